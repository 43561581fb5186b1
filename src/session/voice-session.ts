import { randomUUID } from "node:crypto";
import type { Logger } from "pino";
import type { ResolvedConfig, SessionConnection, SessionState } from "../types.js";
import { AudioChunkPipeline } from "../audio/audio-pipeline.js";
import { FrameBuffer } from "../audio/frame-buffer.js";
import { EndOfUtteranceDetector, VoiceActivityDetector } from "../audio/vad.js";
import { ConversationContext } from "./conversation-context.js";
import { SessionLock } from "./session-lock.js";
import { SequenceError, StateTransitionError } from "../errors.js";
import { serializeServerMessage, type ServerMessage } from "../protocol/messages.js";

/**
 * Legal moves of the session state machine:
 *   init → listening → processing → speaking → listening → ...
 *   speaking → interrupted → listening   (barge-in)
 *   processing → listening               (backend failure or empty transcript)
 *   any → closed
 */
const TRANSITIONS: Readonly<Record<SessionState, readonly SessionState[]>> = {
  init: ["listening", "closed"],
  listening: ["processing", "closed"],
  processing: ["speaking", "listening", "closed"],
  speaking: ["listening", "interrupted", "closed"],
  interrupted: ["listening", "closed"],
  closed: [],
};

export function canTransition(from: SessionState, to: SessionState): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * Owning handle on the outbound synthesis stream of one response.
 * Cancelling aborts the signal handed to the backend; the stream loop calls
 * `finish()` once it has stopped producing, which settles `settled`.
 */
export class ResponseHandle {
  readonly text: string;
  readonly settled: Promise<void>;

  private readonly controller = new AbortController();
  private settle: () => void = () => {};
  private done = false;

  constructor(text: string) {
    this.text = text;
    this.settled = new Promise<void>((resolve) => {
      this.settle = resolve;
    });
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  get finished(): boolean {
    return this.done;
  }

  cancel(reason = "response cancelled"): void {
    if (!this.controller.signal.aborted) {
      this.controller.abort(new Error(reason));
    }
  }

  finish(): void {
    this.done = true;
    this.settle();
  }
}

export interface VoiceSessionOptions {
  connection: SessionConnection;
  config: Pick<ResolvedConfig, "audio" | "vad" | "session">;
  logger: Logger;
  clock?: () => number;
  sessionId?: string;
}

/**
 * Per-connection voice session.
 *
 * Holds everything one conversation owns: the state machine, inbound and
 * outbound counters, the bounded frame buffer, VAD state, the conversation
 * context and the handle of the response currently being spoken. It does
 * not drive turns itself; SessionManager does that under `lock`.
 */
export class VoiceSession {
  readonly sessionId: string;
  readonly connection: SessionConnection;
  readonly logger: Logger;
  readonly createdAt: number;

  readonly buffer: FrameBuffer;
  readonly context: ConversationContext;
  readonly vad: VoiceActivityDetector;
  readonly endOfUtterance: EndOfUtteranceDetector;
  readonly pipeline: AudioChunkPipeline;
  readonly lock = new SessionLock();

  /** An utterance ended while the session could not take a new turn */
  utterancePending = false;

  private readonly clock: () => number;
  private _state: SessionState = "init";
  private _inboundSequence = 0;
  private _outboundSequence = 0;
  private _lastActivity: number;
  private _pendingResponse: ResponseHandle | null = null;
  private turnController: AbortController | null = null;

  constructor(options: VoiceSessionOptions) {
    const { config } = options;
    this.sessionId = options.sessionId ?? randomUUID();
    this.connection = options.connection;
    this.clock = options.clock ?? Date.now;
    this.createdAt = this.clock();
    this._lastActivity = this.createdAt;
    this.logger = options.logger.child({ sessionId: this.sessionId });

    this.buffer = new FrameBuffer(config.session.bufferCapacityFrames);
    this.context = new ConversationContext({ maxTurns: config.session.maxConversationTurns });
    this.vad = new VoiceActivityDetector(config.vad);
    this.endOfUtterance = new EndOfUtteranceDetector(config.vad);
    this.pipeline = new AudioChunkPipeline(this.vad, {
      frameSamples: config.audio.frameSamples,
      clock: this.clock,
    });
  }

  get state(): SessionState {
    return this._state;
  }

  get isClosed(): boolean {
    return this._state === "closed";
  }

  get inboundSequence(): number {
    return this._inboundSequence;
  }

  get outboundSequence(): number {
    return this._outboundSequence;
  }

  get lastActivity(): number {
    return this._lastActivity;
  }

  /** Non-null exactly while the session is speaking */
  get pendingResponse(): ResponseHandle | null {
    return this._pendingResponse;
  }

  // ── State machine ───────────────────────────────────────────────────────────

  /**
   * Move to `to`. Leaving `speaking` drops the response handle (cancelling it
   * when closing); entering it goes through `beginSpeaking` so the handle is
   * always set.
   * @throws StateTransitionError when the move is not in the table
   */
  transition(to: Exclude<SessionState, "speaking">): void {
    this.assertTransition(to);
    const from = this._state;
    this._state = to;
    if (from === "speaking") {
      if (to === "closed") this._pendingResponse?.cancel("session closed");
      this._pendingResponse = null;
    }
    this.logger.debug({ from, to }, "State transition");
  }

  beginSpeaking(handle: ResponseHandle): void {
    this.assertTransition("speaking");
    const from = this._state;
    this._state = "speaking";
    this._pendingResponse = handle;
    this.logger.debug({ from, to: "speaking" }, "State transition");
  }

  /** True while `handle` is the live response and may still send audio. */
  isCurrentResponse(handle: ResponseHandle): boolean {
    return this._state === "speaking" && this._pendingResponse === handle && !handle.cancelled;
  }

  private assertTransition(to: SessionState): void {
    if (!canTransition(this._state, to)) {
      throw new StateTransitionError(this._state, to);
    }
  }

  // ── Sequencing ──────────────────────────────────────────────────────────────

  /**
   * Claim the next inbound sequence slot.
   * @throws SequenceError if `sequenceNumber` is not the expected one
   */
  acceptSequence(sequenceNumber: number): void {
    if (sequenceNumber !== this._inboundSequence) {
      throw new SequenceError(this._inboundSequence, sequenceNumber);
    }
    this._inboundSequence++;
    this.touch();
  }

  nextOutboundSequence(): number {
    return this._outboundSequence++;
  }

  touch(): void {
    this._lastActivity = this.clock();
  }

  // ── Backend turn ────────────────────────────────────────────────────────────

  /** Signal for the backend calls of a new turn; aborts any previous one. */
  beginTurn(): AbortSignal {
    this.turnController?.abort();
    this.turnController = new AbortController();
    return this.turnController.signal;
  }

  endTurn(signal: AbortSignal): void {
    if (this.turnController?.signal === signal) {
      this.turnController = null;
    }
  }

  // ── Outbound ────────────────────────────────────────────────────────────────

  /** Send a message on this session's connection. Dropped once closed. */
  send(message: ServerMessage): boolean {
    if (this._state === "closed") return false;
    return this.write(message);
  }

  /** Last message of a closing session; bypasses the closed check. */
  sendFinal(message: ServerMessage): boolean {
    return this.write(message);
  }

  private write(message: ServerMessage): boolean {
    const now = this.clock();
    try {
      this.connection.send(serializeServerMessage(this.sessionId, message, now));
    } catch (err) {
      this.logger.warn({ err, type: message.type }, "Failed to send message");
      return false;
    }
    this._lastActivity = now;
    return true;
  }

  // ── Teardown ────────────────────────────────────────────────────────────────

  /**
   * Cancel the response handle and in-flight backend calls, release buffers
   * and conversation state. Called once by SessionManager.endSession after
   * the session is marked closed.
   */
  release(): void {
    this._pendingResponse?.cancel("session closed");
    this._pendingResponse = null;
    this.turnController?.abort();
    this.turnController = null;
    this.utterancePending = false;

    this.buffer.clear();
    this.context.clear();
    this.vad.reset();
    this.endOfUtterance.reset();
    this.pipeline.reset();
  }

  toJSON(): SessionSnapshot {
    return {
      sessionId: this.sessionId,
      state: this._state,
      inboundSequence: this._inboundSequence,
      outboundSequence: this._outboundSequence,
      bufferedFrames: this.buffer.length,
      conversationTurns: this.context.length,
      lastActivity: new Date(this._lastActivity).toISOString(),
      remoteAddress: this.connection.remoteAddress,
    };
  }
}

export interface SessionSnapshot {
  sessionId: string;
  state: SessionState;
  inboundSequence: number;
  outboundSequence: number;
  bufferedFrames: number;
  conversationTurns: number;
  lastActivity: string;
  remoteAddress: string;
}
