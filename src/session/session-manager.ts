import type { Logger } from "pino";
import type { AudioFrame, EndReason, ResolvedConfig, SessionConnection } from "../types.js";
import { VoiceSession, ResponseHandle, type SessionSnapshot } from "./voice-session.js";
import { InterruptionController } from "./interruption-controller.js";
import {
  callWithDeadline,
  iterateWithDeadline,
  type BackendBridge,
  type BackendResponse,
} from "../backend/backend-bridge.js";
import {
  decodeAudioChunk,
  encodeHex,
  parseClientMessage,
  type AudioChunkMessage,
  type ClientMessage,
} from "../protocol/messages.js";
import { resample } from "../audio/audio-pipeline.js";
import {
  AudioFormatError,
  GatewayError,
  SessionNotFoundError,
  toError,
} from "../errors.js";
import { createLogger } from "../logger.js";
import { PRE_ROLL_FRAMES, SAMPLE_RATE } from "../constants.js";

/** WebSocket close code sent for each way a session can end */
const CLOSE_CODES: Readonly<Record<EndReason, number>> = {
  client_closed: 1000,
  idle_timeout: 1001,
  server_shutdown: 1001,
  protocol_error: 1008,
  sequence_error: 1008,
  connection_error: 1011,
  internal_error: 1011,
};

export interface SessionManagerOptions {
  config: Pick<ResolvedConfig, "audio" | "vad" | "session">;
  backend: BackendBridge;
  logger?: Logger;
  clock?: () => number;
}

export interface SessionManagerStats {
  activeSessions: number;
  interruptions: number;
  unacknowledgedCancellations: number;
  sessions: SessionSnapshot[];
}

/**
 * Owns every live VoiceSession and drives its turn-taking.
 *
 * Inbound:  raw message → protocol parse → frame → ingestFrame (under the session lock)
 * Turn:     end-of-utterance → transcribe → respond → synthesize, streamed back as `response`
 * Barge-in: voiced frame while speaking → InterruptionController
 *
 * The registry is the only state shared between sessions. Every closure
 * path (client close, idle timeout, protocol or sequence fault, shutdown)
 * goes through endSession.
 */
export class SessionManager {
  private sessions = new Map<string, VoiceSession>();
  private readonly config: SessionManagerOptions["config"];
  private readonly backend: BackendBridge;
  private readonly logger: Logger;
  private readonly clock: () => number;
  private readonly interruption: InterruptionController;
  private readonly activeTurns = new Set<Promise<void>>();
  private sweepTimer: ReturnType<typeof setInterval> | null = null;

  constructor(options: SessionManagerOptions) {
    this.config = options.config;
    this.backend = options.backend;
    this.logger = options.logger ?? createLogger({ component: "session-manager" });
    this.clock = options.clock ?? Date.now;
    this.interruption = new InterruptionController({
      cancelTimeoutMs: this.config.session.cancelTimeoutMs,
      logger: this.logger,
    });
  }

  // ── Lifecycle ───────────────────────────────────────────────────────────────

  /** Start the periodic idle sweep. */
  start(): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => {
      this.sweepIdleSessions();
    }, this.config.session.sweepIntervalMs);
    this.sweepTimer.unref();
  }

  /** Stop the sweep; sessions stay open. */
  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  /** Close every session, wait for their turns to unwind and release the backend. */
  async stopAll(): Promise<void> {
    this.stop();
    for (const session of [...this.sessions.values()]) {
      this.endSession(session, "server_shutdown");
    }
    await this.waitForTurns();
    await this.backend.dispose?.();
    this.logger.info("All sessions stopped");
  }

  // ── Sessions ────────────────────────────────────────────────────────────────

  /** Register a session for a new connection and announce it. */
  startSession(connection: SessionConnection): VoiceSession {
    const session = new VoiceSession({
      connection,
      config: this.config,
      logger: this.logger,
      clock: this.clock,
    });

    this.sessions.set(session.sessionId, session);
    session.transition("listening");
    session.send({ type: "session_started" });

    session.logger.info({ remoteAddress: connection.remoteAddress }, "Session started");
    return session;
  }

  getSession(sessionId: string): VoiceSession | undefined {
    return this.sessions.get(sessionId);
  }

  /** @throws SessionNotFoundError for unknown or expired ids */
  requireSession(sessionId: string): VoiceSession {
    const session = this.sessions.get(sessionId);
    if (!session) throw new SessionNotFoundError(sessionId);
    return session;
  }

  /**
   * Close a session. Idempotent: the first call releases everything and sends
   * the final message, later calls do nothing.
   *
   * @param error - the fault that ended the session; sent as the final `error`
   *   message instead of `session_ended`
   */
  endSession(session: VoiceSession, reason: EndReason, error?: Error): void {
    if (session.isClosed) return;

    if (this.sessions.get(session.sessionId) === session) {
      this.sessions.delete(session.sessionId);
    }

    session.transition("closed");
    session.release();

    if (error) {
      session.sendFinal({
        type: "error",
        message: error.message,
        kind: error instanceof GatewayError ? error.kind : "InternalError",
      });
    } else if (reason !== "connection_error") {
      session.sendFinal({ type: "session_ended", reason });
    }

    try {
      session.connection.close(CLOSE_CODES[reason], reason);
    } catch (err) {
      session.logger.warn({ err }, "Error closing connection");
    }

    session.logger.info({ reason, error: error?.message }, "Session ended");
  }

  /** Close sessions idle longer than the configured timeout. Returns how many were closed. */
  sweepIdleSessions(): number {
    const now = this.clock();
    const { idleTimeoutMs } = this.config.session;
    let closed = 0;

    for (const session of [...this.sessions.values()]) {
      if (now - session.lastActivity > idleTimeoutMs) {
        this.endSession(session, "idle_timeout");
        closed++;
      }
    }

    if (closed > 0) {
      this.logger.info({ closed }, "Closed idle sessions");
    }
    return closed;
  }

  getStats(): SessionManagerStats {
    return {
      activeSessions: this.sessions.size,
      ...this.interruption.stats,
      sessions: [...this.sessions.values()].map((s) => s.toJSON()),
    };
  }

  /** Resolves once every in-flight backend turn has finished or unwound. */
  async waitForTurns(): Promise<void> {
    while (this.activeTurns.size > 0) {
      await Promise.allSettled([...this.activeTurns]);
    }
  }

  // ── Inbound ─────────────────────────────────────────────────────────────────

  /**
   * Dispatch one raw transport message. Text is a protocol message; binary is
   * raw PCM for the session's AudioChunkPipeline. Never throws: faults are
   * reported to the client, fatal ones close the session.
   */
  async handleMessage(session: VoiceSession, data: Buffer | string, isBinary: boolean): Promise<void> {
    if (session.isClosed) return;
    session.touch();

    try {
      if (isBinary) {
        await this.ingestRaw(session, typeof data === "string" ? Buffer.from(data) : data);
        return;
      }

      const message = parseClientMessage(typeof data === "string" ? data : data.toString("utf8"));
      if (message.session_id !== undefined && message.session_id !== session.sessionId) {
        throw new SessionNotFoundError(message.session_id);
      }
      await this.dispatch(session, message);
    } catch (err) {
      this.handleError(session, err);
    }
  }

  /**
   * Accept one frame. The frame must carry the session's next inbound
   * sequence number; anything else closes the session with SequenceError.
   */
  async ingestFrame(session: VoiceSession, frame: AudioFrame): Promise<void> {
    try {
      await session.lock.run(() => this.ingestLocked(session, frame));
    } catch (err) {
      this.closeOnFatal(session, err);
      throw err;
    }
  }

  /** Barge-in requested by the client or an operator. No-op unless speaking. */
  async interrupt(sessionId: string): Promise<boolean> {
    const session = this.requireSession(sessionId);
    return session.lock.run(() => this.interruption.interrupt(session));
  }

  private async dispatch(session: VoiceSession, message: ClientMessage): Promise<void> {
    switch (message.type) {
      case "audio_chunk":
        await this.ingestChunk(session, message);
        return;

      case "start_listening":
        await session.lock.run(() => {
          if (session.state === "listening") {
            session.send({ type: "listening_started" });
          }
        });
        return;

      case "stop_listening":
        // Push-to-talk: the client says the utterance is over
        await session.lock.run(() => {
          if (session.state === "listening" && session.buffer.hasVoice) {
            session.endOfUtterance.reset();
            this.startTurn(session);
          }
        });
        return;

      case "interrupt":
        await session.lock.run(() => this.interruption.interrupt(session));
        return;

      case "end_session":
        this.endSession(session, "client_closed");
        return;
    }
  }

  private ingestChunk(session: VoiceSession, message: AudioChunkMessage): Promise<void> {
    return session.lock.run(async () => {
      if (session.isClosed) return;

      let samples: Int16Array;
      try {
        samples = decodeAudioChunk(message, this.config.audio.frameSamples);
      } catch (err) {
        if (!(err instanceof AudioFormatError)) throw err;
        // The slot is consumed so the stream stays in sequence; the audio is dropped
        session.acceptSequence(message.sequence_number);
        this.reportError(session, err);
        return;
      }

      await this.ingestLocked(session, {
        sequenceNumber: message.sequence_number,
        samples,
        hasVoice: session.vad.classify(samples),
        timestamp: message.timestamp ?? this.clock(),
      });
    });
  }

  private ingestRaw(session: VoiceSession, bytes: Buffer): Promise<void> {
    return session.lock.run(async () => {
      if (session.isClosed) return;
      for (const frame of session.pipeline.push(bytes, this.clock())) {
        await this.ingestLocked(session, frame);
        if (session.isClosed) return;
      }
    });
  }

  /** Body of ingestFrame; caller holds the session lock. */
  private async ingestLocked(session: VoiceSession, frame: AudioFrame): Promise<void> {
    if (session.isClosed) throw new SessionNotFoundError(session.sessionId);

    session.acceptSequence(frame.sequenceNumber);
    session.send({ type: "audio_chunk_ack", sequence_number: frame.sequenceNumber });

    if (session.state === "speaking" && frame.hasVoice) {
      await this.interruption.interrupt(session, frame);
      return;
    }

    const overflow = session.buffer.push(frame);
    if (overflow) {
      session.logger.warn(
        { capacity: session.buffer.capacity, evicted: overflow.evicted },
        overflow.message
      );
    }

    if (session.state === "listening" || session.state === "processing") {
      const ended = session.endOfUtterance.observe(frame.hasVoice);
      if (ended && session.state === "listening") {
        this.startTurn(session);
        return;
      }
      if (ended) {
        session.utterancePending = true;
        return;
      }
    }

    // Silence before voice onset: keep only the pre-roll
    if (!frame.hasVoice && !session.endOfUtterance.inUtterance && !session.utterancePending) {
      session.buffer.retainLast(PRE_ROLL_FRAMES);
    }
  }

  // ── Turn ────────────────────────────────────────────────────────────────────

  /** listening → processing: hand the buffered utterance to the backend. Caller holds the lock. */
  private startTurn(session: VoiceSession): void {
    session.utterancePending = false;
    const frames = session.buffer.drain();
    session.transition("processing");
    session.send({ type: "listening_stopped" });

    session.logger.debug({ frames: frames.length }, "Utterance complete; processing");

    const signal = session.beginTurn();
    const turn = this.runTurn(session, frames, signal).catch((err: unknown) => {
      session.logger.error({ err }, "Turn runner failed");
      this.endSession(session, "internal_error", toError(err));
    });
    this.activeTurns.add(turn);
    void turn.finally(() => this.activeTurns.delete(turn));
  }

  private async runTurn(session: VoiceSession, frames: AudioFrame[], signal: AbortSignal): Promise<void> {
    const { backendTimeoutMs } = this.config.session;
    const { sessionId } = session;

    try {
      const transcript = await callWithDeadline("transcribe", backendTimeoutMs, signal, (s) =>
        this.backend.transcribe(frames, { sessionId, signal: s })
      );
      if (signal.aborted || session.isClosed) return;

      const text = transcript.trim();
      if (!text) {
        await session.lock.run(() => this.finishProcessing(session));
        return;
      }

      session.send({ type: "transcription", text });
      const context = session.context.snapshot();
      session.context.addTurn({ role: "user", text, timestamp: this.clock() });

      const reply = await callWithDeadline("respond", backendTimeoutMs, signal, (s) =>
        this.backend.respond(text, context, { sessionId, signal: s })
      );
      if (signal.aborted || session.isClosed) return;

      const handle = await session.lock.run(() => this.beginResponse(session, reply));
      if (handle) {
        await this.streamResponse(session, handle);
      }
    } catch (err) {
      if (signal.aborted || session.isClosed) return;
      await session.lock.run(() => {
        this.reportError(session, err);
        this.finishProcessing(session);
      });
    } finally {
      session.endTurn(signal);
    }
  }

  /** processing → speaking. Returns null when there is nothing to say. */
  private beginResponse(session: VoiceSession, reply: BackendResponse): ResponseHandle | null {
    if (session.state !== "processing") return null;
    if (reply.context) {
      session.context.apply(reply.context);
    }

    const text = reply.text.trim();
    if (!text) {
      this.finishProcessing(session);
      return null;
    }

    session.context.addTurn({ role: "assistant", text, timestamp: this.clock() });
    const handle = new ResponseHandle(text);
    session.beginSpeaking(handle);
    session.send({ type: "response", text });
    return handle;
  }

  /**
   * Forward synthesized audio until the stream ends or the handle is
   * cancelled. The handle is checked before every send, so nothing from a
   * cancelled response reaches the client after the cancel.
   */
  private async streamResponse(session: VoiceSession, handle: ResponseHandle): Promise<void> {
    const { backendTimeoutMs } = this.config.session;
    let failure: unknown = null;

    try {
      const stream = this.backend.synthesize(handle.text, {
        sessionId: session.sessionId,
        signal: handle.signal,
      });

      for await (const chunk of iterateWithDeadline("synthesize", backendTimeoutMs, handle.signal, stream)) {
        if (!session.isCurrentResponse(handle)) break;

        const pcm = resample(chunk.audio, chunk.sampleRate, SAMPLE_RATE);
        session.send({
          type: "response",
          text: "",
          audio_data: encodeHex(pcm),
          sequence_number: session.nextOutboundSequence(),
          sample_rate: SAMPLE_RATE,
        });
      }
    } catch (err) {
      if (!handle.cancelled) {
        failure = err;
        handle.cancel("synthesis failed");
      }
    } finally {
      handle.finish();
    }

    await session.lock.run(() => {
      // Interrupted or closed meanwhile: whoever did that owns the state now
      if (session.state !== "speaking" || session.pendingResponse !== handle) return;
      if (failure) this.reportError(session, failure);
      this.backToListening(session);
    });
  }

  /** processing → listening after an empty or failed turn. Caller holds the lock. */
  private finishProcessing(session: VoiceSession): void {
    if (session.state !== "processing") return;
    this.backToListening(session);
  }

  private backToListening(session: VoiceSession): void {
    session.transition("listening");
    session.send({ type: "listening_started" });
    if (session.utterancePending) {
      this.startTurn(session);
    }
  }

  // ── Errors ──────────────────────────────────────────────────────────────────

  /** Send a recoverable error to the client. */
  private reportError(session: VoiceSession, err: unknown): void {
    const error = toError(err);
    const kind = error instanceof GatewayError ? error.kind : "InternalError";
    session.logger.warn({ kind, err: error.message }, "Recoverable session error");
    session.send({ type: "error", message: error.message, kind });
  }

  private handleError(session: VoiceSession, err: unknown): void {
    if (err instanceof GatewayError && !err.fatal) {
      this.reportError(session, err);
      return;
    }
    this.closeOnFatal(session, err);
  }

  private closeOnFatal(session: VoiceSession, err: unknown): void {
    const error = toError(err);
    if (error instanceof GatewayError && !error.fatal) return;

    if (!(error instanceof GatewayError)) {
      session.logger.error({ err: error }, "Unexpected error in session");
    }
    this.endSession(session, endReasonFor(error), error);
  }
}

function endReasonFor(error: Error): EndReason {
  if (error instanceof GatewayError) {
    switch (error.kind) {
      case "ProtocolError":
        return "protocol_error";
      case "SequenceError":
        return "sequence_error";
      default:
        return "internal_error";
    }
  }
  return "internal_error";
}
