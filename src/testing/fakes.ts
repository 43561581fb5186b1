import { setImmediate as nextTick } from "node:timers/promises";
import { z } from "zod";
import type {
  AudioFrame,
  ConversationSnapshot,
  ResolvedAudioConfig,
  ResolvedConfig,
  ResolvedSessionConfig,
  ResolvedVadConfig,
  SessionConnection,
} from "../types.js";
import type {
  BackendBridge,
  BackendCallOptions,
  BackendResponse,
  SynthesizedAudio,
} from "../backend/backend-bridge.js";
import { samplesToPcm } from "../audio/audio-pipeline.js";
import { encodeHex } from "../protocol/messages.js";
import {
  DEFAULT_BACKEND_TIMEOUT_MS,
  DEFAULT_BUFFER_CAPACITY_FRAMES,
  DEFAULT_FRAME_SAMPLES,
  DEFAULT_IDLE_TIMEOUT_MS,
  DEFAULT_MAX_CONVERSATION_TURNS,
  DEFAULT_SWEEP_INTERVAL_MS,
  DEFAULT_VAD_ACTIVATION_SAMPLES,
  DEFAULT_VAD_HANGOVER_SAMPLES,
  DEFAULT_VAD_THRESHOLD,
  SAMPLE_RATE,
} from "../constants.js";

// ── Config ────────────────────────────────────────────────────────────────────

export type EngineConfig = Pick<ResolvedConfig, "audio" | "vad" | "session">;

/**
 * Engine config for tests: library defaults, except utterances end after 3
 * silent frames and cancellation waits 50ms.
 */
export function testConfig(overrides: {
  audio?: Partial<ResolvedAudioConfig>;
  vad?: Partial<ResolvedVadConfig>;
  session?: Partial<ResolvedSessionConfig>;
} = {}): EngineConfig {
  return {
    audio: { frameSamples: DEFAULT_FRAME_SAMPLES, ...overrides.audio },
    vad: {
      threshold: DEFAULT_VAD_THRESHOLD,
      activationSamples: DEFAULT_VAD_ACTIVATION_SAMPLES,
      hangoverSamples: DEFAULT_VAD_HANGOVER_SAMPLES,
      endOfUtteranceFrames: 3,
      ...overrides.vad,
    },
    session: {
      idleTimeoutMs: DEFAULT_IDLE_TIMEOUT_MS,
      sweepIntervalMs: DEFAULT_SWEEP_INTERVAL_MS,
      bufferCapacityFrames: DEFAULT_BUFFER_CAPACITY_FRAMES,
      maxConversationTurns: DEFAULT_MAX_CONVERSATION_TURNS,
      backendTimeoutMs: DEFAULT_BACKEND_TIMEOUT_MS,
      cancelTimeoutMs: 50,
      ...overrides.session,
    },
  };
}

// ── Audio ─────────────────────────────────────────────────────────────────────

/** Square wave at ±amplitude; RMS is amplitude / 32768 */
export function tone(samples: number, amplitude: number): Int16Array {
  const out = new Int16Array(samples);
  for (let i = 0; i < samples; i++) {
    out[i] = i % 2 === 0 ? amplitude : -amplitude;
  }
  return out;
}

export function voiced(samples = DEFAULT_FRAME_SAMPLES): Int16Array {
  return tone(samples, 8_000);
}

export function silence(samples = DEFAULT_FRAME_SAMPLES): Int16Array {
  return new Int16Array(samples);
}

export function frame(sequenceNumber: number, hasVoice: boolean, samples = DEFAULT_FRAME_SAMPLES): AudioFrame {
  return {
    sequenceNumber,
    samples: hasVoice ? voiced(samples) : silence(samples),
    hasVoice,
    timestamp: 0,
  };
}

/** JSON `audio_chunk` text message carrying `samples` */
export function chunkMessage(
  sequenceNumber: number,
  samples: Int16Array,
  extra: Record<string, unknown> = {}
): string {
  return JSON.stringify({
    type: "audio_chunk",
    audio_data: encodeHex(samplesToPcm(samples)),
    sequence_number: sequenceNumber,
    ...extra,
  });
}

// ── Connection ────────────────────────────────────────────────────────────────

const outboundSchema = z
  .object({ type: z.string(), session_id: z.string(), timestamp: z.string() })
  .passthrough();

export type RecordedMessage = z.infer<typeof outboundSchema>;

export function parseOutbound(raw: string): RecordedMessage {
  return outboundSchema.parse(JSON.parse(raw));
}

/** In-memory SessionConnection that records everything sent to it. */
export class RecordingConnection implements SessionConnection {
  readonly remoteAddress = "127.0.0.1";
  readonly sent: string[] = [];
  readonly closes: Array<{ code: number | undefined; reason: string | undefined }> = [];

  send(data: string): void {
    this.sent.push(data);
  }

  close(code?: number, reason?: string): void {
    this.closes.push({ code, reason });
  }

  get messages(): RecordedMessage[] {
    return this.sent.map(parseOutbound);
  }

  get types(): string[] {
    return this.messages.map((m) => m.type);
  }

  ofType(type: string): RecordedMessage[] {
    return this.messages.filter((m) => m.type === type);
  }
}

// ── Backend ───────────────────────────────────────────────────────────────────

/** Resolves once `signal` aborts. */
export function aborted(signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    signal.addEventListener("abort", () => resolve(), { once: true });
  });
}

/** Rejects with the abort reason once `signal` aborts; never resolves. */
export function hang<T>(signal: AbortSignal): Promise<T> {
  return aborted(signal).then(() => {
    throw signal.reason;
  });
}

/**
 * Scriptable BackendBridge. Behavior is swapped per test through the
 * `*Impl` fields; every call is recorded.
 */
export class FakeBackend implements BackendBridge {
  readonly id = "fake";

  transcribeImpl: (frames: readonly AudioFrame[], options: BackendCallOptions) => Promise<string> =
    async () => "hello there";
  respondImpl: (
    transcript: string,
    context: ConversationSnapshot,
    options: BackendCallOptions
  ) => Promise<BackendResponse> = async (transcript) => ({ text: `You said: ${transcript}` });

  audioChunks: Buffer[] = [Buffer.alloc(640)];
  audioSampleRate = SAMPLE_RATE;
  /** Keep the synthesis stream open after the last chunk until it is cancelled */
  holdStream = false;
  /** Thrown by the synthesis stream after the last chunk */
  streamError: Error | null = null;

  readonly transcribed: AudioFrame[][] = [];
  readonly contexts: ConversationSnapshot[] = [];
  readonly synthesized: string[] = [];
  streamsClosed = 0;
  disposed = false;

  transcribe(frames: readonly AudioFrame[], options: BackendCallOptions): Promise<string> {
    this.transcribed.push([...frames]);
    return this.transcribeImpl(frames, options);
  }

  respond(
    transcript: string,
    context: ConversationSnapshot,
    options: BackendCallOptions
  ): Promise<BackendResponse> {
    this.contexts.push(context);
    return this.respondImpl(transcript, context, options);
  }

  async *synthesize(text: string, options: BackendCallOptions): AsyncGenerator<SynthesizedAudio> {
    this.synthesized.push(text);
    try {
      for (const audio of this.audioChunks) {
        if (options.signal.aborted) return;
        yield { audio, sampleRate: this.audioSampleRate };
      }
      if (this.streamError) throw this.streamError;
      if (this.holdStream) {
        await aborted(options.signal);
      }
    } finally {
      this.streamsClosed++;
    }
  }

  async dispose(): Promise<void> {
    this.disposed = true;
  }
}

// ── Timing ────────────────────────────────────────────────────────────────────

/** Poll `predicate` on each event-loop turn until it holds. */
export async function until(predicate: () => boolean, timeoutMs = 1_000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await nextTick();
  }
}
