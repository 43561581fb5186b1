import type {
  AudioFrame,
  ConversationSnapshot,
  ConversationUpdate,
  ResolvedBackendConfig,
} from "../types.js";
import {
  BackendTimeoutError,
  BackendUnavailableError,
  GatewayError,
  toError,
} from "../errors.js";

export interface BackendCallOptions {
  sessionId: string;
  /** Aborted on timeout, barge-in or session close; implementations should stop promptly */
  signal: AbortSignal;
}

export interface BackendResponse {
  text: string;
  /** Topic or preference changes to store in the session's conversation */
  context?: ConversationUpdate | undefined;
}

export interface SynthesizedAudio {
  /** 16-bit mono PCM */
  audio: Buffer;
  sampleRate: number;
}

/**
 * Contract for the speech/LLM backend.
 *
 * Calls are scoped to one session and must not share mutable state across
 * sessions. Audio in is 16kHz mono 16-bit PCM frames; audio out may be at
 * any sample rate and is resampled by the engine.
 */
export interface BackendBridge {
  readonly id: string;

  /** Transcribe one buffered utterance. */
  transcribe(frames: readonly AudioFrame[], options: BackendCallOptions): Promise<string>;

  /** Generate the assistant's reply to `transcript` given the conversation so far. */
  respond(
    transcript: string,
    context: ConversationSnapshot,
    options: BackendCallOptions
  ): Promise<BackendResponse>;

  /**
   * Stream synthesized audio for `text`. Cancellation is cooperative: stop
   * yielding once `options.signal` aborts.
   */
  synthesize(text: string, options: BackendCallOptions): AsyncIterable<SynthesizedAudio>;

  dispose?(): Promise<void>;
}

/**
 * Create the configured backend (lazy import keeps provider code off the
 * load path of embedders that inject their own bridge).
 */
export async function createBackendBridge(config: ResolvedBackendConfig): Promise<BackendBridge> {
  switch (config.provider) {
    case "openai": {
      const { OpenAiBackend } = await import("../providers/openai-backend.js");
      return new OpenAiBackend(config.openai);
    }
  }
}

// ── Deadlines ─────────────────────────────────────────────────────────────────

/**
 * Run one backend call under a deadline.
 *
 * The call gets its own signal, aborted when `parent` aborts or the deadline
 * passes. Expiry raises BackendTimeoutError; any other failure that is not
 * already a GatewayError becomes BackendUnavailableError. A failure after
 * `parent` aborted is rethrown untouched so callers can tell cancellation
 * from faults.
 */
export async function callWithDeadline<T>(
  operation: string,
  timeoutMs: number,
  parent: AbortSignal,
  call: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  // Settles the race as soon as the call is abandoned, even if `call` ignores its signal
  const abandoned = new Promise<never>((_resolve, reject) => {
    controller.signal.addEventListener("abort", () => reject(controller.signal.reason), {
      once: true,
    });
  });

  const onParentAbort = () => controller.abort(parent.reason);
  if (parent.aborted) {
    controller.abort(parent.reason);
  } else {
    parent.addEventListener("abort", onParentAbort, { once: true });
  }

  const timer = setTimeout(() => {
    controller.abort(new BackendTimeoutError(`${operation} timed out after ${timeoutMs}ms`));
  }, timeoutMs);

  try {
    return await Promise.race([call(controller.signal), abandoned]);
  } catch (err) {
    throw classifyBackendError(operation, err, parent);
  } finally {
    clearTimeout(timer);
    parent.removeEventListener("abort", onParentAbort);
  }
}

/**
 * Iterate a backend stream with a deadline on every chunk. Returning early
 * (break, throw) closes the underlying iterator.
 */
export async function* iterateWithDeadline<T>(
  operation: string,
  timeoutMs: number,
  signal: AbortSignal,
  source: AsyncIterable<T>
): AsyncGenerator<T, void, undefined> {
  const iterator = source[Symbol.asyncIterator]();
  let completed = false;

  try {
    while (!signal.aborted) {
      const next = await callWithDeadline(operation, timeoutMs, signal, () => iterator.next());
      if (next.done) {
        completed = true;
        return;
      }
      yield next.value;
    }
  } finally {
    if (!completed && iterator.return) {
      // Fire and forget: a stalled generator cannot answer return() until its
      // pending next() settles, and cancellation must not wait on it.
      iterator.return().catch(() => undefined);
    }
  }
}

function classifyBackendError(operation: string, err: unknown, parent: AbortSignal): Error {
  if (err instanceof GatewayError) return err;
  if (parent.aborted) return toError(err);
  const cause = toError(err);
  return new BackendUnavailableError(`${operation} failed: ${cause.message}`, { cause });
}
