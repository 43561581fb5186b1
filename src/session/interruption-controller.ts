import { setTimeout as delay } from "node:timers/promises";
import type { Logger } from "pino";
import type { AudioFrame } from "../types.js";
import type { ResponseHandle, VoiceSession } from "./voice-session.js";

export interface InterruptionControllerOptions {
  /** Longest wait for the synthesis stream to acknowledge cancellation */
  cancelTimeoutMs: number;
  logger: Logger;
}

/**
 * Barge-in handling.
 *
 * Only acts on a speaking session; anywhere else it is a no-op. Callers hold
 * the session lock, so no inbound frame is processed between cancelling the
 * response and acknowledging the interruption to the client.
 */
export class InterruptionController {
  private readonly cancelTimeoutMs: number;
  private readonly logger: Logger;
  private interruptions = 0;
  private unacknowledged = 0;

  constructor(options: InterruptionControllerOptions) {
    this.cancelTimeoutMs = options.cancelTimeoutMs;
    this.logger = options.logger;
  }

  /**
   * Cancel the response being spoken and return the session to listening.
   *
   * @param trigger - voiced frame that caused the barge-in; kept as the first
   *   frame of the next utterance
   * @returns true if the session was interrupted, false if it was not speaking
   */
  async interrupt(session: VoiceSession, trigger?: AudioFrame): Promise<boolean> {
    if (session.state !== "speaking") return false;

    const handle = session.pendingResponse;
    session.transition("interrupted");
    handle?.cancel("interrupted by user speech");
    session.context.markLastAssistantInterrupted();

    if (handle) {
      await this.awaitStreamStop(session, handle);
    }

    // Closed while waiting; endSession has already released everything
    if (session.isClosed) return true;

    session.buffer.clear();
    session.endOfUtterance.reset();
    session.utterancePending = false;
    if (trigger) {
      session.buffer.push(trigger);
      session.endOfUtterance.observe(trigger.hasVoice);
    }

    session.send({ type: "interruption" });
    session.transition("listening");
    this.interruptions++;

    session.logger.info(
      { trigger: trigger?.sequenceNumber ?? null },
      "Response interrupted by barge-in"
    );
    return true;
  }

  get stats(): { interruptions: number; unacknowledgedCancellations: number } {
    return {
      interruptions: this.interruptions,
      unacknowledgedCancellations: this.unacknowledged,
    };
  }

  /**
   * Wait a bounded time for the stream loop to stop. The client is told to
   * stop playback either way; a late stream can no longer send because its
   * handle is cancelled and detached.
   */
  private async awaitStreamStop(session: VoiceSession, handle: ResponseHandle): Promise<void> {
    const stopped = await Promise.race([
      handle.settled.then(() => true),
      delay(this.cancelTimeoutMs, false, { ref: false }),
    ]);

    if (!stopped) {
      this.unacknowledged++;
      this.logger.warn(
        { sessionId: session.sessionId, cancelTimeoutMs: this.cancelTimeoutMs },
        "Backend did not acknowledge synthesis cancellation in time; backend degraded"
      );
    }
  }
}
