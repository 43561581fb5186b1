import type { AudioFrame } from "../types.js";
import { BufferOverflowError } from "../errors.js";

/**
 * Bounded, ordered store of inbound frames awaiting the backend.
 *
 * At capacity the oldest frames are evicted to make room: a stalled backend
 * degrades the session instead of growing memory without limit. `push`
 * reports the eviction as a BufferOverflowError for the caller to log.
 */
export class FrameBuffer {
  readonly capacity: number;
  private frames: AudioFrame[] = [];

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`FrameBuffer capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  /** Append a frame. Returns the overflow it caused, or null. */
  push(frame: AudioFrame): BufferOverflowError | null {
    this.frames.push(frame);
    const excess = this.frames.length - this.capacity;
    if (excess <= 0) return null;

    this.frames.splice(0, excess);
    return new BufferOverflowError(this.capacity, excess);
  }

  /** Remove and return everything buffered, oldest first. */
  drain(): AudioFrame[] {
    const drained = this.frames;
    this.frames = [];
    return drained;
  }

  /** Drop all but the newest `count` frames. */
  retainLast(count: number): void {
    if (this.frames.length > count) {
      this.frames.splice(0, this.frames.length - count);
    }
  }

  peek(): readonly AudioFrame[] {
    return this.frames;
  }

  clear(): void {
    this.frames = [];
  }

  get length(): number {
    return this.frames.length;
  }

  /** True when at least one buffered frame carries voice */
  get hasVoice(): boolean {
    return this.frames.some((frame) => frame.hasVoice);
  }
}
