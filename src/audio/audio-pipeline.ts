import type { AudioFrame } from "../types.js";
import type { VoiceActivityDetector } from "./vad.js";
import { BYTES_PER_SAMPLE, DEFAULT_FRAME_SAMPLES } from "../constants.js";

export interface AudioChunkPipelineOptions {
  frameSamples?: number;
  /** First sequence number handed out (default 0) */
  startSequence?: number;
  clock?: () => number;
}

/**
 * Turns a raw 16kHz mono 16-bit PCM byte stream into sequenced frames.
 *
 * Bytes are copied into a fixed frame-sized accumulator. Every time it fills,
 * one frame comes out, tagged with the next sequence number and the session
 * VAD's verdict. Partial frames never leave the pipeline; an odd trailing
 * byte waits for its partner in the next push.
 *
 * One instance per VoiceSession.
 */
export class AudioChunkPipeline {
  readonly frameSamples: number;

  private readonly vad: VoiceActivityDetector;
  private readonly clock: () => number;
  private readonly accumulator: Buffer;
  private filled = 0;
  private nextSequence: number;

  constructor(vad: VoiceActivityDetector, options: AudioChunkPipelineOptions = {}) {
    this.vad = vad;
    this.frameSamples = options.frameSamples ?? DEFAULT_FRAME_SAMPLES;
    this.nextSequence = options.startSequence ?? 0;
    this.clock = options.clock ?? Date.now;
    this.accumulator = Buffer.alloc(this.frameSamples * BYTES_PER_SAMPLE);
  }

  /** Append raw PCM bytes; returns the frames completed by this push, in order. */
  push(bytes: Uint8Array, timestamp?: number): AudioFrame[] {
    const frames: AudioFrame[] = [];
    let offset = 0;

    while (offset < bytes.length) {
      const take = Math.min(this.accumulator.length - this.filled, bytes.length - offset);
      this.accumulator.set(bytes.subarray(offset, offset + take), this.filled);
      this.filled += take;
      offset += take;

      if (this.filled === this.accumulator.length) {
        frames.push(this.emitFrame(timestamp ?? this.clock()));
        this.filled = 0;
      }
    }

    return frames;
  }

  /** Samples waiting for the current frame to fill */
  get pendingSamples(): number {
    return Math.floor(this.filled / BYTES_PER_SAMPLE);
  }

  /** Sequence number the next frame will carry */
  get sequence(): number {
    return this.nextSequence;
  }

  /** Drop any partial frame. Sequence numbering is not rewound. */
  reset(): void {
    this.filled = 0;
  }

  private emitFrame(timestamp: number): AudioFrame {
    const samples = pcmToSamples(this.accumulator);
    return {
      sequenceNumber: this.nextSequence++,
      samples,
      hasVoice: this.vad.classify(samples),
      timestamp,
    };
  }
}

// ── PCM helpers ───────────────────────────────────────────────────────────────

/** Decode little-endian 16-bit PCM. A trailing odd byte is ignored. */
export function pcmToSamples(pcm: Uint8Array): Int16Array {
  const view = Buffer.from(pcm.buffer, pcm.byteOffset, pcm.byteLength);
  const count = Math.floor(view.length / BYTES_PER_SAMPLE);
  const samples = new Int16Array(count);
  for (let i = 0; i < count; i++) {
    samples[i] = view.readInt16LE(i * BYTES_PER_SAMPLE);
  }
  return samples;
}

/** Encode samples as little-endian 16-bit PCM */
export function samplesToPcm(samples: Int16Array): Buffer {
  const pcm = Buffer.allocUnsafe(samples.length * BYTES_PER_SAMPLE);
  for (let i = 0; i < samples.length; i++) {
    pcm.writeInt16LE(samples[i], i * BYTES_PER_SAMPLE);
  }
  return pcm;
}

/** Concatenate frames back into one PCM buffer (for batch transcription) */
export function framesToPcm(frames: readonly AudioFrame[]): Buffer {
  return Buffer.concat(frames.map((frame) => samplesToPcm(frame.samples)));
}

// ── Resampling ────────────────────────────────────────────────────────────────

/** Resample 16-bit mono PCM by linear interpolation between neighbouring samples. */
export function resample(pcm: Buffer, fromRate: number, toRate: number): Buffer {
  if (fromRate === toRate) return pcm;

  const input = pcmToSamples(pcm);
  const step = fromRate / toRate;
  const output = new Int16Array(Math.round(input.length / step));

  for (let i = 0; i < output.length; i++) {
    const position = i * step;
    const left = Math.floor(position);
    const a = input[left] ?? 0;
    const b = input[left + 1] ?? a;
    output[i] = Math.round(a + (position - left) * (b - a));
  }

  return samplesToPcm(output);
}
