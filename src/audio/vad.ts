import type { ResolvedVadConfig } from "../types.js";
import { INT16_SCALE } from "../constants.js";

/**
 * Energy-based voice activity detector.
 *
 * One instance per session; state carries across frames:
 *   - RMS of each frame is measured on samples normalized to [-1, 1]
 *   - above threshold the run counter grows by the frame's sample count
 *     (capped at activation + hangover), otherwise it decays by the same amount
 *   - voice is reported while the counter is at or above the activation run
 *
 * The hangover lets a voiced stretch outlast a short dip in energy, so
 * single quiet frames inside a word do not read as silence.
 */
export class VoiceActivityDetector {
  private readonly threshold: number;
  private readonly activationSamples: number;
  private readonly ceiling: number;
  private runSamples = 0;

  constructor(config: Pick<ResolvedVadConfig, "threshold" | "activationSamples" | "hangoverSamples">) {
    this.threshold = config.threshold;
    this.activationSamples = config.activationSamples;
    this.ceiling = config.activationSamples + config.hangoverSamples;
  }

  /** Classify one frame. Empty input leaves state untouched and reports the current verdict. */
  classify(samples: Int16Array): boolean {
    if (samples.length > 0) {
      if (calculateRms(samples) > this.threshold) {
        this.runSamples = Math.min(this.ceiling, this.runSamples + samples.length);
      } else {
        this.runSamples = Math.max(0, this.runSamples - samples.length);
      }
    }
    return this.runSamples >= this.activationSamples;
  }

  get run(): number {
    return this.runSamples;
  }

  reset(): void {
    this.runSamples = 0;
  }
}

/**
 * Signals the end of an utterance: a configured number of consecutive
 * silent frames after at least one voiced frame. Fires once, then re-arms.
 */
export class EndOfUtteranceDetector {
  private readonly requiredSilentFrames: number;
  private heardVoice = false;
  private silentFrames = 0;

  constructor(config: Pick<ResolvedVadConfig, "endOfUtteranceFrames">) {
    this.requiredSilentFrames = config.endOfUtteranceFrames;
  }

  /** Returns true on the frame that completes the utterance. */
  observe(hasVoice: boolean): boolean {
    if (hasVoice) {
      this.heardVoice = true;
      this.silentFrames = 0;
      return false;
    }

    if (!this.heardVoice) return false;

    this.silentFrames++;
    if (this.silentFrames >= this.requiredSilentFrames) {
      this.reset();
      return true;
    }
    return false;
  }

  /** True between the first voiced frame and the end of the utterance. */
  get inUtterance(): boolean {
    return this.heardVoice;
  }

  reset(): void {
    this.heardVoice = false;
    this.silentFrames = 0;
  }
}

// ── Utility ───────────────────────────────────────────────────────────────────

/** RMS energy of 16-bit samples, normalized to [0, 1] */
export function calculateRms(samples: Int16Array): number {
  if (samples.length === 0) return 0;

  let sum = 0;
  for (let i = 0; i < samples.length; i++) {
    const sample = samples[i] / INT16_SCALE;
    sum += sample * sample;
  }
  return Math.sqrt(sum / samples.length);
}
