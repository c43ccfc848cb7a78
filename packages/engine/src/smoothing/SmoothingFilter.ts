/**
 * Smoothing Filter
 *
 * Per-feature exponential moving average:
 *
 *   smoothed = alpha * raw + (1 - alpha) * previousSmoothed
 *
 * The first sample of a session initializes the accumulator to the raw
 * value, so there is no ramp up from zero.
 */

import { FEATURE_CLASSES, FEATURE_NAMES } from "@sonokinetic/contracts";
import type { FeatureName } from "@sonokinetic/contracts";
import type { SmoothingConfig } from "../config/SessionConfig";

export class ExponentialSmoother {
  readonly alpha: number;
  private previous: number | null = null;

  constructor(alpha: number) {
    this.alpha = alpha;
  }

  get value(): number | null {
    return this.previous;
  }

  update(raw: number): number {
    const smoothed =
      this.previous === null ? raw : this.alpha * raw + (1 - this.alpha) * this.previous;
    this.previous = smoothed;
    return smoothed;
  }

  reset(): void {
    this.previous = null;
  }
}

export class SmoothingFilter {
  private smoothers: Map<FeatureName, ExponentialSmoother> = new Map();

  constructor(config: SmoothingConfig) {
    for (const name of FEATURE_NAMES) {
      const alpha = config.overrides[name] ?? config.alphas[FEATURE_CLASSES[name]];
      this.smoothers.set(name, new ExponentialSmoother(alpha));
    }
  }

  alphaOf(name: FeatureName): number {
    return this.smoother(name).alpha;
  }

  smooth(name: FeatureName, raw: number): number {
    return this.smoother(name).update(raw);
  }

  /** Last smoothed value, or null if the feature has never been computed. */
  hold(name: FeatureName): number | null {
    return this.smoother(name).value;
  }

  reset(): void {
    for (const smoother of this.smoothers.values()) {
      smoother.reset();
    }
  }

  private smoother(name: FeatureName): ExponentialSmoother {
    const smoother = this.smoothers.get(name);
    if (!smoother) {
      throw new Error(`No smoother for feature: ${name}`);
    }
    return smoother;
  }
}

/**
 * Frames of constant input needed before a step of size `step` is within
 * `epsilon` of the input. The residual after k frames is
 * |step| * (1 - alpha)^k.
 */
export function framesToConverge(alpha: number, epsilon: number, step: number): number {
  const magnitude = Math.abs(step);
  if (magnitude <= epsilon) return 0;
  if (alpha >= 1) return 1;
  return Math.ceil(Math.log(epsilon / magnitude) / Math.log(1 - alpha));
}
