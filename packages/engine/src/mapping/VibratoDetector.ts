/**
 * Vibrato Detector
 *
 * Watches the elbow-hip angle of one arm for rapid back-and-forth motion.
 * A direction reversal counts when the angle's rate of change reaches
 * `rateThreshold`. With at least `minReversals` reversals inside the
 * window, depth is the peak-to-peak angle span over the window divided by
 * `fullDepthSpan`, clamped to [0,1]. Otherwise depth is 0.
 */

import type { SessionMs } from "@sonokinetic/contracts";
import type { VibratoConfig } from "../config/SessionConfig";
import { clamp } from "../kinematics/geometry";

interface AngleSample {
  t: SessionMs;
  angle: number;
}

export class VibratoDetector {
  private config: VibratoConfig;
  private samples: AngleSample[] = [];
  private reversals: SessionMs[] = [];
  private lastDirection: -1 | 0 | 1 = 0;

  constructor(config: VibratoConfig) {
    this.config = config;
  }

  update(t: SessionMs, angle: number): number {
    const previous = this.samples[this.samples.length - 1];
    if (previous && t > previous.t) {
      const delta = angle - previous.angle;
      const rate = Math.abs(delta) / ((t - previous.t) / 1000);
      if (rate >= this.config.rateThreshold) {
        const direction = delta > 0 ? 1 : -1;
        if (this.lastDirection !== 0 && direction !== this.lastDirection) {
          this.reversals.push(t);
        }
        this.lastDirection = direction;
      }
    }

    this.samples.push({ t, angle });
    this.prune(t);

    if (this.reversals.length < this.config.minReversals) return 0;

    const angles = this.samples.map((s) => s.angle);
    const span = Math.max(...angles) - Math.min(...angles);
    return clamp(span / this.config.fullDepthSpan, 0, 1);
  }

  reset(): void {
    this.samples = [];
    this.reversals = [];
    this.lastDirection = 0;
  }

  private prune(now: SessionMs): void {
    const horizon = now - this.config.windowMs;
    this.samples = this.samples.filter((s) => s.t >= horizon);
    this.reversals = this.reversals.filter((r) => r >= horizon);
  }
}
