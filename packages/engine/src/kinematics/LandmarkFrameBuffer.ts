/**
 * Landmark Frame Buffer
 *
 * Bounded rolling history of valid samples per landmark, used for
 * finite-difference derivatives (velocity, jerk).
 *
 * ## Gap handling
 *
 * A sample is valid when its visibility reaches `visibilityThreshold`.
 * When the time since a landmark's last valid sample exceeds
 * `gapToleranceMs`, its history is discarded before the new sample is
 * stored, and derivatives read as zero until enough fresh samples exist.
 * A reacquired landmark therefore never produces a derivative spanning
 * the gap.
 */

import type { LandmarkFrame, LandmarkId, Ms, SessionMs } from "@sonokinetic/contracts";
import type { KinematicsConfig, LandmarkConfig } from "../config/SessionConfig";
import { clamp, distance } from "./geometry";

export type LandmarkFrameBufferConfig = LandmarkConfig &
  Pick<KinematicsConfig, "velocityScale" | "jerkScale">;

interface Sample {
  t: SessionMs;
  x: number;
  y: number;
}

interface Vector {
  vx: number;
  vy: number;
}

export class LandmarkFrameBuffer {
  private config: LandmarkFrameBufferConfig;
  private history: Map<LandmarkId, Sample[]> = new Map();
  private latestT: SessionMs | null = null;

  constructor(config: LandmarkFrameBufferConfig) {
    this.config = config;
  }

  push(frame: LandmarkFrame): void {
    this.latestT = frame.t;

    for (const landmark of frame.landmarks) {
      if (landmark.visibility < this.config.visibilityThreshold) continue;

      let samples = this.history.get(landmark.id);
      if (!samples) {
        samples = [];
        this.history.set(landmark.id, samples);
      }

      const last = samples[samples.length - 1];
      if (last && frame.t - last.t > this.config.gapToleranceMs) {
        samples.length = 0;
      }

      samples.push({ t: frame.t, x: landmark.x, y: landmark.y });
      if (samples.length > this.config.historyCapacity) {
        samples.shift();
      }
    }
  }

  /**
   * Normalized speed of a landmark from its two most recent valid samples,
   * clamped to [0,1].
   */
  velocity(id: LandmarkId): number {
    const samples = this.recent(id, 2);
    if (!samples) return 0;

    const v = this.velocityBetween(samples[0], samples[1]);
    if (!v) return 0;
    return clamp(Math.hypot(v.vx, v.vy) / this.config.velocityScale, 0, 1);
  }

  /**
   * Normalized rate of change of velocity from the three most recent valid
   * samples, clamped to [0,1]. The two velocity estimates sit at the
   * midpoints of their sample intervals; their spacing is the elapsed time.
   */
  jerk(id: LandmarkId): number {
    const samples = this.recent(id, 3);
    if (!samples) return 0;

    const [s0, s1, s2] = samples;
    const earlier = this.velocityBetween(s0, s1);
    const later = this.velocityBetween(s1, s2);
    if (!earlier || !later) return 0;

    const elapsedS = (s2.t - s0.t) / 2 / 1000;
    const change = Math.hypot(later.vx - earlier.vx, later.vy - earlier.vy);
    return clamp(change / elapsedS / this.config.jerkScale, 0, 1);
  }

  /**
   * Raw distance covered between the two most recent valid samples.
   */
  displacement(id: LandmarkId): number {
    const samples = this.recent(id, 2);
    if (!samples) return 0;
    return distance(samples[0], samples[1]);
  }

  /**
   * Whether the landmark's newest valid sample is within the gap tolerance
   * of the latest frame.
   */
  isTracked(id: LandmarkId): boolean {
    const samples = this.history.get(id);
    if (!samples || samples.length === 0 || this.latestT === null) return false;
    return this.latestT - samples[samples.length - 1].t <= this.config.gapToleranceMs;
  }

  /** Number of valid samples currently held for a landmark. */
  sampleCount(id: LandmarkId): number {
    return this.history.get(id)?.length ?? 0;
  }

  reset(): void {
    this.history.clear();
    this.latestT = null;
  }

  /**
   * The `count` most recent samples, oldest first, or null when there are
   * not enough or the newest is stale relative to the latest frame.
   */
  private recent(id: LandmarkId, count: number): Sample[] | null {
    const samples = this.history.get(id);
    if (!samples || samples.length < count || this.latestT === null) return null;

    const newest = samples[samples.length - 1];
    const age: Ms = this.latestT - newest.t;
    if (age > this.config.gapToleranceMs) return null;

    return samples.slice(samples.length - count);
  }

  private velocityBetween(a: Sample, b: Sample): Vector | null {
    const dtS = (b.t - a.t) / 1000;
    if (dtS <= 0) return null;
    return { vx: (b.x - a.x) / dtS, vy: (b.y - a.y) / dtS };
  }
}
