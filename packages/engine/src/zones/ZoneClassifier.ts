/**
 * Zone Classifier
 *
 * Maps feetCenterX onto four equal bands of [0,1] with boundary hysteresis.
 * From zone z the reported zone only changes once the input passes
 * (z+1)/4 + margin going up, or z/4 - margin going down. The new zone is the
 * band that then contains the input, so a fast step can skip zones.
 */

import type { ZoneClassification, ZoneIndex } from "@sonokinetic/contracts";
import type { ZoneConfig } from "../config/SessionConfig";
import { clamp } from "../kinematics/geometry";

export const ZONE_COUNT = 4;
const BAND_WIDTH = 1 / ZONE_COUNT;

const ZONES: readonly ZoneIndex[] = [0, 1, 2, 3];

/** Band containing x, with 1.0 belonging to the top band. */
export function bandOf(x: number): ZoneIndex {
  const index = Math.min(ZONE_COUNT - 1, Math.floor(clamp(x, 0, 1) / BAND_WIDTH));
  return ZONES[index];
}

export class ZoneClassifier {
  private margin: number;
  private zone: ZoneIndex | null = null;
  private lastCrossing: number | null = null;

  constructor(config: ZoneConfig) {
    this.margin = config.hysteresisMargin;
  }

  get current(): ZoneIndex | null {
    return this.zone;
  }

  /** Input value at which the current zone was last confirmed. */
  get confirmedAt(): number | null {
    return this.lastCrossing;
  }

  classify(feetCenterX: number): ZoneClassification {
    const x = clamp(feetCenterX, 0, 1);

    if (this.zone === null) {
      this.zone = bandOf(x);
      this.lastCrossing = x;
      return { zone: this.zone, changed: false, previous: null };
    }

    const previous = this.zone;
    const upper = (previous + 1) * BAND_WIDTH + this.margin;
    const lower = previous * BAND_WIDTH - this.margin;

    if (x >= upper || x <= lower) {
      const next = bandOf(x);
      if (next !== previous) {
        this.zone = next;
        this.lastCrossing = x;
        return { zone: next, changed: true, previous };
      }
    }

    return { zone: previous, changed: false, previous };
  }

  reset(): void {
    this.zone = null;
    this.lastCrossing = null;
  }
}
