import { describe, it, expect, beforeEach } from "vitest";
import fc from "fast-check";
import type { ZoneIndex } from "@sonokinetic/contracts";
import { ZoneClassifier, bandOf } from "../../src/zones/ZoneClassifier";

describe("bandOf", () => {
  it("splits [0,1] into four equal bands", () => {
    expect(bandOf(0)).toBe(0);
    expect(bandOf(0.24)).toBe(0);
    expect(bandOf(0.25)).toBe(1);
    expect(bandOf(0.5)).toBe(2);
    expect(bandOf(0.75)).toBe(3);
  });

  it("puts 1.0 and out-of-range values in the edge bands", () => {
    expect(bandOf(1)).toBe(3);
    expect(bandOf(1.4)).toBe(3);
    expect(bandOf(-0.2)).toBe(0);
  });
});

describe("ZoneClassifier", () => {
  let classifier: ZoneClassifier;

  beforeEach(() => {
    classifier = new ZoneClassifier({ hysteresisMargin: 0.02 });
  });

  it("reports the first observation without a change", () => {
    expect(classifier.classify(0.6)).toEqual({ zone: 2, changed: false, previous: null });
    expect(classifier.current).toBe(2);
    expect(classifier.confirmedAt).toBe(0.6);
  });

  it("holds the zone until the input passes the boundary by the margin", () => {
    classifier.classify(0.1);

    expect(classifier.classify(0.26)).toEqual({ zone: 0, changed: false, previous: 0 });
    expect(classifier.classify(0.28)).toEqual({ zone: 1, changed: true, previous: 0 });
    expect(classifier.classify(0.28)).toEqual({ zone: 1, changed: false, previous: 1 });
  });

  it("applies the margin going down", () => {
    classifier.classify(0.4);

    expect(classifier.classify(0.24).changed).toBe(false);
    expect(classifier.classify(0.22)).toEqual({ zone: 0, changed: true, previous: 1 });
  });

  it("does not flip back on jitter around a boundary", () => {
    classifier.classify(0.1);
    const results = [0.24, 0.26, 0.245, 0.262, 0.255, 0.24].map((x) => classifier.classify(x));

    expect(results.every((r) => !r.changed && r.zone === 0)).toBe(true);
  });

  it("jumps straight to the band holding a fast step", () => {
    classifier.classify(0.1);
    expect(classifier.classify(0.9)).toEqual({ zone: 3, changed: true, previous: 0 });
  });

  it("confirms exactly three changes on a walk from 0.1 to 0.9", () => {
    const xs = Array.from({ length: 10 }, (_, i) => 0.1 + (i * 0.8) / 9);
    const results = xs.map((x) => classifier.classify(x));

    expect(results.filter((r) => r.changed)).toHaveLength(3);
    expect(results.map((r) => r.zone)).toEqual([0, 0, 1, 1, 1, 2, 2, 2, 3, 3]);
  });

  it("starts over after reset", () => {
    classifier.classify(0.1);
    classifier.reset();
    expect(classifier.classify(0.9)).toEqual({ zone: 3, changed: false, previous: null });
  });

  it("never changes zone while the input stays within the margin of its band", () => {
    const zoneArb = fc.constantFrom<ZoneIndex>(0, 1, 2, 3);
    fc.assert(
      fc.property(
        zoneArb,
        fc.double({ min: 0.005, max: 0.1, noNaN: true }),
        fc.array(fc.double({ min: 0, max: 1, noNaN: true }), { minLength: 1, maxLength: 40 }),
        (zone, margin, positions) => {
          const subject = new ZoneClassifier({ hysteresisMargin: margin });
          subject.classify((zone + 0.5) / 4);

          const lo = zone / 4 - margin;
          const hi = (zone + 1) / 4 + margin;
          return positions.every((u) => {
            const x = lo + (hi - lo) * (0.001 + 0.998 * u);
            const result = subject.classify(x);
            return !result.changed && result.zone === zone;
          });
        }
      )
    );
  });
});
