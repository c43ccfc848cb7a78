import { describe, it, expect, beforeEach } from "vitest";
import fc from "fast-check";
import { FEATURE_NAMES, FEATURE_RANGES, PoseLandmark } from "@sonokinetic/contracts";
import type { Landmark } from "@sonokinetic/contracts";
import { parseSessionConfig } from "../../src/config/SessionConfig";
import { FeatureExtractor } from "../../src/features/FeatureExtractor";
import { TEST_CONFIG, UNSMOOTHED, feetAt, partialFrame, pose } from "../_fixtures/pose";

function extractorWith(smoothing: unknown = UNSMOOTHED): FeatureExtractor {
  return new FeatureExtractor(parseSessionConfig({ ...TEST_CONFIG, smoothing }));
}

describe("FeatureExtractor", () => {
  let extractor: FeatureExtractor;

  beforeEach(() => {
    extractor = extractorWith();
  });

  describe("standing pose", () => {
    it("reads a centred, level, straight-legged body", () => {
      const f = extractor.extract(pose(0));

      expect(f.feetCenterX).toBeCloseTo(0.5, 9);
      expect(f.hipTilt).toBeCloseTo(0, 9);
      expect(f.kneeAngle).toBeCloseTo(1, 6);
      expect(f.headTilt).toBeCloseTo(0, 9);
    });

    it("reads hanging arms", () => {
      const f = extractor.extract(pose(0));

      expect(f.rightHandY).toBeCloseTo(0.4, 9);
      expect(f.leftHandY).toBeCloseTo(0.4, 9);
      expect(f.rightElbowHipAngle).toBeCloseTo(0, 6);
      expect(f.leftElbowHipAngle).toBeCloseTo(0, 6);
      expect(f.armAngle).toBeCloseTo(0.2, 9);
      expect(f.symmetry).toBeCloseTo(0, 9);
    });

    it("reports no motion on the first frame", () => {
      const f = extractor.extract(pose(0));

      expect(f.rightHandJerk).toBe(0);
      expect(f.leftHandJerk).toBe(0);
      expect(f.rightArmVelocity).toBe(0);
      expect(f.leftArmVelocity).toBe(0);
      expect(f.energy).toBe(0);
      expect(f.smoothness).toBe(1);
    });

    it("clamps vertical extension to 1", () => {
      // (0.9 - 0.1) * 1.5 = 1.2
      expect(extractor.extract(pose(0)).verticalExtension).toBe(1);
    });
  });

  describe("geometry", () => {
    it("gives positive hip tilt when the right hip is lower", () => {
      const f = extractor.extract(pose(0, { [PoseLandmark.rightHip]: { y: 0.7 } }));
      expect(f.hipTilt).toBeCloseTo(Math.atan2(0.1, 0.2) / (Math.PI / 4), 6);
    });

    it("saturates head tilt at the full-scale angle", () => {
      const f = extractor.extract(pose(0, { [PoseLandmark.rightEar]: { y: 0.2 } }));
      expect(f.headTilt).toBeCloseTo(1, 6);
    });

    it("reads a horizontal arm as half of the elbow-hip range", () => {
      const f = extractor.extract(pose(0, { [PoseLandmark.rightElbow]: { x: 0.75, y: 0.3 } }));
      expect(f.rightElbowHipAngle).toBeCloseTo(0.5, 6);
      expect(f.leftElbowHipAngle).toBeCloseTo(0, 6);
    });

    it("reads a bent knee below 1", () => {
      // Knee pushed forward in the image: a right angle at the knee
      const f = extractor.extract(
        pose(0, {
          [PoseLandmark.leftKnee]: { x: 0.55, y: 0.75 },
          [PoseLandmark.leftAnkle]: { x: 0.4, y: 0.9 },
          [PoseLandmark.rightKnee]: { x: 0.75, y: 0.75 },
          [PoseLandmark.rightAnkle]: { x: 0.6, y: 0.9 },
        })
      );
      expect(f.kneeAngle).toBeCloseTo(0.5, 6);
    });
  });

  describe("wrist kinematics", () => {
    it("derives arm velocity and hand jerk from wrist motion", () => {
      const right = PoseLandmark.rightWrist;
      extractor.extract(pose(0, { [right]: { x: 0.6 } }));
      extractor.extract(pose(100, { [right]: { x: 0.6 } }));
      const f = extractor.extract(pose(200, { [right]: { x: 0.7 } }));

      expect(f.rightArmVelocity).toBeCloseTo(0.5, 9);
      expect(f.rightHandJerk).toBeCloseTo(0.25, 9);
      expect(f.leftArmVelocity).toBe(0);
      expect(f.leftHandJerk).toBe(0);
    });

    it("holds wrist derivatives through a short dropout and zeroes them after the gap tolerance", () => {
      const right = PoseLandmark.rightWrist;
      extractor.extract(pose(0));
      extractor.extract(pose(100));
      // 0.3 units in 100 ms: jerk 30 / 40, velocity 3 / 2 clamped
      const flick = extractor.extract(pose(200, { [right]: { x: 0.9 } }));
      expect(flick.rightHandJerk).toBeCloseTo(0.75, 9);
      expect(flick.rightArmVelocity).toBe(1);

      const hidden = { [right]: { x: 0.9, visibility: 0 } };
      const within = extractor.extract(pose(400, hidden));
      expect(within.rightHandJerk).toBeCloseTo(0.75, 9);
      expect(within.rightArmVelocity).toBe(1);

      const beyond = extractor.extract(pose(500, hidden));
      expect(beyond.rightHandJerk).toBe(0);
      expect(beyond.rightArmVelocity).toBe(0);
    });

    it("reacquires a wrist after a long gap without a derivative spike", () => {
      const right = PoseLandmark.rightWrist;
      extractor.extract(pose(0));
      extractor.extract(pose(100));
      extractor.extract(pose(200, { [right]: { x: 0.9 } }));
      for (let t = 300; t <= 800; t += 100) {
        extractor.extract(pose(t, { [right]: { visibility: 0 } }));
      }

      for (const t of [900, 1000, 1100]) {
        const f = extractor.extract(pose(t));
        expect(f.rightHandJerk).toBe(0);
        expect(f.rightArmVelocity).toBe(0);
      }
    });

    it("derives energy and smoothness from displacement", () => {
      extractor.extract(pose(0));
      const f = extractor.extract(pose(100, { [PoseLandmark.rightWrist]: { x: 0.62 } }));

      expect(f.energy).toBeCloseTo(0.2, 9);
      expect(f.smoothness).toBeCloseTo(0.9, 9);
    });
  });

  describe("missing landmarks", () => {
    it("reports neutral values for features never seen", () => {
      const f = extractor.extract(
        partialFrame(0, {
          [PoseLandmark.leftAnkle]: { x: 0.2 },
          [PoseLandmark.rightAnkle]: { x: 0.4 },
        })
      );

      expect(f.feetCenterX).toBeCloseTo(0.3, 9);
      expect(f.hipTilt).toBe(0);
      expect(f.kneeAngle).toBe(1);
      expect(f.rightHandY).toBe(0.5);
      expect(f.smoothness).toBe(0.5);
      expect(f.verticalExtension).toBe(0.5);
    });

    it("holds the last value while the inputs are not visible", () => {
      extractor.extract(pose(0, { [PoseLandmark.rightHip]: { y: 0.7 } }));
      const f = extractor.extract(
        pose(100, {
          [PoseLandmark.rightHip]: { y: 0.6, visibility: 0.2 },
          [PoseLandmark.rightWrist]: { y: 0.2, visibility: 0 },
        })
      );

      expect(f.hipTilt).toBeCloseTo(Math.atan2(0.1, 0.2) / (Math.PI / 4), 6);
      expect(f.rightHandY).toBeCloseTo(0.4, 9);
      expect(f.leftHandY).toBeCloseTo(0.4, 9);
    });

    it("forgets held values on reset", () => {
      extractor.extract(pose(0, { [PoseLandmark.rightHip]: { y: 0.7 } }));
      extractor.reset();
      const f = extractor.extract(partialFrame(100, { [PoseLandmark.nose]: {} }));

      expect(f.hipTilt).toBe(0);
    });
  });

  describe("smoothing", () => {
    it("applies the positional alpha to feetCenterX", () => {
      extractor = extractorWith({ alphas: { ...UNSMOOTHED.alphas, positional: 0.5 } });
      extractor.extract(pose(0, feetAt(0.5)));
      const f = extractor.extract(pose(100, feetAt(0.7)));

      expect(f.feetCenterX).toBeCloseTo(0.6, 9);
    });
  });

  describe("ranges", () => {
    const landmarkArb = fc.record({
      id: fc.integer({ min: 0, max: 32 }),
      x: fc.double({ min: -2, max: 3, noNaN: true }),
      y: fc.double({ min: -2, max: 3, noNaN: true }),
      z: fc.double({ min: -5, max: 5, noNaN: true }),
      visibility: fc.double({ min: 0, max: 1, noNaN: true }),
    });
    const frameArb = fc.uniqueArray(landmarkArb, {
      selector: (landmark) => landmark.id,
      minLength: 1,
      maxLength: 33,
    });

    it("keeps every feature inside its declared range", () => {
      fc.assert(
        fc.property(
          fc.array(frameArb, { minLength: 1, maxLength: 8 }),
          fc.integer({ min: 1, max: 200 }),
          (frames, stepMs) => {
            const subject = extractorWith({
              alphas: { positional: 0.3, angular: 0.5, height: 0.7, derivative: 1, descriptor: 0.4 },
            });
            return frames.every((landmarks: Landmark[], i) => {
              const features = subject.extract({ t: i * stepMs, landmarks });
              return FEATURE_NAMES.every((name) => {
                const [min, max] = FEATURE_RANGES[name];
                const value = features[name];
                return Number.isFinite(value) && value >= min && value <= max;
              });
            });
          }
        )
      );
    });
  });
});
