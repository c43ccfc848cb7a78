/**
 * Feature Extractor
 *
 * Computes the named feature vector for one LandmarkFrame from the current
 * frame plus the rolling landmark history and per-feature smoothing state.
 *
 * A feature whose input landmarks are missing or below the visibility
 * threshold is not recomputed: it holds its last smoothed value, or the
 * neutral default before it has ever been seen. Wrist derivatives are the
 * exception: once the wrist has been lost for longer than the gap
 * tolerance they are smoothed towards zero.
 */

import {
  FEATURE_NAMES,
  NEUTRAL_FEATURES,
  PoseLandmark,
  clampFeature,
} from "@sonokinetic/contracts";
import type {
  FeatureName,
  FeatureVector,
  IFeatureExtractor,
  Landmark,
  LandmarkFrame,
  LandmarkId,
} from "@sonokinetic/contracts";
import type { SessionConfig } from "../config/SessionConfig";
import { LandmarkFrameBuffer } from "../kinematics/LandmarkFrameBuffer";
import { angleAt, clamp, midpoint, tiltAngle } from "../kinematics/geometry";
import { SmoothingFilter } from "../smoothing/SmoothingFilter";

export type FeatureExtractorConfig = Pick<SessionConfig, "landmarks" | "kinematics" | "smoothing">;

type RawFeatures = Partial<Record<FeatureName, number>>;

/** Landmarks whose motion makes up the energy descriptor */
const ENERGY_LANDMARKS: readonly LandmarkId[] = [
  PoseLandmark.nose,
  PoseLandmark.leftWrist,
  PoseLandmark.rightWrist,
  PoseLandmark.leftAnkle,
  PoseLandmark.rightAnkle,
];

const SMOOTHNESS_SCALE = 5;
const VERTICAL_EXTENSION_SCALE = 1.5;

const LEGS = [
  [PoseLandmark.leftHip, PoseLandmark.leftKnee, PoseLandmark.leftAnkle],
  [PoseLandmark.rightHip, PoseLandmark.rightKnee, PoseLandmark.rightAnkle],
] as const;

const ARMS = {
  right: {
    shoulder: PoseLandmark.rightShoulder,
    elbow: PoseLandmark.rightElbow,
    wrist: PoseLandmark.rightWrist,
    hip: PoseLandmark.rightHip,
  },
  left: {
    shoulder: PoseLandmark.leftShoulder,
    elbow: PoseLandmark.leftElbow,
    wrist: PoseLandmark.leftWrist,
    hip: PoseLandmark.leftHip,
  },
} as const;

export class FeatureExtractor implements IFeatureExtractor {
  private config: FeatureExtractorConfig;
  private buffer: LandmarkFrameBuffer;
  private smoothing: SmoothingFilter;

  constructor(config: FeatureExtractorConfig) {
    this.config = config;
    this.buffer = new LandmarkFrameBuffer({
      ...config.landmarks,
      velocityScale: config.kinematics.velocityScale,
      jerkScale: config.kinematics.jerkScale,
    });
    this.smoothing = new SmoothingFilter(config.smoothing);
  }

  extract(frame: LandmarkFrame): FeatureVector {
    this.buffer.push(frame);

    const visible = this.visibleLandmarks(frame);
    const raw: RawFeatures = {
      ...this.lowerBody(visible),
      ...this.head(visible),
      ...this.arm("right", visible),
      ...this.arm("left", visible),
      ...this.descriptors(visible),
    };

    const vector: Record<FeatureName, number> = { ...NEUTRAL_FEATURES };
    for (const name of FEATURE_NAMES) {
      const value = raw[name];
      vector[name] =
        value === undefined
          ? this.smoothing.hold(name) ?? NEUTRAL_FEATURES[name]
          : clampFeature(name, this.smoothing.smooth(name, clampFeature(name, value)));
    }
    return vector;
  }

  reset(): void {
    this.buffer.reset();
    this.smoothing.reset();
  }

  private visibleLandmarks(frame: LandmarkFrame): Map<LandmarkId, Landmark> {
    const visible = new Map<LandmarkId, Landmark>();
    for (const landmark of frame.landmarks) {
      if (landmark.visibility >= this.config.landmarks.visibilityThreshold) {
        visible.set(landmark.id, landmark);
      }
    }
    return visible;
  }

  private lowerBody(visible: Map<LandmarkId, Landmark>): RawFeatures {
    const features: RawFeatures = {};

    const leftAnkle = visible.get(PoseLandmark.leftAnkle);
    const rightAnkle = visible.get(PoseLandmark.rightAnkle);
    if (leftAnkle && rightAnkle) {
      features.feetCenterX = midpoint(leftAnkle, rightAnkle).x;
    }

    const leftHip = visible.get(PoseLandmark.leftHip);
    const rightHip = visible.get(PoseLandmark.rightHip);
    const hipTilt = leftHip && rightHip ? tiltAngle(leftHip, rightHip) : null;
    if (hipTilt !== null) {
      features.hipTilt = hipTilt / this.config.kinematics.tiltFullScaleRad;
    }

    const legAngles: number[] = [];
    for (const [hipId, kneeId, ankleId] of LEGS) {
      const hip = visible.get(hipId);
      const knee = visible.get(kneeId);
      const ankle = visible.get(ankleId);
      if (!hip || !knee || !ankle) continue;
      const angle = angleAt(hip, knee, ankle);
      if (angle !== null) legAngles.push(angle / Math.PI);
    }
    if (legAngles.length > 0) {
      features.kneeAngle = legAngles.reduce((sum, a) => sum + a, 0) / legAngles.length;
    }

    return features;
  }

  private head(visible: Map<LandmarkId, Landmark>): RawFeatures {
    const leftEar = visible.get(PoseLandmark.leftEar);
    const rightEar = visible.get(PoseLandmark.rightEar);
    const tilt = leftEar && rightEar ? tiltAngle(leftEar, rightEar) : null;
    return tilt === null ? {} : { headTilt: tilt / this.config.kinematics.tiltFullScaleRad };
  }

  private arm(side: "right" | "left", visible: Map<LandmarkId, Landmark>): RawFeatures {
    const ids = ARMS[side];
    const features: RawFeatures = {};

    const wrist = visible.get(ids.wrist);
    if (wrist) {
      if (side === "right") {
        features.rightHandY = 1 - wrist.y;
      } else {
        features.leftHandY = 1 - wrist.y;
      }
    }

    // Derivatives hold through a short dropout and decay once the gap
    // tolerance has passed, where the buffer reads zero.
    if (wrist || !this.buffer.isTracked(ids.wrist)) {
      const jerk = this.buffer.jerk(ids.wrist);
      const velocity = this.buffer.velocity(ids.wrist);
      if (side === "right") {
        features.rightHandJerk = jerk;
        features.rightArmVelocity = velocity;
      } else {
        features.leftHandJerk = jerk;
        features.leftArmVelocity = velocity;
      }
    }

    const shoulder = visible.get(ids.shoulder);
    const elbow = visible.get(ids.elbow);
    const hip = visible.get(ids.hip);
    const angle = shoulder && elbow && hip ? angleAt(elbow, shoulder, hip) : null;
    if (angle !== null) {
      if (side === "right") {
        features.rightElbowHipAngle = angle / Math.PI;
      } else {
        features.leftElbowHipAngle = angle / Math.PI;
      }
    }

    return features;
  }

  private descriptors(visible: Map<LandmarkId, Landmark>): RawFeatures {
    const features: RawFeatures = {};

    const moving = ENERGY_LANDMARKS.filter((id) => visible.has(id));
    if (moving.length > 0) {
      const travelled = moving.reduce((sum, id) => sum + this.buffer.displacement(id), 0);
      features.energy = travelled * this.config.kinematics.energyScale;
    }

    const leftWrist = visible.get(PoseLandmark.leftWrist);
    const rightWrist = visible.get(PoseLandmark.rightWrist);
    if (leftWrist && rightWrist) {
      const rightReach = rightWrist.x - 0.5;
      const leftReach = 0.5 - leftWrist.x;
      features.symmetry = (rightReach - leftReach) * 2;

      const wristTravel =
        this.buffer.displacement(PoseLandmark.leftWrist) +
        this.buffer.displacement(PoseLandmark.rightWrist);
      features.smoothness = 1 - wristTravel * SMOOTHNESS_SCALE;
    }

    const leftShoulder = visible.get(PoseLandmark.leftShoulder);
    const rightShoulder = visible.get(PoseLandmark.rightShoulder);
    if (leftShoulder && rightShoulder && leftWrist && rightWrist) {
      const elevation = (shoulderY: number, wristY: number) => clamp(shoulderY - wristY + 0.5, 0, 1);
      features.armAngle =
        (elevation(leftShoulder.y, leftWrist.y) + elevation(rightShoulder.y, rightWrist.y)) / 2;
    }

    const nose = visible.get(PoseLandmark.nose);
    const leftAnkle = visible.get(PoseLandmark.leftAnkle);
    const rightAnkle = visible.get(PoseLandmark.rightAnkle);
    if (nose && leftAnkle && rightAnkle) {
      const ankleY = midpoint(leftAnkle, rightAnkle).y;
      features.verticalExtension = (ankleY - nose.y) * VERTICAL_EXTENSION_SCALE;
    }

    return features;
  }
}
