/**
 * Feature Vector Types
 *
 * Normalized kinematic features computed once per frame. Every value is
 * clamped into the range listed in FEATURE_RANGES.
 */

export const FEATURE_NAMES = [
  "feetCenterX",
  "hipTilt",
  "kneeAngle",
  "rightHandY",
  "leftHandY",
  "rightHandJerk",
  "leftHandJerk",
  "rightArmVelocity",
  "leftArmVelocity",
  "rightElbowHipAngle",
  "leftElbowHipAngle",
  "headTilt",
  // Whole-body motion descriptors
  "energy",
  "symmetry",
  "smoothness",
  "armAngle",
  "verticalExtension",
] as const;

export type FeatureName = (typeof FEATURE_NAMES)[number];

export type FeatureVector = Readonly<Record<FeatureName, number>>;

export type FeatureRange = readonly [min: number, max: number];

const UNIT: FeatureRange = [0, 1];
const SIGNED: FeatureRange = [-1, 1];

export const FEATURE_RANGES: Readonly<Record<FeatureName, FeatureRange>> = {
  feetCenterX: UNIT,
  hipTilt: SIGNED,
  kneeAngle: UNIT,
  rightHandY: UNIT,
  leftHandY: UNIT,
  rightHandJerk: UNIT,
  leftHandJerk: UNIT,
  rightArmVelocity: UNIT,
  leftArmVelocity: UNIT,
  rightElbowHipAngle: UNIT,
  leftElbowHipAngle: UNIT,
  headTilt: SIGNED,
  energy: UNIT,
  symmetry: SIGNED,
  smoothness: UNIT,
  armAngle: UNIT,
  verticalExtension: UNIT,
};

/**
 * Values reported for a feature before its inputs have ever been seen.
 */
export const NEUTRAL_FEATURES: FeatureVector = {
  feetCenterX: 0.5,
  hipTilt: 0,
  kneeAngle: 1,
  rightHandY: 0.5,
  leftHandY: 0.5,
  rightHandJerk: 0,
  leftHandJerk: 0,
  rightArmVelocity: 0,
  leftArmVelocity: 0,
  rightElbowHipAngle: 0,
  leftElbowHipAngle: 0,
  headTilt: 0,
  energy: 0,
  symmetry: 0,
  smoothness: 0.5,
  armAngle: 0,
  verticalExtension: 0.5,
};

/**
 * Smoothing class of a feature. Each class has its own configured alpha:
 * slow positional features tolerate heavy smoothing, trigger-relevant
 * derivatives need a fast response.
 */
export type FeatureClass =
  | "positional"
  | "angular"
  | "height"
  | "derivative"
  | "descriptor";

export const FEATURE_CLASSES: Readonly<Record<FeatureName, FeatureClass>> = {
  feetCenterX: "positional",
  hipTilt: "positional",
  headTilt: "positional",
  kneeAngle: "angular",
  rightElbowHipAngle: "angular",
  leftElbowHipAngle: "angular",
  rightHandY: "height",
  leftHandY: "height",
  rightHandJerk: "derivative",
  leftHandJerk: "derivative",
  rightArmVelocity: "derivative",
  leftArmVelocity: "derivative",
  energy: "descriptor",
  symmetry: "descriptor",
  smoothness: "descriptor",
  armAngle: "descriptor",
  verticalExtension: "descriptor",
};

export function clampFeature(name: FeatureName, value: number): number {
  const [min, max] = FEATURE_RANGES[name];
  if (Number.isNaN(value)) return NEUTRAL_FEATURES[name];
  return Math.min(max, Math.max(min, value));
}
