// Session
export { PoseMusicSession, type PoseMusicSessionOptions } from "./PoseMusicSession";

// Configuration
export {
  SessionConfigSchema,
  SessionConfigError,
  parseSessionConfig,
  type SessionConfig,
  type SessionConfigInput,
  type LandmarkConfig,
  type KinematicsConfig,
  type SmoothingConfig,
  type ZoneConfig,
  type TriggerConfig,
  type MappingConfig,
  type VibratoConfig,
  type DispatchConfig,
} from "./config/SessionConfig";

// Kinematics and features
export { LandmarkFrameBuffer, type LandmarkFrameBufferConfig } from "./kinematics/LandmarkFrameBuffer";
export * from "./kinematics/geometry";
export { ExponentialSmoother, SmoothingFilter, framesToConverge } from "./smoothing/SmoothingFilter";
export { FeatureExtractor, type FeatureExtractorConfig } from "./features/FeatureExtractor";
export { LandmarkFrameSchema, validateFrame, type FrameValidation } from "./features/validateFrame";

// Classification and triggers
export { ZoneClassifier, ZONE_COUNT, bandOf } from "./zones/ZoneClassifier";
export * from "./triggers";

// Mapping
export * from "./mapping";

// Output
export {
  SinkDispatcher,
  type DispatchStats,
  type DispatchFailure,
} from "./output/SinkDispatcher";
