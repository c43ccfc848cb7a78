/**
 * Session Configuration
 *
 * Validated once at session start. Values that are tuned per performer
 * (smoothing alphas, hysteresis margin, onset threshold, retrigger interval)
 * have no defaults and must be supplied.
 */

import { z } from "zod";
import { FEATURE_NAMES } from "@sonokinetic/contracts";

const unit = z.number().min(0).max(1);
const alpha = z.number().gt(0, "alpha must be in (0, 1]").max(1, "alpha must be in (0, 1]");
const positive = z.number().positive();
const nonNegative = z.number().nonnegative();

const LandmarkConfigSchema = z
  .object({
    /** Minimum visibility for a landmark sample to count as valid */
    visibilityThreshold: unit.default(0.5),
    /** Longest gap between valid samples before derivatives reset */
    gapToleranceMs: positive.default(250),
    /** Samples kept per landmark (3 needed for jerk) */
    historyCapacity: z.number().int().min(3).default(4),
  })
  .default({});

const KinematicsConfigSchema = z
  .object({
    /** Wrist speed (units/s) that maps to arm velocity 1.0 */
    velocityScale: positive.default(2),
    /** Velocity change rate (units/s²) that maps to jerk 1.0 */
    jerkScale: positive.default(40),
    /** Multiplier from summed displacement to energy */
    energyScale: positive.default(10),
    /** Tilt angle (radians) that maps to ±1 */
    tiltFullScaleRad: positive.default(Math.PI / 4),
  })
  .default({});

const SmoothingConfigSchema = z.object({
  alphas: z.object({
    positional: alpha,
    angular: alpha,
    height: alpha,
    derivative: alpha,
    descriptor: alpha,
  }),
  overrides: z.record(z.enum(FEATURE_NAMES), alpha).default({}),
});

const ZoneConfigSchema = z.object({
  hysteresisMargin: z.number().min(0).lt(0.125, "margin must stay inside half a zone"),
});

const LimbTriggerSchema = z.object({
  onsetThreshold: unit.optional(),
  minRetriggerMs: nonNegative.optional(),
});

const TriggerConfigSchema = z
  .object({
    onsetThreshold: unit,
    minRetriggerMs: nonNegative,
    baseDurationMs: positive.default(300),
    minDurationMs: positive.default(150),
    maxDurationMs: positive.default(600),
    /** Duration removed at full arm velocity */
    velocityShorteningMs: nonNegative.default(150),
    /** MIDI velocity at zero arm velocity */
    velocityFloor: z.number().int().min(1).max(127).default(60),
    limbs: z
      .object({ right: LimbTriggerSchema.optional(), left: LimbTriggerSchema.optional() })
      .default({}),
  })
  .refine((c) => c.minDurationMs <= c.maxDurationMs, {
    message: "minDurationMs must not exceed maxDurationMs",
    path: ["minDurationMs"],
  });

const VibratoConfigSchema = z
  .object({
    /** Minimum elbow-angle change rate (per second) for a reversal to count */
    rateThreshold: positive.default(0.5),
    windowMs: positive.default(500),
    minReversals: z.number().int().min(1).default(2),
    /** Peak-to-peak angle span giving full vibrato depth */
    fullDepthSpan: positive.default(0.2),
  })
  .default({});

const MappingConfigSchema = z
  .object({
    hipTiltModerate: unit.default(0.6),
    hipTiltExtreme: unit.default(0.8),
    /** Chord pitch bend at the moderate tilt limit, fraction of full range */
    chordBendRange: unit.default(0.5),
    chordVelocityFloor: z.number().int().min(1).max(127).default(40),
    elbowStableAngle: z.number().min(0).lt(1).default(0.1),
    glissandoRange: unit.default(0.25),
    vibrato: VibratoConfigSchema,
  })
  .default({})
  .refine((c) => c.hipTiltExtreme >= c.hipTiltModerate, {
    message: "hipTiltExtreme must be at least hipTiltModerate",
    path: ["hipTiltExtreme"],
  });

const DispatchConfigSchema = z
  .object({
    maxRetries: z.number().int().min(0).default(3),
    backoffMs: nonNegative.default(10),
    maxPending: z.number().int().min(1).default(256),
  })
  .default({});

export const SessionConfigSchema = z.object({
  landmarks: LandmarkConfigSchema,
  kinematics: KinematicsConfigSchema,
  smoothing: SmoothingConfigSchema,
  zones: ZoneConfigSchema,
  triggers: TriggerConfigSchema,
  mapping: MappingConfigSchema,
  dispatch: DispatchConfigSchema,
});

/** Configuration as supplied by the caller (defaults optional). */
export type SessionConfigInput = z.input<typeof SessionConfigSchema>;

/** Fully resolved configuration. */
export type SessionConfig = z.output<typeof SessionConfigSchema>;

export type LandmarkConfig = SessionConfig["landmarks"];
export type KinematicsConfig = SessionConfig["kinematics"];
export type SmoothingConfig = SessionConfig["smoothing"];
export type ZoneConfig = SessionConfig["zones"];
export type TriggerConfig = SessionConfig["triggers"];
export type MappingConfig = SessionConfig["mapping"];
export type VibratoConfig = MappingConfig["vibrato"];
export type DispatchConfig = SessionConfig["dispatch"];

export class SessionConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid session configuration: ${issues.join("; ")}`);
    this.name = "SessionConfigError";
    this.issues = issues;
  }
}

/**
 * Validate a session configuration and fill in defaults.
 * @throws SessionConfigError listing every invalid field
 */
export function parseSessionConfig(input: unknown): SessionConfig {
  const result = SessionConfigSchema.safeParse(input);
  if (!result.success) {
    throw new SessionConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }
  return result.data;
}
