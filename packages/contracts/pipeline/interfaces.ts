/**
 * Pipeline Interfaces
 *
 * Defines the contracts between pipeline stages:
 * LandmarkFrame → FeatureExtractor → {ZoneClassifier, GestureTrigger × 2} → Mapper → OutputSink
 */

import type { Ms, SessionMs } from "../core/time";
import type { LandmarkFrame } from "../pose/landmarks";
import type { FeatureVector } from "../features/features";
import type {
  ControlMessage,
  ControlName,
  Limb,
  MidiPitch,
  MidiVelocity,
  ParameterName,
  VoiceId,
} from "../control/messages";

// ============================================================================
// Feature extraction
// ============================================================================

/**
 * Stateful per-session feature extractor.
 * Deterministic given its internal buffer and smoothing state.
 */
export interface IFeatureExtractor {
  extract(frame: LandmarkFrame): FeatureVector;

  /** Clear buffer and smoothing state (session start). */
  reset(): void;
}

// ============================================================================
// Zone classification
// ============================================================================

export type ZoneIndex = 0 | 1 | 2 | 3;

export interface ZoneClassification {
  zone: ZoneIndex;

  /** True only on the frame a zone change is confirmed */
  changed: boolean;

  /** Zone before this frame, null on the first observation */
  previous: ZoneIndex | null;
}

// ============================================================================
// Gesture triggers
// ============================================================================

export type TriggerPhase = "idle" | "armed" | "sounding";

/**
 * Onset of a melody note. Velocity and duration are inversely coupled:
 * a faster arm gives a louder, shorter note.
 */
export interface TriggerOnset {
  type: "onset";
  limb: Limb;
  t: SessionMs;
  velocity: MidiVelocity;
  durationMs: Ms;

  /** Hand height at the onset instant, 0..1 */
  handY: number;
}

export interface TriggerRelease {
  type: "release";
  limb: Limb;
  t: SessionMs;
}

export type TriggerEvent = TriggerOnset | TriggerRelease;

// ============================================================================
// Mapping
// ============================================================================

/**
 * Combines classifier output, trigger events and continuous features into
 * the ordered outbound message set: chord/zone messages, then notes, then
 * continuous controls.
 */
export interface IMapper {
  map(
    features: FeatureVector,
    zone: ZoneClassification,
    events: readonly TriggerEvent[],
    t: SessionMs
  ): ControlMessage[];

  /**
   * NoteOffs for every voice still sounding. Pending trigger releases are
   * applied first, so their melody voices close in trigger order.
   */
  releaseAll(releases?: readonly TriggerRelease[]): ControlMessage[];
}

// ============================================================================
// Output
// ============================================================================

/**
 * Capability interface implemented by every output destination.
 * Methods may complete asynchronously; a rejected promise or a thrown
 * error means the message was not delivered.
 */
export interface IOutputSink {
  readonly id: string;

  sendParameter(name: ParameterName, value: number): void | Promise<void>;

  sendNoteOn(
    voiceId: VoiceId,
    pitch: MidiPitch,
    velocity: MidiVelocity
  ): void | Promise<void>;

  sendNoteOff(voiceId: VoiceId): void | Promise<void>;

  sendControlChange(
    name: ControlName,
    value: number,
    voiceId?: VoiceId
  ): void | Promise<void>;
}
