/**
 * Control Message Types
 *
 * Outbound musical-control messages produced by the mapper. Created once per
 * frame or trigger event and never mutated afterwards.
 */

import type { FeatureName } from "../features/features";

/** Tracked limb. Each limb owns one trigger and one melody voice. */
export type Limb = "right" | "left";

export const LIMBS: readonly Limb[] = ["right", "left"];

/**
 * Voice identifier. Melody voices are named after their limb; chord voices
 * use the "chord-" prefix.
 */
export type ChordVoice =
  | "chord-root"
  | "chord-third"
  | "chord-fifth"
  | "chord-extension";

export type VoiceId = Limb | ChordVoice;

export const TRIAD_VOICES: readonly ChordVoice[] = [
  "chord-root",
  "chord-third",
  "chord-fifth",
];

export type MidiPitch = number;    // 0-127
export type MidiVelocity = number; // 1-127

/** Names of the non-feature parameters published on the parameter stream. */
export type DerivedParameter = "chordZone" | "rightMelodyNote" | "leftMelodyNote";

export type ParameterName = FeatureName | DerivedParameter;

/**
 * Continuous controls. Ranges:
 * - pitchBend: -1..1 (full bend range of the receiver), per voice
 * - vibrato: 0..1, per melody voice
 * - expression: 0..1
 * - filter: -1..1, 0 = neutral
 * - texture: 0..1
 */
export type ControlName = "pitchBend" | "vibrato" | "expression" | "filter" | "texture";

export interface ParameterUpdate {
  readonly type: "parameter";
  readonly name: ParameterName;
  readonly value: number;
}

export interface NoteOn {
  readonly type: "note_on";
  readonly voiceId: VoiceId;
  readonly pitch: MidiPitch;
  readonly velocity: MidiVelocity;
}

export interface NoteOff {
  readonly type: "note_off";
  readonly voiceId: VoiceId;
}

export interface ControlChange {
  readonly type: "control_change";
  readonly name: ControlName;
  readonly value: number;
  /** Target voice for per-voice controls; global when absent */
  readonly voiceId?: VoiceId;
}

export type ControlMessage = ParameterUpdate | NoteOn | NoteOff | ControlChange;

/** Note messages are discrete: they are never superseded by a later frame. */
export function isNoteMessage(msg: ControlMessage): msg is NoteOn | NoteOff {
  return msg.type === "note_on" || msg.type === "note_off";
}
