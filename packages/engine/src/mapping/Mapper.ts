/**
 * Gesture Mapper
 *
 * Combines zone classification, trigger events and continuous features into
 * the outbound control messages for one frame.
 *
 * ## Output ordering
 *
 * 1. Chord/zone: chord selection, triad note changes, extension notes
 * 2. Melody notes from trigger onsets and releases
 * 3. Continuous controls and parameter updates
 *
 * A consumer therefore sees the harmonic context change before the melody
 * notes that rely on it.
 *
 * ## Lower body
 * - feetCenterX zone → triad on scale degree I, IV, V or vi
 * - hipTilt → chord pitch bend, saturating at the moderate threshold; past
 *   the extreme threshold an added 7th (positive tilt) or 6th (negative)
 *   sounds until the tilt falls back below it
 * - kneeAngle → expression, and triad velocity at chord changes
 *
 * ## Upper body (per limb, while its trigger is sounding)
 * - hand height → melody pitch within the limb's octave
 * - elbow-hip angle → glissando bend, plus vibrato depth on oscillation
 *
 * ## Global
 * - headTilt → filter, energy → texture
 */

import { FEATURE_NAMES, LIMBS, TRIAD_VOICES } from "@sonokinetic/contracts";
import type {
  ControlMessage,
  FeatureName,
  FeatureVector,
  IMapper,
  Limb,
  MidiPitch,
  MidiVelocity,
  NoteOff,
  NoteOn,
  ParameterName,
  SessionMs,
  TriggerEvent,
  TriggerRelease,
  VoiceId,
  ZoneClassification,
  ZoneIndex,
} from "@sonokinetic/contracts";
import type { MappingConfig } from "../config/SessionConfig";
import { clamp } from "../kinematics/geometry";
import { ZONE_CHORDS, quantizeMelody } from "./harmony";
import { VibratoDetector } from "./VibratoDetector";

type ExtensionDegree = "sixth" | "seventh";

interface SoundingExtension {
  degree: ExtensionDegree;
  pitch: MidiPitch;
}

const LIMB_FEATURES: Readonly<
  Record<Limb, { handY: FeatureName; elbowAngle: FeatureName; melodyNote: ParameterName }>
> = {
  right: { handY: "rightHandY", elbowAngle: "rightElbowHipAngle", melodyNote: "rightMelodyNote" },
  left: { handY: "leftHandY", elbowAngle: "leftElbowHipAngle", melodyNote: "leftMelodyNote" },
};

export class Mapper implements IMapper {
  private config: MappingConfig;

  private chordZone: ZoneIndex | null = null;
  private extension: SoundingExtension | null = null;
  private melody: Map<Limb, MidiPitch> = new Map();
  private vibrato: Record<Limb, VibratoDetector>;

  constructor(config: MappingConfig) {
    this.config = config;
    this.vibrato = {
      right: new VibratoDetector(config.vibrato),
      left: new VibratoDetector(config.vibrato),
    };
  }

  map(
    features: FeatureVector,
    zone: ZoneClassification,
    events: readonly TriggerEvent[],
    t: SessionMs
  ): ControlMessage[] {
    return [
      ...this.chordMessages(features, zone),
      ...this.noteMessages(events),
      ...this.continuousMessages(features, t),
    ];
  }

  releaseAll(releases: readonly TriggerRelease[] = []): ControlMessage[] {
    const messages = this.noteMessages(releases);

    for (const limb of this.melody.keys()) {
      messages.push(noteOff(limb));
    }
    if (this.extension) {
      messages.push(noteOff("chord-extension"));
    }
    if (this.chordZone !== null) {
      messages.push(...TRIAD_VOICES.map(noteOff));
    }

    this.reset();
    return messages;
  }

  reset(): void {
    this.chordZone = null;
    this.extension = null;
    this.melody.clear();
    this.vibrato.right.reset();
    this.vibrato.left.reset();
  }

  // === Chord / zone ===

  private chordMessages(features: FeatureVector, zone: ZoneClassification): ControlMessage[] {
    const messages: ControlMessage[] = [];
    const velocity = this.chordVelocity(features.kneeAngle);

    if (this.chordZone === null || (zone.changed && zone.zone !== this.chordZone)) {
      messages.push({ type: "parameter", name: "chordZone", value: zone.zone });
      if (this.chordZone !== null) {
        messages.push(...TRIAD_VOICES.map(noteOff));
      }
      const { triad } = ZONE_CHORDS[zone.zone];
      TRIAD_VOICES.forEach((voice, i) => {
        messages.push(noteOn(voice, triad[i], velocity));
      });
      this.chordZone = zone.zone;
    }

    const wanted = this.wantedExtension(features.hipTilt, this.chordZone ?? zone.zone);
    const current = this.extension;
    if (wanted?.pitch !== current?.pitch || wanted?.degree !== current?.degree) {
      if (current) {
        messages.push(noteOff("chord-extension"));
      }
      if (wanted) {
        messages.push(noteOn("chord-extension", wanted.pitch, velocity));
      }
      this.extension = wanted;
    }

    return messages;
  }

  private wantedExtension(hipTilt: number, zone: ZoneIndex): SoundingExtension | null {
    const extreme = this.config.hipTiltExtreme;
    if (hipTilt > extreme) {
      return { degree: "seventh", pitch: ZONE_CHORDS[zone].seventh };
    }
    if (hipTilt < -extreme) {
      return { degree: "sixth", pitch: ZONE_CHORDS[zone].sixth };
    }
    return null;
  }

  private chordVelocity(kneeAngle: number): MidiVelocity {
    const floor = this.config.chordVelocityFloor;
    return clamp(Math.round(floor + clamp(kneeAngle, 0, 1) * (127 - floor)), 1, 127);
  }

  // === Melody notes ===

  private noteMessages(events: readonly TriggerEvent[]): ControlMessage[] {
    const messages: ControlMessage[] = [];

    for (const event of events) {
      if (event.type === "onset") {
        if (this.melody.has(event.limb)) {
          messages.push(noteOff(event.limb));
        }
        const pitch = quantizeMelody(event.handY, event.limb);
        messages.push(noteOn(event.limb, pitch, event.velocity));
        this.melody.set(event.limb, pitch);
      } else if (this.melody.delete(event.limb)) {
        messages.push(noteOff(event.limb));
      }
    }

    return messages;
  }

  // === Continuous controls ===

  private continuousMessages(features: FeatureVector, t: SessionMs): ControlMessage[] {
    const messages: ControlMessage[] = [];

    const chordBend = this.chordBend(features.hipTilt);
    const chordVoices: VoiceId[] = [...TRIAD_VOICES];
    if (this.extension) chordVoices.push("chord-extension");
    for (const voiceId of chordVoices) {
      messages.push({ type: "control_change", name: "pitchBend", value: chordBend, voiceId });
    }

    messages.push({
      type: "control_change",
      name: "expression",
      value: clamp(features.kneeAngle, 0, 1),
    });

    for (const limb of LIMBS) {
      const names = LIMB_FEATURES[limb];
      const elbowAngle = features[names.elbowAngle];
      const depth = this.vibrato[limb].update(t, elbowAngle);
      if (!this.melody.has(limb)) continue;

      messages.push({
        type: "parameter",
        name: names.melodyNote,
        value: quantizeMelody(features[names.handY], limb),
      });
      messages.push({
        type: "control_change",
        name: "pitchBend",
        value: this.glissandoBend(elbowAngle),
        voiceId: limb,
      });
      messages.push({ type: "control_change", name: "vibrato", value: depth, voiceId: limb });
    }

    messages.push({ type: "control_change", name: "filter", value: clamp(features.headTilt, -1, 1) });
    messages.push({ type: "control_change", name: "texture", value: clamp(features.energy, 0, 1) });

    for (const name of FEATURE_NAMES) {
      messages.push({ type: "parameter", name, value: features[name] });
    }

    return messages;
  }

  /** Proportional to tilt up to the moderate threshold, then held. */
  private chordBend(hipTilt: number): number {
    const moderate = this.config.hipTiltModerate;
    return clamp(hipTilt, -moderate, moderate) * this.config.chordBendRange;
  }

  /** Zero while the arm is close to the body, then proportional to angle. */
  private glissandoBend(elbowAngle: number): number {
    const stable = this.config.elbowStableAngle;
    if (elbowAngle <= stable) return 0;
    return clamp((elbowAngle - stable) / (1 - stable), 0, 1) * this.config.glissandoRange;
  }
}

function noteOn(voiceId: VoiceId, pitch: MidiPitch, velocity: MidiVelocity): NoteOn {
  return { type: "note_on", voiceId, pitch, velocity };
}

function noteOff(voiceId: VoiceId): NoteOff {
  return { type: "note_off", voiceId };
}
