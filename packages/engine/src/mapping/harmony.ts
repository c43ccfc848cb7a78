/**
 * Harmony Tables
 *
 * Static pitch material, computed once at module load with Tonal.js:
 * - four zone triads on scale degrees I, IV, V and vi of C major
 * - 6th/7th extension notes above each triad root
 * - one-octave melody ranges (right hand from C3, left hand from C5)
 */

import { Chord, Interval, Note, Scale } from "tonal";
import type { Limb, MidiPitch, ZoneIndex } from "@sonokinetic/contracts";
import { clamp } from "../kinematics/geometry";

const KEY_SCALE = Scale.get("C major");
const DEGREES_PER_OCTAVE = KEY_SCALE.intervals.length;

/** Semitone offset of each scale degree from the tonic */
const SCALE_STEPS: readonly number[] = KEY_SCALE.intervals.map((name) => Interval.semitones(name));

function midiOf(noteName: string): MidiPitch {
  const midi = Note.midi(noteName);
  if (midi === null) {
    throw new Error(`Not a note name: ${noteName}`);
  }
  return midi;
}

/** Pitch of a (0-based, possibly multi-octave) scale degree above a tonic. */
function degreeToMidi(tonic: MidiPitch, degree: number): MidiPitch {
  const octave = Math.floor(degree / DEGREES_PER_OCTAVE);
  return tonic + 12 * octave + SCALE_STEPS[degree % DEGREES_PER_OCTAVE];
}

export interface ZoneChord {
  numeral: string;
  /** Chord symbol, e.g. "CM", "Am" */
  symbol: string;
  /** Root, third, fifth */
  triad: readonly [MidiPitch, MidiPitch, MidiPitch];
  /** Added 6th above the root */
  sixth: MidiPitch;
  /** Added 7th above the root */
  seventh: MidiPitch;
}

const CHORD_TONIC = midiOf(`${KEY_SCALE.tonic ?? "C"}3`);

function buildZoneChord(numeral: string, rootDegree: number): ZoneChord {
  const at = (offset: number) => degreeToMidi(CHORD_TONIC, rootDegree + offset);
  const triad = [at(0), at(2), at(4)] as const;
  const pitchClasses = triad.map((midi) => Note.pitchClass(Note.fromMidi(midi)));
  return {
    numeral,
    symbol: Chord.detect(pitchClasses)[0] ?? numeral,
    triad,
    sixth: at(5),
    seventh: at(6),
  };
}

export const ZONE_CHORDS: Readonly<Record<ZoneIndex, ZoneChord>> = {
  0: buildZoneChord("I", 0),
  1: buildZoneChord("IV", 3),
  2: buildZoneChord("V", 4),
  3: buildZoneChord("vi", 5),
};

export const MELODY_BASE: Readonly<Record<Limb, MidiPitch>> = {
  right: midiOf("C3"),
  left: midiOf("C5"),
};

/** Scale steps in a melody range: a full octave including its top note */
export const MELODY_STEPS = DEGREES_PER_OCTAVE + 1;

/**
 * Quantize a hand height (0 = low, 1 = high) onto the limb's one-octave
 * diatonic range.
 */
export function quantizeMelody(handY: number, limb: Limb): MidiPitch {
  const step = clamp(Math.floor(clamp(handY, 0, 1) * MELODY_STEPS), 0, MELODY_STEPS - 1);
  return degreeToMidi(MELODY_BASE[limb], step);
}
