/**
 * MPE Note Sink
 *
 * Encodes the mapped control stream as raw MIDI in MPE layout. Channel
 * numbers are 0-indexed (0 = MIDI channel 1).
 *
 * - The master channel carries global controls: filter (CC74), texture
 *   (CC71), expression (CC11) and voice-less pitch bend / vibrato.
 * - Each NoteOn takes the next free member channel, rotating through the
 *   pool, so every voice can be bent independently. NoteOff frees it.
 * - Per-voice pitch bend uses the 14-bit pitch wheel, 8192 = centre.
 * - Per-voice vibrato depth goes out as CC1 on the voice's channel.
 *
 * Parameter updates are not part of the note stream and are ignored.
 */

import type {
  ControlName,
  IOutputSink,
  MidiPitch,
  MidiVelocity,
  ParameterName,
  VoiceId,
} from "@sonokinetic/contracts";

import type { MidiOutput } from "./MidiOutput";

export interface MpeNoteSinkConfig {
  /**
   * Sink identifier used in dispatch statistics and diagnostics.
   * @default "mpe"
   */
  id?: string;

  /**
   * MPE master channel, 0-indexed.
   * @default 0
   */
  masterChannel?: number;

  /**
   * Member channel pool, 0-indexed, in rotation order.
   * @default [1..15]
   */
  memberChannels?: number[];
}

const DEFAULT_CONFIG: Required<MpeNoteSinkConfig> = {
  id: "mpe",
  masterChannel: 0,
  memberChannels: Array.from({ length: 15 }, (_, i) => i + 1),
};

const STATUS = {
  noteOff: 0x80,
  noteOn: 0x90,
  controlChange: 0xb0,
  pitchBend: 0xe0,
} as const;

export const CC = {
  modulation: 1,
  expression: 11,
  texture: 71,
  brightness: 74,
  allNotesOff: 123,
} as const;

const PITCH_BEND_CENTER = 8192;
const PITCH_BEND_SPAN = 8191;

interface ActiveVoice {
  channel: number;
  pitch: MidiPitch;
}

export class MpeNoteSink implements IOutputSink {
  readonly id: string;

  private output: MidiOutput;
  private masterChannel: number;
  private memberChannels: number[];

  private active: Map<VoiceId, ActiveVoice> = new Map();
  /** Index into memberChannels where the next allocation search starts */
  private cursor = 0;
  /** Channels that have carried a note since the last allNotesOff() */
  private used: Set<number> = new Set();

  constructor(output: MidiOutput, config: MpeNoteSinkConfig = {}) {
    const resolved = { ...DEFAULT_CONFIG, ...config };
    for (const channel of [resolved.masterChannel, ...resolved.memberChannels]) {
      if (!Number.isInteger(channel) || channel < 0 || channel > 15) {
        throw new Error(`Invalid MIDI channel ${channel}: expected an integer 0-15`);
      }
    }
    if (resolved.memberChannels.includes(resolved.masterChannel)) {
      throw new Error(`Master channel ${resolved.masterChannel} cannot also be a member channel`);
    }
    if (resolved.memberChannels.length === 0) {
      throw new Error("MPE member channel pool is empty");
    }

    this.id = resolved.id;
    this.output = output;
    this.masterChannel = resolved.masterChannel;
    this.memberChannels = [...resolved.memberChannels];
  }

  /** Member channel currently assigned to a voice, if it is sounding. */
  channelOf(voiceId: VoiceId): number | null {
    return this.active.get(voiceId)?.channel ?? null;
  }

  sendParameter(_name: ParameterName, _value: number): void {
    // Not part of the note stream
  }

  async sendNoteOn(voiceId: VoiceId, pitch: MidiPitch, velocity: MidiVelocity): Promise<void> {
    // A voice holds one note; restriking it releases the old one first
    if (this.active.has(voiceId)) {
      await this.sendNoteOff(voiceId);
    }

    const channel = this.nextFreeChannel();
    const note = toDataByte(pitch);
    await this.output.send([STATUS.noteOn | channel, note, clampInt(velocity, 1, 127)]);

    this.active.set(voiceId, { channel, pitch: note });
    this.used.add(channel);
    this.cursor = (this.memberChannels.indexOf(channel) + 1) % this.memberChannels.length;
  }

  async sendNoteOff(voiceId: VoiceId): Promise<void> {
    const voice = this.active.get(voiceId);
    if (!voice) return;

    await this.output.send([STATUS.noteOff | voice.channel, voice.pitch, 0]);
    this.active.delete(voiceId);
  }

  async sendControlChange(name: ControlName, value: number, voiceId?: VoiceId): Promise<void> {
    let channel = this.masterChannel;
    if (voiceId !== undefined) {
      const voice = this.active.get(voiceId);
      if (!voice) return; // no channel to address
      channel = voice.channel;
    }

    switch (name) {
      case "pitchBend":
        return this.sendPitchBend(channel, value);
      case "vibrato":
        return this.sendCC(channel, CC.modulation, unitToCC(value));
      case "expression":
        return this.sendCC(channel, CC.expression, unitToCC(value));
      case "texture":
        return this.sendCC(channel, CC.texture, unitToCC(value));
      case "filter":
        // -1 = dark, 0 = neutral (64), 1 = bright
        return this.sendCC(channel, CC.brightness, clampInt(64 + clamp(value, -1, 1) * 63, 0, 127));
    }
  }

  /**
   * All Notes Off (CC123) on the master channel and every member channel
   * that has carried a note. Clears voice allocation.
   */
  async allNotesOff(): Promise<void> {
    const channels = [this.masterChannel, ...[...this.used].sort((a, b) => a - b)];
    for (const channel of channels) {
      await this.sendCC(channel, CC.allNotesOff, 0);
    }
    this.active.clear();
    this.used.clear();
    this.cursor = 0;
  }

  dispose(): void {
    this.output.dispose?.();
  }

  private nextFreeChannel(): number {
    const busy = new Set([...this.active.values()].map((voice) => voice.channel));
    const count = this.memberChannels.length;
    for (let i = 0; i < count; i++) {
      const channel = this.memberChannels[(this.cursor + i) % count];
      if (!busy.has(channel)) return channel;
    }
    throw new Error(`No free MPE member channel (${count} voices sounding)`);
  }

  private async sendPitchBend(channel: number, bend: number): Promise<void> {
    const wheel = PITCH_BEND_CENTER + Math.round(clamp(bend, -1, 1) * PITCH_BEND_SPAN);
    await this.output.send([STATUS.pitchBend | channel, wheel & 0x7f, (wheel >> 7) & 0x7f]);
  }

  private async sendCC(channel: number, controller: number, value: number): Promise<void> {
    await this.output.send([STATUS.controlChange | channel, controller, value]);
  }
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function clampInt(value: number, min: number, max: number): number {
  return clamp(Math.round(value), min, max);
}

function toDataByte(value: number): number {
  return clampInt(value, 0, 127);
}

function unitToCC(value: number): number {
  return clampInt(clamp(value, 0, 1) * 127, 0, 127);
}
