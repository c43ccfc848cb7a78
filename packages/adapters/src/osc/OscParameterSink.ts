/**
 * OSC Parameter Sink
 *
 * Publishes the mapped control stream as OSC-style messages, one message
 * per control value:
 *
 * | Message          | Address                      | Args                     |
 * |------------------|------------------------------|--------------------------|
 * | ParameterUpdate  | /motion/<name>               | [value]                  |
 * | ControlChange    | /control/<name>[/<voice>]    | [value]                  |
 * | NoteOn           | /note/on                     | [voice, pitch, velocity] |
 * | NoteOff          | /note/off                    | [voice]                  |
 */

import type {
  ControlName,
  IOutputSink,
  MidiPitch,
  MidiVelocity,
  ParameterName,
  VoiceId,
} from "@sonokinetic/contracts";

import type { OscMessage, OscTransport } from "./OscTransport";

export interface OscParameterSinkConfig {
  /**
   * Sink identifier used in dispatch statistics and diagnostics.
   * @default "osc"
   */
  id?: string;

  /**
   * Prepended to every address, e.g. "/performer1".
   * @default ""
   */
  addressPrefix?: string;
}

const DEFAULT_CONFIG: Required<OscParameterSinkConfig> = {
  id: "osc",
  addressPrefix: "",
};

export class OscParameterSink implements IOutputSink {
  readonly id: string;

  private transport: OscTransport;
  private prefix: string;

  constructor(transport: OscTransport, config: OscParameterSinkConfig = {}) {
    const resolved = { ...DEFAULT_CONFIG, ...config };
    this.id = resolved.id;
    this.prefix = resolved.addressPrefix.replace(/\/+$/, "");
    this.transport = transport;
  }

  sendParameter(name: ParameterName, value: number): void | Promise<void> {
    return this.send(`/motion/${name}`, [value]);
  }

  sendNoteOn(voiceId: VoiceId, pitch: MidiPitch, velocity: MidiVelocity): void | Promise<void> {
    return this.send("/note/on", [voiceId, pitch, velocity]);
  }

  sendNoteOff(voiceId: VoiceId): void | Promise<void> {
    return this.send("/note/off", [voiceId]);
  }

  sendControlChange(name: ControlName, value: number, voiceId?: VoiceId): void | Promise<void> {
    const address = voiceId === undefined ? `/control/${name}` : `/control/${name}/${voiceId}`;
    return this.send(address, [value]);
  }

  dispose(): void {
    this.transport.dispose?.();
  }

  private send(address: string, args: OscMessage["args"]): void | Promise<void> {
    return this.transport.send({ address: `${this.prefix}${address}`, args });
  }
}
