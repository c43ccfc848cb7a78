/**
 * Abstraction over a MIDI output port for dependency injection.
 * Allows testing the sink without a MIDI driver.
 */

export interface MidiOutput {
  /**
   * Send one raw MIDI message: [status, data1, data2].
   * A thrown error or rejected promise means the message was not delivered.
   */
  send(data: number[]): void | Promise<void>;

  /** Clean up resources. */
  dispose?(): void;
}
