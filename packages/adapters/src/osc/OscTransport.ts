/**
 * Abstraction over an OSC client for dependency injection.
 * Allows testing the sink without opening a UDP socket.
 */

export type OscArgument = number | string;

export interface OscMessage {
  /** OSC address pattern, e.g. "/motion/hipTilt" */
  address: string;
  args: OscArgument[];
}

export interface OscTransport {
  /**
   * Send one message. A thrown error or rejected promise means the message
   * was not delivered.
   */
  send(message: OscMessage): void | Promise<void>;

  /** Clean up resources. */
  dispose?(): void;
}
