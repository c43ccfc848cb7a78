/**
 * Sink Dispatcher
 *
 * Hands control messages to an output sink without blocking frame
 * processing. `dispatch()` only enqueues; delivery runs asynchronously.
 *
 * ## Backpressure
 *
 * Continuous messages (parameter updates, control changes) are keyed by
 * name and voice. A newer message supersedes a pending one with the same
 * key, and when the queue grows past `maxPending` the oldest continuous
 * entries are dropped. A failed continuous send is not retried: the next
 * frame overwrites it anyway.
 *
 * Note messages are never dropped silently. A failed send is retried up to
 * `maxRetries` times with exponential backoff. A NoteOn that still fails is
 * followed by a compensating NoteOff for its voice, so the receiver cannot
 * be left with a hung note. A NoteOff that still fails is reported.
 */

import { setTimeout as sleep } from "node:timers/promises";
import { isNoteMessage } from "@sonokinetic/contracts";
import type { ControlMessage, IOutputSink } from "@sonokinetic/contracts";
import type { DispatchConfig } from "../config/SessionConfig";

export interface DispatchStats {
  delivered: number;
  superseded: number;
  dropped: number;
  retried: number;
  compensated: number;
  failed: number;
}

/**
 * - dropped: a continuous message could not be delivered
 * - failed: a note message could not be delivered after all retries
 */
export interface DispatchFailure {
  kind: "dropped" | "failed";
  message: ControlMessage;
  error: unknown;
  /** True when a compensating NoteOff was queued */
  compensated: boolean;
}

interface PendingEntry {
  message: ControlMessage;
  /** Supersede key for continuous messages, null for notes */
  key: string | null;
  attempts: number;
}

export class SinkDispatcher {
  private sink: IOutputSink;
  private config: DispatchConfig;
  private onFailure: ((failure: DispatchFailure) => void) | null;

  private queue: PendingEntry[] = [];
  private running: Promise<void> | null = null;
  private counters: DispatchStats = {
    delivered: 0,
    superseded: 0,
    dropped: 0,
    retried: 0,
    compensated: 0,
    failed: 0,
  };

  constructor(
    sink: IOutputSink,
    config: DispatchConfig,
    onFailure?: (failure: DispatchFailure) => void
  ) {
    this.sink = sink;
    this.config = config;
    this.onFailure = onFailure ?? null;
  }

  get sinkId(): string {
    return this.sink.id;
  }

  get pending(): number {
    return this.queue.length;
  }

  get stats(): DispatchStats {
    return { ...this.counters };
  }

  dispatch(messages: readonly ControlMessage[]): void {
    for (const message of messages) {
      const key = continuousKey(message);
      if (key !== null) {
        const index = this.queue.findIndex((entry) => entry.key === key);
        if (index >= 0) {
          this.queue.splice(index, 1);
          this.counters.superseded++;
        }
      }
      this.queue.push({ message, key, attempts: 0 });
    }

    this.enforceBound();
    this.schedule();
  }

  /** Resolves once every queued message has been delivered or given up on. */
  async drain(): Promise<void> {
    while (this.running) {
      await this.running;
    }
  }

  private enforceBound(): void {
    while (this.queue.length > this.config.maxPending) {
      const index = this.queue.findIndex((entry) => entry.key !== null);
      if (index < 0) break; // only notes left; those are never dropped
      this.queue.splice(index, 1);
      this.counters.dropped++;
    }
  }

  private schedule(): void {
    if (this.running || this.queue.length === 0) return;
    this.running = this.run().finally(() => {
      this.running = null;
      // Messages queued while the last delivery was settling
      this.schedule();
    });
  }

  private async run(): Promise<void> {
    // Let the caller's frame finish before touching the sink
    await Promise.resolve();

    for (let entry = this.queue.shift(); entry; entry = this.queue.shift()) {
      await this.deliver(entry);
    }
  }

  private async deliver(entry: PendingEntry): Promise<void> {
    for (;;) {
      try {
        await this.send(entry.message);
        this.counters.delivered++;
        return;
      } catch (error) {
        const { message } = entry;
        if (!isNoteMessage(message)) {
          this.counters.dropped++;
          this.report({ kind: "dropped", message, error, compensated: false });
          return;
        }

        if (entry.attempts < this.config.maxRetries) {
          entry.attempts++;
          this.counters.retried++;
          await sleep(this.config.backoffMs * 2 ** (entry.attempts - 1));
          continue;
        }

        this.counters.failed++;
        const compensate = message.type === "note_on";
        if (compensate) {
          this.queue.unshift({
            message: { type: "note_off", voiceId: message.voiceId },
            key: null,
            attempts: 0,
          });
          this.counters.compensated++;
        }
        this.report({ kind: "failed", message, error, compensated: compensate });
        return;
      }
    }
  }

  private async send(message: ControlMessage): Promise<void> {
    switch (message.type) {
      case "parameter":
        return this.sink.sendParameter(message.name, message.value);
      case "note_on":
        return this.sink.sendNoteOn(message.voiceId, message.pitch, message.velocity);
      case "note_off":
        return this.sink.sendNoteOff(message.voiceId);
      case "control_change":
        return this.sink.sendControlChange(message.name, message.value, message.voiceId);
    }
  }

  private report(failure: DispatchFailure): void {
    this.onFailure?.(failure);
  }
}

function continuousKey(message: ControlMessage): string | null {
  switch (message.type) {
    case "parameter":
      return `parameter:${message.name}`;
    case "control_change":
      return `control:${message.name}:${message.voiceId ?? "*"}`;
    case "note_on":
    case "note_off":
      return null;
  }
}
