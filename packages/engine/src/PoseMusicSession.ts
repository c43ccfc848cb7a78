/**
 * Pose Music Session
 *
 * Per-session context object. Owns every piece of mutable pipeline state
 * and runs the frame flow:
 *
 *   LandmarkFrame → FeatureExtractor → {ZoneClassifier, GestureTrigger × 2} → Mapper → sinks
 *
 * Single writer: `process()` must not be re-entered. Only delivery to the
 * sinks runs asynchronously, through one SinkDispatcher per sink.
 */

import { LIMBS } from "@sonokinetic/contracts";
import type {
  ControlMessage,
  Diagnostic,
  DiagnosticSeverity,
  FeatureVector,
  IOutputSink,
  LandmarkFrame,
  Limb,
  SessionMs,
  TriggerEvent,
  TriggerPhase,
} from "@sonokinetic/contracts";
import { parseSessionConfig } from "./config/SessionConfig";
import type { SessionConfig } from "./config/SessionConfig";
import { FeatureExtractor } from "./features/FeatureExtractor";
import { validateFrame } from "./features/validateFrame";
import { Mapper } from "./mapping/Mapper";
import { SinkDispatcher } from "./output/SinkDispatcher";
import type { DispatchFailure, DispatchStats } from "./output/SinkDispatcher";
import { GestureTrigger, resolveTriggerSettings } from "./triggers/GestureTrigger";
import { ZoneClassifier } from "./zones/ZoneClassifier";

export interface PoseMusicSessionOptions {
  /** Destinations for the mapped messages, each behind its own dispatcher */
  sinks?: IOutputSink[];
}

/** Diagnostics kept per session; older entries are discarded first. */
const MAX_DIAGNOSTICS = 100;

const LIMB_INPUTS = {
  right: { jerk: "rightHandJerk", armVelocity: "rightArmVelocity", handY: "rightHandY" },
  left: { jerk: "leftHandJerk", armVelocity: "leftArmVelocity", handY: "leftHandY" },
} as const;

export class PoseMusicSession {
  readonly config: SessionConfig;

  private extractor: FeatureExtractor;
  private zones: ZoneClassifier;
  private triggers: Record<Limb, GestureTrigger>;
  private mapper: Mapper;
  private dispatchers: SinkDispatcher[];

  private lastT: SessionMs | null = null;
  private lastFeatures: FeatureVector | null = null;
  private diagnosticLog: Map<string, Diagnostic> = new Map();
  private rejectedFrames = 0;
  private ended = false;

  /**
   * @throws SessionConfigError when the configuration is out of domain
   */
  constructor(config: unknown, options: PoseMusicSessionOptions = {}) {
    this.config = parseSessionConfig(config);

    this.extractor = new FeatureExtractor(this.config);
    this.zones = new ZoneClassifier(this.config.zones);
    this.triggers = {
      right: new GestureTrigger("right", resolveTriggerSettings(this.config.triggers, "right")),
      left: new GestureTrigger("left", resolveTriggerSettings(this.config.triggers, "left")),
    };
    this.mapper = new Mapper(this.config.mapping);
    this.dispatchers = (options.sinks ?? []).map(
      (sink) =>
        new SinkDispatcher(sink, this.config.dispatch, (failure) =>
          this.handleDispatchFailure(sink.id, failure)
        )
    );
  }

  /** Feature vector of the last accepted frame. */
  get features(): FeatureVector | null {
    return this.lastFeatures;
  }

  get diagnostics(): Diagnostic[] {
    return [...this.diagnosticLog.values()];
  }

  get isEnded(): boolean {
    return this.ended;
  }

  triggerPhase(limb: Limb): TriggerPhase {
    return this.triggers[limb].phase;
  }

  dispatchStats(): Record<string, DispatchStats> {
    return Object.fromEntries(this.dispatchers.map((d) => [d.sinkId, d.stats]));
  }

  clearDiagnostics(): void {
    this.diagnosticLog.clear();
  }

  /**
   * Process one frame and return the mapped messages, which are also handed
   * to every sink. A malformed frame is skipped: it returns no messages and
   * leaves all state untouched.
   */
  process(frame: LandmarkFrame): ControlMessage[] {
    if (this.ended) {
      throw new Error("Session has ended");
    }

    const validation = validateFrame(frame);
    if (!validation.ok) {
      this.rejectFrame(frame, validation.reason);
      return [];
    }
    const accepted = validation.frame;
    if (this.lastT !== null && accepted.t <= this.lastT) {
      this.rejectFrame(frame, `timestamp ${accepted.t} is not after ${this.lastT}`);
      return [];
    }
    this.lastT = accepted.t;

    const features = this.extractor.extract(accepted);
    this.lastFeatures = features;

    const zone = this.zones.classify(features.feetCenterX);

    const events: TriggerEvent[] = [];
    for (const limb of LIMBS) {
      const inputs = LIMB_INPUTS[limb];
      events.push(
        ...this.triggers[limb].update({
          t: accepted.t,
          jerk: features[inputs.jerk],
          armVelocity: features[inputs.armVelocity],
          handY: features[inputs.handY],
        })
      );
    }

    const messages = this.mapper.map(features, zone, events, accepted.t);
    this.dispatch(messages);
    return messages;
  }

  /**
   * End the session: release every sounding voice, hand the NoteOffs to the
   * sinks and tear down all per-session state. Returns the release messages.
   */
  end(t: SessionMs = this.lastT ?? 0): ControlMessage[] {
    if (this.ended) return [];

    const releases = LIMBS.flatMap((limb) => this.triggers[limb].forceRelease(t));
    const messages = this.mapper.releaseAll(releases);
    this.dispatch(messages);

    this.extractor.reset();
    this.zones.reset();
    this.triggers.right.reset();
    this.triggers.left.reset();
    this.lastFeatures = null;
    this.ended = true;

    console.log(`[PoseMusicSession] Session ended at t=${t}, released ${messages.length} voices`);
    return messages;
  }

  /** Resolves once every sink has caught up with the dispatched messages. */
  async flush(): Promise<void> {
    await Promise.all(this.dispatchers.map((d) => d.drain()));
  }

  private dispatch(messages: ControlMessage[]): void {
    if (messages.length === 0) return;
    for (const dispatcher of this.dispatchers) {
      dispatcher.dispatch(messages);
    }
  }

  private rejectFrame(frame: LandmarkFrame, reason: string): void {
    this.rejectedFrames++;
    const t = Number.isFinite(frame?.t) ? frame.t : this.lastT ?? 0;
    const message = `Rejected frame at t=${t}: ${reason}`;
    console.warn(`[PoseMusicSession] ${message}`);
    this.record({
      id: `input:rejected-frame:${this.rejectedFrames}`,
      category: "input",
      severity: "warning",
      message,
      timestamp: t,
      source: "PoseMusicSession",
    });
  }

  private handleDispatchFailure(sinkId: string, failure: DispatchFailure): void {
    const t = this.lastT ?? 0;
    const severity: DiagnosticSeverity = failure.kind === "failed" ? "error" : "warning";
    const subject =
      failure.message.type === "note_on" || failure.message.type === "note_off"
        ? `${failure.message.type} for ${failure.message.voiceId}`
        : `${failure.message.type} ${failure.message.name}`;
    const reason = failure.error instanceof Error ? failure.error.message : String(failure.error);
    const message =
      failure.kind === "failed"
        ? `Undelivered ${subject} on ${sinkId}${failure.compensated ? " (compensating note_off queued)" : ""}: ${reason}`
        : `Dropping continuous updates on ${sinkId}: ${reason}`;

    // Continuous drops share one entry per sink so a dead sink does not flood the log
    const id =
      failure.kind === "failed"
        ? `output:${sinkId}:failed:${subject}:${t}`
        : `output:${sinkId}:dropped`;
    const isNew = !this.diagnosticLog.has(id);
    this.record({ id, category: "output", severity, message, timestamp: t, source: sinkId });

    if (!isNew) return;
    if (severity === "error") {
      console.error(`[PoseMusicSession] ${message}`);
    } else {
      console.warn(`[PoseMusicSession] ${message}`);
    }
  }

  private record(diagnostic: Diagnostic): void {
    this.diagnosticLog.delete(diagnostic.id);
    this.diagnosticLog.set(diagnostic.id, diagnostic);
    while (this.diagnosticLog.size > MAX_DIAGNOSTICS) {
      const oldest = this.diagnosticLog.keys().next();
      if (oldest.done) break;
      this.diagnosticLog.delete(oldest.value);
    }
  }
}
