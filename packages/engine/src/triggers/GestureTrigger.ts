/**
 * Gesture Trigger
 *
 * Debounced state machine, one per limb, turning the smoothed hand jerk
 * into discrete melody note onsets and releases:
 *
 *   idle ──jerk > threshold, cooldown passed──▶ armed ──same step──▶ sounding
 *     ▲                                                                  │
 *     └──────────── duration elapsed (sets cooldown deadline) ───────────┘
 *
 * One voice per limb: a spike while sounding or cooling down is ignored.
 */

import type {
  Limb,
  MidiVelocity,
  Ms,
  SessionMs,
  TriggerEvent,
  TriggerPhase,
  TriggerRelease,
} from "@sonokinetic/contracts";
import type { TriggerConfig } from "../config/SessionConfig";
import { clamp } from "../kinematics/geometry";

export type TriggerState =
  | { phase: "idle"; cooldownUntil: SessionMs }
  | { phase: "armed"; cooldownUntil: SessionMs; armedAt: SessionMs }
  | { phase: "sounding"; onsetAt: SessionMs; durationMs: Ms; velocity: MidiVelocity };

export interface TriggerInput {
  t: SessionMs;
  /** Smoothed hand jerk, 0..1 */
  jerk: number;
  /** Smoothed arm velocity, 0..1 */
  armVelocity: number;
  /** Hand height, 0..1 */
  handY: number;
}

export interface TriggerSettings {
  onsetThreshold: number;
  minRetriggerMs: Ms;
  baseDurationMs: Ms;
  minDurationMs: Ms;
  maxDurationMs: Ms;
  velocityShorteningMs: Ms;
  velocityFloor: MidiVelocity;
}

export interface TriggerStep {
  state: TriggerState;
  events: TriggerEvent[];
}

export const INITIAL_TRIGGER_STATE: TriggerState = {
  phase: "idle",
  cooldownUntil: Number.NEGATIVE_INFINITY,
};

/**
 * Settings for one limb: shared trigger configuration with the limb's
 * overrides applied.
 */
export function resolveTriggerSettings(config: TriggerConfig, limb: Limb): TriggerSettings {
  const overrides = config.limbs[limb];
  return {
    onsetThreshold: overrides?.onsetThreshold ?? config.onsetThreshold,
    minRetriggerMs: overrides?.minRetriggerMs ?? config.minRetriggerMs,
    baseDurationMs: config.baseDurationMs,
    minDurationMs: config.minDurationMs,
    maxDurationMs: config.maxDurationMs,
    velocityShorteningMs: config.velocityShorteningMs,
    velocityFloor: config.velocityFloor,
  };
}

/** MIDI velocity rises linearly with arm velocity from the floor to 127. */
export function noteVelocity(armVelocity: number, floor: MidiVelocity): MidiVelocity {
  const v = clamp(armVelocity, 0, 1);
  return clamp(Math.round(floor + v * (127 - floor)), 1, 127);
}

/** Held duration shortens as arm velocity rises (staccato vs legato). */
export function noteDuration(armVelocity: number, settings: TriggerSettings): Ms {
  const v = clamp(armVelocity, 0, 1);
  return clamp(
    settings.baseDurationMs - v * settings.velocityShorteningMs,
    settings.minDurationMs,
    settings.maxDurationMs
  );
}

/**
 * Transition function. Pure: the same state, input and settings always give
 * the same next state and events.
 */
export function stepTrigger(
  state: TriggerState,
  input: TriggerInput,
  settings: TriggerSettings,
  limb: Limb
): TriggerStep {
  switch (state.phase) {
    case "idle": {
      const onset = input.jerk > settings.onsetThreshold && input.t >= state.cooldownUntil;
      if (!onset) return { state, events: [] };
      return stepTrigger(
        { phase: "armed", cooldownUntil: state.cooldownUntil, armedAt: input.t },
        input,
        settings,
        limb
      );
    }

    case "armed": {
      const velocity = noteVelocity(input.armVelocity, settings.velocityFloor);
      const durationMs = noteDuration(input.armVelocity, settings);
      return {
        state: { phase: "sounding", onsetAt: input.t, durationMs, velocity },
        events: [
          {
            type: "onset",
            limb,
            t: input.t,
            velocity,
            durationMs,
            handY: clamp(input.handY, 0, 1),
          },
        ],
      };
    }

    case "sounding": {
      if (input.t - state.onsetAt < state.durationMs) return { state, events: [] };
      return release(input.t, settings, limb);
    }
  }
}

function release(
  t: SessionMs,
  settings: TriggerSettings,
  limb: Limb
): { state: TriggerState; events: TriggerRelease[] } {
  return {
    state: { phase: "idle", cooldownUntil: t + settings.minRetriggerMs },
    events: [{ type: "release", limb, t }],
  };
}

export class GestureTrigger {
  readonly limb: Limb;
  private settings: TriggerSettings;
  private state: TriggerState = INITIAL_TRIGGER_STATE;

  constructor(limb: Limb, settings: TriggerSettings) {
    this.limb = limb;
    this.settings = settings;
  }

  get phase(): TriggerPhase {
    return this.state.phase;
  }

  get snapshot(): TriggerState {
    return this.state;
  }

  update(input: TriggerInput): TriggerEvent[] {
    const next = stepTrigger(this.state, input, this.settings, this.limb);
    this.state = next.state;
    return next.events;
  }

  /** Release a sounding voice immediately (session end). */
  forceRelease(t: SessionMs): TriggerRelease[] {
    if (this.state.phase !== "sounding") return [];
    const next = release(t, this.settings, this.limb);
    this.state = next.state;
    return next.events;
  }

  reset(): void {
    this.state = INITIAL_TRIGGER_STATE;
  }
}
