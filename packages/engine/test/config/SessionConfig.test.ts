import { describe, it, expect } from "vitest";
import { SessionConfigError, parseSessionConfig } from "../../src/config/SessionConfig";
import { TEST_CONFIG, UNSMOOTHED } from "../_fixtures/pose";

function issuesOf(input: unknown): string[] {
  try {
    parseSessionConfig(input);
  } catch (error) {
    if (error instanceof SessionConfigError) return error.issues;
    throw error;
  }
  return [];
}

describe("parseSessionConfig", () => {
  it("fills defaults around the required values", () => {
    const config = parseSessionConfig(TEST_CONFIG);

    expect(config.landmarks).toEqual({
      visibilityThreshold: 0.5,
      gapToleranceMs: 250,
      historyCapacity: 4,
    });
    expect(config.triggers).toMatchObject({
      onsetThreshold: 0.5,
      minRetriggerMs: 200,
      baseDurationMs: 300,
      minDurationMs: 150,
      maxDurationMs: 600,
      velocityFloor: 60,
      limbs: {},
    });
    expect(config.mapping.hipTiltExtreme).toBe(0.8);
    expect(config.mapping.vibrato.windowMs).toBe(500);
    expect(config.dispatch).toEqual({ maxRetries: 3, backoffMs: 0, maxPending: 256 });
    expect(config.smoothing.overrides).toEqual({});
  });

  it("requires the performer-tuned values", () => {
    expect(issuesOf({})).toEqual([
      "smoothing: Required",
      "zones: Required",
      "triggers: Required",
    ]);
  });

  it("throws a SessionConfigError naming every issue", () => {
    expect(() => parseSessionConfig({ ...TEST_CONFIG, zones: {} })).toThrow(
      "Invalid session configuration: zones.hysteresisMargin: Required"
    );
  });

  it("rejects a zero alpha", () => {
    const smoothing = { alphas: { ...UNSMOOTHED.alphas, positional: 0 } };
    expect(issuesOf({ ...TEST_CONFIG, smoothing })).toEqual([
      "smoothing.alphas.positional: alpha must be in (0, 1]",
    ]);
  });

  it("rejects an override for an unknown feature", () => {
    const smoothing = { ...UNSMOOTHED, overrides: { elbowFlair: 0.5 } };
    expect(issuesOf({ ...TEST_CONFIG, smoothing })).toHaveLength(1);
  });

  it("rejects a margin of half a zone or more", () => {
    expect(issuesOf({ ...TEST_CONFIG, zones: { hysteresisMargin: 0.125 } })).toEqual([
      "zones.hysteresisMargin: margin must stay inside half a zone",
    ]);
  });

  it("rejects an extreme tilt below the moderate one", () => {
    const mapping = { hipTiltModerate: 0.7, hipTiltExtreme: 0.6 };
    expect(issuesOf({ ...TEST_CONFIG, mapping })).toEqual([
      "mapping.hipTiltExtreme: hipTiltExtreme must be at least hipTiltModerate",
    ]);
  });

  it("rejects a minimum duration above the maximum", () => {
    const triggers = { onsetThreshold: 0.5, minRetriggerMs: 0, minDurationMs: 700 };
    expect(issuesOf({ ...TEST_CONFIG, triggers })).toEqual([
      "triggers.minDurationMs: minDurationMs must not exceed maxDurationMs",
    ]);
  });
});
