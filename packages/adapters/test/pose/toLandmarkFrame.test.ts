import { describe, it, expect } from "vitest";
import type { NormalizedLandmark } from "@mediapipe/tasks-vision";
import { toLandmarkFrame } from "../../src/pose/toLandmarkFrame";

function detectedPose(offset: number, count = 33): NormalizedLandmark[] {
  return Array.from({ length: count }, (_, i) => ({
    x: offset + i / 100,
    y: 0.5,
    z: -0.1,
    visibility: 0.9,
  }));
}

describe("toLandmarkFrame", () => {
  it("numbers landmarks by their index in the pose", () => {
    const frame = toLandmarkFrame({ landmarks: [detectedPose(0)] }, 1500);

    expect(frame?.t).toBe(1500);
    expect(frame?.landmarks).toHaveLength(33);
    expect(frame?.landmarks[16]).toEqual({ id: 16, x: 0.16, y: 0.5, z: -0.1, visibility: 0.9 });
  });

  it("returns null when no pose was detected", () => {
    expect(toLandmarkFrame({ landmarks: [] }, 0)).toBeNull();
  });

  it("selects a pose by index", () => {
    const frame = toLandmarkFrame({ landmarks: [detectedPose(0), detectedPose(0.5)] }, 0, 1);
    expect(frame?.landmarks[0].x).toBe(0.5);
    expect(toLandmarkFrame({ landmarks: [detectedPose(0)] }, 0, 1)).toBeNull();
  });

  it("keeps at most 33 landmarks", () => {
    const frame = toLandmarkFrame({ landmarks: [detectedPose(0, 40)] }, 0);
    expect(frame?.landmarks).toHaveLength(33);
  });
});
