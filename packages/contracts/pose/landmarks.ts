/**
 * Pose Landmark Types
 *
 * Input contract of the engine: one LandmarkFrame per captured image,
 * produced by an external pose-estimation stage.
 */

import type { SessionMs, Confidence } from "../core/time";

/**
 * Landmark index in the 33-point body model (0..32).
 */
export type LandmarkId = number;

/** Number of landmarks in a complete frame. */
export const LANDMARK_COUNT = 33;

/**
 * Indices of the landmarks the engine reads.
 * "Left" and "right" refer to the performer's body, not the image.
 */
export const PoseLandmark = {
  nose: 0,
  leftEar: 7,
  rightEar: 8,
  leftShoulder: 11,
  rightShoulder: 12,
  leftElbow: 13,
  rightElbow: 14,
  leftWrist: 15,
  rightWrist: 16,
  leftHip: 23,
  rightHip: 24,
  leftKnee: 25,
  rightKnee: 26,
  leftAnkle: 27,
  rightAnkle: 28,
} as const;

export interface Landmark {
  readonly id: LandmarkId;
  readonly x: number; // 0..1 across the image
  readonly y: number; // 0..1 down the image
  readonly z: number; // unbounded depth
  readonly visibility: Confidence;
}

export interface LandmarkFrame {
  readonly t: SessionMs;
  readonly landmarks: readonly Landmark[];
}
