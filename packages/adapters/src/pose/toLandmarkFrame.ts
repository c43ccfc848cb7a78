/**
 * Converts MediaPipe Pose Landmarker output into the engine's input frame.
 *
 * The landmarker reports normalized image coordinates (y grows downward)
 * with a per-landmark visibility; index i in the result is landmark id i.
 */

import type { PoseLandmarkerResult } from "@mediapipe/tasks-vision";
import { LANDMARK_COUNT } from "@sonokinetic/contracts";
import type { Landmark, LandmarkFrame, SessionMs } from "@sonokinetic/contracts";

/**
 * @param t frame time relative to session start
 * @param poseIndex which detected pose to use when several are present
 * @returns null when the result holds no pose at `poseIndex`
 */
export function toLandmarkFrame(
  result: Pick<PoseLandmarkerResult, "landmarks">,
  t: SessionMs,
  poseIndex = 0
): LandmarkFrame | null {
  const pose = result.landmarks[poseIndex];
  if (!pose || pose.length === 0) return null;

  const landmarks: Landmark[] = pose.slice(0, LANDMARK_COUNT).map((lm, id) => ({
    id,
    x: lm.x,
    y: lm.y,
    z: lm.z,
    visibility: lm.visibility ?? 0,
  }));

  return { t, landmarks };
}
