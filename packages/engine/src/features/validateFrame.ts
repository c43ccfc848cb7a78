/**
 * Shape validation for incoming landmark frames. A frame that fails is
 * skipped whole; the pipeline continues with the next one.
 */

import { z } from "zod";
import { LANDMARK_COUNT } from "@sonokinetic/contracts";
import type { LandmarkFrame } from "@sonokinetic/contracts";

const finite = z.number().finite();

const LandmarkSchema = z.object({
  id: z.number().int().min(0).max(LANDMARK_COUNT - 1),
  x: finite,
  y: finite,
  z: finite,
  visibility: z.number().min(0).max(1),
});

export const LandmarkFrameSchema = z.object({
  t: finite,
  landmarks: z
    .array(LandmarkSchema)
    .min(1, "frame has no landmarks")
    .max(LANDMARK_COUNT, `frame has more than ${LANDMARK_COUNT} landmarks`)
    .refine((landmarks) => new Set(landmarks.map((l) => l.id)).size === landmarks.length, {
      message: "duplicate landmark ids",
    }),
});

export type FrameValidation =
  | { ok: true; frame: LandmarkFrame }
  | { ok: false; reason: string };

export function validateFrame(input: unknown): FrameValidation {
  const result = LandmarkFrameSchema.safeParse(input);
  if (result.success) {
    return { ok: true, frame: result.data };
  }
  const issue = result.error.issues[0];
  const where = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
  return { ok: false, reason: `${where}${issue.message}` };
}
