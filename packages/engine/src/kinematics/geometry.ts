/**
 * Planar geometry over landmark image coordinates.
 */

export interface Point2 {
  x: number;
  y: number;
}

export function midpoint(a: Point2, b: Point2): Point2 {
  return { x: (a.x + b.x) / 2, y: (a.y + b.y) / 2 };
}

export function distance(a: Point2, b: Point2): number {
  return Math.hypot(b.x - a.x, b.y - a.y);
}

/**
 * Interior angle at `vertex` (radians, 0..π) of the triangle a-vertex-b,
 * via the law of cosines. Null when either side has zero length.
 */
export function angleAt(a: Point2, vertex: Point2, b: Point2): number | null {
  const sideA = distance(vertex, a);
  const sideB = distance(vertex, b);
  if (sideA === 0 || sideB === 0) return null;

  const opposite = distance(a, b);
  const cos = (sideA * sideA + sideB * sideB - opposite * opposite) / (2 * sideA * sideB);
  // Rounding can push cos just outside [-1, 1]
  return Math.acos(Math.min(1, Math.max(-1, cos)));
}

/**
 * Tilt of the segment between a landmark pair, in radians.
 * Positive when `right` sits lower in the image than `left`. The horizontal
 * component is taken as a magnitude so the sign does not flip when the
 * performer turns around. Null when the two points coincide.
 */
export function tiltAngle(left: Point2, right: Point2): number | null {
  const dx = Math.abs(left.x - right.x);
  const dy = right.y - left.y;
  if (dx === 0 && dy === 0) return null;
  return Math.atan2(dy, dx);
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
