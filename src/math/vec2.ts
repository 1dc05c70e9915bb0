/**
 * 2D vector utilities for polygon processing
 */

/** 2D vector as [x, y] tuple */
export type Vec2 = [number, number];

/**
 * Cross product of (a - o) and (b - o).
 * Positive when o -> a -> b turns counter-clockwise.
 */
export function cross(o: Readonly<Vec2>, a: Readonly<Vec2>, b: Readonly<Vec2>): number {
  return (a[0] - o[0]) * (b[1] - o[1]) - (a[1] - o[1]) * (b[0] - o[0]);
}

/** Signed area of a ring (positive for counter-clockwise) */
export function signedArea(ring: readonly Readonly<Vec2>[]): number {
  let sum = 0;
  for (let i = 0, j = ring.length - 1; i < ring.length; j = i++) {
    const a = ring[j]!;
    const b = ring[i]!;
    sum += a[0] * b[1] - b[0] * a[1];
  }
  return sum / 2;
}

function onSegment(p: Readonly<Vec2>, q: Readonly<Vec2>, r: Readonly<Vec2>): boolean {
  return (
    Math.min(p[0], r[0]) <= q[0] &&
    q[0] <= Math.max(p[0], r[0]) &&
    Math.min(p[1], r[1]) <= q[1] &&
    q[1] <= Math.max(p[1], r[1])
  );
}

/**
 * Whether segments p1-p2 and q1-q2 share at least one point,
 * including touching endpoints and collinear overlap.
 */
export function segmentsIntersect(
  p1: Readonly<Vec2>,
  p2: Readonly<Vec2>,
  q1: Readonly<Vec2>,
  q2: Readonly<Vec2>
): boolean {
  const d1 = Math.sign(cross(q1, q2, p1));
  const d2 = Math.sign(cross(q1, q2, p2));
  const d3 = Math.sign(cross(p1, p2, q1));
  const d4 = Math.sign(cross(p1, p2, q2));

  if (d1 !== d2 && d3 !== d4 && d1 !== 0 && d2 !== 0 && d3 !== 0 && d4 !== 0) {
    return true;
  }

  if (d1 === 0 && onSegment(q1, p1, q2)) return true;
  if (d2 === 0 && onSegment(q1, p2, q2)) return true;
  if (d3 === 0 && onSegment(p1, q1, p2)) return true;
  if (d4 === 0 && onSegment(p1, q2, p2)) return true;

  return false;
}

/**
 * Whether a closed ring is simple: no two edges meet except adjacent
 * edges at their shared vertex, and no edge doubles back over the previous one.
 */
export function isSimpleRing(ring: readonly Readonly<Vec2>[]): boolean {
  const n = ring.length;
  if (n < 3) return false;

  for (let i = 0; i < n; i++) {
    const a1 = ring[i]!;
    const a2 = ring[(i + 1) % n]!;

    // Adjacent edge: only a collinear backtrack counts as overlap
    const b2 = ring[(i + 2) % n]!;
    if (cross(a1, a2, b2) === 0) {
      const dot = (a2[0] - a1[0]) * (b2[0] - a2[0]) + (a2[1] - a1[1]) * (b2[1] - a2[1]);
      if (dot < 0) return false;
    }

    for (let j = i + 2; j < n; j++) {
      if (i === 0 && j === n - 1) continue;
      const c1 = ring[j]!;
      const c2 = ring[(j + 1) % n]!;
      if (segmentsIntersect(a1, a2, c1, c2)) return false;
    }
  }

  return true;
}
