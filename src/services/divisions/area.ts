/**
 * Planar area of rings in the local metric frame
 */

import type { MetricPoint } from './types.js';

/**
 * Signed Shoelace area. Positive for counter-clockwise rings.
 * The ring may be open or closed; a repeated closing point adds nothing.
 */
export function signedRingArea(ring: readonly MetricPoint[]): number {
  let twiceArea = 0;
  for (let i = 0; i < ring.length; i++) {
    const a = ring[i];
    const b = ring[(i + 1) % ring.length];
    twiceArea += a.x * b.y - b.x * a.y;
  }
  return twiceArea / 2;
}

/** Shoelace area in square metres. */
export function ringArea(ring: readonly MetricPoint[]): number {
  return Math.abs(signedRingArea(ring));
}
