/**
 * Polygon orientation helpers
 */

import type { Vec2 } from '../num/vec2.js';
import { cross2 } from '../num/vec2.js';

/**
 * Compute signed area of a polygon
 * Positive = CCW, Negative = CW
 */
export function computeSignedArea(polygon: readonly Readonly<Vec2>[]): number {
  const n = polygon.length;
  if (n < 3) return 0;

  let area = 0;
  for (let i = 0; i < n; i++) {
    area += cross2(polygon[i], polygon[(i + 1) % n]);
  }

  return area / 2;
}

/**
 * Check if a polygon is counter-clockwise oriented
 */
export function isCounterClockwise(polygon: readonly Readonly<Vec2>[]): boolean {
  return computeSignedArea(polygon) > 0;
}
