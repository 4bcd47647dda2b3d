/**
 * 2D vector operations on [x, y] tuples
 */

export type Vec2 = [number, number];

/**
 * Create a 2D vector
 */
export function vec2(x: number, y: number): Vec2 {
  return [x, y];
}

/**
 * Add two vectors: a + b
 */
export function add2(a: Readonly<Vec2>, b: Readonly<Vec2>): Vec2 {
  return [a[0] + b[0], a[1] + b[1]];
}

/**
 * Subtract two vectors: a - b
 */
export function sub2(a: Readonly<Vec2>, b: Readonly<Vec2>): Vec2 {
  return [a[0] - b[0], a[1] - b[1]];
}

/**
 * Dot product: a · b
 */
export function dot2(a: Readonly<Vec2>, b: Readonly<Vec2>): number {
  return a[0] * b[0] + a[1] * b[1];
}

/**
 * Cross product (2D): returns scalar (z-component of 3D cross product)
 */
export function cross2(a: Readonly<Vec2>, b: Readonly<Vec2>): number {
  return a[0] * b[1] - a[1] * b[0];
}

/**
 * Length of vector
 */
export function length2(v: Readonly<Vec2>): number {
  return Math.sqrt(v[0] * v[0] + v[1] * v[1]);
}

/**
 * Distance between two points
 */
export function dist2(a: Readonly<Vec2>, b: Readonly<Vec2>): number {
  return length2(sub2(a, b));
}
