/**
 * Lattice construction
 *
 * Every tiling places its vertices on a rows x cols grid of logical cells.
 * The flat point array is laid out row by row, so the point for cell (x, y)
 * lives at index `x + y * cols`. Face rules rely on that layout.
 */

import type { Vec2 } from '../num/vec2.js';
import type { VertexKey } from '../mesh/types.js';

/**
 * Maps a logical lattice cell to its position in the plane.
 * Must depend on (x, y) only, never on the patch size.
 */
export type LatticePlacement = (x: number, y: number) => Vec2;

/**
 * Flat index of lattice cell (x, y)
 */
export function latticeKey(x: number, y: number, cols: number): VertexKey {
  return x + y * cols;
}

/**
 * Place every cell of a rows x cols lattice
 */
export function buildLattice(rows: number, cols: number, place: LatticePlacement): Vec2[] {
  const points: Vec2[] = [];
  for (let y = 0; y < rows; y++) {
    for (let x = 0; x < cols; x++) {
      points.push(place(x, y));
    }
  }
  return points;
}
