/**
 * Regular tilings: one polygon type meeting edge to edge
 */

import { vec2 } from '../num/vec2.js';
import { HALF_SQRT_3 } from '../num/constants.js';
import { CELL_QUAD, LOWER_TRIANGLE, UPPER_TRIANGLE } from '../faces/stencils.js';
import type { LatticePlacement } from '../lattice/buildLattice.js';
import type { TilingDefinition } from './types.js';

/**
 * 60° rhombic lattice: each row is shifted half a unit to the right
 */
export const placeTriangular: LatticePlacement = (x, y) => vec2(x + 0.5 * y, y * HALF_SQRT_3);

export const TRIANGLE_TILING: TilingDefinition = {
  kind: `triangle`,
  name: `TRIANGLE`,
  family: `regular`,
  vertexConfiguration: `3.3.3.3.3.3`,
  polygonSides: [3],
  place: placeTriangular,
  passes: [[{ when: () => true, stencils: [LOWER_TRIANGLE, UPPER_TRIANGLE] }]],
};

export const SQUARE_TILING: TilingDefinition = {
  kind: `square`,
  name: `SQUARE`,
  family: `regular`,
  vertexConfiguration: `4.4.4.4`,
  polygonSides: [4],
  place: (x, y) => vec2(x, y),
  passes: [[{ when: () => true, stencils: [CELL_QUAD] }]],
};

/**
 * Brick-offset lattice. Each row alternates short and long gaps so that
 * three consecutive rows trace the zigzag outline of a row of hexagons.
 */
export const HEXAGON_TILING: TilingDefinition = {
  kind: `hexagon`,
  name: `HEXAGON`,
  family: `regular`,
  vertexConfiguration: `6.6.6`,
  polygonSides: [6],
  place: (x, y) =>
    vec2(
      Math.floor((x + (y % 2)) / 2) * 3 + ((x + y) % 2) - (y % 2) * 1.5,
      y * HALF_SQRT_3
    ),
  passes: [
    [
      {
        when: (x, y) => x % 2 === y % 2,
        stencils: [[[0, 0], [1, 0], [1, 1], [1, 2], [0, 2], [0, 1]]],
      },
    ],
  ],
};
