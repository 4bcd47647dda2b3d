/**
 * Semi-regular (Archimedean) tilings
 *
 * Each tiling mixes two or three regular polygons with unit edges. The
 * lattice transforms group cells into 2x2 or 4x4 super-cells (via
 * `Math.floor(x / 2)`, `Math.floor(y / 4)`, ...) and add fixed irrational
 * offsets per sub-cell. The rule tables list, for every cell class, the
 * polygons anchored at that cell.
 */

import type { Vec2 } from '../num/vec2.js';
import { add2, vec2 } from '../num/vec2.js';
import { HALF_SQRT_3, SQRT_2, SQRT_3 } from '../num/constants.js';
import { CELL_QUAD, LOWER_TRIANGLE, UPPER_TRIANGLE } from '../faces/stencils.js';
import { placeTriangular } from './regular.js';
import type { SemiRegularVariant, TilingDefinition } from './types.js';

const half = (n: number): number => Math.floor(n / 2);
const quarter = (n: number): number => Math.floor(n / 4);

/**
 * Snub hexagonal tiling (3.3.3.3.6)
 *
 * Uses the triangular lattice. Cells are classified by `(x + 3y) mod 7`;
 * one cell in seven anchors a hexagon and the triangles touching it are
 * left out.
 */
export const SEMI_REGULAR_1: TilingDefinition = {
  kind: `semi-regular-1`,
  name: `SEMI-REGULAR-1`,
  family: `semi-regular`,
  vertexConfiguration: `3.3.3.3.6`,
  polygonSides: [3, 6],
  place: placeTriangular,
  passes: [
    [
      {
        when: (x, y) => [0, 2, 5, 6].includes((x + 3 * y) % 7),
        stencils: [LOWER_TRIANGLE],
      },
      {
        when: (x, y) => [2, 4, 5, 6].includes((x + 3 * y) % 7),
        stencils: [UPPER_TRIANGLE],
      },
      {
        when: (x, y) => (x + 3 * y) % 7 === 4,
        stencils: [[[1, 0], [0, 1], [-1, 1], [-1, 0], [0, -1], [1, -1]]],
      },
    ],
  ],
};

const SEMI_REGULAR_2_STEP = 1 + SQRT_2 * 0.5;

/**
 * Truncated square tiling (4.8.8)
 *
 * Octagons are collected in a first pass and squares in a second, so the
 * face list holds every octagon before any square.
 */
export const SEMI_REGULAR_2: TilingDefinition = {
  kind: `semi-regular-2`,
  name: `SEMI-REGULAR-2`,
  family: `semi-regular`,
  vertexConfiguration: `4.8.8`,
  polygonSides: [4, 8],
  place: (x, y) =>
    vec2(
      half(x) * (2 + SQRT_2) + (x % 2) + half(y) * SEMI_REGULAR_2_STEP,
      half(y) * SEMI_REGULAR_2_STEP + (y % 2)
    ),
  passes: [
    [
      {
        when: (x, y) => x % 2 === 1 && y % 2 === 0,
        stencils: [[[0, 0], [1, -1], [2, -1], [1, 0], [1, 1], [0, 2], [-1, 2], [0, 1]]],
      },
    ],
    [
      {
        when: (x, y) => x % 2 === 0 && y % 2 === 0,
        stencils: [CELL_QUAD],
      },
    ],
  ],
};

/**
 * Elongated triangular tiling (3.3.3.4.4): rows of squares alternate
 * with rows of triangles.
 */
export const SEMI_REGULAR_3: TilingDefinition = {
  kind: `semi-regular-3`,
  name: `SEMI-REGULAR-3`,
  family: `semi-regular`,
  vertexConfiguration: `3.3.3.4.4`,
  polygonSides: [3, 4],
  place: (x, y) => vec2(x + 0.5 * half(y), half(y) * (1 + HALF_SQRT_3) + (y % 2)),
  passes: [
    [
      { when: (_x, y) => y % 2 === 0, stencils: [CELL_QUAD] },
      { when: (_x, y) => y % 2 === 1, stencils: [LOWER_TRIANGLE, UPPER_TRIANGLE] },
    ],
  ],
};

/** Trihexagonal tiling (3.6.3.6) on the triangular lattice */
export const SEMI_REGULAR_4: TilingDefinition = {
  kind: `semi-regular-4`,
  name: `SEMI-REGULAR-4`,
  family: `semi-regular`,
  vertexConfiguration: `3.6.3.6`,
  polygonSides: [3, 6],
  place: placeTriangular,
  passes: [
    [
      { when: (x, y) => x % 2 === 0 && y % 2 === 0, stencils: [LOWER_TRIANGLE] },
      { when: (x, y) => x % 2 === 0 && y % 2 === 1, stencils: [[[0, 0], [0, 1], [-1, 1]]] },
      {
        when: (x, y) => x % 2 === 1 && y % 2 === 0,
        stencils: [[[0, 0], [1, 0], [1, 1], [0, 2], [-1, 2], [-1, 1]]],
      },
    ],
  ],
};

const SEMI_REGULAR_5_STEP = 1 + HALF_SQRT_3;

/**
 * Snub square tiling (3.3.4.3.4)
 *
 * Each 2x2 super-cell is sheared by half a unit along both axes, which
 * tilts alternate squares against their neighbours.
 */
export const SEMI_REGULAR_5: TilingDefinition = {
  kind: `semi-regular-5`,
  name: `SEMI-REGULAR-5`,
  family: `semi-regular`,
  vertexConfiguration: `3.3.4.3.4`,
  polygonSides: [3, 4],
  place: (x, y) =>
    vec2(
      half(x) * SEMI_REGULAR_5_STEP + (x % 2) - half(y) * 0.5,
      half(y) * SEMI_REGULAR_5_STEP + (y % 2) + half(x) * 0.5
    ),
  passes: [
    [
      {
        when: (x, y) => x % 2 === 0 && y % 2 === 0,
        stencils: [CELL_QUAD, [[0, 0], [0, 1], [-1, 1]]],
      },
      { when: (x, y) => x % 2 === 1 && y % 2 === 0, stencils: [LOWER_TRIANGLE] },
      {
        when: (x, y) => x % 2 === 0 && y % 2 === 1,
        stencils: [
          [[0, 0], [1, 0], [1, 1]],
          [[0, 0], [1, 1], [0, 1]],
        ],
      },
      { when: (x, y) => x % 2 === 1 && y % 2 === 1, stencils: [CELL_QUAD] },
    ],
  ],
};

/** Offsets of the four rows of a truncated hexagonal super-cell */
const SEMI_REGULAR_6_ROW_OFFSETS: readonly Readonly<Vec2>[] = [
  [0, 0],
  [0.5, HALF_SQRT_3],
  [0.5, 1 + HALF_SQRT_3],
  [0, 1 + SQRT_3],
];

/**
 * Truncated hexagonal tiling (3.12.12)
 */
export const SEMI_REGULAR_6: TilingDefinition = {
  kind: `semi-regular-6`,
  name: `SEMI-REGULAR-6`,
  family: `semi-regular`,
  vertexConfiguration: `3.12.12`,
  polygonSides: [3, 12],
  place: (x, y) =>
    add2(
      vec2(
        half(x) * (2 + SQRT_3) + (x % 2) + quarter(y) * (1 + HALF_SQRT_3),
        quarter(y) * (1.5 + SQRT_3)
      ),
      SEMI_REGULAR_6_ROW_OFFSETS[y % 4]
    ),
  passes: [
    [
      {
        when: (x, y) => x % 2 === 0 && y % 4 === 0,
        stencils: [
          [
            [1, 0], [2, -1], [3, -1], [2, 0], [2, 1], [2, 2],
            [2, 3], [1, 4], [0, 4], [1, 3], [0, 2], [0, 1],
          ],
          LOWER_TRIANGLE,
        ],
      },
      { when: (x, y) => x % 2 === 0 && y % 4 === 2, stencils: [[[0, 0], [1, 1], [0, 1]]] },
    ],
  ],
};

/**
 * Row offsets shared by the rhombitrihexagonal and truncated
 * trihexagonal lattices. Rows 0 and 3 sit on hexagon corners.
 */
const HEXAGONAL_ROW_OFFSETS: readonly Readonly<Vec2>[] = [
  [HALF_SQRT_3, -0.5],
  [0, 0],
  [0, 1],
  [HALF_SQRT_3, 1.5],
];

/**
 * Rhombitrihexagonal tiling (3.4.6.4)
 */
export const SEMI_REGULAR_7: TilingDefinition = {
  kind: `semi-regular-7`,
  name: `SEMI-REGULAR-7`,
  family: `semi-regular`,
  vertexConfiguration: `3.4.6.4`,
  polygonSides: [3, 4, 6],
  place: (x, y) =>
    add2(
      vec2(
        half(x) * (1 + SQRT_3) + (x % 2) * SQRT_3 + quarter(y) * (0.5 + HALF_SQRT_3),
        quarter(y) * (1.5 + HALF_SQRT_3)
      ),
      HEXAGONAL_ROW_OFFSETS[y % 4]
    ),
  passes: [
    [
      {
        when: (x, y) => x % 2 === 0 && y % 4 === 0,
        stencils: [
          [[0, 0], [1, 1], [1, 2], [0, 3], [0, 2], [0, 1]],
          [[0, 0], [2, -2], [2, -1], [1, 1]],
          [[1, 1], [2, -1], [2, 1]],
        ],
      },
      { when: (x, y) => x % 2 === 1 && y % 4 === 1, stencils: [CELL_QUAD] },
      { when: (x, y) => x % 2 === 1 && y % 4 === 2, stencils: [[[0, 0], [-1, 2], [-1, 3], [-1, 1]]] },
      { when: (x, y) => x % 2 === 0 && y % 4 === 2, stencils: [[[-1, 0], [0, 0], [-2, 2]]] },
    ],
  ],
};

/** Horizontal offsets of the four columns of a truncated trihexagonal super-cell */
const SEMI_REGULAR_8_COLUMN_OFFSETS: readonly number[] = [0, SQRT_3, 1 + SQRT_3, 1 + 2 * SQRT_3];

/**
 * Truncated trihexagonal tiling (4.6.12)
 *
 * The largest period of the family: 4x4 super-cells, each anchoring one
 * dodecagon.
 */
export const SEMI_REGULAR_8: TilingDefinition = {
  kind: `semi-regular-8`,
  name: `SEMI-REGULAR-8`,
  family: `semi-regular`,
  vertexConfiguration: `4.6.12`,
  polygonSides: [4, 6, 12],
  place: (x, y) =>
    add2(
      add2(
        vec2(
          quarter(x) * (3 + 3 * SQRT_3) + quarter(y) * (1.5 + 1.5 * SQRT_3),
          quarter(y) * (1.5 + HALF_SQRT_3)
        ),
        HEXAGONAL_ROW_OFFSETS[y % 4]
      ),
      vec2(SEMI_REGULAR_8_COLUMN_OFFSETS[x % 4], 0)
    ),
  passes: [
    [
      {
        when: (x, y) => x % 2 === 0 && y % 4 === 0,
        stencils: [[[0, 0], [1, 1], [1, 2], [0, 3], [0, 2], [0, 1]]],
      },
      { when: (x, y) => x % 4 === 1 && y % 4 === 1, stencils: [CELL_QUAD] },
      { when: (x, y) => x % 4 === 3 && y % 4 === 2, stencils: [[[0, 0], [-3, 2], [-3, 3], [-1, 1]]] },
      { when: (x, y) => x % 4 === 0 && y % 4 === 2, stencils: [[[0, 1], [-1, 3], [-2, 2], [0, 0]]] },
      {
        when: (x, y) => x % 4 === 3 && y % 4 === 1,
        stencils: [
          [
            [0, 0], [1, -2], [2, -3], [3, -3], [3, -2], [1, 0],
            [1, 1], [-1, 3], [-1, 4], [-2, 4], [-3, 3], [0, 1],
          ],
        ],
      },
    ],
  ],
};

export const SEMI_REGULAR_TILINGS: Readonly<Record<SemiRegularVariant, TilingDefinition>> = {
  1: SEMI_REGULAR_1,
  2: SEMI_REGULAR_2,
  3: SEMI_REGULAR_3,
  4: SEMI_REGULAR_4,
  5: SEMI_REGULAR_5,
  6: SEMI_REGULAR_6,
  7: SEMI_REGULAR_7,
  8: SEMI_REGULAR_8,
};
