/**
 * Stencils shared by several tilings
 */

import type { FaceStencil } from './types.js';

/** Lower-left triangle of a lattice rhombus */
export const LOWER_TRIANGLE: FaceStencil = [[0, 0], [1, 0], [0, 1]];

/** Upper-right triangle of a lattice rhombus */
export const UPPER_TRIANGLE: FaceStencil = [[1, 0], [1, 1], [0, 1]];

/** The quadrilateral spanned by a cell and its right, upper and diagonal neighbours */
export const CELL_QUAD: FaceStencil = [[0, 0], [1, 0], [1, 1], [0, 1]];
