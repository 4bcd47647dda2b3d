/**
 * Tiling generation
 *
 * Generation is a pure function of (tiling, rows, cols): the lattice and the
 * faces are built independently from the same flat indexing, then frozen
 * into a mesh record.
 */

import type { TilingMesh } from '../mesh/types.js';
import { createTilingMesh } from '../mesh/types.js';
import { buildLattice } from '../lattice/buildLattice.js';
import { assembleFaces } from '../faces/assemble.js';
import { parseDimensions } from '../validate/dimensions.js';
import { getTilingDefinition } from './registry.js';
import type { SemiRegularVariant, TilingDefinition, TilingKind } from './types.js';

/**
 * Generate a rows x cols patch of a tiling definition
 */
export function buildTiling(definition: TilingDefinition, rows: number, cols: number): TilingMesh {
  const dimensions = parseDimensions(rows, cols);
  const points = buildLattice(dimensions.rows, dimensions.cols, definition.place);
  const faces = assembleFaces(dimensions.rows, dimensions.cols, definition.passes);
  return createTilingMesh(definition.name, points, faces);
}

/**
 * Generate a rows x cols patch of a registered tiling
 *
 * @example
 * ```ts
 * const mesh = generateTiling(`square`, 3, 3);
 * mesh.faces[0]; // [0, 1, 4, 3]
 * ```
 */
export function generateTiling(kind: TilingKind, rows: number, cols: number): TilingMesh {
  return buildTiling(getTilingDefinition(kind), rows, cols);
}

export function generateTriangleTiling(rows: number, cols: number): TilingMesh {
  return generateTiling(`triangle`, rows, cols);
}

export function generateSquareTiling(rows: number, cols: number): TilingMesh {
  return generateTiling(`square`, rows, cols);
}

export function generateHexagonTiling(rows: number, cols: number): TilingMesh {
  return generateTiling(`hexagon`, rows, cols);
}

/**
 * Generate one of the eight semi-regular tilings, numbered 1 to 8
 */
export function generateSemiRegularTiling(
  variant: SemiRegularVariant,
  rows: number,
  cols: number
): TilingMesh {
  return generateTiling(`semi-regular-${variant}`, rows, cols);
}
