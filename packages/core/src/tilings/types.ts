/**
 * Tiling definition types
 */

import type { LatticePlacement } from '../lattice/buildLattice.js';
import type { FacePass } from '../faces/types.js';

export const REGULAR_TILING_KINDS = [`triangle`, `square`, `hexagon`] as const;

export const SEMI_REGULAR_VARIANTS = [1, 2, 3, 4, 5, 6, 7, 8] as const;

export type RegularTilingKind = (typeof REGULAR_TILING_KINDS)[number];

export type SemiRegularVariant = (typeof SEMI_REGULAR_VARIANTS)[number];

export type SemiRegularTilingKind = `semi-regular-${SemiRegularVariant}`;

export type TilingKind = RegularTilingKind | SemiRegularTilingKind;

export type TilingFamily = `regular` | `semi-regular`;

/**
 * Everything needed to generate one tiling
 */
export interface TilingDefinition {
  kind: TilingKind;
  /** Name carried by generated meshes */
  name: string;
  family: TilingFamily;
  /**
   * Polygons around every vertex, in cyclic order
   * (e.g. `3.12.12` for the truncated hexagonal tiling)
   */
  vertexConfiguration: string;
  /** Side counts of the polygons this tiling uses */
  polygonSides: readonly number[];
  place: LatticePlacement;
  passes: readonly FacePass[];
}
