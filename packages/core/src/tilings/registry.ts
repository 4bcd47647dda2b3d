/**
 * Registry of every tiling this library can generate
 */

import { UnknownTilingError } from '../errors.js';
import { HEXAGON_TILING, SQUARE_TILING, TRIANGLE_TILING } from './regular.js';
import { SEMI_REGULAR_TILINGS } from './semiRegular.js';
import type { TilingDefinition, TilingKind } from './types.js';

/** All tiling kinds: the three regular tilings, then the eight semi-regular ones */
export const TILING_KINDS = [
  `triangle`,
  `square`,
  `hexagon`,
  `semi-regular-1`,
  `semi-regular-2`,
  `semi-regular-3`,
  `semi-regular-4`,
  `semi-regular-5`,
  `semi-regular-6`,
  `semi-regular-7`,
  `semi-regular-8`,
] as const satisfies readonly TilingKind[];

const TILING_DEFINITIONS: Readonly<Record<TilingKind, TilingDefinition>> = {
  triangle: TRIANGLE_TILING,
  square: SQUARE_TILING,
  hexagon: HEXAGON_TILING,
  'semi-regular-1': SEMI_REGULAR_TILINGS[1],
  'semi-regular-2': SEMI_REGULAR_TILINGS[2],
  'semi-regular-3': SEMI_REGULAR_TILINGS[3],
  'semi-regular-4': SEMI_REGULAR_TILINGS[4],
  'semi-regular-5': SEMI_REGULAR_TILINGS[5],
  'semi-regular-6': SEMI_REGULAR_TILINGS[6],
  'semi-regular-7': SEMI_REGULAR_TILINGS[7],
  'semi-regular-8': SEMI_REGULAR_TILINGS[8],
};

/**
 * Check whether a string names a registered tiling
 */
export function isTilingKind(value: string): value is TilingKind {
  return TILING_KINDS.some((kind) => kind === value);
}

/**
 * Look up a tiling definition
 *
 * @throws UnknownTilingError if no tiling is registered under `kind`
 */
export function getTilingDefinition(kind: string): TilingDefinition {
  if (!isTilingKind(kind)) {
    throw new UnknownTilingError(kind);
  }
  return TILING_DEFINITIONS[kind];
}
