/**
 * Semi-regular tilings: several regular polygons, every vertex alike
 */

import { generateSemiRegularTiling } from '../tilings/generate.js';
import type { SemiRegularVariant } from '../tilings/types.js';
import { Tiling } from './Tiling.js';

export class SemiRegularTiling extends Tiling {
  /**
   * Create any of the eight semi-regular tilings by number
   */
  static create(variant: SemiRegularVariant, rows: number, cols: number): SemiRegularTiling {
    return new SemiRegularTiling(generateSemiRegularTiling(variant, rows, cols));
  }

  /** Snub hexagonal tiling (3.3.3.3.6) */
  static one(rows: number, cols: number): SemiRegularTiling {
    return SemiRegularTiling.create(1, rows, cols);
  }

  /** Truncated square tiling (4.8.8) */
  static two(rows: number, cols: number): SemiRegularTiling {
    return SemiRegularTiling.create(2, rows, cols);
  }

  /** Elongated triangular tiling (3.3.3.4.4) */
  static three(rows: number, cols: number): SemiRegularTiling {
    return SemiRegularTiling.create(3, rows, cols);
  }

  /** Trihexagonal tiling (3.6.3.6) */
  static four(rows: number, cols: number): SemiRegularTiling {
    return SemiRegularTiling.create(4, rows, cols);
  }

  /** Snub square tiling (3.3.4.3.4) */
  static five(rows: number, cols: number): SemiRegularTiling {
    return SemiRegularTiling.create(5, rows, cols);
  }

  /** Truncated hexagonal tiling (3.12.12) */
  static six(rows: number, cols: number): SemiRegularTiling {
    return SemiRegularTiling.create(6, rows, cols);
  }

  /** Rhombitrihexagonal tiling (3.4.6.4) */
  static seven(rows: number, cols: number): SemiRegularTiling {
    return SemiRegularTiling.create(7, rows, cols);
  }

  /** Truncated trihexagonal tiling (4.6.12) */
  static eight(rows: number, cols: number): SemiRegularTiling {
    return SemiRegularTiling.create(8, rows, cols);
  }
}
