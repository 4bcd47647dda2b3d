/**
 * Regular tilings: a single regular polygon with unit edges
 */

import { generateTiling } from '../tilings/generate.js';
import { Tiling } from './Tiling.js';

export class RegularTiling extends Tiling {
  /**
   * Equilateral triangles, six around every vertex
   */
  static triangle(rows: number, cols: number): RegularTiling {
    return new RegularTiling(generateTiling(`triangle`, rows, cols));
  }

  /**
   * Unit squares, four around every vertex
   */
  static square(rows: number, cols: number): RegularTiling {
    return new RegularTiling(generateTiling(`square`, rows, cols));
  }

  /**
   * Regular hexagons, three around every vertex
   */
  static hexagon(rows: number, cols: number): RegularTiling {
    return new RegularTiling(generateTiling(`hexagon`, rows, cols));
  }
}
