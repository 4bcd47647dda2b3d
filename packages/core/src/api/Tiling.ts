/**
 * Tiling wrapper class
 *
 * Provides read-only accessors over a generated tiling mesh.
 */

import type { FaceIndex, Points, TilingMesh } from '../mesh/types.js';
import type { ObjExportOptions } from '../export/obj.js';
import { exportTilingToObj } from '../export/obj.js';

export abstract class Tiling {
  protected constructor(private readonly mesh: TilingMesh) {}

  /**
   * Tiling identifier, e.g. `HEXAGON`
   */
  name(): string {
    return this.mesh.name;
  }

  /**
   * Lattice points; the point for cell (x, y) is at `x + y * cols`
   */
  points(): Points {
    return this.mesh.points;
  }

  /**
   * Faces as counter-clockwise lists of point indices
   */
  faces(): FaceIndex {
    return this.mesh.faces;
  }

  /**
   * The underlying mesh record
   */
  toMesh(): TilingMesh {
    return this.mesh;
  }

  /**
   * Export to Wavefront OBJ text
   */
  toObj(options?: ObjExportOptions): string {
    return exportTilingToObj(this.mesh, options);
  }
}
