/**
 * Face assembly
 *
 * Sweeps the interior of the lattice and applies each pass's rule table.
 * The interior is the set of cells whose every stencil corner lands inside
 * [0, cols) x [0, rows), so boundary cells are left unfaced rather than
 * clamped.
 */

import type { VertexKey } from '../mesh/types.js';
import { latticeKey } from '../lattice/buildLattice.js';
import type { FacePass, FaceStencil, OffsetEnvelope } from './types.js';

/**
 * Compute the offset envelope of a pass
 */
export function passEnvelope(pass: FacePass): OffsetEnvelope {
  const envelope: OffsetEnvelope = { minDx: 0, maxDx: 0, minDy: 0, maxDy: 0 };

  for (const rule of pass) {
    for (const stencil of rule.stencils) {
      for (const [dx, dy] of stencil) {
        envelope.minDx = Math.min(envelope.minDx, dx);
        envelope.maxDx = Math.max(envelope.maxDx, dx);
        envelope.minDy = Math.min(envelope.minDy, dy);
        envelope.maxDy = Math.max(envelope.maxDy, dy);
      }
    }
  }

  return envelope;
}

function stencilFace(stencil: FaceStencil, x: number, y: number, cols: number): VertexKey[] {
  return stencil.map(([dx, dy]) => latticeKey(x + dx, y + dy, cols));
}

/**
 * Assemble the faces of a rows x cols lattice from a tiling's passes
 */
export function assembleFaces(rows: number, cols: number, passes: readonly FacePass[]): VertexKey[][] {
  const faces: VertexKey[][] = [];

  for (const pass of passes) {
    const { minDx, maxDx, minDy, maxDy } = passEnvelope(pass);

    for (let y = -minDy; y < rows - maxDy; y++) {
      for (let x = -minDx; x < cols - maxDx; x++) {
        for (const rule of pass) {
          if (!rule.when(x, y)) continue;
          for (const stencil of rule.stencils) {
            faces.push(stencilFace(stencil, x, y, cols));
          }
        }
      }
    }
  }

  return faces;
}
