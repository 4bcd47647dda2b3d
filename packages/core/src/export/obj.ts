/**
 * OBJ Export
 *
 * Writes tiling meshes as Wavefront OBJ text. Points are placed in the
 * z = 0 plane and face indices are 1-based.
 */

import type { Writable } from 'node:stream';
import { z } from 'zod';
import type { Face, TilingMesh } from '../mesh/types.js';
import { ObjWriteError } from '../errors.js';

/**
 * Default OBJ export options
 */
export const DEFAULT_OBJ_EXPORT_OPTIONS = {
  reverseWinding: false,
} as const;

export const objExportOptionsSchema = z.object({
  /** List each face's vertices in reverse, flipping the face normals */
  reverseWinding: z.boolean().default(DEFAULT_OBJ_EXPORT_OPTIONS.reverseWinding),
});

/**
 * Options for OBJ export
 */
export type ObjExportOptions = z.input<typeof objExportOptionsSchema>;

function faceLine(face: Face, reverseWinding: boolean): string {
  const keys = reverseWinding ? [...face].reverse() : face;
  return `f ${keys.map((key) => key + 1).join(` `)}\n`;
}

/**
 * Export a tiling mesh to OBJ text
 *
 * @example
 * ```ts
 * exportTilingToObj(generateTiling(`square`, 2, 2));
 * // o SQUARE-tiling
 * // v 0 0 0
 * // ...
 * // f 1 2 4 3
 * ```
 */
export function exportTilingToObj(mesh: TilingMesh, options: ObjExportOptions = {}): string {
  const { reverseWinding } = objExportOptionsSchema.parse(options);

  let output = `o ${mesh.name}-tiling\n`;

  for (const [x, y] of mesh.points) {
    output += `v ${x} ${y} 0\n`;
  }

  for (const face of mesh.faces) {
    output += faceLine(face, reverseWinding);
  }

  return output;
}

/**
 * Write a tiling mesh as OBJ text to a stream
 *
 * The stream is left open; the caller owns it.
 *
 * @throws ObjWriteError if the stream reports a write failure
 */
export function writeObj(
  mesh: TilingMesh,
  stream: Writable,
  options: ObjExportOptions = {}
): Promise<void> {
  const text = exportTilingToObj(mesh, options);
  const message = `Failed to write ${mesh.name} tiling`;

  return new Promise<void>((resolve, reject) => {
    // A failed write also emits `error`; keep a listener so it is not rethrown
    const onError = (err: Error) => reject(new ObjWriteError(message, err));
    stream.once(`error`, onError);

    stream.write(text, (err) => {
      if (err) {
        reject(new ObjWriteError(message, err));
        return;
      }
      stream.off(`error`, onError);
      resolve();
    });
  });
}
