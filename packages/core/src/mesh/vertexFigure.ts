/**
 * Vertex figure analysis
 *
 * In a uniform tiling every vertex is surrounded by the same cyclic sequence
 * of polygons. These helpers recover that sequence from a generated mesh so
 * patches can be checked against the tiling's vertex configuration.
 */

import { cross2, dot2, sub2 } from '../num/vec2.js';
import type { Face, TilingMesh, VertexKey } from './types.js';

/** Tolerance on the total corner angle of a fully surrounded vertex */
const FULL_TURN_TOLERANCE = 1e-6;

/**
 * Map each vertex key to the faces that use it
 */
export function buildVertexFaces(mesh: TilingMesh): Map<VertexKey, Face[]> {
  const incidence = new Map<VertexKey, Face[]>();
  for (const face of mesh.faces) {
    for (const key of face) {
      const faces = incidence.get(key);
      if (faces) {
        faces.push(face);
      } else {
        incidence.set(key, [face]);
      }
    }
  }
  return incidence;
}

/**
 * Side counts of the polygons around a vertex, in counter-clockwise order.
 * Faces are ordered by the angle of the edge each one leaves the vertex along,
 * starting just counter-clockwise of -x.
 *
 * Returns null when the faces around the vertex do not close a full turn,
 * which is the case on the boundary of a patch.
 */
export function vertexFigure(
  mesh: TilingMesh,
  key: VertexKey,
  incident: readonly Face[] = mesh.faces.filter((face) => face.includes(key))
): number[] | null {
  const origin = mesh.points[key];
  const corners: { direction: number; sides: number }[] = [];
  let turn = 0;

  for (const face of incident) {
    const n = face.length;
    const i = face.indexOf(key);
    const next = sub2(mesh.points[face[(i + 1) % n]], origin);
    const prev = sub2(mesh.points[face[(i + n - 1) % n]], origin);

    turn += Math.atan2(cross2(next, prev), dot2(next, prev));
    corners.push({ direction: Math.atan2(next[1], next[0]), sides: n });
  }

  if (Math.abs(turn - 2 * Math.PI) > FULL_TURN_TOLERANCE) {
    return null;
  }

  corners.sort((a, b) => a.direction - b.direction);
  return corners.map((corner) => corner.sides);
}

function compareSequences(a: readonly number[], b: readonly number[]): number {
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return a[i] - b[i];
  }
  return 0;
}

/**
 * Format a vertex figure as a vertex configuration such as `3.4.6.4`.
 * The figure is rotated and mirrored to its smallest form, so every
 * vertex of a uniform tiling gives the same string.
 */
export function formatVertexConfiguration(figure: readonly number[]): string {
  let best = [...figure];
  for (const sequence of [[...figure], [...figure].reverse()]) {
    for (let shift = 0; shift < sequence.length; shift++) {
      const rotated = [...sequence.slice(shift), ...sequence.slice(0, shift)];
      if (compareSequences(rotated, best) < 0) {
        best = rotated;
      }
    }
  }
  return best.join(`.`);
}

/**
 * Count the vertex configurations of every fully surrounded vertex
 */
export function countVertexConfigurations(mesh: TilingMesh): Map<string, number> {
  const counts = new Map<string, number>();
  for (const [key, faces] of buildVertexFaces(mesh)) {
    const figure = vertexFigure(mesh, key, faces);
    if (figure === null) continue;

    const configuration = formatVertexConfiguration(figure);
    counts.set(configuration, (counts.get(configuration) ?? 0) + 1);
  }
  return counts;
}
