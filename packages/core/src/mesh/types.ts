/**
 * Tiling mesh types
 * 
 * A tiling mesh is a flat array of lattice points plus a list of polygonal
 * faces that reference those points by index. Faces wind counter-clockwise.
 */

import type { Vec2 } from '../num/vec2.js';
import { dist2 } from '../num/vec2.js';

/**
 * Index into a mesh's points. The point for lattice cell (x, y) is always
 * stored at `x + y * cols`.
 */
export type VertexKey = number;

/** Largest key an unsigned 32-bit index buffer can hold */
export const MAX_VERTEX_KEY = 0xffff_ffff;

export type Point = Readonly<Vec2>;

export type Points = readonly Point[];

/** One polygon, listed counter-clockwise */
export type Face = readonly VertexKey[];

export type FaceIndex = readonly Face[];

/**
 * Generated tiling patch
 */
export interface TilingMesh {
  /** Tiling identifier, e.g. `SQUARE` or `SEMI-REGULAR-3` */
  readonly name: string;
  readonly points: Points;
  readonly faces: FaceIndex;
}

/**
 * Package points and faces into a frozen mesh record
 */
export function createTilingMesh(name: string, points: Vec2[], faces: VertexKey[][]): TilingMesh {
  for (const point of points) {
    Object.freeze(point);
  }
  for (const face of faces) {
    Object.freeze(face);
  }

  return Object.freeze({
    name,
    points: Object.freeze(points),
    faces: Object.freeze(faces),
  });
}

/**
 * Get the points of a face in winding order
 */
export function facePolygon(mesh: TilingMesh, face: Face): Point[] {
  return face.map((key) => mesh.points[key]);
}

/**
 * Get the length of every edge of a face, starting with the edge
 * from its first to its second vertex
 */
export function faceEdgeLengths(mesh: TilingMesh, face: Face): number[] {
  const polygon = facePolygon(mesh, face);
  return polygon.map((point, i) => dist2(point, polygon[(i + 1) % polygon.length]));
}

/**
 * Count faces by their number of sides
 */
export function countFacesBySides(mesh: TilingMesh): Map<number, number> {
  const counts = new Map<number, number>();
  for (const face of mesh.faces) {
    counts.set(face.length, (counts.get(face.length) ?? 0) + 1);
  }
  return counts;
}
