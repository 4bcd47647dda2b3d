/**
 * TilingAdapter - Converts a tiling mesh to three.js geometry
 *
 * Tiling faces are arbitrary convex polygons; three.js renders triangles, so
 * each face is triangulated here. Lattice points become vertices in the
 * z = 0 plane and keep their keys as vertex indices.
 */

import * as THREE from 'three';
import type { TilingMesh } from '@uniform-tilings/core';

export interface TilingObjectOptions {
  /** Fill material (defaults to a double-sided MeshStandardMaterial) */
  material?: THREE.Material;
  /** Outline colour */
  edgeColor?: THREE.ColorRepresentation;
}

/**
 * Convert a tiling mesh to an indexed triangle BufferGeometry
 */
export function tilingToBufferGeometry(mesh: TilingMesh): THREE.BufferGeometry {
  const geometry = new THREE.BufferGeometry();

  const positions = new Float32Array(mesh.points.length * 3);
  const normals = new Float32Array(mesh.points.length * 3);
  mesh.points.forEach(([x, y], i) => {
    positions[i * 3] = x;
    positions[i * 3 + 1] = y;
    normals[i * 3 + 2] = 1;
  });

  const indices: number[] = [];
  for (const face of mesh.faces) {
    const contour = face.map((key) => {
      const [x, y] = mesh.points[key];
      return new THREE.Vector2(x, y);
    });
    for (const triangle of THREE.ShapeUtils.triangulateShape(contour, [])) {
      for (const corner of triangle) {
        indices.push(face[corner]);
      }
    }
  }

  geometry.setAttribute('position', new THREE.BufferAttribute(positions, 3));
  geometry.setAttribute('normal', new THREE.BufferAttribute(normals, 3));
  geometry.setIndex(new THREE.BufferAttribute(new Uint32Array(indices), 1));

  // Bounds for frustum culling and camera framing
  geometry.computeBoundingBox();
  geometry.computeBoundingSphere();

  return geometry;
}

/**
 * Convert a tiling mesh to line segments, one pair of points per face edge
 *
 * Edges shared by two faces appear twice.
 */
export function tilingToEdgeGeometry(mesh: TilingMesh): THREE.BufferGeometry {
  const edgeCount = mesh.faces.reduce((sum, face) => sum + face.length, 0);
  const positions = new Float32Array(edgeCount * 6);

  let offset = 0;
  for (const face of mesh.faces) {
    face.forEach((key, i) => {
      const [ax, ay] = mesh.points[key];
      const [bx, by] = mesh.points[face[(i + 1) % face.length]];
      positions.set([ax, ay, 0, bx, by, 0], offset);
      offset += 6;
    });
  }

  const geometry = new THREE.BufferGeometry();
  geometry.setAttribute('position', new THREE.BufferAttribute(positions, 3));
  return geometry;
}

/**
 * Create a group holding the filled tiling and its outline
 */
export function createTilingObject(
  mesh: TilingMesh,
  options: TilingObjectOptions = {}
): THREE.Group {
  const material =
    options.material ??
    new THREE.MeshStandardMaterial({
      color: 0x4a90e2,
      metalness: 0.1,
      roughness: 0.6,
      side: THREE.DoubleSide,
      polygonOffset: true,
      polygonOffsetFactor: 1,
      polygonOffsetUnits: 1,
    });

  const fill = new THREE.Mesh(tilingToBufferGeometry(mesh), material);
  fill.name = `${mesh.name}-faces`;

  const outline = new THREE.LineSegments(
    tilingToEdgeGeometry(mesh),
    new THREE.LineBasicMaterial({ color: options.edgeColor ?? 0xe0e6f0 })
  );
  outline.name = `${mesh.name}-edges`;

  const group = new THREE.Group();
  group.name = mesh.name;
  group.add(fill, outline);
  return group;
}

/**
 * Dispose the geometries and materials of a tiling group
 */
export function disposeTilingObject(group: THREE.Group): void {
  group.traverse((object) => {
    if (object instanceof THREE.Mesh || object instanceof THREE.LineSegments) {
      object.geometry.dispose();
      const materials: THREE.Material[] = Array.isArray(object.material)
        ? object.material
        : [object.material];
      materials.forEach((material) => material.dispose());
    }
  });
}
