import { describe, it, expect } from 'vitest';
import * as THREE from 'three';
import { generateTiling, TILING_KINDS } from '@uniform-tilings/core';
import {
  createTilingObject,
  disposeTilingObject,
  tilingToBufferGeometry,
  tilingToEdgeGeometry,
} from '../src/TilingAdapter.js';

function triangleAreas(geometry: THREE.BufferGeometry): number[] {
  const position = geometry.getAttribute('position');
  const index = geometry.getIndex();
  if (!index) throw new Error('Expected indexed geometry');

  const areas: number[] = [];
  for (let i = 0; i < index.count; i += 3) {
    const [a, b, c] = [index.getX(i), index.getX(i + 1), index.getX(i + 2)];
    const abx = position.getX(b) - position.getX(a);
    const aby = position.getY(b) - position.getY(a);
    const acx = position.getX(c) - position.getX(a);
    const acy = position.getY(c) - position.getY(a);
    areas.push(Math.abs(abx * acy - aby * acx) / 2);
  }
  return areas;
}

describe('tilingToBufferGeometry', () => {
  it('places every lattice point in the z = 0 plane', () => {
    const geometry = tilingToBufferGeometry(generateTiling('square', 3, 3));
    const position = geometry.getAttribute('position');

    expect(position.count).toBe(9);
    expect(position.itemSize).toBe(3);
    expect([position.getX(5), position.getY(5), position.getZ(5)]).toEqual([2, 1, 0]);
  });

  it('splits each square into two triangles', () => {
    const geometry = tilingToBufferGeometry(generateTiling('square', 3, 3));
    const index = geometry.getIndex();

    expect(index?.count).toBe(24);
    expect(index?.array).toBeInstanceOf(Uint32Array);
    expect(triangleAreas(geometry).reduce((sum, area) => sum + area, 0)).toBeCloseTo(4, 6);
  });

  it('emits n - 2 triangles per n-gon', () => {
    const mesh = generateTiling('semi-regular-8', 10, 7);
    const geometry = tilingToBufferGeometry(mesh);

    // One dodecagon
    expect(geometry.getIndex()?.count).toBe(30);
  });

  it('only indexes vertices of the source face', () => {
    const mesh = generateTiling('hexagon', 3, 2);
    const geometry = tilingToBufferGeometry(mesh);
    const indices = Array.from(geometry.getIndex()?.array ?? []);

    expect(indices).toHaveLength(12);
    expect(new Set(indices)).toEqual(new Set([0, 1, 2, 3, 4, 5]));
  });

  it.each(TILING_KINDS)('covers the %s faces without gaps', (kind) => {
    const mesh = generateTiling(kind, 12, 12);
    const geometry = tilingToBufferGeometry(mesh);

    const expectedTriangles = mesh.faces.reduce((sum, face) => sum + face.length - 2, 0);
    expect(geometry.getIndex()?.count).toBe(expectedTriangles * 3);
    for (const area of triangleAreas(geometry)) {
      expect(area).toBeGreaterThan(1e-6);
    }
  });

  it('handles meshes without faces', () => {
    const geometry = tilingToBufferGeometry(generateTiling('triangle', 1, 5));
    expect(geometry.getAttribute('position').count).toBe(5);
    expect(geometry.getIndex()?.count).toBe(0);
  });
});

describe('tilingToEdgeGeometry', () => {
  it('emits one segment per face edge', () => {
    const geometry = tilingToEdgeGeometry(generateTiling('square', 3, 3));
    const position = geometry.getAttribute('position');

    // 4 quads * 4 edges * 2 endpoints
    expect(position.count).toBe(32);
    expect([position.getX(0), position.getY(0), position.getX(1), position.getY(1)]).toEqual([
      0, 0, 1, 0,
    ]);
    // closing edge of the first quad: (0, 1) -> (0, 0)
    expect([position.getX(6), position.getY(6), position.getX(7), position.getY(7)]).toEqual([
      0, 1, 0, 0,
    ]);
  });
});

describe('createTilingObject', () => {
  it('groups the filled faces with their outline', () => {
    const group = createTilingObject(generateTiling('semi-regular-4', 6, 6));

    expect(group.name).toBe('SEMI-REGULAR-4');
    expect(group.children).toHaveLength(2);
    expect(group.children[0]).toBeInstanceOf(THREE.Mesh);
    expect(group.children[0].name).toBe('SEMI-REGULAR-4-faces');
    expect(group.children[1]).toBeInstanceOf(THREE.LineSegments);
    expect(group.children[1].name).toBe('SEMI-REGULAR-4-edges');
  });

  it('uses the supplied material', () => {
    const material = new THREE.MeshBasicMaterial({ color: 0xff0000 });
    const group = createTilingObject(generateTiling('square', 2, 2), { material });
    const fill = group.children[0];

    expect(fill instanceof THREE.Mesh && fill.material).toBe(material);
  });

  it('disposes geometries and materials', () => {
    const material = new THREE.MeshBasicMaterial();
    const group = createTilingObject(generateTiling('square', 2, 2), { material });
    let disposed = 0;
    material.addEventListener('dispose', () => {
      disposed++;
    });

    disposeTilingObject(group);

    expect(disposed).toBe(1);
  });
});
