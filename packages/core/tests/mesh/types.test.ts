import { describe, it, expect } from "vitest";
import {
  createTilingMesh,
  facePolygon,
  faceEdgeLengths,
  countFacesBySides,
  MAX_VERTEX_KEY,
} from "../../src/mesh/types.js";
import { vec2 } from "../../src/num/vec2.js";

function createUnitSquareMesh() {
  return createTilingMesh(
    `TEST`,
    [vec2(0, 0), vec2(1, 0), vec2(0, 1), vec2(1, 1), vec2(2, 0)],
    [
      [0, 1, 3, 2],
      [1, 4, 3],
    ]
  );
}

describe(`createTilingMesh`, () => {
  it(`keeps name, points and faces`, () => {
    const mesh = createUnitSquareMesh();
    expect(mesh.name).toBe(`TEST`);
    expect(mesh.points).toHaveLength(5);
    expect(mesh.faces).toEqual([
      [0, 1, 3, 2],
      [1, 4, 3],
    ]);
  });

  it(`freezes the record, its arrays, points and faces`, () => {
    const mesh = createUnitSquareMesh();
    expect(Object.isFrozen(mesh)).toBe(true);
    expect(Object.isFrozen(mesh.points)).toBe(true);
    expect(Object.isFrozen(mesh.points[0])).toBe(true);
    expect(Object.isFrozen(mesh.faces)).toBe(true);
    expect(Object.isFrozen(mesh.faces[1])).toBe(true);
  });
});

describe(`facePolygon`, () => {
  it(`returns face points in winding order`, () => {
    const mesh = createUnitSquareMesh();
    expect(facePolygon(mesh, mesh.faces[0])).toEqual([[0, 0], [1, 0], [1, 1], [0, 1]]);
  });
});

describe(`faceEdgeLengths`, () => {
  it(`measures each edge starting from the first vertex`, () => {
    const mesh = createUnitSquareMesh();
    const lengths = faceEdgeLengths(mesh, mesh.faces[1]);
    expect(lengths).toHaveLength(3);
    expect(lengths[0]).toBe(1);
    expect(lengths[1]).toBeCloseTo(Math.SQRT2, 12);
    expect(lengths[2]).toBe(1);
  });
});

describe(`countFacesBySides`, () => {
  it(`groups faces by vertex count`, () => {
    const counts = countFacesBySides(createUnitSquareMesh());
    expect([...counts.entries()]).toEqual([
      [4, 1],
      [3, 1],
    ]);
  });
});

describe(`MAX_VERTEX_KEY`, () => {
  it(`is the largest unsigned 32-bit integer`, () => {
    expect(MAX_VERTEX_KEY).toBe(4294967295);
    expect(new Uint32Array([MAX_VERTEX_KEY])[0]).toBe(MAX_VERTEX_KEY);
  });
});
