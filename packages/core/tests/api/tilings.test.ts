import { describe, it, expect } from "vitest";
import { RegularTiling } from "../../src/api/RegularTiling.js";
import { SemiRegularTiling } from "../../src/api/SemiRegularTiling.js";
import { generateTiling } from "../../src/tilings/generate.js";
import { TilingOverflowError } from "../../src/errors.js";

describe(`RegularTiling`, () => {
  it(`builds a square patch`, () => {
    const tiling = RegularTiling.square(3, 3);

    expect(tiling.name()).toBe(`SQUARE`);
    expect(tiling.points()).toHaveLength(9);
    expect(tiling.faces()).toEqual([
      [0, 1, 4, 3],
      [1, 2, 5, 4],
      [3, 4, 7, 6],
      [4, 5, 8, 7],
    ]);
  });

  it(`builds triangle and hexagon patches`, () => {
    expect(RegularTiling.triangle(2, 2).faces()).toEqual([
      [0, 1, 2],
      [1, 3, 2],
    ]);
    expect(RegularTiling.hexagon(3, 2).faces()).toEqual([[0, 1, 3, 5, 4, 2]]);
  });

  it(`exposes the generated mesh`, () => {
    expect(RegularTiling.hexagon(6, 6).toMesh()).toEqual(generateTiling(`hexagon`, 6, 6));
  });

  it(`exports to OBJ`, () => {
    const obj = RegularTiling.triangle(2, 2).toObj({ reverseWinding: true });
    expect(obj.startsWith(`o TRIANGLE-tiling\n`)).toBe(true);
    expect(obj.endsWith(`f 3 2 1\nf 3 4 2\n`)).toBe(true);
  });

  it(`propagates generation errors`, () => {
    expect(() => RegularTiling.square(70000, 70000)).toThrow(TilingOverflowError);
  });
});

describe(`SemiRegularTiling`, () => {
  it(`builds each variant by number`, () => {
    expect(SemiRegularTiling.create(4, 3, 3).faces()).toEqual([[1, 2, 5, 7, 6, 3]]);
    expect(SemiRegularTiling.create(6, 7, 4).faces()).toEqual([[8, 13, 12]]);
  });

  it(`has a named constructor for every variant`, () => {
    const constructors = [
      SemiRegularTiling.one,
      SemiRegularTiling.two,
      SemiRegularTiling.three,
      SemiRegularTiling.four,
      SemiRegularTiling.five,
      SemiRegularTiling.six,
      SemiRegularTiling.seven,
      SemiRegularTiling.eight,
    ];

    constructors.forEach((build, i) => {
      expect(build(12, 12).name()).toBe(`SEMI-REGULAR-${i + 1}`);
    });
  });

  it(`builds the truncated trihexagonal tiling`, () => {
    const tiling = SemiRegularTiling.eight(10, 7);
    expect(tiling.faces()).toEqual([[38, 25, 19, 20, 27, 39, 46, 58, 65, 64, 56, 45]]);
    expect(tiling.toObj().split(`\n`)[0]).toBe(`o SEMI-REGULAR-8-tiling`);
  });
});
