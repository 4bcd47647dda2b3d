import { describe, it, expect } from "vitest";
import { TILING_KINDS, isTilingKind, getTilingDefinition } from "../../src/tilings/registry.js";
import { UnknownTilingError } from "../../src/errors.js";

describe(`TILING_KINDS`, () => {
  it(`lists the regular tilings before the semi-regular ones`, () => {
    expect(TILING_KINDS).toEqual([
      `triangle`,
      `square`,
      `hexagon`,
      `semi-regular-1`,
      `semi-regular-2`,
      `semi-regular-3`,
      `semi-regular-4`,
      `semi-regular-5`,
      `semi-regular-6`,
      `semi-regular-7`,
      `semi-regular-8`,
    ]);
  });
});

describe(`isTilingKind`, () => {
  it(`accepts registered kinds`, () => {
    expect(isTilingKind(`hexagon`)).toBe(true);
    expect(isTilingKind(`semi-regular-6`)).toBe(true);
  });

  it(`rejects anything else`, () => {
    expect(isTilingKind(`pentagon`)).toBe(false);
    expect(isTilingKind(`semi-regular-9`)).toBe(false);
    expect(isTilingKind(`HEXAGON`)).toBe(false);
  });
});

describe(`getTilingDefinition`, () => {
  it(`returns the definition registered for a kind`, () => {
    const definition = getTilingDefinition(`semi-regular-2`);
    expect(definition.kind).toBe(`semi-regular-2`);
    expect(definition.name).toBe(`SEMI-REGULAR-2`);
    expect(definition.family).toBe(`semi-regular`);
    expect(definition.vertexConfiguration).toBe(`4.8.8`);
    expect(definition.passes).toHaveLength(2);
  });

  it(`registers every kind under its own name`, () => {
    for (const kind of TILING_KINDS) {
      expect(getTilingDefinition(kind).kind).toBe(kind);
    }
  });

  it(`throws UnknownTilingError for unregistered kinds`, () => {
    expect(() => getTilingDefinition(`pentagon`)).toThrow(UnknownTilingError);
    expect(() => getTilingDefinition(`pentagon`)).toThrow(`Unknown tiling kind: pentagon`);
  });
});
