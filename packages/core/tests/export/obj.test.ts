/**
 * OBJ Export Tests
 */

import { Writable } from "node:stream";
import { describe, test, expect } from "vitest";
import { exportTilingToObj, writeObj } from "../../src/export/obj.js";
import { createTilingMesh } from "../../src/mesh/types.js";
import { generateTiling } from "../../src/tilings/generate.js";
import { ObjWriteError } from "../../src/errors.js";

const TRIANGLE_OBJ = [
  `o TRIANGLE-tiling`,
  `v 0 0 0`,
  `v 1 0 0`,
  `v 0.5 0.8660254037844386 0`,
  `v 1.5 0.8660254037844386 0`,
  `f 1 2 3`,
  `f 2 4 3`,
  ``,
].join(`\n`);

function collectingStream(): { stream: Writable; chunks: string[] } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString(`utf8`));
      callback();
    },
  });
  return { stream, chunks };
}

describe(`exportTilingToObj`, () => {
  test(`writes the object name, vertices and 1-based faces`, () => {
    expect(exportTilingToObj(generateTiling(`triangle`, 2, 2))).toBe(TRIANGLE_OBJ);
  });

  test(`reverses face winding on request`, () => {
    const lines = exportTilingToObj(generateTiling(`triangle`, 2, 2), { reverseWinding: true })
      .trimEnd()
      .split(`\n`);

    expect(lines.slice(-2)).toEqual([`f 3 2 1`, `f 3 4 2`]);
    expect(lines.slice(0, 5)).toEqual(TRIANGLE_OBJ.split(`\n`).slice(0, 5));
  });

  test(`writes square cells as quads`, () => {
    const lines = exportTilingToObj(generateTiling(`square`, 2, 2)).trimEnd().split(`\n`);
    expect(lines).toEqual([`o SQUARE-tiling`, `v 0 0 0`, `v 1 0 0`, `v 0 1 0`, `v 1 1 0`, `f 1 2 4 3`]);
  });

  test(`writes one line per point and per face`, () => {
    const mesh = generateTiling(`semi-regular-8`, 10, 7);
    const lines = exportTilingToObj(mesh).trimEnd().split(`\n`);

    expect(lines.filter((line) => line.startsWith(`v `))).toHaveLength(70);
    expect(lines.filter((line) => line.startsWith(`f `))).toEqual([
      `f 39 26 20 21 28 40 47 59 66 65 57 46`,
    ]);
  });

  test(`writes only the header for an empty mesh`, () => {
    expect(exportTilingToObj(createTilingMesh(`EMPTY`, [], []))).toBe(`o EMPTY-tiling\n`);
  });
});

describe(`writeObj`, () => {
  test(`writes the OBJ text to the stream`, async () => {
    const { stream, chunks } = collectingStream();

    await writeObj(generateTiling(`triangle`, 2, 2), stream);

    expect(chunks.join(``)).toBe(TRIANGLE_OBJ);
    expect(stream.writableEnded).toBe(false);
  });

  test(`passes export options through`, async () => {
    const { stream, chunks } = collectingStream();

    await writeObj(generateTiling(`triangle`, 2, 2), stream, { reverseWinding: true });

    expect(chunks.join(``)).toContain(`f 3 2 1\nf 3 4 2\n`);
  });

  test(`rejects with ObjWriteError when the stream fails`, async () => {
    const failure = new Error(`disk full`);
    const stream = new Writable({
      write(_chunk, _encoding, callback) {
        callback(failure);
      },
    });

    const result = writeObj(generateTiling(`square`, 2, 2), stream);

    await expect(result).rejects.toBeInstanceOf(ObjWriteError);
    await expect(result).rejects.toMatchObject({
      code: `io`,
      message: `Failed to write SQUARE tiling`,
      cause: failure,
    });
  });
});
