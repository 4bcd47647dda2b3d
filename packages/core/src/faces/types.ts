/**
 * Face rule types
 *
 * A tiling's faces are encoded as a table of rules. Each rule classifies a
 * lattice cell by its coordinates modulo the tiling's period and, when it
 * matches, emits one or more polygons described by fixed cell offsets.
 */

/** Offset of one polygon corner from the visited cell */
export type CellOffset = readonly [dx: number, dy: number];

/** Corners of one polygon, counter-clockwise */
export type FaceStencil = readonly CellOffset[];

/**
 * Selects which cells a rule applies to
 */
export type CellDiscriminator = (x: number, y: number) => boolean;

export interface FaceRule {
  readonly when: CellDiscriminator;
  /** Emitted in order for every matching cell */
  readonly stencils: readonly FaceStencil[];
}

/**
 * Rules sharing one sweep over the lattice interior.
 * Within a cell, rules are tried in table order and every match emits.
 */
export type FacePass = readonly FaceRule[];

/**
 * Smallest and largest offsets reached by a pass. Each range includes 0.
 */
export interface OffsetEnvelope {
  minDx: number;
  maxDx: number;
  minDy: number;
  maxDy: number;
}
