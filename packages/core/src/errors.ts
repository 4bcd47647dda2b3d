/**
 * Tiling Error Types
 *
 * Typed errors raised by tiling generation and export.
 * Callers can branch on `code` without `instanceof` checks across packages.
 */

/**
 * Discriminator for every error this library raises
 */
export type TilingErrorCode =
  | `invalid-dimensions`
  | `overflow`
  | `unknown-tiling`
  | `io`
  | `invalid-viewer-config`;

/**
 * Base class for tiling errors
 */
export abstract class TilingError extends Error {
  abstract readonly code: TilingErrorCode;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

/**
 * Rows or columns are not non-negative integers
 */
export class InvalidDimensionsError extends TilingError {
  readonly code = `invalid-dimensions`;
  readonly errors: Record<string, string[]>;

  constructor(message = `Invalid tiling dimensions`, errors: Record<string, string[]> = {}) {
    super(message);
    this.errors = errors;
  }
}

/**
 * The requested lattice has more vertices than a vertex key can address
 */
export class TilingOverflowError extends TilingError {
  readonly code = `overflow`;

  constructor(
    readonly rows: number,
    readonly cols: number,
    readonly maxVertexKey: number
  ) {
    super(`A ${rows}x${cols} lattice exceeds the vertex key limit of ${maxVertexKey}`);
  }
}

/**
 * No tiling is registered under the requested kind
 */
export class UnknownTilingError extends TilingError {
  readonly code = `unknown-tiling`;

  constructor(readonly kind: string) {
    super(`Unknown tiling kind: ${kind}`);
  }
}

/**
 * Writing exported mesh data to a stream failed
 */
export class ObjWriteError extends TilingError {
  readonly code = `io`;

  constructor(message = `Failed to write OBJ data`, cause?: unknown) {
    super(message, { cause });
  }
}
