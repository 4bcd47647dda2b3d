/**
 * Viewer configuration
 *
 * The viewer is configured from the page's query string:
 * `?tiling=semi-regular-7&rows=30&cols=40&reverse=true`.
 */

import { z } from 'zod';
import { TILING_KINDS, TilingError, issuesByField, type TilingKind } from '@uniform-tilings/core';

/** Largest lattice side the viewer will render */
export const MAX_VIEWER_DIMENSION = 512;

export interface ViewerConfig {
  tiling: TilingKind;
  rows: number;
  cols: number;
  reverseWinding: boolean;
}

export const DEFAULT_VIEWER_CONFIG = {
  tiling: `semi-regular-1`,
  rows: 24,
  cols: 24,
  reverseWinding: false,
} as const satisfies ViewerConfig;

const dimension = z.coerce.number().int().nonnegative().max(MAX_VIEWER_DIMENSION);

export const viewerQuerySchema = z.object({
  tiling: z.enum(TILING_KINDS).default(DEFAULT_VIEWER_CONFIG.tiling),
  rows: dimension.default(DEFAULT_VIEWER_CONFIG.rows),
  cols: dimension.default(DEFAULT_VIEWER_CONFIG.cols),
  reverse: z.stringbool().default(DEFAULT_VIEWER_CONFIG.reverseWinding),
});

/**
 * Query parameters failed validation
 */
export class InvalidViewerConfigError extends TilingError {
  readonly code = `invalid-viewer-config`;
  readonly errors: Record<string, string[]>;

  constructor(message = `Invalid viewer configuration`, errors: Record<string, string[]> = {}) {
    super(message);
    this.errors = errors;
  }
}

/**
 * Read the viewer configuration from a query string
 *
 * Missing parameters take their defaults; unknown parameters are ignored.
 *
 * @throws InvalidViewerConfigError
 */
export function parseViewerConfig(search: string | URLSearchParams): ViewerConfig {
  const params = typeof search === `string` ? new URLSearchParams(search) : search;
  const result = viewerQuerySchema.safeParse(Object.fromEntries(params));
  if (!result.success) {
    throw new InvalidViewerConfigError(
      `Invalid viewer configuration: ${params.toString()}`,
      issuesByField(result.error)
    );
  }

  const { tiling, rows, cols, reverse } = result.data;
  return { tiling, rows, cols, reverseWinding: reverse };
}

/**
 * Build the query string for a configuration, omitting defaults
 */
export function formatViewerConfig(config: ViewerConfig): string {
  const params = new URLSearchParams();
  if (config.tiling !== DEFAULT_VIEWER_CONFIG.tiling) params.set(`tiling`, config.tiling);
  if (config.rows !== DEFAULT_VIEWER_CONFIG.rows) params.set(`rows`, String(config.rows));
  if (config.cols !== DEFAULT_VIEWER_CONFIG.cols) params.set(`cols`, String(config.cols));
  if (config.reverseWinding) params.set(`reverse`, `true`);
  const query = params.toString();
  return query ? `?${query}` : ``;
}
