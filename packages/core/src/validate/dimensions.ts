/**
 * Dimension Validators
 *
 * Zod schemas for lattice dimensions plus the vertex key overflow guard.
 */

import { z } from 'zod';
import { InvalidDimensionsError, TilingOverflowError } from '../errors.js';
import { MAX_VERTEX_KEY } from '../mesh/types.js';
import { issuesByField } from './issues.js';

export const dimensionsSchema = z.object({
  rows: z.number().int().nonnegative(),
  cols: z.number().int().nonnegative(),
});

export type Dimensions = z.infer<typeof dimensionsSchema>;

/**
 * Validate lattice dimensions
 *
 * @throws InvalidDimensionsError if rows or cols is not a non-negative integer
 * @throws TilingOverflowError if the lattice has more points than a vertex key can address
 */
export function parseDimensions(rows: number, cols: number): Dimensions {
  const result = dimensionsSchema.safeParse({ rows, cols });
  if (!result.success) {
    throw new InvalidDimensionsError(
      `Rows and columns must be non-negative integers, got ${rows}x${cols}`,
      issuesByField(result.error)
    );
  }

  if (result.data.rows * result.data.cols > MAX_VERTEX_KEY) {
    throw new TilingOverflowError(result.data.rows, result.data.cols, MAX_VERTEX_KEY);
  }

  return result.data;
}
