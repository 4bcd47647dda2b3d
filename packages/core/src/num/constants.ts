/**
 * Irrational edge ratios shared by the lattice transforms
 */

export const SQRT_2 = Math.SQRT2;

export const SQRT_3 = Math.sqrt(3);

/** Height of a unit equilateral triangle */
export const HALF_SQRT_3 = SQRT_3 * 0.5;
