/**
 * Object-oriented API
 *
 * - RegularTiling - triangle, square and hexagon tilings
 * - SemiRegularTiling - the eight Archimedean tilings
 */

export * from './Tiling.js';
export * from './RegularTiling.js';
export * from './SemiRegularTiling.js';
