/**
 * @uniform-tilings/core - Regular and semi-regular tilings of the plane
 *
 * Generates finite patches of the eleven uniform tilings as flat point
 * arrays plus polygon faces:
 *
 * ## Primary API
 * - generateTiling(kind, rows, cols) and the per-tiling generate functions
 * - RegularTiling / SemiRegularTiling: class façade with static constructors
 * - exportTilingToObj / writeObj: Wavefront OBJ output
 *
 * ## Building blocks
 * - lattice: flat lattice layout (`x + y * cols`)
 * - faces: rule tables and interior sweep
 * - tilings: the eleven tiling definitions and their registry
 * - mesh: mesh record, statistics and vertex figure analysis
 */

// =============================================================================
// Primary API
// =============================================================================
export * from './api/index.js';

export {
  buildTiling,
  generateTiling,
  generateTriangleTiling,
  generateSquareTiling,
  generateHexagonTiling,
  generateSemiRegularTiling,
} from './tilings/generate.js';

export { TILING_KINDS, isTilingKind, getTilingDefinition } from './tilings/registry.js';

export {
  REGULAR_TILING_KINDS,
  SEMI_REGULAR_VARIANTS,
  type TilingKind,
  type RegularTilingKind,
  type SemiRegularTilingKind,
  type SemiRegularVariant,
  type TilingFamily,
  type TilingDefinition,
} from './tilings/types.js';

export { TRIANGLE_TILING, SQUARE_TILING, HEXAGON_TILING, placeTriangular } from './tilings/regular.js';
export {
  SEMI_REGULAR_1,
  SEMI_REGULAR_2,
  SEMI_REGULAR_3,
  SEMI_REGULAR_4,
  SEMI_REGULAR_5,
  SEMI_REGULAR_6,
  SEMI_REGULAR_7,
  SEMI_REGULAR_8,
  SEMI_REGULAR_TILINGS,
} from './tilings/semiRegular.js';

// =============================================================================
// Export
// =============================================================================
export {
  exportTilingToObj,
  writeObj,
  objExportOptionsSchema,
  DEFAULT_OBJ_EXPORT_OPTIONS,
  type ObjExportOptions,
} from './export/obj.js';

// =============================================================================
// Errors and validation
// =============================================================================
export * from './errors.js';
export { dimensionsSchema, parseDimensions, type Dimensions } from './validate/dimensions.js';
export { issuesByField } from './validate/issues.js';

// =============================================================================
// Mesh, lattice and face building blocks
// =============================================================================
export * from './mesh/types.js';
export { computeSignedArea, isCounterClockwise } from './mesh/polygon.js';
export {
  buildVertexFaces,
  vertexFigure,
  formatVertexConfiguration,
  countVertexConfigurations,
} from './mesh/vertexFigure.js';

export { buildLattice, latticeKey, type LatticePlacement } from './lattice/buildLattice.js';
export { assembleFaces, passEnvelope } from './faces/assemble.js';
export { LOWER_TRIANGLE, UPPER_TRIANGLE, CELL_QUAD } from './faces/stencils.js';
export type {
  CellOffset,
  FaceStencil,
  CellDiscriminator,
  FaceRule,
  FacePass,
  OffsetEnvelope,
} from './faces/types.js';

// Numeric helpers
export { vec2, add2, sub2, dot2, cross2, length2, dist2, type Vec2 } from './num/vec2.js';
export { SQRT_2, SQRT_3, HALF_SQRT_3 } from './num/constants.js';
