/**
 * @uniform-tilings/viewer - three.js rendering of tiling meshes
 */

export {
  tilingToBufferGeometry,
  tilingToEdgeGeometry,
  createTilingObject,
  disposeTilingObject,
  type TilingObjectOptions,
} from './TilingAdapter.js';

export {
  parseViewerConfig,
  formatViewerConfig,
  viewerQuerySchema,
  InvalidViewerConfigError,
  DEFAULT_VIEWER_CONFIG,
  MAX_VIEWER_DIMENSION,
  type ViewerConfig,
} from './config.js';

export { createObjDownload, type ObjDownload } from './download.js';
