/**
 * Config Module
 */

export type {
  UVec2,
  WorldSpace,
  DepthRange,
  GridConfig,
  GridConfigOptions,
  SizeLike,
} from "./types";

export {
  DEFAULT_GRID_CONFIG,
  MAX_GRID_DIMENSION,
  createGridConfig,
  targetResolution,
  toUVec2,
  GridConfigBuilder,
  unitGrid,
  pixelGrid,
} from "./gridConfig";
