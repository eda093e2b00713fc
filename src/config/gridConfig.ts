/**
 * Grid Configuration
 *
 * Validated construction of the configuration the fitting and projection
 * functions read. Validation happens once here, so `fit` and `project` only
 * ever see positive integer grid dimensions.
 */

import { InvalidGridConfigError } from "../errors";
import type {
  DepthRange,
  GridConfig,
  GridConfigOptions,
  SizeLike,
  UVec2,
  WorldSpace,
} from "./types";

export const DEFAULT_GRID_CONFIG: GridConfig = Object.freeze({
  tileCount: Object.freeze({ x: 1, y: 1 }),
  pixelsPerTile: Object.freeze({ x: 8, y: 8 }),
  worldSpace: "units",
  depthRange: Object.freeze({ near: 0, far: 1000 }),
  centered: true,
});

/** Normalize a square size, tuple or `{x, y}` into a fresh `UVec2` */
export function toUVec2(value: SizeLike): UVec2 {
  if (typeof value === "number") {
    return { x: value, y: value };
  }
  if ("x" in value) {
    return { x: value.x, y: value.y };
  }
  return { x: value[0], y: value[1] };
}

/** Largest accepted tile count or pixels per tile component (u32 max) */
export const MAX_GRID_DIMENSION = 0xffffffff;

function isGridDimension(n: number): boolean {
  return Number.isInteger(n) && n >= 1 && n <= MAX_GRID_DIMENSION;
}

function validatePair(name: string, value: UVec2): void {
  if (!isGridDimension(value.x) || !isGridDimension(value.y)) {
    throw new InvalidGridConfigError(
      `${name} must be a pair of integers in [1, ${MAX_GRID_DIMENSION}], got (${value.x}, ${value.y})`
    );
  }
}

/**
 * Build a validated, frozen grid configuration.
 * Missing options fall back to `DEFAULT_GRID_CONFIG`.
 *
 * @throws InvalidGridConfigError if `tileCount` or `pixelsPerTile` has a
 *   component that is not an integer in [1, MAX_GRID_DIMENSION]
 */
export function createGridConfig(options: GridConfigOptions = {}): GridConfig {
  const tileCount = toUVec2(options.tileCount ?? DEFAULT_GRID_CONFIG.tileCount);
  const pixelsPerTile = toUVec2(options.pixelsPerTile ?? DEFAULT_GRID_CONFIG.pixelsPerTile);

  validatePair("tileCount", tileCount);
  validatePair("pixelsPerTile", pixelsPerTile);

  const depthRange: DepthRange = {
    near: options.depthRange?.near ?? DEFAULT_GRID_CONFIG.depthRange.near,
    far: options.depthRange?.far ?? DEFAULT_GRID_CONFIG.depthRange.far,
  };

  return Object.freeze({
    tileCount: Object.freeze(tileCount),
    pixelsPerTile: Object.freeze(pixelsPerTile),
    worldSpace: options.worldSpace ?? DEFAULT_GRID_CONFIG.worldSpace,
    depthRange: Object.freeze(depthRange),
    centered: options.centered ?? DEFAULT_GRID_CONFIG.centered,
  });
}

/** Target resolution in pixels at scale 1 */
export function targetResolution(config: Pick<GridConfig, "tileCount" | "pixelsPerTile">): UVec2 {
  return {
    x: config.tileCount.x * config.pixelsPerTile.x,
    y: config.tileCount.y * config.pixelsPerTile.y,
  };
}

/**
 * Fluent alternative to `createGridConfig`.
 *
 * @example
 * const config = new GridConfigBuilder()
 *   .withPixelsPerTile(8)
 *   .withTileCount([80, 25])
 *   .withCentered(false)
 *   .build();
 */
export class GridConfigBuilder {
  private options: GridConfigOptions;

  constructor(base: GridConfigOptions = {}) {
    this.options = { ...base };
  }

  withTileCount(tileCount: SizeLike): this {
    this.options.tileCount = tileCount;
    return this;
  }

  withPixelsPerTile(pixelsPerTile: SizeLike): this {
    this.options.pixelsPerTile = pixelsPerTile;
    return this;
  }

  /**
   * Pick the tile count closest to a resolution: as many whole tiles of
   * `pixelsPerTile` as fit in `resolution` on each axis.
   */
  withTargetResolution(pixelsPerTile: SizeLike, resolution: SizeLike): this {
    const ppt = toUVec2(pixelsPerTile);
    const res = toUVec2(resolution);
    this.options.pixelsPerTile = ppt;
    this.options.tileCount = {
      x: Math.floor(res.x / ppt.x),
      y: Math.floor(res.y / ppt.y),
    };
    return this;
  }

  withWorldSpace(worldSpace: WorldSpace): this {
    this.options.worldSpace = worldSpace;
    return this;
  }

  withCentered(centered: boolean): this {
    this.options.centered = centered;
    return this;
  }

  withDepthRange(near: number, far: number): this {
    this.options.depthRange = { near, far };
    return this;
  }

  /** @throws InvalidGridConfigError */
  build(): GridConfig {
    return createGridConfig(this.options);
  }
}

/** Grid measured in tiles: one world unit per tile */
export function unitGrid(tileCount: SizeLike, pixelsPerTile: SizeLike = 8): GridConfig {
  return createGridConfig({ tileCount, pixelsPerTile, worldSpace: "units" });
}

/** Grid measured in pixels: one world unit per target pixel */
export function pixelGrid(resolution: SizeLike): GridConfig {
  return createGridConfig({ tileCount: resolution, pixelsPerTile: 1, worldSpace: "pixels" });
}
