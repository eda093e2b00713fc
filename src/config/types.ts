/**
 * Grid Configuration Types
 */

/** Pair of non-negative integers (columns/rows, width/height in pixels) */
export interface UVec2 {
  x: number;
  y: number;
}

/**
 * World-space convention for the projection.
 *
 * - `units`: one world unit is one tile
 * - `pixels`: one world unit is one target pixel (one physical pixel at scale 1)
 */
export type WorldSpace = "units" | "pixels";

/** Depth bounds passed straight through to the projection */
export interface DepthRange {
  near: number;
  far: number;
}

/** Validated, immutable grid configuration */
export interface GridConfig {
  readonly tileCount: Readonly<UVec2>;
  readonly pixelsPerTile: Readonly<UVec2>;
  readonly worldSpace: WorldSpace;
  readonly depthRange: Readonly<DepthRange>;
  /** Center the viewport in the window, otherwise anchor it at the top-left corner */
  readonly centered: boolean;
}

/** Anything accepted where a pair is expected: a square size or an explicit pair */
export type SizeLike = number | UVec2 | readonly [number, number];

export interface GridConfigOptions {
  /** Number of tiles to display (default 1x1) */
  tileCount?: SizeLike;
  /** Pixels per tile at scale 1 (default 8x8) */
  pixelsPerTile?: SizeLike;
  /** World-space convention (default "units") */
  worldSpace?: WorldSpace;
  /** Near/far planes (default 0 / 1000) */
  depthRange?: Partial<DepthRange>;
  /** Center the viewport in the window (default true) */
  centered?: boolean;
}
