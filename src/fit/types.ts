/**
 * Fit Types
 */

import type { UVec2 } from "../config/types";

/** Window size in physical pixels */
export interface WindowSize {
  width: number;
  height: number;
}

/** Rectangle in physical window pixels, origin at the top-left corner */
export interface Viewport {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface FitResult {
  /** Tile count the fit was computed for */
  tileCount: UVec2;
  /** Pixels per tile the fit was computed for */
  pixelsPerTile: UVec2;
  /** Target resolution at scale 1 (tileCount * pixelsPerTile) */
  target: UVec2;
  /** Physical pixels per target pixel, always an integer >= 1 */
  scale: number;
  /** Where the scaled target lands in the window */
  viewport: Viewport;
  /**
   * True when the window is smaller than the target on at least one axis.
   * The scale is then held at 1 and the viewport overflows the window on
   * that axis, so the caller has to clip.
   */
  clamped: boolean;
}
