/**
 * Integer-scale viewport fitting
 *
 * Finds the largest whole-number scale at which the target resolution fits
 * the window on both axes, and places the scaled target in the window.
 * Scaling only ever magnifies: a window smaller than the target renders at
 * scale 1 and the viewport overflows.
 */

import { InvalidWindowSizeError } from "../errors";
import type { GridConfig, UVec2 } from "../config/types";
import type { FitResult, Viewport, WindowSize } from "./types";

/**
 * Validate a window size and drop fractional pixels.
 *
 * @throws InvalidWindowSizeError if either dimension is not finite or is
 *   below one whole pixel
 */
export function validateWindowSize(window: WindowSize): WindowSize {
  const width = Math.trunc(window.width);
  const height = Math.trunc(window.height);
  if (!Number.isFinite(width) || !Number.isFinite(height) || width < 1 || height < 1) {
    throw new InvalidWindowSizeError(window.width, window.height);
  }
  return { width, height };
}

/**
 * Fit the target resolution `tileCount * pixelsPerTile` into `window`.
 *
 * `tileCount` and `pixelsPerTile` are expected to come from a validated
 * `GridConfig`; the window is validated on every call.
 *
 * @throws InvalidWindowSizeError
 */
export function fit(
  window: WindowSize,
  tileCount: UVec2,
  pixelsPerTile: UVec2,
  centered: boolean = true
): FitResult {
  const { width, height } = validateWindowSize(window);

  const target: UVec2 = {
    x: tileCount.x * pixelsPerTile.x,
    y: tileCount.y * pixelsPerTile.y,
  };

  const sx = Math.floor(width / target.x);
  const sy = Math.floor(height / target.y);
  const clamped = sx < 1 || sy < 1;
  const scale = Math.max(1, Math.min(sx, sy));

  const viewportWidth = target.x * scale;
  const viewportHeight = target.y * scale;

  // Floor keeps the origin on whole pixels, also when it goes negative
  const viewport: Viewport = centered
    ? {
        x: Math.floor((width - viewportWidth) / 2),
        y: Math.floor((height - viewportHeight) / 2),
        width: viewportWidth,
        height: viewportHeight,
      }
    : { x: 0, y: 0, width: viewportWidth, height: viewportHeight };

  if (
    !clamped &&
    (viewport.x < 0 ||
      viewport.y < 0 ||
      viewport.x + viewport.width > width ||
      viewport.y + viewport.height > height)
  ) {
    throw new Error(
      `Viewport ${viewport.width}x${viewport.height} at (${viewport.x}, ${viewport.y}) escapes window ${width}x${height} at scale ${scale}`
    );
  }

  return {
    tileCount: { x: tileCount.x, y: tileCount.y },
    pixelsPerTile: { x: pixelsPerTile.x, y: pixelsPerTile.y },
    target,
    scale,
    viewport,
    clamped,
  };
}

/** `fit` with the grid and anchoring taken from a config */
export function fitConfig(window: WindowSize, config: GridConfig): FitResult {
  return fit(window, config.tileCount, config.pixelsPerTile, config.centered);
}

/**
 * Visible part of a fitted viewport: the viewport intersected with the
 * window. Equal to `fit.viewport` unless the fit was clamped.
 *
 * @throws InvalidWindowSizeError
 */
export function clipViewport(fit: FitResult, window: WindowSize): Viewport {
  const { width, height } = validateWindowSize(window);
  const { viewport } = fit;

  const x0 = Math.max(0, viewport.x);
  const y0 = Math.max(0, viewport.y);
  const x1 = Math.min(width, viewport.x + viewport.width);
  const y1 = Math.min(height, viewport.y + viewport.height);

  return { x: x0, y: y0, width: Math.max(0, x1 - x0), height: Math.max(0, y1 - y0) };
}
