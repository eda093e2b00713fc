/**
 * Orthographic projection for a fitted viewport
 *
 * Turns a `FitResult` into frustum extents under one of two world-space
 * conventions. In `units` space the frustum always spans the tile count;
 * in `pixels` space it spans the target resolution. Neither depends on
 * the window size beyond what the fit already decided.
 */

import { ortho, type Mat4 } from "../math/mat4";
import type { DepthRange, GridConfig, UVec2, WorldSpace } from "../config/types";
import type { FitResult } from "../fit/types";
import type { ProjectionResult } from "./types";

/**
 * Split a whole-unit span around the origin.
 *
 * The negative side gets `floor(span / 2)` units and the positive side the
 * rest, so both edges land on integer coordinates. An odd span puts the
 * extra unit on the positive side: 25 becomes [-12, 13].
 */
export function splitSpan(span: number): [number, number] {
  const low = 0 - Math.floor(span / 2);
  return [low, low + span];
}

function spanAndScale(
  fit: FitResult,
  worldSpace: WorldSpace
): { span: UVec2; pixelsPerUnit: UVec2 } {
  switch (worldSpace) {
    case "units":
      return {
        span: { x: fit.tileCount.x, y: fit.tileCount.y },
        pixelsPerUnit: {
          x: fit.pixelsPerTile.x * fit.scale,
          y: fit.pixelsPerTile.y * fit.scale,
        },
      };
    case "pixels":
      return {
        span: { x: fit.viewport.width / fit.scale, y: fit.viewport.height / fit.scale },
        pixelsPerUnit: { x: fit.scale, y: fit.scale },
      };
  }
}

/**
 * Frustum extents for a fit. Total over both world spaces; near and far
 * pass through unchanged.
 */
export function project(
  fit: FitResult,
  worldSpace: WorldSpace,
  depthRange: DepthRange
): ProjectionResult {
  const { span, pixelsPerUnit } = spanAndScale(fit, worldSpace);
  const [left, right] = splitSpan(span.x);
  const [bottom, top] = splitSpan(span.y);

  return {
    left,
    right,
    bottom,
    top,
    near: depthRange.near,
    far: depthRange.far,
    pixelsPerUnit,
    unitsPerPixel: { x: 1 / pixelsPerUnit.x, y: 1 / pixelsPerUnit.y },
  };
}

/** `project` with the world space and depth range taken from a config */
export function projectConfig(fit: FitResult, config: GridConfig): ProjectionResult {
  return project(fit, config.worldSpace, config.depthRange);
}

export interface ProjectionMatrixOptions {
  /** Swap near and far so depth runs from 1 at the near plane to 0 at the far plane */
  reverseDepth?: boolean;
}

/**
 * Column-major orthographic matrix for the projection's frustum.
 *
 * @throws Error if near equals far; the frustum's x and y spans are
 *   always at least one unit
 */
export function projectionMatrix(
  projection: ProjectionResult,
  options: ProjectionMatrixOptions = {}
): Mat4 {
  return ortho(projection, options.reverseDepth ?? false);
}
