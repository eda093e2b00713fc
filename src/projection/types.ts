/**
 * Projection Types
 */

import type { UVec2 } from "../config/types";

/** Orthographic frustum extents in world units */
export interface Frustum {
  left: number;
  right: number;
  bottom: number;
  top: number;
  near: number;
  far: number;
}

export interface ProjectionResult extends Frustum {
  /** Physical pixels covered by one world unit, per axis */
  pixelsPerUnit: UVec2;
  /** World units covered by one physical pixel, per axis */
  unitsPerPixel: UVec2;
}
