/**
 * Projection Module
 *
 * Frustum extents and projection matrices for a fitted viewport.
 */

export type { Frustum, ProjectionResult } from "./types";

export {
  project,
  projectConfig,
  projectionMatrix,
  splitSpan,
} from "./project";
export type { ProjectionMatrixOptions } from "./project";
