/**
 * Fit Module
 */

export type { WindowSize, Viewport, FitResult } from "./types";

export { fit, fitConfig, clipViewport, validateWindowSize } from "./fit";
