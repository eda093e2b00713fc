/**
 * tilefit - Integer-scale viewport fitting and orthographic projection for pixel art
 */

export const VERSION = "0.1.0";

export { TiledCamera, type TiledCameraOptions, type ScreenPoint } from "./TiledCamera";
export { TileFitError, InvalidGridConfigError, InvalidWindowSizeError, type TileFitErrorCode } from "./errors";
export * from "./config";
export * from "./fit";
export * from "./projection";
export * from "./grid";
export * as mat4 from "./math/mat4";
