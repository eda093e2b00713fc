/**
 * Error types raised at the boundary of the fitting functions.
 */

export type TileFitErrorCode = "INVALID_GRID_CONFIG" | "INVALID_WINDOW_SIZE";

export class TileFitError extends Error {
  readonly code: TileFitErrorCode;

  constructor(code: TileFitErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Tile count or pixels per tile has a component outside the integers 1..2^32-1 */
export class InvalidGridConfigError extends TileFitError {
  constructor(message: string) {
    super("INVALID_GRID_CONFIG", message);
  }
}

/** Window size is zero, negative or not a number */
export class InvalidWindowSizeError extends TileFitError {
  readonly width: number;
  readonly height: number;

  constructor(width: number, height: number) {
    super(
      "INVALID_WINDOW_SIZE",
      `Invalid window size ${width}x${height}: both dimensions must be at least 1 pixel`
    );
    this.width = width;
    this.height = height;
  }
}
