/**
 * Grid Types
 */

/** Position in world space */
export interface WorldPoint {
  x: number;
  y: number;
}

/**
 * Cell of the displayed grid. (0, 0) is the bottom-left tile inside the
 * frustum; column grows right and row grows up.
 */
export interface CellCoord {
  column: number;
  row: number;
}
