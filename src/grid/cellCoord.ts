/**
 * Cell Coordinate Utilities
 *
 * Conversions between world positions and cells of the displayed grid,
 * with the camera at the world origin. The grid's bottom-left corner sits
 * on the frustum's bottom-left edge, so cell edges line up with the
 * projection in both world spaces.
 */

import { splitSpan } from "../projection/project";
import type { GridConfig, UVec2 } from "../config/types";
import type { CellCoord, WorldPoint } from "./types";

/** Size of one tile in world units */
export function cellSize(config: GridConfig): UVec2 {
  switch (config.worldSpace) {
    case "units":
      return { x: 1, y: 1 };
    case "pixels":
      return { x: config.pixelsPerTile.x, y: config.pixelsPerTile.y };
  }
}

/** World position of the grid's bottom-left corner */
export function gridOrigin(config: GridConfig): WorldPoint {
  const size = cellSize(config);
  const [left] = splitSpan(config.tileCount.x * size.x);
  const [bottom] = splitSpan(config.tileCount.y * size.y);
  return { x: left, y: bottom };
}

/** Cell containing a world position. May lie outside the grid. */
export function worldToCell(point: WorldPoint, config: GridConfig): CellCoord {
  const size = cellSize(config);
  const origin = gridOrigin(config);
  return {
    column: Math.floor((point.x - origin.x) / size.x),
    row: Math.floor((point.y - origin.y) / size.y),
  };
}

/** World position of a cell's bottom-left corner */
export function cellToWorld(cell: CellCoord, config: GridConfig): WorldPoint {
  const size = cellSize(config);
  const origin = gridOrigin(config);
  return {
    x: origin.x + cell.column * size.x,
    y: origin.y + cell.row * size.y,
  };
}

/** World position of a cell's center */
export function cellCenter(cell: CellCoord, config: GridConfig): WorldPoint {
  const size = cellSize(config);
  const corner = cellToWorld(cell, config);
  return { x: corner.x + size.x / 2, y: corner.y + size.y / 2 };
}

export function isCellInGrid(cell: CellCoord, config: GridConfig): boolean {
  return (
    cell.column >= 0 &&
    cell.row >= 0 &&
    cell.column < config.tileCount.x &&
    cell.row < config.tileCount.y
  );
}

/**
 * Round a world coordinate to the nearest physical pixel boundary.
 * Sprites placed on snapped positions keep their edges on the pixel grid.
 */
export function snapToPixel(value: number, pixelsPerUnit: number): number {
  return Math.round(value * pixelsPerUnit) / pixelsPerUnit;
}
