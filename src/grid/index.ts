/**
 * Grid Module
 */

export type { WorldPoint, CellCoord } from "./types";

export {
  cellSize,
  gridOrigin,
  worldToCell,
  cellToWorld,
  cellCenter,
  isCellInGrid,
  snapToPixel,
} from "./cellCoord";
