/**
 * Pixel-perfect camera for a fixed tile grid
 *
 * Owns a grid config, a world position and the last valid fit/projection.
 * The host calls `resize()` whenever it observes a new window size and
 * applies `viewport` and `getMatrix()` to its render pipeline.
 */

import { InvalidWindowSizeError } from "./errors";
import { fitConfig, clipViewport, validateWindowSize } from "./fit/fit";
import { projectConfig, projectionMatrix, type ProjectionMatrixOptions } from "./projection/project";
import { multiply, translate, transformPoint, type Mat4 } from "./math/mat4";
import type { GridConfig } from "./config/types";
import type { FitResult, Viewport, WindowSize } from "./fit/types";
import type { ProjectionResult } from "./projection/types";
import type { WorldPoint } from "./grid/types";

/** Position in window pixels, origin top-left, y down */
export interface ScreenPoint {
  x: number;
  y: number;
}

export interface TiledCameraOptions {
  config: GridConfig;
  /** Initial camera position in world space (default origin) */
  position?: WorldPoint;
}

// Getters hand out the cached objects themselves
function freezeFit(fit: FitResult): FitResult {
  Object.freeze(fit.tileCount);
  Object.freeze(fit.pixelsPerTile);
  Object.freeze(fit.target);
  Object.freeze(fit.viewport);
  return Object.freeze(fit);
}

function freezeProjection(projection: ProjectionResult): ProjectionResult {
  Object.freeze(projection.pixelsPerUnit);
  Object.freeze(projection.unitsPerPixel);
  return Object.freeze(projection);
}

export class TiledCamera {
  private config: GridConfig;
  private position: WorldPoint;

  private window: WindowSize | null = null;
  private lastFit: FitResult | null = null;
  private lastProjection: ProjectionResult | null = null;

  constructor(options: TiledCameraOptions) {
    this.config = options.config;
    this.position = { x: options.position?.x ?? 0, y: options.position?.y ?? 0 };
  }

  /** Last valid fit (frozen), null until the first successful resize */
  get fit(): FitResult | null {
    return this.lastFit;
  }

  get projection(): ProjectionResult | null {
    return this.lastProjection;
  }

  get viewport(): Viewport | null {
    return this.lastFit?.viewport ?? null;
  }

  /** Current integer scale, 0 before the first successful resize */
  get scale(): number {
    return this.lastFit?.scale ?? 0;
  }

  getConfig(): GridConfig {
    return this.config;
  }

  /** Replace the config and re-fit against the last known window */
  setConfig(config: GridConfig): void {
    this.config = config;
    if (this.window) {
      this.refit(this.window);
    }
  }

  getPosition(): WorldPoint {
    return { x: this.position.x, y: this.position.y };
  }

  setPosition(x: number, y: number): void {
    this.position = { x, y };
  }

  /**
   * Re-fit for a new window size.
   * Returns true if the cached fit changed. An invalid size is logged and
   * skipped, keeping the previous result.
   */
  resize(width: number, height: number): boolean {
    let size: WindowSize;
    try {
      size = validateWindowSize({ width, height });
    } catch (error) {
      if (error instanceof InvalidWindowSizeError) {
        console.warn(`[TiledCamera] Skipping resize: ${error.message}`);
        return false;
      }
      throw error;
    }

    if (this.window && this.window.width === size.width && this.window.height === size.height) {
      return false;
    }

    this.refit(size);
    return true;
  }

  private refit(size: WindowSize): void {
    const fit = fitConfig(size, this.config);
    if (fit.clamped && !this.lastFit?.clamped) {
      console.warn(
        `[TiledCamera] Window ${size.width}x${size.height} is smaller than target ${fit.target.x}x${fit.target.y}; viewport will be clipped`
      );
    }
    this.window = size;
    this.lastFit = freezeFit(fit);
    this.lastProjection = freezeProjection(projectConfig(fit, this.config));
  }

  private requireSized(): { window: WindowSize; fit: FitResult; projection: ProjectionResult } {
    if (!this.window || !this.lastFit || !this.lastProjection) {
      throw new Error("Camera has no window size - call resize() first");
    }
    return { window: this.window, fit: this.lastFit, projection: this.lastProjection };
  }

  /** Part of the viewport inside the window */
  getVisibleViewport(): Viewport {
    const { window, fit } = this.requireSized();
    return clipViewport(fit, window);
  }

  /** View-projection matrix: ortho * translate(-position) */
  getMatrix(options: ProjectionMatrixOptions = {}): Mat4 {
    const { projection } = this.requireSized();
    const view = translate(-this.position.x, -this.position.y);
    return multiply(projectionMatrix(projection, options), view);
  }

  /**
   * World position under a window pixel, or null if the pixel is outside
   * the visible viewport or the camera has not been sized yet.
   */
  screenToWorld(screenX: number, screenY: number): WorldPoint | null {
    if (!this.window || !this.lastFit || !this.lastProjection) return null;

    const visible = clipViewport(this.lastFit, this.window);
    if (
      screenX < visible.x ||
      screenY < visible.y ||
      screenX >= visible.x + visible.width ||
      screenY >= visible.y + visible.height
    ) {
      return null;
    }

    const { viewport } = this.lastFit;
    const { left, top, pixelsPerUnit } = this.lastProjection;

    return {
      x: this.position.x + left + (screenX - viewport.x) / pixelsPerUnit.x,
      y: this.position.y + top - (screenY - viewport.y) / pixelsPerUnit.y,
    };
  }

  /**
   * Window pixel a world position lands on. Positions outside the frustum
   * map outside the viewport. Null before the first successful resize.
   */
  worldToScreen(worldX: number, worldY: number): ScreenPoint | null {
    if (!this.lastFit || !this.lastProjection) return null;

    const [ndcX, ndcY] = transformPoint(this.getMatrix(), [worldX, worldY, 0]);
    const { viewport } = this.lastFit;

    return {
      x: viewport.x + ((ndcX + 1) / 2) * viewport.width,
      y: viewport.y + ((1 - ndcY) / 2) * viewport.height,
    };
  }
}
