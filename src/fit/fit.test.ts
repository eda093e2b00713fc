import { describe, it, expect } from "vitest";
import { fit, fitConfig, clipViewport, validateWindowSize } from "./fit";
import { createGridConfig } from "../config/gridConfig";
import { InvalidWindowSizeError } from "../errors";

const TILES = { x: 80, y: 25 };
const PPT = { x: 8, y: 8 };

describe("fit", () => {
  describe("80x25 grid of 8px tiles (640x200 target)", () => {
    it("fills a 1920x600 window exactly at scale 3", () => {
      const result = fit({ width: 1920, height: 600 }, TILES, PPT);

      expect(result.target).toEqual({ x: 640, y: 200 });
      expect(result.scale).toBe(3);
      expect(result.viewport).toEqual({ x: 0, y: 0, width: 1920, height: 600 });
      expect(result.clamped).toBe(false);
    });

    it("uses the smaller axis scale and centers in a 1000x500 window", () => {
      const result = fit({ width: 1000, height: 500 }, TILES, PPT);

      // sx = 1, sy = 2
      expect(result.scale).toBe(1);
      expect(result.viewport).toEqual({ x: 180, y: 150, width: 640, height: 200 });
      expect(result.clamped).toBe(false);
    });

    it("clamps scale to 1 when the window is smaller than the target", () => {
      const result = fit({ width: 300, height: 150 }, TILES, PPT);

      expect(result.scale).toBe(1);
      expect(result.clamped).toBe(true);
      expect(result.viewport).toEqual({ x: -170, y: -25, width: 640, height: 200 });
      expect(result.viewport.x + result.viewport.width).toBeGreaterThan(300);
      expect(result.viewport.y + result.viewport.height).toBeGreaterThan(150);
    });

    it("overflows only the axis that is too small", () => {
      const result = fit({ width: 600, height: 1000 }, TILES, PPT);

      expect(result.scale).toBe(1);
      expect(result.clamped).toBe(true);
      expect(result.viewport).toEqual({ x: -20, y: 400, width: 640, height: 200 });
      expect(result.viewport.y + result.viewport.height).toBeLessThanOrEqual(1000);
    });
  });

  describe("centering", () => {
    it("floors odd leftover space", () => {
      const result = fit({ width: 1001, height: 501 }, TILES, PPT);
      expect(result.viewport.x).toBe(180);
      expect(result.viewport.y).toBe(150);
    });

    it("floors toward negative infinity when the viewport overflows", () => {
      const result = fit({ width: 299, height: 150 }, TILES, PPT);
      expect(result.viewport.x).toBe(-171);
    });

    it("anchors at the origin when not centered", () => {
      const result = fit({ width: 1000, height: 500 }, TILES, PPT, false);
      expect(result.viewport).toEqual({ x: 0, y: 0, width: 640, height: 200 });
    });
  });

  it("handles non-square tiles", () => {
    const result = fit({ width: 500, height: 300 }, { x: 10, y: 10 }, { x: 16, y: 8 });

    expect(result.target).toEqual({ x: 160, y: 80 });
    expect(result.scale).toBe(3);
    expect(result.viewport).toEqual({ x: 10, y: 30, width: 480, height: 240 });
  });

  it("drops fractional window pixels", () => {
    const result = fit({ width: 1920.7, height: 600.2 }, TILES, PPT);
    expect(result.scale).toBe(3);
    expect(result.viewport).toEqual({ x: 0, y: 0, width: 1920, height: 600 });
  });

  it("matches the integer scale formula and stays inside large windows", () => {
    for (let width = 640; width <= 2600; width += 97) {
      for (let height = 200; height <= 1100; height += 53) {
        const result = fit({ width, height }, TILES, PPT);
        const expected = Math.max(1, Math.min(Math.floor(width / 640), Math.floor(height / 200)));
        const { viewport } = result;

        expect(result.scale).toBe(expected);
        expect(Number.isInteger(result.scale)).toBe(true);
        expect(result.clamped).toBe(false);
        expect(viewport.x).toBe(Math.floor((width - viewport.width) / 2));
        expect(viewport.y).toBe(Math.floor((height - viewport.height) / 2));
        expect(viewport.x + viewport.width).toBeLessThanOrEqual(width);
        expect(viewport.y + viewport.height).toBeLessThanOrEqual(height);
      }
    }
  });

  it("returns identical results for identical inputs", () => {
    const a = fit({ width: 1366, height: 768 }, TILES, PPT);
    const b = fit({ width: 1366, height: 768 }, TILES, PPT);
    expect(a).toEqual(b);
    expect(a).not.toBe(b);
  });

  describe("invalid window sizes", () => {
    const cases: [number, number][] = [
      [0, 600],
      [800, 0],
      [-1, 600],
      [800, -50],
      [0.5, 600],
      [Number.NaN, 600],
      [Number.POSITIVE_INFINITY, 600],
    ];

    for (const [width, height] of cases) {
      it(`rejects ${width}x${height}`, () => {
        expect(() => fit({ width, height }, TILES, PPT)).toThrow(InvalidWindowSizeError);
      });
    }

    it("reports the offending size", () => {
      let caught: unknown;
      try {
        fit({ width: 0, height: 600 }, TILES, PPT);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(InvalidWindowSizeError);
      if (!(caught instanceof InvalidWindowSizeError)) return;
      expect(caught.code).toBe("INVALID_WINDOW_SIZE");
      expect(caught.name).toBe("InvalidWindowSizeError");
      expect(caught.width).toBe(0);
      expect(caught.height).toBe(600);
      expect(caught.message).toBe(
        "Invalid window size 0x600: both dimensions must be at least 1 pixel"
      );
    });
  });
});

describe("validateWindowSize", () => {
  it("truncates to whole pixels", () => {
    expect(validateWindowSize({ width: 1024.9, height: 1.2 })).toEqual({ width: 1024, height: 1 });
  });
});

describe("fitConfig", () => {
  it("reads grid and anchoring from the config", () => {
    const config = createGridConfig({ tileCount: [80, 25], pixelsPerTile: 8, centered: false });
    const result = fitConfig({ width: 1000, height: 500 }, config);

    expect(result.tileCount).toEqual({ x: 80, y: 25 });
    expect(result.pixelsPerTile).toEqual({ x: 8, y: 8 });
    expect(result.viewport).toEqual({ x: 0, y: 0, width: 640, height: 200 });
  });
});

describe("clipViewport", () => {
  it("returns the viewport unchanged when it fits", () => {
    const window = { width: 1000, height: 500 };
    const result = fit(window, TILES, PPT);
    expect(clipViewport(result, window)).toEqual({ x: 180, y: 150, width: 640, height: 200 });
  });

  it("intersects an overflowing viewport with the window", () => {
    const window = { width: 300, height: 150 };
    const result = fit(window, TILES, PPT);
    expect(clipViewport(result, window)).toEqual({ x: 0, y: 0, width: 300, height: 150 });
  });

  it("clips a corner-anchored viewport on the far edges", () => {
    const window = { width: 600, height: 1000 };
    const result = fit(window, TILES, PPT, false);
    expect(clipViewport(result, window)).toEqual({ x: 0, y: 0, width: 600, height: 200 });
  });
});
