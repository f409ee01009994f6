import { describe, expect, it } from "vitest";
import type { Dimensions, ProcessingSettings } from "../config/processingConfig";
import {
  calculateBoundingBoxResize,
  calculateNarrowSideResize,
  calculateResizeDimensions,
} from "./dimensions";

const settings: ProcessingSettings = {
  maxWidth: 1920,
  maxHeight: 1080,
  maxNarrowSide: 0,
  jpegQuality: 90,
  webpQuality: 85,
  convertToFormat: "",
  normalizeExtensions: true,
};

const sizes: Dimensions[] = [
  { width: 1, height: 1 },
  { width: 400, height: 400 },
  { width: 1080, height: 1920 },
  { width: 1920, height: 1080 },
  { width: 1600, height: 800 },
  { width: 2000, height: 3000 },
  { width: 3000, height: 2000 },
  { width: 4032, height: 3024 },
  { width: 5000, height: 100 },
  { width: 333, height: 7777 },
];

describe("calculateNarrowSideResize", () => {
  it("scales the narrow side down to the limit", () => {
    expect(calculateNarrowSideResize({ width: 1600, height: 800 }, 400)).toEqual({
      width: 800,
      height: 400,
    });
  });

  it("leaves the long side unconstrained", () => {
    expect(calculateNarrowSideResize({ width: 10000, height: 1000 }, 500)).toEqual({
      width: 5000,
      height: 500,
    });
  });

  it("truncates instead of rounding", () => {
    expect(calculateNarrowSideResize({ width: 800, height: 1203 }, 400)).toEqual({
      width: 400,
      height: 601,
    });
  });

  it("returns the input unchanged whenever the narrow side already fits", () => {
    for (const size of sizes) {
      const limit = Math.min(size.width, size.height);
      expect(calculateNarrowSideResize(size, limit)).toBe(size);
      expect(calculateNarrowSideResize(size, limit + 1)).toBe(size);
    }
  });
});

describe("calculateBoundingBoxResize", () => {
  it("fits a portrait image into the box turned upright", () => {
    expect(calculateBoundingBoxResize({ width: 2000, height: 3000 }, 1920, 1080)).toEqual({
      width: 1080,
      height: 1620,
    });
  });

  it("fits a landscape image into the box", () => {
    expect(calculateBoundingBoxResize({ width: 3000, height: 2000 }, 1920, 1080)).toEqual({
      width: 1620,
      height: 1080,
    });
  });

  it("applies the long limit to the long edge whatever order the limits are given in", () => {
    expect(calculateBoundingBoxResize({ width: 3000, height: 2000 }, 1080, 1920)).toEqual({
      width: 1620,
      height: 1080,
    });
  });

  it("treats square images as landscape", () => {
    expect(calculateBoundingBoxResize({ width: 2000, height: 2000 }, 1920, 1080)).toEqual({
      width: 1080,
      height: 1080,
    });
  });

  it("does not resize a portrait image that fits once the box is turned", () => {
    const size = { width: 1080, height: 1920 };
    expect(calculateBoundingBoxResize(size, 1920, 1080)).toBe(size);
  });

  it("never upscales", () => {
    for (const size of sizes) {
      const result = calculateBoundingBoxResize(size, 1920, 1080);
      expect(result.width).toBeLessThanOrEqual(size.width);
      expect(result.height).toBeLessThanOrEqual(size.height);
      expect(Math.max(result.width, result.height)).toBeLessThanOrEqual(1920);
      expect(Math.min(result.width, result.height)).toBeLessThanOrEqual(1080);
    }
  });

  it("keeps at least one pixel on extreme aspect ratios", () => {
    expect(calculateBoundingBoxResize({ width: 19200, height: 1 }, 1920, 1080)).toEqual({
      width: 1920,
      height: 1,
    });
  });
});

describe("calculateResizeDimensions", () => {
  it("uses the narrow side strategy when it is set", () => {
    expect(
      calculateResizeDimensions({ width: 1600, height: 800 }, { ...settings, maxNarrowSide: 400 })
    ).toEqual({ width: 800, height: 400 });
  });

  it("ignores the bounding box entirely when the narrow side is set", () => {
    const narrow = { ...settings, maxNarrowSide: 1000 };
    for (const size of sizes) {
      const expected = calculateResizeDimensions(size, narrow);
      expect(calculateResizeDimensions(size, { ...narrow, maxWidth: 10, maxHeight: 10 })).toEqual(
        expected
      );
      expect(
        calculateResizeDimensions(size, { ...narrow, maxWidth: 99999, maxHeight: 5 })
      ).toEqual(expected);
    }
  });

  it("gives transposed results for transposed images and swapped limits", () => {
    const swapped = { ...settings, maxWidth: settings.maxHeight, maxHeight: settings.maxWidth };
    for (const size of sizes) {
      const result = calculateResizeDimensions(size, settings);
      const transposed = calculateResizeDimensions(
        { width: size.height, height: size.width },
        swapped
      );
      if (size.width === size.height) {
        expect(transposed).toEqual(result);
      } else {
        expect(transposed).toEqual({ width: result.height, height: result.width });
      }
    }
  });

  it("returns the input for images already inside the box", () => {
    const small = { width: 800, height: 600 };
    expect(calculateResizeDimensions(small, settings)).toBe(small);
  });
});
