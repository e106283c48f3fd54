import { describe, expect, it } from "vitest";
import { RESOLUTION_PRESETS } from "../src/catalog.js";
import {
  greatestCommonDivisor,
  matchResolution,
  pixelDifferencePercent,
  reduceRatio,
} from "../src/resolutionMatcher.js";
import type { Rectangle } from "../src/types.js";

const ALL_PRESETS: Rectangle[] = RESOLUTION_PRESETS.map((preset) => preset.resolution);

describe("reduceRatio", () => {
  it("divides both sides by their greatest common divisor", () => {
    expect(reduceRatio(1920, 1080)).toEqual({ width: 16, height: 9 });
    expect(reduceRatio(1360, 768)).toEqual({ width: 85, height: 48 });
    expect(reduceRatio(7, 7)).toEqual({ width: 1, height: 1 });
  });

  it("computes the gcd", () => {
    expect(greatestCommonDivisor(1024, 768)).toBe(256);
    expect(greatestCommonDivisor(0, 5)).toBe(5);
  });
});

describe("pixelDifferencePercent", () => {
  it("is relative to the source pixel count", () => {
    expect(pixelDifferencePercent({ width: 10, height: 10 }, { width: 5, height: 10 })).toBe(50);
  });
});

describe("matchResolution", () => {
  it("returns the source when there are no candidates", () => {
    expect(matchResolution({ width: 1920, height: 1080 }, [])).toEqual({
      width: 1920,
      height: 1080,
    });
  });

  it("only considers candidates with exactly the same reduced ratio", () => {
    expect(
      matchResolution({ width: 1920, height: 1080 }, [
        { width: 1024, height: 768 },
        { width: 1280, height: 720 },
      ])
    ).toEqual({ width: 1280, height: 720 });
  });

  it("returns the source when no candidate shares its ratio", () => {
    expect(matchResolution({ width: 1920, height: 1080 }, ALL_PRESETS)).toEqual({
      width: 1920,
      height: 1080,
    });
  });

  it("picks the closest pixel count", () => {
    expect(matchResolution({ width: 1200, height: 800 }, ALL_PRESETS)).toEqual({
      width: 1152,
      height: 768,
    });
    expect(
      matchResolution({ width: 1000, height: 1000 }, [
        { width: 1100, height: 1100 },
        { width: 900, height: 900 },
      ])
    ).toEqual({ width: 900, height: 900 });
  });

  it("prefers the larger resolution on an equal difference", () => {
    expect(
      matchResolution({ width: 5, height: 5 }, [
        { width: 1, height: 1 },
        { width: 7, height: 7 },
      ])
    ).toEqual({ width: 7, height: 7 });
  });

  it("returns an already matching source unchanged", () => {
    expect(matchResolution({ width: 1024, height: 1024 }, ALL_PRESETS)).toEqual({
      width: 1024,
      height: 1024,
    });
  });
});
