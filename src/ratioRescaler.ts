import type { FitResult, RatioSpec, Rectangle } from "./types.js";
import { isForcedRatio } from "./shared.js";

/**
 * Returns the candidate whose ratio is numerically closest to the source's.
 * On equal distance the earlier candidate wins.
 */
export function findClosestRatio(
  source: Rectangle,
  candidates: readonly RatioSpec[]
): RatioSpec | null {
  const currentRatio = source.width / source.height;
  let best: RatioSpec | null = null;
  let bestDifference = Number.POSITIVE_INFINITY;

  for (const candidate of candidates) {
    const difference = Math.abs(currentRatio - candidate.width / candidate.height);
    if (difference < bestDifference) {
      best = candidate;
      bestDifference = difference;
    }
  }

  return best;
}

/**
 * Shrinks one side of `source` so that it takes on `ratio`. The other side is
 * kept and the computed side is truncated to whole pixels.
 */
export function rescaleToRatio(source: Rectangle, ratio: RatioSpec): Rectangle {
  const sourceIsWider = source.width * ratio.height > ratio.width * source.height;
  if (sourceIsWider) {
    return {
      width: Math.floor((source.height * ratio.width) / ratio.height),
      height: source.height,
    };
  }
  return {
    width: source.width,
    height: Math.floor((source.width * ratio.height) / ratio.width),
  };
}

export function rescaleToClosestRatio(
  source: Rectangle,
  candidates: readonly RatioSpec[],
  forced?: RatioSpec | null
): FitResult {
  const target = isForcedRatio(forced) ? forced : findClosestRatio(source, candidates);
  if (!target) {
    return { width: source.width, height: source.height, ratioWidth: 1, ratioHeight: 1 };
  }

  const rescaled = rescaleToRatio(source, target);
  return {
    width: rescaled.width,
    height: rescaled.height,
    ratioWidth: target.width,
    ratioHeight: target.height,
  };
}
