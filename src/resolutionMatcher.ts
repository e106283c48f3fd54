import type { RatioSpec, Rectangle } from "./types.js";

interface MatchCandidate {
  resolution: Rectangle;
  pixels: number;
  percentDifference: number;
}

export function greatestCommonDivisor(a: number, b: number): number {
  let left = Math.abs(a);
  let right = Math.abs(b);
  while (right !== 0) {
    [left, right] = [right, left % right];
  }
  return left;
}

export function reduceRatio(width: number, height: number): RatioSpec {
  const divisor = greatestCommonDivisor(width, height);
  return { width: width / divisor, height: height / divisor };
}

export function pixelDifferencePercent(source: Rectangle, candidate: Rectangle): number {
  const sourcePixels = source.width * source.height;
  const candidatePixels = candidate.width * candidate.height;
  return (Math.abs(candidatePixels - sourcePixels) / sourcePixels) * 100;
}

/**
 * Picks the resolution with exactly the source's reduced aspect ratio and the
 * closest pixel count, preferring the larger one on a tie. Returns the source
 * when nothing shares its ratio.
 */
export function matchResolution(source: Rectangle, candidates: readonly Rectangle[]): Rectangle {
  const inputRatio = reduceRatio(source.width, source.height);

  const matching: MatchCandidate[] = [];
  for (const resolution of candidates) {
    const candidateRatio = reduceRatio(resolution.width, resolution.height);
    if (candidateRatio.width !== inputRatio.width || candidateRatio.height !== inputRatio.height) {
      continue;
    }
    matching.push({
      resolution,
      pixels: resolution.width * resolution.height,
      percentDifference: pixelDifferencePercent(source, resolution),
    });
  }

  if (matching.length === 0) {
    return { width: source.width, height: source.height };
  }

  matching.sort(
    (left, right) =>
      left.percentDifference - right.percentDifference || right.pixels - left.pixels
  );

  const best = matching[0].resolution;
  return { width: best.width, height: best.height };
}
