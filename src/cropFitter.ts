import type { FitResult, RatioSpec, Rectangle } from "./types.js";
import { isForcedRatio } from "./shared.js";

export interface CropCandidate {
  width: number;
  height: number;
  pixelLoss: number;
}

interface RankedCandidate extends CropCandidate {
  ratio: RatioSpec;
}

function sizeByHeightUnits(source: Rectangle, ratio: RatioSpec): Rectangle {
  const heightUnits = Math.floor(source.height / ratio.height);
  return { width: heightUnits * ratio.width, height: heightUnits * ratio.height };
}

function sizeByWidthUnits(source: Rectangle, ratio: RatioSpec): Rectangle {
  const widthUnits = Math.floor(source.width / ratio.width);
  return { width: widthUnits * ratio.width, height: widthUnits * ratio.height };
}

/**
 * Largest crop of `source` whose sides are the same whole number of `ratio`
 * units. A source smaller than one unit yields a zero-sized crop.
 */
export function evaluateCropCandidate(source: Rectangle, ratio: RatioSpec): CropCandidate {
  // w/h > rw/rh, compared without division
  const sourceIsWider = source.width * ratio.height > ratio.width * source.height;

  let fitted: Rectangle;
  if (sourceIsWider) {
    fitted = sizeByHeightUnits(source, ratio);
    if (fitted.width > source.width) {
      fitted = sizeByWidthUnits(source, ratio);
    }
  } else {
    fitted = sizeByWidthUnits(source, ratio);
    if (fitted.height > source.height) {
      fitted = sizeByHeightUnits(source, ratio);
    }
  }

  return {
    width: fitted.width,
    height: fitted.height,
    pixelLoss: source.width * source.height - fitted.width * fitted.height,
  };
}

export function fitCrop(
  source: Rectangle,
  candidates: readonly RatioSpec[],
  forced?: RatioSpec | null
): FitResult {
  if (isForcedRatio(forced)) {
    const fitted = evaluateCropCandidate(source, forced);
    return {
      width: fitted.width,
      height: fitted.height,
      ratioWidth: forced.width,
      ratioHeight: forced.height,
    };
  }

  if (candidates.length === 0) {
    return { width: source.width, height: source.height, ratioWidth: 1, ratioHeight: 1 };
  }

  const ranked: RankedCandidate[] = candidates.map((ratio) => ({
    ...evaluateCropCandidate(source, ratio),
    ratio,
  }));
  // Array.prototype.sort is stable, so equal losses keep catalog order.
  ranked.sort((left, right) => left.pixelLoss - right.pixelLoss);

  const best = ranked[0];
  return {
    width: best.width,
    height: best.height,
    ratioWidth: best.ratio.width,
    ratioHeight: best.ratio.height,
  };
}
