import {
  buildRatioCatalog,
  buildResolutionCatalog,
  type RatioPresetFlags,
  type ResolutionPresetFlags,
} from "./catalog.js";
import { fitCrop } from "./cropFitter.js";
import { rescaleToClosestRatio } from "./ratioRescaler.js";
import { matchResolution } from "./resolutionMatcher.js";
import { isForcedRatio } from "./shared.js";
import type { CatalogWarning, RatioSpec } from "./types.js";

export type NodeName = "AspectRatioCalculator" | "ClosestRatioRescaler" | "ResolutionMatcher";

export interface NodeDefinition {
  name: NodeName;
  displayName: string;
  category: string;
  outputs: readonly string[];
}

export const NODE_DEFINITIONS: readonly NodeDefinition[] = [
  {
    name: "AspectRatioCalculator",
    displayName: "Aspect Ratio Calculator",
    category: "image/resolution",
    outputs: ["width", "height", "aspect_ratio_width", "aspect_ratio_height"],
  },
  {
    name: "ClosestRatioRescaler",
    displayName: "Closest Ratio Rescaler",
    category: "image/resolution",
    outputs: ["width", "height", "aspect_ratio_width", "aspect_ratio_height"],
  },
  {
    name: "ResolutionMatcher",
    displayName: "Resolution Matcher",
    category: "image/resolution",
    outputs: ["width", "height"],
  },
];

export interface RatioNodeInput {
  width: number;
  height: number;
  presets?: RatioPresetFlags;
  customRatios?: string;
  /** Values of zero or less in either slot disable the override. */
  forceRatioWidth?: number;
  forceRatioHeight?: number;
}

export interface ResolutionNodeInput {
  width: number;
  height: number;
  presets?: ResolutionPresetFlags;
  customResolutions?: string;
}

export interface NodeOutput<T extends readonly number[]> {
  result: T;
  warnings: CatalogWarning[];
}

export type RatioNodeResult = readonly [
  width: number,
  height: number,
  ratioWidth: number,
  ratioHeight: number,
];
export type ResolutionNodeResult = readonly [width: number, height: number];

function forcedRatioFrom(input: RatioNodeInput): RatioSpec | null {
  const forced = {
    width: input.forceRatioWidth ?? -1,
    height: input.forceRatioHeight ?? -1,
  };
  return isForcedRatio(forced) ? forced : null;
}

export function computeAspectRatioCrop(input: RatioNodeInput): NodeOutput<RatioNodeResult> {
  const source = { width: input.width, height: input.height };
  const forced = forcedRatioFrom(input);
  // A forced ratio skips the catalog, so custom text is not parsed either.
  const catalog = forced
    ? { entries: [], warnings: [] }
    : buildRatioCatalog(input.presets ?? {}, input.customRatios);
  const fit = fitCrop(source, catalog.entries, forced);
  return {
    result: [fit.width, fit.height, fit.ratioWidth, fit.ratioHeight],
    warnings: catalog.warnings,
  };
}

export function computeClosestRatioRescale(input: RatioNodeInput): NodeOutput<RatioNodeResult> {
  const source = { width: input.width, height: input.height };
  const forced = forcedRatioFrom(input);
  const catalog = forced
    ? { entries: [], warnings: [] }
    : buildRatioCatalog(input.presets ?? {}, input.customRatios);
  const fit = rescaleToClosestRatio(source, catalog.entries, forced);
  return {
    result: [fit.width, fit.height, fit.ratioWidth, fit.ratioHeight],
    warnings: catalog.warnings,
  };
}

export function computeResolutionMatch(
  input: ResolutionNodeInput
): NodeOutput<ResolutionNodeResult> {
  const source = { width: input.width, height: input.height };
  const catalog = buildResolutionCatalog(input.presets ?? {}, input.customResolutions);
  const matched = matchResolution(source, catalog.entries);
  return {
    result: [matched.width, matched.height],
    warnings: catalog.warnings,
  };
}
