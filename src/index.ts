export * from "./types.js";
export {
  RATIO_PRESETS,
  RESOLUTION_PRESETS,
  buildRatioCatalog,
  buildResolutionCatalog,
  isRatioPresetKey,
  isResolutionPresetKey,
  listRatioPresets,
  listResolutionPresets,
  parseCustomRatios,
  parseCustomResolutions,
  parseRatioList,
  type ParseRatioListOptions,
  type RatioPresetFlags,
  type RatioPresetKey,
  type ResolutionPresetFlags,
  type ResolutionPresetKey,
} from "./catalog.js";
export { evaluateCropCandidate, fitCrop, type CropCandidate } from "./cropFitter.js";
export { findClosestRatio, rescaleToClosestRatio, rescaleToRatio } from "./ratioRescaler.js";
export {
  greatestCommonDivisor,
  matchResolution,
  pixelDifferencePercent,
  reduceRatio,
} from "./resolutionMatcher.js";
export {
  NODE_DEFINITIONS,
  computeAspectRatioCrop,
  computeClosestRatioRescale,
  computeResolutionMatch,
  type NodeDefinition,
  type NodeName,
  type NodeOutput,
  type RatioNodeInput,
  type RatioNodeResult,
  type ResolutionNodeInput,
  type ResolutionNodeResult,
} from "./nodes.js";
export { MAX_DIMENSION, MIN_DIMENSION, isForcedRatio } from "./shared.js";
