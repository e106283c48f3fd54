import type { Catalog, CatalogWarning, RatioSpec, Rectangle } from "./types.js";

export const RATIO_PRESETS = [
  { key: "1:1", ratio: { width: 1, height: 1 } },
  { key: "2:3", ratio: { width: 2, height: 3 } },
  { key: "3:2", ratio: { width: 3, height: 2 } },
  { key: "4:3", ratio: { width: 4, height: 3 } },
  { key: "3:4", ratio: { width: 3, height: 4 } },
  { key: "16:9", ratio: { width: 16, height: 9 } },
  { key: "9:16", ratio: { width: 9, height: 16 } },
] as const;

// Table order is catalog order, and catalog order decides ties.
export const RESOLUTION_PRESETS = [
  { key: "sd15_1:1_512x512", resolution: { width: 512, height: 512 } },
  { key: "sd15/sdxl_1:1_768x768", resolution: { width: 768, height: 768 } },
  { key: "sd15_3:2_768x512", resolution: { width: 768, height: 512 } },
  { key: "sd15_2:3_512x768", resolution: { width: 512, height: 768 } },
  { key: "sd15_4:3_768x576", resolution: { width: 768, height: 576 } },
  { key: "sd15_3:4_576x768", resolution: { width: 576, height: 768 } },
  { key: "sd15_16:9_912x512", resolution: { width: 912, height: 512 } },
  { key: "sd15_9:16_512x912", resolution: { width: 512, height: 912 } },
  { key: "sdxl_1:1_1024x1024", resolution: { width: 1024, height: 1024 } },
  { key: "sdxl_3:2_1152x768", resolution: { width: 1152, height: 768 } },
  { key: "sdxl_2:3_768x1152", resolution: { width: 768, height: 1152 } },
  { key: "sdxl_4:3_1152x864", resolution: { width: 1152, height: 864 } },
  { key: "sdxl_3:4_864x1152", resolution: { width: 864, height: 1152 } },
  { key: "sdxl_16:9_1360x768", resolution: { width: 1360, height: 768 } },
  { key: "sdxl_9:16_768x1360", resolution: { width: 768, height: 1360 } },
  { key: "flux_1:1_1408x1408", resolution: { width: 1408, height: 1408 } },
  { key: "flux_3:2_1728x1152", resolution: { width: 1728, height: 1152 } },
  { key: "flux_4:3_1664x1216", resolution: { width: 1664, height: 1216 } },
  { key: "flux_16:9_1920x1088", resolution: { width: 1920, height: 1088 } },
  { key: "flux_21:9_2176x960", resolution: { width: 2176, height: 960 } },
] as const;

export type RatioPresetKey = (typeof RATIO_PRESETS)[number]["key"];
export type ResolutionPresetKey = (typeof RESOLUTION_PRESETS)[number]["key"];

export type RatioPresetFlags = Partial<Record<RatioPresetKey, boolean>>;
export type ResolutionPresetFlags = Partial<Record<ResolutionPresetKey, boolean>>;

export interface ParseRatioListOptions {
  withinSeparator: string;
  pairSeparator?: string;
  label?: string;
}

const INTEGER_PATTERN = /^[+-]?\d+$/u;

function parseInteger(raw: string): number | null {
  const trimmed = raw.trim();
  if (!INTEGER_PATTERN.test(trimmed)) return null;
  const value = Number.parseInt(trimmed, 10);
  return Number.isSafeInteger(value) ? value : null;
}

/**
 * Parses `"W:H,W:H"`-style text into positive integer pairs.
 *
 * Tokens that cannot be used are skipped and reported in `warnings`; the
 * function never throws. If the split pipeline itself fails, the whole input
 * yields an empty list and a single warning covering the full text.
 */
export function parseRatioList(text: string, options: ParseRatioListOptions): Catalog<RatioSpec> {
  const pairSeparator = options.pairSeparator ?? ",";
  const { withinSeparator } = options;
  const label = options.label ?? "list";

  if (text.trim() === "") {
    return { entries: [], warnings: [] };
  }

  try {
    const entries: RatioSpec[] = [];
    const warnings: CatalogWarning[] = [];

    for (const rawToken of text.split(pairSeparator)) {
      const token = rawToken.trim();
      if (!token.includes(withinSeparator)) {
        if (token !== "") {
          warnings.push({ token, message: `missing "${withinSeparator}" separator` });
        }
        continue;
      }

      const parts = token.split(withinSeparator);
      if (parts.length !== 2) {
        warnings.push({ token, message: "expected exactly two values" });
        continue;
      }

      const width = parseInteger(parts[0]);
      const height = parseInteger(parts[1]);
      if (width === null || height === null) {
        warnings.push({ token, message: "values must be integers" });
        continue;
      }
      if (width <= 0 || height <= 0) {
        warnings.push({ token, message: "values must be positive" });
        continue;
      }

      entries.push({ width, height });
    }

    return { entries, warnings };
  } catch (err) {
    const message = err instanceof Error ? err.message : "unknown error";
    return {
      entries: [],
      warnings: [{ token: text, message: `Invalid ${label} format: ${message}` }],
    };
  }
}

export function parseCustomRatios(text: string): Catalog<RatioSpec> {
  return parseRatioList(text, { withinSeparator: ":", label: "custom ratio" });
}

export function parseCustomResolutions(text: string): Catalog<Rectangle> {
  return parseRatioList(text, { withinSeparator: "x", label: "custom resolution" });
}

export function isRatioPresetKey(value: string): value is RatioPresetKey {
  return RATIO_PRESETS.some((preset) => preset.key === value);
}

export function isResolutionPresetKey(value: string): value is ResolutionPresetKey {
  return RESOLUTION_PRESETS.some((preset) => preset.key === value);
}

export function listRatioPresets(): RatioPresetKey[] {
  return RATIO_PRESETS.map((preset) => preset.key);
}

export function listResolutionPresets(): ResolutionPresetKey[] {
  return RESOLUTION_PRESETS.map((preset) => preset.key);
}

export function buildRatioCatalog(flags: RatioPresetFlags, customRatios = ""): Catalog<RatioSpec> {
  const enabled: RatioSpec[] = RATIO_PRESETS.filter((preset) => flags[preset.key] === true).map(
    (preset) => preset.ratio
  );
  const custom = parseCustomRatios(customRatios);
  return {
    entries: [...enabled, ...custom.entries],
    warnings: custom.warnings,
  };
}

export function buildResolutionCatalog(
  flags: ResolutionPresetFlags,
  customResolutions = ""
): Catalog<Rectangle> {
  const enabled: Rectangle[] = RESOLUTION_PRESETS.filter(
    (preset) => flags[preset.key] === true
  ).map((preset) => preset.resolution);
  const custom = parseCustomResolutions(customResolutions);
  return {
    entries: [...enabled, ...custom.entries],
    warnings: custom.warnings,
  };
}
