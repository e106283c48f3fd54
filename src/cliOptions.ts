import {
  isRatioPresetKey,
  isResolutionPresetKey,
  listRatioPresets,
  listResolutionPresets,
  type RatioPresetKey,
  type ResolutionPresetKey,
} from "./catalog.js";
import type { AspectfitConfig } from "./config.js";
import type { FitMode, RunOptions, RunnerError } from "./runner.js";
import type { RatioSpec } from "./types.js";

export type CliFlags = {
  presets?: string;
  custom?: string;
  force?: string;
  config?: string;
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
};

export interface ResolveRunOptionsInput {
  version: string;
  commandName: string;
  mode: FitMode;
  width: string;
  height: string;
  flags: CliFlags;
  config: AspectfitConfig;
}

export type ResolvedRunOptions =
  | { ok: true; options: RunOptions }
  | { ok: false; errors: RunnerError[] };

const DIMENSION_PATTERN = /^\d+$/u;
const FORCE_RATIO_PATTERN = /^(-?\d+):(-?\d+)$/u;

export function parseDimension(raw: string): number | null {
  const trimmed = raw.trim();
  if (!DIMENSION_PATTERN.test(trimmed)) return null;
  const value = Number.parseInt(trimmed, 10);
  return Number.isSafeInteger(value) && value >= 1 ? value : null;
}

/**
 * Parses `W:H` for `--force`. A zero or negative side means "no override" and
 * yields `null`, matching the host node's `-1` default.
 */
export function parseForcedRatio(raw: string): RatioSpec | null | undefined {
  const match = FORCE_RATIO_PATTERN.exec(raw.trim());
  if (!match) return undefined;
  const width = Number.parseInt(match[1], 10);
  const height = Number.parseInt(match[2], 10);
  if (width <= 0 || height <= 0) return null;
  return { width, height };
}

function splitPresetList(raw: string | readonly string[]): string[] {
  const parts = typeof raw === "string" ? raw.split(",") : raw;
  return parts.map((part) => part.trim()).filter(Boolean);
}

function resolvePresetKeys<K extends string>(
  raw: string | readonly string[],
  allKeys: readonly K[],
  isKey: (value: string) => value is K,
  errors: RunnerError[]
): K[] {
  const requested = splitPresetList(raw);
  if (requested.length === 1 && requested[0].toLowerCase() === "all") return [...allKeys];
  if (requested.length === 1 && requested[0].toLowerCase() === "none") return [];

  const selected = new Set<K>();
  for (const key of requested) {
    if (isKey(key)) {
      selected.add(key);
    } else {
      errors.push({
        code: "UNKNOWN_PRESET",
        message: `Unknown preset "${key}". Valid: ${allKeys.join(", ")}`,
      });
    }
  }
  // Catalog order comes from the preset table, not from the order given here.
  return allKeys.filter((key) => selected.has(key));
}

export function resolveRunOptions(input: ResolveRunOptionsInput): ResolvedRunOptions {
  const { flags, config, mode } = input;
  const errors: RunnerError[] = [];

  const width = parseDimension(input.width);
  const height = parseDimension(input.height);
  if (width === null || height === null) {
    errors.push({
      code: "INVALID_DIMENSION",
      message: `Invalid dimensions: "${input.width}" x "${input.height}". Width and height must be integers of at least 1.`,
    });
  }

  // `match` declares no --force, so commander rejects it before this runs.
  let forcedRatio: RatioSpec | null = null;
  if (flags.force !== undefined && mode !== "match") {
    const parsed = parseForcedRatio(flags.force);
    if (parsed === undefined) {
      errors.push({
        code: "INVALID_FORCE_RATIO",
        message: `Invalid forced ratio: "${flags.force}". Expected W:H, e.g. 16:9.`,
      });
    } else {
      forcedRatio = parsed;
    }
  }

  const ratioPresetSource = mode === "match" ? undefined : flags.presets;
  const resolutionPresetSource = mode === "match" ? flags.presets : undefined;

  const ratioPresets: RatioPresetKey[] = resolvePresetKeys(
    ratioPresetSource ?? config.ratioPresets ?? "all",
    listRatioPresets(),
    isRatioPresetKey,
    errors
  );
  const resolutionPresets: ResolutionPresetKey[] = resolvePresetKeys(
    resolutionPresetSource ?? config.resolutionPresets ?? "none",
    listResolutionPresets(),
    isResolutionPresetKey,
    errors
  );

  if (errors.length > 0 || width === null || height === null) {
    return { ok: false, errors };
  }

  return {
    ok: true,
    options: {
      version: input.version,
      commandName: input.commandName,
      mode,
      width,
      height,
      ratioPresets,
      resolutionPresets,
      customRatios: (mode === "match" ? undefined : flags.custom) ?? config.customRatios ?? "",
      customResolutions:
        (mode === "match" ? flags.custom : undefined) ?? config.customResolutions ?? "",
      forcedRatio,
      json: flags.json ?? config.json ?? false,
      verbose: flags.verbose ?? config.verbose ?? false,
      quiet: flags.quiet ?? config.quiet ?? false,
    },
  };
}
