import * as fs from "fs";
import * as path from "path";
import {
  isRatioPresetKey,
  isResolutionPresetKey,
  type RatioPresetKey,
  type ResolutionPresetKey,
} from "./catalog.js";
import { isRecord } from "./shared.js";

/** A preset key, or one of the shorthands for every preset and for none. */
export type PresetSelection<K extends string> = K | "all" | "none";

export interface AspectfitConfig {
  ratioPresets?: PresetSelection<RatioPresetKey>[];
  resolutionPresets?: PresetSelection<ResolutionPresetKey>[];
  customRatios?: string;
  customResolutions?: string;
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

export interface LoadedConfig {
  config: AspectfitConfig;
  sourcePath: string | null;
}

export class ConfigError extends Error {}

export const CONFIG_FILE = "aspectfit.config.json";

const ALLOWED_KEYS = new Set([
  "ratioPresets",
  "resolutionPresets",
  "customRatios",
  "customResolutions",
  "json",
  "verbose",
  "quiet",
]);

function parseString(
  value: unknown,
  key: keyof AspectfitConfig,
  sourcePath: string
): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "string") {
    throw new ConfigError(`Invalid "${key}" in ${sourcePath}: expected string.`);
  }
  return value;
}

function parseBoolean(
  value: unknown,
  key: keyof AspectfitConfig,
  sourcePath: string
): boolean | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "boolean") {
    throw new ConfigError(`Invalid "${key}" in ${sourcePath}: expected boolean.`);
  }
  return value;
}

function parseStringArray(
  value: unknown,
  key: keyof AspectfitConfig,
  sourcePath: string
): string[] | undefined {
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) {
    throw new ConfigError(`Invalid "${key}" in ${sourcePath}: expected string array.`);
  }

  const parsed: string[] = [];
  for (const [index, entry] of value.entries()) {
    if (typeof entry !== "string") {
      throw new ConfigError(
        `Invalid "${key}" in ${sourcePath}: expected string at index ${index.toString()}.`
      );
    }
    parsed.push(entry);
  }
  return parsed;
}

function parsePresetSelection<K extends string>(
  value: unknown,
  key: "ratioPresets" | "resolutionPresets",
  sourcePath: string,
  isKey: (entry: string) => entry is K
): PresetSelection<K>[] | undefined {
  const entries = parseStringArray(value, key, sourcePath);
  if (entries === undefined) return undefined;

  const parsed: PresetSelection<K>[] = [];
  for (const [index, entry] of entries.entries()) {
    if (isKey(entry)) {
      parsed.push(entry);
    } else if (entry === "all" || entry === "none") {
      parsed.push(entry);
    } else {
      throw new ConfigError(
        `Invalid "${key}" in ${sourcePath}: unknown preset "${entry}" at index ${index.toString()}.`
      );
    }
  }
  return parsed;
}

function parseConfig(value: unknown, sourcePath: string): AspectfitConfig {
  if (!isRecord(value)) {
    throw new ConfigError(`Invalid config in ${sourcePath}: expected a JSON object.`);
  }

  for (const key of Object.keys(value)) {
    if (!ALLOWED_KEYS.has(key)) {
      throw new ConfigError(`Unknown config key "${key}" in ${sourcePath}.`);
    }
  }

  return {
    ratioPresets: parsePresetSelection(
      value.ratioPresets,
      "ratioPresets",
      sourcePath,
      isRatioPresetKey
    ),
    resolutionPresets: parsePresetSelection(
      value.resolutionPresets,
      "resolutionPresets",
      sourcePath,
      isResolutionPresetKey
    ),
    customRatios: parseString(value.customRatios, "customRatios", sourcePath),
    customResolutions: parseString(value.customResolutions, "customResolutions", sourcePath),
    json: parseBoolean(value.json, "json", sourcePath),
    verbose: parseBoolean(value.verbose, "verbose", sourcePath),
    quiet: parseBoolean(value.quiet, "quiet", sourcePath),
  };
}

function readJsonFile(filePath: string): unknown {
  try {
    const raw = fs.readFileSync(filePath, "utf-8");
    return JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : "unknown error";
    throw new ConfigError(`Failed to read config file ${filePath}: ${message}`);
  }
}

export function loadConfig(cwd: string, explicitConfigPath?: string): LoadedConfig {
  if (explicitConfigPath) {
    const configPath = path.resolve(cwd, explicitConfigPath);
    if (!fs.existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    return {
      config: parseConfig(readJsonFile(configPath), configPath),
      sourcePath: configPath,
    };
  }

  const configJsonPath = path.join(cwd, CONFIG_FILE);
  if (fs.existsSync(configJsonPath)) {
    return {
      config: parseConfig(readJsonFile(configJsonPath), configJsonPath),
      sourcePath: configJsonPath,
    };
  }

  const packageJsonPath = path.join(cwd, "package.json");
  if (fs.existsSync(packageJsonPath)) {
    const packageJson = readJsonFile(packageJsonPath);
    if (isRecord(packageJson) && packageJson.aspectfit !== undefined) {
      return {
        config: parseConfig(packageJson.aspectfit, `${packageJsonPath}#aspectfit`),
        sourcePath: `${packageJsonPath}#aspectfit`,
      };
    }
  }

  return {
    config: {},
    sourcePath: null,
  };
}
