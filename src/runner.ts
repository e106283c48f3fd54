import chalk from "chalk";
import {
  buildRatioCatalog,
  buildResolutionCatalog,
  type RatioPresetKey,
  type ResolutionPresetKey,
} from "./catalog.js";
import { evaluateCropCandidate, fitCrop } from "./cropFitter.js";
import { rescaleToClosestRatio, rescaleToRatio } from "./ratioRescaler.js";
import { matchResolution, pixelDifferencePercent, reduceRatio } from "./resolutionMatcher.js";
import {
  buildRerunCommand,
  formatDimensions,
  formatFitResult,
  formatPixelLoss,
  formatRatio,
  type FitMode,
} from "./runner/reporting.js";
import { MAX_DIMENSION, isPositiveInteger } from "./shared.js";
import type { Catalog, CatalogWarning, FitResult, RatioSpec, Rectangle } from "./types.js";

export type { FitMode } from "./runner/reporting.js";

export interface RunnerError {
  code: string;
  message: string;
}

export interface RunOptions {
  version: string;
  commandName: string;
  mode: FitMode;
  width: number;
  height: number;
  ratioPresets: RatioPresetKey[];
  resolutionPresets: ResolutionPresetKey[];
  customRatios: string;
  customResolutions: string;
  forcedRatio: RatioSpec | null;
  json: boolean;
  verbose: boolean;
  quiet: boolean;
}

export interface CandidateReport {
  width: number;
  height: number;
  output: Rectangle;
  /** Crop mode: discarded pixels. Match mode: pixel-count difference in percent. */
  score: number;
}

export interface RunReport {
  version: string;
  mode: FitMode;
  source: Rectangle | null;
  options: {
    ratioPresets: RatioPresetKey[];
    resolutionPresets: ResolutionPresetKey[];
    customRatios: string;
    customResolutions: string;
    forcedRatio: RatioSpec | null;
  } | null;
  catalog: {
    entries: Rectangle[];
    skipped: CatalogWarning[];
  };
  candidates: CandidateReport[];
  result: FitResult | Rectangle | null;
  rerunCommand: string | null;
  errors: RunnerError[];
  warnings: RunnerError[];
}

export interface RunResult {
  exitCode: number;
  report: RunReport;
}

function createInitialReport(options: RunOptions): RunReport {
  return {
    version: "1.0",
    mode: options.mode,
    source: { width: options.width, height: options.height },
    options: {
      ratioPresets: options.ratioPresets,
      resolutionPresets: options.resolutionPresets,
      customRatios: options.customRatios,
      customResolutions: options.customResolutions,
      forcedRatio: options.mode === "match" ? null : options.forcedRatio,
    },
    catalog: {
      entries: [],
      skipped: [],
    },
    candidates: [],
    result: null,
    rerunCommand: buildRerunCommand(options),
    errors: [],
    warnings: [],
  };
}

/**
 * Report for a run that never started: bad arguments or an unreadable config.
 * Nothing was resolved, so source, options and rerun command stay null.
 */
export function createErrorReport(mode: FitMode, errors: RunnerError[]): RunReport {
  return {
    version: "1.0",
    mode,
    source: null,
    options: null,
    catalog: {
      entries: [],
      skipped: [],
    },
    candidates: [],
    result: null,
    rerunCommand: null,
    errors,
    warnings: [],
  };
}

function presetFlags<K extends string>(keys: readonly K[]): Partial<Record<K, boolean>> {
  const flags: Partial<Record<K, boolean>> = {};
  for (const key of keys) {
    flags[key] = true;
  }
  return flags;
}

function catalogFor(options: RunOptions): Catalog<Rectangle> {
  if (options.mode === "match") {
    return buildResolutionCatalog(
      presetFlags(options.resolutionPresets),
      options.customResolutions
    );
  }
  if (options.forcedRatio) {
    return { entries: [], warnings: [] };
  }
  return buildRatioCatalog(presetFlags(options.ratioPresets), options.customRatios);
}

function evaluateCandidates(
  mode: FitMode,
  source: Rectangle,
  entries: readonly Rectangle[]
): CandidateReport[] {
  if (mode === "crop") {
    return entries.map((ratio) => {
      const fitted = evaluateCropCandidate(source, ratio);
      return {
        width: ratio.width,
        height: ratio.height,
        output: { width: fitted.width, height: fitted.height },
        score: fitted.pixelLoss,
      };
    });
  }

  if (mode === "match") {
    const inputRatio = reduceRatio(source.width, source.height);
    return entries
      .filter((resolution) => {
        const ratio = reduceRatio(resolution.width, resolution.height);
        return ratio.width === inputRatio.width && ratio.height === inputRatio.height;
      })
      .map((resolution) => ({
        width: resolution.width,
        height: resolution.height,
        output: { width: resolution.width, height: resolution.height },
        score: pixelDifferencePercent(source, resolution),
      }));
  }

  const currentRatio = source.width / source.height;
  return entries.map((ratio) => ({
    width: ratio.width,
    height: ratio.height,
    output: rescaleToRatio(source, ratio),
    score: Math.abs(currentRatio - ratio.width / ratio.height),
  }));
}

function describeCandidate(mode: FitMode, source: Rectangle, candidate: CandidateReport): string {
  if (mode === "match") {
    return `${formatDimensions(candidate)} → ${candidate.score.toFixed(2)}% pixel difference`;
  }
  const output = formatDimensions(candidate.output);
  if (mode === "crop") {
    return `${formatRatio(candidate)} → ${output}, loss ${formatPixelLoss(candidate.score, source)}`;
  }
  return `${formatRatio(candidate)} → ${output}, ratio distance ${candidate.score.toFixed(4)}`;
}

function isFitResult(result: FitResult | Rectangle): result is FitResult {
  return "ratioWidth" in result;
}

export function runAspectfit(options: RunOptions): RunResult {
  const report = createInitialReport(options);
  const source: Rectangle = { width: options.width, height: options.height };
  const forcedRatio = options.mode === "match" ? null : options.forcedRatio;

  const printInfo = (message: string) => {
    if (!options.json && !options.quiet) {
      console.log(message);
    }
  };

  const printError = (message: string) => {
    if (!options.json) {
      console.error(message);
    }
  };

  const printVerbose = (message: string) => {
    if (options.verbose) {
      printInfo(message);
    }
  };

  if (!isPositiveInteger(source.width) || !isPositiveInteger(source.height)) {
    const message = `Invalid dimensions: ${String(source.width)}x${String(source.height)}. Width and height must be positive integers.`;
    report.errors.push({ code: "INVALID_DIMENSION", message });
    printError(chalk.red(message));
    return { exitCode: 1, report };
  }

  if (source.width > MAX_DIMENSION || source.height > MAX_DIMENSION) {
    const message = `Source ${formatDimensions(source)} exceeds the recommended maximum of ${MAX_DIMENSION.toString()} per side.`;
    report.warnings.push({ code: "DIMENSION_ABOVE_RECOMMENDED", message });
    printError(chalk.yellow(`Warning: ${message}`));
  }

  const catalog = catalogFor(options);
  report.catalog = { entries: catalog.entries, skipped: catalog.warnings };

  for (const skipped of catalog.warnings) {
    const message = `Skipping custom entry "${skipped.token}": ${skipped.message}`;
    report.warnings.push({ code: "CATALOG_ENTRY_SKIPPED", message });
    printError(chalk.yellow(`Warning: ${message}`));
  }

  printInfo(chalk.bold(`\naspectfit v${options.version}\n`));
  printInfo(`Mode: ${chalk.cyan(options.mode)}  Source: ${chalk.cyan(formatDimensions(source))}`);
  if (forcedRatio) {
    printInfo(`Forced ratio: ${chalk.cyan(formatRatio(forcedRatio))}`);
  } else {
    printInfo(`Candidates: ${chalk.cyan(catalog.entries.length.toString())}`);
  }

  report.candidates = evaluateCandidates(options.mode, source, catalog.entries);
  for (const candidate of report.candidates) {
    printVerbose(chalk.dim(`  ${describeCandidate(options.mode, source, candidate)}`));
  }

  let result: FitResult | Rectangle;
  if (options.mode === "crop") {
    result = fitCrop(source, catalog.entries, forcedRatio);
  } else if (options.mode === "rescale") {
    result = rescaleToClosestRatio(source, catalog.entries, forcedRatio);
  } else {
    result = matchResolution(source, catalog.entries);
  }
  report.result = result;

  if (catalog.entries.length === 0 && !forcedRatio) {
    printInfo(chalk.yellow("No candidates enabled; keeping the source dimensions."));
  }

  if (result.width === 0 || result.height === 0) {
    const message = `Source ${formatDimensions(source)} is smaller than one unit of the selected ratio.`;
    report.warnings.push({ code: "ZERO_SIZED_RESULT", message });
    printError(chalk.yellow(`Warning: ${message}`));
  }

  const label = isFitResult(result) ? formatFitResult(result) : formatDimensions(result);
  if (options.quiet && !options.json) {
    console.log(label);
  } else {
    printInfo(`\nResult: ${chalk.green(label)}\n`);
  }

  return { exitCode: 0, report };
}
