import { Command } from "commander";
import chalk from "chalk";
import * as fs from "fs";
import * as path from "path";
import { fileURLToPath } from "node:url";
import { listRatioPresets, listResolutionPresets } from "./catalog.js";
import { resolveRunOptions, type CliFlags } from "./cliOptions.js";
import { ConfigError, loadConfig, type AspectfitConfig } from "./config.js";
import {
  createErrorReport,
  runAspectfit,
  type FitMode,
  type RunResult,
  type RunnerError,
} from "./runner.js";
import { isRecord } from "./shared.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export interface ProgramOptions {
  /** Directory searched for config files. Defaults to `process.cwd()` at run time. */
  cwd?: string;
}

function readPackageVersion(): string {
  const pkg: unknown = JSON.parse(
    fs.readFileSync(path.join(__dirname, "../package.json"), "utf-8")
  );
  return isRecord(pkg) && typeof pkg.version === "string" ? pkg.version : "0.0.0";
}

function failRun(mode: FitMode, errors: RunnerError[], json: boolean): RunResult {
  if (!json) {
    for (const error of errors) {
      console.error(chalk.red(error.message));
    }
  }
  return { exitCode: 1, report: createErrorReport(mode, errors) };
}

function runFromFlags(
  version: string,
  mode: FitMode,
  width: string,
  height: string,
  flags: CliFlags,
  cwd: string
): { json: boolean; result: RunResult } {
  let config: AspectfitConfig;
  try {
    config = loadConfig(cwd, flags.config).config;
  } catch (err) {
    if (!(err instanceof ConfigError)) {
      throw err;
    }
    const json = flags.json ?? false;
    return { json, result: failRun(mode, [{ code: "CONFIG_ERROR", message: err.message }], json) };
  }

  const resolved = resolveRunOptions({
    version,
    commandName: "aspectfit",
    mode,
    width,
    height,
    flags,
    config,
  });
  if (!resolved.ok) {
    const json = flags.json ?? config.json ?? false;
    return { json, result: failRun(mode, resolved.errors, json) };
  }

  return { json: resolved.options.json, result: runAspectfit(resolved.options) };
}

/**
 * Builds the `aspectfit` command line. Commander errors are thrown as
 * `CommanderError` instead of exiting the process.
 */
export function createProgram(options: ProgramOptions = {}): Command {
  const version = readPackageVersion();

  const runMode = (mode: FitMode) => {
    return (width: string, height: string, _options: CliFlags, command: Command) => {
      const flags = command.optsWithGlobals<CliFlags>();
      const { json, result } = runFromFlags(
        version,
        mode,
        width,
        height,
        flags,
        options.cwd ?? process.cwd()
      );
      if (json) {
        console.log(JSON.stringify(result.report, null, 2));
      }
      process.exitCode = result.exitCode;
    };
  };

  const program = new Command();

  // Set before the subcommands are added so they inherit it.
  program.exitOverride();

  program
    .name("aspectfit")
    .description("Pick crop and resize dimensions that fit an aspect ratio or resolution preset")
    .version(version)
    .option("-c, --config <path>", "Config file (default: aspectfit.config.json)")
    .option("--json", "Print the run report as JSON")
    .option("--verbose", "Show every evaluated candidate")
    .option("--quiet", "Print only the result");

  program
    .command("crop")
    .description("Largest crop made of whole units of the ratio that loses the fewest pixels")
    .argument("<width>", "Source width in pixels")
    .argument("<height>", "Source height in pixels")
    .option(
      "-p, --presets <keys>",
      `Ratio presets (comma-separated, "all" or "none"): ${listRatioPresets().join(", ")}`
    )
    .option("--custom <ratios>", "Extra ratios, e.g. 21:9,32:9")
    .option("--force <ratio>", "Fit to this ratio and skip the search, e.g. 16:9")
    .action(runMode("crop"));

  program
    .command("rescale")
    .description("Shrink one side to the closest ratio")
    .argument("<width>", "Source width in pixels")
    .argument("<height>", "Source height in pixels")
    .option(
      "-p, --presets <keys>",
      `Ratio presets (comma-separated, "all" or "none"): ${listRatioPresets().join(", ")}`
    )
    .option("--custom <ratios>", "Extra ratios, e.g. 21:9,32:9")
    .option("--force <ratio>", "Rescale to this ratio and skip the search, e.g. 16:9")
    .action(runMode("rescale"));

  program
    .command("match")
    .description("Closest preset resolution with exactly the same aspect ratio")
    .argument("<width>", "Source width in pixels")
    .argument("<height>", "Source height in pixels")
    .option(
      "-p, --presets <keys>",
      `Resolution presets (comma-separated, "all" or "none"): ${listResolutionPresets().join(", ")}`
    )
    .option("--custom <resolutions>", "Extra resolutions, e.g. 1920x1080,1280x720")
    .action(runMode("match"));

  return program;
}
