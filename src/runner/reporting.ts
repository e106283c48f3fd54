import type { FitResult, RatioSpec, Rectangle } from "../types.js";

export type FitMode = "crop" | "rescale" | "match";

export interface RerunCommandOptions {
  commandName: string;
  mode: FitMode;
  width: number;
  height: number;
  ratioPresets: readonly string[];
  resolutionPresets: readonly string[];
  customRatios: string;
  customResolutions: string;
  forcedRatio: RatioSpec | null;
}

function shellQuote(value: string): string {
  if (/^[A-Za-z0-9_.,/:-]+$/.test(value)) return value;
  return `"${value.replace(/(["\\$`])/g, "\\$1")}"`;
}

function presetArgument(keys: readonly string[]): string {
  return keys.length === 0 ? "none" : keys.join(",");
}

export function buildRerunCommand(options: RerunCommandOptions): string {
  const command: string[] = [
    options.commandName,
    options.mode,
    options.width.toString(),
    options.height.toString(),
  ];

  if (options.mode === "match") {
    command.push("--presets", presetArgument(options.resolutionPresets));
    if (options.customResolutions.trim() !== "") {
      command.push("--custom", options.customResolutions);
    }
    return command.map(shellQuote).join(" ");
  }

  if (options.forcedRatio) {
    command.push("--force", formatRatio(options.forcedRatio));
  } else {
    command.push("--presets", presetArgument(options.ratioPresets));
    if (options.customRatios.trim() !== "") {
      command.push("--custom", options.customRatios);
    }
  }

  return command.map(shellQuote).join(" ");
}

export function formatDimensions(rectangle: Rectangle): string {
  return `${rectangle.width.toString()}x${rectangle.height.toString()}`;
}

export function formatRatio(ratio: RatioSpec): string {
  return `${ratio.width.toString()}:${ratio.height.toString()}`;
}

export function formatFitResult(result: FitResult): string {
  return `${formatDimensions(result)} (${formatRatio({
    width: result.ratioWidth,
    height: result.ratioHeight,
  })})`;
}

export function formatPixelLoss(pixelLoss: number, source: Rectangle): string {
  const sourcePixels = source.width * source.height;
  const percent = sourcePixels > 0 ? (pixelLoss / sourcePixels) * 100 : 0;
  return `${pixelLoss.toString()}px (${percent.toFixed(1)}%)`;
}
