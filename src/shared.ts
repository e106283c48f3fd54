import type { RatioSpec } from "./types.js";

export const MIN_DIMENSION = 1;
export const MAX_DIMENSION = 8192;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isPositiveInteger(value: number): boolean {
  return Number.isSafeInteger(value) && value > 0;
}

export function isForcedRatio(forced: RatioSpec | null | undefined): forced is RatioSpec {
  return !!forced && isPositiveInteger(forced.width) && isPositiveInteger(forced.height);
}
