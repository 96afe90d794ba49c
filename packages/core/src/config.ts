import type { GifPipelineConfig } from "./index";
import { UsageError } from "./errors";

export const DEFAULT_GIF_CONFIG = {
  /** Canvas width in pixels; clips are scaled to fit and padded with black. */
  width: 800,
  height: 338,
  fps: 8,
  /** Upper bound for both the ffmpeg palette and the gifsicle pass. */
  colors: 128,
  /** gifsicle --lossy strength, 0-200. */
  lossy: 80,
} as const;

export const MIN_COLORS = 4;
export const MAX_COLORS = 256;
export const MAX_LOSSY = 200;

export interface RawGifConfig {
  output?: string;
  width?: string;
  height?: string;
  fps?: string;
  colors?: string;
  lossy?: string;
}

export function resolveGifConfig(raw: RawGifConfig): GifPipelineConfig {
  const output = raw.output?.trim();
  if (!output) {
    throw new UsageError("Output GIF file is required (-o)");
  }

  const config: GifPipelineConfig = {
    output,
    width: parseDimension("-w", raw.width, DEFAULT_GIF_CONFIG.width),
    height: parseDimension("-h", raw.height, DEFAULT_GIF_CONFIG.height),
    fps: parseFps(raw.fps),
    colors: parseIntegerInRange("-c", raw.colors, DEFAULT_GIF_CONFIG.colors, MIN_COLORS, MAX_COLORS),
    lossy: parseIntegerInRange("-l", raw.lossy, DEFAULT_GIF_CONFIG.lossy, 0, MAX_LOSSY),
  };
  return Object.freeze(config);
}

export function assertDimension(flag: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0 || value % 2 !== 0) {
    throw new UsageError(`${flag} must be a positive even integer, received ${value}`);
  }
}

export function assertFps(value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new UsageError(`-f must be a number greater than 0, received ${value}`);
  }
}

export function assertIntegerInRange(flag: string, value: number, min: number, max: number): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new UsageError(`${flag} must be an integer between ${min} and ${max}, received ${value}`);
  }
}

function toNumber(flag: string, raw: string): number {
  const trimmed = raw.trim();
  const value = trimmed.length === 0 ? Number.NaN : Number(trimmed);
  if (Number.isNaN(value)) {
    throw new UsageError(`${flag} expects a number, received "${raw}"`);
  }
  return value;
}

function parseDimension(flag: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined) {
    return fallback;
  }
  const value = toNumber(flag, raw);
  assertDimension(flag, value);
  return value;
}

function parseFps(raw: string | undefined): number {
  if (raw === undefined) {
    return DEFAULT_GIF_CONFIG.fps;
  }
  const value = toNumber("-f", raw);
  assertFps(value);
  return value;
}

function parseIntegerInRange(
  flag: string,
  raw: string | undefined,
  fallback: number,
  min: number,
  max: number
): number {
  if (raw === undefined) {
    return fallback;
  }
  const value = toNumber(flag, raw);
  assertIntegerInRange(flag, value, min, max);
  return value;
}
