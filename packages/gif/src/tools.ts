import {
  assertDimension,
  assertFps,
  assertIntegerInRange,
  MAX_COLORS,
  MAX_LOSSY,
  MIN_COLORS,
  UsageError,
  type ClipReference,
  type GifPipelineConfig,
} from "@clipgif/core";

export type MediaTool = "ffmpeg" | "ffprobe" | "gifsicle";

export const REQUIRED_TOOLS: readonly MediaTool[] = ["ffmpeg", "ffprobe", "gifsicle"];

export interface FfmpegInput {
  path: string;
  /** Options placed before this input's `-i`. */
  options?: string[];
}

export interface FfmpegJob {
  inputs: FfmpegInput[];
  outputOptions: string[];
  output: string;
}

export interface GifsicleJob {
  input: string;
  output: string;
  options: string[];
}

const PART_CODEC = "libx264";
const PART_CRF = 18;
const BAYER_SCALE = 3;

function assertSpeed(speed: number): void {
  if (!Number.isFinite(speed) || speed <= 0) {
    throw new UsageError(`Speed multiplier must be greater than 0, received ${speed}`);
  }
}

function assertPath(label: string, path: string): void {
  if (path.length === 0) {
    throw new UsageError(`${label} path must not be empty`);
  }
}

/**
 * Fits the clip inside the canvas without distortion, then pads the remainder with black so every
 * part has exactly the same dimensions.
 */
export function scaleAndPadFilter(width: number, height: number): string {
  assertDimension("-w", width);
  assertDimension("-h", height);
  return [
    `scale=${width}:${height}:force_original_aspect_ratio=decrease`,
    `pad=${width}:${height}:(ow-iw)/2:(oh-ih)/2:black`,
  ].join(",");
}

export function retimeFilter(speed: number): string {
  assertSpeed(speed);
  return `setpts=PTS/${speed}`;
}

export function buildClipTranscodeJob(clip: ClipReference, output: string, config: GifPipelineConfig): FfmpegJob {
  assertPath("Clip", clip.path);
  assertPath("Part", output);
  const filter = [scaleAndPadFilter(config.width, config.height), retimeFilter(clip.speed)].join(",");
  return {
    inputs: [{ path: clip.path }],
    outputOptions: ["-vf", filter, "-c:v", PART_CODEC, "-crf", PART_CRF.toString(), "-an", "-y"],
    output,
  };
}

/**
 * Renders the concat demuxer list. Paths are single-quoted, with embedded quotes closed, escaped and
 * reopened the way ffmpeg's own quoting rules expect.
 */
export function formatConcatManifest(paths: readonly string[]): string {
  if (paths.length === 0) {
    throw new UsageError("Concat manifest needs at least one part");
  }
  return paths.map((path) => `file '${path.replace(/'/g, "'\\''")}'\n`).join("");
}

export function buildConcatJob(manifest: string, output: string): FfmpegJob {
  assertPath("Manifest", manifest);
  assertPath("Merged clip", output);
  return {
    inputs: [{ path: manifest, options: ["-f", "concat", "-safe", "0"] }],
    outputOptions: ["-c", "copy", "-y"],
    output,
  };
}

export function buildPaletteJob(merged: string, palette: string, config: GifPipelineConfig): FfmpegJob {
  assertFps(config.fps);
  assertIntegerInRange("-c", config.colors, MIN_COLORS, MAX_COLORS);
  return {
    inputs: [{ path: merged }],
    outputOptions: ["-vf", `fps=${config.fps},palettegen=max_colors=${config.colors}`, "-y"],
    output: palette,
  };
}

export function buildGifEncodeJob(
  merged: string,
  palette: string,
  output: string,
  config: GifPipelineConfig
): FfmpegJob {
  assertFps(config.fps);
  return {
    inputs: [{ path: merged }, { path: palette }],
    outputOptions: [
      "-filter_complex",
      `fps=${config.fps}[v];[v][1:v]paletteuse=dither=bayer:bayer_scale=${BAYER_SCALE}`,
      "-y",
    ],
    output,
  };
}

export function buildCompressionJob(input: string, output: string, config: GifPipelineConfig): GifsicleJob {
  assertPath("Raw GIF", input);
  assertPath("Output", output);
  assertIntegerInRange("-c", config.colors, MIN_COLORS, MAX_COLORS);
  assertIntegerInRange("-l", config.lossy, 0, MAX_LOSSY);
  return {
    input,
    output,
    options: ["-O3", "--colors", config.colors.toString(), `--lossy=${config.lossy}`],
  };
}

export function gifsicleArguments(job: GifsicleJob): string[] {
  return [...job.options, job.input, "-o", job.output];
}

/** Flattens a job into the argument list ffmpeg receives, mainly for logs and assertions. */
export function ffmpegArguments(job: FfmpegJob): string[] {
  const args: string[] = [];
  for (const input of job.inputs) {
    args.push(...(input.options ?? []), "-i", input.path);
  }
  return [...args, ...job.outputOptions, job.output];
}
