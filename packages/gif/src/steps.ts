import { writeFile } from "fs/promises";
import { copy } from "fs-extra";
import type { Artifact, ClipReference, GifPipelineConfig, ScratchArea } from "@clipgif/core";
import type { MediaToolRunner } from "./runner";
import {
  buildClipTranscodeJob,
  buildCompressionJob,
  buildConcatJob,
  buildGifEncodeJob,
  buildPaletteJob,
  formatConcatManifest,
} from "./tools";

/**
 * Shared inputs for every step. Each step consumes the artifact produced by the previous one and
 * returns the next, so any of them can be run on its own against a mock runner.
 */
export interface StepContext {
  config: GifPipelineConfig;
  scratch: ScratchArea;
  runner: MediaToolRunner;
}

export interface CompressionOutcome {
  artifact: Artifact<"final-gif">;
  compressed: boolean;
  error?: Error;
}

export async function transcodeClip(
  context: StepContext,
  clip: ClipReference,
  index: number
): Promise<Artifact<"clip-part">> {
  const path = context.scratch.resolve(`part${index + 1}.mp4`);
  await context.runner.transcode(buildClipTranscodeJob(clip, path, context.config));
  return { kind: "clip-part", path };
}

export async function writeConcatManifest(
  context: StepContext,
  parts: readonly Artifact<"clip-part">[]
): Promise<Artifact<"concat-manifest">> {
  const path = context.scratch.resolve("concat.txt");
  await writeFile(path, formatConcatManifest(parts.map((part) => part.path)), "utf-8");
  return { kind: "concat-manifest", path };
}

export async function concatenateParts(
  context: StepContext,
  manifest: Artifact<"concat-manifest">
): Promise<Artifact<"merged-clip">> {
  const path = context.scratch.resolve("merged.mp4");
  await context.runner.transcode(buildConcatJob(manifest.path, path));
  return { kind: "merged-clip", path };
}

export async function probeMergedDuration(
  context: StepContext,
  merged: Artifact<"merged-clip">
): Promise<number | undefined> {
  return context.runner.probeDuration(merged.path);
}

export async function generatePalette(
  context: StepContext,
  merged: Artifact<"merged-clip">
): Promise<Artifact<"palette">> {
  const path = context.scratch.resolve("palette.png");
  await context.runner.transcode(buildPaletteJob(merged.path, path, context.config));
  return { kind: "palette", path };
}

export async function encodeGif(
  context: StepContext,
  merged: Artifact<"merged-clip">,
  palette: Artifact<"palette">
): Promise<Artifact<"raw-gif">> {
  const path = context.scratch.resolve("raw.gif");
  await context.runner.transcode(buildGifEncodeJob(merged.path, palette.path, path, context.config));
  return { kind: "raw-gif", path };
}

/**
 * Lossy recompression of the raw GIF. A gifsicle failure is not fatal: the raw GIF is copied to the
 * output path unchanged instead. Only a failure of that copy propagates.
 */
export async function compressGif(context: StepContext, raw: Artifact<"raw-gif">): Promise<CompressionOutcome> {
  const output = context.config.output;
  const artifact: Artifact<"final-gif"> = { kind: "final-gif", path: output };
  try {
    await context.runner.compress(buildCompressionJob(raw.path, output, context.config));
    return { artifact, compressed: true };
  } catch (error) {
    await copy(raw.path, output, { overwrite: true });
    return {
      artifact,
      compressed: false,
      error: error instanceof Error ? error : new Error(String(error)),
    };
  }
}
