import { constants } from "fs";
import { access, stat } from "fs/promises";
import EventEmitter from "eventemitter3";
import {
  ClipNotFoundError,
  Disposable,
  MissingDependencyError,
  PipelineStepError,
  ScratchArea,
  UsageError,
  type Artifact,
  type ClipReference,
  type GifPipelineConfig,
  type GifPipelineEvents,
  type GifPipelineResult,
} from "@clipgif/core";
import type { MediaToolRunner } from "./runner";
import {
  compressGif,
  concatenateParts,
  encodeGif,
  generatePalette,
  probeMergedDuration,
  transcodeClip,
  writeConcatManifest,
  type StepContext,
} from "./steps";
import { REQUIRED_TOOLS } from "./tools";

export interface GifPipelineOptions {
  config: GifPipelineConfig;
  runner: MediaToolRunner;
  /** Owner of the scratch area; pass one in to release it from a signal handler. */
  lifecycle?: Disposable;
  /** Parent directory for the scratch area, the OS temp dir by default. */
  tmpRoot?: string;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

async function isReadableFile(path: string): Promise<boolean> {
  try {
    if (!(await stat(path)).isFile()) {
      return false;
    }
    await access(path, constants.R_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Runs the clip-to-GIF steps in order: transcode each clip, concatenate, build a palette, encode and
 * recompress. Anything but the final recompression aborts the run; the scratch area is removed on
 * every exit path.
 */
export class GifPipeline extends EventEmitter<GifPipelineEvents> {
  readonly config: GifPipelineConfig;
  private readonly runner: MediaToolRunner;
  private readonly lifecycle: Disposable;
  private readonly tmpRoot?: string;

  constructor(options: GifPipelineOptions) {
    super();
    this.config = options.config;
    this.runner = options.runner;
    this.lifecycle = options.lifecycle ?? new Disposable();
    this.tmpRoot = options.tmpRoot;
  }

  async run(clips: readonly ClipReference[]): Promise<GifPipelineResult> {
    if (clips.length === 0) {
      throw new UsageError("At least one video clip is required");
    }
    await this.ensureDependencies();
    await this.ensureClipsExist(clips);

    // Registered before mkdtemp settles, so an interrupt during creation still removes the directory.
    const creating = ScratchArea.create({ tmpRoot: this.tmpRoot });
    this.lifecycle.collect(async () => (await creating).dispose());
    try {
      const scratch = await creating;
      return await this.process(clips, { config: this.config, scratch, runner: this.runner });
    } finally {
      await this.lifecycle.run();
    }
  }

  async ensureDependencies(): Promise<void> {
    for (const tool of REQUIRED_TOOLS) {
      if (!(await this.runner.isAvailable(tool))) {
        throw new MissingDependencyError(tool);
      }
    }
  }

  /** Every clip must be a readable regular file; nothing runs until all of them are. */
  async ensureClipsExist(clips: readonly ClipReference[]): Promise<void> {
    for (const clip of clips) {
      if (!(await isReadableFile(clip.path))) {
        throw new ClipNotFoundError(clip.path);
      }
    }
  }

  private async process(clips: readonly ClipReference[], context: StepContext): Promise<GifPipelineResult> {
    const parts: Artifact<"clip-part">[] = [];
    for (const [index, clip] of clips.entries()) {
      parts.push(
        await this.withStep(`Processing ${clip.path} (speed: ${clip.speed}x)`, () =>
          transcodeClip(context, clip, index)
        )
      );
    }

    const merged = await this.withStep("Merging videos", async () => {
      const manifest = await writeConcatManifest(context, parts);
      return concatenateParts(context, manifest);
    });

    const durationSeconds = await this.probeDuration(context, merged);

    const palette = await this.withStep("Generating palette", () => generatePalette(context, merged));
    const raw = await this.withStep("Generating GIF", () => encodeGif(context, merged, palette));
    const outcome = await this.withStep("Compressing GIF", () => compressGif(context, raw));
    if (outcome.error) {
      this.emit("compression:fallback", { error: outcome.error });
    }

    const info = await this.withStep("Reading output size", () => stat(outcome.artifact.path));
    return {
      output: outcome.artifact.path,
      sizeBytes: info.size,
      durationSeconds,
      compressed: outcome.compressed,
      clips: [...clips],
    };
  }

  /** Informational only: a probe failure becomes a warning and the run carries on. */
  private async probeDuration(context: StepContext, merged: Artifact<"merged-clip">): Promise<number | undefined> {
    try {
      const seconds = await probeMergedDuration(context, merged);
      if (seconds === undefined) {
        this.emit("warning", { message: "Could not determine merged duration" });
      } else {
        this.emit("duration", { seconds });
      }
      return seconds;
    } catch (error) {
      this.emit("warning", { message: "Duration probe failed", error: toError(error) });
      return undefined;
    }
  }

  private async withStep<T>(label: string, action: () => Promise<T>): Promise<T> {
    const start = process.hrtime.bigint();
    this.emit("step:start", { label });
    try {
      const result = await action();
      const elapsedMs = Number(process.hrtime.bigint() - start) / 1_000_000;
      this.emit("step:end", { label, elapsedMs });
      return result;
    } catch (error) {
      const elapsedMs = Number(process.hrtime.bigint() - start) / 1_000_000;
      const enriched = error instanceof PipelineStepError ? error : new PipelineStepError(label, error);
      this.emit("step:error", { label, elapsedMs, error: enriched });
      throw enriched;
    }
  }
}
