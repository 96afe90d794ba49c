import { parseArgs } from "util";
import {
  ClipGifError,
  DEFAULT_GIF_CONFIG,
  MissingDependencyError,
  UsageError,
  parseClipTokens,
  resolveGifConfig,
  type ClipReference,
  type Disposable,
  type GifPipelineConfig,
} from "@clipgif/core";
import { GifPipeline } from "../pipeline";
import { attachConsoleReporter, formatSizeKb } from "../reporter";
import type { MediaToolRunner } from "../runner";

export type CliCommand = { kind: "help" } | { kind: "run"; config: GifPipelineConfig; clips: ClipReference[] };

export interface CliDependencies {
  runner: MediaToolRunner;
  lifecycle?: Disposable;
  tmpRoot?: string;
  program?: string;
}

export function usageText(program = "clipgif"): string {
  return [
    `Usage: ${program} -o output.gif [options] video1:speed1 video2:speed2 ...`,
    "",
    "Options:",
    "  -o FILE    Output GIF file (required)",
    `  -w WIDTH   Output width (default: ${DEFAULT_GIF_CONFIG.width})`,
    `  -h HEIGHT  Output height (default: ${DEFAULT_GIF_CONFIG.height})`,
    `  -f FPS     Frames per second (default: ${DEFAULT_GIF_CONFIG.fps})`,
    `  -c COLORS  Max colors for GIF (default: ${DEFAULT_GIF_CONFIG.colors})`,
    `  -l LOSSY   Lossy compression level 0-200 (default: ${DEFAULT_GIF_CONFIG.lossy})`,
    "  --help     Show this message",
    "",
    "Video format: path/to/video.mov:speed_multiplier",
    "  speed_multiplier: 1 = original speed, 2 = 2x faster, 0.5 = half speed",
    "",
    "Example:",
    `  ${program} -o demo.gif -w 800 -h 338 first.mov:2 second.mov:4.75 third.mov:4.75`,
  ].join("\n");
}

function readArgs(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      options: {
        output: { type: "string", short: "o" },
        width: { type: "string", short: "w" },
        height: { type: "string", short: "h" },
        fps: { type: "string", short: "f" },
        colors: { type: "string", short: "c" },
        lossy: { type: "string", short: "l" },
        help: { type: "boolean" },
      },
      allowPositionals: true,
      strict: true,
    });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

export function parseCliArgs(argv: readonly string[]): CliCommand {
  const { values, positionals } = readArgs(argv);
  if (values.help) {
    return { kind: "help" };
  }
  const config = resolveGifConfig({
    output: values.output,
    width: values.width,
    height: values.height,
    fps: values.fps,
    colors: values.colors,
    lossy: values.lossy,
  });
  return { kind: "run", config, clips: parseClipTokens(positionals) };
}

function dependencyHint(error: MissingDependencyError): string {
  const pkg = error.tool === "gifsicle" ? "gifsicle" : "ffmpeg";
  return `Install ${pkg} and make sure ${error.tool} is on your PATH.`;
}

/** Runs the CLI end to end and resolves to the process exit code. */
export async function runCli(argv: readonly string[], dependencies: CliDependencies): Promise<number> {
  const program = dependencies.program ?? "clipgif";
  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`Error: ${error.message}`);
      console.error(usageText(program));
      return error.exitCode;
    }
    throw error;
  }

  if (command.kind === "help") {
    console.log(usageText(program));
    return 0;
  }

  const { config, clips } = command;
  console.log("=== Video to GIF Converter ===");
  console.log(`Output: ${config.output}`);
  console.log(`Resolution: ${config.width}x${config.height}`);
  console.log(`FPS: ${config.fps}, Colors: ${config.colors}, Lossy: ${config.lossy}`);

  const pipeline = new GifPipeline({
    config,
    runner: dependencies.runner,
    lifecycle: dependencies.lifecycle,
    tmpRoot: dependencies.tmpRoot,
  });
  const detach = attachConsoleReporter(pipeline);
  try {
    const result = await pipeline.run(clips);
    console.log("=== Done ===");
    console.log(`Output: ${result.output}`);
    console.log(`Size: ${formatSizeKb(result.sizeBytes)}`);
    return 0;
  } catch (error) {
    if (error instanceof MissingDependencyError) {
      console.error(`Error: ${error.message}`);
      console.error(dependencyHint(error));
      return error.exitCode;
    }
    if (error instanceof ClipGifError) {
      console.error(`Error: ${error.message}`);
      return error.exitCode;
    }
    console.error("clipgif failed", error);
    return 1;
  } finally {
    detach();
  }
}
