import { spawn, type ChildProcess, type SpawnOptionsWithoutStdio } from "child_process";
import { readFile } from "fs/promises";
import { basename } from "path";
import { outputFile } from "fs-extra";
import ffmpeg, { type FfprobeData } from "fluent-ffmpeg";
import { ffmpegArguments, gifsicleArguments, type FfmpegJob, type GifsicleJob, type MediaTool } from "./tools";

/**
 * Every external process the pipeline starts goes through this interface, so steps can be exercised
 * against {@link MockMediaToolRunner} without ffmpeg or gifsicle installed.
 */
export interface MediaToolRunner {
  isAvailable(tool: MediaTool): Promise<boolean>;
  transcode(job: FfmpegJob): Promise<void>;
  /** Duration in seconds of the first video stream, or undefined when ffprobe cannot tell. */
  probeDuration(path: string): Promise<number | undefined>;
  compress(job: GifsicleJob): Promise<void>;
}

export interface NodeMediaToolRunnerOptions {
  ffmpegPath?: string;
  ffprobePath?: string;
  gifsiclePath?: string;
  /** Consulted for `FFMPEG_PATH` and `FFPROBE_PATH`, as fluent-ffmpeg does; `process.env` by default. */
  env?: NodeJS.ProcessEnv;
}

type Kill = (signal: NodeJS.Signals) => void;

const VERSION_FLAGS: Record<MediaTool, string> = {
  ffmpeg: "-version",
  ffprobe: "-version",
  gifsicle: "--version",
};

export function extractDuration(data: FfprobeData): number | undefined {
  const video = data.streams.find((stream) => stream.codec_type === "video");
  for (const candidate of [video?.duration, data.format.duration]) {
    if (candidate === undefined || candidate === null) continue;
    const seconds = Number(candidate);
    if (Number.isFinite(seconds) && seconds > 0) {
      return seconds;
    }
  }
  return undefined;
}

interface RunCommandOptions extends SpawnOptionsWithoutStdio {
  /** Called once the child exists; the returned callback runs when it exits. */
  onSpawn?: (child: ChildProcess) => () => void;
}

async function runCommand(command: string, args: string[], options: RunCommandOptions = {}): Promise<void> {
  const { onSpawn, ...spawnOptions } = options;
  await new Promise<void>((resolvePromise, rejectPromise) => {
    const child = spawn(command, args, { ...spawnOptions, stdio: ["ignore", "ignore", "pipe"] });
    const release = onSpawn?.(child);
    let stderr = "";
    child.stderr?.on("data", (chunk: Buffer) => {
      stderr += chunk.toString();
    });
    child.on("error", (error) => {
      release?.();
      rejectPromise(error);
    });
    child.on("close", (code, signal) => {
      release?.();
      if (code === 0) {
        resolvePromise();
        return;
      }
      const detail = stderr.trim();
      const reason = signal ? `was killed by ${signal}` : `exited with code ${code}`;
      rejectPromise(new Error(`${command} ${args.join(" ")} ${reason}${detail ? `: ${detail}` : ""}`));
    });
  });
}

/**
 * Runs the real binaries: ffmpeg and ffprobe through fluent-ffmpeg, gifsicle and the version checks
 * through `spawn`. Every tool resolves to the same binary for the availability check and the actual
 * run, and children still running can be stopped with {@link NodeMediaToolRunner.killActive}.
 */
export class NodeMediaToolRunner implements MediaToolRunner {
  private readonly active = new Set<Kill>();

  constructor(private readonly options: NodeMediaToolRunnerOptions = {}) {}

  get activeCount(): number {
    return this.active.size;
  }

  async isAvailable(tool: MediaTool): Promise<boolean> {
    try {
      await runCommand(this.resolveBinary(tool), [VERSION_FLAGS[tool]]);
      return true;
    } catch {
      return false;
    }
  }

  async transcode(job: FfmpegJob): Promise<void> {
    await new Promise<void>((resolvePromise, rejectPromise) => {
      const command = ffmpeg().setFfmpegPath(this.resolveBinary("ffmpeg"));
      for (const input of job.inputs) {
        command.input(input.path);
        if (input.options && input.options.length > 0) {
          command.inputOptions(input.options);
        }
      }
      const release = this.track((signal) => command.kill(signal));
      command
        .outputOptions(job.outputOptions)
        .output(job.output)
        .on("end", () => {
          release();
          resolvePromise();
        })
        .on("error", (error: Error) => {
          release();
          rejectPromise(error);
        })
        .run();
    });
  }

  async probeDuration(path: string): Promise<number | undefined> {
    const data = await new Promise<FfprobeData>((resolvePromise, rejectPromise) => {
      ffmpeg(path)
        .setFfprobePath(this.resolveBinary("ffprobe"))
        .ffprobe((error: unknown, probed: FfprobeData) => {
          if (error) {
            rejectPromise(error instanceof Error ? error : new Error(String(error)));
            return;
          }
          resolvePromise(probed);
        });
    });
    return extractDuration(data);
  }

  async compress(job: GifsicleJob): Promise<void> {
    await runCommand(this.resolveBinary("gifsicle"), gifsicleArguments(job), {
      onSpawn: (child) => this.track((signal) => child.kill(signal)),
    });
  }

  /** Sends `signal` to every ffmpeg or gifsicle child still running and returns how many there were. */
  killActive(signal: NodeJS.Signals = "SIGTERM"): number {
    const kills = [...this.active];
    this.active.clear();
    for (const kill of kills) {
      kill(signal);
    }
    return kills.length;
  }

  resolveBinary(tool: MediaTool): string {
    const env = this.options.env ?? process.env;
    switch (tool) {
      case "ffmpeg":
        return this.options.ffmpegPath || env.FFMPEG_PATH || "ffmpeg";
      case "ffprobe":
        return this.options.ffprobePath || env.FFPROBE_PATH || "ffprobe";
      case "gifsicle":
        return this.options.gifsiclePath || "gifsicle";
    }
  }

  private track(kill: Kill): () => void {
    this.active.add(kill);
    return () => {
      this.active.delete(kill);
    };
  }
}

export type ToolInvocation =
  | { tool: "ffmpeg"; job: FfmpegJob }
  | { tool: "ffprobe"; path: string }
  | { tool: "gifsicle"; job: GifsicleJob };

type FailurePredicate = (invocation: ToolInvocation) => boolean;

/**
 * In-process stand-in for ffmpeg, ffprobe and gifsicle. Each job writes a small text file at its
 * output path so later steps find the artifacts they expect.
 */
export class MockMediaToolRunner implements MediaToolRunner {
  readonly invocations: ToolInvocation[] = [];
  readonly availabilityChecks: MediaTool[] = [];
  private readonly missing = new Set<MediaTool>();
  private readonly failures: FailurePredicate[] = [];
  private duration: number | undefined;

  setMissing(tool: MediaTool): this {
    this.missing.add(tool);
    return this;
  }

  failWhen(predicate: FailurePredicate): this {
    this.failures.push(predicate);
    return this;
  }

  setDuration(seconds: number | undefined): this {
    this.duration = seconds;
    return this;
  }

  get commands(): string[] {
    return this.invocations.map((invocation) => {
      switch (invocation.tool) {
        case "ffmpeg":
          return ["ffmpeg", ...ffmpegArguments(invocation.job)].join(" ");
        case "ffprobe":
          return `ffprobe ${invocation.path}`;
        case "gifsicle":
          return ["gifsicle", ...gifsicleArguments(invocation.job)].join(" ");
      }
    });
  }

  get ffmpegJobs(): FfmpegJob[] {
    return this.invocations.flatMap((invocation) => (invocation.tool === "ffmpeg" ? [invocation.job] : []));
  }

  async isAvailable(tool: MediaTool): Promise<boolean> {
    this.availabilityChecks.push(tool);
    return !this.missing.has(tool);
  }

  async transcode(job: FfmpegJob): Promise<void> {
    this.record({ tool: "ffmpeg", job });
    await outputFile(job.output, `ffmpeg:${basename(job.output)}\n`);
  }

  async probeDuration(path: string): Promise<number | undefined> {
    this.record({ tool: "ffprobe", path });
    return this.duration;
  }

  async compress(job: GifsicleJob): Promise<void> {
    this.record({ tool: "gifsicle", job });
    const raw = await readFile(job.input, "utf-8");
    await outputFile(job.output, `gifsicle:${job.options.join(" ")}\n${raw}`);
  }

  private record(invocation: ToolInvocation): void {
    this.invocations.push(invocation);
    if (this.failures.some((predicate) => predicate(invocation))) {
      throw new Error(`${invocation.tool} exited with code 1`);
    }
  }
}
