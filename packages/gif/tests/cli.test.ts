import { mkdir, mkdtemp, readdir, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { parseCliArgs, runCli, usageText } from "../src/cli/program";
import { MockMediaToolRunner } from "../src/runner";

describe("parseCliArgs", () => {
  it("reads every flag and clip token", () => {
    const command = parseCliArgs([
      "-o",
      "out.gif",
      "-w",
      "640",
      "-h",
      "360",
      "-f",
      "10",
      "-c",
      "64",
      "-l",
      "120",
      "a.mov:2",
      "b.mov",
    ]);
    expect(command).toEqual({
      kind: "run",
      config: { output: "out.gif", width: 640, height: 360, fps: 10, colors: 64, lossy: 120 },
      clips: [
        { path: "a.mov", speed: 2 },
        { path: "b.mov", speed: 1 },
      ],
    });
  });

  it("accepts long flag names", () => {
    const command = parseCliArgs(["--output", "out.gif", "--fps", "12", "a.mov"]);
    expect(command).toMatchObject({ kind: "run", config: { output: "out.gif", fps: 12, width: 800 } });
  });

  it("uses -h for the height", () => {
    const command = parseCliArgs(["-o", "out.gif", "-h", "200", "a.mov"]);
    expect(command).toMatchObject({ config: { height: 200 } });
  });

  it("recognises --help", () => {
    expect(parseCliArgs(["--help"])).toEqual({ kind: "help" });
  });

  it("rejects unknown options", () => {
    expect(() => parseCliArgs(["-o", "out.gif", "-x", "a.mov"])).toThrow("Unknown option '-x'");
  });
});

describe("runCli", () => {
  let dir: string;
  let scratchRoot: string;
  let clip: string;

  const logged = () => vi.mocked(console.log).mock.calls.map((call) => call[0]);
  const errors = () => vi.mocked(console.error).mock.calls.map((call) => call[0]);

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "clipgif-cli-"));
    scratchRoot = join(dir, "scratch");
    await mkdir(scratchRoot);
    clip = join(dir, "clip.mov");
    await writeFile(clip, "clip");
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("prints the usage for --help", async () => {
    const code = await runCli(["--help"], { runner: new MockMediaToolRunner() });
    expect(code).toBe(0);
    expect(logged()).toEqual([usageText()]);
  });

  it("prints the usage when the output flag is missing", async () => {
    const code = await runCli([clip], { runner: new MockMediaToolRunner() });
    expect(code).toBe(1);
    expect(errors()).toEqual(["Error: Output GIF file is required (-o)", usageText()]);
  });

  it("prints the usage when no clips are given", async () => {
    const code = await runCli(["-o", join(dir, "out.gif")], { runner: new MockMediaToolRunner() });
    expect(code).toBe(1);
    expect(errors()).toEqual(["Error: At least one video clip is required", usageText()]);
  });

  it("converts the clips and reports the size", async () => {
    const output = join(dir, "out.gif");
    const code = await runCli(["-o", output, `${clip}:2`], {
      runner: new MockMediaToolRunner().setDuration(5),
      tmpRoot: scratchRoot,
    });

    expect(code).toBe(0);
    expect(logged().slice(0, 4)).toEqual([
      "=== Video to GIF Converter ===",
      `Output: ${output}`,
      "Resolution: 800x338",
      "FPS: 8, Colors: 128, Lossy: 80",
    ]);
    expect(logged().slice(-3)).toEqual(["=== Done ===", `Output: ${output}`, "Size: 0 KB"]);
    expect(logged()).toContain("[clipgif] Total duration: 5.00s");
    expect(logged()).toContain(`[clipgif] ▶ Processing ${clip} (speed: 2x)`);
    expect(await readdir(scratchRoot)).toEqual([]);
  });

  it("fails on a missing clip", async () => {
    const missing = join(dir, "nope.mov");
    const code = await runCli(["-o", join(dir, "out.gif"), missing], {
      runner: new MockMediaToolRunner(),
      tmpRoot: scratchRoot,
    });
    expect(code).toBe(1);
    expect(errors()).toEqual([`Error: Video file not found: ${missing}`]);
  });

  it("names the missing dependency", async () => {
    const code = await runCli(["-o", join(dir, "out.gif"), clip], {
      runner: new MockMediaToolRunner().setMissing("ffprobe"),
    });
    expect(code).toBe(1);
    expect(errors()).toEqual([
      "Error: ffprobe is required but not installed.",
      "Install ffmpeg and make sure ffprobe is on your PATH.",
    ]);
  });

  it("reports a failing step", async () => {
    const runner = new MockMediaToolRunner().failWhen(
      (invocation) => invocation.tool === "ffmpeg" && invocation.job.output.endsWith("merged.mp4")
    );
    const code = await runCli(["-o", join(dir, "out.gif"), clip], { runner, tmpRoot: scratchRoot });

    expect(code).toBe(1);
    expect(errors()).toContain("Error: [Merging videos] ffmpeg exited with code 1");
    expect(await readdir(scratchRoot)).toEqual([]);
  });
});
