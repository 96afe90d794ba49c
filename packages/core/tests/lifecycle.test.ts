import { mkdtemp, rm, writeFile } from "fs/promises";
import { existsSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { Disposable, ScratchArea } from "../src/lifecycle";

describe("Disposable", () => {
  it("runs callbacks newest first", async () => {
    const order: string[] = [];
    const lifecycle = new Disposable();
    lifecycle.collect(() => {
      order.push("first");
    });
    lifecycle.collect(async () => {
      order.push("second");
    });

    await lifecycle.run();

    expect(order).toEqual(["second", "first"]);
    expect(lifecycle.pending).toBe(0);
  });

  it("runs each callback once even when run twice concurrently", async () => {
    let calls = 0;
    const lifecycle = new Disposable();
    lifecycle.collect(async () => {
      calls += 1;
    });

    await Promise.all([lifecycle.run(), lifecycle.run()]);

    expect(calls).toBe(1);
  });

  it("keeps going after a failing callback and rethrows the first error", async () => {
    const order: string[] = [];
    const lifecycle = new Disposable();
    lifecycle.collect(() => {
      order.push("oldest");
    });
    lifecycle.collect(() => {
      throw new Error("second failure");
    });
    lifecycle.collect(() => {
      throw new Error("first failure");
    });

    await expect(lifecycle.run()).rejects.toThrow("first failure");
    expect(order).toEqual(["oldest"]);
  });
});

describe("ScratchArea", () => {
  let tmpRoot: string;

  beforeEach(async () => {
    tmpRoot = await mkdtemp(join(tmpdir(), "clipgif-lifecycle-"));
  });

  afterEach(async () => {
    await rm(tmpRoot, { recursive: true, force: true });
  });

  it("creates a private directory and removes it with its contents", async () => {
    const scratch = await ScratchArea.create({ tmpRoot, prefix: "run-" });
    expect(scratch.root.startsWith(join(tmpRoot, "run-"))).toBe(true);
    expect(existsSync(scratch.root)).toBe(true);

    await writeFile(scratch.resolve("part1.mp4"), "data");
    await scratch.dispose();

    expect(existsSync(scratch.root)).toBe(false);
    expect(scratch.isDisposed).toBe(true);
  });

  it("resolves plain file names inside the root", async () => {
    const scratch = await ScratchArea.create({ tmpRoot });
    expect(scratch.resolve("merged.mp4")).toBe(join(scratch.root, "merged.mp4"));
    await scratch.dispose();
  });

  it("rejects names that leave the scratch area", async () => {
    const scratch = await ScratchArea.create({ tmpRoot });
    expect(() => scratch.resolve("../escape.gif")).toThrow('Invalid scratch file name "../escape.gif"');
    expect(() => scratch.resolve("..")).toThrow("Invalid scratch file name");
    expect(() => scratch.resolve("")).toThrow("Invalid scratch file name");
    await scratch.dispose();
  });

  it("refuses to resolve after disposal and tolerates a second dispose", async () => {
    const scratch = await ScratchArea.create({ tmpRoot });
    await scratch.dispose();
    await scratch.dispose();
    expect(() => scratch.resolve("raw.gif")).toThrow("has already been removed");
  });
});
