import { describe, it, expect } from "vitest";
import { DEFAULT_GIF_CONFIG, resolveGifConfig } from "../src/config";
import { UsageError } from "../src/errors";

describe("resolveGifConfig", () => {
  it("applies the defaults", () => {
    expect(resolveGifConfig({ output: "demo.gif" })).toEqual({
      output: "demo.gif",
      width: 800,
      height: 338,
      fps: 8,
      colors: 128,
      lossy: 80,
    });
    expect(DEFAULT_GIF_CONFIG.height).toBe(338);
  });

  it("parses every flag value", () => {
    const config = resolveGifConfig({
      output: "out.gif",
      width: "640",
      height: "360",
      fps: "12.5",
      colors: "64",
      lossy: "0",
    });
    expect(config).toEqual({ output: "out.gif", width: 640, height: 360, fps: 12.5, colors: 64, lossy: 0 });
  });

  it("freezes the resolved config", () => {
    expect(Object.isFrozen(resolveGifConfig({ output: "demo.gif" }))).toBe(true);
  });

  it("requires an output path", () => {
    expect(() => resolveGifConfig({})).toThrow("Output GIF file is required (-o)");
    expect(() => resolveGifConfig({ output: "  " })).toThrow(UsageError);
  });

  it("rejects non-numeric values", () => {
    expect(() => resolveGifConfig({ output: "o.gif", width: "wide" })).toThrow('-w expects a number, received "wide"');
    expect(() => resolveGifConfig({ output: "o.gif", fps: "" })).toThrow('-f expects a number, received ""');
  });

  it("rejects odd or non-positive dimensions", () => {
    expect(() => resolveGifConfig({ output: "o.gif", width: "801" })).toThrow(
      "-w must be a positive even integer, received 801"
    );
    expect(() => resolveGifConfig({ output: "o.gif", height: "0" })).toThrow(UsageError);
  });

  it("enforces the color and lossy ranges", () => {
    expect(() => resolveGifConfig({ output: "o.gif", colors: "300" })).toThrow(
      "-c must be an integer between 4 and 256, received 300"
    );
    expect(() => resolveGifConfig({ output: "o.gif", lossy: "201" })).toThrow(
      "-l must be an integer between 0 and 200, received 201"
    );
    expect(resolveGifConfig({ output: "o.gif", lossy: "200", colors: "4" })).toMatchObject({ lossy: 200, colors: 4 });
  });

  it("rejects a zero frame rate", () => {
    expect(() => resolveGifConfig({ output: "o.gif", fps: "0" })).toThrow(
      "-f must be a number greater than 0, received 0"
    );
  });
});
