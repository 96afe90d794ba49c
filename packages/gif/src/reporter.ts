import type { GifPipeline } from "./pipeline";

const PREFIX = "[clipgif]";

export function formatDurationMs(durationMs: number): string {
  if (!Number.isFinite(durationMs) || durationMs < 0) {
    return "?";
  }
  if (durationMs < 1) {
    return `${durationMs.toFixed(2)}ms`;
  }
  if (durationMs < 1_000) {
    return `${durationMs.toFixed(0)}ms`;
  }
  if (durationMs < 60_000) {
    const seconds = durationMs / 1_000;
    return seconds < 10 ? `${seconds.toFixed(2)}s` : `${seconds.toFixed(1)}s`;
  }
  const minutes = durationMs / 60_000;
  return `${minutes.toFixed(2)}m`;
}

export function formatSizeKb(bytes: number): string {
  return `${Math.floor(bytes / 1024)} KB`;
}

/** Mirrors pipeline progress to the console. Returns a function that detaches the listeners. */
export function attachConsoleReporter(pipeline: GifPipeline): () => void {
  const onStart = ({ label }: { label: string }) => console.log(`${PREFIX} ▶ ${label}`);
  const onEnd = ({ label, elapsedMs }: { label: string; elapsedMs: number }) =>
    console.log(`${PREFIX} ✅ ${label} (${formatDurationMs(elapsedMs)})`);
  const onError = ({ label, elapsedMs, error }: { label: string; elapsedMs: number; error: Error }) =>
    console.error(`${PREFIX} ❌ ${label} (${formatDurationMs(elapsedMs)})`, error.message);
  const onDuration = ({ seconds }: { seconds: number }) =>
    console.log(`${PREFIX} Total duration: ${seconds.toFixed(2)}s`);
  const onFallback = ({ error }: { error: Error }) =>
    console.warn(`${PREFIX} gifsicle failed, keeping the uncompressed GIF.`, error.message);
  const onWarning = ({ message, error }: { message: string; error?: Error }) =>
    console.warn(`${PREFIX} ${message}`, ...(error ? [error.message] : []));

  pipeline.on("step:start", onStart);
  pipeline.on("step:end", onEnd);
  pipeline.on("step:error", onError);
  pipeline.on("duration", onDuration);
  pipeline.on("compression:fallback", onFallback);
  pipeline.on("warning", onWarning);

  return () => {
    pipeline.off("step:start", onStart);
    pipeline.off("step:end", onEnd);
    pipeline.off("step:error", onError);
    pipeline.off("duration", onDuration);
    pipeline.off("compression:fallback", onFallback);
    pipeline.off("warning", onWarning);
  };
}
