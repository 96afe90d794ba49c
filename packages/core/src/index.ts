/**
 * Core types shared by the clipgif packages. The pipeline runner reports progress through the
 * {@link GifPipelineEvents} map so reporters stay decoupled from the steps themselves.
 */
export interface ClipReference {
  path: string;
  /** 1 = original speed, 2 = twice as fast, 0.5 = half speed. */
  speed: number;
}

export interface GifPipelineConfig {
  readonly output: string;
  readonly width: number;
  readonly height: number;
  readonly fps: number;
  readonly colors: number;
  readonly lossy: number;
}

export type ArtifactKind = "clip-part" | "concat-manifest" | "merged-clip" | "palette" | "raw-gif" | "final-gif";

export interface Artifact<K extends ArtifactKind = ArtifactKind> {
  kind: K;
  path: string;
}

export interface StepStartEvent {
  label: string;
}

export interface StepEndEvent {
  label: string;
  elapsedMs: number;
}

export interface StepErrorEvent extends StepEndEvent {
  error: Error;
}

export interface PipelineWarning {
  message: string;
  error?: Error;
}

export type GifPipelineEvents = {
  "step:start": [event: StepStartEvent];
  "step:end": [event: StepEndEvent];
  "step:error": [event: StepErrorEvent];
  duration: [event: { seconds: number }];
  "compression:fallback": [event: { error: Error }];
  warning: [event: PipelineWarning];
};

export interface GifPipelineResult {
  output: string;
  sizeBytes: number;
  durationSeconds?: number;
  /** false when the lossy pass failed and the uncompressed GIF was kept. */
  compressed: boolean;
  clips: ClipReference[];
}

export * from "./clips";
export * from "./config";
export * from "./errors";
export * from "./lifecycle";
