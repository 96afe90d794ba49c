export class ClipGifError extends Error {
  readonly exitCode: number = 1;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UsageError extends ClipGifError {}

export class MissingDependencyError extends ClipGifError {
  readonly tool: string;

  constructor(tool: string) {
    super(`${tool} is required but not installed.`);
    this.tool = tool;
  }
}

export class ClipNotFoundError extends ClipGifError {
  readonly path: string;

  constructor(path: string) {
    super(`Video file not found: ${path}`);
    this.path = path;
  }
}

/**
 * Raised when an external tool or file operation fails inside a pipeline step. The message carries
 * the step label so the failing stage is visible without a stack trace.
 */
export class PipelineStepError extends ClipGifError {
  readonly step: string;

  constructor(step: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`[${step}] ${detail}`, { cause });
    this.step = step;
  }
}
