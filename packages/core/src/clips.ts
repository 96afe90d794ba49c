import type { ClipReference } from "./index";
import { UsageError } from "./errors";

const DEFAULT_SPEED = 1;

/**
 * Parses a `path[:speed]` token. The token is split on its last colon; a missing, empty or
 * non-numeric speed means the clip plays at its original speed.
 */
export function parseClipToken(token: string): ClipReference {
  const separator = token.lastIndexOf(":");
  const path = separator === -1 ? token : token.slice(0, separator);
  const speedToken = separator === -1 ? "" : token.slice(separator + 1);

  if (path.length === 0) {
    throw new UsageError(`Clip "${token}" has no file path`);
  }

  return { path, speed: parseSpeed(speedToken, token) };
}

export function parseClipTokens(tokens: readonly string[]): ClipReference[] {
  if (tokens.length === 0) {
    throw new UsageError("At least one video clip is required");
  }
  return tokens.map((token) => parseClipToken(token));
}

function parseSpeed(speedToken: string, token: string): number {
  const trimmed = speedToken.trim();
  if (trimmed.length === 0) {
    return DEFAULT_SPEED;
  }
  const speed = Number(trimmed);
  if (Number.isNaN(speed)) {
    return DEFAULT_SPEED;
  }
  if (!Number.isFinite(speed) || speed <= 0) {
    throw new UsageError(`Speed multiplier for "${token}" must be greater than 0, received "${speedToken}"`);
  }
  return speed;
}
