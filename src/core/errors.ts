/**
 * Error taxonomy for backup runs.
 *
 * Only InsufficientSpaceError and UnrecoverableSetupError end a run; the
 * others are absorbed where they happen and surface in the manifest or log.
 */

import type { ArtifactCategory, SpacePhase } from "../types";
import { formatBytes } from "../utils/format";

export class InsufficientSpaceError extends Error {
  readonly phase: SpacePhase;
  readonly availableBytes: number;
  readonly projectedBytes: number;

  constructor(phase: SpacePhase, availableBytes: number, projectedBytes: number) {
    super(
      `Not enough space before phase "${phase}": available ${formatBytes(availableBytes)}, ` +
        `projected ${formatBytes(projectedBytes)}`,
    );
    this.name = "InsufficientSpaceError";
    this.phase = phase;
    this.availableBytes = availableBytes;
    this.projectedBytes = projectedBytes;
  }
}

export class CollectorError extends Error {
  readonly collector: string;
  readonly category: ArtifactCategory;

  constructor(collector: string, category: ArtifactCategory, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "CollectorError";
    this.collector = collector;
    this.category = category;
  }
}

export class PermissionRestoreError extends Error {
  readonly path: string;
  readonly mode: number;

  constructor(path: string, mode: number, cause?: unknown) {
    super(`Could not restore mode ${mode.toString(8)} on ${path}: ${describeError(cause)}`, {
      cause,
    });
    this.name = "PermissionRestoreError";
    this.path = path;
    this.mode = mode;
  }
}

export class UnrecoverableSetupError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "UnrecoverableSetupError";
  }
}

export type AbortError = InsufficientSpaceError | UnrecoverableSetupError;

export function isAbortError(error: unknown): error is AbortError {
  return error instanceof InsufficientSpaceError || error instanceof UnrecoverableSetupError;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
