/**
 * Shared plumbing for collectors
 */

import { rm, stat } from "node:fs/promises";
import * as path from "node:path";
import type { DiskProbe } from "../../system/capabilities";
import { NodeDiskProbe } from "../../system/disk";
import type {
  ArtifactBase,
  ArtifactCategory,
  CollectorOutput,
  Omission,
  PhaseName,
  SpacePhase,
} from "../../types";
import { type ScopedLogger, scoped } from "../../utils/logger";
import { CollectorError, describeError } from "../errors";
import type { CollectorContext, ResourceCollector } from "./types";

const sizeProbe: DiskProbe = new NodeDiskProbe();

export abstract class BaseCollector implements ResourceCollector {
  abstract readonly name: string;
  abstract readonly phase: PhaseName;
  abstract readonly category: ArtifactCategory;
  abstract readonly area: string;
  abstract readonly spacePhase: SpacePhase;

  abstract produce(context: CollectorContext): Promise<CollectorOutput>;

  private scopedLog: ScopedLogger | null = null;

  protected get log(): ScopedLogger {
    this.scopedLog ??= scoped(this.name);
    return this.scopedLog;
  }

  /**
   * Common artifact fields for a file or directory written under the staging tree
   */
  protected async staged(
    context: CollectorContext,
    absolutePath: string,
    name: string = path.basename(absolutePath),
  ): Promise<ArtifactBase> {
    const stats = await stat(absolutePath);
    const sizeBytes = stats.isDirectory()
      ? await sizeProbe.directorySize(absolutePath)
      : stats.size;

    return {
      name,
      relativePath: path.relative(context.stagingPath, absolutePath),
      category: this.category,
      collector: this.name,
      sizeBytes,
    };
  }

  /**
   * Remove what a failed capture left behind
   */
  protected async discardPartial(file: string): Promise<void> {
    try {
      await rm(file, { force: true });
    } catch (error) {
      this.log.warn(`Could not remove ${file}: ${describeError(error)}`);
    }
  }

  protected omission(reason: unknown, subject?: string): Omission {
    const message = describeError(reason);
    this.log.warn(subject ? `Skipped ${subject}: ${message}` : `Skipped: ${message}`);
    return {
      collector: this.name,
      category: this.category,
      subject,
      reason: message,
    };
  }

  protected fail(message: string, cause?: unknown): CollectorError {
    return new CollectorError(this.name, this.category, message, cause);
  }
}
