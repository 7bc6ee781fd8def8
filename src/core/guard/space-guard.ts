/**
 * Per-phase free-space projection.
 *
 * projected = current staging size + phase estimate + safety margin, evaluated
 * fresh before every phase because each finished phase grows the staging tree.
 */

import type { ContainerEngine, DiskProbe } from "../../system/capabilities";
import type { SpaceEstimate, SpacePhase } from "../../types";
import { formatBytes } from "../../utils/format";
import { logger } from "../../utils/logger";
import { InsufficientSpaceError } from "../errors";

export interface SpaceGuardOptions {
  disk: DiskProbe;
  /** Needed for the docker_images estimate; absent means that estimate is 0 */
  engine?: ContainerEngine | null;
  /** Live volume store measured for the docker_volumes estimate */
  volumeStorePath: string;
  safetyMarginBytes: number;
  defaultPhaseBytes: number;
  /** Runs before InsufficientSpaceError is thrown: remove partial output, restore permissions */
  onAbort?: (estimate: SpaceEstimate) => Promise<void>;
}

export class SpaceGuard {
  constructor(private readonly options: SpaceGuardOptions) {}

  async estimate(phase: SpacePhase, stagingPath: string): Promise<SpaceEstimate> {
    const { disk, safetyMarginBytes } = this.options;

    const availableBytes = await disk.freeBytes(stagingPath);
    const stagingBytes = await disk.directorySize(stagingPath);
    const projectedAdditionalBytes = await this.phaseEstimate(phase, stagingBytes);

    return {
      phase,
      stagingBytes,
      projectedAdditionalBytes,
      safetyMarginBytes,
      projectedBytes: stagingBytes + projectedAdditionalBytes + safetyMarginBytes,
      availableBytes,
    };
  }

  /**
   * Abort the run when the phase's projection exceeds free space
   */
  async check(phase: SpacePhase, stagingPath: string): Promise<SpaceEstimate> {
    const estimate = await this.estimate(phase, stagingPath);

    if (estimate.projectedBytes > estimate.availableBytes) {
      logger.error(
        `Space check failed before "${phase}": available ${formatBytes(estimate.availableBytes)}, ` +
          `needed ${formatBytes(estimate.projectedBytes)}`,
      );
      if (this.options.onAbort) {
        await this.options.onAbort(estimate);
      }
      throw new InsufficientSpaceError(phase, estimate.availableBytes, estimate.projectedBytes);
    }

    logger.info(
      `Space check passed (${phase}): available ${formatBytes(estimate.availableBytes)}, ` +
        `estimated needed ${formatBytes(estimate.projectedBytes)}`,
    );
    return estimate;
  }

  private async phaseEstimate(phase: SpacePhase, stagingBytes: number): Promise<number> {
    switch (phase) {
      case "docker_volumes":
        return this.options.disk.directorySize(this.options.volumeStorePath);
      case "docker_images":
        return this.options.engine ? this.options.engine.imagesDiskUsage() : 0;
      case "compression":
        // uncompressed tree and compressed output coexist until the archive is done
        return stagingBytes * 2;
      default:
        return this.options.defaultPhaseBytes;
    }
  }
}
