/**
 * Live capture of the container volume store.
 *
 * Containers keep running, so the archive is crash-consistent: what a power
 * loss would leave on disk, not a transaction-consistent application state.
 */

import { access } from "node:fs/promises";
import * as path from "node:path";
import type { CommandRunner, ContainerEngine } from "../../system/capabilities";
import type { CollectorOutput } from "../../types";
import { createTarball } from "../archive/tarball";
import { BaseCollector } from "./base";
import type { CollectorContext } from "./types";

export interface VolumeCollectorOptions {
  gzipLevel: number;
  timeoutMs?: number;
}

export const VOLUMES_ARCHIVE = "docker_volumes.tar.gz";

export class DockerVolumesCollector extends BaseCollector {
  readonly name = "docker-volumes";
  readonly phase = "docker";
  readonly category = "docker";
  readonly area = "docker";
  readonly spacePhase = "docker_volumes";
  readonly permissions: readonly string[];

  constructor(
    private readonly engine: ContainerEngine,
    private readonly runner: CommandRunner,
    private readonly options: VolumeCollectorOptions,
  ) {
    super();
    this.permissions = [engine.engineRoot];
  }

  isApplicable(): Promise<boolean> {
    return this.engine.isAvailable();
  }

  async produce(context: CollectorContext): Promise<CollectorOutput> {
    const store = this.engine.volumeStorePath;
    const exists = await access(store).then(
      () => true,
      () => false,
    );
    if (!exists) {
      throw this.fail(`Volume store not found: ${store}`);
    }

    this.log.info("Backing up Docker volumes (live backup - containers remain running)...");
    const file = path.join(context.outputDir, VOLUMES_ARCHIVE);
    try {
      await createTarball(this.runner, {
        cwd: store,
        entries: ["."],
        outputPath: file,
        gzipLevel: this.options.gzipLevel,
        timeoutMs: this.options.timeoutMs,
        live: true,
      });
    } catch (error) {
      throw this.fail("Could not back up Docker volumes", error);
    }

    return {
      artifacts: [
        { ...(await this.staged(context, file)), kind: "volume-store", storePath: store },
      ],
      omissions: [],
    };
  }
}
