/**
 * Final archive creation from the staging tree
 */

import { chmod, rm, stat, writeFile } from "node:fs/promises";
import * as path from "node:path";
import type { CommandRunner } from "../../system/capabilities";
import type { ArchiveResult, Manifest } from "../../types";
import { computeFileChecksum } from "../../utils/crypto";
import { formatBytes } from "../../utils/format";
import { logger } from "../../utils/logger";
import { UnrecoverableSetupError } from "../errors";
import { MANIFEST_FILE, renderManifest } from "./manifest";
import { createTarball } from "./tarball";

export interface ArchiveBuilderOptions {
  gzipLevel: number;
  timeoutMs?: number;
}

export class ArchiveBuilder {
  constructor(
    private readonly runner: CommandRunner,
    private readonly options: ArchiveBuilderOptions,
  ) {}

  /**
   * Write the manifest into the staging tree and archive the tree as
   * `<name>/` inside `archivePath`
   */
  async finalize(stagingPath: string, manifest: Manifest, archivePath: string): Promise<ArchiveResult> {
    logger.info("Creating compressed backup archive...");

    try {
      await writeFile(path.join(stagingPath, MANIFEST_FILE), renderManifest(manifest));

      await createTarball(this.runner, {
        cwd: path.dirname(stagingPath),
        entries: [path.basename(stagingPath)],
        outputPath: archivePath,
        gzipLevel: this.options.gzipLevel,
        timeoutMs: this.options.timeoutMs,
      });

      await chmod(archivePath, 0o644);
      const { size } = await stat(archivePath);
      const checksum = await computeFileChecksum(archivePath);

      logger.info(`Archive created: ${archivePath} (${formatBytes(size)})`);
      return { archivePath, sizeBytes: size, checksum };
    } catch (error) {
      await rm(archivePath, { force: true });
      throw new UnrecoverableSetupError(`Could not create archive ${archivePath}`, error);
    }
  }
}
