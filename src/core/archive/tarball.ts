/**
 * gzip-compressed tar creation through the system tar
 */

import { rm } from "node:fs/promises";
import * as path from "node:path";
import type { CommandRunner } from "../../system/capabilities";

export interface TarballOptions {
  /** Directory the entries are relative to */
  cwd: string;
  entries: string[];
  outputPath: string;
  gzipLevel: number;
  timeoutMs?: number;
  /**
   * The tree is being written to while it is read. GNU tar exits 1 when a
   * file changed during reading; for live trees that is the expected
   * crash-consistent outcome, not a failure.
   */
  live?: boolean;
  mode?: number;
}

export async function createTarball(runner: CommandRunner, options: TarballOptions): Promise<void> {
  const args = ["-cf", "-", "-C", options.cwd];
  if (options.live) {
    args.push("--warning=no-file-changed", "--ignore-failed-read");
  }
  args.push("--", ...options.entries);

  const result = await runner.runToFile("tar", args, options.outputPath, {
    gzipLevel: options.gzipLevel,
    timeoutMs: options.timeoutMs,
    mode: options.mode,
  });

  const acceptable =
    result.success ||
    (options.live === true && result.exitCode === 1 && !result.timedOut && result.writeFailed !== true);

  if (!acceptable) {
    await rm(options.outputPath, { force: true });
    throw new Error(
      `tar of ${options.entries.join(", ")} in ${options.cwd} failed: ` +
        (result.stderr || `exit ${result.exitCode}`),
    );
  }
}

/**
 * Archive a single file or directory so that extracting the result into its
 * parent directory recreates it
 */
export function archiveTree(
  runner: CommandRunner,
  sourcePath: string,
  outputPath: string,
  options: Pick<TarballOptions, "gzipLevel" | "timeoutMs" | "live">,
): Promise<void> {
  return createTarball(runner, {
    ...options,
    cwd: path.dirname(sourcePath),
    entries: [path.basename(sourcePath)],
    outputPath,
  });
}
