/**
 * Free-space and tree-size queries
 */

import type { Dirent } from "node:fs";
import { lstat, readdir, statfs } from "node:fs/promises";
import * as path from "node:path";
import { logger } from "../utils/logger";
import type { DiskProbe } from "./capabilities";

export class NodeDiskProbe implements DiskProbe {
  async freeBytes(target: string): Promise<number> {
    const stats = await statfs(target);
    return stats.bavail * stats.bsize;
  }

  async directorySize(root: string): Promise<number> {
    const rootStats = await lstat(root).catch(() => null);
    if (!rootStats) {
      return 0;
    }
    if (!rootStats.isDirectory()) {
      return rootStats.size;
    }

    let total = 0;
    const pending = [root];

    while (pending.length > 0) {
      const dir = pending.pop();
      if (dir === undefined) break;

      let entries: Dirent[];
      try {
        entries = await readdir(dir, { withFileTypes: true });
      } catch (error) {
        logger.debug(`Skipping unreadable directory ${dir}`, error);
        continue;
      }

      for (const entry of entries) {
        const full = path.join(dir, entry.name);
        if (entry.isDirectory()) {
          pending.push(full);
        } else if (entry.isFile()) {
          // Files can vanish between readdir and lstat on a live tree
          total += await lstat(full).then(
            (s) => s.size,
            () => 0,
          );
        }
      }
    }

    return total;
  }
}
