/**
 * Transactional record of file mode changes made for read access.
 *
 * Every path is recorded once, before its first change, and restored once.
 */

import { chmod, stat } from "node:fs/promises";
import { logger } from "../../utils/logger";
import { PermissionRestoreError } from "../errors";

export interface PermissionRecord {
  path: string;
  /** Permission bits (mask 0o7777) as found before the first change */
  originalMode: number;
}

export interface FileModeOps {
  /** Current permission bits, or null when the path does not exist */
  readMode(path: string): Promise<number | null>;
  setMode(path: string, mode: number): Promise<void>;
}

export const nodeFileModeOps: FileModeOps = {
  async readMode(path) {
    const stats = await stat(path).catch(() => null);
    return stats ? stats.mode & 0o7777 : null;
  },
  setMode: (path, mode) => chmod(path, mode),
};

export interface RestoreReport {
  restored: string[];
  failures: PermissionRestoreError[];
}

/**
 * Parse an octal mode such as "755" or "0o755"
 */
export function parseMode(mode: string | number): number {
  if (typeof mode === "number") {
    return mode;
  }
  const digits = mode.replace(/^0o/, "");
  if (!/^[0-7]{3,4}$/.test(digits)) {
    throw new Error(`Invalid file mode: ${mode}`);
  }
  return Number.parseInt(digits, 8);
}

export class PermissionLedger {
  private readonly records = new Map<string, PermissionRecord>();

  constructor(private readonly ops: FileModeOps = nodeFileModeOps) {}

  /**
   * Record `path`'s mode and apply `desiredMode`. A path already held is
   * left alone; missing paths are ignored; a refused chmod is logged, not thrown.
   */
  async acquire(path: string, desiredMode: string | number): Promise<void> {
    const mode = parseMode(desiredMode);

    if (this.records.has(path)) {
      return;
    }

    const current = await this.ops.readMode(path).catch((error: unknown) => {
      logger.warn(`Could not read mode of ${path}`, error);
      return null;
    });
    if (current === null) {
      return;
    }
    this.records.set(path, { path, originalMode: current });

    try {
      await this.ops.setMode(path, mode);
      logger.debug(`Mode of ${path} set to ${mode.toString(8)}`);
    } catch (error) {
      logger.warn(`Could not change mode of ${path} to ${mode.toString(8)}`, error);
    }
  }

  /**
   * Reapply every recorded mode in acquisition order, then forget them.
   */
  async restoreAll(): Promise<RestoreReport> {
    const report: RestoreReport = { restored: [], failures: [] };

    if (this.records.size > 0) {
      logger.info("Restoring original permissions...");
    }

    for (const record of this.records.values()) {
      try {
        await this.ops.setMode(record.path, record.originalMode);
        report.restored.push(record.path);
      } catch (cause) {
        const failure = new PermissionRestoreError(record.path, record.originalMode, cause);
        logger.warn(failure.message);
        report.failures.push(failure);
      }
    }

    this.records.clear();
    return report;
  }

  entries(): PermissionRecord[] {
    return [...this.records.values()];
  }

  get size(): number {
    return this.records.size;
  }
}
