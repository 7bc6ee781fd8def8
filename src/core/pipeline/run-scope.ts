/**
 * Single exit path of a run.
 *
 * Outputs the run created are registered with `own()`; `abort()` removes them
 * and `release()` hands every loosened file mode back. Both happen at most once
 * however many abort routes reach them.
 */

import { rm } from "node:fs/promises";
import { logger } from "../../utils/logger";
import type { PermissionLedger, RestoreReport } from "../ledger/permission-ledger";

export class RunScope {
  private readonly owned: string[] = [];
  private discarding: Promise<void> | null = null;
  private releasing: Promise<RestoreReport> | null = null;

  constructor(private readonly ledger: PermissionLedger) {}

  own(path: string): void {
    this.owned.push(path);
  }

  /**
   * Remove every owned output, newest first
   */
  discard(): Promise<void> {
    this.discarding ??= this.removeOwned();
    return this.discarding;
  }

  /**
   * Restore all recorded file modes
   */
  release(): Promise<RestoreReport> {
    this.releasing ??= this.ledger.restoreAll();
    return this.releasing;
  }

  async abort(): Promise<void> {
    await this.discard();
    await this.release();
  }

  private async removeOwned(): Promise<void> {
    for (const path of [...this.owned].reverse()) {
      try {
        await rm(path, { recursive: true, force: true });
        logger.info(`Removed ${path}`);
      } catch (error) {
        logger.error(`Could not remove ${path}`, error);
      }
    }
  }
}
