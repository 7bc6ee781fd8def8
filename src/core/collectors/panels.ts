/**
 * Hosting control panel state: its directories and, when it runs one, its
 * database container
 */

import { access, rm } from "node:fs/promises";
import * as path from "node:path";
import type { CommandRunner, ContainerEngine } from "../../system/capabilities";
import type { Artifact, CollectorOutput, Omission, PanelConfig } from "../../types";
import { sanitizeFileComponent } from "../../utils/naming";
import { archiveTree } from "../archive/tarball";
import { BaseCollector } from "./base";
import type { CollectorContext } from "./types";

export const PANEL_DB_DUMP_COMMAND = [
  "mysqldump",
  "-u",
  "root",
  "--all-databases",
  "--single-transaction",
  "--routines",
  "--triggers",
];

export interface PanelCollectorOptions {
  gzipLevel: number;
  timeoutMs?: number;
  dumpTimeoutMs?: number;
}

function exists(p: string): Promise<boolean> {
  return access(p).then(
    () => true,
    () => false,
  );
}

/**
 * First running container whose name mentions the panel (case-insensitive)
 * and matches the database pattern
 */
export function findPanelDatabaseContainer(
  panel: PanelConfig,
  containers: string[],
): string | undefined {
  if (!panel.databaseContainerPattern) return undefined;
  const pattern = new RegExp(panel.databaseContainerPattern);
  const panelName = panel.name.toLowerCase();
  return containers.find((c) => c.toLowerCase().includes(panelName) && pattern.test(c));
}

export class PanelCollector extends BaseCollector {
  readonly name: string;
  readonly phase = "configs";
  readonly category = "configs";
  readonly area = "configs";
  readonly spacePhase = "configs";

  constructor(
    private readonly panel: PanelConfig,
    private readonly runner: CommandRunner,
    private readonly engine: ContainerEngine | null,
    private readonly options: PanelCollectorOptions,
  ) {
    super();
    this.name = `panel:${panel.name}`;
  }

  async isApplicable(): Promise<boolean> {
    for (const p of this.panel.paths) {
      if (await exists(p)) return true;
    }
    return false;
  }

  async produce(context: CollectorContext): Promise<CollectorOutput> {
    this.log.info(`Backing up ${this.panel.name} configuration...`);
    const prefix = sanitizeFileComponent(this.panel.name);
    const artifacts: Artifact[] = [];
    const omissions: Omission[] = [];

    for (const dir of this.panel.paths) {
      if (!(await exists(dir))) continue;

      await context.ledger.acquire(dir, context.readMode);
      const file = path.join(
        context.outputDir,
        `${prefix}_${sanitizeFileComponent(path.basename(dir))}.tar.gz`,
      );
      try {
        await archiveTree(this.runner, dir, file, this.options);
        artifacts.push({
          ...(await this.staged(context, file)),
          kind: "config-tree",
          originalPath: dir,
        });
      } catch (error) {
        omissions.push(this.omission(error, dir));
      }
    }

    const dump = await this.dumpDatabase(context, prefix);
    if (dump && "reason" in dump) omissions.push(dump);
    else if (dump) artifacts.push(dump);

    return { artifacts, omissions };
  }

  private async dumpDatabase(
    context: CollectorContext,
    prefix: string,
  ): Promise<Artifact | Omission | null> {
    if (!this.engine || !this.panel.databaseContainerPattern) return null;
    if (!(await this.engine.isAvailable())) return null;

    let running: string[];
    try {
      running = await this.engine.listRunningContainers();
    } catch (error) {
      return this.omission(error, `${this.panel.name} database`);
    }

    const container = findPanelDatabaseContainer(this.panel, running);
    if (!container) {
      this.log.debug(`No running ${this.panel.name} database container`);
      return null;
    }

    this.log.info(`Backing up ${this.panel.name} database from container: ${container}`);
    const file = path.join(context.outputDir, `${prefix}_db.sql`);
    const result = await this.engine.execToFile(
      container,
      PANEL_DB_DUMP_COMMAND,
      file,
      this.options.dumpTimeoutMs,
    );
    if (!result.success) {
      await rm(file, { force: true });
      return this.omission(
        result.timedOut ? "dump timed out" : result.stderr || `exit ${result.exitCode}`,
        container,
      );
    }

    return {
      ...(await this.staged(context, file)),
      kind: "database-dump",
      container,
      engine: "mysql",
    };
  }
}
