/**
 * Databases served directly by the host, outside any container
 */

import * as path from "node:path";
import type { CommandRunner } from "../../system/capabilities";
import type { Artifact, CollectorOutput, DatabaseEngine, Omission } from "../../types";
import { BaseCollector } from "./base";
import type { CollectorContext } from "./types";

interface HostDump {
  engine: DatabaseEngine;
  tool: string;
  command: string;
  args: string[];
  file: string;
}

export const HOST_DUMPS: HostDump[] = [
  {
    engine: "mysql",
    tool: "mysqldump",
    command: "mysqldump",
    args: ["--all-databases", "--single-transaction", "--routines", "--triggers"],
    file: "mysql_all_databases.sql",
  },
  {
    engine: "postgres",
    tool: "pg_dumpall",
    command: "runuser",
    args: ["-l", "postgres", "-c", "pg_dumpall"],
    file: "postgresql_all_databases.sql",
  },
];

export class HostDatabasesCollector extends BaseCollector {
  readonly name = "host-databases";
  readonly phase = "databases";
  readonly category = "configs";
  readonly area = "configs";
  readonly spacePhase = "databases";

  constructor(
    private readonly runner: CommandRunner,
    private readonly timeoutMs?: number,
  ) {
    super();
  }

  async isApplicable(): Promise<boolean> {
    for (const dump of HOST_DUMPS) {
      if (await this.runner.which(dump.tool)) return true;
    }
    return false;
  }

  async produce(context: CollectorContext): Promise<CollectorOutput> {
    const artifacts: Artifact[] = [];
    const omissions: Omission[] = [];

    for (const dump of HOST_DUMPS) {
      if (!(await this.runner.which(dump.tool))) continue;

      this.log.info(`Backing up system ${dump.engine} databases...`);
      const file = path.join(context.outputDir, dump.file);
      const result = await this.runner.runToFile(dump.command, dump.args, file, {
        timeoutMs: this.timeoutMs,
        mode: 0o600,
      });

      if (result.success) {
        artifacts.push({
          ...(await this.staged(context, file)),
          kind: "host-database-dump",
          engine: dump.engine,
        });
      } else {
        await this.discardPartial(file);
        omissions.push(
          this.omission(
            result.timedOut ? "dump timed out" : result.stderr || `exit ${result.exitCode}`,
            dump.engine,
          ),
        );
      }
    }

    return { artifacts, omissions };
  }
}
