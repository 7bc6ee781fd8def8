/**
 * Live dumps from running database containers.
 *
 * Each dump runs inside its container and streams to a file; a failed dump
 * is recorded as an omission for that container only.
 */

import * as path from "node:path";
import type { ContainerEngine } from "../../system/capabilities";
import type {
  Artifact,
  CollectorOutput,
  ContainerDatabaseRule,
  DatabaseEngine,
  Omission,
} from "../../types";
import { sanitizeFileComponent } from "../../utils/naming";
import { BaseCollector } from "./base";
import type { CollectorContext } from "./types";

export const DUMP_COMMANDS: Record<DatabaseEngine, string[]> = {
  mysql: ["mysqldump", "--all-databases", "--single-transaction", "--routines", "--triggers"],
  postgres: ["pg_dumpall", "-U", "postgres"],
};

export interface DumpTarget {
  container: string;
  engine: DatabaseEngine;
}

/**
 * Pair running containers with the first rule their name matches
 */
export function matchDumpTargets(containers: string[], rules: ContainerDatabaseRule[]): DumpTarget[] {
  const compiled = rules.map((rule) => ({ regex: new RegExp(rule.pattern), engine: rule.engine }));
  const targets: DumpTarget[] = [];

  for (const container of containers) {
    const rule = compiled.find((r) => r.regex.test(container));
    if (rule) {
      targets.push({ container, engine: rule.engine });
    }
  }

  return targets;
}

export function dumpFileName(target: DumpTarget): string {
  return `${sanitizeFileComponent(target.container)}_${target.engine}_dump.sql`;
}

export class DatabaseDumpsCollector extends BaseCollector {
  readonly name = "database-dumps";
  readonly phase = "docker";
  readonly category = "docker";
  readonly area = "docker/database_dumps";
  readonly spacePhase = "docker";

  constructor(
    private readonly engine: ContainerEngine,
    private readonly rules: ContainerDatabaseRule[],
    private readonly timeoutMs?: number,
  ) {
    super();
  }

  isApplicable(): Promise<boolean> {
    return this.engine.isAvailable();
  }

  async produce(context: CollectorContext): Promise<CollectorOutput> {
    this.log.info("Creating database dumps from running containers...");
    const running = await this.engine.listRunningContainers().catch((error: unknown) => {
      throw this.fail("Could not list running containers", error);
    });

    const artifacts: Artifact[] = [];
    const omissions: Omission[] = [];

    for (const target of matchDumpTargets(running, this.rules)) {
      const file = path.join(context.outputDir, dumpFileName(target));
      this.log.info(`Creating ${target.engine} dump from container: ${target.container}`);

      const result = await this.engine.execToFile(
        target.container,
        DUMP_COMMANDS[target.engine],
        file,
        this.timeoutMs,
      );

      if (result.success) {
        artifacts.push({
          ...(await this.staged(context, file)),
          kind: "database-dump",
          container: target.container,
          engine: target.engine,
        });
      } else {
        await this.discardPartial(file);
        omissions.push(
          this.omission(
            result.timedOut ? "dump timed out" : result.stderr || `exit ${result.exitCode}`,
            target.container,
          ),
        );
      }
    }

    return { artifacts, omissions };
  }
}
