/**
 * Host configuration directories and files, one archive per configured path
 */

import { access } from "node:fs/promises";
import * as path from "node:path";
import type { CommandRunner } from "../../system/capabilities";
import type { Artifact, CollectorOutput, Omission } from "../../types";
import { sanitizeFileComponent } from "../../utils/naming";
import { archiveTree } from "../archive/tarball";
import { BaseCollector } from "./base";
import type { CollectorContext } from "./types";

export interface ConfigTreesOptions {
  paths: string[];
  gzipLevel: number;
  timeoutMs?: number;
}

/**
 * `<basename>.tar.gz`, with a counter when two paths share a basename
 */
export function configArchiveNames(paths: string[]): string[] {
  const used = new Set<string>();
  return paths.map((p) => {
    const base = sanitizeFileComponent(path.basename(p.replace(/\/+$/, "")) || "root");
    let name = `${base}.tar.gz`;
    for (let n = 2; used.has(name); n++) {
      name = `${base}_${n}.tar.gz`;
    }
    used.add(name);
    return name;
  });
}

export class ConfigTreesCollector extends BaseCollector {
  readonly name = "config-trees";
  readonly phase = "configs";
  readonly category = "configs";
  readonly area = "configs";
  readonly spacePhase = "configs";

  constructor(
    private readonly runner: CommandRunner,
    private readonly options: ConfigTreesOptions,
  ) {
    super();
  }

  async produce(context: CollectorContext): Promise<CollectorOutput> {
    this.log.info("Backing up system configurations...");
    const names = configArchiveNames(this.options.paths);
    const artifacts: Artifact[] = [];
    const omissions: Omission[] = [];

    for (const [index, configPath] of this.options.paths.entries()) {
      const exists = await access(configPath).then(
        () => true,
        () => false,
      );
      if (!exists) {
        this.log.debug(`Not present: ${configPath}`);
        continue;
      }

      await context.ledger.acquire(configPath, context.readMode);
      const file = path.join(context.outputDir, names[index] ?? `${index}.tar.gz`);
      try {
        await archiveTree(this.runner, configPath, file, this.options);
        artifacts.push({
          ...(await this.staged(context, file)),
          kind: "config-tree",
          originalPath: configPath,
        });
      } catch (error) {
        omissions.push(this.omission(error, configPath));
      }
    }

    return { artifacts, omissions };
  }
}
