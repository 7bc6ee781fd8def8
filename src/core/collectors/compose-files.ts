/**
 * Compose definition discovery.
 *
 * Each directory holding a compose file is copied to its own staging
 * directory named after the directory path: /opt/a -> docker/compose_opt_a.
 */

import type { Dirent } from "node:fs";
import { access, copyFile, mkdir, readdir } from "node:fs/promises";
import * as path from "node:path";
import type { Artifact, CollectorOutput, Omission } from "../../types";
import { logger } from "../../utils/logger";
import { flattenPath } from "../../utils/naming";
import { BaseCollector } from "./base";
import type { CollectorContext } from "./types";

export interface ComposeDiscoveryOptions {
  roots: string[];
  fileNames: string[];
  /** Directory levels searched below each root; files directly in a root are depth 0 */
  maxDepth: number;
}

const SKIPPED_DIRS = new Set(["node_modules", ".git"]);

/**
 * Find compose files under the roots, searching at most `maxDepth` levels down.
 * Symlinked directories are not followed; unreadable directories are skipped.
 */
export async function discoverComposeFiles(options: ComposeDiscoveryOptions): Promise<string[]> {
  const names = new Set(options.fileNames);
  const found: string[] = [];

  for (const root of options.roots) {
    const pending: Array<{ dir: string; depth: number }> = [{ dir: root, depth: 0 }];

    while (pending.length > 0) {
      const next = pending.shift();
      if (!next) break;

      let entries: Dirent[];
      try {
        entries = await readdir(next.dir, { withFileTypes: true });
      } catch (error) {
        logger.debug(`Skipping ${next.dir} during compose search`, error);
        continue;
      }

      entries.sort((a, b) => a.name.localeCompare(b.name));
      for (const entry of entries) {
        const full = path.join(next.dir, entry.name);
        if (entry.isFile() && names.has(entry.name)) {
          found.push(full);
        } else if (
          entry.isDirectory() &&
          next.depth < options.maxDepth &&
          !SKIPPED_DIRS.has(entry.name)
        ) {
          pending.push({ dir: full, depth: next.depth + 1 });
        }
      }
    }
  }

  return found;
}

export function composeStagingName(dir: string): string {
  return `compose${flattenPath(dir)}`;
}

/**
 * Group compose files by directory and give every directory a distinct
 * staging name, suffixing a counter when two paths flatten alike
 * ("/opt/a_b" and "/opt/a/b").
 */
export function planComposeStaging(files: string[]): Map<string, { stagingName: string; files: string[] }> {
  const plan = new Map<string, { stagingName: string; files: string[] }>();
  const usedNames = new Set<string>();

  for (const file of files) {
    const dir = path.dirname(file);
    const existing = plan.get(dir);
    if (existing) {
      existing.files.push(file);
      continue;
    }

    const base = composeStagingName(dir);
    let stagingName = base;
    for (let n = 2; usedNames.has(stagingName); n++) {
      stagingName = `${base}_${n}`;
    }
    usedNames.add(stagingName);
    plan.set(dir, { stagingName, files: [file] });
  }

  return plan;
}

export class ComposeFilesCollector extends BaseCollector {
  readonly name = "compose-files";
  readonly phase = "docker";
  readonly category = "docker";
  readonly area = "docker";
  readonly spacePhase = "docker";

  constructor(private readonly options: ComposeDiscoveryOptions) {
    super();
  }

  async produce(context: CollectorContext): Promise<CollectorOutput> {
    this.log.info("Searching for Docker Compose files...");
    const files = await discoverComposeFiles(this.options);
    const plan = planComposeStaging(files);
    const artifacts: Artifact[] = [];
    const omissions: Omission[] = [];

    for (const [dir, entry] of plan) {
      const targetDir = path.join(context.outputDir, entry.stagingName);
      try {
        await mkdir(targetDir, { recursive: true });
        const copied: string[] = [];

        for (const file of entry.files) {
          await copyFile(file, path.join(targetDir, path.basename(file)));
          copied.push(path.basename(file));
        }

        const envFile = path.join(dir, ".env");
        const hasEnv = await access(envFile).then(
          () => true,
          () => false,
        );
        if (hasEnv) {
          await copyFile(envFile, path.join(targetDir, ".env"));
          copied.push(".env");
        }

        artifacts.push({
          ...(await this.staged(context, targetDir)),
          kind: "compose-project",
          originalDir: dir,
          files: copied,
        });
      } catch (error) {
        omissions.push(this.omission(error, dir));
      }
    }

    this.log.info(`Found ${artifacts.length} compose project(s)`);
    return { artifacts, omissions };
  }
}
