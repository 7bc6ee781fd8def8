/**
 * Installed package inventories and the apt sources tree
 */

import { access, writeFile } from "node:fs/promises";
import * as path from "node:path";
import type { CommandRunner, InstalledPackage, PackageManager } from "../../system/capabilities";
import type { Artifact, CollectorOutput, Omission, PackageSource } from "../../types";
import { archiveTree } from "../archive/tarball";
import { BaseCollector } from "./base";
import type { CollectorContext } from "./types";

const SOURCES: PackageSource[] = ["apt", "snap", "pip"];

export interface PackagesCollectorOptions {
  /** apt sources tree restored before reinstalling */
  aptSourcesDir: string;
  gzipLevel: number;
  timeoutMs?: number;
}

export function renderPackageList(packages: InstalledPackage[]): string {
  return packages.map((p) => `${p.name}\t${p.version}`).join("\n") + (packages.length ? "\n" : "");
}

export class PackagesCollector extends BaseCollector {
  readonly name = "packages";
  readonly phase = "packages";
  readonly category = "packages";
  readonly area = "packages";
  readonly spacePhase = "packages";

  constructor(
    private readonly packages: PackageManager,
    private readonly runner: CommandRunner,
    private readonly options: PackagesCollectorOptions,
  ) {
    super();
  }

  async produce(context: CollectorContext): Promise<CollectorOutput> {
    this.log.info("Collecting package information...");
    const artifacts: Artifact[] = [];
    const omissions: Omission[] = [];

    for (const source of SOURCES) {
      try {
        const installed = await this.packages.listInstalled(source);
        if (installed === null) {
          this.log.debug(`${source} not present`);
          continue;
        }
        const file = path.join(context.outputDir, `${source}_packages.txt`);
        await writeFile(file, renderPackageList(installed));
        artifacts.push({ ...(await this.staged(context, file)), kind: "package-list", source });
      } catch (error) {
        omissions.push(this.omission(error, source));
      }
    }

    const sourcesDir = this.options.aptSourcesDir;
    const hasAptSources = await access(sourcesDir).then(
      () => true,
      () => false,
    );
    if (hasAptSources) {
      const file = path.join(context.outputDir, "apt_sources.tar.gz");
      try {
        await archiveTree(this.runner, sourcesDir, file, this.options);
        artifacts.push({
          ...(await this.staged(context, file)),
          kind: "config-tree",
          originalPath: sourcesDir,
        });
      } catch (error) {
        omissions.push(this.omission(error, sourcesDir));
      }
    }

    if (artifacts.length === 0 && omissions.length === 0) {
      throw this.fail("No package manager found");
    }

    return { artifacts, omissions };
  }
}
