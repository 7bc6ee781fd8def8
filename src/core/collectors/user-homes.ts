import type { Dirent } from "node:fs";
import { readdir } from "node:fs/promises";
import * as path from "node:path";
import type { CommandRunner, HostInspector } from "../../system/capabilities";
import type { Artifact, CollectorOutput, Omission } from "../../types";
import { sanitizeFileComponent } from "../../utils/naming";
import { archiveTree } from "../archive/tarball";
import { BaseCollector } from "./base";
import type { CollectorContext } from "./types";

export interface UserHomesOptions {
  homeRoot: string;
  minUid: number;
  gzipLevel: number;
  timeoutMs?: number;
}

export class UserHomesCollector extends BaseCollector {
  readonly name = "user-homes";
  readonly phase = "users";
  readonly category = "system";
  readonly area = "system";
  readonly spacePhase = "users";
  readonly permissions: readonly string[];

  constructor(
    private readonly host: HostInspector,
    private readonly runner: CommandRunner,
    private readonly options: UserHomesOptions,
  ) {
    super();
    this.permissions = [options.homeRoot];
  }

  async produce(context: CollectorContext): Promise<CollectorOutput> {
    this.log.info("Backing up user data...");
    const { homeRoot, minUid } = this.options;

    let entries: Dirent[];
    try {
      entries = await readdir(homeRoot, { withFileTypes: true });
    } catch (error) {
      throw this.fail(`Could not read ${homeRoot}`, error);
    }

    const accounts = await this.host.listAccounts();
    const artifacts: Artifact[] = [];
    const omissions: Omission[] = [];

    const homes = entries.filter((e) => e.isDirectory()).sort((a, b) => a.name.localeCompare(b.name));
    for (const entry of homes) {
      const username = entry.name;
      const uid = accounts.get(username);
      if (uid === undefined || uid < minUid) {
        this.log.debug(`Skipping ${username}: not a regular user`);
        continue;
      }

      const home = path.join(homeRoot, username);
      await context.ledger.acquire(home, context.readMode);
      const file = path.join(context.outputDir, `user_${sanitizeFileComponent(username)}.tar.gz`);
      try {
        await archiveTree(this.runner, home, file, { ...this.options, live: true });
        artifacts.push({
          ...(await this.staged(context, file)),
          kind: "user-home",
          username,
          homeRoot,
        });
      } catch (error) {
        omissions.push(this.omission(error, username));
      }
    }

    return { artifacts, omissions };
  }
}
