import { copyFile, rm } from "node:fs/promises";
import * as path from "node:path";
import type { CommandRunner } from "../../system/capabilities";
import type { Artifact, CollectorOutput, Omission } from "../../types";
import { BaseCollector } from "./base";
import type { CollectorContext } from "./types";

export interface NetworkCollectorOptions {
  /** Host files copied as they are: source path -> staged file name */
  files: Record<string, string>;
  timeoutMs?: number;
}

export const DEFAULT_NETWORK_FILES: Record<string, string> = {
  "/etc/hosts": "hosts.txt",
  "/etc/resolv.conf": "resolv.conf",
};

const COMMANDS: Array<{ file: string; args: string[] }> = [
  { file: "network_interfaces.txt", args: ["addr", "show"] },
  { file: "routes.txt", args: ["route", "show"] },
];

export class NetworkCollector extends BaseCollector {
  readonly name = "network";
  readonly phase = "network";
  readonly category = "system";
  readonly area = "system";
  readonly spacePhase = "network";

  constructor(
    private readonly runner: CommandRunner,
    private readonly options: NetworkCollectorOptions,
  ) {
    super();
  }

  async produce(context: CollectorContext): Promise<CollectorOutput> {
    this.log.info("Collecting network configuration...");
    const artifacts: Artifact[] = [];
    const omissions: Omission[] = [];

    for (const { file, args } of COMMANDS) {
      const target = path.join(context.outputDir, file);
      const result = await this.runner.runToFile("ip", args, target, {
        timeoutMs: this.options.timeoutMs,
      });
      if (result.success) {
        artifacts.push({ ...(await this.staged(context, target)), kind: "report" });
      } else {
        await rm(target, { force: true });
        omissions.push(this.omission(result.stderr || `exit ${result.exitCode}`, `ip ${args.join(" ")}`));
      }
    }

    for (const [source, file] of Object.entries(this.options.files)) {
      const target = path.join(context.outputDir, file);
      try {
        await copyFile(source, target);
        artifacts.push({ ...(await this.staged(context, target)), kind: "report" });
      } catch (error) {
        omissions.push(this.omission(error, source));
      }
    }

    return { artifacts, omissions };
  }
}
