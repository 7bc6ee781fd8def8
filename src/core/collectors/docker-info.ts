import { rm } from "node:fs/promises";
import * as path from "node:path";
import type { ContainerEngine, EngineReport } from "../../system/capabilities";
import type { Artifact, CollectorOutput, Omission } from "../../types";
import { BaseCollector } from "./base";
import type { CollectorContext } from "./types";

const REPORT_FILES: Record<EngineReport, string> = {
  version: "docker_version.txt",
  info: "docker_info.txt",
  containers: "containers.txt",
  images: "images.txt",
  networks: "networks.txt",
  volumes: "volumes.txt",
};

const REPORTS: EngineReport[] = ["version", "info", "containers", "images", "networks", "volumes"];

export class DockerInfoCollector extends BaseCollector {
  readonly name = "docker-info";
  readonly phase = "docker";
  readonly category = "docker";
  readonly area = "docker";
  readonly spacePhase = "docker";

  constructor(private readonly engine: ContainerEngine) {
    super();
  }

  isApplicable(): Promise<boolean> {
    return this.engine.isAvailable();
  }

  async produce(context: CollectorContext): Promise<CollectorOutput> {
    this.log.info("Collecting Docker information...");
    const artifacts: Artifact[] = [];
    const omissions: Omission[] = [];

    for (const report of REPORTS) {
      const target = path.join(context.outputDir, REPORT_FILES[report]);
      if (await this.engine.captureReport(report, target)) {
        artifacts.push({ ...(await this.staged(context, target)), kind: "report" });
      } else {
        await rm(target, { force: true });
        omissions.push(this.omission("engine query failed", `${report} report`));
      }
    }

    return { artifacts, omissions };
  }
}
