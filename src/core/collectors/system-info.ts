import { writeFile } from "node:fs/promises";
import * as path from "node:path";
import type { HostInspector } from "../../system/capabilities";
import type { CollectorOutput, HostDescription } from "../../types";
import { formatBytes } from "../../utils/format";
import { BaseCollector } from "./base";
import type { CollectorContext } from "./types";

export function renderSystemInfo(host: HostDescription, date: Date): string {
  return [
    "=== SYSTEM INFORMATION ===",
    `Hostname: ${host.hostname}`,
    `OS: ${host.os}`,
    `Kernel: ${host.kernel}`,
    `Architecture: ${host.architecture}`,
    `CPU: ${host.cpu}`,
    `Memory: ${formatBytes(host.memoryBytes)}`,
    `Disk: ${formatBytes(host.rootDiskBytes)}`,
    `IP Address: ${host.ipAddress ?? "unknown"}`,
    `Backup Date: ${date.toString()}`,
    "",
  ].join("\n");
}

export class SystemInfoCollector extends BaseCollector {
  readonly name = "system-info";
  readonly phase = "system";
  readonly category = "system";
  readonly area = "system";
  readonly spacePhase = "system";

  constructor(private readonly host: HostInspector) {
    super();
  }

  async produce(context: CollectorContext): Promise<CollectorOutput> {
    this.log.info("Collecting system information...");
    const description = await this.host.describe();
    const file = path.join(context.outputDir, "system_info.txt");
    await writeFile(file, renderSystemInfo(description, new Date()));

    return {
      artifacts: [{ ...(await this.staged(context, file)), kind: "report" }],
      omissions: [],
    };
  }
}
