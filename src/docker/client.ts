/**
 * Docker CLI client wrapper
 */

import type {
  CommandResult,
  CommandRunner,
  ContainerEngine,
  EngineReport,
} from "../system/capabilities";
import { parseHumanSize } from "../utils/format";
import { logger } from "../utils/logger";

const REPORT_ARGS: Record<EngineReport, string[]> = {
  version: ["version"],
  info: ["info"],
  containers: ["ps", "-a", "--format", "table {{.Names}}\t{{.Image}}\t{{.Status}}\t{{.Ports}}"],
  images: ["images", "--format", "table {{.Repository}}\t{{.Tag}}\t{{.Size}}"],
  networks: ["network", "ls"],
  volumes: ["volume", "ls"],
};

export interface DockerEngineOptions {
  engineRoot: string;
  volumeStorePath: string;
  /** Limit for short engine queries */
  commandTimeoutMs?: number;
  /** Limit for image saves */
  longTimeoutMs?: number;
}

/**
 * Pull the "Images" row's size out of `docker system df --format "{{json .}}"` output
 */
export function parseImagesDiskUsage(output: string): number {
  for (const line of output.split("\n").filter(Boolean)) {
    let row: unknown;
    try {
      row = JSON.parse(line);
    } catch {
      logger.debug(`Failed to parse system df JSON: ${line}`);
      continue;
    }
    if (row && typeof row === "object" && "Type" in row && "Size" in row && row.Type === "Images") {
      return parseHumanSize(String(row.Size)) ?? 0;
    }
  }
  return 0;
}

export class DockerEngine implements ContainerEngine {
  readonly engineRoot: string;
  readonly volumeStorePath: string;
  private availability: Promise<boolean> | null = null;

  constructor(
    private readonly runner: CommandRunner,
    private readonly options: DockerEngineOptions,
  ) {
    this.engineRoot = options.engineRoot;
    this.volumeStorePath = options.volumeStorePath;
  }

  /**
   * Run a Docker command and return the result
   */
  dockerRun(args: string[], timeoutMs = this.options.commandTimeoutMs): Promise<CommandResult> {
    return this.runner.run("docker", args, { timeoutMs });
  }

  /**
   * Check if the docker CLI exists and the daemon answers. Asked once per engine.
   */
  isAvailable(): Promise<boolean> {
    this.availability ??= this.probe();
    return this.availability;
  }

  private async probe(): Promise<boolean> {
    if (!(await this.runner.which("docker"))) {
      return false;
    }
    const result = await this.dockerRun(["info"]);
    return result.success;
  }

  async captureReport(report: EngineReport, outputPath: string): Promise<boolean> {
    const result = await this.runner.runToFile("docker", REPORT_ARGS[report], outputPath, {
      timeoutMs: this.options.commandTimeoutMs,
    });
    if (!result.success) {
      logger.debug(`docker ${report} report failed: ${result.stderr}`);
    }
    return result.success;
  }

  async listRunningContainers(): Promise<string[]> {
    const result = await this.dockerRun(["ps", "--format", "{{.Names}}"]);
    if (!result.success) {
      throw new Error(`Failed to list running containers: ${result.stderr}`);
    }
    return result.stdout.split("\n").map((n) => n.trim()).filter(Boolean);
  }

  async listImageIds(): Promise<string[]> {
    const result = await this.dockerRun(["images", "-q"]);
    if (!result.success) {
      throw new Error(`Failed to list images: ${result.stderr}`);
    }
    return [...new Set(result.stdout.split("\n").map((id) => id.trim()).filter(Boolean))];
  }

  saveImages(imageIds: string[], outputPath: string, gzipLevel: number): Promise<CommandResult> {
    return this.runner.runToFile("docker", ["save", ...imageIds], outputPath, {
      gzipLevel,
      timeoutMs: this.options.longTimeoutMs,
    });
  }

  async imagesDiskUsage(): Promise<number> {
    const result = await this.dockerRun(["system", "df", "--format", "{{json .}}"]);
    if (!result.success) {
      logger.debug(`docker system df failed: ${result.stderr}`);
      return 0;
    }
    return parseImagesDiskUsage(result.stdout);
  }

  execToFile(
    container: string,
    command: string[],
    outputPath: string,
    timeoutMs = this.options.longTimeoutMs,
  ): Promise<CommandResult> {
    return this.runner.runToFile("docker", ["exec", container, ...command], outputPath, {
      timeoutMs,
      mode: 0o600,
    });
  }
}
