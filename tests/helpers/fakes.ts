/**
 * In-process stand-ins for the host capabilities
 */

import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import type { CollectorContext } from "../../src/core/collectors/types";
import { type FileModeOps, PermissionLedger } from "../../src/core/ledger/permission-ledger";
import type {
  CommandResult,
  CommandRunner,
  ContainerEngine,
  DiskProbe,
  EngineReport,
  HostInspector,
  InstalledPackage,
  PackageManager,
  ServiceManager,
  ServiceUnit,
  UnitListing,
} from "../../src/system/capabilities";
import { NodeDiskProbe } from "../../src/system/disk";
import type { HostDescription, PackageSource } from "../../src/types";

export async function makeTempDir(label: string): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), `hostkeep-${label}-`));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export interface FakeResponse {
  output?: string;
  stderr?: string;
  exitCode?: number;
  timedOut?: boolean;
  writeFailed?: boolean;
}

export type FakeHandler = (args: string[]) => FakeResponse;

export interface RecordedCall {
  command: string;
  args: string[];
  outputPath?: string;
  gzipLevel?: number;
}

function toResult(response: FakeResponse, stdout: string): CommandResult {
  const exitCode = response.exitCode ?? 0;
  const timedOut = response.timedOut ?? false;
  return {
    success: exitCode === 0 && !timedOut,
    stdout,
    stderr: response.stderr ?? "",
    exitCode,
    timedOut,
    ...(response.writeFailed ? { writeFailed: true } : {}),
  };
}

/**
 * Commands answer from registered handlers; unknown commands fail with 127.
 * runToFile writes the handler's output to the target file.
 */
export class FakeRunner implements CommandRunner {
  readonly calls: RecordedCall[] = [];
  private readonly handlers = new Map<string, FakeHandler>();

  on(command: string, handler: FakeHandler): this {
    this.handlers.set(command, handler);
    return this;
  }

  async run(command: string, args: string[]): Promise<CommandResult> {
    this.calls.push({ command, args });
    const handler = this.handlers.get(command);
    if (!handler) {
      return toResult({ exitCode: 127, stderr: `${command}: not found` }, "");
    }
    const response = handler(args);
    return toResult(response, response.output ?? "");
  }

  async runToFile(
    command: string,
    args: string[],
    outputPath: string,
    options: { gzipLevel?: number } = {},
  ): Promise<CommandResult> {
    this.calls.push({ command, args, outputPath, gzipLevel: options.gzipLevel });
    const handler = this.handlers.get(command);
    if (!handler) {
      return toResult({ exitCode: 127, stderr: `${command}: not found` }, "");
    }
    const response = handler(args);
    await writeFile(outputPath, response.output ?? "");
    return toResult(response, "");
  }

  async which(command: string): Promise<string | null> {
    return this.handlers.has(command) ? `/usr/bin/${command}` : null;
  }

  callsTo(command: string): RecordedCall[] {
    return this.calls.filter((c) => c.command === command);
  }
}

export interface FakeEngineOptions {
  available?: boolean;
  engineRoot?: string;
  volumeStorePath?: string;
  running?: string[];
  imageIds?: string[];
  imagesBytes?: number;
  /** Dump output per container; a container without an entry fails its exec */
  dumps?: Record<string, string>;
}

export class FakeEngine implements ContainerEngine {
  readonly engineRoot: string;
  readonly volumeStorePath: string;
  readonly execCalls: Array<{ container: string; command: string[]; outputPath: string }> = [];
  listFailure: Error | null = null;

  constructor(private readonly options: FakeEngineOptions = {}) {
    this.engineRoot = options.engineRoot ?? "/var/lib/docker";
    this.volumeStorePath = options.volumeStorePath ?? "/var/lib/docker/volumes";
  }

  async isAvailable(): Promise<boolean> {
    return this.options.available ?? true;
  }

  async captureReport(report: EngineReport, outputPath: string): Promise<boolean> {
    await writeFile(outputPath, `${report} report\n`);
    return true;
  }

  async listRunningContainers(): Promise<string[]> {
    if (this.listFailure) throw this.listFailure;
    return this.options.running ?? [];
  }

  async listImageIds(): Promise<string[]> {
    return this.options.imageIds ?? [];
  }

  async saveImages(imageIds: string[], outputPath: string): Promise<CommandResult> {
    await writeFile(outputPath, imageIds.join("\n"));
    return { success: true, stdout: "", stderr: "", exitCode: 0, timedOut: false };
  }

  async imagesDiskUsage(): Promise<number> {
    return this.options.imagesBytes ?? 0;
  }

  async execToFile(container: string, command: string[], outputPath: string): Promise<CommandResult> {
    this.execCalls.push({ container, command, outputPath });
    const dump = this.options.dumps?.[container];
    if (dump === undefined) {
      await writeFile(outputPath, "-- partial");
      return {
        success: false,
        stdout: "",
        stderr: "access denied",
        exitCode: 2,
        timedOut: false,
      };
    }
    await writeFile(outputPath, dump);
    return { success: true, stdout: "", stderr: "", exitCode: 0, timedOut: false };
  }
}

/**
 * Free space is fixed; sizes come from the real tree unless overridden
 */
export class FakeDisk implements DiskProbe {
  readonly sizeOverrides = new Map<string, number>();
  private readonly real = new NodeDiskProbe();

  constructor(public free: number) {}

  async freeBytes(): Promise<number> {
    return this.free;
  }

  async directorySize(target: string): Promise<number> {
    return this.sizeOverrides.get(target) ?? this.real.directorySize(target);
  }
}

export const TEST_HOST: HostDescription = {
  hostname: "test-host",
  os: "Ubuntu 24.04 LTS",
  kernel: "6.8.0-test",
  architecture: "x86_64",
  cpu: "Test CPU",
  memoryBytes: 2 * 1024 * 1024 * 1024,
  rootDiskBytes: 40 * 1024 * 1024 * 1024,
  ipAddress: "10.0.0.5",
};

export class FakeHost implements HostInspector {
  constructor(
    public elevated = true,
    public accounts: Map<string, number> = new Map(),
  ) {}

  async describe(): Promise<HostDescription> {
    return TEST_HOST;
  }

  isElevated(): boolean {
    return this.elevated;
  }

  async listAccounts(): Promise<Map<string, number>> {
    return this.accounts;
  }
}

export class FakePackages implements PackageManager {
  constructor(private readonly installed: Partial<Record<PackageSource, InstalledPackage[]>> = {}) {}

  async listInstalled(source: PackageSource): Promise<InstalledPackage[] | null> {
    return this.installed[source] ?? null;
  }
}

export class FakeServices implements ServiceManager {
  constructor(private readonly units: Partial<Record<UnitListing, ServiceUnit[]>> = {}) {}

  async listUnits(listing: UnitListing): Promise<ServiceUnit[]> {
    return this.units[listing] ?? [];
  }
}

/**
 * File modes held in memory; paths listed in `refuse` reject chmod
 */
export class MemoryModeOps implements FileModeOps {
  readonly modes = new Map<string, number>();
  readonly refuse = new Set<string>();
  readonly setCalls: Array<[string, number]> = [];

  async readMode(target: string): Promise<number | null> {
    return this.modes.get(target) ?? null;
  }

  async setMode(target: string, mode: number): Promise<void> {
    this.setCalls.push([target, mode]);
    if (this.refuse.has(target)) {
      throw new Error("EPERM: operation not permitted");
    }
    this.modes.set(target, mode);
  }
}

/**
 * A collector context over a fresh staging directory with the area created
 */
export async function makeContext(
  stagingPath: string,
  area: string,
  ledger: PermissionLedger = new PermissionLedger(new MemoryModeOps()),
): Promise<CollectorContext> {
  const outputDir = path.join(stagingPath, area);
  await mkdir(outputDir, { recursive: true });
  return { stagingPath, outputDir, ledger, readMode: "755" };
}
