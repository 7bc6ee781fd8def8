/**
 * Narrow interfaces over the host facilities the pipeline consumes.
 * Implementations live beside this file and in ../docker; tests substitute fakes.
 */

import type { HostDescription, PackageSource } from "../types";

export interface CommandResult {
  success: boolean;
  stdout: string;
  stderr: string;
  exitCode: number;
  timedOut: boolean;
  /** Set by runToFile when the output file could not be written */
  writeFailed?: boolean;
}

export interface RunOptions {
  /** Kill the process after this many milliseconds (0 or unset: no limit) */
  timeoutMs?: number;
  /** Written to the process's stdin */
  input?: string;
  env?: NodeJS.ProcessEnv;
}

export interface RunToFileOptions extends RunOptions {
  /** gzip the stream at this level before writing */
  gzipLevel?: number;
  /** Mode of the created file */
  mode?: number;
}

export interface CommandRunner {
  run(command: string, args: string[], options?: RunOptions): Promise<CommandResult>;
  /**
   * Stream the process's stdout into `outputPath`; `stdout` in the result is empty.
   * A write error resolves as an unsuccessful result carrying the error message.
   */
  runToFile(
    command: string,
    args: string[],
    outputPath: string,
    options?: RunToFileOptions,
  ): Promise<CommandResult>;
  /** Absolute path of an executable on PATH, or null */
  which(command: string): Promise<string | null>;
}

export type EngineReport = "version" | "info" | "containers" | "images" | "networks" | "volumes";

export interface ContainerEngine {
  readonly engineRoot: string;
  readonly volumeStorePath: string;
  isAvailable(): Promise<boolean>;
  captureReport(report: EngineReport, outputPath: string): Promise<boolean>;
  listRunningContainers(): Promise<string[]>;
  listImageIds(): Promise<string[]>;
  saveImages(imageIds: string[], outputPath: string, gzipLevel: number): Promise<CommandResult>;
  /** Bytes used by images, as accounted by the engine */
  imagesDiskUsage(): Promise<number>;
  /** Run a command inside a container, streaming its stdout to a file */
  execToFile(
    container: string,
    command: string[],
    outputPath: string,
    timeoutMs?: number,
  ): Promise<CommandResult>;
}

export interface InstalledPackage {
  name: string;
  version: string;
}

export interface PackageManager {
  /** Installed packages of one source, or null when that source is absent on the host */
  listInstalled(source: PackageSource): Promise<InstalledPackage[] | null>;
}

export type UnitListing = "active" | "enabled" | "failed";

export interface ServiceUnit {
  unit: string;
  state: string;
  description: string;
}

export interface ServiceManager {
  listUnits(listing: UnitListing): Promise<ServiceUnit[]>;
}

export interface DiskProbe {
  /** Bytes available to unprivileged writers on the filesystem holding `path` */
  freeBytes(path: string): Promise<number>;
  /** Apparent size of a tree; 0 when it does not exist */
  directorySize(path: string): Promise<number>;
}

export interface HostInspector {
  describe(): Promise<HostDescription>;
  isElevated(): boolean;
  /** username -> uid */
  listAccounts(): Promise<Map<string, number>>;
}
