/**
 * Host capability wiring
 */

import { DockerEngine } from "../docker/client";
import type { HostkeepConfig } from "../types";
import type {
  CommandRunner,
  ContainerEngine,
  DiskProbe,
  HostInspector,
  PackageManager,
  ServiceManager,
} from "./capabilities";
import { NodeDiskProbe } from "./disk";
import { ProcessRunner, secondsToMs } from "./exec";
import { LocalHostInspector } from "./host";
import { HostPackageManager } from "./packages";
import { SystemdServiceManager } from "./services";

export type * from "./capabilities";

export interface HostCapabilities {
  runner: CommandRunner;
  engine: ContainerEngine;
  packages: PackageManager;
  services: ServiceManager;
  host: HostInspector;
  disk: DiskProbe;
}

export function createHostCapabilities(config: HostkeepConfig): HostCapabilities {
  const runner = new ProcessRunner();
  const commandTimeoutMs = secondsToMs(config.timeouts.commandSeconds);

  return {
    runner,
    engine: new DockerEngine(runner, {
      engineRoot: config.docker.engineRoot,
      volumeStorePath: config.docker.volumeStore,
      commandTimeoutMs,
      longTimeoutMs: secondsToMs(config.timeouts.dumpSeconds),
    }),
    packages: new HostPackageManager(runner, commandTimeoutMs),
    services: new SystemdServiceManager(runner, commandTimeoutMs),
    host: new LocalHostInspector(),
    disk: new NodeDiskProbe(),
  };
}
