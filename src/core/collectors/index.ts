/**
 * Collector registry
 */

import type {
  CommandRunner,
  ContainerEngine,
  HostInspector,
  PackageManager,
  ServiceManager,
} from "../../system/capabilities";
import { secondsToMs } from "../../system/exec";
import type { HostkeepConfig } from "../../types";
import { ComposeFilesCollector } from "./compose-files";
import { ConfigTreesCollector } from "./config-trees";
import { DatabaseDumpsCollector } from "./database-dumps";
import { DockerImagesCollector } from "./docker-images";
import { DockerInfoCollector } from "./docker-info";
import { DockerVolumesCollector } from "./docker-volumes";
import { HostDatabasesCollector } from "./host-databases";
import { DEFAULT_NETWORK_FILES, NetworkCollector } from "./network";
import { PackagesCollector } from "./packages";
import { PanelCollector } from "./panels";
import { ServicesCollector } from "./services";
import { SystemInfoCollector } from "./system-info";
import type { ResourceCollector } from "./types";
import { UserHomesCollector } from "./user-homes";

export { BaseCollector } from "./base";
export type { CollectorContext, ResourceCollector } from "./types";

export interface CollectorDeps {
  runner: CommandRunner;
  engine: ContainerEngine;
  packages: PackageManager;
  services: ServiceManager;
  host: HostInspector;
}

/**
 * Every collector the configuration enables, in phase order
 */
export function createDefaultCollectors(
  config: HostkeepConfig,
  deps: CollectorDeps,
): ResourceCollector[] {
  const gzipLevel = config.compression;
  const timeoutMs = secondsToMs(config.timeouts.commandSeconds);
  const dumpTimeoutMs = secondsToMs(config.timeouts.dumpSeconds);
  const engine = config.docker.enabled ? deps.engine : null;

  const collectors: ResourceCollector[] = [
    new SystemInfoCollector(deps.host),
    new PackagesCollector(deps.packages, deps.runner, {
      aptSourcesDir: "/etc/apt",
      gzipLevel,
      timeoutMs,
    }),
    new ServicesCollector(deps.services),
    new NetworkCollector(deps.runner, { files: DEFAULT_NETWORK_FILES, timeoutMs }),
  ];

  if (engine) {
    collectors.push(
      new DockerInfoCollector(engine),
      new DockerVolumesCollector(engine, deps.runner, { gzipLevel, timeoutMs: dumpTimeoutMs }),
      new DockerImagesCollector(engine, gzipLevel),
      new ComposeFilesCollector({
        roots: config.docker.composeRoots,
        fileNames: config.docker.composeFileNames,
        maxDepth: config.docker.composeMaxDepth,
      }),
      new DatabaseDumpsCollector(engine, config.docker.databases, dumpTimeoutMs),
    );
  }

  for (const panel of config.panels) {
    collectors.push(
      new PanelCollector(panel, deps.runner, engine, { gzipLevel, timeoutMs, dumpTimeoutMs }),
    );
  }

  collectors.push(
    new ConfigTreesCollector(deps.runner, { paths: config.configPaths, gzipLevel, timeoutMs }),
    new UserHomesCollector(deps.host, deps.runner, {
      homeRoot: config.users.homeRoot,
      minUid: config.users.minUid,
      gzipLevel,
      timeoutMs: dumpTimeoutMs,
    }),
    new HostDatabasesCollector(deps.runner, dumpTimeoutMs),
  );

  return collectors;
}
