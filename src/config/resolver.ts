/**
 * Configuration path resolution
 */

import * as path from "node:path";
import type { HostkeepConfig } from "../types";

function resolveFrom(baseDir: string, p: string): string {
  return path.isAbsolute(p) ? p : path.resolve(baseDir, p);
}

/**
 * Resolve relative paths in a config file against the file's directory
 */
export function resolvePaths(config: HostkeepConfig, configPath: string): HostkeepConfig {
  const configDir = path.dirname(path.resolve(configPath));
  const resolve = (p: string) => resolveFrom(configDir, p);

  return {
    ...config,
    backupDir: resolve(config.backupDir),
    docker: {
      ...config.docker,
      engineRoot: resolve(config.docker.engineRoot),
      volumeStore: resolve(config.docker.volumeStore),
      composeRoots: config.docker.composeRoots.map(resolve),
    },
    configPaths: config.configPaths.map(resolve),
    panels: config.panels.map((panel) => ({ ...panel, paths: panel.paths.map(resolve) })),
    users: { ...config.users, homeRoot: resolve(config.users.homeRoot) },
  };
}
