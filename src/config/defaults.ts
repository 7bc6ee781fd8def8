/**
 * Default configuration values
 */

import type { HostkeepConfig } from "../types";

export const DEFAULT_CONFIG_PATHS = [
  "/etc/nginx",
  "/etc/apache2",
  "/etc/ssl",
  "/etc/letsencrypt",
  "/etc/cron.d",
  "/etc/crontab",
  "/etc/fstab",
  "/etc/ssh",
  "/etc/systemd/system",
  "/etc/environment",
  "/etc/profile.d",
];

export const DEFAULT_CONFIG: HostkeepConfig = {
  version: "1",
  backupDir: "/home/ftpbackup",
  namePrefix: "vps_backup",
  compression: 6,
  requireRoot: true,
  space: {
    safetyMarginMb: 500,
    defaultPhaseMb: 100,
  },
  permissions: {
    readMode: "755",
  },
  timeouts: {
    commandSeconds: 600,
    dumpSeconds: 3600,
  },
  docker: {
    enabled: true,
    engineRoot: "/var/lib/docker",
    volumeStore: "/var/lib/docker/volumes",
    composeRoots: ["/opt", "/home", "/root"],
    composeFileNames: ["docker-compose.yml", "docker-compose.yaml"],
    composeMaxDepth: 4,
    databases: [
      { pattern: "mysql|mariadb", engine: "mysql" },
      { pattern: "postgres|postgresql", engine: "postgres" },
    ],
  },
  configPaths: DEFAULT_CONFIG_PATHS,
  panels: [
    {
      name: "easypanel",
      paths: ["/etc/easypanel", "/opt/easypanel", "/var/lib/easypanel"],
      databaseContainerPattern: "mysql|mariadb|db",
    },
  ],
  users: {
    homeRoot: "/home",
    minUid: 1000,
  },
};

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects, with source overriding target. Arrays are replaced, not merged.
 */
export function deepMerge(target: object, source: object): Record<string, unknown> {
  const result: Record<string, unknown> = Object.fromEntries(Object.entries(target));

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}
