/**
 * Configuration type definitions for hostkeep
 */

export type DatabaseEngine = "mysql" | "postgres";

export interface SpaceConfig {
  /** Fixed headroom added to every projection, in MiB (default: 500) */
  safetyMarginMb: number;
  /** Projected growth of cheap phases, in MiB (default: 100) */
  defaultPhaseMb: number;
}

export interface PermissionsConfig {
  /** Octal mode applied to directories that must become readable (default: "755") */
  readMode: string;
}

export interface TimeoutsConfig {
  /** Limit for ordinary external commands, in seconds (0 disables) */
  commandSeconds: number;
  /** Limit for database dumps, image saves and archive creation, in seconds (0 disables) */
  dumpSeconds: number;
}

/**
 * Running containers whose name matches `pattern` are dumped with `engine`'s tool
 */
export interface ContainerDatabaseRule {
  pattern: string;
  engine: DatabaseEngine;
}

export interface DockerConfig {
  /** Capture container engine state when the engine is present (default: true) */
  enabled: boolean;
  /** Engine data root, loosened for read access during volume capture */
  engineRoot: string;
  /** Live volume store archived as a whole */
  volumeStore: string;
  /** Directories searched for compose definitions */
  composeRoots: string[];
  /** File names treated as compose definitions */
  composeFileNames: string[];
  /** Maximum directory depth below each compose root */
  composeMaxDepth: number;
  databases: ContainerDatabaseRule[];
}

/**
 * A hosting control panel whose directories and database are captured
 */
export interface PanelConfig {
  name: string;
  paths: string[];
  /** Running containers matching both the panel name and this pattern hold the panel DB */
  databaseContainerPattern?: string;
}

export interface UsersConfig {
  homeRoot: string;
  /** Homes of accounts below this uid are system accounts and are skipped */
  minUid: number;
}

export interface HostkeepConfig {
  version: string;
  /** Directory holding staging trees and finished archives */
  backupDir: string;
  namePrefix: string;
  /** gzip level, 0-9 */
  compression: number;
  /** Delete the staging tree after archiving; unset means ask */
  removeStaging?: boolean;
  requireRoot: boolean;
  space: SpaceConfig;
  permissions: PermissionsConfig;
  timeouts: TimeoutsConfig;
  docker: DockerConfig;
  configPaths: string[];
  panels: PanelConfig[];
  users: UsersConfig;
}
