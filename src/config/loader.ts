/**
 * Configuration file loading
 */

import { access, readFile } from "node:fs/promises";
import * as path from "node:path";
import * as yaml from "js-yaml";
import type { HostkeepConfig } from "../types";
import { logger } from "../utils/logger";
import { DEFAULT_CONFIG, deepMerge, isRecord } from "./defaults";
import { resolvePaths } from "./resolver";
import { ConfigError, validateConfig } from "./validator";

export { ConfigError } from "./validator";

export const CONFIG_FILE_NAMES = [
  "hostkeep.config.yaml",
  "hostkeep.config.yml",
  "hostkeep.config.json",
];

export const SYSTEM_CONFIG_PATH = "/etc/hostkeep/config.yaml";

/**
 * Values given on the command line; each one set replaces the file's value
 */
export interface ConfigOverrides {
  backupDir?: string;
  namePrefix?: string;
  compression?: number;
  removeStaging?: boolean;
  dockerEnabled?: boolean;
}

/**
 * Load and parse a config file
 */
export async function loadConfig(configPath: string): Promise<HostkeepConfig> {
  const absolutePath = path.resolve(configPath);

  let content: string;
  try {
    content = await readFile(absolutePath, "utf-8");
  } catch {
    throw new ConfigError(`Config file not found: ${absolutePath}`);
  }

  const parsed = parseConfigContent(content, path.extname(absolutePath).toLowerCase()) ?? {};
  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file must contain an object: ${absolutePath}`);
  }

  const merged = deepMerge(DEFAULT_CONFIG, parsed);
  validateConfig(merged);

  return resolvePaths(merged, absolutePath);
}

function parseConfigContent(content: string, ext: string): unknown {
  if (ext === ".yaml" || ext === ".yml") {
    try {
      return yaml.load(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse YAML: ${e instanceof Error ? e.message : String(e)}`);
    }
  }

  if (ext === ".json") {
    try {
      return JSON.parse(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse JSON: ${e instanceof Error ? e.message : String(e)}`);
    }
  }

  throw new ConfigError(`Unsupported config file format: ${ext}. Use .yaml, .yml, or .json`);
}

/**
 * Find a config file in the given directory, then at the system location
 */
export async function findConfigFile(
  startDir: string = process.cwd(),
  systemPath: string = SYSTEM_CONFIG_PATH,
): Promise<string | null> {
  const candidates = [...CONFIG_FILE_NAMES.map((name) => path.join(startDir, name)), systemPath];

  for (const candidate of candidates) {
    const found = await access(candidate).then(
      () => true,
      () => false,
    );
    if (found) {
      return candidate;
    }
  }

  return null;
}

export function applyOverrides(config: HostkeepConfig, overrides: ConfigOverrides): HostkeepConfig {
  const result: HostkeepConfig = {
    ...config,
    backupDir: overrides.backupDir ? path.resolve(overrides.backupDir) : config.backupDir,
    namePrefix: overrides.namePrefix ?? config.namePrefix,
    compression: overrides.compression ?? config.compression,
    removeStaging: overrides.removeStaging ?? config.removeStaging,
    docker: { ...config.docker, enabled: overrides.dockerEnabled ?? config.docker.enabled },
  };
  validateConfig(result);
  return result;
}

/**
 * Load the given or discovered config file, falling back to the defaults when
 * there is none, and apply command-line overrides
 */
export async function findAndLoadConfig(
  configPath?: string,
  overrides: ConfigOverrides = {},
): Promise<HostkeepConfig> {
  const found = configPath ?? (await findConfigFile());

  let config: HostkeepConfig;
  if (found) {
    logger.debug(`Using config file: ${found}`);
    config = await loadConfig(found);
  } else {
    logger.debug("No config file found, using defaults");
    config = structuredClone(DEFAULT_CONFIG);
  }

  return applyOverrides(config, overrides);
}
