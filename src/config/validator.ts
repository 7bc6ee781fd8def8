/**
 * Configuration validation
 */

import type { HostkeepConfig } from "../types";
import { isRecord } from "./defaults";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Validator = (config: Record<string, unknown>) => void;

function section(c: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = c[key];
  if (!isRecord(value)) {
    throw new ConfigError(`${key} must be an object`);
  }
  return value;
}

function requireString(value: unknown, field: string): void {
  if (typeof value !== "string" || value.length === 0) {
    throw new ConfigError(`${field} must be a non-empty string`);
  }
}

function requireBoolean(value: unknown, field: string): void {
  if (typeof value !== "boolean") {
    throw new ConfigError(`${field} must be a boolean`);
  }
}

function requireNumber(value: unknown, field: string, min: number, max = Infinity): void {
  if (typeof value !== "number" || !Number.isInteger(value) || value < min || value > max) {
    const range = max === Infinity ? `>= ${min}` : `between ${min} and ${max}`;
    throw new ConfigError(`${field} must be an integer ${range}`);
  }
}

function requireStringArray(value: unknown, field: string): void {
  if (!Array.isArray(value) || value.some((v) => typeof v !== "string" || v.length === 0)) {
    throw new ConfigError(`${field} must be an array of strings`);
  }
}

function requirePattern(value: unknown, field: string): void {
  requireString(value, field);
  try {
    new RegExp(String(value));
  } catch {
    throw new ConfigError(`${field} is not a valid regular expression`);
  }
}

const validators: Record<string, Validator> = {
  version: (c) => requireString(c.version, "version"),

  paths: (c) => {
    requireString(c.backupDir, "backupDir");
    requireString(c.namePrefix, "namePrefix");
    if (typeof c.namePrefix === "string" && !/^[A-Za-z0-9_.-]+$/.test(c.namePrefix)) {
      throw new ConfigError("namePrefix may only contain letters, digits, '.', '_' and '-'");
    }
  },

  archive: (c) => {
    requireNumber(c.compression, "compression", 0, 9);
    if (c.removeStaging !== undefined) {
      requireBoolean(c.removeStaging, "removeStaging");
    }
    requireBoolean(c.requireRoot, "requireRoot");
  },

  space: (c) => {
    const space = section(c, "space");
    requireNumber(space.safetyMarginMb, "space.safetyMarginMb", 0);
    requireNumber(space.defaultPhaseMb, "space.defaultPhaseMb", 0);
  },

  permissions: (c) => {
    const permissions = section(c, "permissions");
    const mode = permissions.readMode;
    if (typeof mode !== "string" || !/^(0o?)?[0-7]{3,4}$/.test(mode)) {
      throw new ConfigError("permissions.readMode must be an octal mode such as \"755\"");
    }
  },

  timeouts: (c) => {
    const timeouts = section(c, "timeouts");
    requireNumber(timeouts.commandSeconds, "timeouts.commandSeconds", 0);
    requireNumber(timeouts.dumpSeconds, "timeouts.dumpSeconds", 0);
  },

  docker: (c) => {
    const docker = section(c, "docker");
    requireBoolean(docker.enabled, "docker.enabled");
    requireString(docker.engineRoot, "docker.engineRoot");
    requireString(docker.volumeStore, "docker.volumeStore");
    requireStringArray(docker.composeRoots, "docker.composeRoots");
    requireStringArray(docker.composeFileNames, "docker.composeFileNames");
    requireNumber(docker.composeMaxDepth, "docker.composeMaxDepth", 0);

    if (!Array.isArray(docker.databases)) {
      throw new ConfigError("docker.databases must be an array");
    }
    docker.databases.forEach((rule: unknown, i) => {
      if (!isRecord(rule)) {
        throw new ConfigError(`docker.databases[${i}] must be an object`);
      }
      requirePattern(rule.pattern, `docker.databases[${i}].pattern`);
      if (rule.engine !== "mysql" && rule.engine !== "postgres") {
        throw new ConfigError(`docker.databases[${i}].engine must be 'mysql' or 'postgres'`);
      }
    });
  },

  configPaths: (c) => requireStringArray(c.configPaths, "configPaths"),

  panels: (c) => {
    if (!Array.isArray(c.panels)) {
      throw new ConfigError("panels must be an array");
    }
    c.panels.forEach((panel: unknown, i) => {
      if (!isRecord(panel)) {
        throw new ConfigError(`panels[${i}] must be an object`);
      }
      requireString(panel.name, `panels[${i}].name`);
      requireStringArray(panel.paths, `panels[${i}].paths`);
      if (panel.databaseContainerPattern !== undefined) {
        requirePattern(panel.databaseContainerPattern, `panels[${i}].databaseContainerPattern`);
      }
    });
  },

  users: (c) => {
    const users = section(c, "users");
    requireString(users.homeRoot, "users.homeRoot");
    requireNumber(users.minUid, "users.minUid", 0);
  },
};

/**
 * Validate a configuration object
 */
export function validateConfig(config: unknown): asserts config is HostkeepConfig {
  if (!isRecord(config)) {
    throw new ConfigError("Config must be an object");
  }

  for (const validate of Object.values(validators)) {
    validate(config);
  }
}
