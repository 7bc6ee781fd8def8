/**
 * Host description and account lookup
 */

import { readFile, statfs } from "node:fs/promises";
import * as os from "node:os";
import type { HostDescription } from "../types";
import type { HostInspector } from "./capabilities";

const OS_RELEASE = "/etc/os-release";
const PASSWD = "/etc/passwd";

/**
 * Read PRETTY_NAME out of os-release content
 */
export function parseOsRelease(content: string): string | null {
  for (const line of content.split("\n")) {
    const match = line.match(/^PRETTY_NAME=(.*)$/);
    if (match) {
      return (match[1] ?? "").replace(/^["']|["']$/g, "");
    }
  }
  return null;
}

/**
 * Parse passwd(5) content into username -> uid
 */
export function parsePasswd(content: string): Map<string, number> {
  const accounts = new Map<string, number>();
  for (const line of content.split("\n")) {
    if (!line || line.startsWith("#")) continue;
    const [name, , uid] = line.split(":");
    const parsed = Number.parseInt(uid ?? "", 10);
    if (name && !Number.isNaN(parsed)) {
      accounts.set(name, parsed);
    }
  }
  return accounts;
}

function primaryIPv4(): string | null {
  for (const addresses of Object.values(os.networkInterfaces())) {
    for (const address of addresses ?? []) {
      if (address.family === "IPv4" && !address.internal) {
        return address.address;
      }
    }
  }
  return null;
}

export class LocalHostInspector implements HostInspector {
  async describe(): Promise<HostDescription> {
    const osName = await readFile(OS_RELEASE, "utf8").then(
      (content) => parseOsRelease(content) ?? `${os.type()} ${os.release()}`,
      () => `${os.type()} ${os.release()}`,
    );
    const rootDiskBytes = await statfs("/").then(
      (s) => s.blocks * s.bsize,
      () => 0,
    );

    return {
      hostname: os.hostname(),
      os: osName,
      kernel: os.release(),
      architecture: os.machine(),
      cpu: os.cpus()[0]?.model.trim() ?? "unknown",
      memoryBytes: os.totalmem(),
      rootDiskBytes,
      ipAddress: primaryIPv4(),
    };
  }

  isElevated(): boolean {
    return typeof process.getuid === "function" && process.getuid() === 0;
  }

  async listAccounts(): Promise<Map<string, number>> {
    return parsePasswd(await readFile(PASSWD, "utf8"));
  }
}
