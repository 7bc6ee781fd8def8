/**
 * Installed-package queries for apt (dpkg), snap and pip
 */

import type { PackageSource } from "../types";
import type { CommandRunner, InstalledPackage, PackageManager } from "./capabilities";

const DPKG_FORMAT = "${db:Status-Abbrev}\\t${Package}\\t${Version}\\n";

/**
 * Parse dpkg-query output produced with DPKG_FORMAT, keeping installed ("ii") packages
 */
export function parseDpkgQuery(output: string): InstalledPackage[] {
  const packages: InstalledPackage[] = [];
  for (const line of output.split("\n")) {
    const [status, name, version] = line.split("\t");
    if (status?.trim() === "ii" && name) {
      packages.push({ name, version: version ?? "" });
    }
  }
  return packages;
}

/**
 * Parse `snap list` table output
 */
export function parseSnapList(output: string): InstalledPackage[] {
  return output
    .split("\n")
    .slice(1)
    .map((line) => line.trim().split(/\s+/))
    .filter((cols) => cols.length >= 2 && cols[0])
    .map((cols) => ({ name: cols[0] ?? "", version: cols[1] ?? "" }));
}

/**
 * Parse `pip list --format=json` output
 */
export function parsePipJson(output: string): InstalledPackage[] {
  const parsed: unknown = JSON.parse(output || "[]");
  if (!Array.isArray(parsed)) {
    return [];
  }
  const packages: InstalledPackage[] = [];
  for (const entry of parsed) {
    if (entry && typeof entry === "object" && "name" in entry && "version" in entry) {
      packages.push({ name: String(entry.name), version: String(entry.version) });
    }
  }
  return packages;
}

export class HostPackageManager implements PackageManager {
  constructor(
    private readonly runner: CommandRunner,
    private readonly timeoutMs?: number,
  ) {}

  async listInstalled(source: PackageSource): Promise<InstalledPackage[] | null> {
    switch (source) {
      case "apt":
        return this.query("dpkg-query", ["-W", "-f", DPKG_FORMAT], parseDpkgQuery);
      case "snap":
        return this.query("snap", ["list"], parseSnapList);
      case "pip": {
        const pip = (await this.runner.which("pip3")) ? "pip3" : "pip";
        return this.query(pip, ["list", "--format=json"], parsePipJson);
      }
    }
  }

  private async query(
    command: string,
    args: string[],
    parse: (output: string) => InstalledPackage[],
  ): Promise<InstalledPackage[] | null> {
    if (!(await this.runner.which(command))) {
      return null;
    }
    const result = await this.runner.run(command, args, { timeoutMs: this.timeoutMs });
    if (!result.success) {
      throw new Error(`${command} failed: ${result.stderr || `exit ${result.exitCode}`}`);
    }
    return parse(result.stdout);
  }
}
