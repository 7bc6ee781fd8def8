/**
 * systemd unit listing
 */

import type { CommandRunner, ServiceManager, ServiceUnit, UnitListing } from "./capabilities";

/**
 * Parse `systemctl list-units --plain --no-legend` rows:
 * UNIT LOAD ACTIVE SUB DESCRIPTION...
 */
export function parseListUnits(output: string): ServiceUnit[] {
  return output
    .split("\n")
    .map((line) => line.trim())
    .filter(Boolean)
    .map((line) => {
      const [unit = "", , active = "", sub = "", ...description] = line.split(/\s+/);
      return { unit, state: `${active}/${sub}`, description: description.join(" ") };
    });
}

/**
 * Parse `systemctl list-unit-files --no-legend` rows: UNIT STATE [PRESET]
 */
export function parseListUnitFiles(output: string): ServiceUnit[] {
  return output
    .split("\n")
    .map((line) => line.trim())
    .filter(Boolean)
    .map((line) => {
      const [unit = "", state = ""] = line.split(/\s+/);
      return { unit, state, description: "" };
    });
}

export class SystemdServiceManager implements ServiceManager {
  constructor(
    private readonly runner: CommandRunner,
    private readonly timeoutMs?: number,
  ) {}

  async listUnits(listing: UnitListing): Promise<ServiceUnit[]> {
    const common = ["--type=service", "--no-legend", "--no-pager"];
    const args =
      listing === "enabled"
        ? ["list-unit-files", ...common, "--state=enabled"]
        : ["list-units", ...common, "--plain", `--state=${listing}`];

    const result = await this.runner.run("systemctl", args, { timeoutMs: this.timeoutMs });
    if (!result.success) {
      throw new Error(`systemctl ${args[0]} failed: ${result.stderr || `exit ${result.exitCode}`}`);
    }

    return listing === "enabled" ? parseListUnitFiles(result.stdout) : parseListUnits(result.stdout);
  }
}
