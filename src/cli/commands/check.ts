import * as path from "node:path";
import { parseArgs } from "node:util";
import { ConfigError, findAndLoadConfig } from "../../config";
import { SpaceGuard } from "../../core";
import { createHostCapabilities } from "../../system";
import type { ContainerEngine, DiskProbe } from "../../system/capabilities";
import type { HostkeepConfig, SpaceEstimate, SpacePhase } from "../../types";
import { formatBytes, mibToBytes } from "../../utils/format";
import { setLogLevel } from "../../utils/logger";
import { color, formatSummary, formatTableRow, formatTableSeparator, TABLE_WIDTHS, ui } from "../ui";

/**
 * Nearest existing directory at or above `dir`; free space is measured there
 * when the backup directory does not exist yet
 */
export async function existingAncestor(dir: string, disk: Pick<DiskProbe, "freeBytes">): Promise<string> {
  let current = path.resolve(dir);
  for (;;) {
    const ok = await disk.freeBytes(current).then(
      () => true,
      () => false,
    );
    const parent = path.dirname(current);
    if (ok || parent === current) return current;
    current = parent;
  }
}

export function preflightPhases(config: HostkeepConfig): SpacePhase[] {
  return config.docker.enabled ? ["initial", "docker_volumes", "docker_images"] : ["initial"];
}

/**
 * Estimate every pre-run phase against a staging tree that does not exist yet
 */
export async function estimatePreflight(
  config: HostkeepConfig,
  disk: DiskProbe,
  engine: ContainerEngine | null,
): Promise<SpaceEstimate[]> {
  const measuredAt = await existingAncestor(config.backupDir, disk);
  const probe: DiskProbe = {
    freeBytes: () => disk.freeBytes(measuredAt),
    directorySize: (p) => disk.directorySize(p),
  };
  const guard = new SpaceGuard({
    disk: probe,
    engine: config.docker.enabled ? engine : null,
    volumeStorePath: config.docker.volumeStore,
    safetyMarginBytes: mibToBytes(config.space.safetyMarginMb),
    defaultPhaseBytes: mibToBytes(config.space.defaultPhaseMb),
  });
  const stagingPath = path.join(config.backupDir, `${config.namePrefix}_preflight`);

  const estimates: SpaceEstimate[] = [];
  for (const phase of preflightPhases(config)) {
    estimates.push(await guard.estimate(phase, stagingPath));
  }
  return estimates;
}

export async function checkCommand(args: string[]): Promise<number> {
  let values: ReturnType<typeof parseCheckArgs>;
  try {
    values = parseCheckArgs(args);
  } catch (error) {
    ui.error(error instanceof Error ? error.message : String(error));
    return 1;
  }

  if (values.help) {
    printHelp();
    return 0;
  }

  if (values.verbose) {
    setLogLevel("debug");
  }

  let config: HostkeepConfig;
  try {
    config = await findAndLoadConfig(values.config, {
      backupDir: values["backup-dir"],
      dockerEnabled: values["no-docker"] ? false : undefined,
    });
  } catch (error) {
    if (error instanceof ConfigError) {
      ui.error(error.message);
      return 1;
    }
    throw error;
  }

  ui.banner("check");

  const caps = createHostCapabilities(config);
  const dockerAvailable = config.docker.enabled && (await caps.engine.isAvailable());
  const estimates = await estimatePreflight(
    config,
    caps.disk,
    dockerAvailable ? caps.engine : null,
  );

  const widths = [TABLE_WIDTHS.phase, TABLE_WIDTHS.amount, TABLE_WIDTHS.status];
  const rows = [
    formatTableRow(["Phase", "Projected", "Fits"], widths),
    formatTableSeparator(widths),
    ...estimates.map((e) =>
      formatTableRow(
        [
          e.phase,
          formatBytes(e.projectedBytes),
          e.projectedBytes > e.availableBytes ? color.red("no") : color.green("yes"),
        ],
        widths,
      ),
    ),
  ];

  ui.note(
    formatSummary([
      { label: "Backup directory", value: config.backupDir },
      { label: "Free space", value: formatBytes(estimates[0]?.availableBytes ?? 0) },
      { label: "Safety margin", value: formatBytes(mibToBytes(config.space.safetyMarginMb)) },
      {
        label: "Docker",
        value: !config.docker.enabled ? "disabled" : dockerAvailable ? "available" : "not found",
      },
    ]),
    "Host",
  );
  ui.note(rows.join("\n"), "Space projection");

  const failing = estimates.filter((e) => e.projectedBytes > e.availableBytes);
  if (failing.length > 0) {
    ui.error(`Not enough space for: ${failing.map((e) => e.phase).join(", ")}`);
    return 1;
  }

  ui.outro("Enough space for every phase");
  return 0;
}

function parseCheckArgs(args: string[]) {
  return parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      "backup-dir": { type: "string" },
      "no-docker": { type: "boolean", default: false },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: false,
  }).values;
}

function printHelp(): void {
  console.log(`
${color.bold("hostkeep check")} - Project the disk space a backup would need

${color.dim("USAGE:")}
  hostkeep check [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>       Path to config file
      --backup-dir <path>   Directory the backup would be written to
      --no-docker           Leave container volumes and images out of the projection
  -v, --verbose             Verbose output
  -h, --help                Show this help message

Exits with status 1 when any projection exceeds the free space.
`);
}
