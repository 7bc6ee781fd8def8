import { parseArgs } from "node:util";
import { type ConfigOverrides, ConfigError, findAndLoadConfig } from "../../config";
import { BackupPipeline, type PipelineOutcome, describeError, discardStaging } from "../../core";
import { createHostCapabilities } from "../../system";
import type { HostkeepConfig } from "../../types";
import { formatBytes, formatDuration } from "../../utils/format";
import { setLogLevel } from "../../utils/logger";
import { color, formatSummary, ui } from "../ui";

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export function parseCompression(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (!/^[0-9]$/.test(value)) {
    throw new UsageError(`--compression must be a single digit from 0 to 9, got "${value}"`);
  }
  return Number(value);
}

export function stagingChoice(values: {
  "remove-staging"?: boolean;
  "keep-staging"?: boolean;
}): boolean | undefined {
  if (values["remove-staging"] && values["keep-staging"]) {
    throw new UsageError("--remove-staging and --keep-staging cannot be used together");
  }
  if (values["remove-staging"]) return true;
  if (values["keep-staging"]) return false;
  return undefined;
}

function parseBackupArgs(args: string[]) {
  return parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      "backup-dir": { type: "string" },
      prefix: { type: "string" },
      compression: { type: "string" },
      "remove-staging": { type: "boolean", default: false },
      "keep-staging": { type: "boolean", default: false },
      "no-docker": { type: "boolean", default: false },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: false,
  }).values;
}

type BackupArgs = ReturnType<typeof parseBackupArgs>;

export async function backupCommand(args: string[]): Promise<number> {
  let values: BackupArgs;
  try {
    values = parseBackupArgs(args);
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
    const overrides: ConfigOverrides = {
      backupDir: values["backup-dir"],
      namePrefix: values.prefix,
      compression: parseCompression(values.compression),
      removeStaging: stagingChoice(values),
      dockerEnabled: values["no-docker"] ? false : undefined,
    };
    config = await findAndLoadConfig(values.config, overrides);
  } catch (error) {
    if (error instanceof ConfigError || error instanceof UsageError) {
      ui.error(error.message);
      return 1;
    }
    throw error;
  }

  ui.banner("backup");
  ui.info(`Backup directory: ${config.backupDir}`);

  const pipeline = new BackupPipeline(config, createHostCapabilities(config));
  const outcome = await pipeline.run();
  reportPermissions(outcome);

  if (outcome.status === "aborted") {
    ui.error(`Backup aborted: ${outcome.error.message}`);
    if (values.verbose) {
      console.error(outcome.error);
    }
    ui.cancel("No archive was written");
    return 1;
  }

  const { run, manifest, archive } = outcome;
  for (const omission of manifest.omissions) {
    const subject = omission.subject ? ` (${omission.subject})` : "";
    ui.warn(`Skipped ${omission.collector}${subject}: ${omission.reason}`);
  }

  ui.note(
    formatSummary([
      { label: "Backup ID", value: run.id },
      { label: "Archive", value: archive.archivePath },
      { label: "Size", value: formatBytes(archive.sizeBytes) },
      { label: "SHA-256", value: archive.checksum },
      { label: "Artifacts", value: manifest.artifacts.length },
      { label: "Skipped", value: manifest.omissions.length || null },
      { label: "Duration", value: formatDuration(Date.now() - run.startedAt.getTime()) },
    ]),
    "Backup Summary",
  );

  await settleStaging(config, run.stagingPath);

  ui.outro("Backup complete! To restore: extract the archive and run restore.sh as root");
  return 0;
}

async function settleStaging(config: HostkeepConfig, stagingPath: string): Promise<void> {
  if (config.removeStaging === true) {
    return;
  }
  if (config.removeStaging === false) {
    ui.info(`Uncompressed backup kept at ${stagingPath}`);
    return;
  }

  const remove = await ui.confirm({
    message: "Remove uncompressed backup directory?",
    initialValue: false,
  });

  if (ui.isCancel(remove) || !remove) {
    ui.info(`Uncompressed backup kept at ${stagingPath}`);
    return;
  }

  try {
    await discardStaging(stagingPath);
    ui.success("Uncompressed backup directory removed");
  } catch (error) {
    ui.warn(`Could not remove ${stagingPath}: ${describeError(error)}`);
  }
}

function reportPermissions(outcome: PipelineOutcome): void {
  for (const failure of outcome.permissions.failures) {
    ui.warn(failure.message);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("hostkeep backup")} - Capture this host into a compressed archive

${color.dim("USAGE:")}
  hostkeep backup [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>       Path to config file (default: ./hostkeep.config.yaml,
                            then /etc/hostkeep/config.yaml, then built-in defaults)
      --backup-dir <path>   Directory for the staging tree and archive (default: /home/ftpbackup)
      --prefix <name>       Archive name prefix (default: vps_backup)
      --compression <0-9>   gzip level (default: 6)
      --remove-staging      Delete the uncompressed staging tree after archiving
      --keep-staging        Keep the staging tree without asking
      --no-docker           Skip containers, volumes, images and container databases
  -v, --verbose             Verbose output
  -h, --help                Show this help message

Without --remove-staging or --keep-staging you are asked at the end.
Containers keep running throughout; volume archives are crash-consistent.

${color.dim("EXAMPLES:")}
  sudo hostkeep backup                         # Full backup with defaults
  sudo hostkeep backup --backup-dir /mnt/bk    # Write to another disk
  sudo hostkeep backup --no-docker --keep-staging
`);
}
