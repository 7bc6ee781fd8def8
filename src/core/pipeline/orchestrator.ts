/**
 * Backup pipeline orchestration
 */

import { chmod, mkdir, rm, writeFile } from "node:fs/promises";
import * as path from "node:path";
import type { DiskProbe } from "../../system/capabilities";
import { secondsToMs } from "../../system/exec";
import type {
  Artifact,
  ArchiveResult,
  BackupRun,
  HostkeepConfig,
  Manifest,
  Omission,
  PhaseResult,
} from "../../types";
import { ARTIFACT_CATEGORIES, PHASE_ORDER } from "../../types";
import { generateUUID } from "../../utils/crypto";
import { formatBytes, formatDuration, mibToBytes } from "../../utils/format";
import { logger } from "../../utils/logger";
import { generateRunName } from "../../utils/naming";
import { ArchiveBuilder } from "../archive/archive-builder";
import { buildManifest } from "../archive/manifest";
import { type CollectorDeps, createDefaultCollectors } from "../collectors";
import type { ResourceCollector } from "../collectors/types";
import { type AbortError, UnrecoverableSetupError, describeError, isAbortError } from "../errors";
import { SpaceGuard } from "../guard/space-guard";
import { PermissionLedger, type RestoreReport } from "../ledger/permission-ledger";
import { RESTORE_SCRIPT_FILE, emitRestoreProcedure } from "../restore/restore-script";
import { RunScope } from "./run-scope";

export interface PipelineDeps extends CollectorDeps {
  disk: DiskProbe;
  /** Defaults to a ledger over node:fs */
  ledger?: PermissionLedger;
  /** Defaults to every collector the configuration enables */
  collectors?: ResourceCollector[];
  now?: () => Date;
}

interface OutcomeBase {
  run: Readonly<BackupRun>;
  phases: PhaseResult[];
  permissions: RestoreReport;
}

export type PipelineOutcome =
  | (OutcomeBase & { status: "succeeded"; manifest: Manifest; archive: ArchiveResult })
  | (OutcomeBase & { status: "aborted"; error: AbortError });

/**
 * Delete a staging tree left in place after a run
 */
export async function discardStaging(stagingPath: string): Promise<void> {
  await rm(stagingPath, { recursive: true, force: true });
  logger.info(`Removed staging directory ${stagingPath}`);
}

export class BackupPipeline {
  private readonly ledger: PermissionLedger;
  private readonly collectors: ResourceCollector[];
  private readonly now: () => Date;

  constructor(
    private readonly config: HostkeepConfig,
    private readonly deps: PipelineDeps,
  ) {
    this.ledger = deps.ledger ?? new PermissionLedger();
    this.collectors = orderByPhase(deps.collectors ?? createDefaultCollectors(config, deps));
    this.now = deps.now ?? (() => new Date());
  }

  async run(): Promise<PipelineOutcome> {
    const startedAt = this.now();
    const name = generateRunName(this.config.namePrefix, startedAt);
    const run: BackupRun = {
      id: generateUUID(),
      name,
      startedAt,
      stagingPath: path.join(this.config.backupDir, name),
      archivePath: path.join(this.config.backupDir, `${name}.tar.gz`),
      completedPhases: [],
      status: "running",
    };

    logger.info(`Starting backup: ${run.name} (${run.id})`);

    const scope = new RunScope(this.ledger);
    const guard = new SpaceGuard({
      disk: this.deps.disk,
      engine: this.config.docker.enabled ? this.deps.engine : null,
      volumeStorePath: this.config.docker.volumeStore,
      safetyMarginBytes: mibToBytes(this.config.space.safetyMarginMb),
      defaultPhaseBytes: mibToBytes(this.config.space.defaultPhaseMb),
      onAbort: () => scope.abort(),
    });
    const phases: PhaseResult[] = [];

    let outcome: PipelineOutcome;
    try {
      this.checkPrivileges();
      await this.createStaging(run, scope);
      await guard.check("initial", run.stagingPath);

      const artifacts: Artifact[] = [];
      const omissions: Omission[] = [];

      for (const phase of PHASE_ORDER) {
        if (phase === "archive") continue;
        for (const collector of this.collectors.filter((c) => c.phase === phase)) {
          const result = await this.runCollector(collector, run, guard);
          phases.push(result);
          collectResult(result, artifacts, omissions);
        }
        run.completedPhases.push(phase);
      }

      const manifest = buildManifest({
        run,
        host: await this.deps.host.describe(),
        artifacts,
        omissions,
        stagingBytes: await this.deps.disk.directorySize(run.stagingPath),
      });

      await this.writeRestoreScript(run, manifest);
      await guard.check("compression", run.stagingPath);

      scope.own(run.archivePath);
      const archive = await new ArchiveBuilder(this.deps.runner, {
        gzipLevel: this.config.compression,
        timeoutMs: secondsToMs(this.config.timeouts.dumpSeconds),
      }).finalize(run.stagingPath, manifest, run.archivePath);
      run.completedPhases.push("archive");

      // The archive is final from here on; a leftover staging tree is not a failure
      if (this.config.removeStaging === true) {
        await discardStaging(run.stagingPath).catch((error: unknown) => {
          logger.warn(`Could not remove staging directory ${run.stagingPath}: ${describeError(error)}`);
        });
      }

      run.status = "succeeded";
      const permissions = await scope.release();
      outcome = { status: "succeeded", run, phases, permissions, manifest, archive };

      logger.info(
        `Backup completed: ${archive.archivePath} (${formatBytes(archive.sizeBytes)}) in ` +
          formatDuration(this.now().getTime() - startedAt.getTime()),
      );
    } catch (error) {
      const abortError = isAbortError(error)
        ? error
        : new UnrecoverableSetupError(`Backup failed: ${describeError(error)}`, error);

      logger.error(abortError.message);
      await scope.abort();
      run.status = "aborted";
      outcome = { status: "aborted", run, phases, permissions: await scope.release(), error: abortError };
    }

    Object.freeze(run.completedPhases);
    Object.freeze(run);
    return outcome;
  }

  private checkPrivileges(): void {
    if (this.config.requireRoot && !this.deps.host.isElevated()) {
      throw new UnrecoverableSetupError("This command must be run as root");
    }
  }

  private async createStaging(run: BackupRun, scope: RunScope): Promise<void> {
    try {
      await mkdir(this.config.backupDir, { recursive: true });
      await chmod(this.config.backupDir, 0o755);
      await mkdir(run.stagingPath);
      scope.own(run.stagingPath);
      await chmod(run.stagingPath, 0o755);
      for (const category of ARTIFACT_CATEGORIES) {
        await mkdir(path.join(run.stagingPath, category), { recursive: true });
      }
    } catch (error) {
      throw new UnrecoverableSetupError(`Could not create staging directory ${run.stagingPath}`, error);
    }
    logger.info(`Staging directory: ${run.stagingPath}`);
  }

  private async runCollector(
    collector: ResourceCollector,
    run: BackupRun,
    guard: SpaceGuard,
  ): Promise<PhaseResult> {
    const { name, phase, category } = collector;
    const readMode = this.config.permissions.readMode;

    try {
      if (collector.isApplicable && !(await collector.isApplicable())) {
        logger.debug(`Skipping ${name}: not present on this host`);
        return { status: "skipped", collector: name, phase };
      }

      for (const p of collector.permissions ?? []) {
        await this.ledger.acquire(p, readMode);
      }

      await guard.check(collector.spacePhase, run.stagingPath);

      const outputDir = path.join(run.stagingPath, collector.area);
      await mkdir(outputDir, { recursive: true });

      const output = await collector.produce({
        stagingPath: run.stagingPath,
        outputDir,
        ledger: this.ledger,
        readMode,
      });

      if (output.omissions.length > 0) {
        return { status: "partial", collector: name, phase, ...output };
      }
      return { status: "succeeded", collector: name, phase, artifacts: output.artifacts };
    } catch (error) {
      if (isAbortError(error)) throw error;

      const omission: Omission = { collector: name, category, reason: describeError(error) };
      logger.warn(`${name} failed: ${omission.reason}`);
      return { status: "failed", collector: name, phase, omission };
    }
  }

  private async writeRestoreScript(run: BackupRun, manifest: Manifest): Promise<void> {
    logger.info("Creating restoration script...");
    const { script } = emitRestoreProcedure(manifest);
    const scriptPath = path.join(run.stagingPath, RESTORE_SCRIPT_FILE);
    await writeFile(scriptPath, script);
    await chmod(scriptPath, 0o755);
  }
}

function orderByPhase(collectors: ResourceCollector[]): ResourceCollector[] {
  return [...collectors].sort((a, b) => PHASE_ORDER.indexOf(a.phase) - PHASE_ORDER.indexOf(b.phase));
}

function collectResult(result: PhaseResult, artifacts: Artifact[], omissions: Omission[]): void {
  switch (result.status) {
    case "succeeded":
      artifacts.push(...result.artifacts);
      break;
    case "partial":
      artifacts.push(...result.artifacts);
      omissions.push(...result.omissions);
      break;
    case "failed":
      omissions.push(result.omission);
      break;
    case "skipped":
      break;
  }
}
