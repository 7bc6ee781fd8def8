export * from "./errors";
export { PermissionLedger, parseMode } from "./ledger/permission-ledger";
export type { FileModeOps, PermissionRecord, RestoreReport } from "./ledger/permission-ledger";
export { SpaceGuard } from "./guard/space-guard";
export { ArchiveBuilder } from "./archive/archive-builder";
export { buildManifest, renderManifest } from "./archive/manifest";
export { emitRestoreProcedure } from "./restore/restore-script";
export { createDefaultCollectors } from "./collectors";
export { BackupPipeline, discardStaging } from "./pipeline/orchestrator";
export type { PipelineDeps, PipelineOutcome } from "./pipeline/orchestrator";
