/**
 * Centralized type exports for hostkeep
 */

// Backup types
export type {
  ArchiveResult,
  Artifact,
  ArtifactBase,
  ArtifactCategory,
  ArtifactKind,
  BackupRun,
  CollectorOutput,
  HostDescription,
  Manifest,
  Omission,
  PackageSource,
  PhaseName,
  PhaseResult,
  RunStatus,
  SpaceEstimate,
  SpacePhase,
} from "./backup";
export { ARTIFACT_CATEGORIES, PHASE_ORDER } from "./backup";
// Config types
export type {
  ContainerDatabaseRule,
  DatabaseEngine,
  DockerConfig,
  HostkeepConfig,
  PanelConfig,
  PermissionsConfig,
  SpaceConfig,
  TimeoutsConfig,
  UsersConfig,
} from "./config";
