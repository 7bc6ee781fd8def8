/**
 * Backup run, artifact and manifest type definitions
 */

import type { DatabaseEngine } from "./config";

/** Pipeline phases in the order they execute */
export const PHASE_ORDER = [
  "system",
  "packages",
  "services",
  "network",
  "docker",
  "configs",
  "users",
  "databases",
  "archive",
] as const;

export type PhaseName = (typeof PHASE_ORDER)[number];

/** Phases the space guard knows how to estimate specially; everything else gets the default */
export type SpacePhase = "initial" | "docker_volumes" | "docker_images" | "compression" | PhaseName;

export const ARTIFACT_CATEGORIES = ["system", "docker", "configs", "packages", "services"] as const;

export type ArtifactCategory = (typeof ARTIFACT_CATEGORIES)[number];

export type RunStatus = "running" | "succeeded" | "aborted";

export interface BackupRun {
  id: string;
  name: string;
  startedAt: Date;
  stagingPath: string;
  archivePath: string;
  completedPhases: PhaseName[];
  status: RunStatus;
}

export type PackageSource = "apt" | "snap" | "pip";

export interface ArtifactBase {
  /** Display name */
  name: string;
  /** Path relative to the staging root */
  relativePath: string;
  category: ArtifactCategory;
  /** Name of the collector that produced it */
  collector: string;
  sizeBytes: number;
}

export type Artifact = ArtifactBase &
  (
    | { kind: "report" }
    | { kind: "package-list"; source: PackageSource }
    | { kind: "config-tree"; originalPath: string }
    | { kind: "compose-project"; originalDir: string; files: string[] }
    | { kind: "volume-store"; storePath: string }
    | { kind: "image-bundle"; imageCount: number }
    | { kind: "database-dump"; container: string; engine: DatabaseEngine }
    | { kind: "host-database-dump"; engine: DatabaseEngine }
    | { kind: "user-home"; username: string; homeRoot: string }
  );

export type ArtifactKind = Artifact["kind"];

/**
 * Something a collector was expected to capture but did not
 */
export interface Omission {
  collector: string;
  category: ArtifactCategory;
  /** The unit inside the collector that failed (a container, a path), if narrower than the collector */
  subject?: string;
  reason: string;
}

export interface CollectorOutput {
  artifacts: Artifact[];
  omissions: Omission[];
}

export type PhaseResult =
  | { status: "succeeded"; collector: string; phase: PhaseName; artifacts: Artifact[] }
  | {
      status: "partial";
      collector: string;
      phase: PhaseName;
      artifacts: Artifact[];
      omissions: Omission[];
    }
  | { status: "failed"; collector: string; phase: PhaseName; omission: Omission }
  | { status: "skipped"; collector: string; phase: PhaseName };

export interface SpaceEstimate {
  phase: SpacePhase;
  stagingBytes: number;
  projectedAdditionalBytes: number;
  safetyMarginBytes: number;
  projectedBytes: number;
  availableBytes: number;
}

export interface HostDescription {
  hostname: string;
  os: string;
  kernel: string;
  architecture: string;
  cpu: string;
  memoryBytes: number;
  rootDiskBytes: number;
  ipAddress: string | null;
}

export interface Manifest {
  runId: string;
  name: string;
  createdAt: Date;
  host: HostDescription;
  stagingPath: string;
  archivePath: string;
  stagingBytes: number;
  artifacts: Artifact[];
  omissions: Omission[];
  notes: string[];
}

export interface ArchiveResult {
  archivePath: string;
  sizeBytes: number;
  checksum: string;
}
