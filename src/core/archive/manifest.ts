/**
 * Run manifest: what was captured, what was not, and how to restore it
 */

import type {
  Artifact,
  ArtifactCategory,
  BackupRun,
  HostDescription,
  Manifest,
  Omission,
} from "../../types";
import { ARTIFACT_CATEGORIES } from "../../types";
import { formatBytes } from "../../utils/format";

export const MANIFEST_FILE = "manifest.txt";

export const CRASH_CONSISTENCY_NOTE =
  "Docker volumes were archived while containers kept running; the copy is crash-consistent, " +
  "equivalent to the state left by a sudden power loss.";

export const LIVE_DUMP_NOTE =
  "Database dumps were taken from running servers using each engine's own consistent-dump tool.";

const CATEGORY_TITLES: Record<ArtifactCategory, string> = {
  system: "System",
  packages: "Packages",
  services: "Services",
  docker: "Docker",
  configs: "Configuration",
};

export interface ManifestInput {
  run: Pick<BackupRun, "id" | "name" | "startedAt" | "stagingPath" | "archivePath">;
  host: HostDescription;
  artifacts: Artifact[];
  omissions: Omission[];
  stagingBytes: number;
}

export function buildManifest(input: ManifestInput): Manifest {
  const notes: string[] = [];
  if (input.artifacts.some((a) => a.kind === "volume-store")) {
    notes.push(CRASH_CONSISTENCY_NOTE);
  }
  if (input.artifacts.some((a) => a.kind === "database-dump" || a.kind === "host-database-dump")) {
    notes.push(LIVE_DUMP_NOTE);
  }

  return {
    runId: input.run.id,
    name: input.run.name,
    createdAt: input.run.startedAt,
    host: input.host,
    stagingPath: input.run.stagingPath,
    archivePath: input.run.archivePath,
    stagingBytes: input.stagingBytes,
    artifacts: [...input.artifacts],
    omissions: [...input.omissions],
    notes,
  };
}

function describeOmission(omission: Omission): string {
  const subject = omission.subject ? ` (${omission.subject})` : "";
  return `- [${CATEGORY_TITLES[omission.category]}] ${omission.collector}${subject}: ${omission.reason}`;
}

export function renderManifest(manifest: Manifest): string {
  const lines: string[] = [
    "=== BACKUP MANIFEST ===",
    `Name: ${manifest.name}`,
    `Run ID: ${manifest.runId}`,
    `Created: ${manifest.createdAt.toISOString()}`,
    `Hostname: ${manifest.host.hostname}`,
    `Operating System: ${manifest.host.os}`,
    `Staging Size: ${formatBytes(manifest.stagingBytes)}`,
    `Archive: ${manifest.archivePath}`,
    "",
    "=== CONTENTS ===",
  ];

  for (const category of ARTIFACT_CATEGORIES) {
    const artifacts = manifest.artifacts.filter((a) => a.category === category);
    if (artifacts.length === 0) continue;
    lines.push(`[${CATEGORY_TITLES[category]}]`);
    for (const artifact of artifacts) {
      lines.push(`- ${artifact.relativePath} (${formatBytes(artifact.sizeBytes)})`);
    }
  }

  if (manifest.artifacts.length === 0) {
    lines.push("(nothing captured)");
  }

  if (manifest.omissions.length > 0) {
    lines.push("", "=== SKIPPED ===", ...manifest.omissions.map(describeOmission));
  }

  if (manifest.notes.length > 0) {
    lines.push("", "=== NOTES ===", ...manifest.notes.map((n) => `- ${n}`));
  }

  lines.push(
    "",
    "=== RESTORATION ===",
    "1. Copy the archive to the new server and extract it",
    "2. Run as root: bash restore.sh",
    "3. Reboot and verify that all services are running",
    "",
  );

  return lines.join("\n");
}
