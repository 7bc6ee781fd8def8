/**
 * Restore procedure generation.
 *
 * Each step replays the inverse of one capture step. Steps appear only when
 * the manifest holds artifacts they act on, and every command tolerates being
 * run twice: extraction overwrites, apt install skips what is present, and
 * database replay checks that its container is running first.
 */

import * as path from "node:path";
import type { Artifact, ArtifactKind, DatabaseEngine, Manifest } from "../../types";
import { shellQuote } from "../../utils/path";

export const RESTORE_SCRIPT_FILE = "restore.sh";

export const RESTORE_STEP_ORDER = [
  "preflight",
  "packages",
  "configs",
  "engine-stop",
  "volumes",
  "engine-start",
  "images",
  "database-replay",
  "host-databases",
  "user-homes",
  "finalize",
] as const;

export type RestoreStepName = (typeof RESTORE_STEP_ORDER)[number];

export interface RestoreStep {
  name: RestoreStepName;
  title: string;
  commands: string[];
}

export interface RestoreProcedure {
  steps: RestoreStep[];
  script: string;
}

type ArtifactOf<K extends ArtifactKind> = Extract<Artifact, { kind: K }>;

const CONTAINER_REPLAY: Record<DatabaseEngine, string> = {
  mysql: "mysql",
  postgres: "psql -U postgres",
};

const HOST_REPLAY: Record<DatabaseEngine, string> = {
  mysql: "mysql",
  postgres: "runuser -u postgres -- psql",
};

const HEADER = `#!/bin/bash
# Restores this backup onto a fresh host. Run as root from the extracted directory.

set -u

RESTORE_DIR="$(dirname "$(readlink -f "$0")")"
RED='\\033[0;31m'
GREEN='\\033[0;32m'
YELLOW='\\033[1;33m'
NC='\\033[0m'

log() { echo -e "\${GREEN}[$(date '+%Y-%m-%d %H:%M:%S')]\${NC} $1"; }
warn() { echo -e "\${YELLOW}[WARNING]\${NC} $1"; }
error() { echo -e "\${RED}[ERROR]\${NC} $1"; }
`;

function staged(artifact: Artifact): string {
  return `"$RESTORE_DIR"/${shellQuote(artifact.relativePath)}`;
}

function ofKind<K extends ArtifactKind>(artifacts: Artifact[], kind: K): ArtifactOf<K>[] {
  return artifacts.filter((a): a is ArtifactOf<K> => a.kind === kind);
}

function extractTree(artifact: ArtifactOf<"config-tree">): string {
  const parent = path.dirname(artifact.originalPath);
  return (
    `mkdir -p ${shellQuote(parent)} && tar -xzf ${staged(artifact)} -C ${shellQuote(parent)}` +
    ` || warn ${shellQuote(`Could not restore ${artifact.originalPath}`)}`
  );
}

/**
 * Build the ordered restore steps for a manifest
 */
export function buildRestoreSteps(manifest: Manifest): RestoreStep[] {
  const { artifacts } = manifest;
  const configTrees = ofKind(artifacts, "config-tree");
  const packageTrees = configTrees.filter((a) => a.category === "packages");
  const aptLists = ofKind(artifacts, "package-list").filter((a) => a.source === "apt");
  const composeProjects = ofKind(artifacts, "compose-project");
  const volumeStores = ofKind(artifacts, "volume-store");
  const imageBundles = ofKind(artifacts, "image-bundle");
  const containerDumps = ofKind(artifacts, "database-dump");
  const hostDumps = ofKind(artifacts, "host-database-dump");
  const userHomes = ofKind(artifacts, "user-home");

  const steps: RestoreStep[] = [
    {
      name: "preflight",
      title: "Checking privileges",
      commands: [
        "if [[ $EUID -ne 0 ]]; then",
        '  error "This script must be run as root"',
        "  exit 1",
        "fi",
        'log "Restore directory: $RESTORE_DIR"',
      ],
    },
  ];

  if (aptLists.length > 0 || packageTrees.length > 0) {
    steps.push({
      name: "packages",
      title: "Installing packages",
      commands: [
        ...packageTrees.map(extractTree),
        'apt-get update || warn "apt-get update failed"',
        ...aptLists.map(
          (list) =>
            `cut -f1 ${staged(list)} | xargs -r apt-get install -y || warn "Some packages could not be installed"`,
        ),
      ],
    });
  }

  const otherTrees = configTrees.filter((a) => a.category !== "packages");
  if (otherTrees.length > 0 || composeProjects.length > 0) {
    steps.push({
      name: "configs",
      title: "Restoring configurations",
      commands: [
        ...otherTrees.map(extractTree),
        ...composeProjects.map(
          (project) =>
            `mkdir -p ${shellQuote(project.originalDir)} && cp -a ${staged(project)}/. ${shellQuote(project.originalDir)}/` +
            ` || warn ${shellQuote(`Could not restore ${project.originalDir}`)}`,
        ),
      ],
    });
  }

  if (volumeStores.length > 0) {
    steps.push(
      {
        name: "engine-stop",
        title: "Stopping Docker",
        commands: ["systemctl stop docker 2>/dev/null || true"],
      },
      {
        name: "volumes",
        title: "Restoring Docker volumes",
        commands: volumeStores.map(
          (store) =>
            `mkdir -p ${shellQuote(store.storePath)} && tar -xzf ${staged(store)} -C ${shellQuote(store.storePath)}` +
            ' || warn "Could not restore Docker volumes"',
        ),
      },
    );
  }

  if (volumeStores.length > 0 || imageBundles.length > 0 || containerDumps.length > 0) {
    steps.push({
      name: "engine-start",
      title: "Starting Docker",
      commands: ['systemctl start docker || error "Could not start Docker"'],
    });
  }

  if (imageBundles.length > 0) {
    steps.push({
      name: "images",
      title: "Loading Docker images",
      commands: imageBundles.map(
        (bundle) => `docker load -i ${staged(bundle)} || warn "Could not restore Docker images"`,
      ),
    });
  }

  if (containerDumps.length > 0) {
    steps.push({
      name: "database-replay",
      title: "Replaying database dumps into running containers",
      commands: containerDumps.flatMap((dump) => {
        const container = shellQuote(dump.container);
        return [
          `if docker ps --format '{{.Names}}' | grep -qxF ${container}; then`,
          `  docker exec -i ${container} ${CONTAINER_REPLAY[dump.engine]} < ${staged(dump)}` +
            ` || warn ${shellQuote(`Could not replay dump into ${dump.container}`)}`,
          "else",
          `  warn ${shellQuote(`Container ${dump.container} is not running; skipped ${dump.relativePath}`)}`,
          "fi",
        ];
      }),
    });
  }

  if (hostDumps.length > 0) {
    steps.push({
      name: "host-databases",
      title: "Restoring host databases",
      commands: hostDumps.map(
        (dump) =>
          `${HOST_REPLAY[dump.engine]} < ${staged(dump)}` +
          ` || warn ${shellQuote(`Could not restore host ${dump.engine} databases`)}`,
      ),
    });
  }

  if (userHomes.length > 0) {
    steps.push({
      name: "user-homes",
      title: "Restoring user data",
      commands: userHomes.map(
        (home) =>
          `tar -xzf ${staged(home)} -C ${shellQuote(home.homeRoot)}` +
          ` || warn ${shellQuote(`Could not restore user ${home.username}`)}`,
      ),
    });
  }

  steps.push({
    name: "finalize",
    title: "Performing final configuration",
    commands: ['systemctl daemon-reload || warn "systemctl daemon-reload failed"'],
  });

  return steps;
}

export function renderRestoreScript(steps: RestoreStep[]): string {
  const body = steps.flatMap((step) => ["", `log ${shellQuote(`${step.title}...`)}`, ...step.commands]);
  return [
    HEADER.trimEnd(),
    ...body,
    "",
    'log "Restoration completed. Reboot the system and verify all services."',
    "",
  ].join("\n");
}

export function emitRestoreProcedure(manifest: Manifest): RestoreProcedure {
  const steps = buildRestoreSteps(manifest);
  return { steps, script: renderRestoreScript(steps) };
}
