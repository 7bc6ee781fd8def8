import { describe, expect, test } from "vitest";
import {
  CRASH_CONSISTENCY_NOTE,
  LIVE_DUMP_NOTE,
  buildManifest,
  renderManifest,
} from "../../src/core/archive/manifest";
import { TEST_HOST } from "../helpers/fakes";
import { ALL_ARTIFACTS, makeManifest } from "../helpers/manifest";

const RUN = {
  id: "00000000-0000-4000-8000-000000000000",
  name: "vps_backup_20240102_030405",
  startedAt: new Date("2024-01-02T03:04:05.000Z"),
  stagingPath: "/home/ftpbackup/vps_backup_20240102_030405",
  archivePath: "/home/ftpbackup/vps_backup_20240102_030405.tar.gz",
};

describe("manifest", () => {
  test("notes crash consistency when volumes were captured live", () => {
    const manifest = buildManifest({
      run: RUN,
      host: TEST_HOST,
      artifacts: ALL_ARTIFACTS,
      omissions: [],
      stagingBytes: 100,
    });

    expect(manifest.notes).toEqual([CRASH_CONSISTENCY_NOTE, LIVE_DUMP_NOTE]);
    expect(manifest.runId).toBe(RUN.id);
    expect(manifest.createdAt).toBe(RUN.startedAt);
    expect(manifest.artifacts).toHaveLength(ALL_ARTIFACTS.length);
  });

  test("no notes without live captures", () => {
    const manifest = buildManifest({
      run: RUN,
      host: TEST_HOST,
      artifacts: ALL_ARTIFACTS.filter((a) => a.kind === "report"),
      omissions: [],
      stagingBytes: 0,
    });

    expect(manifest.notes).toEqual([]);
  });

  test("renders contents grouped by category", () => {
    const text = renderManifest(makeManifest());
    const lines = text.split("\n");

    expect(lines.slice(0, 8)).toEqual([
      "=== BACKUP MANIFEST ===",
      "Name: vps_backup_20240102_030405",
      "Run ID: 00000000-0000-4000-8000-000000000000",
      "Created: 2024-01-02T03:04:05.000Z",
      "Hostname: test-host",
      "Operating System: Ubuntu 24.04 LTS",
      "Staging Size: 6.00 MiB",
      "Archive: /home/ftpbackup/vps_backup_20240102_030405.tar.gz",
    ]);

    const systemAt = lines.indexOf("[System]");
    expect(lines.slice(systemAt, systemAt + 3)).toEqual([
      "[System]",
      "- system/system_info.txt (300 B)",
      "- system/user_alice.tar.gz (900 B)",
    ]);
    expect(lines.indexOf("[Docker]")).toBeGreaterThan(lines.indexOf("[System]"));
    expect(lines).toContain("- docker/docker_volumes.tar.gz (1.00 MiB)");
    expect(lines).not.toContain("[Services]");
    expect(lines).not.toContain("=== SKIPPED ===");
  });

  test("lists omissions as skipped items under their category", () => {
    const text = renderManifest(
      makeManifest({
        omissions: [
          {
            collector: "database-dumps",
            category: "docker",
            subject: "main_postgres",
            reason: "access denied",
          },
          { collector: "services", category: "services", reason: "systemctl not found" },
        ],
      }),
    );
    const lines = text.split("\n");
    const at = lines.indexOf("=== SKIPPED ===");

    expect(lines.slice(at, at + 3)).toEqual([
      "=== SKIPPED ===",
      "- [Docker] database-dumps (main_postgres): access denied",
      "- [Services] services: systemctl not found",
    ]);
  });

  test("an empty run says nothing was captured", () => {
    const lines = renderManifest(makeManifest({ artifacts: [] })).split("\n");
    expect(lines[lines.indexOf("=== CONTENTS ===") + 1]).toBe("(nothing captured)");
  });
});
