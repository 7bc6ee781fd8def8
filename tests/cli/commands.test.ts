import * as path from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { parseCompression, stagingChoice, UsageError } from "../../src/cli/commands/backup";
import { estimatePreflight, existingAncestor, preflightPhases } from "../../src/cli/commands/check";
import { DEFAULT_CONFIG } from "../../src/config/defaults";
import { NodeDiskProbe } from "../../src/system/disk";
import type { HostkeepConfig } from "../../src/types";
import { MIB } from "../../src/utils/format";
import { FakeDisk, FakeEngine, makeTempDir, removeTempDir } from "../helpers/fakes";

describe("backup command options", () => {
  describe("parseCompression", () => {
    test("accepts single digits", () => {
      expect(parseCompression("0")).toBe(0);
      expect(parseCompression("9")).toBe(9);
    });

    test("leaves an absent value unset", () => {
      expect(parseCompression(undefined)).toBeUndefined();
    });

    test("rejects anything else", () => {
      expect(() => parseCompression("10")).toThrow(UsageError);
      expect(() => parseCompression("fast")).toThrow(
        '--compression must be a single digit from 0 to 9, got "fast"',
      );
    });
  });

  describe("stagingChoice", () => {
    test("maps the flags to a decision", () => {
      expect(stagingChoice({ "remove-staging": true })).toBe(true);
      expect(stagingChoice({ "keep-staging": true })).toBe(false);
      expect(stagingChoice({})).toBeUndefined();
    });

    test("rejects both flags together", () => {
      expect(() => stagingChoice({ "remove-staging": true, "keep-staging": true })).toThrow(
        "--remove-staging and --keep-staging cannot be used together",
      );
    });
  });
});

describe("check command", () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await makeTempDir("check");
  });

  afterAll(async () => {
    await removeTempDir(tempDir);
  });

  function configFor(backupDir: string, dockerEnabled: boolean): HostkeepConfig {
    const base = structuredClone(DEFAULT_CONFIG);
    return {
      ...base,
      backupDir,
      space: { safetyMarginMb: 1, defaultPhaseMb: 2 },
      docker: { ...base.docker, enabled: dockerEnabled },
    };
  }

  test("preflightPhases adds the container phases only with docker enabled", () => {
    expect(preflightPhases(configFor(tempDir, true))).toEqual(["initial", "docker_volumes", "docker_images"]);
    expect(preflightPhases(configFor(tempDir, false))).toEqual(["initial"]);
  });

  test("existingAncestor walks up to a directory that exists", async () => {
    const missing = path.join(tempDir, "not", "yet", "created");
    expect(await existingAncestor(missing, new NodeDiskProbe())).toBe(tempDir);
  });

  test("estimatePreflight projects each phase from an empty staging tree", async () => {
    const config = configFor(path.join(tempDir, "backups"), true);
    const disk = new FakeDisk(50 * MIB);
    disk.sizeOverrides.set(config.docker.volumeStore, 10 * MIB);
    const engine = new FakeEngine({ imagesBytes: 5 * MIB });

    const estimates = await estimatePreflight(config, disk, engine);

    expect(estimates.map((e) => [e.phase, e.projectedBytes, e.availableBytes])).toEqual([
      ["initial", 3 * MIB, 50 * MIB],
      ["docker_volumes", 11 * MIB, 50 * MIB],
      ["docker_images", 6 * MIB, 50 * MIB],
    ]);
    expect(estimates.every((e) => e.stagingBytes === 0)).toBe(true);
  });

  test("estimatePreflight counts no images without an engine", async () => {
    const config = configFor(path.join(tempDir, "backups"), true);
    const disk = new FakeDisk(50 * MIB);
    disk.sizeOverrides.set(config.docker.volumeStore, 0);

    const estimates = await estimatePreflight(config, disk, null);

    expect(estimates.find((e) => e.phase === "docker_images")?.projectedBytes).toBe(MIB);
  });
});
