import { describe, expect, test, vi } from "vitest";
import { InsufficientSpaceError } from "../../src/core/errors";
import { SpaceGuard, type SpaceGuardOptions } from "../../src/core/guard/space-guard";
import type { SpaceEstimate } from "../../src/types";
import { GIB, MIB } from "../../src/utils/format";
import { FakeDisk, FakeEngine } from "../helpers/fakes";

const STAGING = "/backups/vps_backup_20240102_030405";
const STORE = "/var/lib/docker/volumes";

function createGuard(disk: FakeDisk, overrides: Partial<SpaceGuardOptions> = {}): SpaceGuard {
  return new SpaceGuard({
    disk,
    volumeStorePath: STORE,
    safetyMarginBytes: 500 * MIB,
    defaultPhaseBytes: 100 * MIB,
    ...overrides,
  });
}

describe("SpaceGuard", () => {
  test("default phases project staging + default estimate + margin", async () => {
    const disk = new FakeDisk(10 * GIB);
    disk.sizeOverrides.set(STAGING, 1 * GIB);

    const estimate = await createGuard(disk).estimate("packages", STAGING);

    expect(estimate).toEqual({
      phase: "packages",
      stagingBytes: 1 * GIB,
      projectedAdditionalBytes: 100 * MIB,
      safetyMarginBytes: 500 * MIB,
      projectedBytes: 1 * GIB + 600 * MIB,
      availableBytes: 10 * GIB,
    });
  });

  test("docker_volumes estimates the size of the volume store", async () => {
    const disk = new FakeDisk(100 * GIB);
    disk.sizeOverrides.set(STAGING, 0);
    disk.sizeOverrides.set(STORE, 7 * GIB);

    const estimate = await createGuard(disk).estimate("docker_volumes", STAGING);

    expect(estimate.projectedAdditionalBytes).toBe(7 * GIB);
  });

  test("docker_images estimates from engine image usage", async () => {
    const disk = new FakeDisk(100 * GIB);
    disk.sizeOverrides.set(STAGING, 0);
    const engine = new FakeEngine({ imagesBytes: 3_200_000_000 });

    const estimate = await createGuard(disk, { engine }).estimate("docker_images", STAGING);

    expect(estimate.projectedAdditionalBytes).toBe(3_200_000_000);
  });

  test("docker_images is zero without an engine", async () => {
    const disk = new FakeDisk(100 * GIB);
    disk.sizeOverrides.set(STAGING, 0);

    const estimate = await createGuard(disk).estimate("docker_images", STAGING);

    expect(estimate.projectedAdditionalBytes).toBe(0);
  });

  test("compression needs twice the staging size", async () => {
    const disk = new FakeDisk(100 * GIB);
    disk.sizeOverrides.set(STAGING, 4 * GIB);

    const estimate = await createGuard(disk).estimate("compression", STAGING);

    expect(estimate.projectedAdditionalBytes).toBe(8 * GIB);
    expect(estimate.projectedBytes).toBe(12 * GIB + 500 * MIB);
  });

  test("check passes when the projection fits", async () => {
    const disk = new FakeDisk(2 * GIB);
    disk.sizeOverrides.set(STAGING, 0);
    const onAbort = vi.fn(async () => {});

    const estimate = await createGuard(disk, { onAbort }).check("initial", STAGING);

    expect(estimate.projectedBytes).toBe(600 * MIB);
    expect(onAbort).not.toHaveBeenCalled();
  });

  test("a projection equal to free space still passes", async () => {
    const disk = new FakeDisk(600 * MIB);
    disk.sizeOverrides.set(STAGING, 0);

    await expect(createGuard(disk).check("system", STAGING)).resolves.toMatchObject({
      projectedBytes: 600 * MIB,
    });
  });

  test("10 GiB staging with 15 GiB free aborts before compression", async () => {
    const disk = new FakeDisk(15 * GIB);
    disk.sizeOverrides.set(STAGING, 10 * GIB);
    const onAbort = vi.fn(async (_estimate: SpaceEstimate) => {});

    const error = await createGuard(disk, { onAbort })
      .check("compression", STAGING)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(InsufficientSpaceError);
    if (!(error instanceof InsufficientSpaceError)) return;
    expect(error.phase).toBe("compression");
    expect(error.availableBytes).toBe(15 * GIB);
    expect(error.projectedBytes).toBe(30 * GIB + 500 * MIB);
    expect(onAbort).toHaveBeenCalledTimes(1);
    expect(onAbort.mock.calls[0]?.[0]).toMatchObject({ phase: "compression" });
  });

  test("the abort hook finishes before the error is thrown", async () => {
    const disk = new FakeDisk(0);
    disk.sizeOverrides.set(STAGING, 0);
    const events: string[] = [];
    const guard = createGuard(disk, {
      onAbort: async () => {
        await Promise.resolve();
        events.push("cleanup");
      },
    });

    await guard.check("initial", STAGING).catch(() => events.push("thrown"));

    expect(events).toEqual(["cleanup", "thrown"]);
  });
});
