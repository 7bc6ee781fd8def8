import { readFile } from "node:fs/promises";
import * as path from "node:path";
import { describe, expect, test } from "vitest";
import { DockerEngine, parseImagesDiskUsage } from "../../src/docker/client";
import { type FakeHandler, FakeRunner, makeTempDir, removeTempDir } from "../helpers/fakes";

const OPTIONS = {
  engineRoot: "/var/lib/docker",
  volumeStorePath: "/var/lib/docker/volumes",
  commandTimeoutMs: 1000,
  longTimeoutMs: 5000,
};

function dockerWith(handler: FakeHandler) {
  const runner = new FakeRunner().on("docker", handler);
  return { runner, engine: new DockerEngine(runner, OPTIONS) };
}

describe("parseImagesDiskUsage", () => {
  test("reads the Images row", () => {
    const output = [
      '{"Active":"3","Reclaimable":"0B","Size":"1.5GB","TotalCount":"4","Type":"Images"}',
      '{"Active":"2","Reclaimable":"0B","Size":"12kB","TotalCount":"2","Type":"Containers"}',
    ].join("\n");

    expect(parseImagesDiskUsage(output)).toBe(1_500_000_000);
  });

  test("skips lines that are not JSON", () => {
    const output = 'WARNING: something\n{"Size":"2MB","Type":"Images"}\n';
    expect(parseImagesDiskUsage(output)).toBe(2_000_000);
  });

  test("returns 0 without an Images row", () => {
    expect(parseImagesDiskUsage('{"Size":"1GB","Type":"Local Volumes"}')).toBe(0);
    expect(parseImagesDiskUsage("")).toBe(0);
  });
});

describe("DockerEngine", () => {
  test("is unavailable without the docker binary", async () => {
    const engine = new DockerEngine(new FakeRunner(), OPTIONS);
    expect(await engine.isAvailable()).toBe(false);
  });

  test("probes the daemon once", async () => {
    const { runner, engine } = dockerWith(() => ({ output: "Server: ok" }));

    expect(await engine.isAvailable()).toBe(true);
    expect(await engine.isAvailable()).toBe(true);
    expect(runner.callsTo("docker")).toEqual([{ command: "docker", args: ["info"] }]);
  });

  test("is unavailable when the daemon does not answer", async () => {
    const { engine } = dockerWith(() => ({ exitCode: 1, stderr: "Cannot connect to the Docker daemon" }));
    expect(await engine.isAvailable()).toBe(false);
  });

  test("lists running container names", async () => {
    const { engine } = dockerWith(() => ({ output: "app-mysql-1\n  web  \n\n" }));
    expect(await engine.listRunningContainers()).toEqual(["app-mysql-1", "web"]);
  });

  test("throws when listing containers fails", async () => {
    const { engine } = dockerWith(() => ({ exitCode: 1, stderr: "permission denied" }));
    await expect(engine.listRunningContainers()).rejects.toThrow(
      "Failed to list running containers: permission denied",
    );
  });

  test("deduplicates image ids", async () => {
    const { engine } = dockerWith(() => ({ output: "aaa111\nbbb222\naaa111" }));
    expect(await engine.listImageIds()).toEqual(["aaa111", "bbb222"]);
  });

  test("reports zero image usage when system df fails", async () => {
    const { engine } = dockerWith(() => ({ exitCode: 1 }));
    expect(await engine.imagesDiskUsage()).toBe(0);
  });

  test("saves images with the given compression", async () => {
    const dir = await makeTempDir("docker");
    try {
      const { runner, engine } = dockerWith(() => ({ output: "image-bytes" }));
      const outputPath = path.join(dir, "images.tar.gz");

      const result = await engine.saveImages(["aaa111", "bbb222"], outputPath, 4);

      expect(result.success).toBe(true);
      expect(runner.callsTo("docker")).toEqual([
        { command: "docker", args: ["save", "aaa111", "bbb222"], outputPath, gzipLevel: 4 },
      ]);
    } finally {
      await removeTempDir(dir);
    }
  });

  test("runs dumps inside the container", async () => {
    const dir = await makeTempDir("docker");
    try {
      const { runner, engine } = dockerWith(() => ({ output: "-- dump" }));
      const outputPath = path.join(dir, "dump.sql");

      await engine.execToFile("app-mysql-1", ["mysqldump", "--all-databases"], outputPath);

      expect(runner.callsTo("docker")[0]?.args).toEqual([
        "exec",
        "app-mysql-1",
        "mysqldump",
        "--all-databases",
      ]);
      expect(await readFile(outputPath, "utf-8")).toBe("-- dump");
    } finally {
      await removeTempDir(dir);
    }
  });
});
