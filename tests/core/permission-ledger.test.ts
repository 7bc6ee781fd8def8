import { beforeEach, describe, expect, test } from "vitest";
import { PermissionRestoreError } from "../../src/core/errors";
import { PermissionLedger, parseMode } from "../../src/core/ledger/permission-ledger";
import { MemoryModeOps } from "../helpers/fakes";

describe("parseMode", () => {
  test("parses three and four digit octal strings", () => {
    expect(parseMode("755")).toBe(0o755);
    expect(parseMode("0700")).toBe(0o700);
    expect(parseMode("0o644")).toBe(0o644);
  });

  test("passes numbers through", () => {
    expect(parseMode(0o750)).toBe(0o750);
  });

  test("rejects non-octal input", () => {
    expect(() => parseMode("789")).toThrow("Invalid file mode: 789");
    expect(() => parseMode("rwx")).toThrow();
  });
});

describe("PermissionLedger", () => {
  let ops: MemoryModeOps;
  let ledger: PermissionLedger;

  beforeEach(() => {
    ops = new MemoryModeOps();
    ledger = new PermissionLedger(ops);
  });

  test("records the original mode before applying the new one", async () => {
    ops.modes.set("/var/lib/docker", 0o710);

    await ledger.acquire("/var/lib/docker", "755");

    expect(ledger.entries()).toEqual([{ path: "/var/lib/docker", originalMode: 0o710 }]);
    expect(ops.modes.get("/var/lib/docker")).toBe(0o755);
  });

  test("second acquire of the same path changes nothing", async () => {
    ops.modes.set("/home", 0o750);

    await ledger.acquire("/home", "755");
    await ledger.acquire("/home", "777");

    expect(ledger.size).toBe(1);
    expect(ledger.entries()[0]?.originalMode).toBe(0o750);
    expect(ops.setCalls).toEqual([["/home", 0o755]]);
  });

  test("missing paths are not recorded", async () => {
    await ledger.acquire("/does/not/exist", "755");

    expect(ledger.size).toBe(0);
    expect(ops.setCalls).toEqual([]);
  });

  test("a refused chmod does not throw and keeps the record", async () => {
    ops.modes.set("/etc/ssl", 0o700);
    ops.refuse.add("/etc/ssl");

    await expect(ledger.acquire("/etc/ssl", "755")).resolves.toBeUndefined();

    expect(ledger.entries()).toEqual([{ path: "/etc/ssl", originalMode: 0o700 }]);
  });

  test("restoreAll reapplies modes in acquisition order and clears the ledger", async () => {
    ops.modes.set("/a", 0o700);
    ops.modes.set("/b", 0o711);
    await ledger.acquire("/a", "755");
    await ledger.acquire("/b", "755");
    ops.setCalls.length = 0;

    const report = await ledger.restoreAll();

    expect(ops.setCalls).toEqual([
      ["/a", 0o700],
      ["/b", 0o711],
    ]);
    expect(report.restored).toEqual(["/a", "/b"]);
    expect(report.failures).toEqual([]);
    expect(ledger.size).toBe(0);
    expect(ops.modes.get("/a")).toBe(0o700);
  });

  test("one failed restore does not stop the rest", async () => {
    ops.modes.set("/a", 0o700);
    ops.modes.set("/b", 0o711);
    ops.modes.set("/c", 0o750);
    await ledger.acquire("/a", "755");
    await ledger.acquire("/b", "755");
    await ledger.acquire("/c", "755");
    ops.refuse.add("/b");

    const report = await ledger.restoreAll();

    expect(report.restored).toEqual(["/a", "/c"]);
    expect(report.failures).toHaveLength(1);
    const failure = report.failures[0];
    expect(failure).toBeInstanceOf(PermissionRestoreError);
    expect(failure?.path).toBe("/b");
    expect(failure?.mode).toBe(0o711);
    expect(failure?.message).toBe(
      "Could not restore mode 711 on /b: EPERM: operation not permitted",
    );
    expect(ops.modes.get("/c")).toBe(0o750);
  });

  test("restoreAll on an empty ledger is a no-op", async () => {
    const report = await ledger.restoreAll();
    expect(report).toEqual({ restored: [], failures: [] });
    expect(ops.setCalls).toEqual([]);
  });
});
