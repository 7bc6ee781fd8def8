import { describe, expect, test } from "vitest";
import {
  flattenPath,
  formatRunTimestamp,
  generateRunName,
  sanitizeFileComponent,
} from "../../src/utils/naming";

describe("naming", () => {
  const date = new Date(2024, 0, 2, 3, 4, 5);

  describe("formatRunTimestamp", () => {
    test("pads every field", () => {
      expect(formatRunTimestamp(date)).toBe("20240102_030405");
    });

    test("uses local time", () => {
      expect(formatRunTimestamp(new Date(2023, 11, 31, 23, 59, 58))).toBe("20231231_235958");
    });
  });

  describe("generateRunName", () => {
    test("joins prefix and timestamp", () => {
      expect(generateRunName("vps_backup", date)).toBe("vps_backup_20240102_030405");
    });
  });

  describe("sanitizeFileComponent", () => {
    test("replaces anything outside the safe set", () => {
      expect(sanitizeFileComponent("app/db:1 main")).toBe("app_db_1_main");
    });

    test("keeps dots, dashes and underscores", () => {
      expect(sanitizeFileComponent("app-mysql_1.v2")).toBe("app-mysql_1.v2");
    });
  });

  describe("flattenPath", () => {
    test("maps separators to underscores", () => {
      expect(flattenPath("/opt/app")).toBe("_opt_app");
    });

    test("ignores trailing separators", () => {
      expect(flattenPath("/srv/stack/")).toBe("_srv_stack");
    });

    test("keeps nested directories distinct from siblings", () => {
      expect(flattenPath("/opt/a/b")).not.toBe(flattenPath("/opt/a_b"));
    });
  });
});
