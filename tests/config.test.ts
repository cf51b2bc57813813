import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import {
  CONFIG_FILE,
  defaultConfig,
  loadProjlensConfig,
  parseProjlensConfig,
} from "../src/config/projlensYaml.js";
import { ConfigError } from "../src/errors.js";

describe(".projlens.yml", () => {
  it("falls back to defaults for an empty document", () => {
    expect(parseProjlensConfig("")).toEqual({
      workdayStart: 9,
      workdayEnd: 17,
      logLimit: 5,
      groupLimit: 12,
      excludeDates: "",
    });
  });

  it("reads every key", () => {
    const config = parseProjlensConfig(
      "workdayStart: 8\nworkdayEnd: 18\nlogLimit: 20\ngroupLimit: 3\nexcludeDates: 2024-12-25\n",
    );
    expect(config).toEqual({ workdayStart: 8, workdayEnd: 18, logLimit: 20, groupLimit: 3, excludeDates: "2024-12-25" });
  });

  it("joins a list of excluded dates", () => {
    const config = parseProjlensConfig("excludeDates:\n  - 2024-12-25\n  - 2024-12-31--2025-01-01\n");
    expect(config.excludeDates).toBe("2024-12-25,2024-12-31--2025-01-01");
  });

  it("rejects unknown keys", () => {
    expect(() => parseProjlensConfig("colour: blue\n")).toThrow(`${CONFIG_FILE}: unknown key "colour"`);
  });

  it("rejects out-of-range and inconsistent values", () => {
    expect(() => parseProjlensConfig("logLimit: 0\n")).toThrow(ConfigError);
    expect(() => parseProjlensConfig("workdayStart: 9.5\n")).toThrow(ConfigError);
    expect(() => parseProjlensConfig("workdayStart: 10\nworkdayEnd: 10\n")).toThrow(
      `${CONFIG_FILE}: workdayEnd must be after workdayStart`,
    );
    expect(() => parseProjlensConfig("excludeDates: 2024-99-99\n")).toThrow(ConfigError);
  });

  it("requires a mapping at the root", () => {
    expect(() => parseProjlensConfig("- a\n- b\n")).toThrow(`${CONFIG_FILE}: root must be an object`);
  });

  describe("loadProjlensConfig", () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), "projlens-config-"));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it("uses defaults when the file is missing", () => {
      expect(loadProjlensConfig(dir)).toEqual(defaultConfig());
    });

    it("loads the file at the repository root", () => {
      writeFileSync(join(dir, CONFIG_FILE), "groupLimit: 24\n", "utf8");
      expect(loadProjlensConfig(dir).groupLimit).toBe(24);
    });
  });
});
