import { describe, expect, it } from "vitest";

import { getArg, parseRunConfig, parseWeek, periodKey, toBool } from "./runConfig.v1";

describe("runConfig", () => {
  it("reads flags", () => {
    expect(parseRunConfig(["--week", "3", "--includePlayoffs", "true", "--format", "xlsx"], {})).toEqual({
      week: 3,
      includePlayoffs: true,
      dryRun: false,
      format: "xlsx",
    });
  });

  it("treats bare flags as true", () => {
    expect(parseRunConfig(["--week", "week2", "--dryRun", "--includePlayoffs"], {})).toEqual({
      week: 2,
      includePlayoffs: true,
      dryRun: true,
      format: "csv",
    });
  });

  it("falls back to the environment", () => {
    expect(
      parseRunConfig([], { LEAGUE_WEEK: "Week5", LEAGUE_INCLUDE_PLAYOFFS: "yes", LEAGUE_FORMAT: "xlsx" })
    ).toEqual({ week: 5, includePlayoffs: true, dryRun: false, format: "xlsx" });
  });

  it("lets flags win over the environment", () => {
    const cfg = parseRunConfig(["--week", "1", "--includePlayoffs", "off"], { LEAGUE_WEEK: "4", LEAGUE_INCLUDE_PLAYOFFS: "1" });
    expect(cfg.week).toBe(1);
    expect(cfg.includePlayoffs).toBe(false);
  });

  it("rejects bad input", () => {
    expect(() => parseRunConfig([], {})).toThrow("Missing required arg: --week (or LEAGUE_WEEK)");
    expect(() => parseRunConfig(["--week", "0"], {})).toThrow("RUN_CONFIG_INVALID:");
    expect(() => parseRunConfig(["--week", "1", "--format", "pdf"], {})).toThrow("RUN_CONFIG_INVALID:");
    expect(() => parseWeek("first")).toThrow("Invalid week: first");
    expect(() => toBool("maybe", false)).toThrow("Invalid boolean value: maybe");
  });

  it("has small helpers for args and period keys", () => {
    expect(getArg(["--week", "2"], "--week")).toBe("2");
    expect(getArg(["--dryRun", "--week", "2"], "--dryRun")).toBe("");
    expect(getArg([], "--week")).toBeUndefined();
    expect(periodKey(7)).toBe("week7");
  });
});
