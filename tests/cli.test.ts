import { describe, it, expect } from "vitest";
import path from "path";
import { parseCliArgs } from "../src/cli/build_report.js";
import { DEFAULT_FLEET_PATH, DEFAULT_RULES_DIR } from "../src/config/loader.js";

const clock = () => new Date("2025-02-17T12:00:00Z");

describe("parseCliArgs", () => {
  it("applies defaults", () => {
    const opts = parseCliArgs([], {}, clock);
    expect(opts.report).toBe("weekly");
    expect(opts.timeZone).toBe("America/Chicago");
    expect(opts.now.toISOString()).toBe("2025-02-17T12:00:00.000Z");
    expect(opts.rulesDir).toBe(DEFAULT_RULES_DIR);
    expect(opts.fleetPath).toBe(DEFAULT_FLEET_PATH);
    expect(path.basename(opts.inputDir)).toBe("demo");
    expect(path.basename(opts.outDir)).toBe("out");
  });

  it("reads flags before the environment", () => {
    const opts = parseCliArgs(
      ["--report", "daily-camera", "--tz", "America/Denver", "--now", "2025-02-12T18:00:00Z", "--out", "/tmp/reports"],
      { REPORT_KIND: "weekly", REPORT_TZ: "UTC" },
      clock
    );
    expect(opts.report).toBe("daily_camera");
    expect(opts.timeZone).toBe("America/Denver");
    expect(opts.now.toISOString()).toBe("2025-02-12T18:00:00.000Z");
    expect(opts.outDir).toBe(path.resolve("/tmp/reports"));
  });

  it("falls back to the environment", () => {
    const opts = parseCliArgs([], { REPORT_KIND: "daily_speeding", REPORT_TZ: "UTC" }, clock);
    expect(opts.report).toBe("daily_speeding");
    expect(opts.timeZone).toBe("UTC");
  });

  it("rejects an unparseable --now", () => {
    expect(() => parseCliArgs(["--now", "tomorrow"], {}, clock)).toThrow('Invalid --now value "tomorrow"');
  });
});
