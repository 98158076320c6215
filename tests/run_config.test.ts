import { describe, it, expect } from "vitest";
import { DEFAULT_TIME_ZONE, isValidTimeZone, parseReportKind, parseTimeZone } from "../src/shared/run_config.js";

describe("parseReportKind", () => {
  it("defaults to weekly when no args", () => {
    expect(parseReportKind()).toBe("weekly");
  });

  it("CLI arg takes priority over env var", () => {
    expect(parseReportKind("daily_camera", "weekly")).toBe("daily_camera");
  });

  it("falls back to env var when no CLI arg", () => {
    expect(parseReportKind(undefined, "daily_speeding")).toBe("daily_speeding");
  });

  it("normalizes dashes and case", () => {
    expect(parseReportKind("Daily-Assessments")).toBe("daily_assessments");
  });

  it("rejects unknown kinds", () => {
    expect(() => parseReportKind("monthly")).toThrow(
      'Unknown report kind "monthly" (expected one of: daily_camera, daily_speeding, daily_assessments, weekly)'
    );
  });
});

describe("parseTimeZone", () => {
  it("defaults to America/Chicago", () => {
    expect(parseTimeZone()).toBe(DEFAULT_TIME_ZONE);
    expect(DEFAULT_TIME_ZONE).toBe("America/Chicago");
  });

  it("CLI arg takes priority over env var", () => {
    expect(parseTimeZone("America/Denver", "UTC")).toBe("America/Denver");
    expect(parseTimeZone(undefined, " UTC ")).toBe("UTC");
  });

  it("rejects zones the runtime does not know", () => {
    expect(isValidTimeZone("Mars/Olympus_Mons")).toBe(false);
    expect(() => parseTimeZone("Mars/Olympus_Mons")).toThrow('Unknown time zone "Mars/Olympus_Mons"');
  });
});
