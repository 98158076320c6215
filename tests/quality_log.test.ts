import { describe, it, expect } from "vitest";
import { QualityLog } from "../src/trace/quality_log.js";

describe("Quality Log", () => {
  function makeLog() {
    const log = new QualityLog();
    log.record("DRIVER_NAME_PARSED", "camera", "cam-1", 'Driver "Yem Bobey" parsed from vehicle "POL-2324PP - Yem Bobey"');
    log.record("UNKNOWN_EVENT_TYPE", "camera", "cam-2", 'Unrecognized event type "Rolling Stop" defaults to ORANGE');
    log.record("DRIVER_NAME_PARSED", "speeding", "spd-1", 'Driver "Jo Ng" parsed from vehicle "5010C Jo Ng"');
    return log;
  }

  it("numbers entries in recording order", () => {
    const entries = makeLog().getEntries();
    expect(entries.map((e) => e.position)).toEqual([0, 1, 2]);
    expect(entries[1]).toEqual({
      position: 1,
      kind: "UNKNOWN_EVENT_TYPE",
      source: "camera",
      ref: "cam-2",
      message: 'Unrecognized event type "Rolling Stop" defaults to ORANGE',
    });
  });

  it("returns a copy of its entries", () => {
    const log = makeLog();
    log.getEntries().pop();
    expect(log.count()).toBe(3);
  });

  it("counts overall and per kind", () => {
    const log = makeLog();
    expect(log.count("DRIVER_NAME_PARSED")).toBe(2);
    expect(log.count("MISSING_SPEED")).toBe(0);
    expect(log.summary()).toEqual({ DRIVER_NAME_PARSED: 2, UNKNOWN_EVENT_TYPE: 1 });
    expect(Object.keys(log.summary())).toEqual(["DRIVER_NAME_PARSED", "UNKNOWN_EVENT_TYPE"]);
  });

  it("digests identical streams identically", () => {
    expect(makeLog().digest()).toBe(makeLog().digest());
    const other = makeLog();
    other.record("MISSING_SPEED", "speeding", "spd-2", "No vehicle speed; recorded as 0");
    expect(other.digest()).not.toBe(makeLog().digest());
  });
});
