import { describe, it, expect } from "vitest";
import {
  categorizeFinding,
  categoryLabel,
  classifyAnswer,
  deriveAssessmentStatus,
  extractFindings,
} from "../src/assessments/findings.js";
import { rules } from "./helpers.js";

const findings = rules.findings;

describe("classifyAnswer", () => {
  const skipped: [string, string][] = [
    ["Yes", "short"],
    ["https://forms.example.com/r/1", "url"],
    ["2025-02-11 09:15", "numeric"],
    ["FRM_2231_B", "opaque_code"],
    ["not applicable", "boilerplate"],
    ["No unsafe practices observed", "positive"],
    ["Good housekeeping observed", "positive"],
    ["Proper PPE was worn", "positive"],
    ["Hose_leak", "no_corrective_keyword"],
    ["Follow up with shop on tag", "no_corrective_keyword"],
  ];

  it.each(skipped)("skips %j as %s", (value, reason) => {
    expect(classifyAnswer(value, findings)).toBe(reason);
  });

  it("keeps text that says something was wrong or fixed", () => {
    expect(classifyAnswer("Hydraulic hose damaged on pump truck", findings)).toBeNull();
    expect(classifyAnswer("  Fire extinguisher tag expired ", findings)).toBeNull();
  });

  it("keeps positive wording when a corrective keyword follows it", () => {
    expect(classifyAnswer("Proper PPE was not worn, replaced on site", findings)).toBeNull();
    expect(classifyAnswer("Good housekeeping, but spill found near pump", findings)).toBeNull();
  });

  it("keeps a finding keyword from reading as an opaque code", () => {
    expect(classifyAnswer("Leak_found", findings)).toBeNull();
  });
});

describe("extractFindings", () => {
  it("returns trimmed findings in field order, ignoring metadata and location columns", () => {
    const row = {
      "Report Number": "A-1",
      Date: "2025-02-11 09:15:00",
      Observer: "Crew found nothing",
      Yard: "Damaged fence at Midland",
      "Equipment Inspection": " Trailer tire damaged, replaced ",
      PPE: "Proper PPE was worn",
      Comments: "Hard hat missing on crew member",
    };
    expect(extractFindings(row, findings)).toEqual([
      "Trailer tire damaged, replaced",
      "Hard hat missing on crew member",
    ]);
  });

  it("returns nothing for a row of affirmations", () => {
    expect(extractFindings({ "Report Number": "A-2", PPE: "Proper PPE was worn", Area: "Yes" }, findings)).toEqual([]);
  });
});

describe("categorizeFinding", () => {
  it.each([
    ["Trailer tire damaged, replaced", "EQUIPMENT_VEHICLE"],
    ["Spill near walkway not cleaned up", "HOUSEKEEPING_SITE"],
    ["Expired permit in truck", "DOCUMENTATION"],
    ["Proper PPE was not worn, replaced on site", "BEHAVIORAL_COMPLIANCE"],
  ])("%s → %s", (text, category) => {
    expect(categorizeFinding(text, findings)).toBe(category);
  });

  it("breaks ties toward the category listed first", () => {
    expect(categorizeFinding("truck log", findings)).toBe("EQUIPMENT_VEHICLE");
  });

  it("falls back to the default category", () => {
    expect(categorizeFinding("Crew was disappointed", findings)).toBe("BEHAVIORAL_COMPLIANCE");
  });

  it("labels categories from the table", () => {
    expect(categoryLabel("HOUSEKEEPING_SITE", findings)).toBe("Housekeeping/Site Conditions");
  });
});

describe("deriveAssessmentStatus", () => {
  it("reads corrected-on-site wording first", () => {
    expect(
      deriveAssessmentStatus({ PPE: "Vest replaced on site", Comments: "follow up Monday", Status: "Open" }, findings)
    ).toBe("CorrectedOnSite");
  });

  it("then follow-up wording", () => {
    expect(deriveAssessmentStatus({ Comments: "Needs follow-up with shop" }, findings)).toBe("RequiresFollowUp");
  });

  it("then the status column", () => {
    expect(deriveAssessmentStatus({ Status: "Corrected" }, findings)).toBe("CorrectedOnSite");
    expect(deriveAssessmentStatus({ status: "Pending follow" }, findings)).toBe("RequiresFollowUp");
    expect(deriveAssessmentStatus({ Status: "Closed" }, findings)).toBe("Open");
  });

  it("defaults to Open", () => {
    expect(deriveAssessmentStatus({ Comments: "Tire damaged" }, findings)).toBe("Open");
  });
});
