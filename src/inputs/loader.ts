/**
 * Input Loader: reads one run's fetched data from a directory.
 *
 *   vehicles.json         vehicle master records
 *   camera_events.json    driver-performance events
 *   speeding_events.json  over-the-limit events
 *   assessments.csv       field-assessment form export
 *   incidents.csv         incident-report form export
 *
 * JSON files may hold a bare array or a vendor page ({ "<key>": [...] }).
 * Every file is optional; a missing file is an empty list.
 */

import { readFileSync, existsSync } from "fs";
import path from "path";

import { parseFormResponsesCsv } from "../assessments/rows.js";
import { isRecord } from "../enrich/fields.js";
import type { FormRow } from "../shared/types.js";

export const INPUT_FILES = {
  vehicles: "vehicles.json",
  cameraEvents: "camera_events.json",
  speedingEvents: "speeding_events.json",
  assessments: "assessments.csv",
  incidents: "incidents.csv",
} as const;

export interface ReportInputs {
  vehicles: unknown[];
  cameraEvents: unknown[];
  speedingEvents: unknown[];
  assessments: FormRow[];
  incidents: FormRow[];
  /** Input files that were not present */
  missing: string[];
}

/**
 * The record list inside a JSON document: the document itself when it
 * is an array, else the first array-valued property.
 */
export function recordList(doc: unknown): unknown[] {
  if (Array.isArray(doc)) return doc;
  if (isRecord(doc)) {
    for (const value of Object.values(doc)) {
      if (Array.isArray(value)) return value;
    }
  }
  return [];
}

function readJsonList(filePath: string): unknown[] {
  const buffer = readFileSync(filePath);
  try {
    return recordList(JSON.parse(buffer.toString("utf-8")));
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`Input file is not valid JSON (${filePath}): ${msg}`);
  }
}

function readCsvRows(filePath: string): FormRow[] {
  return parseFormResponsesCsv(readFileSync(filePath).toString("utf-8"));
}

/**
 * Load all input files from `dir`.
 */
export function loadReportInputs(dir: string): ReportInputs {
  if (!existsSync(dir)) {
    throw new Error(`Input directory not found: ${dir}`);
  }
  const missing: string[] = [];
  const locate = (filename: string): string | null => {
    const filePath = path.join(dir, filename);
    if (existsSync(filePath)) return filePath;
    missing.push(filename);
    return null;
  };
  const json = (filename: string) => {
    const p = locate(filename);
    return p ? readJsonList(p) : [];
  };
  const csv = (filename: string) => {
    const p = locate(filename);
    return p ? readCsvRows(p) : [];
  };

  return {
    vehicles: json(INPUT_FILES.vehicles),
    cameraEvents: json(INPUT_FILES.cameraEvents),
    speedingEvents: json(INPUT_FILES.speedingEvents),
    assessments: csv(INPUT_FILES.assessments),
    incidents: csv(INPUT_FILES.incidents),
    missing,
  };
}
