#!/usr/bin/env tsx
/**
 * CLI: report:build
 *
 * Usage: npm run report:build -- --report weekly --input samples/demo [--now <iso>] [--tz <zone>]
 *
 * Loads rule tables, fleet config and one run's input files, builds the
 * requested report and writes it as JSON under the output directory.
 *
 * Options (CLI beats environment):
 *   --report  daily_camera | daily_speeding | daily_assessments | weekly   (REPORT_KIND)
 *   --tz      IANA zone, default America/Chicago                          (REPORT_TZ)
 *   --now     reference instant, default the current time
 *   --input   input directory, default samples/demo
 *   --rules   rule-table directory, default rules/
 *   --fleet   fleet config file, default config/fleet.json
 *   --out     output directory, default out/
 */

import { mkdirSync, writeFileSync } from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { v4 as uuidv4 } from "uuid";

import { DEFAULT_FLEET_PATH, DEFAULT_RULES_DIR, loadFleetConfig, loadRuleSet } from "../config/loader.js";
import { buildFleetLookup } from "../enrich/fleet_lookup.js";
import { loadReportInputs } from "../inputs/loader.js";
import { buildReport } from "../report/index.js";
import { parseReportKind, parseTimeZone } from "../shared/run_config.js";
import type { ReportKind } from "../shared/run_config.js";
import { parseVendorTimestamp } from "../time/windows.js";
import { QualityLog } from "../trace/quality_log.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const ROOT = path.resolve(__dirname, "..", "..");

export interface CliOptions {
  report: ReportKind;
  timeZone: string;
  now: Date;
  inputDir: string;
  rulesDir: string;
  fleetPath: string;
  outDir: string;
}

/**
 * Parse CLI flags. Unknown flags are ignored; invalid values throw.
 */
export function parseCliArgs(
  args: readonly string[],
  env: Record<string, string | undefined>,
  clock: () => Date = () => new Date()
): CliOptions {
  const flags = new Map<string, string>();
  for (let i = 0; i < args.length; i++) {
    if (args[i].startsWith("--") && i + 1 < args.length) {
      flags.set(args[i].slice(2), args[i + 1]);
      i++;
    }
  }

  let now = clock();
  const nowArg = flags.get("now");
  if (nowArg !== undefined) {
    const parsed = parseVendorTimestamp(nowArg);
    if (!parsed) throw new Error(`Invalid --now value "${nowArg}"`);
    now = parsed;
  }

  return {
    report: parseReportKind(flags.get("report"), env.REPORT_KIND),
    timeZone: parseTimeZone(flags.get("tz"), env.REPORT_TZ),
    now,
    inputDir: path.resolve(flags.get("input") ?? path.join(ROOT, "samples", "demo")),
    rulesDir: path.resolve(flags.get("rules") ?? DEFAULT_RULES_DIR),
    fleetPath: path.resolve(flags.get("fleet") ?? DEFAULT_FLEET_PATH),
    outDir: path.resolve(flags.get("out") ?? path.join(ROOT, "out")),
  };
}

function main() {
  console.log("╔══════════════════════════════════════════════════════════════╗");
  console.log("║  Fleet Safety · Report Builder                               ║");
  console.log("╚══════════════════════════════════════════════════════════════╝");
  console.log();

  try {
    const opts = parseCliArgs(process.argv.slice(2), process.env);
    const runId = uuidv4();
    const startTime = Date.now();

    console.log(`  Run:       ${runId}`);
    console.log(`  Report:    ${opts.report}`);
    console.log(`  Zone:      ${opts.timeZone}`);
    console.log(`  Now:       ${opts.now.toISOString()}`);
    console.log(`  Input:     ${opts.inputDir}`);
    console.log();

    const rules = loadRuleSet(opts.rulesDir);
    const fleet = loadFleetConfig(opts.fleetPath);
    const inputs = loadReportInputs(opts.inputDir);
    const log = new QualityLog();
    const lookup = buildFleetLookup(inputs.vehicles, fleet);

    console.log(`  Vehicles:  ${inputs.vehicles.length} (${lookup.driversByVehicle.size} with drivers)`);
    console.log(`  Camera:    ${inputs.cameraEvents.length} raw events`);
    console.log(`  Speeding:  ${inputs.speedingEvents.length} raw events`);
    console.log(`  Forms:     ${inputs.assessments.length} assessments, ${inputs.incidents.length} incidents`);
    for (const file of inputs.missing) {
      console.log(`    ⚠ ${file} not found, treated as empty`);
    }

    const report = buildReport(opts.report, inputs, {
      rules,
      fleet,
      lookup,
      timeZone: opts.timeZone,
      now: opts.now,
      log,
    });

    mkdirSync(opts.outDir, { recursive: true });
    const outFile = path.join(opts.outDir, `${report.kind}_${report.window.startDate}.json`);
    writeFileSync(outFile, JSON.stringify({ runId, ...report }, null, 2) + "\n", "utf-8");
    const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);

    console.log();
    console.log(`  Window:    ${report.window.startLocal} to ${report.window.endLocal}`);
    console.log("  Data quality:");
    const byKind = Object.entries(report.quality.byKind);
    if (byKind.length === 0) console.log("    ● no issues");
    for (const [kind, count] of byKind) {
      console.log(`    ◐ ${kind}: ${count}`);
    }
    console.log();
    console.log(`  Digest:    ${report.digest.slice(0, 16)}...`);
    console.log(`  Written:   ${outFile}`);
    console.log(`  Elapsed:   ${elapsed}s`);
    console.log();
    console.log(`  ✓ ${report.title}`);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    console.error(`\n  ✗ Report build failed: ${msg}`);
    process.exit(1);
  }
}

// ── CLI entry point ──────────────────────────────────────────────────
if (process.argv[1] && path.resolve(process.argv[1]) === path.resolve(fileURLToPath(import.meta.url))) {
  main();
}
