/**
 * Seating plan operations used by the CLI.
 *
 * Read a guest export from disk, run the pipeline, write the report.
 * Nothing is cached between calls: every build starts from the file.
 *
 * Output layout:
 *   {outDir}/SeatingPlan.csv     per-table blocks
 *   {outDir}/Pending_RSVP.csv    rows with a blank RSVP
 *   {outDir}/Declined.csv        rows that regretfully declined
 *   {outDir}/Attending_Long.csv  one row per seated guest
 *   {outDir}/Untagged.csv        only with --untagged divert
 */

import path from "path";
import { readGuestCSV } from "../lib/guests/csv-parser";
import { buildSeatingPlan, type BuildSeatingOptions, type SeatingReport } from "../features/seating/pipeline";
import { writeReport } from "../features/seating/export";

/* ─── Types ─── */

type BuildResult = {
  report: SeatingReport;
  /** Absolute paths of the written sheets */
  files: string[];
};

type PlanCounts = {
  guests: number;
  attending: number;
  pending: number;
  declined: number;
  untagged: number;
  tables: number;
  /** Tables holding more guests than the base table size */
  overfull: number;
};

/* ─── Operations ─── */

function resolvePath(p: string): string {
  return path.resolve(p.replace(/^~/, process.env.HOME ?? "~"));
}

async function planFromFile(input: string, opts: BuildSeatingOptions = {}): Promise<SeatingReport> {
  const table = await readGuestCSV(resolvePath(input));
  return buildSeatingPlan(table, opts);
}

async function buildToDirectory(
  input: string,
  outDir: string,
  opts: BuildSeatingOptions = {}
): Promise<BuildResult> {
  const report = await planFromFile(input, opts);
  const files = await writeReport(report.sheets, resolvePath(outDir));
  return { report, files };
}

function countPlan(report: SeatingReport): PlanCounts {
  return {
    guests: report.records.length,
    attending: report.attendance.attending.length,
    pending: report.attendance.pending.length,
    declined: report.attendance.declined.length,
    untagged: report.assignment.untagged.length,
    tables: report.assignment.tables.length,
    overfull: report.summary.filter((t) => t.guests > t.capacity).length,
  };
}

export { planFromFile, buildToDirectory, countPlan, resolvePath };
export type { BuildResult, PlanCounts };
