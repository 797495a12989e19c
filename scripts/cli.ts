#!/usr/bin/env tsx
/**
 * seating planner: guest export → table assignments → report CLI.
 *
 * Usage:
 *   npm run cli                                  Interactive mode
 *   npm run cli -- help                          Show all commands
 *   npm run cli -- <command> [options]           Direct mode
 */

import fs from "fs";
import readline from "readline";
import { APP_NAME, DEFAULT_OUTPUT_DIR } from "../lib/config";
import { reportError } from "../lib/platform/errors";
import {
  buildToDirectory,
  countPlan,
  planFromFile,
  resolvePath,
} from "./seating-ops";
import { seatingEnv } from "../features/seating/config";
import type { BuildSeatingOptions, SeatingReport } from "../features/seating/pipeline";

/* ─── Formatting ─── */

const dim = (s: string) => `\x1b[2m${s}\x1b[0m`;
const bold = (s: string) => `\x1b[1m${s}\x1b[0m`;
const green = (s: string) => `\x1b[32m${s}\x1b[0m`;
const red = (s: string) => `\x1b[31m${s}\x1b[0m`;
const yellow = (s: string) => `\x1b[33m${s}\x1b[0m`;
const cyan = (s: string) => `\x1b[36m${s}\x1b[0m`;

function log(msg: string) {
  console.log(`  ${msg}`);
}

function heading(title: string) {
  console.log();
  log(bold(title));
  log(dim("─".repeat(title.length)));
}

/* ─── Args ─── */

const args = process.argv.slice(2);

function getArg(name: string): string | undefined {
  const idx = args.indexOf(`--${name}`);
  return idx !== -1 ? args[idx + 1] : undefined;
}

function hasFlag(name: string): boolean {
  return args.includes(`--${name}`);
}

/** Policy flags shared by build and summary. Validation happens in the pipeline. */
function seatingFlags(): BuildSeatingOptions {
  return {
    tableSize: getArg("table-size"),
    categoryOrder: getArg("order"),
    untagged: getArg("untagged"),
    tagMode: getArg("tag-mode"),
  };
}

/** Validate the input file exists and looks like a CSV */
function validateInput(file: string): { valid: boolean; error?: string } {
  const abs = resolvePath(file);
  if (!fs.existsSync(abs)) return { valid: false, error: `File not found: ${abs}` };
  if (!fs.statSync(abs).isFile()) return { valid: false, error: `Not a file: ${abs}` };
  if (!/\.csv$/i.test(abs)) return { valid: false, error: `Expected a .csv export: ${abs}` };
  return { valid: true };
}

/* ─── Prompts ─── */

async function ask(question: string, opts?: { hint?: string; defaultVal?: string }): Promise<string> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });

  const parts: string[] = [question];
  if (opts?.hint) parts.push(dim(opts.hint));
  if (opts?.defaultVal) parts.push(dim(`[${opts.defaultVal}]`));

  return new Promise((resolve) => {
    rl.question(`  ${cyan("›")} ${parts.join(" ")} `, (answer) => {
      rl.close();
      resolve(answer.trim() || opts?.defaultVal || "");
    });
  });
}

/* ─── Output ─── */

function printWarnings(report: SeatingReport) {
  if (report.warnings.length === 0) return;
  heading(`Warnings (${report.warnings.length})`);
  for (const w of report.warnings) log(yellow(`⚠ ${w.message}`));
}

function printSummary(report: SeatingReport) {
  const counts = countPlan(report);

  heading("Guests");
  log(`${counts.guests} rows · ${green(`${counts.attending} attending`)} · ${counts.pending} pending · ${counts.declined} declined`);
  if (report.options.untagged === "divert") {
    log(`${counts.untagged} untagged ${dim("(not seated)")}`);
  }

  heading(`Tables (${counts.tables})`);
  for (const t of report.summary) {
    const fill = `${t.guests}/${t.capacity}`;
    const marker = t.guests > t.capacity ? yellow(` ${fill}`) : ` ${fill}`;
    log(`${bold(`#${t.table}`.padEnd(5))}${marker.padEnd(8)} ${dim(t.category)}`);
  }

  printWarnings(report);
  console.log();
}

/* ─── Commands ─── */

async function cmdBuild(opts: { input: string; out: string } & BuildSeatingOptions) {
  const { input, out, ...seating } = opts;
  const { report, files } = await buildToDirectory(input, out, seating);

  printSummary(report);
  heading("Written");
  for (const f of files) log(`${green("✓")} ${f}`);
  console.log();
}

async function cmdSummary(opts: { input: string } & BuildSeatingOptions) {
  const { input, ...seating } = opts;
  printSummary(await planFromFile(input, seating));
}

/* ─── Help ─── */

function showHelp() {
  console.log(`
  ${bold(APP_NAME)} - seat RSVP'd guests at tables and export the plan

  ${bold("Usage")}
    npm run cli                                  ${dim("Interactive mode")}
    npm run cli -- help                          ${dim("Show this help")}
    npm run cli -- <command> [options]           ${dim("Direct command")}

  ${bold("Commands")}
    build --input ${dim("<file.csv>")} [--out ${dim("<dir>")}]   Write the seating report
      ${dim(`Default output directory: ${DEFAULT_OUTPUT_DIR}`)}
    summary --input ${dim("<file.csv>")}                Print tables without writing files

  ${bold("Options")}
    --table-size ${dim("<n>")}                 ${dim("Seats per table (default 10, env SEATING_TABLE_SIZE)")}
    --order ${dim("<first-seen|largest-first>")}  ${dim("Category order (env SEATING_CATEGORY_ORDER)")}
    --untagged ${dim("<seat|divert>")}          ${dim("Seat untagged guests as Uncategorised, or hold them out")}
    --tag-mode ${dim("<full|last-segment>")}    ${dim("Group by the whole tag or its last comma segment")}

  ${bold("Examples")}
    ${dim("$")} npm run cli -- build --input ~/Downloads/guest-list.csv --out ~/Desktop/seating
    ${dim("$")} npm run cli -- summary --input guest-list.csv --order largest-first
    ${dim("$")} npm run cli -- build --input guest-list.csv --untagged divert --tag-mode last-segment
`);
}

/* ─── Interactive mode ─── */

async function interactive() {
  heading(APP_NAME);

  const input = await ask("Guest export", { hint: "(path to .csv)" });
  const check = validateInput(input);
  if (!check.valid) throw new Error(check.error);

  const out = await ask("Output directory", { defaultVal: DEFAULT_OUTPUT_DIR });
  const tableSize = await ask("Seats per table", { defaultVal: String(seatingEnv().tableSize) });

  await cmdBuild({ input, out, tableSize });
}

/* ─── Direct mode ─── */

async function direct() {
  const command = args[0];

  switch (command) {
    case "build": {
      const input = getArg("input");
      if (!input) throw new Error("Usage: npm run cli -- build --input <file.csv> [--out <dir>]");
      const check = validateInput(input);
      if (!check.valid) throw new Error(check.error);
      return cmdBuild({ input, out: getArg("out") ?? DEFAULT_OUTPUT_DIR, ...seatingFlags() });
    }
    case "summary": {
      const input = getArg("input");
      if (!input) throw new Error("Usage: npm run cli -- summary --input <file.csv>");
      const check = validateInput(input);
      if (!check.valid) throw new Error(check.error);
      return cmdSummary({ input, ...seatingFlags() });
    }
    default:
      log(red(`Unknown command: ${command}`));
      showHelp();
      process.exitCode = 1;
  }
}

/* ─── Entry point ─── */

async function main() {
  const command = args[0];

  if (hasFlag("help") || command === "help") {
    showHelp();
    return;
  }

  if (!command) {
    return interactive();
  }

  return direct();
}

main().catch((err: unknown) => {
  const message = reportError("cli", "Seating build failed", err, { command: args[0] ?? "interactive" });
  console.log();
  log(red(`Error: ${message}`));
  process.exitCode = 1;
});
