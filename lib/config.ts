/**
 * App-wide constants for the CLI. Seating defaults (table size, policies)
 * live in features/seating/config.ts.
 */

/** Name shown in CLI headings and help */
const APP_NAME = "seating planner";

/** Where `build` writes the report when --out is not given */
const DEFAULT_OUTPUT_DIR = (process.env.SEATING_OUT_DIR || "seating-plan").trim();

export { APP_NAME, DEFAULT_OUTPUT_DIR };
