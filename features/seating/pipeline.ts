import { log } from '@/lib/platform/logger';
import { resolveColumns } from '@/lib/guests/csv-parser';
import { buildGuestRecords } from '@/lib/guests/record';
import { classifyAttendance, type AttendanceSplit } from '@/lib/guests/attendance';
import {
  DEFAULT_COLUMNS,
  type ColumnMap,
  type GuestRecord,
  type GuestTable,
  type SeatingWarning,
} from '@/lib/guests/types';
import { resolveSeatingOptions, type SeatingOptionInput } from './config';
import { packTables } from './packer';
import {
  SHEET_NAMES,
  attendingLongSheet,
  projectSeating,
  rawSheet,
  seatingSheet,
  summariseTables,
  type Sheet,
  type TableBlock,
  type TableSummary,
} from './report';
import type { SeatingAssignment, SeatingOptions } from './types';

export type SeatingReport = {
  options: SeatingOptions;
  records: GuestRecord[];
  attendance: AttendanceSplit;
  assignment: SeatingAssignment;
  blocks: TableBlock[];
  sheets: Sheet[];
  summary: TableSummary[];
  warnings: SeatingWarning[];
};

export type BuildSeatingOptions = SeatingOptionInput & {
  columns?: ColumnMap;
};

/**
 * Run the whole pipeline over one export: records, attendance, packing,
 * projection. Each call works on its own state, so repeated runs over the
 * same input give the same tables.
 *
 * Throws MissingColumnError before touching any row when a required
 * column is absent, and InvalidOptionError for bad options.
 */
export function buildSeatingPlan(input: GuestTable, opts: BuildSeatingOptions = {}): SeatingReport {
  const { columns: expected = DEFAULT_COLUMNS, ...overrides } = opts;
  const options = resolveSeatingOptions(overrides);
  const columns = resolveColumns(input.columns, expected);

  const { records, warnings: recordWarnings } = buildGuestRecords(input.rows, columns);
  const attendance = classifyAttendance(records);
  const assignment = packTables(attendance.attending, options);
  const blocks = projectSeating(assignment, records, options.tableSize);

  const sheets: Sheet[] = [
    seatingSheet(blocks),
    rawSheet(SHEET_NAMES.pending, input.columns, attendance.pending),
    rawSheet(SHEET_NAMES.declined, input.columns, attendance.declined),
    attendingLongSheet(assignment, records),
  ];
  if (options.untagged === 'divert') {
    sheets.push(rawSheet(SHEET_NAMES.untagged, input.columns, assignment.untagged));
  }

  log.info('seating.pipeline', 'Seating plan built', {
    guests: records.length,
    attending: attendance.attending.length,
    pending: attendance.pending.length,
    declined: attendance.declined.length,
    untagged: assignment.untagged.length,
    tables: assignment.tables.length,
  });

  return {
    options,
    records,
    attendance,
    assignment,
    blocks,
    sheets,
    summary: summariseTables(assignment),
    warnings: [...recordWarnings, ...assignment.warnings],
  };
}
