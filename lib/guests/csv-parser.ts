import { readFile } from 'fs/promises';
import Papa from 'papaparse';
import { log } from '../platform/logger';
import { MissingColumnError } from '../platform/errors';
import {
  DEFAULT_COLUMNS,
  GUEST_FIELDS,
  type ColumnMap,
  type GuestTable,
  type RawGuestRow,
} from './types';

type CSVRow = Record<string, string | undefined>;

/** Header comparison key: trimmed, lower-cased, inner whitespace collapsed. */
export function normaliseHeader(header: string): string {
  return header.trim().toLowerCase().replace(/\s+/g, ' ');
}

function toCell(value: string | undefined): string | null {
  if (value === undefined || value === '') return null;
  return value;
}

/**
 * Parse a raw RSVP export. Every header is kept, in source order, so the
 * pending and declined sheets can echo the rows untouched.
 */
export function parseGuestCSV(csvContent: string): GuestTable {
  const result = Papa.parse<CSVRow>(csvContent.replace(/^\uFEFF/, ''), {
    header: true,
    skipEmptyLines: true,
    transformHeader: (header) => header.trim(),
  });

  if (result.errors.length > 0) {
    log.warn('guests.csv', 'CSV parsing errors', {
      errors: result.errors.map((e) => ({ row: e.row, message: e.message })),
    });
  }

  const columns = result.meta.fields ?? [];
  const rows: RawGuestRow[] = result.data.map((data) => {
    const row: RawGuestRow = {};
    for (const column of columns) {
      row[column] = toCell(data[column]);
    }
    return row;
  });

  return { columns, rows };
}

/**
 * Match every logical field to a header of the export.
 * Throws MissingColumnError naming each field that has no column.
 */
export function resolveColumns(
  columns: string[],
  expected: ColumnMap = DEFAULT_COLUMNS
): ColumnMap {
  const byKey = new Map<string, string>();
  for (const column of columns) {
    const key = normaliseHeader(column);
    if (!byKey.has(key)) byKey.set(key, column);
  }

  const resolved: ColumnMap = { ...expected };
  const missing: string[] = [];
  for (const field of GUEST_FIELDS) {
    const actual = byKey.get(normaliseHeader(expected[field]));
    if (actual === undefined) {
      missing.push(expected[field]);
    } else {
      resolved[field] = actual;
    }
  }

  if (missing.length > 0) throw new MissingColumnError(missing);

  return resolved;
}

export async function readGuestCSV(filePath: string): Promise<GuestTable> {
  const content = await readFile(filePath, 'utf-8');
  const table = parseGuestCSV(content);
  log.info('guests.csv', 'Loaded guest export', {
    file: filePath,
    rows: table.rows.length,
    columns: table.columns.length,
  });
  return table;
}
