import { log } from '../platform/logger';
import type { ColumnMap, GuestRecord, RawGuestRow, SeatingWarning } from './types';

const REMARKS_SEPARATOR = ' | ';

function cell(row: RawGuestRow, column: string): string | null {
  return row[column] ?? null;
}

/** Trimmed text, or null when the cell is absent or blank. */
function trimmed(value: string | null): string | null {
  const t = value?.trim();
  return t ? t : null;
}

export function composeFullName(first: string | null, last: string | null): string {
  return `${first ?? ''} ${last ?? ''}`.trim();
}

/**
 * Join the two free-text fields with " | ". Blank sides are dropped;
 * two blank sides give "" rather than null.
 */
export function combineRemarks(first: string | null, second: string | null): string {
  return [trimmed(first), trimmed(second)]
    .filter((part): part is string => part !== null)
    .join(REMARKS_SEPARATOR);
}

export function toGuestRecord(row: RawGuestRow, id: number, columns: ColumnMap): GuestRecord {
  return {
    id,
    fullName: composeFullName(cell(row, columns.firstName), cell(row, columns.lastName)),
    rsvp: cell(row, columns.rsvp),
    rawTag: cell(row, columns.tags),
    partyId: trimmed(cell(row, columns.party)),
    meal: cell(row, columns.meal),
    babyChair: cell(row, columns.babyChair),
    carPark: cell(row, columns.carPark),
    remarks: combineRemarks(cell(row, columns.otherRequests), cell(row, columns.comments)),
    row,
  };
}

/**
 * Build one record per row, ids following row order. A row with no name at
 * all is kept (with an empty name) and reported as a warning.
 */
export function buildGuestRecords(
  rows: RawGuestRow[],
  columns: ColumnMap
): { records: GuestRecord[]; warnings: SeatingWarning[] } {
  const warnings: SeatingWarning[] = [];

  const records = rows.map((row, id) => {
    const record = toGuestRecord(row, id, columns);
    if (record.fullName === '') {
      const message = `Row ${id + 1} has no first or last name`;
      warnings.push({ code: 'malformed-row', guestId: id, message });
      log.warn('guests.record', message, { guestId: id });
    }
    return record;
  });

  return { records, warnings };
}
