import type { GuestRecord } from '@/lib/guests/types';
import type { Category, OpenTable, SeatingAssignment } from './types';

export const SEATING_COLUMNS = [
  'Table',
  'Name',
  'Meal preference',
  'Baby chair',
  'Car park coupon',
  'Remarks',
  'Tags',
] as const;

export const ATTENDING_LONG_COLUMNS = [
  'Table',
  'Category',
  'Party',
  'Name',
  'Meal preference',
  'Baby chair',
  'Car park coupon',
  'Remarks',
] as const;

export const SHEET_NAMES = {
  seating: 'SeatingPlan',
  pending: 'Pending_RSVP',
  declined: 'Declined',
  untagged: 'Untagged',
  attendingLong: 'Attending_Long',
} as const;

export type SheetCell = string | number;

export type Sheet = {
  name: string;
  columns: string[];
  rows: SheetCell[][];
};

export type GuestLine = {
  seat: number;
  guestId: number;
  name: string;
  meal: string;
  babyChair: string;
  carPark: string;
  remarks: string;
  tags: string;
};

export type SeatingRow =
  | { kind: 'header'; table: number }
  | { kind: 'labels' }
  | ({ kind: 'guest' } & GuestLine)
  | { kind: 'placeholder'; seat: number }
  | { kind: 'separator' };

export type TableBlock = {
  table: number;
  category: string;
  rows: SeatingRow[];
};

export type TableSummary = {
  table: number;
  guests: number;
  capacity: number;
  category: string;
};

/**
 * Display cleaning for the meal, baby-chair and car-park cells: anything
 * mentioning "no" (any case) is shown blank. Not used for RSVP decisions.
 */
export function cleanPreference(value: string | null): string {
  if (value === null) return '';
  return value.toLowerCase().includes('no') ? '' : value;
}

type SortableGuest = { guest: GuestRecord; category: string };

/** Category, then party (singles first), then name; id settles exact duplicates. */
function compareSeated(a: SortableGuest, b: SortableGuest): number {
  return (
    compareText(a.category, b.category) ||
    comparePartyIds(a.guest.partyId, b.guest.partyId) ||
    compareText(a.guest.fullName, b.guest.fullName) ||
    a.guest.id - b.guest.id
  );
}

function comparePartyIds(a: string | null, b: string | null): number {
  if (a === b) return 0;
  if (a === null) return -1;
  if (b === null) return 1;
  return compareText(a, b);
}

/** Plain code-unit order, independent of locale ("B2" before "a1"). */
function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function membersOf(
  table: OpenTable,
  guestsById: Map<number, GuestRecord>,
  categoryByGuest: Map<number, Category>
): SortableGuest[] {
  return table.guestIds
    .map((id) => guestsById.get(id))
    .filter((g): g is GuestRecord => g !== undefined)
    .map((guest) => ({ guest, category: categoryByGuest.get(guest.id)?.key ?? table.category }))
    .sort(compareSeated);
}

function guestLine(guest: GuestRecord, seat: number): GuestLine {
  return {
    seat,
    guestId: guest.id,
    name: guest.fullName,
    meal: cleanPreference(guest.meal),
    babyChair: cleanPreference(guest.babyChair),
    carPark: cleanPreference(guest.carPark),
    remarks: guest.remarks,
    tags: guest.rawTag ?? '',
  };
}

/**
 * Rows for one table: header marker, column labels, the sorted guests,
 * placeholders up to `displayCapacity`, then a blank separator. A table
 * holding more guests than that (the overflow table) still lists them all.
 */
export function projectTable(
  table: OpenTable,
  guestsById: Map<number, GuestRecord>,
  categoryByGuest: Map<number, Category>,
  displayCapacity: number
): TableBlock {
  const members = membersOf(table, guestsById, categoryByGuest);
  const rows: SeatingRow[] = [{ kind: 'header', table: table.number }, { kind: 'labels' }];

  members.forEach(({ guest }, i) => rows.push({ kind: 'guest', ...guestLine(guest, i + 1) }));
  for (let seat = members.length + 1; seat <= displayCapacity; seat++) {
    rows.push({ kind: 'placeholder', seat });
  }
  rows.push({ kind: 'separator' });

  return { table: table.number, category: table.category, rows };
}

export function seatingRowCells(row: SeatingRow): SheetCell[] {
  const blank = (n: number) => Array.from({ length: n }, () => '');
  switch (row.kind) {
    case 'header':
      return [`Table #${row.table}`, ...blank(SEATING_COLUMNS.length - 1)];
    case 'labels':
      return ['', ...SEATING_COLUMNS.slice(1)];
    case 'guest':
      return [row.seat, row.name, row.meal, row.babyChair, row.carPark, row.remarks, row.tags];
    case 'placeholder':
      return [row.seat, ...blank(SEATING_COLUMNS.length - 1)];
    case 'separator':
      return blank(SEATING_COLUMNS.length);
  }
}

export function projectSeating(
  assignment: SeatingAssignment,
  guests: GuestRecord[],
  displayCapacity: number
): TableBlock[] {
  const guestsById = new Map(guests.map((g) => [g.id, g]));
  return [...assignment.tables]
    .sort((a, b) => a.number - b.number)
    .map((table) => projectTable(table, guestsById, assignment.categoryByGuest, displayCapacity));
}

export function seatingSheet(blocks: TableBlock[]): Sheet {
  return {
    name: SHEET_NAMES.seating,
    columns: [...SEATING_COLUMNS],
    rows: blocks.flatMap((block) => block.rows.map(seatingRowCells)),
  };
}

/** Source rows echoed as they came in, for the pending/declined/untagged sheets. */
export function rawSheet(name: string, columns: string[], records: GuestRecord[]): Sheet {
  return {
    name,
    columns: [...columns],
    rows: records.map((r) => columns.map((c) => r.row[c] ?? '')),
  };
}

/** One row per seated guest, ordered by table then the in-table order. */
export function attendingLongSheet(assignment: SeatingAssignment, guests: GuestRecord[]): Sheet {
  const guestsById = new Map(guests.map((g) => [g.id, g]));
  const rows: SheetCell[][] = [];

  for (const table of [...assignment.tables].sort((a, b) => a.number - b.number)) {
    for (const { guest } of membersOf(table, guestsById, assignment.categoryByGuest)) {
      rows.push([
        table.number,
        assignment.categoryByGuest.get(guest.id)?.label ?? '',
        guest.partyId ?? '',
        guest.fullName,
        cleanPreference(guest.meal),
        cleanPreference(guest.babyChair),
        cleanPreference(guest.carPark),
        guest.remarks,
      ]);
    }
  }

  return { name: SHEET_NAMES.attendingLong, columns: [...ATTENDING_LONG_COLUMNS], rows };
}

export function summariseTables(assignment: SeatingAssignment): TableSummary[] {
  const labels = new Map(assignment.categories.map((c) => [c.key, c.label]));
  return [...assignment.tables]
    .sort((a, b) => a.number - b.number)
    .map((t) => ({
      table: t.number,
      guests: t.guestIds.length,
      capacity: t.capacity,
      category: labels.get(t.category) ?? t.category,
    }));
}
