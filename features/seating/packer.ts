import { log } from '@/lib/platform/logger';
import type { GuestRecord, SeatingWarning } from '@/lib/guests/types';
import { groupByCategory, orderCategories } from './categories';
import { groupParties } from './parties';
import type {
  Category,
  CategoryBucket,
  OpenTable,
  Party,
  SeatingAssignment,
  SeatingOptions,
  TableCounter,
} from './types';

/**
 * Seats per table for one category. A category of exactly base + 1 guests
 * gets one extra seat so nobody ends up alone at a second table.
 */
export function localCapacity(guestCount: number, baseCapacity: number): number {
  return guestCount === baseCapacity + 1 ? baseCapacity + 1 : baseCapacity;
}

export function createTableCounter(): TableCounter {
  return { next: 1 };
}

function openTable(
  tables: OpenTable[],
  counter: TableCounter,
  category: Category,
  capacity: number,
  party: Party
): OpenTable {
  const table: OpenTable = {
    number: counter.next,
    category: category.key,
    capacity,
    remaining: capacity - party.members.length,
    guestIds: party.members.map((g) => g.id),
  };
  counter.next += 1;
  tables.push(table);
  return table;
}

function seat(table: OpenTable, party: Party) {
  table.remaining -= party.members.length;
  table.guestIds.push(...party.members.map((g) => g.id));
}

/** First open table with room for `size` more guests. */
function firstFit(tables: OpenTable[], size: number): OpenTable | undefined {
  return tables.find((t) => t.remaining >= size);
}

function place(
  tables: OpenTable[],
  counter: TableCounter,
  category: Category,
  capacity: number,
  party: Party
): OpenTable {
  const table = firstFit(tables, party.members.length);
  if (table) {
    seat(table, party);
    return table;
  }
  return openTable(tables, counter, category, capacity, party);
}

/**
 * First-fit packing of one category. Stated parties go first, then the
 * singles. `tables` is the category's working list and is filled in place;
 * numbers are drawn from `counter` as tables open.
 */
export function packCategory(
  bucket: CategoryBucket,
  baseCapacity: number,
  counter: TableCounter,
  tables: OpenTable[] = []
): { tables: OpenTable[]; capacity: number; warnings: SeatingWarning[] } {
  const { category, guests } = bucket;
  const capacity = localCapacity(guests.length, baseCapacity);
  const { stated, singles } = groupParties(guests);
  const warnings: SeatingWarning[] = [];

  for (const party of stated) {
    const table = place(tables, counter, category, capacity, party);

    if (party.members.length > capacity) {
      const message = `Party "${party.key}" (${party.members.length}) exceeds table capacity ${capacity}`;
      warnings.push({
        code: 'oversized-party',
        category: category.label,
        partyId: party.key,
        size: party.members.length,
        capacity,
        table: table.number,
        message,
      });
      log.warn('seating.pack', message, { category: category.label, table: table.number });
    }
  }

  for (const party of singles) {
    place(tables, counter, category, capacity, party);
  }

  return { tables, capacity, warnings };
}

/**
 * Seat every attending guest. Categories are packed one at a time in the
 * order chosen by `options.categoryOrder`, sharing one table counter so
 * numbering runs across categories. Nothing is kept between calls.
 */
export function packTables(attending: GuestRecord[], options: SeatingOptions): SeatingAssignment {
  const grouping = groupByCategory(attending, options);
  const ordered = orderCategories(grouping, options.categoryOrder);
  const counter = createTableCounter();

  const tables: OpenTable[] = [];
  const tableByGuest = new Map<number, number>();
  const categoryByGuest = new Map<number, Category>();
  const warnings: SeatingWarning[] = [];

  for (const bucket of ordered) {
    const packed = packCategory(bucket, options.tableSize, counter);
    warnings.push(...packed.warnings);

    for (const guest of bucket.guests) categoryByGuest.set(guest.id, bucket.category);
    for (const table of packed.tables) {
      tables.push(table);
      for (const id of table.guestIds) tableByGuest.set(id, table.number);
    }

    log.info('seating.pack', 'Packed category', {
      category: bucket.category.label,
      guests: bucket.guests.length,
      capacity: packed.capacity,
      tables: packed.tables.map((t) => t.number),
    });
  }

  return {
    tables,
    tableByGuest,
    categories: ordered.map((b) => b.category),
    categoryByGuest,
    untagged: grouping.untagged,
    warnings,
  };
}
