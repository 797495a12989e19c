import { describe, it, expect } from "vitest";
import {
  createTableCounter,
  localCapacity,
  packCategory,
  packTables,
} from "@/features/seating/packer";
import { resolveSeatingOptions, type SeatingOptionInput } from "@/features/seating/config";
import type { GuestRecord } from "@/lib/guests/types";
import type { CategoryBucket } from "@/features/seating/types";
import { makeGuest, singles } from "../helpers/guests";

function options(overrides: SeatingOptionInput = {}) {
  return resolveSeatingOptions(overrides, {});
}

function bucket(guests: GuestRecord[]): CategoryBucket {
  return { category: { key: "family", label: "Family", isDefault: false }, guests, firstSeen: 0 };
}

/** Guests `from`..`from + size - 1` sharing one party id. */
function party(partyId: string, size: number, from: number, rawTag = "Family"): GuestRecord[] {
  return Array.from({ length: size }, (_, i) => makeGuest({ id: from + i, partyId, rawTag }));
}

function tableShape(guests: GuestRecord[], overrides?: SeatingOptionInput) {
  return packTables(guests, options(overrides)).tables.map((t) => ({
    number: t.number,
    guestIds: t.guestIds,
  }));
}

describe("localCapacity", () => {
  it("adds one seat only for exactly base + 1 guests", () => {
    expect(localCapacity(10, 10)).toBe(10);
    expect(localCapacity(11, 10)).toBe(11);
    expect(localCapacity(12, 10)).toBe(10);
    expect(localCapacity(9, 8)).toBe(9);
  });
});

describe("packTables: singles", () => {
  it("seats 10 singles at one table", () => {
    const { tables } = packTables(singles(10), options());

    expect(tables).toHaveLength(1);
    expect(tables[0].number).toBe(1);
    expect(tables[0].guestIds).toHaveLength(10);
  });

  it("seats 11 singles at one overflow table", () => {
    const { tables } = packTables(singles(11), options());

    expect(tables).toHaveLength(1);
    expect(tables[0]).toMatchObject({ number: 1, capacity: 11, remaining: 0 });
    expect(tables[0].guestIds).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
  });

  it("splits 12 singles 10 + 2", () => {
    expect(tableShape(singles(12))).toEqual([
      { number: 1, guestIds: [0, 1, 2, 3, 4, 5, 6, 7, 8, 9] },
      { number: 2, guestIds: [10, 11] },
    ]);
  });

  it("follows the configured table size", () => {
    expect(tableShape(singles(7), { tableSize: 3 })).toEqual([
      { number: 1, guestIds: [0, 1, 2] },
      { number: 2, guestIds: [3, 4, 5] },
      { number: 3, guestIds: [6] },
    ]);
  });
});

describe("packTables: parties", () => {
  it("places stated parties before singles", () => {
    const guests = [
      makeGuest({ id: 0 }),
      ...party("A", 4, 1),
      makeGuest({ id: 5 }),
      ...party("B", 7, 6),
    ];

    expect(tableShape(guests)).toEqual([
      { number: 1, guestIds: [1, 2, 3, 4, 0, 5] },
      { number: 2, guestIds: [6, 7, 8, 9, 10, 11, 12] },
    ]);
  });

  it("fits a later party into the first table with room", () => {
    const guests = [...party("A", 6, 0), ...party("B", 6, 6), ...party("C", 4, 12)];

    expect(tableShape(guests)).toEqual([
      { number: 1, guestIds: [0, 1, 2, 3, 4, 5, 12, 13, 14, 15] },
      { number: 2, guestIds: [6, 7, 8, 9, 10, 11] },
    ]);
  });

  it("keeps every party together", () => {
    const guests = [
      ...party("A", 3, 0),
      makeGuest({ id: 3 }),
      ...party("B", 5, 4),
      ...party("C", 4, 9),
      makeGuest({ id: 13 }),
      ...party("D", 2, 14),
    ];
    const { tableByGuest } = packTables(guests, options());

    for (const id of ["A", "B", "C", "D"]) {
      const numbers = new Set(guests.filter((g) => g.partyId === id).map((g) => tableByGuest.get(g.id)));
      expect(numbers.size).toBe(1);
    }
  });

  it("seats an 11-guest party together at the overflow table", () => {
    const { tables, warnings } = packTables(party("A", 11, 0), options());

    expect(tables).toHaveLength(1);
    expect(tables[0].guestIds).toHaveLength(11);
    expect(warnings).toEqual([]);
  });

  it("packs an 11-guest category of two parties with the standard rule", () => {
    expect(tableShape([...party("A", 6, 0), ...party("B", 5, 6)])).toEqual([
      { number: 1, guestIds: [0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10] },
    ]);
  });

  it("switches to base capacity once a category passes base + 1", () => {
    expect(tableShape([...party("A", 8, 0), ...party("B", 4, 8)])).toEqual([
      { number: 1, guestIds: [0, 1, 2, 3, 4, 5, 6, 7] },
      { number: 2, guestIds: [8, 9, 10, 11] },
    ]);
  });
});

describe("packTables: oversized party boundary", () => {
  it("lets a party larger than capacity overflow its own table and reports it", () => {
    const guests = [...party("Big", 12, 0), makeGuest({ id: 12 })];
    const { tables, warnings } = packTables(guests, options());

    expect(tables.map((t) => ({ number: t.number, size: t.guestIds.length, remaining: t.remaining }))).toEqual([
      { number: 1, size: 12, remaining: -2 },
      { number: 2, size: 1, remaining: 9 },
    ]);
    expect(warnings).toEqual([
      {
        code: "oversized-party",
        category: "Family",
        partyId: "Big",
        size: 12,
        capacity: 10,
        table: 1,
        message: 'Party "Big" (12) exceeds table capacity 10',
      },
    ]);
  });
});

describe("packTables: categories", () => {
  it("numbers tables globally across categories in processing order", () => {
    const guests = [...singles(3, "Family", 0), ...singles(12, "Friends", 3), ...singles(2, "Family", 15)];

    expect(tableShape(guests)).toEqual([
      { number: 1, guestIds: [0, 1, 2, 15, 16] },
      { number: 2, guestIds: [3, 4, 5, 6, 7, 8, 9, 10, 11, 12] },
      { number: 3, guestIds: [13, 14] },
    ]);
  });

  it("never mixes categories at one table", () => {
    const guests = [...singles(4, "Family", 0), ...singles(4, "Friends", 4)];
    const { tables } = packTables(guests, options());

    expect(tables.map((t) => [t.category, t.guestIds])).toEqual([
      ["family", [0, 1, 2, 3]],
      ["friends", [4, 5, 6, 7]],
    ]);
  });

  it("packs Uncategorised last", () => {
    const guests = [makeGuest({ id: 0, rawTag: null }), ...singles(2, "Friends", 1)];
    const { tables, categories } = packTables(guests, options());

    expect(categories.map((c) => c.label)).toEqual(["Friends", "Uncategorised"]);
    expect(tables.map((t) => [t.number, t.guestIds])).toEqual([
      [1, [1, 2]],
      [2, [0]],
    ]);
  });

  it("uses the largest-first order when asked", () => {
    const guests = [...singles(2, "Small", 0), ...singles(5, "Big", 2)];
    const { tables } = packTables(guests, options({ categoryOrder: "largest-first" }));

    expect(tables.map((t) => [t.number, t.category])).toEqual([
      [1, "big"],
      [2, "small"],
    ]);
  });

  it("leaves diverted guests out of every table", () => {
    const guests = [makeGuest({ id: 0, rawTag: null }), ...singles(2, "Friends", 1)];
    const { tables, tableByGuest, untagged } = packTables(guests, options({ untagged: "divert" }));

    expect(tables).toHaveLength(1);
    expect(tableByGuest.has(0)).toBe(false);
    expect(untagged.map((g) => g.id)).toEqual([0]);
  });

  it("seats nobody when nobody attends", () => {
    const assignment = packTables([], options());
    expect(assignment.tables).toEqual([]);
    expect(assignment.categories).toEqual([]);
  });
});

describe("packTables: properties", () => {
  /** Deterministic mixed list: three categories, parties of 1-5, some singles. */
  function mixedGuests(): GuestRecord[] {
    const tags = ["Family", "Friends", null];
    const guests: GuestRecord[] = [];
    let id = 0;
    for (let p = 0; p < 30; p++) {
      const size = (p * 7) % 5 + 1;
      const tag = tags[p % 3];
      const partyId = p % 4 === 0 ? null : `P${p}`;
      for (let i = 0; i < size; i++) {
        guests.push(makeGuest({ id, rawTag: tag, partyId }));
        id++;
      }
    }
    return guests;
  }

  it("seats every guest exactly once", () => {
    const guests = mixedGuests();
    const { tables, tableByGuest } = packTables(guests, options());
    const seated = tables.flatMap((t) => t.guestIds);

    expect(seated.slice().sort((a, b) => a - b)).toEqual(guests.map((g) => g.id));
    expect(tableByGuest.size).toBe(guests.length);
  });

  it("keeps every table within capacity", () => {
    const { tables } = packTables(mixedGuests(), options());
    for (const t of tables) {
      expect(t.guestIds.length).toBeLessThanOrEqual(10);
    }
  });

  it("numbers tables 1..n with no gaps", () => {
    const { tables } = packTables(mixedGuests(), options());
    expect(tables.map((t) => t.number)).toEqual(tables.map((_, i) => i + 1));
  });

  it("gives identical results on a second run", () => {
    const guests = mixedGuests();
    const first = packTables(guests, options());
    const second = packTables(guests, options());

    expect(second.tables).toEqual(first.tables);
    expect([...second.tableByGuest]).toEqual([...first.tableByGuest]);
  });
});

describe("packCategory", () => {
  it("draws numbers from the counter it is given", () => {
    const counter = createTableCounter();
    counter.next = 5;
    const { tables } = packCategory(bucket(singles(12)), 10, counter);

    expect(tables.map((t) => t.number)).toEqual([5, 6]);
    expect(counter.next).toBe(7);
  });

  it("fills the working list it is given", () => {
    const working = [
      { number: 1, category: "family", capacity: 10, remaining: 2, guestIds: [100] },
    ];
    const counter = createTableCounter();
    counter.next = 2;
    const { tables } = packCategory(bucket(singles(3)), 10, counter, working);

    expect(tables).toBe(working);
    expect(working.map((t) => t.guestIds)).toEqual([[100, 0, 1], [2]]);
  });
});
