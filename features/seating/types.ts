import type { GuestRecord, SeatingWarning } from '@/lib/guests/types';

export const UNTAGGED_POLICIES = ['seat', 'divert'] as const;
/** "seat": untagged guests join Uncategorised. "divert": they are held out of packing. */
export type UntaggedPolicy = (typeof UNTAGGED_POLICIES)[number];

export const TAG_MODES = ['full', 'last-segment'] as const;
export type TagMode = (typeof TAG_MODES)[number];

export const CATEGORY_ORDERS = ['first-seen', 'largest-first'] as const;
export type CategoryOrderName = (typeof CATEGORY_ORDERS)[number];

export type Category = {
  /** Matching key: lower-cased, whitespace removed. */
  key: string;
  /** Display label, taken from the first guest seen with this key. */
  label: string;
  isDefault: boolean;
};

export type CategoryBucket = {
  category: Category;
  /** Attending guests in input order. */
  guests: GuestRecord[];
  /** Position of the category's first guest in the attending list. */
  firstSeen: number;
};

/** Reorders real categories. The default bucket is appended afterwards regardless. */
export type CategoryOrder = (buckets: CategoryBucket[]) => CategoryBucket[];

export type Party = {
  /** The stated party id, or `solo-<guestId>` for a party of one. */
  key: string;
  stated: boolean;
  members: GuestRecord[];
};

export type OpenTable = {
  number: number;
  category: string;
  capacity: number;
  remaining: number;
  guestIds: number[];
};

/** Hands out global table numbers for one packing run. */
export type TableCounter = { next: number };

export type SeatingOptions = {
  tableSize: number;
  untagged: UntaggedPolicy;
  tagMode: TagMode;
  categoryOrder: CategoryOrder;
};

export type SeatingAssignment = {
  tables: OpenTable[];
  tableByGuest: Map<number, number>;
  /** Categories in processing order. */
  categories: Category[];
  categoryByGuest: Map<number, Category>;
  untagged: GuestRecord[];
  warnings: SeatingWarning[];
};
