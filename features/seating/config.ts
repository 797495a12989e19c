import { InvalidOptionError } from '@/lib/platform/errors';
import { categoryOrderByName } from './categories';
import {
  CATEGORY_ORDERS,
  TAG_MODES,
  UNTAGGED_POLICIES,
  type CategoryOrder,
  type CategoryOrderName,
  type SeatingOptions,
  type TagMode,
  type UntaggedPolicy,
} from './types';

const DEFAULT_TABLE_SIZE = 10;
const DEFAULT_CATEGORY_ORDER: CategoryOrderName = 'first-seen';
const DEFAULT_UNTAGGED: UntaggedPolicy = 'seat';
const DEFAULT_TAG_MODE: TagMode = 'full';

/** Raw option values as they arrive from env or CLI flags. */
export type SeatingOptionInput = {
  tableSize?: string | number;
  categoryOrder?: string | CategoryOrder;
  untagged?: string;
  tagMode?: string;
};

function oneOf<T extends string>(option: string, allowed: readonly T[], value: string): T {
  const match = allowed.find((a) => a === value.trim().toLowerCase());
  if (match === undefined) {
    throw new InvalidOptionError(option, `"${value}" (expected ${allowed.join(' | ')})`);
  }
  return match;
}

function parseTableSize(value: string | number): number {
  const n = typeof value === 'number' ? value : Number(value.trim());
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidOptionError('table size', `"${value}" (expected a positive integer)`);
  }
  return n;
}

/** Defaults from SEATING_* env vars, falling back to the built-in values. */
export function seatingEnv(env: NodeJS.ProcessEnv = process.env): SeatingOptionInput {
  return {
    tableSize: env.SEATING_TABLE_SIZE || DEFAULT_TABLE_SIZE,
    categoryOrder: env.SEATING_CATEGORY_ORDER || DEFAULT_CATEGORY_ORDER,
    untagged: env.SEATING_UNTAGGED || DEFAULT_UNTAGGED,
    tagMode: env.SEATING_TAG_MODE || DEFAULT_TAG_MODE,
  };
}

/**
 * Merge overrides over env defaults and validate the result.
 * Throws InvalidOptionError for anything out of range.
 */
export function resolveSeatingOptions(
  overrides: SeatingOptionInput = {},
  env: NodeJS.ProcessEnv = process.env
): SeatingOptions {
  const defaults = seatingEnv(env);
  const order = overrides.categoryOrder ?? defaults.categoryOrder ?? DEFAULT_CATEGORY_ORDER;

  return {
    tableSize: parseTableSize(overrides.tableSize ?? defaults.tableSize ?? DEFAULT_TABLE_SIZE),
    categoryOrder:
      typeof order === 'function'
        ? order
        : categoryOrderByName(oneOf('category order', CATEGORY_ORDERS, order)),
    untagged: oneOf('untagged policy', UNTAGGED_POLICIES, overrides.untagged ?? defaults.untagged ?? DEFAULT_UNTAGGED),
    tagMode: oneOf('tag mode', TAG_MODES, overrides.tagMode ?? defaults.tagMode ?? DEFAULT_TAG_MODE),
  };
}

