import type { GuestRecord } from '@/lib/guests/types';
import type {
  Category,
  CategoryBucket,
  CategoryOrder,
  CategoryOrderName,
  TagMode,
  UntaggedPolicy,
} from './types';

export const DEFAULT_CATEGORY_LABEL = 'Uncategorised';

/** Lower-case and drop every whitespace character so "Bride Side" matches "bride side ". */
export function normaliseTagKey(tag: string): string {
  return tag.trim().toLowerCase().replace(/\s+/g, '');
}

const DEFAULT_CATEGORY_KEY = normaliseTagKey(DEFAULT_CATEGORY_LABEL);

/**
 * The tag text a guest is grouped by, or null when there is none.
 *
 * "last-segment" keeps only the final comma-separated part, so
 * "Table 1_VIP, Bride_Side" groups under "Bride_Side".
 */
export function extractTag(rawTag: string | null, mode: TagMode): string | null {
  if (rawTag === null) return null;

  if (mode === 'last-segment') {
    const parts = rawTag
      .split(',')
      .map((p) => p.trim())
      .filter(Boolean);
    return parts.length > 0 ? parts[parts.length - 1] : null;
  }

  const tag = rawTag.trim();
  return tag ? tag : null;
}

export type CategoryGrouping = {
  /** Real categories in order of first appearance. */
  buckets: CategoryBucket[];
  /** The Uncategorised bucket, when any guest landed in it. */
  fallback: CategoryBucket | null;
  /** Guests held out of packing under the "divert" policy. */
  untagged: GuestRecord[];
};

export function groupByCategory(
  attending: GuestRecord[],
  options: { untagged: UntaggedPolicy; tagMode: TagMode }
): CategoryGrouping {
  const byKey = new Map<string, CategoryBucket>();
  const untagged: GuestRecord[] = [];

  attending.forEach((guest, position) => {
    const tag = extractTag(guest.rawTag, options.tagMode);

    if (tag === null && options.untagged === 'divert') {
      untagged.push(guest);
      return;
    }

    const label = tag ?? DEFAULT_CATEGORY_LABEL;
    const key = normaliseTagKey(label);
    const bucket = byKey.get(key);
    if (bucket) {
      bucket.guests.push(guest);
      return;
    }

    const category: Category = {
      key,
      label: key === DEFAULT_CATEGORY_KEY ? DEFAULT_CATEGORY_LABEL : label,
      isDefault: key === DEFAULT_CATEGORY_KEY,
    };
    byKey.set(key, { category, guests: [guest], firstSeen: position });
  });

  const all = Array.from(byKey.values());
  return {
    buckets: all.filter((b) => !b.category.isDefault),
    fallback: all.find((b) => b.category.isDefault) ?? null,
    untagged,
  };
}

export const firstSeenOrder: CategoryOrder = (buckets) =>
  [...buckets].sort((a, b) => a.firstSeen - b.firstSeen);

/** Biggest categories first so they get contiguous blocks of tables. */
export const largestFirstOrder: CategoryOrder = (buckets) =>
  [...buckets].sort((a, b) => b.guests.length - a.guests.length || a.firstSeen - b.firstSeen);

const ORDERS: Record<CategoryOrderName, CategoryOrder> = {
  'first-seen': firstSeenOrder,
  'largest-first': largestFirstOrder,
};

export function categoryOrderByName(name: CategoryOrderName): CategoryOrder {
  return ORDERS[name];
}

/** Apply the policy to real categories; Uncategorised always goes last. */
export function orderCategories(grouping: CategoryGrouping, order: CategoryOrder): CategoryBucket[] {
  const ordered = order(grouping.buckets);
  return grouping.fallback ? [...ordered, grouping.fallback] : ordered;
}
