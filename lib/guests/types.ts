/** One source row keyed by column label. Empty or missing cells are null. */
export type RawGuestRow = Record<string, string | null>;

export const ATTENDANCE_STATUSES = ['attending', 'pending', 'declined'] as const;
export type AttendanceStatus = (typeof ATTENDANCE_STATUSES)[number];

/** Logical input fields. Every one of them must exist as a column. */
export const GUEST_FIELDS = [
  'firstName',
  'lastName',
  'rsvp',
  'tags',
  'party',
  'meal',
  'babyChair',
  'carPark',
  'otherRequests',
  'comments',
] as const;
export type GuestField = (typeof GUEST_FIELDS)[number];

/** Maps each logical field to the column label used by the export. */
export type ColumnMap = Record<GuestField, string>;

export const DEFAULT_COLUMNS: ColumnMap = {
  firstName: 'first name',
  lastName: 'last name',
  rsvp: 'rsvp',
  tags: 'tags',
  party: 'party',
  meal: 'meal',
  babyChair: 'baby chair',
  carPark: 'do you need a car park coupon? 您需要停车券吗？',
  otherRequests:
    'if you have any other comments or requests not mentioned above, feel free to leave them here. 如果您有其他未提及的备注或需求，也欢迎在此填写.',
  comments: 'comments',
};

/** A raw export: rows plus the header in source order. */
export type GuestTable = {
  columns: string[];
  rows: RawGuestRow[];
};

export type GuestRecord = {
  /** Sequence number assigned at ingestion (0-based row position). */
  id: number;
  fullName: string;
  rsvp: string | null;
  rawTag: string | null;
  /** Trimmed party id; null means the guest is a party of one. */
  partyId: string | null;
  meal: string | null;
  babyChair: string | null;
  carPark: string | null;
  remarks: string;
  row: RawGuestRow;
};

export type SeatingWarning =
  | { code: 'malformed-row'; guestId: number; message: string }
  | {
      code: 'oversized-party';
      category: string;
      partyId: string;
      size: number;
      capacity: number;
      table: number;
      message: string;
    };
