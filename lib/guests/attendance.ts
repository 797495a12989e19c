import type { AttendanceStatus, GuestRecord } from './types';

const DECLINE_PHRASE = 'regretfully decline';

/**
 * Declined when the RSVP carries the decline phrase, pending when it is
 * blank, attending otherwise. Other words ("no", "not sure") mean nothing.
 */
export function attendanceOf(rsvp: string | null): AttendanceStatus {
  if (rsvp !== null && rsvp.toLowerCase().includes(DECLINE_PHRASE)) return 'declined';
  if (rsvp === null || rsvp.trim() === '') return 'pending';
  return 'attending';
}

export type AttendanceSplit = Record<AttendanceStatus, GuestRecord[]>;

/** Order-preserving, disjoint split covering every record. */
export function classifyAttendance(records: GuestRecord[]): AttendanceSplit {
  const split: AttendanceSplit = { attending: [], pending: [], declined: [] };
  for (const record of records) {
    split[attendanceOf(record.rsvp)].push(record);
  }
  return split;
}
