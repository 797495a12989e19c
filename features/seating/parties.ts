import type { GuestRecord } from '@/lib/guests/types';
import type { Party } from './types';

/**
 * Split one category's guests into parties, in order of first appearance.
 * Guests without a party id each become a party of one.
 */
export function groupParties(guests: GuestRecord[]): { stated: Party[]; singles: Party[] } {
  const stated = new Map<string, Party>();
  const singles: Party[] = [];

  for (const guest of guests) {
    if (guest.partyId === null) {
      singles.push({ key: `solo-${guest.id}`, stated: false, members: [guest] });
      continue;
    }

    const party = stated.get(guest.partyId);
    if (party) {
      party.members.push(guest);
    } else {
      stated.set(guest.partyId, { key: guest.partyId, stated: true, members: [guest] });
    }
  }

  return { stated: Array.from(stated.values()), singles };
}
