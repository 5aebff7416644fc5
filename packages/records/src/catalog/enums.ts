// Closed tag sets used by the catalog schemas

import { assertNever } from '../utils.js';

export const RANKS = ['cadet', 'officer', 'lieutenant', 'captain', 'commander'] as const;

export type Rank = (typeof RANKS)[number];

export const CONTACT_TYPES = ['radio', 'visual', 'physical', 'telepathic'] as const;

export type ContactType = (typeof CONTACT_TYPES)[number];

export function isLeadershipRank(rank: Rank): boolean {
  switch (rank) {
    case 'captain':
    case 'commander':
      return true;
    case 'cadet':
    case 'officer':
    case 'lieutenant':
      return false;
    default:
      return assertNever(rank);
  }
}

export const LEADERSHIP_RANKS: readonly Rank[] = RANKS.filter(isLeadershipRank);
