import type { PreferenceFact } from './types';

/**
 * Precedence between two writes of the same key:
 * later updatedAt wins, ties go to the lexicographically greater session id.
 * Returns > 0 when `a` takes precedence over `b`.
 */
export function comparePrecedence(a: PreferenceFact, b: PreferenceFact): number {
  if (a.updatedAt !== b.updatedAt) return a.updatedAt - b.updatedAt;
  if (a.sourceSessionId === b.sourceSessionId) return 0;
  return a.sourceSessionId > b.sourceSessionId ? 1 : -1;
}

/**
 * Whether `candidate` replaces `current` as the effective fact: it must be
 * at least as recent and at least as confident.
 */
export function supersedes(candidate: PreferenceFact, current: PreferenceFact): boolean {
  return comparePrecedence(candidate, current) >= 0 && candidate.confidence >= current.confidence;
}

export function byKey(a: PreferenceFact, b: PreferenceFact): number {
  if (a.key === b.key) return 0;
  return a.key < b.key ? -1 : 1;
}
