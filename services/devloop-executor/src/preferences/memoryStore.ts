/**
 * In-memory preference store
 *
 * Used when no REDIS_URL is configured and in tests. Every operation runs
 * synchronously between awaits, so upserts are atomic per user.
 */

import { loggers } from '../utils/logger';
import { byKey, supersedes } from './order';
import type { PreferenceFact, PreferenceSnapshot, PreferenceStore, UpsertOutcome } from './types';

const log = loggers.preferences;

interface UserPreferences {
  effective: Map<string, PreferenceFact>;
  history: PreferenceFact[];
}

export class InMemoryPreferenceStore implements PreferenceStore {
  private readonly users = new Map<string, UserPreferences>();
  private readonly snapshots = new Map<string, PreferenceSnapshot>();

  constructor(private readonly now: () => number = Date.now) {}

  async get(userId: string): Promise<PreferenceFact[]> {
    const user = this.users.get(userId);
    if (!user) return [];
    return [...user.effective.values()].sort(byKey);
  }

  async history(userId: string, key?: string): Promise<PreferenceFact[]> {
    const entries = this.users.get(userId)?.history ?? [];
    return key === undefined ? [...entries] : entries.filter((fact) => fact.key === key);
  }

  async upsert(userId: string, fact: PreferenceFact): Promise<UpsertOutcome> {
    let user = this.users.get(userId);
    if (!user) {
      user = { effective: new Map(), history: [] };
      this.users.set(userId, user);
    }

    const stored = { ...fact };
    user.history.push(stored);

    const current = user.effective.get(fact.key);
    if (current && !supersedes(stored, current)) {
      log.debug({ userId, key: fact.key, kept: current.sourceSessionId, dropped: fact.sourceSessionId }, 'Preference write lost on precedence');
      return { applied: false, effective: current, conflict: { key: fact.key, winner: current, loser: stored } };
    }

    user.effective.set(fact.key, stored);
    return { applied: true, effective: stored };
  }

  async snapshotForProject(projectId: string, userId: string): Promise<PreferenceSnapshot> {
    const frozen = this.snapshots.get(projectId);
    if (frozen) return frozen;

    const snapshot: PreferenceSnapshot = {
      projectId,
      userId,
      frozenAt: this.now(),
      facts: await this.get(userId),
    };
    // Another caller may have frozen it while we awaited
    const raced = this.snapshots.get(projectId);
    if (raced) return raced;
    this.snapshots.set(projectId, snapshot);
    return snapshot;
  }

  async close(): Promise<void> {
    this.users.clear();
    this.snapshots.clear();
  }
}
