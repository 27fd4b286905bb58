/**
 * Preference model types
 */

import { z } from 'zod';

export const PreferenceFactSchema = z.object({
  key: z.string().min(1),
  value: z.string(),
  confidence: z.number().min(0).max(1),
  sourceSessionId: z.string().min(1),
  updatedAt: z.number().int().nonnegative(),   // epoch ms
});

export type PreferenceFact = z.infer<typeof PreferenceFactSchema>;

/**
 * Result of an upsert. A write that loses on precedence is still recorded
 * in history and reported here as a resolved conflict.
 */
export interface UpsertOutcome {
  applied: boolean;
  effective: PreferenceFact;
  conflict?: PreferenceConflict;
}

export interface PreferenceConflict {
  key: string;
  winner: PreferenceFact;
  loser: PreferenceFact;
}

export const PreferenceSnapshotSchema = z.object({
  projectId: z.string(),
  userId: z.string(),
  frozenAt: z.number().int().nonnegative(),
  facts: z.array(PreferenceFactSchema),
});

export type PreferenceSnapshot = z.infer<typeof PreferenceSnapshotSchema>;

export interface PreferenceStore {
  /** Effective facts, ordered by key */
  get(userId: string): Promise<PreferenceFact[]>;
  /** Every write in arrival order, optionally for one key */
  history(userId: string, key?: string): Promise<PreferenceFact[]>;
  upsert(userId: string, fact: PreferenceFact): Promise<UpsertOutcome>;
  /** First call freezes the user's effective facts for the project */
  snapshotForProject(projectId: string, userId: string): Promise<PreferenceSnapshot>;
  close(): Promise<void>;
}
