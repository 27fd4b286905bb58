/**
 * Redis-backed preference store
 *
 * Layout:
 *   devloop:prefs:{userId}:effective   hash   key -> fact JSON
 *   devloop:prefs:{userId}:history     list   fact JSON per write, arrival order
 *   devloop:snapshot:{projectId}       string snapshot JSON, written once (SET NX)
 *
 * Upserts run as one Lua script so the precedence check, the history append
 * and the effective write are atomic per user. A write replaces the effective
 * fact only when it is at least as recent and at least as confident.
 */

import { Redis } from 'ioredis';
import { z } from 'zod';
import { PreferenceStoreError } from '../errors';
import { loggers, logError } from '../utils/logger';
import { byKey } from './order';
import { PreferenceFactSchema, PreferenceSnapshotSchema } from './types';
import type { PreferenceFact, PreferenceSnapshot, PreferenceStore, UpsertOutcome } from './types';

const log = loggers.preferences;

// KEYS: effective hash, history list
// ARGV: fact key, fact JSON, updatedAt, sourceSessionId, confidence
export const UPSERT_SCRIPT = `
local current = redis.call('HGET', KEYS[1], ARGV[1])
redis.call('RPUSH', KEYS[2], ARGV[2])
if current then
  local cur = cjson.decode(current)
  local ts = tonumber(ARGV[3])
  if cur.updatedAt > ts or (cur.updatedAt == ts and cur.sourceSessionId > ARGV[4]) or cur.confidence > tonumber(ARGV[5]) then
    return {0, current}
  end
end
redis.call('HSET', KEYS[1], ARGV[1], ARGV[2])
return {1, ARGV[2]}
`;

const UpsertReplySchema = z.tuple([z.number(), z.string()]);

/**
 * The commands the store issues; `Redis` from ioredis satisfies it
 */
export interface PreferenceRedisClient {
  hvals(key: string): Promise<string[]>;
  lrange(key: string, start: number, stop: number): Promise<string[]>;
  eval(script: string, numKeys: number, ...args: string[]): Promise<unknown>;
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: 'NX'): Promise<'OK' | null>;
  quit(): Promise<'OK'>;
}

export function effectiveKey(userId: string): string {
  return `devloop:prefs:${userId}:effective`;
}

export function historyKey(userId: string): string {
  return `devloop:prefs:${userId}:history`;
}

export function snapshotKey(projectId: string): string {
  return `devloop:snapshot:${projectId}`;
}

function parseFact(raw: string): PreferenceFact {
  return PreferenceFactSchema.parse(JSON.parse(raw));
}

export class RedisPreferenceStore implements PreferenceStore {
  constructor(
    private readonly redis: PreferenceRedisClient,
    private readonly now: () => number = Date.now
  ) {}

  static fromUrl(url: string): RedisPreferenceStore {
    const redis = new Redis(url, {
      maxRetriesPerRequest: 3,
      retryStrategy: (times) => {
        if (times > 10) {
          log.error({ attempts: times }, 'Redis reconnection failed');
          return null;
        }
        return Math.min(times * 200, 5000);
      },
    });

    redis.on('connect', () => {
      log.info('Redis connected for preference store');
    });
    redis.on('error', (error) => {
      log.error({ err: error }, 'Redis connection error');
    });

    return new RedisPreferenceStore(redis);
  }

  async get(userId: string): Promise<PreferenceFact[]> {
    const entries = await this.call('get', () => this.redis.hvals(effectiveKey(userId)));
    return entries.map(parseFact).sort(byKey);
  }

  async history(userId: string, key?: string): Promise<PreferenceFact[]> {
    const entries = await this.call('history', () => this.redis.lrange(historyKey(userId), 0, -1));
    const facts = entries.map(parseFact);
    return key === undefined ? facts : facts.filter((fact) => fact.key === key);
  }

  async upsert(userId: string, fact: PreferenceFact): Promise<UpsertOutcome> {
    const stored = PreferenceFactSchema.parse(fact);
    const json = JSON.stringify(stored);

    const reply = await this.call('upsert', () =>
      this.redis.eval(
        UPSERT_SCRIPT,
        2,
        effectiveKey(userId),
        historyKey(userId),
        stored.key,
        json,
        String(stored.updatedAt),
        stored.sourceSessionId,
        String(stored.confidence)
      )
    );

    const [applied, effectiveJson] = UpsertReplySchema.parse(reply);
    const effective = parseFact(effectiveJson);
    if (applied === 1) {
      return { applied: true, effective };
    }

    log.debug({ userId, key: stored.key, kept: effective.sourceSessionId, dropped: stored.sourceSessionId }, 'Preference write lost on precedence');
    return { applied: false, effective, conflict: { key: stored.key, winner: effective, loser: stored } };
  }

  async snapshotForProject(projectId: string, userId: string): Promise<PreferenceSnapshot> {
    const key = snapshotKey(projectId);
    const existing = await this.call('snapshot', () => this.redis.get(key));
    if (existing !== null) {
      return PreferenceSnapshotSchema.parse(JSON.parse(existing));
    }

    const snapshot: PreferenceSnapshot = {
      projectId,
      userId,
      frozenAt: this.now(),
      facts: await this.get(userId),
    };
    const written = await this.call('snapshot', () => this.redis.set(key, JSON.stringify(snapshot), 'NX'));
    if (written === 'OK') return snapshot;

    // Lost the race: someone else froze it first
    const frozen = await this.call('snapshot', () => this.redis.get(key));
    if (frozen === null) {
      throw new PreferenceStoreError(`Snapshot for ${projectId} disappeared`);
    }
    return PreferenceSnapshotSchema.parse(JSON.parse(frozen));
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      logError(log, err, `Preference store ${operation} failed`);
      throw new PreferenceStoreError(`Preference store unavailable during ${operation}`, err);
    }
  }
}
