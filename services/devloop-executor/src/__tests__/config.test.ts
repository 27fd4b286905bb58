import { describe, it, expect } from 'vitest';
import { loadConfig } from '../config';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({});

    expect(config.port).toBe(3050);
    expect(config.workspacesPath).toBe('/workspaces');
    expect(config.sandbox).toEqual({
      cpuSeconds: 3600,
      memoryMb: 0,
      commandTimeoutMs: 30000,
      maxProcesses: 100,
      maxFileSizeMb: 1024,
    });
    expect(config.planAutoApproveMs).toBeNull();
    expect(config.reapproveReplans).toBe(false);
    expect(config.autoApplyConfidence).toBe(0.8);
    expect(config.redisUrl).toBeUndefined();
    expect(config.internalApiKey).toBe('');
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      PORT: '4000',
      MAX_SANDBOXES: '2',
      PLAN_AUTO_APPROVE_MS: '1500',
      REAPPROVE_REPLANS: 'true',
      REDIS_URL: 'redis://localhost:6379',
      INTERNAL_API_KEY: 'test-secret',
    });

    expect(config.port).toBe(4000);
    expect(config.maxSandboxes).toBe(2);
    expect(config.planAutoApproveMs).toBe(1500);
    expect(config.reapproveReplans).toBe(true);
    expect(config.redisUrl).toBe('redis://localhost:6379');
    expect(config.internalApiKey).toBe('test-secret');
  });

  it('treats empty strings as unset', () => {
    const config = loadConfig({ REDIS_URL: '', PLAN_AUTO_APPROVE_MS: '' });

    expect(config.redisUrl).toBeUndefined();
    expect(config.planAutoApproveMs).toBeNull();
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ PREFERENCE_AUTO_APPLY_CONFIDENCE: '2' })).toThrow();
    expect(() => loadConfig({ KEEP_WORKSPACES: 'maybe' })).toThrow();
  });
});
