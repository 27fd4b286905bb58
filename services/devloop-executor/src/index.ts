/**
 * devloop executor
 *
 * Entry point: loads configuration, wires the sandbox runtime, preference
 * store and planner into the orchestrator, and serves front-ends over
 * WebSocket (and optionally a local socket).
 */

import { loadConfig } from './config';
import type { Config } from './config';
import { ExecutorOrchestrator } from './orchestrator/executorOrchestrator';
import { OpenAIPlanner } from './planning/openaiPlanner';
import { InMemoryPreferenceStore } from './preferences/memoryStore';
import { RedisPreferenceStore } from './preferences/redisStore';
import type { PreferenceStore } from './preferences/types';
import { LocalSandboxRuntime } from './sandbox/localSandbox';
import { createExecutorServer } from './server';
import {
  logError,
  logger,
  logServiceShutdown,
  logServiceStartup,
  loggers,
  setupGlobalErrorHandlers,
} from './utils/logger';

function createStore(config: Config): PreferenceStore {
  if (config.redisUrl) {
    return RedisPreferenceStore.fromUrl(config.redisUrl);
  }
  loggers.preferences.warn('No REDIS_URL configured - preferences are kept in memory and lost on restart');
  return new InMemoryPreferenceStore();
}

async function start(): Promise<void> {
  setupGlobalErrorHandlers(logger);
  const config = loadConfig();

  if (!config.openaiApiKey && !config.openaiBaseUrl) {
    throw new Error('OPENAI_API_KEY or OPENAI_BASE_URL is required for the planner');
  }

  const runtime = new LocalSandboxRuntime({
    workspacesPath: config.workspacesPath,
    maxSandboxes: config.maxSandboxes,
    defaultLimits: config.sandbox,
    killGraceMs: config.killGraceMs,
    keepWorkspaces: config.keepWorkspaces,
  });
  const store = createStore(config);
  const planner = OpenAIPlanner.fromConfig(config);

  const orchestrator = new ExecutorOrchestrator({
    runtime,
    store,
    planner,
    reconnectGraceMs: config.reconnectGraceMs,
    maxOutputBuffer: config.maxOutputBuffer,
    settings: {
      autoApplyConfidence: config.autoApplyConfidence,
      planAutoApproveMs: config.planAutoApproveMs,
      reapproveReplans: config.reapproveReplans,
      maxReplans: config.maxReplans,
      planningRetry: {
        maxAttempts: config.planningMaxAttempts,
        initialDelayMs: config.planningBackoffMs,
      },
    },
  });

  const server = createExecutorServer(config, orchestrator);
  await server.listen();
  logServiceStartup(logger, config.port);

  let stopping = false;
  const stop = async (signal: string): Promise<void> => {
    if (stopping) return;
    stopping = true;
    logServiceShutdown(logger, `${signal} received`);
    try {
      await orchestrator.shutdown();
      await server.close();
      await store.close();
      process.exit(0);
    } catch (err) {
      logError(logger, err, 'Shutdown failed');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => {
    void stop('SIGTERM');
  });
  process.on('SIGINT', () => {
    void stop('SIGINT');
  });
}

start().catch((err: unknown) => {
  logError(logger, err, 'Executor failed to start');
  process.exit(1);
});
