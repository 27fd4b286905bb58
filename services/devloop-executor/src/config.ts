/**
 * Configuration for the devloop executor
 *
 * Everything comes from environment variables, validated once at startup.
 *
 * SECURITY: the HTTP surface should ONLY be reachable by trusted front-ends.
 * Requests must carry INTERNAL_API_KEY when it is set.
 */

import { z } from 'zod';

const boolFromEnv = z
  .enum(['true', 'false', '1', '0', ''])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

// Empty string means "not set"
const optionalString = z
  .string()
  .optional()
  .transform((value) => (value ? value : undefined));

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3050),
  HOST: z.string().default('0.0.0.0'),
  SOCKET_PATH: optionalString,

  // Sandboxes
  WORKSPACES_PATH: z.string().default('/workspaces'),
  MAX_SANDBOXES: z.coerce.number().int().positive().default(16),
  DEFAULT_COMMAND_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  KILL_GRACE_MS: z.coerce.number().int().nonnegative().default(2000),
  SANDBOX_CPU_SECONDS: z.coerce.number().int().positive().default(3600),
  SANDBOX_MEMORY_MB: z.coerce.number().int().nonnegative().default(0),   // 0 = unlimited
  SANDBOX_MAX_PROCESSES: z.coerce.number().int().nonnegative().default(100),
  SANDBOX_MAX_FILE_MB: z.coerce.number().int().nonnegative().default(1024),
  KEEP_WORKSPACES: boolFromEnv,

  // Sessions
  RECONNECT_GRACE_MS: z.coerce.number().int().nonnegative().default(60000),
  SESSION_MAX_OUTPUT_BUFFER: z.coerce.number().int().positive().default(1000),
  PLAN_AUTO_APPROVE_MS: optionalString.pipe(z.coerce.number().int().nonnegative().optional()),
  REAPPROVE_REPLANS: boolFromEnv,
  MAX_REPLANS: z.coerce.number().int().nonnegative().default(3),
  PLANNING_MAX_ATTEMPTS: z.coerce.number().int().positive().default(4),
  PLANNING_BACKOFF_MS: z.coerce.number().int().nonnegative().default(500),

  // Preferences
  PREFERENCE_AUTO_APPLY_CONFIDENCE: z.coerce.number().min(0).max(1).default(0.8),
  REDIS_URL: optionalString,

  // Planner
  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: optionalString,
  PLANNER_MODEL: z.string().default('gpt-4o-mini'),

  INTERNAL_API_KEY: z.string().default(''),
  NODE_ENV: z.string().default('development'),
});

export interface SandboxDefaults {
  cpuSeconds: number;
  memoryMb: number;
  commandTimeoutMs: number;
  maxProcesses: number;
  maxFileSizeMb: number;
}

export interface Config {
  port: number;
  host: string;
  socketPath?: string;                // Optional local socket listener
  workspacesPath: string;             // Parent of every sandbox root
  maxSandboxes: number;               // Concurrent sandbox cap
  killGraceMs: number;                // SIGTERM -> SIGKILL window
  keepWorkspaces: boolean;            // Leave roots on disk after teardown
  sandbox: SandboxDefaults;
  reconnectGraceMs: number;
  maxOutputBuffer: number;            // Messages held for a parked session
  planAutoApproveMs: number | null;   // null = wait for acknowledgement
  reapproveReplans: boolean;
  maxReplans: number;
  planningMaxAttempts: number;
  planningBackoffMs: number;
  autoApplyConfidence: number;
  redisUrl?: string;                  // Unset = in-memory preference store
  openaiApiKey?: string;
  openaiBaseUrl?: string;
  plannerModel: string;
  internalApiKey: string;             // SECURITY: shared key for HTTP and WebSocket access
  nodeEnv: string;
}

/**
 * Parse and validate the environment; throws a ZodError on invalid values
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.parse(env);

  return {
    port: parsed.PORT,
    host: parsed.HOST,
    socketPath: parsed.SOCKET_PATH,
    workspacesPath: parsed.WORKSPACES_PATH,
    maxSandboxes: parsed.MAX_SANDBOXES,
    killGraceMs: parsed.KILL_GRACE_MS,
    keepWorkspaces: parsed.KEEP_WORKSPACES,
    sandbox: {
      cpuSeconds: parsed.SANDBOX_CPU_SECONDS,
      memoryMb: parsed.SANDBOX_MEMORY_MB,
      commandTimeoutMs: parsed.DEFAULT_COMMAND_TIMEOUT_MS,
      maxProcesses: parsed.SANDBOX_MAX_PROCESSES,
      maxFileSizeMb: parsed.SANDBOX_MAX_FILE_MB,
    },
    reconnectGraceMs: parsed.RECONNECT_GRACE_MS,
    maxOutputBuffer: parsed.SESSION_MAX_OUTPUT_BUFFER,
    planAutoApproveMs: parsed.PLAN_AUTO_APPROVE_MS ?? null,
    reapproveReplans: parsed.REAPPROVE_REPLANS,
    maxReplans: parsed.MAX_REPLANS,
    planningMaxAttempts: parsed.PLANNING_MAX_ATTEMPTS,
    planningBackoffMs: parsed.PLANNING_BACKOFF_MS,
    autoApplyConfidence: parsed.PREFERENCE_AUTO_APPLY_CONFIDENCE,
    redisUrl: parsed.REDIS_URL,
    openaiApiKey: parsed.OPENAI_API_KEY,
    openaiBaseUrl: parsed.OPENAI_BASE_URL,
    plannerModel: parsed.PLANNER_MODEL,
    internalApiKey: parsed.INTERNAL_API_KEY,
    nodeEnv: parsed.NODE_ENV,
  };
}
