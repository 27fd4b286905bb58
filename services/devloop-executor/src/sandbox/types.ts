/**
 * Sandbox runtime types
 */

import type { CommandStatus } from '@devloop/sdk';
import type { LimitSettings } from '../security/securityPolicy';

export type SandboxState = 'provisioning' | 'ready' | 'busy' | 'terminating' | 'terminated';

export interface ResourceLimits extends LimitSettings {
  commandTimeoutMs: number;
}

export interface SandboxHandle {
  readonly id: string;
  readonly projectId: string;
  readonly root: string;          // Every command and file transfer stays under this directory
  readonly limits: ResourceLimits;
  state: SandboxState;
}

export interface Command {
  commandId: string;
  correlationId: string;
  argv: string[];
  cwd?: string;                   // Relative to the sandbox root
  timeoutMs?: number;             // Defaults to limits.commandTimeoutMs
}

export interface OutputChunk {
  commandId: string;
  correlationId: string;
  stream: 'stdout' | 'stderr';
  seq: number;
  data: string;
}

export interface CommandOutcome {
  commandId: string;
  correlationId: string;
  status: CommandStatus;
  exitCode: number | null;
  signal: string | null;
  durationMs: number;
  reason?: string;
}

export type ExecutionEvent =
  | { kind: 'chunk'; chunk: OutputChunk }
  | { kind: 'result'; result: CommandOutcome };

/**
 * A running command. `events` yields every chunk and then exactly one result;
 * `result` settles with the same outcome.
 */
export interface CommandExecution {
  commandId: string;
  events: AsyncIterable<ExecutionEvent>;
  result: Promise<CommandOutcome>;
}

export interface SandboxRuntime {
  /** Concurrent live sandboxes */
  readonly activeCount: number;
  provision(projectId: string, limits?: Partial<ResourceLimits>): Promise<SandboxHandle>;
  execute(handle: SandboxHandle, command: Command): CommandExecution;
  /** Returns false when the command already finished (no-op) */
  cancel(handle: SandboxHandle, commandId: string): boolean;
  teardown(handle: SandboxHandle): Promise<void>;
  writeFile(handle: SandboxHandle, path: string, content: string | Buffer): Promise<void>;
  readFile(handle: SandboxHandle, path: string): Promise<Buffer>;
}
