/**
 * Local Sandbox Runtime - one restricted process environment per project
 *
 * SECURITY: each project gets a dedicated root directory and every command:
 * - Runs with the root (or a directory below it) as working directory
 * - Sees a restricted environment (HOME/XDG under the root, fixed PATH,
 *   none of the executor's own secrets)
 * - Runs under ulimits (CPU, memory, processes, file size)
 * - Runs in its own process group so timeouts and cancellation kill
 *   every descendant; whatever the command left in its group is killed when
 *   the command exits, and again on teardown
 * - Passes the command blocklist before anything is spawned
 */

import { spawn } from 'child_process';
import type { ChildProcess } from 'child_process';
import { randomUUID } from 'crypto';
import { constants } from 'fs';
import { access, mkdir, readFile, rm, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import { StringDecoder } from 'string_decoder';
import { CommandError, InvalidStateError, ProvisionError } from '../errors';
import {
  buildLimitPrefix,
  checkCommand,
  confinePath,
  shellQuote,
} from '../security/securityPolicy';
import { AsyncChannel } from '../utils/channel';
import { loggers, logError } from '../utils/logger';
import type {
  Command,
  CommandExecution,
  CommandOutcome,
  ExecutionEvent,
  ResourceLimits,
  SandboxHandle,
  SandboxRuntime,
} from './types';

const log = loggers.sandbox;

const PROJECT_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]{0,127}$/;
const SANDBOX_PATH = '/usr/local/bin:/usr/bin:/bin';

export interface LocalSandboxOptions {
  workspacesPath: string;
  maxSandboxes: number;
  defaultLimits: ResourceLimits;
  killGraceMs: number;
  keepWorkspaces?: boolean;
  shellPath?: string;
}

interface RunningCommand {
  command: Command;
  child: ChildProcess;
  stopReason: 'cancelled' | 'timed_out' | null;
  timers: NodeJS.Timeout[];
}

interface SandboxRecord {
  handle: SandboxHandle;
  running: RunningCommand | null;
  pending: Promise<CommandOutcome> | null;
  // Process groups that may still have members
  groups: Set<number>;
}

/**
 * Environment for sandboxed processes
 * Only the variables below reach the command; nothing is inherited from the executor.
 */
export function getSandboxEnv(handle: SandboxHandle): NodeJS.ProcessEnv {
  const home = join(handle.root, '.home');
  return {
    HOME: home,
    USER: 'sandbox',
    LOGNAME: 'sandbox',
    PATH: SANDBOX_PATH,
    PWD: handle.root,
    LANG: process.env.LANG || 'C.UTF-8',
    TERM: 'dumb',
    TMPDIR: join(home, 'tmp'),

    // XDG Base Directory Specification
    XDG_CONFIG_HOME: join(home, '.config'),
    XDG_CACHE_HOME: join(home, '.cache'),
    XDG_DATA_HOME: join(home, '.local', 'share'),
    XDG_STATE_HOME: join(home, '.local', 'state'),
  };
}

export class LocalSandboxRuntime implements SandboxRuntime {
  private readonly sandboxes = new Map<string, SandboxRecord>();
  private readonly shellPath: string;

  constructor(private readonly options: LocalSandboxOptions) {
    this.shellPath = options.shellPath ?? '/bin/bash';
  }

  get activeCount(): number {
    return this.sandboxes.size;
  }

  async provision(projectId: string, limits: Partial<ResourceLimits> = {}): Promise<SandboxHandle> {
    if (!PROJECT_ID_PATTERN.test(projectId)) {
      throw new ProvisionError('environment_unavailable', `Invalid project id '${projectId}'`);
    }
    if (this.sandboxes.size >= this.options.maxSandboxes) {
      throw new ProvisionError(
        'resource_exhausted',
        `Sandbox limit reached (${this.options.maxSandboxes} active)`
      );
    }
    for (const record of this.sandboxes.values()) {
      if (record.handle.projectId === projectId) {
        throw new ProvisionError('resource_exhausted', `Project ${projectId} already has an active sandbox`);
      }
    }

    const handle: SandboxHandle = {
      id: randomUUID(),
      projectId,
      root: join(this.options.workspacesPath, projectId),
      limits: { ...this.options.defaultLimits, ...limits },
      state: 'provisioning',
    };
    // Reserve the slot before the first await so concurrent provisions see it
    this.sandboxes.set(handle.id, { handle, running: null, pending: null, groups: new Set() });

    try {
      await access(this.shellPath, constants.X_OK);
    } catch (err) {
      this.sandboxes.delete(handle.id);
      throw new ProvisionError('environment_unavailable', `Shell ${this.shellPath} is not available`, err);
    }

    try {
      const env = getSandboxEnv(handle);
      await mkdir(handle.root, { recursive: true, mode: 0o750 });
      for (const dir of [env.TMPDIR, env.XDG_CONFIG_HOME, env.XDG_CACHE_HOME, env.XDG_DATA_HOME, env.XDG_STATE_HOME]) {
        if (dir) await mkdir(dir, { recursive: true });
      }
    } catch (err) {
      this.sandboxes.delete(handle.id);
      throw new ProvisionError('environment_unavailable', `Cannot create sandbox root ${handle.root}`, err);
    }

    handle.state = 'ready';
    log.info({ sandboxId: handle.id, projectId, root: handle.root, limits: handle.limits }, 'Sandbox provisioned');
    return handle;
  }

  execute(handle: SandboxHandle, command: Command): CommandExecution {
    const record = this.requireRecord(handle);
    if (handle.state !== 'ready') {
      throw new InvalidStateError(`Sandbox ${handle.id} is ${handle.state}; one command at a time`);
    }

    const channel = new AsyncChannel<ExecutionEvent>();
    const startedAt = Date.now();
    let seq = 0;
    let settled = false;
    let resolveResult: (outcome: CommandOutcome) => void = () => undefined;
    const result = new Promise<CommandOutcome>((resolve) => {
      resolveResult = resolve;
    });

    const settle = (outcome: Omit<CommandOutcome, 'commandId' | 'correlationId' | 'durationMs'>): void => {
      if (settled) return;
      settled = true;
      const full: CommandOutcome = {
        commandId: command.commandId,
        correlationId: command.correlationId,
        durationMs: Date.now() - startedAt,
        ...outcome,
      };
      if (record.running) {
        for (const timer of record.running.timers) clearTimeout(timer);
      }
      record.running = null;
      record.pending = null;
      if (handle.state === 'busy') handle.state = 'ready';
      channel.push({ kind: 'result', result: full });
      channel.close();
      log.debug({ sandboxId: handle.id, commandId: command.commandId, status: full.status, exitCode: full.exitCode }, 'Command finished');
      resolveResult(full);
    };

    const reject = (reason: string): CommandExecution => {
      log.warn({ sandboxId: handle.id, commandId: command.commandId, argv: command.argv, reason }, 'Command rejected');
      settle({ status: 'failure', exitCode: null, signal: null, reason });
      return { commandId: command.commandId, events: channel, result };
    };

    const decision = checkCommand(command.argv);
    if (!decision.allowed) {
      return reject(decision.reason ?? 'Command rejected by security policy');
    }

    const cwd = confinePath(handle.root, command.cwd ?? '.');
    if (cwd === null) {
      return reject(`Working directory '${command.cwd}' is outside the sandbox`);
    }

    const script = buildLimitPrefix(handle.limits) + command.argv.map(shellQuote).join(' ');
    const child = spawn(this.shellPath, ['-c', script], {
      cwd,
      env: getSandboxEnv(handle),
      detached: true,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    const running: RunningCommand = { command, child, stopReason: null, timers: [] };
    record.running = running;
    if (child.pid !== undefined) record.groups.add(child.pid);
    record.pending = result;
    handle.state = 'busy';

    log.debug({ sandboxId: handle.id, commandId: command.commandId, argv: command.argv, cwd, pid: child.pid }, 'Command started');

    for (const stream of ['stdout', 'stderr'] as const) {
      const source = child[stream];
      if (!source) continue;
      const decoder = new StringDecoder('utf8');
      source.on('data', (data: Buffer) => {
        const text = decoder.write(data);
        if (text.length === 0 || settled) return;
        channel.push({
          kind: 'chunk',
          chunk: { commandId: command.commandId, correlationId: command.correlationId, stream, seq: seq++, data: text },
        });
      });
    }

    const timeoutMs = command.timeoutMs ?? handle.limits.commandTimeoutMs;
    running.timers.push(
      setTimeout(() => {
        log.warn({ sandboxId: handle.id, commandId: command.commandId, timeoutMs }, 'Command timed out');
        this.stop(running, 'timed_out');
      }, timeoutMs)
    );

    child.on('error', (err) => {
      logError(log, err, 'Failed to spawn command', { sandboxId: handle.id, commandId: command.commandId });
      settle({ status: 'failure', exitCode: null, signal: null, reason: `Spawn failed: ${err.message}` });
    });

    // Background descendants must not outlive the command
    child.on('exit', () => {
      this.killGroup(record, child.pid);
    });

    child.on('close', (code, signal) => {
      if (running.stopReason === 'cancelled') {
        settle({ status: 'cancelled', exitCode: code, signal, reason: 'Cancelled' });
      } else if (running.stopReason === 'timed_out') {
        settle({ status: 'timed_out', exitCode: code, signal, reason: `Exceeded ${timeoutMs}ms` });
      } else if (code === 0) {
        settle({ status: 'success', exitCode: 0, signal: null });
      } else {
        settle({
          status: 'failure',
          exitCode: code,
          signal,
          reason: signal ? `Terminated by ${signal}` : `Exited with code ${code}`,
        });
      }
    });

    return { commandId: command.commandId, events: channel, result };
  }

  cancel(handle: SandboxHandle, commandId: string): boolean {
    const record = this.sandboxes.get(handle.id);
    const running = record?.running;
    if (!running || running.command.commandId !== commandId) {
      log.debug({ sandboxId: handle.id, commandId }, 'Cancel for finished command ignored');
      return false;
    }
    this.stop(running, 'cancelled');
    return true;
  }

  async teardown(handle: SandboxHandle): Promise<void> {
    const record = this.sandboxes.get(handle.id);
    if (!record || handle.state === 'terminating' || handle.state === 'terminated') return;

    handle.state = 'terminating';
    if (record.running) {
      const pending = record.pending;
      this.stop(record.running, 'cancelled', 0);
      if (pending) await pending;
    }
    for (const pgid of [...record.groups]) {
      this.killGroup(record, pgid);
    }

    if (!this.options.keepWorkspaces) {
      try {
        await rm(handle.root, { recursive: true, force: true });
      } catch (err) {
        logError(log, err, 'Failed to remove sandbox root', { sandboxId: handle.id, root: handle.root });
      }
    }

    this.sandboxes.delete(handle.id);
    handle.state = 'terminated';
    log.info({ sandboxId: handle.id, projectId: handle.projectId }, 'Sandbox torn down');
  }

  async writeFile(handle: SandboxHandle, path: string, content: string | Buffer): Promise<void> {
    const target = this.resolveFile(handle, path);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, content);
  }

  async readFile(handle: SandboxHandle, path: string): Promise<Buffer> {
    return readFile(this.resolveFile(handle, path));
  }

  private resolveFile(handle: SandboxHandle, path: string): string {
    this.requireRecord(handle);
    const target = confinePath(handle.root, path);
    if (target === null || target === handle.root) {
      throw new CommandError(`Path '${path}' is outside the sandbox`);
    }
    return target;
  }

  private requireRecord(handle: SandboxHandle): SandboxRecord {
    const record = this.sandboxes.get(handle.id);
    if (!record || handle.state === 'terminating' || handle.state === 'terminated') {
      throw new InvalidStateError(`Sandbox ${handle.id} is not active`);
    }
    return record;
  }

  /**
   * SIGTERM the process group, SIGKILL after the grace window
   */
  private stop(running: RunningCommand, reason: 'cancelled' | 'timed_out', graceMs: number = this.options.killGraceMs): void {
    if (running.stopReason !== null) return;
    running.stopReason = reason;
    this.signalGroup(running.child.pid, graceMs === 0 ? 'SIGKILL' : 'SIGTERM');
    if (graceMs > 0) {
      running.timers.push(setTimeout(() => this.signalGroup(running.child.pid, 'SIGKILL'), graceMs));
    }
  }

  private killGroup(record: SandboxRecord, pgid: number | undefined): void {
    if (pgid === undefined) return;
    this.signalGroup(pgid, 'SIGKILL');
    record.groups.delete(pgid);
  }

  private signalGroup(pgid: number | undefined, signal: NodeJS.Signals): void {
    if (pgid === undefined) return;
    try {
      process.kill(-pgid, signal);
    } catch (err) {
      // ESRCH: the group is already gone
      log.debug({ pgid, signal, err }, 'Process group signal failed');
    }
  }
}
