/**
 * In-process stand-ins for the sandbox runtime and the planner
 */

import type { CommandStatus, ProtocolMessage } from '@devloop/sdk';
import { ProvisionError } from '../errors';
import type {
  ExecutionReport,
  IntakeDecision,
  Plan,
  Planner,
  PlanningContext,
  StepDecision,
} from '../planning/types';
import type { SessionSettings } from '../session/projectSession';
import type {
  Command,
  CommandExecution,
  CommandOutcome,
  ExecutionEvent,
  ResourceLimits,
  SandboxHandle,
  SandboxRuntime,
} from '../sandbox/types';
import { AsyncChannel } from '../utils/channel';

export type FakeResponse =
  | { status: CommandStatus; stdout?: string; exitCode?: number | null; reason?: string }
  | 'hang';

interface FakeRunning {
  finish: (status: CommandStatus, reason?: string) => void;
}

export const TEST_LIMITS: ResourceLimits = {
  cpuSeconds: 0,
  memoryMb: 0,
  maxProcesses: 0,
  maxFileSizeMb: 0,
  commandTimeoutMs: 1000,
};

/**
 * Commands complete on the next macrotask with the scripted response;
 * 'hang' keeps them running until cancel or teardown
 */
export class FakeSandboxRuntime implements SandboxRuntime {
  provisionError: Error | null = null;
  readonly executed: Command[] = [];
  readonly files = new Map<string, string>();
  readonly tornDown: string[] = [];
  // Most commands ever running at once
  peakRunning = 0;
  private readonly running = new Map<string, FakeRunning>();
  private active = 0;
  private nextId = 1;

  constructor(private readonly respond: (command: Command) => FakeResponse = () => ({ status: 'success' })) {}

  get activeCount(): number {
    return this.active;
  }

  async provision(projectId: string, limits: Partial<ResourceLimits> = {}): Promise<SandboxHandle> {
    if (this.provisionError) throw this.provisionError;
    this.active += 1;
    return {
      id: `sandbox-${this.nextId++}`,
      projectId,
      root: `/fake/${projectId}`,
      limits: { ...TEST_LIMITS, ...limits },
      state: 'ready',
    };
  }

  execute(handle: SandboxHandle, command: Command): CommandExecution {
    this.executed.push(command);
    const channel = new AsyncChannel<ExecutionEvent>();
    let resolveResult: (outcome: CommandOutcome) => void = () => undefined;
    const result = new Promise<CommandOutcome>((resolve) => {
      resolveResult = resolve;
    });
    handle.state = 'busy';

    const finish = (status: CommandStatus, reason?: string, stdout?: string, exitCode?: number | null): void => {
      if (!this.running.delete(command.commandId)) return;
      if (handle.state === 'busy') handle.state = 'ready';
      if (stdout) {
        channel.push({
          kind: 'chunk',
          chunk: { commandId: command.commandId, correlationId: command.correlationId, stream: 'stdout', seq: 0, data: stdout },
        });
      }
      const outcome: CommandOutcome = {
        commandId: command.commandId,
        correlationId: command.correlationId,
        status,
        exitCode: exitCode === undefined ? (status === 'success' ? 0 : null) : exitCode,
        signal: null,
        durationMs: 1,
        reason,
      };
      channel.push({ kind: 'result', result: outcome });
      channel.close();
      resolveResult(outcome);
    };

    this.running.set(command.commandId, { finish: (status, reason) => finish(status, reason) });
    this.peakRunning = Math.max(this.peakRunning, this.running.size);

    const response = this.respond(command);
    if (response !== 'hang') {
      setImmediate(() => finish(response.status, response.reason, response.stdout, response.exitCode));
    }
    return { commandId: command.commandId, events: channel, result };
  }

  cancel(_handle: SandboxHandle, commandId: string): boolean {
    const running = this.running.get(commandId);
    if (!running) return false;
    running.finish('cancelled', 'Cancelled');
    return true;
  }

  async teardown(handle: SandboxHandle): Promise<void> {
    if (handle.state === 'terminated') return;
    for (const running of [...this.running.values()]) {
      running.finish('cancelled', 'Cancelled');
    }
    handle.state = 'terminated';
    this.active -= 1;
    this.tornDown.push(handle.id);
  }

  async writeFile(handle: SandboxHandle, path: string, content: string | Buffer): Promise<void> {
    this.files.set(`${handle.id}:${path}`, content.toString());
  }

  async readFile(handle: SandboxHandle, path: string): Promise<Buffer> {
    const content = this.files.get(`${handle.id}:${path}`);
    if (content === undefined) throw new Error(`No file ${path}`);
    return Buffer.from(content);
  }
}

export function failingProvision(): ProvisionError {
  return new ProvisionError('resource_exhausted', 'Sandbox limit reached (0 active)');
}

/**
 * Planner that replays scripted answers and records what it was asked
 */
export class ScriptedPlanner implements Planner {
  readonly intakeContexts: PlanningContext[] = [];
  readonly planReasons: Array<string | undefined> = [];
  readonly reports: ExecutionReport[] = [];

  constructor(
    private readonly script: {
      intake?: IntakeDecision[];
      plans: Plan[];
      decide?: (report: ExecutionReport, plan: Plan) => StepDecision;
    }
  ) {}

  async intake(context: PlanningContext): Promise<IntakeDecision> {
    this.intakeContexts.push({ ...context, transcript: [...context.transcript] });
    return this.script.intake?.shift() ?? { kind: 'ready' };
  }

  async plan(_context: PlanningContext, reason?: string): Promise<Plan> {
    this.planReasons.push(reason);
    const plan = this.script.plans.shift();
    if (!plan) throw new Error('No scripted plan left');
    return plan;
  }

  async decide(_context: PlanningContext, plan: Plan, report: ExecutionReport): Promise<StepDecision> {
    this.reports.push(report);
    return this.script.decide?.(report, plan) ?? { kind: 'continue' };
  }
}

export function testSettings(overrides: Partial<SessionSettings> = {}): SessionSettings {
  return {
    autoApplyConfidence: 0.8,
    planAutoApproveMs: null,
    reapproveReplans: false,
    maxReplans: 2,
    planningRetry: { maxAttempts: 1, initialDelayMs: 0 },
    ...overrides,
  };
}

export function sequentialIds(prefix: string = 'id'): () => string {
  let next = 1;
  return () => `${prefix}-${next++}`;
}

/**
 * Collected session output with typed lookups
 */
export class MessageLog {
  readonly messages: ProtocolMessage[] = [];

  readonly push = (message: ProtocolMessage): void => {
    this.messages.push(message);
  };

  phases(): string[] {
    const phases: string[] = [];
    for (const message of this.messages) {
      if (message.type === 'session_event' && message.event.name === 'phase_changed') {
        phases.push(message.event.to);
      }
    }
    return phases;
  }

  assistant(kind?: string): string[] {
    const texts: string[] = [];
    for (const message of this.messages) {
      if (message.type === 'assistant_output' && (kind === undefined || message.kind === kind)) {
        texts.push(message.text);
      }
    }
    return texts;
  }

  results(): Array<{ commandId: string; status: CommandStatus }> {
    const results: Array<{ commandId: string; status: CommandStatus }> = [];
    for (const message of this.messages) {
      if (message.type === 'command_result') {
        results.push({ commandId: message.commandId, status: message.status });
      }
    }
    return results;
  }

  errors(): Array<{ code: string; message: string; fatal: boolean }> {
    const errors: Array<{ code: string; message: string; fatal: boolean }> = [];
    for (const message of this.messages) {
      if (message.type === 'error') {
        errors.push({ code: message.code, message: message.message, fatal: message.fatal });
      }
    }
    return errors;
  }

  /**
   * `type:commandId` for every command message, in emission order
   */
  commandTrace(): string[] {
    const trace: string[] = [];
    for (const message of this.messages) {
      if (message.type === 'command_request') {
        trace.push(`request:${message.commandId ?? '?'}`);
      } else if (message.type === 'command_output_chunk') {
        trace.push(`chunk:${message.commandId}`);
      } else if (message.type === 'command_result') {
        trace.push(`result:${message.commandId}`);
      }
    }
    return trace;
  }

  events(name: string): ProtocolMessage[] {
    return this.messages.filter((message) => message.type === 'session_event' && message.event.name === name);
  }
}
