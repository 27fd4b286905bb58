/**
 * ProjectSession - the session state machine for one project
 *
 * Phases: intake -> planning -> executing -> reviewing -> completed, with
 * executing -> planning on replan, `failed` on unrecoverable errors and
 * `cancelled` on explicit cancellation.
 *
 * All work runs on a serialized queue, so the session handles one input at a
 * time. Waiting is never done on the queue: commands stream in the
 * background and their results are queued when they arrive, plan approval is
 * a flag plus an optional timer. Cancellation bypasses the queue.
 */

import { randomUUID } from 'crypto';
import {
  assistantOutput,
  commandOutputChunk,
  commandRequest,
  commandResult,
  errorMessage,
  isTerminalPhase,
  sessionEvent,
} from '@devloop/sdk';
import type {
  PlanStepView,
  ProtocolMessage,
  SessionEventPayload,
  SessionPhase,
  WireErrorCode,
} from '@devloop/sdk';
import { toWireError } from '../errors';
import { describeFacts, partitionByConfidence } from '../preferences/policy';
import type { PreferenceFact, PreferenceStore } from '../preferences/types';
import { withPlanningRetry } from '../planning/retry';
import type { RetryOptions } from '../planning/retry';
import type {
  ExecutionReport,
  Plan,
  Planner,
  PlanningContext,
  StagedPreference,
  TranscriptEntry,
} from '../planning/types';
import type {
  CommandExecution,
  CommandOutcome,
  ResourceLimits,
  SandboxHandle,
  SandboxRuntime,
} from '../sandbox/types';
import { loggers, logError } from '../utils/logger';
import { canTransition } from './transitions';
import type { PhaseTransition } from './transitions';

const log = loggers.session;

const AFFIRMATIVE = /^\s*(y|yes|ok|okay|sure|please|apply)\b/i;
const NEGATIVE = /^\s*(n|no|nope|nah|skip|decline)\b/i;
const OUTPUT_TAIL_CHARS = 4000;
const CONTEXT_FILE = '.devloop/context.md';

export interface SessionSettings {
  autoApplyConfidence: number;
  planAutoApproveMs: number | null;   // null = wait for acknowledge_plan
  reapproveReplans: boolean;          // false = replans caused by results start right away
  maxReplans: number;
  planningRetry: RetryOptions;
  limits?: Partial<ResourceLimits>;
}

export interface ProjectSessionDeps {
  userId: string;
  projectId: string;
  runtime: SandboxRuntime;
  store: PreferenceStore;
  planner: Planner;
  settings: SessionSettings;
  sessionId?: string;
  now?: () => number;
  newId?: () => string;
}

export type SessionEndStatus = 'completed' | 'failed' | 'cancelled';

export interface SessionEnd {
  status: SessionEndStatus;
  reason?: string;
}

export interface SessionSummary {
  sessionId: string;
  userId: string;
  projectId: string;
  phase: SessionPhase;
  sandboxId: string | null;
  replans: number;
  commandInFlight: string | null;
  createdAt: number;
}

export interface CommandSpec {
  argv: string[];
  cwd?: string;
  timeoutMs?: number;
}

interface InFlight {
  commandId: string;
  correlationId: string;
  stepIndex: number | null;
  argv: string[];
  output: string;
}

export interface FrontEndRequest extends CommandSpec {
  correlationId: string;
  commandId?: string;
}

interface QueuedRequest extends FrontEndRequest {
  commandId: string;
}

export type SessionListener = (message: ProtocolMessage) => void;

export class ProjectSession {
  readonly sessionId: string;
  readonly userId: string;
  readonly projectId: string;
  readonly createdAt: number;

  private phaseValue: SessionPhase = 'intake';
  private readonly transcript: TranscriptEntry[] = [];
  private readonly events: PhaseTransition[] = [];
  private readonly handledTriggers = new Set<string>();
  private readonly listeners = new Set<SessionListener>();

  private handle: SandboxHandle | null = null;
  private applied: PreferenceFact[] = [];
  private awaitingConfirmation: PreferenceFact[] = [];
  private staged: StagedPreference[] = [];

  private plan: Plan | null = null;
  private planVersion = 0;
  private stepIndex = 0;
  private replans = 0;
  private awaitingAck = false;
  private approvalTimer: NodeJS.Timeout | null = null;

  private current: InFlight | null = null;
  private readonly requests: QueuedRequest[] = [];

  private queue: Promise<void> = Promise.resolve();
  private finalizing: Promise<void> | null = null;
  private resolveEnd: (end: SessionEnd) => void = () => undefined;
  readonly ended: Promise<SessionEnd>;

  private readonly runtime: SandboxRuntime;
  private readonly store: PreferenceStore;
  private readonly planner: Planner;
  private readonly settings: SessionSettings;
  private readonly now: () => number;
  private readonly newId: () => string;

  constructor(deps: ProjectSessionDeps) {
    this.now = deps.now ?? Date.now;
    this.newId = deps.newId ?? randomUUID;
    this.sessionId = deps.sessionId ?? this.newId();
    this.userId = deps.userId;
    this.projectId = deps.projectId;
    this.runtime = deps.runtime;
    this.store = deps.store;
    this.planner = deps.planner;
    this.settings = deps.settings;
    this.createdAt = this.now();
    this.ended = new Promise((resolve) => {
      this.resolveEnd = resolve;
    });
  }

  get phase(): SessionPhase {
    return this.phaseValue;
  }

  get terminal(): boolean {
    return isTerminalPhase(this.phaseValue);
  }

  get eventLog(): readonly PhaseTransition[] {
    return this.events;
  }

  get sandbox(): SandboxHandle | null {
    return this.handle;
  }

  /**
   * Subscribe to outbound messages; returns an unsubscribe function
   */
  onMessage(listener: SessionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Resolves once every queued input has been processed
   */
  whenIdle(): Promise<void> {
    return this.queue;
  }

  describe(): SessionSummary {
    return {
      sessionId: this.sessionId,
      userId: this.userId,
      projectId: this.projectId,
      phase: this.phaseValue,
      sandboxId: this.handle?.id ?? null,
      replans: this.replans,
      commandInFlight: this.current?.commandId ?? null,
      createdAt: this.createdAt,
    };
  }

  // ============================================
  // Inputs
  // ============================================

  start(): Promise<void> {
    return this.enqueue('start', () => this.begin());
  }

  userInput(text: string, triggerId: string): Promise<void> {
    return this.enqueue('user_input', () => this.consumeUserInput(text, triggerId));
  }

  acknowledgePlan(triggerId: string): Promise<void> {
    return this.enqueue('acknowledge_plan', async () => {
      if (this.phaseValue !== 'planning' || !this.awaitingAck) {
        this.emitError('invalid_state', `No plan is waiting for approval (phase ${this.phaseValue})`, false);
        return;
      }
      await this.approvePlan(triggerId);
    });
  }

  /**
   * End the question and answer early and plan from what was gathered so far
   */
  proceed(triggerId: string): Promise<void> {
    return this.enqueue('proceed', async () => {
      if (this.phaseValue !== 'intake') {
        this.emitError('invalid_state', `Nothing to proceed from (phase ${this.phaseValue})`, false);
        return;
      }
      if (!this.transcript.some((entry) => entry.role === 'user')) {
        this.emitError('invalid_state', 'Describe the project before asking to proceed', false);
        return;
      }
      log.info({ sessionId: this.sessionId, turns: this.transcript.length }, 'Intake ended by the user');
      this.transition('planning', triggerId, 'user_requested');
      await this.producePlan(triggerId, undefined, false);
    });
  }

  /**
   * Front-end command; queued synchronously so it can be cancelled before
   * it starts, run behind the command in flight
   */
  requestCommand(request: FrontEndRequest): Promise<void> {
    const queued: QueuedRequest = { ...request, commandId: request.commandId ?? this.newId() };
    const accepted = !this.terminal;
    if (accepted) this.requests.push(queued);

    return this.enqueue('command_request', async () => {
      if (!accepted) {
        this.emitError('invalid_state', `Session is ${this.phaseValue}`, false, queued.correlationId);
        return;
      }
      // Already started, cancelled or settled by the session ending
      if (!this.requests.includes(queued)) return;
      if (!this.handle) {
        this.requests.splice(this.requests.indexOf(queued), 1);
        this.emitError('invalid_state', 'Session has no sandbox', false, queued.correlationId);
        return;
      }
      this.dispatchNext();
    });
  }

  /**
   * Out of band: acknowledged immediately, the result arrives as `cancelled`.
   * A request still waiting in the queue is dropped without running.
   */
  cancelCommand(commandId: string): void {
    const queuedAt = this.requests.findIndex((request) => request.commandId === commandId);
    if (queuedAt >= 0) {
      const [request] = this.requests.splice(queuedAt, 1);
      this.emitEvent({ name: 'cancel_acknowledged', scope: 'command', commandId, noop: false });
      if (request) this.settleQueued(request, 'Cancelled before it started');
      log.info({ sessionId: this.sessionId, commandId }, 'Queued command cancelled');
      return;
    }

    const running = this.current !== null && this.current.commandId === commandId && this.handle !== null;
    const cancelled = running && this.handle !== null && this.runtime.cancel(this.handle, commandId);
    this.emitEvent({ name: 'cancel_acknowledged', scope: 'command', commandId, noop: !cancelled });
    log.info({ sessionId: this.sessionId, commandId, noop: !cancelled }, 'Command cancel requested');
  }

  /**
   * Out of band: the session moves to `cancelled` without waiting for queued work
   */
  cancel(triggerId: string, reason: string = 'cancelled_by_user'): Promise<void> {
    if (this.terminal) {
      this.emitEvent({ name: 'cancel_acknowledged', scope: 'session', noop: true });
      return this.finalizing ?? Promise.resolve();
    }
    this.emitEvent({ name: 'cancel_acknowledged', scope: 'session', noop: false });
    this.transition('cancelled', triggerId, reason);
    return this.finalize({ status: 'cancelled', reason });
  }

  // ============================================
  // Phases
  // ============================================

  private async begin(): Promise<void> {
    try {
      this.handle = await this.runtime.provision(this.projectId, this.settings.limits);
    } catch (err) {
      logError(log, err, 'Sandbox provisioning failed', { sessionId: this.sessionId, projectId: this.projectId });
      this.emitEvent(this.startedEvent());
      const wire = toWireError(err);
      await this.fail('provision_failed', wire.code === 'provision_failed' ? wire.message : 'Sandbox provisioning failed');
      return;
    }
    if (this.terminal) {
      await this.runtime.teardown(this.handle);
      return;
    }

    this.emitEvent(this.startedEvent());
    log.info({ sessionId: this.sessionId, projectId: this.projectId, sandboxId: this.handle.id }, 'Session started');

    const snapshot = await this.store.snapshotForProject(this.projectId, this.userId);
    const { applied, needsConfirmation } = partitionByConfidence(snapshot.facts, this.settings.autoApplyConfidence);
    this.applied = applied;

    await this.runtime.writeFile(this.handle, CONTEXT_FILE, this.contextFile());

    if (applied.length > 0) {
      this.say('note', `Applying your preferences: ${describeFacts(applied)}.`);
    }
    if (needsConfirmation.length > 0) {
      this.awaitingConfirmation = needsConfirmation;
      this.say('confirmation', `I noticed these preferences in earlier projects: ${describeFacts(needsConfirmation)}. Apply them here? (yes/no)`);
    }
  }

  private async consumeUserInput(text: string, triggerId: string): Promise<void> {
    if (this.terminal) {
      this.emitError('invalid_state', `Session is ${this.phaseValue}`, false);
      return;
    }

    if (this.awaitingConfirmation.length > 0) {
      const facts = this.awaitingConfirmation;
      this.awaitingConfirmation = [];
      if (AFFIRMATIVE.test(text)) {
        this.applied = [...this.applied, ...facts];
        this.say('note', `Applied: ${describeFacts(facts)}.`);
        return;
      }
      this.say('note', 'Understood, starting without them.');
      // Anything other than a plain no is also the first instruction
      if (NEGATIVE.test(text)) return;
    }

    this.transcript.push({ role: 'user', text, at: this.now() });

    switch (this.phaseValue) {
      case 'intake':
        await this.runIntake(triggerId);
        return;
      case 'planning':
        if (this.awaitingAck) {
          // Feedback on the proposed plan
          this.awaitingAck = false;
          this.clearApprovalTimer();
          await this.producePlan(triggerId, `User feedback: ${text}`, false);
        }
        return;
      default:
        this.say('note', 'Noted. I will take it into account at the next decision.');
    }
  }

  private async runIntake(triggerId: string): Promise<void> {
    const decision = await this.withRetry('intake', () => this.planner.intake(this.context()));
    if (this.terminal) return;

    if (decision.kind === 'question') {
      this.transcript.push({ role: 'assistant', text: decision.text, at: this.now() });
      this.say('question', decision.text);
      return;
    }

    this.staged.push(...(decision.preferences ?? []));
    if (decision.summary) {
      this.say('note', decision.summary);
    }
    this.transition('planning', triggerId);
    await this.producePlan(triggerId, undefined, false);
  }

  private async producePlan(triggerId: string, reason: string | undefined, fromResult: boolean): Promise<void> {
    const plan = await this.withRetry('plan', () => this.planner.plan(this.context(), reason));
    if (this.terminal || this.phaseValue !== 'planning') return;

    this.plan = plan;
    this.planVersion += 1;
    this.stepIndex = 0;
    this.transcript.push({ role: 'assistant', text: `Plan: ${plan.summary}`, at: this.now() });

    const steps: PlanStepView[] = plan.steps.map((step, index) => ({
      index,
      description: step.description,
      argv: step.argv,
    }));
    this.send(assistantOutput({ sessionId: this.sessionId, kind: 'plan', text: plan.summary, plan: steps }));

    if (fromResult && !this.settings.reapproveReplans) {
      await this.approvePlan(triggerId);
      return;
    }

    this.awaitingAck = true;
    const delay = this.settings.planAutoApproveMs;
    if (delay !== null) {
      const version = this.planVersion;
      this.approvalTimer = setTimeout(() => {
        this.approvalTimer = null;
        void this.enqueue('auto_approve', async () => {
          if (this.awaitingAck && this.planVersion === version && this.phaseValue === 'planning') {
            await this.approvePlan(`auto_approve:${version}`);
          }
        });
      }, delay);
    }
  }

  private async approvePlan(triggerId: string): Promise<void> {
    this.awaitingAck = false;
    this.clearApprovalTimer();
    this.transition('executing', triggerId);
    this.dispatchNext();
  }

  /**
   * Start the next command when nothing is in flight: queued front-end
   * requests first, then the next plan step
   */
  private dispatchNext(): void {
    if (this.current !== null || this.terminal || !this.handle) return;

    const request = this.requests.shift();
    if (request) {
      this.launch(request, null, request.correlationId, request.commandId);
      return;
    }

    if (this.phaseValue !== 'executing' || !this.plan) return;

    const step = this.plan.steps[this.stepIndex];
    if (step) {
      this.launch(step, this.stepIndex, this.newId());
      return;
    }

    // Every step ran
    void this.enqueue('review', () => this.review(`plan_complete:${this.planVersion}`));
  }

  private launch(spec: CommandSpec, stepIndex: number | null, correlationId: string, commandId: string = this.newId()): void {
    const handle = this.handle;
    if (!handle) return;

    const inFlight: InFlight = { commandId, correlationId, stepIndex, argv: spec.argv, output: '' };
    this.current = inFlight;

    this.send(commandRequest({
      sessionId: this.sessionId,
      correlationId,
      commandId,
      argv: spec.argv,
      cwd: spec.cwd,
      timeoutMs: spec.timeoutMs,
      stepIndex: stepIndex ?? undefined,
    }));
    this.emitEvent({ name: 'command_started', commandId, correlationId, argv: spec.argv });

    let execution: CommandExecution;
    try {
      execution = this.runtime.execute(handle, {
        commandId,
        correlationId,
        argv: spec.argv,
        cwd: spec.cwd,
        timeoutMs: spec.timeoutMs,
      });
    } catch (err) {
      logError(log, err, 'Command could not start', { sessionId: this.sessionId, commandId });
      this.completeCommand(inFlight, {
        commandId,
        correlationId,
        status: 'failure',
        exitCode: null,
        signal: null,
        durationMs: 0,
        reason: err instanceof Error ? err.message : String(err),
      });
      return;
    }

    this.pump(execution, inFlight).catch((err: unknown) => {
      logError(log, err, 'Command stream failed', { sessionId: this.sessionId, commandId });
    });
  }

  /**
   * Forward chunks as they arrive; the result is forwarded last
   */
  private async pump(execution: CommandExecution, inFlight: InFlight): Promise<void> {
    for await (const event of execution.events) {
      if (event.kind === 'chunk') {
        const { chunk } = event;
        inFlight.output = (inFlight.output + chunk.data).slice(-OUTPUT_TAIL_CHARS);
        this.send(commandOutputChunk({ sessionId: this.sessionId, ...chunk }));
      } else {
        this.completeCommand(inFlight, event.result);
      }
    }
  }

  private completeCommand(inFlight: InFlight, outcome: CommandOutcome): void {
    this.send(commandResult({ sessionId: this.sessionId, ...outcome }));
    if (this.current === inFlight) this.current = null;
    void this.enqueue('command_result', () => this.afterCommand(inFlight, outcome));
  }

  private async afterCommand(inFlight: InFlight, outcome: CommandOutcome): Promise<void> {
    if (this.terminal) return;
    const triggerId = `command_result:${outcome.commandId}`;

    if (inFlight.stepIndex === null || this.phaseValue !== 'executing' || !this.plan) {
      this.dispatchNext();
      return;
    }

    const plan = this.plan;
    const report: ExecutionReport = {
      stepIndex: inFlight.stepIndex,
      argv: inFlight.argv,
      outcome,
      output: inFlight.output,
    };
    const decision = await this.withRetry('decide', () => this.planner.decide(this.context(), plan, report));
    if (this.terminal) return;
    this.staged.push(...(decision.preferences ?? []));

    switch (decision.kind) {
      case 'continue':
        this.stepIndex = inFlight.stepIndex + 1;
        this.dispatchNext();
        return;
      case 'replan':
        if (this.replans >= this.settings.maxReplans) {
          await this.fail('internal_error', `Replan limit (${this.settings.maxReplans}) reached: ${decision.reason}`, 'replan_limit_exceeded');
          return;
        }
        this.replans += 1;
        log.info({ sessionId: this.sessionId, replans: this.replans, reason: decision.reason }, 'Replanning');
        this.transition('planning', triggerId, decision.reason);
        await this.producePlan(triggerId, decision.reason, true);
        return;
      case 'review':
        await this.review(triggerId, decision.summary);
        return;
    }
  }

  private async review(triggerId: string, summary?: string): Promise<void> {
    if (this.terminal || this.phaseValue !== 'executing') return;
    this.transition('reviewing', triggerId);

    const learned: PreferenceFact[] = [];
    for (const staged of this.staged) {
      const outcome = await this.store.upsert(this.userId, {
        ...staged,
        sourceSessionId: this.sessionId,
        updatedAt: this.now(),
      });
      if (outcome.applied) learned.push(outcome.effective);
    }
    this.staged = [];
    if (this.terminal) return;

    const lines = [summary ?? `Finished: ${this.plan?.summary ?? this.projectId}`];
    if (learned.length > 0) {
      lines.push(`Learned preferences: ${describeFacts(learned)}`);
    }
    this.say('summary', lines.join('\n'));

    this.transition('completed', `review_complete:${this.sessionId}`);
    await this.finalize({ status: 'completed' });
  }

  // ============================================
  // Failure and teardown
  // ============================================

  private async fail(code: WireErrorCode, message: string, reason: string = code): Promise<void> {
    if (this.terminal) return;
    log.warn({ sessionId: this.sessionId, code, message }, 'Session failed');
    this.emitError(code, message, true);
    this.transition('failed', `failure:${code}`, reason);
    await this.finalize({ status: 'failed', reason });
  }

  private finalize(end: SessionEnd): Promise<void> {
    if (this.finalizing) return this.finalizing;
    this.clearApprovalTimer();
    this.awaitingAck = false;
    for (const request of this.requests.splice(0)) {
      this.settleQueued(request, 'Session ended before the command started');
    }

    this.finalizing = (async () => {
      const handle = this.handle;
      if (handle) {
        try {
          await this.runtime.teardown(handle);
        } catch (err) {
          logError(log, err, 'Sandbox teardown failed', { sessionId: this.sessionId, sandboxId: handle.id });
        }
      }
      this.emitEvent({ name: 'session_ended', status: end.status, reason: end.reason });
      log.info({ sessionId: this.sessionId, status: end.status, reason: end.reason }, 'Session ended');
      this.resolveEnd(end);
    })();
    return this.finalizing;
  }

  /**
   * Record a phase change and emit it once per trigger
   */
  private transition(to: SessionPhase, triggerId: string, reason?: string): boolean {
    const from = this.phaseValue;
    if (from === to || !canTransition(from, to)) {
      log.debug({ sessionId: this.sessionId, from, to, triggerId }, 'Transition ignored');
      return false;
    }
    const key = `${triggerId}->${to}`;
    if (this.handledTriggers.has(key)) return false;
    this.handledTriggers.add(key);

    const entry: PhaseTransition = { seq: this.events.length + 1, from, to, trigger: triggerId, reason, at: this.now() };
    this.events.push(entry);
    this.phaseValue = to;

    log.debug({ sessionId: this.sessionId, from, to, triggerId, reason }, 'Phase changed');
    this.emitEvent({ name: 'phase_changed', seq: entry.seq, from, to, trigger: triggerId, reason });
    return true;
  }

  // ============================================
  // Helpers
  // ============================================

  private enqueue(label: string, task: () => Promise<void>): Promise<void> {
    const run = async (): Promise<void> => {
      try {
        await task();
      } catch (err) {
        logError(log, err, `Session task ${label} failed`, { sessionId: this.sessionId, phase: this.phaseValue });
        const wire = toWireError(err);
        await this.fail(wire.code, wire.message);
      }
    };
    this.queue = this.queue.then(run);
    return this.queue;
  }

  private withRetry<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return withPlanningRetry(operation, fn, this.settings.planningRetry);
  }

  private context(): PlanningContext {
    const stagedKeys = new Set(this.staged.map((fact) => fact.key));
    const stagedFacts: PreferenceFact[] = this.staged.map((fact) => ({
      ...fact,
      sourceSessionId: this.sessionId,
      updatedAt: this.now(),
    }));
    return {
      sessionId: this.sessionId,
      projectId: this.projectId,
      phase: this.phaseValue,
      transcript: this.transcript,
      preferences: [...this.applied.filter((fact) => !stagedKeys.has(fact.key)), ...stagedFacts],
    };
  }

  private contextFile(): string {
    const prefs = this.applied.map((fact) => `- ${fact.key}: ${fact.value}`);
    return [
      '# devloop project context',
      '',
      `- Project: ${this.projectId}`,
      `- Session: ${this.sessionId}`,
      '',
      '## Preferences',
      '',
      ...(prefs.length > 0 ? prefs : ['- none recorded']),
      '',
    ].join('\n');
  }

  private startedEvent(): SessionEventPayload {
    return {
      name: 'session_started',
      projectId: this.projectId,
      userId: this.userId,
      sandboxId: this.handle?.id ?? null,
      phase: this.phaseValue,
    };
  }

  private settleQueued(request: QueuedRequest, reason: string): void {
    this.send(commandResult({
      sessionId: this.sessionId,
      commandId: request.commandId,
      correlationId: request.correlationId,
      status: 'cancelled',
      exitCode: null,
      signal: null,
      durationMs: 0,
      reason,
    }));
  }

  private clearApprovalTimer(): void {
    if (this.approvalTimer) {
      clearTimeout(this.approvalTimer);
      this.approvalTimer = null;
    }
  }

  private say(kind: 'question' | 'confirmation' | 'plan' | 'summary' | 'note', text: string): void {
    this.send(assistantOutput({ sessionId: this.sessionId, kind, text }));
  }

  private emitEvent(event: SessionEventPayload): void {
    this.send(sessionEvent(event, this.sessionId));
  }

  private emitError(code: WireErrorCode, message: string, fatal: boolean, correlationId?: string): void {
    this.send(errorMessage({ sessionId: this.sessionId, code, message, fatal, correlationId }));
  }

  private send(message: ProtocolMessage): void {
    for (const listener of this.listeners) {
      try {
        listener(message);
      } catch (err) {
        logError(log, err, 'Session listener failed', { sessionId: this.sessionId, type: message.type });
      }
    }
  }
}
