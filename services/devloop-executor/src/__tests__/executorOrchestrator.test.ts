import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { assistantOutput, createTransportPair, ExecutorClient } from '@devloop/sdk';
import type { ProtocolMessage } from '@devloop/sdk';
import { ExecutorOrchestrator } from '../orchestrator/executorOrchestrator';
import { InMemoryPreferenceStore } from '../preferences/memoryStore';
import { FakeSandboxRuntime, ScriptedPlanner, testSettings } from './helpers';

const PLAN = {
  summary: 'Todo app',
  steps: [
    { description: 'Create the crate', argv: ['cargo', 'init'] },
    { description: 'Build', argv: ['cargo', 'build'] },
  ],
};

function isEvent(name: string): (message: ProtocolMessage) => boolean {
  return (message) => message.type === 'session_event' && message.event.name === name;
}

function isError(message: ProtocolMessage): boolean {
  return message.type === 'error';
}

describe('ExecutorOrchestrator', () => {
  let runtime: FakeSandboxRuntime;
  let planner: ScriptedPlanner;
  let orchestrator: ExecutorOrchestrator;

  function createOrchestrator(reconnectGraceMs: number): ExecutorOrchestrator {
    return new ExecutorOrchestrator({
      runtime,
      store: new InMemoryPreferenceStore(),
      planner,
      settings: testSettings(),
      reconnectGraceMs,
      maxOutputBuffer: 100,
    });
  }

  beforeEach(() => {
    runtime = new FakeSandboxRuntime();
    planner = new ScriptedPlanner({
      intake: [{ kind: 'question', text: 'Which language?' }],
      plans: [PLAN],
    });
    orchestrator = createOrchestrator(50);
  });

  afterEach(async () => {
    await orchestrator.shutdown();
  });

  function connect(): ExecutorClient {
    const [front, back] = createTransportPair();
    orchestrator.attach(back);
    return new ExecutorClient(front);
  }

  function payload(message: ProtocolMessage | undefined): unknown {
    return message?.type === 'session_event' ? message.event : message?.type;
  }

  async function startSession(client: ExecutorClient): Promise<string> {
    const started = client.waitFor(isEvent('session_started'));
    client.start({ userId: 'u-1', projectId: 'todo-app' });
    const message = await started;
    if (!message.sessionId) throw new Error('session_started without a session id');
    return message.sessionId;
  }

  it('runs a session end to end over the wire', async () => {
    const client = connect();
    const sessionId = await startSession(client);
    expect(client.sessionId).toBe(sessionId);

    const question = client.waitFor((m) => m.type === 'assistant_output' && m.kind === 'question');
    client.say('Build me a todo app');
    expect(await question).toMatchObject({ text: 'Which language?' });

    const plan = client.waitFor((m) => m.type === 'assistant_output' && m.kind === 'plan');
    client.say('Rust');
    expect(await plan).toMatchObject({
      text: 'Todo app',
      plan: [
        { index: 0, description: 'Create the crate', argv: ['cargo', 'init'] },
        { index: 1, description: 'Build', argv: ['cargo', 'build'] },
      ],
    });

    const ended = client.waitFor(isEvent('session_ended'));
    client.acknowledgePlan();
    const end = await ended;

    expect(end.type === 'session_event' && end.event).toEqual({ name: 'session_ended', status: 'completed' });
    expect(runtime.executed.map((command) => command.argv)).toEqual([['cargo', 'init'], ['cargo', 'build']]);
    await vi.waitFor(() => expect(orchestrator.sessionCount).toBe(0));
  });

  it('lets the front-end end intake early', async () => {
    const client = connect();
    await startSession(client);

    const question = client.waitFor((m) => m.type === 'assistant_output' && m.kind === 'question');
    client.say('Build me a todo app');
    await question;

    const plan = client.waitFor((m) => m.type === 'assistant_output' && m.kind === 'plan');
    client.proceed();

    expect(await plan).toMatchObject({ text: 'Todo app' });
    expect(orchestrator.list()[0]?.phase).toBe('planning');
  });

  it('lists live sessions', async () => {
    const client = connect();
    const sessionId = await startSession(client);

    expect(orchestrator.list()).toEqual([
      expect.objectContaining({
        sessionId,
        userId: 'u-1',
        projectId: 'todo-app',
        phase: 'intake',
        sandboxId: 'sandbox-1',
        connected: true,
        buffered: 0,
      }),
    ]);
  });

  describe('protocol errors', () => {
    it('requires start or resume first', async () => {
      const client = connect();
      const error = client.waitFor(isError);
      client.say('hello');

      expect(await error).toMatchObject({
        code: 'invalid_state',
        message: 'Send start or resume before any other message',
        fatal: false,
      });
    });

    it('rejects executor-only message types from a front-end', async () => {
      const client = connect();
      const sessionId = await startSession(client);
      const error = client.waitFor(isError);

      client.send(assistantOutput({ sessionId, kind: 'note', text: 'spoofed' }));

      expect(await error).toMatchObject({
        code: 'protocol_error',
        message: 'Front-ends may not send assistant_output messages',
        sessionId,
      });
    });

    it('reports skipped garbage and keeps decoding', async () => {
      const [front, back] = createTransportPair();
      orchestrator.attach(back);
      const client = new ExecutorClient(front);
      const error = client.waitFor(isError);
      const started = client.waitFor(isEvent('session_started'));

      front.send(Buffer.from('garbage'));
      client.start({ userId: 'u-1', projectId: 'todo-app' });

      expect(await error).toMatchObject({
        code: 'frame_corrupt',
        message: 'Skipped 7 bytes while resynchronizing',
        fatal: false,
      });
      await started;
    });

    it('rejects a resume for an unknown session', async () => {
      const client = connect();
      const error = client.waitFor(isError);
      client.resume('missing-session');

      expect(await error).toMatchObject({ code: 'unknown_session', message: 'No session missing-session' });
    });
  });

  describe('reconnection', () => {
    it('buffers output while disconnected and replays it on resume', async () => {
      const first = connect();
      const sessionId = await startSession(first);
      first.close();
      await vi.waitFor(() => expect(orchestrator.list()[0]?.connected).toBe(false));

      const session = orchestrator.getSession(sessionId);
      await session?.userInput('Build me a todo app', 'in-1');
      expect(orchestrator.list()[0]?.buffered).toBe(1);

      const second = connect();
      const received: ProtocolMessage[] = [];
      second.onMessage((message) => received.push(message));
      second.resume(sessionId);

      await vi.waitFor(() => expect(received).toHaveLength(2));
      expect(received[0]?.type === 'session_event' && received[0].event).toEqual({
        name: 'session_resumed',
        phase: 'intake',
        replayed: 1,
      });
      expect(received[1]).toMatchObject({ type: 'assistant_output', kind: 'question', text: 'Which language?' });
      expect(orchestrator.list()[0]).toMatchObject({ connected: true, buffered: 0 });
    });

    it('holds the final status of a session that ended while parked', async () => {
      await orchestrator.shutdown();
      orchestrator = createOrchestrator(5000);
      const first = connect();
      const sessionId = await startSession(first);
      first.close();
      await vi.waitFor(() => expect(orchestrator.list()[0]?.connected).toBe(false));

      const session = orchestrator.getSession(sessionId);
      await session?.cancel('cancel-1');
      await vi.waitFor(() => expect(orchestrator.list()[0]).toMatchObject({ phase: 'cancelled', buffered: 3 }));

      const second = connect();
      const received: ProtocolMessage[] = [];
      second.onMessage((message) => received.push(message));
      second.resume(sessionId);

      await vi.waitFor(() => expect(received).toHaveLength(4));
      expect(received.map(payload)).toEqual([
        { name: 'session_resumed', phase: 'cancelled', replayed: 3 },
        { name: 'cancel_acknowledged', scope: 'session', noop: false },
        { name: 'phase_changed', seq: 1, from: 'intake', to: 'cancelled', trigger: 'cancel-1', reason: 'cancelled_by_user' },
        { name: 'session_ended', status: 'cancelled', reason: 'cancelled_by_user' },
      ]);
      expect(orchestrator.sessionCount).toBe(0);
    });

    it('releases an ended session nobody resumes within the grace period', async () => {
      const client = connect();
      const sessionId = await startSession(client);
      const session = orchestrator.getSession(sessionId);
      client.close();
      await vi.waitFor(() => expect(orchestrator.list()[0]?.connected).toBe(false));
      await session?.cancel('cancel-1');

      expect(orchestrator.sessionCount).toBe(1);
      await vi.waitFor(() => expect(orchestrator.sessionCount).toBe(0));
    });

    it('cancels a session whose front-end does not return in time', async () => {
      const client = connect();
      const sessionId = await startSession(client);
      const session = orchestrator.getSession(sessionId);

      client.close();

      expect(await session?.ended).toEqual({ status: 'cancelled', reason: 'disconnected' });
      expect(runtime.tornDown).toEqual(['sandbox-1']);
      await vi.waitFor(() => expect(orchestrator.sessionCount).toBe(0));
    });
  });

  it('cancels every session on shutdown', async () => {
    const client = connect();
    const sessionId = await startSession(client);
    const session = orchestrator.getSession(sessionId);

    await orchestrator.shutdown();

    expect(await session?.ended).toEqual({ status: 'cancelled', reason: 'executor_shutdown' });
    await vi.waitFor(() => expect(client.closed).toBe(true));
  });
});
