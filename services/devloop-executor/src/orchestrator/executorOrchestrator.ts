/**
 * Executor Orchestrator
 *
 * Binds front-end connections to project sessions:
 * - decodes inbound frames and routes them to the bound session
 * - encodes session output back to the front-end
 * - parks sessions whose front-end disconnected, buffering their output
 *   until a `resume` arrives or the grace period runs out; a session that
 *   ends while parked is held the same way so its final status still reaches
 *   a returning front-end
 */

import {
  encodeFrame,
  errorMessage,
  FrameDecoder,
  sessionEvent,
} from '@devloop/sdk';
import type {
  ProtocolError,
  ProtocolMessage,
  SessionControl,
  Transport,
  WireErrorCode,
} from '@devloop/sdk';
import { ProjectSession } from '../session/projectSession';
import type { SessionSettings, SessionSummary } from '../session/projectSession';
import type { Planner } from '../planning/types';
import type { PreferenceStore } from '../preferences/types';
import type { SandboxRuntime } from '../sandbox/types';
import { loggers, logError } from '../utils/logger';

const log = loggers.orchestrator;

export interface OrchestratorOptions {
  runtime: SandboxRuntime;
  store: PreferenceStore;
  planner: Planner;
  settings: SessionSettings;
  reconnectGraceMs: number;
  maxOutputBuffer: number;
  maxFrameBytes?: number;
  now?: () => number;
  newId?: () => string;
}

export interface OrchestratedSession extends SessionSummary {
  connected: boolean;
  buffered: number;
}

interface SessionEntry {
  session: ProjectSession;
  connection: Connection | null;
  buffer: ProtocolMessage[];
  dropped: number;
  graceTimer: NodeJS.Timeout | null;
  finished: boolean;
  unsubscribe: () => void;
}

/**
 * One attached front-end
 */
class Connection {
  readonly decoder: FrameDecoder;
  entry: SessionEntry | null = null;

  constructor(readonly transport: Transport, maxFrameBytes?: number) {
    this.decoder = new FrameDecoder({ maxFrameBytes });
  }

  send(message: ProtocolMessage): void {
    try {
      this.transport.send(encodeFrame(message));
    } catch (err) {
      logError(log, err, 'Failed to encode outbound message', { transportId: this.transport.id, type: message.type });
      if (message.type !== 'error') {
        this.sendError('internal_error', `Could not deliver ${message.type} message`, false);
      }
    }
  }

  sendError(code: WireErrorCode, message: string, fatal: boolean, correlationId?: string): void {
    this.send(errorMessage({ sessionId: this.entry?.session.sessionId, code, message, fatal, correlationId }));
  }
}

export class ExecutorOrchestrator {
  private readonly sessions = new Map<string, SessionEntry>();
  private readonly connections = new Set<Connection>();
  private shuttingDown = false;

  constructor(private readonly options: OrchestratorOptions) {}

  get sessionCount(): number {
    return this.sessions.size;
  }

  /**
   * Bind a front-end connection. Its first control message must be
   * `start` or `resume`.
   */
  attach(transport: Transport): void {
    const connection = new Connection(transport, this.options.maxFrameBytes);
    this.connections.add(connection);
    log.info({ transportId: transport.id }, 'Front-end attached');

    transport.onData((chunk) => this.handleData(connection, chunk));
    transport.onClose((reason) => this.handleClose(connection, reason));

    if (this.shuttingDown) {
      connection.sendError('invalid_state', 'Executor is shutting down', true);
      transport.close();
    }
  }

  list(): OrchestratedSession[] {
    return [...this.sessions.values()].map((entry) => ({
      ...entry.session.describe(),
      connected: entry.connection !== null,
      buffered: entry.buffer.length,
    }));
  }

  getSession(sessionId: string): ProjectSession | undefined {
    return this.sessions.get(sessionId)?.session;
  }

  /**
   * Cancel every session and close every connection
   */
  async shutdown(): Promise<void> {
    this.shuttingDown = true;
    const entries = [...this.sessions.values()];
    log.info({ sessions: entries.length }, 'Shutting down orchestrator');

    await Promise.all(entries.map((entry) => entry.session.cancel('shutdown', 'executor_shutdown')));
    await Promise.all(entries.map((entry) => entry.session.ended));
    // Sessions that had already ended while parked
    for (const entry of [...this.sessions.values()]) {
      this.release(entry);
    }

    for (const connection of this.connections) {
      connection.transport.close();
    }
    this.connections.clear();
  }

  // ============================================
  // Inbound
  // ============================================

  private handleData(connection: Connection, chunk: Buffer): void {
    if (connection.decoder.broken) return;

    for (const result of connection.decoder.push(chunk)) {
      if (!result.ok) {
        this.reportProtocolError(connection, result.error);
        if (result.error.fatal) {
          connection.transport.close();
          return;
        }
        continue;
      }
      this.dispatch(connection, result.message);
    }
  }

  private reportProtocolError(connection: Connection, error: ProtocolError): void {
    log.warn({ transportId: connection.transport.id, code: error.code, details: error.details }, error.message);
    connection.sendError(error.code, error.message, error.fatal);
  }

  private dispatch(connection: Connection, message: ProtocolMessage): void {
    if (message.type === 'session_control') {
      const { control } = message;
      if (control.action === 'start') {
        this.startSession(connection, control.userId, control.projectId);
        return;
      }
      if (control.action === 'resume') {
        this.resumeSession(connection, control.sessionId);
        return;
      }
    }

    const entry = connection.entry;
    if (!entry) {
      connection.sendError('invalid_state', 'Send start or resume before any other message', false);
      return;
    }
    const session = entry.session;
    if (message.sessionId !== undefined && message.sessionId !== session.sessionId) {
      connection.sendError('invalid_state', `Message is for session ${message.sessionId}, connection is bound to ${session.sessionId}`, false);
      return;
    }

    switch (message.type) {
      case 'user_input':
        this.track(session.userInput(message.text, message.id), 'user_input');
        return;
      case 'command_request':
        this.track(session.requestCommand({
          correlationId: message.correlationId,
          commandId: message.commandId,
          argv: message.argv,
          cwd: message.cwd,
          timeoutMs: message.timeoutMs,
        }), 'command_request');
        return;
      case 'session_control':
        this.control(session, message.control, message.id);
        return;
      default:
        connection.sendError('protocol_error', `Front-ends may not send ${message.type} messages`, false);
    }
  }

  private control(session: ProjectSession, control: SessionControl, triggerId: string): void {
    switch (control.action) {
      case 'proceed':
        this.track(session.proceed(triggerId), 'proceed');
        return;
      case 'acknowledge_plan':
        this.track(session.acknowledgePlan(triggerId), 'acknowledge_plan');
        return;
      case 'cancel_command':
        session.cancelCommand(control.commandId);
        return;
      case 'cancel_session':
        this.track(session.cancel(triggerId), 'cancel_session');
        return;
      case 'start':
      case 'resume':
        return;
    }
  }

  // ============================================
  // Session lifecycle
  // ============================================

  private startSession(connection: Connection, userId: string, projectId: string): void {
    if (connection.entry) {
      connection.sendError('invalid_state', `Connection is already bound to session ${connection.entry.session.sessionId}`, false);
      return;
    }
    if (this.shuttingDown) {
      connection.sendError('invalid_state', 'Executor is shutting down', true);
      return;
    }

    const session = new ProjectSession({
      userId,
      projectId,
      runtime: this.options.runtime,
      store: this.options.store,
      planner: this.options.planner,
      settings: this.options.settings,
      now: this.options.now,
      newId: this.options.newId,
    });

    const entry: SessionEntry = {
      session,
      connection,
      buffer: [],
      dropped: 0,
      graceTimer: null,
      finished: false,
      unsubscribe: () => undefined,
    };
    entry.unsubscribe = session.onMessage((message) => this.deliver(entry, message));
    this.sessions.set(session.sessionId, entry);
    connection.entry = entry;

    session.ended
      .then((end) => {
        entry.finished = true;
        if (entry.connection === null && !this.shuttingDown) {
          log.info({ sessionId: session.sessionId, status: end.status }, 'Session ended while parked, holding output for resume');
          this.park(entry);
          return;
        }
        log.info({ sessionId: session.sessionId, status: end.status }, 'Releasing session');
        this.release(entry);
      })
      .catch((err: unknown) => logError(log, err, 'Session end handling failed', { sessionId: session.sessionId }));

    log.info({ sessionId: session.sessionId, userId, projectId, transportId: connection.transport.id }, 'Session created');
    this.track(session.start(), 'start');
  }

  private resumeSession(connection: Connection, sessionId: string): void {
    if (connection.entry) {
      connection.sendError('invalid_state', `Connection is already bound to session ${connection.entry.session.sessionId}`, false);
      return;
    }
    const entry = this.sessions.get(sessionId);
    if (!entry) {
      connection.sendError('unknown_session', `No session ${sessionId}`, false);
      return;
    }

    // A newer connection takes the session over
    const previous = entry.connection;
    if (previous && previous !== connection) {
      previous.entry = null;
      previous.sendError('invalid_state', 'Session resumed from another connection', true);
      previous.transport.close();
    }

    if (entry.graceTimer) {
      clearTimeout(entry.graceTimer);
      entry.graceTimer = null;
    }

    entry.connection = connection;
    connection.entry = entry;

    const replay = entry.buffer.splice(0);
    const session = entry.session;
    connection.send(sessionEvent({ name: 'session_resumed', phase: session.phase, replayed: replay.length }, session.sessionId));
    if (entry.dropped > 0) {
      connection.sendError('internal_error', `${entry.dropped} messages were dropped while disconnected`, false);
      entry.dropped = 0;
    }
    for (const message of replay) {
      connection.send(message);
    }
    log.info({ sessionId, replayed: replay.length, transportId: connection.transport.id }, 'Session resumed');

    if (entry.finished) {
      this.release(entry);
    }
  }

  private deliver(entry: SessionEntry, message: ProtocolMessage): void {
    if (entry.connection) {
      entry.connection.send(message);
      return;
    }
    entry.buffer.push(message);
    if (entry.buffer.length > this.options.maxOutputBuffer) {
      entry.buffer.shift();
      entry.dropped += 1;
    }
  }

  private handleClose(connection: Connection, reason?: Error): void {
    this.connections.delete(connection);
    for (const result of connection.decoder.broken ? [] : connection.decoder.end()) {
      if (!result.ok) {
        log.debug({ transportId: connection.transport.id, code: result.error.code }, result.error.message);
      }
    }

    const entry = connection.entry;
    connection.entry = null;
    if (reason) {
      logError(log, reason, 'Front-end connection failed', { transportId: connection.transport.id });
    }
    if (!entry || entry.connection !== connection) return;

    entry.connection = null;
    const session = entry.session;
    if (entry.finished || session.terminal || this.shuttingDown) return;

    log.info({ sessionId: session.sessionId, graceMs: this.options.reconnectGraceMs }, 'Front-end disconnected, session parked');
    this.park(entry);
  }

  /**
   * (Re)start the grace timer. On expiry a live session is cancelled; a
   * finished one is released along with its undelivered output.
   */
  private park(entry: SessionEntry): void {
    if (entry.graceTimer) clearTimeout(entry.graceTimer);
    const session = entry.session;
    entry.graceTimer = setTimeout(() => {
      entry.graceTimer = null;
      log.info({ sessionId: session.sessionId, finished: entry.finished }, 'Reconnect grace expired');
      if (entry.finished) {
        this.release(entry);
        return;
      }
      this.track(session.cancel(`grace_expired:${session.sessionId}`, 'disconnected'), 'grace_expired');
    }, this.options.reconnectGraceMs);
  }

  private release(entry: SessionEntry): void {
    if (entry.graceTimer) {
      clearTimeout(entry.graceTimer);
      entry.graceTimer = null;
    }
    entry.unsubscribe();
    this.sessions.delete(entry.session.sessionId);
    if (entry.connection) {
      entry.connection.entry = null;
      entry.connection = null;
    }
  }

  private track(work: Promise<void>, label: string): void {
    work.catch((err: unknown) => logError(log, err, `Session ${label} failed`));
  }
}
