/**
 * ExecutorClient
 *
 * Front-end side of a devloop connection. Wraps a transport with the frame
 * codec and exposes typed helpers for the session control flow.
 *
 * @example
 * ```typescript
 * import { ExecutorClient, WebSocketTransport } from '@devloop/sdk';
 *
 * const transport = await WebSocketTransport.connect('ws://localhost:3050/ws/executor');
 * const client = new ExecutorClient(transport);
 *
 * client.onMessage((msg) => console.log(msg.type));
 * client.start({ userId: 'user-1', projectId: 'todo-cli' });
 * client.say('Build a CLI todo app');
 * ```
 */

import { randomUUID } from 'crypto';
import { encodeFrame, FrameDecoder } from './protocol/codec.js';
import type { ProtocolError } from './protocol/errors.js';
import {
  commandRequest,
  sessionControl,
  userInput,
} from './protocol/messages.js';
import type { ProtocolMessage, SessionControl } from './protocol/messages.js';
import type { Transport } from './transport/types.js';

export type MessageHandler = (message: ProtocolMessage) => void;
export type ProtocolErrorHandler = (error: ProtocolError) => void;

export interface RunCommandOptions {
  cwd?: string;
  timeoutMs?: number;
}

export class ExecutorClient {
  private readonly decoder = new FrameDecoder();
  private readonly messageHandlers = new Set<MessageHandler>();
  private readonly errorHandlers = new Set<ProtocolErrorHandler>();
  private currentSessionId: string | undefined;

  constructor(private readonly transport: Transport) {
    transport.onData((chunk) => this.handleData(chunk));
    transport.onClose(() => {
      for (const result of this.decoder.broken ? [] : this.decoder.end()) {
        if (!result.ok) this.emitError(result.error);
      }
    });
  }

  /**
   * Session id assigned by the executor, once `session_started` arrived
   */
  get sessionId(): string | undefined {
    return this.currentSessionId;
  }

  get closed(): boolean {
    return this.transport.closed;
  }

  onMessage(handler: MessageHandler): () => void {
    this.messageHandlers.add(handler);
    return () => {
      this.messageHandlers.delete(handler);
    };
  }

  onProtocolError(handler: ProtocolErrorHandler): () => void {
    this.errorHandlers.add(handler);
    return () => {
      this.errorHandlers.delete(handler);
    };
  }

  send(message: ProtocolMessage): void {
    this.transport.send(encodeFrame(message));
  }

  start(params: { userId: string; projectId: string }): void {
    this.control({ action: 'start', ...params });
  }

  resume(sessionId: string): void {
    this.currentSessionId = sessionId;
    this.control({ action: 'resume', sessionId });
  }

  say(text: string): void {
    this.send(userInput({ sessionId: this.currentSessionId, text }));
  }

  proceed(): void {
    this.control({ action: 'proceed' });
  }

  acknowledgePlan(): void {
    this.control({ action: 'acknowledge_plan' });
  }

  cancelCommand(commandId: string): void {
    this.control({ action: 'cancel_command', commandId });
  }

  cancelSession(): void {
    this.control({ action: 'cancel_session' });
  }

  /**
   * Ask the executor to run a command in the session sandbox.
   * Returns the correlation id shared by the resulting chunks and result.
   */
  runCommand(argv: string[], options: RunCommandOptions = {}): string {
    const correlationId = randomUUID();
    this.send(
      commandRequest({
        sessionId: this.currentSessionId,
        correlationId,
        argv,
        cwd: options.cwd,
        timeoutMs: options.timeoutMs,
      })
    );
    return correlationId;
  }

  /**
   * Resolve with the first inbound message matching the predicate
   */
  waitFor<T extends ProtocolMessage>(
    predicate: (message: ProtocolMessage) => message is T,
    timeoutMs?: number
  ): Promise<T>;
  waitFor(predicate: (message: ProtocolMessage) => boolean, timeoutMs?: number): Promise<ProtocolMessage>;
  waitFor(predicate: (message: ProtocolMessage) => boolean, timeoutMs = 10000): Promise<ProtocolMessage> {
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        unsubscribe();
        reject(new Error(`Timed out after ${timeoutMs}ms waiting for message`));
      }, timeoutMs);
      const unsubscribe = this.onMessage((message) => {
        if (!predicate(message)) return;
        clearTimeout(timer);
        unsubscribe();
        resolve(message);
      });
    });
  }

  close(): void {
    this.transport.close();
  }

  private control(control: SessionControl): void {
    this.send(sessionControl(control, this.currentSessionId));
  }

  private handleData(chunk: Buffer): void {
    if (this.decoder.broken) return;
    for (const result of this.decoder.push(chunk)) {
      if (!result.ok) {
        this.emitError(result.error);
        if (result.error.fatal) this.transport.close();
        continue;
      }
      const message = result.message;
      if (message.type === 'session_event' && message.event.name === 'session_started' && message.sessionId) {
        this.currentSessionId = message.sessionId;
      }
      for (const handler of this.messageHandlers) {
        handler(message);
      }
    }
  }

  private emitError(error: ProtocolError): void {
    for (const handler of this.errorHandlers) {
      handler(error);
    }
  }
}
