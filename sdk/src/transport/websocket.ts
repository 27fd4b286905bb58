/**
 * WebSocket transport
 *
 * Binary messages are treated as chunks of the byte stream; message
 * boundaries carry no meaning, the frame codec delimits messages.
 */

import { randomUUID } from 'crypto';
import { WebSocket } from 'ws';
import type { RawData } from 'ws';
import { BaseTransport } from './types.js';

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

export class WebSocketTransport extends BaseTransport {
  readonly id: string;
  private readonly ws: WebSocket;

  constructor(ws: WebSocket, id: string = randomUUID()) {
    super();
    this.id = id;
    this.ws = ws;

    ws.on('message', (data: RawData) => {
      this.emitData(toBuffer(data));
    });
    ws.on('close', () => this.emitClose());
    ws.on('error', (err: Error) => this.emitClose(err));
  }

  /**
   * Open a client connection and resolve once it is established
   */
  static connect(url: string, headers: Record<string, string> = {}): Promise<WebSocketTransport> {
    return new Promise((resolve, reject) => {
      const ws = new WebSocket(url, { headers });
      const onError = (err: Error): void => {
        reject(err);
      };
      ws.once('error', onError);
      ws.once('open', () => {
        ws.off('error', onError);
        resolve(new WebSocketTransport(ws));
      });
    });
  }

  send(bytes: Uint8Array): void {
    if (this.closed || this.ws.readyState !== WebSocket.OPEN) return;
    this.ws.send(bytes, { binary: true });
  }

  close(): void {
    if (this.closed) return;
    this.ws.close(1000, 'closed');
    this.emitClose();
  }
}
