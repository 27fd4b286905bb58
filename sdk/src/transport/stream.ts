/**
 * Node stream transport (local sockets, pipes, stdio)
 */

import { randomUUID } from 'crypto';
import { PassThrough } from 'stream';
import type { Duplex, Readable, Writable } from 'stream';
import { BaseTransport } from './types.js';

export class StreamTransport extends BaseTransport {
  readonly id: string;
  private readonly writable: Writable;

  constructor(readable: Readable, writable: Writable, id: string = randomUUID()) {
    super();
    this.id = id;
    this.writable = writable;

    readable.on('data', (chunk: Buffer | string) => {
      this.emitData(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk);
    });
    readable.on('end', () => this.emitClose());
    readable.on('close', () => this.emitClose());
    readable.on('error', (err: Error) => this.emitClose(err));
    if (writable !== readable) {
      writable.on('error', (err: Error) => this.emitClose(err));
    }
  }

  /**
   * Wrap a duplex stream such as a net.Socket
   */
  static fromDuplex(stream: Duplex, id?: string): StreamTransport {
    return new StreamTransport(stream, stream, id);
  }

  send(bytes: Uint8Array): void {
    if (this.closed || this.writable.writableEnded) return;
    this.writable.write(bytes);
  }

  close(): void {
    if (this.closed) return;
    if (!this.writable.writableEnded) this.writable.end();
    this.emitClose();
  }
}

/**
 * Two connected in-process transports; bytes sent on one arrive on the other
 */
export function createTransportPair(): [StreamTransport, StreamTransport] {
  const aToB = new PassThrough();
  const bToA = new PassThrough();

  const a = new StreamTransport(bToA, aToB, 'pair-a');
  const b = new StreamTransport(aToB, bToA, 'pair-b');

  // Closing one side ends the other
  a.onClose(() => {
    if (!aToB.writableEnded) aToB.end();
  });
  b.onClose(() => {
    if (!bToA.writableEnded) bToA.end();
  });

  return [a, b];
}
