/**
 * Transport abstraction
 *
 * An ordered, reliable byte stream between a front-end and the executor.
 * Framing is the codec's job; a transport only moves bytes.
 */

export type DataListener = (chunk: Buffer) => void;
export type CloseListener = (reason?: Error) => void;

export interface Transport {
  readonly id: string;
  readonly closed: boolean;
  send(bytes: Uint8Array): void;
  /** Subscribe to inbound bytes; returns an unsubscribe function */
  onData(listener: DataListener): () => void;
  /** Fires once when either side closes or the stream fails */
  onClose(listener: CloseListener): () => void;
  close(): void;
}

/**
 * Listener bookkeeping shared by the concrete transports
 */
export abstract class BaseTransport implements Transport {
  abstract readonly id: string;
  private readonly dataListeners = new Set<DataListener>();
  private readonly closeListeners = new Set<CloseListener>();
  private isClosed = false;

  get closed(): boolean {
    return this.isClosed;
  }

  abstract send(bytes: Uint8Array): void;
  abstract close(): void;

  onData(listener: DataListener): () => void {
    this.dataListeners.add(listener);
    return () => {
      this.dataListeners.delete(listener);
    };
  }

  onClose(listener: CloseListener): () => void {
    if (this.isClosed) {
      listener();
      return () => undefined;
    }
    this.closeListeners.add(listener);
    return () => {
      this.closeListeners.delete(listener);
    };
  }

  protected emitData(chunk: Buffer): void {
    for (const listener of this.dataListeners) {
      listener(chunk);
    }
  }

  protected emitClose(reason?: Error): void {
    if (this.isClosed) return;
    this.isClosed = true;
    for (const listener of this.closeListeners) {
      listener(reason);
    }
    this.closeListeners.clear();
    this.dataListeners.clear();
  }
}
