import { describe, it, expect, vi } from 'vitest';
import { createTransportPair } from '../transport/stream.js';

describe('StreamTransport pair', () => {
  it('delivers bytes from one side to the other in order', async () => {
    const [a, b] = createTransportPair();
    const received: Buffer[] = [];
    b.onData((chunk) => received.push(chunk));

    a.send(Buffer.from('hello '));
    a.send(Buffer.from('world'));

    await vi.waitFor(() => {
      expect(Buffer.concat(received).toString('utf8')).toBe('hello world');
    });
  });

  it('closes the peer when one side closes', async () => {
    const [a, b] = createTransportPair();
    const closed = vi.fn();
    b.onClose(closed);

    a.close();

    expect(a.closed).toBe(true);
    await vi.waitFor(() => {
      expect(b.closed).toBe(true);
    });
    expect(closed).toHaveBeenCalledTimes(1);
  });

  it('calls late close listeners immediately', () => {
    const [a] = createTransportPair();
    a.close();

    const late = vi.fn();
    a.onClose(late);
    expect(late).toHaveBeenCalledTimes(1);
  });

  it('ignores sends after close', async () => {
    const [a, b] = createTransportPair();
    const received = vi.fn();
    b.onData(received);

    a.close();
    a.send(Buffer.from('late'));

    await vi.waitFor(() => {
      expect(b.closed).toBe(true);
    });
    expect(received).not.toHaveBeenCalled();
  });
});
