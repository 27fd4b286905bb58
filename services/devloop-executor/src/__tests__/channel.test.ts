import { describe, it, expect } from 'vitest';
import { AsyncChannel } from '../utils/channel';

async function drain<T extends object>(channel: AsyncChannel<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of channel) items.push(item);
  return items;
}

describe('AsyncChannel', () => {
  it('yields buffered items and then ends', async () => {
    const channel = new AsyncChannel<{ n: number }>();
    channel.push({ n: 1 });
    channel.push({ n: 2 });
    channel.close();

    expect(await drain(channel)).toEqual([{ n: 1 }, { n: 2 }]);
  });

  it('wakes a waiting consumer', async () => {
    const channel = new AsyncChannel<{ n: number }>();
    const drained = drain(channel);

    channel.push({ n: 1 });
    await Promise.resolve();
    channel.push({ n: 2 });
    channel.close();

    expect(await drained).toEqual([{ n: 1 }, { n: 2 }]);
  });

  it('drops items pushed after close', async () => {
    const channel = new AsyncChannel<{ n: number }>();
    channel.close();
    channel.push({ n: 1 });

    expect(channel.closed).toBe(true);
    expect(await drain(channel)).toEqual([]);
  });
});
