import { describe, it, expect } from 'vitest';
import { Channel } from './channel.js';
import { ChannelClosedError } from '../utils/errors.js';

async function drain<T>(channel: Channel<T>): Promise<T[]> {
  const values: T[] = [];
  for await (const value of channel) {
    values.push(value);
  }
  return values;
}

describe('Channel', () => {
  it('should deliver values in FIFO order', async () => {
    const channel = new Channel<number>();
    await channel.send(1);
    await channel.send(2);
    await channel.send(3);
    channel.close();

    expect(await drain(channel)).toEqual([1, 2, 3]);
  });

  it('should hand a value to a receiver that is already waiting', async () => {
    const channel = new Channel<string>();
    const pending = channel.receive();

    await channel.send('a');

    expect(await pending).toEqual({ done: false, value: 'a' });
  });

  it('should block senders while at capacity', async () => {
    const channel = new Channel<number>(1);
    await channel.send(1);

    let sent = false;
    const blocked = channel.send(2).then(() => {
      sent = true;
    });
    await Promise.resolve();
    expect(sent).toBe(false);

    expect(await channel.receive()).toEqual({ done: false, value: 1 });
    await blocked;
    expect(sent).toBe(true);
    expect(await channel.receive()).toEqual({ done: false, value: 2 });
  });

  it('should still deliver values sent before close', async () => {
    const channel = new Channel<number>();
    await channel.send(7);
    channel.close();

    expect(await channel.receive()).toEqual({ done: false, value: 7 });
    expect(await channel.receive()).toEqual({ done: true, value: undefined });
  });

  it('should release waiting receivers on close', async () => {
    const channel = new Channel<number>();
    const pending = channel.receive();

    channel.close();

    expect(await pending).toEqual({ done: true, value: undefined });
  });

  it('should reject sends after close', async () => {
    const channel = new Channel<number>();
    channel.close();

    await expect(channel.send(1)).rejects.toBeInstanceOf(ChannelClosedError);
  });

  it('should reject receivers with the close error once drained', async () => {
    const channel = new Channel<number>();
    await channel.send(1);
    channel.close(new Error('boom'));

    expect(await channel.receive()).toEqual({ done: false, value: 1 });
    await expect(channel.receive()).rejects.toThrow('boom');
  });

  it('should give each value to exactly one of several consumers', async () => {
    const channel = new Channel<number>(4);
    const consumers = [drain(channel), drain(channel), drain(channel)];

    for (let i = 0; i < 100; i++) {
      await channel.send(i);
    }
    channel.close();

    const received = (await Promise.all(consumers)).flat().sort((a, b) => a - b);
    expect(received).toEqual(Array.from({ length: 100 }, (_, i) => i));
  });

  it('should reject a capacity below 1', () => {
    expect(() => new Channel<number>(0)).toThrow(RangeError);
  });
});
