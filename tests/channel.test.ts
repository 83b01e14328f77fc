import { describe, it, expect } from 'vitest';
import { Channel } from '../src/size/channel';

describe('size.Channel', () => {
  it('should reject non-positive capacities', () => {
    expect(() => new Channel<string>(0)).toThrow(RangeError);
  });

  it('should deliver in FIFO order and refuse when full', () => {
    const channel = new Channel<string>(2);
    expect(channel.trySend('a')).toBe(true);
    expect(channel.trySend('b')).toBe(true);
    expect(channel.trySend('c')).toBe(false);
    expect(channel.size).toBe(2);

    expect(channel.tryReceive()).toBe('a');
    expect(channel.tryReceive()).toBe('b');
    expect(channel.tryReceive()).toBeUndefined();
  });

  it('should hand an item straight to a waiting receiver', async () => {
    const channel = new Channel<string>(1);
    const pending = channel.receive();
    expect(channel.trySend('x')).toBe(true);
    expect(channel.size).toBe(0);
    await expect(pending).resolves.toBe('x');
  });

  it('should let a blocked sender through once room is made', async () => {
    const channel = new Channel<string>(1);
    channel.trySend('first');
    const sent = channel.send('second');

    expect(channel.tryReceive()).toBe('first');
    await expect(sent).resolves.toBe(true);
    expect(channel.tryReceive()).toBe('second');
  });

  it('should release waiters on close and keep buffered items receivable', async () => {
    const waiting = new Channel<string>(1);
    const pending = waiting.receive();
    waiting.close();
    await expect(pending).resolves.toBeUndefined();

    const buffered = new Channel<string>(1);
    buffered.trySend('kept');
    buffered.close();
    expect(buffered.trySend('late')).toBe(false);
    await expect(buffered.receive()).resolves.toBe('kept');
    await expect(buffered.receive()).resolves.toBeUndefined();
  });

  it('should fail a blocked send when closed', async () => {
    const channel = new Channel<string>(1);
    channel.trySend('full');
    const sent = channel.send('blocked');
    channel.close();
    await expect(sent).resolves.toBe(false);
  });
});
