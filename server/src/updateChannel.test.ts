import { describe, expect, it } from 'vitest';
import { UpdateChannel } from './updateChannel';

describe('UpdateChannel', () => {
  it('yields buffered values in push order', async () => {
    const channel = new UpdateChannel<number>();
    channel.push(1);
    channel.push(2);
    expect(await channel.next()).toEqual({ done: false, value: 1 });
    expect(await channel.next()).toEqual({ done: false, value: 2 });
  });

  it('hands a push straight to a waiting reader', async () => {
    const channel = new UpdateChannel<string>();
    const pending = channel.next();
    channel.push('tick');
    expect(await pending).toEqual({ done: false, value: 'tick' });
  });

  it('finishes waiting readers on close and drops later pushes', async () => {
    const channel = new UpdateChannel<number>();
    const pending = channel.next();
    expect(channel.close()).toBe(true);
    expect(await pending).toEqual({ done: true, value: undefined });
    expect(channel.push(3)).toBe(false);
    expect(await channel.next()).toEqual({ done: true, value: undefined });
  });

  it('closes only once', () => {
    const channel = new UpdateChannel<number>();
    expect(channel.close()).toBe(true);
    expect(channel.close()).toBe(false);
    expect(channel.closed).toBe(true);
  });

  it('ends a for-await loop when closed', async () => {
    const channel = new UpdateChannel<number>();
    const seen: number[] = [];
    const loop = (async () => {
      for await (const value of channel) {
        seen.push(value);
      }
    })();
    channel.push(1);
    channel.push(2);
    await Promise.resolve();
    channel.close();
    await loop;
    expect(seen).toEqual([1, 2]);
  });
});
