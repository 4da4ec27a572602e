import { describe, it, expect } from 'vitest';
import { createSerialQueue } from './serial-queue';

const delay = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

describe('createSerialQueue', () => {
  it('runs tasks one at a time in submission order', async () => {
    const enqueue = createSerialQueue();
    const events: string[] = [];

    const task = (name: string, ms: number) => async () => {
      events.push(`${name}:start`);
      await delay(ms);
      events.push(`${name}:end`);
      return name;
    };

    const results = await Promise.all([
      enqueue(task('a', 20)),
      enqueue(task('b', 1)),
      enqueue(task('c', 5)),
    ]);

    expect(results).toEqual(['a', 'b', 'c']);
    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
  });

  it('keeps going after a task rejects', async () => {
    const enqueue = createSerialQueue();
    const failure = new Error('boom');

    const first = enqueue(async () => {
      throw failure;
    });
    const second = enqueue(async () => 'next');

    await expect(first).rejects.toBe(failure);
    await expect(second).resolves.toBe('next');
  });
});
