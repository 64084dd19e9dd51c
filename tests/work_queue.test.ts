import { describe, expect, it } from 'vitest';
import { InFlightGuard } from '../src/pipeline/inFlight.js';
import { WorkQueue } from '../src/pipeline/workQueue.js';
import { createTestLogger } from './helpers/fakes.js';

type Deferred = { promise: Promise<void>; resolve: () => void; reject: (error: Error) => void };

function deferred(): Deferred {
  let resolve: () => void = () => {};
  let reject: (error: Error) => void = () => {};
  const promise = new Promise<void>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe('WorkQueue', () => {
  it('runs at most `concurrency` jobs and refuses work beyond the pending limit', async () => {
    const gates = new Map<string, Deferred>();
    const started: string[] = [];
    const queue = new WorkQueue<string>(
      job => {
        started.push(job);
        const gate = deferred();
        gates.set(job, gate);
        return gate.promise;
      },
      { concurrency: 1, maxPending: 1, logger: createTestLogger() }
    );

    expect(queue.push('a')).toBe('accepted');
    expect(queue.push('b')).toBe('accepted');
    expect(queue.push('c')).toBe('full');
    expect(started).toEqual(['a']);
    expect(queue.running).toBe(1);
    expect(queue.size).toBe(1);

    gates.get('a')?.resolve();
    await new Promise(resolve => setImmediate(resolve));
    expect(started).toEqual(['a', 'b']);

    gates.get('b')?.resolve();
    await queue.onIdle();
    expect(queue.running).toBe(0);
    expect(queue.size).toBe(0);
  });

  it('keeps going after a job fails', async () => {
    const logger = createTestLogger();
    const done: number[] = [];
    const queue = new WorkQueue<number>(
      async job => {
        if (job === 1) {
          throw new Error('job exploded');
        }
        done.push(job);
      },
      { concurrency: 1, maxPending: 4, logger }
    );

    queue.push(1);
    queue.push(2);
    await queue.onIdle();

    expect(done).toEqual([2]);
    expect(logger.error).toHaveBeenCalledWith({ err: expect.any(Error) }, 'Work queue job failed');
  });

  it('refuses new jobs once closed but finishes queued ones', async () => {
    const done: string[] = [];
    const queue = new WorkQueue<string>(
      async job => {
        done.push(job);
      },
      { concurrency: 2, maxPending: 2, logger: createTestLogger() }
    );

    queue.push('x');
    queue.close();
    expect(queue.push('y')).toBe('closed');
    await queue.onIdle();
    expect(done).toEqual(['x']);
  });

  it('resolves onIdle immediately when nothing is running', async () => {
    const queue = new WorkQueue<string>(async () => {}, { concurrency: 1, maxPending: 0 });
    await expect(queue.onIdle()).resolves.toBeUndefined();
  });
});

describe('InFlightGuard', () => {
  it('admits a key once until it is released', () => {
    const guard = new InFlightGuard();
    const key = InFlightGuard.keyFor('cam1', '123');

    expect(guard.acquire(key)).toBe(true);
    expect(guard.acquire(key)).toBe(false);
    expect(guard.acquire(InFlightGuard.keyFor('cam2', '123'))).toBe(true);
    expect(guard.size).toBe(2);

    guard.release(key);
    expect(guard.acquire(key)).toBe(true);
  });
});
