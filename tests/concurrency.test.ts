import { describe, expect, it } from 'vitest';
import { createLimiter } from '@/lib/concurrency';
import { CancellationToken } from '@/lib/cancellation';

const deferred = () => {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>(done => {
    resolve = done;
  });
  return { promise, resolve };
};

describe('createLimiter', () => {
  it('never runs more tasks than the limit and starts queued tasks in FIFO order', async () => {
    const limit = createLimiter(2);
    const started: number[] = [];
    const gates = [deferred(), deferred(), deferred(), deferred()];
    let running = 0;
    let peak = 0;

    const runs = gates.map((gate, index) =>
      limit(async () => {
        started.push(index);
        running++;
        peak = Math.max(peak, running);
        await gate.promise;
        running--;
        return index;
      })
    );

    await Promise.resolve();
    await Promise.resolve();
    expect(started).toEqual([0, 1]);

    gates[1].resolve();
    gates[0].resolve();
    gates[2].resolve();
    gates[3].resolve();

    await expect(Promise.all(runs)).resolves.toEqual([0, 1, 2, 3]);
    expect(started).toEqual([0, 1, 2, 3]);
    expect(peak).toBe(2);
  });

  it('keeps going after a task fails', async () => {
    const limit = createLimiter(1);
    const failing = limit(async () => {
      throw new Error('boom');
    });
    const next = limit(async () => 'ok');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });
});

describe('CancellationToken', () => {
  it('lets only the first caller cancel', () => {
    const token = new CancellationToken();
    expect(token.isCancelled).toBe(false);
    expect(token.cancel('first')).toBe(true);
    expect(token.cancel('second')).toBe(false);
    expect(token.isCancelled).toBe(true);
    expect(token.cancelReason).toBe('first');
  });
});
