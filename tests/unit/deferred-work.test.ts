import { DeferredWorkQueue } from '../../src/orchestrator/deferred-work';

describe('DeferredWorkQueue', () => {
  it('returns from schedule before the job starts', async () => {
    const queue = new DeferredWorkQueue(1);
    const job = jest.fn().mockResolvedValue(undefined);

    queue.schedule('job', job);
    expect(job).not.toHaveBeenCalled();
    expect(queue.pendingCount).toBe(1);

    await queue.drain();
    expect(job).toHaveBeenCalledTimes(1);
    expect(queue.pendingCount).toBe(0);
  });

  it('isolates job failures', async () => {
    const queue = new DeferredWorkQueue(2);
    const after = jest.fn().mockResolvedValue(undefined);

    queue.schedule('failing', async () => {
      throw new Error('analytics store down');
    });
    queue.schedule('after', after);

    await expect(queue.drain()).resolves.toBeUndefined();
    expect(after).toHaveBeenCalledTimes(1);
  });

  it('never runs more jobs at once than its concurrency', async () => {
    const queue = new DeferredWorkQueue(2);
    let running = 0;
    let peak = 0;

    for (let i = 0; i < 6; i++) {
      queue.schedule(`job-${i}`, async () => {
        running++;
        peak = Math.max(peak, running);
        await new Promise<void>((resolve) => setImmediate(resolve));
        running--;
      });
    }

    await queue.drain();
    expect(peak).toBe(2);
  });

  it('resolves drain immediately when idle', async () => {
    await expect(new DeferredWorkQueue().drain()).resolves.toBeUndefined();
  });

  it('rejects a concurrency below one', () => {
    expect(() => new DeferredWorkQueue(0)).toThrow('at least 1');
  });
});
