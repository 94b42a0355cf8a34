import { describe, it, expect } from 'vitest';
import { startTask } from './task.js';

describe('startTask', () => {
  it('reports running until the work settles', async () => {
    const task = startTask(async () => 42);
    expect(task.running).toBe(true);
    await expect(task.promise).resolves.toBe(42);
    expect(task.running).toBe(false);
  });

  it('lets the caller cancel before the work starts', async () => {
    const task = startTask(async (signal) => signal.aborted);
    task.cancel();
    await expect(task.promise).resolves.toBe(true);
  });

  it('clears running when the work fails', async () => {
    const task = startTask(async () => {
      throw new Error('boom');
    });
    await expect(task.promise).rejects.toThrow('boom');
    expect(task.running).toBe(false);
  });
});
