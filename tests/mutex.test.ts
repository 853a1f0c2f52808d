import { Mutex } from '../src/utils/Mutex';

describe('Mutex', () => {
  it('runs sections one at a time in call order', async () => {
    const mutex = new Mutex();
    const log: string[] = [];

    const slow = mutex.runExclusive(async () => {
      log.push('a:start');
      await new Promise((resolve) => setTimeout(resolve, 10));
      log.push('a:end');
    });
    const fast = mutex.runExclusive(() => {
      log.push('b');
    });

    await Promise.all([slow, fast]);
    expect(log).toEqual(['a:start', 'a:end', 'b']);
  });

  it('returns the section result', async () => {
    const mutex = new Mutex();
    await expect(mutex.runExclusive(() => 42)).resolves.toBe(42);
  });

  it('keeps working after a section throws', async () => {
    const mutex = new Mutex();
    await expect(
      mutex.runExclusive(() => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    await expect(mutex.runExclusive(() => 'next')).resolves.toBe('next');
  });
});
