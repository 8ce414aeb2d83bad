import { KeyedMutex } from '../../src';

const tick = () => new Promise((resolve) => setTimeout(resolve, 5));

describe('KeyedMutex', () => {
  it('runs work for one key strictly in arrival order', async () => {
    const mutex = new KeyedMutex<number>();
    const log: string[] = [];

    await Promise.all([
      mutex.runExclusive(1, async () => {
        log.push('a:start');
        await tick();
        log.push('a:end');
      }),
      mutex.runExclusive(1, async () => {
        log.push('b:start');
        log.push('b:end');
      }),
    ]);

    expect(log).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
  });

  it('does not block other keys', async () => {
    const mutex = new KeyedMutex<number>();
    const log: string[] = [];

    await Promise.all([
      mutex.runExclusive(1, async () => {
        log.push('1:start');
        await tick();
        log.push('1:end');
      }),
      mutex.runExclusive(2, async () => {
        log.push('2:start');
        log.push('2:end');
      }),
    ]);

    expect(log).toEqual(['1:start', '2:start', '2:end', '1:end']);
  });

  it('releases the key when work throws', async () => {
    const mutex = new KeyedMutex<string>();

    await expect(
      mutex.runExclusive('k', async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    await expect(mutex.runExclusive('k', async () => 'next')).resolves.toBe(
      'next',
    );
  });
});
