import { RecordLock, withTimeout } from '../record-lock';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('RecordLock', () => {
  it('should run holders of one key in order', async () => {
    const lock = new RecordLock(1000);
    const order: string[] = [];
    const gate = deferred();

    const first = lock.runExclusive('a', async () => {
      await gate.promise;
      order.push('first');
    });
    const second = lock.runExclusive('a', async () => {
      order.push('second');
    });

    expect(lock.isBusy('a')).toBe(true);
    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(['first', 'second']);
  });

  it('should not block other keys', async () => {
    const lock = new RecordLock(1000);
    const gate = deferred();
    const held = lock.runExclusive('a', () => gate.promise);

    await expect(lock.runExclusive('b', async () => 'done')).resolves.toBe('done');

    gate.resolve();
    await held;
  });

  it('should time out a waiter with a retryable error', async () => {
    const lock = new RecordLock(20);
    const gate = deferred();
    const held = lock.runExclusive('a', () => gate.promise);

    await expect(lock.runExclusive('a', async () => 'never')).rejects.toMatchObject({
      kind: 'LockTimeout',
      retryable: true,
    });

    gate.resolve();
    await held;
    await expect(lock.runExclusive('a', async () => 'later')).resolves.toBe('later');
  });

  it('should release the key after a failure', async () => {
    const lock = new RecordLock(1000);

    await expect(
      lock.runExclusive('a', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    await expect(lock.runExclusive('a', async () => 1)).resolves.toBe(1);
  });

  it('should forget idle keys', async () => {
    const lock = new RecordLock(1000);
    await lock.runExclusive('a', async () => undefined);
    await new Promise((resolve) => setImmediate(resolve));

    expect(lock.isBusy('a')).toBe(false);
  });
});

describe('withTimeout', () => {
  it('should resolve with the value when in time', async () => {
    await expect(withTimeout(Promise.resolve(5), 50, () => new Error('late'))).resolves.toBe(5);
  });

  it('should reject with the timeout error', async () => {
    await expect(withTimeout(new Promise<never>(() => undefined), 10, () => new Error('late'))).rejects.toThrow(
      'late'
    );
  });
});
