// noinspection ES6MissingAwait

import { EXCLUSIVE, LockManager, SHARED } from '../src/engine/locks';

describe('Sharable lock', () => {
  let ops: number[]; // Used to assert concurrent operation ordering
  const pushOp = async (n: number) => ops.push(n);

  beforeEach(() => {
    ops = [];
  });

  test('exclusive ops execute immediately', async () => {
    const lock = new LockManager<'it'>();
    await lock.exclusive('it', 'test', async () => {
      expect(lock.state('it')).toEqual({ purpose: 'test', mode: EXCLUSIVE });
      await pushOp(1);
      await pushOp(2);
    });
    expect(ops).toEqual([1, 2]);
    await lock.open('it');
    expect(lock.state('it')).toBeUndefined();
    await lock.exclusive('it', 'test', async () => {
      await pushOp(3);
      await pushOp(4);
    });
    expect(ops).toEqual([1, 2, 3, 4]);
  });

  test('exclusive ops do not share', async () => {
    const lock = new LockManager<'it'>();
    lock.exclusive('it', 'test', async () => {
      await pushOp(1);
      await pushOp(2);
    });
    await lock.exclusive('it', 'test', async () => {
      await pushOp(3);
      await pushOp(4);
    });
    expect(ops).toEqual([1, 2, 3, 4]);
  });

  test('three exclusive ops do not share', async () => {
    const lock = new LockManager<'it'>();
    lock.exclusive('it', 'test', async () => {
      await pushOp(1);
      await pushOp(2);
    });
    lock.exclusive('it', 'test', async () => {
      await pushOp(3);
      await pushOp(4);
    });
    await lock.exclusive('it', 'test', async () => {
      await pushOp(5);
      await pushOp(6);
    });
    expect(ops).toEqual([1, 2, 3, 4, 5, 6]);
  });

  test('exclusive op returns its result', async () => {
    const lock = new LockManager<'it'>();
    await expect(lock.exclusive('it', 'test', () => 42)).resolves.toBe(42);
  });

  test('sync throw in exclusive lock rejects', async () => {
    const lock = new LockManager<'it'>();
    lock.exclusive('it', 'test', async () => {
      await pushOp(1);
      await pushOp(2);
    });
    await expect(lock.exclusive('it', 'test', () => {
      throw 'bang';
    })).rejects.toBe('bang');
  });

  test('async throw in exclusive lock rejects', async () => {
    const lock = new LockManager<'it'>();
    await expect(lock.exclusive('it', 'test', () => {
      return Promise.reject('bang');
    })).rejects.toBe('bang');
  });

  test('lock opens after a rejection', async () => {
    const lock = new LockManager<'it'>();
    lock.exclusive('it', 'test', () => {
      throw 'bang';
    }).catch(() => {
    });
    await lock.exclusive('it', 'test', async () => {
      await pushOp(1);
    });
    expect(ops).toEqual([1]);
  });

  test('shared ops do share', async () => {
    const lock = new LockManager<'it'>();
    lock.share('it', 'test', async () => {
      expect(lock.state('it')).toEqual({ purpose: 'test', mode: SHARED });
      await pushOp(1);
      await pushOp(2);
    });
    await lock.share('it', 'test', async () => {
      await pushOp(3);
      await pushOp(4);
    });
    expect(ops).toEqual([1, 3, 2, 4]);
  });

  test('shared ops can recursively share', async () => {
    const lock = new LockManager<'it'>();
    await lock.share('it', 'test', async () => {
      await pushOp(1);
      await pushOp(2);
      await lock.share('it', 'test', async () => {
        await pushOp(3);
        await pushOp(4);
      });
    });
    expect(ops).toEqual([1, 2, 3, 4]);
  });

  test('shared ops do not share with exclusive ops', async () => {
    const lock = new LockManager<'it'>();
    lock.share('it', 'test', async () => {
      await pushOp(1);
      await pushOp(2);
    });
    lock.exclusive('it', 'test', async () => {
      await pushOp(3);
      await pushOp(4);
    });
    await lock.share('it', 'test', async () => {
      await pushOp(5);
      await pushOp(6);
    });
    expect(ops).toEqual([1, 2, 3, 4, 5, 6]);
  });

  test('exclusive op waits for shared ops', async () => {
    const lock = new LockManager<'it'>();
    lock.share('it', 'test', async () => {
      await pushOp(1);
      await pushOp(2);
    });
    lock.share('it', 'test', async () => {
      await pushOp(3);
      await pushOp(4);
    });
    await lock.exclusive('it', 'test', async () => {
      await pushOp(5);
    });
    expect(ops).toEqual([1, 3, 2, 4, 5]);
  });

  test('locks are independent by key', async () => {
    const lock = new LockManager<'a' | 'b'>();
    lock.exclusive('a', 'test', async () => {
      await pushOp(1);
      await pushOp(2);
    });
    await lock.exclusive('b', 'test', async () => {
      await pushOp(3);
      await pushOp(4);
    });
    expect(ops).toEqual([1, 3, 2, 4]);
  });
});
