import { Future } from './Future';

/** Newly scheduled tasks will execute when the lock opens */
export const EXCLUSIVE = Symbol('exclusive');
/** New shared tasks will extend the most recent task */
export const SHARED = Symbol('shared');

type LockMode = typeof EXCLUSIVE | typeof SHARED;

/**
 * A period during which a lock is held by one or more tasks. Shared periods
 * admit further tasks until they start running, and end when all their tasks
 * have settled.
 */
class LockPeriod extends Future {
  private readonly tasks: (() => Promise<unknown>)[] = [];
  private inFlight: Promise<unknown> = Promise.resolve();
  private running = false;

  constructor(
    readonly purpose: string,
    readonly mode: LockMode
  ) {
    super();
  }

  get isShareable() {
    return this.pending && this.mode === SHARED;
  }

  share<T>(proc: () => PromiseLike<T> | T): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const run = () => {
        const result = exec(proc);
        result.then(resolve, reject);
        return settled(result);
      };
      if (this.running)
        this.settleWith(run());
      else
        this.tasks.push(run);
    });
  }

  run() {
    this.running = true;
    this.settleWith(Promise.all(this.tasks.map(task => task())));
  }

  private settleWith(done: Promise<unknown>) {
    const all = Promise.all([this.inFlight, done]).then(() => {
      if (this.inFlight === all)
        this.resolve();
    });
    this.inFlight = all;
  }
}

export class LockManager<K extends string = string> {
  private readonly locks: { [key: string]: LockPeriod | undefined } = {};

  /**
   * Get the current state of the given lock: the purpose and mode of the most
   * recently scheduled period. `undefined` means the lock is immediately
   * available.
   */
  state(key: K): { purpose: string, mode: LockMode } | undefined {
    const head = this.locks[key];
    return head && { purpose: head.purpose, mode: head.mode };
  }

  /**
   * Resolves when the lock is immediately available. Used for indication and
   * tests. In normal usage, {@link share} and {@link exclusive} are used for
   * scheduling.
   */
  async open(key: K) {
    let head: LockPeriod | undefined;
    while ((head = this.locks[key]) != null)
      await head;
  }

  /**
   * Schedules an exclusive task on the given lock. This task will execute when
   * any running or scheduled task has completed.
   */
  exclusive<T = void>(
    key: K,
    purpose: string,
    proc: () => PromiseLike<T> | T
  ): Promise<T> {
    return this.next(key, purpose, EXCLUSIVE).share(proc);
  }

  /**
   * Schedules a shared task on the given lock. If the most recently scheduled
   * period is shared and not finished, the task joins it; otherwise it waits
   * for that period to finish.
   */
  share<T = void>(
    key: K,
    purpose: string,
    proc: () => PromiseLike<T> | T
  ): Promise<T> {
    const head = this.locks[key];
    if (head?.isShareable)
      return head.share(proc);
    return this.next(key, purpose, SHARED).share(proc);
  }

  private next(key: K, purpose: string, mode: LockMode): LockPeriod {
    const prev = this.locks[key];
    const period = new LockPeriod(purpose, mode);
    this.locks[key] = period;
    period.then(() => {
      // If we're the last in the queue, delete ourselves
      if (this.locks[key] === period)
        delete this.locks[key];
    });
    // This wait is the essence of the lock
    (prev ?? Promise.resolve()).then(() => period.run());
    return period;
  }
}

function exec<T>(proc: () => PromiseLike<T> | T): Promise<T> {
  try {
    // Use of try block catches both sync and async errors
    return Promise.resolve(proc());
  } catch (e) {
    return Promise.reject(e);
  }
}

function settled(result: PromiseLike<unknown>): Promise<unknown> {
  return new Promise(done => result.then(done, done));
}
