import type { Logger } from 'loglevel';
import type { Observable } from 'rxjs';
import { QuadStoreError } from '../api';
import type { QuadStoreConfig } from '../config';
import { uuid } from '../util';
import { LockManager } from './locks';
import { getIdLogger } from './logging';
import type { Conjunction, IndexName } from './planner';
import type { IndexedQuadruple, QuadrupleRef, QuadrupleRow } from './quads';

/**
 * The storage boundary. Every call is one atomic unit of work: it either takes
 * full effect or leaves the persisted set unchanged. Index hints are advisory;
 * an executor may ignore them, but must never return or delete a row which
 * fails a predicate.
 */
export interface Executor {
  /** @returns `true` if the row was newly inserted */
  insertIfAbsent(row: IndexedQuadruple): Promise<boolean>;
  /** @returns the number of rows newly inserted */
  insertAllIfAbsent(rows: Iterable<IndexedQuadruple>): Promise<number>;
  /** @returns `true` if a row was deleted */
  deleteById(ref: QuadrupleRef): Promise<boolean>;
  /** @returns the number of rows deleted */
  deleteByPredicates(predicates: Conjunction, index: IndexName | null): Promise<number>;
  /** @returns the number of rows deleted */
  deleteAll(): Promise<number>;
  existsById(ref: QuadrupleRef): Promise<boolean>;
  selectByPredicates(predicates: Conjunction, index: IndexName | null): Observable<QuadrupleRow>;
  count(): Promise<number>;
  close(): Promise<void>;
  readonly closed: boolean;
}

/**
 * Base for executors, providing identity, logging and the scoped transactional
 * call. Subclasses put their backend calls inside {@link transact} (for
 * writes) or {@link read}.
 */
export abstract class AbstractExecutor implements Partial<Executor> {
  readonly id: string;
  protected readonly log: Logger;
  protected readonly lock = new LockManager<'txn'>();
  private isClosed = false;

  protected constructor(config: QuadStoreConfig) {
    this.id = config['@id'] ?? uuid();
    this.log = getIdLogger(this.constructor, this.id, config.logLevel ?? 'warn');
  }

  get closed() {
    return this.isClosed;
  }

  /**
   * Runs write work exclusively of any other work. Anything thrown is
   * normalised to a {@link QuadStoreError}; backend rollback is the
   * responsibility of the work.
   */
  protected transact<T>(purpose: string, work: () => PromiseLike<T> | T): Promise<T> {
    return this.lock.exclusive('txn', purpose, work)
      .catch(err => { throw this.failed(purpose, err); });
  }

  /**
   * Runs read work, concurrently with other reads but not with writes.
   */
  protected read<T>(purpose: string, work: () => PromiseLike<T> | T): Promise<T> {
    return this.lock.share('txn', purpose, work)
      .catch(err => { throw this.failed(purpose, err); });
  }

  /**
   * Waits for outstanding work, then marks this executor closed and releases
   * the backend. Closing twice is a no-op.
   */
  async close(): Promise<void> {
    if (!this.isClosed) {
      this.isClosed = true;
      this.log.info('Closing');
      await this.lock.exclusive('txn', 'close', () => this.release())
        .catch(err => { throw this.failed('close', err); });
    }
  }

  /** Releases backend resources */
  protected abstract release(): Promise<void> | void;

  /** Logs a failure, returning it normalised for throwing */
  protected failed(purpose: string, err: unknown): QuadStoreError {
    const error = QuadStoreError.from(err);
    this.log.warn(`${purpose} failed`, error.message);
    return error;
  }
}
