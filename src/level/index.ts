import type { AbstractBatchOperation, AbstractLevel } from 'abstract-level';
import { Observable } from 'rxjs';
import { QuadStoreError } from '../api';
import type { QuadStoreConfig } from '../config';
import { checkNotClosed } from '../engine/check';
import { AbstractExecutor, Executor } from '../engine/executor';
import {
  assertFlavored, Column, Conjunction, INDEXES, IndexName, requiredValues
} from '../engine/planner';
import { IndexedQuadruple, QuadrupleRef, QuadrupleRow, refKey } from '../engine/quads';
import { TripleFlavor } from '../engine/terms';

export type LevelBackend = AbstractLevel<string | Buffer | Uint8Array, string, string>;
type Batch = AbstractBatchOperation<LevelBackend, string, string>[];

/** Row keys: `q:` then the flavor and quadruple id key */
const ROW = 'q:';
/** Index keys: `i:`, index name, column values, then the row's flavor and id key */
const INDEX = 'i:';
const SEP = ':';
/** Sorts after every character used in keys */
const HIGH = '\uffff';

/** The persisted value of a row */
interface StoredRow {
  f: TripleFlavor;
  c: string;
  s: string;
  p: string;
  o: string;
  /** Per-position keys, in context, subject, predicate, object order */
  k: [string, string, string, string];
}

/**
 * Executor over any `abstract-level` database, which it should have to
 * itself. Each quadruple is stored as one JSON row, keyed by its flavor and id,
 * plus one empty-valued entry for each index, whose key carries the indexed
 * column values so that a bound index is read as a key range.
 */
export class LevelExecutor extends AbstractExecutor implements Executor {
  constructor(
    private readonly backend: LevelBackend,
    config: QuadStoreConfig = {}
  ) {
    super(config);
  }

  /** Opens the backend. Backends which defer opening need not be opened. */
  async open(): Promise<this> {
    await this.backend.open();
    this.log.info('Opened');
    return this;
  }

  @checkNotClosed.async
  insertIfAbsent(row: IndexedQuadruple): Promise<boolean> {
    return this.insertAllIfAbsent([row]).then(inserted => inserted > 0);
  }

  @checkNotClosed.async
  insertAllIfAbsent(rows: Iterable<IndexedQuadruple>): Promise<number> {
    return this.transact('insert', async () => {
      const byKey = new Map<string, IndexedQuadruple>();
      for (let row of rows)
        byKey.set(rowKey(row), row);
      const keys = [...byKey.keys()];
      const existing = await this.backend.getMany(keys);
      const batch: Batch = [];
      let inserted = 0;
      keys.forEach((key, i) => {
        const row = byKey.get(key);
        if (existing[i] == null && row != null) {
          batch.push(...putOps(key, row));
          inserted++;
        }
      });
      if (inserted > 0)
        await this.backend.batch(batch);
      return inserted;
    });
  }

  @checkNotClosed.async
  deleteById(ref: QuadrupleRef): Promise<boolean> {
    return this.transact('delete', async () => {
      const key = rowKey(ref);
      const [value] = await this.backend.getMany([key]);
      if (value == null)
        return false;
      await this.backend.batch(delOps(key, parseRow(value)));
      return true;
    });
  }

  @checkNotClosed.async
  deleteByPredicates(predicates: Conjunction, index: IndexName | null): Promise<number> {
    return this.transact('delete', async () => {
      const batch: Batch = [];
      let deleted = 0;
      for await (let [key, row] of this.matching(predicates, index)) {
        batch.push(...delOps(key, row));
        deleted++;
      }
      if (deleted > 0)
        await this.backend.batch(batch);
      return deleted;
    });
  }

  @checkNotClosed.async
  deleteAll(): Promise<number> {
    return this.transact('clear', async () => {
      const batch: Batch = [];
      let count = 0;
      for await (let key of this.backend.keys(range(ROW))) {
        batch.push({ type: 'del', key });
        count++;
      }
      for await (let key of this.backend.keys(range(INDEX)))
        batch.push({ type: 'del', key });
      if (batch.length > 0)
        await this.backend.batch(batch);
      return count;
    });
  }

  @checkNotClosed.async
  existsById(ref: QuadrupleRef): Promise<boolean> {
    return this.read('exists', async () => {
      const [value] = await this.backend.getMany([rowKey(ref)]);
      return value != null;
    });
  }

  @checkNotClosed.rx
  selectByPredicates(predicates: Conjunction, index: IndexName | null): Observable<QuadrupleRow> {
    return new Observable<QuadrupleRow>(subs => {
      this.read('select', async () => {
        for await (let [, row] of this.matching(predicates, index)) {
          if (subs.closed)
            break;
          subs.next({ flavor: row.f, context: row.c, subject: row.s, predicate: row.p, object: row.o });
        }
      }).then(() => subs.complete(), err => subs.error(err));
    });
  }

  @checkNotClosed.async
  count(): Promise<number> {
    return this.read('count', () => this.countRows());
  }

  protected release() {
    return this.backend.close();
  }

  private async countRows() {
    let count = 0;
    for await (let _ of this.backend.keys(range(ROW)))
      count++;
    return count;
  }

  /**
   * Yields every stored row which passes all the predicates, with its key.
   * Where every column of the hinted index is bound, only that index's key
   * range is read; otherwise all rows are scanned.
   */
  private async *matching(
    predicates: Conjunction,
    index: IndexName | null
  ): AsyncGenerator<[string, StoredRow]> {
    const required = requiredValues(assertFlavored(predicates));
    const passes = (row: StoredRow) => COLUMNS.every(column =>
      required[column] == null || required[column] === columnValue(row, column));
    const prefix = index != null ? indexPrefix(index, required) : null;
    if (prefix != null) {
      const keys: string[] = [];
      for await (let indexKey of this.backend.keys(range(prefix)))
        keys.push(ROW + indexKey.slice(prefix.length));
      const values = await this.backend.getMany(keys);
      for (let i = 0; i < keys.length; i++) {
        const value = values[i];
        if (value == null)
          throw new QuadStoreError('Executor failure', `Dangling index entry for ${keys[i]}`);
        const row = parseRow(value);
        if (passes(row))
          yield [keys[i], row];
      }
    } else {
      for await (let [key, value] of this.backend.iterator(range(ROW))) {
        const row = parseRow(value);
        if (passes(row))
          yield [key, row];
      }
    }
  }
}

function rowKey(ref: QuadrupleRef) {
  return ROW + refKey(ref);
}

function range(prefix: string) {
  return { gt: prefix, lt: prefix + HIGH };
}

const COLUMNS: readonly Column[] = ['context', 'subject', 'predicate', 'object', 'flavor'];

function columnValue(row: StoredRow, column: Column): string {
  switch (column) {
    case 'context': return row.k[0];
    case 'subject': return row.k[1];
    case 'predicate': return row.k[2];
    case 'object': return row.k[3];
    case 'flavor': return `${row.f}`;
  }
}

/**
 * The key prefix selecting index entries for the required values, or `null`
 * if the index has an unbound column
 */
function indexPrefix(index: IndexName, required: Partial<Record<Column, string>>) {
  const values: string[] = [];
  for (let column of INDEXES[index]) {
    const value = required[column];
    if (value == null)
      return null;
    values.push(value);
  }
  return INDEX + [index, ...values].join(SEP) + SEP;
}

function indexKeys(ref: string, row: StoredRow): string[] {
  return Object.entries(INDEXES).map(([index, columns]) =>
    INDEX + [index, ...columns.map(column => columnValue(row, column)), ref].join(SEP));
}

function putOps(key: string, quad: IndexedQuadruple): Batch {
  const { keys, flavor: f, context: c, subject: s, predicate: p, object: o } = quad;
  const row: StoredRow = {
    f, c, s, p, o,
    k: [keys.context.toKey(), keys.subject.toKey(), keys.predicate.toKey(), keys.object.toKey()]
  };
  return [
    { type: 'put', key, value: JSON.stringify(row) },
    ...indexKeys(key.slice(ROW.length), row).map((key): Batch[number] => ({ type: 'put', key, value: '' }))
  ];
}

function delOps(key: string, row: StoredRow): Batch {
  return [
    { type: 'del', key },
    ...indexKeys(key.slice(ROW.length), row).map((key): Batch[number] => ({ type: 'del', key }))
  ];
}

function parseRow(value: string): StoredRow {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch (err) {
    throw new QuadStoreError('Executor failure', 'Malformed row', err);
  }
  if (isStoredRow(parsed))
    return parsed;
  throw new QuadStoreError('Executor failure', `Malformed row ${value}`);
}

function isStoredRow(value: unknown): value is StoredRow {
  return typeof value == 'object' && value != null &&
    'f' in value && (value.f === TripleFlavor.ResourceObject || value.f === TripleFlavor.LiteralObject) &&
    'c' in value && typeof value.c == 'string' &&
    's' in value && typeof value.s == 'string' &&
    'p' in value && typeof value.p == 'string' &&
    'o' in value && typeof value.o == 'string' &&
    'k' in value && Array.isArray(value.k) && value.k.length === 4 &&
    value.k.every(key => typeof key == 'string');
}
