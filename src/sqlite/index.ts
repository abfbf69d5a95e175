import Database = require('better-sqlite3');
import { Observable } from 'rxjs';
import type { SqliteConfig } from '../config';
import { checkNotClosed } from '../engine/check';
import { AbstractExecutor, Executor } from '../engine/executor';
import { assertFlavored, Column, Conjunction, IndexName } from '../engine/planner';
import type { IndexedQuadruple, QuadrupleRef, QuadrupleRow } from '../engine/quads';
import type { TripleFlavor } from '../engine/terms';

const COLUMNS: { [column in Column]: string } = {
  context: 'ContextID',
  subject: 'SubjectID',
  predicate: 'PredicateID',
  object: 'ObjectID',
  flavor: 'TripleFlavor'
};

const INDEXES: { [index in IndexName]: string } = {
  C: 'IDX_ContextID',
  S: 'IDX_SubjectID',
  P: 'IDX_PredicateID',
  OF: 'IDX_ObjectID',
  SP: 'IDX_SubjectID_PredicateID',
  SOF: 'IDX_SubjectID_ObjectID',
  POF: 'IDX_PredicateID_ObjectID'
};

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS Quadruples (
    QuadrupleID INTEGER NOT NULL,
    TripleFlavor INTEGER NOT NULL,
    Context VARCHAR NOT NULL,
    ContextID INTEGER NOT NULL,
    Subject VARCHAR NOT NULL,
    SubjectID INTEGER NOT NULL,
    Predicate VARCHAR NOT NULL,
    PredicateID INTEGER NOT NULL,
    Object VARCHAR NOT NULL,
    ObjectID INTEGER NOT NULL,
    PRIMARY KEY (QuadrupleID, TripleFlavor)
  );
  CREATE INDEX IF NOT EXISTS IDX_ContextID ON Quadruples (ContextID);
  CREATE INDEX IF NOT EXISTS IDX_SubjectID ON Quadruples (SubjectID);
  CREATE INDEX IF NOT EXISTS IDX_PredicateID ON Quadruples (PredicateID);
  CREATE INDEX IF NOT EXISTS IDX_ObjectID ON Quadruples (ObjectID, TripleFlavor);
  CREATE INDEX IF NOT EXISTS IDX_SubjectID_PredicateID ON Quadruples (SubjectID, PredicateID);
  CREATE INDEX IF NOT EXISTS IDX_SubjectID_ObjectID ON Quadruples (SubjectID, ObjectID, TripleFlavor);
  CREATE INDEX IF NOT EXISTS IDX_PredicateID_ObjectID ON Quadruples (PredicateID, ObjectID, TripleFlavor);
`;

/** Default busy timeout, in milliseconds */
export const DEFAULT_TIMEOUT = 120000;

interface SqlRow {
  TripleFlavor: TripleFlavor;
  Context: string;
  Subject: string;
  Predicate: string;
  Object: string;
}

type Param = bigint | number | string;

/**
 * Executor over a SQLite database. Quadruples are rows of one table, keyed by
 * id and flavor, with each term stored as its display form beside its key. Lookups are
 * single-table queries on the key columns, using the hinted index.
 */
export class SqliteExecutor extends AbstractExecutor implements Executor {
  private readonly db: Database.Database;
  private readonly insert: Database.Statement<Param[]>;
  private readonly deleteOne: Database.Statement<[bigint, number]>;
  private readonly exists: Database.Statement<[bigint, number], { found: number }>;
  private readonly countAll: Database.Statement<[], { count: number }>;

  /**
   * Opens the database, creating the table and its indexes if they do not
   * exist (unless read-only).
   * @throws {QuadStoreError} `Executor failure` if the database cannot be opened
   */
  constructor(config: SqliteConfig) {
    super(config);
    try {
      this.db = new Database(config.path, {
        timeout: config.timeout ?? DEFAULT_TIMEOUT,
        readonly: config.readonly ?? false
      });
      if (!config.readonly)
        this.db.exec(SCHEMA);
      this.insert = this.db.prepare<Param[]>(`INSERT OR IGNORE INTO Quadruples
        (QuadrupleID, TripleFlavor, Context, ContextID, Subject, SubjectID,
         Predicate, PredicateID, Object, ObjectID)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`);
      this.deleteOne = this.db.prepare<[bigint, number]>(
        'DELETE FROM Quadruples WHERE QuadrupleID = ? AND TripleFlavor = ?');
      this.exists = this.db.prepare<[bigint, number], { found: number }>(
        'SELECT EXISTS(SELECT 1 FROM Quadruples WHERE QuadrupleID = ? AND TripleFlavor = ?) AS found');
      this.countAll = this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM Quadruples');
    } catch (err) {
      throw this.failed('open', err);
    }
    this.log.info('Opened', config.path);
  }

  @checkNotClosed.async
  insertIfAbsent(row: IndexedQuadruple): Promise<boolean> {
    return this.transact('insert', () => this.insertRow(row));
  }

  @checkNotClosed.async
  insertAllIfAbsent(rows: Iterable<IndexedQuadruple>): Promise<number> {
    return this.transact('insert', () => this.db.transaction(() => {
      let inserted = 0;
      for (let row of rows)
        if (this.insertRow(row))
          inserted++;
      return inserted;
    })());
  }

  @checkNotClosed.async
  deleteById(ref: QuadrupleRef): Promise<boolean> {
    return this.transact('delete', () =>
      this.deleteOne.run(ref.id.toBigInt(), ref.flavor).changes > 0);
  }

  @checkNotClosed.async
  deleteByPredicates(predicates: Conjunction, index: IndexName | null): Promise<number> {
    return this.transact('delete', () => {
      const [where, params] = whereClause(predicates);
      return this.db.prepare(`DELETE FROM Quadruples${indexedBy(index)}${where}`)
        .run(...params).changes;
    });
  }

  @checkNotClosed.async
  deleteAll(): Promise<number> {
    return this.transact('clear', () => this.db.prepare('DELETE FROM Quadruples').run().changes);
  }

  @checkNotClosed.async
  existsById(ref: QuadrupleRef): Promise<boolean> {
    return this.read('exists', () =>
      this.exists.get(ref.id.toBigInt(), ref.flavor)?.found === 1);
  }

  @checkNotClosed.rx
  selectByPredicates(predicates: Conjunction, index: IndexName | null): Observable<QuadrupleRow> {
    return new Observable<QuadrupleRow>(subs => {
      this.read('select', () => {
        const [where, params] = whereClause(predicates);
        const select = this.db.prepare<Param[], SqlRow>(
          `SELECT TripleFlavor, Context, Subject, Predicate, Object FROM Quadruples${indexedBy(index)}${where}`);
        for (let row of select.iterate(...params)) {
          if (subs.closed)
            break;
          subs.next({
            flavor: row.TripleFlavor,
            context: row.Context,
            subject: row.Subject,
            predicate: row.Predicate,
            object: row.Object
          });
        }
      }).then(() => subs.complete(), err => subs.error(err));
    });
  }

  @checkNotClosed.async
  count(): Promise<number> {
    return this.read('count', () => this.countAll.get()?.count ?? 0);
  }

  /**
   * Refreshes the query planner's statistics and compacts the database file.
   */
  @checkNotClosed.async
  optimize(): Promise<void> {
    return this.transact('optimize', () => {
      this.db.exec('ANALYZE');
      this.db.exec('VACUUM');
      this.log.debug('Optimized');
    });
  }

  protected release() {
    this.db.close();
  }

  private insertRow(row: IndexedQuadruple): boolean {
    return this.insert.run(
      row.id.toBigInt(),
      row.flavor,
      row.context, row.keys.context.toBigInt(),
      row.subject, row.keys.subject.toBigInt(),
      row.predicate, row.keys.predicate.toBigInt(),
      row.object, row.keys.object.toBigInt()
    ).changes > 0;
  }
}

function whereClause(predicates: Conjunction): [string, Param[]] {
  assertFlavored(predicates);
  if (predicates.length === 0)
    return ['', []];
  return [
    ' WHERE ' + predicates.map(p => `${COLUMNS[p.column]} = ?`).join(' AND '),
    predicates.map(p => p.column === 'flavor' ? p.key : p.key.toBigInt())
  ];
}

function indexedBy(index: IndexName | null) {
  return index != null ? ` INDEXED BY ${INDEXES[index]}` : '';
}
