import { MemoryLevel } from 'memory-level';
import type { Executor } from '../src/engine/executor';
import { QuadrupleFactory } from '../src/engine/quads';
import { LevelExecutor } from '../src/level';
import { SqliteExecutor } from '../src/sqlite';

/** In-process executors, by name, for running a suite against each */
export const executors: [string, () => Promise<Executor>][] = [
  ['level', () => new LevelExecutor(new MemoryLevel(), { logLevel: 'silent' }).open()],
  ['sqlite', async () => new SqliteExecutor({ path: ':memory:', logLevel: 'silent' })]
];

export const rdf = new QuadrupleFactory('http://ex.org/default');

/** Compact IRIs in the test namespace */
export function ex(name: string) {
  return rdf.namedNode(`http://ex.org/${name}`);
}

/** Sorted string forms, for order-independent comparison */
export function strings(quads: Iterable<object>) {
  return [...quads].map(String).sort();
}
