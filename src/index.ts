/**
 * Core API exports
 */
export * from './util';
export * from './api';
export * from './config';
export { QuadrupleStore, withExecutor } from './engine/store';
export { AbstractExecutor } from './engine/executor';
export type { Executor } from './engine/executor';
export { Hash } from './engine/hash';
export {
  Quadruple, QuadrupleFactory, QuadrupleSet, quadrupleId, refKey, termKey
} from './engine/quads';
export type {
  IndexedQuadruple, QuadrupleKeys, QuadrupleRef, QuadrupleRow
} from './engine/quads';
export { bindPattern } from './engine/pattern';
export type {
  BoundPattern, PatternCase, QuadPattern, ShapeLabel, TermPattern
} from './engine/pattern';
export { assertFlavored, compile, INDEXES, SHAPES } from './engine/planner';
export type {
  Column, Conjunction, EqualityPredicate, IndexName, KeyColumn, Lookup
} from './engine/planner';
export { flavorOf, termString, TripleFlavor } from './engine/terms';
export type { ObjectTerm, Resource } from './engine/terms';
export { LevelExecutor } from './level';
export { SqliteExecutor } from './sqlite';
