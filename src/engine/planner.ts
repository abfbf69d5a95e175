import { QuadStoreError } from '../api';
import { Hash } from './hash';
import { bindPattern, PatternCase, ShapeLabel, TermPattern } from './pattern';
import { QuadrupleKeys, termKey } from './quads';
import { TripleFlavor } from './terms';

export type KeyColumn = keyof QuadrupleKeys;
export type Column = KeyColumn | 'flavor';

/**
 * Equality on one stored column. Term positions match on the per-position key;
 * the flavor matches on the discriminant itself.
 */
export type EqualityPredicate =
  { readonly column: KeyColumn, readonly key: Hash } |
  { readonly column: 'flavor', readonly key: TripleFlavor };

/** A pure conjunction: evaluation order never affects the result */
export type Conjunction = readonly EqualityPredicate[];

/**
 * Names of the stored indexes. Any index which includes the object also
 * includes the flavor.
 */
export type IndexName = 'C' | 'S' | 'P' | 'OF' | 'SP' | 'SOF' | 'POF';

export const INDEXES: { readonly [name in IndexName]: readonly Column[] } = {
  C: ['context'],
  S: ['subject'],
  P: ['predicate'],
  OF: ['object', 'flavor'],
  SP: ['subject', 'predicate'],
  SOF: ['subject', 'object', 'flavor'],
  POF: ['predicate', 'object', 'flavor']
};

/**
 * The index consulted for each lookup shape. Every column of the chosen index
 * is bound by the shape.
 */
export const SHAPES: { readonly [shape in ShapeLabel]: IndexName | null } = {
  '': null,
  C: 'C',
  S: 'S',
  P: 'P',
  O: 'OF',
  CS: 'S',
  CP: 'C',
  CO: 'OF',
  SP: 'SP',
  SO: 'SOF',
  PO: 'POF',
  CSP: 'SP',
  CSO: 'SOF',
  CPO: 'POF',
  SPO: 'SOF',
  CSPO: 'SOF'
};

/** A compiled lookup for a pattern */
export interface Lookup {
  readonly label: PatternCase;
  readonly shape: ShapeLabel;
  /** The advised index, or `null` for a full scan */
  readonly index: IndexName | null;
  readonly predicates: Conjunction;
}

/**
 * Compiles a pattern to a lookup. Predicates are given in column order:
 * context, subject, predicate, object, flavor. An absent or empty pattern
 * compiles to a full scan.
 *
 * @throws {QuadStoreError} if the pattern is invalid; see {@link bindPattern}
 */
export function compile(pattern?: TermPattern | null): Lookup {
  const bound = bindPattern(pattern);
  const predicates: EqualityPredicate[] = [];
  if (bound.context != null)
    predicates.push({ column: 'context', key: termKey(bound.context) });
  if (bound.subject != null)
    predicates.push({ column: 'subject', key: termKey(bound.subject) });
  if (bound.predicate != null)
    predicates.push({ column: 'predicate', key: termKey(bound.predicate) });
  if (bound.object != null) {
    predicates.push({ column: 'object', key: termKey(bound.object.term) });
    // A resource and a literal can share a string form, and so a key
    predicates.push({ column: 'flavor', key: bound.object.flavor });
  }
  return {
    label: bound.label,
    shape: bound.shape,
    index: SHAPES[bound.shape],
    predicates
  };
}

/**
 * Checks that a conjunction which constrains the object also constrains the
 * flavor. Executors call this before running any conjunction.
 *
 * @throws {QuadStoreError} `Ambiguous object flavor`
 */
export function assertFlavored(predicates: Conjunction): Conjunction {
  if (predicates.some(p => p.column === 'object') &&
    !predicates.some(p => p.column === 'flavor'))
    throw new QuadStoreError('Ambiguous object flavor',
      'Object lookup without a flavor');
  return predicates;
}

/**
 * The value each predicate requires of a column, for executors which filter
 * rows themselves. Keys are given in {@link Hash.toKey} form.
 */
export function requiredValues(predicates: Conjunction): Partial<Record<Column, string>> {
  const values: Partial<Record<Column, string>> = {};
  for (let p of predicates)
    values[p.column] = p.column === 'flavor' ? `${p.key}` : p.key.toKey();
  return values;
}
