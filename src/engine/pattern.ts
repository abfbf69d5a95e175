import type { Term } from 'rdf-js';
import { inPosition } from './quads';
import {
  asObject, flavorOf, isNamedNode, isResource, NamedNode, ObjectTerm, Resource, TermPos,
  TripleFlavor
} from './terms';

/**
 * A partially-bound quadruple. Absent (`null` or `undefined`) positions are
 * wildcards. The object is a single term, so a pattern cannot bind it both as
 * a resource and as a literal; its flavor follows from the term type.
 */
export interface QuadPattern {
  readonly context?: NamedNode | null;
  readonly subject?: Resource | null;
  readonly predicate?: NamedNode | null;
  readonly object?: ObjectTerm | null;
}

/**
 * A pattern of any RDF/JS terms, as given by untyped callers. Binding checks
 * each term against its position.
 */
export type TermPattern = { readonly [pos in TermPos]?: Term | null };

type Flag<L extends string> = '' | L;

/**
 * Which positions of a pattern are bound: `C`ontext, `S`ubject, `P`redicate
 * and `O`bject (as a resource) or `L`iteral, in that order. The empty case is
 * a full scan.
 */
export type PatternCase = `${Flag<'C'>}${Flag<'S'>}${Flag<'P'>}${Flag<'O' | 'L'>}`;

/**
 * A pattern case with the object kind erased. The empty shape plus one shape
 * for each non-empty subset of {context, subject, predicate, object}.
 */
export type ShapeLabel = `${Flag<'C'>}${Flag<'S'>}${Flag<'P'>}${Flag<'O'>}`;

/**
 * A pattern whose bound terms have been checked for their positions, with the
 * object flavor made explicit.
 */
export interface BoundPattern {
  readonly label: PatternCase;
  readonly shape: ShapeLabel;
  readonly context?: NamedNode;
  readonly subject?: Resource;
  readonly predicate?: NamedNode;
  readonly object?: { readonly term: ObjectTerm, readonly flavor: TripleFlavor };
}

/**
 * Classifies a pattern.
 * @throws {QuadStoreError} `Invalid argument` if a bound term cannot be used in
 * its position, or `Ambiguous object flavor` if the object is not a resource or
 * literal
 */
export function bindPattern(pattern: TermPattern | null | undefined): BoundPattern {
  const context = bound('context', pattern?.context, isNamedNode);
  const subject = bound('subject', pattern?.subject, isResource);
  const predicate = bound('predicate', pattern?.predicate, isNamedNode);
  const given = pattern?.object;
  const term = given != null ? asObject(given) : undefined;
  const object = term != null ? { term, flavor: flavorOf(term) } : undefined;
  const c = context != null ? 'C' : '';
  const s = subject != null ? 'S' : '';
  const p = predicate != null ? 'P' : '';
  const o = object != null ? 'O' : '';
  const l = object?.flavor === TripleFlavor.LiteralObject ? 'L' : o;
  const label: PatternCase = `${c}${s}${p}${l}`;
  const shape: ShapeLabel = `${c}${s}${p}${o}`;
  return { label, shape, context, subject, predicate, object };
}

function bound<T extends Term>(
  pos: 'context' | 'subject' | 'predicate',
  term: Term | null | undefined,
  guard: (term: Term) => term is T
): T | undefined {
  return term != null ? inPosition(pos, term, guard) : undefined;
}
