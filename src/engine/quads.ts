import type { BaseQuad, Quad, Term } from 'rdf-js';
import { DataFactory as RdfDataFactory, Quad as RdfQuad } from 'rdf-data-factory';
import { QuadStoreError } from '../api';
import { DEFAULT_CONTEXT } from '../config';
import { Hash } from './hash';
import { IndexSet } from './indices';
import {
  decodeObject, decodeResource, encodeTerm, flavorOf, isNamedNode, isObjectTerm, isResource,
  NamedNode, ObjectTerm, Resource, termString, TermPos, TripleFlavor
} from './terms';

export type { Quad };

/** Per-position keys of a quadruple: the hash of each term's string form */
export interface QuadrupleKeys {
  readonly context: Hash;
  readonly subject: Hash;
  readonly predicate: Hash;
  readonly object: Hash;
}

/**
 * A persisted quadruple as read back from an executor: the object flavor and
 * the display forms of the four terms.
 */
export interface QuadrupleRow {
  readonly flavor: TripleFlavor;
  readonly context: string;
  readonly subject: string;
  readonly predicate: string;
  readonly object: string;
}

/**
 * Locates one persisted quadruple. A resource and a literal object with equal
 * string forms give equal ids, so the flavor is part of the reference.
 */
export interface QuadrupleRef {
  readonly id: Hash;
  readonly flavor: TripleFlavor;
}

/** Everything an executor persists for one quadruple */
export interface IndexedQuadruple extends QuadrupleRow, QuadrupleRef {
  readonly keys: QuadrupleKeys;
}

/**
 * The identity of a quadruple: the hash of the string forms of context,
 * subject, predicate and object, in that order, separated by single spaces.
 * Changing either the order or the separator changes every persisted id.
 */
export function quadrupleId(
  context: NamedNode,
  subject: Resource,
  predicate: NamedNode,
  object: ObjectTerm
): Hash {
  return Hash.digest([context, subject, predicate, object].map(termString).join(' '));
}

/** The per-position key of a single term */
export function termKey(term: ObjectTerm): Hash {
  return Hash.digest(termString(term));
}

/**
 * An RDF quad whose graph is a named context and whose object is a resource or
 * a literal. The flavor and id are computed once, at construction.
 */
export class Quadruple extends RdfQuad {
  declare readonly subject: Resource;
  declare readonly predicate: NamedNode;
  declare readonly object: ObjectTerm;
  declare readonly graph: NamedNode;
  readonly flavor: TripleFlavor;
  readonly id: Hash;

  /**
   * @throws {QuadStoreError} `Invalid argument` if a term is missing or cannot
   * be used in its position
   */
  constructor(
    context: NamedNode,
    subject: Resource,
    predicate: NamedNode,
    object: ObjectTerm
  ) {
    super(
      inPosition('subject', subject, isResource),
      inPosition('predicate', predicate, isNamedNode),
      inPosition('object', object, isObjectTerm),
      inPosition('context', context, isNamedNode));
    this.flavor = flavorOf(object);
    this.id = quadrupleId(context, subject, predicate, object);
  }

  /** The context, by its quadruple role name */
  get context(): NamedNode {
    return this.graph;
  }

  get keys(): QuadrupleKeys {
    return {
      context: termKey(this.graph),
      subject: termKey(this.subject),
      predicate: termKey(this.predicate),
      object: termKey(this.object)
    };
  }

  toIndexed(): IndexedQuadruple {
    return {
      id: this.id,
      flavor: this.flavor,
      keys: this.keys,
      context: encodeTerm(this.graph),
      subject: encodeTerm(this.subject),
      predicate: encodeTerm(this.predicate),
      object: encodeTerm(this.object)
    };
  }

  toString() {
    return [this.graph, this.subject, this.predicate, this.object].map(termString).join(' ');
  }
}

export function inPosition<T extends Term>(
  pos: TermPos,
  term: Term | null | undefined,
  guard: (term: Term) => term is T
): T {
  if (term == null)
    throw new QuadStoreError('Invalid argument', `${pos} is missing`);
  else if (!guard(term))
    throw new QuadStoreError('Invalid argument',
      `${term.termType} ${term.value} cannot be used in ${pos} position`);
  return term;
}

/**
 * A set of quadruples, unique by flavor and {@link Quadruple.id}. Adding an
 * equal quadruple again is a no-op.
 */
export class QuadrupleSet extends IndexSet<Quadruple> {
  protected getIndex(quad: Quadruple): string {
    return refKey(quad);
  }
}

/** A string key for a quadruple reference: flavor then id key */
export function refKey(ref: QuadrupleRef): string {
  return `${ref.flavor}:${ref.id.toKey()}`;
}

export class QuadrupleFactory extends RdfDataFactory {
  /** Given to quads in the default graph */
  readonly defaultContext: NamedNode;

  constructor(defaultContext = DEFAULT_CONTEXT) {
    super();
    this.defaultContext = this.namedNode(defaultContext);
  }

  quadruple(
    context: NamedNode,
    subject: Resource,
    predicate: NamedNode,
    object: ObjectTerm
  ): Quadruple {
    return new Quadruple(context, subject, predicate, object);
  }

  /**
   * Converts any RDF quad to a quadruple, checking its terms. A quad in the
   * default graph is stamped with the given context, or the factory default.
   * @throws {QuadStoreError} `Invalid argument` if a term is missing or cannot
   * be used in its position
   */
  fromQuad(quad: BaseQuad, context = this.defaultContext): Quadruple {
    if (quad instanceof Quadruple)
      return quad;
    const graph = quad.graph?.termType === 'DefaultGraph' ? context : quad.graph;
    return new Quadruple(
      inPosition('context', graph, isNamedNode),
      inPosition('subject', quad.subject, isResource),
      inPosition('predicate', quad.predicate, isNamedNode),
      inPosition('object', quad.object, isObjectTerm));
  }

  /** Reconstructs a quadruple from a persisted row */
  fromRow(row: QuadrupleRow): Quadruple {
    return new Quadruple(
      this.namedNode(row.context),
      decodeResource(row.subject, this),
      this.namedNode(row.predicate),
      decodeObject(row.flavor, row.object, this));
  }
}
