import { map, Observable, tap } from 'rxjs';
import type { QuadStoreConfig } from '../config';
import { completed } from '../util';
import type { Executor } from './executor';
import type { QuadPattern } from './pattern';
import { compile } from './planner';
import { inPosition, Quad, Quadruple, QuadrupleFactory, QuadrupleSet } from './quads';
import { isLiteral, isResource, Literal, NamedNode, ObjectTerm, Resource, Term } from './terms';

type Maybe<T> = T | null | undefined;

/**
 * A set of quadruples persisted by an {@link Executor}. Mutations and lookups
 * are each one call to the executor, and so each is atomic. The store holds no
 * state of its own beyond its configuration; the executor is owned by the
 * caller, see {@link withExecutor}.
 */
export class QuadrupleStore {
  readonly rdf: QuadrupleFactory;

  constructor(
    private readonly executor: Executor,
    config: QuadStoreConfig = {}
  ) {
    this.rdf = new QuadrupleFactory(config.defaultContext);
  }

  /**
   * Adds a quadruple, if not already present. A quad in the default graph is
   * given the default context.
   * @returns `true` if the quadruple was newly added; `false` for `null`
   * @throws {QuadStoreError} `Invalid argument` if a term is missing or cannot
   * be used in its position
   */
  async add(quad: Maybe<Quad>): Promise<boolean> {
    if (quad == null)
      return false;
    return this.executor.insertIfAbsent(this.rdf.fromQuad(quad).toIndexed());
  }

  /**
   * Removes a quadruple, if present.
   * @returns `true` if the quadruple was present; `false` for `null`
   */
  async remove(quad: Maybe<Quad>): Promise<boolean> {
    if (quad == null)
      return false;
    return this.executor.deleteById(this.rdf.fromQuad(quad));
  }

  /**
   * Removes every quadruple matching the pattern. A `null` pattern, or one
   * with no bound position, removes nothing: use {@link clear} to remove
   * everything.
   * @returns the number of quadruples removed
   */
  async removeMatches(pattern: Maybe<QuadPattern>): Promise<number> {
    const lookup = compile(pattern);
    if (lookup.predicates.length === 0)
      return 0;
    return this.executor.deleteByPredicates(lookup.predicates, lookup.index);
  }

  removeByContext(context: Maybe<NamedNode>) {
    return this.removeBound({ context }, null, context);
  }

  removeBySubject(subject: Maybe<Resource>) {
    return this.removeBound({ subject }, null, subject);
  }

  removeByPredicate(predicate: Maybe<NamedNode>) {
    return this.removeBound({ predicate }, null, predicate);
  }

  removeByObject(object: Maybe<Resource>) {
    return this.removeBound({ object }, isResource, object);
  }

  removeByLiteral(literal: Maybe<Literal>) {
    return this.removeBound({ object: literal }, isLiteral, literal);
  }

  removeByContextSubject(context: Maybe<NamedNode>, subject: Maybe<Resource>) {
    return this.removeBound({ context, subject }, null, context, subject);
  }

  removeByContextPredicate(context: Maybe<NamedNode>, predicate: Maybe<NamedNode>) {
    return this.removeBound({ context, predicate }, null, context, predicate);
  }

  removeByContextObject(context: Maybe<NamedNode>, object: Maybe<Resource>) {
    return this.removeBound({ context, object }, isResource, context, object);
  }

  removeByContextLiteral(context: Maybe<NamedNode>, literal: Maybe<Literal>) {
    return this.removeBound({ context, object: literal }, isLiteral, context, literal);
  }

  removeByContextSubjectPredicate(
    context: Maybe<NamedNode>, subject: Maybe<Resource>, predicate: Maybe<NamedNode>) {
    return this.removeBound({ context, subject, predicate }, null, context, subject, predicate);
  }

  removeByContextSubjectObject(
    context: Maybe<NamedNode>, subject: Maybe<Resource>, object: Maybe<Resource>) {
    return this.removeBound({ context, subject, object }, isResource, context, subject, object);
  }

  removeByContextSubjectLiteral(
    context: Maybe<NamedNode>, subject: Maybe<Resource>, literal: Maybe<Literal>) {
    return this.removeBound({ context, subject, object: literal }, isLiteral, context, subject, literal);
  }

  removeByContextPredicateObject(
    context: Maybe<NamedNode>, predicate: Maybe<NamedNode>, object: Maybe<Resource>) {
    return this.removeBound({ context, predicate, object }, isResource, context, predicate, object);
  }

  removeByContextPredicateLiteral(
    context: Maybe<NamedNode>, predicate: Maybe<NamedNode>, literal: Maybe<Literal>) {
    return this.removeBound({ context, predicate, object: literal }, isLiteral, context, predicate, literal);
  }

  removeBySubjectPredicate(subject: Maybe<Resource>, predicate: Maybe<NamedNode>) {
    return this.removeBound({ subject, predicate }, null, subject, predicate);
  }

  removeBySubjectObject(subject: Maybe<Resource>, object: Maybe<Resource>) {
    return this.removeBound({ subject, object }, isResource, subject, object);
  }

  removeBySubjectLiteral(subject: Maybe<Resource>, literal: Maybe<Literal>) {
    return this.removeBound({ subject, object: literal }, isLiteral, subject, literal);
  }

  removeByPredicateObject(predicate: Maybe<NamedNode>, object: Maybe<Resource>) {
    return this.removeBound({ predicate, object }, isResource, predicate, object);
  }

  removeByPredicateLiteral(predicate: Maybe<NamedNode>, literal: Maybe<Literal>) {
    return this.removeBound({ predicate, object: literal }, isLiteral, predicate, literal);
  }

  /**
   * Removes every quadruple.
   * @returns the number of quadruples removed
   */
  clear(): Promise<number> {
    return this.executor.deleteAll();
  }

  /**
   * Adds all the given quads in one transaction. Quads in the default graph
   * are given the context, if provided, or else the default context. If any
   * quad is invalid, nothing is added.
   * @returns the number of quadruples newly added
   */
  async merge(quads: Maybe<Iterable<Quad>>, context?: NamedNode): Promise<number> {
    if (quads == null)
      return 0;
    const rows = [...quads].map(quad => this.rdf.fromQuad(quad, context).toIndexed());
    return rows.length > 0 ? this.executor.insertAllIfAbsent(rows) : 0;
  }

  /**
   * Streams the quadruples matching the pattern; all quadruples if the pattern
   * is absent or has no bound position.
   */
  read(pattern?: Maybe<QuadPattern>): Observable<Quadruple> {
    const lookup = compile(pattern);
    return this.executor.selectByPredicates(lookup.predicates, lookup.index)
      .pipe(map(row => this.rdf.fromRow(row)));
  }

  /**
   * Collects the quadruples matching the pattern; all quadruples if the pattern
   * is absent or has no bound position. Never `null`.
   */
  async select(pattern?: Maybe<QuadPattern>): Promise<QuadrupleSet> {
    const result = new QuadrupleSet();
    await completed(this.read(pattern).pipe(tap(quad => result.add(quad))));
    return result;
  }

  /** @returns `false` for `null` */
  async contains(quad: Maybe<Quad>): Promise<boolean> {
    if (quad == null)
      return false;
    return this.executor.existsById(this.rdf.fromQuad(quad));
  }

  count(): Promise<number> {
    return this.executor.count();
  }

  /**
   * Removes matches of a pattern whose required terms are all given. The
   * object, if bound, must pass the guard for its kind.
   */
  private async removeBound(
    pattern: QuadPattern,
    objectGuard: ((term: Term) => term is ObjectTerm) | null,
    ...required: Maybe<Term>[]
  ) {
    if (required.some(term => term == null))
      return 0;
    if (objectGuard != null && pattern.object != null)
      inPosition('object', pattern.object, objectGuard);
    return this.removeMatches(pattern);
  }
}

/**
 * Runs the given work on a store over the executor, closing the executor
 * however the work ends.
 */
export async function withExecutor<T>(
  executor: Executor,
  work: (store: QuadrupleStore) => PromiseLike<T> | T,
  config?: QuadStoreConfig
): Promise<T> {
  try {
    return await work(new QuadrupleStore(executor, config));
  } finally {
    await executor.close();
  }
}
