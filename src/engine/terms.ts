import type { BlankNode, DataFactory, Literal, NamedNode, Term } from 'rdf-js';
import { QuadStoreError } from '../api';
import { XS } from '../ns';

export type { BlankNode, Literal, NamedNode, Term };

/** Terms which can appear in subject and object positions */
export type Resource = NamedNode | BlankNode;
export type ObjectTerm = Resource | Literal;
export type TermPos = 'context' | 'subject' | 'predicate' | 'object';

/**
 * Discriminates the kind of a quadruple's object. Stored alongside the object
 * so that lookups can filter on kind without inspecting the object itself.
 */
export enum TripleFlavor {
  ResourceObject = 1,
  LiteralObject = 2
}

/** Blank node labels are given an IRI-like string form */
export const BNODE_PREFIX = 'bnode:';

export function isResource(term: Term | null | undefined): term is Resource {
  return term?.termType === 'NamedNode' || term?.termType === 'BlankNode';
}

export function isNamedNode(term: Term | null | undefined): term is NamedNode {
  return term?.termType === 'NamedNode';
}

export function isLiteral(term: Term | null | undefined): term is Literal {
  return term?.termType === 'Literal';
}

export function isObjectTerm(term: Term | null | undefined): term is ObjectTerm {
  return isResource(term) || isLiteral(term);
}

/**
 * The string form of a term, used for hashing and exact-match comparison.
 * Literals include their language tag, or their datatype unless it is
 * `xsd:string`.
 */
export function termString(term: ObjectTerm): string {
  switch (term.termType) {
    case 'NamedNode':
      return term.value;
    case 'BlankNode':
      return `${BNODE_PREFIX}${term.value}`;
    case 'Literal':
      if (term.language)
        return `${term.value}@${term.language}`;
      else if (term.datatype.value === XS.string)
        return term.value;
      else
        return `${term.value}^^${term.datatype.value}`;
  }
}

/**
 * @throws {QuadStoreError} `Ambiguous object flavor` if the term is neither a
 * resource nor a literal
 */
export function flavorOf(object: Term): TripleFlavor {
  switch (object.termType) {
    case 'NamedNode':
    case 'BlankNode':
      return TripleFlavor.ResourceObject;
    case 'Literal':
      return TripleFlavor.LiteralObject;
    default:
      throw notAnObject(object);
  }
}

/**
 * @throws {QuadStoreError} `Ambiguous object flavor` if the term is neither a
 * resource nor a literal
 */
export function asObject(term: Term): ObjectTerm {
  if (isObjectTerm(term))
    return term;
  throw notAnObject(term);
}

function notAnObject(term: Term) {
  return new QuadStoreError('Ambiguous object flavor',
    `${term.termType} cannot be a quadruple object`);
}

/**
 * The display form of a term, as persisted. Resources persist as their string
 * form; literals as a JSON array of value, datatype and (if present) language,
 * so that decoding never has to guess the tag from the value.
 */
export function encodeTerm(term: ObjectTerm): string {
  if (term.termType === 'Literal') {
    const parts = [term.value, term.datatype.value];
    if (term.language)
      parts.push(term.language);
    return JSON.stringify(parts);
  }
  return termString(term);
}

/** A named node whose IRI has the blank node prefix decodes as a blank node */
export function decodeResource(display: string, rdf: DataFactory): Resource {
  return display.startsWith(BNODE_PREFIX) ?
    rdf.blankNode(display.slice(BNODE_PREFIX.length)) : rdf.namedNode(display);
}

export function decodeLiteral(display: string, rdf: DataFactory): Literal {
  let parsed: unknown;
  try {
    parsed = JSON.parse(display);
  } catch (err) {
    throw new QuadStoreError('Executor failure', `Malformed literal ${display}`, err);
  }
  if (Array.isArray(parsed)) {
    const [value, datatype, language]: unknown[] = parsed;
    if (typeof value == 'string' && typeof datatype == 'string') {
      if (typeof language == 'string')
        return rdf.literal(value, language);
      else if (language == null)
        return rdf.literal(value, rdf.namedNode(datatype));
    }
  }
  throw new QuadStoreError('Executor failure', `Malformed literal ${display}`);
}

/**
 * Decodes a persisted object, using its stored flavor to choose the decoder.
 */
export function decodeObject(
  flavor: TripleFlavor,
  display: string,
  rdf: DataFactory
): ObjectTerm {
  switch (flavor) {
    case TripleFlavor.ResourceObject:
      return decodeResource(display, rdf);
    case TripleFlavor.LiteralObject:
      return decodeLiteral(display, rdf);
    default:
      throw new QuadStoreError('Executor failure', `Unknown flavor ${flavor}`);
  }
}
