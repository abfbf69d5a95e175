import { DataFactory } from 'rdf-data-factory';
import type { BaseQuad } from 'rdf-js';
import { QuadStoreError } from '../src/api';
import { DEFAULT_CONTEXT } from '../src/config';
import {
  Quadruple, QuadrupleFactory, quadrupleId, QuadrupleSet, termKey
} from '../src/engine/quads';
import { TripleFlavor } from '../src/engine/terms';

describe('Quadruple identity', () => {
  const rdf = new DataFactory();

  test('id hashes space-separated string forms', () => {
    expect(quadrupleId(
      rdf.namedNode('ex:ctx'),
      rdf.namedNode('ex:subj'),
      rdf.namedNode('ex:pred'),
      rdf.literal('hello')
    ).encode()).toBe('-7329876751289732557');
  });

  test('id includes language', () => {
    expect(quadrupleId(
      rdf.namedNode('http://ex.org/g'),
      rdf.namedNode('http://ex.org/s'),
      rdf.namedNode('http://ex.org/p'),
      rdf.literal('hello', 'en')
    ).encode()).toBe('7814516329918073193');
  });

  test('term key hashes one string form', () => {
    expect(termKey(rdf.literal('hello')).encode()).toBe('8514701317032132957');
    expect(termKey(rdf.namedNode('ex:ctx')).toKey()).toBe('b4c9378de2cf5b29');
    expect(termKey(rdf.blankNode('b1')).encode()).toBe('4855105576624167230');
  });

  test('resource and literal with one string form share an id', () => {
    // Flavor is what tells them apart
    const ctx = rdf.namedNode('ex:ctx'), s = rdf.namedNode('ex:subj'), p = rdf.namedNode('ex:pred');
    expect(quadrupleId(ctx, s, p, rdf.namedNode('hello'))
      .equals(quadrupleId(ctx, s, p, rdf.literal('hello')))).toBe(true);
  });
});

describe('Quadruple', () => {
  const rdf = new QuadrupleFactory('http://ex.org/default');
  const ctx = rdf.namedNode('http://ex.org/g');
  const s = rdf.namedNode('http://ex.org/s');
  const p = rdf.namedNode('http://ex.org/p');

  test('has flavor of object', () => {
    expect(rdf.quadruple(ctx, s, p, rdf.namedNode('http://ex.org/o')).flavor)
      .toBe(TripleFlavor.ResourceObject);
    expect(rdf.quadruple(ctx, s, p, rdf.blankNode('o')).flavor)
      .toBe(TripleFlavor.ResourceObject);
    expect(rdf.quadruple(ctx, s, p, rdf.literal('o')).flavor)
      .toBe(TripleFlavor.LiteralObject);
  });

  test('is an RDF quad', () => {
    const quad = rdf.quadruple(ctx, s, p, rdf.literal('o'));
    expect(quad.equals(rdf.quad(s, p, rdf.literal('o'), ctx))).toBe(true);
    expect(quad.context.equals(ctx)).toBe(true);
  });

  test('prints string forms', () => {
    expect(rdf.quadruple(ctx, s, p, rdf.literal('hello', 'en')).toString())
      .toBe('http://ex.org/g http://ex.org/s http://ex.org/p hello@en');
  });

  test('rejects a term in the wrong position', () => {
    expect(() => rdf.fromQuad(rdf.quad<BaseQuad>(rdf.literal('s'), p, s, ctx)))
      .toThrow('Invalid argument: Literal s cannot be used in subject position');
    expect(() => rdf.fromQuad(rdf.quad<BaseQuad>(s, rdf.blankNode('p'), s, ctx)))
      .toThrow('Invalid argument: BlankNode p cannot be used in predicate position');
    expect(() => rdf.fromQuad(rdf.quad(s, p, rdf.variable('o'), ctx)))
      .toThrow('Invalid argument: Variable o cannot be used in object position');
    expect(() => rdf.fromQuad(rdf.quad(s, p, s, rdf.blankNode('g'))))
      .toThrow(QuadStoreError);
  });

  test('indexed form has keys and display strings', () => {
    const indexed = rdf.quadruple(ctx, s, p, rdf.literal('hello')).toIndexed();
    expect(indexed.flavor).toBe(TripleFlavor.LiteralObject);
    expect(indexed.keys.object.encode()).toBe('8514701317032132957');
    expect(indexed.keys.context.equals(termKey(ctx))).toBe(true);
    expect(indexed.subject).toBe('http://ex.org/s');
    expect(indexed.object).toBe('["hello","http://www.w3.org/2001/XMLSchema#string"]');
  });
});

describe('Quadruple factory', () => {
  const rdf = new QuadrupleFactory('http://ex.org/default');
  const s = rdf.namedNode('http://ex.org/s');
  const p = rdf.namedNode('http://ex.org/p');
  const o = rdf.literal('o');

  test('default graph gets default context', () => {
    expect(rdf.fromQuad(rdf.quad(s, p, o)).context.value).toBe('http://ex.org/default');
  });

  test('default graph gets given context', () => {
    expect(rdf.fromQuad(rdf.quad(s, p, o), rdf.namedNode('http://ex.org/g')).context.value)
      .toBe('http://ex.org/g');
  });

  test('named graph is kept', () => {
    expect(rdf.fromQuad(rdf.quad(s, p, o, rdf.namedNode('http://ex.org/h')),
      rdf.namedNode('http://ex.org/g')).context.value).toBe('http://ex.org/h');
  });

  test('default default context', () => {
    expect(new QuadrupleFactory().defaultContext.value).toBe(DEFAULT_CONTEXT);
  });

  test('quadruple passes through', () => {
    const quad = rdf.quadruple(rdf.namedNode('http://ex.org/g'), s, p, o);
    expect(rdf.fromQuad(quad)).toBe(quad);
  });

  test('reconstructs from row', () => {
    for (let object of [rdf.blankNode('b1'), rdf.literal('hello', 'en'), rdf.literal('hello')]) {
      const quad = rdf.quadruple(rdf.namedNode('http://ex.org/g'), rdf.blankNode('s'), p, object);
      const copy = rdf.fromRow(quad.toIndexed());
      expect(copy.equals(quad)).toBe(true);
      expect(copy.id.equals(quad.id)).toBe(true);
      expect(copy.flavor).toBe(quad.flavor);
    }
  });
});

describe('Quadruple set', () => {
  const rdf = new QuadrupleFactory();
  const s = rdf.namedNode('http://ex.org/s');
  const p = rdf.namedNode('http://ex.org/p');

  test('is unique by id', () => {
    const set = new QuadrupleSet();
    expect(set.add(rdf.fromQuad(rdf.quad(s, p, rdf.literal('o'))))).toBe(true);
    expect(set.add(rdf.fromQuad(rdf.quad(s, p, rdf.literal('o'))))).toBe(false);
    expect(set.size).toBe(1);
  });

  test('has and delete', () => {
    const quad = rdf.fromQuad(rdf.quad(s, p, rdf.literal('o')));
    const set = new QuadrupleSet([quad]);
    expect(set.has(rdf.fromQuad(rdf.quad(s, p, rdf.literal('o'))))).toBe(true);
    expect(set.delete(quad)).toBe(true);
    expect(set.has(quad)).toBe(false);
    expect([...set]).toEqual([]);
  });

  test('constructs quadruples', () => {
    expect(new Quadruple(rdf.defaultContext, s, p, s).id
      .equals(quadrupleId(rdf.defaultContext, s, p, s))).toBe(true);
  });
});
