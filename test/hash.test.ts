import { Hash } from '../src/engine/hash';

test('Hash is equal to itself', () => {
  const hash = Hash.digest('hello');
  expect(hash.equals(hash)).toBe(true);
  expect(hash.equals(Hash.digest('hello'))).toBe(true);
});

test('Different text hashes are different', () => {
  expect(Hash.digest('hello').equals(Hash.digest('ex:ctx'))).toBe(false);
});

test('Digest reads the first eight bytes little-endian', () => {
  expect(Hash.digest('hello').encode()).toBe('8514701317032132957');
  expect(Hash.digest('hello').toBigInt()).toBe(8514701317032132957n);
});

test('Digest is signed', () => {
  expect(Hash.digest('ex:ctx').encode()).toBe('-5419739594028524759');
  expect(Hash.digest('ex:ctx').toBigInt()).toBe(-5419739594028524759n);
});

test('Digest is of UTF-8', () => {
  expect(Hash.digest('café').encode()).toBe('4960129645174264071');
});

test('Key is fixed-width hex', () => {
  expect(Hash.digest('hello').toKey()).toBe('762a4bbc2a40415d');
  expect(Hash.digest('').toKey()).toBe('04b2008fd98c1dd4');
});

test('Key of negative hash is two\'s complement', () => {
  expect(Hash.digest('ex:ctx').toKey()).toBe('b4c9378de2cf5b29');
});

test('Prints its encoding', () => {
  expect(Hash.digest('hello').toString()).toBe('Hash: 8514701317032132957');
});
