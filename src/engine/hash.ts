import BN = require('bn.js');
import { createHash } from 'crypto';
const inspect = Symbol.for('nodejs.util.inspect.custom');

/**
 * A signed 64-bit content hash: the first eight bytes of the MD5 digest of a
 * string's UTF-8 encoding, read little-endian in two's complement.
 */
export class Hash {
  static readonly BYTE_WIDTH = 8;
  static readonly BIT_WIDTH = Hash.BYTE_WIDTH * 8;

  private readonly value: BN;

  static digest(text: string): Hash {
    const md5 = createHash('md5').update(text, 'utf8').digest();
    return new Hash(new BN(md5.subarray(0, Hash.BYTE_WIDTH), 'le'));
  }

  /** Decimal signed integer string */
  encode(): string {
    return this.value.toString(10);
  }

  /**
   * Fixed-width (16 character) lowercase hex of the two's complement, for use
   * in key-value store keys.
   */
  toKey(): string {
    return this.value.toTwos(Hash.BIT_WIDTH).toString(16, Hash.BYTE_WIDTH * 2);
  }

  toBigInt(): bigint {
    return BigInt(this.encode());
  }

  equals(that: Hash): boolean {
    return this.value.eq(that.value);
  }

  toString() {
    return `Hash: ${this.encode()}`;
  }

  // v8(chrome/nodejs) console
  [inspect]() {
    return this.toString();
  }

  /** @param twos unsigned two's complement bits */
  private constructor(twos: BN) {
    this.value = twos.fromTwos(Hash.BIT_WIDTH);
  }
}
