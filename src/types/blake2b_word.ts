import { Byte } from "./byte";

export const WORD_BITS = 64n;
export const WORD_MODULUS = 1n << WORD_BITS;
export const WORD_MASK = WORD_MODULUS - 1n;

/** An unsigned 64-bit integer. */
export class Blake2bWord {
  private constructor(readonly value: bigint) {}

  static fromBigInt(value: bigint): Blake2bWord {
    if (value < 0n || value > WORD_MASK) {
      throw new RangeError(`${value} does not fit in 64 bits`);
    }
    return new Blake2bWord(value);
  }

  /** Little-endian word from 8 bytes; each must be in [0, 256). */
  static fromBytes(bytes: ArrayLike<number>): Blake2bWord {
    if (bytes.length !== 8) {
      throw new RangeError(`a word takes 8 bytes, got ${bytes.length}`);
    }
    let value = 0n;
    for (let i = 7; i >= 0; i--) {
      value = (value << 8n) | Byte.fromNumber(bytes[i]).value;
    }
    return new Blake2bWord(value);
  }

  toBytes(): number[] {
    return Array.from({ length: 8 }, (_, i) => Number((this.value >> BigInt(8 * i)) & 0xffn));
  }
}
