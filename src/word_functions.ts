import { WORD_MASK, WORD_MODULUS } from "./types/blake2b_word";

export function sumMod64(a: bigint, b: bigint): bigint {
  return (a + b) & WORD_MASK;
}

export function carryOfSum(a: bigint, b: bigint): bigint {
  return (a + b) / WORD_MODULUS;
}

export function rotateRight64(value: bigint, bits: number): bigint {
  const n = BigInt(bits % 64);
  return ((value >> n) | (value << (64n - n))) & WORD_MASK;
}

export function negate64(value: bigint): bigint {
  return WORD_MASK - value;
}

/** Little-endian limbs of `value`, `count` limbs of `bits` each. */
export function decomposeLimbs(value: bigint, count: number, bits: number): bigint[] {
  const mask = (1n << BigInt(bits)) - 1n;
  return Array.from({ length: count }, (_, i) => (value >> BigInt(i * bits)) & mask);
}

export function composeLimbs(limbs: readonly bigint[], bits: number): bigint {
  return limbs.reduce((acc, limb, i) => acc + (limb << BigInt(i * bits)), 0n);
}

/** Moves bit i of `value` to bit 2i. */
export function spread(value: number): number {
  let out = 0;
  for (let i = 0; i < 16; i++) {
    if ((value >> i) & 1) {
      out += 4 ** i;
    }
  }
  return out;
}
