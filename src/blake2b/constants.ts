import sigmaTable from "./sigma.json";

export const BLAKE2B_BLOCK_SIZE = 128;
export const MAX_OUTPUT_SIZE = 64;
export const MAX_KEY_SIZE = 64;
export const ROUNDS = 12;

export const IV: readonly bigint[] = [
  0x6a09e667f3bcc908n,
  0xbb67ae8584caa73bn,
  0x3c6ef372fe94f82bn,
  0xa54ff53a5f1d36f1n,
  0x510e527fade682d1n,
  0x9b05688c2b3e6c1fn,
  0x1f83d9abfb41bd6bn,
  0x5be0cd19137e2179n,
];

/** Parameter block word 0 without the key and output lengths. */
export const PARAMETER_BLOCK_CONSTANT = 0x01010000n;

/** State indices (a, b, c, d) of the 8 mixing calls of a round. */
export const ABCD: ReadonlyArray<readonly [number, number, number, number]> = [
  [0, 4, 8, 12],
  [1, 5, 9, 13],
  [2, 6, 10, 14],
  [3, 7, 11, 15],
  [0, 5, 10, 15],
  [1, 6, 11, 12],
  [2, 7, 8, 13],
  [3, 4, 9, 14],
];

/** Message word schedule, one permutation of 0..15 per round. */
export const SIGMA: ReadonlyArray<readonly number[]> = sigmaTable;

if (SIGMA.length !== ROUNDS || SIGMA.some((row) => row.length !== 16)) {
  throw new Error("sigma.json must hold 12 rows of 16 indices");
}
