import { AssignedNative } from "../backend/circuit";
import { TraceBuilder } from "../backend/trace_builder";
import { CircuitConfigurationError } from "../errors";
import { Value } from "../value";
import { BLAKE2B_BLOCK_SIZE, MAX_KEY_SIZE, MAX_OUTPUT_SIZE } from "./constants";

export function enforceInputSizes(outputSize: number, keySize: number): void {
  if (!Number.isInteger(outputSize) || outputSize < 1 || outputSize > MAX_OUTPUT_SIZE) {
    throw new CircuitConfigurationError(
      `output size must be between 1 and ${MAX_OUTPUT_SIZE} bytes, got ${outputSize}`
    );
  }
  if (!Number.isInteger(keySize) || keySize < 0 || keySize > MAX_KEY_SIZE) {
    throw new CircuitConfigurationError(
      `key size must be between 0 and ${MAX_KEY_SIZE} bytes, got ${keySize}`
    );
  }
}

/**
 * Blocks compressed for an input and key. An empty input still takes one
 * block: zeroes without a key, the key block otherwise. A key always takes
 * a block of its own.
 */
export function totalBlocksCount(inputSize: number, keySize: number): number {
  const inputBlocks = Math.ceil(inputSize / BLAKE2B_BLOCK_SIZE);
  if (inputSize === 0) {
    return 1;
  }
  return keySize === 0 ? inputBlocks : inputBlocks + 1;
}

/** Bytes counted into the state by the time block `index` is compressed. */
export function processedBytesCount(
  index: number,
  isLastBlock: boolean,
  inputSize: number,
  keySize: number
): number {
  if (isLastBlock) {
    return inputSize + (keySize === 0 ? 0 : BLAKE2B_BLOCK_SIZE);
  }
  return BLAKE2B_BLOCK_SIZE * (index + 1);
}

/** Zero bytes at the end of the last input block. */
export function inputPaddingSize(inputSize: number): number {
  if (inputSize === 0) {
    return BLAKE2B_BLOCK_SIZE;
  }
  return (BLAKE2B_BLOCK_SIZE - (inputSize % BLAKE2B_BLOCK_SIZE)) % BLAKE2B_BLOCK_SIZE;
}

export interface BlockLayout {
  index: number;
  isLastBlock: boolean;
  isKeyBlock: boolean;
  /** Trailing bytes of the block that must be zero. */
  paddingSize: number;
  bytes: Value<bigint>[];
}

function padded(bytes: readonly Value<bigint>[]): Value<bigint>[] {
  const block = bytes.slice(0, BLAKE2B_BLOCK_SIZE);
  while (block.length < BLAKE2B_BLOCK_SIZE) {
    block.push(Value.known(0n));
  }
  return block;
}

/** The 128 byte witnesses of every block, key block first. */
export function blockLayouts(
  input: readonly Value<bigint>[],
  key: readonly Value<bigint>[]
): BlockLayout[] {
  const total = totalBlocksCount(input.length, key.length);
  const hasKey = key.length > 0;
  return Array.from({ length: total }, (_, index) => {
    const isLastBlock = index === total - 1;
    const isKeyBlock = hasKey && index === 0;
    if (isKeyBlock) {
      return {
        index,
        isLastBlock,
        isKeyBlock,
        paddingSize: BLAKE2B_BLOCK_SIZE - key.length,
        bytes: padded(key),
      };
    }
    const inputBlock = hasKey ? index - 1 : index;
    const start = inputBlock * BLAKE2B_BLOCK_SIZE;
    return {
      index,
      isLastBlock,
      isKeyBlock,
      paddingSize: isLastBlock ? inputPaddingSize(input.length) : 0,
      bytes: padded(input.slice(start, start + BLAKE2B_BLOCK_SIZE)),
    };
  });
}

/**
 * Ties the last `count` bytes of a block to `zero`, walking the rows from the
 * last one and each row's limbs from the most significant.
 */
export function constrainPaddingCellsToEqualZero(
  trace: TraceBuilder,
  count: number,
  rows: readonly (readonly AssignedNative[])[],
  zero: AssignedNative
): void {
  let constrained = 0;
  for (let row = rows.length - 1; row >= 0 && constrained < count; row--) {
    for (let limb = rows[row].length - 1; limb >= 0 && constrained < count; limb--) {
      trace.region.constrainEqual(rows[row][limb].cell, zero.cell);
      constrained++;
    }
  }
}
