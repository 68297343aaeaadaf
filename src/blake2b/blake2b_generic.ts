import { Layouter } from "../backend/circuit";
import { ConstraintSystem } from "../backend/constraint_system";
import { AdviceColumn, FixedColumn, InstanceColumn } from "../backend/expression";
import { TraceBuilder } from "../backend/trace_builder";
import { AdditionMod64Config } from "../base_operations/addition_mod_64";
import { Decompose8Config } from "../base_operations/decompose_8";
import { LimbRotation } from "../base_operations/generic_limb_rotation";
import { NegateConfig } from "../base_operations/negate";
import { Rotate63Config } from "../base_operations/rotate_63";
import { XorConfig } from "../base_operations/xor";
import { CircuitConfigurationError, SynthesisError } from "../errors";
import { log } from "../logger";
import { AssignedBlake2bWord, AssignedByte } from "../types";
import { Value } from "../value";
import { ABCD, IV, PARAMETER_BLOCK_CONSTANT, ROUNDS, SIGMA } from "./constants";
import {
  blockLayouts,
  constrainPaddingCellsToEqualZero,
  enforceInputSizes,
  processedBytesCount,
} from "./utils";

/** Configs every optimization shares. */
export interface GenericParts {
  decompose8: Decompose8Config;
  limbRotation: LimbRotation;
  rotate63: Rotate63Config;
  negate: NegateConfig;
  constants: FixedColumn;
  expectedFinalState: InstanceColumn;
}

export interface Blake2bParts extends GenericParts {
  addition: AdditionMod64Config;
  xor: XorConfig;
}

/** What a circuit needs from an optimization: its name and how to configure it. */
export interface Blake2bChipFactory<C extends Blake2bGeneric = Blake2bGeneric> {
  readonly optimizationName: string;
  configure(meta: ConstraintSystem, fullNumber: AdviceColumn, limbs: readonly AdviceColumn[]): C;
}

/**
 * The Blake2b schedule written once over the base operations. Optimizations
 * differ only in the addition decomposition and the XOR strategy they pass in.
 */
export abstract class Blake2bGeneric {
  private initialized = false;

  protected constructor(protected readonly parts: Blake2bParts) {}

  protected static genericConfigure(
    meta: ConstraintSystem,
    fullNumber: AdviceColumn,
    limbs: readonly AdviceColumn[]
  ): GenericParts {
    if (limbs.length !== 8) {
      throw new CircuitConfigurationError(`expected 8 limb columns, got ${limbs.length}`);
    }
    const decompose8 = Decompose8Config.configure(meta, fullNumber, limbs);
    const rotate63 = Rotate63Config.configure(meta, fullNumber);
    const negate = NegateConfig.configure(meta, fullNumber);

    const constants = meta.fixedColumn();
    meta.enableEquality(constants);

    const expectedFinalState = meta.instanceColumn();
    meta.enableEquality(expectedFinalState);

    return {
      decompose8,
      limbRotation: new LimbRotation(decompose8),
      rotate63,
      negate,
      constants,
      expectedFinalState,
    };
  }

  /** Fills the lookup tables. Runs once per chip; later calls do nothing. */
  initializeWith(layouter: Layouter): void {
    if (this.initialized) {
      return;
    }
    this.parts.decompose8.populateLookupTable(layouter);
    this.parts.addition.decomposition.populateLookupTable(layouter);
    this.parts.xor.populateXorLookupTable(layouter);
    this.initialized = true;
  }

  /**
   * Lays out the hash of `input` under `key` and binds the first
   * `outputSize` digest bytes to the public inputs starting at
   * `instanceOffset`. Returns those digest bytes.
   */
  computeBlake2bHashForInputs(
    layouter: Layouter,
    outputSize: number,
    inputSize: number,
    keySize: number,
    input: readonly Value<bigint>[],
    key: readonly Value<bigint>[],
    instanceOffset = 0
  ): AssignedByte[] {
    enforceInputSizes(outputSize, keySize);
    if (input.length !== inputSize) {
      throw new CircuitConfigurationError(`expected ${inputSize} input bytes, got ${input.length}`);
    }
    if (key.length !== keySize) {
      throw new CircuitConfigurationError(`expected ${keySize} key bytes, got ${key.length}`);
    }
    if (!this.initialized) {
      throw new SynthesisError("the chip must be initialized before computing a hash");
    }

    const digest = layouter.assignRegion("blake2b", (region) => {
      const trace = new TraceBuilder(region);
      const ivCells = IV.map((value, i) => this.constant(trace, `iv ${i}`, value));
      const state = this.computeInitialState(trace, ivCells, outputSize, keySize);
      return this.performBlake2bIterations(trace, ivCells, state, input, key);
    });

    const output = digest.slice(0, outputSize);
    output.forEach((byte, i) => {
      layouter.constrainInstance(byte.cell.cell, this.parts.expectedFinalState, instanceOffset + i);
    });
    return output;
  }

  private constant(trace: TraceBuilder, annotation: string, value: bigint): AssignedBlake2bWord {
    return new AssignedBlake2bWord(trace.assignConstant(annotation, this.parts.constants, value));
  }

  /** IV rows tied to the fixed IV, then word 0 mixed with the parameter block. */
  private computeInitialState(
    trace: TraceBuilder,
    ivCells: readonly AssignedBlake2bWord[],
    outputSize: number,
    keySize: number
  ): AssignedBlake2bWord[] {
    const state = IV.map((value, i) => {
      const row = this.parts.decompose8.assignRow(trace, Value.known(value));
      trace.region.constrainEqual(ivCells[i].cell.cell, row.fullNumber.cell.cell);
      return row.fullNumber;
    });
    const parameters = [
      this.constant(trace, "parameter block", PARAMETER_BLOCK_CONSTANT),
      this.constant(trace, "output size", BigInt(outputSize)),
      this.constant(trace, "key size", BigInt(keySize) << 8n),
    ];
    for (const parameter of parameters) {
      state[0] = this.parts.xor.xor(trace, state[0], parameter);
    }
    return state;
  }

  private performBlake2bIterations(
    trace: TraceBuilder,
    ivCells: readonly AssignedBlake2bWord[],
    state: AssignedBlake2bWord[],
    input: readonly Value<bigint>[],
    key: readonly Value<bigint>[]
  ): AssignedByte[] {
    const zero = trace.assignConstant("zero", this.parts.constants, 0n);
    let digest: AssignedByte[] = [];

    for (const block of blockLayouts(input, key)) {
      log.debug("[blake2b]", `block ${block.index}: row ${trace.nextRow}, ${block.paddingSize} padding bytes`);
      const rows = Array.from({ length: 16 }, (_, w) =>
        this.parts.decompose8.assignRowFromBytes(trace, block.bytes.slice(8 * w, 8 * w + 8))
      );
      constrainPaddingCellsToEqualZero(
        trace,
        block.paddingSize,
        rows.map((row) => row.limbs),
        zero
      );
      const processed = processedBytesCount(block.index, block.isLastBlock, input.length, key.length);
      digest = this.compress(
        trace,
        ivCells,
        state,
        rows.map((row) => row.fullNumber),
        BigInt(processed),
        block.isLastBlock
      );
    }
    return digest;
  }

  /** One compression; updates `state` in place and returns its bytes. */
  private compress(
    trace: TraceBuilder,
    ivCells: readonly AssignedBlake2bWord[],
    state: AssignedBlake2bWord[],
    block: readonly AssignedBlake2bWord[],
    processedBytes: bigint,
    isLastBlock: boolean
  ): AssignedByte[] {
    const { xor, negate } = this.parts;
    const v = [...state, ...ivCells];

    v[12] = xor.xor(trace, v[12], this.constant(trace, "processed bytes", processedBytes));
    if (isLastBlock) {
      v[14] = negate.not(trace, v[14]);
    }

    for (let round = 0; round < ROUNDS; round++) {
      ABCD.forEach((indices, j) => {
        this.mix(trace, v, indices, block[SIGMA[round][2 * j]], block[SIGMA[round][2 * j + 1]]);
      });
    }

    const bytes: AssignedByte[] = [];
    for (let i = 0; i < 8; i++) {
      const partial = xor.xor(trace, state[i], v[i]);
      const row = xor.xorAndReturnFullRow(trace, partial, v[i + 8]);
      bytes.push(...row.bytes());
      state[i] = row.fullNumber;
    }
    return bytes;
  }

  private mix(
    trace: TraceBuilder,
    v: AssignedBlake2bWord[],
    [ai, bi, ci, di]: readonly [number, number, number, number],
    x: AssignedBlake2bWord,
    y: AssignedBlake2bWord
  ): void {
    const { addition, xor, limbRotation, rotate63 } = this.parts;

    let a = addition.add(trace, v[ai], v[bi]);
    a = addition.add(trace, a, x);
    let d = limbRotation.rotateRight(trace, xor.xorAndReturnFullRow(trace, a, v[di]), 4);
    let c = addition.add(trace, d, v[ci]);
    let b = limbRotation.rotateRight(trace, xor.xorAndReturnFullRow(trace, c, v[bi]), 3);

    a = addition.add(trace, b, a);
    a = addition.add(trace, a, y);
    d = limbRotation.rotateRight(trace, xor.xorAndReturnFullRow(trace, a, d), 2);
    c = addition.add(trace, d, c);
    b = rotate63.rotateRight63(trace, xor.xor(trace, c, b));

    v[ai] = a;
    v[bi] = b;
    v[ci] = c;
    v[di] = d;
  }
}
