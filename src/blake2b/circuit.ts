import { Circuit, Layouter } from "../backend/circuit";
import { ConstraintSystem } from "../backend/constraint_system";
import { CircuitConfigurationError } from "../errors";
import { Value } from "../value";
import { Blake2bChipFactory, Blake2bGeneric } from "./blake2b_generic";
import { enforceInputSizes } from "./utils";

export interface Blake2bConfig {
  blake2bChip: Blake2bGeneric;
}

/**
 * A circuit proving that a private input and key hash to the public digest.
 * Sizes are part of the circuit; only the bytes are witnesses.
 */
export class Blake2bCircuit implements Circuit<Blake2bConfig> {
  constructor(
    readonly chip: Blake2bChipFactory,
    readonly input: readonly Value<bigint>[],
    readonly inputSize: number,
    readonly key: readonly Value<bigint>[],
    readonly keySize: number,
    readonly outputSize: number
  ) {
    enforceInputSizes(outputSize, keySize);
    if (input.length !== inputSize) {
      throw new CircuitConfigurationError(`expected ${inputSize} input bytes, got ${input.length}`);
    }
    if (key.length !== keySize) {
      throw new CircuitConfigurationError(`expected ${keySize} key bytes, got ${key.length}`);
    }
  }

  static fromBytes(
    chip: Blake2bChipFactory,
    input: Uint8Array,
    key: Uint8Array,
    outputSize: number
  ): Blake2bCircuit {
    const known = (bytes: Uint8Array) => Array.from(bytes, (b) => Value.known(BigInt(b)));
    return new Blake2bCircuit(chip, known(input), input.length, known(key), key.length, outputSize);
  }

  withoutWitnesses(): Blake2bCircuit {
    const unknown = (size: number) => Array.from({ length: size }, () => Value.unknown<bigint>());
    return new Blake2bCircuit(
      this.chip,
      unknown(this.inputSize),
      this.inputSize,
      unknown(this.keySize),
      this.keySize,
      this.outputSize
    );
  }

  configure(meta: ConstraintSystem): Blake2bConfig {
    const fullNumber = meta.adviceColumn();
    meta.enableEquality(fullNumber);

    const limbs = Array.from({ length: 8 }, () => meta.adviceColumn());
    limbs.forEach((limb) => meta.enableEquality(limb));

    return { blake2bChip: this.chip.configure(meta, fullNumber, limbs) };
  }

  synthesize(config: Blake2bConfig, layouter: Layouter): void {
    config.blake2bChip.initializeWith(layouter);
    config.blake2bChip.computeBlake2bHashForInputs(
      layouter,
      this.outputSize,
      this.inputSize,
      this.keySize,
      this.input,
      this.key
    );
  }
}
