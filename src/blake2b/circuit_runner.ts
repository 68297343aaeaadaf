import { hexToBytes } from "@noble/hashes/utils";
import { measureCircuit } from "../dev/cost_model";
import { MockProver } from "../dev/mock_prover";
import { log } from "../logger";
import { Blake2bChipFactory } from "./blake2b_generic";
import { Blake2bCircuit } from "./circuit";

export interface PreparedInputs {
  input: Uint8Array;
  key: Uint8Array;
  expected: Uint8Array;
}

/** Decodes the hex strings of a test vector. The expected digest sets the output size. */
export function prepareParametersForTest(input: string, key: string, expected: string): PreparedInputs {
  return {
    input: hexToBytes(input),
    key: hexToBytes(key),
    expected: hexToBytes(expected),
  };
}

export function createCircuitForInputs(chip: Blake2bChipFactory, inputs: PreparedInputs): Blake2bCircuit {
  return Blake2bCircuit.fromBytes(chip, inputs.input, inputs.key, inputs.expected.length);
}

/** The smallest k the circuit fits in. */
export function pickK(circuit: Blake2bCircuit): number {
  return measureCircuit(circuit).minimumK;
}

/** Runs the mock prover with the digest bytes as public inputs. */
export function mockProveWithPublicInputs(
  expected: ArrayLike<number>,
  circuit: Blake2bCircuit,
  k: number = pickK(circuit)
): MockProver {
  log.debug("[runner]", `mock proving ${circuit.chip.optimizationName} with k = ${k}`);
  return MockProver.run(k, circuit, [Array.from(expected, (b) => BigInt(b))]);
}

export function verifyMockProver(prover: MockProver): void {
  prover.assertSatisfied();
}

/** Builds, synthesizes and checks the circuit for one hex test vector. */
export function mockedPreprocessInputsSynthesizeProveAndVerify(
  chip: Blake2bChipFactory,
  input: string,
  key: string,
  expected: string
): void {
  const inputs = prepareParametersForTest(input, key, expected);
  const circuit = createCircuitForInputs(chip, inputs);
  verifyMockProver(mockProveWithPublicInputs(inputs.expected, circuit));
}
