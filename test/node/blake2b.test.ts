import { expect } from "chai";
import { hexToBytes } from "@noble/hashes/utils";
import {
  Blake2bChipOptRecycle,
  Blake2bCircuit,
  Blake2bConfig,
  Circuit,
  CircuitConfigurationError,
  ConstraintSystem,
  ConstraintViolationError,
  Layouter,
  measureCircuit,
  mockedPreprocessInputsSynthesizeProveAndVerify,
  MockProver,
  mockProveWithPublicInputs,
  OPTIMIZATIONS,
  pickK,
  PrimeField,
  SynthesisError,
  Value,
  verifyMockProver,
} from "../../src";
import { summarize } from "../shared/gadget_circuit";
import { referenceDigest, sampleBytes } from "../shared/reference";

const EMPTY_INPUT_DIGEST =
  "786a02f742015903c6c6fd852552d272912f4740e15847618a86e217f71f5419" +
  "d25e1031afee585313896444934eb04b903a685b1448b755d56f701afe9be2ce";

const NO_BYTES = new Uint8Array(0);

const SHAPES: Record<string, { adviceColumns: number; tableRows: number }> = {
  recycle: { adviceColumns: 9, tableRows: 65536 },
  "4-limbs": { adviceColumns: 9, tableRows: 65536 },
  spread: { adviceColumns: 10, tableRows: 256 },
};

function paddedInstances(digest: Uint8Array, length: number): bigint[] {
  return Array.from({ length }, (_, i) => BigInt(i < digest.length ? digest[i] : 0));
}

OPTIMIZATIONS.forEach((chip) => {
  describe(`blake2b with the ${chip.optimizationName} optimization`, function () {
    this.timeout(300000);

    const cases: Array<[string, number, number, number]> = [
      ["an empty input", 0, 0, 64],
      ["a single byte", 1, 0, 32],
      ["exactly one block", 128, 0, 64],
      ["several blocks", 300, 0, 64],
      ["a keyed input", 50, 32, 64],
      ["a key with an empty input", 0, 64, 16],
    ];

    cases.forEach(([name, inputSize, keySize, outputSize]) => {
      it(`hashes ${name}`, () => {
        const input = sampleBytes(inputSize, 1);
        const key = sampleBytes(keySize, 2);
        const circuit = Blake2bCircuit.fromBytes(chip, input, key, outputSize);
        const prover = mockProveWithPublicInputs(referenceDigest(input, key, outputSize), circuit);
        expect(prover.verify()).to.be.deep.eq([]);
      });
    });

    it("accepts the known digest of the empty input", () => {
      expect(() => mockedPreprocessInputsSynthesizeProveAndVerify(chip, "", "", EMPTY_INPUT_DIGEST)).to.not.throw();
    });

    it("rejects a digest with one wrong byte", () => {
      const expected = hexToBytes(EMPTY_INPUT_DIGEST);
      expected[5] ^= 1;
      const prover = mockProveWithPublicInputs(expected, Blake2bCircuit.fromBytes(chip, NO_BYTES, NO_BYTES, 64));
      expect(prover.verify().map(summarize)).to.be.deep.eq(["instance @5"]);
      expect(() => verifyMockProver(prover)).to.throw(ConstraintViolationError);
    });

    [1, 32].forEach((outputSize) => {
      it(`binds only the first ${outputSize} public inputs`, () => {
        const input = sampleBytes(20, 3);
        const circuit = Blake2bCircuit.fromBytes(chip, input, NO_BYTES, outputSize);
        const instances = paddedInstances(referenceDigest(input, NO_BYTES, outputSize), 64);
        const k = pickK(circuit);

        const unbound = [...instances];
        unbound[outputSize] = 0xabn;
        expect(MockProver.run(k, circuit, [unbound]).verify()).to.be.deep.eq([]);

        const bound = [...instances];
        bound[outputSize - 1] ^= 1n;
        expect(MockProver.run(k, circuit, [bound]).verify().map(summarize)).to.be.deep.eq([
          `instance @${outputSize - 1}`,
        ]);
      });
    });

    it("range checks the input bytes", () => {
      const circuit = new Blake2bCircuit(chip, [Value.known(300n)], 1, [], 0, 32);
      const failures = MockProver.run(pickK(circuit), circuit, [paddedInstances(NO_BYTES, 32)]).verify();
      expect(failures.flatMap((f) => (f.kind === "lookup" ? [f.lookup] : []))).to.be.deep.eq([
        "range check 8 bit limb 0",
      ]);
    });

    it("measures the shape it proves", () => {
      const input = sampleBytes(10, 4);
      const circuit = Blake2bCircuit.fromBytes(chip, input, NO_BYTES, 32);
      const cost = measureCircuit(circuit);
      const prover = mockProveWithPublicInputs(referenceDigest(input, NO_BYTES, 32), circuit, cost.minimumK);
      expect(prover.verify()).to.be.deep.eq([]);
      expect(cost.rows).to.be.eq(prover.assignment.usedRows);
      expect(cost.copyConstraints).to.be.eq(prover.assignment.copies.length);
      expect(cost.adviceColumns).to.be.eq(SHAPES[chip.optimizationName].adviceColumns);
      expect(cost.tableRows).to.be.eq(SHAPES[chip.optimizationName].tableRows);
      expect(cost.instanceColumns).to.be.eq(1);
      expect(cost.fixedColumns).to.be.eq(1);
    });

    it("grows with the number of blocks", () => {
      const rows = (inputSize: number) =>
        measureCircuit(Blake2bCircuit.fromBytes(chip, sampleBytes(inputSize, 5), NO_BYTES, 64)).rows;
      expect(rows(128)).to.be.eq(rows(1));
      expect(rows(129)).to.be.greaterThan(rows(128));
    });

    it("needs a field larger than 2^65", () => {
      const circuit = Blake2bCircuit.fromBytes(chip, NO_BYTES, NO_BYTES, 64);
      const small = new PrimeField((1n << 61n) - 1n, "m61");
      expect(() => MockProver.run(17, circuit, [[]], small)).to.throw(CircuitConfigurationError);
    });
  });
});

it("rejects sizes out of range", () => {
  const chip = Blake2bChipOptRecycle;
  expect(() => Blake2bCircuit.fromBytes(chip, NO_BYTES, NO_BYTES, 0)).to.throw(CircuitConfigurationError);
  expect(() => Blake2bCircuit.fromBytes(chip, NO_BYTES, NO_BYTES, 65)).to.throw(CircuitConfigurationError);
  expect(() => Blake2bCircuit.fromBytes(chip, NO_BYTES, new Uint8Array(65), 32)).to.throw(
    CircuitConfigurationError
  );
  expect(() => new Blake2bCircuit(chip, [Value.known(1n)], 2, [], 0, 32)).to.throw(CircuitConfigurationError);
});

/** Hashes several inputs into consecutive ranges of the public inputs. */
class ManyHashesCircuit implements Circuit<Blake2bConfig> {
  constructor(private readonly hashes: readonly Blake2bCircuit[], private readonly initializations: number) {}

  withoutWitnesses(): ManyHashesCircuit {
    return this;
  }

  configure(meta: ConstraintSystem): Blake2bConfig {
    return this.hashes[0].configure(meta);
  }

  synthesize(config: Blake2bConfig, layouter: Layouter): void {
    for (let i = 0; i < this.initializations; i++) {
      config.blake2bChip.initializeWith(layouter);
    }
    let offset = 0;
    for (const hash of this.hashes) {
      config.blake2bChip.computeBlake2bHashForInputs(
        layouter,
        hash.outputSize,
        hash.inputSize,
        hash.keySize,
        hash.input,
        hash.key,
        offset
      );
      offset += hash.outputSize;
    }
  }
}

describe("chip reuse", function () {
  this.timeout(300000);

  const first = sampleBytes(7, 6);
  const second = sampleBytes(140, 7);
  const hashes = [
    Blake2bCircuit.fromBytes(Blake2bChipOptRecycle, first, NO_BYTES, 32),
    Blake2bCircuit.fromBytes(Blake2bChipOptRecycle, second, NO_BYTES, 16),
  ];
  const instances = [...referenceDigest(first, NO_BYTES, 32), ...referenceDigest(second, NO_BYTES, 16)].map(
    (b) => BigInt(b)
  );

  it("hashes twice with tables filled once", () => {
    const circuit = new ManyHashesCircuit(hashes, 2);
    const k = measureCircuit(circuit).minimumK;
    expect(MockProver.run(k, circuit, [instances]).verify()).to.be.deep.eq([]);
  });

  it("refuses to hash before the tables are filled", () => {
    expect(() => MockProver.run(17, new ManyHashesCircuit(hashes, 0), [instances])).to.throw(SynthesisError);
  });
});

it("ties every padding byte of the input and key blocks to zero", function () {
  this.timeout(120000);
  const copies = (inputSize: number, keySize: number) =>
    measureCircuit(
      Blake2bCircuit.fromBytes(Blake2bChipOptRecycle, sampleBytes(inputSize, 8), sampleBytes(keySize, 9), 32)
    ).copyConstraints;
  // one input byte less leaves one more padding byte, and likewise for the key
  expect(copies(1, 0) - copies(2, 0)).to.be.eq(1);
  expect(copies(0, 0) - copies(1, 0)).to.be.eq(1);
  expect(copies(10, 3) - copies(10, 4)).to.be.eq(1);
});
