import { expect } from "chai";
import { AssignedRow, Decompose16Config, Decompose8Config, Fr, WORD_MASK } from "../../src";
import { known, rowValues, runGadget, summarize } from "../shared/gadget_circuit";

const limbValues = (row: AssignedRow) => row.limbs.map((limb) => limb.value.peek());

it("decomposes 64-bit words into 8 bytes", function () {
  this.timeout(10000);
  const rows: AssignedRow[] = [];
  const failures = runGadget(
    (meta, { fullNumber, limbs }) => Decompose8Config.configure(meta, fullNumber, limbs),
    (decompose, trace, layouter) => {
      decompose.populateLookupTable(layouter);
      for (const value of [0n, 1n, 0xffn, 0x0123456789abcdefn, WORD_MASK]) {
        rows.push(decompose.assignRow(trace, known(value)));
      }
    }
  );
  expect(failures).to.be.deep.eq([]);
  expect(limbValues(rows[3])).to.be.deep.eq([0xefn, 0xcdn, 0xabn, 0x89n, 0x67n, 0x45n, 0x23n, 0x01n]);
  expect(limbValues(rows[4])).to.be.deep.eq(Array(8).fill(0xffn));
  expect(rows.map((row) => row.offset)).to.be.deep.eq([0, 1, 2, 3, 4]);
});

it("decomposes 64-bit words into 4 limbs of 16 bits", function () {
  this.timeout(10000);
  let row: AssignedRow | undefined;
  const failures = runGadget(
    (meta, { fullNumber, limbs }) => Decompose16Config.configure(meta, fullNumber, limbs),
    (decompose, trace, layouter) => {
      decompose.populateLookupTable(layouter);
      row = decompose.assignRow(trace, known(0x0123456789abcdefn));
    }
  );
  expect(failures).to.be.deep.eq([]);
  expect(row?.limbBits).to.be.eq(16);
  expect(row && limbValues(row)).to.be.deep.eq([0xcdefn, 0x89abn, 0x4567n, 0x0123n]);
});

it("assigns a word from its bytes", function () {
  this.timeout(10000);
  let row: AssignedRow | undefined;
  const failures = runGadget(
    (meta, { fullNumber, limbs }) => Decompose8Config.configure(meta, fullNumber, limbs),
    (decompose, trace, layouter) => {
      decompose.populateLookupTable(layouter);
      row = decompose.assignRowFromBytes(trace, [1, 2, 3, 4, 5, 6, 7, 8].map(known));
    }
  );
  expect(failures).to.be.deep.eq([]);
  expect(row?.fullNumber.bigint().peek()).to.be.eq(0x0807060504030201n);
});

it("rejects a limb sum that differs from the full number", function () {
  this.timeout(10000);
  const failures = runGadget(
    (meta, { fullNumber, limbs }) => Decompose8Config.configure(meta, fullNumber, limbs),
    (decompose, trace, layouter) => {
      decompose.populateLookupTable(layouter);
      decompose.populateRowFromValues(trace, rowValues(5n, [4n, 0n, 0n, 0n, 0n, 0n, 0n, 0n]), true);
    }
  );
  expect(failures.map(summarize)).to.be.deep.eq(["gate decompose in 8 limbs#0@0"]);
});

it("does not check a row written without the decomposition selector", function () {
  this.timeout(10000);
  const failures = runGadget(
    (meta, { fullNumber, limbs }) => Decompose8Config.configure(meta, fullNumber, limbs),
    (decompose, trace, layouter) => {
      decompose.populateLookupTable(layouter);
      decompose.populateRowFromValues(trace, rowValues(5n, [4n, 0n, 0n, 0n, 0n, 0n, 0n, 0n]), false);
    }
  );
  expect(failures).to.be.deep.eq([]);
});

it("rejects an out of range limb even when the sum matches", function () {
  this.timeout(10000);
  const failures = runGadget(
    (meta, { fullNumber, limbs }) => Decompose8Config.configure(meta, fullNumber, limbs),
    (decompose, trace, layouter) => {
      decompose.populateLookupTable(layouter);
      // 256 = 256 * 1 with the limb carrying the overflow
      decompose.populateRowFromValues(trace, rowValues(256n, [256n, 0n, 0n, 0n, 0n, 0n, 0n, 0n]), true);
      // 256 + 256 * (p - 1) wraps to 0 in the field
      decompose.populateRowFromValues(
        trace,
        rowValues(0n, [256n, Fr.modulus - 1n, 0n, 0n, 0n, 0n, 0n, 0n]),
        true
      );
    }
  );
  expect(failures.map(summarize)).to.be.deep.eq([
    "lookup range check 8 bit limb 0@0",
    "lookup range check 8 bit limb 0@1",
    "lookup range check 8 bit limb 1@1",
  ]);
});
