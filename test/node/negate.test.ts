import { expect } from "chai";
import { ConstraintSystem, Decompose8Config, NegateConfig, WORD_MASK } from "../../src";
import { known, runGadget, SharedColumns, summarize } from "../shared/gadget_circuit";

function configure(meta: ConstraintSystem, { fullNumber, limbs }: SharedColumns) {
  return {
    words: Decompose8Config.configure(meta, fullNumber, limbs),
    negate: NegateConfig.configure(meta, fullNumber),
  };
}

it("negates a word on the row after it", function () {
  this.timeout(10000);
  const results: Array<bigint | undefined> = [];
  let rowsUsed = 0;
  const failures = runGadget(configure, ({ words, negate }, trace, layouter) => {
    words.populateLookupTable(layouter);
    for (const value of [0n, WORD_MASK, 0x0123456789abcdefn]) {
      const row = words.assignRow(trace, known(value));
      const start = trace.nextRow;
      results.push(negate.not(trace, row.fullNumber).bigint().peek());
      rowsUsed = trace.nextRow - start;
    }
  });
  expect(failures).to.be.deep.eq([]);
  expect(results).to.be.deep.eq([WORD_MASK, 0n, 0xfedcba9876543210n]);
  expect(rowsUsed).to.be.eq(1);
});

it("copies an input that is not the last row", function () {
  this.timeout(10000);
  let result: bigint | undefined;
  const failures = runGadget(configure, ({ words, negate }, trace, layouter) => {
    words.populateLookupTable(layouter);
    const input = words.assignRow(trace, known(0xf0n));
    words.assignRow(trace, known(1n));
    result = negate.not(trace, input.fullNumber).bigint().peek();
  });
  expect(failures).to.be.deep.eq([]);
  expect(result).to.be.eq(WORD_MASK - 0xf0n);
});

it("rejects a wrong negation", function () {
  const failures = runGadget(configure, ({ negate }, trace) => {
    negate.populateNegateRows(trace, known(5n), known(5n));
  });
  expect(failures.map(summarize)).to.be.deep.eq(["gate negate#0@0"]);
});
