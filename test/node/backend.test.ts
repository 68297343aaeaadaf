import { expect } from "chai";
import {
  CircuitConfigurationError,
  ConstraintSystem,
  ConstraintViolationError,
  Expression,
  Fr,
  minimumK,
  Rotation,
  SynthesisError,
  Value,
  VerifyFailure,
} from "../../src";
import { known, runGadget, SharedColumns, summarize } from "../shared/gadget_circuit";

const columnsOnly = (_meta: ConstraintSystem, columns: SharedColumns) => columns;

describe("assignment", () => {
  it("rejects a cell assigned twice", () => {
    expect(() =>
      runGadget(columnsOnly, (columns, trace) => {
        trace.region.assignAdvice("a", columns.fullNumber, 0, known(1));
        trace.region.assignAdvice("b", columns.fullNumber, 0, known(2));
      })
    ).to.throw(SynthesisError, "assigned twice");
  });

  it("rejects copies on columns without equality", () => {
    expect(() =>
      runGadget(columnsOnly, (columns, trace) => {
        const a = trace.region.assignAdvice("a", columns.fullNumber, 0, known(1));
        const b = trace.region.assignAdvice("b", columns.extra, 0, known(1));
        trace.region.constrainEqual(a.cell, b.cell);
      })
    ).to.throw(SynthesisError, "not enabled for equality");
  });

  it("rejects unknown witnesses when checking a trace", () => {
    expect(() =>
      runGadget(columnsOnly, (columns, trace) => {
        trace.region.assignAdvice("a", columns.fullNumber, 0, Value.unknown());
      })
    ).to.throw(SynthesisError, "unknown witness");
  });

  it("keeps rows below the blinding rows", () => {
    expect(
      runGadget(columnsOnly, (columns, trace) => {
        trace.region.assignAdvice("last usable", columns.fullNumber, 9, known(1));
      }, 4)
    ).to.be.deep.eq([]);
    expect(() =>
      runGadget(columnsOnly, (columns, trace) => {
        trace.region.assignAdvice("blinding", columns.fullNumber, 10, known(1));
      }, 4)
    ).to.throw(SynthesisError, "outside the 10 usable rows");
  });

  it("reports copies between differing cells", () => {
    const failures = runGadget(columnsOnly, (columns, trace) => {
      const a = trace.region.assignAdvice("a", columns.fullNumber, 0, known(1));
      const b = trace.region.assignAdvice("b", columns.limbs[0], 1, known(2));
      trace.region.constrainEqual(a.cell, b.cell);
    });
    expect(failures.map(summarize)).to.be.deep.eq(["permutation 0:1"]);
  });

  it("checks gates only where their selector is enabled", () => {
    const failures = runGadget(
      (meta, columns) => {
        const q = meta.selector();
        meta.createGate("double", (vc) => {
          const full = vc.queryAdvice(columns.fullNumber, Rotation.cur);
          const doubled = vc.queryAdvice(columns.limbs[0], Rotation.cur);
          return [vc.querySelector(q).mul(doubled.sub(full.scale(2)))];
        });
        return { q, columns };
      },
      ({ q, columns }, trace) => {
        const rows: Array<[number, number, boolean]> = [
          [3, 6, true],
          [3, 7, true],
          [3, 7, false],
        ];
        rows.forEach(([full, doubled, enabled], offset) => {
          if (enabled) {
            trace.region.enableSelector("double", q, offset);
          }
          trace.region.assignAdvice("full", columns.fullNumber, offset, known(full));
          trace.region.assignAdvice("doubled", columns.limbs[0], offset, known(doubled));
        });
      }
    );
    expect(failures.map(summarize)).to.be.deep.eq(["gate double#0@1"]);
  });

  it("fails lookups into a table that was never filled", () => {
    expect(() =>
      runGadget(
        (meta, columns) => {
          const q = meta.selector();
          const table = meta.lookupTableColumn();
          meta.lookup("in table", (vc) => [
            [vc.querySelector(q).mul(vc.queryAdvice(columns.fullNumber, Rotation.cur)), table],
          ]);
          return { q, columns };
        },
        ({ q, columns }, trace) => {
          trace.region.enableSelector("in table", q, 0);
          trace.region.assignAdvice("value", columns.fullNumber, 0, known(1));
        }
      )
    ).to.throw(SynthesisError, "never assigned");
  });

  it("fills each table column once and in order", () => {
    const withTable = (meta: ConstraintSystem) => meta.lookupTableColumn();
    expect(() =>
      runGadget(withTable, (table, _trace, layouter) => {
        layouter.assignTable("first", (t) => t.assignCell("v", table, 0, 0n));
        layouter.assignTable("second", (t) => t.assignCell("v", table, 1, 1n));
      })
    ).to.throw(SynthesisError, "assigned twice");
    expect(() =>
      runGadget(withTable, (table, _trace, layouter) => {
        layouter.assignTable("gap", (t) => t.assignCell("v", table, 1, 1n));
      })
    ).to.throw(SynthesisError, "in order");
  });
});

describe("constraint system", () => {
  it("rejects gates and lookups without a selector", () => {
    const meta = new ConstraintSystem(Fr);
    const advice = meta.adviceColumn();
    const table = meta.lookupTableColumn();
    expect(() => meta.createGate("free", (vc) => [vc.queryAdvice(advice, Rotation.cur)])).to.throw(
      CircuitConfigurationError
    );
    expect(() => meta.lookup("free", (vc) => [[vc.queryAdvice(advice, Rotation.cur), table]])).to.throw(
      CircuitConfigurationError
    );
    expect(meta.gates).to.be.deep.eq([]);
    expect(meta.lookups).to.be.deep.eq([]);
  });

  it("reports the highest degree", () => {
    const meta = new ConstraintSystem(Fr);
    const q = meta.selector();
    const a = meta.adviceColumn();
    const b = meta.adviceColumn();
    expect(meta.degree()).to.be.eq(1);
    meta.createGate("cubic", (vc) => [
      vc.querySelector(q).mul(vc.queryAdvice(a, Rotation.cur)).mul(vc.queryAdvice(b, Rotation.next)),
    ]);
    expect(meta.degree()).to.be.eq(3);
    expect(Expression.constant(5).degree()).to.be.eq(0);
  });

  it("evaluates expressions in the field", () => {
    const meta = new ConstraintSystem(Fr);
    const a = meta.adviceColumn();
    const evaluator = { selector: () => 1n, query: () => 2n };
    expect(Expression.query(a, Rotation.cur).scale(3).sub(1).evaluate(Fr, evaluator)).to.be.eq(5n);
    expect(Expression.constant(0).sub(1).evaluate(Fr, evaluator)).to.be.eq(Fr.modulus - 1n);
  });
});

describe("cost helpers", () => {
  it("picks the smallest k whose usable rows fit", () => {
    expect(minimumK(1)).to.be.eq(3);
    expect(minimumK(65530)).to.be.eq(16);
    expect(minimumK(65536)).to.be.eq(17);
  });

  it("lists the first five failures", () => {
    const failures: VerifyFailure[] = Array.from({ length: 6 }, (_, row) => ({
      kind: "gate",
      gate: "g",
      constraint: 0,
      row,
      message: `row ${row}`,
    }));
    const error = new ConstraintViolationError(failures);
    expect(error.message).to.be.eq(
      "circuit is not satisfied: row 0; row 1; row 2; row 3; row 4 (+1 more)"
    );
    expect(error.failures).to.have.length(6);
  });
});
