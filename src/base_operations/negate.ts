import { ConstraintSystem } from "../backend/constraint_system";
import { AdviceColumn, Expression, Rotation, Selector } from "../backend/expression";
import { TraceBuilder } from "../backend/trace_builder";
import { AssignedBlake2bWord } from "../types/assigned";
import { WORD_MASK } from "../types/blake2b_word";
import { Value } from "../value";
import { negate64 } from "../word_functions";

/**
 * Bitwise not of a 64-bit word: `(2^64 - 1) - value - notValue = 0`, with the
 * value at row r and the result at row r+1. The input must be range checked
 * elsewhere.
 */
export class NegateConfig {
  private constructor(readonly fullNumber: AdviceColumn, readonly qNegate: Selector) {}

  static configure(meta: ConstraintSystem, fullNumber: AdviceColumn): NegateConfig {
    const qNegate = meta.selector();
    meta.createGate("negate", (vc) => {
      const q = vc.querySelector(qNegate);
      const value = vc.queryAdvice(fullNumber, Rotation.cur);
      const notValue = vc.queryAdvice(fullNumber, Rotation.next);
      return [q.mul(Expression.constant(WORD_MASK).sub(value).sub(notValue))];
    });
    return new NegateConfig(fullNumber, qNegate);
  }

  not(trace: TraceBuilder, input: AssignedBlake2bWord): AssignedBlake2bWord {
    const inputRow =
      trace.lastRowHolding(input.cell) ??
      trace.emitRow((offset) => ({
        offset,
        fullNumber: input.cell.copyAdvice("negate input", trace.region, this.fullNumber, offset),
        limbs: [],
      }));
    trace.region.enableSelector("negate", this.qNegate, inputRow.offset);
    const result = trace.emitRow((offset) => ({
      offset,
      fullNumber: trace.region.assignAdvice(
        "negated",
        this.fullNumber,
        offset,
        input.bigint().map(negate64)
      ),
      limbs: [],
    }));
    return new AssignedBlake2bWord(result.fullNumber);
  }

  /** Writes an input row and a result row from raw values. */
  populateNegateRows(trace: TraceBuilder, value: Value<bigint>, notValue: Value<bigint>): void {
    const inputRow = trace.emitRow((offset) => ({
      offset,
      fullNumber: trace.region.assignAdvice("negate input", this.fullNumber, offset, value),
      limbs: [],
    }));
    trace.region.enableSelector("negate", this.qNegate, inputRow.offset);
    trace.emitRow((offset) => ({
      offset,
      fullNumber: trace.region.assignAdvice("negated", this.fullNumber, offset, notValue),
      limbs: [],
    }));
  }
}
