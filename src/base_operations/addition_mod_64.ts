import { ConstraintSystem } from "../backend/constraint_system";
import { AdviceColumn, Expression, Rotation, Selector } from "../backend/expression";
import { TraceBuilder } from "../backend/trace_builder";
import { AssignedBit, AssignedBlake2bWord, AssignedRow } from "../types/assigned";
import { WORD_MODULUS } from "../types/blake2b_word";
import { Value } from "../value";
import { carryOfSum, sumMod64 } from "../word_functions";
import { Decomposition } from "./decomposition";

export interface AdditionRows {
  lhs: Value<bigint>;
  rhs: Value<bigint>;
  carry: Value<bigint>;
  result: Value<bigint>;
}

/**
 * Addition modulo 2^64 over three rows:
 *
 *   r     lhs
 *   r+1   rhs      carry
 *   r+2   result   (decomposed)
 *
 * with `result = lhs + rhs - carry * 2^64` and a boolean carry.
 */
export class AdditionMod64Config {
  private constructor(
    readonly carry: AdviceColumn,
    readonly qAdd: Selector,
    readonly decomposition: Decomposition
  ) {}

  static configure(
    meta: ConstraintSystem,
    decomposition: Decomposition,
    carry: AdviceColumn
  ): AdditionMod64Config {
    const qAdd = meta.selector();
    const full = decomposition.fullNumber;

    meta.createGate("sum mod 2^64", (vc) => {
      const q = vc.querySelector(qAdd);
      const lhs = vc.queryAdvice(full, Rotation.cur);
      const rhs = vc.queryAdvice(full, Rotation.next);
      const result = vc.queryAdvice(full, 2);
      const carryBit = vc.queryAdvice(carry, Rotation.next);
      return [
        q.mul(result.sub(lhs).sub(rhs).add(carryBit.scale(WORD_MODULUS))),
        q.mul(carryBit.mul(Expression.constant(1).sub(carryBit))),
      ];
    });

    return new AdditionMod64Config(carry, qAdd, decomposition);
  }

  add(trace: TraceBuilder, lhs: AssignedBlake2bWord, rhs: AssignedBlake2bWord): AssignedBlake2bWord {
    return this.addWithCarry(trace, lhs, rhs).result.fullNumber;
  }

  /**
   * When either operand is the full number of the last emitted row, that row
   * becomes row r and only the other operand is copied.
   */
  addWithCarry(
    trace: TraceBuilder,
    lhs: AssignedBlake2bWord,
    rhs: AssignedBlake2bWord
  ): { result: AssignedRow; carry: AssignedBit } {
    const [first, second] =
      !trace.isLastFullNumber(lhs.cell) && trace.isLastFullNumber(rhs.cell) ? [rhs, lhs] : [lhs, rhs];
    const sum = first.bigint().zip(second.bigint());

    const firstRow =
      trace.lastRowHolding(first.cell) ??
      trace.emitRow((offset) => ({
        offset,
        fullNumber: first.cell.copyAdvice("sum lhs", trace.region, this.decomposition.fullNumber, offset),
        limbs: [],
      }));
    trace.region.enableSelector("sum mod 2^64", this.qAdd, firstRow.offset);

    const secondRow = trace.emitRow((offset) => ({
      offset,
      fullNumber: second.cell.copyAdvice("sum rhs", trace.region, this.decomposition.fullNumber, offset),
      limbs: [],
      carry: trace.region.assignAdvice(
        "carry",
        this.carry,
        offset,
        sum.map(([a, b]) => carryOfSum(a, b))
      ),
    }));

    const result = this.decomposition.assignRow(
      trace,
      sum.map(([a, b]) => sumMod64(a, b))
    );
    return { result, carry: new AssignedBit(secondRow.carry) };
  }

  /** Writes the three addition rows from raw values, decomposing the result. */
  populateAdditionRows(trace: TraceBuilder, rows: AdditionRows): AssignedRow {
    const lhsRow = trace.emitRow((offset) => ({
      offset,
      fullNumber: trace.region.assignAdvice("sum lhs", this.decomposition.fullNumber, offset, rows.lhs),
      limbs: [],
    }));
    trace.region.enableSelector("sum mod 2^64", this.qAdd, lhsRow.offset);
    trace.emitRow((offset) => {
      trace.region.assignAdvice("carry", this.carry, offset, rows.carry);
      return {
        offset,
        fullNumber: trace.region.assignAdvice("sum rhs", this.decomposition.fullNumber, offset, rows.rhs),
        limbs: [],
      };
    });
    return this.decomposition.assignRow(trace, rows.result);
  }
}
