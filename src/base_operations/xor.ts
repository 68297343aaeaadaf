import { Layouter } from "../backend/circuit";
import { TraceBuilder } from "../backend/trace_builder";
import { AssignedBlake2bWord, AssignedRow } from "../types/assigned";
import { Value } from "../value";
import { Decompose8Config } from "./decompose_8";

export interface XorInstructions {
  populateXorLookupTable(layouter: Layouter): void;
  xor(trace: TraceBuilder, lhs: AssignedBlake2bWord, rhs: AssignedBlake2bWord): AssignedBlake2bWord;
  xorAndReturnFullRow(trace: TraceBuilder, lhs: AssignedBlake2bWord, rhs: AssignedBlake2bWord): AssignedRow;
}

/**
 * Shared operand handling of the XOR strategies. Both operands and the
 * result sit in rows with 8-bit limbs; when either operand is the last row
 * emitted and that row is already byte decomposed, it is reused as the
 * first operand row.
 */
export abstract class XorConfig implements XorInstructions {
  protected constructor(readonly decomposition: Decompose8Config) {}

  abstract populateXorLookupTable(layouter: Layouter): void;

  /** Emits the rows that follow the two operand rows and returns the result row. */
  protected abstract emitXor(
    trace: TraceBuilder,
    first: AssignedRow,
    second: AssignedRow,
    result: Value<bigint>
  ): AssignedRow;

  xor(trace: TraceBuilder, lhs: AssignedBlake2bWord, rhs: AssignedBlake2bWord): AssignedBlake2bWord {
    return this.xorAndReturnFullRow(trace, lhs, rhs).fullNumber;
  }

  xorAndReturnFullRow(trace: TraceBuilder, lhs: AssignedBlake2bWord, rhs: AssignedBlake2bWord): AssignedRow {
    const recycledLhs = trace.lastDecomposedRow(lhs.cell, 8);
    const recycledRhs = recycledLhs === undefined ? trace.lastDecomposedRow(rhs.cell, 8) : undefined;

    let first: AssignedRow;
    let other: AssignedBlake2bWord;
    if (recycledLhs !== undefined) {
      first = AssignedRow.fromEmitted(recycledLhs);
      other = rhs;
    } else if (recycledRhs !== undefined) {
      first = AssignedRow.fromEmitted(recycledRhs);
      other = lhs;
    } else {
      first = this.decomposition.assignRowFromCell(trace, lhs.cell);
      other = rhs;
    }
    const second = this.decomposition.assignRowFromCell(trace, other.cell);
    const result = first.fullNumber.bigint().zip(second.fullNumber.bigint()).map(([a, b]) => a ^ b);
    return this.emitXor(trace, first, second, result);
  }

  /** Writes a full XOR from raw values; `result` is taken as given. */
  populateXorRows(
    trace: TraceBuilder,
    lhs: Value<bigint>,
    rhs: Value<bigint>,
    result: Value<bigint>
  ): AssignedRow {
    const first = this.decomposition.assignRow(trace, lhs);
    const second = this.decomposition.assignRow(trace, rhs);
    return this.emitXor(trace, first, second, result);
  }
}
