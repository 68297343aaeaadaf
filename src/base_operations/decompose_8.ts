import { ConstraintSystem } from "../backend/constraint_system";
import { AdviceColumn, Selector, TableColumn } from "../backend/expression";
import { TraceBuilder } from "../backend/trace_builder";
import { AssignedRow } from "../types/assigned";
import { Value } from "../value";
import { LimbDecomposition } from "./decomposition";

/** Words as 8 little-endian bytes, each checked against a 256-row table. */
export class Decompose8Config extends LimbDecomposition {
  private constructor(
    fullNumber: AdviceColumn,
    limbs: readonly AdviceColumn[],
    qDecompose: Selector,
    rangeTable: TableColumn
  ) {
    super(fullNumber, limbs, qDecompose, rangeTable, 8);
  }

  static configure(
    meta: ConstraintSystem,
    fullNumber: AdviceColumn,
    limbs: readonly AdviceColumn[]
  ): Decompose8Config {
    const { qDecompose, rangeTable } = LimbDecomposition.configureGate(meta, fullNumber, limbs, 8);
    return new Decompose8Config(fullNumber, limbs, qDecompose, rangeTable);
  }

  /**
   * Assigns a word given as 8 byte witnesses, least significant first. The
   * bytes go in as they are; out of range values fail the range lookups.
   */
  assignRowFromBytes(trace: TraceBuilder, bytes: readonly Value<bigint>[]): AssignedRow {
    if (bytes.length !== 8) {
      throw new RangeError(`a word takes 8 bytes, got ${bytes.length}`);
    }
    const full = Value.all(bytes).map((values) => this.composeFromLimbs(values));
    const row = trace.emitRow((offset) => {
      trace.region.enableSelector("decompose", this.qDecompose, offset);
      const fullNumber = trace.region.assignAdvice("full number", this.fullNumber, offset, full);
      const limbs = this.limbs.map((column, i) =>
        trace.region.assignAdvice(`byte ${i}`, column, offset, bytes[i])
      );
      return { offset, fullNumber, limbs, limbBits: this.limbBits };
    });
    return AssignedRow.fromEmitted(row);
  }
}
