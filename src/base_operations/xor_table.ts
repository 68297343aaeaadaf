import { Layouter } from "../backend/circuit";
import { ConstraintSystem } from "../backend/constraint_system";
import { Rotation, Selector, TableColumn } from "../backend/expression";
import { TraceBuilder } from "../backend/trace_builder";
import { AssignedRow } from "../types/assigned";
import { Value } from "../value";
import { Decompose8Config } from "./decompose_8";
import { XorConfig } from "./xor";

/**
 * XOR through a table of every byte pair. Rows r, r+1 and r+2 hold the
 * decomposed operands and result; each limb column looks up
 * `(limb[r], limb[r+1], limb[r+2])` in `(left, right, left ^ right)`.
 */
export class XorTableConfig extends XorConfig {
  private tablePopulated = false;

  private constructor(
    decomposition: Decompose8Config,
    readonly qXor: Selector,
    readonly tableLeft: TableColumn,
    readonly tableRight: TableColumn,
    readonly tableResult: TableColumn
  ) {
    super(decomposition);
  }

  static configure(meta: ConstraintSystem, decomposition: Decompose8Config): XorTableConfig {
    const qXor = meta.selector();
    const tableLeft = meta.lookupTableColumn();
    const tableRight = meta.lookupTableColumn();
    const tableResult = meta.lookupTableColumn();

    decomposition.limbs.forEach((limb, i) => {
      meta.lookup(`xor limb ${i}`, (vc) => {
        const q = vc.querySelector(qXor);
        return [
          [q.mul(vc.queryAdvice(limb, Rotation.cur)), tableLeft],
          [q.mul(vc.queryAdvice(limb, Rotation.next)), tableRight],
          [q.mul(vc.queryAdvice(limb, 2)), tableResult],
        ];
      });
    });

    return new XorTableConfig(decomposition, qXor, tableLeft, tableRight, tableResult);
  }

  populateXorLookupTable(layouter: Layouter): void {
    if (this.tablePopulated) {
      return;
    }
    layouter.assignTable("xor table", (table) => {
      let row = 0;
      for (let left = 0; left < 256; left++) {
        for (let right = 0; right < 256; right++) {
          table.assignCell("left", this.tableLeft, row, BigInt(left));
          table.assignCell("right", this.tableRight, row, BigInt(right));
          table.assignCell("result", this.tableResult, row, BigInt(left ^ right));
          row++;
        }
      }
    });
    this.tablePopulated = true;
  }

  protected emitXor(
    trace: TraceBuilder,
    first: AssignedRow,
    _second: AssignedRow,
    result: Value<bigint>
  ): AssignedRow {
    trace.region.enableSelector("xor", this.qXor, first.offset);
    return this.decomposition.assignRow(trace, result);
  }
}
