import { AssignedNative, Layouter } from "../backend/circuit";
import { ConstraintSystem } from "../backend/constraint_system";
import { AdviceColumn, Expression, Rotation, Selector, TableColumn } from "../backend/expression";
import { EmittedRow, LimbBits, TraceBuilder } from "../backend/trace_builder";
import { CircuitConfigurationError } from "../errors";
import { AssignedRow } from "../types/assigned";
import { Value } from "../value";
import { composeLimbs, decomposeLimbs } from "../word_functions";

/**
 * A row layout where the full-number cell equals the little-endian weighted
 * sum of its limbs, and every limb is range checked by a lookup.
 */
export interface Decomposition {
  readonly limbBits: LimbBits;
  readonly fullNumber: AdviceColumn;
  readonly limbs: readonly AdviceColumn[];
  readonly qDecompose: Selector;

  populateLookupTable(layouter: Layouter): void;
  assignRow(trace: TraceBuilder, value: Value<bigint>): AssignedRow;
  assignRowFromCell(trace: TraceBuilder, cell: AssignedNative): AssignedRow;
  populateRowFromValues(
    trace: TraceBuilder,
    values: readonly Value<bigint>[],
    checkDecomposition: boolean
  ): EmittedRow;
}

export abstract class LimbDecomposition implements Decomposition {
  private tablePopulated = false;

  protected constructor(
    readonly fullNumber: AdviceColumn,
    readonly limbs: readonly AdviceColumn[],
    readonly qDecompose: Selector,
    readonly rangeTable: TableColumn,
    readonly limbBits: LimbBits
  ) {}

  protected static configureGate(
    meta: ConstraintSystem,
    fullNumber: AdviceColumn,
    limbs: readonly AdviceColumn[],
    limbBits: LimbBits
  ): { qDecompose: Selector; rangeTable: TableColumn } {
    if (limbs.length * limbBits !== 64) {
      throw new CircuitConfigurationError(
        `${limbs.length} limbs of ${limbBits} bits do not make a 64-bit word`
      );
    }
    const qDecompose = meta.selector();
    const rangeTable = meta.lookupTableColumn();

    meta.createGate(`decompose in ${limbs.length} limbs`, (vc) => {
      const q = vc.querySelector(qDecompose);
      const full = vc.queryAdvice(fullNumber, Rotation.cur);
      const composed = Expression.sum(
        limbs.map((limb, i) => vc.queryAdvice(limb, Rotation.cur).scale(1n << BigInt(i * limbBits)))
      );
      return [q.mul(full.sub(composed))];
    });

    limbs.forEach((limb, i) => {
      meta.lookup(`range check ${limbBits} bit limb ${i}`, (vc) => [
        [vc.querySelector(qDecompose).mul(vc.queryAdvice(limb, Rotation.cur)), rangeTable],
      ]);
    });

    return { qDecompose, rangeTable };
  }

  populateLookupTable(layouter: Layouter): void {
    if (this.tablePopulated) {
      return;
    }
    const size = 1 << this.limbBits;
    layouter.assignTable(`range check ${this.limbBits} bits`, (table) => {
      for (let i = 0; i < size; i++) {
        table.assignCell("range value", this.rangeTable, i, BigInt(i));
      }
    });
    this.tablePopulated = true;
  }

  assignRow(trace: TraceBuilder, value: Value<bigint>): AssignedRow {
    const row = trace.emitRow((offset) => {
      trace.region.enableSelector("decompose", this.qDecompose, offset);
      const fullNumber = trace.region.assignAdvice("full number", this.fullNumber, offset, value);
      return { offset, fullNumber, limbs: this.assignLimbs(trace, offset, value), limbBits: this.limbBits };
    });
    return AssignedRow.fromEmitted(row);
  }

  assignRowFromCell(trace: TraceBuilder, cell: AssignedNative): AssignedRow {
    const row = trace.emitRow((offset) => {
      trace.region.enableSelector("decompose", this.qDecompose, offset);
      const fullNumber = cell.copyAdvice("full number", trace.region, this.fullNumber, offset);
      return {
        offset,
        fullNumber,
        limbs: this.assignLimbs(trace, offset, cell.value),
        limbBits: this.limbBits,
      };
    });
    return AssignedRow.fromEmitted(row);
  }

  /**
   * Writes `values` (full number first, then one value per limb) as they are.
   * The decomposition constraint is only enabled when asked for.
   */
  populateRowFromValues(
    trace: TraceBuilder,
    values: readonly Value<bigint>[],
    checkDecomposition: boolean
  ): EmittedRow {
    if (values.length !== this.limbs.length + 1) {
      throw new RangeError(`expected ${this.limbs.length + 1} values, got ${values.length}`);
    }
    return trace.emitRow((offset) => {
      if (checkDecomposition) {
        trace.region.enableSelector("decompose", this.qDecompose, offset);
      }
      const fullNumber = trace.region.assignAdvice("full number", this.fullNumber, offset, values[0]);
      const limbs = this.limbs.map((column, i) =>
        trace.region.assignAdvice(`limb ${i}`, column, offset, values[i + 1])
      );
      return { offset, fullNumber, limbs, limbBits: checkDecomposition ? this.limbBits : undefined };
    });
  }

  protected assignLimbs(trace: TraceBuilder, offset: number, value: Value<bigint>): AssignedNative[] {
    const limbValues = value.map((v) => decomposeLimbs(v, this.limbs.length, this.limbBits));
    return this.limbs.map((column, i) =>
      trace.region.assignAdvice(`limb ${i}`, column, offset, limbValues.map((limbs) => limbs[i]))
    );
  }

  protected composeFromLimbs(limbs: readonly bigint[]): bigint {
    return composeLimbs(limbs, this.limbBits);
  }
}
