import { ConstraintSystem } from "../backend/constraint_system";
import { AdviceColumn, Selector, TableColumn } from "../backend/expression";
import { LimbDecomposition } from "./decomposition";

/** Words as 4 little-endian 16-bit limbs, placed in the first 4 limb columns. */
export class Decompose16Config extends LimbDecomposition {
  private constructor(
    fullNumber: AdviceColumn,
    limbs: readonly AdviceColumn[],
    qDecompose: Selector,
    rangeTable: TableColumn
  ) {
    super(fullNumber, limbs, qDecompose, rangeTable, 16);
  }

  static configure(
    meta: ConstraintSystem,
    fullNumber: AdviceColumn,
    limbs: readonly AdviceColumn[]
  ): Decompose16Config {
    const used = limbs.slice(0, 4);
    const { qDecompose, rangeTable } = LimbDecomposition.configureGate(meta, fullNumber, used, 16);
    return new Decompose16Config(fullNumber, used, qDecompose, rangeTable);
  }
}
