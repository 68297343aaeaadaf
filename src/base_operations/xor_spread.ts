import { Layouter } from "../backend/circuit";
import { ConstraintSystem } from "../backend/constraint_system";
import { AdviceColumn, Selector, TableColumn } from "../backend/expression";
import { TraceBuilder } from "../backend/trace_builder";
import { AssignedRow } from "../types/assigned";
import { Value } from "../value";
import { spread } from "../word_functions";
import { Decompose8Config } from "./decompose_8";
import { XorConfig } from "./xor";

// Window rows, relative to the first operand row.
const LHS = 0;
const RHS = 1;
const SPREAD_LHS = 2;
const SPREAD_RHS = 3;
const SPREAD_RESULT = 4;
const RESULT = 5;

// Grid columns: 0 is the full number, 1..8 the limbs, 9 the extra column.
const EXTRA = 9;

/** Where z_i sits as (row, column): cells the rest of the window leaves free. */
const Z_POSITIONS: ReadonlyArray<readonly [number, number]> = [
  [SPREAD_LHS, 0],
  [SPREAD_RHS, 0],
  [SPREAD_RESULT, 0],
  [RHS, EXTRA],
  [SPREAD_LHS, EXTRA],
  [SPREAD_RHS, EXTRA],
  [SPREAD_RESULT, EXTRA],
  [RESULT, EXTRA],
];

// Pairs of rows holding a byte and its spread form.
const SPREAD_PAIRS: ReadonlyArray<readonly [number, number]> = [
  [LHS, SPREAD_LHS],
  [RHS, SPREAD_RHS],
  [RESULT, SPREAD_RESULT],
];

function spreadOf(value: bigint): bigint {
  return BigInt(spread(Number(value)));
}

function bytesOf(value: bigint): bigint[] {
  return Array.from({ length: 8 }, (_, i) => (value >> BigInt(8 * i)) & 0xffn);
}

/**
 * XOR through spread encodings. Spreading moves bit k to bit 2k, so per byte
 *
 *   spread(a) + spread(b) = spread(a ^ b) + 2 * spread(a & b)
 *
 * The window is six rows with the selector on the last one:
 *
 *   0  lhs            decomposed
 *   1  rhs            decomposed        z3
 *   2  z0  spread(lhs bytes)            z4
 *   3  z1  spread(rhs bytes)            z5
 *   4  z2  spread(result bytes)         z6
 *   5  result         decomposed        z7
 *
 * Each (byte, spread) pair is looked up in the spread table and each z_i in
 * its spread column, so `spread(a) + spread(b) - spread(c) - 2 * z_i = 0`
 * pins `c` to `a ^ b`.
 */
export class XorSpreadConfig extends XorConfig {
  private tablePopulated = false;

  private constructor(
    decomposition: Decompose8Config,
    readonly extra: AdviceColumn,
    readonly qXor: Selector,
    readonly tableValue: TableColumn,
    readonly tableSpread: TableColumn
  ) {
    super(decomposition);
  }

  static configure(
    meta: ConstraintSystem,
    decomposition: Decompose8Config,
    extra: AdviceColumn
  ): XorSpreadConfig {
    const qXor = meta.selector();
    const tableValue = meta.lookupTableColumn();
    const tableSpread = meta.lookupTableColumn();
    const grid = [decomposition.fullNumber, ...decomposition.limbs, extra];
    const rotation = (row: number) => row - RESULT;

    meta.createGate("xor with spread", (vc) => {
      const q = vc.querySelector(qXor);
      const at = (row: number, column: number) => vc.queryAdvice(grid[column], rotation(row));
      return Z_POSITIONS.map(([zRow, zColumn], i) =>
        q.mul(
          at(SPREAD_LHS, i + 1)
            .add(at(SPREAD_RHS, i + 1))
            .sub(at(SPREAD_RESULT, i + 1))
            .sub(at(zRow, zColumn).scale(2))
        )
      );
    });

    decomposition.limbs.forEach((limb, i) => {
      SPREAD_PAIRS.forEach(([byteRow, spreadRow]) => {
        meta.lookup(`spread of limb ${i} in row ${byteRow}`, (vc) => {
          const q = vc.querySelector(qXor);
          return [
            [q.mul(vc.queryAdvice(limb, rotation(byteRow))), tableValue],
            [q.mul(vc.queryAdvice(limb, rotation(spreadRow))), tableSpread],
          ];
        });
      });
    });

    Z_POSITIONS.forEach(([row, column], i) => {
      meta.lookup(`z${i} is a spread value`, (vc) => [
        [vc.querySelector(qXor).mul(vc.queryAdvice(grid[column], rotation(row))), tableSpread],
      ]);
    });

    return new XorSpreadConfig(decomposition, extra, qXor, tableValue, tableSpread);
  }

  populateXorLookupTable(layouter: Layouter): void {
    if (this.tablePopulated) {
      return;
    }
    layouter.assignTable("spread table", (table) => {
      for (let i = 0; i < 256; i++) {
        table.assignCell("value", this.tableValue, i, BigInt(i));
        table.assignCell("spread", this.tableSpread, i, BigInt(spread(i)));
      }
    });
    this.tablePopulated = true;
  }

  protected emitXor(
    trace: TraceBuilder,
    first: AssignedRow,
    second: AssignedRow,
    result: Value<bigint>
  ): AssignedRow {
    const operands = first.fullNumber.bigint().zip(second.fullNumber.bigint());
    const z = operands.map(([a, b]) => bytesOf(a & b).map(spreadOf));
    const zAt = (i: number) => z.map((values) => values[i]);
    const spreadRows: Array<[number, Value<bigint>]> = [
      [SPREAD_LHS, first.fullNumber.bigint()],
      [SPREAD_RHS, second.fullNumber.bigint()],
      [SPREAD_RESULT, result],
    ];
    const zIndexAt = (row: number, column: number) =>
      Z_POSITIONS.findIndex(([r, c]) => r === row && c === column);

    for (const [row, word] of spreadRows) {
      const spreadBytes = word.map((v) => bytesOf(v).map(spreadOf));
      trace.emitRow((offset) => ({
        offset,
        fullNumber: trace.region.assignAdvice(
          `z${zIndexAt(row, 0)}`,
          this.decomposition.fullNumber,
          offset,
          zAt(zIndexAt(row, 0))
        ),
        limbs: this.decomposition.limbs.map((column, i) =>
          trace.region.assignAdvice(
            `spread limb ${i}`,
            column,
            offset,
            spreadBytes.map((values) => values[i])
          )
        ),
      }));
    }

    const resultRow = this.decomposition.assignRow(trace, result);
    trace.region.enableSelector("xor with spread", this.qXor, resultRow.offset);

    Z_POSITIONS.forEach(([row, column], i) => {
      if (column === EXTRA) {
        trace.region.assignAdvice(`z${i}`, this.extra, first.offset + row, zAt(i));
      }
    });
    return resultRow;
  }
}
