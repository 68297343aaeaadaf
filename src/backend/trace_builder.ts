import { FieldElement } from "../field_element";
import { AssignedNative, Region, sameCell } from "./circuit";
import { FixedColumn } from "./expression";

export type LimbBits = 8 | 16;

/**
 * A row written through the builder. `limbBits` is set when the row's full
 * number is decomposed (its limbs sit in the same row and the decomposition
 * selector is enabled).
 */
export interface EmittedRow {
  readonly offset: number;
  readonly fullNumber: AssignedNative;
  readonly limbs: readonly AssignedNative[];
  readonly limbBits?: LimbBits;
}

/**
 * Owns the row cursor of a region. Gadgets emit rows strictly in order and
 * consult `lastRow` to decide whether an operand can reuse the previous row.
 */
export class TraceBuilder {
  private cursor: number;
  private constantsCursor = 0;
  private last: EmittedRow | undefined;

  constructor(readonly region: Region, startOffset = 0) {
    this.cursor = startOffset;
  }

  /** Offset the next emitted row will get. */
  get nextRow(): number {
    return this.cursor;
  }

  get lastRow(): EmittedRow | undefined {
    return this.last;
  }

  emitRow<R extends EmittedRow>(build: (offset: number) => R): R {
    const row = build(this.cursor);
    this.last = row;
    this.cursor += 1;
    return row;
  }

  /** The last emitted row, if `cell` is its full number. */
  lastRowHolding(cell: AssignedNative): EmittedRow | undefined {
    const last = this.last;
    return last !== undefined && sameCell(last.fullNumber.cell, cell.cell) ? last : undefined;
  }

  isLastFullNumber(cell: AssignedNative): boolean {
    return this.lastRowHolding(cell) !== undefined;
  }

  /** The last row, if its full number is `cell` and it carries limbs of `bits`. */
  lastDecomposedRow(cell: AssignedNative, bits: LimbBits): EmittedRow | undefined {
    const last = this.lastRowHolding(cell);
    return last !== undefined && last.limbBits === bits ? last : undefined;
  }

  /** Places a constant in the next free row of a fixed column. */
  assignConstant(annotation: string, column: FixedColumn, value: FieldElement): AssignedNative {
    return this.region.assignFixed(annotation, column, this.constantsCursor++, value);
  }
}
