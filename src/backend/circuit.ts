import { FieldElement } from "../field_element";
import { Value } from "../value";
import { ConstraintSystem } from "./constraint_system";
import {
  AdviceColumn,
  Column,
  FixedColumn,
  InstanceColumn,
  Selector,
  TableColumn,
} from "./expression";

/** Absolute position of a cell in the trace. */
export interface Cell {
  readonly column: Column;
  readonly row: number;
}

export function sameCell(a: Cell, b: Cell): boolean {
  return a.row === b.row && a.column.kind === b.column.kind && a.column.index === b.column.index;
}

export class AssignedCell {
  constructor(readonly value: Value<FieldElement>, readonly cell: Cell) {}

  /** Copies this cell into an advice cell of `region` and constrains both equal. */
  copyAdvice(
    annotation: string,
    region: Region,
    column: AdviceColumn,
    offset: number
  ): AssignedCell {
    const copied = region.assignAdvice(annotation, column, offset, this.value);
    region.constrainEqual(this.cell, copied.cell);
    return copied;
  }
}

export type AssignedNative = AssignedCell;

/** A contiguous block of rows; offsets are relative to its first row. */
export interface Region {
  assignAdvice(
    annotation: string,
    column: AdviceColumn,
    offset: number,
    value: Value<FieldElement>
  ): AssignedCell;
  assignFixed(
    annotation: string,
    column: FixedColumn,
    offset: number,
    value: FieldElement
  ): AssignedCell;
  enableSelector(annotation: string, selector: Selector, offset: number): void;
  constrainEqual(left: Cell, right: Cell): void;
}

export interface Table {
  assignCell(annotation: string, column: TableColumn, offset: number, value: FieldElement): void;
}

export interface Layouter {
  assignRegion<T>(name: string, assignment: (region: Region) => T): T;
  assignTable(name: string, assignment: (table: Table) => void): void;
  constrainInstance(cell: Cell, column: InstanceColumn, row: number): void;
}

export interface Circuit<Config> {
  /** The same circuit with every witness replaced by an unknown value. */
  withoutWitnesses(): Circuit<Config>;
  configure(meta: ConstraintSystem): Config;
  synthesize(config: Config, layouter: Layouter): void;
}
