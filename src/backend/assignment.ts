import { SynthesisError } from "../errors";
import { FieldElement } from "../field_element";
import { Value } from "../value";
import { AssignedCell, Cell, Layouter, Region, Table } from "./circuit";
import { ConstraintSystem } from "./constraint_system";
import { Column, InstanceColumn, Selector, TableColumn } from "./expression";

// Rows at the end of the trace reserved for blinding by a proving backend.
export const BLINDING_ROWS = 6;

export function usableRows(k: number): number {
  return 2 ** k - BLINDING_ROWS;
}

// `null` marks a cell assigned with an unknown value.
type CellSlot = FieldElement | null | undefined;

export interface AssignmentOptions {
  k: number;
  instances: readonly (readonly FieldElement[])[];
  /** Reject unknown witness values; set when checking a concrete trace. */
  requireKnown: boolean;
}

function describeCell(cell: Cell): string {
  return `${cell.column.kind}[${cell.column.index}]@${cell.row}`;
}

/**
 * In-memory trace filled by a circuit's synthesis. Regions are laid out one
 * after another, each starting below every row used before it.
 */
export class Assignment implements Layouter {
  readonly k: number;
  readonly advice: CellSlot[][];
  readonly fixed: CellSlot[][];
  readonly selectors: Set<number>[];
  readonly tables = new Map<number, FieldElement[]>();
  readonly copies: Array<[Cell, Cell]> = [];
  readonly instances: readonly (readonly FieldElement[])[];

  private nextRegionRow = 0;
  private maxRow = -1;
  private readonly requireKnown: boolean;

  constructor(readonly cs: ConstraintSystem, options: AssignmentOptions) {
    this.k = options.k;
    this.requireKnown = options.requireKnown;
    this.advice = Array.from({ length: cs.numAdviceColumns }, () => []);
    this.fixed = Array.from({ length: cs.numFixedColumns }, () => []);
    this.selectors = Array.from({ length: cs.numSelectors }, () => new Set<number>());
    if (options.instances.length !== cs.numInstanceColumns) {
      throw new SynthesisError(
        `expected ${cs.numInstanceColumns} instance columns, got ${options.instances.length}`
      );
    }
    options.instances.forEach((column, i) => {
      if (column.length > usableRows(this.k)) {
        throw new SynthesisError(`instance column ${i} has more values than usable rows`);
      }
    });
    this.instances = options.instances;
  }

  /** Number of rows used by regions, tables excluded. */
  get usedRows(): number {
    return this.maxRow + 1;
  }

  get tableRows(): number {
    return Math.max(0, ...[...this.tables.values()].map((t) => t.length));
  }

  assignRegion<T>(name: string, assignment: (region: Region) => T): T {
    const start = this.nextRegionRow;
    const result = assignment(this.region(name, start));
    this.nextRegionRow = Math.max(start, this.maxRow + 1);
    return result;
  }

  assignTable(name: string, assignment: (table: Table) => void): void {
    const touched = new Set<number>();
    assignment({
      assignCell: (annotation, column, offset, value) => {
        this.assignTableCell(name, annotation, column, offset, value, touched);
      },
    });
  }

  constrainInstance(cell: Cell, column: InstanceColumn, row: number): void {
    this.checkRow(row, `instance binding to row ${row}`);
    this.addCopy(cell, { column, row });
  }

  cellValue(cell: Cell): FieldElement {
    const column = cell.column;
    switch (column.kind) {
      case "advice":
        return this.advice[column.index][cell.row] ?? 0n;
      case "fixed":
        return this.fixed[column.index][cell.row] ?? 0n;
      case "instance":
        return this.instances[column.index][cell.row] ?? 0n;
    }
  }

  isSelectorEnabled(selector: Selector, row: number): boolean {
    return this.selectors[selector.index].has(row);
  }

  private region(name: string, start: number): Region {
    return {
      assignAdvice: (annotation, column, offset, value) =>
        this.assignCell(name, annotation, column, this.advice, start + offset, value),
      assignFixed: (annotation, column, offset, value) =>
        this.assignCell(name, annotation, column, this.fixed, start + offset, Value.known(value)),
      enableSelector: (annotation, selector, offset) => {
        const row = start + offset;
        this.checkRow(row, `${name}/${annotation}`);
        this.selectors[selector.index].add(row);
        this.touch(row);
      },
      constrainEqual: (left, right) => this.addCopy(left, right),
    };
  }

  private assignCell(
    region: string,
    annotation: string,
    column: Column,
    storage: CellSlot[][],
    row: number,
    value: Value<FieldElement>
  ): AssignedCell {
    const cell: Cell = { column, row };
    this.checkRow(row, `${region}/${annotation}`);
    const slots = storage[column.index];
    if (slots === undefined) {
      throw new SynthesisError(`${region}/${annotation}: unknown column ${column.kind}[${column.index}]`);
    }
    if (slots[row] !== undefined) {
      throw new SynthesisError(`${region}/${annotation}: cell ${describeCell(cell)} assigned twice`);
    }
    const known = value.peek();
    if (known === undefined && this.requireKnown) {
      throw new SynthesisError(`${region}/${annotation}: unknown witness at ${describeCell(cell)}`);
    }
    const reduced = known === undefined ? undefined : this.cs.field.reduce(known);
    slots[row] = reduced ?? null;
    this.touch(row);
    return new AssignedCell(reduced === undefined ? Value.unknown() : Value.known(reduced), cell);
  }

  private assignTableCell(
    table: string,
    annotation: string,
    column: TableColumn,
    offset: number,
    value: FieldElement,
    touched: Set<number>
  ): void {
    let values = this.tables.get(column.index);
    if (values !== undefined && !touched.has(column.index)) {
      throw new SynthesisError(`${table}/${annotation}: table column ${column.index} assigned twice`);
    }
    if (values === undefined) {
      values = [];
      this.tables.set(column.index, values);
    }
    touched.add(column.index);
    if (offset !== values.length) {
      throw new SynthesisError(`${table}/${annotation}: table rows must be assigned in order`);
    }
    this.checkRow(offset, `${table}/${annotation}`);
    values.push(this.cs.field.reduce(value));
  }

  private addCopy(left: Cell, right: Cell): void {
    for (const cell of [left, right]) {
      if (!this.cs.isEqualityEnabled(cell.column)) {
        throw new SynthesisError(
          `column ${cell.column.kind}[${cell.column.index}] is not enabled for equality`
        );
      }
    }
    this.copies.push([left, right]);
  }

  private checkRow(row: number, what: string): void {
    if (row < 0 || row >= usableRows(this.k)) {
      throw new SynthesisError(
        `${what}: row ${row} is outside the ${usableRows(this.k)} usable rows of k = ${this.k}`
      );
    }
  }

  private touch(row: number): void {
    if (row > this.maxRow) {
      this.maxRow = row;
    }
  }
}
