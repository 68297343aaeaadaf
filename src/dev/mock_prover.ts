import { Assignment } from "../backend/assignment";
import { Cell, Circuit } from "../backend/circuit";
import { ConstraintSystem, Lookup } from "../backend/constraint_system";
import { Column, ExpressionEvaluator, Selector, TableColumn } from "../backend/expression";
import { ConstraintViolationError, SynthesisError } from "../errors";
import { FieldElement, Fr, PrimeField } from "../field_element";
import { log } from "../logger";

export type VerifyFailure =
  | { kind: "gate"; gate: string; constraint: number; row: number; message: string }
  | { kind: "lookup"; lookup: string; row: number; values: FieldElement[]; message: string }
  | { kind: "permutation"; left: Cell; right: Cell; message: string }
  | { kind: "instance"; cell: Cell; instance: Cell; message: string };

function describe(cell: Cell): string {
  return `${cell.column.kind}[${cell.column.index}]@${cell.row}`;
}

/**
 * Synthesizes a circuit against concrete witnesses and public inputs and
 * checks every gate, lookup and copy constraint directly on the trace.
 */
export class MockProver {
  private constructor(readonly cs: ConstraintSystem, readonly assignment: Assignment) {}

  static run<Config>(
    k: number,
    circuit: Circuit<Config>,
    instances: readonly (readonly FieldElement[])[],
    field: PrimeField = Fr
  ): MockProver {
    const cs = new ConstraintSystem(field);
    const config = circuit.configure(cs);
    const assignment = new Assignment(cs, {
      k,
      instances: instances.map((column) => column.map((v) => field.reduce(v))),
      requireKnown: true,
    });
    circuit.synthesize(config, assignment);
    log.debug("[mock-prover]", `synthesized ${assignment.usedRows} rows with k = ${k}`);
    return new MockProver(cs, assignment);
  }

  verify(): VerifyFailure[] {
    const failures = [...this.checkGates(), ...this.checkLookups(), ...this.checkCopies()];
    if (failures.length === 0) {
      log.info("[mock-prover]", "all constraints satisfied");
    } else {
      log.info("[mock-prover]", `${failures.length} constraint failures`);
    }
    return failures;
  }

  /** Throws `ConstraintViolationError` unless every constraint holds. */
  assertSatisfied(): void {
    const failures = this.verify();
    if (failures.length > 0) {
      throw new ConstraintViolationError(failures);
    }
  }

  private evaluatorAt(row: number): ExpressionEvaluator {
    return {
      selector: (selector: Selector) => (this.assignment.isSelectorEnabled(selector, row) ? 1n : 0n),
      query: (column: Column, rotation: number) =>
        this.assignment.cellValue({ column, row: row + rotation }),
    };
  }

  private activeRows(selectors: readonly Selector[]): number[] {
    const rows = new Set<number>();
    selectors.forEach((s) => this.assignment.selectors[s.index].forEach((row) => rows.add(row)));
    return [...rows].sort((a, b) => a - b);
  }

  private checkGates(): VerifyFailure[] {
    const field = this.cs.field;
    const failures: VerifyFailure[] = [];
    for (const gate of this.cs.gates) {
      for (const row of this.activeRows(gate.selectors)) {
        const evaluator = this.evaluatorAt(row);
        gate.polys.forEach((poly, constraint) => {
          if (poly.evaluate(field, evaluator) !== 0n) {
            failures.push({
              kind: "gate",
              gate: gate.name,
              constraint,
              row,
              message: `gate "${gate.name}" constraint ${constraint} is not satisfied at row ${row}`,
            });
          }
        });
      }
    }
    return failures;
  }

  private checkLookups(): VerifyFailure[] {
    const field = this.cs.field;
    const tableCache = new Map<string, Set<string>>();
    const failures: VerifyFailure[] = [];
    for (const lookup of this.cs.lookups) {
      const rows = this.activeRows(lookup.selectors);
      if (rows.length === 0) {
        continue;
      }
      const key = lookup.tableColumns.map((c) => c.index).join(",");
      let table = tableCache.get(key);
      if (table === undefined) {
        table = this.tableRows(lookup);
        tableCache.set(key, table);
      }
      for (const row of rows) {
        const evaluator = this.evaluatorAt(row);
        const values = lookup.inputs.map((input) => input.evaluate(field, evaluator));
        if (!table.has(values.join(","))) {
          failures.push({
            kind: "lookup",
            lookup: lookup.name,
            row,
            values,
            message: `lookup "${lookup.name}" input (${values.join(", ")}) at row ${row} is not in the table`,
          });
        }
      }
    }
    return failures;
  }

  private tableRows(lookup: Lookup): Set<string> {
    const columns = lookup.tableColumns.map((column: TableColumn) => {
      const values = this.assignment.tables.get(column.index);
      if (values === undefined) {
        throw new SynthesisError(`lookup "${lookup.name}" uses table column ${column.index}, which was never assigned`);
      }
      return values;
    });
    const length = columns[0].length;
    if (columns.some((c) => c.length !== length)) {
      throw new SynthesisError(`table columns of lookup "${lookup.name}" have different lengths`);
    }
    const rows = new Set<string>();
    for (let row = 0; row < length; row++) {
      rows.add(columns.map((c) => c[row]).join(","));
    }
    return rows;
  }

  private checkCopies(): VerifyFailure[] {
    const failures: VerifyFailure[] = [];
    for (const [left, right] of this.assignment.copies) {
      const l = this.assignment.cellValue(left);
      const r = this.assignment.cellValue(right);
      if (l === r) {
        continue;
      }
      if (right.column.kind === "instance" || left.column.kind === "instance") {
        const [instance, cell] = right.column.kind === "instance" ? [right, left] : [left, right];
        failures.push({
          kind: "instance",
          cell,
          instance,
          message: `cell ${describe(cell)} does not match public input ${describe(instance)}`,
        });
      } else {
        failures.push({
          kind: "permutation",
          left,
          right,
          message: `cells ${describe(left)} and ${describe(right)} are constrained equal but differ`,
        });
      }
    }
    return failures;
  }
}
