import { Assignment, BLINDING_ROWS } from "../backend/assignment";
import { Circuit } from "../backend/circuit";
import { ConstraintSystem } from "../backend/constraint_system";
import { Fr, PrimeField } from "../field_element";

// Large enough that measuring never runs out of rows.
const MEASURE_K = 24;

export interface CircuitCost {
  rows: number;
  tableRows: number;
  adviceColumns: number;
  fixedColumns: number;
  instanceColumns: number;
  selectors: number;
  gates: number;
  lookups: number;
  copyConstraints: number;
  maxDegree: number;
  /** Smallest k whose usable rows fit both the trace and the tables. */
  minimumK: number;
}

export function minimumK(rows: number): number {
  let k = 1;
  while (2 ** k - BLINDING_ROWS < rows) {
    k++;
  }
  return k;
}

/** Synthesizes the circuit without witnesses and reports its shape. */
export function measureCircuit<Config>(circuit: Circuit<Config>, field: PrimeField = Fr): CircuitCost {
  const shape = circuit.withoutWitnesses();
  const cs = new ConstraintSystem(field);
  const config = shape.configure(cs);
  const assignment = new Assignment(cs, {
    k: MEASURE_K,
    instances: Array.from({ length: cs.numInstanceColumns }, () => []),
    requireKnown: false,
  });
  shape.synthesize(config, assignment);
  return {
    rows: assignment.usedRows,
    tableRows: assignment.tableRows,
    adviceColumns: cs.numAdviceColumns,
    fixedColumns: cs.numFixedColumns,
    instanceColumns: cs.numInstanceColumns,
    selectors: cs.numSelectors,
    gates: cs.gates.length,
    lookups: cs.lookups.length,
    copyConstraints: assignment.copies.length,
    maxDegree: cs.degree(),
    minimumK: minimumK(Math.max(assignment.usedRows, assignment.tableRows)),
  };
}

export function formatCost(cost: CircuitCost): string {
  return [
    `rows: ${cost.rows}`,
    `table rows: ${cost.tableRows}`,
    `columns: ${cost.adviceColumns} advice, ${cost.fixedColumns} fixed, ${cost.instanceColumns} instance`,
    `selectors: ${cost.selectors}`,
    `gates: ${cost.gates} (max degree ${cost.maxDegree})`,
    `lookups: ${cost.lookups}`,
    `copy constraints: ${cost.copyConstraints}`,
    `minimum k: ${cost.minimumK}`,
  ].join("\n");
}
