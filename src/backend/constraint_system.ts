import { CircuitConfigurationError } from "../errors";
import { PrimeField } from "../field_element";
import {
  AdviceColumn,
  Column,
  ColumnKind,
  Expression,
  FixedColumn,
  InstanceColumn,
  Selector,
  TableColumn,
} from "./expression";

export interface Gate {
  readonly name: string;
  readonly polys: readonly Expression[];
  readonly selectors: readonly Selector[];
}

export interface Lookup {
  readonly name: string;
  readonly inputs: readonly Expression[];
  readonly tableColumns: readonly TableColumn[];
  readonly selectors: readonly Selector[];
}

/** Query helpers handed to gate and lookup definitions. */
export class VirtualCells {
  querySelector(selector: Selector): Expression {
    return Expression.selector(selector);
  }

  queryAdvice(column: AdviceColumn, rotation: number): Expression {
    return Expression.query(column, rotation);
  }
}

function columnKey(column: Column): string {
  return `${column.kind}:${column.index}`;
}

/**
 * Collects the columns, gates and lookups of a circuit.
 *
 * Every gate polynomial and every lookup must query at least one selector:
 * they are only checked on rows where one of their selectors is enabled.
 */
export class ConstraintSystem {
  readonly field: PrimeField;

  private readonly counts: Record<ColumnKind, number> = { advice: 0, fixed: 0, instance: 0 };
  private selectorCount = 0;
  private tableColumnCount = 0;
  private readonly equality = new Set<string>();
  private readonly gateList: Gate[] = [];
  private readonly lookupList: Lookup[] = [];

  constructor(field: PrimeField) {
    this.field = field;
  }

  adviceColumn(): AdviceColumn {
    return { kind: "advice", index: this.counts.advice++ };
  }

  fixedColumn(): FixedColumn {
    return { kind: "fixed", index: this.counts.fixed++ };
  }

  instanceColumn(): InstanceColumn {
    return { kind: "instance", index: this.counts.instance++ };
  }

  selector(): Selector {
    return { kind: "selector", index: this.selectorCount++ };
  }

  lookupTableColumn(): TableColumn {
    return { kind: "table", index: this.tableColumnCount++ };
  }

  enableEquality(column: Column): void {
    this.equality.add(columnKey(column));
  }

  isEqualityEnabled(column: Column): boolean {
    return this.equality.has(columnKey(column));
  }

  createGate(name: string, define: (meta: VirtualCells) => Expression[]): void {
    const polys = define(new VirtualCells());
    if (polys.length === 0) {
      throw new CircuitConfigurationError(`gate "${name}" has no constraints`);
    }
    const selectors = new Map<number, Selector>();
    polys.forEach((poly, i) => {
      const found = poly.selectors();
      if (found.length === 0) {
        throw new CircuitConfigurationError(
          `constraint ${i} of gate "${name}" does not query a selector`
        );
      }
      found.forEach((s) => selectors.set(s.index, s));
    });
    this.gateList.push({ name, polys, selectors: [...selectors.values()] });
  }

  lookup(
    name: string,
    define: (meta: VirtualCells) => Array<[Expression, TableColumn]>
  ): void {
    const pairs = define(new VirtualCells());
    if (pairs.length === 0) {
      throw new CircuitConfigurationError(`lookup "${name}" has no inputs`);
    }
    const selectors = new Map<number, Selector>();
    pairs.forEach(([input]) => input.selectors().forEach((s) => selectors.set(s.index, s)));
    if (selectors.size === 0) {
      throw new CircuitConfigurationError(`lookup "${name}" does not query a selector`);
    }
    this.lookupList.push({
      name,
      inputs: pairs.map(([input]) => input),
      tableColumns: pairs.map(([, column]) => column),
      selectors: [...selectors.values()],
    });
  }

  get gates(): readonly Gate[] {
    return this.gateList;
  }

  get lookups(): readonly Lookup[] {
    return this.lookupList;
  }

  get numAdviceColumns(): number {
    return this.counts.advice;
  }

  get numFixedColumns(): number {
    return this.counts.fixed;
  }

  get numInstanceColumns(): number {
    return this.counts.instance;
  }

  get numSelectors(): number {
    return this.selectorCount;
  }

  /** Highest degree among gate polynomials and lookup inputs. */
  degree(): number {
    const gateDegrees = this.gateList.flatMap((g) => g.polys.map((p) => p.degree()));
    const lookupDegrees = this.lookupList.flatMap((l) => l.inputs.map((e) => e.degree()));
    return Math.max(1, ...gateDegrees, ...lookupDegrees);
  }
}
