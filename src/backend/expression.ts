import { FieldElement, PrimeField } from "../field_element";

export type ColumnKind = "advice" | "fixed" | "instance";

export interface Column<K extends ColumnKind = ColumnKind> {
  readonly kind: K;
  readonly index: number;
}

export type AdviceColumn = Column<"advice">;
export type FixedColumn = Column<"fixed">;
export type InstanceColumn = Column<"instance">;

export interface Selector {
  readonly kind: "selector";
  readonly index: number;
}

export interface TableColumn {
  readonly kind: "table";
  readonly index: number;
}

// Relative row offsets used by gate queries.
export const Rotation = {
  cur: 0,
  prev: -1,
  next: 1,
} as const;

export type ExpressionNode =
  | { kind: "constant"; value: bigint }
  | { kind: "selector"; selector: Selector }
  | { kind: "query"; column: Column; rotation: number }
  | { kind: "negated"; inner: Expression }
  | { kind: "sum"; lhs: Expression; rhs: Expression }
  | { kind: "product"; lhs: Expression; rhs: Expression }
  | { kind: "scaled"; inner: Expression; factor: bigint };

/** Reads the cells an expression refers to, relative to the row it is evaluated at. */
export interface ExpressionEvaluator {
  selector(selector: Selector): FieldElement;
  query(column: Column, rotation: number): FieldElement;
}

export class Expression {
  constructor(readonly node: ExpressionNode) {}

  static constant(value: bigint | number): Expression {
    return new Expression({ kind: "constant", value: BigInt(value) });
  }

  static selector(selector: Selector): Expression {
    return new Expression({ kind: "selector", selector });
  }

  static query(column: Column, rotation: number): Expression {
    return new Expression({ kind: "query", column, rotation });
  }

  static sum(terms: readonly Expression[]): Expression {
    return terms.reduce((acc, term) => acc.add(term), Expression.constant(0));
  }

  add(other: Expression | bigint | number): Expression {
    return new Expression({ kind: "sum", lhs: this, rhs: toExpression(other) });
  }

  sub(other: Expression | bigint | number): Expression {
    return this.add(toExpression(other).neg());
  }

  mul(other: Expression | bigint | number): Expression {
    return new Expression({ kind: "product", lhs: this, rhs: toExpression(other) });
  }

  neg(): Expression {
    return new Expression({ kind: "negated", inner: this });
  }

  scale(factor: bigint | number): Expression {
    return new Expression({ kind: "scaled", inner: this, factor: BigInt(factor) });
  }

  degree(): number {
    const node = this.node;
    switch (node.kind) {
      case "constant":
        return 0;
      case "selector":
      case "query":
        return 1;
      case "negated":
      case "scaled":
        return node.inner.degree();
      case "sum":
        return Math.max(node.lhs.degree(), node.rhs.degree());
      case "product":
        return node.lhs.degree() + node.rhs.degree();
    }
  }

  /** Every selector this expression queries. */
  selectors(): Selector[] {
    const found = new Map<number, Selector>();
    this.visit((node) => {
      if (node.kind === "selector") {
        found.set(node.selector.index, node.selector);
      }
    });
    return [...found.values()];
  }

  evaluate(field: PrimeField, evaluator: ExpressionEvaluator): FieldElement {
    const node = this.node;
    switch (node.kind) {
      case "constant":
        return field.reduce(node.value);
      case "selector":
        return evaluator.selector(node.selector);
      case "query":
        return evaluator.query(node.column, node.rotation);
      case "negated":
        return field.neg(node.inner.evaluate(field, evaluator));
      case "sum":
        return field.add(
          node.lhs.evaluate(field, evaluator),
          node.rhs.evaluate(field, evaluator)
        );
      case "product":
        return field.mul(
          node.lhs.evaluate(field, evaluator),
          node.rhs.evaluate(field, evaluator)
        );
      case "scaled":
        return field.mul(node.inner.evaluate(field, evaluator), field.reduce(node.factor));
    }
  }

  private visit(fn: (node: ExpressionNode) => void): void {
    const node = this.node;
    fn(node);
    switch (node.kind) {
      case "negated":
      case "scaled":
        node.inner.visit(fn);
        break;
      case "sum":
      case "product":
        node.lhs.visit(fn);
        node.rhs.visit(fn);
        break;
      default:
        break;
    }
  }
}

function toExpression(value: Expression | bigint | number): Expression {
  return value instanceof Expression ? value : Expression.constant(value);
}
