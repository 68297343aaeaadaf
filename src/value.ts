import { SynthesisError } from "./errors";

type Inner<T> = { known: true; value: T } | { known: false };

/**
 * A witness value that may be unknown, as it is while the circuit shape is
 * being measured. Operations on an unknown value yield an unknown value.
 */
export class Value<T> {
  private constructor(private readonly inner: Inner<T>) {}

  static known<T>(value: T): Value<T> {
    return new Value<T>({ known: true, value });
  }

  static unknown<T>(): Value<T> {
    return new Value<T>({ known: false });
  }

  isKnown(): boolean {
    return this.inner.known;
  }

  map<U>(fn: (value: T) => U): Value<U> {
    return this.inner.known ? Value.known(fn(this.inner.value)) : Value.unknown();
  }

  zip<U>(other: Value<U>): Value<[T, U]> {
    if (this.inner.known && other.inner.known) {
      return Value.known<[T, U]>([this.inner.value, other.inner.value]);
    }
    return Value.unknown();
  }

  // Returns undefined when unknown.
  peek(): T | undefined {
    return this.inner.known ? this.inner.value : undefined;
  }

  assertKnown(): T {
    if (!this.inner.known) {
      throw new SynthesisError("witness value is unknown");
    }
    return this.inner.value;
  }

  static all<T>(values: readonly Value<T>[]): Value<T[]> {
    const out: T[] = [];
    for (const v of values) {
      if (!v.inner.known) {
        return Value.unknown();
      }
      out.push(v.inner.value);
    }
    return Value.known(out);
  }
}
