// Field elements are plain bigints reduced into [0, p).
export type FieldElement = bigint;

export class PrimeField {
  readonly modulus: bigint;
  readonly name: string;

  constructor(modulus: bigint, name = "custom") {
    if (modulus < 2n) {
      throw new RangeError(`field modulus must be at least 2, got ${modulus}`);
    }
    this.modulus = modulus;
    this.name = name;
  }

  reduce(value: bigint): FieldElement {
    const r = value % this.modulus;
    return r < 0n ? r + this.modulus : r;
  }

  add(a: FieldElement, b: FieldElement): FieldElement {
    return this.reduce(a + b);
  }

  sub(a: FieldElement, b: FieldElement): FieldElement {
    return this.reduce(a - b);
  }

  mul(a: FieldElement, b: FieldElement): FieldElement {
    return this.reduce(a * b);
  }

  neg(a: FieldElement): FieldElement {
    return this.reduce(-a);
  }
}

/** Scalar field of BN254. */
export const Fr = new PrimeField(
  21888242871839275222246405745257275088548364400416034343698204186575808495617n,
  "bn254::Fr"
);
