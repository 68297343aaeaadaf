/** An integer in [0, 256). */
export class Byte {
  private constructor(readonly value: bigint) {}

  static fromBigInt(value: bigint): Byte {
    if (value < 0n || value > 0xffn) {
      throw new RangeError(`${value} does not fit in a byte`);
    }
    return new Byte(value);
  }

  static fromNumber(value: number): Byte {
    if (!Number.isInteger(value)) {
      throw new RangeError(`${value} does not fit in a byte`);
    }
    return Byte.fromBigInt(BigInt(value));
  }

  toNumber(): number {
    return Number(this.value);
  }
}
