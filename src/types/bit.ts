export class Bit {
  private constructor(readonly value: bigint) {}

  static fromBigInt(value: bigint): Bit {
    if (value !== 0n && value !== 1n) {
      throw new RangeError(`${value} is not a bit`);
    }
    return new Bit(value);
  }

  static fromBoolean(value: boolean): Bit {
    return new Bit(value ? 1n : 0n);
  }
}
