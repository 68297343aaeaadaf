import { AssignedNative } from "../backend/circuit";
import { EmittedRow, LimbBits } from "../backend/trace_builder";
import { Value } from "../value";
import { Bit } from "./bit";
import { Blake2bWord } from "./blake2b_word";
import { Byte } from "./byte";

/**
 * Typed views over assigned cells. They are only built around cells whose
 * range is enforced by the circuit; reading a value out of range throws.
 */
export class AssignedByte {
  constructor(readonly cell: AssignedNative) {}

  value(): Value<Byte> {
    return this.cell.value.map(Byte.fromBigInt);
  }
}

export class AssignedBit {
  constructor(readonly cell: AssignedNative) {}

  value(): Value<Bit> {
    return this.cell.value.map(Bit.fromBigInt);
  }
}

export class AssignedBlake2bWord {
  constructor(readonly cell: AssignedNative) {}

  value(): Value<Blake2bWord> {
    return this.cell.value.map(Blake2bWord.fromBigInt);
  }

  /** The raw field value, for arithmetic on witnesses. */
  bigint(): Value<bigint> {
    return this.cell.value;
  }
}

/** A decomposed row: a word and the limbs it is the weighted sum of. */
export class AssignedRow {
  constructor(
    readonly offset: number,
    readonly fullNumber: AssignedBlake2bWord,
    readonly limbs: readonly AssignedNative[],
    readonly limbBits: LimbBits
  ) {}

  /** The limbs as bytes; only 8-bit rows have them. */
  bytes(): AssignedByte[] {
    if (this.limbBits !== 8) {
      throw new RangeError("only rows with 8-bit limbs hold bytes");
    }
    return this.limbs.map((limb) => new AssignedByte(limb));
  }

  static fromEmitted(row: EmittedRow): AssignedRow {
    if (row.limbBits === undefined) {
      throw new RangeError(`row ${row.offset} is not decomposed`);
    }
    return new AssignedRow(row.offset, new AssignedBlake2bWord(row.fullNumber), row.limbs, row.limbBits);
  }
}
