import { TraceBuilder } from "../backend/trace_builder";
import { AssignedBlake2bWord, AssignedRow } from "../types/assigned";
import { Value } from "../value";
import { rotateRight64 } from "../word_functions";
import { Decompose8Config } from "./decompose_8";

export type LimbsToRotate = 2 | 3 | 4;

/**
 * Rotation right by a whole number of bytes. It has no gate of its own:
 * every output limb is a copy of an input limb, and the output row enables
 * the decomposition constraint to tie its full number to those limbs.
 */
export class LimbRotation {
  constructor(private readonly decomposition: Decompose8Config) {}

  rotateRight(trace: TraceBuilder, input: AssignedRow, limbsToRotate: LimbsToRotate): AssignedBlake2bWord {
    if (input.limbBits !== 8) {
      throw new RangeError("limb rotation takes a row with 8-bit limbs");
    }
    const rotated = input.fullNumber.bigint().map((v) => rotateRight64(v, 8 * limbsToRotate));
    const row = trace.emitRow((offset) => {
      trace.region.enableSelector("decompose", this.decomposition.qDecompose, offset);
      const fullNumber = trace.region.assignAdvice(
        "rotated",
        this.decomposition.fullNumber,
        offset,
        rotated
      );
      // output limb j is input limb j + limbsToRotate
      const limbs = this.decomposition.limbs.map((column, j) =>
        input.limbs[(j + limbsToRotate) % 8].copyAdvice(`rotated limb ${j}`, trace.region, column, offset)
      );
      return { offset, fullNumber, limbs, limbBits: this.decomposition.limbBits };
    });
    return new AssignedBlake2bWord(row.fullNumber);
  }

  /**
   * Writes an input row and an output row from raw values (full number then
   * limbs), both decomposed, with the limb copies of a rotation between them.
   */
  populateRotationRows(
    trace: TraceBuilder,
    input: readonly Value<bigint>[],
    output: readonly Value<bigint>[],
    limbsToRotate: LimbsToRotate
  ): void {
    const inputRow = this.decomposition.populateRowFromValues(trace, input, true);
    const outputRow = this.decomposition.populateRowFromValues(trace, output, true);
    inputRow.limbs.forEach((limb, i) => {
      const target = (8 + i - limbsToRotate) % 8;
      trace.region.constrainEqual(limb.cell, outputRow.limbs[target].cell);
    });
  }
}
