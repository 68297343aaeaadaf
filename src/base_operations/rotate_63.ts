import { ConstraintSystem } from "../backend/constraint_system";
import { AdviceColumn, Rotation, Selector } from "../backend/expression";
import { TraceBuilder } from "../backend/trace_builder";
import { CircuitConfigurationError } from "../errors";
import { AssignedBlake2bWord } from "../types/assigned";
import { WORD_MASK } from "../types/blake2b_word";
import { Value } from "../value";
import { rotateRight64 } from "../word_functions";

// 2^65: 2 * in - out must not wrap around the field.
const MIN_MODULUS = 1n << 65n;

/**
 * Rotation right by 63 bits, i.e. left by one. With the input on the row
 * before the output, `2 * in - out` is 0 when the top bit was clear and
 * `2^64 - 1` when it was set:
 *
 *   (2 * in - out) * (2 * in - out - (2^64 - 1)) = 0
 *
 * The output is not range checked here.
 */
export class Rotate63Config {
  private constructor(readonly fullNumber: AdviceColumn, readonly qRot63: Selector) {}

  static configure(meta: ConstraintSystem, fullNumber: AdviceColumn): Rotate63Config {
    if (meta.field.modulus <= MIN_MODULUS) {
      throw new CircuitConfigurationError(
        `rotation by 63 bits needs a field modulus above 2^65, got ${meta.field.modulus}`
      );
    }
    const qRot63 = meta.selector();
    meta.createGate("rotate right 63", (vc) => {
      const q = vc.querySelector(qRot63);
      const input = vc.queryAdvice(fullNumber, Rotation.prev);
      const output = vc.queryAdvice(fullNumber, Rotation.cur);
      const doubled = input.scale(2).sub(output);
      return [q.mul(doubled).mul(doubled.sub(WORD_MASK))];
    });
    return new Rotate63Config(fullNumber, qRot63);
  }

  rotateRight63(trace: TraceBuilder, input: AssignedBlake2bWord): AssignedBlake2bWord {
    if (!trace.isLastFullNumber(input.cell)) {
      trace.emitRow((offset) => ({
        offset,
        fullNumber: input.cell.copyAdvice("rotate 63 input", trace.region, this.fullNumber, offset),
        limbs: [],
      }));
    }
    return this.populateRotationRow(
      trace,
      input.bigint().map((v) => rotateRight64(v, 63))
    );
  }

  /** Writes `output` on a new row, checked against the last emitted row. */
  populateRotationRow(trace: TraceBuilder, output: Value<bigint>): AssignedBlake2bWord {
    const row = trace.emitRow((offset) => {
      trace.region.enableSelector("rotate right 63", this.qRot63, offset);
      return {
        offset,
        fullNumber: trace.region.assignAdvice("rotated", this.fullNumber, offset, output),
        limbs: [],
      };
    });
    return new AssignedBlake2bWord(row.fullNumber);
  }
}
