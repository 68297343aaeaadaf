import { ConstraintSystem } from "../../backend/constraint_system";
import { AdviceColumn } from "../../backend/expression";
import { AdditionMod64Config } from "../../base_operations/addition_mod_64";
import { XorSpreadConfig } from "../../base_operations/xor_spread";
import { Blake2bGeneric, Blake2bParts } from "../blake2b_generic";

/**
 * XOR through spread encodings, trading the 2^16-row XOR table for a
 * 256-row spread table and six rows per XOR. Needs one extra advice column,
 * which also holds the addition carry.
 */
export class Blake2bChipOptSpread extends Blake2bGeneric {
  static readonly optimizationName = "spread";

  private constructor(parts: Blake2bParts) {
    super(parts);
  }

  static configure(
    meta: ConstraintSystem,
    fullNumber: AdviceColumn,
    limbs: readonly AdviceColumn[]
  ): Blake2bChipOptSpread {
    const generic = Blake2bGeneric.genericConfigure(meta, fullNumber, limbs);
    const extra = meta.adviceColumn();
    const addition = AdditionMod64Config.configure(meta, generic.decompose8, extra);
    const xor = XorSpreadConfig.configure(meta, generic.decompose8, extra);
    return new Blake2bChipOptSpread({ ...generic, addition, xor });
  }
}
