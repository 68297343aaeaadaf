import { ConstraintSystem } from "../../backend/constraint_system";
import { AdviceColumn } from "../../backend/expression";
import { AdditionMod64Config } from "../../base_operations/addition_mod_64";
import { XorTableConfig } from "../../base_operations/xor_table";
import { Blake2bGeneric, Blake2bParts } from "../blake2b_generic";

/**
 * 8-bit limbs everywhere, so every addition result can be reused as the
 * first row of the XOR after it. The carry sits in the first limb column.
 */
export class Blake2bChipOptRecycle extends Blake2bGeneric {
  static readonly optimizationName = "recycle";

  private constructor(parts: Blake2bParts) {
    super(parts);
  }

  static configure(
    meta: ConstraintSystem,
    fullNumber: AdviceColumn,
    limbs: readonly AdviceColumn[]
  ): Blake2bChipOptRecycle {
    const generic = Blake2bGeneric.genericConfigure(meta, fullNumber, limbs);
    const addition = AdditionMod64Config.configure(meta, generic.decompose8, limbs[0]);
    const xor = XorTableConfig.configure(meta, generic.decompose8);
    return new Blake2bChipOptRecycle({ ...generic, addition, xor });
  }
}
