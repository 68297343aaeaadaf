import { ConstraintSystem } from "../../backend/constraint_system";
import { AdviceColumn } from "../../backend/expression";
import { AdditionMod64Config } from "../../base_operations/addition_mod_64";
import { Decompose16Config } from "../../base_operations/decompose_16";
import { XorTableConfig } from "../../base_operations/xor_table";
import { Blake2bGeneric, Blake2bParts } from "../blake2b_generic";

/**
 * Addition results decomposed in four 16-bit limbs. XOR still needs bytes,
 * so its operands are always copied into fresh rows.
 */
export class Blake2bChipOpt4Limbs extends Blake2bGeneric {
  static readonly optimizationName = "4-limbs";

  private constructor(parts: Blake2bParts) {
    super(parts);
  }

  static configure(
    meta: ConstraintSystem,
    fullNumber: AdviceColumn,
    limbs: readonly AdviceColumn[]
  ): Blake2bChipOpt4Limbs {
    const generic = Blake2bGeneric.genericConfigure(meta, fullNumber, limbs);
    const decompose16 = Decompose16Config.configure(meta, fullNumber, limbs);
    const addition = AdditionMod64Config.configure(meta, decompose16, limbs[0]);
    const xor = XorTableConfig.configure(meta, generic.decompose8);
    return new Blake2bChipOpt4Limbs({ ...generic, addition, xor });
  }
}
