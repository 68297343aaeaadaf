import { Blake2bChipFactory } from "../blake2b_generic";
import { Blake2bChipOpt4Limbs } from "./opt_4_limbs";
import { Blake2bChipOptRecycle } from "./opt_recycle";
import { Blake2bChipOptSpread } from "./opt_spread";

export { Blake2bChipOpt4Limbs, Blake2bChipOptRecycle, Blake2bChipOptSpread };

export const OPTIMIZATIONS: readonly Blake2bChipFactory[] = [
  Blake2bChipOptRecycle,
  Blake2bChipOpt4Limbs,
  Blake2bChipOptSpread,
];

export function optimizationByName(name: string): Blake2bChipFactory | undefined {
  return OPTIMIZATIONS.find((chip) => chip.optimizationName === name);
}
