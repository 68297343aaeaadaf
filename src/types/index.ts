export * from "./assigned";
export * from "./bit";
export * from "./blake2b_word";
export * from "./byte";
