export * from "./backend/assignment";
export * from "./backend/circuit";
export * from "./backend/constraint_system";
export * from "./backend/expression";
export * from "./backend/trace_builder";
export * from "./base_operations/addition_mod_64";
export * from "./base_operations/decompose_16";
export * from "./base_operations/decompose_8";
export * from "./base_operations/decomposition";
export * from "./base_operations/generic_limb_rotation";
export * from "./base_operations/negate";
export * from "./base_operations/rotate_63";
export * from "./base_operations/xor";
export * from "./base_operations/xor_spread";
export * from "./base_operations/xor_table";
export * from "./blake2b/blake2b_generic";
export * from "./blake2b/chips";
export * from "./blake2b/circuit";
export * from "./blake2b/circuit_runner";
export * from "./blake2b/constants";
export * from "./blake2b/utils";
export * from "./build_info";
export * from "./dev/cost_model";
export * from "./dev/mock_prover";
export * from "./errors";
export * from "./field_element";
export * from "./logger";
export * from "./types";
export * from "./value";
export * from "./word_functions";
