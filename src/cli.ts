#!/usr/bin/env node
import { readFileSync } from "fs";
import { parseArgs } from "util";
import { blake2b } from "@noble/hashes/blake2b";
import { bytesToHex, hexToBytes } from "@noble/hashes/utils";
import { z } from "zod";
import { optimizationByName, OPTIMIZATIONS } from "./blake2b/chips";
import { Blake2bCircuit } from "./blake2b/circuit";
import { mockProveWithPublicInputs } from "./blake2b/circuit_runner";
import { buildInfo } from "./build_info";
import { formatCost, measureCircuit } from "./dev/cost_model";
import { initLogLevel, log } from "./logger";

const hexString = z
  .string()
  .regex(/^([0-9a-fA-F]{2})*$/, "must be an even-length hex string");

export const InputsSchema = z.object({
  in: hexString,
  key: hexString.default(""),
  output_size: z.number().int().min(1).max(64),
});

export type Inputs = z.infer<typeof InputsSchema>;

const USAGE = `usage: blake2b-circuit <inputs.json> [--optimization ${OPTIMIZATIONS.map((o) => o.optimizationName).join("|")}] [--log-level level]`;

export function parseInputs(json: string): Inputs {
  return InputsSchema.parse(JSON.parse(json));
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      optimization: { type: "string", short: "o", default: "recycle" },
      "log-level": { type: "string" },
      version: { type: "boolean", short: "v" },
    },
  });
}

/** Checks the circuit for the inputs in `path` and prints its cost. Returns the exit code. */
export function runCli(argv: string[]): number {
  let args: ReturnType<typeof parseCliArgs>;
  try {
    args = parseCliArgs(argv);
    const level = args.values["log-level"];
    if (level !== undefined) {
      initLogLevel(level);
    }
  } catch (e) {
    console.error(e instanceof Error ? e.message : e);
    console.error(USAGE);
    return 2;
  }
  const { values, positionals } = args;

  if (values.version) {
    console.log(buildInfo().version);
    return 0;
  }
  const chip = optimizationByName(values.optimization ?? "recycle");
  if (positionals.length !== 1 || chip === undefined) {
    console.error(USAGE);
    return 2;
  }

  const inputs = parseInputs(readFileSync(positionals[0], "utf8"));
  const input = hexToBytes(inputs.in);
  const key = hexToBytes(inputs.key);
  // noble rejects an empty key; unkeyed hashing leaves it out
  const digest = blake2b(input, key.length > 0 ? { key, dkLen: inputs.output_size } : { dkLen: inputs.output_size });

  const circuit = Blake2bCircuit.fromBytes(chip, input, key, inputs.output_size);
  const cost = measureCircuit(circuit);
  const prover = mockProveWithPublicInputs(digest, circuit, cost.minimumK);
  const failures = prover.verify();

  console.log(`optimization: ${chip.optimizationName}`);
  console.log(`digest: ${bytesToHex(digest)}`);
  console.log(formatCost(cost));
  if (failures.length > 0) {
    failures.slice(0, 10).forEach((failure) => log.error("[cli]", failure.message));
    console.log(`verification: failed (${failures.length} failures)`);
    return 1;
  }
  console.log("verification: ok");
  return 0;
}

if (require.main === module) {
  try {
    process.exitCode = runCli(process.argv.slice(2));
  } catch (e) {
    console.error(e instanceof Error ? e.message : e);
    process.exitCode = 1;
  }
}
