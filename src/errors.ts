import type { VerifyFailure } from "./dev/mock_prover";

/** Raised while building a circuit whose parameters cannot be satisfied. */
export class CircuitConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CircuitConfigurationError";
  }
}

/** Raised when synthesis misuses the backend. */
export class SynthesisError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SynthesisError";
  }
}

export class ConstraintViolationError extends Error {
  readonly failures: readonly VerifyFailure[];

  constructor(failures: readonly VerifyFailure[]) {
    const shown = failures.slice(0, 5).map((f) => f.message).join("; ");
    const more = failures.length > 5 ? ` (+${failures.length - 5} more)` : "";
    super(`circuit is not satisfied: ${shown}${more}`);
    this.name = "ConstraintViolationError";
    this.failures = failures;
  }
}
