/**
 * PricingError hierarchy.
 *
 * Every failure in the pricing core surfaces as one of these typed errors,
 * never as a NaN or sentinel value. Nothing here is retryable: each error
 * describes bad input or an exhausted search, not a transient condition.
 */

export type PricingErrorCode =
  | "INVALID_ARGUMENT"
  | "UNSTABLE_LATTICE"
  | "MODEL_MISMATCH"
  | "UNKNOWN_MODEL"
  | "IV_OUT_OF_BOUNDS"
  | "IV_NO_CONVERGENCE";

/** Base error for all pricing operations. */
export class PricingError extends Error {
  readonly code: PricingErrorCode;
  readonly context: Record<string, unknown>;

  constructor(
    message: string,
    code: PricingErrorCode,
    context: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = "PricingError";
    this.code = code;
    this.context = context;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

// ── Specific error types ─────────────────────────────────────

/** Non-positive spot/strike/volatility/maturity, bad step count, unusable lattice. */
export class InvalidArgumentError extends PricingError {
  constructor(
    message: string,
    context: Record<string, unknown> = {},
    code: "INVALID_ARGUMENT" | "UNSTABLE_LATTICE" = "INVALID_ARGUMENT"
  ) {
    super(message, code, context);
    this.name = "InvalidArgumentError";
  }
}

/** American style against the analytic oracle, or an unknown model name. */
export class ModelMismatchError extends PricingError {
  constructor(
    message: string,
    context: Record<string, unknown> = {},
    code: "MODEL_MISMATCH" | "UNKNOWN_MODEL" = "MODEL_MISMATCH"
  ) {
    super(message, code, context);
    this.name = "ModelMismatchError";
  }
}

/** Target price not strictly inside the prices reachable by the volatility bracket. */
export class ImpliedVolOutOfBoundsError extends PricingError {
  readonly priceLow: number;
  readonly priceHigh: number;

  constructor(
    targetPrice: number,
    priceLow: number,
    priceHigh: number,
    context: Record<string, unknown> = {}
  ) {
    super(
      `Target price ${targetPrice} is outside the bounds of possible option prices ` +
        `(${priceLow.toFixed(6)}, ${priceHigh.toFixed(6)})`,
      "IV_OUT_OF_BOUNDS",
      { targetPrice, priceLow, priceHigh, ...context }
    );
    this.name = "ImpliedVolOutOfBoundsError";
    this.priceLow = priceLow;
    this.priceHigh = priceHigh;
  }
}

/** Bisection ran out of iterations before meeting the tolerance. */
export class ImpliedVolNonConvergenceError extends PricingError {
  readonly iterations: number;
  readonly lastEstimate: number;

  constructor(
    iterations: number,
    lastEstimate: number,
    context: Record<string, unknown> = {}
  ) {
    super(
      `Implied volatility failed to converge after ${iterations} iterations. ` +
        `Last estimate: ${lastEstimate.toFixed(6)}`,
      "IV_NO_CONVERGENCE",
      { iterations, lastEstimate, ...context }
    );
    this.name = "ImpliedVolNonConvergenceError";
    this.iterations = iterations;
    this.lastEstimate = lastEstimate;
  }
}

// ── HTTP mapping ─────────────────────────────────────────────

/**
 * Status code for an error reaching the API boundary.
 * Bad input is 400, a well-formed query with no solution is 422.
 */
export function toHttpStatus(error: unknown): number {
  if (!(error instanceof PricingError)) return 500;
  switch (error.code) {
    case "INVALID_ARGUMENT":
    case "UNSTABLE_LATTICE":
    case "MODEL_MISMATCH":
    case "UNKNOWN_MODEL":
      return 400;
    case "IV_OUT_OF_BOUNDS":
    case "IV_NO_CONVERGENCE":
      return 422;
  }
}
