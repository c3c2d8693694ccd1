/**
 * Core option pricing type definitions.
 * Covers contracts, pricing models, Greeks and valuation results.
 */

export type OptionType = "call" | "put";
export type OptionStyle = "american" | "european";

/** Contract fields as a caller supplies them */
export interface ContractTerms {
  readonly spot: number;           // S, current underlying price
  readonly strike: number;         // K
  readonly rate: number;           // r, continuously compounded, any sign
  readonly volatility: number;     // σ, annualized
  readonly timeToMaturity: number; // τ, years
  readonly type: OptionType;
  readonly style: OptionStyle;
}

/** Set only by createContract */
export const VALIDATED_CONTRACT: unique symbol = Symbol("validatedContract");

/**
 * Frozen contract snapshot every valuation runs against. The brand keeps
 * plain object literals out of the pricers: only createContract makes one.
 */
export interface OptionContract extends ContractTerms {
  readonly [VALIDATED_CONTRACT]: true;
}

/** Closed-form Greeks for the analytic model */
export interface Greeks {
  readonly delta: number;  // ∂V/∂S
  readonly gamma: number;  // ∂²V/∂S²
  readonly theta: number;  // ∂V/∂t, per year
  readonly vega: number;   // ∂V/∂σ, per 1% vol move
  readonly rho: number;    // ∂V/∂r, per 1% rate move
}

/** Finite-difference Greeks for the lattice models (no rho) */
export type LatticeGreeks = Omit<Greeks, "rho">;

export type PricingModel = "blackScholes" | "binomialTree" | "trinomialTree";
export type LatticeModel = Exclude<PricingModel, "blackScholes">;

/** A pricer is a model tag plus its resolution parameter, nothing else */
export type Pricer =
  | { readonly model: "blackScholes" }
  | { readonly model: LatticeModel; readonly steps: number };

/** Price together with the Greeks the model supports */
export type Valuation =
  | { readonly model: "blackScholes"; readonly price: number; readonly greeks: Greeks }
  | {
      readonly model: LatticeModel;
      readonly steps: number;
      readonly price: number;
      readonly greeks: LatticeGreeks;
    };

/** A held quantity of one contract priced by one model */
export interface Position {
  readonly pricer: Pricer;
  readonly contract: OptionContract;
  readonly quantity: number;
}
