/**
 * Black-Scholes Option Pricing Model
 *
 * Closed-form price for European options. Serves as the pricing oracle
 * for the implied volatility solver and as the convergence reference
 * for the lattice models.
 *
 * Reference: Black, F. & Scholes, M. (1973)
 */

import type { OptionContract, OptionType } from "../types/options.js";
import { InvalidArgumentError, ModelMismatchError } from "../utils/errors.js";
import { normalCDF } from "./normal.js";

/** Black-Scholes input parameters */
export interface BSParams {
  /** Current underlying price */
  S: number;
  /** Strike price */
  K: number;
  /** Time to expiration in years */
  T: number;
  /** Risk-free interest rate (annualized, e.g. 0.05 for 5%) */
  r: number;
  /** Volatility (annualized, e.g. 0.25 for 25%) */
  sigma: number;
}

/** Map a contract onto the formula's parameter names */
export function toBSParams(contract: OptionContract): BSParams {
  return {
    S: contract.spot,
    K: contract.strike,
    T: contract.timeToMaturity,
    r: contract.rate,
    sigma: contract.volatility,
  };
}

/** Calculate d1 and d2 intermediate values */
export function calcD1D2(params: BSParams): { d1: number; d2: number } {
  const { S, K, T, r, sigma } = params;

  if (!(S > 0) || !(K > 0) || !(T > 0) || !(sigma > 0) || !Number.isFinite(r)) {
    throw new InvalidArgumentError("S, K, T and sigma must be positive and r finite", {
      S,
      K,
      T,
      r,
      sigma,
    });
  }

  const volSqrtT = sigma * Math.sqrt(T);
  const d1 = (Math.log(S / K) + (r + 0.5 * sigma * sigma) * T) / volSqrtT;
  const d2 = d1 - volSqrtT;

  return { d1, d2 };
}

/**
 * Black-Scholes European option price.
 *
 * Call: C = S·N(d1) - K·e^(-rT)·N(d2)
 * Put:  P = K·e^(-rT)·N(-d2) - S·N(-d1)
 */
export function blackScholesPrice(params: BSParams, type: OptionType): number {
  const { S, K, T, r } = params;
  const { d1, d2 } = calcD1D2(params);
  const discountFactor = Math.exp(-r * T);

  if (type === "call") {
    return S * normalCDF(d1) - K * discountFactor * normalCDF(d2);
  }
  return K * discountFactor * normalCDF(-d2) - S * normalCDF(-d1);
}

/** Throws unless the contract can be priced in closed form */
export function assertEuropean(contract: OptionContract): void {
  if (contract.style !== "european") {
    throw new ModelMismatchError(
      "Black-Scholes model only applicable for European options",
      { style: contract.style }
    );
  }
}

/** Analytic price of a validated contract */
export function analyticPrice(contract: OptionContract): number {
  assertEuropean(contract);
  return blackScholesPrice(toBSParams(contract), contract.type);
}
