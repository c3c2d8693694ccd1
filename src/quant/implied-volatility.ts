/**
 * Implied Volatility Solver
 *
 * Inverts the Black-Scholes oracle for σ by bisection. Price is strictly
 * increasing in volatility for both calls and puts, so a bracket whose
 * end prices straddle the target always contains exactly one root.
 */

import type { OptionType } from "../types/options.js";
import {
  ImpliedVolNonConvergenceError,
  ImpliedVolOutOfBoundsError,
  InvalidArgumentError,
} from "../utils/errors.js";
import { analyticPrice } from "./black-scholes.js";
import { createContract } from "./contract.js";

/** Observed price plus every contract field except volatility */
export interface ImpliedVolQuery {
  targetPrice: number;
  spot: number;
  strike: number;
  rate: number;
  timeToMaturity: number;
  type: OptionType;
}

export interface ImpliedVolOptions {
  /** Lower end of the search bracket */
  volLow?: number;
  /** Upper end of the search bracket (200% by default) */
  volHigh?: number;
  /** Accept a midpoint whose price is within this distance of the target */
  tolerance?: number;
  /** Oracle evaluations allowed inside the bisection loop */
  maxIterations?: number;
}

export const DEFAULT_IMPLIED_VOL_OPTIONS: Readonly<Required<ImpliedVolOptions>> =
  Object.freeze({
    volLow: 0.001,
    volHigh: 2.0,
    tolerance: 1e-6,
    maxIterations: 1000,
  });

function resolveOptions(options: ImpliedVolOptions): Required<ImpliedVolOptions> {
  const defaults = DEFAULT_IMPLIED_VOL_OPTIONS;
  const resolved: Required<ImpliedVolOptions> = {
    volLow: options.volLow ?? defaults.volLow,
    volHigh: options.volHigh ?? defaults.volHigh,
    tolerance: options.tolerance ?? defaults.tolerance,
    maxIterations: options.maxIterations ?? defaults.maxIterations,
  };
  const { volLow, volHigh, tolerance, maxIterations } = resolved;

  if (!(volLow > 0) || !(volHigh > volLow) || !Number.isFinite(volHigh)) {
    throw new InvalidArgumentError(
      "Volatility bracket must satisfy 0 < volLow < volHigh",
      { volLow, volHigh }
    );
  }
  if (!(tolerance > 0)) {
    throw new InvalidArgumentError("Tolerance must be positive", { tolerance });
  }
  if (!Number.isInteger(maxIterations) || maxIterations < 1) {
    throw new InvalidArgumentError("maxIterations must be a whole number ≥ 1", {
      maxIterations,
    });
  }
  return resolved;
}

/**
 * Bisection search for the volatility reproducing targetPrice.
 *
 * Throws:
 *   InvalidArgumentError           bad contract fields, targetPrice ≤ 0, bad options
 *   ImpliedVolOutOfBoundsError     target not strictly between the bracket prices
 *   ImpliedVolNonConvergenceError  maxIterations midpoints without meeting tolerance
 */
export function calculateImpliedVolatility(
  query: ImpliedVolQuery,
  options: ImpliedVolOptions = {}
): number {
  const { targetPrice, ...fields } = query;
  if (!Number.isFinite(targetPrice) || targetPrice <= 0) {
    throw new InvalidArgumentError("Target price must be positive", { targetPrice });
  }
  const { tolerance, maxIterations, ...bracket } = resolveOptions(options);
  let { volLow, volHigh } = bracket;

  const priceAt = (volatility: number) =>
    analyticPrice(createContract({ ...fields, volatility, style: "european" }));

  const priceLow = priceAt(volLow);
  const priceHigh = priceAt(volHigh);

  // Equality with either end counts as out of bounds
  if (targetPrice <= priceLow || targetPrice >= priceHigh) {
    throw new ImpliedVolOutOfBoundsError(targetPrice, priceLow, priceHigh, {
      volLow,
      volHigh,
    });
  }

  let vol = (volLow + volHigh) / 2;
  for (let i = 0; i < maxIterations; i++) {
    const price = priceAt(vol);

    if (Math.abs(price - targetPrice) < tolerance) {
      return vol;
    }

    if (price < targetPrice) {
      volLow = vol;
    } else {
      volHigh = vol;
    }
    vol = (volLow + volHigh) / 2;
  }

  throw new ImpliedVolNonConvergenceError(maxIterations, vol, {
    targetPrice,
    tolerance,
  });
}
