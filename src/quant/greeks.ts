/**
 * Options Greeks Calculator
 *
 * Two estimators:
 *   - analyticGreeks: closed-form Black-Scholes derivatives (European only)
 *   - estimateGreeks: finite differences over any pricing function
 *
 * Units are shared by both: theta per year, vega and rho per 1% move.
 *
 * Finite differences re-run the full pricer on every perturbed contract.
 * For a lattice pricer that is a complete tree rebuild per evaluation,
 * six evaluations for delta/gamma/theta/vega together.
 */

import type { Greeks, LatticeGreeks, OptionContract } from "../types/options.js";
import { assertEuropean, calcD1D2, toBSParams } from "./black-scholes.js";
import { withBump } from "./contract.js";
import { normalCDF, normalPDF } from "./normal.js";

/**
 * Closed-form first-order Greeks.
 *
 * Delta (Δ): Call N(d1), Put N(d1) - 1
 * Gamma (Γ): N'(d1) / (S·σ·√T)
 * Theta (Θ):
 *   Call: -S·σ·N'(d1) / (2√T) - r·K·e^(-rT)·N(d2)
 *   Put:  -S·σ·N'(d1) / (2√T) + r·K·e^(-rT)·N(-d2)
 * Vega (ν): S·√T·N'(d1) / 100
 * Rho (ρ):
 *   Call:  K·T·e^(-rT)·N(d2) / 100
 *   Put:  -K·T·e^(-rT)·N(-d2) / 100
 */
export function analyticGreeks(contract: OptionContract): Greeks {
  assertEuropean(contract);

  const params = toBSParams(contract);
  const { S, K, T, r, sigma } = params;
  const { d1, d2 } = calcD1D2(params);
  const sqrtT = Math.sqrt(T);
  const expMinusRT = Math.exp(-r * T);
  const nd1 = normalPDF(d1);
  const isCall = contract.type === "call";

  // ─── Delta ────────────────────────────────────────────────
  const delta = isCall ? normalCDF(d1) : normalCDF(d1) - 1;

  // ─── Gamma (same for calls and puts) ──────────────────────
  const gamma = nd1 / (S * sigma * sqrtT);

  // ─── Theta (per year) ─────────────────────────────────────
  const thetaCommon = -(S * sigma * nd1) / (2 * sqrtT);
  const theta = isCall
    ? thetaCommon - r * K * expMinusRT * normalCDF(d2)
    : thetaCommon + r * K * expMinusRT * normalCDF(-d2);

  // ─── Vega (per 1% IV move) ────────────────────────────────
  const vega = (S * sqrtT * nd1) / 100;

  // ─── Rho (per 1% rate move) ───────────────────────────────
  const rho = isCall
    ? (K * T * expMinusRT * normalCDF(d2)) / 100
    : (-K * T * expMinusRT * normalCDF(-d2)) / 100;

  return { delta, gamma, theta, vega, rho };
}

/** Relative and absolute bump sizes for finite differences */
export interface BumpSizes {
  /** Spot bump as a fraction of spot */
  spotBump: number;
  /** Smallest absolute spot bump */
  spotFloor: number;
  /** Volatility bump as a fraction of volatility */
  volBump: number;
  /** Absolute rate bump */
  rateBump: number;
  /**
   * Ratio between neighbouring lattice nodes at one time step. When set,
   * spot moves multiplicatively by a whole number of node spacings, at
   * least 1 + spotBump, so the bumped trees keep the strike at the same
   * place relative to their nodes.
   */
  spotGrid?: number;
}

/** Bumps for lattice pricers */
export const LATTICE_BUMPS: Readonly<BumpSizes> = Object.freeze({
  spotBump: 0.01,
  spotFloor: 1e-4,
  volBump: 0.01,
  rateBump: 1e-4,
});

/** Bumps for the closed form */
export const ANALYTIC_BUMPS: Readonly<BumpSizes> = Object.freeze({
  spotBump: 1e-4,
  spotFloor: 1e-6,
  volBump: 1e-4,
  rateBump: 1e-5,
});

export type PriceFn = (contract: OptionContract) => number;

/** Spot bump: max(S·ε, floor), capped at S/2 so S - h stays positive */
export function spotBumpSize(spot: number, bumps: BumpSizes): number {
  return Math.min(Math.max(spot * bumps.spotBump, bumps.spotFloor), spot / 2);
}

/** Smallest whole number of node spacings covering a 1 + spotBump move */
export function gridBumpFactor(spotGrid: number, spotBump: number): number {
  const spacings = Math.max(1, Math.ceil(Math.log(1 + spotBump) / Math.log(spotGrid)));
  return Math.pow(spotGrid, spacings);
}

/** Spot levels either side of the current spot */
export function spotPoints(spot: number, bumps: BumpSizes): { down: number; up: number } {
  if (bumps.spotGrid !== undefined) {
    const factor = gridBumpFactor(bumps.spotGrid, bumps.spotBump);
    return { down: spot / factor, up: spot * factor };
  }
  const h = spotBumpSize(spot, bumps);
  return { down: spot - h, up: spot + h };
}

/** Maturity bump: min(τ·0.01, τ/10) */
export function timeBumpSize(timeToMaturity: number): number {
  return Math.min(timeToMaturity * 0.01, timeToMaturity / 10);
}

export interface SpotGreeks {
  delta: number;
  gamma: number;
}

/**
 * Delta and gamma alone from three spot points; pass `base` when the
 * unbumped price is already known to save one evaluation.
 */
export function estimateSpotGreeks(
  priceFn: PriceFn,
  contract: OptionContract,
  bumps: BumpSizes = LATTICE_BUMPS,
  base: number = priceFn(contract)
): SpotGreeks {
  const S = contract.spot;
  const { down: sDown, up: sUp } = spotPoints(S, bumps);
  const up = priceFn(withBump(contract, { spot: sUp }));
  const down = priceFn(withBump(contract, { spot: sDown }));
  const delta = (up - down) / (sUp - sDown);
  const gamma =
    ((up - base) / (sUp - S) - (base - down) / (S - sDown)) / ((sUp - sDown) / 2);
  return { delta, gamma };
}

/**
 * Finite-difference delta, gamma, theta and vega for any pricer.
 *
 * Delta/Gamma: three-point differences in spot (central when the
 *              bump is additive, node-aligned on a lattice grid)
 * Theta:       (V(τ - h) - V(τ)) / h, so decay reads negative
 * Vega:        central difference in σ, divided by 100
 */
export function estimateGreeks(
  priceFn: PriceFn,
  contract: OptionContract,
  bumps: BumpSizes = LATTICE_BUMPS
): LatticeGreeks {
  const base = priceFn(contract);
  const { delta, gamma } = estimateSpotGreeks(priceFn, contract, bumps, base);

  const hT = timeBumpSize(contract.timeToMaturity);
  const shorter = priceFn(
    withBump(contract, { timeToMaturity: contract.timeToMaturity - hT })
  );
  const theta = (shorter - base) / hT;

  const hV = Math.min(contract.volatility * bumps.volBump, contract.volatility / 2);
  const volUp = priceFn(withBump(contract, { volatility: contract.volatility + hV }));
  const volDown = priceFn(withBump(contract, { volatility: contract.volatility - hV }));
  const vega = (volUp - volDown) / (2 * hV * 100);

  return { delta, gamma, theta, vega };
}

/** Finite-difference rho per 1% rate move */
export function estimateRho(
  priceFn: PriceFn,
  contract: OptionContract,
  bumps: BumpSizes = ANALYTIC_BUMPS
): number {
  const h = bumps.rateBump;
  const up = priceFn(withBump(contract, { rate: contract.rate + h }));
  const down = priceFn(withBump(contract, { rate: contract.rate - h }));
  return (up - down) / (2 * h * 100);
}
