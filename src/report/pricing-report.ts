/**
 * Pricing Reports
 *
 * Plain-text sections for the demo driver and the logs:
 *   1. Valuation block (contract + price + Greeks)
 *   2. Put-call parity check
 *   3. Early exercise premium
 *   4. Implied volatility round trip
 *   5. Lattice convergence table against the closed form
 *   6. Closed-form Greeks against finite differences
 */

import type {
  Greeks,
  LatticeGreeks,
  LatticeModel,
  OptionContract,
  Valuation,
} from "../types/options.js";
import { analyticPrice } from "../quant/black-scholes.js";
import { assertSteps, describeContract, withBump } from "../quant/contract.js";
import {
  ANALYTIC_BUMPS,
  analyticGreeks,
  estimateGreeks,
  estimateRho,
} from "../quant/greeks.js";
import { calculateImpliedVolatility } from "../quant/implied-volatility.js";
import { createPricer, priceWith } from "../quant/pricers.js";

const MODEL_LABELS: Readonly<Record<Valuation["model"], string>> = Object.freeze({
  blackScholes: "Black-Scholes",
  binomialTree: "Binomial Tree",
  trinomialTree: "Trinomial Tree",
});

const fmt = (x: number, digits = 4) => x.toFixed(digits);

export function modelLabel(valuation: Valuation): string {
  return valuation.model === "blackScholes"
    ? MODEL_LABELS.blackScholes
    : `${MODEL_LABELS[valuation.model]} (${valuation.steps} steps)`;
}

export function formatGreeks(greeks: Greeks | LatticeGreeks): string {
  const lines = [
    `  Delta: ${fmt(greeks.delta)}`,
    `  Gamma: ${fmt(greeks.gamma)}`,
    `  Theta: ${fmt(greeks.theta)} (per day: ${fmt(greeks.theta / 365)})`,
    `  Vega: ${fmt(greeks.vega)} (for 1% change in volatility)`,
  ];
  if ("rho" in greeks && typeof greeks.rho === "number") {
    lines.push(`  Rho: ${fmt(greeks.rho)} (for 1% change in interest rate)`);
  }
  return lines.join("\n");
}

export function formatValuation(contract: OptionContract, valuation: Valuation): string {
  return [
    `${modelLabel(valuation)}`,
    describeContract(contract),
    `Price: ${fmt(valuation.price)}`,
    "Greeks:",
    formatGreeks(valuation.greeks),
  ].join("\n");
}

/** C - P - (S - K·e^(-rT)); zero when parity holds */
export function putCallParityGap(contract: OptionContract): number {
  const call = analyticPrice(withBump(contract, { type: "call", style: "european" }));
  const put = analyticPrice(withBump(contract, { type: "put", style: "european" }));
  const { spot, strike, rate, timeToMaturity } = contract;
  return call - put - spot + strike * Math.exp(-rate * timeToMaturity);
}

/** American lattice price minus the European closed-form price */
export function earlyExercisePremium(
  contract: OptionContract,
  model: LatticeModel,
  steps: number
): { american: number; european: number; premium: number } {
  const pricer = createPricer(model, steps);
  const american = priceWith(pricer, withBump(contract, { style: "american" }));
  const european = analyticPrice(withBump(contract, { style: "european" }));
  return { american, european, premium: american - european };
}

/** Price at the contract's σ, then solve back for σ */
export function impliedVolRoundTrip(
  contract: OptionContract
): { price: number; volatility: number; implied: number } {
  const price = analyticPrice(contract);
  const implied = calculateImpliedVolatility({
    targetPrice: price,
    spot: contract.spot,
    strike: contract.strike,
    rate: contract.rate,
    timeToMaturity: contract.timeToMaturity,
    type: contract.type,
  });
  return { price, volatility: contract.volatility, implied };
}

export interface ConvergenceRow {
  steps: number;
  price: number;
  error: number;
  /** Percent of the closed-form price */
  relativeError: number;
}

/** Lattice price at each step count against the European closed form */
export function convergenceTable(
  contract: OptionContract,
  model: LatticeModel,
  stepsList: readonly number[]
): { reference: number; rows: ConvergenceRow[] } {
  const european = withBump(contract, { style: "european" });
  const reference = analyticPrice(european);

  const rows = stepsList.map((steps) => {
    const price = priceWith(createPricer(model, steps), european);
    const error = Math.abs(price - reference);
    return { steps, price, error, relativeError: (error / reference) * 100 };
  });

  return { reference, rows };
}

export function formatConvergenceTable(rows: readonly ConvergenceRow[]): string {
  const header = "Steps\tPrice\t\tError\t\tRelative Error";
  const body = rows.map(
    (r) => `${r.steps}\t${fmt(r.price)}\t\t${fmt(r.error)}\t\t${fmt(r.relativeError)}%`
  );
  return [header, ...body].join("\n");
}

/** Doubling step counts from `from` up to and including `to` */
export function doublingSteps(from: number, to: number): number[] {
  const steps: number[] = [];
  for (let n = assertSteps(from); n <= to; n *= 2) steps.push(n);
  return steps;
}

export interface GreeksCheckRow {
  greek: keyof Greeks;
  analytic: number;
  estimated: number;
  difference: number;
}

const GREEK_NAMES: readonly (keyof Greeks)[] = ["delta", "gamma", "theta", "vega", "rho"];

/** Closed-form Greeks next to finite differences over the closed-form price */
export function greeksCrossCheck(contract: OptionContract): GreeksCheckRow[] {
  const analytic = analyticGreeks(contract);
  const estimated: Greeks = {
    ...estimateGreeks(analyticPrice, contract, ANALYTIC_BUMPS),
    rho: estimateRho(analyticPrice, contract, ANALYTIC_BUMPS),
  };
  return GREEK_NAMES.map((greek) => ({
    greek,
    analytic: analytic[greek],
    estimated: estimated[greek],
    difference: estimated[greek] - analytic[greek],
  }));
}

export function formatGreeksCrossCheck(rows: readonly GreeksCheckRow[]): string {
  const header = "Greek\tAnalytic\tFinite Diff\tDifference";
  const body = rows.map(
    (r) =>
      `${r.greek}\t${fmt(r.analytic, 6)}\t${fmt(r.estimated, 6)}\t` +
      r.difference.toExponential(2)
  );
  return [header, ...body].join("\n");
}
