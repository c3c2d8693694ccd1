/**
 * Cox-Ross-Rubinstein Binomial Tree
 *
 * u = e^(σ√dt), d = 1/u, p = (e^(r·dt) - d) / (u - d)
 *
 * Node (i, k) has seen i - k up moves and k down moves, so its
 * underlying is S·u^(i-2k). Its up successor is (i+1, k) and its
 * down successor (i+1, k+1).
 *
 * Converges to Black-Scholes for European options as N → ∞.
 */

import type { OptionContract } from "../types/options.js";
import { assertSteps } from "./contract.js";
import {
  assertProbabilities,
  backwardInduction,
  type LatticeGeometry,
} from "./lattice.js";

export interface BinomialParameters {
  dt: number;
  u: number;
  d: number;
  p: number;
}

/** Risk-neutral up/down factors and up probability for N steps */
export function binomialParameters(
  contract: OptionContract,
  steps: number
): BinomialParameters {
  assertSteps(steps);
  const dt = contract.timeToMaturity / steps;
  const u = Math.exp(contract.volatility * Math.sqrt(dt));
  const d = 1 / u;
  const p = (Math.exp(contract.rate * dt) - d) / (u - d);

  assertProbabilities("Binomial", { p, q: 1 - p });
  return { dt, u, d, p };
}

/** Price a European or American option on an N-step binomial tree */
export function binomialPrice(contract: OptionContract, steps: number): number {
  const { dt, u, p } = binomialParameters(contract, steps);
  const { spot } = contract;

  const geometry: LatticeGeometry = {
    dt,
    width: (step) => step + 1,
    underlying: (step, k) => spot * Math.pow(u, step - 2 * k),
    branches: [
      { offset: 0, probability: p },
      { offset: 1, probability: 1 - p },
    ],
  };

  return backwardInduction(contract, steps, geometry);
}

/** Ratio between adjacent nodes of one time step: u² */
export function binomialNodeSpacing(contract: OptionContract, steps: number): number {
  const { u } = binomialParameters(contract, steps);
  return u * u;
}
