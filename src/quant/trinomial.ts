/**
 * Trinomial Tree
 *
 * dx = σ√(3dt), u = e^dx, d = 1/u, middle factor 1.
 *
 * Branch weights match the mean and variance of the log-price step
 * (ν = r - σ²/2) with pu + pm + pd = 1:
 *
 *   pu = 1/6 + √(dt / 12σ²) · ν
 *   pm = 2/3
 *   pd = 1/6 - √(dt / 12σ²) · ν
 *
 * Step i has 2i + 1 nodes; node k sits at level j = k - i with
 * underlying S·u^j. Its successors at step i+1 are k (down),
 * k+1 (middle) and k+2 (up).
 */

import type { OptionContract } from "../types/options.js";
import { assertSteps } from "./contract.js";
import {
  assertProbabilities,
  backwardInduction,
  type LatticeGeometry,
} from "./lattice.js";

export interface TrinomialParameters {
  dt: number;
  u: number;
  d: number;
  pu: number;
  pm: number;
  pd: number;
}

export function trinomialParameters(
  contract: OptionContract,
  steps: number
): TrinomialParameters {
  assertSteps(steps);
  const { rate: r, volatility: sigma } = contract;
  const dt = contract.timeToMaturity / steps;
  const dx = sigma * Math.sqrt(3 * dt);
  const u = Math.exp(dx);
  const d = 1 / u;

  const drift = Math.sqrt(dt / (12 * sigma * sigma)) * (r - 0.5 * sigma * sigma);
  const pu = 1 / 6 + drift;
  const pm = 2 / 3;
  const pd = 1 / 6 - drift;

  assertProbabilities("Trinomial", { pu, pm, pd });
  return { dt, u, d, pu, pm, pd };
}

/** Price a European or American option on an N-step trinomial tree */
export function trinomialPrice(contract: OptionContract, steps: number): number {
  const { dt, u, pu, pm, pd } = trinomialParameters(contract, steps);
  const { spot } = contract;

  const geometry: LatticeGeometry = {
    dt,
    width: (step) => 2 * step + 1,
    underlying: (step, k) => spot * Math.pow(u, k - step),
    branches: [
      { offset: 0, probability: pd },
      { offset: 1, probability: pm },
      { offset: 2, probability: pu },
    ],
  };

  return backwardInduction(contract, steps, geometry);
}

/** Ratio between adjacent nodes of one time step: u */
export function trinomialNodeSpacing(contract: OptionContract, steps: number): number {
  return trinomialParameters(contract, steps).u;
}
