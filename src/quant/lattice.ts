/**
 * Recombining Lattice Engine
 *
 * Shared backward induction for the binomial and trinomial trees.
 * A model only supplies its geometry: how many nodes each step has,
 * the underlying price at a node, and the branch weights to its
 * successors. The engine then runs the three phases:
 *
 *   1. parameter derivation (done by the model, validated here)
 *   2. terminal payoff:   V(N, k) = payoff(S(N, k))
 *   3. backward sweep:    V(i, k) = e^(-r·dt) · Σ p_b · V(i+1, k + offset_b)
 *                         American: V(i, k) = max(continuation, exercise)
 *
 * Node k at step i has its successors at indices ≥ k, so a single
 * buffer is overwritten in place from left to right: O(N) memory,
 * O(N²) node evaluations.
 */

import type { OptionContract } from "../types/options.js";
import { InvalidArgumentError } from "../utils/errors.js";
import { assertSteps, intrinsicValue } from "./contract.js";

/** One edge out of a node, relative to the node's own index */
export interface Branch {
  offset: number;
  probability: number;
}

export interface LatticeGeometry {
  /** Time step dt = τ / N */
  dt: number;
  /** Nodes at a given step */
  width(step: number): number;
  /** Underlying price at node (step, index) */
  underlying(step: number, index: number): number;
  /** Successor edges, shared by every node */
  branches: readonly Branch[];
}

/**
 * Reject weights outside [0, 1] before any induction runs.
 * Large volatility or coarse steps can push a risk-neutral weight negative.
 */
export function assertProbabilities(
  model: string,
  probabilities: Record<string, number>
): void {
  for (const [name, p] of Object.entries(probabilities)) {
    if (!Number.isFinite(p) || p < 0 || p > 1) {
      throw new InvalidArgumentError(
        `${model} risk-neutral probability ${name}=${p} is outside [0, 1]; ` +
          "increase the step count or check rate and volatility",
        { model, ...probabilities },
        "UNSTABLE_LATTICE"
      );
    }
  }
}

/** Run terminal payoff + backward induction and return the root value */
export function backwardInduction(
  contract: OptionContract,
  steps: number,
  geometry: LatticeGeometry
): number {
  assertSteps(steps);

  const discount = Math.exp(-contract.rate * geometry.dt);
  const american = contract.style === "american";
  const { branches } = geometry;

  // Terminal payoffs
  const values = new Float64Array(geometry.width(steps));
  for (let k = 0; k < values.length; k++) {
    values[k] = intrinsicValue(contract, geometry.underlying(steps, k));
  }

  // Backward sweep
  for (let i = steps - 1; i >= 0; i--) {
    const width = geometry.width(i);
    for (let k = 0; k < width; k++) {
      let expected = 0;
      for (const b of branches) {
        expected += b.probability * values[k + b.offset];
      }
      let value = discount * expected;

      if (american) {
        const exercise = intrinsicValue(contract, geometry.underlying(i, k));
        if (exercise > value) value = exercise;
      }

      values[k] = value;
    }
  }

  return values[0];
}
