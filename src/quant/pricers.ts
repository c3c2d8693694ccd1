/**
 * Pricer selection and valuation.
 *
 * A Pricer is a plain tagged value; every operation over it is an
 * exhaustive switch on `model`, so adding a model is a compile error
 * everywhere it is not yet handled.
 */

import type {
  LatticeGreeks,
  LatticeModel,
  OptionContract,
  Pricer,
  PricingModel,
  Valuation,
} from "../types/options.js";
import { ModelMismatchError } from "../utils/errors.js";
import { analyticPrice } from "./black-scholes.js";
import { binomialNodeSpacing, binomialPrice } from "./binomial.js";
import { assertSteps } from "./contract.js";
import {
  analyticGreeks,
  estimateGreeks,
  estimateSpotGreeks,
  LATTICE_BUMPS,
  type BumpSizes,
  type SpotGreeks,
} from "./greeks.js";
import { trinomialNodeSpacing, trinomialPrice } from "./trinomial.js";

/** Step counts used when the caller does not pick one */
export const DEFAULT_STEPS: Readonly<Record<LatticeModel, number>> = Object.freeze({
  binomialTree: 100,
  trinomialTree: 80,
});

const MODEL_NAMES: ReadonlyMap<string, PricingModel> = new Map<string, PricingModel>([
  ["blackscholes", "blackScholes"],
  ["binomialtree", "binomialTree"],
  ["trinomialtree", "trinomialTree"],
]);

/**
 * Resolve an external model name ("BlackScholes", "BinomialTree",
 * "TrinomialTree", any case) to its tag. Only the outer edge should
 * ever hold a model as a string.
 */
export function parsePricingModel(name: string): PricingModel {
  const model = MODEL_NAMES.get(name.trim().toLowerCase());
  if (model === undefined) {
    throw new ModelMismatchError(
      `Unknown pricing method: ${name}`,
      { name, known: ["BlackScholes", "BinomialTree", "TrinomialTree"] },
      "UNKNOWN_MODEL"
    );
  }
  return model;
}

/** Build a pricer; lattice models validate their step count here */
export function createPricer(model: PricingModel, steps?: number): Pricer {
  switch (model) {
    case "blackScholes":
      return Object.freeze({ model });
    case "binomialTree":
    case "trinomialTree":
      return Object.freeze({
        model,
        steps: assertSteps(steps ?? DEFAULT_STEPS[model]),
      });
  }
}

/** Run the pricer's lattice on a contract */
function latticePrice(model: LatticeModel, steps: number, contract: OptionContract): number {
  return model === "binomialTree"
    ? binomialPrice(contract, steps)
    : trinomialPrice(contract, steps);
}

/** Price a contract; Black-Scholes rejects American contracts */
export function priceWith(pricer: Pricer, contract: OptionContract): number {
  switch (pricer.model) {
    case "blackScholes":
      return analyticPrice(contract);
    case "binomialTree":
    case "trinomialTree":
      return latticePrice(pricer.model, pricer.steps, contract);
  }
}

type LatticePricer = Extract<Pricer, { model: LatticeModel }>;

/**
 * Lattice bumps with spot moves aligned to the tree's nodes. Otherwise
 * gamma picks up the payoff kink moving between nodes instead of the
 * option's curvature.
 */
function latticeBumps(pricer: LatticePricer, contract: OptionContract): BumpSizes {
  const spotGrid =
    pricer.model === "binomialTree"
      ? binomialNodeSpacing(contract, pricer.steps)
      : trinomialNodeSpacing(contract, pricer.steps);
  return { ...LATTICE_BUMPS, spotGrid };
}

/** Finite-difference Greeks on a lattice pricer; each Greek rebuilds the tree */
export function latticeGreeks(pricer: LatticePricer, contract: OptionContract): LatticeGreeks {
  return estimateGreeks(
    (c) => latticePrice(pricer.model, pricer.steps, c),
    contract,
    latticeBumps(pricer, contract)
  );
}

/** Delta and gamma only: closed form, or three tree builds on a lattice */
export function spotGreeks(pricer: Pricer, contract: OptionContract): SpotGreeks {
  switch (pricer.model) {
    case "blackScholes": {
      const { delta, gamma } = analyticGreeks(contract);
      return { delta, gamma };
    }
    case "binomialTree":
    case "trinomialTree": {
      const tree: LatticePricer = pricer;
      return estimateSpotGreeks(
        (c) => latticePrice(tree.model, tree.steps, c),
        contract,
        latticeBumps(tree, contract)
      );
    }
  }
}

/** Price plus the Greeks this model supports */
export function valuate(pricer: Pricer, contract: OptionContract): Valuation {
  switch (pricer.model) {
    case "blackScholes":
      return {
        model: pricer.model,
        price: analyticPrice(contract),
        greeks: analyticGreeks(contract),
      };
    case "binomialTree":
    case "trinomialTree":
      return {
        model: pricer.model,
        steps: pricer.steps,
        price: latticePrice(pricer.model, pricer.steps, contract),
        greeks: latticeGreeks(pricer, contract),
      };
  }
}
