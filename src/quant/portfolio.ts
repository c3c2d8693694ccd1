/**
 * Option Portfolio
 *
 * Holds positions priced by any mix of models and sums their
 * quantity-weighted value and Greeks. Nothing is cached: every query
 * revalues every position, lattices included.
 */

import type {
  OptionContract,
  Position,
  Pricer,
  Valuation,
} from "../types/options.js";
import { InvalidArgumentError } from "../utils/errors.js";
import { priceWith, spotGreeks, valuate } from "./pricers.js";

export interface PortfolioSummary {
  totalValue: number;
  delta: number;
  gamma: number;
  theta: number;
  vega: number;
  /** Null as soon as one position is priced on a lattice */
  rho: number | null;
  positions: Array<Position & { valuation: Valuation }>;
}

/** Rho exists only for the analytic model */
function rhoOf(valuation: Valuation): number | null {
  switch (valuation.model) {
    case "blackScholes":
      return valuation.greeks.rho;
    case "binomialTree":
    case "trinomialTree":
      return null;
  }
}

export class OptionPortfolio {
  private readonly held: Position[] = [];

  addPosition(pricer: Pricer, contract: OptionContract, quantity: number = 1): this {
    if (!Number.isFinite(quantity)) {
      throw new InvalidArgumentError("Position quantity must be finite", { quantity });
    }
    this.held.push(Object.freeze({ pricer, contract, quantity }));
    return this;
  }

  get positions(): readonly Position[] {
    return this.held;
  }

  get size(): number {
    return this.held.length;
  }

  /** Σ price × quantity */
  totalValue(): number {
    return this.held.reduce(
      (sum, p) => sum + priceWith(p.pricer, p.contract) * p.quantity,
      0
    );
  }

  /** Valuation of every position, in insertion order */
  valuations(): Valuation[] {
    return this.held.map((p) => valuate(p.pricer, p.contract));
  }

  /** Σ delta × quantity */
  delta(): number {
    return this.held.reduce(
      (sum, p) => sum + spotGreeks(p.pricer, p.contract).delta * p.quantity,
      0
    );
  }

  /** Σ gamma × quantity */
  gamma(): number {
    return this.held.reduce(
      (sum, p) => sum + spotGreeks(p.pricer, p.contract).gamma * p.quantity,
      0
    );
  }

  /** Value one pass over all positions and aggregate everything */
  summarize(): PortfolioSummary {
    const summary: PortfolioSummary = {
      totalValue: 0,
      delta: 0,
      gamma: 0,
      theta: 0,
      vega: 0,
      rho: 0,
      positions: [],
    };

    for (const position of this.held) {
      const valuation = valuate(position.pricer, position.contract);
      const q = position.quantity;

      summary.totalValue += valuation.price * q;
      summary.delta += valuation.greeks.delta * q;
      summary.gamma += valuation.greeks.gamma * q;
      summary.theta += valuation.greeks.theta * q;
      summary.vega += valuation.greeks.vega * q;

      const rho = rhoOf(valuation);
      summary.rho = rho === null || summary.rho === null ? null : summary.rho + rho * q;

      summary.positions.push({ ...position, valuation });
    }

    return summary;
  }
}
