/**
 * Implied Volatility Solver Tests
 */

import { describe, it, expect } from "vitest";
import { analyticPrice } from "../../src/quant/black-scholes.js";
import { createContract } from "../../src/quant/contract.js";
import {
  calculateImpliedVolatility,
  type ImpliedVolQuery,
} from "../../src/quant/implied-volatility.js";
import {
  ImpliedVolNonConvergenceError,
  ImpliedVolOutOfBoundsError,
  InvalidArgumentError,
} from "../../src/utils/errors.js";
import type { OptionType } from "../../src/types/options.js";

const market = { spot: 100, strike: 100, rate: 0.05, timeToMaturity: 1 };

const priceAt = (volatility: number, type: OptionType = "call") =>
  analyticPrice(createContract({ ...market, volatility, type }));

const query = (targetPrice: number, type: OptionType = "call"): ImpliedVolQuery => ({
  ...market,
  targetPrice,
  type,
});

describe("calculateImpliedVolatility", () => {
  it.each([0.1, 0.2, 0.5])("should recover σ=%s from a call price", (sigma) => {
    const implied = calculateImpliedVolatility(query(priceAt(sigma)));
    expect(implied).toBeCloseTo(sigma, 5);
  });

  it.each([0.1, 0.2, 0.5])("should recover σ=%s from a put price", (sigma) => {
    const implied = calculateImpliedVolatility(query(priceAt(sigma, "put"), "put"));
    expect(implied).toBeCloseTo(sigma, 5);
  });

  it("should land within tolerance of the target price", () => {
    const target = 12.5;
    const implied = calculateImpliedVolatility(query(target), { tolerance: 1e-8 });
    expect(Math.abs(priceAt(implied) - target)).toBeLessThan(1e-8);
  });

  it("should reject a target at or below the price at volLow", () => {
    // ITM-forward call: price at σ=0.001 is S - K·e^(-rT) ≈ 4.877
    expect(() => calculateImpliedVolatility(query(4))).toThrow(ImpliedVolOutOfBoundsError);
    expect(() => calculateImpliedVolatility(query(priceAt(0.001)))).toThrow(
      ImpliedVolOutOfBoundsError
    );
  });

  it("should reject a target at or above the price at volHigh", () => {
    expect(() => calculateImpliedVolatility(query(99))).toThrow(ImpliedVolOutOfBoundsError);
    expect(() => calculateImpliedVolatility(query(priceAt(2.0)))).toThrow(
      ImpliedVolOutOfBoundsError
    );
  });

  it("should carry both bracket prices on the out-of-bounds error", () => {
    try {
      calculateImpliedVolatility(query(99));
      expect.fail("solver should have rejected the target");
    } catch (err) {
      expect(err).toBeInstanceOf(ImpliedVolOutOfBoundsError);
      if (err instanceof ImpliedVolOutOfBoundsError) {
        expect(err.priceLow).toBeCloseTo(4.877058, 5);
        expect(err.priceHigh).toBeCloseTo(priceAt(2.0), 10);
        expect(err.code).toBe("IV_OUT_OF_BOUNDS");
      }
    }
  });

  it("should respect a custom bracket", () => {
    expect(() =>
      calculateImpliedVolatility(query(priceAt(0.5)), { volLow: 0.05, volHigh: 0.3 })
    ).toThrow(ImpliedVolOutOfBoundsError);
  });

  it("should fail with non-convergence when iterations run out", () => {
    try {
      calculateImpliedVolatility(query(priceAt(0.2)), { tolerance: 1e-12, maxIterations: 5 });
      expect.fail("solver should have run out of iterations");
    } catch (err) {
      expect(err).toBeInstanceOf(ImpliedVolNonConvergenceError);
      if (err instanceof ImpliedVolNonConvergenceError) {
        expect(err.iterations).toBe(5);
        expect(err.code).toBe("IV_NO_CONVERGENCE");
      }
    }
  });

  it("should reject non-positive target prices and bad contract fields", () => {
    expect(() => calculateImpliedVolatility(query(0))).toThrow(InvalidArgumentError);
    expect(() => calculateImpliedVolatility({ ...query(10), spot: -1 })).toThrow(
      InvalidArgumentError
    );
  });

  it("should reject an inverted bracket and bad iteration budgets", () => {
    expect(() =>
      calculateImpliedVolatility(query(10), { volLow: 1, volHigh: 0.5 })
    ).toThrow(InvalidArgumentError);
    expect(() => calculateImpliedVolatility(query(10), { maxIterations: 0 })).toThrow(
      InvalidArgumentError
    );
  });
});
