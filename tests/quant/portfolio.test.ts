/**
 * Option Portfolio Tests
 */

import { describe, it, expect } from "vitest";
import { analyticPrice } from "../../src/quant/black-scholes.js";
import { analyticGreeks } from "../../src/quant/greeks.js";
import { createContract } from "../../src/quant/contract.js";
import { OptionPortfolio } from "../../src/quant/portfolio.js";
import { createPricer, valuate } from "../../src/quant/pricers.js";
import { InvalidArgumentError } from "../../src/utils/errors.js";

const market = { spot: 100, strike: 100, rate: 0.05, volatility: 0.2, timeToMaturity: 1 };
const call = createContract({ ...market, type: "call" });
const put = createContract({ ...market, type: "put" });
const americanPut = createContract({ ...market, type: "put", style: "american" });
const bs = createPricer("blackScholes");

describe("OptionPortfolio", () => {
  it("should start empty with zero aggregates", () => {
    const portfolio = new OptionPortfolio();
    expect(portfolio.size).toBe(0);
    expect(portfolio.totalValue()).toBe(0);
    expect(portfolio.delta()).toBe(0);
    expect(portfolio.gamma()).toBe(0);
  });

  it("should sum quantity-weighted values", () => {
    const portfolio = new OptionPortfolio().addPosition(bs, call, 1).addPosition(bs, put, 1);
    expect(portfolio.size).toBe(2);
    expect(portfolio.totalValue()).toBeCloseTo(16.024093, 5);
  });

  it("should net a straddle's delta and double its gamma", () => {
    const portfolio = new OptionPortfolio().addPosition(bs, call).addPosition(bs, put);
    const g = analyticGreeks(call);
    // put delta = call delta - 1
    expect(portfolio.delta()).toBeCloseTo(2 * g.delta - 1, 10);
    expect(portfolio.gamma()).toBeCloseTo(2 * g.gamma, 10);
  });

  it("should scale short positions negatively", () => {
    const portfolio = new OptionPortfolio().addPosition(bs, call, -2);
    expect(portfolio.totalValue()).toBeCloseTo(-2 * analyticPrice(call), 10);
    expect(portfolio.delta()).toBeCloseTo(-2 * analyticGreeks(call).delta, 10);
  });

  it("should mix analytic and lattice positions", () => {
    const tree = createPricer("binomialTree", 50);
    const portfolio = new OptionPortfolio()
      .addPosition(bs, call)
      .addPosition(tree, americanPut, 3);

    const expected = analyticPrice(call) + 3 * valuate(tree, americanPut).price;
    expect(portfolio.totalValue()).toBeCloseTo(expected, 10);
    expect(portfolio.valuations().map((v) => v.model)).toEqual(["blackScholes", "binomialTree"]);
  });

  it("should sum lattice delta and gamma without a full valuation", () => {
    const tree = createPricer("trinomialTree", 60);
    const portfolio = new OptionPortfolio().addPosition(tree, americanPut, 2);
    const { greeks } = valuate(tree, americanPut);
    expect(portfolio.delta()).toBeCloseTo(2 * greeks.delta, 12);
    expect(portfolio.gamma()).toBeCloseTo(2 * greeks.gamma, 12);
  });

  it("should reject non-finite quantities", () => {
    expect(() => new OptionPortfolio().addPosition(bs, call, Number.NaN)).toThrow(
      InvalidArgumentError
    );
  });

  it("should expose positions in insertion order", () => {
    const portfolio = new OptionPortfolio().addPosition(bs, call, 2).addPosition(bs, put, 5);
    expect(portfolio.positions.map((p) => [p.contract.type, p.quantity])).toEqual([
      ["call", 2],
      ["put", 5],
    ]);
  });
});

describe("OptionPortfolio.summarize", () => {
  it("should aggregate every Greek including rho for analytic books", () => {
    const summary = new OptionPortfolio().addPosition(bs, call).addPosition(bs, put, 2).summarize();
    const c = analyticGreeks(call);
    const p = analyticGreeks(put);

    expect(summary.totalValue).toBeCloseTo(analyticPrice(call) + 2 * analyticPrice(put), 10);
    expect(summary.theta).toBeCloseTo(c.theta + 2 * p.theta, 10);
    expect(summary.vega).toBeCloseTo(c.vega + 2 * p.vega, 10);
    expect(summary.rho).not.toBeNull();
    expect(summary.rho ?? Number.NaN).toBeCloseTo(c.rho + 2 * p.rho, 10);
    expect(summary.positions).toHaveLength(2);
  });

  it("should drop rho once a lattice position is present", () => {
    const summary = new OptionPortfolio()
      .addPosition(bs, call)
      .addPosition(createPricer("trinomialTree", 40), americanPut)
      .summarize();
    expect(summary.rho).toBeNull();
    expect(summary.positions[1].valuation.model).toBe("trinomialTree");
  });
});
