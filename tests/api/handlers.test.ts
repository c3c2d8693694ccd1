/**
 * Pricing API Handler Tests
 */

import { describe, it, expect } from "vitest";
import {
  handleGreeks,
  handleImpliedVol,
  handlePortfolio,
  handlePrice,
  toFailure,
  type ApiSettings,
} from "../../src/api/handlers.js";

const settings: ApiSettings = {
  binomialSteps: 100,
  trinomialSteps: 80,
  ivTolerance: 1e-6,
  ivMaxIterations: 1000,
};

const market = { spot: 100, strike: 100, rate: 0.05, timeToMaturity: 1, type: "call" };
const contract = { ...market, volatility: 0.2 };

describe("handlePrice", () => {
  it("should price with the analytic model", () => {
    const result = handlePrice({ model: "BlackScholes", contract }, settings);
    expect(result.status).toBe(200);
    if (!result.body.success) throw new Error(result.body.error);
    expect(result.body.data.model).toBe("blackScholes");
    expect(result.body.data.steps).toBeUndefined();
    expect(result.body.data.price).toBeCloseTo(10.450575, 5);
  });

  it("should fill the step count from settings", () => {
    const result = handlePrice({ model: "TrinomialTree", contract }, settings);
    if (!result.body.success) throw new Error(result.body.error);
    expect(result.body.data.steps).toBe(80);
  });

  it("should honour an explicit step count", () => {
    const result = handlePrice({ model: "BinomialTree", steps: 1, contract }, settings);
    if (!result.body.success) throw new Error(result.body.error);
    expect(result.body.data).toEqual({
      model: "binomialTree",
      steps: 1,
      price: result.body.data.price,
    });
    expect(result.body.data.price).toBeCloseTo(12.162285, 5);
  });

  it("should answer 400 for an invalid contract", () => {
    const result = handlePrice(
      { model: "BlackScholes", contract: { ...contract, spot: -5 } },
      settings
    );
    expect(result).toEqual({
      status: 400,
      body: {
        success: false,
        error: "Invalid price request: contract.spot: Spot price must be positive",
        code: "INVALID_ARGUMENT",
      },
    });
  });

  it("should answer 400 for an unknown model", () => {
    const result = handlePrice({ model: "MonteCarlo", contract }, settings);
    expect(result.status).toBe(400);
    expect(result.body).toMatchObject({ success: false, code: "UNKNOWN_MODEL" });
  });

  it("should answer 400 for American options on the analytic model", () => {
    const result = handlePrice(
      { model: "BlackScholes", contract: { ...contract, style: "american" } },
      settings
    );
    expect(result.status).toBe(400);
    expect(result.body).toMatchObject({ success: false, code: "MODEL_MISMATCH" });
  });
});

describe("handleGreeks", () => {
  it("should include rho for the analytic model only", () => {
    const analytic = handleGreeks({ model: "BlackScholes", contract }, settings);
    if (!analytic.body.success) throw new Error(analytic.body.error);
    expect(analytic.body.data.greeks).toHaveProperty("rho");

    const lattice = handleGreeks({ model: "BinomialTree", steps: 50, contract }, settings);
    if (!lattice.body.success) throw new Error(lattice.body.error);
    expect(lattice.body.data.greeks).not.toHaveProperty("rho");
  });
});

describe("handleImpliedVol", () => {
  it("should solve for volatility", () => {
    const result = handleImpliedVol({ targetPrice: 10.450575, contract: market }, settings);
    expect(result.status).toBe(200);
    if (!result.body.success) throw new Error(result.body.error);
    expect(result.body.data.impliedVolatility).toBeCloseTo(0.2, 5);
  });

  it("should answer 422 for an unreachable price", () => {
    const result = handleImpliedVol({ targetPrice: 99, contract: market }, settings);
    expect(result.status).toBe(422);
    expect(result.body).toMatchObject({ success: false, code: "IV_OUT_OF_BOUNDS" });
  });

  it("should answer 422 when the iteration budget runs out", () => {
    const result = handleImpliedVol(
      { targetPrice: 10.450575, contract: market, tolerance: 1e-12, maxIterations: 3 },
      settings
    );
    expect(result.status).toBe(422);
    expect(result.body).toMatchObject({ success: false, code: "IV_NO_CONVERGENCE" });
  });
});

describe("handlePortfolio", () => {
  it("should aggregate positions across models", () => {
    const result = handlePortfolio(
      {
        positions: [
          { model: "BlackScholes", contract },
          { model: "BlackScholes", quantity: 1, contract: { ...contract, type: "put" } },
        ],
      },
      settings
    );
    if (!result.body.success) throw new Error(result.body.error);
    expect(result.body.data.totalValue).toBeCloseTo(16.024093, 5);
    expect(result.body.data.rho).not.toBeNull();
    expect(result.body.data.positions.map((p) => p.quantity)).toEqual([1, 1]);
  });

  it("should report a null rho with a lattice position", () => {
    const result = handlePortfolio(
      { positions: [{ model: "TrinomialTree", steps: 20, contract }] },
      settings
    );
    if (!result.body.success) throw new Error(result.body.error);
    expect(result.body.data.rho).toBeNull();
    expect(result.body.data.positions[0].model).toBe("trinomialTree");
  });

  it("should reject an empty book", () => {
    const result = handlePortfolio({ positions: [] }, settings);
    expect(result.status).toBe(400);
    expect(result.body).toMatchObject({
      success: false,
      error: "Invalid portfolio request: positions: Portfolio needs at least one position",
    });
  });
});

describe("toFailure", () => {
  it("should map unknown errors to 500", () => {
    expect(toFailure(new Error("boom"))).toEqual({
      status: 500,
      body: { success: false, error: "Error: boom", code: "INTERNAL_ERROR" },
    });
  });
});
