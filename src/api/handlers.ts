/**
 * Pricing API handlers.
 *
 * Each handler takes a raw JSON body, validates it with zod and answers
 * with a status code plus the `{ success, data | error }` envelope the
 * Express routes send as-is. Model names stay strings only up to
 * parsePricingModel; everything past that works on tags.
 */

import type { Pricer, PricingModel, Valuation } from "../types/options.js";
import { PricingError, toHttpStatus } from "../utils/errors.js";
import {
  ImpliedVolRequestSchema,
  PortfolioRequestSchema,
  PriceRequestSchema,
  parseOrThrow,
} from "../utils/validation.js";
import { createContract } from "../quant/contract.js";
import { calculateImpliedVolatility } from "../quant/implied-volatility.js";
import { OptionPortfolio } from "../quant/portfolio.js";
import { createPricer, parsePricingModel, priceWith, valuate } from "../quant/pricers.js";

export interface ApiSettings {
  binomialSteps: number;
  trinomialSteps: number;
  ivTolerance: number;
  ivMaxIterations: number;
}

export type ApiBody<T> =
  | { success: true; data: T }
  | { success: false; error: string; code: string };

export interface ApiResult<T> {
  status: number;
  body: ApiBody<T>;
}

export interface PriceData {
  model: PricingModel;
  steps?: number;
  price: number;
}

export interface ImpliedVolData {
  targetPrice: number;
  impliedVolatility: number;
}

export interface PortfolioData {
  totalValue: number;
  delta: number;
  gamma: number;
  theta: number;
  vega: number;
  rho: number | null;
  positions: Array<{ model: PricingModel; quantity: number; price: number }>;
}

/** Turn a thrown error into the failure envelope */
export function toFailure(error: unknown): ApiResult<never> {
  const status = toHttpStatus(error);
  if (error instanceof PricingError) {
    return { status, body: { success: false, error: error.message, code: error.code } };
  }
  return {
    status,
    body: { success: false, error: String(error), code: "INTERNAL_ERROR" },
  };
}

function respond<T>(compute: () => T): ApiResult<T> {
  try {
    return { status: 200, body: { success: true, data: compute() } };
  } catch (err) {
    return toFailure(err);
  }
}

function resolvePricer(name: string, steps: number | undefined, settings: ApiSettings): Pricer {
  const model = parsePricingModel(name);
  switch (model) {
    case "blackScholes":
      return createPricer(model);
    case "binomialTree":
      return createPricer(model, steps ?? settings.binomialSteps);
    case "trinomialTree":
      return createPricer(model, steps ?? settings.trinomialSteps);
  }
}

/** POST /api/price */
export function handlePrice(body: unknown, settings: ApiSettings): ApiResult<PriceData> {
  return respond(() => {
    const req = parseOrThrow(PriceRequestSchema, body, "price request");
    const pricer = resolvePricer(req.model, req.steps, settings);
    const price = priceWith(pricer, createContract(req.contract));
    return pricer.model === "blackScholes"
      ? { model: pricer.model, price }
      : { model: pricer.model, steps: pricer.steps, price };
  });
}

/** POST /api/greeks */
export function handleGreeks(body: unknown, settings: ApiSettings): ApiResult<Valuation> {
  return respond(() => {
    const req = parseOrThrow(PriceRequestSchema, body, "greeks request");
    const pricer = resolvePricer(req.model, req.steps, settings);
    return valuate(pricer, createContract(req.contract));
  });
}

/** POST /api/implied-vol */
export function handleImpliedVol(
  body: unknown,
  settings: ApiSettings
): ApiResult<ImpliedVolData> {
  return respond(() => {
    const req = parseOrThrow(ImpliedVolRequestSchema, body, "implied volatility request");
    const impliedVolatility = calculateImpliedVolatility(
      { targetPrice: req.targetPrice, ...req.contract },
      {
        volLow: req.volLow,
        volHigh: req.volHigh,
        tolerance: req.tolerance ?? settings.ivTolerance,
        maxIterations: req.maxIterations ?? settings.ivMaxIterations,
      }
    );
    return { targetPrice: req.targetPrice, impliedVolatility };
  });
}

/** POST /api/portfolio */
export function handlePortfolio(
  body: unknown,
  settings: ApiSettings
): ApiResult<PortfolioData> {
  return respond(() => {
    const req = parseOrThrow(PortfolioRequestSchema, body, "portfolio request");
    const portfolio = new OptionPortfolio();
    for (const p of req.positions) {
      portfolio.addPosition(
        resolvePricer(p.model, p.steps, settings),
        createContract(p.contract),
        p.quantity
      );
    }

    const summary = portfolio.summarize();
    return {
      totalValue: summary.totalValue,
      delta: summary.delta,
      gamma: summary.gamma,
      theta: summary.theta,
      vega: summary.vega,
      rho: summary.rho,
      positions: summary.positions.map((p) => ({
        model: p.valuation.model,
        quantity: p.quantity,
        price: p.valuation.price,
      })),
    };
  });
}
