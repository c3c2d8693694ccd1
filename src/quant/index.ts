/**
 * Quant Engine barrel export
 */

export * from "./normal.js";
export * from "./contract.js";
export * from "./black-scholes.js";
export * from "./lattice.js";
export * from "./binomial.js";
export * from "./trinomial.js";
export * from "./greeks.js";
export * from "./implied-volatility.js";
export * from "./pricers.js";
export * from "./portfolio.js";

export * from "../utils/errors.js";
export * from "../types/options.js";
