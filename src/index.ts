/**
 * Demo driver: walks through every pricing model and prints the reports.
 *
 *   1. Black-Scholes European call/put with Greeks, parity and finite-difference checks
 *   2. Binomial tree American options and early exercise premium
 *   3. Trinomial tree American options vs the binomial tree
 *   4. Implied volatility round trip
 *   5. Mixed-model portfolio
 *   6. Lattice convergence against the closed form
 *
 * Start: npm start
 */

import { config } from "./config/index.js";
import { logger } from "./utils/logger.js";
import {
  OptionPortfolio,
  createContract,
  createPricer,
  parsePricingModel,
  priceWith,
  valuate,
  type OptionStyle,
  type OptionType,
} from "./quant/index.js";
import {
  convergenceTable,
  doublingSteps,
  earlyExercisePremium,
  formatConvergenceTable,
  formatGreeksCrossCheck,
  formatValuation,
  greeksCrossCheck,
  impliedVolRoundTrip,
  putCallParityGap,
} from "./report/pricing-report.js";

const MARKET = { spot: 100, strike: 100, rate: 0.05, volatility: 0.2, timeToMaturity: 1 };

const contractOf = (type: OptionType, style: OptionStyle, strike = MARKET.strike) =>
  createContract({ ...MARKET, strike, type, style });

function section(title: string, body: string): void {
  logger.info(`═══ ${title} ═══\n${body}\n`);
}

function blackScholesSection(): void {
  const bs = createPricer("blackScholes");
  const call = contractOf("call", "european");
  const put = contractOf("put", "european");
  section(
    "Black-Scholes European Options",
    [
      formatValuation(call, valuate(bs, call)),
      "",
      formatValuation(put, valuate(bs, put)),
      "",
      `Put-Call Parity Check: ${putCallParityGap(call).toExponential(3)} (should be close to 0)`,
      "",
      "Finite-Difference Check (call):",
      formatGreeksCrossCheck(greeksCrossCheck(call)),
    ].join("\n")
  );
}

function latticeSection(): void {
  const binomialSteps = config.pricing.binomialSteps;
  const trinomialSteps = config.pricing.trinomialSteps;
  const binomial = createPricer("binomialTree", binomialSteps);
  const trinomial = createPricer("trinomialTree", trinomialSteps);
  const lines: string[] = [];

  for (const type of ["call", "put"] as const) {
    const american = contractOf(type, "american");
    lines.push(formatValuation(american, valuate(binomial, american)), "");

    const { european, premium } = earlyExercisePremium(american, "binomialTree", binomialSteps);
    lines.push(
      `European ${type} (Black-Scholes): ${european.toFixed(4)}`,
      `Early Exercise Premium (${type}): ${premium.toFixed(4)}`,
      ""
    );

    const tri = priceWith(trinomial, american);
    const bin = priceWith(binomial, american);
    lines.push(
      `Trinomial (${trinomialSteps} steps) American ${type}: ${tri.toFixed(4)}`,
      `Difference vs Binomial (${binomialSteps} steps): ${(tri - bin).toFixed(4)}`,
      ""
    );
  }
  section("Lattice American Options", lines.join("\n"));
}

function impliedVolSection(): void {
  const lines = (["call", "put"] as const).map((type) => {
    const { price, volatility, implied } = impliedVolRoundTrip(contractOf(type, "european"));
    return (
      `${type} price ${price.toFixed(4)} at σ=${(volatility * 100).toFixed(2)}% ` +
      `→ implied ${(implied * 100).toFixed(4)}%`
    );
  });
  section("Implied Volatility", lines.join("\n"));
}

function portfolioSection(): void {
  // Model names arrive as strings here, the way a caller would supply them
  const book: Array<[string, number | undefined, OptionType, OptionStyle, number, number]> = [
    ["BlackScholes", undefined, "call", "european", 100, 1],
    ["BlackScholes", undefined, "put", "european", 90, 2],
    ["BinomialTree", 100, "call", "american", 110, 1],
    ["TrinomialTree", 80, "put", "american", 100, 1],
  ];

  const portfolio = new OptionPortfolio();
  for (const [name, steps, type, style, strike, quantity] of book) {
    portfolio.addPosition(
      createPricer(parsePricingModel(name), steps),
      contractOf(type, style, strike),
      quantity
    );
  }

  const summary = portfolio.summarize();
  section(
    "Portfolio",
    [
      `Positions: ${portfolio.size}`,
      `Portfolio Total Value: ${summary.totalValue.toFixed(4)}`,
      `Portfolio Delta: ${summary.delta.toFixed(4)}`,
      `Portfolio Gamma: ${summary.gamma.toFixed(4)}`,
    ].join("\n")
  );
}

function convergenceSection(): void {
  const call = contractOf("call", "european");
  const binomial = convergenceTable(call, "binomialTree", doublingSteps(10, 1000));
  const trinomial = convergenceTable(call, "trinomialTree", doublingSteps(10, 500));
  section(
    "Convergence Analysis",
    [
      `Black-Scholes Price (Analytical): ${binomial.reference.toFixed(4)}`,
      "",
      "Binomial Tree:",
      formatConvergenceTable(binomial.rows),
      "",
      "Trinomial Tree:",
      formatConvergenceTable(trinomial.rows),
    ].join("\n")
  );
}

function main(): void {
  logger.info(`Environment: ${config.nodeEnv}`);
  blackScholesSection();
  latticeSection();
  impliedVolSection();
  portfolioSection();
  convergenceSection();
}

try {
  main();
} catch (err) {
  logger.error("Demo failed", { error: err instanceof Error ? err.message : String(err) });
  process.exit(1);
}
