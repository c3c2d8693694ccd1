/**
 * Option contract construction.
 *
 * Contracts are validated once and frozen; every pricer reads from the
 * snapshot and never mutates it. Perturbed reruns build new contracts.
 */

import {
  VALIDATED_CONTRACT,
  type ContractTerms,
  type OptionContract,
} from "../types/options.js";
import {
  ContractInputSchema,
  StepsSchema,
  parseOrThrow,
  type ContractInput,
} from "../utils/validation.js";

/**
 * Validate and freeze a contract.
 * Throws InvalidArgumentError for non-positive spot, strike, volatility
 * or maturity, and for any non-finite field.
 */
export function createContract(input: ContractInput): OptionContract {
  const parsed = parseOrThrow(ContractInputSchema, input, "contract");
  const contract: OptionContract = {
    spot: parsed.spot,
    strike: parsed.strike,
    rate: parsed.rate,
    volatility: parsed.volatility,
    timeToMaturity: parsed.timeToMaturity,
    type: parsed.type,
    style: parsed.style,
    [VALIDATED_CONTRACT]: true,
  };
  return Object.freeze(contract);
}

/** New validated contract with some fields replaced */
export function withBump(
  contract: OptionContract,
  changes: Partial<ContractTerms>
): OptionContract {
  const { spot, strike, rate, volatility, timeToMaturity, type, style } = contract;
  return createContract({
    spot,
    strike,
    rate,
    volatility,
    timeToMaturity,
    type,
    style,
    ...changes,
  });
}

/** Throws InvalidArgumentError unless steps is a whole number ≥ 1 */
export function assertSteps(steps: number): number {
  return parseOrThrow(StepsSchema, steps, "step count");
}

/** Immediate-exercise value at a given underlying price */
export function intrinsicValue(contract: OptionContract, underlying: number): number {
  return contract.type === "call"
    ? Math.max(0, underlying - contract.strike)
    : Math.max(0, contract.strike - underlying);
}

const capitalize = (s: string) => s.charAt(0).toUpperCase() + s.slice(1);

/** Human-readable parameter block */
export function describeContract(contract: OptionContract): string {
  return [
    `Type: ${capitalize(contract.type)} ${capitalize(contract.style)}`,
    `Spot Price: ${contract.spot.toFixed(4)}`,
    `Strike Price: ${contract.strike.toFixed(4)}`,
    `Risk-Free Rate: ${(contract.rate * 100).toFixed(4)}%`,
    `Volatility: ${(contract.volatility * 100).toFixed(4)}%`,
    `Time to Maturity: ${contract.timeToMaturity.toFixed(4)} years`,
  ].join("\n");
}
