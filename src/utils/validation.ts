/**
 * Input validation utilities.
 */

import { z } from "zod";
import { InvalidArgumentError } from "./errors.js";

/** Validate the six contract fields plus exercise style */
export const ContractInputSchema = z.object({
  spot: z.number().finite().positive("Spot price must be positive"),
  strike: z.number().finite().positive("Strike price must be positive"),
  rate: z.number().finite(),
  volatility: z.number().finite().positive("Volatility must be positive"),
  timeToMaturity: z
    .number()
    .finite()
    .positive("Time to maturity must be positive"),
  type: z.enum(["call", "put"]),
  style: z.enum(["european", "american"]).default("european"),
});

export type ContractInput = z.input<typeof ContractInputSchema>;

/** Lattice resolution: whole number of steps, at least one */
export const StepsSchema = z
  .number()
  .int("Step count must be a whole number")
  .min(1, "Step count must be at least 1");

/** Raw model name as it arrives from the outer edge; resolved by parsePricingModel */
export const PricingModelNameSchema = z.string().min(1);

export const PriceRequestSchema = z.object({
  model: PricingModelNameSchema,
  steps: StepsSchema.optional(),
  contract: ContractInputSchema,
});

export const ImpliedVolRequestSchema = z.object({
  targetPrice: z.number().finite().positive("Target price must be positive"),
  contract: ContractInputSchema.omit({ volatility: true, style: true }),
  volLow: z.number().finite().positive().optional(),
  volHigh: z.number().finite().positive().optional(),
  tolerance: z.number().finite().positive().optional(),
  maxIterations: z.number().int().positive().optional(),
});

export const PortfolioRequestSchema = z.object({
  positions: z
    .array(
      z.object({
        model: PricingModelNameSchema,
        steps: StepsSchema.optional(),
        quantity: z.number().finite().default(1),
        contract: ContractInputSchema,
      })
    )
    .min(1, "Portfolio needs at least one position"),
});

export type PriceRequest = z.infer<typeof PriceRequestSchema>;
export type ImpliedVolRequest = z.infer<typeof ImpliedVolRequestSchema>;
export type PortfolioRequest = z.infer<typeof PortfolioRequestSchema>;

/**
 * Parse with a zod schema, turning the first issue into an InvalidArgumentError.
 * The error context carries the dotted field path and every issue message.
 */
export function parseOrThrow<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  label: string
): z.output<S> {
  const result = schema.safeParse(input);
  if (result.success) return result.data;

  const issues = result.error.issues;
  const first = issues[0];
  const field = first ? first.path.join(".") : "";
  const detail = first ? first.message : "invalid input";
  throw new InvalidArgumentError(
    field ? `Invalid ${label}: ${field}: ${detail}` : `Invalid ${label}: ${detail}`,
    {
      field,
      issues: issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    }
  );
}
