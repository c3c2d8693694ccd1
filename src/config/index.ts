/**
 * Centralized configuration loaded from environment variables.
 * Uses zod for runtime validation.
 *
 * Only the outer edges (demo driver, HTTP server) read this; the
 * pricing core takes every parameter explicitly.
 */

import { z } from "zod";
import dotenv from "dotenv";

dotenv.config();

const ConfigSchema = z.object({
  // Lattice resolution used when a request names no step count
  pricing: z.object({
    binomialSteps: z.coerce.number().int().min(1).default(100),
    trinomialSteps: z.coerce.number().int().min(1).default(80),
  }),

  // Implied volatility bisection
  impliedVol: z.object({
    tolerance: z.coerce.number().positive().default(1e-6),
    maxIterations: z.coerce.number().int().positive().default(1000),
  }),

  // System
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
  port: z.coerce.number().default(3000),
});

export type Config = z.infer<typeof ConfigSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const raw = {
    pricing: {
      binomialSteps: env.BINOMIAL_STEPS,
      trinomialSteps: env.TRINOMIAL_STEPS,
    },
    impliedVol: {
      tolerance: env.IV_TOLERANCE,
      maxIterations: env.IV_MAX_ITERATIONS,
    },
    logLevel: env.LOG_LEVEL,
    nodeEnv: env.NODE_ENV,
    port: env.PORT,
  };

  return ConfigSchema.parse(raw);
}

/** Singleton config instance */
export const config = loadConfig();
