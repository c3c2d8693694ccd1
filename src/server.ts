/**
 * Express API Server: pricing over HTTP
 *
 *   GET  /api/health       liveness
 *   POST /api/price        price one contract with a named model
 *   POST /api/greeks       price + Greeks for one contract
 *   POST /api/implied-vol  solve for volatility from an observed price
 *   POST /api/portfolio    value and delta/gamma across positions
 *
 * Start: npm run serve
 */

import express, { type Express, type Request, type Response } from "express";
import { fileURLToPath } from "url";
import {
  handleGreeks,
  handleImpliedVol,
  handlePortfolio,
  handlePrice,
  type ApiResult,
  type ApiSettings,
} from "./api/handlers.js";
import { config } from "./config/index.js";
import { componentLogger } from "./utils/logger.js";

const log = componentLogger("server");

export function settingsFromConfig(): ApiSettings {
  return {
    binomialSteps: config.pricing.binomialSteps,
    trinomialSteps: config.pricing.trinomialSteps,
    ivTolerance: config.impliedVol.tolerance,
    ivMaxIterations: config.impliedVol.maxIterations,
  };
}

function route<T>(
  name: string,
  handler: (body: unknown, settings: ApiSettings) => ApiResult<T>,
  settings: ApiSettings
) {
  return (req: Request, res: Response) => {
    const started = Date.now();
    const result = handler(req.body, settings);
    if (result.body.success) {
      log.debug(`${name} ok`, { ms: Date.now() - started });
    } else {
      log.warn(`${name} failed: ${result.body.error}`, {
        code: result.body.code,
        status: result.status,
      });
    }
    res.status(result.status).json(result.body);
  };
}

export function createApp(settings: ApiSettings = settingsFromConfig()): Express {
  const app = express();
  app.use(express.json());

  app.get("/api/health", (_req, res) => {
    res.json({ success: true, data: { status: "ok" } });
  });

  app.post("/api/price", route("price", handlePrice, settings));
  app.post("/api/greeks", route("greeks", handleGreeks, settings));
  app.post("/api/implied-vol", route("implied-vol", handleImpliedVol, settings));
  app.post("/api/portfolio", route("portfolio", handlePortfolio, settings));

  return app;
}

function startServer(): void {
  const app = createApp();
  app.listen(config.port, () => {
    log.info(`Pricing API listening on http://localhost:${config.port}`);
    log.info(
      `Defaults: binomial ${config.pricing.binomialSteps} steps, ` +
        `trinomial ${config.pricing.trinomialSteps} steps`
    );
  });
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  startServer();
}
