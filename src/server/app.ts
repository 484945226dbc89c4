import express, { type Request, type Response } from "express";
import cors from "cors";
import rateLimit from "express-rate-limit";

import type { AppConfig } from "../config.js";
import type { ValuationEngine } from "../engine/valuation-engine.js";
import { CancelledError } from "../errors.js";
import type { ErrorCode } from "../types/valuation.js";
import { getRequestId, logger, requestLogger, serializeError } from "./logger.js";

const STATUS: Record<ErrorCode, number> = {
  invalid_input: 400,
  not_found: 404,
  quota_exceeded: 429,
  // nginx's "client closed request"
  cancelled: 499,
  provider_unavailable: 502,
  infrastructure_degraded: 503,
};

function queryParam(req: Request, key: string): string | undefined {
  const value = req.query[key];
  return typeof value === "string" ? value : undefined;
}

/** Aborts when the client goes away before the response is written. */
function clientSignal(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableEnded) controller.abort(new CancelledError("client disconnected"));
  });
  return controller.signal;
}

export function createApp(engine: ValuationEngine, config: AppConfig) {
  const app = express();

  app.use(requestLogger);
  app.use(cors({ origin: true, credentials: false }));

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  const api = express.Router();
  api.use(
    rateLimit({
      windowMs: 60_000,
      limit: config.server.rateLimitPerMinute,
      standardHeaders: true,
      legacyHeaders: false,
    }),
  );

  api.get("/vehicle/:plate", async (req, res) => {
    const signal = clientSignal(res);
    try {
      const record = await engine.resolvePlate(req.params.plate, signal);
      if (record.found) {
        res.json({ success: true, ...record });
        return;
      }
      const status = record.errorCode === "invalid_input" ? 400 : record.errorCode === "cancelled" ? 499 : 404;
      res.status(status).json({
        success: false,
        error: record.errorReason ?? "Vehicle not found",
        code: record.errorCode ?? "not_found",
        failures: record.failures,
      });
    } catch (error) {
      logger.error("Vehicle lookup failed", { requestId: getRequestId(res), error: serializeError(error) });
      res.status(500).json({ success: false, error: "internal_error" });
    }
  });

  api.get("/market-price", async (req, res) => {
    const signal = clientSignal(res);
    try {
      const outcome = await engine.resolveValuation(
        {
          make: queryParam(req, "make"),
          model: queryParam(req, "model"),
          year: queryParam(req, "year"),
          trim: queryParam(req, "trim"),
          mileage: queryParam(req, "mileage"),
          region: queryParam(req, "region"),
          plate: queryParam(req, "plate"),
        },
        signal,
      );

      if (!outcome.success) {
        res.status(STATUS[outcome.code]).json({ success: false, error: outcome.error, code: outcome.code });
        return;
      }

      res.json({
        success: true,
        vehicle: outcome.vehicle,
        marketData: outcome.estimate,
        pricing: outcome.offer,
        details: outcome.details,
        quota: outcome.quota,
      });
    } catch (error) {
      logger.error("Valuation failed", { requestId: getRequestId(res), error: serializeError(error) });
      res.status(500).json({ success: false, error: "internal_error" });
    }
  });

  app.use(config.server.apiPrefix, api);
  return app;
}
