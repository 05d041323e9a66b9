import cors from "cors";
import express, { type Express, type NextFunction, type Request, type Response } from "express";

import type { AppConfig } from "./config";
import { errorMessage } from "./errors";
import { analyzeRouter, sendError, type Analyzer } from "./routes/analyze";
import { healthRouter } from "./routes/health";
import type { TextExtractor } from "./services/pdfText";

export type AppDeps = {
  config: AppConfig;
  analyzer: Analyzer;
  extractor: TextExtractor;
};

export function createApp(deps: AppDeps): Express {
  const app = express();

  app.use(
    cors({
      origin: deps.config.corsOrigins,
      methods: ["GET", "POST", "OPTIONS"],
      allowedHeaders: ["Content-Type", "Authorization"],
      credentials: false,
    })
  );
  app.use(express.json({ limit: "1mb" }));

  app.use(healthRouter());
  app.use(
    analyzeRouter({
      analyzer: deps.analyzer,
      extractor: deps.extractor,
      maxUploadBytes: deps.config.maxUploadBytes,
    })
  );

  app.use((_req: Request, res: Response) => {
    sendError(res, 404, "not_found", "Route not found");
  });

  // ✅ JSON errors only (prevents HTML error pages)
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    console.error("❌ UNHANDLED_ERROR:", errorMessage(err));
    sendError(res, 500, "internal_error", "Internal server error. Please try again later.");
  });

  return app;
}
