import express from "express";
import type { Express } from "express";
import cors from "cors";
import type { RecordSet } from "@shelter/shared";
import type { AppConfig } from "./config";
import systemRoutes from "./routes/system";
import dataRoutes from "./routes/data";
import aggregateRoutes from "./routes/aggregates";
import trendRoutes from "./routes/trends";
import workloadRoutes from "./routes/workload";
import ingestRoutes from "./routes/ingest";
import { createErrorHandler, notFoundHandler } from "./middleware/errorHandler";

export interface AppDeps {
  recordSet: RecordSet;
  config: AppConfig;
}

/**
 * Builds the API over a record set loaded once at startup. Every response is
 * recomputed from that set; uploads are previewed without replacing it.
 */
export function createApp({ recordSet, config }: AppDeps): Express {
  const app = express();

  app.use(cors({
    origin: config.corsOrigin,
    credentials: true
  }));

  // Health Checks
  app.get("/api/health", (req, res) => {
    res.json({ ok: true, ts: Date.now() });
  });

  // Routes
  app.use("/api/system", systemRoutes(recordSet));
  app.use("/api/data", dataRoutes(recordSet));
  app.use("/api/aggregates", aggregateRoutes(recordSet));
  app.use("/api/trends", trendRoutes(recordSet));
  app.use("/api/workload", workloadRoutes(recordSet, config));
  app.use("/api/ingest", ingestRoutes(config.uploadMaxBytes));

  app.use(notFoundHandler);
  app.use(createErrorHandler(config.uploadMaxBytes));

  return app;
}
