import { Router } from "express";
import type { RecordSet } from "@shelter/shared";

export const API_VERSION = "0.1.0";

export default function systemRoutes(recordSet: RecordSet): Router {
  const router = Router();

  router.get("/health", (req, res) => {
    res.json({
      status: "ok",
      version: API_VERSION,
      dataset: {
        source: recordSet.source,
        records: recordSet.records.length,
        loadedAt: recordSet.loadedAt,
      },
      time: new Date().toISOString(),
    });
  });

  return router;
}
