import { Router } from "express";
import { WorkloadQuerySchema } from "@shelter/shared";
import type { RecordSet } from "@shelter/shared";
import type { AppConfig } from "../config";
import { WorkloadService } from "../services/workloadService";

export default function workloadRoutes(recordSet: RecordSet, config: AppConfig): Router {
  const router = Router();

  router.get("/", (req, res) => {
    const query = WorkloadQuerySchema.parse(req.query);
    res.json({ ok: true, ...WorkloadService.forecast(recordSet, query, config) });
  });

  return router;
}
