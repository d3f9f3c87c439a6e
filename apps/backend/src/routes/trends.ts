import { Router } from "express";
import { FilterQuerySchema } from "@shelter/shared";
import type { RecordSet } from "@shelter/shared";
import { calculateDailyTrend, dailyDistribution, hourlyDensity } from "@core";

export default function trendRoutes(recordSet: RecordSet): Router {
  const router = Router();
  const { records } = recordSet;

  router.get("/daily", (req, res) => {
    const filter = FilterQuerySchema.parse(req.query);
    res.json({ ok: true, filter, trend: calculateDailyTrend(records, filter) });
  });

  router.get("/daily-distribution", (req, res) => {
    const filter = FilterQuerySchema.parse(req.query);
    res.json({ ok: true, filter, distribution: dailyDistribution(records, filter) });
  });

  router.get("/hourly-density", (req, res) => {
    const filter = FilterQuerySchema.parse(req.query);
    res.json({ ok: true, filter, density: hourlyDensity(records, filter) });
  });

  return router;
}
