import { Router } from "express";
import { DimensionSchema, FilterQuerySchema } from "@shelter/shared";
import type { RecordSet } from "@shelter/shared";
import { aggregate, hourlyAverages, weekdayDistribution } from "@core";

export default function aggregateRoutes(recordSet: RecordSet): Router {
  const router = Router();
  const { records } = recordSet;

  // Fixed paths first, otherwise /:dimension swallows them
  router.get("/weekday-distribution", (req, res) => {
    const filter = FilterQuerySchema.parse(req.query);
    res.json({ ok: true, filter, entries: weekdayDistribution(records, filter) });
  });

  router.get("/hourly-average", (req, res) => {
    const filter = FilterQuerySchema.parse(req.query);
    res.json({ ok: true, filter, entries: hourlyAverages(records, filter) });
  });

  router.get("/:dimension", (req, res) => {
    const dimension = DimensionSchema.parse(req.params.dimension);
    const filter = FilterQuerySchema.parse(req.query);
    res.json({ ok: true, dimension, filter, entries: aggregate(records, dimension, filter) });
  });

  return router;
}
