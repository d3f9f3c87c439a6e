import { Router } from "express";
import type { RecordSet } from "@shelter/shared";
import { summarizeDataset } from "@core";

export default function dataRoutes(recordSet: RecordSet): Router {
  const router = Router();

  router.get("/overview", (req, res) => {
    res.json({ ok: true, overview: summarizeDataset(recordSet) });
  });

  return router;
}
