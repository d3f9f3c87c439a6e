import { Router } from "express";
import multer from "multer";
import { IngestService } from "../services/ingestService";
import { ApiError } from "../middleware/errorHandler";

export default function ingestRoutes(uploadMaxBytes: number): Router {
  const router = Router();
  // 設定 Multer 存入記憶體
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: uploadMaxBytes },
  });

  router.post("/preview", upload.single("file"), (req, res) => {
    if (!req.file) {
      throw new ApiError(400, "MISSING_FILE", "Missing file");
    }
    const result = IngestService.previewUpload(req.file.buffer, req.file.originalname);
    res.json({ ok: true, ...result });
  });

  return router;
}
