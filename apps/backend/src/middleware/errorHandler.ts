import type { ErrorRequestHandler, RequestHandler } from "express";
import multer from "multer";
import { ZodError } from "zod";
import { isDomainError, isLoadError } from "@core";

export class ApiError extends Error {
  readonly status: number;
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(status: number, code: string, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "ApiError";
    this.status = status;
    this.code = code;
    this.details = details;
  }
}

export const notFoundHandler: RequestHandler = (req, res) => {
  res.status(404).json({ ok: false, code: "NOT_FOUND", message: `No route for ${req.method} ${req.path}` });
};

// 統一錯誤格式: { ok: false, code, message, details? }
export function createErrorHandler(uploadMaxBytes: number): ErrorRequestHandler {
  const maxMb = Math.round((uploadMaxBytes / (1024 * 1024)) * 10) / 10;

  return (err: unknown, req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    if (err instanceof ApiError) {
      res.status(err.status).json({ ok: false, code: err.code, message: err.message, details: err.details });
      return;
    }
    if (err instanceof ZodError) {
      res.status(400).json({
        ok: false,
        code: "INVALID_QUERY",
        message: "Invalid query parameters",
        details: { issues: err.issues.map(i => ({ path: i.path.join("."), message: i.message })) },
      });
      return;
    }
    if (isDomainError(err)) {
      res.status(400).json({ ok: false, code: err.code, message: err.message, details: err.details });
      return;
    }
    if (isLoadError(err)) {
      res.status(422).json({ ok: false, code: err.code, message: err.message, details: err.details });
      return;
    }
    if (err instanceof multer.MulterError) {
      if (err.code === "LIMIT_FILE_SIZE") {
        res.status(413).json({ ok: false, code: "FILE_TOO_LARGE", message: `File too large (Max ${maxMb}MB)` });
        return;
      }
      res.status(400).json({ ok: false, code: "INVALID_UPLOAD", message: err.message, details: { field: err.field } });
      return;
    }

    console.error(`[API] ${req.method} ${req.originalUrl} failed`, err);
    res.status(500).json({
      ok: false,
      code: "INTERNAL_ERROR",
      message: err instanceof Error ? err.message : "Internal error",
    });
  };
}
