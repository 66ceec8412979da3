// src/middleware/error.middleware.ts
import type { NextFunction, Request, Response } from "express";
import multer from "multer";
import { HttpError, ParseError } from "../utils/errors";

export function errorMiddleware(err: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  if (err instanceof ParseError) {
    console.warn(`[api] ${req.method} ${req.originalUrl} parse error: ${err.message}`);
    res.status(400).json({ message: err.message, missing: err.missing, found: err.found });
    return;
  }

  if (err instanceof multer.MulterError) {
    res.status(err.code === "LIMIT_FILE_SIZE" ? 413 : 400).json({ message: err.message });
    return;
  }

  // body-parser rejects bad JSON with a SyntaxError carrying status 400
  if (err instanceof SyntaxError && "status" in err) {
    res.status(400).json({ message: "Malformed JSON body" });
    return;
  }

  if (err instanceof HttpError) {
    res.status(err.status).json({ message: err.message });
    return;
  }

  console.error(`[api] ${req.method} ${req.originalUrl} error:`, err);
  res.status(500).json({ message: "Server error" });
}
