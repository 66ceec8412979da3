// src/routes/analytics.routes.ts
import { Router, type RequestHandler } from "express";
import multer from "multer";
import type { AppConfig } from "../config/env";
import { createAnalyticsController } from "../controllers/analytics.controller";
import type { TradeReportStore } from "../services/reportStore";

export interface AnalyticsRoutesDeps {
  config: AppConfig;
  reports: TradeReportStore;
  authenticate: RequestHandler;
}

export default function registerAnalyticsRoutes({ config, reports, authenticate }: AnalyticsRoutesDeps) {
  const router = Router();
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: config.maxUploadMb * 1024 * 1024, files: 1 },
  });
  const c = createAnalyticsController({ config, reports });

  router.use(authenticate);

  router.post("/upload-trades", upload.single("file"), c.uploadTrades);
  router.get("/trades", c.listTrades);
  router.get("/summary", c.summary);
  router.get("/filter", c.filter);
  router.get("/timeseries", c.timeseries);
  router.get("/by-symbol", c.bySymbol);
  router.get("/hourly-heatmap", c.hourlyHeatmap);
  router.get("/daily-stats", c.dailyStats);
  router.get("/monthly-stats", c.monthlyStats);

  return router;
}
