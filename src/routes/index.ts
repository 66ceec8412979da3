// src/routes/index.ts
import { Router, type RequestHandler } from "express";
import type { AppConfig } from "../config/env";
import type { CodeSender } from "../controllers/auth.controller";
import { createAuthenticate } from "../middleware/auth.middleware";
import type { TradeReportStore } from "../services/reportStore";
import type { UserStore } from "../services/userStore";
import registerAnalyticsRoutes from "./analytics.routes";
import registerAuthRoutes from "./auth.routes";

export interface ApiDeps {
  config: AppConfig;
  reports: TradeReportStore;
  users: UserStore;
  sendCode?: CodeSender;
}

/** Explicitly typed handlers avoid the Application overload */
const healthHandler: RequestHandler = (_req, res) => {
  res.json({ ok: true, service: "trade-analytics" });
};

export default function createApiRouter({ config, reports, users, sendCode }: ApiDeps) {
  const router = Router();
  const authenticate = createAuthenticate(config, users);

  /** Health check */
  router.get("/health", healthHandler);

  router.use("/auth", registerAuthRoutes({ config, users, authenticate, sendCode }));
  router.use("/analytics", registerAnalyticsRoutes({ config, reports, authenticate }));

  return router;
}
