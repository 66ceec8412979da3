// src/routes/auth.routes.ts
import { Router, type RequestHandler } from "express";
import type { AppConfig } from "../config/env";
import { createAuthController, type CodeSender } from "../controllers/auth.controller";
import { authorize } from "../middleware/auth.middleware";
import type { UserStore } from "../services/userStore";

export interface AuthRoutesDeps {
  config: AppConfig;
  users: UserStore;
  authenticate: RequestHandler;
  sendCode?: CodeSender;
}

export default function registerAuthRoutes({ config, users, authenticate, sendCode }: AuthRoutesDeps) {
  const router = Router();
  const c = createAuthController({ config, users, sendCode });

  router.post("/register", c.register);
  router.post("/verify-email", c.verifyEmail);
  router.post("/resend-verification", c.resendVerification);
  router.post("/login", c.login);
  router.post("/sign-out", authenticate, c.signOut);
  router.get("/me", authenticate, c.me);
  router.get("/session", authenticate, c.session);
  router.delete("/sessions/cleanup", authenticate, authorize("admin"), c.cleanupSessions);
  router.post("/forgot-password", c.forgotPassword);
  router.post("/reset-password", c.resetPassword);
  router.get("/oauth/:provider", c.oauthNotImplemented);
  router.get("/oauth/:provider/callback", c.oauthNotImplemented);

  return router;
}
