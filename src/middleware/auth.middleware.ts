// src/middleware/auth.middleware.ts
import type { RequestHandler } from "express";
import jwt from "jsonwebtoken";
import type { AppConfig } from "../config/env";
import type { UserRole, UserStore } from "../services/userStore";

export interface TokenClaims {
  id: string;
  role: UserRole;
  /** server-side session the token belongs to */
  sid: string;
}

export function signToken(claims: TokenClaims, config: AppConfig): string {
  return jwt.sign(claims, config.jwtSecret, { expiresIn: config.jwtExpiresInSeconds });
}

/** User and session ids from a valid token, null for anything else. */
export function verifyToken(token: string, config: AppConfig): { userId: string; sessionId: string } | null {
  try {
    const decoded = jwt.verify(token, config.jwtSecret);
    if (typeof decoded === "object" && typeof decoded.id === "string" && typeof decoded.sid === "string") {
      return { userId: decoded.id, sessionId: decoded.sid };
    }
    return null;
  } catch {
    return null;
  }
}

export const createAuthenticate =
  (config: AppConfig, users: UserStore): RequestHandler =>
  async (req, res, next): Promise<void> => {
    if (config.publicMode) {
      next();
      return;
    }

    let token: string | undefined;
    if (req.headers.authorization?.startsWith("Bearer ")) {
      token = req.headers.authorization.split(" ")[1];
    }

    if (!token) {
      res.status(401).json({ message: "Not authorized, no token provided" });
      return;
    }

    const claims = verifyToken(token, config);
    if (!claims) {
      res.status(401).json({ message: "Not authorized, token failed" });
      return;
    }

    try {
      const session = await users.findSession(claims.sessionId);
      if (!session || session.userId !== claims.userId || session.expiresAt.getTime() <= Date.now()) {
        res.status(401).json({ message: "Session expired or signed out" });
        return;
      }

      const user = await users.findById(claims.userId);
      if (!user) {
        res.status(401).json({ message: "No user found with this token" });
        return;
      }
      req.user = { id: user.id, email: user.email, role: user.role, sessionId: session.id };
      next();
    } catch (err) {
      next(err);
    }
  };

/** Run after authenticate. */
export const authorize =
  (...roles: UserRole[]): RequestHandler =>
  (req, res, next): void => {
    if (!req.user || !roles.includes(req.user.role)) {
      res.status(403).json({ message: "Not authorized to access this route" });
      return;
    }
    next();
  };
