// src/controllers/auth.controller.ts
import type { Request, RequestHandler } from "express";
import bcrypt from "bcryptjs";
import { randomInt } from "crypto";
import { isProduction, type AppConfig } from "../config/env";
import { signToken } from "../middleware/auth.middleware";
import type { CodePurpose, OneTimeCodeRecord, UserRecord, UserStore } from "../services/userStore";

const MIN_PASSWORD_LENGTH = 8;
const MAX_CODE_ATTEMPTS = 5;
const BCRYPT_ROUNDS = 10;

const CODE_TTL_MINUTES: Record<CodePurpose, number> = {
  verify_email: 15,
  reset_password: 10,
};

/** Delivers a one-time code to the account holder. */
export type CodeSender = (email: string, code: string, purpose: CodePurpose) => Promise<void>;

// No mail provider wired in: outside production the code is logged so the flows can be exercised.
export const createLogCodeSender =
  (config: AppConfig): CodeSender =>
  async (email, code, purpose) => {
    if (isProduction(config)) {
      console.warn(`[auth.code] no delivery channel configured, ${purpose} code for ${email} not sent`);
      return;
    }
    const what = purpose === "verify_email" ? "email verification" : "password reset";
    console.log(`[DEV EMAIL] ${email}: your ${what} code is ${code}. It expires in ${CODE_TTL_MINUTES[purpose]} minutes.`);
  };

const publicUser = (u: UserRecord) => ({
  id: u.id,
  name: u.name,
  email: u.email,
  role: u.role,
  emailVerified: u.emailVerified,
});

const normalizeEmail = (raw: unknown) => (typeof raw === "string" ? raw.trim().toLowerCase() : "");

function bodyString(req: Request, key: string): string {
  const body: unknown = req.body;
  if (typeof body !== "object" || body === null || !(key in body)) return "";
  const value: unknown = Reflect.get(body, key);
  return typeof value === "string" ? value : "";
}

/** Why a stored code can no longer be redeemed, null when it still can. */
function codeState(record: OneTimeCodeRecord): "used" | "expired" | "locked" | null {
  if (record.used) return "used";
  if (record.expiresAt.getTime() < Date.now()) return "expired";
  if (record.attempts >= MAX_CODE_ATTEMPTS) return "locked";
  return null;
}

export interface AuthControllerDeps {
  config: AppConfig;
  users: UserStore;
  sendCode?: CodeSender;
}

export function createAuthController({ config, users, sendCode = createLogCodeSender(config) }: AuthControllerDeps) {
  /** Replaces any open code of the same purpose and delivers a fresh one. */
  const issueCode = async (user: UserRecord, purpose: CodePurpose): Promise<OneTimeCodeRecord> => {
    const code = randomInt(100000, 1000000).toString();
    await users.invalidateCodes(user.id, purpose);
    const record = await users.createCode({
      userId: user.id,
      purpose,
      codeHash: await bcrypt.hash(code, BCRYPT_ROUNDS),
      attempts: 0,
      used: false,
      createdAt: new Date(),
      expiresAt: new Date(Date.now() + CODE_TTL_MINUTES[purpose] * 60 * 1000),
    });
    await sendCode(user.email, code, purpose);
    return record;
  };

  /** POST /api/auth/register  body: { name, email, password } */
  const register: RequestHandler = async (req, res, next) => {
    try {
      const name = bodyString(req, "name").trim();
      const email = normalizeEmail(bodyString(req, "email"));
      const password = bodyString(req, "password");

      if (!name || !email || !password) {
        res.status(400).json({ message: "All fields are required" });
        return;
      }
      if (password.length < MIN_PASSWORD_LENGTH) {
        res.status(400).json({ message: `Password must be at least ${MIN_PASSWORD_LENGTH} characters` });
        return;
      }
      if (await users.findByEmail(email)) {
        res.status(400).json({ message: "User already exists with this email" });
        return;
      }

      const now = new Date();
      const user = await users.create({
        name,
        email,
        passwordHash: await bcrypt.hash(password, BCRYPT_ROUNDS),
        role: "user",
        emailVerified: false,
        createdAt: now,
        updatedAt: now,
      });
      console.log("[auth.register] user created", user.id);
      await issueCode(user, "verify_email");

      res.status(201).json({
        success: true,
        message: "Account created. Check your email for the verification code.",
        user: publicUser(user),
      });
    } catch (err) {
      next(err);
    }
  };

  /** POST /api/auth/verify-email  body: { email, code } */
  const verifyEmail: RequestHandler = async (req, res, next) => {
    try {
      const email = normalizeEmail(bodyString(req, "email"));
      const code = bodyString(req, "code").trim();
      if (!email || !code) {
        res.status(400).json({ message: "email and code are required" });
        return;
      }

      const invalid = "Invalid or expired verification code";
      const user = await users.findByEmail(email);
      if (!user) {
        res.status(400).json({ message: invalid });
        return;
      }
      if (user.emailVerified) {
        res.status(400).json({ message: "Email already verified" });
        return;
      }

      const record = await users.findOpenCode(user.id, "verify_email");
      const state = record ? codeState(record) : "expired";
      if (!record || state === "expired" || state === "used") {
        res.status(400).json({ message: invalid });
        return;
      }
      if (state === "locked") {
        res.status(400).json({ message: "Too many attempts, request a new code" });
        return;
      }
      if (!(await bcrypt.compare(code, record.codeHash))) {
        await users.recordFailedAttempt(record.id);
        res.status(400).json({ message: invalid });
        return;
      }

      await users.markCodeUsed(record.id);
      await users.markEmailVerified(user.id);
      console.log("[auth.verify] email verified for user", user.id);

      res.status(200).json({ success: true, message: "Email verified. You can now log in." });
    } catch (err) {
      next(err);
    }
  };

  /** POST /api/auth/resend-verification  body: { email } */
  const resendVerification: RequestHandler = async (req, res, next) => {
    try {
      const email = normalizeEmail(bodyString(req, "email"));
      const user = email ? await users.findByEmail(email) : null;
      if (!user || user.emailVerified) {
        res.status(400).json({
          message: "Could not resend the code. Check the email address and that it is not already verified.",
        });
        return;
      }

      await issueCode(user, "verify_email");
      res.status(200).json({ success: true, message: "Verification code sent. Check your email." });
    } catch (err) {
      next(err);
    }
  };

  /** POST /api/auth/login  body: { email, password } */
  const login: RequestHandler = async (req, res, next) => {
    try {
      const email = normalizeEmail(bodyString(req, "email"));
      const password = bodyString(req, "password");

      const user = email ? await users.findByEmail(email) : null;
      if (!user || !(await bcrypt.compare(password, user.passwordHash))) {
        res.status(400).json({ message: "Invalid credentials" });
        return;
      }
      if (!user.emailVerified) {
        res.status(403).json({ message: "Email not verified. Verify your email before logging in." });
        return;
      }

      const now = Date.now();
      const session = await users.createSession({
        userId: user.id,
        createdAt: new Date(now),
        expiresAt: new Date(now + config.jwtExpiresInSeconds * 1000),
      });

      console.log("[auth.login] JWT issued for user", user.id);
      res.status(200).json({
        token: signToken({ id: user.id, role: user.role, sid: session.id }, config),
        expiresAt: session.expiresAt,
        user: publicUser(user),
      });
    } catch (err) {
      next(err);
    }
  };

  /** POST /api/auth/sign-out  ends the session behind the bearer token */
  const signOut: RequestHandler = async (req, res, next) => {
    try {
      if (!req.user || !(await users.deleteSession(req.user.sessionId))) {
        res.status(404).json({ message: "Session not found" });
        return;
      }
      console.log("[auth.signout] session closed for user", req.user.id);
      res.status(200).json({ success: true, message: "Signed out" });
    } catch (err) {
      next(err);
    }
  };

  /** GET /api/auth/me */
  const me: RequestHandler = async (req, res, next) => {
    try {
      const user = req.user ? await users.findById(req.user.id) : null;
      if (!user) {
        res.status(401).json({ message: "Not authorized" });
        return;
      }
      res.json(publicUser(user));
    } catch (err) {
      next(err);
    }
  };

  /** GET /api/auth/session */
  const session: RequestHandler = async (req, res, next) => {
    try {
      if (!req.user) {
        res.status(401).json({ message: "Not authorized" });
        return;
      }
      const [user, current] = await Promise.all([users.findById(req.user.id), users.findSession(req.user.sessionId)]);
      if (!user || !current) {
        res.status(401).json({ message: "Not authorized" });
        return;
      }
      res.json({ user: publicUser(user), expiresAt: current.expiresAt });
    } catch (err) {
      next(err);
    }
  };

  /** DELETE /api/auth/sessions/cleanup  admin only */
  const cleanupSessions: RequestHandler = async (_req, res, next) => {
    try {
      const deleted = await users.deleteExpiredSessions(new Date());
      console.log(`[auth.sessions] removed ${deleted} expired sessions`);
      res.json({ success: true, deleted, message: `Removed ${deleted} expired sessions` });
    } catch (err) {
      next(err);
    }
  };

  /**
   * POST /api/auth/forgot-password  body: { email }
   * Always 200 so the response does not reveal which emails are registered.
   */
  const forgotPassword: RequestHandler = async (req, res, next) => {
    try {
      const email = normalizeEmail(bodyString(req, "email"));
      if (!email) {
        res.status(400).json({ message: "email is required" });
        return;
      }

      const message = "If the account exists, a reset code has been sent.";
      const user = await users.findByEmail(email);
      if (!user) {
        res.status(200).json({ message });
        return;
      }

      const reset = await issueCode(user, "reset_password");
      res.status(200).json({ resetId: reset.id, message });
    } catch (err) {
      next(err);
    }
  };

  /** POST /api/auth/reset-password  body: { resetId, code, newPassword } */
  const resetPassword: RequestHandler = async (req, res, next) => {
    try {
      const resetId = bodyString(req, "resetId");
      const code = bodyString(req, "code");
      const newPassword = bodyString(req, "newPassword");

      if (!resetId || !code || !newPassword) {
        res.status(400).json({ message: "resetId, code and newPassword are required" });
        return;
      }
      if (newPassword.length < MIN_PASSWORD_LENGTH) {
        res.status(400).json({ message: `Password must be at least ${MIN_PASSWORD_LENGTH} characters` });
        return;
      }

      const reset = await users.findCode(resetId);
      if (!reset || reset.purpose !== "reset_password") {
        res.status(400).json({ message: "Invalid or expired reset request" });
        return;
      }
      switch (codeState(reset)) {
        case "used":
          res.status(400).json({ message: "This reset request is already used" });
          return;
        case "expired":
          res.status(400).json({ message: "Reset code expired" });
          return;
        case "locked":
          res.status(400).json({ message: "Too many attempts, request a new code" });
          return;
      }

      if (!(await bcrypt.compare(code, reset.codeHash))) {
        await users.recordFailedAttempt(reset.id);
        res.status(400).json({ message: "Invalid code" });
        return;
      }

      await users.updatePassword(reset.userId, await bcrypt.hash(newPassword, BCRYPT_ROUNDS));
      await users.markCodeUsed(reset.id);

      res.status(200).json({ message: "Password updated successfully. You can now log in." });
    } catch (err) {
      next(err);
    }
  };

  /** GET /api/auth/oauth/:provider[/callback]  no provider is wired in yet */
  const oauthNotImplemented: RequestHandler = (req, res) => {
    res.status(501).json({ message: `OAuth with ${req.params.provider} is not implemented` });
  };

  return {
    register,
    verifyEmail,
    resendVerification,
    login,
    signOut,
    me,
    session,
    cleanupSessions,
    forgotPassword,
    resetPassword,
    oauthNotImplemented,
  };
}
