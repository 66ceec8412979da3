import type { UserRole } from "../../services/userStore";

declare global {
  namespace Express {
    interface Request {
      user?: {
        id: string;
        email: string;
        role: UserRole;
        sessionId: string;
      };
    }
  }
}

export {};
