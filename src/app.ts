// src/app.ts
import express, { type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import compression from "compression";
import createApiRouter, { type ApiDeps } from "./routes";
import { errorMiddleware } from "./middleware/error.middleware";

export function createApp(deps: ApiDeps) {
  const app = express();

  // CORS + Body parsing
  app.use(
    cors({
      origin: deps.config.clientUrl,
      credentials: true,
    })
  );
  app.use(compression());
  app.use(express.json());

  app.use("/api", createApiRouter(deps));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ message: "Not found" });
  });

  // Error handler
  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    errorMiddleware(err, req, res, next);
  });

  return app;
}
