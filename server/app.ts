import express from "express";
import type { Express, NextFunction, Request, Response } from "express";
import { registerRoutes } from "./routes";
import { logger, errorMessage } from "./logger";

export function createApp(): Express {
  const app = express();
  app.use(express.json({ limit: "100kb" }));

  registerRoutes(app);

  // Malformed JSON bodies and anything else express surfaces.
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = err instanceof SyntaxError ? 400 : 500;
    if (status === 500) logger.error("app", "Unhandled request error", err);
    res.status(status).json({ error: true, message: errorMessage(err) });
  });

  return app;
}
