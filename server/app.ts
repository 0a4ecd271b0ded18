import express, { type NextFunction, type Request, type Response } from "express";
import { addSecurityHeaders } from "./middleware/security";
import type { QueryOrchestrator } from "./orchestrator";
import { registerRoutes } from "./routes";
import { NotFoundError, handleRouteError } from "./utils/errorHandler";
import { logInfo } from "./utils/logger";

export function createApp(orchestrator: QueryOrchestrator) {
  const app = express();
  app.disable("x-powered-by");
  app.use(express.json({ limit: "100kb" }));
  app.use(addSecurityHeaders);

  app.use((req, res, next) => {
    const start = Date.now();
    res.on("finish", () => {
      if (req.path.startsWith("/api")) {
        logInfo(`${req.method} ${req.path} ${res.statusCode} in ${Date.now() - start}ms`);
      }
    });
    next();
  });

  const server = registerRoutes(app, orchestrator);

  app.use((req: Request, _res: Response, next: NextFunction) => {
    next(new NotFoundError(`Route ${req.method} ${req.path}`));
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    handleRouteError(res, err, "Express");
  });

  return { app, server };
}
