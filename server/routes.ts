import type { Express, Request, Response } from "express";
import { createServer, type Server } from "http";
import { queryRequestSchema, relationshipRequestSchema } from "@shared/schema";
import { getConfig } from "./config/env";
import { createQueryRateLimit } from "./middleware/security";
import { validate } from "./middleware/validation";
import type { QueryOrchestrator } from "./orchestrator";
import { handleRouteError } from "./utils/errorHandler";

/**
 * Structured relationship lookup: a person or workgroup by name, a meeting by
 * record id.
 */
export function relationshipsHandler(orchestrator: Pick<QueryOrchestrator, "executeRelationshipQuery">) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const { kind, name, callerId } = relationshipRequestSchema.parse(req.body);
      const result = await orchestrator.executeRelationshipQuery(kind, name, callerId);
      res.json(result);
    } catch (error) {
      handleRouteError(res, error, "Relationships");
    }
  };
}

export function registerRoutes(app: Express, orchestrator: QueryOrchestrator): Server {
  const queryRateLimit = createQueryRateLimit({ maxRequests: getConfig().RATE_LIMIT_PER_MINUTE });

  app.get("/api/health", (_req, res) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  app.post("/api/query", validate({ body: queryRequestSchema }), queryRateLimit, async (req, res) => {
    try {
      const { question, callerId } = queryRequestSchema.parse(req.body);
      const result = await orchestrator.executeQuery(question, callerId);
      res.json(result);
    } catch (error) {
      handleRouteError(res, error, "Query");
    }
  });

  app.post(
    "/api/relationships",
    validate({ body: relationshipRequestSchema }),
    queryRateLimit,
    relationshipsHandler(orchestrator),
  );

  app.post("/api/entities/cache/clear", (_req, res) => {
    orchestrator.clearEntityCache();
    res.json({ success: true });
  });

  const httpServer = createServer(app);

  return httpServer;
}
