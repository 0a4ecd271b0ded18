/**
 * Validation Middleware
 *
 * Zod-based request validation for body and params.
 * Failures are passed on as ValidationError so handleRouteError answers 400.
 */

import type { NextFunction, Request, RequestHandler, Response } from "express";
import { ZodError, type ZodTypeAny } from "zod";
import { ValidationError } from "../utils/errorHandler";

export interface ValidationSchemas {
  body?: ZodTypeAny;
  params?: ZodTypeAny;
}

/**
 * @example
 * app.post("/api/query", validate({ body: queryRequestSchema }), async (req, res) => { ... });
 */
export function validate(schemas: ValidationSchemas): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    try {
      if (schemas.params) {
        req.params = schemas.params.parse(req.params);
      }
      if (schemas.body) {
        req.body = schemas.body.parse(req.body);
      }
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        const messages = error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ");
        next(new ValidationError(messages));
      } else {
        next(error);
      }
    }
  };
}
