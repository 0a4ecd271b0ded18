import type { Response } from "express";
import { ZodError } from "zod";
import { fromZodError } from "zod-validation-error";
import { logError as writeErrorLog } from "./logger";

export interface AppError extends Error {
  statusCode?: number;
  code?: string;
  isOperational?: boolean;
}

export class ValidationError extends Error implements AppError {
  statusCode = 400;
  isOperational = true;
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends Error implements AppError {
  statusCode = 404;
  isOperational = true;
  constructor(resource: string) {
    super(`${resource} not found`);
    this.name = "NotFoundError";
  }
}

export class AuditConflictError extends Error implements AppError {
  statusCode = 409;
  isOperational = true;
  queryId: string;
  constructor(queryId: string) {
    super(`Audit record ${queryId} already exists with different content`);
    this.name = "AuditConflictError";
    this.queryId = queryId;
  }
}

export class RateLimitError extends Error implements AppError {
  statusCode = 429;
  isOperational = true;
  retryAfterSeconds?: number;
  constructor(message = "Rate limit exceeded", retryAfterSeconds?: number) {
    super(message);
    this.name = "RateLimitError";
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

export class ExternalServiceError extends Error implements AppError {
  statusCode = 502;
  isOperational = true;
  service: string;
  constructor(service: string, message: string) {
    super(`${service} error: ${message}`);
    this.name = "ExternalServiceError";
    this.service = service;
  }
}

/** A collaborator (vector index, LLM, entity store) could not be reached at all. */
export class ServiceUnavailableError extends Error implements AppError {
  statusCode = 503;
  isOperational = true;
  service: string;
  constructor(service: string, message = "temporarily unavailable") {
    super(`${service} ${message}`);
    this.name = "ServiceUnavailableError";
    this.service = service;
  }
}

export class CollaboratorTimeoutError extends Error implements AppError {
  statusCode = 504;
  isOperational = true;
  operation: string;
  timeoutMs: number;
  constructor(operation: string, timeoutMs: number) {
    super(`${operation} exceeded timeout of ${timeoutMs}ms`);
    this.name = "CollaboratorTimeoutError";
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

function hasStatusCode(error: unknown): error is Error & { statusCode: number } {
  return error instanceof Error && "statusCode" in error && typeof error.statusCode === "number";
}

function readErrorCode(error: unknown): string | number | undefined {
  if (!(error instanceof Error)) return undefined;
  if ("code" in error && (typeof error.code === "string" || typeof error.code === "number")) {
    return error.code;
  }
  if ("status" in error && typeof error.status === "number") {
    return error.status;
  }
  return hasStatusCode(error) ? error.statusCode : undefined;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof ZodError) {
    return fromZodError(error).message;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return "An unexpected error occurred";
}

export function getErrorStatusCode(error: unknown): number {
  if (error instanceof ZodError) {
    return 400;
  }
  if (hasStatusCode(error)) {
    return error.statusCode;
  }
  return 500;
}

export function handleRouteError(res: Response, error: unknown, context?: string): void {
  const statusCode = getErrorStatusCode(error);
  const message = getErrorMessage(error);

  if (statusCode >= 500 && context) {
    logError(context, error);
  }
  if (error instanceof RateLimitError && error.retryAfterSeconds !== undefined) {
    res.set("Retry-After", String(error.retryAfterSeconds));
  }

  res.status(statusCode).json({ error: message });
}

export function logError(context: string, error: unknown): void {
  const message = getErrorMessage(error);
  const stack = error instanceof Error ? error.stack : undefined;
  writeErrorLog(`[${context}] ${message}`, { stack });
}

export type QueryFailureType = "invalid_input" | "timeout" | "unavailable" | "error";

export interface ClassifiedError {
  type: QueryFailureType;
  errorMessage: string;
  errorCode: string | number | undefined;
  stack: string | undefined;
}

const UNAVAILABLE_MARKERS = ["unavailable", "econnrefused", "enotfound", "econnreset", "fetch failed", "connection"];

/**
 * Map anything thrown inside the query pipeline onto one of the
 * caller-visible failure outcomes. Timeouts and unreachable collaborators
 * are kept distinct from generic failures.
 */
export function classifyQueryError(err: unknown): ClassifiedError {
  const errorMessage = getErrorMessage(err);
  const errorCode = readErrorCode(err);
  const stack = err instanceof Error ? err.stack : undefined;

  // Schema failures past the request boundary are internal faults.
  if (err instanceof ValidationError) {
    return { type: "invalid_input", errorMessage, errorCode, stack };
  }

  if (err instanceof CollaboratorTimeoutError) {
    return { type: "timeout", errorMessage, errorCode, stack };
  }

  if (err instanceof ServiceUnavailableError) {
    return { type: "unavailable", errorMessage, errorCode, stack };
  }

  const lowered = errorMessage.toLowerCase();
  if (
    errorCode === "insufficient_quota" ||
    errorCode === 429 ||
    errorCode === 503 ||
    lowered.includes("exceeded your current quota") ||
    UNAVAILABLE_MARKERS.some((marker) => lowered.includes(marker))
  ) {
    return { type: "unavailable", errorMessage, errorCode, stack };
  }

  return { type: "error", errorMessage, errorCode, stack };
}
