import * as fs from "fs";
import * as path from "path";
import { v4 as uuidv4 } from "uuid";
import { getConfig } from "../config/env";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export type LogValue = string | number | boolean | null | undefined | LogValue[] | { [key: string]: LogValue };

export interface LogMeta {
  correlationId?: string;
  queryId?: string;
  callerId?: string;
  intent?: string;
  duration?: number;
  error?: string;
  stack?: string;
  [key: string]: LogValue;
}

let logDirReady = false;

function ensureLogDir(dir: string): void {
  if (logDirReady) return;
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  logDirReady = true;
}

export function generateCorrelationId(): string {
  return uuidv4().substring(0, 8);
}

export function log(level: LogLevel, message: string, meta?: LogMeta): void {
  const config = getConfig();
  if (LOG_LEVELS[level] < LOG_LEVELS[config.LOG_LEVEL]) return;

  const logEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...meta,
  };

  if (config.LOG_TO_FILE) {
    const logDir = path.resolve(process.cwd(), config.LOG_DIR);
    const dateStr = logEntry.timestamp.split("T")[0];
    try {
      ensureLogDir(logDir);
      fs.appendFileSync(path.join(logDir, `archive-${dateStr}.log`), JSON.stringify(logEntry) + "\n");
    } catch (err) {
      console.error("[Logger] Failed to write to log file:", err);
    }
  }

  const correlationPrefix = meta?.correlationId ? `[${meta.correlationId}] ` : "";
  const metaStr = meta ? ` ${JSON.stringify(meta)}` : "";
  const line = `[${level.toUpperCase()}] ${correlationPrefix}${message}${metaStr}`;
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export function logInfo(message: string, meta?: LogMeta): void {
  log("info", message, meta);
}

export function logError(message: string, meta?: LogMeta): void {
  log("error", message, meta);
}

export function logWarn(message: string, meta?: LogMeta): void {
  log("warn", message, meta);
}

export function logDebug(message: string, meta?: LogMeta): void {
  log("debug", message, meta);
}

/**
 * Per-query logger: stamps every line with the query's correlation id,
 * caller and elapsed time, and times named stages (search, generate, ...).
 */
export class QueryLogger {
  private correlationId: string;
  private startTime: number;
  private queryId: string;
  private callerId?: string;
  private stages: Map<string, number> = new Map();

  constructor(queryId: string, callerId?: string) {
    this.queryId = queryId;
    this.correlationId = queryId.substring(0, 8) || generateCorrelationId();
    this.startTime = Date.now();
    this.callerId = callerId;
  }

  private getMeta(extra?: Partial<LogMeta>): LogMeta {
    return {
      correlationId: this.correlationId,
      queryId: this.queryId,
      callerId: this.callerId,
      duration: Date.now() - this.startTime,
      ...extra,
    };
  }

  startStage(name: string): void {
    this.stages.set(name, Date.now());
  }

  endStage(name: string): number {
    const start = this.stages.get(name);
    if (start === undefined) return 0;
    const duration = Date.now() - start;
    this.stages.delete(name);
    this.debug(`Stage ${name} finished`, { stage: name, stageMs: duration });
    return duration;
  }

  info(message: string, extra?: Partial<LogMeta>): void {
    logInfo(message, this.getMeta(extra));
  }

  error(message: string, err?: unknown, extra?: Partial<LogMeta>): void {
    const errorMeta: Partial<LogMeta> = {};
    if (err instanceof Error) {
      errorMeta.error = err.message;
      errorMeta.stack = err.stack;
    } else if (err !== undefined) {
      errorMeta.error = String(err);
    }
    logError(message, this.getMeta({ ...errorMeta, ...extra }));
  }

  warn(message: string, extra?: Partial<LogMeta>): void {
    logWarn(message, this.getMeta(extra));
  }

  debug(message: string, extra?: Partial<LogMeta>): void {
    logDebug(message, this.getMeta(extra));
  }

  getCorrelationId(): string {
    return this.correlationId;
  }

  getDuration(): number {
    return Date.now() - this.startTime;
  }
}
