/**
 * Audit Trail
 *
 * Purpose:
 * Append-only record of every query result, one JSON file per query id.
 * Files are created exclusively and never rewritten: retrying the same
 * record is a no-op, a different record under an existing id is rejected.
 *
 * Layer: Audit
 */

import { promises as fs } from "fs";
import * as path from "path";
import { auditRecordSchema, type AuditRecord } from "@shared/schema";
import type { QueryResult } from "../query/types";
import { AuditConflictError } from "../utils/errorHandler";
import { logDebug } from "../utils/logger";

export interface AuditSink {
  /** Persist a record and return where it was written. */
  append(queryId: string, record: AuditRecord): Promise<string>;
}

export function toAuditRecord(result: QueryResult, userInput: string, callerId?: string): AuditRecord {
  return auditRecordSchema.parse({
    queryId: result.queryId,
    callerId: callerId ?? null,
    userInput,
    intent: result.intent,
    answer: result.answer,
    citations: result.citations.map((c) => ({
      recordId: c.recordId,
      date: c.date,
      groupingName: c.groupingName,
      excerpt: c.excerpt,
    })),
    evidenceFound: result.evidenceFound,
    outcome: result.outcome,
    seed: result.seed,
    modelVersion: result.modelVersion,
    timestamp: result.timestamp,
    method: result.method,
    discrepancy: result.discrepancy,
  });
}

function serialize(record: AuditRecord): string {
  return JSON.stringify(auditRecordSchema.parse(record), null, 2);
}

function isFileExistsError(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "EEXIST";
}

export class FileAuditSink implements AuditSink {
  constructor(private readonly dir: string) {}

  async append(queryId: string, record: AuditRecord): Promise<string> {
    if (record.queryId !== queryId) {
      throw new AuditConflictError(queryId);
    }

    await fs.mkdir(this.dir, { recursive: true });

    const filePath = path.join(this.dir, `${queryId}.json`);
    const content = serialize(record);

    try {
      await fs.writeFile(filePath, content, { encoding: "utf-8", flag: "wx" });
      logDebug(`[Audit] Wrote ${filePath}`, { queryId });
      return filePath;
    } catch (err) {
      if (!isFileExistsError(err)) throw err;
    }

    const existing = await fs.readFile(filePath, "utf-8");
    if (existing !== content) {
      throw new AuditConflictError(queryId);
    }
    logDebug(`[Audit] Identical record already at ${filePath}`, { queryId });
    return filePath;
  }
}
