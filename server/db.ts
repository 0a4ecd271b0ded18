/**
 * Database Connection
 *
 * Purpose:
 * Provides a shared database connection using Drizzle ORM with Neon.
 * Created on first use so that modules importing it can load without
 * DATABASE_URL (tests swap the stores for in-process fakes).
 *
 * Layer: Infrastructure
 */

import { drizzle, type NeonHttpDatabase } from "drizzle-orm/neon-http";
import { neon } from "@neondatabase/serverless";
import { getConfig } from "./config/env";

let _db: NeonHttpDatabase | null = null;

export function getDb(): NeonHttpDatabase {
  if (!_db) {
    const url = getConfig().DATABASE_URL;
    if (!url) {
      throw new Error("DATABASE_URL is not set");
    }
    _db = drizzle(neon(url));
  }
  return _db;
}
