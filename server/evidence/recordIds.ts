import { validate as validateUuid } from "uuid";
import { SENTINEL_RECORD_IDS, UNRESOLVED_ENTITY_ID } from "../config/constants";

const SENTINEL_IDS = new Set<string>(Object.values(SENTINEL_RECORD_IDS));

// 8-4-4-4-12 hex with optional hyphens, optional braces or urn:uuid: prefix
const UUID_TOKEN =
  /(?<![0-9a-f])(?:urn:uuid:)?\{?([0-9a-f]{8}-?[0-9a-f]{4}-?[0-9a-f]{4}-?[0-9a-f]{4}-?[0-9a-f]{12})\}?(?![0-9a-f])/gi;

/**
 * Canonical lower-case hyphenated form of a record id, or null when it is
 * not a UUID in any accepted spelling.
 */
export function canonicalRecordId(raw: string): string | null {
  const hex = raw
    .trim()
    .toLowerCase()
    .replace(/^urn:uuid:/, "")
    .replace(/^\{(.*)\}$/, "$1")
    .replace(/-/g, "");
  if (!/^[0-9a-f]{32}$/.test(hex)) return null;

  const canonical = `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
  return validateUuid(canonical) ? canonical : null;
}

/**
 * First UUID in free text, canonicalized. Tokens that look like a UUID but
 * fail validation are skipped.
 */
export function findRecordIdInText(text: string): string | null {
  for (const match of text.matchAll(UUID_TOKEN)) {
    const canonical = canonicalRecordId(match[1]);
    if (canonical) return canonical;
  }
  return null;
}

export function isSentinelRecordId(recordId: string): boolean {
  return SENTINEL_IDS.has(recordId);
}

/**
 * A record id a citation may point at: a real UUID, not a sentinel and not
 * the nil id.
 */
export function isCitableRecordId(recordId: string): boolean {
  if (isSentinelRecordId(recordId)) return false;
  const canonical = canonicalRecordId(recordId);
  return canonical !== null && canonical !== UNRESOLVED_ENTITY_ID;
}
