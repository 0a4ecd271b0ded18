/**
 * Entity Resolver
 *
 * Purpose:
 * Maps a free-text mention of a person, workgroup or topic onto one canonical
 * entity from the entity store.
 *
 * Resolution steps:
 * 1. Strip decorations ("Stephen [ORG]" -> "Stephen") with ordered pattern rules
 * 2. Score every candidate by similarity against its name and alternate names
 * 3. Keep candidates at or above the threshold, best first (ties keep pool order)
 * 4. With a grouping context and several survivors, prefer the candidate that
 *    appears most often in that grouping's meetings
 *
 * Nothing matched -> UNRESOLVED_ENTITY_ID with the stripped name.
 * The resolver never creates or deletes entities.
 *
 * Layer: Entities
 */

import { ENTITY_RESOLUTION, UNRESOLVED_ENTITY_ID } from "../config/constants";
import { ValidationError } from "../utils/errorHandler";
import { logDebug } from "../utils/logger";
import type { ArchiveStore } from "../storage";
import type {
  CanonicalEntity,
  EntityKind,
  MeetingRecord,
  ResolutionContext,
  ResolvedEntity,
} from "../query/types";
import { ResolverCache } from "./resolverCache";
import { bestSimilarity } from "./similarity";

export type ResolverStore = Pick<ArchiveStore, "listEntities" | "listMeetings">;

export type EntityResolverOptions = {
  threshold?: number;
  patternRules?: readonly string[];
  cache?: ResolverCache;
};

type ScoredCandidate = {
  entity: CanonicalEntity;
  index: number;
  score: number;
  affinity: number;
};

export function applyPatternRules(
  name: string,
  rules: readonly string[] = ENTITY_RESOLUTION.PATTERN_RULES,
): string {
  let stripped = name;
  for (const rule of rules) {
    stripped = stripped.replace(new RegExp(rule, "gi"), "");
  }
  return stripped.replace(/\s+/g, " ").trim();
}

function labelsOf(entity: CanonicalEntity): string[] {
  return [entity.name, ...entity.alternateNames];
}

function appearsIn(entity: CanonicalEntity, meeting: MeetingRecord): boolean {
  switch (entity.kind) {
    case "person":
      return (
        meeting.hostId === entity.id ||
        meeting.documenterId === entity.id ||
        meeting.participantIds.includes(entity.id)
      );
    case "workgroup":
      return meeting.workgroupId === entity.id;
    case "topic": {
      const labels = labelsOf(entity).map((l) => l.toLowerCase());
      return meeting.topics.some((t) => labels.includes(t.toLowerCase()));
    }
  }
}

export class EntityResolver {
  readonly cache: ResolverCache;
  private readonly threshold: number;
  private readonly patternRules: readonly string[];

  constructor(private readonly store: ResolverStore, options: EntityResolverOptions = {}) {
    this.threshold = options.threshold ?? 0.8;
    this.patternRules = options.patternRules ?? ENTITY_RESOLUTION.PATTERN_RULES;
    this.cache = options.cache ?? new ResolverCache();
  }

  normalize(name: string): string {
    const stripped = applyPatternRules(name, this.patternRules);
    return stripped || name.trim();
  }

  /**
   * Resolve a mention. An empty name throws ValidationError before any
   * store access. Results against the store's own pool are cached per
   * kind, grouping context and lower-cased name; an explicit candidate
   * pool bypasses the cache.
   */
  resolve(
    name: string,
    kind: EntityKind = "person",
    candidatePool?: CanonicalEntity[],
    context?: ResolutionContext,
  ): Promise<ResolvedEntity> {
    if (!name || !name.trim()) {
      throw new ValidationError("Entity name cannot be empty");
    }

    const normalized = this.normalize(name);
    if (candidatePool) {
      return this.resolveAgainst(normalized, candidatePool, context);
    }

    const key = ResolverCache.key(kind, name.trim(), context?.groupingId);
    const cached = this.cache.getResult(key);
    if (cached) {
      logDebug(`[EntityResolver] Cache hit for "${name}"`);
      return Promise.resolve({ ...cached });
    }
    const pending = this.cache.getPending(key);
    if (pending) return pending;

    return this.cache.track(key, this.resolveFromStore(normalized, kind, context));
  }

  /**
   * Closest canonical names for a mention that did not resolve, for
   * "Did you mean ...?" replies.
   */
  async suggest(name: string, kind: EntityKind, limit: number = ENTITY_RESOLUTION.SUGGESTION_LIMIT): Promise<string[]> {
    const normalized = this.normalize(name);
    const pool = await this.loadPool(kind);

    const scored = pool
      .map((entity) => ({ name: entity.name, score: bestSimilarity(normalized, labelsOf(entity)) }))
      .filter((s) => s.score >= ENTITY_RESOLUTION.SUGGESTION_MIN_SIMILARITY)
      .sort((a, b) => b.score - a.score);

    const names: string[] = [];
    for (const s of scored) {
      if (!names.includes(s.name)) names.push(s.name);
      if (names.length >= limit) break;
    }
    return names;
  }

  clearCache(): void {
    this.cache.clear();
  }

  private loadPool(kind: EntityKind): Promise<CanonicalEntity[]> {
    return this.cache.getPool(kind, () => this.store.listEntities(kind));
  }

  private async resolveFromStore(
    normalized: string,
    kind: EntityKind,
    context?: ResolutionContext,
  ): Promise<ResolvedEntity> {
    const pool = await this.loadPool(kind);
    return this.resolveAgainst(normalized, pool, context);
  }

  private async resolveAgainst(
    normalized: string,
    pool: CanonicalEntity[],
    context?: ResolutionContext,
  ): Promise<ResolvedEntity> {
    let bestScore = 0;
    const survivors: ScoredCandidate[] = [];

    pool.forEach((entity, index) => {
      const score = bestSimilarity(normalized, labelsOf(entity));
      if (score > bestScore) bestScore = score;
      if (score >= this.threshold) {
        survivors.push({ entity, index, score, affinity: 0 });
      }
    });

    survivors.sort((a, b) => b.score - a.score || a.index - b.index);

    const ranked =
      survivors.length > 1 && context?.groupingId
        ? await this.rerankByAffinity(survivors, context.groupingId)
        : survivors;

    const top = ranked[0];
    if (!top) {
      logDebug(`[EntityResolver] No match for "${normalized}" (best ${bestScore.toFixed(2)})`);
      return { id: UNRESOLVED_ENTITY_ID, canonicalName: normalized, score: bestScore, resolved: false };
    }

    logDebug(`[EntityResolver] "${normalized}" -> "${top.entity.name}" (${top.score.toFixed(2)})`);
    return { id: top.entity.id, canonicalName: top.entity.name, score: top.score, resolved: true };
  }

  /**
   * Soft re-rank: higher affinity first, similarity order otherwise.
   * Without any affinity the similarity order stands.
   */
  private async rerankByAffinity(survivors: ScoredCandidate[], groupingId: string): Promise<ScoredCandidate[]> {
    const meetings = await this.store.listMeetings({ workgroupId: groupingId });

    const withAffinity = survivors.map((candidate) => ({
      ...candidate,
      affinity: meetings.filter((m) => appearsIn(candidate.entity, m)).length * ENTITY_RESOLUTION.CONTEXT_AFFINITY_INCREMENT,
    }));

    if (!withAffinity.some((c) => c.affinity > 0)) {
      return survivors;
    }
    // Array.prototype.sort is stable, so equal affinity keeps similarity order
    return withAffinity.sort((a, b) => b.affinity - a.affinity);
  }
}
