import type { CanonicalEntity, EntityKind, ResolvedEntity } from "../query/types";

function copy(result: ResolvedEntity): ResolvedEntity {
  return { ...result };
}

/**
 * Resolution results and candidate pools for one resolver instance.
 *
 * Owned by whoever constructs the resolver, never module state, and only
 * emptied by clear(). In-flight lookups are tracked so that concurrent first
 * resolutions of the same key share one store lookup. Every caller gets its
 * own copy of the result.
 */
export class ResolverCache {
  private results = new Map<string, ResolvedEntity>();
  private pending = new Map<string, Promise<ResolvedEntity>>();
  private pools = new Map<EntityKind, Promise<CanonicalEntity[]>>();

  static key(kind: EntityKind, name: string, groupingId?: string): string {
    return `${kind}:${groupingId ?? ""}:${name.toLowerCase()}`;
  }

  getResult(key: string): ResolvedEntity | undefined {
    return this.results.get(key);
  }

  getPending(key: string): Promise<ResolvedEntity> | undefined {
    return this.pending.get(key)?.then(copy);
  }

  /**
   * Track an in-flight resolution. Its value is stored as a result once it
   * settles successfully; a rejection is not cached. Nothing is stored if
   * the cache was cleared in the meantime.
   */
  track(key: string, resolution: Promise<ResolvedEntity>): Promise<ResolvedEntity> {
    const tracked: Promise<ResolvedEntity> = resolution.then(
      (result) => {
        if (this.pending.get(key) === tracked) {
          this.results.set(key, result);
          this.pending.delete(key);
        }
        return result;
      },
      (err: unknown) => {
        if (this.pending.get(key) === tracked) {
          this.pending.delete(key);
        }
        throw err;
      },
    );
    this.pending.set(key, tracked);
    return tracked.then(copy);
  }

  /**
   * Candidate pool for a kind, loaded at most once. A failed load is
   * forgotten so the next call retries.
   */
  getPool(kind: EntityKind, load: () => Promise<CanonicalEntity[]>): Promise<CanonicalEntity[]> {
    const cached = this.pools.get(kind);
    if (cached) return cached;

    const loading = load().catch((err: unknown) => {
      this.pools.delete(kind);
      throw err;
    });
    this.pools.set(kind, loading);
    return loading;
  }

  get size(): number {
    return this.results.size;
  }

  clear(): void {
    this.results.clear();
    this.pending.clear();
    this.pools.clear();
  }
}
