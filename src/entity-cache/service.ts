/**
 * Entity Cache Module - Service Layer
 *
 * In-memory mirror of the source's entity states.
 *
 * The map is replaced on every write, so a snapshot handed out earlier is
 * never mutated and readers never wait on a writer. The generation counter
 * only moves forward.
 */
import { createLogger } from "../logger.js";
import type {
  ApplyOutcome,
  CacheListener,
  CacheSnapshot,
  CachedEntity,
  EntityId,
  EntityState,
} from "./schema.js";
import { shouldApply } from "./transform.js";

const log = createLogger("cache");

/**
 * Read/write surface of the entity cache.
 */
export type EntityCache = Readonly<{
  get: (id: EntityId) => CachedEntity | null;
  apply: (update: EntityState) => ApplyOutcome;
  snapshot: () => CacheSnapshot;
  generation: () => number;
  subscribe: (listener: CacheListener) => () => void;
  waitFor: (
    id: EntityId,
    predicate: (entity: CachedEntity) => boolean,
    timeoutMs: number,
    signal?: AbortSignal,
  ) => Promise<CachedEntity | null>;
}>;

/**
 * Create an empty entity cache.
 */
export function createEntityCache(): EntityCache {
  let current: CacheSnapshot = { entities: new Map(), generation: 0 };
  const listeners = new Set<CacheListener>();

  function get(id: EntityId): CachedEntity | null {
    return current.entities.get(id) ?? null;
  }

  function notify(entity: CachedEntity, generation: number): void {
    for (const listener of [...listeners]) {
      try {
        listener(entity, generation);
      } catch (error) {
        log.error(
          {
            entityId: entity.id,
            generation,
            error: error instanceof Error ? error.message : String(error),
          },
          "Cache listener threw",
        );
      }
    }
  }

  function apply(update: EntityState): ApplyOutcome {
    const stored = get(update.id);

    if (!shouldApply(stored, update)) {
      log.trace(
        { entityId: update.id, lastUpdated: update.lastUpdated },
        "Stale or replayed update ignored",
      );
      return { applied: false, generation: current.generation };
    }

    const generation = current.generation + 1;
    const entry: CachedEntity = Object.freeze({ ...update, generation });
    const entities = new Map(current.entities);
    entities.set(update.id, entry);
    current = { entities, generation };

    notify(entry, generation);

    return { applied: true, generation };
  }

  function subscribe(listener: CacheListener): () => void {
    listeners.add(listener);
    return () => {
      listeners.delete(listener);
    };
  }

  function waitFor(
    id: EntityId,
    predicate: (entity: CachedEntity) => boolean,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<CachedEntity | null> {
    const existing = get(id);
    if (existing !== null && predicate(existing)) {
      return Promise.resolve(existing);
    }
    if (signal?.aborted) {
      return Promise.resolve(null);
    }

    return new Promise((resolve) => {
      const onAbort = () => finish(null);

      const finish = (entity: CachedEntity | null) => {
        clearTimeout(timer);
        unsubscribe();
        signal?.removeEventListener("abort", onAbort);
        resolve(entity);
      };

      const unsubscribe = subscribe((entity) => {
        if (entity.id === id && predicate(entity)) {
          finish(entity);
        }
      });

      const timer = setTimeout(() => finish(null), Math.max(0, timeoutMs));
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  return {
    get,
    apply,
    snapshot: () => current,
    generation: () => current.generation,
    subscribe,
    waitFor,
  };
}
