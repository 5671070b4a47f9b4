/**
 * Entity Cache Module - Schemas and Types
 *
 * Defines the shape of mirrored entity states.
 * Records are frozen on construction; an update replaces the whole record.
 */

// =============================================================================
// Entity Values
// =============================================================================

/**
 * Opaque entity identifier assigned by Home Assistant, e.g. "light.kitchen".
 */
export type EntityId = string;

/**
 * Interpreted entity state, discriminated on `kind`.
 */
export type EntityValue =
  | Readonly<{ kind: "switch"; isOn: boolean }>
  | Readonly<{ kind: "numeric"; value: number; raw: string }>
  | Readonly<{ kind: "composite"; state: string }>
  | Readonly<{ kind: "text"; value: string }>
  | Readonly<{ kind: "removed" }>;

export type EntityValueKind = EntityValue["kind"];

/**
 * Domains whose meaning lives in the attributes rather than the state string.
 */
export const COMPOSITE_DOMAINS: ReadonlySet<string> = new Set([
  "weather",
  "zone",
  "sun",
]);

// =============================================================================
// Entity State
// =============================================================================

/**
 * One entity's current state as reported by the source.
 * Timestamps are epoch milliseconds.
 */
export type EntityState = Readonly<{
  id: EntityId;
  value: EntityValue;
  attributes: Readonly<Record<string, unknown>>;
  lastUpdated: number;
  lastChanged: number;
}>;

/**
 * An entity state as stored in the cache, tagged with the generation
 * at which it was applied.
 */
export type CachedEntity = EntityState &
  Readonly<{
    generation: number;
  }>;

// =============================================================================
// Cache Views
// =============================================================================

/**
 * Immutable view of the whole cache at one generation.
 */
export type CacheSnapshot = Readonly<{
  entities: ReadonlyMap<EntityId, CachedEntity>;
  generation: number;
}>;

/**
 * Outcome of an apply call. `generation` is the cache generation after the
 * call, whether or not the update was applied.
 */
export type ApplyOutcome = Readonly<{
  applied: boolean;
  generation: number;
}>;

/**
 * Called after every applied update.
 */
export type CacheListener = (entity: CachedEntity, generation: number) => void;
