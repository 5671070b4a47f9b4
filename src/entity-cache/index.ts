/**
 * Entity Cache Module - Public API
 *
 * Exports only what's needed by other modules.
 */

// Types
export type {
  ApplyOutcome,
  CacheListener,
  CacheSnapshot,
  CachedEntity,
  EntityId,
  EntityState,
  EntityValue,
  EntityValueKind,
} from "./schema.js";

// Service
export type { EntityCache } from "./service.js";
export { createEntityCache } from "./service.js";

// Pure transformations
export {
  createEntityState,
  createTombstone,
  domainOf,
  hasSameContent,
  parseTimestamp,
  shouldApply,
  toEntityValue,
} from "./transform.js";
