/**
 * Entity Cache Module - Pure Transformations
 *
 * State interpretation and update ordering rules.
 * No side effects, no I/O - just data in, data out.
 */
import { isDeepStrictEqual } from "node:util";

import type { EntityId, EntityState, EntityValue } from "./schema.js";
import { COMPOSITE_DOMAINS } from "./schema.js";

// =============================================================================
// Interpretation
// =============================================================================

/**
 * Domain part of an entity id ("light" for "light.kitchen").
 * Returns null when the id has no domain separator.
 */
export function domainOf(entityId: EntityId): string | null {
  const dot = entityId.indexOf(".");
  if (dot <= 0) {
    return null;
  }
  return entityId.slice(0, dot);
}

/**
 * Interpret a raw state string for the given entity.
 */
export function toEntityValue(entityId: EntityId, state: string): EntityValue {
  const domain = domainOf(entityId);

  if (domain !== null && COMPOSITE_DOMAINS.has(domain)) {
    return { kind: "composite", state };
  }

  if (state === "on" || state === "off") {
    return { kind: "switch", isOn: state === "on" };
  }

  const trimmed = state.trim();
  if (trimmed !== "") {
    const value = Number(trimmed);
    if (Number.isFinite(value)) {
      return { kind: "numeric", value, raw: state };
    }
  }

  return { kind: "text", value: state };
}

/**
 * Build a frozen entity state record.
 */
export function createEntityState(input: {
  id: EntityId;
  state: string;
  attributes: Record<string, unknown>;
  lastUpdated: number;
  lastChanged: number;
}): EntityState {
  return Object.freeze({
    id: input.id,
    value: Object.freeze(toEntityValue(input.id, input.state)),
    attributes: Object.freeze({ ...input.attributes }),
    lastUpdated: input.lastUpdated,
    lastChanged: input.lastChanged,
  });
}

/**
 * Build the tombstone written when the source removes an entity.
 */
export function createTombstone(id: EntityId, removedAt: number): EntityState {
  return Object.freeze({
    id,
    value: Object.freeze({ kind: "removed" as const }),
    attributes: Object.freeze({}),
    lastUpdated: removedAt,
    lastChanged: removedAt,
  });
}

// =============================================================================
// Ordering
// =============================================================================

/**
 * Decide whether an update replaces the stored record.
 *
 * - nothing stored: apply
 * - strictly older than stored: drop (out-of-order redelivery)
 * - same timestamp and same content: drop (replay)
 * - otherwise: apply
 */
export function shouldApply(
  current: EntityState | null,
  update: EntityState,
): boolean {
  if (current === null) {
    return true;
  }

  if (update.lastUpdated < current.lastUpdated) {
    return false;
  }

  if (update.lastUpdated === current.lastUpdated) {
    return !hasSameContent(current, update);
  }

  return true;
}

/**
 * True when both records carry the same value and attributes.
 */
export function hasSameContent(a: EntityState, b: EntityState): boolean {
  return (
    isDeepStrictEqual(a.value, b.value) &&
    isDeepStrictEqual(a.attributes, b.attributes)
  );
}

// =============================================================================
// Readers
// =============================================================================

/**
 * Parse an ISO timestamp to epoch ms, null when unparseable.
 */
export function parseTimestamp(value: string): number | null {
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? null : ms;
}
