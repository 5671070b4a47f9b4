/**
 * SSE Module - Schemas and Types
 *
 * Defines the event types for Server-Sent Events.
 */
import type { EntityId } from "../entity-cache/index.js";
import type { ChannelId } from "../hardware/index.js";
import type { ConnectionState } from "../upstream/index.js";

// =============================================================================
// SSE Event Types
// =============================================================================

/**
 * Sent once to each client when its stream opens.
 */
export type ConnectedEvent = Readonly<{
  type: "connected";
  clientId: number;
}>;

/**
 * An entity update was applied to the cache. Clients refetch the status
 * view; the generation lets them drop stale responses.
 */
export type EntityChangedEvent = Readonly<{
  type: "entity_changed";
  entityId: EntityId;
  generation: number;
}>;

/**
 * Upstream connection state changed.
 */
export type ConnectionEvent = Readonly<{
  type: "connection";
  state: ConnectionState;
  connected: boolean;
}>;

/**
 * A local output was written.
 */
export type HardwareEvent = Readonly<{
  type: "hardware";
  channelId: ChannelId;
  isOn: boolean;
}>;

/**
 * Union of all SSE event types.
 */
export type SseEvent =
  | ConnectedEvent
  | EntityChangedEvent
  | ConnectionEvent
  | HardwareEvent;
