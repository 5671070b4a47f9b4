/**
 * Upstream Module - Pure Transformations
 *
 * Frame decoding, message building and the reconnect delay.
 * No side effects, no I/O - just data in, data out.
 */
import { type Result, err, ok } from "neverthrow";

import {
  type EntityId,
  type EntityState,
  createEntityState,
  createTombstone,
  parseTimestamp,
} from "../entity-cache/index.js";
import type { UpstreamError } from "./errors.js";
import { malformedEvent, protocolError } from "./errors.js";
import type {
  AuthMessage,
  CommandMessage,
  HaState,
  UpstreamFrame,
} from "./schema.js";
import {
  DumpEntryIdSchema,
  FrameEnvelopeSchema,
  HaStateSchema,
  KNOWN_FRAME_TYPES,
  KnownFrameSchema,
  StateChangedEventSchema,
} from "./schema.js";

// =============================================================================
// Frame Decoding
// =============================================================================

/**
 * Decode a text frame.
 *
 * Anything that is not JSON, has no `type`, or is a known type with the wrong
 * shape is a PROTOCOL_ERROR. Unknown types decode as "unrecognised".
 */
export function decodeFrame(raw: string): Result<UpstreamFrame, UpstreamError> {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return err(protocolError("Frame is not valid JSON", raw));
  }

  const envelope = FrameEnvelopeSchema.safeParse(data);
  if (!envelope.success) {
    return err(protocolError("Frame has no type", raw));
  }

  if (!KNOWN_FRAME_TYPES.has(envelope.data.type)) {
    const unrecognised: UpstreamFrame = {
      type: "unrecognised",
      frameType: envelope.data.type,
    };
    return ok(unrecognised);
  }

  const frame = KnownFrameSchema.safeParse(data);
  if (!frame.success) {
    return err(
      protocolError(`Invalid ${envelope.data.type} frame`, raw),
    );
  }

  return ok(frame.data);
}

// =============================================================================
// Entity States
// =============================================================================

/**
 * Convert a validated Home Assistant state object.
 */
export function fromHaState(state: HaState): Result<EntityState, UpstreamError> {
  const lastUpdated = parseTimestamp(state.last_updated);
  const lastChanged = parseTimestamp(state.last_changed);

  if (lastUpdated === null || lastChanged === null) {
    return err(malformedEvent("Unparseable timestamp", state.entity_id));
  }

  return ok(
    createEntityState({
      id: state.entity_id,
      state: state.state,
      attributes: state.attributes,
      lastUpdated,
      lastChanged,
    }),
  );
}

/**
 * Validate and convert one entry of a `get_states` result.
 */
export function parseStateEntry(
  entry: unknown,
): Result<EntityState, UpstreamError> {
  const parsed = HaStateSchema.safeParse(entry);
  if (!parsed.success) {
    return err(malformedEvent(`Invalid state object: ${parsed.error.message}`));
  }
  return fromHaState(parsed.data);
}

/**
 * Entity id of a `get_states` entry, null when it has none.
 */
export function dumpEntryId(entry: unknown): EntityId | null {
  const parsed = DumpEntryIdSchema.safeParse(entry);
  return parsed.success ? parsed.data.entity_id : null;
}

/**
 * Validate and convert the payload of a `state_changed` event.
 * A null `new_state` becomes a tombstone stamped with `time_fired`.
 */
export function parseStateChangedEvent(
  event: unknown,
): Result<EntityState, UpstreamError> {
  const parsed = StateChangedEventSchema.safeParse(event);
  if (!parsed.success) {
    return err(malformedEvent(`Invalid state_changed event: ${parsed.error.message}`));
  }

  const { data, time_fired } = parsed.data;

  if (data.new_state === null) {
    const removedAt = parseTimestamp(time_fired);
    if (removedAt === null) {
      return err(malformedEvent("Unparseable time_fired", data.entity_id));
    }
    return ok(createTombstone(data.entity_id, removedAt));
  }

  if (data.new_state.entity_id !== data.entity_id) {
    return err(
      malformedEvent(
        `new_state belongs to ${data.new_state.entity_id}`,
        data.entity_id,
      ),
    );
  }

  return fromHaState(data.new_state);
}

// =============================================================================
// Outbound Messages
// =============================================================================

export function buildAuthMessage(accessToken: string): AuthMessage {
  return { type: "auth", access_token: accessToken };
}

export function buildSubscribeMessage(): CommandMessage {
  return { type: "subscribe_events", event_type: "state_changed" };
}

export function buildGetStatesMessage(): CommandMessage {
  return { type: "get_states" };
}

export function buildPingMessage(): CommandMessage {
  return { type: "ping" };
}

/**
 * Build a `call_service` message. Empty data and target are left out.
 */
export function buildCallServiceMessage(
  domain: string,
  service: string,
  serviceData?: Record<string, unknown>,
  target?: Record<string, unknown>,
): CommandMessage {
  return {
    type: "call_service",
    domain,
    service,
    ...(serviceData && Object.keys(serviceData).length > 0
      ? { service_data: serviceData }
      : {}),
    ...(target && Object.keys(target).length > 0 ? { target } : {}),
  };
}

/**
 * Serialize a message with its id.
 */
export function encodeCommand(id: number, message: CommandMessage): string {
  return JSON.stringify({ id, ...message });
}

// =============================================================================
// Reconnect Policy
// =============================================================================

/**
 * Delay before reconnect attempt number `attempt` (0-based):
 * min * 2^attempt, capped at max.
 */
export function nextBackoffDelay(
  attempt: number,
  minMs: number,
  maxMs: number,
): number {
  const exponent = Math.max(0, Math.min(attempt, 30));
  return Math.min(minMs * 2 ** exponent, maxMs);
}
