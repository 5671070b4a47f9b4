/**
 * Upstream Module - Schemas and Types
 *
 * Home Assistant WebSocket API message shapes.
 * Schemas are the source of truth - types derived with z.infer<>.
 */
import { z } from "zod";

// =============================================================================
// Entity State (as sent by Home Assistant)
// =============================================================================

/**
 * State object inside `get_states` results and `state_changed` events.
 */
export const HaStateSchema = z.object({
  entity_id: z.string().min(1),
  state: z.string(),
  attributes: z.record(z.unknown()).default({}),
  last_changed: z.string(),
  last_updated: z.string(),
});

export type HaState = z.infer<typeof HaStateSchema>;

/**
 * Just the id of a dump entry, so an entry that fails full validation still
 * counts as listed.
 */
export const DumpEntryIdSchema = z.object({
  entity_id: z.string().min(1),
});

/**
 * Payload of an `event` frame for the `state_changed` subscription.
 * `new_state` is null when the entity was removed.
 */
export const StateChangedEventSchema = z.object({
  event_type: z.literal("state_changed"),
  data: z.object({
    entity_id: z.string().min(1),
    new_state: HaStateSchema.nullable(),
    old_state: z.unknown().optional(),
  }),
  time_fired: z.string(),
});

export type StateChangedEvent = z.infer<typeof StateChangedEventSchema>;

// =============================================================================
// Inbound Frames
// =============================================================================

export const AuthRequiredFrameSchema = z.object({
  type: z.literal("auth_required"),
  ha_version: z.string().optional(),
});

export const AuthOkFrameSchema = z.object({
  type: z.literal("auth_ok"),
  ha_version: z.string().optional(),
});

export const AuthInvalidFrameSchema = z.object({
  type: z.literal("auth_invalid"),
  message: z.string().default("invalid credentials"),
});

export const ResultFrameSchema = z.object({
  type: z.literal("result"),
  id: z.number().int(),
  success: z.boolean(),
  result: z.unknown().optional(),
  error: z
    .object({
      code: z.union([z.string(), z.number()]).optional(),
      message: z.string(),
    })
    .optional(),
});

export const EventFrameSchema = z.object({
  type: z.literal("event"),
  id: z.number().int(),
  event: z.unknown(),
});

export const PongFrameSchema = z.object({
  type: z.literal("pong"),
  id: z.number().int(),
});

/**
 * Frames the client acts on.
 */
export const KnownFrameSchema = z.discriminatedUnion("type", [
  AuthRequiredFrameSchema,
  AuthOkFrameSchema,
  AuthInvalidFrameSchema,
  ResultFrameSchema,
  EventFrameSchema,
  PongFrameSchema,
]);

export type KnownFrame = z.infer<typeof KnownFrameSchema>;

export const KNOWN_FRAME_TYPES: ReadonlySet<string> = new Set([
  "auth_required",
  "auth_ok",
  "auth_invalid",
  "result",
  "event",
  "pong",
]);

/**
 * Minimal envelope every frame must satisfy.
 */
export const FrameEnvelopeSchema = z
  .object({
    type: z.string().min(1),
  })
  .passthrough();

/**
 * Decoded frame. Unrecognised types are kept so they can be logged.
 */
export type UpstreamFrame =
  | KnownFrame
  | Readonly<{ type: "unrecognised"; frameType: string }>;

// =============================================================================
// Outbound Messages
// =============================================================================

export type AuthMessage = Readonly<{
  type: "auth";
  access_token: string;
}>;

/**
 * Messages that carry an id. The id is assigned when sending.
 */
export type CommandMessage =
  | Readonly<{ type: "subscribe_events"; event_type: "state_changed" }>
  | Readonly<{ type: "get_states" }>
  | Readonly<{ type: "ping" }>
  | Readonly<{
      type: "call_service";
      domain: string;
      service: string;
      service_data?: Record<string, unknown>;
      target?: Record<string, unknown>;
    }>;

// =============================================================================
// Connection
// =============================================================================

/**
 * Connection lifecycle. Only `subscribed` counts as connected.
 */
export type ConnectionState =
  | "disconnected"
  | "connecting"
  | "authenticating"
  | "subscribed";

export type ConnectionListener = (state: ConnectionState) => void;

// =============================================================================
// Transport
// =============================================================================

/**
 * Callbacks a socket implementation reports into.
 */
export type SocketHandlers = Readonly<{
  onOpen: () => void;
  onMessage: (data: string, isBinary: boolean) => void;
  onClose: (code: number, reason: string) => void;
  onError: (error: Error) => void;
}>;

/**
 * The part of a WebSocket the sync client uses.
 */
export type UpstreamSocket = Readonly<{
  send: (data: string) => void;
  close: () => void;
}>;

export type SocketFactory = (
  url: string,
  handlers: SocketHandlers,
) => UpstreamSocket;

// =============================================================================
// Client Options
// =============================================================================

export type SyncClientOptions = Readonly<{
  url: string;
  accessToken: string;
  backoffMinMs: number;
  backoffMaxMs: number;
  backoffStableMs: number;
  heartbeatIntervalMs: number;
  idleTimeoutMs: number;
  commandAckTimeoutMs: number;
}>;
