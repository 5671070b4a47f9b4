/**
 * Upstream Module - Public API
 *
 * Exports types, the sync client and transformations for the
 * Home Assistant connection.
 */

// Types
export type {
  ConnectionListener,
  ConnectionState,
  HaState,
  SocketFactory,
  SocketHandlers,
  SyncClientOptions,
  UpstreamFrame,
  UpstreamSocket,
} from "./schema.js";
export type { CommandError, UpstreamError } from "./errors.js";

// Error utilities
export { formatCommandError, formatUpstreamError } from "./errors.js";

// Service
export type { SyncClient } from "./service.js";
export { createSyncClient } from "./service.js";
export { createWsSocket } from "./socket.js";

// Pure transformations (for testing)
export {
  buildCallServiceMessage,
  decodeFrame,
  nextBackoffDelay,
  parseStateChangedEvent,
  parseStateEntry,
} from "./transform.js";
