/**
 * SSE Module - Public API
 *
 * Exports types and service functions for Server-Sent Events.
 */

// Types
export type {
  ConnectedEvent,
  ConnectionEvent,
  EntityChangedEvent,
  HardwareEvent,
  SseEvent,
} from "./schema.js";

// Service functions
export {
  broadcast,
  broadcastConnection,
  broadcastEntityChanged,
  broadcastHardware,
  createSseStream,
  disconnectAllClients,
  encodeEvent,
  getClientCount,
  removeClient,
  sendToClient,
} from "./service.js";
