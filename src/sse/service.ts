/**
 * SSE Module - Service Layer
 *
 * Server-Sent Events broadcasting for live UI updates.
 */
import type { EntityId } from "../entity-cache/index.js";
import type { ChannelId } from "../hardware/index.js";
import { createLogger } from "../logger.js";
import type { ConnectionState } from "../upstream/index.js";
import type { SseEvent } from "./schema.js";

const log = createLogger("sse");

const encoder = new TextEncoder();

/**
 * Encode one event in the text/event-stream format.
 */
export function encodeEvent(event: SseEvent): Uint8Array {
  return encoder.encode(
    `event: ${event.type}\ndata: ${JSON.stringify(event)}\n\n`,
  );
}

// =============================================================================
// Client Management
// =============================================================================

/**
 * SSE client connection.
 */
type SseClient = {
  id: number;
  controller: ReadableStreamDefaultController<Uint8Array>;
  connected: boolean;
};

let clients: SseClient[] = [];
let nextClientId = 1;

/**
 * Get count of connected clients.
 */
export function getClientCount(): number {
  return clients.filter((c) => c.connected).length;
}

/**
 * Create a new SSE stream for a client.
 */
export function createSseStream(): {
  stream: ReadableStream<Uint8Array>;
  clientId: number;
} {
  const clientId = nextClientId++;
  let client: SseClient | null = null;

  const stream = new ReadableStream<Uint8Array>({
    start(controller) {
      client = {
        id: clientId,
        controller,
        connected: true,
      };
      clients.push(client);
      log.info(
        { clientId, totalClients: getClientCount() },
        "SSE client connected",
      );

      controller.enqueue(encodeEvent({ type: "connected", clientId }));
    },
    cancel() {
      if (client) {
        client.connected = false;
        clients = clients.filter((c) => c.id !== clientId);
        log.info(
          { clientId, remainingClients: getClientCount() },
          "SSE client disconnected",
        );
      }
    },
  });

  return { stream, clientId };
}

/**
 * Remove a client by ID.
 */
export function removeClient(clientId: number): void {
  const client = clients.find((c) => c.id === clientId);
  if (client) {
    client.connected = false;
    clients = clients.filter((c) => c.id !== clientId);
    log.debug({ clientId }, "SSE client removed");
  }
}

// =============================================================================
// Event Broadcasting
// =============================================================================

/**
 * Broadcast an event to all connected clients.
 */
export function broadcast(event: SseEvent): void {
  const connectedClients = clients.filter((c) => c.connected);

  if (connectedClients.length === 0) {
    log.trace({ eventType: event.type }, "No clients to broadcast to");
    return;
  }

  const data = encodeEvent(event);

  let successCount = 0;
  let errorCount = 0;

  for (const client of connectedClients) {
    try {
      client.controller.enqueue(data);
      successCount++;
    } catch (error) {
      client.connected = false;
      errorCount++;
      log.debug(
        {
          clientId: client.id,
          error: error instanceof Error ? error.message : String(error),
        },
        "SSE client gone",
      );
    }
  }

  if (errorCount > 0) {
    clients = clients.filter((c) => c.connected);
    log.debug(
      { eventType: event.type, sent: successCount, failed: errorCount },
      "Broadcast complete with disconnections",
    );
  }

  log.debug(
    { eventType: event.type, clients: successCount },
    "Event broadcasted",
  );
}

/**
 * Broadcast an applied entity update.
 */
export function broadcastEntityChanged(
  entityId: EntityId,
  generation: number,
): void {
  broadcast({ type: "entity_changed", entityId, generation });
}

/**
 * Broadcast an upstream connection state change.
 */
export function broadcastConnection(state: ConnectionState): void {
  broadcast({ type: "connection", state, connected: state === "subscribed" });
}

/**
 * Broadcast a hardware output write.
 */
export function broadcastHardware(channelId: ChannelId, isOn: boolean): void {
  broadcast({ type: "hardware", channelId, isOn });
}

/**
 * Send event to a specific client.
 */
export function sendToClient(clientId: number, event: SseEvent): boolean {
  const client = clients.find((c) => c.id === clientId && c.connected);
  if (!client) return false;

  try {
    client.controller.enqueue(encodeEvent(event));
    return true;
  } catch (error) {
    client.connected = false;
    log.debug(
      { clientId, error: error instanceof Error ? error.message : String(error) },
      "SSE client gone",
    );
    return false;
  }
}

// =============================================================================
// Cleanup
// =============================================================================

/**
 * Disconnect all clients (for shutdown).
 */
export function disconnectAllClients(): void {
  log.info({ clientCount: clients.length }, "Disconnecting all SSE clients...");

  for (const client of clients) {
    try {
      client.controller.close();
    } catch (error) {
      log.trace(
        { clientId: client.id, error: error instanceof Error ? error.message : String(error) },
        "SSE stream already closed",
      );
    }
  }

  clients = [];
}
