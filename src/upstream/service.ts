/**
 * Upstream Module - Service Layer
 *
 * Persistent Home Assistant WebSocket session:
 * connect → auth → subscribe to state_changed → full state dump → live events.
 *
 * This is the only writer of the entity cache and of the connection state.
 * Any connection-level failure publishes "disconnected" at once and schedules
 * a reconnect with exponential backoff.
 */
import { type Result, err, ok } from "neverthrow";

import type { EntityCache, EntityId } from "../entity-cache/index.js";
import { createTombstone } from "../entity-cache/index.js";
import { createLogger, logOperationComplete } from "../logger.js";
import type { CommandError, UpstreamError } from "./errors.js";
import {
  authRejected,
  commandRejected,
  commandTimeout,
  connectionLost,
  formatUpstreamError,
  idleTimeout,
  notConnected,
  protocolError,
  transportFailure,
} from "./errors.js";
import type {
  CommandMessage,
  ConnectionListener,
  ConnectionState,
  SocketFactory,
  SyncClientOptions,
  UpstreamFrame,
  UpstreamSocket,
} from "./schema.js";
import {
  buildAuthMessage,
  buildCallServiceMessage,
  buildGetStatesMessage,
  buildPingMessage,
  buildSubscribeMessage,
  decodeFrame,
  dumpEntryId,
  encodeCommand,
  nextBackoffDelay,
  parseStateChangedEvent,
  parseStateEntry,
} from "./transform.js";

const log = createLogger("upstream");

/**
 * Public surface of the sync client.
 */
export type SyncClient = Readonly<{
  start: () => void;
  stop: () => void;
  getConnectionState: () => ConnectionState;
  isConnected: () => boolean;
  onConnectionChange: (listener: ConnectionListener) => () => void;
  callService: (
    domain: string,
    service: string,
    serviceData?: Record<string, unknown>,
    target?: Record<string, unknown>,
  ) => Promise<Result<void, CommandError>>;
}>;

type PendingCall = {
  resolve: (result: Result<void, CommandError>) => void;
  timer: ReturnType<typeof setTimeout>;
};

/**
 * State of one socket, from connect until it fails or is stopped.
 */
type Session = {
  socket: UpstreamSocket | null;
  nextId: number;
  authenticated: boolean;
  subscriptionId: number | null;
  statesRequestId: number | null;
  lastFrameAt: number;
  startedAt: number;
  heartbeatTimer: ReturnType<typeof setInterval> | null;
  pending: Map<number, PendingCall>;
};

/**
 * Create a sync client writing into the given cache.
 */
export function createSyncClient(
  options: SyncClientOptions,
  cache: Pick<EntityCache, "apply" | "snapshot">,
  socketFactory: SocketFactory,
): SyncClient {
  let state: ConnectionState = "disconnected";
  let session: Session | null = null;
  let stopped = true;
  let attempt = 0;
  let reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  let stableTimer: ReturnType<typeof setTimeout> | null = null;
  const listeners = new Set<ConnectionListener>();

  // ===========================================================================
  // Connection State
  // ===========================================================================

  function setState(next: ConnectionState): void {
    if (next === state) {
      return;
    }

    log.info({ from: state, to: next }, `Connection ${next}`);
    state = next;

    for (const listener of [...listeners]) {
      try {
        listener(next);
      } catch (error) {
        log.error(
          { error: error instanceof Error ? error.message : String(error) },
          "Connection listener threw",
        );
      }
    }
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  function connect(): void {
    reconnectTimer = null;
    if (stopped) {
      return;
    }

    const now = Date.now();
    const current: Session = {
      socket: null,
      nextId: 1,
      authenticated: false,
      subscriptionId: null,
      statesRequestId: null,
      lastFrameAt: now,
      startedAt: now,
      heartbeatTimer: null,
      pending: new Map(),
    };
    session = current;
    setState("connecting");

    log.info({ url: options.url, attempt }, "Connecting to Home Assistant...");

    // Handlers from a socket that is no longer current are ignored.
    const isCurrent = () => session === current;

    try {
      current.socket = socketFactory(options.url, {
        onOpen: () => {
          if (isCurrent()) {
            log.debug("WebSocket open, waiting for auth_required");
          }
        },
        onMessage: (data, isBinary) => {
          if (isCurrent()) {
            handleRaw(current, data, isBinary);
          }
        },
        onClose: (code, reason) => {
          if (isCurrent()) {
            fail(
              transportFailure(
                `Socket closed (${code}${reason ? `: ${reason}` : ""})`,
              ),
            );
          }
        },
        onError: (error) => {
          if (isCurrent()) {
            fail(transportFailure(error.message, error));
          }
        },
      });
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      fail(transportFailure("Failed to open socket", cause));
      return;
    }

    if (isCurrent()) {
      current.heartbeatTimer = setInterval(
        () => heartbeat(current),
        options.heartbeatIntervalMs,
      );
    }
  }

  /**
   * Tear down the current session and fail its pending calls.
   */
  function closeSession(reason: string): void {
    const current = session;
    if (current === null) {
      return;
    }
    session = null;

    if (current.heartbeatTimer !== null) {
      clearInterval(current.heartbeatTimer);
    }
    if (stableTimer !== null) {
      clearTimeout(stableTimer);
      stableTimer = null;
    }

    for (const [id, call] of current.pending) {
      clearTimeout(call.timer);
      call.resolve(err(connectionLost(reason)));
      current.pending.delete(id);
    }

    try {
      current.socket?.close();
    } catch (error) {
      log.debug(
        { error: error instanceof Error ? error.message : String(error) },
        "Socket close threw",
      );
    }
  }

  function fail(error: UpstreamError): void {
    if (session === null) {
      return;
    }

    log.warn({ errorType: error.type }, formatUpstreamError(error));

    closeSession(formatUpstreamError(error));
    setState("disconnected");
    scheduleReconnect();
  }

  function scheduleReconnect(): void {
    if (stopped || reconnectTimer !== null) {
      return;
    }

    const delayMs = nextBackoffDelay(
      attempt,
      options.backoffMinMs,
      options.backoffMaxMs,
    );
    attempt += 1;

    log.info({ delayMs, attempt }, "Scheduling reconnect");
    reconnectTimer = setTimeout(connect, delayMs);
  }

  function enterSubscribed(current: Session): void {
    setState("subscribed");
    logOperationComplete(log, "subscribe", current.startedAt);

    stableTimer = setTimeout(() => {
      stableTimer = null;
      if (attempt > 0) {
        log.debug({ attempt }, "Connection stable, backoff reset");
      }
      attempt = 0;
    }, options.backoffStableMs);
  }

  function heartbeat(current: Session): void {
    const idleMs = Date.now() - current.lastFrameAt;

    if (idleMs >= options.idleTimeoutMs) {
      fail(idleTimeout(idleMs));
      return;
    }

    // Home Assistant rejects messages other than auth before auth_ok.
    if (current.authenticated) {
      send(current, buildPingMessage());
    }
  }

  // ===========================================================================
  // Sending
  // ===========================================================================

  function sendRaw(current: Session, payload: string): boolean {
    try {
      current.socket?.send(payload);
      return true;
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      fail(transportFailure("Failed to send frame", cause));
      return false;
    }
  }

  /**
   * Send a message with the next id. Returns the id, or null if the send
   * failed (the session is then already torn down).
   */
  function send(current: Session, message: CommandMessage): number | null {
    const id = current.nextId;
    current.nextId += 1;

    if (!sendRaw(current, encodeCommand(id, message))) {
      return null;
    }

    log.trace({ id, messageType: message.type }, "Frame sent");
    return id;
  }

  // ===========================================================================
  // Receiving
  // ===========================================================================

  function handleRaw(current: Session, data: string, isBinary: boolean): void {
    current.lastFrameAt = Date.now();

    if (isBinary) {
      fail(protocolError("Unexpected binary frame"));
      return;
    }

    const decoded = decodeFrame(data);
    if (decoded.isErr()) {
      fail(decoded.error);
      return;
    }

    handleFrame(current, decoded.value);
  }

  function handleFrame(current: Session, frame: UpstreamFrame): void {
    switch (frame.type) {
      case "auth_required": {
        log.info(
          { haVersion: frame.ha_version },
          "Authenticating with Home Assistant...",
        );
        setState("authenticating");
        sendRaw(current, JSON.stringify(buildAuthMessage(options.accessToken)));
        break;
      }

      case "auth_ok": {
        log.info({ haVersion: frame.ha_version }, "Authenticated");
        current.authenticated = true;
        current.subscriptionId = send(current, buildSubscribeMessage());
        break;
      }

      case "auth_invalid": {
        fail(authRejected(frame.message));
        break;
      }

      case "result": {
        if (frame.id === current.subscriptionId) {
          if (!frame.success) {
            fail(
              protocolError(
                `Subscription refused: ${frame.error?.message ?? "unknown error"}`,
              ),
            );
            break;
          }
          log.debug({ id: frame.id }, "Subscribed to state_changed");
          current.statesRequestId = send(current, buildGetStatesMessage());
          break;
        }

        if (frame.id === current.statesRequestId) {
          if (!frame.success) {
            fail(
              protocolError(
                `State dump refused: ${frame.error?.message ?? "unknown error"}`,
              ),
            );
            break;
          }
          if (applyStateDump(frame.result)) {
            enterSubscribed(current);
          }
          break;
        }

        const call = current.pending.get(frame.id);
        if (call) {
          current.pending.delete(frame.id);
          clearTimeout(call.timer);
          call.resolve(
            frame.success
              ? ok(undefined)
              : err(
                  commandRejected(
                    frame.error?.message ?? "Service call failed",
                    frame.error?.code,
                  ),
                ),
          );
          break;
        }

        log.debug({ id: frame.id }, "Result for unknown request ignored");
        break;
      }

      case "event": {
        if (frame.id !== current.subscriptionId) {
          log.debug({ id: frame.id }, "Event for unknown subscription ignored");
          break;
        }
        applyEvent(frame.event);
        break;
      }

      case "pong":
        break;

      case "unrecognised":
        log.debug({ frameType: frame.frameType }, "Unrecognised frame ignored");
        break;
    }
  }

  /**
   * Apply every entity of a `get_states` result. Bad entries are skipped;
   * a result that is not a list ends the connection.
   */
  function applyStateDump(result: unknown): boolean {
    if (!Array.isArray(result)) {
      fail(protocolError("State dump is not a list"));
      return false;
    }

    let applied = 0;
    let skipped = 0;
    const listed = new Set<EntityId>();

    for (const entry of result) {
      const entityId = dumpEntryId(entry);
      if (entityId !== null) {
        listed.add(entityId);
      }

      const parsed = parseStateEntry(entry);
      if (parsed.isErr()) {
        skipped += 1;
        log.warn(
          { errorType: parsed.error.type, entityId },
          formatUpstreamError(parsed.error),
        );
        continue;
      }
      if (cache.apply(parsed.value).applied) {
        applied += 1;
      }
    }

    // The dump is the whole picture: anything cached but not listed is gone.
    let removed = 0;
    const now = Date.now();
    for (const [entityId, entity] of cache.snapshot().entities) {
      if (listed.has(entityId) || entity.value.kind === "removed") {
        continue;
      }
      const tombstone = createTombstone(
        entityId,
        Math.max(now, entity.lastUpdated),
      );
      if (cache.apply(tombstone).applied) {
        removed += 1;
      }
    }

    log.info(
      { entities: result.length, applied, skipped, removed },
      "Full state dump applied",
    );
    return true;
  }

  function applyEvent(event: unknown): void {
    const parsed = parseStateChangedEvent(event);

    if (parsed.isErr()) {
      log.warn(
        { errorType: parsed.error.type },
        formatUpstreamError(parsed.error),
      );
      return;
    }

    const outcome = cache.apply(parsed.value);
    log.debug(
      {
        entityId: parsed.value.id,
        applied: outcome.applied,
        generation: outcome.generation,
      },
      "State change received",
    );
  }

  // ===========================================================================
  // Public API
  // ===========================================================================

  function start(): void {
    if (!stopped) {
      return;
    }
    stopped = false;
    attempt = 0;
    connect();
  }

  function stop(): void {
    stopped = true;

    if (reconnectTimer !== null) {
      clearTimeout(reconnectTimer);
      reconnectTimer = null;
    }

    closeSession("Client stopped");
    setState("disconnected");
  }

  function callService(
    domain: string,
    service: string,
    serviceData?: Record<string, unknown>,
    target?: Record<string, unknown>,
  ): Promise<Result<void, CommandError>> {
    const current = session;

    if (current === null || state !== "subscribed") {
      return Promise.resolve(
        err(notConnected(`Connection is ${state}, cannot call ${domain}.${service}`)),
      );
    }

    const id = send(
      current,
      buildCallServiceMessage(domain, service, serviceData, target),
    );
    if (id === null) {
      return Promise.resolve(err(connectionLost("Failed to send service call")));
    }

    log.info({ id, domain, service, target }, "Service call sent");

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        current.pending.delete(id);
        resolve(err(commandTimeout(options.commandAckTimeoutMs)));
      }, options.commandAckTimeoutMs);

      current.pending.set(id, { resolve, timer });
    });
  }

  return {
    start,
    stop,
    getConnectionState: () => state,
    isConnected: () => state === "subscribed",
    onConnectionChange: (listener) => {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    callService,
  };
}
