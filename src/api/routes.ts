/**
 * API routes for the home gateway.
 *
 * Routes are organized by domain:
 * - /api/health - Health check
 * - /api/v1/status - Status view for the UI
 * - /api/v1/light/:name - Home Assistant lights
 * - /api/v1/led/:color, /api/v1/buzzer, /api/v1/output/:channel - Local outputs
 * - /api/v1/events - SSE stream for live updates
 * - everything else - pass-through proxy
 */
import { type Context, type Handler, Hono } from "hono";
import { bodyLimit } from "hono/body-limit";

import type { CommandTarget, Dispatcher } from "../dispatcher/index.js";
import { formatDispatchError } from "../dispatcher/index.js";
import type { EntityCache } from "../entity-cache/index.js";
import type { HardwareDriver } from "../hardware/index.js";
import { createLogger } from "../logger.js";
import type { Proxy } from "../proxy/index.js";
import { formatProxyError } from "../proxy/index.js";
import {
  broadcastHardware,
  createSseStream,
  getClientCount,
  removeClient,
  sendToClient,
} from "../sse/index.js";
import type { StatusOptions } from "../status/index.js";
import { buildStatusView, toLightState } from "../status/index.js";
import type { SyncClient } from "../upstream/index.js";
import { errorBody, parseDesiredState, statusFor } from "./responses.js";

const log = createLogger("api");

/** Largest accepted POST body, in bytes. */
const MAX_BODY_BYTES = 8;

const LIGHT_NAME = /^[A-Za-z0-9_]+$/;

export type RouteDeps = Readonly<{
  cache: Pick<EntityCache, "get" | "snapshot">;
  upstream: Pick<SyncClient, "getConnectionState">;
  hardware: Pick<HardwareDriver, "kind" | "hasChannel" | "read" | "snapshot">;
  dispatcher: Dispatcher;
  statusOptions: StatusOptions;
  version: string;
}>;

function targetId(target: CommandTarget): string {
  return target.kind === "entity" ? target.entityId : target.channelId;
}

/**
 * Build the API routes over the running services.
 */
export function createRoutes(deps: RouteDeps): Hono {
  const { cache, upstream, hardware, dispatcher, statusOptions } = deps;
  const routes = new Hono();

  const limitBody = bodyLimit({
    maxSize: MAX_BODY_BYTES,
    onError: (c) =>
      c.json(
        errorBody(
          "BODY_TOO_LARGE",
          `Body must not exceed ${MAX_BODY_BYTES} bytes`,
          c.get("requestId"),
        ),
        413,
      ),
  });

  // ===========================================================================
  // Shared Handlers
  // ===========================================================================

  /**
   * Parse the desired state, dispatch it and map the outcome to a response.
   */
  async function setTarget(c: Context, target: CommandTarget): Promise<Response> {
    const requestId = c.get("requestId");
    const desired = parseDesiredState(await c.req.text());

    if (desired === null) {
      return c.json(
        errorBody("INVALID_BODY", "Body must be true, false or an integer", requestId),
        400,
      );
    }

    log.info({ requestId, target: targetId(target), desired }, "Command received");

    const result = await dispatcher.dispatch({ target, desired });

    if (result.isErr()) {
      const error = result.error;
      log.warn(
        { requestId, target: targetId(target), error: formatDispatchError(error) },
        "Command failed",
      );
      return c.json(
        errorBody(error.type, error.message, requestId),
        statusFor(error.type),
      );
    }

    const outcome = result.value;
    if (target.kind === "channel") {
      broadcastHardware(target.channelId, outcome.isOn);
    }

    return c.json({
      target: targetId(target),
      isOn: outcome.isOn,
      source: outcome.source,
      generation: outcome.generation,
      requestId,
    });
  }

  function getChannel(c: Context, channelId: string): Response {
    const requestId = c.get("requestId");

    if (!hardware.hasChannel(channelId)) {
      return c.json(
        errorBody("UNKNOWN_TARGET", `No output channel named "${channelId}"`, requestId),
        404,
      );
    }

    return c.json({ channel: channelId, isOn: hardware.read(channelId), requestId });
  }

  // ===========================================================================
  // Health Check
  // ===========================================================================

  routes.get("/api/health", (c) => {
    const requestId = c.get("requestId");
    const connection = upstream.getConnectionState();
    log.debug({ requestId }, "Health check");

    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      requestId,
      version: deps.version,
      connection,
      connected: connection === "subscribed",
      driver: hardware.kind,
      sseClients: getClientCount(),
    });
  });

  // ===========================================================================
  // Status
  // ===========================================================================

  /**
   * Built from the cache as it stands; never waits on the source.
   */
  routes.get("/api/v1/status", (c) => {
    const view = buildStatusView(
      cache.snapshot(),
      upstream.getConnectionState(),
      hardware.snapshot(),
      statusOptions,
    );
    return c.json(view);
  });

  // ===========================================================================
  // Lights
  // ===========================================================================

  routes.get("/api/v1/light/:name", (c) => {
    const requestId = c.get("requestId");
    const name = c.req.param("name");

    if (!LIGHT_NAME.test(name)) {
      return c.json(errorBody("UNKNOWN_TARGET", `Invalid light name "${name}"`, requestId), 404);
    }

    const entity = cache.get(`light.${name}`);
    return c.json({
      target: `light.${name}`,
      state: toLightState(entity ?? undefined),
      generation: entity?.generation ?? null,
      requestId,
    });
  });

  routes.post("/api/v1/light/:name", limitBody, async (c) => {
    const name = c.req.param("name");

    if (!LIGHT_NAME.test(name)) {
      return c.json(
        errorBody("UNKNOWN_TARGET", `Invalid light name "${name}"`, c.get("requestId")),
        404,
      );
    }

    return setTarget(c, { kind: "entity", entityId: `light.${name}` });
  });

  // ===========================================================================
  // Local Outputs
  // ===========================================================================

  routes.get("/api/v1/led/:color", (c) => getChannel(c, `${c.req.param("color")}-led`));

  routes.post("/api/v1/led/:color", limitBody, (c) =>
    setTarget(c, { kind: "channel", channelId: `${c.req.param("color")}-led` }),
  );

  routes.get("/api/v1/buzzer", (c) => getChannel(c, "buzzer"));

  routes.post("/api/v1/buzzer", limitBody, (c) =>
    setTarget(c, { kind: "channel", channelId: "buzzer" }),
  );

  routes.get("/api/v1/output/:channel", (c) => getChannel(c, c.req.param("channel")));

  routes.post("/api/v1/output/:channel", limitBody, (c) =>
    setTarget(c, { kind: "channel", channelId: c.req.param("channel") }),
  );

  // ===========================================================================
  // Server-Sent Events Stream
  // ===========================================================================

  /**
   * SSE endpoint for live updates. The current connection state is sent
   * right after the `connected` event.
   */
  routes.get("/api/v1/events", (c) => {
    const requestId = c.get("requestId");
    const { stream, clientId } = createSseStream();
    const connection = upstream.getConnectionState();

    log.info({ requestId, clientId }, "SSE client connected");

    sendToClient(clientId, {
      type: "connection",
      state: connection,
      connected: connection === "subscribed",
    });

    c.req.raw.signal.addEventListener("abort", () => removeClient(clientId), {
      once: true,
    });

    return new Response(stream, {
      headers: {
        "Content-Type": "text/event-stream",
        "Cache-Control": "no-cache",
        Connection: "keep-alive",
      },
    });
  });

  return routes;
}

// =============================================================================
// Pass-through
// =============================================================================

/**
 * Fallback handler that relays unmatched requests through the proxy.
 */
export function createProxyHandler(proxy: Proxy): Handler {
  return async (c) => {
    const requestId = c.get("requestId");
    const result = await proxy.forward(c.req.raw);

    if (result.isOk()) {
      return result.value;
    }

    const error = result.error;
    if (error.type === "NOT_CONFIGURED") {
      return c.json(
        errorBody("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`, requestId),
        404,
      );
    }

    log.warn({ requestId, path: c.req.path, error: formatProxyError(error) }, "Pass-through failed");
    return c.json(errorBody("BAD_GATEWAY", error.message, requestId), 502);
  };
}
