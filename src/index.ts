/**
 * Home Gateway - Application Entry Point
 *
 * Sets up the Hono server with:
 * - Health, status and command routes
 * - SSE for live updates
 * - Optional static UI bundle and pass-through proxy
 * - Request ID tracing
 * - Global error handling
 * - Home Assistant sync client
 */
import { serve } from "@hono/node-server";
import { serveStatic } from "@hono/node-server/serve-static";
import { Hono } from "hono";

import { errorHandler } from "./api/errorHandler.js";
import { requestIdMiddleware } from "./api/middleware/requestId.js";
import { createProxyHandler, createRoutes } from "./api/routes.js";
import {
  config,
  getUpstreamConfig,
  hardwareChannels,
  statusEntities,
} from "./config.js";
import { createDispatcher } from "./dispatcher/index.js";
import { createEntityCache } from "./entity-cache/index.js";
import { createHardwareDriver } from "./hardware/index.js";
import { createLogger } from "./logger.js";
import { createProxy } from "./proxy/index.js";
import {
  broadcastConnection,
  broadcastEntityChanged,
  disconnectAllClients,
} from "./sse/index.js";
import { createSyncClient, createWsSocket } from "./upstream/index.js";

const log = createLogger("api");

const VERSION = "1.0.0";

// =============================================================================
// APPLICATION STARTUP BANNER
// =============================================================================

console.log("");
console.log("========================================");
console.log("  HOME GATEWAY");
console.log("========================================");
console.log("");

// Log configuration summary (non-sensitive values only)
log.info(
  {
    port: config.PORT,
    host: config.HOST,
    env: config.NODE_ENV,
    haEndpoint: config.HA_ENDPOINT,
    haTls: config.HA_TLS,
    gpioDriver: config.GPIO_DRIVER,
    lights: statusEntities.lights,
    reverseProxy: config.REVERSE_PROXY_URL ?? null,
    staticDir: config.STATIC_DIR ?? null,
  },
  "Configuration loaded",
);

// =============================================================================
// SERVICES
// =============================================================================

const cache = createEntityCache();
const hardware = createHardwareDriver(
  config.GPIO_DRIVER,
  hardwareChannels,
  config.GPIO_SYSFS_ROOT,
);
const upstream = createSyncClient(getUpstreamConfig(), cache, createWsSocket);
const dispatcher = createDispatcher(
  { cache, upstream, hardware },
  {
    confirmTimeoutMs: config.CONFIRM_TIMEOUT_MS,
    hardwareTimeoutMs: config.HARDWARE_TIMEOUT_MS,
  },
);
const proxy = createProxy({ targetUrl: config.REVERSE_PROXY_URL ?? null });

// Push cache and connection changes to SSE clients
cache.subscribe((entity, generation) => {
  broadcastEntityChanged(entity.id, generation);
});
upstream.onConnectionChange((state) => {
  log.info({ state }, `Home Assistant connection: ${state}`);
  broadcastConnection(state);
});

// =============================================================================
// HONO SERVER SETUP
// =============================================================================

const app = new Hono();

// Global middleware
app.use("*", requestIdMiddleware);

// Error handler
app.onError(errorHandler);

// API routes
app.route(
  "/",
  createRoutes({
    cache,
    upstream,
    hardware,
    dispatcher,
    statusOptions: {
      weatherEntity: statusEntities.weather,
      locationEntity: statusEntities.location,
      lights: statusEntities.lights,
    },
    version: VERSION,
  }),
);

// Compiled UI bundle
if (config.STATIC_DIR) {
  app.use("/*", serveStatic({ root: config.STATIC_DIR }));
}

// Everything else goes to the pass-through target
app.all("*", createProxyHandler(proxy));

// =============================================================================
// START
// =============================================================================

upstream.start();

const server = serve(
  { fetch: app.fetch, port: config.PORT, hostname: config.HOST },
  (info) => {
    log.info(
      { port: info.port, host: config.HOST, env: config.NODE_ENV, appName: config.APP_NAME },
      `🚀 ${config.APP_NAME} listening on ${config.HOST}:${info.port}`,
    );
  },
);

// =============================================================================
// GRACEFUL SHUTDOWN
// =============================================================================

const shutdown = (signal: string) => {
  log.info({ signal }, `${signal} received. Shutting down gracefully...`);

  // Stop reconnecting and fail pending commands
  upstream.stop();

  // Close SSE connections
  disconnectAllClients();

  server.close((error) => {
    if (error) {
      log.error({ error: error.message }, "Server close failed");
      process.exit(1);
    }
    log.info("Shutdown complete");
    process.exit(0);
  });
};

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
