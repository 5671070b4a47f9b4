/**
 * Upstream Module - WebSocket Transport
 *
 * Adapts a `ws` client socket to the handlers the sync client expects.
 * Protocol-level ping/pong is answered by `ws` itself.
 */
import WebSocket from "ws";

import type { SocketFactory } from "./schema.js";

function rawDataToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString("utf8");
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf8");
  }
  return Buffer.from(data).toString("utf8");
}

/**
 * Open a WebSocket to Home Assistant.
 */
export const createWsSocket: SocketFactory = (url, handlers) => {
  const ws = new WebSocket(url, { handshakeTimeout: 10000 });

  ws.on("open", () => handlers.onOpen());
  ws.on("message", (data, isBinary) =>
    handlers.onMessage(rawDataToString(data), isBinary),
  );
  ws.on("close", (code, reason) => handlers.onClose(code, reason.toString()));
  ws.on("error", (error) => handlers.onError(error));

  return {
    send: (data) => ws.send(data),
    close: () => ws.close(),
  };
};
