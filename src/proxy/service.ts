/**
 * Proxy Module - Service Layer
 *
 * Forwards requests the API does not handle to the pass-through target.
 */
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import type { ProxyError } from "./errors.js";
import { notConfigured, proxyUnreachable } from "./errors.js";
import {
  buildTargetUrl,
  forwardRequestHeaders,
  forwardResponseHeaders,
  hasNoBody,
} from "./transform.js";

const log = createLogger("proxy");

const PROXY_TIMEOUT_MS = 30_000;

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export type ProxyOptions = Readonly<{
  targetUrl: string | null;
  timeoutMs?: number;
  fetchFn?: FetchFn;
}>;

export type Proxy = Readonly<{
  forward: (request: Request) => Promise<Result<Response, ProxyError>>;
}>;

/**
 * Create a forwarder for the configured target. With no target every
 * request fails with NOT_CONFIGURED.
 */
export function createProxy(options: ProxyOptions): Proxy {
  const { targetUrl } = options;
  const timeoutMs = options.timeoutMs ?? PROXY_TIMEOUT_MS;
  const fetchFn: FetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));

  async function forward(request: Request): Promise<Result<Response, ProxyError>> {
    if (targetUrl === null) {
      return err(notConfigured());
    }

    const incoming = new URL(request.url);
    const url = buildTargetUrl(targetUrl, incoming.pathname, incoming.search);
    const body = hasNoBody(request.method) ? undefined : await request.arrayBuffer();

    log.debug({ method: request.method, url }, "Forwarding request");

    try {
      const response = await fetchFn(url, {
        method: request.method,
        headers: forwardRequestHeaders(request.headers),
        body,
        redirect: "manual",
        signal: AbortSignal.timeout(timeoutMs),
      });

      return ok(
        new Response(response.body, {
          status: response.status,
          statusText: response.statusText,
          headers: forwardResponseHeaders(response.headers),
        }),
      );
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));

      if (cause.name === "TimeoutError" || cause.name === "AbortError") {
        return err(proxyUnreachable(`No response within ${timeoutMs}ms`, cause));
      }

      return err(proxyUnreachable(cause.message, cause));
    }
  }

  return { forward };
}
