/**
 * Proxy Module - Pure Transformations
 *
 * URL rewriting and header filtering for forwarded requests.
 */

/**
 * Headers that describe one hop rather than the message.
 */
const HOP_BY_HOP = new Set([
  "connection",
  "keep-alive",
  "proxy-authenticate",
  "proxy-authorization",
  "te",
  "trailer",
  "transfer-encoding",
  "upgrade",
]);

const DROPPED_REQUEST_HEADERS = new Set([...HOP_BY_HOP, "host", "content-length"]);

// fetch has already decoded the body by the time the response is relayed.
const DROPPED_RESPONSE_HEADERS = new Set([
  ...HOP_BY_HOP,
  "content-encoding",
  "content-length",
]);

/**
 * Resolve `path` and `search` against the target base URL. A path prefix on
 * the base is kept.
 */
export function buildTargetUrl(base: string, path: string, search: string): string {
  const url = new URL(base);
  const prefix = url.pathname.replace(/\/+$/, "");
  url.pathname = `${prefix}${path}`;
  url.search = search;
  return url.toString();
}

function filterHeaders(headers: Headers, dropped: ReadonlySet<string>): Headers {
  const filtered = new Headers();
  headers.forEach((value, name) => {
    if (!dropped.has(name.toLowerCase())) {
      filtered.append(name, value);
    }
  });
  return filtered;
}

export function forwardRequestHeaders(headers: Headers): Headers {
  return filterHeaders(headers, DROPPED_REQUEST_HEADERS);
}

export function forwardResponseHeaders(headers: Headers): Headers {
  return filterHeaders(headers, DROPPED_RESPONSE_HEADERS);
}

/**
 * Methods that carry no request body.
 */
export function hasNoBody(method: string): boolean {
  return method === "GET" || method === "HEAD";
}
