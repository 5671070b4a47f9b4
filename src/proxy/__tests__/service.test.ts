/**
 * Proxy Tests
 *
 * The target is a stubbed fetch; nothing leaves the process.
 */
import { describe, expect, test, vi } from "vitest";

// Mock logger to reduce noise in tests
vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
  }),
}));

// Import after mocks
import type { FetchFn } from "../service.js";
import { createProxy } from "../service.js";
import {
  buildTargetUrl,
  forwardRequestHeaders,
  forwardResponseHeaders,
} from "../transform.js";

// =============================================================================
// Transformations
// =============================================================================

describe("buildTargetUrl", () => {
  test("keeps path and query", () => {
    expect(
      buildTargetUrl("http://nas.local:8080", "/photos/index.html", "?page=2"),
    ).toBe("http://nas.local:8080/photos/index.html?page=2");
  });

  test("keeps a path prefix on the target", () => {
    expect(buildTargetUrl("http://nas.local:8080/app/", "/settings", "")).toBe(
      "http://nas.local:8080/app/settings",
    );
  });
});

describe("header filtering", () => {
  test("drops host and hop-by-hop request headers", () => {
    const headers = forwardRequestHeaders(
      new Headers({
        host: "gateway.local:8000",
        connection: "keep-alive",
        "content-length": "12",
        accept: "text/html",
        cookie: "session=test-session",
      }),
    );

    expect([...headers.entries()]).toEqual([
      ["accept", "text/html"],
      ["cookie", "session=test-session"],
    ]);
  });

  test("drops encoding headers from the relayed response", () => {
    const headers = forwardResponseHeaders(
      new Headers({
        "content-type": "text/html",
        "content-encoding": "gzip",
        "content-length": "512",
      }),
    );

    expect([...headers.entries()]).toEqual([["content-type", "text/html"]]);
  });
});

// =============================================================================
// Forwarding
// =============================================================================

describe("createProxy", () => {
  test("fails with NOT_CONFIGURED when no target is set", async () => {
    const fetchFn = vi.fn<FetchFn>();
    const proxy = createProxy({ targetUrl: null, fetchFn });

    const result = await proxy.forward(new Request("http://gateway.local/index.html"));

    expect(result._unsafeUnwrapErr().type).toBe("NOT_CONFIGURED");
    expect(fetchFn).not.toHaveBeenCalled();
  });

  test("relays a GET with its query and returns the target's response", async () => {
    const fetchFn = vi.fn<FetchFn>(
      async () =>
        new Response("<h1>NAS</h1>", {
          status: 200,
          headers: { "content-type": "text/html" },
        }),
    );
    const proxy = createProxy({ targetUrl: "http://nas.local:8080", fetchFn });

    const result = await proxy.forward(
      new Request("http://gateway.local/photos?page=2", {
        headers: { accept: "text/html" },
      }),
    );

    const response = result._unsafeUnwrap();
    expect(response.status).toBe(200);
    expect(response.headers.get("content-type")).toBe("text/html");
    expect(await response.text()).toBe("<h1>NAS</h1>");

    const [url, init] = fetchFn.mock.calls[0] ?? [];
    expect(url).toBe("http://nas.local:8080/photos?page=2");
    expect(init?.method).toBe("GET");
    expect(init?.body).toBeUndefined();
    expect(init?.redirect).toBe("manual");
  });

  test("forwards the body of a POST", async () => {
    const fetchFn = vi.fn<FetchFn>(async () => new Response(null, { status: 204 }));
    const proxy = createProxy({ targetUrl: "http://nas.local:8080", fetchFn });

    const result = await proxy.forward(
      new Request("http://gateway.local/api/notes", {
        method: "POST",
        body: "hello",
      }),
    );

    expect(result._unsafeUnwrap().status).toBe(204);
    const init = fetchFn.mock.calls[0]?.[1];
    expect(init?.method).toBe("POST");
    const body = init?.body;
    expect(body).toBeInstanceOf(ArrayBuffer);
    if (body instanceof ArrayBuffer) {
      expect(new TextDecoder().decode(body)).toBe("hello");
    }
  });

  test("passes error statuses from the target through", async () => {
    const fetchFn = vi.fn<FetchFn>(async () => new Response("gone", { status: 410 }));
    const proxy = createProxy({ targetUrl: "http://nas.local:8080", fetchFn });

    const result = await proxy.forward(new Request("http://gateway.local/old"));

    expect(result._unsafeUnwrap().status).toBe(410);
  });

  test("fails with UNREACHABLE when the target cannot be reached", async () => {
    const fetchFn = vi.fn<FetchFn>(async () => {
      throw new TypeError("fetch failed");
    });
    const proxy = createProxy({ targetUrl: "http://nas.local:8080", fetchFn });

    const result = await proxy.forward(new Request("http://gateway.local/"));

    expect(result._unsafeUnwrapErr()).toMatchObject({
      type: "UNREACHABLE",
      message: "fetch failed",
    });
  });

  test("reports a timeout as UNREACHABLE", async () => {
    const fetchFn = vi.fn<FetchFn>(async () => {
      throw new DOMException("The operation was aborted due to timeout", "TimeoutError");
    });
    const proxy = createProxy({
      targetUrl: "http://nas.local:8080",
      timeoutMs: 250,
      fetchFn,
    });

    const result = await proxy.forward(new Request("http://gateway.local/"));

    expect(result._unsafeUnwrapErr()).toMatchObject({
      type: "UNREACHABLE",
      message: "No response within 250ms",
    });
  });
});
