/**
 * Proxy Module - Public API
 */

// Types
export type { ProxyError } from "./errors.js";
export type { FetchFn, Proxy, ProxyOptions } from "./service.js";

// Error utilities
export { formatProxyError } from "./errors.js";

// Service
export { createProxy } from "./service.js";

// Pure transformations
export { buildTargetUrl } from "./transform.js";
