/**
 * Proxy Module - Error Types
 *
 * Errors are values, not exceptions.
 */

export type ProxyError =
  | {
      readonly type: "NOT_CONFIGURED";
      readonly message: string;
    }
  | {
      readonly type: "UNREACHABLE";
      readonly message: string;
      readonly cause?: Error;
    };

/**
 * Create a NOT_CONFIGURED error.
 */
export function notConfigured(): ProxyError {
  return { type: "NOT_CONFIGURED", message: "No pass-through target configured" };
}

/**
 * Create an UNREACHABLE error.
 */
export function proxyUnreachable(message: string, cause?: Error): ProxyError {
  if (cause) {
    return { type: "UNREACHABLE", message, cause };
  }
  return { type: "UNREACHABLE", message };
}

/**
 * Format a ProxyError for logging.
 */
export function formatProxyError(error: ProxyError): string {
  switch (error.type) {
    case "NOT_CONFIGURED":
      return error.message;
    case "UNREACHABLE":
      return `Pass-through target unreachable: ${error.message}`;
  }
}
