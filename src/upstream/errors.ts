/**
 * Upstream Module - Error Types
 *
 * Typed error unions for the Home Assistant connection and for service calls.
 * Errors are values, not exceptions.
 */

/**
 * Errors that end (or, for MALFORMED_EVENT, skip part of) a connection.
 */
export type UpstreamError =
  | {
      readonly type: "TRANSPORT_FAILURE";
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "PROTOCOL_ERROR";
      readonly message: string;
      readonly frame?: string;
    }
  | {
      readonly type: "AUTH_REJECTED";
      readonly message: string;
    }
  | {
      readonly type: "IDLE_TIMEOUT";
      readonly message: string;
      readonly idleMs: number;
    }
  | {
      readonly type: "MALFORMED_EVENT";
      readonly message: string;
      readonly entityId?: string;
    };

/**
 * Errors returned by a service call.
 */
export type CommandError =
  | {
      readonly type: "NOT_CONNECTED";
      readonly message: string;
    }
  | {
      readonly type: "REJECTED";
      readonly message: string;
      readonly code?: string | number;
    }
  | {
      readonly type: "TIMEOUT";
      readonly message: string;
      readonly timeoutMs: number;
    }
  | {
      readonly type: "CONNECTION_LOST";
      readonly message: string;
    };

/**
 * Create a TRANSPORT_FAILURE error.
 */
export function transportFailure(
  message: string,
  cause?: Error,
): UpstreamError {
  if (cause) {
    return { type: "TRANSPORT_FAILURE", message, cause };
  }
  return { type: "TRANSPORT_FAILURE", message };
}

/**
 * Create a PROTOCOL_ERROR. Long frames are cut for logging.
 */
export function protocolError(message: string, frame?: string): UpstreamError {
  if (frame !== undefined) {
    return { type: "PROTOCOL_ERROR", message, frame: frame.slice(0, 200) };
  }
  return { type: "PROTOCOL_ERROR", message };
}

/**
 * Create an AUTH_REJECTED error.
 */
export function authRejected(message: string): UpstreamError {
  return { type: "AUTH_REJECTED", message };
}

/**
 * Create an IDLE_TIMEOUT error.
 */
export function idleTimeout(idleMs: number): UpstreamError {
  return {
    type: "IDLE_TIMEOUT",
    message: `No frame received for ${idleMs}ms`,
    idleMs,
  };
}

/**
 * Create a MALFORMED_EVENT error.
 */
export function malformedEvent(
  message: string,
  entityId?: string,
): UpstreamError {
  if (entityId !== undefined) {
    return { type: "MALFORMED_EVENT", message, entityId };
  }
  return { type: "MALFORMED_EVENT", message };
}

/**
 * Create a NOT_CONNECTED error.
 */
export function notConnected(message: string): CommandError {
  return { type: "NOT_CONNECTED", message };
}

/**
 * Create a REJECTED error.
 */
export function commandRejected(
  message: string,
  code?: string | number,
): CommandError {
  if (code !== undefined) {
    return { type: "REJECTED", message, code };
  }
  return { type: "REJECTED", message };
}

/**
 * Create a TIMEOUT error.
 */
export function commandTimeout(timeoutMs: number): CommandError {
  return {
    type: "TIMEOUT",
    message: `No result within ${timeoutMs}ms`,
    timeoutMs,
  };
}

/**
 * Create a CONNECTION_LOST error.
 */
export function connectionLost(message: string): CommandError {
  return { type: "CONNECTION_LOST", message };
}

/**
 * Format an UpstreamError for logging.
 */
export function formatUpstreamError(error: UpstreamError): string {
  switch (error.type) {
    case "TRANSPORT_FAILURE":
      return `Transport failure: ${error.message}`;
    case "PROTOCOL_ERROR":
      return `Protocol error: ${error.message}`;
    case "AUTH_REJECTED":
      return `Authentication rejected: ${error.message}`;
    case "IDLE_TIMEOUT":
      return `Idle timeout: ${error.message}`;
    case "MALFORMED_EVENT":
      return error.entityId
        ? `Malformed event for ${error.entityId}: ${error.message}`
        : `Malformed event: ${error.message}`;
  }
}

/**
 * Format a CommandError for logging.
 */
export function formatCommandError(error: CommandError): string {
  switch (error.type) {
    case "NOT_CONNECTED":
      return `Not connected: ${error.message}`;
    case "REJECTED":
      return error.code !== undefined
        ? `Rejected (${error.code}): ${error.message}`
        : `Rejected: ${error.message}`;
    case "TIMEOUT":
      return `Timed out: ${error.message}`;
    case "CONNECTION_LOST":
      return `Connection lost: ${error.message}`;
  }
}
