/**
 * Dispatcher Module - Error Types
 *
 * Errors surfaced to the UI. None of them is retried by the gateway.
 */

export type DispatchError =
  | {
      readonly type: "UNREACHABLE";
      readonly message: string;
    }
  | {
      readonly type: "REJECTED";
      readonly message: string;
      readonly code?: string | number;
    }
  | {
      readonly type: "TIMEOUT";
      readonly stage: "acknowledgement" | "confirmation" | "hardware";
      readonly message: string;
      readonly timeoutMs: number;
    }
  | {
      readonly type: "HARDWARE_FAULT";
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "UNKNOWN_TARGET";
      readonly message: string;
    };

export type DispatchErrorType = DispatchError["type"];

/**
 * Create an UNREACHABLE error.
 */
export function unreachable(message: string): DispatchError {
  return { type: "UNREACHABLE", message };
}

/**
 * Create a REJECTED error.
 */
export function rejected(message: string, code?: string | number): DispatchError {
  if (code !== undefined) {
    return { type: "REJECTED", message, code };
  }
  return { type: "REJECTED", message };
}

/**
 * Create a TIMEOUT error.
 */
export function timedOut(
  stage: "acknowledgement" | "confirmation" | "hardware",
  timeoutMs: number,
): DispatchError {
  return {
    type: "TIMEOUT",
    stage,
    message: `No ${stage} within ${timeoutMs}ms`,
    timeoutMs,
  };
}

/**
 * Create a HARDWARE_FAULT error.
 */
export function hardwareFault(message: string, cause?: Error): DispatchError {
  if (cause) {
    return { type: "HARDWARE_FAULT", message, cause };
  }
  return { type: "HARDWARE_FAULT", message };
}

/**
 * Create an UNKNOWN_TARGET error.
 */
export function unknownTarget(message: string): DispatchError {
  return { type: "UNKNOWN_TARGET", message };
}

/**
 * Format a DispatchError for logging.
 */
export function formatDispatchError(error: DispatchError): string {
  switch (error.type) {
    case "UNREACHABLE":
      return `Source unreachable: ${error.message}`;
    case "REJECTED":
      return `Command rejected: ${error.message}`;
    case "TIMEOUT":
      return `Timed out: ${error.message}`;
    case "HARDWARE_FAULT":
      return `Hardware fault: ${error.message}`;
    case "UNKNOWN_TARGET":
      return `Unknown target: ${error.message}`;
  }
}
