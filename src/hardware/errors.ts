/**
 * Hardware Module - Error Types
 *
 * Errors are values, not exceptions.
 */

export type HardwareError =
  | {
      readonly type: "UNKNOWN_CHANNEL";
      readonly channelId: string;
      readonly message: string;
    }
  | {
      readonly type: "WRITE_FAILED";
      readonly channelId: string;
      readonly message: string;
      readonly cause?: Error;
    };

/**
 * Create an UNKNOWN_CHANNEL error.
 */
export function unknownChannel(channelId: string): HardwareError {
  return {
    type: "UNKNOWN_CHANNEL",
    channelId,
    message: `No output channel named "${channelId}"`,
  };
}

/**
 * Create a WRITE_FAILED error.
 */
export function writeFailed(
  channelId: string,
  message: string,
  cause?: Error,
): HardwareError {
  if (cause) {
    return { type: "WRITE_FAILED", channelId, message, cause };
  }
  return { type: "WRITE_FAILED", channelId, message };
}

/**
 * Format a HardwareError for logging.
 */
export function formatHardwareError(error: HardwareError): string {
  switch (error.type) {
    case "UNKNOWN_CHANNEL":
      return error.message;
    case "WRITE_FAILED":
      return `Write to ${error.channelId} failed: ${error.message}`;
  }
}
