/**
 * Request body parsing and error responses for the API.
 */
import { z } from "zod";

import type { DispatchErrorType } from "../dispatcher/index.js";

/**
 * POST bodies are a bare JSON boolean or a signed 8-bit integer (non-zero is on).
 */
export const DesiredStateSchema = z
  .union([z.boolean(), z.number().int().min(-128).max(127)])
  .transform((value) => (typeof value === "boolean" ? value : value !== 0));

export type BodyErrorType = "INVALID_BODY" | "BODY_TOO_LARGE";

export type ApiErrorType = DispatchErrorType | BodyErrorType | "NOT_FOUND" | "BAD_GATEWAY";

export type ErrorStatus = 400 | 404 | 413 | 500 | 502 | 503 | 504;

/**
 * HTTP status for each error type the API reports.
 */
export function statusFor(type: ApiErrorType): ErrorStatus {
  switch (type) {
    case "UNREACHABLE":
      return 503;
    case "REJECTED":
    case "BAD_GATEWAY":
      return 502;
    case "TIMEOUT":
      return 504;
    case "HARDWARE_FAULT":
      return 500;
    case "UNKNOWN_TARGET":
    case "NOT_FOUND":
      return 404;
    case "INVALID_BODY":
      return 400;
    case "BODY_TOO_LARGE":
      return 413;
  }
}

export type ErrorBody = {
  error: { type: ApiErrorType; message: string };
  requestId: string;
};

export function errorBody(
  type: ApiErrorType,
  message: string,
  requestId: string,
): ErrorBody {
  return { error: { type, message }, requestId };
}

/**
 * Parse a desired on/off state from a raw request body.
 * Returns null when the body is not a boolean or integer.
 */
export function parseDesiredState(raw: string): boolean | null {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return null;
  }

  const parsed = DesiredStateSchema.safeParse(data);
  return parsed.success ? parsed.data : null;
}
