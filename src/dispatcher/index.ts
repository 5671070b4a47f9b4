/**
 * Dispatcher Module - Public API
 */

// Types
export type {
  CommandIntent,
  CommandTarget,
  DispatchOutcome,
  DispatchSource,
  DispatcherOptions,
} from "./schema.js";
export type { DispatchError, DispatchErrorType } from "./errors.js";

// Error utilities
export { formatDispatchError } from "./errors.js";

// Service
export type { Dispatcher, DispatcherDeps } from "./service.js";
export { createDispatcher } from "./service.js";

// Pure transformations (for testing)
export {
  describeTarget,
  fromCommandError,
  matchesDesired,
  resolveServiceCall,
} from "./transform.js";
