/**
 * Hardware Module - Public API
 */

// Types
export type {
  ChannelId,
  ChannelMap,
  DriverKind,
  HardwareDriver,
  HardwareOutput,
} from "./schema.js";
export type { HardwareError } from "./errors.js";

// Error utilities
export { formatHardwareError } from "./errors.js";

// Drivers
export {
  createHardwareDriver,
  createSimulatedDriver,
  createSysfsDriver,
} from "./service.js";
