/**
 * Status Module - Public API
 */

// Types
export type {
  Known,
  LightState,
  Resolved,
  StatusOptions,
  StatusView,
  Unknown,
  UnknownReason,
  WeatherStatus,
} from "./schema.js";

// Pure transformations
export {
  buildStatusView,
  lookupEntity,
  toLightState,
  toLocation,
  toWeatherCurrent,
  toWeatherForecast,
} from "./transform.js";
