/**
 * Status Module - Schemas and Types
 *
 * The view served to the UI and the weather attributes it is built from.
 */
import { z } from "zod";

import type { EntityId } from "../entity-cache/index.js";
import type { ChannelId } from "../hardware/index.js";
import type { ConnectionState } from "../upstream/index.js";

// =============================================================================
// Weather Attributes (as published by Home Assistant)
// =============================================================================

const measurement = z.number().finite();

export const ForecastEntrySchema = z.object({
  datetime: z.string().datetime({ offset: true }),
  condition: z.string(),
  temperature: measurement,
  wind_speed: measurement,
  wind_bearing: measurement,
  humidity: measurement.nullish(),
  pressure: measurement.nullish(),
});

export type ForecastEntry = z.infer<typeof ForecastEntrySchema>;

export const WeatherAttributesSchema = z.object({
  temperature: measurement,
  humidity: measurement,
  pressure: measurement,
  wind_speed: measurement,
  wind_bearing: measurement,
  forecast: z.array(z.unknown()).optional(),
});

export type WeatherAttributes = z.infer<typeof WeatherAttributesSchema>;

// =============================================================================
// View Types
// =============================================================================

export type UnknownReason = "not_loaded" | "removed" | "invalid";

export type Unknown = Readonly<{
  status: "unknown";
  reason: UnknownReason;
}>;

export type Known<T> = Readonly<{
  status: "known";
  value: T;
}>;

export type Resolved<T> = Known<T> | Unknown;

export type WeatherStatus = Readonly<{
  timestamp: string;
  state: string;
  humidity: number | null;
  pressure: number | null;
  temperature: number;
  windSpeed: number;
  windBearing: number;
}>;

export type LightState = "on" | "off" | "unknown";

export type StatusView = Readonly<{
  connected: boolean;
  connection: ConnectionState;
  generation: number;
  location: Resolved<string>;
  weatherCurrent: Resolved<WeatherStatus>;
  weatherForecast: Resolved<WeatherStatus>;
  lights: Readonly<Record<EntityId, LightState>>;
  hardware: Readonly<Record<ChannelId, boolean>>;
}>;

export type StatusOptions = Readonly<{
  weatherEntity: EntityId;
  locationEntity: EntityId;
  lights: readonly EntityId[];
}>;
