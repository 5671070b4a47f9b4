/**
 * Status Module - Pure Transformations
 *
 * Projects a cache snapshot, the connection state and the hardware outputs
 * into the UI view. Reads only what it is given and never waits.
 */
import type {
  CacheSnapshot,
  CachedEntity,
  EntityId,
} from "../entity-cache/index.js";
import type { HardwareOutput } from "../hardware/index.js";
import type { ConnectionState } from "../upstream/index.js";
import type {
  Known,
  LightState,
  Resolved,
  StatusOptions,
  StatusView,
  Unknown,
  UnknownReason,
  WeatherStatus,
} from "./schema.js";
import { ForecastEntrySchema, WeatherAttributesSchema } from "./schema.js";

// =============================================================================
// Helpers
// =============================================================================

export function known<T>(value: T): Known<T> {
  return { status: "known", value };
}

export function unknown(reason: UnknownReason): Unknown {
  return { status: "unknown", reason };
}

/**
 * Look up an entity, or say why it cannot be shown.
 */
export function lookupEntity(
  snapshot: CacheSnapshot,
  entityId: EntityId,
): Known<CachedEntity> | Unknown {
  const entity = snapshot.entities.get(entityId);
  if (entity === undefined) {
    return unknown("not_loaded");
  }
  if (entity.value.kind === "removed") {
    return unknown("removed");
  }
  return known(entity);
}

// =============================================================================
// Projections
// =============================================================================

/**
 * Current conditions from a weather entity's state and attributes.
 */
export function toWeatherCurrent(entity: CachedEntity): Resolved<WeatherStatus> {
  if (entity.value.kind !== "composite") {
    return unknown("invalid");
  }

  const attributes = WeatherAttributesSchema.safeParse(entity.attributes);
  if (!attributes.success) {
    return unknown("invalid");
  }

  return known({
    timestamp: new Date(entity.lastChanged).toISOString(),
    state: entity.value.state,
    humidity: attributes.data.humidity,
    pressure: attributes.data.pressure,
    temperature: attributes.data.temperature,
    windSpeed: attributes.data.wind_speed,
    windBearing: attributes.data.wind_bearing,
  });
}

/**
 * First entry of a weather entity's forecast.
 */
export function toWeatherForecast(entity: CachedEntity): Resolved<WeatherStatus> {
  const forecast = entity.attributes["forecast"];
  if (!Array.isArray(forecast) || forecast.length === 0) {
    return unknown("invalid");
  }

  const first = ForecastEntrySchema.safeParse(forecast[0]);
  if (!first.success) {
    return unknown("invalid");
  }

  const entry = first.data;
  return known({
    timestamp: new Date(entry.datetime).toISOString(),
    state: entry.condition,
    humidity: entry.humidity ?? null,
    pressure: entry.pressure ?? null,
    temperature: entry.temperature,
    windSpeed: entry.wind_speed,
    windBearing: entry.wind_bearing,
  });
}

/**
 * Display name of the location entity.
 */
export function toLocation(entity: CachedEntity): Resolved<string> {
  const name = entity.attributes["friendly_name"];
  if (typeof name === "string" && name.trim() !== "") {
    return known(name);
  }
  return unknown("invalid");
}

export function toLightState(entity: CachedEntity | undefined): LightState {
  if (entity === undefined || entity.value.kind !== "switch") {
    return "unknown";
  }
  return entity.value.isOn ? "on" : "off";
}

function project<T>(
  snapshot: CacheSnapshot,
  entityId: EntityId,
  fn: (entity: CachedEntity) => Resolved<T>,
): Resolved<T> {
  const found = lookupEntity(snapshot, entityId);
  return found.status === "known" ? fn(found.value) : found;
}

// =============================================================================
// View
// =============================================================================

/**
 * Build the status view. Anything missing or malformed becomes an Unknown
 * value rather than failing the whole view.
 */
export function buildStatusView(
  snapshot: CacheSnapshot,
  connection: ConnectionState,
  hardware: readonly HardwareOutput[],
  options: StatusOptions,
): StatusView {
  const lights: Record<EntityId, LightState> = {};
  for (const entityId of options.lights) {
    lights[entityId] = toLightState(snapshot.entities.get(entityId));
  }

  const outputs: Record<string, boolean> = {};
  for (const output of hardware) {
    outputs[output.channelId] = output.isOn;
  }

  return {
    connected: connection === "subscribed",
    connection,
    generation: snapshot.generation,
    location: project(snapshot, options.locationEntity, toLocation),
    weatherCurrent: project(snapshot, options.weatherEntity, toWeatherCurrent),
    weatherForecast: project(snapshot, options.weatherEntity, toWeatherForecast),
    lights,
    hardware: outputs,
  };
}
