/**
 * Typed configuration - all config lives in .env, parsed with Zod at startup.
 * App crashes immediately on invalid config - fail fast.
 *
 * Home gateway configuration covering:
 * - Server settings
 * - Home Assistant connection and reconnect policy
 * - Command timeouts
 * - GPIO outputs
 * - Status view entities
 * - Pass-through proxy and static UI bundle
 */
import { z } from "zod";

/**
 * Custom boolean parser for environment variables.
 * z.coerce.boolean() doesn't work with string "false" (it's truthy).
 */
const envBoolean = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((val) =>
      val === undefined ? defaultValue : val.toLowerCase() === "true",
    );

/**
 * Parse optional string - empty string becomes undefined
 */
const optionalString = z
  .string()
  .optional()
  .transform((val) => (val && val.trim() !== "" ? val.trim() : undefined));

/**
 * Comma-separated list, blanks dropped.
 */
const envList = (defaultValue: string) =>
  z
    .string()
    .default(defaultValue)
    .transform((val) =>
      val
        .split(",")
        .map((item) => item.trim())
        .filter((item) => item !== ""),
    );

const gpioPin = (defaultValue: number) =>
  z.coerce.number().int().min(0).max(63).default(defaultValue);

const ConfigSchema = z
  .object({
    // ==========================================================================
    // Server Configuration
    // ==========================================================================
    PORT: z.coerce.number().default(8000).describe("HTTP server port"),
    HOST: z.string().default("127.0.0.1").describe("HTTP bind address"),
    NODE_ENV: z
      .enum(["development", "production", "test"])
      .default("development")
      .describe("Runtime environment"),
    APP_NAME: z.string().default("HomeGateway").describe("Application name"),
    LOG_LEVEL: z
      .enum(["trace", "debug", "info", "warn", "error", "fatal"])
      .default("info")
      .describe("Pino log level"),

    // ==========================================================================
    // Home Assistant Connection
    // ==========================================================================
    HA_ENDPOINT: z
      .string()
      .min(1, "HA_ENDPOINT is required")
      .describe("Home Assistant host[:port], without scheme"),
    HA_TLS: envBoolean(true).describe("Use wss:// instead of ws://"),
    HA_ACCESS_TOKEN: z
      .string()
      .min(1, "HA_ACCESS_TOKEN is required")
      .describe("Long-lived access token"),

    // ==========================================================================
    // Reconnect Policy
    // ==========================================================================
    BACKOFF_MIN_MS: z.coerce
      .number()
      .positive()
      .default(1000)
      .describe("First reconnect delay (ms)"),
    BACKOFF_MAX_MS: z.coerce
      .number()
      .positive()
      .default(30000)
      .describe("Reconnect delay cap (ms)"),
    BACKOFF_STABLE_MS: z.coerce
      .number()
      .nonnegative()
      .default(10000)
      .describe("Time subscribed before the backoff resets (ms)"),
    HEARTBEAT_INTERVAL_MS: z.coerce
      .number()
      .positive()
      .default(15000)
      .describe("Interval between ping frames (ms)"),
    IDLE_TIMEOUT_MS: z.coerce
      .number()
      .positive()
      .default(45000)
      .describe("Connection considered dead after this long without a frame (ms)"),

    // ==========================================================================
    // Command Timeouts
    // ==========================================================================
    COMMAND_ACK_TIMEOUT_MS: z.coerce
      .number()
      .positive()
      .default(5000)
      .describe("Wait for call_service result (ms)"),
    CONFIRM_TIMEOUT_MS: z.coerce
      .number()
      .positive()
      .default(5000)
      .describe("Wait for the confirming state change (ms)"),
    HARDWARE_TIMEOUT_MS: z.coerce
      .number()
      .positive()
      .default(1000)
      .describe("Bound on a single GPIO write (ms)"),

    // ==========================================================================
    // GPIO Outputs
    // ==========================================================================
    GPIO_DRIVER: z
      .enum(["simulated", "sysfs"])
      .default("simulated")
      .describe("Hardware output driver"),
    GPIO_SYSFS_ROOT: z
      .string()
      .default("/sys/class/gpio")
      .describe("sysfs GPIO class directory"),
    RED_LED_PIN: gpioPin(17).describe("BCM line of the red LED"),
    GREEN_LED_PIN: gpioPin(27).describe("BCM line of the green LED"),
    BUZZER_PIN: gpioPin(18).describe("BCM line of the buzzer"),

    // ==========================================================================
    // Status View
    // ==========================================================================
    WEATHER_ENTITY: z
      .string()
      .default("weather.home")
      .describe("Weather entity for current conditions and forecast"),
    LOCATION_ENTITY: z
      .string()
      .default("zone.home")
      .describe("Entity whose friendly name is reported as location"),
    LIGHT_ENTITIES: envList("").describe("Lights reported in the status view"),

    // ==========================================================================
    // Outer Surfaces
    // ==========================================================================
    REVERSE_PROXY_URL: optionalString.describe(
      "Base URL that unmodeled requests are forwarded to",
    ),
    STATIC_DIR: optionalString.describe("Directory of the compiled UI bundle"),
  })
  .refine((cfg) => cfg.BACKOFF_MIN_MS <= cfg.BACKOFF_MAX_MS, {
    message: "BACKOFF_MIN_MS must not exceed BACKOFF_MAX_MS",
    path: ["BACKOFF_MIN_MS"],
  });

// Parse at startup - crashes immediately if invalid
const parsed = ConfigSchema.safeParse(process.env);

if (!parsed.success) {
  console.error("❌ Invalid configuration:");
  console.error(parsed.error.format());
  process.exit(1);
}

export const config = parsed.data;

// Type export for use elsewhere
export type Config = z.infer<typeof ConfigSchema>;

// =============================================================================
// Derived Configuration Objects
// =============================================================================

/**
 * Upstream connection settings for the sync client.
 */
export function getUpstreamConfig(): Readonly<{
  url: string;
  accessToken: string;
  backoffMinMs: number;
  backoffMaxMs: number;
  backoffStableMs: number;
  heartbeatIntervalMs: number;
  idleTimeoutMs: number;
  commandAckTimeoutMs: number;
}> {
  const scheme = config.HA_TLS ? "wss" : "ws";

  return {
    url: `${scheme}://${config.HA_ENDPOINT}/api/websocket`,
    accessToken: config.HA_ACCESS_TOKEN,
    backoffMinMs: config.BACKOFF_MIN_MS,
    backoffMaxMs: config.BACKOFF_MAX_MS,
    backoffStableMs: config.BACKOFF_STABLE_MS,
    heartbeatIntervalMs: config.HEARTBEAT_INTERVAL_MS,
    idleTimeoutMs: config.IDLE_TIMEOUT_MS,
    commandAckTimeoutMs: config.COMMAND_ACK_TIMEOUT_MS,
  };
}

/**
 * Output channels and the GPIO line each one drives.
 */
export const hardwareChannels = {
  "red-led": config.RED_LED_PIN,
  "green-led": config.GREEN_LED_PIN,
  buzzer: config.BUZZER_PIN,
} as const;

/**
 * Entities resolved by the status view builder.
 */
export const statusEntities = {
  weather: config.WEATHER_ENTITY,
  location: config.LOCATION_ENTITY,
  lights: config.LIGHT_ENTITIES,
} as const;
