/**
 * Dispatcher Module - Schemas and Types
 *
 * Command intents from the UI and what the dispatcher reports back.
 */
import type { EntityId } from "../entity-cache/index.js";
import type { ChannelId } from "../hardware/index.js";

// =============================================================================
// Intents
// =============================================================================

export type CommandTarget =
  | Readonly<{ kind: "entity"; entityId: EntityId }>
  | Readonly<{ kind: "channel"; channelId: ChannelId }>;

/**
 * One requested state change. Toggle semantics are worked out by the caller
 * from the latest observed state.
 */
export type CommandIntent = Readonly<{
  target: CommandTarget;
  desired: boolean;
}>;

// =============================================================================
// Outcomes
// =============================================================================

/**
 * How the reported state was established:
 * - hardware: written to a local output
 * - confirmed: a matching state change arrived from the source
 * - unchanged: the entity already had the desired state
 */
export type DispatchSource = "hardware" | "confirmed" | "unchanged";

export type DispatchOutcome = Readonly<{
  target: CommandTarget;
  isOn: boolean;
  source: DispatchSource;
  generation: number | null;
}>;

// =============================================================================
// Service Calls
// =============================================================================

export type ServiceCall = Readonly<{
  domain: string;
  service: "turn_on" | "turn_off";
  target: Readonly<{ entity_id: EntityId }>;
}>;

/**
 * Domains that accept turn_on / turn_off.
 */
export const SWITCHABLE_DOMAINS: ReadonlySet<string> = new Set([
  "light",
  "switch",
  "fan",
  "input_boolean",
  "siren",
]);

export type DispatcherOptions = Readonly<{
  confirmTimeoutMs: number;
  hardwareTimeoutMs: number;
}>;
