/**
 * Dispatcher Module - Pure Transformations
 *
 * Target resolution and confirmation matching.
 */
import {
  type EntityId,
  type EntityState,
  domainOf,
} from "../entity-cache/index.js";
import type { CommandError } from "../upstream/index.js";
import type { DispatchError } from "./errors.js";
import { rejected, timedOut, unreachable } from "./errors.js";
import type { CommandTarget, ServiceCall } from "./schema.js";
import { SWITCHABLE_DOMAINS } from "./schema.js";

/**
 * Service call that drives `entityId` to `desired`, or null when the
 * entity's domain cannot be switched.
 */
export function resolveServiceCall(
  entityId: EntityId,
  desired: boolean,
): ServiceCall | null {
  const domain = domainOf(entityId);
  if (domain === null || !SWITCHABLE_DOMAINS.has(domain)) {
    return null;
  }

  return {
    domain,
    service: desired ? "turn_on" : "turn_off",
    target: { entity_id: entityId },
  };
}

/**
 * True when the entity reports the desired on/off state.
 */
export function matchesDesired(entity: EntityState, desired: boolean): boolean {
  return entity.value.kind === "switch" && entity.value.isOn === desired;
}

/**
 * Map a service call failure onto the UI-facing error.
 * A connection lost while waiting counts as unreachable.
 */
export function fromCommandError(error: CommandError): DispatchError {
  switch (error.type) {
    case "NOT_CONNECTED":
      return unreachable(error.message);
    case "CONNECTION_LOST":
      return unreachable(`${error.message} (the command may still take effect)`);
    case "REJECTED":
      return rejected(error.message, error.code);
    case "TIMEOUT":
      return timedOut("acknowledgement", error.timeoutMs);
  }
}

/**
 * Human-readable target for logs.
 */
export function describeTarget(target: CommandTarget): string {
  return target.kind === "entity" ? target.entityId : `output:${target.channelId}`;
}
