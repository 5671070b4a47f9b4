/**
 * Dispatcher Module - Service Layer
 *
 * Turns UI intents into a hardware write or a Home Assistant service call.
 * Upstream commands only report success once the entity cache shows the
 * desired state; the cache itself is only ever written by the sync client.
 */
import { type Result, err, ok } from "neverthrow";

import type { EntityCache } from "../entity-cache/index.js";
import type { ChannelId, HardwareDriver, HardwareError } from "../hardware/index.js";
import { formatHardwareError } from "../hardware/index.js";
import {
  createLogger,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import type { SyncClient } from "../upstream/index.js";
import { formatCommandError } from "../upstream/index.js";
import type { DispatchError } from "./errors.js";
import {
  formatDispatchError,
  hardwareFault,
  timedOut,
  unknownTarget,
  unreachable,
} from "./errors.js";
import type {
  CommandIntent,
  DispatchOutcome,
  DispatcherOptions,
} from "./schema.js";
import {
  describeTarget,
  fromCommandError,
  matchesDesired,
  resolveServiceCall,
} from "./transform.js";

const log = createLogger("dispatcher");

const TIMED_OUT: unique symbol = Symbol("timed out");

/**
 * Resolve with the promise's value, or TIMED_OUT after `ms`.
 */
async function raceTimeout<T>(
  promise: Promise<T>,
  ms: number,
): Promise<T | typeof TIMED_OUT> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<typeof TIMED_OUT>((resolve) => {
    timer = setTimeout(() => resolve(TIMED_OUT), ms);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export type DispatcherDeps = Readonly<{
  cache: Pick<EntityCache, "get" | "waitFor">;
  upstream: Pick<SyncClient, "isConnected" | "callService">;
  hardware: HardwareDriver;
}>;

export type Dispatcher = Readonly<{
  dispatch: (
    intent: CommandIntent,
  ) => Promise<Result<DispatchOutcome, DispatchError>>;
}>;

/**
 * Create a dispatcher over the given cache, sync client and driver.
 */
export function createDispatcher(
  deps: DispatcherDeps,
  options: DispatcherOptions,
): Dispatcher {
  const { cache, upstream, hardware } = deps;

  // Tail of the write queue per channel; writes to one pin never overlap.
  const channelQueues = new Map<ChannelId, Promise<void>>();

  // ===========================================================================
  // Hardware Path
  // ===========================================================================

  async function dispatchToChannel(
    channelId: ChannelId,
    desired: boolean,
  ): Promise<Result<DispatchOutcome, DispatchError>> {
    if (!hardware.hasChannel(channelId)) {
      return err(unknownTarget(`No output channel named "${channelId}"`));
    }

    const previous = channelQueues.get(channelId) ?? Promise.resolve();
    const write = previous.then(() => hardware.write(channelId, desired));
    channelQueues.set(
      channelId,
      write.then(
        () => undefined,
        () => undefined,
      ),
    );

    let result: Result<void, HardwareError> | typeof TIMED_OUT;
    try {
      result = await raceTimeout(write, options.hardwareTimeoutMs);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      return err(hardwareFault(cause.message, cause));
    }

    if (result === TIMED_OUT) {
      return err(timedOut("hardware", options.hardwareTimeoutMs));
    }

    if (result.isErr()) {
      const fault = result.error;
      return err(
        fault.type === "UNKNOWN_CHANNEL"
          ? unknownTarget(fault.message)
          : hardwareFault(formatHardwareError(fault), fault.cause),
      );
    }

    return ok({
      target: { kind: "channel", channelId },
      isOn: hardware.read(channelId),
      source: "hardware",
      generation: null,
    });
  }

  // ===========================================================================
  // Upstream Path
  // ===========================================================================

  async function dispatchToEntity(
    entityId: string,
    desired: boolean,
  ): Promise<Result<DispatchOutcome, DispatchError>> {
    if (!upstream.isConnected()) {
      return err(unreachable("Not connected to Home Assistant"));
    }

    const call = resolveServiceCall(entityId, desired);
    if (call === null) {
      return err(unknownTarget(`${entityId} cannot be switched on or off`));
    }

    const current = cache.get(entityId);
    if (current !== null && matchesDesired(current, desired)) {
      log.debug({ entityId, desired }, "Entity already in desired state");
      return ok({
        target: { kind: "entity", entityId },
        isOn: desired,
        source: "unchanged",
        generation: current.generation,
      });
    }

    // Listen before sending: the confirming event can overtake the result.
    const abort = new AbortController();
    const confirmation = cache.waitFor(
      entityId,
      (entity) => matchesDesired(entity, desired),
      options.confirmTimeoutMs,
      abort.signal,
    );

    const sent = await upstream.callService(
      call.domain,
      call.service,
      undefined,
      call.target,
    );

    if (sent.isErr()) {
      abort.abort();
      await confirmation;

      // The state change may have landed before the result frame failed.
      const latest = cache.get(entityId);
      if (latest !== null && matchesDesired(latest, desired)) {
        log.debug(
          { entityId, commandError: formatCommandError(sent.error) },
          "Command result failed but the state change was already confirmed",
        );
        return ok({
          target: { kind: "entity", entityId },
          isOn: desired,
          source: "confirmed",
          generation: latest.generation,
        });
      }

      return err(fromCommandError(sent.error));
    }

    const confirmed = await confirmation;
    if (confirmed === null) {
      return err(timedOut("confirmation", options.confirmTimeoutMs));
    }

    return ok({
      target: { kind: "entity", entityId },
      isOn: desired,
      source: "confirmed",
      generation: confirmed.generation,
    });
  }

  // ===========================================================================
  // Public API
  // ===========================================================================

  async function dispatch(
    intent: CommandIntent,
  ): Promise<Result<DispatchOutcome, DispatchError>> {
    const startTime = Date.now();
    const target = describeTarget(intent.target);
    logOperationStart(log, "dispatch", { target, desired: intent.desired });

    const result =
      intent.target.kind === "channel"
        ? await dispatchToChannel(intent.target.channelId, intent.desired)
        : await dispatchToEntity(intent.target.entityId, intent.desired);

    if (result.isErr()) {
      logOperationFailed(log, "dispatch", formatDispatchError(result.error), {
        target,
        errorType: result.error.type,
      });
    } else {
      logOperationComplete(log, "dispatch", startTime, {
        target,
        isOn: result.value.isOn,
        source: result.value.source,
      });
    }

    return result;
  }

  return { dispatch };
}
