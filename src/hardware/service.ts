/**
 * Hardware Module - Service Layer
 *
 * Output drivers. The sysfs driver drives GPIO lines through
 * /sys/class/gpio; the simulated driver keeps state in memory for
 * machines without attached hardware.
 */
import { access, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import type { HardwareError } from "./errors.js";
import { unknownChannel, writeFailed } from "./errors.js";
import type {
  ChannelId,
  ChannelMap,
  DriverKind,
  HardwareDriver,
  HardwareOutput,
} from "./schema.js";

const log = createLogger("hardware");

/**
 * Shared bookkeeping: channel lookup and last written state.
 */
function createOutputState(channels: ChannelMap) {
  const state = new Map<ChannelId, boolean>(
    Object.keys(channels).map((channelId) => [channelId, false]),
  );

  return {
    channels: (): readonly ChannelId[] => [...state.keys()],
    hasChannel: (channelId: ChannelId) => state.has(channelId),
    pinOf: (channelId: ChannelId): number | null =>
      state.has(channelId) ? (channels[channelId] ?? null) : null,
    read: (channelId: ChannelId) => state.get(channelId) ?? false,
    record: (channelId: ChannelId, isOn: boolean) => {
      state.set(channelId, isOn);
    },
    snapshot: (): readonly HardwareOutput[] =>
      [...state.entries()].map(([channelId, isOn]) => ({ channelId, isOn })),
  };
}

// =============================================================================
// Simulated Driver
// =============================================================================

/**
 * In-memory driver for environments without GPIO.
 */
export function createSimulatedDriver(channels: ChannelMap): HardwareDriver {
  const outputs = createOutputState(channels);

  log.info({ channels: outputs.channels() }, "Running without GPIO support");

  return {
    kind: "simulated",
    channels: outputs.channels,
    hasChannel: outputs.hasChannel,
    read: outputs.read,
    snapshot: outputs.snapshot,
    write: async (channelId, isOn) => {
      const pin = outputs.pinOf(channelId);
      if (pin === null) {
        return err(unknownChannel(channelId));
      }

      log.info({ channelId, pin, isOn }, `Setting pin ${pin} to ${isOn}`);
      outputs.record(channelId, isOn);
      return ok(undefined);
    },
  };
}

// =============================================================================
// sysfs Driver
// =============================================================================

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * GPIO driver over the sysfs interface rooted at `root`
 * (normally /sys/class/gpio).
 */
export function createSysfsDriver(
  channels: ChannelMap,
  root: string,
): HardwareDriver {
  const outputs = createOutputState(channels);
  const configured = new Set<number>();

  log.info({ root, channels }, "Using sysfs GPIO driver");

  async function ensureOutput(pin: number): Promise<void> {
    if (configured.has(pin)) {
      return;
    }

    const lineDir = join(root, `gpio${pin}`);
    if (!(await exists(lineDir))) {
      log.debug({ pin }, "Exporting GPIO line");
      await writeFile(join(root, "export"), String(pin));
    }

    await writeFile(join(lineDir, "direction"), "out");
    configured.add(pin);
  }

  return {
    kind: "sysfs",
    channels: outputs.channels,
    hasChannel: outputs.hasChannel,
    read: outputs.read,
    snapshot: outputs.snapshot,
    write: async (
      channelId: ChannelId,
      isOn: boolean,
    ): Promise<Result<void, HardwareError>> => {
      const pin = outputs.pinOf(channelId);
      if (pin === null) {
        return err(unknownChannel(channelId));
      }

      log.info({ channelId, pin, isOn }, `Setting pin ${pin} to ${isOn}`);

      try {
        await ensureOutput(pin);
        await writeFile(join(root, `gpio${pin}`, "value"), isOn ? "1" : "0");
      } catch (error) {
        const cause = error instanceof Error ? error : new Error(String(error));
        return err(writeFailed(channelId, cause.message, cause));
      }

      outputs.record(channelId, isOn);
      return ok(undefined);
    },
  };
}

// =============================================================================
// Selection
// =============================================================================

/**
 * Pick the driver named in configuration.
 */
export function createHardwareDriver(
  kind: DriverKind,
  channels: ChannelMap,
  sysfsRoot: string,
): HardwareDriver {
  switch (kind) {
    case "simulated":
      return createSimulatedDriver(channels);
    case "sysfs":
      return createSysfsDriver(channels, sysfsRoot);
  }
}
