/**
 * Hardware Module - Schemas and Types
 *
 * Locally attached outputs (LEDs, buzzer). Their state lives here,
 * not in the entity cache.
 */
import type { Result } from "neverthrow";

import type { HardwareError } from "./errors.js";

export type ChannelId = string;

/**
 * Channel id → GPIO line.
 */
export type ChannelMap = Readonly<Record<ChannelId, number>>;

export type HardwareOutput = Readonly<{
  channelId: ChannelId;
  isOn: boolean;
}>;

export type DriverKind = "simulated" | "sysfs";

/**
 * Output driver contract. `read` reports the last state written
 * successfully, false before the first write.
 */
export type HardwareDriver = Readonly<{
  kind: DriverKind;
  channels: () => readonly ChannelId[];
  hasChannel: (channelId: ChannelId) => boolean;
  write: (
    channelId: ChannelId,
    isOn: boolean,
  ) => Promise<Result<void, HardwareError>>;
  read: (channelId: ChannelId) => boolean;
  snapshot: () => readonly HardwareOutput[];
}>;
