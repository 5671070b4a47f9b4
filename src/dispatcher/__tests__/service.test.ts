/**
 * Dispatcher Service Tests
 *
 * Uses a real entity cache and simulated driver, with a fake upstream that
 * plays the source's part by applying state changes to the cache.
 */
import { err, ok, type Result } from "neverthrow";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

// Mock logger to reduce noise in tests
vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
  }),
  logOperationStart: vi.fn(),
  logOperationComplete: vi.fn(),
  logOperationFailed: vi.fn(),
}));

// Import after mocks
import {
  createEntityCache,
  createEntityState,
  type EntityCache,
} from "../../entity-cache/index.js";
import type { HardwareDriver, HardwareError } from "../../hardware/index.js";
import { createSimulatedDriver } from "../../hardware/index.js";
import type { CommandError } from "../../upstream/index.js";
import { createDispatcher } from "../service.js";

const CHANNELS = { "red-led": 17, "green-led": 27, buzzer: 18 };
const OPTIONS = { confirmTimeoutMs: 5000, hardwareTimeoutMs: 1000 };

function light(
  cache: EntityCache,
  entityId: string,
  state: "on" | "off",
  lastUpdated: number,
) {
  return cache.apply(
    createEntityState({
      id: entityId,
      state,
      attributes: {},
      lastUpdated,
      lastChanged: lastUpdated,
    }),
  );
}

type CallService = (
  domain: string,
  service: string,
  serviceData?: Record<string, unknown>,
  target?: Record<string, unknown>,
) => Promise<Result<void, CommandError>>;

function createFakeUpstream(connected = true) {
  const callService = vi.fn<CallService>(async () => ok(undefined));
  return {
    isConnected: vi.fn(() => connected),
    callService,
  };
}

describe("Dispatcher Service", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  // ===========================================================================
  // Hardware Channels
  // ===========================================================================

  describe("hardware channels", () => {
    test("writes the output and reports it immediately", async () => {
      const hardware = createSimulatedDriver(CHANNELS);
      const upstream = createFakeUpstream(false);
      const dispatcher = createDispatcher(
        { cache: createEntityCache(), upstream, hardware },
        OPTIONS,
      );

      const result = await dispatcher.dispatch({
        target: { kind: "channel", channelId: "red-led" },
        desired: true,
      });

      expect(result._unsafeUnwrap()).toEqual({
        target: { kind: "channel", channelId: "red-led" },
        isOn: true,
        source: "hardware",
        generation: null,
      });
      expect(hardware.read("red-led")).toBe(true);
      expect(upstream.callService).not.toHaveBeenCalled();
    });

    test("returns UNKNOWN_TARGET for an unconfigured channel", async () => {
      const dispatcher = createDispatcher(
        {
          cache: createEntityCache(),
          upstream: createFakeUpstream(),
          hardware: createSimulatedDriver(CHANNELS),
        },
        OPTIONS,
      );

      const result = await dispatcher.dispatch({
        target: { kind: "channel", channelId: "blue-led" },
        desired: true,
      });

      expect(result._unsafeUnwrapErr().type).toBe("UNKNOWN_TARGET");
    });

    test("returns HARDWARE_FAULT when the driver write fails", async () => {
      const simulated = createSimulatedDriver(CHANNELS);
      const failure: HardwareError = {
        type: "WRITE_FAILED",
        channelId: "buzzer",
        message: "EACCES: permission denied",
      };
      const hardware: HardwareDriver = {
        ...simulated,
        write: async () => err(failure),
      };
      const dispatcher = createDispatcher(
        { cache: createEntityCache(), upstream: createFakeUpstream(), hardware },
        OPTIONS,
      );

      const result = await dispatcher.dispatch({
        target: { kind: "channel", channelId: "buzzer" },
        desired: true,
      });

      expect(result._unsafeUnwrapErr()).toEqual({
        type: "HARDWARE_FAULT",
        message: "Write to buzzer failed: EACCES: permission denied",
      });
    });

    test("returns TIMEOUT when the driver does not answer in time", async () => {
      const simulated = createSimulatedDriver(CHANNELS);
      const hardware: HardwareDriver = {
        ...simulated,
        write: () => new Promise(() => {}),
      };
      const dispatcher = createDispatcher(
        { cache: createEntityCache(), upstream: createFakeUpstream(), hardware },
        OPTIONS,
      );

      const pending = dispatcher.dispatch({
        target: { kind: "channel", channelId: "buzzer" },
        desired: true,
      });
      await vi.advanceTimersByTimeAsync(1000);

      expect((await pending)._unsafeUnwrapErr()).toEqual({
        type: "TIMEOUT",
        stage: "hardware",
        message: "No hardware within 1000ms",
        timeoutMs: 1000,
      });
    });

    test("serializes writes to the same channel", async () => {
      const simulated = createSimulatedDriver(CHANNELS);
      const releases: Array<() => void> = [];
      const write = vi.fn(
        (channelId: string, isOn: boolean) =>
          new Promise<Result<void, HardwareError>>((resolve) => {
            releases.push(() => {
              void simulated.write(channelId, isOn).then(resolve);
            });
          }),
      );
      const hardware: HardwareDriver = { ...simulated, write };
      const dispatcher = createDispatcher(
        { cache: createEntityCache(), upstream: createFakeUpstream(), hardware },
        OPTIONS,
      );

      const first = dispatcher.dispatch({
        target: { kind: "channel", channelId: "green-led" },
        desired: true,
      });
      const second = dispatcher.dispatch({
        target: { kind: "channel", channelId: "green-led" },
        desired: false,
      });
      const other = dispatcher.dispatch({
        target: { kind: "channel", channelId: "red-led" },
        desired: true,
      });
      await vi.advanceTimersByTimeAsync(0);

      // green-led #1 and red-led started, green-led #2 waits
      expect(write).toHaveBeenCalledTimes(2);
      expect(write.mock.calls.map((call) => call[0])).toEqual([
        "green-led",
        "red-led",
      ]);

      releases[0]?.();
      await vi.advanceTimersByTimeAsync(0);
      expect(write).toHaveBeenCalledTimes(3);
      expect(write.mock.calls[2]).toEqual(["green-led", false]);

      releases[1]?.();
      releases[2]?.();
      await vi.advanceTimersByTimeAsync(0);

      expect((await first)._unsafeUnwrap().isOn).toBe(true);
      expect((await second)._unsafeUnwrap().isOn).toBe(false);
      expect((await other)._unsafeUnwrap().isOn).toBe(true);
      expect(hardware.read("green-led")).toBe(false);
    });
  });

  // ===========================================================================
  // Upstream Entities
  // ===========================================================================

  describe("upstream entities", () => {
    function setup(connected = true) {
      const cache = createEntityCache();
      const upstream = createFakeUpstream(connected);
      const dispatcher = createDispatcher(
        { cache, upstream, hardware: createSimulatedDriver(CHANNELS) },
        OPTIONS,
      );
      return { cache, upstream, dispatcher };
    }

    test("returns UNREACHABLE at once while disconnected", async () => {
      const { cache, upstream, dispatcher } = setup(false);
      light(cache, "light.kitchen", "off", 1000);

      const result = await dispatcher.dispatch({
        target: { kind: "entity", entityId: "light.kitchen" },
        desired: true,
      });

      expect(result._unsafeUnwrapErr().type).toBe("UNREACHABLE");
      expect(upstream.callService).not.toHaveBeenCalled();
    });

    test("succeeds without a command when already in the desired state", async () => {
      const { cache, upstream, dispatcher } = setup();
      light(cache, "light.kitchen", "on", 1000);

      const result = await dispatcher.dispatch({
        target: { kind: "entity", entityId: "light.kitchen" },
        desired: true,
      });

      expect(result._unsafeUnwrap()).toEqual({
        target: { kind: "entity", entityId: "light.kitchen" },
        isOn: true,
        source: "unchanged",
        generation: 1,
      });
      expect(upstream.callService).not.toHaveBeenCalled();
    });

    test("returns UNKNOWN_TARGET for a domain that cannot be switched", async () => {
      const { upstream, dispatcher } = setup();

      const result = await dispatcher.dispatch({
        target: { kind: "entity", entityId: "sensor.outdoor" },
        desired: true,
      });

      expect(result._unsafeUnwrapErr().type).toBe("UNKNOWN_TARGET");
      expect(upstream.callService).not.toHaveBeenCalled();
    });

    test("waits for the confirming state change", async () => {
      const { cache, upstream, dispatcher } = setup();
      light(cache, "light.kitchen", "off", 1000);
      upstream.callService.mockImplementation(async () => {
        setTimeout(() => light(cache, "light.kitchen", "on", 2000), 300);
        return ok(undefined);
      });

      const pending = dispatcher.dispatch({
        target: { kind: "entity", entityId: "light.kitchen" },
        desired: true,
      });
      await vi.advanceTimersByTimeAsync(300);

      expect((await pending)._unsafeUnwrap()).toEqual({
        target: { kind: "entity", entityId: "light.kitchen" },
        isOn: true,
        source: "confirmed",
        generation: 2,
      });
      expect(upstream.callService).toHaveBeenCalledWith(
        "light",
        "turn_on",
        undefined,
        { entity_id: "light.kitchen" },
      );
    });

    test("sees a confirmation that arrives before the result", async () => {
      const { cache, upstream, dispatcher } = setup();
      light(cache, "switch.fan", "on", 1000);
      upstream.callService.mockImplementation(async () => {
        light(cache, "switch.fan", "off", 2000);
        return ok(undefined);
      });

      const result = await dispatcher.dispatch({
        target: { kind: "entity", entityId: "switch.fan" },
        desired: false,
      });

      expect(result._unsafeUnwrap().source).toBe("confirmed");
      expect(upstream.callService).toHaveBeenCalledWith(
        "switch",
        "turn_off",
        undefined,
        { entity_id: "switch.fan" },
      );
    });

    test("a confirmed state change wins over a failed result", async () => {
      const { cache, upstream, dispatcher } = setup();
      light(cache, "light.kitchen", "off", 1000);
      upstream.callService.mockImplementation(async () => {
        light(cache, "light.kitchen", "on", 2000);
        return err<void, CommandError>({
          type: "TIMEOUT",
          message: "No result within 2000ms",
          timeoutMs: 2000,
        });
      });

      const result = await dispatcher.dispatch({
        target: { kind: "entity", entityId: "light.kitchen" },
        desired: true,
      });

      expect(result._unsafeUnwrap()).toEqual({
        target: { kind: "entity", entityId: "light.kitchen" },
        isOn: true,
        source: "confirmed",
        generation: 2,
      });
    });

    test("a dropped connection after confirmation still reports success", async () => {
      const { cache, upstream, dispatcher } = setup();
      light(cache, "switch.fan", "on", 1000);
      upstream.callService.mockImplementation(async () => {
        light(cache, "switch.fan", "off", 2000);
        return err<void, CommandError>({
          type: "CONNECTION_LOST",
          message: "Socket closed (1006)",
        });
      });

      const result = await dispatcher.dispatch({
        target: { kind: "entity", entityId: "switch.fan" },
        desired: false,
      });

      expect(result._unsafeUnwrap().source).toBe("confirmed");
      expect(result._unsafeUnwrap().generation).toBe(2);
    });

    test("only its own desired value confirms the command", async () => {
      const { cache, upstream, dispatcher } = setup();
      light(cache, "light.kitchen", "off", 1000);
      upstream.callService.mockImplementation(async () => {
        // someone else switches it off again before ours lands
        setTimeout(() => light(cache, "light.kitchen", "off", 1500), 100);
        setTimeout(() => light(cache, "light.kitchen", "on", 2000), 200);
        setTimeout(() => light(cache, "light.kitchen", "off", 2500), 300);
        return ok(undefined);
      });

      const pending = dispatcher.dispatch({
        target: { kind: "entity", entityId: "light.kitchen" },
        desired: true,
      });
      await vi.advanceTimersByTimeAsync(300);

      const outcome = (await pending)._unsafeUnwrap();
      expect(outcome.isOn).toBe(true);
      expect(outcome.generation).toBe(3);
      expect(cache.get("light.kitchen")?.generation).toBe(4);
    });

    test("returns TIMEOUT when no confirmation arrives and keeps late updates", async () => {
      const { cache, dispatcher } = setup();
      light(cache, "light.kitchen", "off", 1000);

      const pending = dispatcher.dispatch({
        target: { kind: "entity", entityId: "light.kitchen" },
        desired: true,
      });
      await vi.advanceTimersByTimeAsync(5000);

      expect((await pending)._unsafeUnwrapErr()).toEqual({
        type: "TIMEOUT",
        stage: "confirmation",
        message: "No confirmation within 5000ms",
        timeoutMs: 5000,
      });

      light(cache, "light.kitchen", "on", 9000);
      expect(cache.get("light.kitchen")?.value).toEqual({
        kind: "switch",
        isOn: true,
      });
    });

    test("returns REJECTED when the source refuses the call", async () => {
      const { cache, upstream, dispatcher } = setup();
      light(cache, "light.kitchen", "off", 1000);
      upstream.callService.mockResolvedValue(
        err<void, CommandError>({
          type: "REJECTED",
          message: "Entity light.kitchen is unavailable",
          code: "home_assistant_error",
        }),
      );

      const result = await dispatcher.dispatch({
        target: { kind: "entity", entityId: "light.kitchen" },
        desired: true,
      });

      expect(result._unsafeUnwrapErr()).toEqual({
        type: "REJECTED",
        message: "Entity light.kitchen is unavailable",
        code: "home_assistant_error",
      });
    });

    test("maps an acknowledgement timeout to TIMEOUT", async () => {
      const { cache, upstream, dispatcher } = setup();
      light(cache, "light.kitchen", "off", 1000);
      upstream.callService.mockResolvedValue(
        err<void, CommandError>({ type: "TIMEOUT", message: "No result within 2000ms", timeoutMs: 2000 }),
      );

      const result = await dispatcher.dispatch({
        target: { kind: "entity", entityId: "light.kitchen" },
        desired: true,
      });

      expect(result._unsafeUnwrapErr()).toEqual({
        type: "TIMEOUT",
        stage: "acknowledgement",
        message: "No acknowledgement within 2000ms",
        timeoutMs: 2000,
      });
    });

    test("maps a dropped connection to UNREACHABLE", async () => {
      const { cache, upstream, dispatcher } = setup();
      light(cache, "light.kitchen", "off", 1000);
      upstream.callService.mockResolvedValue(
        err<void, CommandError>({ type: "CONNECTION_LOST", message: "Socket closed (1006)" }),
      );

      const result = await dispatcher.dispatch({
        target: { kind: "entity", entityId: "light.kitchen" },
        desired: true,
      });

      expect(result._unsafeUnwrapErr().type).toBe("UNREACHABLE");
    });

    test("sends the command for an entity not seen yet", async () => {
      const { cache, upstream, dispatcher } = setup();
      upstream.callService.mockImplementation(async () => {
        light(cache, "light.porch", "on", 2000);
        return ok(undefined);
      });

      const result = await dispatcher.dispatch({
        target: { kind: "entity", entityId: "light.porch" },
        desired: true,
      });

      expect(result._unsafeUnwrap().generation).toBe(1);
    });
  });
});
