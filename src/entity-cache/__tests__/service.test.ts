/**
 * Entity Cache Service Tests
 *
 * Tests generation ordering, snapshot isolation and waiting for updates.
 */
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
}));

// Import after mocks
import { createEntityCache } from "../service.js";
import { createEntityState, createTombstone } from "../transform.js";

function state(id: string, value: string, lastUpdated: number) {
  return createEntityState({
    id,
    state: value,
    attributes: {},
    lastUpdated,
    lastChanged: lastUpdated,
  });
}

describe("Entity Cache Service", () => {
  // ===========================================================================
  // apply / get / snapshot
  // ===========================================================================

  describe("apply", () => {
    test("starts empty at generation 0", () => {
      const cache = createEntityCache();

      expect(cache.generation()).toBe(0);
      expect(cache.get("light.kitchen")).toBeNull();
      expect(cache.snapshot().entities.size).toBe(0);
    });

    test("increments the generation on every applied update", () => {
      const cache = createEntityCache();

      const first = cache.apply(state("light.kitchen", "off", 1000));
      const second = cache.apply(state("light.hall", "on", 1000));
      const third = cache.apply(state("light.kitchen", "on", 2000));

      expect([first.generation, second.generation, third.generation]).toEqual([
        1, 2, 3,
      ]);
      expect(cache.get("light.kitchen")?.generation).toBe(3);
      expect(cache.get("light.hall")?.generation).toBe(2);
    });

    test("ignores an older update without moving the generation", () => {
      const cache = createEntityCache();
      cache.apply(state("light.kitchen", "on", 2000));

      const outcome = cache.apply(state("light.kitchen", "off", 1000));

      expect(outcome).toEqual({ applied: false, generation: 1 });
      expect(cache.get("light.kitchen")?.value).toEqual({
        kind: "switch",
        isOn: true,
      });
    });

    test("ignores a redelivered update", () => {
      const cache = createEntityCache();
      cache.apply(state("light.kitchen", "on", 2000));

      const outcome = cache.apply(state("light.kitchen", "on", 2000));

      expect(outcome).toEqual({ applied: false, generation: 1 });
    });

    test("keeps removed entities as tombstones", () => {
      const cache = createEntityCache();
      cache.apply(state("light.kitchen", "on", 1000));

      cache.apply(createTombstone("light.kitchen", 2000));

      expect(cache.get("light.kitchen")?.value).toEqual({ kind: "removed" });
      expect(cache.snapshot().entities.size).toBe(1);
    });
  });

  describe("snapshot", () => {
    test("is not affected by later writes", () => {
      const cache = createEntityCache();
      cache.apply(state("light.kitchen", "off", 1000));
      const before = cache.snapshot();

      cache.apply(state("light.kitchen", "on", 2000));
      cache.apply(state("light.hall", "on", 2000));

      expect(before.generation).toBe(1);
      expect(before.entities.size).toBe(1);
      expect(before.entities.get("light.kitchen")?.value).toEqual({
        kind: "switch",
        isOn: false,
      });
    });

    test("never goes backwards for a key read after it", () => {
      const cache = createEntityCache();
      const updates = [
        state("light.kitchen", "off", 1000),
        state("light.kitchen", "on", 900),
        state("light.hall", "on", 1000),
        state("light.kitchen", "on", 3000),
        state("light.kitchen", "off", 2000),
        state("light.hall", "off", 5000),
      ];

      let lastGeneration = cache.snapshot().generation;
      for (const update of updates) {
        const snap = cache.snapshot();
        const seen = snap.entities.get(update.id)?.generation ?? 0;

        cache.apply(update);

        expect(cache.snapshot().generation).toBeGreaterThanOrEqual(
          lastGeneration,
        );
        expect(cache.get(update.id)?.generation ?? 0).toBeGreaterThanOrEqual(
          seen,
        );
        lastGeneration = cache.snapshot().generation;
      }

      expect(lastGeneration).toBe(4);
    });
  });

  // ===========================================================================
  // subscribe
  // ===========================================================================

  describe("subscribe", () => {
    test("notifies listeners of applied updates only", () => {
      const cache = createEntityCache();
      const listener = vi.fn();
      cache.subscribe(listener);

      cache.apply(state("light.kitchen", "on", 2000));
      cache.apply(state("light.kitchen", "off", 1000));

      expect(listener).toHaveBeenCalledTimes(1);
      expect(listener.mock.calls[0]?.[1]).toBe(1);
    });

    test("stops notifying after unsubscribe", () => {
      const cache = createEntityCache();
      const listener = vi.fn();
      const unsubscribe = cache.subscribe(listener);

      unsubscribe();
      cache.apply(state("light.kitchen", "on", 2000));

      expect(listener).not.toHaveBeenCalled();
    });

    test("a throwing listener does not block the write", () => {
      const cache = createEntityCache();
      const after = vi.fn();
      cache.subscribe(() => {
        throw new Error("listener broke");
      });
      cache.subscribe(after);

      const outcome = cache.apply(state("light.kitchen", "on", 2000));

      expect(outcome.applied).toBe(true);
      expect(after).toHaveBeenCalledTimes(1);
    });
  });

  // ===========================================================================
  // waitFor
  // ===========================================================================

  describe("waitFor", () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    const isOn = (entity: { value: { kind: string; isOn?: boolean } }) =>
      entity.value.kind === "switch" && entity.value.isOn === true;

    test("resolves immediately when the entry already matches", async () => {
      const cache = createEntityCache();
      cache.apply(state("light.kitchen", "on", 1000));

      const entity = await cache.waitFor("light.kitchen", isOn, 1000);

      expect(entity?.generation).toBe(1);
    });

    test("resolves with the first matching update", async () => {
      const cache = createEntityCache();
      cache.apply(state("light.kitchen", "off", 1000));

      const pending = cache.waitFor("light.kitchen", isOn, 1000);
      cache.apply(state("light.hall", "on", 1500));
      cache.apply(state("light.kitchen", "on", 2000));

      const entity = await pending;
      expect(entity?.id).toBe("light.kitchen");
      expect(entity?.generation).toBe(3);
    });

    test("resolves null after the timeout", async () => {
      const cache = createEntityCache();
      cache.apply(state("light.kitchen", "off", 1000));

      const pending = cache.waitFor("light.kitchen", isOn, 1000);
      await vi.advanceTimersByTimeAsync(1000);

      expect(await pending).toBeNull();
    });

    test("resolves null when aborted", async () => {
      const cache = createEntityCache();
      const controller = new AbortController();

      const pending = cache.waitFor("light.kitchen", isOn, 1000, controller.signal);
      controller.abort();

      expect(await pending).toBeNull();
    });

    test("late updates are still applied after a timeout", async () => {
      const cache = createEntityCache();
      cache.apply(state("light.kitchen", "off", 1000));

      const pending = cache.waitFor("light.kitchen", isOn, 1000);
      await vi.advanceTimersByTimeAsync(1000);
      await pending;
      const outcome = cache.apply(state("light.kitchen", "on", 5000));

      expect(outcome.applied).toBe(true);
      expect(cache.get("light.kitchen")?.value).toEqual({
        kind: "switch",
        isOn: true,
      });
    });
  });
});
