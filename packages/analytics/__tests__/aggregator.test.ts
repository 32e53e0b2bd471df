/**
 * Click Aggregator Tests
 */

import { describe, it, expect, jest, beforeEach } from "@jest/globals";
import { createSilentLogger } from "@shortkit/logger";
import { MemoryFastStore } from "@shortkit/cache";
import { ClickAggregator, clickKey } from "../src/index.js";

describe("ClickAggregator", () => {
  let store: MemoryFastStore;
  let clicks: ClickAggregator;

  beforeEach(() => {
    store = new MemoryFastStore();
    clicks = new ClickAggregator(store, { logger: createSilentLogger(), incrementTimeoutMs: 20 });
  });

  describe("increment", () => {
    it("should accumulate under the clicks key", async () => {
      await clicks.increment("000001");
      await clicks.increment("000001");

      await expect(store.get("sk:v1:clicks:000001")).resolves.toBe("2");
      expect(clicks.getStats()).toEqual({ increments: 2, dropped: 0 });
    });

    it("should swallow store failures", async () => {
      store.failNext("incrBy");

      await expect(clicks.increment("000001")).resolves.toBeUndefined();
      expect(clicks.getStats()).toEqual({ increments: 0, dropped: 1 });
    });

    it("should give up after the deadline", async () => {
      jest.spyOn(store, "incrBy").mockReturnValue(new Promise<number>(() => undefined));

      await expect(clicks.increment("000001")).resolves.toBeUndefined();
      expect(clicks.getStats().dropped).toBe(1);
    });
  });

  describe("drain and restore", () => {
    it("should drain the counter to zero", async () => {
      await store.incrBy(clickKey("000001"), 5);

      await expect(clicks.drainAndReset("000001")).resolves.toBe(5);
      await expect(clicks.drainAndReset("000001")).resolves.toBe(0);
    });

    it("should add restored clicks to later increments", async () => {
      await store.incrBy(clickKey("000001"), 5);
      const drained = await clicks.drainAndReset("000001");
      await clicks.increment("000001");

      await clicks.restore("000001", drained);

      await expect(store.get(clickKey("000001"))).resolves.toBe("6");
    });

    it("should not create a counter when restoring zero", async () => {
      await clicks.restore("000001", 0);

      await expect(store.get(clickKey("000001"))).resolves.toBeNull();
    });

    it("should reject drain failures", async () => {
      store.failNext("getAndClear");

      await expect(clicks.drainAndReset("000001")).rejects.toThrow("Injected fast store failure");
    });
  });

  describe("pending", () => {
    it("should read without clearing", async () => {
      await store.incrBy(clickKey("000001"), 3);

      await expect(clicks.pending("000001")).resolves.toEqual({ degraded: false, value: 3 });
      await expect(clicks.pending("000001")).resolves.toEqual({ degraded: false, value: 3 });
      await expect(clicks.pending("000002")).resolves.toEqual({ degraded: false, value: 0 });
    });

    it("should report a degraded read", async () => {
      store.setAvailable(false);

      const result = await clicks.pending("000001");

      expect(result.degraded).toBe(true);
    });
  });

  it("should list tracked short codes", async () => {
    await clicks.increment("000001");
    await clicks.increment("00000A");
    await store.setWithTTL("sk:v1:url:000001", "{}", 60);

    await expect(clicks.trackedCodes()).resolves.toEqual(["000001", "00000A"]);
  });
});
