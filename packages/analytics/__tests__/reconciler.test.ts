/**
 * Click Reconciler Tests
 *
 * Runs against the in-process stores; fault injection drives the
 * failure paths.
 */

import { describe, it, expect, jest, beforeEach, afterEach } from "@jest/globals";
import { createSilentLogger } from "@shortkit/logger";
import { MemoryFastStore } from "@shortkit/cache";
import { MemoryUrlRepository } from "@shortkit/db";
import { ClickAggregator, ClickReconciler, clickKey } from "../src/index.js";

const logger = createSilentLogger();

async function seed(repo: MemoryUrlRepository, code: string, hash = `hash-${code}`): Promise<void> {
  const { record } = await repo.insert(hash, `https://example.com/${code}`, null);
  await repo.setCode(record.id, code);
}

describe("ClickReconciler", () => {
  let store: MemoryFastStore;
  let repo: MemoryUrlRepository;
  let clicks: ClickAggregator;
  let reconciler: ClickReconciler;

  beforeEach(async () => {
    store = new MemoryFastStore();
    repo = new MemoryUrlRepository();
    clicks = new ClickAggregator(store, { logger });
    reconciler = new ClickReconciler(clicks, repo, { logger, intervalMs: 60_000 });
    await seed(repo, "000001");
    await seed(repo, "000002");
  });

  afterEach(async () => {
    await reconciler.stop();
    jest.useRealTimers();
  });

  describe("runNow", () => {
    it("should move pending clicks into the durable store", async () => {
      await clicks.increment("000001");
      await clicks.increment("000001");
      await clicks.increment("000001");
      await clicks.increment("000002");

      const result = await reconciler.runNow();

      expect(result).toMatchObject({
        keysScanned: 2,
        applied: 2,
        skipped: 0,
        failed: 0,
        restored: 0,
        lost: 0,
        clicksApplied: 4,
        timedOut: false,
      });
      await expect(repo.getByCode("000001")).resolves.toMatchObject({ clickCount: 3 });
      await expect(repo.getByCode("000002")).resolves.toMatchObject({ clickCount: 1 });
      await expect(clicks.pending("000001")).resolves.toEqual({ degraded: false, value: 0 });
    });

    it("should skip counters that drain to zero", async () => {
      await store.incrBy(clickKey("000001"), 0);

      const result = await reconciler.runNow();

      expect(result).toMatchObject({ keysScanned: 1, skipped: 1, applied: 0 });
    });

    it("should restore the counter when the apply fails", async () => {
      await clicks.increment("000001");
      await clicks.increment("000001");
      repo.failNext("addClicks");

      const result = await reconciler.runNow();

      expect(result).toMatchObject({ failed: 1, restored: 1, lost: 0, applied: 0 });
      await expect(clicks.pending("000001")).resolves.toEqual({ degraded: false, value: 2 });
      await expect(repo.getByCode("000001")).resolves.toMatchObject({ clickCount: 0 });
    });

    it("should apply restored clicks on the next run", async () => {
      await clicks.increment("000001");
      repo.failNext("addClicks");
      await reconciler.runNow();

      const result = await reconciler.runNow();

      expect(result).toMatchObject({ applied: 1, clicksApplied: 1 });
      await expect(repo.getByCode("000001")).resolves.toMatchObject({ clickCount: 1 });
    });

    it("should report loss when the restore also fails", async () => {
      await clicks.increment("000001");
      repo.failNext("addClicks");
      store.failNext("incrBy");

      const result = await reconciler.runNow();

      expect(result).toMatchObject({ failed: 1, restored: 0, lost: 1 });
      await expect(clicks.pending("000001")).resolves.toEqual({ degraded: false, value: 0 });
    });

    it("should drop counters with no matching url without restoring", async () => {
      await clicks.increment("zzzzzz");

      const result = await reconciler.runNow();

      expect(result).toMatchObject({ keysScanned: 1, failed: 1, lost: 1, restored: 0 });
      await expect(store.get(clickKey("zzzzzz"))).resolves.toBeNull();
    });

    it("should leave a counter alone when its drain fails", async () => {
      await clicks.increment("000001");
      store.failNext("getAndClear");

      const result = await reconciler.runNow();

      expect(result).toMatchObject({ failed: 1, lost: 0 });
      await expect(clicks.pending("000001")).resolves.toEqual({ degraded: false, value: 1 });
    });

    it("should report loss when a drained counter is not an integer", async () => {
      await store.setWithTTL(clickKey("000001"), "abc", 3600);
      await clicks.increment("000002");

      const result = await reconciler.runNow();

      expect(result).toMatchObject({ keysScanned: 2, applied: 1, failed: 1, lost: 1, restored: 0 });
      await expect(store.get(clickKey("000001"))).resolves.toBeNull();
      await expect(repo.getByCode("000001")).resolves.toMatchObject({ clickCount: 0 });
    });

    it("should not throw when the scan fails", async () => {
      await clicks.increment("000001");
      store.failNext("scanKeysByPrefix");

      const result = await reconciler.runNow();

      expect(result).toMatchObject({ keysScanned: 0, applied: 0, failed: 0 });
    });

    it("should stop at the run deadline and leave the rest for later", async () => {
      let clock = 0;
      const sink = {
        addClicks: jest.fn(async (): Promise<number> => {
          clock += 1000;
          return 1;
        }),
      };
      const timed = new ClickReconciler(clicks, sink, { logger, runTimeoutMs: 1500, now: () => clock });
      await clicks.increment("a");
      await clicks.increment("b");
      await clicks.increment("c");

      const result = await timed.runNow();

      expect(result).toMatchObject({ keysScanned: 3, applied: 2, timedOut: true });
      expect(sink.addClicks).toHaveBeenCalledTimes(2);
      await expect(clicks.pending("c")).resolves.toEqual({ degraded: false, value: 1 });
    });

    it("should join a run that is already in flight", async () => {
      await clicks.increment("000001");

      const [first, second] = await Promise.all([reconciler.runNow(), reconciler.runNow()]);

      expect(first).toBe(second);
      await expect(repo.getByCode("000001")).resolves.toMatchObject({ clickCount: 1 });
    });
  });

  describe("stop", () => {
    it("should perform a final run and refuse further work", async () => {
      await clicks.increment("000001");

      const result = await reconciler.stop();

      expect(result).toMatchObject({ applied: 1, clicksApplied: 1 });
      expect(reconciler.state).toBe("stopped");
      await expect(reconciler.runNow()).resolves.toBeNull();
      expect(() => reconciler.start()).toThrow("Click reconciler has been stopped");
    });

    it("should wait for the in-flight run before the final run", async () => {
      let release: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      let entered: () => void = () => undefined;
      const applying = new Promise<void>((resolve) => {
        entered = resolve;
      });
      const sink = {
        addClicks: jest.fn(async (code: string, count: number): Promise<number> => {
          entered();
          await gate;
          return repo.addClicks(code, count);
        }),
      };
      const gated = new ClickReconciler(clicks, sink, { logger });

      await clicks.increment("000001");
      const firstRun = gated.runNow();
      await applying;
      expect(gated.state).toBe("running");

      // Arrives after the first drain, so only the final run can flush it
      await clicks.increment("000001");
      await clicks.increment("000001");

      const stopping = gated.stop();
      release();

      await expect(firstRun).resolves.toMatchObject({ clicksApplied: 1 });
      await expect(stopping).resolves.toMatchObject({ clicksApplied: 2 });
      await expect(repo.getByCode("000001")).resolves.toMatchObject({ clickCount: 3 });
      expect(gated.state).toBe("stopped");
    });

    it("should share the final run between repeated calls", async () => {
      const [a, b] = await Promise.all([reconciler.stop(), reconciler.stop()]);

      expect(a).toBe(b);
    });
  });

  describe("schedule", () => {
    it("should run on every interval", async () => {
      jest.useFakeTimers();
      reconciler.start();
      reconciler.start();
      expect(reconciler.isScheduled).toBe(true);

      await clicks.increment("000001");
      await jest.advanceTimersByTimeAsync(60_000);
      await expect(repo.getByCode("000001")).resolves.toMatchObject({ clickCount: 1 });

      await clicks.increment("000001");
      await jest.advanceTimersByTimeAsync(60_000);
      await expect(repo.getByCode("000001")).resolves.toMatchObject({ clickCount: 2 });
    });

    it("should not run before the first interval elapses", async () => {
      jest.useFakeTimers();
      reconciler.start();

      await clicks.increment("000001");
      await jest.advanceTimersByTimeAsync(59_999);

      await expect(repo.getByCode("000001")).resolves.toMatchObject({ clickCount: 0 });
    });

    it("should cancel the timer on stop", async () => {
      reconciler.start();

      await reconciler.stop();

      expect(reconciler.isScheduled).toBe(false);
    });
  });
});
