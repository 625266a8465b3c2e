/**
 * Resource Arbiter Tests
 *
 * Source: apps/backend/src/devices/arbiter.ts
 *
 * Critical Invariants:
 * - Locks are taken in natural ascending key order and released on every
 *   exit path, including a rejected operation and an aborted wait
 * - Waiters are served FIFO per device
 * - tryExclusive never waits and yields to held locks and queued waiters
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { ResourceArbiter, cameraKey, LIGHT_KEY, orderKeys } from "../arbiter";
import { deferred } from "../../__tests__/helpers";

describe("orderKeys", () => {
  it("deduplicates and sorts in natural order", () => {
    expect(
      orderKeys(["light", "camera:10", "camera:2", "camera:2", "camera:1"]),
    ).toEqual(["camera:1", "camera:2", "camera:10", "light"]);
  });

  it("builds camera keys from ids", () => {
    expect(cameraKey(4)).toBe("camera:4");
    expect(LIGHT_KEY).toBe("light");
  });
});

describe("ResourceArbiter", () => {
  let arbiter: ResourceArbiter;

  beforeEach(() => {
    arbiter = new ResourceArbiter();
  });

  describe("withExclusive()", () => {
    it("runs the operation and releases every key", async () => {
      const operation = vi.fn().mockResolvedValue("done");

      const result = await arbiter.withExclusive(
        ["camera:2", "camera:1"],
        operation,
        { operation: "capture" },
      );

      expect(result).toBe("done");
      expect(operation).toHaveBeenCalledTimes(1);
      expect(arbiter.isLocked("camera:1")).toBe(false);
      expect(arbiter.isLocked("camera:2")).toBe(false);
    });

    it("releases the locks when the operation throws", async () => {
      await expect(
        arbiter.withExclusive(
          [LIGHT_KEY],
          async () => {
            throw new Error("boom");
          },
          { operation: "capture" },
        ),
      ).rejects.toThrow("boom");

      expect(arbiter.isLocked(LIGHT_KEY)).toBe(false);
    });

    it("holds the locks while the operation runs", async () => {
      const gate = deferred();
      const held = arbiter.withExclusive(["camera:1"], () => gate.promise, {
        operation: "capture",
      });

      expect(arbiter.isLocked("camera:1")).toBe(true);
      expect(arbiter.getLockStatus()).toEqual([
        { key: "camera:1", held: true, holder: "capture", waiting: 0 },
      ]);

      gate.resolve();
      await held;
      expect(arbiter.isLocked("camera:1")).toBe(false);
    });

    it("serves waiters in FIFO order", async () => {
      const order: string[] = [];
      const gate = deferred();

      const first = arbiter.withExclusive(
        [LIGHT_KEY],
        async () => {
          await gate.promise;
          order.push("first");
        },
        { operation: "first" },
      );
      const second = arbiter.withExclusive(
        [LIGHT_KEY],
        async () => {
          order.push("second");
        },
        { operation: "second" },
      );
      const third = arbiter.withExclusive(
        [LIGHT_KEY],
        async () => {
          order.push("third");
        },
        { operation: "third" },
      );

      expect(arbiter.getLockStatus()[0].waiting).toBe(2);

      gate.resolve();
      await Promise.all([first, second, third]);

      expect(order).toEqual(["first", "second", "third"]);
    });

    it("completes overlapping requests listed in opposite orders", async () => {
      const results = await Promise.all([
        arbiter.withExclusive(
          ["camera:1", "camera:2"],
          async () => "a",
          { operation: "a" },
        ),
        arbiter.withExclusive(
          ["camera:2", "camera:1"],
          async () => "b",
          { operation: "b" },
        ),
        arbiter.withExclusive(
          [LIGHT_KEY, "camera:2"],
          async () => "c",
          { operation: "c" },
        ),
      ]);

      expect(results).toEqual(["a", "b", "c"]);
      expect(arbiter.getLockStatus().every((lock) => !lock.held)).toBe(true);
    });

    it("rejects an aborted wait and leaves the queue clean", async () => {
      const gate = deferred();
      const holder = arbiter.withExclusive(["camera:1"], () => gate.promise, {
        operation: "hold",
      });

      const controller = new AbortController();
      const operation = vi.fn().mockResolvedValue("never");
      const waiting = arbiter.withExclusive(["camera:1"], operation, {
        operation: "wait",
        signal: controller.signal,
      });

      controller.abort(new Error("cancelled"));

      await expect(waiting).rejects.toThrow("cancelled");
      expect(operation).not.toHaveBeenCalled();
      expect(arbiter.getLockStatus()).toEqual([
        { key: "camera:1", held: true, holder: "hold", waiting: 0 },
      ]);

      gate.resolve();
      await holder;
      expect(arbiter.isLocked("camera:1")).toBe(false);
    });

    it("releases keys already taken when a later wait is aborted", async () => {
      const gate = deferred();
      const holder = arbiter.withExclusive(["camera:2"], () => gate.promise, {
        operation: "hold",
      });

      const controller = new AbortController();
      const waiting = arbiter.withExclusive(
        ["camera:1", "camera:2"],
        async () => "never",
        { operation: "wait", signal: controller.signal },
      );

      // camera:1 is taken first, then the wait on camera:2 begins
      await Promise.resolve();
      expect(arbiter.isLocked("camera:1")).toBe(true);

      controller.abort(new Error("cancelled"));
      await expect(waiting).rejects.toThrow("cancelled");
      expect(arbiter.isLocked("camera:1")).toBe(false);

      gate.resolve();
      await holder;
    });

    it("rejects immediately when the signal is already aborted", async () => {
      const controller = new AbortController();
      controller.abort(new Error("too late"));

      await expect(
        arbiter.withExclusive(["camera:1"], async () => "x", {
          operation: "late",
          signal: controller.signal,
        }),
      ).rejects.toThrow("too late");
      expect(arbiter.isLocked("camera:1")).toBe(false);
    });
  });

  describe("tryExclusive()", () => {
    it("runs the operation when every key is free", async () => {
      const result = await arbiter.tryExclusive(
        ["camera:1"],
        async () => 42,
        { operation: "preview" },
      );

      expect(result).toEqual({ acquired: true, value: 42 });
      expect(arbiter.isLocked("camera:1")).toBe(false);
    });

    it("gives way without waiting when a key is held", async () => {
      const gate = deferred();
      const holder = arbiter.withExclusive(["camera:2"], () => gate.promise, {
        operation: "capture",
      });
      const operation = vi.fn().mockResolvedValue("frame");

      const result = await arbiter.tryExclusive(
        ["camera:1", "camera:2"],
        operation,
        { operation: "preview" },
      );

      expect(result).toEqual({ acquired: false, busy: ["camera:2"] });
      expect(operation).not.toHaveBeenCalled();
      expect(arbiter.isLocked("camera:1")).toBe(false);

      gate.resolve();
      await holder;
    });

    it("gives way to a queued capture waiter", async () => {
      const gate = deferred();
      const holder = arbiter.withExclusive(["camera:1"], () => gate.promise, {
        operation: "capture-1",
      });
      const queued = arbiter.withExclusive(["camera:1"], async () => "ok", {
        operation: "capture-2",
      });

      const result = await arbiter.tryExclusive(
        ["camera:1"],
        async () => "frame",
        { operation: "preview" },
      );
      expect(result.acquired).toBe(false);

      gate.resolve();
      await holder;
      await expect(queued).resolves.toBe("ok");
    });
  });
});
