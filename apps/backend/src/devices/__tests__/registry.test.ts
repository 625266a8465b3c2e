/**
 * Device Registry Tests
 *
 * Source: apps/backend/src/devices/registry.ts
 *
 * Critical Invariants:
 * - acquireFrame() never throws; every failure yields the black fallback frame
 * - Absent devices are re-opened lazily, at most once per retry interval
 * - setBrightness() clamps and reports unreachable ports instead of throwing
 */

import { describe, it, expect, beforeEach } from "vitest";
import {
  createTestRegistry,
  createTestRig,
  testConfig,
  type TestRig,
} from "../../__tests__/helpers";
import type { DeviceRegistry } from "../registry";

describe("DeviceRegistry", () => {
  let rig: TestRig;
  let registry: DeviceRegistry;

  beforeEach(async () => {
    rig = createTestRig({ absentCameras: [2] });
    registry = createTestRegistry(rig);
    await registry.initialize();
  });

  it("lists camera ids sorted and deduplicated", () => {
    const unsorted = createTestRegistry(
      createTestRig(),
      testConfig({ cameraIds: [3, 1, 3, 2] }),
    );
    expect(unsorted.listTargets()).toEqual([1, 2, 3]);
    expect(unsorted.hasCamera(2)).toBe(true);
    expect(unsorted.hasCamera(4)).toBe(false);
  });

  it("marks present devices connected and missing ones absent", () => {
    const status = registry.getCameraStatuses();

    expect(status.map((c) => [c.id, c.status])).toEqual([
      [1, "connected"],
      [2, "absent"],
      [3, "connected"],
      [4, "connected"],
    ]);
    expect(status[1].lastError).toBe("Mock camera 2 not present");
    expect(registry.getLightStatuses().map((l) => l.status)).toEqual([
      "connected",
      "connected",
    ]);
  });

  describe("acquireFrame()", () => {
    it("returns a live frame from a connected camera", async () => {
      const frame = await registry.acquireFrame(1);

      expect(frame.status).toBe("live");
      expect(frame.cameraId).toBe(1);
      expect(frame.image.width).toBe(64);
      expect(frame.image.height).toBe(48);
      expect(rig.cameras.get(1)?.getGrabCount()).toBe(1);
    });

    it("returns a black fallback frame for an absent camera", async () => {
      const frame = await registry.acquireFrame(2);

      expect(frame.status).toBe("fallback");
      expect(frame.cameraId).toBe(2);
      expect(frame.image.width).toBe(40);
      expect(frame.image.height).toBe(30);
      expect(frame.image.data.length).toBe(40 * 30 * 3);
      expect(frame.image.data.every((byte) => byte === 0)).toBe(true);
    });

    it("returns a fallback frame for an unknown camera", async () => {
      const frame = await registry.acquireFrame(9);

      expect(frame.status).toBe("fallback");
      expect(frame.cameraId).toBe(9);
    });

    it("absorbs grab failures and records the error", async () => {
      const absent: Array<{ key: string }> = [];
      registry.on("device:absent", (data: { key: string }) => absent.push(data));
      rig.cameras.get(1)?.setFailGrabs(true);

      const frame = await registry.acquireFrame(1);

      expect(frame.status).toBe("fallback");
      const status = registry.getCameraStatuses()[0];
      expect(status.status).toBe("absent");
      expect(status.lastError).toBe("Mock camera 1 grab failed");
      expect(status.lastFrameStatus).toBe("fallback");
      expect(absent.map((event) => event.key)).toEqual(["camera:1"]);
    });

    it("falls back when a grab exceeds the timeout", async () => {
      const slowRig = createTestRig({ grabDelayMs: 100 });
      const slow = createTestRegistry(
        slowRig,
        testConfig({ grabTimeoutMs: 20 }),
      );
      await slow.initialize();

      const frame = await slow.acquireFrame(1);

      expect(frame.status).toBe("fallback");
      expect(slow.getCameraStatuses()[0].lastError).toBe(
        "Device call timed out after 20ms",
      );
    });

    it("reconnects a camera that comes back", async () => {
      const connected: string[] = [];
      registry.on("device:connected", (data: { key: string }) =>
        connected.push(data.key),
      );
      rig.cameras.get(2)?.setPresent(true);

      const frame = await registry.acquireFrame(2);

      expect(frame.status).toBe("live");
      expect(registry.getCameraStatuses()[1].status).toBe("connected");
      expect(registry.getCameraStatuses()[1].lastError).toBeNull();
      expect(connected).toEqual(["camera:2"]);
    });

    it("does not re-open inside the retry interval", async () => {
      const slowRetryRig = createTestRig({ absentCameras: [2] });
      const slowRetry = createTestRegistry(
        slowRetryRig,
        testConfig({ deviceRetryIntervalMs: 60000 }),
      );
      await slowRetry.initialize();
      slowRetryRig.cameras.get(2)?.setPresent(true);

      const frame = await slowRetry.acquireFrame(2);

      expect(frame.status).toBe("fallback");
      expect(slowRetry.getCameraStatuses()[1].status).toBe("absent");
    });
  });

  describe("getCachedFrame()", () => {
    it("returns the fallback before any grab", () => {
      expect(registry.getCachedFrame(1).status).toBe("fallback");
    });

    it("returns the last acquired frame without grabbing", async () => {
      const frame = await registry.acquireFrame(3);

      expect(registry.getCachedFrame(3)).toBe(frame);
      expect(rig.cameras.get(3)?.getGrabCount()).toBe(1);
    });
  });

  describe("setBrightness()", () => {
    it("clamps and writes to every port", async () => {
      const result = await registry.setBrightness(300);

      expect(result).toEqual({
        value: 255,
        appliedPorts: ["COM2", "COM8"],
        unavailablePorts: [],
      });
      expect(rig.lights.get("COM2")?.getWrittenValues()).toEqual([255]);
      expect(rig.lights.get("COM8")?.getWrittenValues()).toEqual([255]);
      expect(registry.getLightStatuses()[0].brightness).toBe(255);
    });

    it("clamps infinite values to the range bounds", async () => {
      expect((await registry.setBrightness(Infinity)).value).toBe(255);
      expect((await registry.setBrightness(-Infinity)).value).toBe(0);
      expect(rig.lights.get("COM2")?.getWrittenValues()).toEqual([255, 0]);
    });

    it("reports absent ports without throwing", async () => {
      const partialRig = createTestRig({ absentLights: ["COM8"] });
      const partial = createTestRegistry(partialRig);
      await partial.initialize();

      const result = await partial.setBrightness(-5);

      expect(result).toEqual({
        value: 0,
        appliedPorts: ["COM2"],
        unavailablePorts: ["COM8"],
      });
    });

    it("writes only to the requested ports", async () => {
      const result = await registry.setBrightness(40, ["COM8", "COM9"]);

      expect(result).toEqual({
        value: 40,
        appliedPorts: ["COM8"],
        unavailablePorts: ["COM9"],
      });
      expect(rig.lights.get("COM2")?.getWrittenValues()).toEqual([]);
    });
  });

  it("closes every adapter on shutdown", async () => {
    await registry.shutdown();

    expect(rig.cameras.get(1)?.isOpen()).toBe(false);
    expect(rig.lights.get("COM2")?.isOpen()).toBe(false);
  });
});
