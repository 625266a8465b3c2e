/**
 * Vision Core Tests
 *
 * Source: apps/backend/src/services/vision-core.ts
 *
 * Critical Invariants:
 * - start() sends the stored brightness to every light port under the light lock
 * - An unreadable settings file or an absent light never aborts startup
 */

import fs from "fs/promises";
import os from "os";
import path from "path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { LIGHT_KEY } from "../../devices/arbiter";
import {
  createMemoryWriter,
  createTestRig,
  testConfig,
  type TestRig,
  type TestRigOptions,
} from "../../__tests__/helpers";
import { VisionCore } from "../vision-core";
import type { Env } from "../../config/env";

function createCore(
  rigOptions: TestRigOptions = {},
  config: Env = testConfig(),
): { core: VisionCore; rig: TestRig } {
  const rig = createTestRig(rigOptions);
  const core = new VisionCore(config, {
    createCamera: rig.createCamera,
    createLight: rig.createLight,
    writeFrame: createMemoryWriter().writeFrame,
  });
  return { core, rig };
}

describe("VisionCore", () => {
  let dir: string;
  let core: VisionCore | null;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "visionrig-core-"));
    core = null;
  });

  afterEach(async () => {
    await core?.stop();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("restores the default brightness on start", async () => {
    const created = createCore();
    core = created.core;

    await core.start();

    expect(created.rig.lights.get("COM2")?.getWrittenValues()).toEqual([100]);
    expect(created.rig.lights.get("COM8")?.getWrittenValues()).toEqual([100]);
    expect(core.getStatus().lights.map((light) => light.brightness)).toEqual([
      100, 100,
    ]);
    expect(core.arbiter.isLocked(LIGHT_KEY)).toBe(false);
  });

  it("restores the brightness from the settings file", async () => {
    const settingsFile = path.join(dir, "settings.json");
    await fs.writeFile(settingsFile, JSON.stringify({ lightValue: 42 }));
    const created = createCore({}, testConfig({ settingsFile }));
    core = created.core;

    await core.start();

    expect(core.settings.get().lightValue).toBe(42);
    expect(created.rig.lights.get("COM2")?.getWrittenValues()).toEqual([42]);
    expect(created.rig.lights.get("COM8")?.getWrittenValues()).toEqual([42]);
  });

  it("starts with defaults when the settings file is unreadable", async () => {
    const settingsFile = path.join(dir, "settings.json");
    await fs.writeFile(settingsFile, "{ not json", "utf-8");
    const created = createCore({}, testConfig({ settingsFile }));
    core = created.core;

    await core.start();

    expect(created.rig.lights.get("COM2")?.getWrittenValues()).toEqual([100]);
  });

  it("starts when a light port is absent", async () => {
    const created = createCore({ absentLights: ["COM8"] });
    core = created.core;

    await core.start();

    expect(created.rig.lights.get("COM2")?.getWrittenValues()).toEqual([100]);
    expect(created.rig.lights.get("COM8")?.getWrittenValues()).toEqual([]);
    expect(core.getStatus().lightsConnected).toBe(1);
  });

  it("restores the light only once when started twice", async () => {
    const created = createCore();
    core = created.core;

    await core.start();
    await core.start();

    expect(created.rig.lights.get("COM2")?.getWrittenValues()).toEqual([100]);
  });
});
