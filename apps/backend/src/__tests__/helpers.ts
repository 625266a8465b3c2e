/**
 * Shared test fixtures: an in-process rig of mock devices, a config that
 * never touches real ports or files, and an in-memory frame writer.
 */

import type { CameraId, LightPort } from "@visionrig/types";
import { loadEnv, type Env } from "../config/env";
import { MockCameraAdapter } from "../devices/providers/mock-camera";
import { MockLightAdapter } from "../devices/providers/mock-light";
import { DeviceRegistry } from "../devices/registry";
import type { Frame } from "../devices/types";
import type { FrameWriter } from "../services/frame-writer";

export const TEST_CAMERA_IDS: CameraId[] = [1, 2, 3, 4];
export const TEST_LIGHT_PORTS: LightPort[] = ["COM2", "COM8"];

export function testConfig(overrides: Partial<Env> = {}): Env {
  return {
    ...loadEnv(),
    cameraIds: TEST_CAMERA_IDS,
    designatedCameraId: 3,
    cameraProvider: "mock",
    lightPorts: TEST_LIGHT_PORTS,
    lightProvider: "mock",
    savePath: "/captures",
    settingsFile: null,
    grabTimeoutMs: 200,
    lightTimeoutMs: 200,
    deviceRetryIntervalMs: 0,
    sequenceSettleMs: 0,
    sequenceStepGapMs: 0,
    previewFps: 50,
    previewWidth: 32,
    fallbackWidth: 40,
    fallbackHeight: 30,
    ...overrides,
  };
}

export interface TestRigOptions {
  absentCameras?: CameraId[];
  absentLights?: LightPort[];
  grabDelayMs?: number;
}

export interface TestRig {
  cameras: Map<CameraId, MockCameraAdapter>;
  lights: Map<LightPort, MockLightAdapter>;
  createCamera: (id: CameraId) => MockCameraAdapter;
  createLight: (port: LightPort) => MockLightAdapter;
}

/**
 * Small (64x48) mock cameras and mock lights, kept for inspection
 */
export function createTestRig(options: TestRigOptions = {}): TestRig {
  const cameras = new Map<CameraId, MockCameraAdapter>();
  const lights = new Map<LightPort, MockLightAdapter>();

  return {
    cameras,
    lights,
    createCamera: (id) => {
      const camera = new MockCameraAdapter(id, {
        width: 64,
        height: 48,
        present: !options.absentCameras?.includes(id),
        grabDelayMs: options.grabDelayMs,
      });
      cameras.set(id, camera);
      return camera;
    },
    createLight: (port) => {
      const light = new MockLightAdapter(port, {
        present: !options.absentLights?.includes(port),
      });
      lights.set(port, light);
      return light;
    },
  };
}

export function createTestRegistry(
  rig: TestRig,
  config: Env = testConfig(),
): DeviceRegistry {
  return new DeviceRegistry({
    cameraIds: config.cameraIds,
    lightPorts: config.lightPorts,
    createCamera: rig.createCamera,
    createLight: rig.createLight,
    grabTimeoutMs: config.grabTimeoutMs,
    lightTimeoutMs: config.lightTimeoutMs,
    retryIntervalMs: config.deviceRetryIntervalMs,
    fallbackWidth: config.fallbackWidth,
    fallbackHeight: config.fallbackHeight,
  });
}

export interface MemoryWriter {
  writeFrame: FrameWriter;
  writes: Array<{ filePath: string; frame: Frame }>;
  /** Make writes for these cameras reject */
  failFor: Set<CameraId>;
}

export function createMemoryWriter(): MemoryWriter {
  const writes: MemoryWriter["writes"] = [];
  const failFor = new Set<CameraId>();
  return {
    writes,
    failFor,
    writeFrame: async (frame, filePath) => {
      if (failFor.has(frame.cameraId)) {
        throw new Error("disk full");
      }
      writes.push({ filePath, frame });
    },
  };
}

export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
