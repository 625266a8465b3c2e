/**
 * Vision Core
 * Builds and owns the device, capture, preview and settings services.
 */

import { PREVIEW } from "@visionrig/config";
import { createLogger } from "@visionrig/utils";
import type { StatusResponse } from "@visionrig/types";
import { env as defaultEnv, type Env } from "../config/env";
import { LIGHT_KEY, ResourceArbiter } from "../devices/arbiter";
import {
  createCameraAdapterFactory,
  createLightAdapterFactory,
  getProviderDisplayName,
} from "../devices/providers/factory";
import { DeviceRegistry } from "../devices/registry";
import type { CameraAdapterFactory, LightAdapterFactory } from "../devices/types";
import { errorMessage } from "../errors";
import { CaptureEngine } from "./capture-engine";
import type { FrameWriter } from "./frame-writer";
import { PreviewFeed } from "./preview-feed";
import { SettingsStore } from "./settings-store";

const logger = createLogger("vision-core");

export interface VisionCoreOverrides {
  createCamera?: CameraAdapterFactory;
  createLight?: LightAdapterFactory;
  writeFrame?: FrameWriter;
}

export class VisionCore {
  readonly config: Env;
  readonly arbiter: ResourceArbiter;
  readonly registry: DeviceRegistry;
  readonly settings: SettingsStore;
  readonly engine: CaptureEngine;
  readonly feed: PreviewFeed;
  private started = false;

  constructor(config: Env = defaultEnv, overrides: VisionCoreOverrides = {}) {
    this.config = config;
    this.arbiter = new ResourceArbiter();

    this.registry = new DeviceRegistry({
      cameraIds: config.cameraIds,
      lightPorts: config.lightPorts,
      createCamera: overrides.createCamera ?? createCameraAdapterFactory(config),
      createLight: overrides.createLight ?? createLightAdapterFactory(config),
      grabTimeoutMs: config.grabTimeoutMs,
      lightTimeoutMs: config.lightTimeoutMs,
      retryIntervalMs: config.deviceRetryIntervalMs,
      fallbackWidth: config.fallbackWidth,
      fallbackHeight: config.fallbackHeight,
    });

    this.settings = new SettingsStore({
      savePath: config.savePath,
      settingsFile: config.settingsFile,
    });

    this.engine = new CaptureEngine({
      registry: this.registry,
      arbiter: this.arbiter,
      settings: this.settings,
      designatedCameraId: config.designatedCameraId,
      settleMs: config.sequenceSettleMs,
      stepGapMs: config.sequenceStepGapMs,
      writeFrame: overrides.writeFrame,
    });

    this.feed = new PreviewFeed({
      registry: this.registry,
      arbiter: this.arbiter,
      settings: this.settings,
      selectCameras: (saveMode) => this.engine.selectCameras(saveMode),
      fps: config.previewFps,
      previewWidth: config.previewWidth,
      jpegQuality: PREVIEW.JPEG_QUALITY,
    });
  }

  /**
   * Load persisted settings, open devices and send the stored brightness to
   * the lights. Device failures never abort startup; absent devices serve
   * fallback frames.
   */
  async start(): Promise<void> {
    if (this.started) {
      return;
    }

    logger.info("Starting vision core", {
      cameras: getProviderDisplayName(this.config.cameraProvider),
      lights: getProviderDisplayName(this.config.lightProvider),
    });

    try {
      await this.settings.reload();
    } catch (error) {
      logger.warn("Settings file unreadable, using defaults", {
        error: errorMessage(error),
      });
    }

    await this.registry.initialize();

    const { lightValue } = this.settings.get();
    const light = await this.arbiter.withExclusive(
      [LIGHT_KEY],
      () => this.registry.setBrightness(lightValue),
      { operation: "restoreLight" },
    );
    logger.info("Light restored", {
      value: light.value,
      unavailablePorts: light.unavailablePorts,
    });

    this.started = true;
  }

  async stop(): Promise<void> {
    await this.engine.shutdown();
    await this.feed.stop();
    await this.registry.shutdown();
    await this.settings.flush();
    this.started = false;
    logger.info("Vision core stopped");
  }

  getStatus(): StatusResponse {
    const { cameras, lights } = this.registry.getStatus();
    return {
      cameras,
      lights,
      camerasAvailable: cameras.some((camera) => camera.status === "connected"),
      lightsConnected: lights.filter((light) => light.status === "connected")
        .length,
      sequence: this.engine.getSequence(),
      settings: { ...this.settings.get() },
      previewViewers: this.feed.viewerCount,
    };
  }
}

let instance: VisionCore | null = null;

export function getVisionCore(): VisionCore {
  if (!instance) {
    instance = new VisionCore();
  }
  return instance;
}
