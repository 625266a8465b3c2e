/**
 * Device Adapter Factory
 * Creates camera and light adapters based on configuration
 */

import type { CameraId, LightPort } from "@visionrig/types";
import type { Env } from "../../config/env";
import { deviceLogger } from "../logger";
import type {
  CameraAdapter,
  CameraAdapterFactory,
  LightAdapter,
  LightAdapterFactory,
} from "../types";
import { MockCameraAdapter } from "./mock-camera";
import { MockLightAdapter } from "./mock-light";
import { SerialLightAdapter } from "./serial-light";
import { SidecarCameraAdapter } from "./sidecar-camera";

type FactoryConfig = Pick<
  Env,
  | "cameraProvider"
  | "cameraSidecarUrl"
  | "grabTimeoutMs"
  | "lightProvider"
  | "lightBaudRate"
>;

export function createCameraAdapterFactory(
  config: FactoryConfig,
): CameraAdapterFactory {
  deviceLogger.info("DeviceFactory: Camera provider", {
    type: config.cameraProvider,
  });

  switch (config.cameraProvider) {
    case "sidecar":
      return (id: CameraId): CameraAdapter =>
        new SidecarCameraAdapter(id, {
          baseUrl: config.cameraSidecarUrl,
          requestTimeoutMs: config.grabTimeoutMs,
        });

    case "mock":
      return (id: CameraId): CameraAdapter => new MockCameraAdapter(id);
  }
}

export function createLightAdapterFactory(
  config: FactoryConfig,
): LightAdapterFactory {
  deviceLogger.info("DeviceFactory: Light provider", {
    type: config.lightProvider,
  });

  switch (config.lightProvider) {
    case "serial":
      return (port: LightPort): LightAdapter =>
        new SerialLightAdapter(port, { baudRate: config.lightBaudRate });

    case "mock":
      return (port: LightPort): LightAdapter => new MockLightAdapter(port);
  }
}

export function getProviderDisplayName(
  type: FactoryConfig["cameraProvider"] | FactoryConfig["lightProvider"],
): string {
  switch (type) {
    case "sidecar":
      return "Industrial cameras (SDK sidecar service)";
    case "serial":
      return "Light controllers (serial)";
    case "mock":
      return "Mock/Simulated devices";
  }
}
