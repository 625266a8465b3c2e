/**
 * Device Registry
 *
 * Owns the configured cameras and light ports, tracks connected/absent status
 * per device and absorbs every device-level failure:
 * - acquireFrame() never throws; absence, grab errors and timeouts produce
 *   the deterministic black fallback frame
 * - setBrightness() never throws; unreachable ports are reported back
 * Absent devices are re-opened lazily, at most once per retry interval.
 */

import { EventEmitter } from "events";
import type {
  CameraDeviceStatus,
  CameraId,
  DeviceConnectivity,
  LightDeviceStatus,
  LightPort,
} from "@visionrig/types";
import { errorMessage } from "../errors";
import { createFallbackFrame } from "./fallback-frame";
import { clampBrightness } from "./light-protocol";
import { deviceLogger } from "./logger";
import { withTimeout } from "./timeout";
import type {
  BrightnessResult,
  CameraAdapter,
  CameraAdapterFactory,
  Frame,
  LightAdapter,
  LightAdapterFactory,
} from "./types";

export interface DeviceRegistryOptions {
  cameraIds: readonly CameraId[];
  lightPorts: readonly LightPort[];
  createCamera: CameraAdapterFactory;
  createLight: LightAdapterFactory;
  grabTimeoutMs: number;
  lightTimeoutMs: number;
  /** Minimum gap between re-open attempts of an absent device */
  retryIntervalMs: number;
  fallbackWidth: number;
  fallbackHeight: number;
}

interface DeviceEntry {
  status: DeviceConnectivity;
  lastSeenAt: Date | null;
  lastError: string | null;
  /** Epoch ms of the last open attempt, 0 = never tried */
  lastOpenAttemptAt: number;
}

interface CameraEntry extends DeviceEntry {
  adapter: CameraAdapter;
  lastFrame: Frame | null;
}

interface LightEntry extends DeviceEntry {
  adapter: LightAdapter;
  brightness: number | null;
}

export type DeviceRegistryEvent = "device:connected" | "device:absent";

export class DeviceRegistry extends EventEmitter {
  private readonly cameras = new Map<CameraId, CameraEntry>();
  private readonly lights = new Map<LightPort, LightEntry>();
  private readonly options: DeviceRegistryOptions;
  private initialized = false;

  constructor(options: DeviceRegistryOptions) {
    super();
    this.options = options;

    const cameraIds = [...new Set(options.cameraIds)].sort((a, b) => a - b);
    for (const id of cameraIds) {
      this.cameras.set(id, {
        adapter: options.createCamera(id),
        status: "absent",
        lastSeenAt: null,
        lastError: null,
        lastOpenAttemptAt: 0,
        lastFrame: null,
      });
    }

    for (const port of new Set(options.lightPorts)) {
      this.lights.set(port, {
        adapter: options.createLight(port),
        status: "absent",
        lastSeenAt: null,
        lastError: null,
        lastOpenAttemptAt: 0,
        brightness: null,
      });
    }
  }

  /**
   * Open every device once. Failures only mark devices absent.
   */
  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }
    this.initialized = true;

    deviceLogger.info("DeviceRegistry: Opening devices", {
      cameras: this.listTargets(),
      lights: this.listLightPorts(),
    });

    await Promise.all([
      ...[...this.cameras.entries()].map(([id, entry]) =>
        this.ensureOpen(entry, `camera:${id}`),
      ),
      ...[...this.lights.entries()].map(([port, entry]) =>
        this.ensureOpen(entry, `light:${port}`),
      ),
    ]);

    const connectedCameras = this.getCameraStatuses().filter(
      (c) => c.status === "connected",
    ).length;
    const connectedLights = this.getLightStatuses().filter(
      (l) => l.status === "connected",
    ).length;

    if (connectedCameras === 0) {
      deviceLogger.warn(
        "DeviceRegistry: No camera connected, previews and captures use fallback frames",
      );
    }

    deviceLogger.info("DeviceRegistry: Initialization complete", {
      connectedCameras,
      connectedLights,
    });
  }

  async shutdown(): Promise<void> {
    const closing = [
      ...[...this.cameras.values()].map((entry) => entry.adapter.close()),
      ...[...this.lights.values()].map((entry) => entry.adapter.close()),
    ];
    const results = await Promise.allSettled(closing);
    for (const result of results) {
      if (result.status === "rejected") {
        deviceLogger.warn("DeviceRegistry: Close failed", {
          error: errorMessage(result.reason),
        });
      }
    }
    this.initialized = false;
    deviceLogger.info("DeviceRegistry: Devices closed");
  }

  listTargets(): CameraId[] {
    return [...this.cameras.keys()];
  }

  listLightPorts(): LightPort[] {
    return [...this.lights.keys()];
  }

  hasCamera(id: CameraId): boolean {
    return this.cameras.has(id);
  }

  /**
   * Grab a frame from the camera, or its fallback. Never throws.
   */
  async acquireFrame(id: CameraId): Promise<Frame> {
    const entry = this.cameras.get(id);
    if (!entry) {
      deviceLogger.warn(`DeviceRegistry: Unknown camera ${id}, using fallback`);
      return this.fallbackFrame(id);
    }

    const key = `camera:${id}`;
    if (!(await this.ensureOpen(entry, key))) {
      return this.rememberFrame(entry, this.fallbackFrame(id));
    }

    try {
      const image = await withTimeout(
        entry.adapter.grab(),
        this.options.grabTimeoutMs,
        { operation: "grab", deviceId: id },
      );
      this.markConnected(entry, key);
      return this.rememberFrame(entry, {
        cameraId: id,
        image,
        timestamp: Date.now(),
        status: "live",
      });
    } catch (error) {
      this.markAbsent(entry, key, error);
      return this.rememberFrame(entry, this.fallbackFrame(id));
    }
  }

  /**
   * Most recent frame produced for the camera without touching hardware
   */
  getCachedFrame(id: CameraId): Frame {
    return this.cameras.get(id)?.lastFrame ?? this.fallbackFrame(id);
  }

  fallbackFrame(id: CameraId): Frame {
    return createFallbackFrame(
      id,
      this.options.fallbackWidth,
      this.options.fallbackHeight,
    );
  }

  /**
   * Clamp and forward a brightness value to the light ports.
   * Unreachable ports are reported, not thrown.
   */
  async setBrightness(
    value: number,
    ports?: readonly LightPort[],
  ): Promise<BrightnessResult> {
    const clamped = clampBrightness(value);
    const targets = ports ? [...new Set(ports)] : this.listLightPorts();

    const outcomes = await Promise.all(
      targets.map(async (port) => ({
        port,
        applied: await this.writeBrightness(port, clamped),
      })),
    );

    const result: BrightnessResult = {
      value: clamped,
      appliedPorts: outcomes.filter((o) => o.applied).map((o) => o.port),
      unavailablePorts: outcomes.filter((o) => !o.applied).map((o) => o.port),
    };

    if (result.unavailablePorts.length > 0) {
      deviceLogger.warn("DeviceRegistry: Light ports unavailable", {
        value: clamped,
        unavailablePorts: result.unavailablePorts,
      });
    }

    return result;
  }

  getStatus(): {
    cameras: CameraDeviceStatus[];
    lights: LightDeviceStatus[];
  } {
    return {
      cameras: this.getCameraStatuses(),
      lights: this.getLightStatuses(),
    };
  }

  getCameraStatuses(): CameraDeviceStatus[] {
    return [...this.cameras.entries()].map(([id, entry]) => ({
      id,
      status: entry.status,
      lastSeenAt: entry.lastSeenAt?.toISOString() ?? null,
      lastError: entry.lastError,
      lastFrameStatus: entry.lastFrame?.status ?? null,
    }));
  }

  getLightStatuses(): LightDeviceStatus[] {
    return [...this.lights.entries()].map(([port, entry]) => ({
      port,
      status: entry.status,
      lastSeenAt: entry.lastSeenAt?.toISOString() ?? null,
      lastError: entry.lastError,
      brightness: entry.brightness,
    }));
  }

  private async writeBrightness(
    port: LightPort,
    value: number,
  ): Promise<boolean> {
    const entry = this.lights.get(port);
    if (!entry) {
      return false;
    }

    const key = `light:${port}`;
    if (!(await this.ensureOpen(entry, key))) {
      return false;
    }

    try {
      await withTimeout(
        entry.adapter.writeBrightness(value),
        this.options.lightTimeoutMs,
        { operation: "writeBrightness", deviceId: port },
      );
      entry.brightness = value;
      this.markConnected(entry, key);
      return true;
    } catch (error) {
      this.markAbsent(entry, key, error);
      return false;
    }
  }

  private async ensureOpen(
    entry: CameraEntry | LightEntry,
    key: string,
  ): Promise<boolean> {
    if (entry.adapter.isOpen()) {
      return true;
    }

    const now = Date.now();
    if (
      entry.lastOpenAttemptAt > 0 &&
      now - entry.lastOpenAttemptAt < this.options.retryIntervalMs
    ) {
      if (entry.status !== "absent") {
        this.markAbsent(entry, key, "not open");
      }
      return false;
    }

    entry.lastOpenAttemptAt = now;
    const timeoutMs =
      "lastFrame" in entry
        ? this.options.grabTimeoutMs
        : this.options.lightTimeoutMs;

    try {
      await withTimeout(entry.adapter.open(), timeoutMs, {
        operation: "open",
        deviceId: key,
      });
      this.markConnected(entry, key);
      return true;
    } catch (error) {
      this.markAbsent(entry, key, error);
      return false;
    }
  }

  private markConnected(entry: DeviceEntry, key: string): void {
    entry.lastSeenAt = new Date();
    entry.lastError = null;
    if (entry.status !== "connected") {
      entry.status = "connected";
      deviceLogger.info(`DeviceRegistry: ${key} connected`);
      this.emit("device:connected", { key });
    }
  }

  private markAbsent(entry: DeviceEntry, key: string, error: unknown): void {
    entry.lastError = errorMessage(error);
    if (entry.status !== "absent") {
      entry.status = "absent";
      deviceLogger.warn(`DeviceRegistry: ${key} absent`, {
        error: entry.lastError,
      });
      this.emit("device:absent", { key, error: entry.lastError });
    } else {
      deviceLogger.debug(`DeviceRegistry: ${key} still absent`, {
        error: entry.lastError,
      });
    }
  }

  private rememberFrame(entry: CameraEntry, frame: Frame): Frame {
    entry.lastFrame = frame;
    return frame;
  }
}
