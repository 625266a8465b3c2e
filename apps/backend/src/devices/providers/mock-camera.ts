/**
 * Mock Camera Adapter
 * Produces deterministic synthetic frames for development and testing.
 * Presence and grab failures can be toggled at runtime.
 */

import type { CameraId } from "@visionrig/types";
import { DeviceUnavailableError } from "../../errors";
import { deviceLogger } from "../logger";
import type { CameraAdapter, RawImage } from "../types";

export interface MockCameraOptions {
  width?: number;
  height?: number;
  /** Whether the camera is plugged in */
  present?: boolean;
  /** Make every grab reject */
  failGrabs?: boolean;
  /** Simulated grab latency */
  grabDelayMs?: number;
}

export class MockCameraAdapter implements CameraAdapter {
  readonly id: CameraId;
  private readonly width: number;
  private readonly height: number;
  private present: boolean;
  private failGrabs: boolean;
  private grabDelayMs: number;
  private opened = false;
  private grabCount = 0;

  constructor(id: CameraId, options: MockCameraOptions = {}) {
    this.id = id;
    this.width = options.width ?? 640;
    this.height = options.height ?? 480;
    this.present = options.present ?? true;
    this.failGrabs = options.failGrabs ?? false;
    this.grabDelayMs = options.grabDelayMs ?? 0;
  }

  async open(): Promise<void> {
    if (!this.present) {
      throw new DeviceUnavailableError(`Mock camera ${this.id} not present`, {
        operation: "open",
        deviceId: this.id,
      });
    }
    this.opened = true;
    deviceLogger.debug(`MockCamera ${this.id}: Opened`);
  }

  async close(): Promise<void> {
    this.opened = false;
  }

  isOpen(): boolean {
    return this.opened && this.present;
  }

  async grab(): Promise<RawImage> {
    if (this.grabDelayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.grabDelayMs));
    }

    if (!this.present) {
      this.opened = false;
    }

    if (!this.isOpen()) {
      throw new DeviceUnavailableError(`Mock camera ${this.id} not open`, {
        operation: "grab",
        deviceId: this.id,
      });
    }

    if (this.failGrabs) {
      throw new Error(`Mock camera ${this.id} grab failed`);
    }

    this.grabCount++;
    return this.renderGradient();
  }

  // Test helpers

  setPresent(present: boolean): void {
    this.present = present;
  }

  setFailGrabs(fail: boolean): void {
    this.failGrabs = fail;
  }

  getGrabCount(): number {
    return this.grabCount;
  }

  /**
   * Diagonal gradient offset by camera id, identical on every grab
   */
  private renderGradient(): RawImage {
    const data = Buffer.alloc(this.width * this.height * 3);
    const offset = this.id * 40;
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        const i = (y * this.width + x) * 3;
        const value = (x + y + offset) % 256;
        data[i] = value;
        data[i + 1] = (value + 85) % 256;
        data[i + 2] = (value + 170) % 256;
      }
    }
    return { data, width: this.width, height: this.height, channels: 3 };
  }
}
