/**
 * Sidecar Camera Adapter
 *
 * Talks to the vendor-SDK camera service over HTTP. The service owns the
 * SDK session and exposes one camera per index:
 *   POST /cameras/:id/open
 *   POST /cameras/:id/close
 *   GET  /cameras/:id/frame   -> raw RGB bytes, X-Frame-Width / X-Frame-Height
 */

import type { CameraId } from "@visionrig/types";
import { DeviceUnavailableError } from "../../errors";
import { deviceLogger } from "../logger";
import type { CameraAdapter, RawImage } from "../types";

export interface SidecarCameraOptions {
  baseUrl: string;
  /** Per-request timeout; the registry applies its own bound on top */
  requestTimeoutMs?: number;
}

export class SidecarCameraAdapter implements CameraAdapter {
  readonly id: CameraId;
  private readonly baseUrl: string;
  private readonly requestTimeoutMs: number;
  private opened = false;

  constructor(id: CameraId, options: SidecarCameraOptions) {
    this.id = id;
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.requestTimeoutMs = options.requestTimeoutMs ?? 2000;
  }

  async open(): Promise<void> {
    const response = await this.request("POST", "open");
    if (!response.ok) {
      throw new DeviceUnavailableError(
        `Camera ${this.id} open failed: HTTP ${response.status}`,
        { operation: "open", deviceId: this.id },
      );
    }
    this.opened = true;
    deviceLogger.info(`SidecarCamera ${this.id}: Opened`);
  }

  async close(): Promise<void> {
    if (!this.opened) {
      return;
    }
    this.opened = false;
    try {
      await this.request("POST", "close");
    } catch (error) {
      deviceLogger.debug(`SidecarCamera ${this.id}: Close error (ignored)`, {
        error,
      });
    }
  }

  isOpen(): boolean {
    return this.opened;
  }

  async grab(): Promise<RawImage> {
    if (!this.opened) {
      throw new DeviceUnavailableError(`Camera ${this.id} not open`, {
        operation: "grab",
        deviceId: this.id,
      });
    }

    let response: Response;
    try {
      response = await this.request("GET", "frame");
    } catch (error) {
      // Service unreachable: force a re-open on next access
      this.opened = false;
      throw error;
    }

    if (response.status === 404 || response.status === 410) {
      this.opened = false;
      throw new DeviceUnavailableError(`Camera ${this.id} disconnected`, {
        operation: "grab",
        deviceId: this.id,
      });
    }

    if (!response.ok) {
      throw new Error(`Camera ${this.id} grab failed: HTTP ${response.status}`);
    }

    const width = parseInt(response.headers.get("x-frame-width") ?? "", 10);
    const height = parseInt(response.headers.get("x-frame-height") ?? "", 10);
    const data = Buffer.from(await response.arrayBuffer());

    if (!(width > 0 && height > 0) || data.length !== width * height * 3) {
      throw new Error(
        `Camera ${this.id} returned a malformed frame (${width}x${height}, ${data.length} bytes)`,
      );
    }

    return { data, width, height, channels: 3 };
  }

  private request(method: "GET" | "POST", action: string): Promise<Response> {
    return fetch(`${this.baseUrl}/cameras/${this.id}/${action}`, {
      method,
      signal: AbortSignal.timeout(this.requestTimeoutMs),
    });
  }
}
