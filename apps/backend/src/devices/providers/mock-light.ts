/**
 * Mock Light Adapter
 * Records written brightness values instead of driving a serial port.
 */

import type { LightPort } from "@visionrig/types";
import { DeviceUnavailableError } from "../../errors";
import { deviceLogger } from "../logger";
import type { LightAdapter } from "../types";

export interface MockLightOptions {
  present?: boolean;
  writeDelayMs?: number;
}

export class MockLightAdapter implements LightAdapter {
  readonly port: LightPort;
  private present: boolean;
  private writeDelayMs: number;
  private opened = false;
  private readonly written: number[] = [];

  constructor(port: LightPort, options: MockLightOptions = {}) {
    this.port = port;
    this.present = options.present ?? true;
    this.writeDelayMs = options.writeDelayMs ?? 0;
  }

  async open(): Promise<void> {
    if (!this.present) {
      throw new DeviceUnavailableError(`Mock light ${this.port} not present`, {
        operation: "open",
        deviceId: this.port,
      });
    }
    this.opened = true;
  }

  async close(): Promise<void> {
    this.opened = false;
  }

  isOpen(): boolean {
    return this.opened && this.present;
  }

  async writeBrightness(value: number): Promise<void> {
    if (this.writeDelayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.writeDelayMs));
    }
    if (!this.isOpen()) {
      this.opened = false;
      throw new DeviceUnavailableError(`Mock light ${this.port} not open`, {
        operation: "writeBrightness",
        deviceId: this.port,
      });
    }
    this.written.push(value);
    deviceLogger.debug(`MockLight ${this.port}: brightness ${value}`);
  }

  // Test helpers

  setPresent(present: boolean): void {
    this.present = present;
  }

  getWrittenValues(): number[] {
    return [...this.written];
  }
}
