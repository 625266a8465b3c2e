/**
 * Serial Light Adapter
 * Drives one light controller over RS-232 (9600 8N1 by default).
 */

import { SerialPort } from "serialport";
import type { LightPort } from "@visionrig/types";
import { DeviceUnavailableError } from "../../errors";
import { encodeBrightnessPacket } from "../light-protocol";
import { deviceLogger } from "../logger";
import type { LightAdapter } from "../types";

export interface SerialLightOptions {
  baudRate?: number;
}

export class SerialLightAdapter implements LightAdapter {
  readonly port: LightPort;
  private readonly baudRate: number;
  private serial: SerialPort | null = null;

  constructor(port: LightPort, options: SerialLightOptions = {}) {
    this.port = port;
    this.baudRate = options.baudRate ?? 9600;
  }

  async open(): Promise<void> {
    if (this.serial?.isOpen) {
      return;
    }

    const serial = new SerialPort({
      path: this.port,
      baudRate: this.baudRate,
      dataBits: 8,
      parity: "none",
      stopBits: 1,
      autoOpen: false,
    });

    await new Promise<void>((resolve, reject) => {
      serial.open((err) => {
        if (err) reject(err);
        else resolve();
      });
    });

    serial.on("error", (err: Error) => {
      deviceLogger.warn(`SerialLight ${this.port}: Port error`, {
        error: err.message,
      });
    });

    serial.on("close", () => {
      deviceLogger.warn(`SerialLight ${this.port}: Port closed`);
      if (this.serial === serial) {
        this.serial = null;
      }
    });

    this.serial = serial;
    deviceLogger.info(`SerialLight ${this.port}: Connected`, {
      baudRate: this.baudRate,
    });
  }

  async close(): Promise<void> {
    const serial = this.serial;
    this.serial = null;
    if (!serial?.isOpen) {
      return;
    }
    await new Promise<void>((resolve) => {
      serial.close((err) => {
        if (err) {
          deviceLogger.debug(`SerialLight ${this.port}: Close error`, {
            error: err.message,
          });
        }
        resolve();
      });
    });
  }

  isOpen(): boolean {
    return this.serial?.isOpen ?? false;
  }

  async writeBrightness(value: number): Promise<void> {
    const serial = this.serial;
    if (!serial?.isOpen) {
      throw new DeviceUnavailableError(`Light port ${this.port} not open`, {
        operation: "writeBrightness",
        deviceId: this.port,
      });
    }

    const packet = encodeBrightnessPacket(value);

    await new Promise<void>((resolve, reject) => {
      serial.write(packet, (err) => {
        if (err) {
          reject(err);
          return;
        }
        serial.drain((drainErr) => {
          if (drainErr) reject(drainErr);
          else resolve();
        });
      });
    });

    deviceLogger.debug(`SerialLight ${this.port}: Sent`, {
      value,
      packet: packet.toString("hex").toUpperCase(),
    });
  }
}
