/**
 * Device module type definitions
 */

import type {
  CameraId,
  FrameStatus,
  LightPort,
} from "@visionrig/types";

/**
 * Raw interleaved RGB pixels, 8 bits per channel
 */
export interface RawImage {
  data: Buffer;
  width: number;
  height: number;
  channels: 3;
}

/**
 * A frame handed from the registry to a consumer.
 * Consumers copy or encode it; nobody mutates `image.data`.
 */
export interface Frame {
  cameraId: CameraId;
  image: RawImage;
  /** Epoch milliseconds */
  timestamp: number;
  status: FrameStatus;
}

/**
 * Camera adapter interface
 * The narrow capability surface the core needs from a camera driver
 */
export interface CameraAdapter {
  readonly id: CameraId;

  /**
   * Open the camera and start grabbing
   */
  open(): Promise<void>;

  /**
   * Stop grabbing and release the camera
   */
  close(): Promise<void>;

  isOpen(): boolean;

  /**
   * Grab the latest frame
   */
  grab(): Promise<RawImage>;
}

/**
 * Light controller adapter interface
 */
export interface LightAdapter {
  readonly port: LightPort;

  open(): Promise<void>;

  close(): Promise<void>;

  isOpen(): boolean;

  /**
   * Write a brightness value (already clamped to 0-255)
   */
  writeBrightness(value: number): Promise<void>;
}

export type CameraAdapterFactory = (id: CameraId) => CameraAdapter;
export type LightAdapterFactory = (port: LightPort) => LightAdapter;

/**
 * Result of a brightness write across light ports
 */
export interface BrightnessResult {
  /** Value actually sent, after clamping */
  value: number;
  appliedPorts: LightPort[];
  unavailablePorts: LightPort[];
}

/**
 * Device lock key used by the resource arbiter, e.g. "camera:1" or "light"
 */
export type DeviceKey = string;
