/**
 * Frame Writer
 * Lays out capture files on disk and encodes raw frames as PNG.
 *
 * Layout:
 *   {savePath}/{product}/{condition}/Light_{lll}/            standard cameras
 *   {savePath}/cam{id}/{product}/{condition}/Light_{lll}/    designated camera
 * Filename: {product}_{condition}_Light_{lll}_{shot}_Cam{id}.png
 */

import fs from "fs/promises";
import path from "path";
import sharp from "sharp";
import type { CameraId } from "@visionrig/types";
import {
  formatLightLabel,
  padNumber,
  sanitizePathSegment,
} from "@visionrig/utils";
import type { Frame } from "../devices/types";
import { errorMessage, StorageError } from "../errors";

export interface FrameLocation {
  savePath: string;
  product: string;
  condition: string;
  brightness: number;
  shotNumber: number;
  cameraId: CameraId;
  designatedCameraId: CameraId;
}

export type FrameWriter = (frame: Frame, filePath: string) => Promise<void>;

export function buildFramePath(location: FrameLocation): string {
  const product = sanitizePathSegment(location.product);
  const condition = sanitizePathSegment(location.condition);
  const light = formatLightLabel(location.brightness);

  const root =
    location.cameraId === location.designatedCameraId
      ? path.join(location.savePath, `cam${location.cameraId}`)
      : location.savePath;

  const filename = [
    product,
    condition,
    light,
    padNumber(location.shotNumber, 3),
    `Cam${location.cameraId}`,
  ].join("_");

  return path.join(root, product, condition, light, `${filename}.png`);
}

/**
 * Encode the frame losslessly and write it, creating directories as needed
 */
export const writeFramePng: FrameWriter = async (frame, filePath) => {
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await sharp(frame.image.data, {
      raw: {
        width: frame.image.width,
        height: frame.image.height,
        channels: frame.image.channels,
      },
    })
      .png()
      .toFile(filePath);
  } catch (error) {
    throw new StorageError(errorMessage(error), filePath, {
      operation: "writeFrame",
      deviceId: frame.cameraId,
    });
  }
};
