import type { CameraId } from "@visionrig/types";
import type { Frame, RawImage } from "./types";

const blackImages = new Map<string, RawImage>();

/**
 * Black RGB image of the given size. One shared buffer per size; consumers
 * never write into frame buffers.
 */
export function blackImage(width: number, height: number): RawImage {
  const key = `${width}x${height}`;
  let image = blackImages.get(key);
  if (!image) {
    image = {
      data: Buffer.alloc(width * height * 3),
      width,
      height,
      channels: 3,
    };
    blackImages.set(key, image);
  }
  return image;
}

export function createFallbackFrame(
  cameraId: CameraId,
  width: number,
  height: number,
  timestamp: number = Date.now(),
): Frame {
  return {
    cameraId,
    image: blackImage(width, height),
    timestamp,
    status: "fallback",
  };
}
