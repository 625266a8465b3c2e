import fs from "fs/promises";
import os from "os";
import path from "path";
import sharp from "sharp";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { createFallbackFrame } from "../../devices/fallback-frame";
import { MockCameraAdapter } from "../../devices/providers/mock-camera";
import type { Frame } from "../../devices/types";
import { StorageError } from "../../errors";
import { buildFramePath, writeFramePng } from "../frame-writer";

const base = {
  savePath: "/captures",
  product: "ModelA",
  condition: "Test_A",
  brightness: 30,
  shotNumber: 7,
  designatedCameraId: 3,
};

describe("buildFramePath", () => {
  it("places standard cameras under the save path", () => {
    expect(buildFramePath({ ...base, cameraId: 1 })).toBe(
      "/captures/ModelA/Test_A/Light_030/ModelA_Test_A_Light_030_007_Cam1.png",
    );
  });

  it("gives the designated camera its own tree", () => {
    expect(buildFramePath({ ...base, cameraId: 3 })).toBe(
      "/captures/cam3/ModelA/Test_A/Light_030/ModelA_Test_A_Light_030_007_Cam3.png",
    );
  });

  it("keeps user names inside their own segment", () => {
    expect(
      buildFramePath({
        ...base,
        product: "../etc",
        condition: "a/b",
        cameraId: 2,
      }),
    ).toBe(
      "/captures/.._etc/a_b/Light_030/.._etc_a_b_Light_030_007_Cam2.png",
    );
  });
});

describe("writeFramePng", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "visionrig-frames-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("writes a lossless PNG, creating directories", async () => {
    const camera = new MockCameraAdapter(1, { width: 8, height: 6 });
    await camera.open();
    const frame: Frame = {
      cameraId: 1,
      image: await camera.grab(),
      timestamp: Date.now(),
      status: "live",
    };
    const filePath = path.join(dir, "ModelA", "Test_A", "frame.png");

    await writeFramePng(frame, filePath);

    const metadata = await sharp(filePath).metadata();
    expect(metadata.format).toBe("png");
    expect(metadata.width).toBe(8);
    expect(metadata.height).toBe(6);

    const { data } = await sharp(filePath)
      .raw()
      .toBuffer({ resolveWithObject: true });
    expect(data.equals(frame.image.data)).toBe(true);
  });

  it("raises StorageError when the target cannot be created", async () => {
    const blocker = path.join(dir, "blocker");
    await fs.writeFile(blocker, "not a directory");
    const filePath = path.join(blocker, "frame.png");

    const error = await writeFramePng(
      createFallbackFrame(2, 4, 4),
      filePath,
    ).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(StorageError);
    expect(error).toMatchObject({ filePath });
    expect(error instanceof Error && error.message).toMatch(
      /^Storage write failed: /,
    );
  });
});
