/**
 * Preview Feed
 *
 * Streams downscaled JPEG previews of every target camera to any number of
 * viewers. The loop only runs while at least one viewer is attached.
 *
 * Critical invariants:
 * - Preview never waits for a device: it uses ResourceArbiter.tryExclusive
 *   and falls back to the last known frame (or the black fallback) when a
 *   capture holds the camera
 * - A viewer whose send() throws is removed; the others keep receiving
 * - A new viewer immediately receives the most recent message
 */

import sharp from "sharp";
import { nanoid } from "nanoid";
import { PREVIEW } from "@visionrig/config";
import { createLogger } from "@visionrig/utils";
import type {
  CameraId,
  PreviewCamera,
  PreviewMessage,
  SaveMode,
} from "@visionrig/types";
import { cameraKey, type ResourceArbiter } from "../devices/arbiter";
import type { DeviceRegistry } from "../devices/registry";
import { delay } from "../devices/timeout";
import type { Frame } from "../devices/types";
import { errorMessage } from "../errors";
import type { SettingsStore } from "./settings-store";

const logger = createLogger("preview-feed");

export interface PreviewViewer {
  /** Deliver one message; throwing detaches the viewer */
  send(message: PreviewMessage): void;
}

export interface PreviewFeedOptions {
  registry: DeviceRegistry;
  arbiter: ResourceArbiter;
  settings: SettingsStore;
  /** Cameras the given save mode stores */
  selectCameras: (saveMode: SaveMode) => CameraId[];
  fps: number;
  previewWidth: number;
  jpegQuality?: number;
}

type EncodedPreview = Omit<PreviewCamera, "status" | "willSave">;

export class PreviewFeed {
  private readonly viewers = new Map<string, PreviewViewer>();
  private readonly options: PreviewFeedOptions;
  private readonly intervalMs: number;
  // Fallback and cached frames share buffers, so they are encoded once
  private readonly encoded = new WeakMap<Buffer, EncodedPreview>();

  private latest: PreviewMessage | null = null;
  private sequence = 0;
  private loopRunning = false;
  private loopTask: Promise<void> | null = null;
  private stopped = false;

  constructor(options: PreviewFeedOptions) {
    this.options = options;
    this.intervalMs = 1000 / Math.max(1, options.fps);
  }

  get viewerCount(): number {
    return this.viewers.size;
  }

  get isRunning(): boolean {
    return this.loopRunning;
  }

  getLatest(): PreviewMessage | null {
    return this.latest;
  }

  /**
   * Attach a viewer and start the loop if needed. Returns the viewer id.
   */
  addViewer(viewer: PreviewViewer): string {
    const id = nanoid();
    this.viewers.set(id, viewer);
    this.stopped = false;
    logger.info(`Preview viewer added: ${id} (total: ${this.viewers.size})`);

    if (this.latest && !this.deliver(id, viewer, this.latest)) {
      return id;
    }

    this.startLoop();
    return id;
  }

  removeViewer(id: string): void {
    if (this.viewers.delete(id)) {
      logger.info(
        `Preview viewer removed: ${id} (total: ${this.viewers.size})`,
      );
    }
  }

  /**
   * The feed as an async iterable. Slow consumers only see the newest
   * message. Ends when the signal aborts.
   */
  async *subscribe(signal?: AbortSignal): AsyncGenerator<PreviewMessage> {
    if (signal?.aborted) {
      return;
    }

    let pending: PreviewMessage | null = null;
    let wake: (() => void) | null = null;

    const onAbort = () => wake?.();
    signal?.addEventListener("abort", onAbort, { once: true });

    const id = this.addViewer({
      send: (message) => {
        pending = message;
        wake?.();
      },
    });

    const take = (): PreviewMessage | null => {
      const message = pending;
      pending = null;
      return message;
    };

    try {
      while (!signal?.aborted) {
        const message = take();
        if (message) {
          yield message;
          continue;
        }
        await new Promise<void>((resolve) => {
          wake = resolve;
        });
        wake = null;
      }
    } finally {
      signal?.removeEventListener("abort", onAbort);
      this.removeViewer(id);
    }
  }

  /**
   * Build one preview message from every target camera
   */
  async tick(): Promise<PreviewMessage> {
    const settings = this.options.settings.get();
    const saved = new Set(this.options.selectCameras(settings.saveMode));
    const targets = this.options.registry.listTargets();

    const entries = await Promise.all(
      targets.map(async (id): Promise<[string, PreviewCamera]> => {
        const frame = await this.frameFor(id);
        const image = await this.encode(frame);
        return [
          String(id),
          { ...image, status: frame.status, willSave: saved.has(id) },
        ];
      }),
    );

    this.sequence += 1;
    return {
      type: "preview",
      sequence: this.sequence,
      cameras: Object.fromEntries(entries),
      timestamp: new Date().toISOString(),
    };
  }

  /**
   * Send a message to every viewer, dropping the ones that fail
   */
  broadcast(message: PreviewMessage): void {
    this.latest = message;
    for (const [id, viewer] of [...this.viewers]) {
      this.deliver(id, viewer, message);
    }
  }

  /**
   * Detach every viewer and wait for the loop to exit
   */
  async stop(): Promise<void> {
    this.stopped = true;
    this.loopRunning = false;
    this.viewers.clear();
    if (this.loopTask) {
      await this.loopTask;
    }
    logger.info("Preview feed stopped");
  }

  private deliver(
    id: string,
    viewer: PreviewViewer,
    message: PreviewMessage,
  ): boolean {
    try {
      viewer.send(message);
      return true;
    } catch (error) {
      this.viewers.delete(id);
      logger.info(`Dead preview viewer removed: ${id}`, {
        error: errorMessage(error),
      });
      return false;
    }
  }

  private async frameFor(id: CameraId): Promise<Frame> {
    const { registry, arbiter } = this.options;
    const result = await arbiter.tryExclusive(
      [cameraKey(id)],
      () => registry.acquireFrame(id),
      { operation: "preview" },
    );
    return result.acquired ? result.value : registry.getCachedFrame(id);
  }

  private async encode(frame: Frame): Promise<EncodedPreview> {
    const cached = this.encoded.get(frame.image.data);
    if (cached) {
      return cached;
    }

    const { data, info } = await sharp(frame.image.data, {
      raw: {
        width: frame.image.width,
        height: frame.image.height,
        channels: frame.image.channels,
      },
    })
      .resize({ width: this.options.previewWidth, withoutEnlargement: true })
      .jpeg({ quality: this.options.jpegQuality ?? PREVIEW.JPEG_QUALITY })
      .toBuffer({ resolveWithObject: true });

    const encoded: EncodedPreview = {
      image: data.toString("base64"),
      width: info.width,
      height: info.height,
    };
    this.encoded.set(frame.image.data, encoded);
    return encoded;
  }

  private startLoop(): void {
    if (this.loopRunning || this.stopped) {
      return;
    }
    this.loopRunning = true;
    logger.info("Preview loop started");
    this.loopTask = this.runLoop();
  }

  private async runLoop(): Promise<void> {
    let frames = 0;
    let errors = 0;

    while (this.loopRunning && this.viewers.size > 0) {
      const started = Date.now();
      try {
        this.broadcast(await this.tick());
        frames++;
      } catch (error) {
        errors++;
        logger.error("Preview tick failed", { error: errorMessage(error) });
      }
      await delay(this.intervalMs - (Date.now() - started));
    }

    this.loopRunning = false;
    this.loopTask = null;
    logger.info(`Preview loop ended: ${frames} frames, ${errors} errors`);

    // A viewer may have attached while the loop was winding down
    if (this.viewers.size > 0) {
      this.startLoop();
    }
  }
}
