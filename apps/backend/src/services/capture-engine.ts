/**
 * Capture Engine
 *
 * Single captures and automated brightness sequences.
 *
 * Critical invariants:
 * - Every hardware touch runs inside ResourceArbiter.withExclusive
 * - At most one sequence run is pending or running
 * - Cancellation takes effect at step boundaries, never mid-step
 * - Shot numbers are reserved when a capture or run starts, so no two
 *   writers ever share one; a reservation that wrote nothing is released
 * - A sequence shares one shot number across all of its steps
 * - Every brightness a sequence applies is stored as the current light value
 *
 * Events:
 * - sequence:state    SequenceRunSnapshot, on every state change
 * - sequence:step     { runId, step } after each step is recorded
 * - capture:complete  CaptureResult after captureOnce
 */

import { EventEmitter } from "events";
import { BRIGHTNESS, ERROR_MESSAGES } from "@visionrig/config";
import { createLogger, formatDuration } from "@visionrig/utils";
import type {
  CameraId,
  CameraOutcome,
  CaptureOverrides,
  CaptureResult,
  LightResponse,
  SaveMode,
  SequenceRunSnapshot,
  SequenceSpec,
  SequenceStepResult,
  Settings,
} from "@visionrig/types";
import { cameraKey, LIGHT_KEY, type ResourceArbiter } from "../devices/arbiter";
import type { DeviceRegistry } from "../devices/registry";
import { delay } from "../devices/timeout";
import {
  ConflictError,
  errorMessage,
  StorageError,
  ValidationError,
} from "../errors";
import { isRecord, readInteger, readString } from "../validation";
import { buildFramePath, writeFramePng, type FrameWriter } from "./frame-writer";
import { SequenceRun } from "./sequence";
import type { SettingsStore } from "./settings-store";

const logger = createLogger("capture");

export interface CaptureEngineOptions {
  registry: DeviceRegistry;
  arbiter: ResourceArbiter;
  settings: SettingsStore;
  designatedCameraId: CameraId;
  /** Wait after a brightness change before grabbing */
  settleMs: number;
  /** Wait after each sequence step */
  stepGapMs: number;
  writeFrame?: FrameWriter;
}

/**
 * Everything a capture needs, frozen at submission time
 */
interface CaptureRequest {
  product: string;
  condition: string;
  saveMode: SaveMode;
  savePath: string;
  shotNumber: number;
  cameras: CameraId[];
}

interface LockedCaptureResult {
  cameras: CameraOutcome[];
  files: string[];
  storageErrors: StorageError[];
}

interface TerminalState {
  state: "completed" | "cancelled" | "failed";
  error?: string;
}

interface StepExecution {
  step: SequenceStepResult;
  storageError: StorageError | null;
}

export function parseCaptureOverrides(input: unknown): CaptureOverrides {
  if (input === undefined || input === null) {
    return {};
  }
  if (!isRecord(input)) {
    throw new ValidationError("Capture request must be an object");
  }

  const overrides: CaptureOverrides = {};
  if (input.product !== undefined) {
    overrides.product = readString(input, "product");
  }
  if (input.condition !== undefined) {
    overrides.condition = readString(input, "condition");
  }
  if (input.saveMode !== undefined) {
    const saveMode = input.saveMode;
    if (
      saveMode !== "all" &&
      saveMode !== "exclude-designated" &&
      saveMode !== "designated-only"
    ) {
      throw new ValidationError(
        "saveMode must be one of: all, exclude-designated, designated-only",
        "saveMode",
      );
    }
    overrides.saveMode = saveMode;
  }
  return overrides;
}

export class CaptureEngine extends EventEmitter {
  private readonly registry: DeviceRegistry;
  private readonly arbiter: ResourceArbiter;
  private readonly settings: SettingsStore;
  private readonly designatedCameraId: CameraId;
  private readonly settleMs: number;
  private readonly stepGapMs: number;
  private readonly writeFrame: FrameWriter;

  private run: SequenceRun | null = null;
  private runTask: Promise<void> | null = null;

  constructor(options: CaptureEngineOptions) {
    super();
    this.registry = options.registry;
    this.arbiter = options.arbiter;
    this.settings = options.settings;
    this.designatedCameraId = options.designatedCameraId;
    this.settleMs = options.settleMs;
    this.stepGapMs = options.stepGapMs;
    this.writeFrame = options.writeFrame ?? writeFramePng;
  }

  /**
   * Cameras stored under the given save mode, in ascending order
   */
  selectCameras(saveMode: SaveMode): CameraId[] {
    const targets = this.registry.listTargets();
    switch (saveMode) {
      case "all":
        return targets;
      case "exclude-designated":
        return targets.filter((id) => id !== this.designatedCameraId);
      case "designated-only":
        return targets.filter((id) => id === this.designatedCameraId);
    }
  }

  /**
   * Grab every selected camera once and write the frames
   */
  async captureOnce(overrides: CaptureOverrides = {}): Promise<CaptureResult> {
    const request = this.buildRequest(this.settings.get(), overrides);
    const brightness = this.settings.get().lightValue;
    const startTime = Date.now();

    logger.info("Capture: Starting", {
      product: request.product,
      condition: request.condition,
      saveMode: request.saveMode,
      cameras: request.cameras,
    });

    const locked = await this.arbiter.withExclusive(
      request.cameras.map(cameraKey),
      async () => {
        const shotNumber = this.settings.reserveShotNumber();
        const captured = await this.captureLocked(
          { ...request, shotNumber },
          brightness,
        );
        if (captured.files.length === 0) {
          this.settings.releaseShotNumber(shotNumber);
        }
        await this.settings.flush();
        return { ...captured, shotNumber };
      },
      { operation: "capture" },
    );

    const result: CaptureResult = {
      success: locked.cameras.every((outcome) => outcome.success),
      shotNumber: locked.shotNumber,
      brightness,
      savedCount: locked.files.length,
      files: locked.files,
      cameras: locked.cameras,
      capturedAt: new Date().toISOString(),
    };

    logger.info(
      `Capture: Complete in ${formatDuration(Date.now() - startTime)}`,
      {
        shotNumber: result.shotNumber,
        savedCount: result.savedCount,
        success: result.success,
      },
    );

    this.emit("capture:complete", result);
    return result;
  }

  /**
   * Validate and apply a brightness level to every light port.
   * The level is stored in settings even when no port is reachable.
   */
  async setLight(input: unknown): Promise<LightResponse> {
    const value = readInteger(
      isRecord(input) ? input : {},
      "value",
      BRIGHTNESS.MIN,
      BRIGHTNESS.MAX,
    );

    const result = await this.arbiter.withExclusive(
      [LIGHT_KEY],
      () => this.registry.setBrightness(value),
      { operation: "setLight" },
    );
    await this.settings.update({ lightValue: result.value });

    const accepted = result.appliedPorts.length > 0;
    if (!accepted) {
      logger.warn(`Light: ${ERROR_MESSAGES.LIGHT_UNAVAILABLE}`, {
        value: result.value,
      });
    }

    return {
      success: accepted,
      status: accepted ? "accepted" : "device-unavailable",
      lightValue: result.value,
      appliedPorts: result.appliedPorts,
      unavailablePorts: result.unavailablePorts,
    };
  }

  /**
   * Start a brightness sweep in the background.
   * Throws ConflictError while another run is pending or running.
   */
  startSequence(spec: SequenceSpec): SequenceRunSnapshot {
    if (this.run?.isActive) {
      throw new ConflictError(ERROR_MESSAGES.SEQUENCE_RUNNING, {
        operation: "startSequence",
        metadata: { runId: this.run.id },
      });
    }

    const request = this.buildRequest(this.settings.get(), {});
    const run = new SequenceRun(spec, this.settings.reserveShotNumber());

    this.run = run;
    this.runTask = this.executeRun(run, {
      ...request,
      shotNumber: run.shotNumber,
    });

    logger.info("Sequence: Submitted", {
      runId: run.id,
      levels: run.levels,
      shotNumber: run.shotNumber,
    });

    return run.snapshot();
  }

  /**
   * Request cancellation of the active run. False when nothing is active.
   */
  cancelSequence(): boolean {
    const run = this.run;
    if (!run || !run.requestCancel()) {
      return false;
    }
    logger.info("Sequence: Cancel requested", { runId: run.id });
    return true;
  }

  getSequence(): SequenceRunSnapshot | null {
    return this.run?.snapshot() ?? null;
  }

  /**
   * Forget a finished run. Throws ConflictError while it is still active.
   */
  clearSequence(): boolean {
    if (!this.run) {
      return false;
    }
    if (this.run.isActive) {
      throw new ConflictError(ERROR_MESSAGES.SEQUENCE_NOT_FINISHED, {
        operation: "clearSequence",
        metadata: { runId: this.run.id },
      });
    }
    this.run = null;
    this.runTask = null;
    return true;
  }

  isSequenceActive(): boolean {
    return this.run?.isActive ?? false;
  }

  /**
   * Resolves once the current run (if any) has reached a terminal state
   */
  async waitForSequence(): Promise<SequenceRunSnapshot | null> {
    if (this.runTask) {
      await this.runTask;
    }
    return this.getSequence();
  }

  async shutdown(): Promise<void> {
    this.cancelSequence();
    await this.waitForSequence();
  }

  private buildRequest(
    snapshot: Readonly<Settings>,
    overrides: CaptureOverrides,
  ): CaptureRequest {
    const product = (overrides.product ?? snapshot.product).trim();
    const condition = (overrides.condition ?? snapshot.condition).trim();
    const saveMode = overrides.saveMode ?? snapshot.saveMode;

    if (product === "") {
      throw new ValidationError(ERROR_MESSAGES.PRODUCT_REQUIRED, "product");
    }
    if (condition === "") {
      throw new ValidationError(ERROR_MESSAGES.PRODUCT_REQUIRED, "condition");
    }

    const cameras = this.selectCameras(saveMode);
    if (cameras.length === 0) {
      throw new ValidationError(
        `Save mode ${saveMode} selects no camera`,
        "saveMode",
      );
    }

    return {
      product,
      condition,
      saveMode,
      savePath: snapshot.savePath,
      shotNumber: snapshot.shotNumber,
      cameras,
    };
  }

  /**
   * Grab and write each camera. Caller holds the camera locks.
   * Per-camera outcomes are independent; acquireFrame never throws.
   */
  private async captureLocked(
    request: CaptureRequest,
    brightness: number,
  ): Promise<LockedCaptureResult> {
    const storageErrors: StorageError[] = [];
    const cameras = await Promise.all(
      request.cameras.map(async (cameraId): Promise<CameraOutcome> => {
        const frame = await this.registry.acquireFrame(cameraId);
        const filePath = buildFramePath({
          savePath: request.savePath,
          product: request.product,
          condition: request.condition,
          brightness,
          shotNumber: request.shotNumber,
          cameraId,
          designatedCameraId: this.designatedCameraId,
        });

        try {
          await this.writeFrame(frame, filePath);
          return {
            cameraId,
            success: true,
            frameStatus: frame.status,
            filePath,
          };
        } catch (error) {
          storageErrors.push(
            error instanceof StorageError
              ? error
              : new StorageError(errorMessage(error), filePath, {
                  deviceId: cameraId,
                }),
          );
          logger.error(`Capture: Write failed for camera ${cameraId}`, {
            filePath,
            error: errorMessage(error),
          });
          return {
            cameraId,
            success: false,
            frameStatus: frame.status,
            error: errorMessage(error),
          };
        }
      }),
    );

    const files = cameras.flatMap((outcome) =>
      outcome.success ? [outcome.filePath] : [],
    );

    return { cameras, files, storageErrors };
  }

  private async executeRun(
    run: SequenceRun,
    request: CaptureRequest,
  ): Promise<void> {
    const startTime = Date.now();
    let final: TerminalState;

    try {
      final = await this.runSteps(run, request);
    } catch (error) {
      logger.error("Sequence: Failed", {
        runId: run.id,
        error: errorMessage(error),
      });
      final = { state: "failed", error: errorMessage(error) };
    }

    if (!run.hasWrittenFiles()) {
      this.settings.releaseShotNumber(run.shotNumber);
    }
    await this.settings.flush();
    this.transition(run, final.state, final.error);

    logger.info(
      `Sequence: ${run.state} after ${formatDuration(Date.now() - startTime)}`,
      { runId: run.id, steps: run.stepCount },
    );
  }

  private async runSteps(
    run: SequenceRun,
    request: CaptureRequest,
  ): Promise<TerminalState> {
    const keys = [LIGHT_KEY, ...request.cameras.map(cameraKey)];

    await this.settings.update({
      sequenceStart: run.spec.start,
      sequenceEnd: run.spec.end,
      sequenceStep: run.spec.step,
      sequenceDirection: run.spec.direction,
    });

    if (run.cancelRequested) {
      return { state: "cancelled" };
    }

    this.transition(run, "running");

    for (const [index, brightness] of run.levels.entries()) {
      const { step, storageError } = await this.arbiter.withExclusive(
        keys,
        () => this.executeStep(request, index, brightness),
        { operation: `sequence:${run.id}` },
      );

      run.recordStep(step);
      this.emit("sequence:step", { runId: run.id, step });

      logger.info(
        `Sequence: Step ${index + 1}/${run.levels.length} at ${brightness}`,
        { runId: run.id, savedCount: step.files.length },
      );

      if (storageError) {
        throw storageError;
      }

      await delay(this.stepGapMs);

      if (run.cancelRequested) {
        return { state: "cancelled" };
      }
    }

    return { state: "completed" };
  }

  private async executeStep(
    request: CaptureRequest,
    index: number,
    brightness: number,
  ): Promise<StepExecution> {
    const light = await this.registry.setBrightness(brightness);
    await this.settings.update({ lightValue: light.value });
    await delay(this.settleMs);

    const captured = await this.captureLocked(request, light.value);

    return {
      step: {
        index,
        brightness: light.value,
        unavailableLights: light.unavailablePorts,
        success: captured.cameras.every((outcome) => outcome.success),
        files: captured.files,
        cameras: captured.cameras,
        finishedAt: new Date().toISOString(),
      },
      storageError: captured.storageErrors[0] ?? null,
    };
  }

  private transition(
    run: SequenceRun,
    next: SequenceRunSnapshot["state"],
    error?: string,
  ): void {
    run.transition(next, error);
    this.emit("sequence:state", run.snapshot());
  }
}
