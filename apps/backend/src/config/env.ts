import dotenv from "dotenv";
import {
  ENV_KEYS,
  FALLBACK_FRAME,
  PORTS,
  PREVIEW,
  RIG_DEFAULTS,
  TIMING,
} from "@visionrig/config";
import { PATHS } from "@visionrig/config/node";

// Load environment variables
dotenv.config();

export type CameraProviderType = "sidecar" | "mock";
export type LightProviderType = "serial" | "mock";

export interface Env {
  nodeEnv: string;
  port: number;
  host: string;

  cameraIds: number[];
  designatedCameraId: number;
  cameraProvider: CameraProviderType;
  cameraSidecarUrl: string;

  lightPorts: string[];
  lightProvider: LightProviderType;
  lightBaudRate: number;

  savePath: string;
  settingsFile: string | null;

  grabTimeoutMs: number;
  lightTimeoutMs: number;
  deviceRetryIntervalMs: number;
  sequenceSettleMs: number;
  sequenceStepGapMs: number;

  previewFps: number;
  previewWidth: number;
  fallbackWidth: number;
  fallbackHeight: number;

  isDevelopment: boolean;
  isProduction: boolean;
}

function readInt(key: string, fallback: number): number {
  const raw = process.env[key];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = parseInt(raw, 10);
  return Number.isNaN(value) ? fallback : value;
}

function readList(key: string, fallback: readonly string[]): string[] {
  const raw = process.env[key];
  if (raw === undefined || raw.trim() === "") {
    return [...fallback];
  }
  return raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function readCameraIds(): number[] {
  const ids = readList(
    ENV_KEYS.CAMERA_IDS,
    RIG_DEFAULTS.CAMERA_IDS.map(String),
  )
    .map((item) => parseInt(item, 10))
    .filter((id) => Number.isInteger(id) && id > 0);
  return [...new Set(ids)].sort((a, b) => a - b);
}

function readCameraProvider(): CameraProviderType {
  const value = process.env[ENV_KEYS.CAMERA_PROVIDER];
  if (value === "sidecar" || value === "mock") {
    return value;
  }
  return process.env[ENV_KEYS.CAMERA_SIDECAR_URL] ? "sidecar" : "mock";
}

function readLightProvider(): LightProviderType {
  const value = process.env[ENV_KEYS.LIGHT_PROVIDER];
  if (value === "serial" || value === "mock") {
    return value;
  }
  return "serial";
}

/**
 * Read the environment once. Exposed for tests; the app uses `env`.
 */
export function loadEnv(): Env {
  const nodeEnv = process.env[ENV_KEYS.NODE_ENV] || "development";
  const settingsFile = process.env[ENV_KEYS.SETTINGS_FILE];

  return {
    nodeEnv,
    port: readInt(ENV_KEYS.PORT, PORTS.BACKEND),
    host: process.env[ENV_KEYS.HOST] || "0.0.0.0",

    cameraIds: readCameraIds(),
    designatedCameraId: readInt(
      ENV_KEYS.DESIGNATED_CAMERA_ID,
      RIG_DEFAULTS.DESIGNATED_CAMERA_ID,
    ),
    cameraProvider: readCameraProvider(),
    cameraSidecarUrl:
      process.env[ENV_KEYS.CAMERA_SIDECAR_URL] || "http://localhost:8100",

    lightPorts: readList(ENV_KEYS.LIGHT_PORTS, RIG_DEFAULTS.LIGHT_PORTS),
    lightProvider: readLightProvider(),
    lightBaudRate: readInt(
      ENV_KEYS.LIGHT_BAUD_RATE,
      RIG_DEFAULTS.LIGHT_BAUD_RATE,
    ),

    savePath: process.env[ENV_KEYS.SAVE_PATH] || PATHS.CAPTURES,
    // An empty SETTINGS_FILE disables persistence
    settingsFile:
      settingsFile === undefined ? PATHS.SETTINGS_FILE : settingsFile || null,

    grabTimeoutMs: readInt(ENV_KEYS.GRAB_TIMEOUT_MS, TIMING.GRAB_TIMEOUT_MS),
    lightTimeoutMs: readInt(ENV_KEYS.LIGHT_TIMEOUT_MS, TIMING.LIGHT_TIMEOUT_MS),
    deviceRetryIntervalMs: readInt(
      ENV_KEYS.DEVICE_RETRY_INTERVAL_MS,
      TIMING.DEVICE_RETRY_INTERVAL_MS,
    ),
    sequenceSettleMs: readInt(
      ENV_KEYS.SEQUENCE_SETTLE_MS,
      TIMING.SEQUENCE_SETTLE_MS,
    ),
    sequenceStepGapMs: readInt(
      ENV_KEYS.SEQUENCE_STEP_GAP_MS,
      TIMING.SEQUENCE_STEP_GAP_MS,
    ),

    previewFps: readInt(ENV_KEYS.PREVIEW_FPS, PREVIEW.FPS),
    previewWidth: readInt(ENV_KEYS.PREVIEW_WIDTH, PREVIEW.WIDTH),
    fallbackWidth: readInt(ENV_KEYS.FALLBACK_WIDTH, FALLBACK_FRAME.WIDTH),
    fallbackHeight: readInt(ENV_KEYS.FALLBACK_HEIGHT, FALLBACK_FRAME.HEIGHT),

    isDevelopment: nodeEnv === "development",
    isProduction: nodeEnv === "production",
  };
}

export const env: Env = loadEnv();

/**
 * Validate environment variables
 */
export function validateEnv(config: Env = env): boolean {
  const problems: string[] = [];
  const warnings: string[] = [];

  if (config.cameraIds.length === 0) {
    problems.push(`${ENV_KEYS.CAMERA_IDS} lists no valid camera index`);
  }

  if (!config.cameraIds.includes(config.designatedCameraId)) {
    warnings.push(
      `Designated camera ${config.designatedCameraId} is not a target camera; designated-only captures will select nothing`,
    );
  }

  if (config.previewFps <= 0 || config.previewFps > 60) {
    problems.push(`${ENV_KEYS.PREVIEW_FPS} must be between 1 and 60`);
  }

  if (config.fallbackWidth <= 0 || config.fallbackHeight <= 0) {
    problems.push("Fallback frame dimensions must be positive");
  }

  if (config.isProduction && config.cameraProvider === "mock") {
    warnings.push(
      "Using mock camera provider in production - frames are synthetic",
    );
  }

  if (problems.length > 0) {
    console.warn(`Invalid configuration: ${problems.join("; ")}`);
  }

  if (warnings.length > 0) {
    console.warn("Warnings:");
    warnings.forEach((w) => console.warn(`  - ${w}`));
  }

  return problems.length === 0;
}
