/**
 * Shared configuration constants for the VisionRig capture system
 */

// ============================================================================
// Service Ports
// ============================================================================

export const PORTS = {
  BACKEND: 8000,
} as const;

// ============================================================================
// API Endpoints
// ============================================================================

export const API_ENDPOINTS = {
  HEALTH: "/health",
  STATUS: "/api/status",
  SETTINGS: "/api/settings",
  SETTINGS_RELOAD: "/api/settings/reload",
  LIGHT: "/api/light",
  CAPTURE: "/api/capture",
  SEQUENCE: "/api/sequence",
  SEQUENCE_CANCEL: "/api/sequence/cancel",

  // WebSocket
  WS_PREVIEW: "/ws/preview",
} as const;

export const ENDPOINTS = API_ENDPOINTS;

// ============================================================================
// Application Constants
// ============================================================================

export const APP_CONFIG = {
  APP_NAME: "VisionRig",
  APP_VERSION: "0.1.0",
} as const;

// ============================================================================
// Rig Defaults
// ============================================================================

export const RIG_DEFAULTS = {
  /** Camera indices the rig is wired for */
  CAMERA_IDS: [1, 2, 3, 4],
  /** Camera stored in its own directory tree and filtered by save mode */
  DESIGNATED_CAMERA_ID: 3,
  LIGHT_PORTS: ["COM2", "COM8", "COM9", "COM10"],
  LIGHT_BAUD_RATE: 9600,
} as const;

export const TIMING = {
  /** Bounded wait for a single frame grab */
  GRAB_TIMEOUT_MS: 1000,
  /** Bounded wait for a brightness write on one port */
  LIGHT_TIMEOUT_MS: 500,
  /** Minimum gap between re-open attempts of an absent device */
  DEVICE_RETRY_INTERVAL_MS: 5000,
  /** Wait after changing brightness before grabbing */
  SEQUENCE_SETTLE_MS: 500,
  /** Wait after each sequence step */
  SEQUENCE_STEP_GAP_MS: 200,
} as const;

export const PREVIEW = {
  FPS: 30,
  /** Preview frames are downscaled to this width */
  WIDTH: 400,
  JPEG_QUALITY: 85,
} as const;

export const FALLBACK_FRAME = {
  WIDTH: 400,
  HEIGHT: 300,
} as const;

export const BRIGHTNESS = {
  MIN: 0,
  MAX: 255,
} as const;

export const DEFAULT_SETTINGS = {
  product: "ModelA",
  condition: "Test_A",
  shotNumber: 1,
  saveMode: "all",
  lightValue: 100,
  sequenceStart: 30,
  sequenceEnd: 120,
  sequenceStep: 10,
  sequenceDirection: "forward",
} as const;

// ============================================================================
// Environment Variable Keys
// ============================================================================

export const ENV_KEYS = {
  NODE_ENV: "NODE_ENV",
  LOG_LEVEL: "LOG_LEVEL",
  LOG_SILENT: "LOG_SILENT",

  PORT: "PORT",
  HOST: "HOST",

  CAMERA_IDS: "CAMERA_IDS",
  CAMERA_PROVIDER: "CAMERA_PROVIDER",
  CAMERA_SIDECAR_URL: "CAMERA_SIDECAR_URL",
  DESIGNATED_CAMERA_ID: "DESIGNATED_CAMERA_ID",

  LIGHT_PORTS: "LIGHT_PORTS",
  LIGHT_PROVIDER: "LIGHT_PROVIDER",
  LIGHT_BAUD_RATE: "LIGHT_BAUD_RATE",

  SAVE_PATH: "SAVE_PATH",
  SETTINGS_FILE: "SETTINGS_FILE",

  GRAB_TIMEOUT_MS: "GRAB_TIMEOUT_MS",
  LIGHT_TIMEOUT_MS: "LIGHT_TIMEOUT_MS",
  DEVICE_RETRY_INTERVAL_MS: "DEVICE_RETRY_INTERVAL_MS",
  SEQUENCE_SETTLE_MS: "SEQUENCE_SETTLE_MS",
  SEQUENCE_STEP_GAP_MS: "SEQUENCE_STEP_GAP_MS",

  PREVIEW_FPS: "PREVIEW_FPS",
  PREVIEW_WIDTH: "PREVIEW_WIDTH",
  FALLBACK_WIDTH: "FALLBACK_WIDTH",
  FALLBACK_HEIGHT: "FALLBACK_HEIGHT",
} as const;

// ============================================================================
// HTTP Status Codes
// ============================================================================

export const HTTP_STATUS = {
  OK: 200,
  CREATED: 201,
  ACCEPTED: 202,
  NO_CONTENT: 204,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  CONFLICT: 409,
  INTERNAL_SERVER_ERROR: 500,
  SERVICE_UNAVAILABLE: 503,
} as const;

// ============================================================================
// Messages
// ============================================================================

export const ERROR_MESSAGES = {
  INTERNAL_ERROR: "An internal error occurred",
  PRODUCT_REQUIRED: "Product name and inspection condition are required",
  SEQUENCE_RUNNING: "A sequence is already running",
  SEQUENCE_NOT_FINISHED: "The current sequence has not finished",
  LIGHT_UNAVAILABLE: "No light controller could be reached",
} as const;

export const SUCCESS_MESSAGES = {
  SEQUENCE_STARTED: "Sequence capture started",
  LIGHT_APPLIED: "Light brightness applied",
} as const;
