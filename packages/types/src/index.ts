// ============================================================================
// Device Types
// ============================================================================

/**
 * Camera index as wired on the rig (1-based)
 */
export type CameraId = number;

/**
 * Serial port name of a light controller, e.g. "COM2" or "/dev/ttyUSB0"
 */
export type LightPort = string;

export type DeviceConnectivity = 'connected' | 'absent';

/**
 * - live: grabbed from the camera
 * - fallback: deterministic black placeholder (camera absent or unreachable)
 */
export type FrameStatus = 'live' | 'fallback';

export interface CameraDeviceStatus {
  id: CameraId;
  status: DeviceConnectivity;
  lastSeenAt: string | null;
  lastError: string | null;
  lastFrameStatus: FrameStatus | null;
}

export interface LightDeviceStatus {
  port: LightPort;
  status: DeviceConnectivity;
  lastSeenAt: string | null;
  lastError: string | null;
  /** Last brightness successfully written to this port */
  brightness: number | null;
}

// ============================================================================
// Settings
// ============================================================================

/**
 * Which cameras take part in a capture
 * - all: every target camera
 * - exclude-designated: every camera except the designated one
 * - designated-only: only the designated camera
 */
export type SaveMode = 'all' | 'exclude-designated' | 'designated-only';

export type SequenceDirection = 'forward' | 'reverse';

export interface Settings {
  product: string;
  condition: string;
  /** Monotonic counter, only lowered by an explicit update or reset */
  shotNumber: number;
  savePath: string;
  saveMode: SaveMode;
  /** Current light brightness, 0-255 */
  lightValue: number;
  // Last sequence parameters used
  sequenceStart: number;
  sequenceEnd: number;
  sequenceStep: number;
  sequenceDirection: SequenceDirection;
}

export type SettingsUpdate = Partial<Settings>;

// ============================================================================
// Capture Types
// ============================================================================

export interface CaptureOverrides {
  product?: string;
  condition?: string;
  saveMode?: SaveMode;
}

export type CameraOutcome =
  | {
      cameraId: CameraId;
      success: true;
      frameStatus: FrameStatus;
      filePath: string;
    }
  | {
      cameraId: CameraId;
      success: false;
      frameStatus: FrameStatus | null;
      error: string;
    };

export interface CaptureResult {
  /** True when every selected camera produced a file */
  success: boolean;
  shotNumber: number;
  brightness: number;
  savedCount: number;
  files: string[];
  cameras: CameraOutcome[];
  capturedAt: string;
}

// ============================================================================
// Sequence Types
// ============================================================================

export interface SequenceSpec {
  start: number;
  end: number;
  step: number;
  direction: SequenceDirection;
}

export type SequenceState =
  | 'pending'
  | 'running'
  | 'completed'
  | 'cancelled'
  | 'failed';

export interface SequenceStepResult {
  index: number;
  brightness: number;
  /** Light ports that could not be reached while setting this step */
  unavailableLights: LightPort[];
  success: boolean;
  files: string[];
  cameras: CameraOutcome[];
  finishedAt: string;
}

export interface SequenceRunSnapshot {
  id: string;
  state: SequenceState;
  spec: SequenceSpec;
  levels: number[];
  /** Index of the step currently executing or next to execute */
  currentIndex: number;
  shotNumber: number;
  steps: SequenceStepResult[];
  cancelRequested: boolean;
  createdAt: string;
  startedAt: string | null;
  finishedAt: string | null;
  error: string | null;
}

// ============================================================================
// API Types
// ============================================================================

export interface LightRequest {
  value: number;
}

export interface LightResponse {
  success: boolean;
  status: 'accepted' | 'device-unavailable';
  lightValue: number;
  appliedPorts: LightPort[];
  unavailablePorts: LightPort[];
}

export interface SequenceRequest {
  start: number;
  end: number;
  step: number;
  direction?: SequenceDirection;
}

export interface StatusResponse {
  cameras: CameraDeviceStatus[];
  lights: LightDeviceStatus[];
  camerasAvailable: boolean;
  lightsConnected: number;
  sequence: SequenceRunSnapshot | null;
  settings: Settings;
  previewViewers: number;
}

export interface ApiErrorResponse {
  success: false;
  error: string;
  message: string;
  statusCode: number;
  details?: Record<string, unknown>;
}

// ============================================================================
// Preview (WebSocket) Types
// ============================================================================

export interface PreviewCamera {
  /** Base64 JPEG */
  image: string;
  status: FrameStatus;
  /** Whether the current save mode stores this camera */
  willSave: boolean;
  width: number;
  height: number;
}

export interface PreviewMessage {
  type: 'preview';
  sequence: number;
  cameras: Record<string, PreviewCamera>;
  timestamp: string;
}
