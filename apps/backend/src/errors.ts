/**
 * Error Types
 *
 * Typed error hierarchy for the capture system.
 * All errors include structured context for debugging and logging.
 *
 * Propagation:
 * - DeviceUnavailableError / DeviceTimeoutError are absorbed by the device
 *   registry and never reach request handlers as exceptions
 * - ValidationError, ConflictError, StorageError and InternalError surface
 *   to the caller
 */

import { HTTP_STATUS } from "@visionrig/config";

// ============================================================================
// Error Context Types
// ============================================================================

export interface VisionErrorContext {
  /** Operation being performed when error occurred */
  operation: string;
  /** Device involved (camera index or light port) */
  deviceId?: string | number;
  /** Error timestamp (ISO string) */
  timestamp: string;
  /** Additional metadata */
  metadata?: Record<string, unknown>;
}

type ContextInput = Partial<Omit<VisionErrorContext, "timestamp">>;

// ============================================================================
// Base Error
// ============================================================================

export class VisionError extends Error {
  public readonly context: VisionErrorContext;
  public readonly timestamp: string;
  public readonly code: string = "VisionError";

  constructor(message: string, context: ContextInput & { operation: string }) {
    super(message);
    this.name = "VisionError";
    this.timestamp = new Date().toISOString();
    this.context = {
      ...context,
      timestamp: this.timestamp,
    };

    // Ensure prototype chain is correct
    Object.setPrototypeOf(this, VisionError.prototype);
  }

  /**
   * Get formatted error details for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      timestamp: this.timestamp,
      context: this.context,
    };
  }
}

// ============================================================================
// Device Errors (absorbed at the registry boundary)
// ============================================================================

export class DeviceUnavailableError extends VisionError {
  public readonly code = "DeviceUnavailable";

  constructor(message: string, context?: ContextInput) {
    super(message, {
      operation: context?.operation || "device",
      ...context,
    });
    this.name = "DeviceUnavailableError";
    Object.setPrototypeOf(this, DeviceUnavailableError.prototype);
  }
}

export class DeviceTimeoutError extends VisionError {
  public readonly code = "DeviceTimeout";
  public readonly timeoutMs: number;

  constructor(timeoutMs: number, context?: ContextInput) {
    super(`Device call timed out after ${timeoutMs}ms`, {
      operation: context?.operation || "device",
      ...context,
    });
    this.name = "DeviceTimeoutError";
    this.timeoutMs = timeoutMs;
    Object.setPrototypeOf(this, DeviceTimeoutError.prototype);
  }
}

// ============================================================================
// Request Errors
// ============================================================================

export class ValidationError extends VisionError {
  public readonly code = "ValidationError";
  public readonly field?: string;

  constructor(message: string, field?: string, context?: ContextInput) {
    super(message, {
      operation: context?.operation || "validate",
      ...context,
      metadata: { ...context?.metadata, ...(field ? { field } : {}) },
    });
    this.name = "ValidationError";
    this.field = field;
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export class ConflictError extends VisionError {
  public readonly code = "Conflict";

  constructor(message: string, context?: ContextInput) {
    super(message, {
      operation: context?.operation || "sequence",
      ...context,
    });
    this.name = "ConflictError";
    Object.setPrototypeOf(this, ConflictError.prototype);
  }
}

export class StorageError extends VisionError {
  public readonly code = "StorageError";
  public readonly filePath: string;

  constructor(message: string, filePath: string, context?: ContextInput) {
    super(`Storage write failed: ${message}`, {
      operation: context?.operation || "write",
      ...context,
    });
    this.name = "StorageError";
    this.filePath = filePath;
    Object.setPrototypeOf(this, StorageError.prototype);
  }
}

export class InternalError extends VisionError {
  public readonly code = "InternalError";

  constructor(message: string, context?: ContextInput) {
    super(message, {
      operation: context?.operation || "unknown",
      ...context,
    });
    this.name = "InternalError";
    Object.setPrototypeOf(this, InternalError.prototype);
  }
}

// ============================================================================
// Helpers
// ============================================================================

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap anything thrown into a VisionError, keeping typed errors as they are
 */
export function toVisionError(error: unknown, operation: string): VisionError {
  if (error instanceof VisionError) {
    return error;
  }
  return new InternalError(errorMessage(error), { operation });
}

/**
 * HTTP status for an error crossing the request boundary
 */
export function httpStatusFor(error: VisionError): number {
  if (error instanceof ValidationError) return HTTP_STATUS.BAD_REQUEST;
  if (error instanceof ConflictError) return HTTP_STATUS.CONFLICT;
  if (error instanceof DeviceUnavailableError) {
    return HTTP_STATUS.SERVICE_UNAVAILABLE;
  }
  return HTTP_STATUS.INTERNAL_SERVER_ERROR;
}
