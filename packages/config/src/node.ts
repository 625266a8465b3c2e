/**
 * Node.js-specific configuration helpers
 * These require Node.js environment (process.env access)
 */

// ============================================================================
// Paths Configuration (defaults, relative to the working directory)
// ============================================================================

export const PATHS = {
  /** Captured frames root */
  CAPTURES: "./captured_images",
  /** Persisted settings snapshot */
  SETTINGS_FILE: "./data/settings.json",
  /** Log files */
  LOGS: "./logs",
} as const;

// ============================================================================
// Environment Detection
// ============================================================================

export function isDevelopment(): boolean {
  return process.env.NODE_ENV === "development";
}
