import { createLogger } from "@visionrig/utils";

/**
 * Device module logger
 * Separate logger for camera and light hardware access
 */
export const deviceLogger = createLogger("devices");
