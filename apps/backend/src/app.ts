import Fastify from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import { APP_CONFIG, ENDPOINTS, HTTP_STATUS } from "@visionrig/config";
import { createLogger } from "@visionrig/utils";
import type { ApiErrorResponse } from "@visionrig/types";
import { captureRoutes } from "./routes/capture";
import { lightRoutes } from "./routes/light";
import { sequenceRoutes } from "./routes/sequence";
import { settingsRoutes } from "./routes/settings";
import { statusRoutes } from "./routes/status";
import { getVisionCore, type VisionCore } from "./services/vision-core";

const logger = createLogger("app");

/**
 * Create and configure the Fastify application
 *
 * ROUTES MANIFEST:
 * =================
 *   GET    /health                 - Service health check
 *   GET    /api/status             - Devices, sequence, settings, viewer count
 *
 *   GET    /api/settings           - Current settings
 *   POST   /api/settings           - Validated partial update
 *   POST   /api/settings/reload    - Re-read the settings file
 *
 *   POST   /api/light              - Apply a brightness level (0-255)
 *   POST   /api/capture            - Capture every selected camera once
 *
 *   POST   /api/sequence           - Start a brightness sweep (202)
 *   GET    /api/sequence           - Current or last run
 *   POST   /api/sequence/cancel    - Stop at the next step boundary
 *   DELETE /api/sequence           - Clear a finished run
 *
 * WebSocket (attached by the server entry point):
 *   WS     /ws/preview             - Live preview frames
 */
export async function createApp(core: VisionCore = getVisionCore()) {
  const app = Fastify({
    logger: false, // We use Winston instead
  });

  await app.register(cors, {
    origin: true,
    credentials: true,
  });

  await app.register(helmet, {
    contentSecurityPolicy: false,
    crossOriginResourcePolicy: { policy: "cross-origin" },
  });

  await app.register(statusRoutes, { core });
  await app.register(settingsRoutes, { core });
  await app.register(lightRoutes, { core });
  await app.register(captureRoutes, { core });
  await app.register(sequenceRoutes, { core });

  app.get(ENDPOINTS.HEALTH, async () => {
    return {
      status: "ok",
      name: APP_CONFIG.APP_NAME,
      version: APP_CONFIG.APP_VERSION,
      timestamp: new Date().toISOString(),
      environment: core.config.nodeEnv,
      uptime: process.uptime(),
    };
  });

  // Error handler for anything the routes did not map themselves
  app.setErrorHandler((error, request, reply) => {
    const statusCode = error.statusCode ?? HTTP_STATUS.INTERNAL_SERVER_ERROR;

    logger.error("Request error:", {
      error: error.message,
      stack: error.stack,
      url: request.url,
      method: request.method,
    });

    const body: ApiErrorResponse = {
      success: false,
      error: error.name || "Internal Server Error",
      message: error.message || "An unexpected error occurred",
      statusCode,
    };
    return reply.status(statusCode).send(body);
  });

  app.setNotFoundHandler((request, reply) => {
    const body: ApiErrorResponse = {
      success: false,
      error: "Not Found",
      message: `Route ${request.method} ${request.url} not found`,
      statusCode: HTTP_STATUS.NOT_FOUND,
    };
    return reply.status(HTTP_STATUS.NOT_FOUND).send(body);
  });

  return app;
}
