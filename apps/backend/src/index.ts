/**
 * Backend Index - Server Entry Point
 *
 * See app.ts for the HTTP routes manifest.
 *
 * WebSocket:
 *   WS     /ws/preview                      - Live preview frames
 */

import type { FastifyInstance } from "fastify";
import type { SequenceRunSnapshot } from "@visionrig/types";
import { createLogger } from "@visionrig/utils";
import { createApp } from "./app";
import { env, validateEnv } from "./config/env";
import { errorMessage } from "./errors";
import { PreviewWebSocketServer } from "./services/preview-websocket";
import { getVisionCore } from "./services/vision-core";

const logger = createLogger("server");

let app: FastifyInstance | null = null;
let previewServer: PreviewWebSocketServer | null = null;
let serverStarted = false;

export interface ServerOptions {
  port?: number;
  host?: string;
}

export async function startServer(options: ServerOptions = {}): Promise<void> {
  if (serverStarted) {
    logger.warn("Server already started");
    return;
  }

  try {
    logger.info("Starting VisionRig Backend Server...");

    if (!validateEnv()) {
      throw new Error("Invalid configuration, see warnings above");
    }

    const core = getVisionCore();
    await core.start();

    core.engine.on("sequence:state", (run: SequenceRunSnapshot) => {
      logger.info(`Sequence ${run.id} is ${run.state}`, {
        steps: run.steps.length,
        error: run.error,
      });
    });

    core.registry.on("device:absent", (data: { key: string }) => {
      logger.warn(`Device ${data.key} is absent`);
    });

    logger.info("Creating Fastify application...");
    app = await createApp(core);

    const port = options.port ?? env.port;
    const host = options.host ?? env.host;

    await app.listen({ port, host });

    previewServer = new PreviewWebSocketServer(app, core.feed);

    serverStarted = true;

    logger.info(`Server listening on http://${host}:${port}`);
    logger.info(`Environment: ${env.nodeEnv}`);
    logger.info(`Captures saved under: ${core.settings.get().savePath}`);
    logger.info(
      `Settings file: ${env.settingsFile ?? "disabled (in-memory only)"}`,
    );
  } catch (error) {
    logger.error("Failed to start server:", { error: errorMessage(error) });
    throw error;
  }
}

export async function stopServer(): Promise<void> {
  if (!serverStarted || !app) {
    logger.warn("Server not started");
    return;
  }

  try {
    logger.info("Stopping VisionRig Backend Server...");

    previewServer?.close();
    previewServer = null;

    await getVisionCore().stop();

    await app.close();
    logger.info("Fastify app closed");

    serverStarted = false;
    app = null;

    logger.info("Server stopped successfully");
  } catch (error) {
    logger.error("Error during shutdown:", { error: errorMessage(error) });
    throw error;
  }
}

// CLI mode (when run directly)
if (require.main === module) {
  const gracefulShutdown = async (signal: string) => {
    logger.info(`Received ${signal}, starting graceful shutdown...`);
    try {
      await stopServer();
      process.exit(0);
    } catch (error) {
      logger.error("Error during shutdown:", { error: errorMessage(error) });
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
  process.on("SIGINT", () => void gracefulShutdown("SIGINT"));

  process.on("unhandledRejection", (reason) => {
    logger.error("Unhandled Rejection:", { reason: errorMessage(reason) });
  });

  process.on("uncaughtException", (error) => {
    logger.error("Uncaught Exception:", { error: error.message });
    process.exit(1);
  });

  startServer().catch((error: unknown) => {
    logger.error("Failed to start server:", { error: errorMessage(error) });
    process.exit(1);
  });
}
