/**
 * Settings Routes
 * Read, update and reload capture settings
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { ENDPOINTS, HTTP_STATUS } from "@visionrig/config";
import { createLogger } from "@visionrig/utils";
import { sendError, type RouteOptions } from "./respond";

const logger = createLogger("settings-routes");

export async function settingsRoutes(
  fastify: FastifyInstance,
  options: RouteOptions,
) {
  const { settings } = options.core;

  /**
   * GET /api/settings
   */
  fastify.get(
    ENDPOINTS.SETTINGS,
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.code(HTTP_STATUS.OK).send({
        success: true,
        data: settings.get(),
      });
    },
  );

  /**
   * POST /api/settings
   * Partial update; rejected as a whole if any field is invalid
   */
  fastify.post(
    ENDPOINTS.SETTINGS,
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      try {
        const updated = await settings.update(request.body);
        return reply.code(HTTP_STATUS.OK).send({
          success: true,
          data: updated,
        });
      } catch (error) {
        return sendError(reply, error, "updateSettings");
      }
    },
  );

  /**
   * POST /api/settings/reload
   * Re-read the settings file, discarding in-memory changes
   */
  fastify.post(
    ENDPOINTS.SETTINGS_RELOAD,
    async (_request: FastifyRequest, reply: FastifyReply) => {
      try {
        const reloaded = await settings.reload();
        logger.info("Settings reloaded on request");
        return reply.code(HTTP_STATUS.OK).send({
          success: true,
          data: reloaded,
        });
      } catch (error) {
        return sendError(reply, error, "reloadSettings");
      }
    },
  );
}
