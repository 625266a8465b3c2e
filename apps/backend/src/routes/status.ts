/**
 * Status Routes
 * Device connectivity, the current sequence and settings in one call
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { ENDPOINTS, HTTP_STATUS } from "@visionrig/config";
import { sendError, type RouteOptions } from "./respond";

export async function statusRoutes(
  fastify: FastifyInstance,
  options: RouteOptions,
) {
  const { core } = options;

  /**
   * GET /api/status
   */
  fastify.get(
    ENDPOINTS.STATUS,
    async (_request: FastifyRequest, reply: FastifyReply) => {
      try {
        return reply.code(HTTP_STATUS.OK).send({
          success: true,
          data: core.getStatus(),
        });
      } catch (error) {
        return sendError(reply, error, "status");
      }
    },
  );
}
