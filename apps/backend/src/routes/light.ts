/**
 * Light Routes
 *
 * POST /api/light { value }
 *   200 accepted by at least one port
 *   503 no light port reachable
 *   400 value missing or outside 0-255
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import {
  ENDPOINTS,
  ERROR_MESSAGES,
  HTTP_STATUS,
  SUCCESS_MESSAGES,
} from "@visionrig/config";
import type { ApiErrorResponse } from "@visionrig/types";
import { sendError, type RouteOptions } from "./respond";

export async function lightRoutes(
  fastify: FastifyInstance,
  options: RouteOptions,
) {
  const { engine } = options.core;

  fastify.post(
    ENDPOINTS.LIGHT,
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      try {
        const result = await engine.setLight(request.body);

        if (!result.success) {
          const body: ApiErrorResponse = {
            success: false,
            error: "DeviceUnavailable",
            message: ERROR_MESSAGES.LIGHT_UNAVAILABLE,
            statusCode: HTTP_STATUS.SERVICE_UNAVAILABLE,
            details: { ...result },
          };
          return reply.code(HTTP_STATUS.SERVICE_UNAVAILABLE).send(body);
        }

        return reply.code(HTTP_STATUS.OK).send({
          success: true,
          message: SUCCESS_MESSAGES.LIGHT_APPLIED,
          data: result,
        });
      } catch (error) {
        return sendError(reply, error, "setLight");
      }
    },
  );
}
