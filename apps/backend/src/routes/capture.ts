/**
 * Capture Routes
 * Single capture from every camera selected by the save mode
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { ENDPOINTS, HTTP_STATUS } from "@visionrig/config";
import { parseCaptureOverrides } from "../services/capture-engine";
import { sendError, type RouteOptions } from "./respond";

export async function captureRoutes(
  fastify: FastifyInstance,
  options: RouteOptions,
) {
  const { engine } = options.core;

  /**
   * POST /api/capture
   * Body (optional): { product?, condition?, saveMode? }
   * 500 when any selected camera failed to write its file
   */
  fastify.post(
    ENDPOINTS.CAPTURE,
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      try {
        const result = await engine.captureOnce(
          parseCaptureOverrides(request.body),
        );

        return reply
          .code(
            result.success
              ? HTTP_STATUS.OK
              : HTTP_STATUS.INTERNAL_SERVER_ERROR,
          )
          .send({
            success: result.success,
            data: result,
          });
      } catch (error) {
        return sendError(reply, error, "capture");
      }
    },
  );
}
