/**
 * Sequence Routes
 * Start, observe, cancel and clear brightness sweeps
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { ENDPOINTS, HTTP_STATUS, SUCCESS_MESSAGES } from "@visionrig/config";
import { parseSequenceSpec } from "../services/sequence";
import { sendError, type RouteOptions } from "./respond";

export async function sequenceRoutes(
  fastify: FastifyInstance,
  options: RouteOptions,
) {
  const { engine, settings } = options.core;

  /**
   * POST /api/sequence { start, end, step, direction? }
   * 202 with the run handle, 409 while another run is active
   */
  fastify.post(
    ENDPOINTS.SEQUENCE,
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      try {
        const spec = parseSequenceSpec(
          request.body,
          settings.get().sequenceDirection,
        );
        const run = engine.startSequence(spec);
        return reply.code(HTTP_STATUS.ACCEPTED).send({
          success: true,
          message: SUCCESS_MESSAGES.SEQUENCE_STARTED,
          data: run,
        });
      } catch (error) {
        return sendError(reply, error, "startSequence");
      }
    },
  );

  /**
   * GET /api/sequence
   * Current or last run, null when none
   */
  fastify.get(
    ENDPOINTS.SEQUENCE,
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.code(HTTP_STATUS.OK).send({
        success: true,
        data: engine.getSequence(),
      });
    },
  );

  /**
   * POST /api/sequence/cancel
   */
  fastify.post(
    ENDPOINTS.SEQUENCE_CANCEL,
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.code(HTTP_STATUS.OK).send({
        success: true,
        data: { cancelled: engine.cancelSequence() },
      });
    },
  );

  /**
   * DELETE /api/sequence
   * Forget a finished run, 409 while it is still active
   */
  fastify.delete(
    ENDPOINTS.SEQUENCE,
    async (_request: FastifyRequest, reply: FastifyReply) => {
      try {
        return reply.code(HTTP_STATUS.OK).send({
          success: true,
          data: { cleared: engine.clearSequence() },
        });
      } catch (error) {
        return sendError(reply, error, "clearSequence");
      }
    },
  );
}
