import type { FastifyReply } from "fastify";
import { createLogger } from "@visionrig/utils";
import type { ApiErrorResponse } from "@visionrig/types";
import { httpStatusFor, toVisionError, ValidationError } from "../errors";
import type { VisionCore } from "../services/vision-core";

const logger = createLogger("routes");

export type RouteOptions = {
  core: VisionCore;
};

/**
 * Map anything thrown by a handler to the JSON error envelope
 */
export function sendError(
  reply: FastifyReply,
  error: unknown,
  operation: string,
): FastifyReply {
  const visionError = toVisionError(error, operation);
  const statusCode = httpStatusFor(visionError);

  if (statusCode >= 500) {
    logger.error(`${operation} failed`, visionError.toJSON());
  } else {
    logger.warn(`${operation} rejected: ${visionError.message}`);
  }

  const body: ApiErrorResponse = {
    success: false,
    error: visionError.code,
    message: visionError.message,
    statusCode,
  };
  if (visionError instanceof ValidationError && visionError.field) {
    body.details = { field: visionError.field };
  }

  return reply.code(statusCode).send(body);
}
