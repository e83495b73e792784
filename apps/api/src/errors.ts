/**
 * Error Responses
 *
 * Every failure leaves the API in the same envelope:
 *   { success: false, error, errorCode, details? }
 *
 * ServiceErrors carry their own status. Fastify's own client errors
 * (schema validation, malformed JSON) become validation_failed. Anything
 * else is logged and answered with a generic 500.
 */

import type { FastifyInstance, FastifyReply } from "fastify";
import type { ZodError } from "zod";
import { ErrorCode, isServiceError, notFoundError, validationError } from "@tinyhop/shared";
import type { ErrorDetails, ServiceError } from "@tinyhop/shared";

export interface ErrorBody {
  success: false;
  error: string;
  errorCode: ErrorCode;
  details?: ErrorDetails;
}

export function errorBody(err: ServiceError): ErrorBody {
  const body: ErrorBody = {
    success: false,
    error: err.message,
    errorCode: err.code,
  };
  if (err.details) {
    body.details = err.details;
  }
  return body;
}

export function sendError(reply: FastifyReply, err: ServiceError): FastifyReply {
  return reply.status(err.statusCode).send(errorBody(err));
}

/**
 * First zod issue as a field-level validation error.
 */
export function fromZodError(error: ZodError, fallbackField: string): ServiceError {
  const issue = error.issues[0];
  if (!issue) {
    return validationError(fallbackField, "Invalid request");
  }
  const field = issue.path.length > 0 ? issue.path.join(".") : fallbackField;
  return validationError(field, `${field}: ${issue.message}`);
}

export function registerErrorHandling(app: FastifyInstance): void {
  app.setErrorHandler((error, request, reply) => {
    if (isServiceError(error)) {
      if (error.code === ErrorCode.INTERNAL) {
        request.log.error({ err: error, cause: error.cause }, "Request failed");
      }
      return sendError(reply, error);
    }

    if (error.validation) {
      return reply.status(400).send({
        success: false,
        error: error.message,
        errorCode: ErrorCode.VALIDATION,
      } satisfies ErrorBody);
    }

    // Malformed JSON, unsupported media type, oversized body
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        success: false,
        error: error.message,
        errorCode: ErrorCode.VALIDATION,
      } satisfies ErrorBody);
    }

    request.log.error({ err: error }, "Unhandled error");
    return reply.status(500).send({
      success: false,
      error: "Internal server error",
      errorCode: ErrorCode.INTERNAL,
    } satisfies ErrorBody);
  });

  app.setNotFoundHandler((request, reply) => {
    return sendError(reply, notFoundError("Route"));
  });
}
