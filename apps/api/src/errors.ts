/**
 * Error Handling
 *
 * Maps error kinds to HTTP responses:
 *
 *   VALIDATION_FAILED → 400 invalid_request
 *   NOT_FOUND         → 404 not_found
 *   EXPIRED           → 410 expired
 *   anything else     → 500 internal_error (details only in logs)
 */

import type { FastifyError, FastifyInstance } from "fastify";
import { ErrorCode, ValidationError, isShortkitError } from "@shortkit/shared";

export interface ErrorBody {
  error: string;
  message: string;
  details?: Record<string, string[]>;
}

interface MappedError {
  status: number;
  body: ErrorBody;
}

/**
 * Resolve an error thrown by a handler to a status and response body.
 */
export function mapError(error: unknown): MappedError {
  if (isShortkitError(error)) {
    switch (error.code) {
      case ErrorCode.VALIDATION_FAILED: {
        const details = error instanceof ValidationError ? error.details : undefined;
        return {
          status: 400,
          body: details
            ? { error: "invalid_request", message: error.message, details }
            : { error: "invalid_request", message: error.message },
        };
      }
      case ErrorCode.NOT_FOUND:
        return { status: 404, body: { error: "not_found", message: error.message } };
      case ErrorCode.EXPIRED:
        return { status: 410, body: { error: "expired", message: error.message } };
      default:
        break;
    }
  }

  return { status: 500, body: { error: "internal_error", message: "Internal server error" } };
}

function isClientFastifyError(error: FastifyError): boolean {
  return typeof error.statusCode === "number" && error.statusCode >= 400 && error.statusCode < 500;
}

export function registerErrorHandler(fastify: FastifyInstance): void {
  fastify.setErrorHandler((error, request, reply) => {
    // Body parsing and content-type failures raised by Fastify itself
    if (!isShortkitError(error) && isClientFastifyError(error)) {
      request.log.info({ err: error }, "Rejected malformed request");
      return reply.status(error.statusCode ?? 400).send({ error: "invalid_request", message: error.message });
    }

    const { status, body } = mapError(error);
    if (status >= 500) {
      request.log.error({ err: error }, "Request error");
    } else {
      request.log.debug({ err: error }, "Request rejected");
    }
    return reply.status(status).send(body);
  });

  fastify.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({ error: "not_found", message: `Route ${request.method} ${request.url} not found` });
  });
}
