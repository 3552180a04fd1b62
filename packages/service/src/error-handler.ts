/**
 * Maps core errors to HTTP responses.
 * Body: { error, code } so callers can tell "no session" from "already active".
 */

import type { FastifyError, FastifyReply, FastifyRequest } from "fastify";
import { ConfigError, SessionError, type SessionErrorCode } from "@capture-session/core";

export function statusForSessionError(code: SessionErrorCode): number {
  switch (code) {
    case "ALREADY_ACTIVE":
    case "INVALID_STATE":
      return 409;
    case "INVALID_ARGUMENT":
      return 400;
    case "DIRECTORY_CREATION_FAILED":
    case "MANIFEST_WRITE_FAILED":
      return 500;
  }
}

export function errorHandler(
  error: FastifyError,
  request: FastifyRequest,
  reply: FastifyReply
): void {
  if (error instanceof SessionError) {
    const status = statusForSessionError(error.code);
    if (status >= 500) {
      request.log.error({ err: error }, "Session operation failed");
    }
    void reply.code(status).send({ error: error.message, code: error.code });
    return;
  }

  if (error instanceof ConfigError) {
    void reply.code(422).send({ error: error.message, code: "INVALID_CONFIG" });
    return;
  }

  if (error.validation) {
    void reply.code(400).send({ error: error.message, code: "INVALID_ARGUMENT" });
    return;
  }

  request.log.error({ err: error }, "Unhandled error");
  void reply
    .code(error.statusCode && error.statusCode < 500 ? error.statusCode : 500)
    .send({
      error:
        error.statusCode && error.statusCode < 500
          ? error.message
          : "Internal server error",
    });
}
