import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import fp from "fastify-plugin";
import { AppError, ValidationError } from "./app-error.js";

export interface ErrorBody {
  error: string;
  code: string;
  issues?: ValidationError["issues"];
}

export function toErrorBody(err: AppError): ErrorBody {
  if (err instanceof ValidationError) {
    return { error: err.message, code: err.code, issues: err.issues };
  }
  return { error: err.message, code: err.code };
}

/** Server-side failures and non-operational errors are logged at error level. */
export function severityOf(err: AppError): "info" | "error" {
  return !err.isOperational || err.statusCode >= 500 ? "error" : "info";
}

function handleError(
  error: FastifyError | AppError,
  request: FastifyRequest,
  reply: FastifyReply,
): FastifyReply {
  if (error instanceof AppError) {
    if (severityOf(error) === "info") {
      request.log.info({ code: error.code }, error.message);
    } else {
      request.log.error(error, error.isOperational ? "application error" : "non-operational application error");
    }
    return reply.code(error.statusCode).send(toErrorBody(error));
  }

  // Fastify's own client errors (bad JSON, body too large, rate limited)
  const status = error.statusCode;
  if (status !== undefined && status >= 400 && status < 500) {
    return reply.code(status).send({ error: error.message, code: error.code || (status === 429 ? "RATE_LIMITED" : "BAD_REQUEST") });
  }

  request.log.error(error, "unhandled error");
  return reply.code(500).send({ error: "Internal Server Error", code: "INTERNAL_ERROR" });
}

async function errorPlugin(app: FastifyInstance): Promise<void> {
  app.setErrorHandler(handleError);

  app.setNotFoundHandler((request, reply) => {
    return reply.code(404).send({
      error: `Route ${request.method} ${request.url.split("?")[0]} not found`,
      code: "ROUTE_NOT_FOUND",
    });
  });
}

export const errorHandling = fp(errorPlugin, {
  name: "tierwise-errors",
});
