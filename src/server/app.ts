import swagger from "@fastify/swagger";
import swaggerUi from "@fastify/swagger-ui";
import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";
import { AppError, toErrorMessage } from "./errors.js";
import {
  captureServerError,
  registerObservabilityHooks,
  sentryCountMetric,
} from "./observability.js";
import { registerBucketRoutes, type AppContext } from "./routes.js";
import type { ApiErrorShape } from "./types.js";

export type LoggerSettings = {
  level: string;
  file?: string;
};

export const LOG_FILE_MAX_SIZE = "5m";
export const LOG_FILE_BACKUP_COUNT = 2;

/**
 * Pino options for Fastify: stdout, plus a size-rotated file when one is
 * configured.
 */
export const buildLoggerOptions = (settings: LoggerSettings): FastifyServerOptions["logger"] => {
  if (!settings.file) {
    return { level: settings.level };
  }

  return {
    level: settings.level,
    transport: {
      targets: [
        { target: "pino/file", level: settings.level, options: { destination: 1 } },
        {
          target: "pino-roll",
          level: settings.level,
          options: {
            file: settings.file,
            size: LOG_FILE_MAX_SIZE,
            limit: { count: LOG_FILE_BACKUP_COUNT },
            mkdir: true,
          },
        },
      ],
    },
  };
};

export const createServer = (
  logger: FastifyServerOptions["logger"] = { level: "info" },
): FastifyInstance => {
  return Fastify({ logger });
};

/**
 * Wires observability, API docs, routes and the error handler onto `app`. The
 * context is built once at startup and shared by every request.
 */
export const configureApp = async (
  app: FastifyInstance,
  context: AppContext,
): Promise<FastifyInstance> => {
  await app.register(swagger, {
    openapi: {
      info: {
        title: "Bucket Keeper",
        description: "Creates, lists and deletes S3 buckets with credentials read from Vault.",
        version: "0.1.0",
      },
    },
  });
  await app.register(swaggerUi, { routePrefix: "/docs" });

  registerObservabilityHooks(app);
  registerBucketRoutes(app, context);

  app.setErrorHandler((error, request, reply) => {
    const statusCode = error instanceof AppError ? error.statusCode : (error.statusCode ?? 500);

    if (statusCode >= 500) {
      request.log.error({ err: error }, "Request failed");
    } else {
      request.log.warn({ err: error }, "Request rejected");
    }

    captureServerError(error, request, reply);
    sentryCountMetric("http.request.errors", 1, {
      method: request.method,
      route: request.routeOptions.url || request.url,
      status_code: statusCode,
    });

    if (error instanceof AppError) {
      const body: ApiErrorShape = {
        error: error.message,
        details: error.exposeDetails ? error.message : undefined,
      };
      return reply.code(error.statusCode).send(body);
    }

    const body: ApiErrorShape = {
      error: statusCode === 500 ? "Internal server error" : toErrorMessage(error),
    };
    return reply.code(statusCode).send(body);
  });

  return app;
};
