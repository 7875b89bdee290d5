import * as Sentry from "@sentry/node";
import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { config } from "./config.js";

declare module "fastify" {
  interface FastifyRequest {
    sentryRequestStartMs?: number;
  }
}

type Attributes = Record<string, unknown>;
type MetricAttributes = Record<string, string | number | boolean>;

const getRouteName = (request: FastifyRequest): string => {
  return request.routeOptions.url || request.url;
};

const SENSITIVE_KEYS = new Set([
  "secretaccesskey",
  "secret_access_key",
  "accesskeyid",
  "access_key",
  "sessiontoken",
  "session_token",
  "x-vault-token",
  "token",
  "authorization",
]);

const isRecord = (value: unknown): value is Attributes => {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
};

const sanitizeValue = (value: unknown): unknown => {
  if (Array.isArray(value)) {
    return value.map(sanitizeValue);
  }

  if (isRecord(value)) {
    return sanitizeAttributes(value);
  }

  return value;
};

export const sanitizeAttributes = (record: Attributes): Attributes => {
  const output: Attributes = {};

  for (const [key, entryValue] of Object.entries(record)) {
    if (SENSITIVE_KEYS.has(key.toLowerCase())) {
      output[key] = "[REDACTED]";
      continue;
    }

    output[key] = sanitizeValue(entryValue);
  }

  return output;
};

// Metric attributes only carry primitives; anything else is dropped.
const toMetricAttributes = (attributes?: Attributes): MetricAttributes => {
  const output: MetricAttributes = {};

  if (!attributes) {
    return output;
  }

  for (const [key, value] of Object.entries(sanitizeAttributes(attributes))) {
    if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      output[key] = value;
    }
  }

  return output;
};

const sentryEnabled = (): boolean => Boolean(config.SENTRY_DSN);
const sentryMetricsEnabled = (): boolean => sentryEnabled() && config.SENTRY_ENABLE_METRICS;

type SentryLogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export const sentryLog = (level: SentryLogLevel, message: string, attributes?: Attributes): void => {
  if (!sentryEnabled() || !config.SENTRY_ENABLE_LOGS) {
    return;
  }

  Sentry.logger[level](message, attributes ? sanitizeAttributes(attributes) : undefined);
};

export const sentryCountMetric = (name: string, value: number, attributes?: Attributes): void => {
  if (!sentryMetricsEnabled()) {
    return;
  }

  Sentry.metrics.count(name, value, {
    attributes: toMetricAttributes(attributes),
  });
};

export const sentryDistributionMetric = (
  name: string,
  value: number,
  unit: "none" | "millisecond" = "none",
  attributes?: Attributes,
): void => {
  if (!sentryMetricsEnabled()) {
    return;
  }

  Sentry.metrics.distribution(name, value, {
    unit,
    attributes: toMetricAttributes(attributes),
  });
};

/**
 * Runs an outbound call and records its latency as `<metric>.latency`,
 * tagged with the outcome.
 */
export const trackLatency = async <T>(
  metric: string,
  run: () => Promise<T>,
  attributes?: Attributes,
): Promise<T> => {
  const startedAt = Date.now();

  try {
    const result = await run();
    sentryDistributionMetric(`${metric}.latency`, Date.now() - startedAt, "millisecond", {
      ...attributes,
      status: "success",
    });
    return result;
  } catch (error) {
    sentryDistributionMetric(`${metric}.latency`, Date.now() - startedAt, "millisecond", {
      ...attributes,
      status: "failure",
    });
    throw error;
  }
};

export const registerObservabilityHooks = (app: FastifyInstance): void => {
  app.addHook("onRequest", (request, _, done) => {
    request.sentryRequestStartMs = Date.now();

    if (sentryEnabled() && config.SENTRY_ENABLE_LOGS) {
      Sentry.getIsolationScope().setAttributes({
        route: getRouteName(request),
        method: request.method,
      });

      sentryLog("info", "Incoming API request", {
        method: request.method,
        route: getRouteName(request),
      });
    }

    sentryCountMetric("http.requests.total", 1, {
      method: request.method,
      route: getRouteName(request),
    });

    done();
  });

  app.addHook("onResponse", (request, reply, done) => {
    if (!sentryEnabled()) {
      done();
      return;
    }

    const startedAt = request.sentryRequestStartMs || Date.now();
    const durationMs = Date.now() - startedAt;

    sentryLog("info", "API request completed", {
      method: request.method,
      route: getRouteName(request),
      status_code: reply.statusCode,
      duration_ms: durationMs,
    });

    const attributes = {
      method: request.method,
      route: getRouteName(request),
      status_code: reply.statusCode,
    };

    sentryDistributionMetric("http.server.duration", durationMs, "millisecond", attributes);

    if (reply.statusCode >= 500) {
      sentryCountMetric("http.requests.errors", 1, attributes);
    }

    done();
  });
};

export const captureServerError = (
  error: unknown,
  request?: FastifyRequest,
  reply?: FastifyReply,
): void => {
  if (!sentryEnabled()) {
    return;
  }

  const params = request?.params;

  Sentry.withScope((scope) => {
    if (request) {
      scope.setTags({
        method: request.method,
        route: getRouteName(request),
      });
    }

    if (reply) {
      scope.setTag("status_code", reply.statusCode.toString());
    }

    scope.setContext("request", {
      method: request?.method,
      url: request?.url,
      params: isRecord(params) ? sanitizeAttributes(params) : undefined,
    });

    Sentry.captureException(error);
  });
};

export const shutdownObservability = async (): Promise<void> => {
  if (!sentryEnabled()) {
    return;
  }

  await Sentry.flush(2000);
};
