import * as Sentry from "@sentry/node";
import { config, type AppConfig } from "./config.js";

type SentrySettings = Pick<
  AppConfig,
  | "SENTRY_DSN"
  | "SENTRY_ENVIRONMENT"
  | "SENTRY_RELEASE"
  | "SENTRY_TRACES_SAMPLE_RATE"
  | "SENTRY_ENABLE_LOGS"
  | "SENTRY_ENABLE_METRICS"
  | "NODE_ENV"
>;

export const buildSentryOptions = (settings: SentrySettings): Sentry.NodeOptions => ({
  dsn: settings.SENTRY_DSN,
  environment: settings.SENTRY_ENVIRONMENT || settings.NODE_ENV,
  release: settings.SENTRY_RELEASE,
  tracesSampleRate: settings.SENTRY_TRACES_SAMPLE_RATE,
  enableLogs: settings.SENTRY_ENABLE_LOGS,
  enableMetrics: settings.SENTRY_ENABLE_METRICS,
  sendDefaultPii: false,
  integrations: [
    Sentry.consoleLoggingIntegration({
      levels: ["log", "warn", "error"],
    }),
  ],
});

if (config.SENTRY_DSN) {
  Sentry.init(buildSentryOptions(config));
}
