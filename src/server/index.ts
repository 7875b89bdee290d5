import "dotenv/config";
import "./sentry.server.js";
import { buildLoggerOptions, configureApp, createServer } from "./app.js";
import { config } from "./config.js";
import { createAppContext } from "./context.js";
import { captureServerError, sentryLog, shutdownObservability } from "./observability.js";

const app = createServer(buildLoggerOptions({ level: config.LOG_LEVEL, file: config.LOG_FILE }));

app.addHook("onClose", async () => {
  await shutdownObservability();
});

const start = async () => {
  try {
    const context = await createAppContext(config, app.log);
    await configureApp(app, context);
  } catch (error) {
    app.log.fatal({ err: error }, "FATAL: Application startup failed");
    captureServerError(error);
    await shutdownObservability();
    process.exit(1);
  }

  try {
    await app.listen({
      port: config.PORT,
      host: config.HOST,
    });
    sentryLog("info", "Fastify server started", {
      port: config.PORT,
      environment: config.NODE_ENV,
      region: config.AWS_REGION,
    });
  } catch (error) {
    app.log.error(error);
    captureServerError(error);
    process.exit(1);
  }
};

await start();
