import { serve } from "@hono/node-server";
import env from "./utils/env-vars";
import { logger } from "./utils/logger";
import { createApp } from "./app";
import { batchOptionsFor, createPipeline } from "./services/pipeline";

const main = async () => {
  const pipeline = await createPipeline(env);
  const auth =
    env.APP_API_KEY && env.APP_API_SECRET
      ? { username: env.APP_API_KEY, password: env.APP_API_SECRET }
      : undefined;

  const app = createApp({
    pipeline,
    batch: batchOptionsFor(env),
    maxFileSize: env.MAX_FILE_SIZE,
    auth,
  });

  serve({ fetch: app.fetch, port: env.APP_PORT }, (info) => {
    logger.info(`Listening on port ${info.port}`);
  });
};

main().catch((err) => {
  logger.error("Failed to start the server:", err);
  process.exit(1);
});
