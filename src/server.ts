// src/server.ts
import { serve } from "@hono/node-server";
import { createApp } from "./app.js";
import { env } from "./config/env.js";
import { createEventPublisher } from "./config/redis.js";
import { logger } from "./core/logger.js";
import { createEngine } from "./engine.js";
import { LifecycleWorker } from "./workers/lifecycle.worker.js";
import { OutboxWorker } from "./workers/outBoxWorker.js";

const engine = createEngine();
const app = createApp(engine);

const publisher = createEventPublisher();
const outboxWorker = new OutboxWorker(engine.outboxRepo, publisher);
const lifecycleWorker = new LifecycleWorker(
  engine,
  env.LIFECYCLE_SWEEP_INTERVAL_MS
);

const server = serve({ fetch: app.fetch, port: env.PORT }, (info) => {
  logger.info(
    { port: info.port, storage: env.STORAGE_DRIVER },
    `Server running on http://localhost:${info.port}`
  );
});

void outboxWorker.start();
lifecycleWorker.start();

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info({ signal }, "Shutting down");

  server.close();
  await lifecycleWorker.stop();
  await engine.context.outbox.drain();
  outboxWorker.stop();
  await outboxWorker.processBatch();
  await publisher.close();
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      logger.error({ err: error }, "Shutdown failed");
      process.exit(1);
    });
  });
}
