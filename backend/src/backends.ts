import Redis from "ioredis";
import type { AppConfig } from "./config";
import { InMemoryJobStore } from "./job-store";
import type { JobStore } from "./job-store";
import type { Logger } from "./logger";
import { InMemoryStatusNotifier } from "./notifier";
import type { StatusNotifier } from "./notifier";
import { InMemoryWorkQueue } from "./queue";
import type { WorkQueue } from "./queue";
import { RedisJobStore } from "./redis-job-store";
import { RedisStatusNotifier } from "./redis-notifier";
import { RedisWorkQueue } from "./redis-queue";

export interface Backends {
  kind: AppConfig["backend"];
  store: JobStore;
  queue: WorkQueue;
  notifier: StatusNotifier;
  close(): Promise<void>;
}

export function createMemoryBackends(logger: Logger, ttlDays?: number): Backends {
  const notifier = new InMemoryStatusNotifier(logger.child("notifier"));
  const store = new InMemoryJobStore({ notifier, ttlDays, logger: logger.child("store") });
  const queue = new InMemoryWorkQueue();
  return {
    kind: "memory",
    store,
    queue,
    notifier,
    close: async () => {
      await queue.close();
      await notifier.close();
    }
  };
}

export async function createRedisBackends(config: AppConfig, logger: Logger): Promise<Backends> {
  const redis = new Redis({
    host: config.redis.host,
    port: config.redis.port,
    db: config.redis.db,
    password: config.redis.password,
    lazyConnect: true
  });
  redis.on("error", (error: Error) => logger.error(`Redis: ${error.message}`));

  await redis.connect();
  await redis.ping();
  logger.info(`Conectado ao Redis em ${config.redis.host}:${config.redis.port}`);

  const notifier = new RedisStatusNotifier(redis, logger.child("notifier"));
  const store = new RedisJobStore(redis, {
    notifier,
    ttlDays: config.retention.days,
    logger: logger.child("store")
  });
  const queue = new RedisWorkQueue(redis, { logger: logger.child("queue") });

  return {
    kind: "redis",
    store,
    queue,
    notifier,
    close: async () => {
      await queue.close();
      await notifier.close();
      await redis.quit();
    }
  };
}

export function createBackends(config: AppConfig, logger: Logger): Promise<Backends> {
  if (config.backend === "redis") {
    return createRedisBackends(config, logger);
  }
  return Promise.resolve(createMemoryBackends(logger, config.retention.days));
}
