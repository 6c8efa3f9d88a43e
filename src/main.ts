import { Redis } from "ioredis";
import { loadConfig } from "./utils/config.js";
import { createLogger } from "./utils/logger.js";
import { InProcessEventBus } from "./core/events.js";
import type { EventBus } from "./core/events.js";
import { RedisStreamEventBus } from "./core/redis-event-bus.js";
import { ActionRegistry } from "./core/action-executor.js";
import { TaskOrchestrator } from "./core/task-orchestrator.js";
import { CronRunner } from "./core/cron-runner.js";
import { JobScheduler } from "./core/job-scheduler.js";
import { NotificationRecorder } from "./core/notification-recorder.js";
import { RestApi } from "./interfaces/rest-api.js";
import { createDatabase } from "./db/index.js";
import { runMigrations } from "./db/migrate.js";
import { DrizzleTaskStore } from "./store/drizzle-store.js";
import { createReminderAction } from "./actions/reminder.js";
import { createWebhookAction } from "./actions/webhook.js";

const logger = createLogger();

async function main() {
  logger.info("Starting stepwise...");

  // 1. Load configuration
  const config = loadConfig();
  logger.info("Configuration loaded");

  // 2. Initialize database
  const { db, client: dbClient } = createDatabase(config.database.url);
  await runMigrations(db, logger, config.database.migrations_folder);
  const store = new DrizzleTaskStore(db);
  logger.info("Database initialized");

  // 3. Event bus: Redis Streams when configured, in-process otherwise
  let redis: Redis | undefined;
  let redisEventBus: RedisStreamEventBus | undefined;
  let eventBus: EventBus;
  if (config.redis.url) {
    redis = new Redis(config.redis.url);
    redisEventBus = new RedisStreamEventBus(redis, logger);
    eventBus = redisEventBus;
    logger.info("Redis Streams event bus initialized");
  } else {
    eventBus = new InProcessEventBus(logger);
    logger.info("In-process event bus initialized");
  }

  // 4. Actions
  const actions = new ActionRegistry(logger, {
    unknownActions: config.actions.unknown_actions,
  });
  actions.register("send_reminder", createReminderAction(actions));
  if (config.actions.webhook_url) {
    for (const actionType of config.actions.webhook_action_types) {
      actions.register(
        actionType,
        createWebhookAction(actionType, {
          url: config.actions.webhook_url,
          timeoutMs: config.actions.webhook_timeout_ms,
          apiKey: config.actions.webhook_api_key,
        })
      );
    }
  }
  logger.info({ actionTypes: actions.listActionTypes() }, "Action handlers registered");

  // 5. Orchestrator and notifications
  const retryDelayMs = config.scheduler.retry_delay_minutes * 60_000;
  const orchestrator = new TaskOrchestrator(store, actions, eventBus, logger, {
    failurePolicy: config.orchestrator.failure_policy,
    maxSubstepAttempts: config.orchestrator.max_substep_attempts,
    retryDelayMs,
    defaultMaxAttempts: config.scheduler.default_max_attempts,
  });
  new NotificationRecorder(store, logger).attach(eventBus);

  // 6. Scheduler
  const cronRunner = new CronRunner(logger, eventBus);
  const scheduler = new JobScheduler(store, orchestrator, actions, cronRunner, logger, {
    jobPollCron: config.scheduler.job_poll_cron,
    meetingPollCron: config.scheduler.meeting_poll_cron,
    batchSize: config.scheduler.job_batch_size,
    retryDelayMs,
    defaultMaxAttempts: config.scheduler.default_max_attempts,
    meetingLookbackMs: config.scheduler.meeting_lookback_hours * 60 * 60 * 1000,
    handlerTimeoutMs: config.scheduler.handler_timeout_ms,
    shutdownGraceMs: config.scheduler.shutdown_grace_ms,
  });
  if (config.scheduler.enabled) {
    scheduler.start();
  } else {
    logger.warn("Scheduler disabled by configuration");
  }

  // 7. REST API
  let restApi: RestApi | undefined;
  if (config.server.enabled) {
    restApi = new RestApi(
      logger,
      { orchestrator, scheduler, store, redis },
      {
        apiKey: config.server.api_key,
        requireAuthForHealth: config.server.require_auth_for_health,
      }
    );
    await restApi.start(config.server.port, config.server.host);
  }

  // 8. Start event bus consumer (after all subscriptions are registered)
  if (redisEventBus) {
    redisEventBus.startConsumer().catch((err) => {
      logger.error({ error: err }, "Event bus consumer error");
    });
  }

  // 9. Graceful shutdown
  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, "Received shutdown signal");
    if (restApi) await restApi.stop();
    await scheduler.stop();
    cronRunner.shutdown();
    if (redisEventBus) {
      await redisEventBus.stopConsumer();
    }
    redis?.disconnect();
    await dbClient.end();
    logger.info("Shutdown complete");
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err) => {
      logger.fatal({ error: err }, "Shutdown failed");
      process.exit(1);
    });
  };
  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));

  logger.info("stepwise is running");
}

main().catch((err) => {
  logger.fatal({ error: err }, "Fatal startup error");
  process.exit(1);
});
