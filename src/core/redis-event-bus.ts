import type { Redis } from "ioredis";
import { z } from "zod";
import type { Logger } from "../utils/logger.js";
import type { EventBus, EventHandler, StepwiseEvent } from "./events.js";
import { patternToRegex } from "./events.js";
import { generateEventId } from "../utils/id.js";
import { describeError } from "./errors.js";

export interface RedisStreamOptions {
  streamKey?: string;
  consumerGroup?: string;
  consumerName?: string;
  maxLen?: number;
  maxRetries?: number;
  blockMs?: number;
  idempotencyTtlSeconds?: number;
}

const StepwiseEventSchema = z.object({
  eventType: z.string(),
  timestamp: z.string(),
  source: z.string(),
  payload: z.record(z.unknown()),
  severity: z.enum(["high", "medium", "low"]),
  eventId: z.string().optional(),
});

const StreamEntrySchema = z.tuple([z.string(), z.array(z.string())]);
const StreamReadSchema = z.array(z.tuple([z.string(), z.array(StreamEntrySchema)]));

interface Subscription {
  pattern: RegExp;
  handler: EventHandler;
  handlerName: string;
}

/**
 * Redis Streams event bus with a consumer group, per-handler idempotency
 * keys and a dead-letter stream. Lets several processes observe task events.
 */
export class RedisStreamEventBus implements EventBus {
  private redis: Redis;
  private logger: Logger;
  private subscriptions: Subscription[] = [];
  private running = false;
  private retryCounts = new Map<string, number>();
  private streamKey: string;
  private deadLetterKey: string;
  private consumerGroup: string;
  private consumerName: string;
  private maxLen: number;
  private maxRetries: number;
  private blockMs: number;
  private idempotencyTtlSeconds: number;

  constructor(redis: Redis, logger: Logger, options: RedisStreamOptions = {}) {
    this.redis = redis;
    this.logger = logger;
    this.streamKey = options.streamKey ?? "stepwise:events";
    this.deadLetterKey = `${this.streamKey}:dead`;
    this.consumerGroup = options.consumerGroup ?? "stepwise-main";
    this.consumerName = options.consumerName ?? `consumer-${process.pid}`;
    this.maxLen = options.maxLen ?? 10_000;
    this.maxRetries = options.maxRetries ?? 3;
    this.blockMs = options.blockMs ?? 5000;
    this.idempotencyTtlSeconds = options.idempotencyTtlSeconds ?? 86_400;
  }

  async publish(event: StepwiseEvent): Promise<void> {
    const stamped = { ...event, eventId: event.eventId ?? generateEventId() };

    await this.redis.xadd(
      this.streamKey,
      "MAXLEN",
      "~",
      String(this.maxLen),
      "*",
      "data",
      JSON.stringify(stamped)
    );

    this.logger.debug(
      { eventType: stamped.eventType, eventId: stamped.eventId },
      "Event published to stream"
    );
  }

  subscribe(pattern: string, handler: EventHandler): void {
    this.subscriptions.push({
      pattern: patternToRegex(pattern),
      handler,
      handlerName: `${pattern}:${this.subscriptions.length}`,
    });
    this.logger.debug({ pattern }, "Event subscription registered");
  }

  async startConsumer(): Promise<void> {
    try {
      await this.redis.xgroup("CREATE", this.streamKey, this.consumerGroup, "0", "MKSTREAM");
      this.logger.info("Consumer group created");
    } catch (err: unknown) {
      // BUSYGROUP: the group already exists
      if (err instanceof Error && err.message.includes("BUSYGROUP")) {
        this.logger.debug("Consumer group already exists");
      } else {
        throw err;
      }
    }

    this.running = true;
    await this.processPending();
    await this.readLoop();
  }

  async stopConsumer(): Promise<void> {
    this.running = false;
    this.logger.info("Event bus consumer stopping");
  }

  /** Re-deliver messages this consumer read but never acknowledged. */
  private async processPending(): Promise<void> {
    while (this.running) {
      const messages = this.parseRead(
        await this.redis.xreadgroup(
          "GROUP",
          this.consumerGroup,
          this.consumerName,
          "COUNT",
          "100",
          "STREAMS",
          this.streamKey,
          "0"
        )
      );
      if (messages.length === 0) break;

      for (const [messageId, fields] of messages) {
        await this.processMessage(messageId, fields);
      }
    }
  }

  private async readLoop(): Promise<void> {
    while (this.running) {
      try {
        const messages = this.parseRead(
          await this.redis.xreadgroup(
            "GROUP",
            this.consumerGroup,
            this.consumerName,
            "COUNT",
            "10",
            "BLOCK",
            String(this.blockMs),
            "STREAMS",
            this.streamKey,
            ">"
          )
        );

        if (messages.length === 0) {
          if (!this.running) break;
          await new Promise((r) => setTimeout(r, 50));
          continue;
        }

        for (const [messageId, fields] of messages) {
          await this.processMessage(messageId, fields);
        }
      } catch (err) {
        if (!this.running) break;
        this.logger.error({ error: err }, "Error reading from event stream");
        await new Promise((r) => setTimeout(r, 1000));
      }
    }
  }

  private parseRead(results: unknown): Array<[string, string[]]> {
    if (!results) return [];
    const parsed = StreamReadSchema.safeParse(results);
    if (!parsed.success) {
      this.logger.warn("Unexpected stream read reply, ignoring");
      return [];
    }
    return parsed.data[0]?.[1] ?? [];
  }

  private parseEvent(fields: string[]): StepwiseEvent | null {
    const dataIndex = fields.indexOf("data");
    const raw = dataIndex === -1 ? undefined : fields[dataIndex + 1];
    if (raw === undefined) return null;

    try {
      const parsed = StepwiseEventSchema.safeParse(JSON.parse(raw));
      return parsed.success ? parsed.data : null;
    } catch (err) {
      this.logger.debug({ error: err }, "Stream entry is not JSON");
      return null;
    }
  }

  private async processMessage(messageId: string, fields: string[]): Promise<void> {
    const event = this.parseEvent(fields);
    if (!event) {
      this.logger.warn({ messageId }, "Unparseable event in stream, skipping");
      await this.redis.xack(this.streamKey, this.consumerGroup, messageId);
      return;
    }

    const matching = this.subscriptions.filter((sub) => sub.pattern.test(event.eventType));
    if (matching.length === 0) {
      await this.redis.xack(this.streamKey, this.consumerGroup, messageId);
      return;
    }

    const eventId = event.eventId ?? messageId;
    const idemKeys = matching.map((sub) => `idem:${eventId}:${sub.handlerName}`);
    const seen = await this.redis.mget(...idemKeys);

    const pipeline = this.redis.pipeline();
    let pendingRetry = false;

    for (const [i, sub] of matching.entries()) {
      if (seen[i]) continue;
      const retryKey = `${messageId}:${sub.handlerName}`;

      try {
        await sub.handler(event);
        pipeline.set(`idem:${eventId}:${sub.handlerName}`, "1", "EX", this.idempotencyTtlSeconds);
        this.retryCounts.delete(retryKey);
      } catch (err) {
        const count = (this.retryCounts.get(retryKey) ?? 0) + 1;

        if (count >= this.maxRetries) {
          this.logger.error(
            { messageId, eventType: event.eventType, handler: sub.handlerName, attempts: count, error: err },
            "Handler failed after max retries, sending to dead letter"
          );
          await this.redis.xadd(
            this.deadLetterKey,
            "*",
            "data",
            JSON.stringify(event),
            "error",
            describeError(err),
            "handler",
            sub.handlerName,
            "originalMessageId",
            messageId
          );
          this.retryCounts.delete(retryKey);
        } else {
          this.retryCounts.set(retryKey, count);
          pendingRetry = true;
          this.logger.warn(
            { messageId, eventType: event.eventType, handler: sub.handlerName, attempt: count, error: err },
            "Handler failed, will retry"
          );
        }
      }
    }

    await pipeline.exec();

    // Leave the message pending while any handler still has retries left.
    if (!pendingRetry) {
      await this.redis.xack(this.streamKey, this.consumerGroup, messageId);
    }
  }
}
