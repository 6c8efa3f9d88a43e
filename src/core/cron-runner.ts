import { Cron } from "croner";
import type { Logger } from "../utils/logger.js";
import type { EventBus } from "./events.js";
import { describeError } from "./errors.js";

export interface PassDef {
  name: string;
  cronExpression: string;
  handler: () => Promise<void>;
  description?: string;
}

export interface PassMetadata {
  name: string;
  cronExpression: string;
  description?: string;
  running: boolean;
  runCount: number;
  lastRun: Date | null;
  lastResult: "success" | "failure" | null;
  lastError: string | null;
  lastDurationMs: number | null;
  nextRun: Date | null;
}

interface ManagedPass {
  def: PassDef;
  cron: Cron;
  metadata: PassMetadata;
}

/**
 * Named periodic passes on croner (seconds-resolution patterns).
 * A pass never overlaps itself: a tick that fires while the previous run
 * is still going is skipped.
 */
export class CronRunner {
  private passes = new Map<string, ManagedPass>();
  private logger: Logger;
  private eventBus: EventBus;

  constructor(logger: Logger, eventBus: EventBus) {
    this.logger = logger;
    this.eventBus = eventBus;
  }

  register(def: PassDef): void {
    if (this.passes.has(def.name)) {
      this.logger.warn({ pass: def.name }, "Pass already registered, replacing");
      this.remove(def.name);
    }

    const metadata: PassMetadata = {
      name: def.name,
      cronExpression: def.cronExpression,
      description: def.description,
      running: false,
      runCount: 0,
      lastRun: null,
      lastResult: null,
      lastError: null,
      lastDurationMs: null,
      nextRun: null,
    };

    const cron = this.startCron(def.name, def.cronExpression);
    metadata.nextRun = cron.nextRun() ?? null;

    this.passes.set(def.name, { def, cron, metadata });
    this.logger.info({ pass: def.name, cron: def.cronExpression }, "Periodic pass registered");
  }

  remove(name: string): void {
    const managed = this.passes.get(name);
    if (!managed) return;
    managed.cron.stop();
    this.passes.delete(name);
    this.logger.info({ pass: name }, "Periodic pass removed");
  }

  /** Run a pass now. Errors are recorded in metadata and published, not thrown. */
  async run(name: string): Promise<void> {
    const managed = this.passes.get(name);
    if (!managed) {
      this.logger.warn({ pass: name }, "Pass not found for execution");
      return;
    }
    if (managed.metadata.running) {
      this.logger.debug({ pass: name }, "Previous run still in progress, skipping tick");
      return;
    }

    const startTime = Date.now();
    managed.metadata.running = true;
    managed.metadata.lastRun = new Date();
    managed.metadata.runCount += 1;

    try {
      await managed.def.handler();
      managed.metadata.lastResult = "success";
      managed.metadata.lastError = null;
    } catch (err) {
      managed.metadata.lastResult = "failure";
      managed.metadata.lastError = describeError(err);
      this.logger.error({ pass: name, error: err }, "Periodic pass failed");

      await this.eventBus
        .publish({
          eventType: "alert.system.pass_failed",
          timestamp: new Date().toISOString(),
          source: "cron-runner",
          payload: { pass: name, error: describeError(err) },
          severity: "high",
        })
        .catch((publishErr: unknown) => {
          this.logger.error({ pass: name, error: publishErr }, "Failed to publish pass failure");
        });
    } finally {
      managed.metadata.running = false;
      managed.metadata.lastDurationMs = Date.now() - startTime;
      managed.metadata.nextRun = managed.cron.nextRun() ?? null;
    }
  }

  list(): PassMetadata[] {
    return Array.from(this.passes.values()).map((p) => ({ ...p.metadata }));
  }

  shutdown(): void {
    for (const [name, managed] of this.passes) {
      managed.cron.stop();
      this.logger.debug({ pass: name }, "Periodic pass stopped");
    }
    this.passes.clear();
    this.logger.info("Cron runner shut down");
  }

  private startCron(name: string, cronExpression: string): Cron {
    return new Cron(cronExpression, { catch: true }, async () => {
      await this.run(name);
    });
  }
}
