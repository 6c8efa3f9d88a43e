import type { Logger } from "../utils/logger.js";
import { createCorrelationId, withContext } from "./correlation.js";
import type { CronRunner, PassMetadata } from "./cron-runner.js";
import type { ActionExecutor } from "./action-executor.js";
import { EXECUTE_SUBSTEP_JOB, type TaskOrchestrator } from "./task-orchestrator.js";
import {
  checkParticipantHandler,
  executeSubstepHandler,
  sendReminderHandler,
} from "./job-handlers.js";
import type { NewJob, TaskStore } from "../store/types.js";
import type { JsonMap, Meeting, ScheduledJob } from "../tasks/types.js";
import {
  HandlerError,
  JobDeferredError,
  NotFoundError,
  StoreUnavailableError,
  UnknownJobTypeError,
  ValidationError,
  describeError,
} from "./errors.js";

export interface JobHandler {
  run(job: ScheduledJob): Promise<JsonMap>;
  /**
   * Called after a failed attempt has been recorded. `exhausted` is true
   * when the job will not be retried.
   */
  onFailure?(job: ScheduledJob, error: string, exhausted: boolean): Promise<void>;
  /** Overrides the scheduler-wide handler timeout. */
  timeoutMs?: number;
}

export interface JobSchedulerOptions {
  jobPollCron?: string;
  meetingPollCron?: string;
  batchSize?: number;
  retryDelayMs?: number;
  defaultMaxAttempts?: number;
  meetingLookbackMs?: number;
  handlerTimeoutMs?: number;
  shutdownGraceMs?: number;
}

export interface MeetingPollResult {
  started: string[];
  completed: string[];
}

export interface SchedulerStatus {
  running: boolean;
  inFlight: number;
  jobTypes: string[];
  passes: PassMetadata[];
}

export const JOB_POLL_PASS = "jobs.poll";
export const MEETING_POLL_PASS = "meetings.poll";

/** Errors that no amount of retrying will fix. */
function isPermanent(err: unknown): boolean {
  return (
    err instanceof ValidationError ||
    err instanceof NotFoundError ||
    err instanceof UnknownJobTypeError
  );
}

/**
 * Time-driven dispatcher. Polls the store for due jobs and dispatches each
 * one concurrently under a claim, a timeout and the fixed-delay retry
 * policy; separately advances meetings whose scheduled time has come.
 */
export class JobScheduler {
  private store: TaskStore;
  private orchestrator: TaskOrchestrator;
  private cron: CronRunner;
  private logger: Logger;
  private handlers = new Map<string, JobHandler>();
  private inFlight = new Set<Promise<void>>();
  private activePolls = new Set<Promise<unknown>>();
  private frozen = false;
  private running = false;
  private stopped = false;

  private jobPollCron: string;
  private meetingPollCron: string;
  private batchSize: number;
  private retryDelayMs: number;
  private defaultMaxAttempts: number;
  private meetingLookbackMs: number;
  private handlerTimeoutMs: number;
  private shutdownGraceMs: number;

  constructor(
    store: TaskStore,
    orchestrator: TaskOrchestrator,
    executor: ActionExecutor,
    cron: CronRunner,
    logger: Logger,
    options: JobSchedulerOptions = {}
  ) {
    this.store = store;
    this.orchestrator = orchestrator;
    this.cron = cron;
    this.logger = logger;
    this.jobPollCron = options.jobPollCron ?? "*/30 * * * * *";
    this.meetingPollCron = options.meetingPollCron ?? "0 * * * * *";
    this.batchSize = options.batchSize ?? 10;
    this.retryDelayMs = options.retryDelayMs ?? 5 * 60 * 1000;
    this.defaultMaxAttempts = options.defaultMaxAttempts ?? 3;
    this.meetingLookbackMs = options.meetingLookbackMs ?? 2 * 60 * 60 * 1000;
    this.handlerTimeoutMs = options.handlerTimeoutMs ?? 60_000;
    this.shutdownGraceMs = options.shutdownGraceMs ?? 30_000;

    this.handlers.set(EXECUTE_SUBSTEP_JOB, executeSubstepHandler(orchestrator, logger));
    this.handlers.set("send_reminder", sendReminderHandler(executor));
    this.handlers.set("check_participant", checkParticipantHandler());
  }

  /** Register a handler. Only allowed before `start()`. */
  registerHandler(jobType: string, handler: JobHandler): void {
    if (this.frozen) {
      throw new Error(`Cannot register job type ${jobType} after the scheduler started`);
    }
    if (this.handlers.has(jobType)) {
      this.logger.warn({ jobType }, "Job handler already registered, replacing");
    }
    this.handlers.set(jobType, handler);
  }

  listJobTypes(): string[] {
    return Array.from(this.handlers.keys()).sort();
  }

  /** Create a job, applying the default attempt budget. */
  async scheduleJob(
    job: Omit<NewJob, "maxAttempts"> & { maxAttempts?: number }
  ): Promise<ScheduledJob> {
    if (!this.handlers.has(job.jobType)) {
      throw new UnknownJobTypeError(job.jobType);
    }
    return this.store.createJob({
      ...job,
      maxAttempts: job.maxAttempts ?? this.defaultMaxAttempts,
    });
  }

  start(): void {
    if (this.running) return;
    this.frozen = true;
    this.running = true;
    this.stopped = false;

    this.cron.register({
      name: JOB_POLL_PASS,
      cronExpression: this.jobPollCron,
      description: "Dispatch due scheduled jobs",
      handler: async () => {
        await this.pollJobs();
      },
    });
    this.cron.register({
      name: MEETING_POLL_PASS,
      cronExpression: this.meetingPollCron,
      description: "Advance meetings by elapsed time",
      handler: async () => {
        await this.pollMeetings();
      },
    });

    this.logger.info(
      { jobTypes: this.listJobTypes(), jobPollCron: this.jobPollCron },
      "Job scheduler started"
    );
  }

  /**
   * Stop both passes, let polls already under way finish without claiming
   * anything new, then wait for in-flight dispatches up to the grace period.
   */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    this.stopped = true;
    this.cron.remove(JOB_POLL_PASS);
    this.cron.remove(MEETING_POLL_PASS);

    await Promise.allSettled(Array.from(this.activePolls));

    const pending = this.inFlight.size;
    if (pending > 0) {
      this.logger.info({ inFlight: pending }, "Waiting for in-flight jobs");
      let timer: NodeJS.Timeout | undefined;
      const grace = new Promise<"timeout">((resolve) => {
        timer = setTimeout(() => resolve("timeout"), this.shutdownGraceMs);
      });
      const outcome = await Promise.race([this.drain().then(() => "drained" as const), grace]);
      clearTimeout(timer);
      if (outcome === "timeout") {
        this.logger.warn(
          { inFlight: this.inFlight.size },
          "Shutdown grace period elapsed with jobs still running"
        );
      }
    }

    this.logger.info("Job scheduler stopped");
  }

  isRunning(): boolean {
    return this.running;
  }

  status(): SchedulerStatus {
    const passes = new Set([JOB_POLL_PASS, MEETING_POLL_PASS]);
    return {
      running: this.running,
      inFlight: this.inFlight.size,
      jobTypes: this.listJobTypes(),
      passes: this.cron.list().filter((p) => passes.has(p.name)),
    };
  }

  /** Wait until every dispatch started so far has settled. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled(Array.from(this.inFlight));
    }
  }

  /**
   * One job-poll cycle. Dispatches are started, not awaited.
   * Returns the number of jobs picked up.
   */
  async pollJobs(): Promise<number> {
    return this.trackPoll(this.runJobPoll());
  }

  /** One meeting-poll cycle. Meetings are processed independently. */
  async pollMeetings(): Promise<MeetingPollResult> {
    return this.trackPoll(this.runMeetingPoll());
  }

  private async trackPoll<T>(poll: Promise<T>): Promise<T> {
    this.activePolls.add(poll);
    try {
      return await poll;
    } finally {
      this.activePolls.delete(poll);
    }
  }

  private async runJobPoll(): Promise<number> {
    let due: ScheduledJob[];
    try {
      due = await this.store.listDueJobs(new Date(), this.batchSize);
    } catch (err) {
      if (err instanceof StoreUnavailableError) {
        this.logger.warn({ error: err }, "Store unavailable, skipping job poll");
        return 0;
      }
      throw err;
    }

    if (this.stopped) {
      this.logger.debug({ count: due.length }, "Scheduler stopped, leaving due jobs pending");
      return 0;
    }
    if (due.length > 0) {
      this.logger.debug({ count: due.length }, "Dispatching due jobs");
    }
    for (const job of due) {
      this.track(job);
    }
    return due.length;
  }

  private async runMeetingPoll(): Promise<MeetingPollResult> {
    const now = new Date();
    const outcome: MeetingPollResult = { started: [], completed: [] };

    let meetings: Meeting[];
    try {
      meetings = await this.store.listScheduledMeetings(["scheduled", "in_progress"], {
        from: new Date(now.getTime() - this.meetingLookbackMs),
        to: now,
      });
    } catch (err) {
      if (err instanceof StoreUnavailableError) {
        this.logger.warn({ error: err }, "Store unavailable, skipping meeting poll");
        return outcome;
      }
      throw err;
    }

    for (const meeting of meetings) {
      try {
        const change = await this.advanceMeeting(meeting, now);
        if (change === "completed") outcome.completed.push(meeting.id);
        if (change === "started") outcome.started.push(meeting.id);
      } catch (err) {
        this.logger.error({ meetingId: meeting.id, error: err }, "Failed to advance meeting");
      }
    }
    return outcome;
  }

  private async advanceMeeting(
    meeting: Meeting,
    now: Date
  ): Promise<"completed" | "started" | null> {
    const endsAt = meeting.startTime.getTime() + meeting.durationMinutes * 60_000;

    if (now.getTime() > endsAt) {
      await this.store.updateMeeting(meeting.id, { status: "completed", endTime: now });
      this.logger.info({ meetingId: meeting.id }, "Meeting completed by elapsed time");

      const taskId = await this.resolveMeetingTask(meeting);
      if (taskId) {
        await this.orchestrator.autoCompleteSubsteps(taskId);
      }
      return "completed";
    }

    if (now.getTime() >= meeting.startTime.getTime() && meeting.status === "scheduled") {
      await this.store.updateMeeting(meeting.id, { status: "in_progress" });
      this.logger.info({ meetingId: meeting.id }, "Meeting in progress");
      return "started";
    }

    return null;
  }

  private async resolveMeetingTask(meeting: Meeting): Promise<string | null> {
    if (meeting.taskId) return meeting.taskId;
    const [task] = await this.store.listTasks({ meetingId: meeting.id, limit: 1 });
    return task?.id ?? null;
  }

  private track(job: ScheduledJob): void {
    const dispatch: Promise<void> = this.dispatch(job)
      .catch((err: unknown) => {
        this.logger.error({ jobId: job.id, error: err }, "Job dispatch failed");
      })
      .finally(() => {
        this.inFlight.delete(dispatch);
      });
    this.inFlight.add(dispatch);
  }

  private async dispatch(job: ScheduledJob): Promise<void> {
    if (this.stopped) return;
    const claimed = await this.store.claimJob(job.id, new Date());
    if (!claimed) {
      this.logger.debug({ jobId: job.id }, "Job already claimed elsewhere");
      return;
    }

    const context = {
      correlationId: createCorrelationId(),
      jobId: claimed.id,
      ...(claimed.userId ? { userId: claimed.userId } : {}),
    };

    await withContext(context, async () => {
      const handler = this.handlers.get(claimed.jobType);
      if (!handler) {
        await this.recordFailure(claimed, undefined, new UnknownJobTypeError(claimed.jobType));
        return;
      }

      const startTime = Date.now();
      try {
        const result = await this.withTimeout(
          handler.run(claimed),
          handler.timeoutMs ?? this.handlerTimeoutMs,
          claimed.jobType
        );
        await this.store.updateJob(claimed.id, {
          status: "completed",
          result,
          lastError: null,
          completedAt: new Date(),
        });
        this.logger.info(
          { jobId: claimed.id, jobType: claimed.jobType, durationMs: Date.now() - startTime },
          "Job completed"
        );
      } catch (err) {
        if (err instanceof JobDeferredError) {
          await this.defer(claimed, err);
        } else {
          await this.recordFailure(claimed, handler, err);
        }
      }
    });
  }

  /** Put a job back for later and refund the attempt its claim used. */
  private async defer(job: ScheduledJob, err: JobDeferredError): Promise<void> {
    const retryAt = new Date(Date.now() + this.retryDelayMs);
    await this.store.updateJob(job.id, {
      status: "pending",
      scheduledFor: retryAt,
      attempts: Math.max(0, job.attempts - 1),
    });
    this.logger.info(
      { jobId: job.id, jobType: job.jobType, retryAt, reason: err.message },
      "Job deferred"
    );
  }

  private async recordFailure(
    job: ScheduledJob,
    handler: JobHandler | undefined,
    err: unknown
  ): Promise<void> {
    const message = describeError(err);
    const now = new Date();
    const exhausted = isPermanent(err) || job.attempts >= job.maxAttempts;

    if (exhausted) {
      await this.store.updateJob(job.id, {
        status: "failed",
        lastError: message,
        completedAt: now,
      });
      this.logger.error(
        { jobId: job.id, jobType: job.jobType, attempts: job.attempts, error: message },
        "Job failed permanently"
      );
    } else {
      const retryAt = new Date(now.getTime() + this.retryDelayMs);
      await this.store.updateJob(job.id, {
        status: "pending",
        scheduledFor: retryAt,
        lastError: message,
      });
      this.logger.warn(
        { jobId: job.id, jobType: job.jobType, attempts: job.attempts, retryAt, error: message },
        "Job failed, retry scheduled"
      );
    }

    if (handler?.onFailure) {
      try {
        await handler.onFailure(job, message, exhausted);
      } catch (hookErr) {
        this.logger.error({ jobId: job.id, error: hookErr }, "Job failure hook threw");
      }
    }
  }

  private async withTimeout<T>(work: Promise<T>, timeoutMs: number, jobType: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new HandlerError(`Job handler ${jobType} timed out after ${timeoutMs}ms`)),
        timeoutMs
      );
    });
    try {
      return await Promise.race([work, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
