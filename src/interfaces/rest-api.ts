import Fastify from "fastify";
import type { InjectOptions, LightMyRequestResponse } from "fastify";
import type { Redis } from "ioredis";
import { z } from "zod";
import type { Logger } from "../utils/logger.js";
import type { TaskOrchestrator } from "../core/task-orchestrator.js";
import type { JobScheduler } from "../core/job-scheduler.js";
import type { TaskStore } from "../store/types.js";
import { NotFoundError, ValidationError, toHttpError } from "../core/errors.js";
import { formatZodIssues } from "../tasks/validation.js";
import { JOB_STATUSES, TASK_STATUSES } from "../tasks/types.js";
import type { OrchestratedTask } from "../tasks/types.js";
import {
  serializeJob,
  serializeMeeting,
  serializeNotification,
  serializeTask,
} from "../tasks/serialization.js";

interface HealthStatus {
  status: "ok" | "degraded" | "error";
  services: Record<string, { status: string; latency?: number }>;
  uptime: number;
}

export interface RestApiDeps {
  orchestrator: TaskOrchestrator;
  scheduler: JobScheduler;
  store: TaskStore;
  redis?: Redis;
}

interface AuthOptions {
  apiKey?: string;
  requireAuthForHealth?: boolean;
}

const SUBSTEP_FIELDS: Record<string, string> = {
  step_number: "stepNumber",
  progress_weight: "progressWeight",
  action_type: "actionType",
  action_params: "actionParams",
  detection_type: "detectionType",
  detection_config: "detectionConfig",
  depends_on: "dependsOn",
  scheduled_at: "scheduledAt",
};

const CreateTaskBodySchema = z.object({
  user_id: z.string().min(1),
  template: z.string().optional(),
  params: z.record(z.unknown()).default({}),
  start_time: z.coerce.date().optional(),
  title: z.string().optional(),
  description: z.string().optional(),
  task_type: z.string().optional(),
  substeps: z.array(z.record(z.unknown())).optional(),
  meeting_id: z.string().optional(),
  message_id: z.string().optional(),
  estimated_completion: z.coerce.date().optional(),
  metadata: z.record(z.unknown()).optional(),
  /** Run the runnable frontier before responding. */
  execute: z.boolean().default(true),
});

const ListTasksQuerySchema = z.object({
  user_id: z.string().optional(),
  status: z.enum(TASK_STATUSES).optional(),
  meeting_id: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(500).default(50),
});

const SubstepUpdateBodySchema = z.discriminatedUnion("status", [
  z.object({ status: z.literal("completed"), result: z.record(z.unknown()).default({}) }),
  z.object({ status: z.literal("failed"), error: z.string().min(1) }),
  z.object({ status: z.literal("skipped"), reason: z.string().optional() }),
]);

const InputRequestBodySchema = z.object({
  prompt: z.string().min(1),
  options: z.array(z.string()).default([]),
});

const InputBodySchema = z.object({ value: z.string() });

const CancelBodySchema = z.object({ reason: z.string().optional() }).default({});

const NotificationsQuerySchema = z.object({
  user_id: z.string().min(1),
  unread_only: z
    .enum(["true", "false"])
    .optional()
    .transform((v) => v === "true"),
  limit: z.coerce.number().int().min(1).max(200).default(50),
});

const CreateMeetingBodySchema = z.object({
  title: z.string().min(1),
  start_time: z.coerce.date(),
  duration_minutes: z.number().int().positive().default(30),
  task_id: z.string().uuid().optional(),
});

const MeetingWebhookBodySchema = z.object({
  event: z.enum(["participant_joined", "conference_ended"]),
  participant: z.string().optional(),
});

const JobsQuerySchema = z.object({
  status: z.enum(JOB_STATUSES).optional(),
  job_type: z.string().optional(),
  task_id: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(500).default(100),
});

function parse<T extends z.ZodTypeAny>(schema: T, value: unknown): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) throw new ValidationError(formatZodIssues(result.error));
  return result.data;
}

function camelizeSubstep(raw: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(raw).map(([key, value]) => [SUBSTEP_FIELDS[key] ?? key, value])
  );
}

export class RestApi {
  private app = Fastify({ logger: false });
  private logger: Logger;
  private startTime = Date.now();
  private deps: RestApiDeps;
  private authOptions: AuthOptions;

  constructor(logger: Logger, deps: RestApiDeps, authOptions?: AuthOptions) {
    this.logger = logger;
    this.deps = deps;
    this.authOptions = authOptions ?? {};
    this.setupAuth();
    this.setupErrorHandler();
    this.setupHealth();
    this.setupTaskRoutes();
    this.setupNotificationRoutes();
    this.setupMeetingRoutes();
    this.setupJobRoutes();
  }

  /** In-process request, for tests and probes. */
  inject(options: InjectOptions): Promise<LightMyRequestResponse> {
    return this.app.inject(options);
  }

  private setupAuth(): void {
    const { apiKey, requireAuthForHealth } = this.authOptions;
    if (!apiKey) return; // No API key configured, open access

    this.app.addHook("onRequest", async (request, reply) => {
      if (request.url === "/health" && !requireAuthForHealth) {
        return;
      }

      const authHeader = request.headers.authorization;
      if (!authHeader || authHeader !== `Bearer ${apiKey}`) {
        return reply.code(401).send({ error: "Unauthorized" });
      }
    });
  }

  private setupErrorHandler(): void {
    this.app.setErrorHandler((error, request, reply) => {
      const mapped = toHttpError(error);

      // Fastify's own request errors (bad JSON, body too large) keep their status.
      if (
        mapped.statusCode === 500 &&
        typeof error.statusCode === "number" &&
        error.statusCode < 500
      ) {
        return reply.code(error.statusCode).send({ error: error.message, code: "BAD_REQUEST" });
      }

      if (mapped.statusCode >= 500) {
        this.logger.error({ error, method: request.method, url: request.url }, "Request failed");
      }
      return reply.code(mapped.statusCode).send(mapped.body);
    });
  }

  private setupHealth(): void {
    this.app.get("/health", async () => {
      const services: Record<string, { status: string; latency?: number }> = {
        core: { status: "running" },
        scheduler: { status: this.deps.scheduler.isRunning() ? "running" : "stopped" },
      };
      let overallStatus: "ok" | "degraded" | "error" = "ok";

      try {
        const start = Date.now();
        await this.deps.store.ping();
        services.database = { status: "connected", latency: Date.now() - start };
      } catch (err) {
        this.logger.debug({ error: err }, "Database health check failed");
        services.database = { status: "disconnected" };
        overallStatus = "error";
      }

      if (this.deps.redis) {
        try {
          const start = Date.now();
          await this.deps.redis.ping();
          services.redis = {
            status: "connected",
            latency: Date.now() - start,
          };
        } catch (err) {
          this.logger.debug({ error: err }, "Redis health check failed");
          services.redis = { status: "disconnected" };
          if (overallStatus === "ok") overallStatus = "degraded";
        }
      }

      const status: HealthStatus = {
        status: overallStatus,
        services,
        uptime: (Date.now() - this.startTime) / 1000,
      };
      return status;
    });
  }

  private setupTaskRoutes(): void {
    const { orchestrator } = this.deps;

    this.app.post("/api/v2/tasks", async (request, reply) => {
      const body = parse(CreateTaskBodySchema, request.body);

      let task: OrchestratedTask;
      if (body.template) {
        task = await orchestrator.createTaskFromTemplate(
          body.user_id,
          body.template,
          body.params,
          body.start_time
        );
      } else {
        task = await orchestrator.createTask({
          userId: body.user_id,
          title: body.title,
          description: body.description,
          taskType: body.task_type,
          substeps: (body.substeps ?? []).map(camelizeSubstep),
          meetingId: body.meeting_id,
          messageId: body.message_id,
          estimatedCompletion: body.estimated_completion,
          metadata: body.metadata,
        });
      }

      if (body.execute) {
        task = await orchestrator.executeTask(task.id);
      }
      return reply.code(201).send({ task: serializeTask(task) });
    });

    this.app.get("/api/v2/tasks", async (request) => {
      const query = parse(ListTasksQuerySchema, request.query);
      const tasks = await orchestrator.listTasks({
        userId: query.user_id,
        status: query.status,
        meetingId: query.meeting_id,
        limit: query.limit,
      });
      return { tasks: tasks.map(serializeTask), count: tasks.length };
    });

    this.app.get<{ Params: { taskId: string } }>("/api/v2/tasks/:taskId", async (request) => {
      const task = await this.requireTask(request.params.taskId);
      return {
        task: serializeTask(task),
        next_substeps: orchestrator.nextRunnableSubsteps(task).map((s) => s.id),
      };
    });

    this.app.put<{ Params: { taskId: string; substepId: string } }>(
      "/api/v2/tasks/:taskId/substeps/:substepId",
      async (request) => {
        const { taskId, substepId } = request.params;
        const body = parse(SubstepUpdateBodySchema, request.body);

        let task: OrchestratedTask;
        switch (body.status) {
          case "completed":
            task = await orchestrator.completeSubstep(taskId, substepId, body.result);
            break;
          case "failed":
            task = await orchestrator.failSubstep(taskId, substepId, body.error);
            break;
          case "skipped":
            task = await orchestrator.skipSubstep(taskId, substepId, body.reason);
            break;
        }
        return { task: serializeTask(task) };
      }
    );

    this.app.post<{ Params: { taskId: string } }>(
      "/api/v2/tasks/:taskId/execute",
      async (request) => {
        const task = await orchestrator.executeTask(request.params.taskId);
        return { task: serializeTask(task) };
      }
    );

    this.app.post<{ Params: { taskId: string } }>(
      "/api/v2/tasks/:taskId/input-request",
      async (request) => {
        const body = parse(InputRequestBodySchema, request.body);
        const task = await orchestrator.requestUserInput(
          request.params.taskId,
          body.prompt,
          body.options
        );
        return { task: serializeTask(task) };
      }
    );

    this.app.post<{ Params: { taskId: string } }>(
      "/api/v2/tasks/:taskId/input",
      async (request) => {
        const body = parse(InputBodySchema, request.body);
        const task = await orchestrator.provideUserInput(request.params.taskId, body.value);
        return { task: serializeTask(task) };
      }
    );

    this.app.post<{ Params: { taskId: string } }>(
      "/api/v2/tasks/:taskId/cancel",
      async (request) => {
        const body = parse(CancelBodySchema, request.body ?? undefined);
        const task = await orchestrator.cancelTask(request.params.taskId, body.reason);
        return { task: serializeTask(task) };
      }
    );
  }

  private setupNotificationRoutes(): void {
    const { store } = this.deps;

    this.app.get("/api/v2/notifications", async (request) => {
      const query = parse(NotificationsQuerySchema, request.query);
      const notifications = await store.listNotifications(query.user_id, {
        unreadOnly: query.unread_only,
        limit: query.limit,
      });
      return { notifications: notifications.map(serializeNotification) };
    });

    this.app.post<{ Params: { notificationId: string } }>(
      "/api/v2/notifications/:notificationId/read",
      async (request) => {
        const notification = await store.markNotificationRead(request.params.notificationId);
        if (!notification) {
          throw new NotFoundError("notification", request.params.notificationId);
        }
        return { notification: serializeNotification(notification) };
      }
    );
  }

  private setupMeetingRoutes(): void {
    const { store, orchestrator } = this.deps;

    this.app.post("/api/v2/meetings", async (request, reply) => {
      const body = parse(CreateMeetingBodySchema, request.body);
      const meeting = await store.createMeeting({
        title: body.title,
        startTime: body.start_time,
        durationMinutes: body.duration_minutes,
        taskId: body.task_id ?? null,
      });
      return reply.code(201).send({ meeting: serializeMeeting(meeting) });
    });

    this.app.post<{ Params: { meetingId: string } }>(
      "/api/v2/meetings/:meetingId/webhook",
      async (request) => {
        const { meetingId } = request.params;
        const body = parse(MeetingWebhookBodySchema, request.body);

        const meeting = await store.getMeeting(meetingId);
        if (!meeting) throw new NotFoundError("meeting", meetingId);

        const taskId =
          meeting.taskId ??
          (await orchestrator.listTasks({ meetingId, limit: 1 }))[0]?.id ??
          null;

        if (body.event === "conference_ended" && meeting.status !== "completed") {
          await store.updateMeeting(meetingId, { status: "completed", endTime: new Date() });
        }
        if (!taskId) {
          this.logger.info({ meetingId, event: body.event }, "Meeting webhook with no linked task");
          return { meeting_id: meetingId, event: body.event, task: null };
        }

        const substepId = body.event === "participant_joined" ? "detect_join" : "detect_completion";
        const task = await orchestrator.completeSubstep(taskId, substepId, {
          event: body.event,
          ...(body.participant ? { participant: body.participant } : {}),
        });
        this.logger.info({ meetingId, taskId, event: body.event }, "Meeting webhook applied");
        return { meeting_id: meetingId, event: body.event, task: serializeTask(task) };
      }
    );
  }

  private setupJobRoutes(): void {
    const { store, scheduler } = this.deps;

    this.app.get("/api/v2/jobs", async (request) => {
      const query = parse(JobsQuerySchema, request.query);
      const jobs = await store.listJobs({
        status: query.status,
        jobType: query.job_type,
        taskId: query.task_id,
        limit: query.limit,
      });
      return { jobs: jobs.map(serializeJob), count: jobs.length };
    });

    this.app.get("/api/v2/scheduler/status", async () => {
      const status = scheduler.status();
      return {
        running: status.running,
        in_flight: status.inFlight,
        job_types: status.jobTypes,
        passes: status.passes.map((p) => ({
          name: p.name,
          cron: p.cronExpression,
          running: p.running,
          run_count: p.runCount,
          last_run_at: p.lastRun?.toISOString() ?? null,
          last_result: p.lastResult,
          last_error: p.lastError,
          next_run_at: p.nextRun?.toISOString() ?? null,
        })),
      };
    });
  }

  private async requireTask(taskId: string): Promise<OrchestratedTask> {
    const task = await this.deps.orchestrator.getTask(taskId);
    if (!task) throw new NotFoundError("task", taskId);
    return task;
  }

  async start(port: number, host: string): Promise<void> {
    await this.app.listen({ port, host });
    this.logger.info({ port, host }, "REST API server started");
  }

  async stop(): Promise<void> {
    await this.app.close();
    this.logger.info("REST API server stopped");
  }
}
