import { and, asc, desc, eq, gte, inArray, lte, sql } from "drizzle-orm";
import type { Database } from "../db/index.js";
import {
  meetings,
  notifications,
  orchestratedTasks,
  scheduledJobs,
  taskSubsteps,
} from "../db/schema.js";
import { StoreUnavailableError } from "../core/errors.js";
import {
  DETECTION_TYPES,
  JOB_STATUSES,
  MEETING_STATUSES,
  SUBSTEP_STATUSES,
  TASK_STATUSES,
} from "../tasks/types.js";
import type {
  Meeting,
  MeetingStatus,
  Notification,
  OrchestratedTask,
  ScheduledJob,
  Substep,
} from "../tasks/types.js";
import type {
  JobFilter,
  JobUpdate,
  MeetingUpdate,
  NewJob,
  NewMeeting,
  NewNotification,
  NotificationFilter,
  TaskFilter,
  TaskStore,
} from "./types.js";

type TaskRow = typeof orchestratedTasks.$inferSelect;
type SubstepRow = typeof taskSubsteps.$inferSelect;
type JobRow = typeof scheduledJobs.$inferSelect;
type MeetingRow = typeof meetings.$inferSelect;
type NotificationRow = typeof notifications.$inferSelect;

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

const CONNECTION_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EPIPE",
  "CONNECTION_CLOSED",
  "CONNECTION_ENDED",
  "CONNECTION_DESTROYED",
  "CONNECT_TIMEOUT",
  "57P01", // admin_shutdown
  "57P03", // cannot_connect_now
]);

/** True for errors that mean the database could not be reached. */
export function isConnectionError(err: unknown): boolean {
  for (let current: unknown = err, depth = 0; current && depth < 5; depth++) {
    if (typeof current !== "object") return false;
    if ("code" in current && typeof current.code === "string") {
      if (CONNECTION_ERROR_CODES.has(current.code)) return true;
    }
    current = "cause" in current ? current.cause : undefined;
  }
  return false;
}

function oneOf<T extends string>(values: readonly T[], value: string, fallback: T): T {
  return values.find((v) => v === value) ?? fallback;
}

function toSubstep(row: SubstepRow): Substep {
  return {
    id: row.id,
    stepNumber: row.stepNumber,
    title: row.title,
    description: row.description,
    status: oneOf(SUBSTEP_STATUSES, row.status, "pending"),
    progressWeight: row.progressWeight,
    actionType: row.actionType,
    actionParams: row.actionParams,
    result: row.result,
    errorMessage: row.errorMessage,
    detectionType: oneOf(DETECTION_TYPES, row.detectionType, "immediate"),
    detectionConfig: row.detectionConfig,
    dependsOn: row.dependsOn,
    attempts: row.attempts,
    jobId: row.jobId,
    scheduledAt: row.scheduledAt,
    startedAt: row.startedAt,
    completedAt: row.completedAt,
  };
}

function toTask(row: TaskRow, substeps: SubstepRow[]): OrchestratedTask {
  return {
    id: row.id,
    userId: row.userId,
    title: row.title,
    description: row.description,
    taskType: row.taskType,
    status: oneOf(TASK_STATUSES, row.status, "pending"),
    progressPercent: row.progressPercent,
    substeps: substeps
      .map(toSubstep)
      .sort((a, b) => a.stepNumber - b.stepNumber),
    estimatedCompletion: row.estimatedCompletion,
    actualCompletion: row.actualCompletion,
    startedAt: row.startedAt,
    needsUserInput: row.needsUserInput,
    inputPrompt: row.inputPrompt,
    inputOptions: row.inputOptions,
    userInputReceived: row.userInputReceived,
    meetingId: row.meetingId,
    messageId: row.messageId,
    metadata: row.metadata,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function toJob(row: JobRow): ScheduledJob {
  return {
    id: row.id,
    jobType: row.jobType,
    jobParams: row.jobParams,
    status: oneOf(JOB_STATUSES, row.status, "pending"),
    scheduledFor: row.scheduledFor,
    attempts: row.attempts,
    maxAttempts: row.maxAttempts,
    lastError: row.lastError,
    result: row.result,
    taskId: row.taskId,
    substepId: row.substepId,
    userId: row.userId,
    startedAt: row.startedAt,
    completedAt: row.completedAt,
    createdAt: row.createdAt,
  };
}

function toMeeting(row: MeetingRow): Meeting {
  return {
    id: row.id,
    title: row.title,
    status: oneOf(MEETING_STATUSES, row.status, "scheduled"),
    startTime: row.startTime,
    durationMinutes: row.durationMinutes,
    endTime: row.endTime,
    taskId: row.taskId,
  };
}

function toNotification(row: NotificationRow): Notification {
  return {
    id: row.id,
    userId: row.userId,
    title: row.title,
    body: row.body,
    notificationType: row.notificationType,
    priority: oneOf(["low", "normal", "high"] as const, row.priority, "normal"),
    taskId: row.taskId,
    isRead: row.isRead,
    readAt: row.readAt,
    createdAt: row.createdAt,
  };
}

/** TaskStore on Postgres through drizzle-orm and postgres.js. */
export class DrizzleTaskStore implements TaskStore {
  constructor(private db: Database) {}

  async saveTask(task: OrchestratedTask): Promise<void> {
    await this.guard("saveTask", () =>
      this.db.transaction(async (tx) => {
        const values = {
          id: task.id,
          userId: task.userId,
          title: task.title,
          description: task.description,
          taskType: task.taskType,
          status: task.status,
          progressPercent: task.progressPercent,
          estimatedCompletion: task.estimatedCompletion,
          actualCompletion: task.actualCompletion,
          startedAt: task.startedAt,
          needsUserInput: task.needsUserInput,
          inputPrompt: task.inputPrompt,
          inputOptions: task.inputOptions,
          userInputReceived: task.userInputReceived,
          meetingId: task.meetingId,
          messageId: task.messageId,
          metadata: task.metadata,
          createdAt: task.createdAt,
          updatedAt: task.updatedAt,
        };
        const { id: _taskId, createdAt: _createdAt, ...taskChanges } = values;
        await tx
          .insert(orchestratedTasks)
          .values(values)
          .onConflictDoUpdate({ target: orchestratedTasks.id, set: taskChanges });

        for (const substep of task.substeps) {
          const row = {
            taskId: task.id,
            id: substep.id,
            stepNumber: substep.stepNumber,
            title: substep.title,
            description: substep.description,
            status: substep.status,
            progressWeight: substep.progressWeight,
            actionType: substep.actionType,
            actionParams: substep.actionParams,
            result: substep.result,
            errorMessage: substep.errorMessage,
            detectionType: substep.detectionType,
            detectionConfig: substep.detectionConfig,
            dependsOn: substep.dependsOn,
            attempts: substep.attempts,
            jobId: substep.jobId,
            scheduledAt: substep.scheduledAt,
            startedAt: substep.startedAt,
            completedAt: substep.completedAt,
          };
          const { taskId: _t, id: _s, ...substepChanges } = row;
          await tx
            .insert(taskSubsteps)
            .values(row)
            .onConflictDoUpdate({
              target: [taskSubsteps.taskId, taskSubsteps.id],
              set: substepChanges,
            });
        }
      })
    );
  }

  async getTask(taskId: string): Promise<OrchestratedTask | null> {
    if (!UUID_RE.test(taskId)) return null;
    return this.guard("getTask", async () => {
      const [row] = await this.db
        .select()
        .from(orchestratedTasks)
        .where(eq(orchestratedTasks.id, taskId))
        .limit(1);
      if (!row) return null;

      const substeps = await this.db
        .select()
        .from(taskSubsteps)
        .where(eq(taskSubsteps.taskId, taskId))
        .orderBy(asc(taskSubsteps.stepNumber));
      return toTask(row, substeps);
    });
  }

  async listTasks(filter: TaskFilter): Promise<OrchestratedTask[]> {
    return this.guard("listTasks", async () => {
      const conditions = [];
      if (filter.userId) conditions.push(eq(orchestratedTasks.userId, filter.userId));
      if (filter.meetingId) conditions.push(eq(orchestratedTasks.meetingId, filter.meetingId));
      if (filter.status) {
        const statuses = Array.isArray(filter.status) ? filter.status : [filter.status];
        conditions.push(inArray(orchestratedTasks.status, statuses));
      }

      const rows = await this.db
        .select()
        .from(orchestratedTasks)
        .where(conditions.length > 0 ? and(...conditions) : undefined)
        .orderBy(desc(orchestratedTasks.createdAt))
        .limit(filter.limit ?? 100);
      if (rows.length === 0) return [];

      const substeps = await this.db
        .select()
        .from(taskSubsteps)
        .where(inArray(taskSubsteps.taskId, rows.map((r) => r.id)));

      const byTask = new Map<string, SubstepRow[]>();
      for (const s of substeps) {
        const list = byTask.get(s.taskId) ?? [];
        list.push(s);
        byTask.set(s.taskId, list);
      }
      return rows.map((row) => toTask(row, byTask.get(row.id) ?? []));
    });
  }

  async createJob(job: NewJob): Promise<ScheduledJob> {
    return this.guard("createJob", async () => {
      const [row] = await this.db
        .insert(scheduledJobs)
        .values({
          jobType: job.jobType,
          jobParams: job.jobParams,
          status: "pending",
          scheduledFor: job.scheduledFor,
          maxAttempts: job.maxAttempts,
          taskId: job.taskId ?? null,
          substepId: job.substepId ?? null,
          userId: job.userId ?? null,
        })
        .returning();
      if (!row) throw new Error("Insert into scheduled_jobs returned no row");
      return toJob(row);
    });
  }

  async getJob(jobId: string): Promise<ScheduledJob | null> {
    if (!UUID_RE.test(jobId)) return null;
    return this.guard("getJob", async () => {
      const [row] = await this.db
        .select()
        .from(scheduledJobs)
        .where(eq(scheduledJobs.id, jobId))
        .limit(1);
      return row ? toJob(row) : null;
    });
  }

  async listJobs(filter: JobFilter): Promise<ScheduledJob[]> {
    if (filter.taskId && !UUID_RE.test(filter.taskId)) return [];
    return this.guard("listJobs", async () => {
      const conditions = [];
      if (filter.status) conditions.push(eq(scheduledJobs.status, filter.status));
      if (filter.jobType) conditions.push(eq(scheduledJobs.jobType, filter.jobType));
      if (filter.taskId) conditions.push(eq(scheduledJobs.taskId, filter.taskId));

      const rows = await this.db
        .select()
        .from(scheduledJobs)
        .where(conditions.length > 0 ? and(...conditions) : undefined)
        .orderBy(desc(scheduledJobs.scheduledFor))
        .limit(filter.limit ?? 100);
      return rows.map(toJob);
    });
  }

  async listDueJobs(now: Date, limit: number): Promise<ScheduledJob[]> {
    return this.guard("listDueJobs", async () => {
      const rows = await this.db
        .select()
        .from(scheduledJobs)
        .where(and(eq(scheduledJobs.status, "pending"), lte(scheduledJobs.scheduledFor, now)))
        .orderBy(asc(scheduledJobs.scheduledFor))
        .limit(limit);
      return rows.map(toJob);
    });
  }

  async claimJob(jobId: string, now: Date): Promise<ScheduledJob | null> {
    return this.guard("claimJob", async () => {
      const [row] = await this.db
        .update(scheduledJobs)
        .set({
          status: "processing",
          attempts: sql`${scheduledJobs.attempts} + 1`,
          startedAt: now,
        })
        .where(and(eq(scheduledJobs.id, jobId), eq(scheduledJobs.status, "pending")))
        .returning();
      return row ? toJob(row) : null;
    });
  }

  async updateJob(jobId: string, update: JobUpdate): Promise<void> {
    if (Object.keys(update).length === 0) return;
    await this.guard("updateJob", () =>
      this.db.update(scheduledJobs).set(update).where(eq(scheduledJobs.id, jobId))
    );
  }

  async createMeeting(meeting: NewMeeting): Promise<Meeting> {
    return this.guard("createMeeting", async () => {
      const [row] = await this.db
        .insert(meetings)
        .values({
          title: meeting.title,
          startTime: meeting.startTime,
          durationMinutes: meeting.durationMinutes,
          taskId: meeting.taskId ?? null,
        })
        .returning();
      if (!row) throw new Error("Insert into meetings returned no row");
      return toMeeting(row);
    });
  }

  async getMeeting(meetingId: string): Promise<Meeting | null> {
    if (!UUID_RE.test(meetingId)) return null;
    return this.guard("getMeeting", async () => {
      const [row] = await this.db
        .select()
        .from(meetings)
        .where(eq(meetings.id, meetingId))
        .limit(1);
      return row ? toMeeting(row) : null;
    });
  }

  async listScheduledMeetings(
    statuses: MeetingStatus[],
    window: { from: Date; to: Date }
  ): Promise<Meeting[]> {
    if (statuses.length === 0) return [];
    return this.guard("listScheduledMeetings", async () => {
      const rows = await this.db
        .select()
        .from(meetings)
        .where(
          and(
            inArray(meetings.status, statuses),
            gte(meetings.startTime, window.from),
            lte(meetings.startTime, window.to)
          )
        )
        .orderBy(asc(meetings.startTime));
      return rows.map(toMeeting);
    });
  }

  async updateMeeting(meetingId: string, update: MeetingUpdate): Promise<void> {
    if (Object.keys(update).length === 0) return;
    await this.guard("updateMeeting", () =>
      this.db.update(meetings).set(update).where(eq(meetings.id, meetingId))
    );
  }

  async createNotification(notification: NewNotification): Promise<Notification> {
    return this.guard("createNotification", async () => {
      const [row] = await this.db
        .insert(notifications)
        .values({
          userId: notification.userId,
          title: notification.title,
          body: notification.body,
          notificationType: notification.notificationType,
          priority: notification.priority,
          taskId: notification.taskId ?? null,
        })
        .returning();
      if (!row) throw new Error("Insert into notifications returned no row");
      return toNotification(row);
    });
  }

  async listNotifications(
    userId: string,
    filter: NotificationFilter = {}
  ): Promise<Notification[]> {
    return this.guard("listNotifications", async () => {
      const conditions = [eq(notifications.userId, userId)];
      if (filter.unreadOnly) conditions.push(eq(notifications.isRead, false));

      const rows = await this.db
        .select()
        .from(notifications)
        .where(and(...conditions))
        .orderBy(desc(notifications.createdAt))
        .limit(filter.limit ?? 50);
      return rows.map(toNotification);
    });
  }

  async markNotificationRead(notificationId: string): Promise<Notification | null> {
    if (!UUID_RE.test(notificationId)) return null;
    return this.guard("markNotificationRead", async () => {
      const [row] = await this.db
        .update(notifications)
        .set({ isRead: true, readAt: new Date() })
        .where(eq(notifications.id, notificationId))
        .returning();
      return row ? toNotification(row) : null;
    });
  }

  async ping(): Promise<void> {
    await this.guard("ping", () => this.db.execute(sql`select 1`));
  }

  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (isConnectionError(err)) {
        throw new StoreUnavailableError(`Database unreachable during ${operation}`, {
          cause: err,
        });
      }
      throw err;
    }
  }
}
