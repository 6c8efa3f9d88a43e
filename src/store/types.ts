import type {
  JobStatus,
  JsonMap,
  Meeting,
  MeetingStatus,
  Notification,
  OrchestratedTask,
  ScheduledJob,
  TaskStatus,
} from "../tasks/types.js";

export interface TaskFilter {
  userId?: string;
  status?: TaskStatus | TaskStatus[];
  meetingId?: string;
  limit?: number;
}

export interface JobFilter {
  status?: JobStatus;
  jobType?: string;
  taskId?: string;
  limit?: number;
}

export interface NewJob {
  jobType: string;
  jobParams: JsonMap;
  scheduledFor: Date;
  maxAttempts: number;
  taskId?: string | null;
  substepId?: string | null;
  userId?: string | null;
}

export type JobUpdate = Partial<
  Pick<
    ScheduledJob,
    | "status"
    | "scheduledFor"
    | "attempts"
    | "lastError"
    | "result"
    | "startedAt"
    | "completedAt"
  >
>;

export interface NewMeeting {
  title: string;
  startTime: Date;
  durationMinutes: number;
  taskId?: string | null;
}

export type MeetingUpdate = Partial<Pick<Meeting, "status" | "endTime" | "taskId">>;

export interface NewNotification {
  userId: string;
  title: string;
  body: string;
  notificationType: string;
  priority: Notification["priority"];
  taskId?: string | null;
}

export interface NotificationFilter {
  unreadOnly?: boolean;
  limit?: number;
}

/**
 * Durable repository for tasks, jobs, meetings and notifications.
 * Implementations signal an unreachable backend with StoreUnavailableError.
 */
export interface TaskStore {
  /** Insert or replace a task together with all of its substeps. */
  saveTask(task: OrchestratedTask): Promise<void>;
  getTask(taskId: string): Promise<OrchestratedTask | null>;
  listTasks(filter: TaskFilter): Promise<OrchestratedTask[]>;

  createJob(job: NewJob): Promise<ScheduledJob>;
  getJob(jobId: string): Promise<ScheduledJob | null>;
  listJobs(filter: JobFilter): Promise<ScheduledJob[]>;
  /** Pending jobs with `scheduledFor <= now`, oldest first. */
  listDueJobs(now: Date, limit: number): Promise<ScheduledJob[]>;
  /**
   * Atomically move a job from `pending` to `processing`, incrementing
   * `attempts` and stamping `startedAt`. Returns null when another
   * dispatcher already claimed it.
   */
  claimJob(jobId: string, now: Date): Promise<ScheduledJob | null>;
  updateJob(jobId: string, update: JobUpdate): Promise<void>;

  createMeeting(meeting: NewMeeting): Promise<Meeting>;
  getMeeting(meetingId: string): Promise<Meeting | null>;
  /** Meetings in one of `statuses` whose start time falls within the window. */
  listScheduledMeetings(
    statuses: MeetingStatus[],
    window: { from: Date; to: Date }
  ): Promise<Meeting[]>;
  updateMeeting(meetingId: string, update: MeetingUpdate): Promise<void>;

  createNotification(notification: NewNotification): Promise<Notification>;
  listNotifications(
    userId: string,
    filter?: NotificationFilter
  ): Promise<Notification[]>;
  markNotificationRead(notificationId: string): Promise<Notification | null>;

  /** Cheap round trip used by health checks. */
  ping(): Promise<void>;
}
