export const SUBSTEP_STATUSES = [
  "pending",
  "in_progress",
  "completed",
  "failed",
  "skipped",
  "waiting",
] as const;
export type SubstepStatus = (typeof SUBSTEP_STATUSES)[number];

export const TASK_STATUSES = [
  "pending",
  "in_progress",
  "waiting_input",
  "completed",
  "failed",
  "cancelled",
] as const;
export type TaskStatus = (typeof TASK_STATUSES)[number];

export const TERMINAL_TASK_STATUSES: readonly TaskStatus[] = [
  "completed",
  "failed",
  "cancelled",
];

export const DETECTION_TYPES = [
  "immediate",
  "scheduled",
  "webhook",
  "polling",
  "manual",
] as const;
export type DetectionType = (typeof DETECTION_TYPES)[number];

export const JOB_STATUSES = [
  "pending",
  "processing",
  "completed",
  "failed",
] as const;
export type JobStatus = (typeof JOB_STATUSES)[number];

export const MEETING_STATUSES = ["scheduled", "in_progress", "completed"] as const;
export type MeetingStatus = (typeof MEETING_STATUSES)[number];

export type JsonMap = Record<string, unknown>;

export interface Substep {
  id: string;
  stepNumber: number;
  title: string;
  description: string | null;
  status: SubstepStatus;
  progressWeight: number;
  actionType: string | null;
  actionParams: JsonMap;
  result: JsonMap | null;
  errorMessage: string | null;
  detectionType: DetectionType;
  detectionConfig: JsonMap;
  dependsOn: string[];
  /** Dispatch attempts made for this substep across all of its jobs. */
  attempts: number;
  /** The scheduled job currently responsible for this substep, if any. */
  jobId: string | null;
  scheduledAt: Date | null;
  startedAt: Date | null;
  completedAt: Date | null;
}

export interface OrchestratedTask {
  id: string;
  userId: string;
  title: string;
  description: string | null;
  taskType: string;
  status: TaskStatus;
  progressPercent: number;
  substeps: Substep[];
  estimatedCompletion: Date | null;
  actualCompletion: Date | null;
  startedAt: Date | null;
  needsUserInput: boolean;
  inputPrompt: string | null;
  inputOptions: string[];
  userInputReceived: string | null;
  meetingId: string | null;
  messageId: string | null;
  metadata: JsonMap;
  createdAt: Date;
  updatedAt: Date;
}

export interface ScheduledJob {
  id: string;
  jobType: string;
  jobParams: JsonMap;
  status: JobStatus;
  scheduledFor: Date;
  attempts: number;
  maxAttempts: number;
  lastError: string | null;
  result: JsonMap | null;
  taskId: string | null;
  substepId: string | null;
  userId: string | null;
  startedAt: Date | null;
  completedAt: Date | null;
  createdAt: Date;
}

export interface Meeting {
  id: string;
  title: string;
  status: MeetingStatus;
  startTime: Date;
  durationMinutes: number;
  endTime: Date | null;
  taskId: string | null;
}

export interface Notification {
  id: string;
  userId: string;
  title: string;
  body: string;
  notificationType: string;
  priority: "low" | "normal" | "high";
  taskId: string | null;
  isRead: boolean;
  readAt: Date | null;
  createdAt: Date;
}

/** Outcome reported by an ActionExecutor. */
export interface ActionResult {
  status: "completed" | "failed";
  result?: JsonMap;
  error?: string;
}

/** Policy applied when a substep fails. */
export type FailurePolicy = "fail_fast" | "retry_substep";
