import {
  pgTable,
  text,
  timestamp,
  integer,
  boolean,
  jsonb,
  varchar,
  index,
  uuid,
  primaryKey,
} from "drizzle-orm/pg-core";

/** Multi-step tasks. Substeps live in task_substeps. */
export const orchestratedTasks = pgTable(
  "orchestrated_tasks",
  {
    id: uuid("id").primaryKey(),
    userId: varchar("user_id", { length: 255 }).notNull(),
    title: varchar("title", { length: 500 }).notNull(),
    description: text("description"),
    taskType: varchar("task_type", { length: 50 }).default("general").notNull(),
    status: varchar("status", { length: 20 }).default("pending").notNull(),
    progressPercent: integer("progress_percent").default(0).notNull(),
    estimatedCompletion: timestamp("estimated_completion", { withTimezone: true }),
    actualCompletion: timestamp("actual_completion", { withTimezone: true }),
    startedAt: timestamp("started_at", { withTimezone: true }),
    needsUserInput: boolean("needs_user_input").default(false).notNull(),
    inputPrompt: text("input_prompt"),
    inputOptions: jsonb("input_options").$type<string[]>().default([]).notNull(),
    userInputReceived: text("user_input_received"),
    meetingId: varchar("meeting_id", { length: 255 }),
    messageId: varchar("message_id", { length: 255 }),
    metadata: jsonb("metadata").$type<Record<string, unknown>>().default({}).notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [
    index("orchestrated_tasks_user_status_idx").on(table.userId, table.status),
    index("orchestrated_tasks_meeting_idx").on(table.meetingId),
  ]
);

/** Substeps, keyed by (task_id, id): ids are only unique within a task. */
export const taskSubsteps = pgTable(
  "task_substeps",
  {
    taskId: uuid("task_id")
      .notNull()
      .references(() => orchestratedTasks.id, { onDelete: "cascade" }),
    id: varchar("id", { length: 100 }).notNull(),
    stepNumber: integer("step_number").notNull(),
    title: varchar("title", { length: 500 }).notNull(),
    description: text("description"),
    status: varchar("status", { length: 20 }).default("pending").notNull(),
    progressWeight: integer("progress_weight").default(10).notNull(),
    actionType: varchar("action_type", { length: 100 }),
    actionParams: jsonb("action_params").$type<Record<string, unknown>>().default({}).notNull(),
    result: jsonb("result").$type<Record<string, unknown>>(),
    errorMessage: text("error_message"),
    detectionType: varchar("detection_type", { length: 20 }).default("immediate").notNull(),
    detectionConfig: jsonb("detection_config").$type<Record<string, unknown>>().default({}).notNull(),
    dependsOn: jsonb("depends_on").$type<string[]>().default([]).notNull(),
    attempts: integer("attempts").default(0).notNull(),
    jobId: uuid("job_id"),
    scheduledAt: timestamp("scheduled_at", { withTimezone: true }),
    startedAt: timestamp("started_at", { withTimezone: true }),
    completedAt: timestamp("completed_at", { withTimezone: true }),
  },
  (table) => [
    primaryKey({ columns: [table.taskId, table.id] }),
    index("task_substeps_status_idx").on(table.taskId, table.status),
  ]
);

/** Durable queue of time-triggered work. */
export const scheduledJobs = pgTable(
  "scheduled_jobs",
  {
    id: uuid("id").defaultRandom().primaryKey(),
    jobType: varchar("job_type", { length: 50 }).notNull(),
    jobParams: jsonb("job_params").$type<Record<string, unknown>>().default({}).notNull(),
    status: varchar("status", { length: 20 }).default("pending").notNull(),
    scheduledFor: timestamp("scheduled_for", { withTimezone: true }).notNull(),
    attempts: integer("attempts").default(0).notNull(),
    maxAttempts: integer("max_attempts").default(3).notNull(),
    lastError: text("last_error"),
    result: jsonb("result").$type<Record<string, unknown>>(),
    taskId: uuid("task_id"),
    substepId: varchar("substep_id", { length: 100 }),
    userId: varchar("user_id", { length: 255 }),
    startedAt: timestamp("started_at", { withTimezone: true }),
    completedAt: timestamp("completed_at", { withTimezone: true }),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [
    index("scheduled_jobs_status_due_idx").on(table.status, table.scheduledFor),
    index("scheduled_jobs_task_idx").on(table.taskId),
  ]
);

export const meetings = pgTable(
  "meetings",
  {
    id: uuid("id").defaultRandom().primaryKey(),
    title: varchar("title", { length: 500 }).notNull(),
    status: varchar("status", { length: 20 }).default("scheduled").notNull(),
    startTime: timestamp("start_time", { withTimezone: true }).notNull(),
    durationMinutes: integer("duration_minutes").default(30).notNull(),
    endTime: timestamp("end_time", { withTimezone: true }),
    taskId: uuid("task_id"),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [index("meetings_status_start_idx").on(table.status, table.startTime)]
);

export const notifications = pgTable(
  "notifications",
  {
    id: uuid("id").defaultRandom().primaryKey(),
    userId: varchar("user_id", { length: 255 }).notNull(),
    title: varchar("title", { length: 500 }).notNull(),
    body: text("body").notNull(),
    notificationType: varchar("notification_type", { length: 50 }).notNull(),
    priority: varchar("priority", { length: 10 }).default("normal").notNull(),
    taskId: uuid("task_id"),
    isRead: boolean("is_read").default(false).notNull(),
    readAt: timestamp("read_at", { withTimezone: true }),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [index("notifications_user_read_idx").on(table.userId, table.isRead, table.createdAt)]
);
