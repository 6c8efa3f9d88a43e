import type {
  Meeting,
  Notification,
  OrchestratedTask,
  ScheduledJob,
  Substep,
} from "./types.js";

function iso(date: Date | null): string | null {
  return date ? date.toISOString() : null;
}

export function serializeSubstep(substep: Substep) {
  return {
    id: substep.id,
    step_number: substep.stepNumber,
    title: substep.title,
    description: substep.description,
    status: substep.status,
    progress_weight: substep.progressWeight,
    action_type: substep.actionType,
    action_params: substep.actionParams,
    result: substep.result,
    error_message: substep.errorMessage,
    detection_type: substep.detectionType,
    detection_config: substep.detectionConfig,
    depends_on: [...substep.dependsOn],
    attempts: substep.attempts,
    job_id: substep.jobId,
    scheduled_at: iso(substep.scheduledAt),
    started_at: iso(substep.startedAt),
    completed_at: iso(substep.completedAt),
  };
}

export function serializeTask(task: OrchestratedTask) {
  return {
    id: task.id,
    user_id: task.userId,
    title: task.title,
    description: task.description,
    task_type: task.taskType,
    status: task.status,
    progress_percent: task.progressPercent,
    substeps: task.substeps.map(serializeSubstep),
    estimated_completion: iso(task.estimatedCompletion),
    actual_completion: iso(task.actualCompletion),
    started_at: iso(task.startedAt),
    needs_user_input: task.needsUserInput,
    input_prompt: task.inputPrompt,
    input_options: [...task.inputOptions],
    user_input_received: task.userInputReceived,
    meeting_id: task.meetingId,
    message_id: task.messageId,
    metadata: task.metadata,
    created_at: task.createdAt.toISOString(),
    updated_at: task.updatedAt.toISOString(),
  };
}

export function serializeJob(job: ScheduledJob) {
  return {
    id: job.id,
    job_type: job.jobType,
    job_params: job.jobParams,
    status: job.status,
    scheduled_for: job.scheduledFor.toISOString(),
    attempts: job.attempts,
    max_attempts: job.maxAttempts,
    last_error: job.lastError,
    result: job.result,
    task_id: job.taskId,
    substep_id: job.substepId,
    user_id: job.userId,
    started_at: iso(job.startedAt),
    completed_at: iso(job.completedAt),
    created_at: job.createdAt.toISOString(),
  };
}

export function serializeMeeting(meeting: Meeting) {
  return {
    id: meeting.id,
    title: meeting.title,
    status: meeting.status,
    start_time: meeting.startTime.toISOString(),
    duration_minutes: meeting.durationMinutes,
    end_time: iso(meeting.endTime),
    task_id: meeting.taskId,
  };
}

export function serializeNotification(notification: Notification) {
  return {
    id: notification.id,
    user_id: notification.userId,
    title: notification.title,
    body: notification.body,
    notification_type: notification.notificationType,
    priority: notification.priority,
    task_id: notification.taskId,
    is_read: notification.isRead,
    read_at: iso(notification.readAt),
    created_at: notification.createdAt.toISOString(),
  };
}

export type SerializedTask = ReturnType<typeof serializeTask>;
export type SerializedSubstep = ReturnType<typeof serializeSubstep>;
export type SerializedJob = ReturnType<typeof serializeJob>;
