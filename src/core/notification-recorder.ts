import type { Logger } from "../utils/logger.js";
import type { EventBus, StepwiseEvent } from "./events.js";
import type { NewNotification, TaskStore } from "../store/types.js";

function str(payload: Record<string, unknown>, key: string): string {
  const value = payload[key];
  return typeof value === "string" ? value : "";
}

/** Translate a task event into the notification shown to its owner, if any. */
export function notificationFor(event: StepwiseEvent): NewNotification | null {
  const p = event.payload;
  const userId = str(p, "userId");
  const taskId = str(p, "taskId");
  const taskTitle = str(p, "taskTitle");
  if (!userId) return null;

  switch (event.eventType) {
    case "task.substep.completed":
      return {
        userId,
        taskId: taskId || null,
        title: `Task Update: ${taskTitle}`,
        body: `${str(p, "substepTitle")} completed. Progress: ${String(p.progressPercent ?? 0)}%`,
        notificationType: "task_update",
        priority: "normal",
      };
    case "task.completed":
      return {
        userId,
        taskId: taskId || null,
        title: `Task Completed: ${taskTitle}`,
        body: "All steps are done.",
        notificationType: "task_completed",
        priority: "normal",
      };
    case "task.failed":
      return {
        userId,
        taskId: taskId || null,
        title: `Task Failed: ${taskTitle}`,
        body: str(p, "error") || "A step failed.",
        notificationType: "task_failed",
        priority: "high",
      };
    case "task.input_requested":
      return {
        userId,
        taskId: taskId || null,
        title: `Input Needed: ${taskTitle}`,
        body: str(p, "prompt"),
        notificationType: "input_requested",
        priority: "high",
      };
    default:
      return null;
  }
}

/** Persists user-facing notifications from task events. */
export class NotificationRecorder {
  private store: TaskStore;
  private logger: Logger;

  constructor(store: TaskStore, logger: Logger) {
    this.store = store;
    this.logger = logger;
  }

  attach(eventBus: EventBus): void {
    eventBus.subscribe("task.*", (event) => this.record(event));
  }

  async record(event: StepwiseEvent): Promise<void> {
    const notification = notificationFor(event);
    if (!notification) return;
    await this.store.createNotification(notification);
    this.logger.debug(
      { eventType: event.eventType, taskId: notification.taskId },
      "Notification recorded"
    );
  }
}
