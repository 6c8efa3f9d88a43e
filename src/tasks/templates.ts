import { ValidationError } from "../core/errors.js";
import type { DetectionType, JsonMap } from "./types.js";
import type { SubstepSpec, TaskSpec } from "./validation.js";

interface TemplateStep {
  id: string;
  title: string;
  weight: number;
  action: string;
  detection: DetectionType;
  /** Minutes relative to the task's start time, for scheduled steps. */
  offsetMinutes?: number;
  dependsOn?: string[];
}

interface TaskTemplate {
  titleTemplate: string;
  steps: TemplateStep[];
}

export const TASK_TEMPLATES = {
  schedule_meeting: {
    titleTemplate: "Meeting: {title}",
    steps: [
      { id: "parse_request", title: "Parse meeting request", weight: 5, action: "parse_request", detection: "immediate" },
      { id: "create_meeting_link", title: "Create meeting link", weight: 10, action: "create_meeting_link", detection: "immediate", dependsOn: ["parse_request"] },
      { id: "save_meeting", title: "Save to database", weight: 5, action: "save_meeting", detection: "immediate", dependsOn: ["create_meeting_link"] },
      { id: "send_invite_email", title: "Send invite email", weight: 20, action: "send_invite_email", detection: "immediate", dependsOn: ["save_meeting"] },
      { id: "create_calendar_event", title: "Create calendar event", weight: 10, action: "create_calendar_event", detection: "immediate", dependsOn: ["save_meeting"] },
      { id: "reminder_60", title: "Send 1hr reminder", weight: 10, action: "send_reminder", detection: "scheduled", offsetMinutes: -60, dependsOn: ["send_invite_email"] },
      { id: "reminder_10", title: "Send 10min reminder", weight: 10, action: "send_reminder", detection: "scheduled", offsetMinutes: -10, dependsOn: ["send_invite_email"] },
      { id: "detect_join", title: "Participant joins", weight: 15, action: "detect_join", detection: "webhook", dependsOn: ["send_invite_email"] },
      { id: "detect_completion", title: "Meeting completes", weight: 15, action: "detect_completion", detection: "webhook", dependsOn: ["send_invite_email"] },
    ],
  },
  send_email: {
    titleTemplate: "Email: {subject}",
    steps: [
      { id: "compose_email", title: "Compose email", weight: 20, action: "compose_email", detection: "immediate" },
      { id: "send_email", title: "Send email", weight: 60, action: "send_email", detection: "immediate", dependsOn: ["compose_email"] },
      { id: "confirm_delivery", title: "Confirm delivery", weight: 20, action: "confirm_delivery", detection: "immediate", dependsOn: ["send_email"] },
    ],
  },
  set_reminder: {
    titleTemplate: "Reminder: {title}",
    steps: [
      { id: "schedule_reminder", title: "Schedule reminder", weight: 30, action: "schedule_reminder", detection: "immediate" },
      { id: "send_reminder", title: "Send reminder", weight: 70, action: "send_reminder", detection: "scheduled", offsetMinutes: 0, dependsOn: ["schedule_reminder"] },
    ],
  },
  research: {
    titleTemplate: "Research: {topic}",
    steps: [
      { id: "web_search", title: "Search web", weight: 40, action: "web_search", detection: "immediate" },
      { id: "analyze_results", title: "Analyze results", weight: 40, action: "analyze_results", detection: "immediate", dependsOn: ["web_search"] },
      { id: "compile_report", title: "Compile report", weight: 20, action: "compile_report", detection: "immediate", dependsOn: ["analyze_results"] },
    ],
  },
} satisfies Record<string, TaskTemplate>;

export type TemplateName = keyof typeof TASK_TEMPLATES;

export const DEFAULT_MEETING_DURATION_MINUTES = 30;

export function isTemplateName(name: string): name is TemplateName {
  return Object.prototype.hasOwnProperty.call(TASK_TEMPLATES, name);
}

function formatTitle(template: string, params: JsonMap): string {
  const missing: string[] = [];
  const title = template.replace(/\{(\w+)\}/g, (_, key: string) => {
    const value = params[key];
    if (value === undefined || value === null || value === "") {
      missing.push(key);
      return "";
    }
    return String(value);
  });
  if (missing.length > 0) {
    throw new ValidationError(missing.map((k) => `params.${k}: Required`));
  }
  return title;
}

/**
 * Expand a named template into a task spec.
 * Scheduled steps are placed relative to `startTime`; without one they
 * run as soon as their dependencies allow.
 */
export function buildTemplateSpec(
  userId: string,
  templateName: string,
  params: JsonMap,
  startTime?: Date
): TaskSpec {
  if (!isTemplateName(templateName)) {
    throw new ValidationError([`unknown task template: ${templateName}`]);
  }
  const template: TaskTemplate = TASK_TEMPLATES[templateName];

  const substeps: SubstepSpec[] = template.steps.map((step, i) => ({
    id: step.id,
    stepNumber: i + 1,
    title: step.title,
    progressWeight: step.weight,
    actionType: step.action,
    actionParams: { ...params },
    detectionType: step.detection,
    dependsOn: step.dependsOn ?? [],
    scheduledAt:
      step.detection === "scheduled" && startTime
        ? new Date(startTime.getTime() + (step.offsetMinutes ?? 0) * 60_000)
        : undefined,
  }));

  let estimatedCompletion: Date | undefined;
  if (startTime) {
    const duration =
      typeof params.duration_minutes === "number"
        ? params.duration_minutes
        : DEFAULT_MEETING_DURATION_MINUTES;
    estimatedCompletion = new Date(startTime.getTime() + duration * 60_000);
  }

  return {
    userId,
    title: formatTitle(template.titleTemplate, params),
    description: typeof params.description === "string" ? params.description : undefined,
    taskType: templateName,
    substeps,
    meetingId: typeof params.meeting_id === "string" ? params.meeting_id : undefined,
    metadata: { ...params },
    estimatedCompletion,
  };
}
