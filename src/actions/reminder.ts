import type { ActionExecutor, ActionHandler } from "../core/action-executor.js";
import type { ActionResult, JsonMap } from "../tasks/types.js";

interface Participant {
  email: string;
  name: string;
}

function readParticipants(value: unknown): Participant[] {
  if (!Array.isArray(value)) return [];
  const participants: Participant[] = [];
  for (const entry of value) {
    if (typeof entry !== "object" || entry === null) continue;
    const email: unknown = Reflect.get(entry, "email");
    const name: unknown = Reflect.get(entry, "name");
    if (typeof email === "string" && email.length > 0) {
      participants.push({ email, name: typeof name === "string" ? name : "" });
    }
  }
  return participants;
}

function text(params: JsonMap, key: string, fallback: string): string {
  const value = params[key];
  return typeof value === "string" && value.length > 0 ? value : fallback;
}

export function reminderBody(name: string, title: string, link: string, time: string): string {
  return [
    `Hi ${name || "there"},`,
    "",
    `This is a reminder that your meeting "${title}" is starting soon.`,
    "",
    `Meeting Link: ${link}`,
    `Time: ${time}`,
    "",
    "Click the link above to join.",
  ].join("\n");
}

/**
 * `send_reminder` action: emails every participant through the executor's
 * `send_email` action. Fails if any individual send fails.
 */
export function createReminderAction(executor: ActionExecutor): ActionHandler {
  return async (params) => {
    const title = text(params, "title", "Meeting");
    const link = text(params, "meeting_link", "");
    const time = text(params, "start_time", "");

    const results: ActionResult[] = [];
    for (const participant of readParticipants(params.participants)) {
      results.push(
        await executor.execute("send_email", {
          to: participant.email,
          to_name: participant.name,
          subject: `Reminder: ${title} starting soon`,
          body: reminderBody(participant.name, title, link, time),
        })
      );
    }

    const failed = results.filter((r) => r.status !== "completed");
    if (failed.length > 0) {
      throw new Error(
        `${failed.length} of ${results.length} reminders failed: ${failed
          .map((r) => r.error ?? "unknown error")
          .join("; ")}`
      );
    }

    return { reminders_sent: results.length };
  };
}
