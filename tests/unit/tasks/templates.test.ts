import { describe, it, expect } from "vitest";
import { TASK_TEMPLATES, buildTemplateSpec, isTemplateName } from "../../../src/tasks/templates.js";
import { parseTaskSpec, checkSubstepGraph } from "../../../src/tasks/validation.js";
import { ValidationError } from "../../../src/core/errors.js";
import { TEST_USER_ID } from "../../helpers/fixtures.js";

const START = new Date("2026-06-01T15:00:00.000Z");

describe("buildTemplateSpec", () => {
  it("expands schedule_meeting relative to the start time", () => {
    const spec = buildTemplateSpec(
      TEST_USER_ID,
      "schedule_meeting",
      { title: "Standup", duration_minutes: 45, meeting_id: "m-1" },
      START
    );

    expect(spec.title).toBe("Meeting: Standup");
    expect(spec.taskType).toBe("schedule_meeting");
    expect(spec.meetingId).toBe("m-1");
    expect(spec.estimatedCompletion).toEqual(new Date("2026-06-01T15:45:00.000Z"));

    const substeps = spec.substeps ?? [];
    expect(substeps.map((s) => s.id)).toEqual([
      "parse_request",
      "create_meeting_link",
      "save_meeting",
      "send_invite_email",
      "create_calendar_event",
      "reminder_60",
      "reminder_10",
      "detect_join",
      "detect_completion",
    ]);

    const reminder60 = substeps.find((s) => s.id === "reminder_60");
    const reminder10 = substeps.find((s) => s.id === "reminder_10");
    expect(reminder60?.scheduledAt).toEqual(new Date("2026-06-01T14:00:00.000Z"));
    expect(reminder10?.scheduledAt).toEqual(new Date("2026-06-01T14:50:00.000Z"));
    expect(substeps.find((s) => s.id === "detect_join")?.detectionType).toBe("webhook");
  });

  it("defaults the meeting duration to 30 minutes", () => {
    const spec = buildTemplateSpec(TEST_USER_ID, "schedule_meeting", { title: "Sync" }, START);
    expect(spec.estimatedCompletion).toEqual(new Date("2026-06-01T15:30:00.000Z"));
  });

  it("leaves scheduled steps unscheduled without a start time", () => {
    const spec = buildTemplateSpec(TEST_USER_ID, "set_reminder", { title: "Water plants" });
    expect(spec.estimatedCompletion).toBeUndefined();
    expect(spec.substeps?.every((s) => s.scheduledAt === undefined)).toBe(true);
  });

  it("copies params into every step's action params", () => {
    const spec = buildTemplateSpec(TEST_USER_ID, "research", { topic: "tide tables" });
    expect(spec.title).toBe("Research: tide tables");
    for (const s of spec.substeps ?? []) {
      expect(s.actionParams).toEqual({ topic: "tide tables" });
    }
  });

  it("requires the params its title uses", () => {
    expect(() => buildTemplateSpec(TEST_USER_ID, "send_email", {})).toThrow(ValidationError);
    expect(() => buildTemplateSpec(TEST_USER_ID, "send_email", { subject: "" })).toThrow(
      "Invalid input: params.subject: Required"
    );
  });

  it("rejects unknown templates", () => {
    expect(() => buildTemplateSpec(TEST_USER_ID, "juggle", {})).toThrow(
      "unknown task template: juggle"
    );
  });
});

describe("TASK_TEMPLATES", () => {
  it.each(Object.keys(TASK_TEMPLATES))("%s produces a valid acyclic spec", (name) => {
    const spec = parseTaskSpec(
      buildTemplateSpec(
        TEST_USER_ID,
        name,
        { title: "t", subject: "s", topic: "x" },
        START
      )
    );
    const substeps = spec.substeps.map((s) => ({ id: s.id ?? "", dependsOn: s.dependsOn }));
    expect(() => checkSubstepGraph(substeps)).not.toThrow();
  });

  it("gives schedule_meeting weights summing to 100", () => {
    const total = TASK_TEMPLATES.schedule_meeting.steps.reduce((sum, s) => sum + s.weight, 0);
    expect(total).toBe(100);
  });

  it("recognises template names", () => {
    expect(isTemplateName("research")).toBe(true);
    expect(isTemplateName("toString")).toBe(false);
  });
});
