import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { Mock } from "vitest";
import { InProcessEventBus } from "../../src/core/events.js";
import { ActionRegistry } from "../../src/core/action-executor.js";
import { TaskOrchestrator } from "../../src/core/task-orchestrator.js";
import { JobScheduler } from "../../src/core/job-scheduler.js";
import { CronRunner } from "../../src/core/cron-runner.js";
import { NotificationRecorder } from "../../src/core/notification-recorder.js";
import { createReminderAction } from "../../src/actions/reminder.js";
import { MemoryTaskStore } from "../helpers/memory-store.js";
import { createMockLogger } from "../helpers/mocks.js";
import { TEST_USER_ID } from "../helpers/fixtures.js";
import type { JsonMap } from "../../src/tasks/types.js";

const NOW = new Date("2026-05-04T13:00:00.000Z");
const START = new Date("2026-05-04T14:00:00.000Z");

describe("Meeting task lifecycle", () => {
  let store: MemoryTaskStore;
  let orchestrator: TaskOrchestrator;
  let scheduler: JobScheduler;
  let cron: CronRunner;
  let sendEmail: Mock<(params: JsonMap) => Promise<JsonMap>>;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(NOW);

    const logger = createMockLogger();
    const eventBus = new InProcessEventBus(logger);
    store = new MemoryTaskStore();

    const actions = new ActionRegistry(logger, { unknownActions: "acknowledge" });
    sendEmail = vi.fn<(params: JsonMap) => Promise<JsonMap>>(async () => ({ message_id: "msg-1" }));
    actions.register("send_email", sendEmail);
    actions.register("send_reminder", createReminderAction(actions));

    orchestrator = new TaskOrchestrator(store, actions, eventBus, logger);
    new NotificationRecorder(store, logger).attach(eventBus);
    cron = new CronRunner(logger, eventBus);
    scheduler = new JobScheduler(store, orchestrator, actions, cron, logger);
  });

  afterEach(async () => {
    await scheduler.stop();
    cron.shutdown();
    vi.useRealTimers();
  });

  async function progressOf(taskId: string): Promise<number | undefined> {
    return (await store.getTask(taskId))?.progressPercent;
  }

  it("runs a scheduled meeting from request to completion", async () => {
    const meeting = await store.createMeeting({
      title: "Design review",
      startTime: START,
      durationMinutes: 30,
    });
    const created = await orchestrator.createTaskFromTemplate(
      TEST_USER_ID,
      "schedule_meeting",
      {
        title: "Design review",
        meeting_id: meeting.id,
        meeting_link: "https://meet.example.com/review",
        participants: [{ email: "ana@example.com", name: "Ana" }],
      },
      START
    );

    // Immediate steps run, reminders become jobs, webhook steps wait.
    const task = await orchestrator.executeTask(created.id);
    expect(task.progressPercent).toBe(50);
    expect(
      Object.fromEntries(task.substeps.map((s) => [s.id, s.status]))
    ).toEqual({
      parse_request: "completed",
      create_meeting_link: "completed",
      save_meeting: "completed",
      send_invite_email: "completed",
      create_calendar_event: "completed",
      reminder_60: "pending",
      reminder_10: "pending",
      detect_join: "waiting",
      detect_completion: "waiting",
    });
    expect(await store.listJobs({ taskId: created.id })).toHaveLength(2);

    // One hour before the start.
    await scheduler.pollJobs();
    await scheduler.drain();
    expect(await progressOf(created.id)).toBe(60);
    expect(sendEmail).toHaveBeenCalledTimes(1);

    // Ten minutes before the start.
    vi.setSystemTime(new Date("2026-05-04T13:50:00.000Z"));
    await scheduler.pollJobs();
    await scheduler.drain();
    expect(await progressOf(created.id)).toBe(70);
    expect(sendEmail).toHaveBeenCalledTimes(2);
    expect(sendEmail).toHaveBeenLastCalledWith(
      expect.objectContaining({
        to: "ana@example.com",
        subject: "Reminder: Design review starting soon",
      })
    );

    vi.setSystemTime(new Date("2026-05-04T14:05:00.000Z"));
    expect(await scheduler.pollMeetings()).toEqual({ started: [meeting.id], completed: [] });

    vi.setSystemTime(new Date("2026-05-04T14:31:00.000Z"));
    expect(await scheduler.pollMeetings()).toEqual({ started: [], completed: [meeting.id] });

    const finished = await store.getTask(created.id);
    expect(finished?.status).toBe("completed");
    expect(finished?.progressPercent).toBe(100);
    expect(finished?.actualCompletion).toEqual(new Date("2026-05-04T14:31:00.000Z"));

    const notifications = await store.listNotifications(TEST_USER_ID);
    expect(notifications.filter((n) => n.notificationType === "task_completed")).toHaveLength(1);
  });

  it("fails the task when a reminder keeps failing", async () => {
    sendEmail.mockRejectedValue(new Error("relay refused"));
    const created = await orchestrator.createTaskFromTemplate(
      TEST_USER_ID,
      "set_reminder",
      { title: "Water plants", participants: [{ email: "ana@example.com", name: "Ana" }] },
      NOW
    );
    await orchestrator.executeTask(created.id);

    for (const time of ["13:00", "13:05", "13:10"]) {
      vi.setSystemTime(new Date(`2026-05-04T${time}:00.000Z`));
      await scheduler.pollJobs();
      await scheduler.drain();
    }

    const task = await store.getTask(created.id);
    expect(task?.status).toBe("failed");
    expect(task?.substeps.find((s) => s.id === "send_reminder")).toMatchObject({
      status: "failed",
      attempts: 3,
      errorMessage: "1 of 1 reminders failed: relay refused",
    });

    const notifications = await store.listNotifications(TEST_USER_ID);
    expect(notifications.map((n) => n.notificationType)).toContain("task_failed");
  });
});
