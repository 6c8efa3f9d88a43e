import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  AUTO_COMPLETE_RESULT,
  EXECUTE_SUBSTEP_JOB,
  TaskOrchestrator,
} from "../../../src/core/task-orchestrator.js";
import {
  HandlerError,
  InvalidTransitionError,
  NotFoundError,
  ValidationError,
} from "../../../src/core/errors.js";
import type { EventBus } from "../../../src/core/events.js";
import { MemoryTaskStore } from "../../helpers/memory-store.js";
import { createMockEventBus, createMockLogger, createScriptedExecutor } from "../../helpers/mocks.js";
import { TEST_USER_ID, step, taskSpec } from "../../helpers/fixtures.js";

const NOW = new Date("2026-04-10T12:00:00.000Z");

describe("TaskOrchestrator", () => {
  let store: MemoryTaskStore;
  let eventBus: ReturnType<typeof createMockEventBus>;
  let executor: ReturnType<typeof createScriptedExecutor>;
  let logger: ReturnType<typeof createMockLogger>;
  let orchestrator: TaskOrchestrator;

  beforeEach(() => {
    vi.clearAllMocks();
    store = new MemoryTaskStore();
    eventBus = createMockEventBus();
    executor = createScriptedExecutor();
    logger = createMockLogger();
    orchestrator = new TaskOrchestrator(store, executor, eventBus, logger);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe("createTask", () => {
    it("assigns step numbers and starts tasks with immediate work", async () => {
      const task = await orchestrator.createTask(
        taskSpec([step("a"), step("b", { dependsOn: ["a"] })])
      );

      expect(task.status).toBe("in_progress");
      expect(task.startedAt).not.toBeNull();
      expect(task.progressPercent).toBe(0);
      expect(task.substeps.map((s) => [s.id, s.stepNumber, s.status, s.attempts])).toEqual([
        ["a", 1, "pending", 0],
        ["b", 2, "pending", 0],
      ]);
      expect(eventBus.eventTypes()).toEqual(["task.created"]);
      expect(await store.getTask(task.id)).toEqual(task);
    });

    it("leaves tasks with only event-driven work pending", async () => {
      const task = await orchestrator.createTask(
        taskSpec([step("join", { detectionType: "webhook" })])
      );
      expect(task.status).toBe("pending");
      expect(task.startedAt).toBeNull();
    });

    it("generates ids for substeps that have none", async () => {
      const task = await orchestrator.createTask(
        taskSpec([{ title: "Anonymous step" }])
      );
      expect(task.substeps[0]!.id).toMatch(/^[0-9a-f-]{36}$/);
    });

    it("rejects invalid dependency graphs without saving", async () => {
      await expect(
        orchestrator.createTask(taskSpec([step("a", { dependsOn: ["ghost"] })]))
      ).rejects.toThrow(ValidationError);
      expect(store.tasks.size).toBe(0);
      expect(eventBus.publishedEvents).toHaveLength(0);
    });
  });

  describe("executeTask", () => {
    it("runs immediate substeps in dependency order to completion", async () => {
      const created = await orchestrator.createTask(
        taskSpec([
          step("a", { progressWeight: 10 }),
          step("b", { progressWeight: 30, dependsOn: ["a"] }),
        ])
      );

      const task = await orchestrator.executeTask(created.id);

      expect(executor.calls.map((c) => c.actionType)).toEqual(["do_a", "do_b"]);
      expect(task.status).toBe("completed");
      expect(task.progressPercent).toBe(100);
      expect(task.actualCompletion).not.toBeNull();
      expect(task.substeps.every((s) => s.attempts === 1)).toBe(true);
      expect(eventBus.eventTypes()).toEqual([
        "task.created",
        "task.updated",
        "task.substep.completed",
        "task.updated",
        "task.substep.completed",
        "task.completed",
      ]);
      const progress = eventBus.publishedEvents
        .filter((e) => e.eventType === "task.substep.completed")
        .map((e) => e.payload.progressPercent);
      expect(progress).toEqual([25, 100]);
    });

    it("passes action params to the executor and stores the result", async () => {
      executor.script.do_a = [{ status: "completed", result: { message_id: "m-42" } }];
      const created = await orchestrator.createTask(
        taskSpec([step("a", { actionParams: { to: "someone@example.com" } })])
      );

      const task = await orchestrator.executeTask(created.id);

      expect(executor.calls[0]).toEqual({
        actionType: "do_a",
        params: { to: "someone@example.com" },
      });
      expect(task.substeps[0]!.result).toEqual({ message_id: "m-42" });
    });

    it("completes substeps without an action type directly", async () => {
      const created = await orchestrator.createTask(
        taskSpec([{ id: "note", title: "Just a marker" }])
      );
      const task = await orchestrator.executeTask(created.id);
      expect(executor.calls).toHaveLength(0);
      expect(task.status).toBe("completed");
    });

    it("fails the task on the first substep failure under fail_fast", async () => {
      executor.script.do_a = [{ status: "failed", error: "smtp down" }];
      const created = await orchestrator.createTask(taskSpec([step("a"), step("b", { dependsOn: ["a"] })]));

      const task = await orchestrator.executeTask(created.id);

      expect(task.status).toBe("failed");
      expect(task.substeps[0]).toMatchObject({ status: "failed", errorMessage: "smtp down" });
      expect(task.substeps[1]!.status).toBe("pending");
      expect(executor.calls).toHaveLength(1);
      expect(eventBus.eventTypes()).toContain("task.failed");
    });

    it("stops a batch once a failure ends the task and returns unrun substeps to pending", async () => {
      executor.script.do_a = [{ status: "failed", error: "smtp down" }];
      const created = await orchestrator.createTask(taskSpec([step("a"), step("b")]));

      const task = await orchestrator.executeTask(created.id);

      expect(task.status).toBe("failed");
      expect(executor.calls.map((c) => c.actionType)).toEqual(["do_a"]);
      expect(task.substeps[0]).toMatchObject({ status: "failed", attempts: 1 });
      expect(task.substeps[1]).toMatchObject({ status: "pending", attempts: 0, startedAt: null });
      expect(await store.getTask(created.id)).toEqual(task);
    });

    it("releases the batch when the task is cancelled while an action runs", async () => {
      const created = await orchestrator.createTask(taskSpec([step("a"), step("b")]));
      executor.script.do_a = [
        async () => {
          await orchestrator.cancelTask(created.id, "changed plans");
          return { status: "completed", result: {} };
        },
      ];

      const task = await orchestrator.executeTask(created.id);

      expect(task.status).toBe("cancelled");
      expect(executor.calls.map((c) => c.actionType)).toEqual(["do_a"]);
      expect(task.substeps.map((s) => [s.id, s.status, s.attempts])).toEqual([
        ["a", "pending", 1],
        ["b", "pending", 0],
      ]);
    });

    it("turns executor exceptions into substep failures", async () => {
      executor.script.do_a = [
        () => {
          throw new Error("connection reset");
        },
      ];
      const created = await orchestrator.createTask(taskSpec([step("a")]));

      const task = await orchestrator.executeTask(created.id);

      expect(task.status).toBe("failed");
      expect(task.substeps[0]!.errorMessage).toBe("connection reset");
    });

    it("hands scheduled substeps to the job queue once", async () => {
      const when = new Date("2026-04-10T13:00:00.000Z");
      const created = await orchestrator.createTask(
        taskSpec([step("remind", { detectionType: "scheduled", scheduledAt: when })])
      );

      const task = await orchestrator.executeTask(created.id);
      await orchestrator.executeTask(created.id);

      const jobs = Array.from(store.jobs.values());
      expect(jobs).toHaveLength(1);
      expect(jobs[0]).toMatchObject({
        jobType: EXECUTE_SUBSTEP_JOB,
        jobParams: { task_id: created.id, substep_id: "remind", user_id: TEST_USER_ID },
        scheduledFor: when,
        maxAttempts: 3,
        taskId: created.id,
        substepId: "remind",
      });
      expect(task.status).toBe("in_progress");
      expect(task.substeps[0]).toMatchObject({ status: "pending", jobId: jobs[0]!.id });
      expect(executor.calls).toHaveLength(0);
    });

    it("parks webhook, polling and manual substeps in waiting", async () => {
      const created = await orchestrator.createTask(
        taskSpec([
          step("hook", { detectionType: "webhook" }),
          step("poll", { detectionType: "polling" }),
          step("human", { detectionType: "manual" }),
        ])
      );

      const task = await orchestrator.executeTask(created.id);

      expect(task.status).toBe("in_progress");
      expect(task.substeps.map((s) => s.status)).toEqual(["waiting", "waiting", "waiting"]);
      expect(executor.calls).toHaveLength(0);
    });

    it("throws NotFoundError for an unknown task", async () => {
      await expect(orchestrator.executeTask("missing")).rejects.toThrow(NotFoundError);
    });
  });

  describe("retry_substep policy", () => {
    beforeEach(() => {
      orchestrator = new TaskOrchestrator(store, executor, eventBus, logger, {
        failurePolicy: "retry_substep",
        maxSubstepAttempts: 2,
        retryDelayMs: 60_000,
      });
    });

    it("returns a failed substep to pending behind a delayed retry job", async () => {
      vi.useFakeTimers();
      vi.setSystemTime(NOW);
      executor.script.do_a = [{ status: "failed", error: "flaky" }];
      const created = await orchestrator.createTask(taskSpec([step("a")]));

      const task = await orchestrator.executeTask(created.id);

      const jobs = Array.from(store.jobs.values());
      expect(jobs).toHaveLength(1);
      expect(jobs[0]!.scheduledFor).toEqual(new Date(NOW.getTime() + 60_000));
      expect(task.status).toBe("in_progress");
      expect(task.substeps[0]).toMatchObject({
        status: "pending",
        attempts: 1,
        errorMessage: "flaky",
        jobId: jobs[0]!.id,
      });
      // The retry job owns the substep; execution does not rerun it early.
      expect(executor.calls).toHaveLength(1);
      const failed = eventBus.publishedEvents.find((e) => e.eventType === "task.substep.failed");
      expect(failed?.payload.willRetry).toBe(true);
    });

    it("fails the substep once attempts run out but keeps the task alive", async () => {
      const created = await orchestrator.createTask(
        taskSpec([step("r", { detectionType: "scheduled" }), step("hook", { detectionType: "webhook" })])
      );

      await orchestrator.beginSubstepDispatch(created.id, "r");
      const retried = await orchestrator.failSubstep(created.id, "r", "first");
      expect(retried.substeps[0]).toMatchObject({ status: "pending", attempts: 1 });

      await orchestrator.beginSubstepDispatch(created.id, "r");
      const task = await orchestrator.failSubstep(created.id, "r", "second");

      expect(task.substeps[0]).toMatchObject({ status: "failed", attempts: 2, errorMessage: "second" });
      expect(task.status).toBe("in_progress");
    });

    it("fails the task when the only remaining work depends on a failure", async () => {
      orchestrator = new TaskOrchestrator(store, executor, eventBus, logger, {
        failurePolicy: "retry_substep",
        maxSubstepAttempts: 1,
      });
      executor.script.do_a = [{ status: "failed", error: "nope" }];
      const created = await orchestrator.createTask(
        taskSpec([step("a"), step("b", { dependsOn: ["a"] })])
      );

      const task = await orchestrator.executeTask(created.id);

      expect(task.status).toBe("failed");
      expect(task.substeps.map((s) => s.status)).toEqual(["failed", "pending"]);
    });

    it("fails the task once independent branches finish around a failure", async () => {
      orchestrator = new TaskOrchestrator(store, executor, eventBus, logger, {
        failurePolicy: "retry_substep",
        maxSubstepAttempts: 1,
      });
      executor.script.do_a = [{ status: "failed", error: "nope" }];
      const created = await orchestrator.createTask(
        taskSpec([step("a"), step("hook", { detectionType: "webhook" })])
      );

      const running = await orchestrator.executeTask(created.id);
      expect(running.status).toBe("in_progress");

      const task = await orchestrator.completeSubstep(created.id, "hook");
      expect(task.status).toBe("failed");
      expect(eventBus.publishedEvents.at(-1)).toMatchObject({
        eventType: "task.failed",
        payload: { error: "No remaining substep can run" },
      });
    });
  });

  describe("completeSubstep", () => {
    it("is idempotent for an already completed substep", async () => {
      const created = await orchestrator.createTask(
        taskSpec([step("a", { detectionType: "webhook" }), step("b", { detectionType: "webhook" })])
      );
      await orchestrator.completeSubstep(created.id, "a", { ok: true });
      const saves = store.saveCount;
      const events = eventBus.publishedEvents.length;

      const task = await orchestrator.completeSubstep(created.id, "a", { ok: false });

      expect(task.substeps[0]!.result).toEqual({ ok: true });
      expect(store.saveCount).toBe(saves);
      expect(eventBus.publishedEvents).toHaveLength(events);
    });

    it("reports the final task status on the completion that finishes the task", async () => {
      const created = await orchestrator.createTask(
        taskSpec([step("a", { detectionType: "webhook" })])
      );

      await orchestrator.completeSubstep(created.id, "a", { ok: true });

      const completed = eventBus.publishedEvents.find(
        (e) => e.eventType === "task.substep.completed"
      );
      expect(completed?.payload).toMatchObject({
        substepId: "a",
        taskStatus: "completed",
        progressPercent: 100,
      });
      expect(eventBus.eventTypes()).toEqual([
        "task.created",
        "task.substep.completed",
        "task.completed",
      ]);
    });

    it("applies concurrent completions one at a time without losing updates", async () => {
      const created = await orchestrator.createTask(
        taskSpec([
          step("a", { detectionType: "webhook" }),
          step("b", { detectionType: "webhook" }),
          step("c", { detectionType: "webhook" }),
        ])
      );

      await Promise.all([
        orchestrator.completeSubstep(created.id, "a"),
        orchestrator.completeSubstep(created.id, "b"),
        orchestrator.completeSubstep(created.id, "c"),
      ]);

      const task = await orchestrator.getTask(created.id);
      expect(task?.status).toBe("completed");
      expect(task?.progressPercent).toBe(100);
      const progress = eventBus.publishedEvents
        .filter((e) => e.eventType === "task.substep.completed")
        .map((e) => [e.payload.substepId, e.payload.progressPercent]);
      expect(progress).toEqual([
        ["a", 33],
        ["b", 66],
        ["c", 100],
      ]);
    });

    it("rejects completion on a terminal task", async () => {
      const created = await orchestrator.createTask(
        taskSpec([step("a", { detectionType: "webhook" })])
      );
      await orchestrator.cancelTask(created.id);

      await expect(orchestrator.completeSubstep(created.id, "a")).rejects.toThrow(
        InvalidTransitionError
      );
    });

    it("throws NotFoundError for an unknown substep", async () => {
      const created = await orchestrator.createTask(taskSpec([step("a")]));
      await expect(orchestrator.completeSubstep(created.id, "zz")).rejects.toThrow(
        "substep not found: zz"
      );
    });

    it("keeps the mutation when event publishing fails", async () => {
      const failingBus: EventBus = {
        publish: vi.fn(async () => {
          throw new Error("bus offline");
        }),
        subscribe: vi.fn(),
      };
      orchestrator = new TaskOrchestrator(store, executor, failingBus, logger);
      const created = await orchestrator.createTask(
        taskSpec([step("a", { detectionType: "webhook" }), step("b", { detectionType: "webhook" })])
      );

      const task = await orchestrator.completeSubstep(created.id, "a");

      expect(task.progressPercent).toBe(50);
      expect((await store.getTask(created.id))?.substeps[0]!.status).toBe("completed");
      expect(logger.error).toHaveBeenCalledWith(
        expect.objectContaining({ eventType: "task.substep.completed" }),
        "Failed to publish task event"
      );
    });
  });

  describe("skipSubstep", () => {
    it("records the reason and completes the task without counting the weight", async () => {
      const created = await orchestrator.createTask(
        taskSpec([
          step("a", { detectionType: "webhook", progressWeight: 10 }),
          step("b", { detectionType: "webhook", progressWeight: 30 }),
        ])
      );
      await orchestrator.completeSubstep(created.id, "a");

      const task = await orchestrator.skipSubstep(created.id, "b", "not needed");

      expect(task.substeps[1]).toMatchObject({
        status: "skipped",
        result: { skipped: true, reason: "not needed" },
      });
      expect(task.status).toBe("completed");
      expect(task.progressPercent).toBe(25);
    });

    it("unblocks dependents", async () => {
      const created = await orchestrator.createTask(
        taskSpec([step("a", { detectionType: "manual" }), step("b", { dependsOn: ["a"] })])
      );
      await orchestrator.skipSubstep(created.id, "a");

      const task = await orchestrator.executeTask(created.id);

      expect(executor.calls.map((c) => c.actionType)).toEqual(["do_b"]);
      expect(task.status).toBe("completed");
    });
  });

  describe("cancelTask", () => {
    it("cancels once and records the reason", async () => {
      const created = await orchestrator.createTask(taskSpec([step("a", { detectionType: "webhook" })]));

      const task = await orchestrator.cancelTask(created.id, "changed my mind");
      await orchestrator.cancelTask(created.id, "again");

      expect(task.status).toBe("cancelled");
      expect(task.metadata).toEqual({ cancelReason: "changed my mind" });
      expect(eventBus.eventTypes().filter((t) => t === "task.cancelled")).toHaveLength(1);
      expect(orchestrator.nextRunnableSubsteps(task)).toEqual([]);
    });

    it("refuses to cancel a completed task", async () => {
      const created = await orchestrator.createTask(taskSpec([step("a")]));
      await orchestrator.executeTask(created.id);

      await expect(orchestrator.cancelTask(created.id)).rejects.toThrow(InvalidTransitionError);
    });
  });

  describe("user input", () => {
    it("parks the task until an allowed answer arrives", async () => {
      const created = await orchestrator.createTask(
        taskSpec([step("a", { detectionType: "webhook" })])
      );

      const waiting = await orchestrator.requestUserInput(created.id, "Proceed?", ["yes", "no"]);
      expect(waiting).toMatchObject({
        status: "waiting_input",
        needsUserInput: true,
        inputPrompt: "Proceed?",
        inputOptions: ["yes", "no"],
      });
      expect(orchestrator.nextRunnableSubsteps(waiting)).toEqual([]);

      await expect(orchestrator.provideUserInput(created.id, "maybe")).rejects.toThrow(
        ValidationError
      );

      const resumed = await orchestrator.provideUserInput(created.id, "yes");
      expect(resumed).toMatchObject({
        status: "in_progress",
        needsUserInput: false,
        userInputReceived: "yes",
      });
      expect(eventBus.eventTypes()).toEqual([
        "task.created",
        "task.input_requested",
        "task.input_received",
      ]);
    });

    it("rejects input for a task that did not ask for any", async () => {
      const created = await orchestrator.createTask(taskSpec([step("a")]));
      await expect(orchestrator.provideUserInput(created.id, "hello")).rejects.toThrow(
        InvalidTransitionError
      );
    });
  });

  describe("autoCompleteSubsteps", () => {
    it("completes every pending and waiting substep with the auto-complete result", async () => {
      const created = await orchestrator.createTask(
        taskSpec([
          step("join", { detectionType: "webhook" }),
          step("end", { detectionType: "webhook", dependsOn: ["join"] }),
        ])
      );
      await orchestrator.executeTask(created.id);

      const task = await orchestrator.autoCompleteSubsteps(created.id);

      expect(task.status).toBe("completed");
      expect(task.progressPercent).toBe(100);
      for (const s of task.substeps) {
        expect(s.status).toBe("completed");
        expect(s.result).toEqual({ ...AUTO_COMPLETE_RESULT });
      }
      const autoEvents = eventBus.publishedEvents.filter(
        (e) => e.eventType === "task.substep.completed"
      );
      expect(autoEvents.map((e) => e.payload.autoCompleted)).toEqual([true, true]);
    });

    it("leaves terminal tasks untouched", async () => {
      const created = await orchestrator.createTask(taskSpec([step("a", { detectionType: "webhook" })]));
      await orchestrator.cancelTask(created.id);

      const task = await orchestrator.autoCompleteSubsteps(created.id);

      expect(task.status).toBe("cancelled");
      expect(task.substeps[0]!.status).toBe("pending");
    });
  });

  describe("beginSubstepDispatch", () => {
    it("claims a runnable substep", async () => {
      const created = await orchestrator.createTask(
        taskSpec([step("r", { detectionType: "scheduled" })])
      );

      const claim = await orchestrator.beginSubstepDispatch(created.id, "r");

      expect(claim.kind).toBe("run");
      const stored = await store.getTask(created.id);
      expect(stored?.substeps[0]).toMatchObject({ status: "in_progress", attempts: 1 });
      expect(stored?.status).toBe("in_progress");
    });

    it("throws HandlerError while dependencies are unmet", async () => {
      const created = await orchestrator.createTask(
        taskSpec([
          step("a", { detectionType: "manual" }),
          step("r", { detectionType: "scheduled", dependsOn: ["a"] }),
        ])
      );
      await expect(orchestrator.beginSubstepDispatch(created.id, "r")).rejects.toThrow(
        HandlerError
      );
    });

    it("defers while the task waits for user input", async () => {
      const created = await orchestrator.createTask(
        taskSpec([step("r", { detectionType: "scheduled" })])
      );
      await orchestrator.requestUserInput(created.id, "Proceed?", ["yes", "no"]);

      const claim = await orchestrator.beginSubstepDispatch(created.id, "r");

      expect(claim).toMatchObject({ kind: "defer", reason: "task is waiting for user input" });
      const stored = await store.getTask(created.id);
      expect(stored?.status).toBe("waiting_input");
      expect(stored?.substeps[0]).toMatchObject({ status: "pending", attempts: 0 });
    });

    it("skips work that is already settled", async () => {
      const created = await orchestrator.createTask(
        taskSpec([step("r", { detectionType: "scheduled" }), step("s", { detectionType: "scheduled" })])
      );
      await orchestrator.completeSubstep(created.id, "r");

      const done = await orchestrator.beginSubstepDispatch(created.id, "r");
      expect(done).toMatchObject({ kind: "skip", reason: "substep is completed" });

      await orchestrator.cancelTask(created.id);
      const cancelled = await orchestrator.beginSubstepDispatch(created.id, "s");
      expect(cancelled).toMatchObject({ kind: "skip", reason: "task is cancelled" });
    });

    it("can be released back to pending", async () => {
      const created = await orchestrator.createTask(
        taskSpec([step("r", { detectionType: "scheduled" })])
      );
      await orchestrator.beginSubstepDispatch(created.id, "r");

      const task = await orchestrator.releaseSubstepDispatch(created.id, "r", "timed out");

      expect(task.substeps[0]).toMatchObject({ status: "pending", errorMessage: "timed out" });
    });
  });

  describe("createTaskFromTemplate", () => {
    it("builds and stores a template task", async () => {
      const task = await orchestrator.createTaskFromTemplate(TEST_USER_ID, "research", {
        topic: "sourdough",
      });
      expect(task.title).toBe("Research: sourdough");
      expect(task.taskType).toBe("research");
      expect(task.substeps).toHaveLength(3);

      const listed = await orchestrator.listTasks({ userId: TEST_USER_ID });
      expect(listed.map((t) => t.id)).toEqual([task.id]);
    });
  });
});
