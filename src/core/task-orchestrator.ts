import { randomUUID } from "node:crypto";
import type { Logger } from "../utils/logger.js";
import { KeyedLock } from "../utils/keyed-lock.js";
import type { EventBus, StepwiseEvent } from "./events.js";
import type { ActionExecutor } from "./action-executor.js";
import type { TaskFilter, TaskStore } from "../store/types.js";
import type {
  ActionResult,
  FailurePolicy,
  JsonMap,
  OrchestratedTask,
  Substep,
} from "../tasks/types.js";
import {
  allSubstepsDone,
  calculateProgress,
  isStalled,
  isTerminal,
  nextRunnableSubsteps,
} from "../tasks/progress.js";
import { checkSubstepGraph, parseTaskSpec } from "../tasks/validation.js";
import { buildTemplateSpec } from "../tasks/templates.js";
import {
  HandlerError,
  InvalidTransitionError,
  NotFoundError,
  ValidationError,
  describeError,
} from "./errors.js";

export const EXECUTE_SUBSTEP_JOB = "execute_substep";

export interface TaskOrchestratorOptions {
  failurePolicy?: FailurePolicy;
  /** Dispatch attempts a substep gets under the `retry_substep` policy. */
  maxSubstepAttempts?: number;
  /** Delay before a substep retry job runs. */
  retryDelayMs?: number;
  /** `maxAttempts` given to the jobs the orchestrator creates. */
  defaultMaxAttempts?: number;
}

export type DispatchClaim =
  | { kind: "run"; task: OrchestratedTask; substep: Substep }
  | { kind: "skip"; task: OrchestratedTask; reason: string }
  | { kind: "defer"; task: OrchestratedTask; reason: string };

type Emit = (
  eventType: string,
  payload?: Record<string, unknown>,
  severity?: StepwiseEvent["severity"]
) => void;

type Apply = (task: OrchestratedTask, emit: Emit) => Promise<boolean> | boolean;

export const AUTO_COMPLETE_RESULT = {
  auto_completed: true,
  reason: "duration elapsed",
} as const;

/**
 * Sole writer of task and substep state.
 *
 * Every mutation loads the task, applies the change and saves it while
 * holding a per-task lock, so concurrent completions for the same task are
 * applied one at a time in call order. Events are published after the lock
 * is released.
 */
export class TaskOrchestrator {
  private store: TaskStore;
  private executor: ActionExecutor;
  private eventBus: EventBus;
  private logger: Logger;
  private lock = new KeyedLock();
  private failurePolicy: FailurePolicy;
  private maxSubstepAttempts: number;
  private retryDelayMs: number;
  private defaultMaxAttempts: number;

  constructor(
    store: TaskStore,
    executor: ActionExecutor,
    eventBus: EventBus,
    logger: Logger,
    options: TaskOrchestratorOptions = {}
  ) {
    this.store = store;
    this.executor = executor;
    this.eventBus = eventBus;
    this.logger = logger;
    this.failurePolicy = options.failurePolicy ?? "fail_fast";
    this.maxSubstepAttempts = options.maxSubstepAttempts ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 5 * 60 * 1000;
    this.defaultMaxAttempts = options.defaultMaxAttempts ?? 3;
  }

  async createTask(input: unknown): Promise<OrchestratedTask> {
    const spec = parseTaskSpec(input);
    const now = new Date();

    const substeps: Substep[] = spec.substeps.map((s, i) => ({
      id: s.id ?? randomUUID(),
      stepNumber: s.stepNumber ?? i + 1,
      title: s.title,
      description: s.description ?? null,
      status: "pending",
      progressWeight: s.progressWeight,
      actionType: s.actionType ?? null,
      actionParams: s.actionParams,
      result: null,
      errorMessage: null,
      detectionType: s.detectionType,
      detectionConfig: s.detectionConfig,
      dependsOn: s.dependsOn,
      attempts: 0,
      jobId: null,
      scheduledAt: s.scheduledAt ?? null,
      startedAt: null,
      completedAt: null,
    }));
    checkSubstepGraph(substeps);

    const task: OrchestratedTask = {
      id: randomUUID(),
      userId: spec.userId,
      title: spec.title,
      description: spec.description ?? null,
      taskType: spec.taskType,
      status: "pending",
      progressPercent: 0,
      substeps,
      estimatedCompletion: spec.estimatedCompletion ?? null,
      actualCompletion: null,
      startedAt: null,
      needsUserInput: false,
      inputPrompt: null,
      inputOptions: [],
      userInputReceived: null,
      meetingId: spec.meetingId ?? null,
      messageId: spec.messageId ?? null,
      metadata: spec.metadata,
      createdAt: now,
      updatedAt: now,
    };

    const hasImmediateWork = nextRunnableSubsteps(task).some(
      (s) => s.detectionType === "immediate"
    );
    if (hasImmediateWork) {
      task.status = "in_progress";
      task.startedAt = now;
    }

    await this.store.saveTask(task);
    this.logger.info(
      { taskId: task.id, taskType: task.taskType, substeps: substeps.length },
      "Task created"
    );
    await this.publish([
      this.buildEvent(task, "task.created", { substepCount: substeps.length }),
    ]);
    return task;
  }

  async createTaskFromTemplate(
    userId: string,
    templateName: string,
    params: JsonMap,
    startTime?: Date
  ): Promise<OrchestratedTask> {
    return this.createTask(buildTemplateSpec(userId, templateName, params, startTime));
  }

  async getTask(taskId: string): Promise<OrchestratedTask | null> {
    return this.store.getTask(taskId);
  }

  async listTasks(filter: TaskFilter = {}): Promise<OrchestratedTask[]> {
    return this.store.listTasks(filter);
  }

  nextRunnableSubsteps(task: OrchestratedTask): Substep[] {
    return nextRunnableSubsteps(task);
  }

  /**
   * Drive the runnable frontier: run immediate substeps through the
   * executor, hand scheduled ones to the job queue, and park event-driven
   * ones in `waiting`. Repeats while immediate completions unlock more work.
   */
  async executeTask(taskId: string): Promise<OrchestratedTask> {
    for (;;) {
      const immediate: Substep[] = [];

      const task = await this.mutate(taskId, async (task, emit) => {
        immediate.length = 0;
        const runnable = nextRunnableSubsteps(task);
        if (runnable.length === 0) return false;

        const now = new Date();
        let changed = this.markStarted(task, now);

        for (const substep of runnable) {
          // A pending retry job owns this substep until it runs.
          if (substep.jobId) continue;
          switch (substep.detectionType) {
            case "immediate":
              substep.status = "in_progress";
              substep.startedAt = now;
              substep.attempts += 1;
              immediate.push({ ...substep });
              changed = true;
              break;
            case "scheduled":
              await this.scheduleSubstepJob(task, substep, substep.scheduledAt ?? now);
              changed = true;
              break;
            default:
              substep.status = "waiting";
              changed = true;
          }
        }

        if (changed) emit("task.updated");
        return changed;
      });

      if (immediate.length === 0) return task;

      for (const [index, substep] of immediate.entries()) {
        const outcome = await this.runAction(substep);
        const notRun = immediate.slice(index + 1).map((s) => s.id);
        let after: OrchestratedTask;
        try {
          after =
            outcome.status === "completed"
              ? await this.completeSubstep(taskId, substep.id, outcome.result ?? {})
              : await this.failSubstep(taskId, substep.id, outcome.error ?? "Action failed");
        } catch (err) {
          if (!(err instanceof InvalidTransitionError)) throw err;
          this.logger.info(
            { taskId, substepId: substep.id, error: err },
            "Task changed state during execution, stopping"
          );
          return this.releaseBatch(taskId, [substep.id], notRun);
        }
        if (isTerminal(after)) {
          return notRun.length > 0 ? this.releaseBatch(taskId, [], notRun) : after;
        }
      }
    }
  }

  async completeSubstep(
    taskId: string,
    substepId: string,
    result: JsonMap = {}
  ): Promise<OrchestratedTask> {
    return this.mutate(taskId, (task, emit) => {
      const substep = this.requireSubstep(task, substepId);
      if (substep.status === "completed") return false;
      this.assertWritable(task, `complete substep ${substepId}`);

      const now = new Date();
      this.markStarted(task, now);
      substep.status = "completed";
      substep.result = result;
      substep.errorMessage = null;
      substep.completedAt = now;

      task.progressPercent = calculateProgress(task.substeps);
      emit("task.substep.completed", {
        substepId,
        substepTitle: substep.title,
        progressPercent: task.progressPercent,
      });
      this.closeIfDone(task, now, emit);
      return true;
    });
  }

  async failSubstep(
    taskId: string,
    substepId: string,
    errorMessage: string
  ): Promise<OrchestratedTask> {
    return this.mutate(taskId, async (task, emit) => {
      const substep = this.requireSubstep(task, substepId);
      if (substep.status === "failed") return false;
      if (substep.status === "completed") {
        throw new InvalidTransitionError(`Substep ${substepId} is already completed`);
      }
      this.assertWritable(task, `fail substep ${substepId}`);

      const now = new Date();
      substep.errorMessage = errorMessage;

      if (
        this.failurePolicy === "retry_substep" &&
        substep.attempts < this.maxSubstepAttempts
      ) {
        substep.status = "pending";
        await this.scheduleSubstepJob(
          task,
          substep,
          new Date(now.getTime() + this.retryDelayMs)
        );
        emit(
          "task.substep.failed",
          { substepId, substepTitle: substep.title, error: errorMessage, willRetry: true },
          "medium"
        );
        return true;
      }

      substep.status = "failed";
      substep.completedAt = now;
      emit(
        "task.substep.failed",
        { substepId, substepTitle: substep.title, error: errorMessage, willRetry: false },
        "medium"
      );

      if (this.failurePolicy === "fail_fast" || isStalled(task)) {
        task.status = "failed";
        task.actualCompletion = now;
        emit("task.failed", { substepId, error: errorMessage }, "high");
        this.logger.warn({ taskId, substepId, error: errorMessage }, "Task failed");
      }
      return true;
    });
  }

  async skipSubstep(
    taskId: string,
    substepId: string,
    reason?: string
  ): Promise<OrchestratedTask> {
    return this.mutate(taskId, (task, emit) => {
      const substep = this.requireSubstep(task, substepId);
      if (substep.status === "skipped") return false;
      if (substep.status === "completed") {
        throw new InvalidTransitionError(`Substep ${substepId} is already completed`);
      }
      this.assertWritable(task, `skip substep ${substepId}`);

      const now = new Date();
      substep.status = "skipped";
      substep.result = { skipped: true, ...(reason ? { reason } : {}) };
      substep.completedAt = now;

      task.progressPercent = calculateProgress(task.substeps);
      emit("task.substep.skipped", { substepId, substepTitle: substep.title, reason });
      this.closeIfDone(task, now, emit);
      return true;
    });
  }

  /**
   * Gate a job-driven substep run. Returns `skip` for work that no longer
   * needs doing, `defer` while the task waits for user input, and throws
   * HandlerError while the substep is not runnable, so the job is retried.
   */
  async beginSubstepDispatch(taskId: string, substepId: string): Promise<DispatchClaim> {
    const out: { claim?: DispatchClaim } = {};

    const task = await this.mutate(taskId, (task, emit) => {
      const substep = this.requireSubstep(task, substepId);

      if (isTerminal(task)) {
        out.claim = { kind: "skip", task, reason: `task is ${task.status}` };
        return false;
      }
      if (substep.status === "completed" || substep.status === "skipped") {
        out.claim = { kind: "skip", task, reason: `substep is ${substep.status}` };
        return false;
      }
      if (task.status === "waiting_input") {
        out.claim = { kind: "defer", task, reason: "task is waiting for user input" };
        return false;
      }
      if (!nextRunnableSubsteps(task).some((s) => s.id === substepId)) {
        throw new HandlerError(
          `Substep ${substepId} is not runnable (task ${task.status}, substep ${substep.status})`
        );
      }

      const now = new Date();
      this.markStarted(task, now);
      substep.status = "in_progress";
      substep.startedAt = now;
      substep.attempts += 1;
      out.claim = { kind: "run", task, substep: { ...substep } };
      emit("task.updated", { substepId, substepStatus: substep.status });
      return true;
    });

    return out.claim ?? { kind: "skip", task, reason: "no claim" };
  }

  /** Return an in-progress substep to `pending` after a failed job attempt. */
  async releaseSubstepDispatch(
    taskId: string,
    substepId: string,
    errorMessage: string
  ): Promise<OrchestratedTask> {
    return this.mutate(taskId, (task, emit) => {
      const substep = this.requireSubstep(task, substepId);
      if (substep.status !== "in_progress") return false;
      substep.status = "pending";
      substep.errorMessage = errorMessage;
      emit("task.updated", { substepId, substepStatus: substep.status });
      return true;
    });
  }

  /**
   * Complete every pending or waiting substep in one step, without going
   * through the action executor. Used when elapsed time alone is evidence
   * of completion.
   */
  async autoCompleteSubsteps(
    taskId: string,
    result: JsonMap = { ...AUTO_COMPLETE_RESULT }
  ): Promise<OrchestratedTask> {
    return this.mutate(taskId, (task, emit) => {
      if (isTerminal(task)) return false;

      const now = new Date();
      const completed: string[] = [];
      for (const substep of task.substeps) {
        if (substep.status !== "pending" && substep.status !== "waiting") continue;
        substep.status = "completed";
        substep.result = { ...result };
        substep.completedAt = now;
        completed.push(substep.id);
      }
      if (completed.length === 0) return false;

      this.markStarted(task, now);
      task.progressPercent = calculateProgress(task.substeps);
      for (const substepId of completed) {
        emit("task.substep.completed", {
          substepId,
          substepTitle: this.requireSubstep(task, substepId).title,
          progressPercent: task.progressPercent,
          autoCompleted: true,
        });
      }
      this.closeIfDone(task, now, emit);
      return true;
    });
  }

  async cancelTask(taskId: string, reason?: string): Promise<OrchestratedTask> {
    return this.mutate(taskId, (task, emit) => {
      if (task.status === "cancelled") return false;
      this.assertWritable(task, "cancel task");

      task.status = "cancelled";
      task.needsUserInput = false;
      if (reason) task.metadata = { ...task.metadata, cancelReason: reason };
      emit("task.cancelled", { reason }, "medium");
      this.logger.info({ taskId, reason }, "Task cancelled");
      return true;
    });
  }

  async requestUserInput(
    taskId: string,
    prompt: string,
    options: string[] = []
  ): Promise<OrchestratedTask> {
    return this.mutate(taskId, (task, emit) => {
      this.assertWritable(task, "request user input");
      task.status = "waiting_input";
      task.needsUserInput = true;
      task.inputPrompt = prompt;
      task.inputOptions = [...options];
      task.userInputReceived = null;
      emit("task.input_requested", { prompt, options }, "medium");
      return true;
    });
  }

  async provideUserInput(taskId: string, value: string): Promise<OrchestratedTask> {
    return this.mutate(taskId, (task, emit) => {
      if (task.status !== "waiting_input") {
        throw new InvalidTransitionError(`Task ${taskId} is not waiting for input`);
      }
      if (task.inputOptions.length > 0 && !task.inputOptions.includes(value)) {
        throw new ValidationError([
          `input must be one of: ${task.inputOptions.join(", ")}`,
        ]);
      }
      task.userInputReceived = value;
      task.needsUserInput = false;
      task.status = allSubstepsDone(task.substeps) ? "completed" : "in_progress";
      if (task.status === "completed") task.actualCompletion = new Date();
      emit("task.input_received", {});
      return true;
    });
  }

  /** Run one substep's action, turning throws into a failed outcome. */
  async runAction(substep: Substep): Promise<ActionResult> {
    if (!substep.actionType) {
      return { status: "completed", result: {} };
    }
    try {
      return await this.executor.execute(substep.actionType, substep.actionParams);
    } catch (err) {
      return { status: "failed", error: describeError(err) };
    }
  }

  /**
   * Put substeps claimed by an interrupted batch back to `pending`. Those in
   * `notRun` never reached the executor and get their attempt back.
   */
  private async releaseBatch(
    taskId: string,
    ran: string[],
    notRun: string[]
  ): Promise<OrchestratedTask> {
    return this.mutate(taskId, (task, emit) => {
      let changed = false;
      for (const substep of task.substeps) {
        const skippedRun = notRun.includes(substep.id);
        if (substep.status !== "in_progress" || (!skippedRun && !ran.includes(substep.id))) {
          continue;
        }
        substep.status = "pending";
        substep.startedAt = null;
        if (skippedRun) substep.attempts = Math.max(0, substep.attempts - 1);
        changed = true;
      }
      if (changed) emit("task.updated", { released: [...ran, ...notRun] });
      return changed;
    });
  }

  private async mutate(taskId: string, apply: Apply): Promise<OrchestratedTask> {
    const emitted: Array<Parameters<Emit>> = [];

    const task = await this.lock.run(taskId, async () => {
      const current = await this.requireTask(taskId);
      const emit: Emit = (...args) => {
        emitted.push(args);
      };

      const changed = await apply(current, emit);
      if (changed) {
        current.progressPercent = calculateProgress(current.substeps);
        current.updatedAt = new Date();
        await this.store.saveTask(current);
      }
      return current;
    });

    // Built after the change so every payload carries the saved task state.
    await this.publish(
      emitted.map(([eventType, payload, severity]) =>
        this.buildEvent(task, eventType, payload, severity)
      )
    );
    return task;
  }

  private async requireTask(taskId: string): Promise<OrchestratedTask> {
    const task = await this.store.getTask(taskId);
    if (!task) throw new NotFoundError("task", taskId);
    return task;
  }

  private requireSubstep(task: OrchestratedTask, substepId: string): Substep {
    const substep = task.substeps.find((s) => s.id === substepId);
    if (!substep) throw new NotFoundError("substep", substepId);
    return substep;
  }

  private assertWritable(task: OrchestratedTask, action: string): void {
    if (isTerminal(task)) {
      throw new InvalidTransitionError(`Cannot ${action}: task ${task.id} is ${task.status}`);
    }
  }

  private markStarted(task: OrchestratedTask, now: Date): boolean {
    if (task.status !== "pending") return false;
    task.status = "in_progress";
    task.startedAt = task.startedAt ?? now;
    return true;
  }

  /** Complete the task when every substep is satisfied, fail it when it can no longer progress. */
  private closeIfDone(task: OrchestratedTask, now: Date, emit: Emit): void {
    if (allSubstepsDone(task.substeps)) {
      task.status = "completed";
      task.actualCompletion = now;
      task.needsUserInput = false;
      emit("task.completed", { progressPercent: task.progressPercent }, "medium");
      this.logger.info({ taskId: task.id }, "Task completed");
      return;
    }
    if (isStalled(task)) {
      const error = "No remaining substep can run";
      task.status = "failed";
      task.actualCompletion = now;
      task.needsUserInput = false;
      emit("task.failed", { error }, "high");
      this.logger.warn({ taskId: task.id }, "Task failed: remaining substeps blocked");
    }
  }

  private async scheduleSubstepJob(
    task: OrchestratedTask,
    substep: Substep,
    when: Date
  ): Promise<void> {
    const job = await this.store.createJob({
      jobType: EXECUTE_SUBSTEP_JOB,
      jobParams: { task_id: task.id, substep_id: substep.id, user_id: task.userId },
      scheduledFor: when,
      maxAttempts: this.defaultMaxAttempts,
      taskId: task.id,
      substepId: substep.id,
      userId: task.userId,
    });
    substep.jobId = job.id;
    substep.scheduledAt = when;
    this.logger.debug(
      { taskId: task.id, substepId: substep.id, jobId: job.id, scheduledFor: when },
      "Substep scheduled"
    );
  }

  private buildEvent(
    task: OrchestratedTask,
    eventType: string,
    payload: Record<string, unknown> = {},
    severity: StepwiseEvent["severity"] = "low"
  ): StepwiseEvent {
    return {
      eventType,
      timestamp: new Date().toISOString(),
      source: "orchestrator",
      payload: {
        taskId: task.id,
        userId: task.userId,
        taskTitle: task.title,
        taskStatus: task.status,
        progressPercent: task.progressPercent,
        ...payload,
      },
      severity,
    };
  }

  private async publish(events: StepwiseEvent[]): Promise<void> {
    for (const event of events) {
      try {
        await this.eventBus.publish(event);
      } catch (err) {
        this.logger.error(
          { eventType: event.eventType, error: err },
          "Failed to publish task event"
        );
      }
    }
  }
}
