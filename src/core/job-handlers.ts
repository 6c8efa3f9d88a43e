import type { Logger } from "../utils/logger.js";
import type { ActionExecutor } from "./action-executor.js";
import type { JobHandler } from "./job-scheduler.js";
import type { TaskOrchestrator } from "./task-orchestrator.js";
import type { JsonMap, ScheduledJob } from "../tasks/types.js";
import {
  HandlerError,
  InvalidTransitionError,
  JobDeferredError,
  NotFoundError,
  ValidationError,
} from "./errors.js";

function stringParam(params: JsonMap, key: string): string | undefined {
  const value = params[key];
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function substepRef(job: ScheduledJob): { taskId: string; substepId: string } {
  const taskId = stringParam(job.jobParams, "task_id");
  const substepId = stringParam(job.jobParams, "substep_id");
  if (!taskId || !substepId) {
    throw new ValidationError(["job params must include task_id and substep_id"]);
  }
  return { taskId, substepId };
}

/**
 * Runs one substep's action and completes it. A failed attempt returns the
 * substep to `pending`; once the job is exhausted the substep is failed.
 */
export function executeSubstepHandler(
  orchestrator: TaskOrchestrator,
  logger: Logger
): JobHandler {
  return {
    async run(job) {
      const { taskId, substepId } = substepRef(job);

      const claim = await orchestrator.beginSubstepDispatch(taskId, substepId);
      if (claim.kind === "skip") {
        logger.info({ jobId: job.id, taskId, substepId, reason: claim.reason }, "Substep job skipped");
        return { skipped: true, reason: claim.reason };
      }
      if (claim.kind === "defer") {
        throw new JobDeferredError(`Substep ${substepId} deferred: ${claim.reason}`);
      }

      const outcome = await orchestrator.runAction(claim.substep);
      if (outcome.status !== "completed") {
        throw new HandlerError(outcome.error ?? `Action ${claim.substep.actionType} failed`);
      }

      const task = await orchestrator.completeSubstep(taskId, substepId, outcome.result ?? {});
      return {
        task_id: taskId,
        substep_id: substepId,
        progress_percent: task.progressPercent,
        task_status: task.status,
      };
    },

    async onFailure(job, error, exhausted) {
      const taskId = stringParam(job.jobParams, "task_id");
      const substepId = stringParam(job.jobParams, "substep_id");
      if (!taskId || !substepId) return;

      try {
        if (exhausted) {
          await orchestrator.failSubstep(taskId, substepId, error);
        } else {
          await orchestrator.releaseSubstepDispatch(taskId, substepId, error);
        }
      } catch (err) {
        if (!(err instanceof InvalidTransitionError || err instanceof NotFoundError)) throw err;
        logger.debug({ jobId: job.id, taskId, substepId, error: err }, "Substep already settled");
      }
    },
  };
}

/** Sends one standalone reminder email through the `send_email` action. */
export function sendReminderHandler(executor: ActionExecutor): JobHandler {
  return {
    async run(job) {
      const to = stringParam(job.jobParams, "to_email");
      if (!to) throw new ValidationError(["job params must include to_email"]);

      const outcome = await executor.execute("send_email", {
        to,
        subject: stringParam(job.jobParams, "subject") ?? "Reminder",
        body: stringParam(job.jobParams, "body") ?? "This is your reminder.",
      });
      if (outcome.status !== "completed") {
        throw new HandlerError(outcome.error ?? "send_email failed");
      }
      return outcome.result ?? {};
    },
  };
}

/** Participant presence is reported by meeting webhooks; this records the check. */
export function checkParticipantHandler(): JobHandler {
  return {
    async run(job) {
      return {
        checked: true,
        meeting_id: stringParam(job.jobParams, "meeting_id") ?? null,
      };
    },
  };
}
