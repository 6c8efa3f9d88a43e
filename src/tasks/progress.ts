import type { OrchestratedTask, Substep, SubstepStatus } from "./types.js";
import { TERMINAL_TASK_STATUSES } from "./types.js";

const SATISFIED: readonly SubstepStatus[] = ["completed", "skipped"];

/**
 * Weighted completion percentage, floored.
 * Only `completed` substeps count toward the numerator; `skipped` ones still
 * count in the denominator, so a task with skips reaches 100 only through
 * the completion rule, never through this number.
 */
export function calculateProgress(substeps: readonly Substep[]): number {
  const total = substeps.reduce((sum, s) => sum + s.progressWeight, 0);
  if (total <= 0) return 0;

  const done = substeps
    .filter((s) => s.status === "completed")
    .reduce((sum, s) => sum + s.progressWeight, 0);

  return Math.floor((done * 100) / total);
}

export function isTerminal(task: Pick<OrchestratedTask, "status">): boolean {
  return TERMINAL_TASK_STATUSES.includes(task.status);
}

export function isSatisfied(substep: Pick<Substep, "status">): boolean {
  return SATISFIED.includes(substep.status);
}

export function allSubstepsDone(substeps: readonly Substep[]): boolean {
  return substeps.length > 0 && substeps.every(isSatisfied);
}

export function dependenciesMet(
  substep: Substep,
  substeps: readonly Substep[]
): boolean {
  const byId = new Map(substeps.map((s) => [s.id, s]));
  return substep.dependsOn.every((depId) => {
    const dep = byId.get(depId);
    return dep !== undefined && isSatisfied(dep);
  });
}

/**
 * Pending substeps whose dependencies are all satisfied, in step order.
 * Empty for terminal tasks and tasks parked on user input.
 */
export function nextRunnableSubsteps(task: OrchestratedTask): Substep[] {
  if (isTerminal(task) || task.status === "waiting_input") return [];

  return task.substeps
    .filter((s) => s.status === "pending" && dependenciesMet(s, task.substeps))
    .sort((a, b) => a.stepNumber - b.stepNumber);
}

/**
 * True when nothing can move the task forward any more: no substep is
 * runnable, running, waiting, or pending behind a dependency that could
 * still be satisfied.
 */
export function isStalled(task: OrchestratedTask): boolean {
  if (allSubstepsDone(task.substeps)) return false;

  const blocked = new Set<string>();
  for (const s of task.substeps) {
    if (s.status === "failed") blocked.add(s.id);
  }

  // Propagate failure through dependency edges until fixpoint.
  let changed = true;
  while (changed) {
    changed = false;
    for (const s of task.substeps) {
      if (blocked.has(s.id) || isSatisfied(s)) continue;
      if (s.dependsOn.some((d) => blocked.has(d))) {
        blocked.add(s.id);
        changed = true;
      }
    }
  }

  return task.substeps.every((s) => isSatisfied(s) || blocked.has(s.id));
}
