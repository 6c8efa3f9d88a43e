import type { OrchestratedTask, Substep } from "../../src/tasks/types.js";
import type { SubstepSpec, TaskSpec } from "../../src/tasks/validation.js";

export const TEST_USER_ID = "test-user-123";

export function createSubstep(overrides: Partial<Substep> = {}): Substep {
  return {
    id: "step-1",
    stepNumber: 1,
    title: "Step",
    description: null,
    status: "pending",
    progressWeight: 10,
    actionType: null,
    actionParams: {},
    result: null,
    errorMessage: null,
    detectionType: "immediate",
    detectionConfig: {},
    dependsOn: [],
    attempts: 0,
    jobId: null,
    scheduledAt: null,
    startedAt: null,
    completedAt: null,
    ...overrides,
  };
}

export function createTask(overrides: Partial<OrchestratedTask> = {}): OrchestratedTask {
  const now = new Date("2026-03-01T10:00:00.000Z");
  return {
    id: "00000000-0000-4000-8000-000000000001",
    userId: TEST_USER_ID,
    title: "Test task",
    description: null,
    taskType: "general",
    status: "pending",
    progressPercent: 0,
    substeps: [],
    estimatedCompletion: null,
    actualCompletion: null,
    startedAt: null,
    needsUserInput: false,
    inputPrompt: null,
    inputOptions: [],
    userInputReceived: null,
    meetingId: null,
    messageId: null,
    metadata: {},
    createdAt: now,
    updatedAt: now,
    ...overrides,
  };
}

export function step(id: string, overrides: Partial<SubstepSpec> = {}): SubstepSpec {
  return { id, title: `Step ${id}`, actionType: `do_${id}`, ...overrides };
}

export function taskSpec(substeps: SubstepSpec[], overrides: Partial<TaskSpec> = {}): TaskSpec {
  return {
    userId: TEST_USER_ID,
    title: "Test task",
    substeps,
    ...overrides,
  };
}
