import { z } from "zod";
import { ValidationError } from "../core/errors.js";
import { DETECTION_TYPES } from "./types.js";

const JsonMapSchema = z.record(z.unknown());

export const SubstepSpecSchema = z.object({
  id: z.string().min(1).max(100).optional(),
  stepNumber: z.number().int().nonnegative().optional(),
  title: z.string().min(1).max(500),
  description: z.string().optional(),
  progressWeight: z.number().int().positive().default(10),
  actionType: z.string().min(1).optional(),
  actionParams: JsonMapSchema.default({}),
  detectionType: z.enum(DETECTION_TYPES).default("immediate"),
  detectionConfig: JsonMapSchema.default({}),
  dependsOn: z.array(z.string().min(1)).default([]),
  scheduledAt: z.coerce.date().optional(),
});

export const TaskSpecSchema = z.object({
  userId: z.string().min(1).max(255),
  title: z.string().min(1).max(500),
  description: z.string().optional(),
  taskType: z.string().min(1).max(50).default("general"),
  substeps: z.array(SubstepSpecSchema).default([]),
  meetingId: z.string().optional(),
  messageId: z.string().optional(),
  metadata: JsonMapSchema.default({}),
  estimatedCompletion: z.coerce.date().optional(),
});

export type SubstepSpec = z.input<typeof SubstepSpecSchema>;
export type TaskSpec = z.input<typeof TaskSpecSchema>;
export type ParsedTaskSpec = z.output<typeof TaskSpecSchema>;

/** Format zod issues as "path: message" strings. */
export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Parse a task spec and check the substep graph.
 * Substep ids are optional in the input; the caller assigns missing ones
 * before `checkSubstepGraph` runs.
 */
export function parseTaskSpec(input: unknown): ParsedTaskSpec {
  const parsed = TaskSpecSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(formatZodIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Reject duplicate ids, unknown or self dependencies, and cycles.
 * Throws a ValidationError listing every problem found.
 */
export function checkSubstepGraph(
  substeps: ReadonlyArray<{ id: string; dependsOn: readonly string[] }>
): void {
  const issues: string[] = [];
  const ids = new Set<string>();

  for (const s of substeps) {
    if (ids.has(s.id)) issues.push(`duplicate substep id: ${s.id}`);
    ids.add(s.id);
  }

  for (const s of substeps) {
    for (const dep of s.dependsOn) {
      if (dep === s.id) {
        issues.push(`substep ${s.id} depends on itself`);
      } else if (!ids.has(dep)) {
        issues.push(`substep ${s.id} depends on unknown substep ${dep}`);
      }
    }
  }

  if (issues.length > 0) throw new ValidationError(issues);

  const cycle = findCycle(substeps);
  if (cycle) {
    throw new ValidationError([`dependency cycle: ${cycle.join(" -> ")}`]);
  }
}

function findCycle(
  substeps: ReadonlyArray<{ id: string; dependsOn: readonly string[] }>
): string[] | null {
  const edges = new Map(substeps.map((s) => [s.id, s.dependsOn]));
  const state = new Map<string, "visiting" | "done">();
  const path: string[] = [];

  const visit = (id: string): string[] | null => {
    const current = state.get(id);
    if (current === "done") return null;
    if (current === "visiting") {
      return [...path.slice(path.indexOf(id)), id];
    }

    state.set(id, "visiting");
    path.push(id);
    for (const dep of edges.get(id) ?? []) {
      const found = visit(dep);
      if (found) return found;
    }
    path.pop();
    state.set(id, "done");
    return null;
  };

  for (const s of substeps) {
    const found = visit(s.id);
    if (found) return found;
  }
  return null;
}
