import { isRecord } from "./coordination/shared-context";
import type { GoalContext } from "./orchestrator/types";

export interface GoalSubmission {
  goal: string;
  context: GoalContext;
}

export type SubmissionValidation =
  | { ok: true; submission: GoalSubmission }
  | { ok: false; error: string };

/**
 * Validate a `{goal, context?}` payload before it reaches the orchestrator.
 * The goal is trimmed; a missing context becomes `{}`.
 */
export function validateGoalSubmission(input: unknown): SubmissionValidation {
  if (!isRecord(input)) {
    return { ok: false, error: "Submission must be an object" };
  }
  const { goal, context } = input;
  if (typeof goal !== "string" || goal.trim() === "") {
    return { ok: false, error: "Goal is required" };
  }
  if (context !== undefined && context !== null && !isRecord(context)) {
    return { ok: false, error: "Context must be an object" };
  }
  return {
    ok: true,
    submission: { goal: goal.trim(), context: isRecord(context) ? context : {} },
  };
}
