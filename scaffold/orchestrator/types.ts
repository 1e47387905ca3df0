import type { Allocation } from "../coordination/allocator";

export type GoalContext = Record<string, unknown>;

export type ExecutionStatus =
  | "initializing"
  | "decomposing"
  | "planning"
  | "allocating"
  | "executing"
  | "completed"
  | "failed";

export type TaskStatus =
  | "pending"
  | "assigned"
  | "in_progress"
  | "completed"
  | "failed"
  | "skipped";

/**
 * A unit of work produced by decomposition. Owned by exactly one execution.
 */
export interface Task {
  id: string;
  executionId: string;
  title: string;
  description: string;
  /** Ids of sibling tasks this task depends on. */
  dependencies: string[];
  requiredCapabilities: string[];
  status: TaskStatus;
}

/**
 * What a decomposer hands back for each subtask. Dependencies may name sibling
 * tasks by title or by assigned task id.
 */
export interface SubtaskDescriptor {
  title: string;
  description?: string;
  dependencies?: string[];
  requiredCapabilities?: string[];
}

export interface Decomposer {
  decompose(
    goal: string,
    context: GoalContext,
    signal?: AbortSignal
  ): Promise<SubtaskDescriptor[]>;
}

export interface PlanStepDraft {
  name?: string;
  /** Task ids, or a comma-separated list of them. */
  tasks: string[] | string;
  parallel?: boolean;
  conditions?: string;
  expectedOutcomes?: string;
}

export interface PlanDraft {
  steps: PlanStepDraft[];
  metadata?: Record<string, unknown>;
}

export interface Planner {
  createPlan(
    tasks: readonly Task[],
    context: GoalContext,
    signal?: AbortSignal
  ): Promise<PlanDraft>;
}

export interface PlanStep {
  name: string;
  taskIds: string[];
  parallel: boolean;
  conditions?: string;
  expectedOutcomes?: string;
}

export interface Plan {
  id: string;
  executionId: string;
  steps: PlanStep[];
  metadata: Record<string, unknown>;
}

export const SKIPPED_TASK_MESSAGE = "Task not found or not allocated";

export type TaskOutcome =
  | { status: "completed"; workerId: string; output: unknown }
  | { status: "failed"; workerId: string; error: string }
  | { status: "skipped"; message: string };

export interface ExecutionResult {
  executionId: string;
  stepsCompleted: number;
  /** Step id (`{executionId}-step-{n}`) → task id → outcome. */
  results: Record<string, Record<string, TaskOutcome>>;
}

export interface ExecutionRecord {
  id: string;
  goal: string;
  context: GoalContext;
  status: ExecutionStatus;
  startTime: Date;
  endTime?: Date;
  subtasks: string[];
  planId?: string;
  allocation?: Allocation;
  result?: ExecutionResult;
  errors: string[];
}

/** Execution record joined with its task detail and plan. */
export interface ExecutionReport {
  execution: ExecutionRecord;
  tasks: Task[];
  plan?: Plan;
}
