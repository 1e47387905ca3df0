import type { GoalContext, Task } from "../orchestrator/types";

/** Content of a `task_execution` request dispatched to a worker. */
export interface TaskRequest {
  kind: "task_execution";
  taskId: string;
  executionId: string;
  task: Task;
  context: GoalContext;
}

/**
 * A capability-tagged actor. Specialization lives in the data (capabilities,
 * prompts), never in a subclass hierarchy.
 *
 * `handle` resolves with the task output or rejects with the failure.
 */
export interface Worker {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly capabilities: readonly string[];
  handle(request: TaskRequest): Promise<unknown>;
}

export type TaskReply =
  | { type: "response"; conversationId: string; taskId: string; output: unknown }
  | { type: "error"; conversationId: string; taskId: string; error: string };
