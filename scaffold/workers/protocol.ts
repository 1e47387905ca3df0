import type { BrokerMessage } from "../coordination/message-broker";
import { isRecord } from "../coordination/shared-context";
import { isTaskStatus } from "../coordination/progress-monitor";
import type { Task } from "../orchestrator/types";
import type { TaskReply, TaskRequest } from "./types";

export const TASK_EXECUTION = "task_execution";

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

function readTask(value: unknown): Task | undefined {
  if (!isRecord(value)) return undefined;
  const { id, executionId, title, description, dependencies, requiredCapabilities, status } =
    value;
  if (
    typeof id !== "string" ||
    typeof executionId !== "string" ||
    typeof title !== "string" ||
    typeof description !== "string" ||
    !isStringArray(dependencies) ||
    !isStringArray(requiredCapabilities) ||
    !isTaskStatus(status)
  ) {
    return undefined;
  }
  return {
    id,
    executionId,
    title,
    description,
    dependencies,
    requiredCapabilities,
    status,
  };
}

export function toRequestContent(request: TaskRequest): Record<string, unknown> {
  return { ...request };
}

/**
 * Narrow a message body to a task request, or undefined when malformed.
 */
export function readTaskRequest(
  content: Record<string, unknown>
): TaskRequest | undefined {
  const { kind, taskId, executionId, task, context } = content;
  if (kind !== TASK_EXECUTION) return undefined;
  if (typeof taskId !== "string" || typeof executionId !== "string") {
    return undefined;
  }
  const parsedTask = readTask(task);
  if (!parsedTask) return undefined;
  return {
    kind: TASK_EXECUTION,
    taskId,
    executionId,
    task: parsedTask,
    context: isRecord(context) ? context : {},
  };
}

/**
 * Narrow a `response`/`error` message to a task reply.
 */
export function readTaskReply(message: BrokerMessage): TaskReply | undefined {
  const { taskId } = message.content;
  if (typeof taskId !== "string") return undefined;

  if (message.type === "response") {
    return {
      type: "response",
      conversationId: message.conversationId,
      taskId,
      output: message.content["output"],
    };
  }
  if (message.type === "error") {
    const error = message.content["error"];
    return {
      type: "error",
      conversationId: message.conversationId,
      taskId,
      error: typeof error === "string" ? error : "Worker reported an error",
    };
  }
  return undefined;
}
