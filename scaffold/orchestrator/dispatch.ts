import type { BrokerMessage } from "../coordination/message-broker";
import { readTaskReply } from "../workers/protocol";
import type { TaskOutcome } from "./types";

export function timeoutMessage(workerId: string, timeoutMs: number): string {
  return `Worker ${workerId} timed out after ${timeoutMs}ms`;
}

interface PendingReply {
  taskId: string;
  workerId: string;
  resolve: (outcome: TaskOutcome) => void;
}

export interface AwaitReplyOptions {
  conversationId: string;
  taskId: string;
  workerId: string;
  timeoutMs: number;
  /** Resolves the wait early with a failed outcome carrying `abortMessage`. */
  signal?: AbortSignal;
  abortMessage?: string;
}

/**
 * Replies the orchestrator is waiting for, keyed by conversation id.
 *
 * Every wait resolves exactly once: with the worker's reply, with a failed
 * outcome on timeout, or with a failed outcome when its signal aborts.
 */
export class PendingReplies {
  private pending = new Map<string, PendingReply>();

  /**
   * Register interest in a conversation. Call before publishing the request.
   */
  wait(options: AwaitReplyOptions): Promise<TaskOutcome> {
    const { conversationId, taskId, workerId, timeoutMs, signal } = options;

    return new Promise((resolve) => {
      let settled = false;
      const finish = (outcome: TaskOutcome) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        this.pending.delete(conversationId);
        resolve(outcome);
      };
      const onAbort = () =>
        finish({
          status: "failed",
          workerId,
          error: options.abortMessage ?? "Dispatch aborted",
        });

      const timer = setTimeout(() => {
        finish({
          status: "failed",
          workerId,
          error: timeoutMessage(workerId, timeoutMs),
        });
      }, timeoutMs);

      this.pending.set(conversationId, { taskId, workerId, resolve: finish });

      if (signal?.aborted) {
        onAbort();
      } else {
        signal?.addEventListener("abort", onAbort, { once: true });
      }
    });
  }

  /**
   * Route a reply to its waiter. Returns false for replies nobody is waiting
   * for (late, duplicate or foreign).
   */
  settle(message: BrokerMessage): boolean {
    const reply = readTaskReply(message);
    if (!reply) return false;
    const entry = this.pending.get(reply.conversationId);
    if (!entry || entry.taskId !== reply.taskId) return false;

    if (reply.type === "response") {
      entry.resolve({ status: "completed", workerId: entry.workerId, output: reply.output });
    } else {
      entry.resolve({ status: "failed", workerId: entry.workerId, error: reply.error });
    }
    return true;
  }
}
