import type {
  BrokerMessage,
  MessageBroker,
  MessageHandler,
} from "../coordination/message-broker";
import { readTaskRequest } from "./protocol";
import type { Worker } from "./types";

/**
 * Bridge a Worker onto the broker: run each `request` through `worker.handle`
 * and publish a correlated `response` or `error` back to the sender. Other
 * message types are ignored.
 */
export function createWorkerMessageHandler(
  worker: Worker,
  broker: MessageBroker,
  verbose = false
): MessageHandler {
  return async (message: BrokerMessage) => {
    if (message.type !== "request") return;

    const reply = (type: "response" | "error", content: Record<string, unknown>) =>
      broker.publish({
        senderId: worker.id,
        receiverId: message.senderId,
        type,
        conversationId: message.conversationId,
        content,
      });

    const request = readTaskRequest(message.content);
    if (!request) {
      reply("error", {
        taskId:
          typeof message.content["taskId"] === "string"
            ? message.content["taskId"]
            : null,
        error: "Malformed task_execution request",
      });
      return;
    }

    if (verbose) {
      console.log(`[Worker ${worker.id}] Starting task: ${request.task.title}`);
    }

    try {
      const output = await worker.handle(request);
      reply("response", { taskId: request.taskId, output });
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      if (verbose) {
        console.error(`[Worker ${worker.id}] Failed: ${error}`);
      }
      reply("error", { taskId: request.taskId, error });
    }
  };
}
