import { MessageBroker, type BrokerMessage } from "../coordination/message-broker";
import type { Task } from "../orchestrator/types";
import { createWorkerMessageHandler } from "../workers/handler";
import { LlmWorker } from "../workers/llm-worker";
import { WORKER_PROFILES } from "../workers/profiles";
import { readTaskReply, readTaskRequest, toRequestContent } from "../workers/protocol";
import type { TaskRequest, Worker } from "../workers/types";
import { createSequencedProvider, textResponse } from "./helpers";

const task: Task = {
  id: "exec-1-task-0",
  executionId: "exec-1",
  title: "Gather sources",
  description: "Find material on X",
  dependencies: [],
  requiredCapabilities: ["research"],
  status: "in_progress",
};

const request: TaskRequest = {
  kind: "task_execution",
  taskId: task.id,
  executionId: "exec-1",
  task,
  context: { audience: "team" },
};

function stubWorker(handle: Worker["handle"]): Worker {
  return {
    id: "w1",
    name: "Stub",
    description: "",
    capabilities: ["research"],
    handle,
  };
}

function collectReplies(broker: MessageBroker): BrokerMessage[] {
  const replies: BrokerMessage[] = [];
  broker.subscribe("orchestrator", (message) => {
    replies.push(message);
  });
  return replies;
}

describe("task protocol", () => {
  it("reads a well-formed request", () => {
    expect(readTaskRequest(toRequestContent(request))).toEqual(request);
  });

  it("defaults a missing context and rejects malformed requests", () => {
    const withoutContext = {
      kind: request.kind,
      taskId: request.taskId,
      executionId: request.executionId,
      task,
    };
    expect(readTaskRequest(withoutContext)?.context).toEqual({});
    expect(readTaskRequest({ ...request, kind: "other" })).toBeUndefined();
    expect(readTaskRequest({ ...request, task: { ...task, status: "done" } })).toBeUndefined();
    expect(readTaskRequest({ kind: "task_execution", taskId: 7 })).toBeUndefined();
  });

  it("reads replies and ignores other message types", () => {
    const base: BrokerMessage = {
      id: "m1",
      senderId: "w1",
      receiverId: "orchestrator",
      type: "response",
      conversationId: "c1",
      content: { taskId: "t1", output: { text: "ok" } },
      timestamp: new Date(),
    };
    expect(readTaskReply(base)).toEqual({
      type: "response",
      conversationId: "c1",
      taskId: "t1",
      output: { text: "ok" },
    });
    expect(readTaskReply({ ...base, type: "error", content: { taskId: "t1", error: 3 } })).toEqual({
      type: "error",
      conversationId: "c1",
      taskId: "t1",
      error: "Worker reported an error",
    });
    expect(readTaskReply({ ...base, type: "notification" })).toBeUndefined();
    expect(readTaskReply({ ...base, content: {} })).toBeUndefined();
  });
});

describe("createWorkerMessageHandler", () => {
  it("replies with the worker's output on the same conversation", async () => {
    const broker = new MessageBroker();
    const replies = collectReplies(broker);
    const handle = jest.fn().mockResolvedValue({ text: "found it" });
    broker.subscribe("w1", createWorkerMessageHandler(stubWorker(handle), broker));

    broker.publish({
      senderId: "orchestrator",
      receiverId: "w1",
      type: "request",
      conversationId: "c1",
      content: toRequestContent(request),
    });
    await broker.drain();

    expect(handle).toHaveBeenCalledWith(request);
    expect(replies).toHaveLength(1);
    expect(replies[0]).toMatchObject({
      senderId: "w1",
      receiverId: "orchestrator",
      type: "response",
      conversationId: "c1",
      content: { taskId: task.id, output: { text: "found it" } },
    });
  });

  it("turns a thrown error into an error reply", async () => {
    const broker = new MessageBroker();
    const replies = collectReplies(broker);
    const worker = stubWorker(() => Promise.reject(new Error("rate limited")));
    broker.subscribe("w1", createWorkerMessageHandler(worker, broker));

    broker.publish({
      senderId: "orchestrator",
      receiverId: "w1",
      type: "request",
      conversationId: "c2",
      content: toRequestContent(request),
    });
    await broker.drain();

    expect(replies[0]).toMatchObject({
      type: "error",
      conversationId: "c2",
      content: { taskId: task.id, error: "rate limited" },
    });
  });

  it("answers malformed requests with an error and ignores other types", async () => {
    const broker = new MessageBroker();
    const replies = collectReplies(broker);
    const handle = jest.fn();
    broker.subscribe("w1", createWorkerMessageHandler(stubWorker(handle), broker));

    broker.publish({
      senderId: "orchestrator",
      receiverId: "w1",
      type: "request",
      conversationId: "c3",
      content: { kind: "task_execution", taskId: "t9" },
    });
    broker.publish({
      senderId: "orchestrator",
      receiverId: "w1",
      type: "notification",
      content: { hello: true },
    });
    await broker.drain();

    expect(handle).not.toHaveBeenCalled();
    expect(replies).toHaveLength(1);
    expect(replies[0]).toMatchObject({
      type: "error",
      conversationId: "c3",
      content: { taskId: "t9", error: "Malformed task_execution request" },
    });
  });
});

describe("LlmWorker", () => {
  it("takes its capabilities and prompt from a profile", async () => {
    const provider = createSequencedProvider("worker", [
      { textBlocks: ["Three sources ", "found."], stopReason: "end_turn", usage: { inputTokens: 12, outputTokens: 4 } },
    ]);
    const worker = new LlmWorker({ id: "research-worker", provider, model: "m", profile: "research" });

    expect(worker.capabilities).toEqual(["research", "information_gathering", "summarization"]);
    expect(worker.name).toBe(WORKER_PROFILES.research.name);

    const output = await worker.handle(request);
    expect(output).toEqual({
      text: "Three sources found.",
      model: "m",
      usage: { inputTokens: 12, outputTokens: 4 },
    });

    const chatRequest = provider.chat.mock.calls[0][0];
    expect(chatRequest.systemPrompt).toBe(WORKER_PROFILES.research.systemPrompt);
    expect(chatRequest.messages[0].content).toBe(
      "Task: Gather sources\nDescription: Find material on X\n\nContext:\naudience: team\n\nComplete this task and reply with the result only."
    );
  });

  it("accepts a custom profile", () => {
    const provider = createSequencedProvider("worker", []);
    const worker = new LlmWorker({
      id: "translator",
      provider,
      model: "m",
      profile: {
        name: "Translator",
        description: "Translates text",
        capabilities: ["translation"],
        systemPrompt: "Translate.",
      },
    });
    expect(worker.capabilities).toEqual(["translation"]);
  });

  it("fails on an empty reply", async () => {
    const provider = createSequencedProvider("worker", [textResponse("   ")]);
    const worker = new LlmWorker({ id: "w", provider, model: "m", profile: "analysis" });
    await expect(worker.handle(request)).rejects.toThrow(
      "Worker w produced no output for exec-1-task-0"
    );
  });
});
