export * from "./registry/types";
export {
  ResourceRegistry,
  WorkerRegistry,
  ToolRegistry,
  KnowledgeSourceRegistry,
} from "./registry/resource-registry";

export { SharedContext, isRecord, type ContextRecord } from "./coordination/shared-context";
export {
  MessageBroker,
  type BrokerMessage,
  type MessageBrokerOptions,
  type MessageHandler,
  type MessageType,
  type PublishInput,
} from "./coordination/message-broker";
export {
  CapabilityAllocator,
  groupByWorker,
  type AllocatableTask,
  type Allocation,
  type TaskAllocator,
} from "./coordination/allocator";
export {
  ProgressMonitor,
  type TaskProgress,
  type TaskProgressListener,
  type WorkerProgress,
} from "./coordination/progress-monitor";

export * from "./orchestrator/types";
export {
  ExecutionOrchestrator,
  CANCELLED_MESSAGE,
  UNFINISHED_TASK_MESSAGE,
  type ExecutionOrchestratorConfig,
} from "./orchestrator/orchestrator";
export {
  EXECUTION_STATUS_ORDER,
  VALID_TRANSITIONS,
  IllegalTransitionError,
  assertTransition,
  canTransition,
  isTerminal,
} from "./orchestrator/lifecycle";
export {
  ExecutionEventBus,
  type ExecutionEvent,
  type ExecutionEventListener,
  type ExecutionEventType,
} from "./orchestrator/events";

export {
  DEFAULT_ORCHESTRATOR_SETTINGS,
  resolveSettings,
  settingsFromEnv,
  providerConfigFromEnv,
  type OrchestratorSettings,
} from "./config";
export { validateGoalSubmission, type GoalSubmission, type SubmissionValidation } from "./submission";

export { LlmDecomposer, type LlmDecomposerOptions } from "./planning/llm-decomposer";
export { LlmPlanner, type LlmPlannerOptions } from "./planning/llm-planner";

export type { TaskReply, TaskRequest, Worker } from "./workers/types";
export { createWorkerMessageHandler } from "./workers/handler";
export { LlmWorker, type LlmWorkerOptions, type LlmWorkerOutput } from "./workers/llm-worker";
export { WORKER_PROFILES, type WorkerProfile, type WorkerProfileName } from "./workers/profiles";

export * from "./providers";
