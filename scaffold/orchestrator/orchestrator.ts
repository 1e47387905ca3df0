import { randomUUID } from "crypto";
import {
  CapabilityAllocator,
  type Allocation,
  type TaskAllocator,
} from "../coordination/allocator";
import { MessageBroker, type BrokerMessage } from "../coordination/message-broker";
import { ProgressMonitor } from "../coordination/progress-monitor";
import { SharedContext } from "../coordination/shared-context";
import { resolveSettings, type OrchestratorSettings } from "../config";
import {
  KnowledgeSourceRegistry,
  ToolRegistry,
  WorkerRegistry,
} from "../registry/resource-registry";
import type { WorkerDescriptor } from "../registry/types";
import { createWorkerMessageHandler } from "../workers/handler";
import { TASK_EXECUTION, toRequestContent } from "../workers/protocol";
import type { TaskRequest, Worker } from "../workers/types";
import { PendingReplies, timeoutMessage } from "./dispatch";
import { ExecutionEventBus } from "./events";
import { assertTransition, isTerminal } from "./lifecycle";
import { withRetry, type RetryOptions } from "./retry";
import {
  SKIPPED_TASK_MESSAGE,
  type Decomposer,
  type ExecutionRecord,
  type ExecutionReport,
  type ExecutionResult,
  type ExecutionStatus,
  type GoalContext,
  type Plan,
  type PlanDraft,
  type PlanStep,
  type Planner,
  type SubtaskDescriptor,
  type Task,
  type TaskOutcome,
  type TaskStatus,
} from "./types";

export const CANCELLED_MESSAGE = "Execution cancelled";
export const UNFINISHED_TASK_MESSAGE = "Execution ended before the task was dispatched";

const DEFAULT_ORCHESTRATOR_ID = "orchestrator";

export interface ExecutionOrchestratorConfig {
  decomposer: Decomposer;
  planner: Planner;
  allocator?: TaskAllocator;
  broker?: MessageBroker;
  workers?: WorkerRegistry;
  tools?: ToolRegistry;
  knowledgeSources?: KnowledgeSourceRegistry;
  context?: SharedContext;
  /** Defaults to a monitor over `context` that mirrors status into `workers`. */
  monitor?: ProgressMonitor;
  events?: ExecutionEventBus;
  settings?: Partial<OrchestratorSettings>;
  /** Broker identity used as the sender of task requests. */
  id?: string;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function splitTaskList(tasks: string[] | string): string[] {
  const items = typeof tasks === "string" ? tasks.split(",") : tasks;
  return items.map((item) => item.trim()).filter((item) => item !== "");
}

/**
 * Drives submitted goals through decomposition, planning, allocation and
 * execution.
 *
 * Each submission gets its own run, started immediately and never awaited by
 * the caller. Runs share the registries, the shared context and the broker;
 * every mutation of those stores is synchronous, so concurrent runs
 * interleave only at their await points.
 */
export class ExecutionOrchestrator {
  readonly id: string;
  readonly workers: WorkerRegistry;
  readonly tools: ToolRegistry;
  readonly knowledgeSources: KnowledgeSourceRegistry;
  readonly context: SharedContext;
  readonly monitor: ProgressMonitor;
  readonly broker: MessageBroker;
  readonly events: ExecutionEventBus;
  readonly settings: Readonly<OrchestratorSettings>;

  private readonly decomposer: Decomposer;
  private readonly planner: Planner;
  private readonly allocator: TaskAllocator;
  private readonly pending = new PendingReplies();

  private executions = new Map<string, ExecutionRecord>();
  private tasks = new Map<string, Task>();
  private plans = new Map<string, Plan>();
  private runs = new Map<string, Promise<void>>();
  private controllers = new Map<string, AbortController>();
  private workerSubscriptions = new Map<string, () => void>();

  constructor(config: ExecutionOrchestratorConfig) {
    this.settings = Object.freeze(resolveSettings(config.settings));
    this.id = config.id?.trim() || DEFAULT_ORCHESTRATOR_ID;
    this.decomposer = config.decomposer;
    this.planner = config.planner;
    this.allocator = config.allocator ?? new CapabilityAllocator(this.settings.verbose);
    this.broker = config.broker ?? new MessageBroker({ verbose: this.settings.verbose });
    this.workers = config.workers ?? new WorkerRegistry();
    this.tools = config.tools ?? new ToolRegistry();
    this.knowledgeSources = config.knowledgeSources ?? new KnowledgeSourceRegistry();
    this.context = config.context ?? new SharedContext();
    this.monitor = config.monitor ?? new ProgressMonitor(this.context, this.workers);
    this.events = config.events ?? new ExecutionEventBus();

    this.broker.subscribe(this.id, (message) => this.onReply(message));
  }

  // ---------------------------------------------------------------------------
  // Public API
  // ---------------------------------------------------------------------------

  /**
   * Accept a goal and start its run. Returns the execution id immediately.
   */
  submitGoal(goal: string, context: GoalContext = {}): string {
    const id = randomUUID();
    const record: ExecutionRecord = {
      id,
      goal,
      context: structuredClone(context),
      status: "initializing",
      startTime: new Date(),
      subtasks: [],
      errors: [],
    };
    this.executions.set(id, record);
    this.events.emit("execution_submitted", id, this.id, { goal });
    this.log(`Submitted execution ${id}: ${goal}`);

    const controller = new AbortController();
    this.controllers.set(id, controller);
    const run = Promise.resolve()
      .then(() => this.runExecution(record, controller.signal))
      .finally(() => {
        this.controllers.delete(id);
      });
    this.runs.set(id, run);
    return id;
  }

  getExecutionStatus(executionId: string): ExecutionRecord | undefined {
    const record = this.executions.get(executionId);
    return record ? structuredClone(record) : undefined;
  }

  getAllExecutions(): Record<string, ExecutionRecord> {
    const all: Record<string, ExecutionRecord> = {};
    for (const [id, record] of this.executions) {
      all[id] = structuredClone(record);
    }
    return all;
  }

  /**
   * Execution record joined with its tasks and plan.
   */
  describeExecution(executionId: string): ExecutionReport | undefined {
    const record = this.executions.get(executionId);
    if (!record) return undefined;
    const tasks = record.subtasks
      .map((taskId) => this.tasks.get(taskId))
      .filter((task): task is Task => task !== undefined);
    const plan = record.planId ? this.plans.get(record.planId) : undefined;
    return structuredClone({ execution: record, tasks, plan });
  }

  /**
   * Resolve with the execution's record once its run has finished.
   */
  async waitForExecution(executionId: string): Promise<ExecutionRecord | undefined> {
    await this.runs.get(executionId);
    return this.getExecutionStatus(executionId);
  }

  /**
   * Request cooperative cancellation. The run stops at its next phase or step
   * boundary and fails with "Execution cancelled"; a task awaiting its reply
   * stops waiting. Returns false for unknown, finished or already cancelled
   * executions.
   */
  cancelExecution(executionId: string): boolean {
    const record = this.executions.get(executionId);
    const controller = this.controllers.get(executionId);
    if (!record || !controller || isTerminal(record.status)) return false;
    if (controller.signal.aborted) return false;

    controller.abort();
    this.events.emit("execution_cancelled", executionId, this.id, {
      status: record.status,
    });
    this.log(`Cancellation requested for ${executionId} while ${record.status}`);
    return true;
  }

  /**
   * Register a worker and subscribe it to task requests. Registering an id
   * again replaces the previous worker. The id is used verbatim as the
   * broker receiver, so it must not carry surrounding whitespace.
   */
  registerWorker(worker: Worker): WorkerDescriptor {
    if (worker.id !== worker.id.trim()) {
      throw new Error(`Worker id "${worker.id}" must not have surrounding whitespace`);
    }
    if (worker.id === this.id) {
      throw new Error(`Worker id "${worker.id}" collides with the orchestrator id`);
    }
    const descriptor = this.workers.registerWorker({
      id: worker.id,
      name: worker.name,
      description: worker.description,
      capabilities: worker.capabilities,
    });
    this.monitor.registerWorker(worker.id);

    this.workerSubscriptions.get(worker.id)?.();
    this.workerSubscriptions.set(
      worker.id,
      this.broker.subscribe(
        worker.id,
        createWorkerMessageHandler(worker, this.broker, this.settings.verbose)
      )
    );
    this.log(`Registered worker ${worker.id} [${worker.capabilities.join(", ")}]`);
    return descriptor;
  }

  /**
   * Remove a worker from the registry and the broker. Allocations already made
   * to it stand; their dispatches fail.
   */
  unregisterWorker(workerId: string): boolean {
    const key = workerId.trim();
    this.workerSubscriptions.get(key)?.();
    this.workerSubscriptions.delete(key);
    return this.workers.unregister(key);
  }

  // ---------------------------------------------------------------------------
  // Run loop
  // ---------------------------------------------------------------------------

  private async runExecution(record: ExecutionRecord, signal: AbortSignal): Promise<void> {
    try {
      this.checkCancelled(signal);
      this.transition(record, "decomposing");
      const tasks = await this.decompose(record, signal);
      this.checkCancelled(signal);

      this.transition(record, "planning");
      const plan = await this.plan(record, tasks, signal);
      this.checkCancelled(signal);

      this.transition(record, "allocating");
      const allocation = this.allocate(record, tasks);
      this.checkCancelled(signal);

      this.transition(record, "executing");
      const result = await this.execute(record, plan, allocation, signal);

      record.result = result;
      this.transition(record, "completed");
      record.endTime = new Date();
      this.events.emit("execution_completed", record.id, this.id, {
        stepsCompleted: result.stepsCompleted,
      });
      this.log(`Execution ${record.id} completed`);
    } catch (err) {
      this.fail(record, signal.aborted ? CANCELLED_MESSAGE : errorMessage(err));
    } finally {
      this.releaseUnfinishedTasks(record);
    }
  }

  private async decompose(record: ExecutionRecord, signal: AbortSignal): Promise<Task[]> {
    this.log(`Decomposing goal: ${record.goal}`);
    const descriptors = await withRetry(
      () => this.decomposer.decompose(record.goal, structuredClone(record.context), signal),
      this.retryOptions("Decomposer", signal)
    );
    if (!Array.isArray(descriptors)) {
      throw new Error("Decomposer must return a list of subtasks");
    }

    const tasks = this.buildTasks(record.id, descriptors);
    for (const task of tasks) {
      this.tasks.set(task.id, task);
      this.monitor.registerTask(task.id);
    }
    record.subtasks = tasks.map((task) => task.id);
    this.events.emit("tasks_decomposed", record.id, this.id, {
      taskIds: [...record.subtasks],
    });
    return tasks;
  }

  private buildTasks(executionId: string, descriptors: SubtaskDescriptor[]): Task[] {
    const ids = descriptors.map((_, index) => `${executionId}-task-${index}`);
    const idByTitle = new Map<string, string>();
    descriptors.forEach((descriptor, index) => {
      const key = descriptor.title.trim().toLowerCase();
      if (!idByTitle.has(key)) idByTitle.set(key, ids[index]);
    });
    const knownIds = new Set(ids);

    return descriptors.map((descriptor, index) => {
      const id = ids[index];
      const dependencies = new Set<string>();
      for (const dependency of descriptor.dependencies ?? []) {
        const resolved = knownIds.has(dependency)
          ? dependency
          : idByTitle.get(dependency.trim().toLowerCase());
        if (resolved === id) continue;
        if (resolved) {
          dependencies.add(resolved);
        } else {
          this.log(`Task ${id}: ignoring unknown dependency "${dependency}"`);
        }
      }
      return {
        id,
        executionId,
        title: descriptor.title,
        description: descriptor.description ?? "",
        dependencies: Array.from(dependencies),
        requiredCapabilities: Array.from(new Set(descriptor.requiredCapabilities ?? [])),
        status: "pending",
      };
    });
  }

  private async plan(
    record: ExecutionRecord,
    tasks: readonly Task[],
    signal: AbortSignal
  ): Promise<Plan> {
    this.log(`Planning execution for ${tasks.length} subtask(s)`);
    const draft = await withRetry(
      () =>
        this.planner.createPlan(
          tasks.map((task) => structuredClone(task)),
          structuredClone(record.context),
          signal
        ),
      this.retryOptions("Planner", signal)
    );

    const plan = this.normalizePlan(record.id, draft);
    this.plans.set(plan.id, plan);
    record.planId = plan.id;
    this.events.emit("plan_created", record.id, this.id, {
      planId: plan.id,
      steps: plan.steps.length,
    });
    return plan;
  }

  private normalizePlan(executionId: string, draft: PlanDraft): Plan {
    if (!draft || !Array.isArray(draft.steps)) {
      throw new Error("Planner must return a plan with a steps list");
    }
    const steps = draft.steps.map((draftStep, index): PlanStep => {
      const step: PlanStep = {
        name: draftStep.name?.trim() || `Step ${index + 1}`,
        taskIds: splitTaskList(draftStep.tasks),
        parallel: draftStep.parallel === true,
      };
      if (draftStep.conditions) step.conditions = draftStep.conditions;
      if (draftStep.expectedOutcomes) step.expectedOutcomes = draftStep.expectedOutcomes;
      return step;
    });
    return {
      id: `${executionId}-plan`,
      executionId,
      steps,
      metadata: { ...draft.metadata },
    };
  }

  private allocate(record: ExecutionRecord, tasks: readonly Task[]): Allocation {
    const snapshot = this.workers.listWorkers();
    this.log(`Allocating ${tasks.length} task(s) across ${snapshot.length} worker(s)`);
    const allocation = this.allocator.allocate(tasks, snapshot);

    for (const task of tasks) {
      const workerId = allocation[task.id];
      if (workerId === undefined) continue;
      this.monitor.assignTask(task.id, workerId);
      this.setTaskStatus(task.id, "assigned");
    }
    record.allocation = { ...allocation };
    this.events.emit("tasks_allocated", record.id, this.id, {
      allocation: { ...allocation },
      unallocated: tasks
        .filter((task) => allocation[task.id] === undefined)
        .map((task) => task.id),
    });
    return allocation;
  }

  private async execute(
    record: ExecutionRecord,
    plan: Plan,
    allocation: Allocation,
    signal: AbortSignal
  ): Promise<ExecutionResult> {
    const results: ExecutionResult["results"] = {};

    for (const [index, step] of plan.steps.entries()) {
      this.checkCancelled(signal);
      const stepId = `${record.id}-step-${index}`;
      this.log(`Executing step ${stepId}: ${step.name}`);

      const stepResults: Record<string, TaskOutcome> = {};
      if (step.parallel && this.settings.honorParallelSteps) {
        const outcomes = await Promise.all(
          step.taskIds.map(
            async (taskId) =>
              [taskId, await this.runTask(record, taskId, allocation, signal)] as const
          )
        );
        for (const [taskId, outcome] of outcomes) {
          stepResults[taskId] = outcome;
        }
      } else {
        for (const taskId of step.taskIds) {
          stepResults[taskId] = await this.runTask(record, taskId, allocation, signal);
        }
      }
      results[stepId] = stepResults;
    }

    this.checkCancelled(signal);
    return {
      executionId: record.id,
      stepsCompleted: plan.steps.length,
      results,
    };
  }

  private async runTask(
    record: ExecutionRecord,
    taskId: string,
    allocation: Allocation,
    signal: AbortSignal
  ): Promise<TaskOutcome> {
    this.checkCancelled(signal);
    const task = this.tasks.get(taskId);
    const ownTask = task !== undefined && task.executionId === record.id;
    const workerId: string | undefined = allocation[taskId];

    if (!ownTask || workerId === undefined) {
      if (ownTask) {
        this.monitor.skipTask(taskId, SKIPPED_TASK_MESSAGE);
        this.setTaskStatus(taskId, "skipped");
      }
      this.log(`Task ${taskId} not found or not allocated to any worker`);
      this.events.emit("task_resolved", record.id, this.id, {
        taskId,
        status: "skipped",
      });
      return { status: "skipped", message: SKIPPED_TASK_MESSAGE };
    }

    this.monitor.startTask(taskId, workerId);
    this.setTaskStatus(taskId, "in_progress");

    let outcome = await this.dispatch(record, task, workerId, signal, 0);
    for (
      let attempt = 1;
      attempt <= this.settings.dispatchRestartLimit &&
      this.shouldRedispatch(outcome, workerId, signal);
      attempt++
    ) {
      this.log(`Re-dispatching ${taskId} to ${workerId} (attempt ${attempt + 1})`);
      outcome = await this.dispatch(record, task, workerId, signal, attempt);
    }

    if (outcome.status === "completed") {
      this.monitor.completeTask(taskId, workerId, outcome.output);
      this.setTaskStatus(taskId, "completed");
    } else if (outcome.status === "failed") {
      this.monitor.failTask(taskId, workerId, outcome.error);
      this.setTaskStatus(taskId, "failed");
      this.log(`Task ${taskId} failed on ${workerId}: ${outcome.error}`);
    }
    this.events.emit("task_resolved", record.id, this.id, {
      taskId,
      workerId,
      status: outcome.status,
    });
    return outcome;
  }

  private dispatch(
    record: ExecutionRecord,
    task: Task,
    workerId: string,
    signal: AbortSignal,
    attempt: number
  ): Promise<TaskOutcome> {
    if (!this.broker.isSubscribed(workerId)) {
      return Promise.resolve({
        status: "failed",
        workerId,
        error: `Worker ${workerId} is not reachable`,
      });
    }

    const conversationId = randomUUID();
    const reply = this.pending.wait({
      conversationId,
      taskId: task.id,
      workerId,
      timeoutMs: this.settings.dispatchTimeoutMs,
      signal,
      abortMessage: CANCELLED_MESSAGE,
    });

    const request: TaskRequest = {
      kind: TASK_EXECUTION,
      taskId: task.id,
      executionId: record.id,
      task: structuredClone(task),
      context: structuredClone(record.context),
    };
    this.broker.publish({
      senderId: this.id,
      receiverId: workerId,
      type: "request",
      conversationId,
      content: toRequestContent(request),
    });
    this.events.emit("task_dispatched", record.id, this.id, {
      taskId: task.id,
      workerId,
      conversationId,
      attempt: attempt + 1,
    });
    return reply;
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private onReply(message: BrokerMessage): void {
    if (!this.pending.settle(message)) {
      this.log(
        `Ignoring ${message.type} from ${message.senderId} on conversation ${message.conversationId}`
      );
    }
  }

  /** Only a timed-out reply is worth another dispatch. */
  private shouldRedispatch(
    outcome: TaskOutcome,
    workerId: string,
    signal: AbortSignal
  ): boolean {
    return (
      !signal.aborted &&
      outcome.status === "failed" &&
      outcome.error === timeoutMessage(workerId, this.settings.dispatchTimeoutMs)
    );
  }

  private transition(record: ExecutionRecord, to: ExecutionStatus): void {
    const from = record.status;
    assertTransition(from, to);
    record.status = to;
    this.events.emit("status_changed", record.id, this.id, { from, to });
    this.log(`Execution ${record.id}: ${from} → ${to}`);
  }

  private fail(record: ExecutionRecord, message: string): void {
    if (isTerminal(record.status)) {
      console.error(
        `[Orchestrator] Error after execution ${record.id} finished: ${message}`
      );
      return;
    }
    record.errors.push(message);
    this.transition(record, "failed");
    record.endTime = new Date();
    this.events.emit("execution_failed", record.id, this.id, { error: message });
    this.log(`Execution ${record.id} failed: ${message}`);
  }

  /**
   * Tasks that never reached a worker (cancelled runs, or tasks no plan step
   * named) are skipped so their workers stop showing them as assigned.
   */
  private releaseUnfinishedTasks(record: ExecutionRecord): void {
    for (const taskId of record.subtasks) {
      const task = this.tasks.get(taskId);
      if (!task || (task.status !== "pending" && task.status !== "assigned")) {
        continue;
      }
      this.monitor.skipTask(taskId, UNFINISHED_TASK_MESSAGE, record.allocation?.[taskId]);
      this.setTaskStatus(taskId, "skipped");
    }
  }

  private setTaskStatus(taskId: string, status: TaskStatus): void {
    const task = this.tasks.get(taskId);
    if (task) task.status = status;
  }

  private checkCancelled(signal: AbortSignal): void {
    if (signal.aborted) {
      throw new Error(CANCELLED_MESSAGE);
    }
  }

  private retryOptions(label: string, signal: AbortSignal): RetryOptions {
    return {
      retries: this.settings.collaboratorRetryLimit,
      backoffMs: this.settings.retryBackoffMs,
      signal,
      onRetry: (attempt: number, err: unknown) =>
        this.log(`${label} failed (${errorMessage(err)}); retry ${attempt}`),
    };
  }

  private log(message: string): void {
    if (this.settings.verbose) {
      console.log(`[Orchestrator] ${message}`);
    }
  }
}
