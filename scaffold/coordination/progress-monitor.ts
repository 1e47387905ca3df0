import { types } from "util";
import type { WorkerRegistry } from "../registry/resource-registry";
import type { WorkerStatus } from "../registry/types";
import type { TaskStatus } from "../orchestrator/types";
import { isRecord, SharedContext, type ContextRecord } from "./shared-context";

const TASK_PREFIX = "task:";
const WORKER_PREFIX = "worker:";

const TASK_STATUSES: ReadonlySet<string> = new Set<TaskStatus>([
  "pending",
  "assigned",
  "in_progress",
  "completed",
  "failed",
  "skipped",
]);

const WORKER_STATUSES: ReadonlySet<string> = new Set<WorkerStatus>([
  "available",
  "assigned",
  "in_progress",
]);

export interface TaskProgress {
  taskId: string;
  status: TaskStatus;
  updatedAt: Date;
  workerId?: string;
  startedAt?: Date;
  endedAt?: Date;
  result?: unknown;
  error?: string;
}

export interface WorkerProgress {
  workerId: string;
  status: WorkerStatus;
  updatedAt: Date;
  /** Tasks allocated to the worker and not yet resolved. */
  currentTasks: string[];
  /** Subset of `currentTasks` that has been dispatched. */
  activeTasks: string[];
  completedTasks: string[];
}

export type TaskProgressListener = (progress: TaskProgress) => void;

type TaskPatch = Partial<Omit<TaskProgress, "taskId" | "updatedAt">>;

export function isTaskStatus(value: unknown): value is TaskStatus {
  return typeof value === "string" && TASK_STATUSES.has(value);
}

function isWorkerStatus(value: unknown): value is WorkerStatus {
  return typeof value === "string" && WORKER_STATUSES.has(value);
}

// Values come back from the context through structuredClone, which may hand
// out objects of another realm, so dates are recognised by brand.
function optionalDate(value: unknown): Date | undefined {
  return types.isDate(value) ? value : undefined;
}

function stringList(value: unknown): string[] {
  return Array.isArray(value)
    ? value.filter((item): item is string => typeof item === "string")
    : [];
}

function readTaskProgress(value: unknown): TaskProgress | undefined {
  if (!isRecord(value)) return undefined;
  const { taskId, status, updatedAt } = value;
  if (typeof taskId !== "string" || !isTaskStatus(status)) return undefined;
  if (!types.isDate(updatedAt)) return undefined;

  const progress: TaskProgress = { taskId, status, updatedAt };
  if (typeof value.workerId === "string") progress.workerId = value.workerId;
  const startedAt = optionalDate(value.startedAt);
  if (startedAt) progress.startedAt = startedAt;
  const endedAt = optionalDate(value.endedAt);
  if (endedAt) progress.endedAt = endedAt;
  if ("result" in value) progress.result = value.result;
  if (typeof value.error === "string") progress.error = value.error;
  return progress;
}

function readWorkerProgress(value: unknown): WorkerProgress | undefined {
  if (!isRecord(value)) return undefined;
  const { workerId, status, updatedAt } = value;
  if (typeof workerId !== "string" || !isWorkerStatus(status)) return undefined;
  if (!types.isDate(updatedAt)) return undefined;
  return {
    workerId,
    status,
    updatedAt,
    currentTasks: stringList(value.currentTasks),
    activeTasks: stringList(value.activeTasks),
    completedTasks: stringList(value.completedTasks),
  };
}

function deriveWorkerStatus(progress: Omit<WorkerProgress, "status">): WorkerStatus {
  if (progress.activeTasks.length > 0) return "in_progress";
  if (progress.currentTasks.length > 0) return "assigned";
  return "available";
}

/**
 * Latest-status-wins view of task and worker progress, stored in a
 * SharedContext under `task:<id>` and `worker:<id>` keys.
 *
 * When constructed with a WorkerRegistry, worker status changes are mirrored
 * onto the registry descriptors.
 */
export class ProgressMonitor {
  private taskListeners = new Map<string, Set<TaskProgressListener>>();

  constructor(
    private readonly context: SharedContext = new SharedContext(),
    private readonly workers?: WorkerRegistry
  ) {}

  registerTask(taskId: string): TaskProgress {
    const progress: TaskProgress = {
      taskId,
      status: "pending",
      updatedAt: new Date(),
    };
    this.context.set(TASK_PREFIX + taskId, progress);
    this.notify(progress);
    return progress;
  }

  registerWorker(workerId: string): WorkerProgress {
    return this.writeWorker({
      workerId,
      updatedAt: new Date(),
      currentTasks: [],
      activeTasks: [],
      completedTasks: [],
    });
  }

  /**
   * Merge `patch` into a task's record. Unknown tasks are left alone.
   */
  updateTask(taskId: string, patch: TaskPatch): TaskProgress | undefined {
    const key = TASK_PREFIX + taskId;
    if (!this.context.has(key)) {
      console.warn(`[ProgressMonitor] Attempted to update unknown task: ${taskId}`);
      return undefined;
    }
    const update: ContextRecord = { ...patch, updatedAt: new Date() };
    const progress = readTaskProgress(this.context.update(key, update));
    if (progress) this.notify(progress);
    return progress;
  }

  assignTask(taskId: string, workerId: string): TaskProgress | undefined {
    const progress = this.updateTask(taskId, { status: "assigned", workerId });
    this.changeWorker(workerId, (worker) => ({
      ...worker,
      currentTasks: addOnce(worker.currentTasks, taskId),
    }));
    return progress;
  }

  startTask(taskId: string, workerId: string): TaskProgress | undefined {
    const progress = this.updateTask(taskId, {
      status: "in_progress",
      workerId,
      startedAt: new Date(),
    });
    this.changeWorker(workerId, (worker) => ({
      ...worker,
      currentTasks: addOnce(worker.currentTasks, taskId),
      activeTasks: addOnce(worker.activeTasks, taskId),
    }));
    return progress;
  }

  completeTask(
    taskId: string,
    workerId: string,
    result: unknown
  ): TaskProgress | undefined {
    const progress = this.updateTask(taskId, {
      status: "completed",
      endedAt: new Date(),
      result,
    });
    this.releaseWorker(workerId, taskId);
    return progress;
  }

  failTask(
    taskId: string,
    workerId: string,
    error: string
  ): TaskProgress | undefined {
    const progress = this.updateTask(taskId, {
      status: "failed",
      endedAt: new Date(),
      error,
    });
    this.releaseWorker(workerId, taskId);
    return progress;
  }

  /**
   * Mark a task skipped. When `workerId` is given the task is also dropped from
   * that worker's current work without counting as completed.
   */
  skipTask(
    taskId: string,
    reason: string,
    workerId?: string
  ): TaskProgress | undefined {
    const progress = this.updateTask(taskId, {
      status: "skipped",
      endedAt: new Date(),
      error: reason,
    });
    if (workerId !== undefined) {
      this.changeWorker(workerId, (worker) => ({
        ...worker,
        currentTasks: worker.currentTasks.filter((id) => id !== taskId),
        activeTasks: worker.activeTasks.filter((id) => id !== taskId),
      }));
    }
    return progress;
  }

  getTask(taskId: string): TaskProgress | undefined {
    return readTaskProgress(this.context.get(TASK_PREFIX + taskId));
  }

  getWorker(workerId: string): WorkerProgress | undefined {
    return readWorkerProgress(this.context.get(WORKER_PREFIX + workerId));
  }

  listTasks(): TaskProgress[] {
    return this.context
      .keys(TASK_PREFIX)
      .map((key) => readTaskProgress(this.context.get(key)))
      .filter((progress): progress is TaskProgress => progress !== undefined);
  }

  listWorkers(): WorkerProgress[] {
    return this.context
      .keys(WORKER_PREFIX)
      .map((key) => readWorkerProgress(this.context.get(key)))
      .filter((progress): progress is WorkerProgress => progress !== undefined);
  }

  onTaskUpdate(taskId: string, listener: TaskProgressListener): () => void {
    let listeners = this.taskListeners.get(taskId);
    if (!listeners) {
      listeners = new Set();
      this.taskListeners.set(taskId, listeners);
    }
    listeners.add(listener);
    return () => {
      listeners?.delete(listener);
      if (listeners?.size === 0) {
        this.taskListeners.delete(taskId);
      }
    };
  }

  private releaseWorker(workerId: string, taskId: string): void {
    this.changeWorker(workerId, (worker) => ({
      ...worker,
      currentTasks: worker.currentTasks.filter((id) => id !== taskId),
      activeTasks: worker.activeTasks.filter((id) => id !== taskId),
      completedTasks: addOnce(worker.completedTasks, taskId),
    }));
  }

  private changeWorker(
    workerId: string,
    change: (
      worker: Omit<WorkerProgress, "status" | "updatedAt">
    ) => Omit<WorkerProgress, "status" | "updatedAt">
  ): WorkerProgress {
    const current = this.getWorker(workerId) ?? {
      workerId,
      currentTasks: [],
      activeTasks: [],
      completedTasks: [],
    };
    return this.writeWorker({ ...change(current), updatedAt: new Date() });
  }

  private writeWorker(worker: Omit<WorkerProgress, "status">): WorkerProgress {
    const progress: WorkerProgress = {
      workerId: worker.workerId,
      status: deriveWorkerStatus(worker),
      updatedAt: worker.updatedAt,
      currentTasks: [...worker.currentTasks],
      activeTasks: [...worker.activeTasks],
      completedTasks: [...worker.completedTasks],
    };
    this.context.set(WORKER_PREFIX + worker.workerId, progress);
    this.workers?.setStatus(worker.workerId, progress.status);
    return progress;
  }

  private notify(progress: TaskProgress): void {
    const listeners = this.taskListeners.get(progress.taskId);
    if (!listeners) return;
    for (const listener of listeners) {
      try {
        listener({ ...progress });
      } catch (err) {
        console.error(
          `[ProgressMonitor] Listener for ${progress.taskId} failed: ${
            err instanceof Error ? err.message : String(err)
          }`
        );
      }
    }
  }
}

function addOnce(list: readonly string[], id: string): string[] {
  return list.includes(id) ? [...list] : [...list, id];
}
