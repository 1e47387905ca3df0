import type { WorkerDescriptor } from "../registry/types";

export interface AllocatableTask {
  id: string;
  requiredCapabilities: readonly string[];
}

/** Task id → worker id. Tasks with no capable worker have no entry. */
export type Allocation = Record<string, string>;

export interface TaskAllocator {
  allocate(
    tasks: readonly AllocatableTask[],
    workers: readonly WorkerDescriptor[]
  ): Allocation;
}

/**
 * One-shot capability matcher.
 *
 * A worker qualifies for a task when its capabilities are a superset of the
 * task's required capabilities; the first qualifying worker in snapshot order
 * wins. No load balancing, no capacity limits, no dependency awareness.
 */
export class CapabilityAllocator implements TaskAllocator {
  constructor(private readonly verbose = false) {}

  allocate(
    tasks: readonly AllocatableTask[],
    workers: readonly WorkerDescriptor[]
  ): Allocation {
    const allocation: Allocation = {};
    const capabilitySets = workers.map(
      (worker) => [worker.id, new Set(worker.capabilities)] as const
    );

    for (const task of tasks) {
      const match = capabilitySets.find(([, capabilities]) =>
        task.requiredCapabilities.every((capability) =>
          capabilities.has(capability)
        )
      );

      if (match) {
        allocation[task.id] = match[0];
      } else if (this.verbose) {
        console.log(
          `[Allocator] No suitable worker for task ${task.id} requiring [${task.requiredCapabilities.join(", ")}]`
        );
      }
    }

    return allocation;
  }
}

/**
 * Worker id → allocated task ids, in allocation order.
 */
export function groupByWorker(allocation: Allocation): Record<string, string[]> {
  const grouped: Record<string, string[]> = {};
  for (const [taskId, workerId] of Object.entries(allocation)) {
    (grouped[workerId] ??= []).push(taskId);
  }
  return grouped;
}
