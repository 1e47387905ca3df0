/**
 * Execution lifecycle contract: strictly forward status transitions.
 */
import type { ExecutionStatus } from "./types";

export const EXECUTION_STATUS_ORDER: readonly ExecutionStatus[] = Object.freeze([
  "initializing",
  "decomposing",
  "planning",
  "allocating",
  "executing",
  "completed",
  "failed",
]);

export const VALID_TRANSITIONS: Readonly<
  Record<ExecutionStatus, readonly ExecutionStatus[]>
> = Object.freeze({
  initializing: ["decomposing", "failed"],
  decomposing: ["planning", "failed"],
  planning: ["allocating", "failed"],
  allocating: ["executing", "failed"],
  executing: ["completed", "failed"],
  completed: [],
  failed: [],
});

export class IllegalTransitionError extends Error {
  readonly from: ExecutionStatus;
  readonly to: ExecutionStatus;

  constructor(from: ExecutionStatus, to: ExecutionStatus) {
    const valid = VALID_TRANSITIONS[from].join(", ") || "none";
    super(`Illegal transition: ${from} → ${to}. Valid targets: [${valid}]`);
    this.name = "IllegalTransitionError";
    this.from = from;
    this.to = to;
  }
}

export function canTransition(
  from: ExecutionStatus,
  to: ExecutionStatus
): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function assertTransition(
  from: ExecutionStatus,
  to: ExecutionStatus
): void {
  if (!canTransition(from, to)) {
    throw new IllegalTransitionError(from, to);
  }
}

export function isTerminal(status: ExecutionStatus): boolean {
  return status === "completed" || status === "failed";
}
