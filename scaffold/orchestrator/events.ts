export type ExecutionEventType =
  | "execution_submitted"
  | "status_changed"
  | "tasks_decomposed"
  | "plan_created"
  | "tasks_allocated"
  | "task_dispatched"
  | "task_resolved"
  | "execution_completed"
  | "execution_failed"
  | "execution_cancelled";

export interface ExecutionEvent {
  id: string;
  schemaVersion: number;
  type: ExecutionEventType;
  executionId: string;
  actor: string;
  timestamp: Date;
  payload?: Record<string, unknown>;
}

export type ExecutionEventListener = (event: ExecutionEvent) => void;

const DEFAULT_MAX_EVENTS = 10_000;

/**
 * In-memory runtime event stream shared by every execution of an
 * orchestrator. Only the newest `maxEvents` events are retained.
 */
export class ExecutionEventBus {
  private events: ExecutionEvent[] = [];
  private listeners = new Set<ExecutionEventListener>();
  private seq = 0;

  constructor(private readonly maxEvents = DEFAULT_MAX_EVENTS) {
    if (!Number.isInteger(maxEvents) || maxEvents < 0) {
      throw new Error(`maxEvents must be a non-negative integer, got: ${maxEvents}`);
    }
  }

  emit(
    type: ExecutionEventType,
    executionId: string,
    actor: string,
    payload?: Record<string, unknown>
  ): ExecutionEvent {
    const event: ExecutionEvent = {
      id: `evt-${++this.seq}`,
      schemaVersion: 1,
      type,
      executionId,
      actor,
      timestamp: new Date(),
      payload: payload ? { ...payload } : undefined,
    };

    this.events.push(event);
    if (this.events.length > this.maxEvents) {
      this.events.splice(0, this.events.length - this.maxEvents);
    }

    for (const listener of this.listeners) {
      try {
        listener(this.clone(event));
      } catch (err) {
        console.error(
          `[Events] Listener failed on ${event.type}: ${
            err instanceof Error ? err.message : String(err)
          }`
        );
      }
    }
    return this.clone(event);
  }

  list(executionId?: string): ExecutionEvent[] {
    return this.events
      .filter(
        (event) => executionId === undefined || event.executionId === executionId
      )
      .map((event) => this.clone(event));
  }

  clear(): void {
    this.events = [];
    this.seq = 0;
  }

  subscribe(listener: ExecutionEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private clone(event: ExecutionEvent): ExecutionEvent {
    return {
      ...event,
      timestamp: new Date(event.timestamp),
      payload: event.payload ? { ...event.payload } : undefined,
    };
  }
}
