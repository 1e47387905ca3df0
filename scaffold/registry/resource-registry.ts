import { types } from "util";
import type {
  KnowledgeSourceDescriptor,
  KnowledgeSourceMetadata,
  RegisterKnowledgeSourceInput,
  RegisterToolInput,
  RegisterWorkerInput,
  ResourceDescriptor,
  ResourceMetadata,
  ToolDescriptor,
  ToolMetadata,
  WorkerDescriptor,
  WorkerMetadata,
  WorkerStatus,
} from "./types";

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Structural equality over cloneable values. Stored metadata passes through
 * structuredClone, which can return objects of another realm, so arrays,
 * dates and records are compared by shape rather than by prototype.
 */
export function sameValue(left: unknown, right: unknown): boolean {
  if (Object.is(left, right)) return true;
  if (Array.isArray(left) || Array.isArray(right)) {
    if (!Array.isArray(left) || !Array.isArray(right)) return false;
    return (
      left.length === right.length &&
      left.every((item, index) => sameValue(item, right[index]))
    );
  }
  if (types.isDate(left) || types.isDate(right)) {
    return (
      types.isDate(left) &&
      types.isDate(right) &&
      left.getTime() === right.getTime()
    );
  }
  if (!isPlainRecord(left) || !isPlainRecord(right)) return false;
  const keys = Object.keys(left);
  return (
    keys.length === Object.keys(right).length &&
    keys.every((key) => key in right && sameValue(left[key], right[key]))
  );
}

/**
 * Map-backed keyed store of resource descriptors.
 *
 * Registration is last-write-wins; an overwritten id keeps its original
 * position in iteration order. Reads hand out copies, so callers can never
 * mutate a stored descriptor in place.
 */
export class ResourceRegistry<M extends ResourceMetadata = ResourceMetadata> {
  protected readonly resources = new Map<string, M>();

  register(id: string, metadata: M): this {
    const key = id.trim();
    if (!key) {
      throw new Error("Resource id must be a non-empty string");
    }
    this.resources.set(key, structuredClone(metadata));
    return this;
  }

  /**
   * Remove a resource. Unknown ids are a no-op, reported as a warning.
   */
  unregister(id: string): boolean {
    const key = id.trim();
    if (!this.resources.delete(key)) {
      console.warn(`[Registry] Attempted to unregister unknown resource: ${key}`);
      return false;
    }
    return true;
  }

  get(id: string): ResourceDescriptor<M> | undefined {
    const key = id.trim();
    const metadata = this.resources.get(key);
    return metadata ? this.describe(key, metadata) : undefined;
  }

  has(id: string): boolean {
    return this.resources.has(id.trim());
  }

  list(): ResourceDescriptor<M>[] {
    return Array.from(this.resources.entries()).map(([id, metadata]) =>
      this.describe(id, metadata)
    );
  }

  /**
   * Descriptors whose fields equal every given criterion. A field absent from
   * the descriptor never matches.
   */
  query(criteria: Partial<M>): ResourceDescriptor<M>[] {
    const entries = Object.entries(criteria);
    return this.list().filter((descriptor) => {
      const fields: ResourceMetadata = descriptor;
      return entries.every(
        ([key, expected]) =>
          key in fields && sameValue(fields[key], expected)
      );
    });
  }

  get size(): number {
    return this.resources.size;
  }

  protected require(id: string): ResourceDescriptor<M> {
    const descriptor = this.get(id);
    if (!descriptor) {
      throw new Error(`Resource ${id} is not registered`);
    }
    return descriptor;
  }

  protected describe(id: string, metadata: M): ResourceDescriptor<M> {
    return { ...structuredClone(metadata), id };
  }
}

export class WorkerRegistry extends ResourceRegistry<WorkerMetadata> {
  registerWorker(input: RegisterWorkerInput): WorkerDescriptor {
    if (!input.name.trim()) {
      throw new Error(`Worker ${input.id} must have a non-empty name`);
    }
    this.register(input.id, {
      ...input.metadata,
      type: "worker",
      name: input.name,
      description: input.description,
      capabilities: Array.from(new Set(input.capabilities)),
      status: input.status ?? "available",
    });
    return this.require(input.id);
  }

  /**
   * Workers whose capability set contains `capability`.
   */
  queryByCapability(capability: string): WorkerDescriptor[] {
    return this.listWorkers().filter((worker) =>
      worker.capabilities.includes(capability)
    );
  }

  /** Worker descriptors in registration order. */
  listWorkers(): WorkerDescriptor[] {
    return this.list().filter((descriptor) => descriptor.type === "worker");
  }

  setStatus(id: string, status: WorkerStatus): boolean {
    const current = this.resources.get(id.trim());
    if (!current) return false;
    current.status = status;
    return true;
  }
}

export class ToolRegistry extends ResourceRegistry<ToolMetadata> {
  registerTool(input: RegisterToolInput): ToolDescriptor {
    this.register(input.id, {
      ...input.metadata,
      type: "tool",
      name: input.name,
      description: input.description,
      inputSchema: input.inputSchema,
      outputSchema: input.outputSchema,
    });
    return this.require(input.id);
  }
}

export class KnowledgeSourceRegistry extends ResourceRegistry<KnowledgeSourceMetadata> {
  registerKnowledgeSource(
    input: RegisterKnowledgeSourceInput
  ): KnowledgeSourceDescriptor {
    this.register(input.id, {
      ...input.metadata,
      type: "knowledge_source",
      name: input.name,
      description: input.description,
      sourceType: input.sourceType,
      accessInfo: input.accessInfo,
    });
    return this.require(input.id);
  }

  queryBySourceType(sourceType: string): KnowledgeSourceDescriptor[] {
    return this.list().filter((source) => source.sourceType === sourceType);
  }
}
