/**
 * Resource descriptors stored by the registries.
 *
 * Every descriptor carries a `type` tag so that a single registry could hold a
 * mix of resources; capability lookups only ever consider `type: "worker"`.
 */
export type ResourceType = "worker" | "tool" | "knowledge_source";

export type WorkerStatus = "available" | "assigned" | "in_progress";

export interface ResourceMetadata {
  type?: ResourceType | string;
  name?: string;
  description?: string;
  [key: string]: unknown;
}

/** A descriptor as returned by `get`/`query`, with its registry id attached. */
export type ResourceDescriptor<M extends ResourceMetadata = ResourceMetadata> =
  M & { id: string };

export interface WorkerMetadata extends ResourceMetadata {
  type: "worker";
  name: string;
  description: string;
  capabilities: string[];
  status: WorkerStatus;
}

export interface ToolMetadata extends ResourceMetadata {
  type: "tool";
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
  outputSchema: Record<string, unknown>;
}

export type KnowledgeSourceType = "database" | "vector_store" | "api" | string;

export interface KnowledgeSourceMetadata extends ResourceMetadata {
  type: "knowledge_source";
  name: string;
  description: string;
  sourceType: KnowledgeSourceType;
  accessInfo: Record<string, unknown>;
}

export type WorkerDescriptor = ResourceDescriptor<WorkerMetadata>;
export type ToolDescriptor = ResourceDescriptor<ToolMetadata>;
export type KnowledgeSourceDescriptor = ResourceDescriptor<KnowledgeSourceMetadata>;

export interface RegisterWorkerInput {
  id: string;
  name: string;
  description: string;
  capabilities: readonly string[];
  status?: WorkerStatus;
  metadata?: Record<string, unknown>;
}

export interface RegisterToolInput {
  id: string;
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
  outputSchema: Record<string, unknown>;
  metadata?: Record<string, unknown>;
}

export interface RegisterKnowledgeSourceInput {
  id: string;
  name: string;
  description: string;
  sourceType: KnowledgeSourceType;
  accessInfo: Record<string, unknown>;
  metadata?: Record<string, unknown>;
}
