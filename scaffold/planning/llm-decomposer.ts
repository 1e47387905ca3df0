import type { LLMProvider } from "../providers/types";
import type {
  Decomposer,
  GoalContext,
  SubtaskDescriptor,
} from "../orchestrator/types";
import { isRecord } from "../coordination/shared-context";
import { parseModelJson, readOptionalString, readStringList } from "./json";

const DEFAULT_MAX_SUBTASKS = 8;

export interface LlmDecomposerOptions {
  provider: LLMProvider;
  model: string;
  maxSubtasks?: number;
  /** Capability vocabulary the model should tag subtasks with. */
  capabilities?: readonly string[];
  verbose?: boolean;
}

function buildSystemPrompt(maxSubtasks: number): string {
  return `You are an expert in task decomposition. Break complex goals into smaller, manageable subtasks that specialized workers can execute.
Produce a JSON array of subtasks. Each subtask must have:
  - title: a short descriptive title, unique within the list
  - description: what needs to be done, self-contained
Optional fields:
  - dependencies: array of titles of subtasks that must finish first
  - requiredCapabilities: array of capability names needed to complete it

Rules:
- Limit to at most ${maxSubtasks} subtasks
- Only use dependencies when ordering constraints are truly needed
- Return ONLY the JSON array, no prose, no markdown fences`;
}

export function renderContext(context: GoalContext): string {
  const entries = Object.entries(context);
  if (entries.length === 0) return "(none)";
  return entries
    .map(
      ([key, value]) =>
        `${key}: ${typeof value === "string" ? value : JSON.stringify(value)}`
    )
    .join("\n");
}

/**
 * Decomposer backed by an LLM provider.
 */
export class LlmDecomposer implements Decomposer {
  private readonly provider: LLMProvider;
  private readonly model: string;
  private readonly maxSubtasks: number;
  private readonly capabilities: readonly string[];
  private readonly verbose: boolean;

  constructor(options: LlmDecomposerOptions) {
    const maxSubtasks = options.maxSubtasks ?? DEFAULT_MAX_SUBTASKS;
    if (!Number.isInteger(maxSubtasks) || maxSubtasks < 1) {
      throw new Error(`maxSubtasks must be a positive integer, got: ${maxSubtasks}`);
    }
    this.provider = options.provider;
    this.model = options.model;
    this.maxSubtasks = maxSubtasks;
    this.capabilities = options.capabilities ?? [];
    this.verbose = options.verbose ?? false;
  }

  async decompose(
    goal: string,
    context: GoalContext,
    signal?: AbortSignal
  ): Promise<SubtaskDescriptor[]> {
    if (this.verbose) {
      console.log(`[Decomposer] Decomposing goal: ${goal}`);
    }

    let prompt = `Goal: ${goal}\n\nAdditional context:\n${renderContext(context)}`;
    if (this.capabilities.length > 0) {
      prompt += `\n\nAvailable capabilities: ${this.capabilities.join(", ")}`;
    }

    const response = await this.provider.chat({
      model: this.model,
      systemPrompt: buildSystemPrompt(this.maxSubtasks),
      messages: [{ role: "user", content: prompt }],
      maxTokens: 2048,
      signal,
    });

    return this.validate(parseModelJson(response, "Decomposer"));
  }

  private validate(raw: unknown): SubtaskDescriptor[] {
    if (!Array.isArray(raw)) {
      throw new Error("Decomposition must be a JSON array");
    }
    if (raw.length === 0) {
      throw new Error("Decomposer returned an empty subtask list");
    }
    if (raw.length > this.maxSubtasks) {
      throw new Error(
        `Decomposer returned ${raw.length} subtasks; max is ${this.maxSubtasks}`
      );
    }

    const seenTitles = new Set<string>();
    return raw.map((item: unknown, idx) => {
      if (!isRecord(item)) {
        throw new Error(`Subtask at index ${idx} is not an object`);
      }
      const where = `Subtask at index ${idx}`;
      const title = readOptionalString(item["title"], "title", where);
      if (!title) {
        throw new Error(`${where} has missing or invalid "title"`);
      }
      const key = title.toLowerCase();
      if (seenTitles.has(key)) {
        throw new Error(`Duplicate subtask title "${title}" at index ${idx}`);
      }
      seenTitles.add(key);

      const descriptor: SubtaskDescriptor = { title };
      const description = readOptionalString(item["description"], "description", where);
      if (description) descriptor.description = description;
      const dependencies = readStringList(item["dependencies"], "dependencies", where);
      if (dependencies) descriptor.dependencies = dependencies;
      const requiredCapabilities = readStringList(
        item["requiredCapabilities"] ?? item["required_capabilities"],
        "requiredCapabilities",
        where
      );
      if (requiredCapabilities) descriptor.requiredCapabilities = requiredCapabilities;
      return descriptor;
    });
  }
}
