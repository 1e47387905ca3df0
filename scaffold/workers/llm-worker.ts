import type { LLMProvider } from "../providers/types";
import { renderContext } from "../planning/llm-decomposer";
import { WORKER_PROFILES, type WorkerProfile, type WorkerProfileName } from "./profiles";
import type { TaskRequest, Worker } from "./types";

export interface LlmWorkerOptions {
  id: string;
  provider: LLMProvider;
  model: string;
  profile: WorkerProfile | WorkerProfileName;
  maxTokens?: number;
}

export interface LlmWorkerOutput {
  text: string;
  model: string;
  usage?: { inputTokens: number; outputTokens: number };
}

/**
 * Worker that answers each task with a single LLM call under its profile's
 * system prompt.
 */
export class LlmWorker implements Worker {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly capabilities: readonly string[];
  private readonly provider: LLMProvider;
  private readonly model: string;
  private readonly systemPrompt: string;
  private readonly maxTokens: number;

  constructor(options: LlmWorkerOptions) {
    const profile =
      typeof options.profile === "string"
        ? WORKER_PROFILES[options.profile]
        : options.profile;
    this.id = options.id;
    this.name = profile.name;
    this.description = profile.description;
    this.capabilities = [...profile.capabilities];
    this.systemPrompt = profile.systemPrompt;
    this.provider = options.provider;
    this.model = options.model;
    this.maxTokens = options.maxTokens ?? 2048;
  }

  async handle(request: TaskRequest): Promise<LlmWorkerOutput> {
    const response = await this.provider.chat({
      model: this.model,
      systemPrompt: this.systemPrompt,
      messages: [{ role: "user", content: this.buildPrompt(request) }],
      maxTokens: this.maxTokens,
    });

    const text = response.textBlocks.join("").trim();
    if (!text) {
      throw new Error(`Worker ${this.id} produced no output for ${request.taskId}`);
    }
    return { text, model: this.model, usage: response.usage };
  }

  private buildPrompt(request: TaskRequest): string {
    const { task } = request;
    const lines = [`Task: ${task.title}`];
    if (task.description) lines.push(`Description: ${task.description}`);
    lines.push("", "Context:", renderContext(request.context));
    lines.push("", "Complete this task and reply with the result only.");
    return lines.join("\n");
  }
}
