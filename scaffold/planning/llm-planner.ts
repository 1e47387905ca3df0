import type { LLMProvider } from "../providers/types";
import type {
  GoalContext,
  PlanDraft,
  PlanStepDraft,
  Planner,
  Task,
} from "../orchestrator/types";
import { isRecord } from "../coordination/shared-context";
import { parseModelJson, readOptionalString, readStringList } from "./json";
import { renderContext } from "./llm-decomposer";

const PLANNER_SYSTEM = `You are an expert in planning and sequencing tasks. Create an execution plan for a set of subtasks, respecting their dependencies.
Produce a JSON object: {"steps": [...]} where each step has:
  - name: a short step name
  - tasks: array of subtask ids executed in this step
  - parallel: true if the step's subtasks can run at the same time
Optional fields per step:
  - conditions: what must hold before the step starts
  - expectedOutcomes: success criteria for the step
Optional top-level fields:
  - estimatedDuration: free-form estimate

Rules:
- Every subtask id must appear in exactly one step
- A subtask must come after every subtask it depends on
- Return ONLY the JSON object, no prose, no markdown fences`;

export interface LlmPlannerOptions {
  provider: LLMProvider;
  model: string;
  verbose?: boolean;
}

function renderTask(task: Task): string {
  const lines = [`- id: ${task.id}`, `  title: ${task.title}`];
  if (task.description) lines.push(`  description: ${task.description}`);
  if (task.dependencies.length > 0) {
    lines.push(`  dependencies: ${task.dependencies.join(", ")}`);
  }
  if (task.requiredCapabilities.length > 0) {
    lines.push(`  requiredCapabilities: ${task.requiredCapabilities.join(", ")}`);
  }
  return lines.join("\n");
}

/**
 * Planner backed by an LLM provider. Validates the plan's shape only; step
 * task ids are resolved later by the orchestrator.
 */
export class LlmPlanner implements Planner {
  private readonly provider: LLMProvider;
  private readonly model: string;
  private readonly verbose: boolean;

  constructor(options: LlmPlannerOptions) {
    this.provider = options.provider;
    this.model = options.model;
    this.verbose = options.verbose ?? false;
  }

  async createPlan(
    tasks: readonly Task[],
    context: GoalContext,
    signal?: AbortSignal
  ): Promise<PlanDraft> {
    if (this.verbose) {
      console.log(`[Planner] Planning execution for ${tasks.length} subtask(s)`);
    }

    const prompt = `Subtasks:\n${tasks.map(renderTask).join("\n")}\n\nAdditional context:\n${renderContext(context)}`;

    const response = await this.provider.chat({
      model: this.model,
      systemPrompt: PLANNER_SYSTEM,
      messages: [{ role: "user", content: prompt }],
      maxTokens: 2048,
      signal,
    });

    return this.validate(parseModelJson(response, "Planner"));
  }

  private validate(raw: unknown): PlanDraft {
    if (!isRecord(raw)) {
      throw new Error("Plan must be a JSON object");
    }
    const rawSteps = raw["steps"];
    if (!Array.isArray(rawSteps)) {
      throw new Error('Plan is missing a "steps" array');
    }

    const steps = rawSteps.map((item: unknown, idx): PlanStepDraft => {
      if (!isRecord(item)) {
        throw new Error(`Step at index ${idx} is not an object`);
      }
      const where = `Step at index ${idx}`;
      const taskIds = readStringList(item["tasks"], "tasks", where);
      if (!taskIds) {
        throw new Error(`${where} has missing "tasks"`);
      }
      const parallel = item["parallel"] ?? false;
      if (typeof parallel !== "boolean") {
        throw new Error(`${where} has invalid "parallel"; expected boolean`);
      }

      const step: PlanStepDraft = { tasks: taskIds, parallel };
      const name = readOptionalString(item["name"], "name", where);
      if (name) step.name = name;
      const conditions = readOptionalString(item["conditions"], "conditions", where);
      if (conditions) step.conditions = conditions;
      const expectedOutcomes = readOptionalString(
        item["expectedOutcomes"] ?? item["expected_outcomes"],
        "expectedOutcomes",
        where
      );
      if (expectedOutcomes) step.expectedOutcomes = expectedOutcomes;
      return step;
    });

    const metadata: Record<string, unknown> = {};
    const estimatedDuration = raw["estimatedDuration"] ?? raw["estimated_duration"];
    metadata.estimatedDuration =
      typeof estimatedDuration === "string" ? estimatedDuration : "unknown";
    metadata.parallelExecution = steps.some((step) => step.parallel === true);

    return { steps, metadata };
  }
}
