/**
 * Goal execution demo.
 *
 * Registers the research, analysis and synthesis workers, submits a goal and
 * polls its status until the execution finishes.
 *
 * Run:
 *   npm run dev -- "Summarize the trade-offs of event sourcing"
 */
import "dotenv/config";
import { providerConfigFromEnv, settingsFromEnv } from "./config";
import { ExecutionOrchestrator } from "./orchestrator/orchestrator";
import { isTerminal } from "./orchestrator/lifecycle";
import { LlmDecomposer } from "./planning/llm-decomposer";
import { LlmPlanner } from "./planning/llm-planner";
import { createProvider } from "./providers";
import { validateGoalSubmission } from "./submission";
import { LlmWorker } from "./workers/llm-worker";
import { WORKER_PROFILES, type WorkerProfileName } from "./workers/profiles";

const DEFAULT_GOAL =
  "Research the main approaches to caching in web applications, analyze their trade-offs, and write a short recommendation.";
const POLL_INTERVAL_MS = 1000;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function main() {
  const validation = validateGoalSubmission({
    goal: process.argv.slice(2).join(" ") || DEFAULT_GOAL,
  });
  if (!validation.ok) {
    throw new Error(validation.error);
  }

  const providerConfig = providerConfigFromEnv();
  const provider = createProvider(providerConfig);
  const settings = { verbose: true, ...settingsFromEnv() };
  console.log(`Using provider: ${provider.name} / ${providerConfig.model}\n`);

  const profileNames: WorkerProfileName[] = ["research", "analysis", "synthesis"];
  const capabilities = Array.from(
    new Set(profileNames.flatMap((name) => WORKER_PROFILES[name].capabilities))
  );

  const orchestrator = new ExecutionOrchestrator({
    decomposer: new LlmDecomposer({
      provider,
      model: providerConfig.model,
      capabilities,
      verbose: settings.verbose,
    }),
    planner: new LlmPlanner({
      provider,
      model: providerConfig.model,
      verbose: settings.verbose,
    }),
    settings,
  });

  for (const name of profileNames) {
    orchestrator.registerWorker(
      new LlmWorker({
        id: `${name}-worker`,
        provider,
        model: providerConfig.model,
        profile: name,
      })
    );
  }

  const { goal, context } = validation.submission;
  const executionId = orchestrator.submitGoal(goal, context);
  console.log(`Submitted execution ${executionId}\n`);

  let lastStatus = "";
  for (;;) {
    const execution = orchestrator.getExecutionStatus(executionId);
    if (!execution) throw new Error(`Execution ${executionId} disappeared`);
    if (execution.status !== lastStatus) {
      console.log(`Status: ${execution.status}`);
      lastStatus = execution.status;
    }
    if (isTerminal(execution.status)) break;
    await sleep(POLL_INTERVAL_MS);
  }

  const report = orchestrator.describeExecution(executionId);
  console.log("\n" + "=".repeat(60));
  console.log(JSON.stringify(report, null, 2));
}

main().catch((err: unknown) => {
  console.error("Fatal error:", err instanceof Error ? err.message : String(err));
  process.exit(1);
});
