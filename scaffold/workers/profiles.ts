/**
 * Specialist worker profiles. A profile is pure data: the capabilities a
 * worker advertises and the system prompt it runs with.
 */
export interface WorkerProfile {
  name: string;
  description: string;
  capabilities: string[];
  systemPrompt: string;
}

export type WorkerProfileName = "research" | "analysis" | "synthesis";

export const WORKER_PROFILES: Readonly<Record<WorkerProfileName, WorkerProfile>> =
  Object.freeze({
    research: {
      name: "Research Specialist",
      description:
        "Gathers and organizes information on a topic and summarizes the findings.",
      capabilities: ["research", "information_gathering", "summarization"],
      systemPrompt: `You are a research worker. Gather the information a task asks for, check it for relevance and accuracy, and summarize the findings clearly. Cite sources when you rely on them.`,
    },
    analysis: {
      name: "Analysis Expert",
      description:
        "Analyzes information to identify patterns, trends and actionable insights.",
      capabilities: [
        "data_analysis",
        "pattern_recognition",
        "insight_generation",
        "critical_thinking",
      ],
      systemPrompt: `You are an analysis worker. Examine the information provided, identify patterns and relationships, point out gaps or biases, and present conclusions with the evidence behind them.`,
    },
    synthesis: {
      name: "Synthesis Master",
      description:
        "Integrates inputs from several sources into coherent, well-structured output.",
      capabilities: [
        "information_synthesis",
        "content_generation",
        "summarization",
        "report_writing",
        "synthesis",
      ],
      systemPrompt: `You are a synthesis worker. Integrate the inputs you are given into one coherent, well-structured result that meets the task's requirements.`,
    },
  });
