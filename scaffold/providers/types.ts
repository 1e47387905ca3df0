/** Unified chat message across all providers */
export interface ChatMessage {
  role: "user" | "assistant";
  content: string;
}

/** Unified request to any LLM */
export interface ChatRequest {
  model: string;
  systemPrompt?: string;
  messages: ChatMessage[];
  maxTokens?: number;
  signal?: AbortSignal;
}

/** Unified response from any LLM */
export interface ChatResponse {
  textBlocks: string[];
  stopReason: "end_turn" | "max_tokens";
  usage?: { inputTokens: number; outputTokens: number };
}

/** Implemented by every LLM backend */
export interface LLMProvider {
  name: string;
  chat(params: ChatRequest): Promise<ChatResponse>;
}

export type ProviderType = "anthropic" | "gemini" | "openai";

/** Config for creating a provider via factory */
export interface ProviderConfig {
  type: ProviderType;
  model: string;
  apiKey?: string;
  baseUrl?: string;
}
