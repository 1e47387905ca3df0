import type { ChatRequest, ChatResponse, LLMProvider } from "./types";

interface OpenAIMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

interface OpenAIResponse {
  choices: Array<{
    message: { content: string | null };
    finish_reason: string;
  }>;
  usage?: {
    prompt_tokens: number;
    completion_tokens: number;
  };
}

/**
 * Chat Completions client over fetch. Works with any OpenAI-compatible
 * endpoint through `baseUrl`.
 */
export class OpenAIProvider implements LLMProvider {
  readonly name = "openai";
  private baseUrl: string;

  constructor(
    private model: string,
    private apiKey?: string,
    baseUrl?: string
  ) {
    this.baseUrl = baseUrl ?? "https://api.openai.com/v1";
  }

  async chat(params: ChatRequest): Promise<ChatResponse> {
    const { systemPrompt, messages, maxTokens, signal } = params;

    const openaiMessages: OpenAIMessage[] = [];
    if (systemPrompt) {
      openaiMessages.push({ role: "system", content: systemPrompt });
    }
    for (const msg of messages) {
      openaiMessages.push({ role: msg.role, content: msg.content });
    }

    const body: Record<string, unknown> = {
      model: params.model || this.model,
      messages: openaiMessages,
    };
    if (maxTokens) body.max_tokens = maxTokens;

    const headers: Record<string, string> = {
      "Content-Type": "application/json",
    };
    if (this.apiKey) headers["Authorization"] = `Bearer ${this.apiKey}`;

    const res = await fetch(`${this.baseUrl}/chat/completions`, {
      method: "POST",
      headers,
      body: JSON.stringify(body),
      signal,
    });

    if (!res.ok) {
      const text = await res.text();
      throw new Error(`OpenAI API error ${res.status}: ${text}`);
    }

    const data = (await res.json()) as OpenAIResponse;
    const choice = data.choices[0];
    if (!choice) {
      throw new Error("OpenAI API returned no choices");
    }

    return {
      textBlocks: choice.message.content ? [choice.message.content] : [],
      stopReason: choice.finish_reason === "length" ? "max_tokens" : "end_turn",
      usage: data.usage
        ? {
            inputTokens: data.usage.prompt_tokens,
            outputTokens: data.usage.completion_tokens,
          }
        : undefined,
    };
  }
}
