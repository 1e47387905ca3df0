import { GoogleGenAI } from "@google/genai";
import type {
  Content,
  GenerateContentConfig,
  GenerateContentResponse,
} from "@google/genai";
import type {
  ChatRequest,
  ChatResponse,
  ChatMessage,
  LLMProvider,
} from "./types";

export class GeminiProvider implements LLMProvider {
  readonly name = "gemini";
  private genai: GoogleGenAI;

  constructor(private model: string, apiKey?: string) {
    this.genai = new GoogleGenAI({ apiKey: apiKey ?? "" });
  }

  async chat(params: ChatRequest): Promise<ChatResponse> {
    const { systemPrompt, messages, maxTokens, signal } = params;

    const config: GenerateContentConfig = {};
    if (systemPrompt) config.systemInstruction = systemPrompt;
    if (maxTokens) config.maxOutputTokens = maxTokens;
    if (signal) config.abortSignal = signal;

    const response = await this.genai.models.generateContent({
      model: params.model || this.model,
      contents: messages.map(convertMessage),
      config,
    });

    return toChatResponse(response);
  }
}

function toChatResponse(response: GenerateContentResponse): ChatResponse {
  const textBlocks: string[] = [];

  const candidate = response.candidates?.[0];
  for (const part of candidate?.content?.parts ?? []) {
    if (part.text !== undefined) {
      textBlocks.push(part.text);
    }
  }

  const usage = response.usageMetadata
    ? {
        inputTokens: response.usageMetadata.promptTokenCount ?? 0,
        outputTokens: response.usageMetadata.candidatesTokenCount ?? 0,
      }
    : undefined;

  return {
    textBlocks,
    stopReason: candidate?.finishReason === "MAX_TOKENS" ? "max_tokens" : "end_turn",
    usage,
  };
}

function convertMessage(msg: ChatMessage): Content {
  return {
    role: msg.role === "assistant" ? "model" : "user",
    parts: [{ text: msg.content }],
  };
}
