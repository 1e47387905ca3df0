import Anthropic from "@anthropic-ai/sdk";
import type {
  ChatRequest,
  ChatResponse,
  ChatMessage,
  LLMProvider,
} from "./types";

const DEFAULT_MAX_TOKENS = 2048;

export class AnthropicProvider implements LLMProvider {
  readonly name = "anthropic";
  private client: Anthropic;

  constructor(private model: string, apiKey?: string) {
    this.client = new Anthropic({ apiKey });
  }

  async chat(params: ChatRequest): Promise<ChatResponse> {
    const { systemPrompt, messages, maxTokens = DEFAULT_MAX_TOKENS, signal } =
      params;

    const response = await this.client.messages.create(
      {
        model: params.model || this.model,
        max_tokens: maxTokens,
        system: systemPrompt,
        messages: messages.map(convertMessage),
      },
      { signal }
    );

    return toChatResponse(response);
  }
}

function toChatResponse(response: Anthropic.Message): ChatResponse {
  const textBlocks: string[] = [];
  for (const block of response.content) {
    if (block.type === "text") {
      textBlocks.push(block.text);
    }
  }

  return {
    textBlocks,
    stopReason: response.stop_reason === "max_tokens" ? "max_tokens" : "end_turn",
    usage: {
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
    },
  };
}

function convertMessage(msg: ChatMessage): Anthropic.MessageParam {
  return {
    role: msg.role === "assistant" ? "assistant" : "user",
    content: msg.content,
  };
}
