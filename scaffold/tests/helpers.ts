import type { ChatResponse, LLMProvider } from "../providers/types";

export function textResponse(text: string): ChatResponse {
  return { textBlocks: [text], stopReason: "end_turn" };
}

export function createSequencedProvider(
  name: string,
  responses: ChatResponse[]
): LLMProvider & { chat: jest.Mock } {
  const queue = [...responses];
  return {
    name,
    chat: jest.fn().mockImplementation(async () => {
      const next = queue.shift();
      if (!next) {
        throw new Error(`${name} mock provider exhausted`);
      }
      return next;
    }),
  };
}
