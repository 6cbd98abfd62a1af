// Wellness Retention Engine - OpenAI adapters
// The services depend on the two narrow interfaces below rather than on the
// SDK, so tests can hand them in-process fakes.

import type OpenAI from "openai";

export const DEFAULT_EMBEDDING_MODEL = "text-embedding-3-small";
export const DEFAULT_COACH_MODEL = "gpt-4o-mini";

export interface EmbeddingsClient {
  /** Returns one embedding per input, in input order. */
  embed(model: string, input: string[]): Promise<number[][]>;
}

export interface ChatRequest {
  model: string;
  system: string;
  user: string;
  temperature: number;
  maxTokens: number;
}

export interface ChatClient {
  /** Runs a JSON-mode chat completion and returns the raw message content. */
  completeJson(request: ChatRequest): Promise<string | null>;
}

export function createEmbeddingsClient(openai: OpenAI): EmbeddingsClient {
  return {
    async embed(model, input) {
      const response = await openai.embeddings.create({ model, input });
      return [...response.data].sort((a, b) => a.index - b.index).map((d) => d.embedding);
    },
  };
}

export function createChatClient(openai: OpenAI): ChatClient {
  return {
    async completeJson(request) {
      const response = await openai.chat.completions.create({
        model: request.model,
        messages: [
          { role: "system", content: request.system },
          { role: "user", content: request.user },
        ],
        response_format: { type: "json_object" },
        temperature: request.temperature,
        max_tokens: request.maxTokens,
      });
      return response.choices[0]?.message?.content ?? null;
    },
  };
}
