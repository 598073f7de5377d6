// =============================================================================
// @trendwire/shared — Anthropic completion service
// =============================================================================
// Single-attempt text completion (plain and streaming) for the retrieval
// answerer. Connection-level failures are rethrown as
// CompletionConnectionError; API errors propagate unchanged.
// =============================================================================

import Anthropic from "@anthropic-ai/sdk";
import { CompletionConnectionError } from "../errors.js";
import type {
  CompletionRequest,
  CompletionService,
} from "../services.js";

export interface CompletionOptions {
  model: string;
  maxTokens: number;
}

function textOf(content: Anthropic.ContentBlock[]): string {
  let text = "";
  for (const block of content) {
    if (block.type === "text") text += block.text;
  }
  return text;
}

function translateError(error: unknown): unknown {
  if (error instanceof Anthropic.APIConnectionError) {
    return new CompletionConnectionError(error.message, { cause: error });
  }
  return error;
}

/** SDK client with retries off; the answerer makes exactly one attempt. */
export function createAnthropicClient(apiKey: string): Anthropic {
  return new Anthropic({ apiKey, maxRetries: 0 });
}

export function createAnthropicCompletionService(
  client: Anthropic,
  options: CompletionOptions,
): CompletionService {
  const params = (request: CompletionRequest) => ({
    model: options.model,
    max_tokens: options.maxTokens,
    system: request.system,
    messages: [{ role: "user" as const, content: request.user }],
  });

  return {
    async complete(request) {
      try {
        const response = await client.messages.create(params(request));
        return textOf(response.content);
      } catch (error) {
        throw translateError(error);
      }
    },

    async stream(request, onText) {
      try {
        const stream = client.messages.stream(params(request));
        stream.on("text", (delta) => onText(delta));
        return await stream.finalText();
      } catch (error) {
        throw translateError(error);
      }
    },
  };
}
