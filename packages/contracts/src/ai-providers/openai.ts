import OpenAI, { type ClientOptions } from "openai";
import { AiProviderError, errorMessage, toAiProviderError } from "../ai-errors.js";
import type {
  AiCompletionRequest,
  AiCompletionResult,
  AiProviderAdapter,
  AiStreamEvent,
} from "../ai-provider.js";
import { buildCompletionResult } from "../ai-provider.js";

export const OPENAI_DEFAULT_MODEL = "gpt-4";
const DEFAULT_TIMEOUT_MS = 120_000;
const CHAT_MODEL_PREFIXES = ["gpt-3.5", "gpt-4"];

export interface OpenAiProviderOptions {
  apiKey?: string;
  /** For OpenAI-compatible backends; defaults to the public API. */
  baseUrl?: string;
  defaultModel?: string;
  timeoutMs?: number;
  /** Replaces the HTTP transport; tests use it to stay offline. */
  fetch?: ClientOptions["fetch"];
}

// The SDK wraps transport failures in its own classes, which carry no status.
function classifyOpenAiError(err: unknown): AiProviderError {
  if (err instanceof OpenAI.APIConnectionTimeoutError) {
    return new AiProviderError("timeout", err.message, { cause: err });
  }
  if (err instanceof OpenAI.APIConnectionError) {
    return new AiProviderError("connectivity", err.message, { cause: err });
  }
  return toAiProviderError(err);
}

export function createOpenAiProvider(options: OpenAiProviderOptions): AiProviderAdapter {
  const apiKey = options.apiKey ?? "";
  if (apiKey.length === 0) {
    throw new AiProviderError("configuration", "OPENAI_API_KEY environment variable is not set");
  }

  const client = new OpenAI({
    apiKey,
    baseURL: options.baseUrl,
    timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    // Retries are the messenger's job; one attempt per call here.
    maxRetries: 0,
    fetch: options.fetch,
  });
  const defaultModel = options.defaultModel || OPENAI_DEFAULT_MODEL;

  return {
    name: "openai",

    isConfigured() {
      return true;
    },

    defaultModel() {
      return defaultModel;
    },

    async listModels() {
      try {
        const page = await client.models.list();
        return page.data
          .map((m) => m.id)
          .filter((id) => CHAT_MODEL_PREFIXES.some((prefix) => id.startsWith(prefix)))
          .sort();
      } catch (err) {
        throw classifyOpenAiError(err);
      }
    },

    async healthCheck() {
      try {
        await client.models.list();
        return { status: "healthy" };
      } catch (err) {
        return { status: "unhealthy", error: errorMessage(err) };
      }
    },

    async complete(req: AiCompletionRequest): Promise<AiCompletionResult> {
      const response = await client.chat.completions
        .create({
          model: req.model,
          messages: req.messages,
          temperature: req.temperature,
          max_tokens: req.maxTokens,
        })
        .catch((err: unknown) => {
          throw classifyOpenAiError(err);
        });

      const choice = response.choices[0];
      if (!choice) {
        throw new AiProviderError("bad_response", "OpenAI response contained no choices");
      }

      return buildCompletionResult({
        content: choice.message.content ?? "",
        promptTokens: response.usage?.prompt_tokens ?? 0,
        completionTokens: response.usage?.completion_tokens ?? 0,
        resolvedModel: req.model,
      });
    },

    async *completeStreaming(req: AiCompletionRequest): AsyncGenerator<AiStreamEvent> {
      try {
        const stream = await client.chat.completions.create({
          model: req.model,
          messages: req.messages,
          temperature: req.temperature,
          max_tokens: req.maxTokens,
          stream: true,
        });

        for await (const chunk of stream) {
          const content = chunk.choices[0]?.delta?.content;
          if (content) {
            yield { type: "chunk", content };
          }
        }
      } catch (err) {
        yield { type: "error", error: classifyOpenAiError(err) };
        return;
      }
      yield { type: "done" };
    },
  };
}
