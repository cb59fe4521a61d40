import type { AiProviderError } from "./ai-errors.js";

export type AiProviderName = "openai" | "bedrock" | "mock";

export type AiRole = "system" | "user" | "assistant";

export interface AiMessage {
  role: AiRole;
  content: string;
}

export interface AiCompletionRequest {
  messages: AiMessage[];
  model: string;
  temperature: number;
  maxTokens: number;
}

export interface AiCompletionResult {
  content: string;
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
  /** Backend model id after alias resolution; cost is looked up against this. */
  resolvedModel: string;
}

export type AiStreamEvent =
  | { type: "chunk"; content: string }
  | { type: "done" }
  | { type: "error"; error: AiProviderError };

export interface AiProviderHealth {
  status: "healthy" | "unhealthy";
  error?: string;
  note?: string;
}

export interface AiProviderAdapter {
  readonly name: AiProviderName;
  complete(req: AiCompletionRequest): Promise<AiCompletionResult>;
  /**
   * Yields text chunks followed by exactly one `done` or `error` event.
   * Single-use: iterate it once.
   */
  completeStreaming(req: AiCompletionRequest): AsyncIterable<AiStreamEvent>;
  /** Resolves with `unhealthy` instead of rejecting. */
  healthCheck(): Promise<AiProviderHealth>;
  defaultModel(): string;
  listModels(): Promise<string[]>;
  isConfigured(): boolean;
}

export function buildCompletionResult(input: {
  content: string;
  promptTokens: number;
  completionTokens: number;
  resolvedModel: string;
}): AiCompletionResult {
  const promptTokens = Math.max(0, Math.trunc(input.promptTokens));
  const completionTokens = Math.max(0, Math.trunc(input.completionTokens));
  return {
    content: input.content,
    promptTokens,
    completionTokens,
    totalTokens: promptTokens + completionTokens,
    resolvedModel: input.resolvedModel,
  };
}

/**
 * Hoists system messages out of the list for backends that take them
 * out-of-band. When there are several, the last one wins.
 */
export function splitSystemMessage(messages: AiMessage[]): {
  system: string | null;
  messages: AiMessage[];
} {
  let system: string | null = null;
  const nonSystemMessages: AiMessage[] = [];
  for (const message of messages) {
    if (message.role === "system") {
      system = message.content;
    } else {
      nonSystemMessages.push(message);
    }
  }
  return { system, messages: nonSystemMessages };
}

/** First user message, or "" when there is none. */
export function firstUserMessage(messages: AiMessage[]): string {
  return messages.find((m) => m.role === "user")?.content ?? "";
}
