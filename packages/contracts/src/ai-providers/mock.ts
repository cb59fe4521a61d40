import { setTimeout as sleep } from "node:timers/promises";
import type {
  AiCompletionRequest,
  AiCompletionResult,
  AiProviderAdapter,
  AiStreamEvent,
} from "../ai-provider.js";
import { buildCompletionResult, firstUserMessage } from "../ai-provider.js";

export const MOCK_MODEL = "mock-model";

export interface MockProviderOptions {
  /** Delay before `complete` resolves. */
  latencyMs?: number;
  /** Delay before each streamed word. */
  wordDelayMs?: number;
}

/** Stand-in token count: two tokens per whitespace-separated word. */
export function mockTokenCount(text: string): number {
  return text.split(/\s+/).filter((word) => word.length > 0).length * 2;
}

export function mockResponseText(requestNumber: number, userMessage: string): string {
  return `[MOCK RESPONSE #${requestNumber}] You said: '${userMessage}'. This is a test response without calling any external API.`;
}

export function mockStreamText(requestNumber: number, userMessage: string): string {
  return `[MOCK STREAM #${requestNumber}] You said: '${userMessage}'. This is a streaming test response.`;
}

/**
 * Deterministic provider for exercising the relay without a backend. The
 * request counter is per instance and shared by `complete` and
 * `completeStreaming`.
 */
export function createMockProvider(options: MockProviderOptions = {}): AiProviderAdapter {
  const latencyMs = options.latencyMs ?? 100;
  const wordDelayMs = options.wordDelayMs ?? 50;
  let requestCount = 0;

  return {
    name: "mock",

    isConfigured() {
      return true;
    },

    defaultModel() {
      return MOCK_MODEL;
    },

    async listModels() {
      return [MOCK_MODEL];
    },

    async healthCheck() {
      return { status: "healthy", note: "Mock provider - no external API" };
    },

    async complete(req: AiCompletionRequest): Promise<AiCompletionResult> {
      requestCount += 1;
      const requestNumber = requestCount;

      await sleep(latencyMs);

      const userMessage = firstUserMessage(req.messages);
      const content = mockResponseText(requestNumber, userMessage);

      return buildCompletionResult({
        content,
        promptTokens: mockTokenCount(userMessage),
        completionTokens: mockTokenCount(content),
        resolvedModel: MOCK_MODEL,
      });
    },

    async *completeStreaming(req: AiCompletionRequest): AsyncGenerator<AiStreamEvent> {
      requestCount += 1;
      const text = mockStreamText(requestCount, firstUserMessage(req.messages));

      for (const word of text.split(/\s+/).filter((w) => w.length > 0)) {
        await sleep(wordDelayMs);
        yield { type: "chunk", content: `${word} ` };
      }
      yield { type: "done" };
    },
  };
}
