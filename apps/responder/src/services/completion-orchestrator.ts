import {
  type AiCompletionRequest,
  type AiCompletionResult,
  type AiErrorKind,
  type AiProviderAdapter,
  type AiProviderName,
  type AiRegistry,
  AiUsageAggregator,
  type AiUsageSnapshot,
  type ConfigResponse,
  errorMessage,
  estimateCostUsd,
  type HealthResponse,
  type ProcessResponse,
  type ProviderListing,
  STREAM_DONE_MARKER,
  type StreamFrame,
  toAiProviderError
} from "@llm-relay/contracts";
import type { FastifyBaseLogger } from "fastify";

export const DEFAULT_SYSTEM_PROMPT = "You are a helpful AI assistant.";
const PROCESSED_FROM = "messenger";

export interface CompletionInput {
  message: string;
  context?: string | null;
  model?: string | null;
  temperature?: number;
  maxTokens?: number;
}

export interface CompletionDefaults {
  temperature: number;
  maxTokens: number;
}

export interface ProcessedMessage {
  timestamp: string;
  from: string;
  message: string;
  aiResponse: string;
  model: string;
  tokens: number;
  cost: number;
  provider: AiProviderName;
}

export type CompletionFailure = {
  ok: false;
  error: AiErrorKind;
  message: string;
  retryable: boolean;
};

export type HandleResult = { ok: true; response: ProcessResponse } | CompletionFailure;

export type ListModelsResult = { ok: true; listing: ProviderListing } | CompletionFailure;

export type OrchestratorLogger = Pick<FastifyBaseLogger, "info" | "warn" | "error">;

function failure(err: unknown): CompletionFailure {
  const error = toAiProviderError(err);
  return { ok: false, error: error.kind, message: error.message, retryable: error.retryable };
}

function elapsedSeconds(startedAt: number): number {
  return (performance.now() - startedAt) / 1000;
}

export function createCompletionOrchestrator(deps: {
  registry: AiRegistry;
  defaults: CompletionDefaults;
  log: OrchestratorLogger;
  usage?: AiUsageAggregator;
}) {
  const { registry, defaults, log } = deps;
  const usage = deps.usage ?? new AiUsageAggregator();
  const processed: ProcessedMessage[] = [];

  function buildRequest(provider: AiProviderAdapter, input: CompletionInput): AiCompletionRequest {
    return {
      messages: [
        { role: "system", content: input.context || DEFAULT_SYSTEM_PROMPT },
        { role: "user", content: input.message }
      ],
      model: input.model || provider.defaultModel(),
      temperature: input.temperature ?? defaults.temperature,
      maxTokens: input.maxTokens ?? defaults.maxTokens
    };
  }

  return {
    async handle(input: CompletionInput): Promise<HandleResult> {
      const startedAt = performance.now();

      let provider: AiProviderAdapter;
      try {
        provider = registry.get();
      } catch (err) {
        log.error({ err, provider: registry.name }, "AI provider is not configured");
        return failure(err);
      }

      const request = buildRequest(provider, input);
      let result: AiCompletionResult;
      try {
        result = await provider.complete(request);
      } catch (err) {
        const outcome = failure(err);
        log.warn(
          { provider: registry.name, model: request.model, kind: outcome.error, retryable: outcome.retryable },
          `completion failed: ${outcome.message}`
        );
        return outcome;
      }

      const latency = elapsedSeconds(startedAt);
      const cost = estimateCostUsd(result.resolvedModel, result.promptTokens, result.completionTokens);
      const timestamp = new Date().toISOString();

      usage.record({
        model: result.resolvedModel,
        totalTokens: result.totalTokens,
        promptTokens: result.promptTokens,
        completionTokens: result.completionTokens,
        cost,
        latency
      });
      processed.push({
        timestamp,
        from: PROCESSED_FROM,
        message: input.message,
        aiResponse: result.content,
        model: result.resolvedModel,
        tokens: result.totalTokens,
        cost,
        provider: registry.name
      });

      log.info(
        { provider: registry.name, model: result.resolvedModel, tokens: result.totalTokens, cost },
        "completion processed"
      );

      return {
        ok: true,
        response: {
          status: "success",
          aiResponse: result.content,
          model: result.resolvedModel,
          provider: registry.name,
          usage: {
            promptTokens: result.promptTokens,
            completionTokens: result.completionTokens,
            totalTokens: result.totalTokens,
            estimatedCost: cost
          },
          timestamp,
          processingTime: Math.round(latency * 1000) / 1000
        }
      };
    },

    /** Frames for the event stream: content chunks, then the end marker or a single error frame. */
    async *stream(input: CompletionInput): AsyncGenerator<StreamFrame | typeof STREAM_DONE_MARKER> {
      let provider: AiProviderAdapter;
      try {
        provider = registry.get();
      } catch (err) {
        log.error({ err, provider: registry.name }, "AI provider is not configured");
        yield { error: errorMessage(err) };
        return;
      }

      for await (const event of provider.completeStreaming(buildRequest(provider, input))) {
        if (event.type === "chunk") {
          yield { content: event.content };
        } else if (event.type === "error") {
          log.warn({ provider: registry.name, kind: event.error.kind }, `stream failed: ${event.error.message}`);
          yield { error: event.error.message };
          return;
        } else {
          yield STREAM_DONE_MARKER;
          return;
        }
      }
    },

    async listModels(): Promise<ListModelsResult> {
      try {
        const provider = registry.get();
        return {
          ok: true,
          listing: { provider: registry.name, models: await provider.listModels(), default: registry.defaultModel() }
        };
      } catch (err) {
        return failure(err);
      }
    },

    async health(): Promise<HealthResponse> {
      const report: HealthResponse = {
        status: "healthy",
        provider: registry.name,
        timestamp: new Date().toISOString(),
        messagesProcessed: processed.length,
        ai: { configured: registry.isConfigured(), status: "healthy" }
      };

      try {
        const check = await registry.get().healthCheck();
        report.ai.status = check.status;
        if (check.note) report.ai.note = check.note;
        if (check.status === "unhealthy") {
          report.status = "degraded";
          if (check.error) report.ai.error = check.error;
        }
      } catch (err) {
        report.status = "degraded";
        report.ai.status = "unhealthy";
        report.ai.error = errorMessage(err);
      }
      return report;
    },

    config(): ConfigResponse {
      return {
        provider: registry.name,
        defaultModel: registry.defaultModel(),
        temperature: defaults.temperature,
        maxTokens: defaults.maxTokens
      };
    },

    stats(): AiUsageSnapshot {
      return usage.snapshot();
    },

    processedMessages(): ProcessedMessage[] {
      return processed.map((entry) => ({ ...entry }));
    }
  };
}

export type CompletionOrchestrator = ReturnType<typeof createCompletionOrchestrator>;
