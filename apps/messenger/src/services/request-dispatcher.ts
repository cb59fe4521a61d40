import {
  type AiErrorKind,
  AiProviderError,
  AiUsageAggregator,
  type AiUsageSnapshot,
  apiRoutes,
  type ConfigResponse,
  configResponseSchema,
  type HealthResponse,
  healthResponseSchema,
  kindForStatus,
  processFailureSchema,
  type ProcessRequest,
  type ProcessResponse,
  processResponseSchema,
  type ProviderListing,
  providerListingSchema,
  STREAM_DONE_MARKER,
  streamFrameSchema,
  toAiProviderError
} from "@llm-relay/contracts";
import type { Logger } from "pino";
import type { z } from "zod";
import { withRetry } from "./retry";

const MESSENGER_ROLE = "messenger";
const RESPONDER_ROLE = "responder";
const QUERY_TIMEOUT_MS = 10_000;

export interface ConversationEntry {
  timestamp: string;
  fromRole: string;
  toRole: string;
  message: string;
  aiGenerated: boolean;
  model?: string;
  tokens?: number;
}

export type DispatchInput = ProcessRequest;

export type DispatchFailure = {
  ok: false;
  error: AiErrorKind;
  message: string;
  attempts: number;
  status?: number;
};

export type DispatchResult = { ok: true; response: ProcessResponse; attempts: number } | DispatchFailure;

export type StreamResult = { ok: true; content: string } | Omit<DispatchFailure, "attempts">;

export type QueryResult<T> =
  | { ok: true; data: T }
  | { ok: false; error: AiErrorKind; message: string; status?: number };

export type DispatchState = "ATTEMPTING" | "SUCCESS" | "RETRY" | "EXHAUSTED";

export interface DispatcherOptions {
  responderUrl: string;
  timeoutMs: number;
  retryAttempts: number;
  retryBaseDelayMs: number;
  log: Pick<Logger, "info" | "warn" | "error">;
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
}

async function readJson(response: Response): Promise<unknown> {
  const text = await response.text();
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

/** Turns a non-2xx responder reply into an error; the responder's own failure payload wins when present. */
async function responseError(response: Response): Promise<AiProviderError> {
  const body = await readJson(response);
  const failure = processFailureSchema.safeParse(body);
  if (failure.success) {
    return new AiProviderError(failure.data.error, failure.data.message, { status: response.status });
  }
  return new AiProviderError(kindForStatus(response.status), `responder returned HTTP ${response.status}`, {
    status: response.status
  });
}

/**
 * Any 5xx from the responder is retried unless it reports a configuration
 * failure; otherwise the error kind decides.
 */
export function shouldRetryDispatch(err: unknown): boolean {
  const error = toAiProviderError(err);
  if (error.status !== undefined && error.status >= 500) {
    return error.kind !== "configuration";
  }
  return error.retryable;
}

export function createRequestDispatcher(options: DispatcherOptions) {
  const { log } = options;
  const fetchImpl = options.fetch ?? globalThis.fetch;
  const baseUrl = options.responderUrl.replace(/\/+$/, "");
  const usage = new AiUsageAggregator();
  const conversation: ConversationEntry[] = [];
  let dispatchCount = 0;

  function post(path: string, input: DispatchInput): Promise<Response> {
    return fetchImpl(`${baseUrl}${path}`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(input),
      signal: AbortSignal.timeout(options.timeoutMs)
    });
  }

  async function attemptSend(input: DispatchInput): Promise<ProcessResponse> {
    let response: Response;
    try {
      response = await post(apiRoutes.process, input);
    } catch (err) {
      throw toAiProviderError(err);
    }

    if (!response.ok) {
      throw await responseError(response);
    }

    const parsed = processResponseSchema.safeParse(await readJson(response));
    if (!parsed.success) {
      throw new AiProviderError("bad_response", `unexpected responder payload: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  function recordExchange(input: DispatchInput, response: ProcessResponse): void {
    conversation.push(
      {
        timestamp: new Date().toISOString(),
        fromRole: MESSENGER_ROLE,
        toRole: RESPONDER_ROLE,
        message: input.message,
        aiGenerated: false
      },
      {
        timestamp: response.timestamp,
        fromRole: RESPONDER_ROLE,
        toRole: MESSENGER_ROLE,
        message: response.aiResponse,
        aiGenerated: true,
        model: response.model,
        tokens: response.usage.totalTokens
      }
    );
    usage.record({
      model: response.model,
      totalTokens: response.usage.totalTokens,
      promptTokens: response.usage.promptTokens,
      completionTokens: response.usage.completionTokens,
      cost: response.usage.estimatedCost,
      latency: response.processingTime
    });
  }

  async function query<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<QueryResult<T>> {
    try {
      const response = await fetchImpl(`${baseUrl}${path}`, { signal: AbortSignal.timeout(QUERY_TIMEOUT_MS) });
      if (!response.ok) {
        throw await responseError(response);
      }
      const parsed = schema.safeParse(await readJson(response));
      if (!parsed.success) {
        throw new AiProviderError("bad_response", `unexpected responder payload: ${parsed.error.message}`);
      }
      return { ok: true, data: parsed.data };
    } catch (err) {
      const error = toAiProviderError(err);
      log.warn({ path, kind: error.kind, status: error.status }, `responder query failed: ${error.message}`);
      return { ok: false, error: error.kind, message: error.message, status: error.status };
    }
  }

  return {
    /** POSTs to the responder's process route with bounded retry. Never rejects. */
    async send(input: DispatchInput): Promise<DispatchResult> {
      dispatchCount += 1;
      const dispatchId = dispatchCount;
      let attempts = 0;
      const transition = (state: DispatchState, fields: Record<string, unknown> = {}) => ({
        dispatchId,
        state,
        attempt: attempts,
        ...fields
      });

      try {
        const response = await withRetry(
          async () => {
            attempts += 1;
            log.info(transition("ATTEMPTING"), "dispatching to responder");
            return attemptSend(input);
          },
          {
            attempts: options.retryAttempts,
            baseDelayMs: options.retryBaseDelayMs,
            shouldRetry: shouldRetryDispatch,
            onRetry: ({ delayMs, error }) => {
              const failure = toAiProviderError(error);
              log.warn(
                transition("RETRY", { delayMs, kind: failure.kind, status: failure.status }),
                `attempt failed, retrying: ${failure.message}`
              );
            },
            sleep: options.sleep
          }
        );

        recordExchange(input, response);
        log.info(
          transition("SUCCESS", { model: response.model, tokens: response.usage.totalTokens }),
          "responder answered"
        );
        return { ok: true, response, attempts };
      } catch (err) {
        const failure = toAiProviderError(err);
        log.error(
          transition("EXHAUSTED", { kind: failure.kind, status: failure.status, retryable: shouldRetryDispatch(failure) }),
          `dispatch failed: ${failure.message}`
        );
        const result: DispatchFailure = { ok: false, error: failure.kind, message: failure.message, attempts };
        if (failure.status !== undefined) result.status = failure.status;
        return result;
      }
    },

    /** POSTs to the stream route and concatenates content frames until the end marker. */
    async sendStream(input: DispatchInput): Promise<StreamResult> {
      try {
        const response = await post(apiRoutes.stream, input);
        if (!response.ok) {
          throw await responseError(response);
        }
        if (!response.body) {
          throw new AiProviderError("bad_response", "stream response had no body");
        }

        const reader = response.body.getReader();
        const decoder = new TextDecoder();
        let buffer = "";
        let content = "";

        while (true) {
          const { done, value } = await reader.read();
          if (done) break;
          buffer += decoder.decode(value, { stream: true });

          const lines = buffer.split("\n");
          buffer = lines.pop() ?? "";

          for (const line of lines) {
            if (!line.startsWith("data: ")) continue;
            const data = line.slice(6);
            if (data === STREAM_DONE_MARKER) {
              await reader.cancel();
              return { ok: true, content };
            }

            let json: unknown;
            try {
              json = JSON.parse(data);
            } catch {
              log.warn({ data }, "skipping malformed stream frame");
              continue;
            }
            const frame = streamFrameSchema.safeParse(json);
            if (!frame.success) continue;
            if ("error" in frame.data) {
              await reader.cancel();
              throw new AiProviderError("server", frame.data.error);
            }
            content += frame.data.content;
          }
        }

        throw new AiProviderError("bad_response", "stream ended before the end marker");
      } catch (err) {
        const failure = toAiProviderError(err);
        log.error({ kind: failure.kind, status: failure.status }, `stream failed: ${failure.message}`);
        const result: Omit<DispatchFailure, "attempts"> = { ok: false, error: failure.kind, message: failure.message };
        if (failure.status !== undefined) result.status = failure.status;
        return result;
      }
    },

    checkHealth(): Promise<QueryResult<HealthResponse>> {
      return query(apiRoutes.health, healthResponseSchema);
    },

    listModels(): Promise<QueryResult<ProviderListing>> {
      return query(apiRoutes.models, providerListingSchema);
    },

    getRemoteConfig(): Promise<QueryResult<ConfigResponse>> {
      return query(apiRoutes.config, configResponseSchema);
    },

    conversation(): ConversationEntry[] {
      return conversation.map((entry) => ({ ...entry }));
    },

    usage(): AiUsageSnapshot {
      return usage.snapshot();
    }
  };
}

export type RequestDispatcher = ReturnType<typeof createRequestDispatcher>;
