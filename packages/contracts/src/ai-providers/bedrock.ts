import { BedrockClient, ListFoundationModelsCommand } from "@aws-sdk/client-bedrock";
import {
  BedrockRuntimeClient,
  InvokeModelCommand,
  InvokeModelWithResponseStreamCommand,
} from "@aws-sdk/client-bedrock-runtime";
import { z } from "zod";
import { AiProviderError, errorMessage, toAiProviderError } from "../ai-errors.js";
import type {
  AiCompletionRequest,
  AiCompletionResult,
  AiProviderAdapter,
  AiStreamEvent,
} from "../ai-provider.js";
import { buildCompletionResult, splitSystemMessage } from "../ai-provider.js";

export const BEDROCK_ANTHROPIC_VERSION = "bedrock-2023-05-31";
const DEFAULT_REGION = "us-east-1";
const DEFAULT_TIMEOUT_MS = 120_000;

const invokeResponseSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })).default([]),
  usage: z
    .object({
      input_tokens: z.number().int().nonnegative().default(0),
      output_tokens: z.number().int().nonnegative().default(0),
    })
    .default({}),
});

const streamChunkSchema = z.object({
  type: z.string(),
  delta: z.object({ type: z.string().optional(), text: z.string().optional() }).optional(),
});

export interface BedrockProviderOptions {
  region?: string;
  defaultModel?: string;
  /** Short name → Bedrock model id. Empty unless configured. */
  modelAliases?: Record<string, string>;
  timeoutMs?: number;
  /** Whether static credentials, a profile or a role were found in the environment. */
  credentialsConfigured?: boolean;
  runtimeClient?: Pick<BedrockRuntimeClient, "send">;
  controlClient?: Pick<BedrockClient, "send">;
}

export interface BedrockRequestBody {
  anthropic_version: string;
  max_tokens: number;
  temperature: number;
  messages: Array<{ role: string; content: string }>;
  system?: string;
}

export function buildBedrockBody(req: AiCompletionRequest): BedrockRequestBody {
  const { system, messages } = splitSystemMessage(req.messages);
  const body: BedrockRequestBody = {
    anthropic_version: BEDROCK_ANTHROPIC_VERSION,
    max_tokens: req.maxTokens,
    temperature: req.temperature,
    messages: messages.map((m) => ({ role: m.role, content: m.content })),
  };
  if (system) {
    body.system = system;
  }
  return body;
}

const decoder = new TextDecoder();

export function createBedrockProvider(options: BedrockProviderOptions = {}): AiProviderAdapter {
  const region = options.region || DEFAULT_REGION;
  const aliases = options.modelAliases ?? {};
  const defaultModel = options.defaultModel ?? "";
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  // The v3 SDK is promise-based; invocations never hold the event loop.
  const runtime =
    options.runtimeClient ??
    new BedrockRuntimeClient({ region, requestHandler: { requestTimeout: timeoutMs } });
  let control = options.controlClient;

  function resolveModel(model: string): string {
    return Object.hasOwn(aliases, model) ? (aliases[model] ?? model) : model;
  }

  function invokeParams(req: AiCompletionRequest) {
    return {
      modelId: resolveModel(req.model),
      contentType: "application/json",
      accept: "application/json",
      body: JSON.stringify(buildBedrockBody(req)),
    };
  }

  return {
    name: "bedrock",

    isConfigured() {
      return options.credentialsConfigured ?? false;
    },

    defaultModel() {
      return defaultModel;
    },

    async listModels() {
      return Object.keys(aliases);
    },

    async healthCheck() {
      try {
        control ??= new BedrockClient({ region });
        await control.send(new ListFoundationModelsCommand({}));
        return { status: "healthy" };
      } catch (err) {
        return { status: "unhealthy", error: errorMessage(err) };
      }
    },

    async complete(req: AiCompletionRequest): Promise<AiCompletionResult> {
      const params = invokeParams(req);

      let raw: unknown;
      try {
        const response = await runtime.send(new InvokeModelCommand(params));
        raw = JSON.parse(decoder.decode(response.body ?? new Uint8Array()));
      } catch (err) {
        throw toAiProviderError(err);
      }

      const parsed = invokeResponseSchema.safeParse(raw);
      if (!parsed.success) {
        throw new AiProviderError("bad_response", `Unexpected Bedrock response: ${parsed.error.message}`);
      }

      const { content, usage } = parsed.data;
      return buildCompletionResult({
        content: content[0]?.text ?? "",
        promptTokens: usage.input_tokens,
        completionTokens: usage.output_tokens,
        resolvedModel: params.modelId,
      });
    },

    async *completeStreaming(req: AiCompletionRequest): AsyncGenerator<AiStreamEvent> {
      try {
        const response = await runtime.send(new InvokeModelWithResponseStreamCommand(invokeParams(req)));
        if (!response.body) {
          throw new AiProviderError("bad_response", "Bedrock stream response had no body");
        }

        for await (const event of response.body) {
          const bytes = event.chunk?.bytes;
          if (!bytes) continue;

          const chunk = streamChunkSchema.safeParse(JSON.parse(decoder.decode(bytes)));
          if (!chunk.success) continue;

          const { type, delta } = chunk.data;
          if (type === "content_block_delta" && delta?.type === "text_delta" && delta.text) {
            yield { type: "chunk", content: delta.text };
          }
        }
      } catch (err) {
        yield { type: "error", error: toAiProviderError(err) };
        return;
      }
      yield { type: "done" };
    },
  };
}
