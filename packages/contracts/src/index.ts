import { z } from "zod";

export const aiProviderNameSchema = z.enum(["openai", "bedrock", "mock"]);

export const aiErrorKindSchema = z.enum([
  "configuration",
  "connectivity",
  "timeout",
  "auth",
  "rate_limit",
  "server",
  "bad_response"
]);

export const MESSAGE_MAX_LENGTH = 10_000;
export const CONTEXT_MAX_LENGTH = 5_000;
export const MAX_TOKENS_LIMIT = 4_000;

export const processRequestSchema = z.object({
  message: z.string().min(1).max(MESSAGE_MAX_LENGTH),
  context: z.string().max(CONTEXT_MAX_LENGTH).nullish(),
  model: z.string().min(1).nullish(),
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().min(1).max(MAX_TOKENS_LIMIT).optional()
});
export type ProcessRequest = z.infer<typeof processRequestSchema>;

export const aiUsageSchema = z.object({
  promptTokens: z.number().int().nonnegative(),
  completionTokens: z.number().int().nonnegative(),
  totalTokens: z.number().int().nonnegative(),
  estimatedCost: z.number().nonnegative()
});
export type AiUsage = z.infer<typeof aiUsageSchema>;

export const processResponseSchema = z.object({
  status: z.literal("success"),
  aiResponse: z.string(),
  model: z.string(),
  provider: aiProviderNameSchema,
  usage: aiUsageSchema,
  timestamp: z.string().datetime(),
  processingTime: z.number().nonnegative()
});
export type ProcessResponse = z.infer<typeof processResponseSchema>;

export const processFailureSchema = z.object({
  status: z.literal("error"),
  error: aiErrorKindSchema,
  message: z.string(),
  retryable: z.boolean()
});
export type ProcessFailure = z.infer<typeof processFailureSchema>;

/** Literal payload of the last frame on `/stream`. */
export const STREAM_DONE_MARKER = "[DONE]";

export const streamFrameSchema = z.union([
  z.object({ content: z.string() }),
  z.object({ error: z.string() })
]);
export type StreamFrame = z.infer<typeof streamFrameSchema>;

export const providerListingSchema = z.object({
  provider: aiProviderNameSchema,
  models: z.array(z.string()),
  default: z.string()
});
export type ProviderListing = z.infer<typeof providerListingSchema>;

export const healthResponseSchema = z.object({
  status: z.enum(["healthy", "degraded"]),
  provider: aiProviderNameSchema,
  timestamp: z.string().datetime(),
  messagesProcessed: z.number().int().nonnegative(),
  ai: z.object({
    configured: z.boolean(),
    status: z.enum(["healthy", "unhealthy"]),
    error: z.string().optional(),
    note: z.string().optional()
  })
});
export type HealthResponse = z.infer<typeof healthResponseSchema>;

export const configResponseSchema = z.object({
  provider: aiProviderNameSchema,
  defaultModel: z.string(),
  temperature: z.number(),
  maxTokens: z.number().int()
});
export type ConfigResponse = z.infer<typeof configResponseSchema>;

export const modelUsageSchema = z.object({
  requests: z.number().int().nonnegative(),
  tokens: z.number().int().nonnegative(),
  cost: z.number().nonnegative()
});

export const usageSnapshotSchema = z.object({
  totalRequests: z.number().int().nonnegative(),
  totalTokens: z.number().int().nonnegative(),
  totalCost: z.number().nonnegative(),
  perModel: z.record(z.string(), modelUsageSchema),
  latencies: z.array(z.number()),
  averageLatency: z.number().nonnegative()
});

export const apiRoutes = {
  process: "/process",
  stream: "/stream",
  models: "/models",
  health: "/health",
  config: "/config",
  stats: "/stats"
} as const;

export * from "./ai-cost.js";
export * from "./ai-errors.js";
export * from "./ai-provider.js";
export * from "./ai-usage.js";
export * from "./ai-providers/bedrock.js";
export * from "./ai-providers/mock.js";
export * from "./ai-providers/openai.js";
export * from "./ai-providers/registry.js";
