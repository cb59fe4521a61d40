import { type AiRegistryConfig, MAX_TOKENS_LIMIT, parseProviderName } from "@llm-relay/contracts";
import { z } from "zod";

/** Parses `alias=modelId,alias2=modelId2`. Blank entries are skipped. */
export function parseModelAliases(raw: string): Record<string, string> | null {
  const aliases: Record<string, string> = {};
  for (const entry of raw.split(",")) {
    const trimmed = entry.trim();
    if (trimmed.length === 0) continue;

    const separator = trimmed.indexOf("=");
    const alias = trimmed.slice(0, separator).trim();
    const modelId = trimmed.slice(separator + 1).trim();
    if (separator <= 0 || alias.length === 0 || modelId.length === 0) {
      return null;
    }
    aliases[alias] = modelId;
  }
  return aliases;
}

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  RESPONDER_PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  RESPONDER_HOST: z.string().default("0.0.0.0"),
  RESPONDER_CORS_ORIGIN: z.string().default("*"),
  AI_PROVIDER: z.string().optional().transform(parseProviderName),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().optional(),
  OPENAI_DEFAULT_MODEL: z.string().min(1).default("gpt-4"),
  AWS_REGION: z.string().min(1).default("us-east-1"),
  AWS_ACCESS_KEY_ID: z.string().optional(),
  AWS_PROFILE: z.string().optional(),
  AWS_ROLE_ARN: z.string().optional(),
  BEDROCK_DEFAULT_MODEL: z.string().default(""),
  BEDROCK_MODEL_ALIASES: z
    .string()
    .default("")
    .transform((raw, ctx) => {
      const aliases = parseModelAliases(raw);
      if (aliases === null) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "expected alias=modelId pairs separated by commas" });
        return z.NEVER;
      }
      return aliases;
    }),
  AI_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  AI_MAX_TOKENS: z.coerce.number().int().min(1).max(MAX_TOKENS_LIMIT).default(1000),
  AI_TIMEOUT_SECONDS: z.coerce.number().positive().default(120)
});

export type ResponderEnv = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): ResponderEnv {
  return envSchema.parse(source);
}

export function registryConfigFromEnv(env: ResponderEnv): AiRegistryConfig {
  const timeoutMs = env.AI_TIMEOUT_SECONDS * 1000;
  return {
    provider: env.AI_PROVIDER,
    openai: {
      apiKey: env.OPENAI_API_KEY,
      baseUrl: env.OPENAI_BASE_URL,
      defaultModel: env.OPENAI_DEFAULT_MODEL,
      timeoutMs
    },
    bedrock: {
      region: env.AWS_REGION,
      defaultModel: env.BEDROCK_DEFAULT_MODEL,
      modelAliases: env.BEDROCK_MODEL_ALIASES,
      timeoutMs,
      credentialsConfigured: Boolean(env.AWS_ACCESS_KEY_ID || env.AWS_PROFILE || env.AWS_ROLE_ARN)
    }
  };
}
