import type { AiProviderAdapter, AiProviderName } from "../ai-provider.js";
import { type BedrockProviderOptions, createBedrockProvider } from "./bedrock.js";
import { createMockProvider, MOCK_MODEL, type MockProviderOptions } from "./mock.js";
import { createOpenAiProvider, OPENAI_DEFAULT_MODEL, type OpenAiProviderOptions } from "./openai.js";

export interface AiRegistryConfig {
  provider: AiProviderName;
  openai?: OpenAiProviderOptions;
  bedrock?: BedrockProviderOptions;
  mock?: MockProviderOptions;
}

export interface AiRegistry {
  readonly name: AiProviderName;
  /**
   * The active provider, built on first call and reused afterwards. Throws
   * the provider's configuration error when credentials are missing; a
   * failed build is retried on the next call.
   */
  get(): AiProviderAdapter;
  /** Whether credentials for the selected provider are present, without building it. */
  isConfigured(): boolean;
  defaultModel(): string;
}

export function parseProviderName(raw: string | undefined): AiProviderName {
  const value = raw?.trim().toLowerCase();
  if (value === "mock" || value === "bedrock") {
    return value;
  }
  return "openai";
}

function buildProvider(config: AiRegistryConfig): AiProviderAdapter {
  switch (config.provider) {
    case "mock":
      return createMockProvider(config.mock);
    case "bedrock":
      return createBedrockProvider(config.bedrock);
    case "openai":
      return createOpenAiProvider(config.openai ?? {});
    default: {
      const unreachable: never = config.provider;
      throw new Error(`unsupported AI provider: ${String(unreachable)}`);
    }
  }
}

export function createAiRegistry(config: AiRegistryConfig): AiRegistry {
  let provider: AiProviderAdapter | null = null;

  return {
    name: config.provider,

    get(): AiProviderAdapter {
      provider ??= buildProvider(config);
      return provider;
    },

    isConfigured(): boolean {
      switch (config.provider) {
        case "mock":
          return true;
        case "bedrock":
          return config.bedrock?.credentialsConfigured ?? false;
        case "openai":
          return (config.openai?.apiKey ?? "").length > 0;
      }
    },

    defaultModel(): string {
      switch (config.provider) {
        case "mock":
          return MOCK_MODEL;
        case "bedrock":
          return config.bedrock?.defaultModel ?? "";
        case "openai":
          return config.openai?.defaultModel || OPENAI_DEFAULT_MODEL;
      }
    },
  };
}
