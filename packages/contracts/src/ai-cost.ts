export interface ModelRate {
  promptRatePer1k: number;
  completionRatePer1k: number;
}

export interface RateTable {
  rates: Record<string, ModelRate>;
  /** Short name → canonical model id, resolved before the rate lookup. */
  aliases: Record<string, string>;
}

/**
 * USD per 1K tokens. Bedrock prices vary by region; these are the
 * us-east-1 on-demand figures.
 */
export const MODEL_COST_TABLE: Record<string, ModelRate> = {
  "gpt-4": { promptRatePer1k: 0.03, completionRatePer1k: 0.06 },
  "gpt-4-turbo": { promptRatePer1k: 0.01, completionRatePer1k: 0.03 },
  "gpt-4o": { promptRatePer1k: 0.005, completionRatePer1k: 0.015 },
  "gpt-4o-mini": { promptRatePer1k: 0.00015, completionRatePer1k: 0.0006 },
  "gpt-3.5-turbo": { promptRatePer1k: 0.0015, completionRatePer1k: 0.002 },
  "anthropic.claude-3-5-sonnet-20241022-v2:0": { promptRatePer1k: 0.003, completionRatePer1k: 0.015 },
  "anthropic.claude-3-5-sonnet-20240620-v1:0": { promptRatePer1k: 0.003, completionRatePer1k: 0.015 },
  "anthropic.claude-3-5-haiku-20241022-v1:0": { promptRatePer1k: 0.0008, completionRatePer1k: 0.004 },
  "anthropic.claude-3-sonnet-20240229-v1:0": { promptRatePer1k: 0.003, completionRatePer1k: 0.015 },
  "anthropic.claude-3-haiku-20240307-v1:0": { promptRatePer1k: 0.00025, completionRatePer1k: 0.00125 },
  "anthropic.claude-3-opus-20240229-v1:0": { promptRatePer1k: 0.015, completionRatePer1k: 0.075 },
};

export const MODEL_ALIASES: Record<string, string> = {
  "claude-3-sonnet": "anthropic.claude-3-sonnet-20240229-v1:0",
  "claude-3-haiku": "anthropic.claude-3-haiku-20240307-v1:0",
  "claude-3-opus": "anthropic.claude-3-opus-20240229-v1:0",
  "claude-3.5-sonnet": "anthropic.claude-3-5-sonnet-20240620-v1:0",
  "claude-3.5-sonnet-v2": "anthropic.claude-3-5-sonnet-20241022-v2:0",
  "claude-3.5-haiku": "anthropic.claude-3-5-haiku-20241022-v1:0",
};

export const DEFAULT_RATE_TABLE: RateTable = {
  rates: MODEL_COST_TABLE,
  aliases: MODEL_ALIASES,
};

export function roundCost(value: number): number {
  return Number(value.toFixed(6));
}

export function resolveModelAlias(model: string, table: RateTable = DEFAULT_RATE_TABLE): string {
  return Object.hasOwn(table.aliases, model) ? (table.aliases[model] ?? model) : model;
}

/**
 * Estimate the USD cost of a completion, rounded to 6 decimals.
 * Models missing from the table (after alias resolution) cost 0.
 */
export function estimateCostUsd(
  model: string,
  promptTokens: number,
  completionTokens: number,
  table: RateTable = DEFAULT_RATE_TABLE,
): number {
  const resolved = resolveModelAlias(model, table);
  const rate = Object.hasOwn(table.rates, resolved) ? table.rates[resolved] : undefined;
  if (!rate) {
    return 0;
  }

  return roundCost(
    (promptTokens / 1000) * rate.promptRatePer1k + (completionTokens / 1000) * rate.completionRatePer1k,
  );
}
