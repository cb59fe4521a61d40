import { roundCost } from "./ai-cost.js";

export interface AiUsageRecord {
  model: string;
  totalTokens: number;
  promptTokens: number;
  completionTokens: number;
  cost: number;
  /** Seconds. */
  latency: number;
}

export interface AiModelUsage {
  requests: number;
  tokens: number;
  cost: number;
}

export interface AiUsageSnapshot {
  totalRequests: number;
  totalTokens: number;
  totalCost: number;
  perModel: Record<string, AiModelUsage>;
  latencies: number[];
  averageLatency: number;
}

/**
 * Running usage totals for one side of the relay, kept for the life of the
 * process. Grows without bound: one latency entry per request.
 *
 * `record` has no await point, so on the event loop every update lands whole
 * even with many requests in flight. Keep it synchronous.
 */
export class AiUsageAggregator {
  private totalRequests = 0;
  private totalTokens = 0;
  private totalCost = 0;
  private readonly perModel = new Map<string, AiModelUsage>();
  private readonly latencies: number[] = [];

  record(entry: AiUsageRecord): void {
    this.totalRequests += 1;
    this.totalTokens += entry.totalTokens;
    this.totalCost += entry.cost;
    this.latencies.push(entry.latency);

    let bucket = this.perModel.get(entry.model);
    if (!bucket) {
      bucket = { requests: 0, tokens: 0, cost: 0 };
      this.perModel.set(entry.model, bucket);
    }
    bucket.requests += 1;
    bucket.tokens += entry.totalTokens;
    bucket.cost += entry.cost;
  }

  snapshot(): AiUsageSnapshot {
    const perModel: Record<string, AiModelUsage> = {};
    for (const [model, usage] of this.perModel) {
      perModel[model] = { ...usage, cost: roundCost(usage.cost) };
    }

    const latencies = [...this.latencies];
    const averageLatency =
      latencies.length > 0 ? latencies.reduce((sum, value) => sum + value, 0) / latencies.length : 0;

    return {
      totalRequests: this.totalRequests,
      totalTokens: this.totalTokens,
      totalCost: roundCost(this.totalCost),
      perModel,
      latencies,
      averageLatency,
    };
  }
}
