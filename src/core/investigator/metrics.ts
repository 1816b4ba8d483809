import type { TokenUsage } from '../llm';
import type { Observation } from './types';

export interface UsageMetrics {
  modelCalls: number;
  retries: number;
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
  toolCalls: number;
  failedToolCalls: number;
  modelLatencyMs: number;
  toolLatencyMs: number;
  estimatedCostUsd: number;
}

export interface Pricing {
  promptPer1k: number;
  completionPer1k: number;
}

export function emptyUsage(): UsageMetrics {
  return {
    modelCalls: 0,
    retries: 0,
    promptTokens: 0,
    completionTokens: 0,
    totalTokens: 0,
    toolCalls: 0,
    failedToolCalls: 0,
    modelLatencyMs: 0,
    toolLatencyMs: 0,
    estimatedCostUsd: 0,
  };
}

function roundCost(value: number): number {
  return Math.round(value * 1e6) / 1e6;
}

export function mergeUsage(a: UsageMetrics, b: UsageMetrics): UsageMetrics {
  return {
    modelCalls: a.modelCalls + b.modelCalls,
    retries: a.retries + b.retries,
    promptTokens: a.promptTokens + b.promptTokens,
    completionTokens: a.completionTokens + b.completionTokens,
    totalTokens: a.totalTokens + b.totalTokens,
    toolCalls: a.toolCalls + b.toolCalls,
    failedToolCalls: a.failedToolCalls + b.failedToolCalls,
    modelLatencyMs: a.modelLatencyMs + b.modelLatencyMs,
    toolLatencyMs: a.toolLatencyMs + b.toolLatencyMs,
    estimatedCostUsd: roundCost(a.estimatedCostUsd + b.estimatedCostUsd),
  };
}

/** Usage context owned by a single investigation. */
export class UsageRecorder {
  private usage: UsageMetrics = emptyUsage();

  constructor(private readonly pricing?: Pricing) {}

  recordModelCall(tokens: TokenUsage, latencyMs: number): void {
    const cost = this.pricing
      ? (tokens.promptTokens / 1000) * this.pricing.promptPer1k +
        (tokens.completionTokens / 1000) * this.pricing.completionPer1k
      : 0;
    this.usage = mergeUsage(this.usage, {
      ...emptyUsage(),
      modelCalls: 1,
      promptTokens: tokens.promptTokens,
      completionTokens: tokens.completionTokens,
      totalTokens: tokens.totalTokens,
      modelLatencyMs: latencyMs,
      estimatedCostUsd: cost,
    });
  }

  recordRetry(): void {
    this.usage = { ...this.usage, retries: this.usage.retries + 1 };
  }

  recordToolCall(observation: Observation): void {
    this.usage = {
      ...this.usage,
      toolCalls: this.usage.toolCalls + 1,
      failedToolCalls: this.usage.failedToolCalls + (observation.success ? 0 : 1),
      toolLatencyMs: this.usage.toolLatencyMs + observation.durationMs,
    };
  }

  snapshot(): UsageMetrics {
    return { ...this.usage };
  }
}

/**
 * Totals across investigations. `record` is one synchronous replace of the
 * totals, so concurrent investigations finishing on the event loop can't
 * interleave partial updates.
 */
export class UsageLedger {
  private totals: UsageMetrics = emptyUsage();
  private count = 0;

  record(usage: UsageMetrics): void {
    this.totals = mergeUsage(this.totals, usage);
    this.count += 1;
  }

  get investigations(): number {
    return this.count;
  }

  snapshot(): UsageMetrics {
    return { ...this.totals };
  }
}
