import type { LLMUsage } from "./contracts";

/**
 * Token and cost accounting for one invocation. Counters only grow.
 */
export class CostLedger {
  private prompt = 0;
  private completion = 0;
  private calls = 0;

  constructor(public readonly pricePer1kTokens: number) {}

  record(usage: LLMUsage): void {
    this.prompt += Math.max(0, Math.floor(usage.promptTokens));
    this.completion += Math.max(0, Math.floor(usage.completionTokens));
    this.calls += 1;
  }

  get promptTokens(): number {
    return this.prompt;
  }

  get completionTokens(): number {
    return this.completion;
  }

  get callCount(): number {
    return this.calls;
  }

  get totalTokens(): number {
    return this.prompt + this.completion;
  }

  get estimatedCost(): number {
    return (this.totalTokens / 1000) * this.pricePer1kTokens;
  }

  averagePerRecord(recordCount: number): number {
    return recordCount > 0 ? this.estimatedCost / recordCount : 0;
  }

  snapshot(): { promptTokens: number; completionTokens: number; callCount: number; estimatedCost: number } {
    return {
      promptTokens: this.prompt,
      completionTokens: this.completion,
      callCount: this.calls,
      estimatedCost: this.estimatedCost,
    };
  }
}
