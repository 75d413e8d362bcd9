import type { Logger } from "../../utils/logger.js";
import type { LLMUsage } from "./provider.js";

export interface TokenCounters {
  promptTokens: number;
  completionTokens: number;
}

export interface TurnUsageRecord {
  turn: number;
  label: string;
  model: string;
  inputTokens: number | null;
  outputTokens: number | null;
  estimatedCost: number | null;
}

export type CostRates = Record<string, { input: number; output: number }>;

/**
 * Tracks token usage for one agent run, one record per chat request.
 * Counters start at zero for every tracker; create one per run.
 */
export class RunUsageTracker {
  private records: TurnUsageRecord[] = [];
  private costRates: CostRates;
  private logger?: Logger;

  constructor(costRates?: CostRates, logger?: Logger) {
    this.costRates = costRates ?? {};
    this.logger = logger;
  }

  /** Record a single chat request's usage. */
  track(label: string, model: string, usage: LLMUsage): TurnUsageRecord {
    const record: TurnUsageRecord = {
      turn: this.records.length + 1,
      label,
      model,
      inputTokens: usage.inputTokens,
      outputTokens: usage.outputTokens,
      estimatedCost: this.calculateCost(model, usage),
    };
    this.records.push(record);

    if (usage.inputTokens === null && usage.outputTokens === null) {
      this.logger?.warn({ turn: record.turn, model }, "Chat response carried no usage data");
    } else {
      this.logger?.info(
        { turn: record.turn, label, input: usage.inputTokens, output: usage.outputTokens },
        "Chat turn usage"
      );
    }

    return record;
  }

  getCounters(): TokenCounters {
    let promptTokens = 0;
    let completionTokens = 0;
    for (const r of this.records) {
      promptTokens += r.inputTokens ?? 0;
      completionTokens += r.outputTokens ?? 0;
    }
    return { promptTokens, completionTokens };
  }

  getRecords(): TurnUsageRecord[] {
    return [...this.records];
  }

  /** Sum of per-turn cost estimates, or null if no turn could be priced. */
  getEstimatedCost(): number | null {
    let total = 0;
    let priced = false;
    for (const r of this.records) {
      if (r.estimatedCost !== null) {
        total += r.estimatedCost;
        priced = true;
      }
    }
    return priced ? total : null;
  }

  private calculateCost(model: string, usage: LLMUsage): number | null {
    if (usage.inputTokens === null && usage.outputTokens === null) {
      return null;
    }

    const rates = this.costRates[model];
    if (!rates) {
      return null;
    }

    const inputCost = ((usage.inputTokens ?? 0) / 1_000_000) * rates.input;
    const outputCost = ((usage.outputTokens ?? 0) / 1_000_000) * rates.output;

    return inputCost + outputCost;
  }
}
