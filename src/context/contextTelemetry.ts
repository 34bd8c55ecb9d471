import type { ContextUsage } from './types.js';

export interface ContextUsageRecord {
  sessionId: string;
  timestamp: string;
  maxTokens: number;
  consumed: number;
  usage: ContextUsage;
  overBudget: boolean;
}

export interface ContextUsageSummary {
  assemblies: number;
  overBudget: number;
  averageConsumed: number;
  /** Mean share of the budget taken by each layer, 0..1 (can exceed 1 when over budget). */
  averageShare: ContextUsage;
}

/** Ring buffer of recent context assemblies, newest last. */
export class ContextTelemetry {
  private records: ContextUsageRecord[] = [];

  constructor(private readonly capacity: number = 500) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Telemetry capacity must be a positive integer, got ${capacity}`);
    }
  }

  record(entry: ContextUsageRecord): void {
    this.records.push(entry);
    const overflow = this.records.length - this.capacity;
    if (overflow > 0) this.records.splice(0, overflow);
  }

  latest(count: number = 10, sessionId?: string): ContextUsageRecord[] {
    const matching = sessionId === undefined ? this.records : this.records.filter((r) => r.sessionId === sessionId);
    return matching.slice(Math.max(0, matching.length - count));
  }

  summarize(sessionId?: string): ContextUsageSummary {
    const matching = sessionId === undefined ? this.records : this.records.filter((r) => r.sessionId === sessionId);
    const share = { current: 0, recent: 0, summaries: 0 };
    let consumed = 0;
    let overBudget = 0;
    for (const entry of matching) {
      consumed += entry.consumed;
      if (entry.overBudget) overBudget++;
      // a zero budget has no meaningful share
      if (entry.maxTokens > 0) {
        share.current += entry.usage.current / entry.maxTokens;
        share.recent += entry.usage.recent / entry.maxTokens;
        share.summaries += entry.usage.summaries / entry.maxTokens;
      }
    }
    const n = matching.length;
    return {
      assemblies: n,
      overBudget,
      averageConsumed: n === 0 ? 0 : consumed / n,
      averageShare:
        n === 0
          ? share
          : { current: share.current / n, recent: share.recent / n, summaries: share.summaries / n }
    };
  }

  clear(): void {
    this.records = [];
  }
}

export const contextTelemetry = new ContextTelemetry();
