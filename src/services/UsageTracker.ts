/**
 * Token usage accounting for completion calls, grouped by caller.
 */

import type { TokenUsage } from '../providers/ICompletionProvider.js';

export interface CallerUsage {
  calls: number;
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface UsageSummary extends CallerUsage {
  byCaller: Record<string, CallerUsage>;
}

function emptyUsage(): CallerUsage {
  return { calls: 0, promptTokens: 0, completionTokens: 0, totalTokens: 0 };
}

export class UsageTracker {
  private readonly byCaller = new Map<string, CallerUsage>();

  record(caller: string, usage: TokenUsage | undefined): void {
    const entry = this.byCaller.get(caller) ?? emptyUsage();
    entry.calls += 1;
    if (usage) {
      entry.promptTokens += usage.promptTokens;
      entry.completionTokens += usage.completionTokens;
      entry.totalTokens += usage.promptTokens + usage.completionTokens;
    }
    this.byCaller.set(caller, entry);
  }

  summary(): UsageSummary {
    const total = emptyUsage();
    const byCaller: Record<string, CallerUsage> = {};

    for (const [caller, usage] of this.byCaller) {
      byCaller[caller] = { ...usage };
      total.calls += usage.calls;
      total.promptTokens += usage.promptTokens;
      total.completionTokens += usage.completionTokens;
      total.totalTokens += usage.totalTokens;
    }

    return { ...total, byCaller };
  }

  reset(): void {
    this.byCaller.clear();
  }
}
