/**
 * Analysis task interface: one per platform, run in parallel after ingestion.
 */

import type { Finding, Platform } from '../types/models.js';
import type { UnifiedStoreView } from './UnifiedStore.js';

/** Ledger name of a platform's analysis task. */
export function analysisTaskName(platform: Platform): string {
  return `analysis:${platform}`;
}

export interface IAnalysisTask {
  /** Task name in the run report, normally `analysisTaskName(platform)`. */
  readonly name: string;
  readonly platform: Platform;

  /** Returns [] when there is too little data; throws only on genuine failure. */
  analyze(store: UnifiedStoreView): Promise<Finding[]>;
}
