/**
 * Run orchestration: ingestion → parallel per-platform analysis → synthesis.
 *
 * Best effort throughout. A failed analyst does not stop the others, a failed
 * synthesis keeps the platform findings, and a failed ingestion marks every
 * downstream task skipped. The report always comes back.
 */

import { PipelineFatalError, toTaskError } from '../errors.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { Finding, Platform } from '../types/models.js';
import { mapWithConcurrency } from '../utils/concurrency.js';
import type { IAnalysisTask } from './IAnalysisTask.js';
import type { FileSets } from './IngestionPipeline.js';
import type { ISynthesisTask } from './SynthesisTask.js';
import { TaskLedger, type TaskResult, type TaskStatus, type TaskUpdateListener } from './TaskLedger.js';
import type { UnifiedStoreView } from './UnifiedStore.js';
import type { UsageSummary, UsageTracker } from './UsageTracker.js';

export { analysisTaskName } from './IAnalysisTask.js';

export const INGESTION_TASK = 'ingestion';
export const SYNTHESIS_TASK = 'synthesis';

export interface IIngestionPipeline {
  run(fileSets: FileSets): Promise<UnifiedStoreView>;
}

export interface RunReport {
  /** Null only when ingestion threw before producing a store. */
  store: UnifiedStoreView | null;
  platformFindings: Record<Platform, Finding[]>;
  synthesis: Finding[];
  tasks: Record<string, TaskResult>;
  usage: UsageSummary;
  durationMs: number;
}

export interface OrchestratorOptions {
  /** Analysts running at once. Default: all of them. */
  analysisConcurrency?: number;
  /** Called on every task transition, e.g. to drive a progress display. */
  onTaskUpdate?: TaskUpdateListener;
  /** Clock override for tests. */
  now?: () => number;
}

export class Orchestrator {
  constructor(
    private readonly ingestion: IIngestionPipeline,
    private readonly analyzers: readonly IAnalysisTask[],
    private readonly synthesis: ISynthesisTask,
    private readonly usageTracker: UsageTracker,
    private readonly logger: ILogProvider,
    private readonly opts?: OrchestratorOptions
  ) {
    const platforms = new Set<Platform>();
    const names = new Set<string>([INGESTION_TASK, SYNTHESIS_TASK]);
    for (const analyzer of analyzers) {
      if (platforms.has(analyzer.platform)) {
        throw new Error(`More than one analyzer registered for ${analyzer.platform}`);
      }
      if (names.has(analyzer.name)) {
        throw new Error(`Task name "${analyzer.name}" is already taken`);
      }
      platforms.add(analyzer.platform);
      names.add(analyzer.name);
    }
    if (opts?.analysisConcurrency !== undefined && opts.analysisConcurrency < 1) {
      throw new RangeError('analysisConcurrency must be at least 1');
    }
  }

  async run(fileSets: FileSets): Promise<RunReport> {
    const startedAt = this.now();
    this.usageTracker.reset();

    const ledger = new TaskLedger(this.logger, { onTaskUpdate: this.opts?.onTaskUpdate, now: this.opts?.now });
    ledger.register(INGESTION_TASK);
    for (const analyzer of this.analyzers) ledger.register(analyzer.name);
    ledger.register(SYNTHESIS_TASK);

    const platformFindings = emptyFindings();
    let synthesis: Finding[] = [];

    const report = (store: UnifiedStoreView | null): RunReport => ({
      store,
      platformFindings,
      synthesis,
      tasks: ledger.snapshot(),
      usage: this.usageTracker.summary(),
      durationMs: this.now() - startedAt,
    });

    // ── Phase 1: ingestion ──

    ledger.start(INGESTION_TASK);
    let store: UnifiedStoreView | null = null;
    try {
      store = await this.ingestion.run(fileSets);
      if (store.recordCount() === 0) {
        throw new PipelineFatalError(`No records ingested; ${store.skipped.length} files skipped`);
      }
      ledger.succeed(INGESTION_TASK, {
        records: store.recordCount(),
        filesLoaded: store.filesLoaded,
        filesSkipped: store.skipped.length,
        droppedRows: store.droppedRows,
      });
    } catch (err) {
      ledger.fail(INGESTION_TASK, toTaskError(err, INGESTION_TASK));
      for (const name of ledger.open()) ledger.skip(name, 'Ingestion failed');
      return report(store);
    }

    // ── Phase 2: analysis fan-out ──

    const ingested = store;
    const limit = this.opts?.analysisConcurrency ?? Math.max(1, this.analyzers.length);
    await mapWithConcurrency(this.analyzers, limit, async (analyzer) => {
      const { name } = analyzer;
      ledger.start(name);
      try {
        const findings = await analyzer.analyze(ingested);
        platformFindings[analyzer.platform] = findings;
        ledger.succeed(name, { findings: findings.length });
      } catch (err) {
        ledger.fail(name, toTaskError(err, name));
      }
    });

    // ── Phase 3: synthesis ──

    const productive = this.analyzers.some(
      (a) =>
        ledger.get(a.name)?.status === 'succeeded' && platformFindings[a.platform].length > 0
    );
    if (!productive) {
      ledger.skip(SYNTHESIS_TASK, 'No analysis produced findings');
      return report(ingested);
    }

    ledger.start(SYNTHESIS_TASK);
    try {
      synthesis = await this.synthesis.synthesize(ingested, platformFindings);
      ledger.succeed(SYNTHESIS_TASK, { findings: synthesis.length });
    } catch (err) {
      ledger.fail(SYNTHESIS_TASK, toTaskError(err, SYNTHESIS_TASK));
    }

    return report(ingested);
  }

  private now(): number {
    return this.opts?.now?.() ?? Date.now();
  }
}

function emptyFindings(): Record<Platform, Finding[]> {
  return { linkedin: [], instagram: [], website: [] };
}

export interface TaskSummary {
  status: TaskStatus;
  durationMs: number;
  error: string | null;
}

/** One line of status per task, for display. */
export function summarizeTasks(report: RunReport): Record<string, TaskSummary> {
  const out: Record<string, TaskSummary> = {};
  for (const [name, result] of Object.entries(report.tasks)) {
    out[name] = {
      status: result.status,
      durationMs: result.durationMs,
      error: result.error ? `${result.error.code}: ${result.error.message}` : (result.skipReason ?? null),
    };
  }
  return out;
}
