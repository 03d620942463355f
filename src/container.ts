/**
 * Dependency wiring.
 * Constructs every service with its dependencies. Production passes the
 * OpenAI-backed completion provider; tests pass mocks.
 */

import { DEFAULT_CONFIG, type AppConfig } from './config.js';
import type { ISourceLoader } from './loaders/ISourceLoader.js';
import { HierarchicalSourceLoader } from './loaders/HierarchicalSourceLoader.js';
import { TabularSourceLoader } from './loaders/TabularSourceLoader.js';
import type { HeuristicRule } from './loaders/heuristics.js';
import { DEFAULT_PROFILES, type PlatformProfile } from './analysis/profiles.js';
import type { ICompletionProvider } from './providers/ICompletionProvider.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import type { ISchemaCache } from './repositories/ISchemaCache.js';
import { InMemorySchemaCache } from './repositories/InMemorySchemaCache.js';
import type { IAnalysisTask } from './services/IAnalysisTask.js';
import { IngestionPipeline } from './services/IngestionPipeline.js';
import { NarrativeWriter } from './services/NarrativeWriter.js';
import { Orchestrator, type OrchestratorOptions } from './services/Orchestrator.js';
import { PlatformAnalysisTask } from './services/PlatformAnalysisTask.js';
import { SchemaOracle } from './services/SchemaOracle.js';
import { SynthesisTask } from './services/SynthesisTask.js';
import { UsageTracker } from './services/UsageTracker.js';

export interface Container {
  config: AppConfig;
  schemaCache: ISchemaCache;
  schemaOracle: SchemaOracle;
  loaders: ISourceLoader[];
  ingestionPipeline: IngestionPipeline;
  narrativeWriter: NarrativeWriter;
  analyzers: IAnalysisTask[];
  synthesisTask: SynthesisTask;
  orchestrator: Orchestrator;
  usageTracker: UsageTracker;
  logProvider: ILogProvider;
}

export function createContainer(deps: {
  completionProvider: ICompletionProvider;
  logProvider: ILogProvider;
  /** Shared with the completion provider so its calls show up in reports. */
  usageTracker?: UsageTracker;
  schemaCache?: ISchemaCache;
  config?: AppConfig;
  profiles?: readonly PlatformProfile[];
  heuristicRules?: readonly HeuristicRule[];
  orchestrator?: OrchestratorOptions;
}): Container {
  const config = deps.config ?? DEFAULT_CONFIG;
  const usageTracker = deps.usageTracker ?? new UsageTracker();
  const schemaCache = deps.schemaCache ?? new InMemorySchemaCache();
  const profiles = deps.profiles ?? DEFAULT_PROFILES;

  const schemaOracle = new SchemaOracle(deps.completionProvider, { timeoutMs: config.llm.timeoutMs });
  const loaders: ISourceLoader[] = [
    new TabularSourceLoader(deps.heuristicRules),
    new HierarchicalSourceLoader(deps.heuristicRules),
  ];
  const ingestionPipeline = new IngestionPipeline(loaders, schemaCache, schemaOracle, deps.logProvider, {
    sampleRows: config.ingestion.sampleRows,
    aggregatePolicy: config.ingestion.aggregatePolicy,
  });

  const narrativeWriter = new NarrativeWriter(deps.completionProvider, deps.logProvider, {
    timeoutMs: config.llm.timeoutMs,
  });
  const analyzers: IAnalysisTask[] = profiles.map(
    (profile) => new PlatformAnalysisTask(profile, narrativeWriter, deps.logProvider)
  );
  const synthesisTask = new SynthesisTask(profiles, narrativeWriter, deps.logProvider);

  const orchestrator = new Orchestrator(
    ingestionPipeline,
    analyzers,
    synthesisTask,
    usageTracker,
    deps.logProvider,
    deps.orchestrator
  );

  return {
    config,
    schemaCache,
    schemaOracle,
    loaders,
    ingestionPipeline,
    narrativeWriter,
    analyzers,
    synthesisTask,
    orchestrator,
    usageTracker,
    logProvider: deps.logProvider,
  };
}
