/**
 * Public API.
 */

export * from './types/models.js';
export * from './errors.js';
export { loadConfig, DEFAULT_CONFIG, AGGREGATE_POLICIES } from './config.js';
export type { AppConfig, AggregatePolicy } from './config.js';
export { createContainer } from './container.js';
export type { Container } from './container.js';
export { getProductionContainer, resetProductionContainer } from './container.production.js';
export * from './providers/index.js';

export { memorySourceFile, diskSourceFile, fingerprintOf } from './sources/SourceFile.js';
export type { ISchemaCache } from './repositories/ISchemaCache.js';
export { InMemorySchemaCache, fingerprintKey } from './repositories/InMemorySchemaCache.js';
export type { ISourceLoader, LoadOutcome, Sample, SourceDocument } from './loaders/ISourceLoader.js';
export { TabularSourceLoader } from './loaders/TabularSourceLoader.js';
export { HierarchicalSourceLoader } from './loaders/HierarchicalSourceLoader.js';
export { HEURISTIC_RULES } from './loaders/heuristics.js';
export type { HeuristicRule } from './loaders/heuristics.js';
export { repairTruncatedJson, parseModelJson, stripCodeFences } from './parsing/json.js';

export { SchemaOracle, SCHEMA_ORACLE_CALLER } from './services/SchemaOracle.js';
export type { ISchemaOracle } from './services/SchemaOracle.js';
export { IngestionPipeline, mergeAggregates } from './services/IngestionPipeline.js';
export type { FamilySummary, FileSets } from './services/IngestionPipeline.js';
export { UnifiedStore } from './services/UnifiedStore.js';
export type { UnifiedStoreView } from './services/UnifiedStore.js';
export { NarrativeWriter } from './services/NarrativeWriter.js';
export type { IAnalysisTask } from './services/IAnalysisTask.js';
export { PlatformAnalysisTask } from './services/PlatformAnalysisTask.js';
export { SynthesisTask } from './services/SynthesisTask.js';
export type { ISynthesisTask, PlatformFindings } from './services/SynthesisTask.js';
export { Orchestrator, summarizeTasks, analysisTaskName, INGESTION_TASK, SYNTHESIS_TASK } from './services/Orchestrator.js';
export type { IIngestionPipeline, OrchestratorOptions, RunReport, TaskSummary } from './services/Orchestrator.js';
export type { TaskResult, TaskStatus, TaskUpdateListener } from './services/TaskLedger.js';
export { UsageTracker } from './services/UsageTracker.js';
export type { CallerUsage, UsageSummary } from './services/UsageTracker.js';
export {
  DEFAULT_PROFILES,
  LINKEDIN_PROFILE,
  INSTAGRAM_PROFILE,
  WEBSITE_PROFILE,
} from './analysis/profiles.js';
export type { PlatformProfile } from './analysis/profiles.js';
