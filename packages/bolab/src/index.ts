export * from './types.js';
export * from './errors.js';
export { loadConfig, resetConfigCache, findWorkspaceRoot, campaignsDirFor, type BolabConfig } from './config.js';
export {
  isInDomain, coerceValue, normalizeRow, rowSatisfiesSpace, rowViolations, validateParameters,
  RESERVED_COLUMNS,
} from './space/parameters.js';
export { validateObjectives, validateSpace, coverageIssues, desirability } from './space/objectives.js';
export { parseSmiles, isValidSmiles } from './space/smiles.js';
export {
  createCampaignConfig, editCampaignConfig, configHash, serializeCampaign, deserializeCampaign,
  readCampaignDocument, type EditResult, type CampaignDocument,
} from './campaign/config.js';
export { CURRENT_SCHEMA_VERSION } from './campaign/schema.js';
export { batchToCsv, parseResultsCsv, parseImportCsv, type ImportedRow } from './history/csv.js';
export { openHistoryDb } from './history/connection.js';
export { FallbackSampler } from './sampling/fallback.js';
export { SeededRng, createSeededRng, seedFromString } from './sampling/prng.js';
export type { OptimizationEngine, BuildRequest, Recommendation, TrainingRow } from './optimizer/engine.js';
export { UnconfiguredEngine } from './optimizer/engine.js';
export { ProcessEngine, type ProcessEngineOptions } from './optimizer/process-engine.js';
export { OptimizerAdapter, type OptimizerHandle } from './optimizer/adapter.js';
export { CampaignOrchestrator, type GenerateOptions } from './orchestrator/orchestrator.js';
export { OrchestratorState } from './orchestrator/states.js';
export type { BatchTask, ProgressListener } from './orchestrator/task.js';
export {
  CampaignService, engineFromConfig,
  type ServiceOptions, type CampaignSummary, type BatchRequestOptions,
} from './service.js';
export {
  JsonlEventSink, MemoryEventSink, ConsoleEventSink, FanoutEventSink, describeEvent,
  type CampaignEvent, type CampaignEventType, type EventSink,
} from './events.js';
export { SettingsService, initSettings, getSettings, teardownSettings } from './workspace/settings.js';
