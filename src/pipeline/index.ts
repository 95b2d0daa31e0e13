/**
 * REASON Pipeline
 *
 * Barrel export for the analysis pipeline, its result types and summary helpers.
 */

export {
  AnalysisPipeline,
  STAGE_DELAYS_MS,
  AFFECTED_PATHWAYS,
  THERAPEUTIC_TARGETS,
  DRUG_CANDIDATES,
  VALIDATION_SCORE,
} from './analysis-pipeline.js';
export type { AnalysisPipelineOptions, StageName } from './analysis-pipeline.js';
export { formatSummary, formatTimestamp, logFileNameFor, resultIdFor } from './summary.js';
export type {
  AnalysisResult,
  AnalysisRun,
  AnalysisArtifacts,
  AnalyzeOptions,
  RunOptions,
  DatasetStatus,
  SimulationResult,
  StageEvent,
} from './types.js';
