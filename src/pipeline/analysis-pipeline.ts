/**
 * REASON Analysis Pipeline
 *
 * Runs the simulated disease analysis: a fixed sequence of logged, delayed
 * stages that consult the knowledge and dataset stores, then writes
 * `<id>.json` and `<id>_summary.txt` into the results directory.
 * The findings themselves are fixed lists.
 */

import fs from 'fs';
import path from 'path';
import { setTimeout as delay } from 'timers/promises';
import type { ReasonConfig } from '../config/index.js';
import { AnalysisError, StorageError } from '../errors/index.js';
import { KnowledgeStore } from '../knowledge/index.js';
import { Logger } from '../logging/index.js';
import { DatasetStore, isErrorDocument } from '../storage/index.js';
import { formatSummary, formatTimestamp, resultIdFor } from './summary.js';
import type {
  AnalysisArtifacts,
  AnalysisResult,
  AnalysisRun,
  AnalyzeOptions,
  DatasetStatus,
  RunOptions,
  SimulationResult,
  StageEvent,
} from './types.js';

/** Base stage durations in ms, before `stageDelayScale` is applied. */
export const STAGE_DELAYS_MS = {
  retrieve: 1000,
  preprocess: 2000,
  integrate: 2000,
  pathways: 1500,
  targets: 2000,
  drugs: 2000,
  simulate: 3000,
  validate: 2000,
} as const;

export type StageName = keyof typeof STAGE_DELAYS_MS;

export const AFFECTED_PATHWAYS = ['inflammatory_response', 'mitochondrial_dysfunction', 'protein_degradation'];
export const THERAPEUTIC_TARGETS = ['GENE1', 'GENE2', 'PROTEIN1'];
export const DRUG_CANDIDATES = ['COMPOUND1', 'COMPOUND2', 'REPURPOSED_DRUG1'];
export const VALIDATION_SCORE = 0.85;

export interface AnalysisPipelineOptions {
  logger?: Logger;
  datasetStore?: DatasetStore;
  knowledgeStore?: KnowledgeStore;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
  onStage?: (event: StageEvent) => void;
}

export class AnalysisPipeline {
  readonly datasets: DatasetStore;
  readonly knowledge: KnowledgeStore;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => Date;
  private readonly onStage?: (event: StageEvent) => void;
  private closed = false;

  constructor(
    private readonly config: ReasonConfig,
    options: AnalysisPipelineOptions = {}
  ) {
    this.logger =
      options.logger ?? new Logger('REASON.Core', { level: config.logLevel, logFile: config.logFile });
    this.logger.info('Initializing REASON system...');

    this.initDirectories();

    const storeLogger = { level: config.logLevel, logFile: config.logFile };
    this.datasets =
      options.datasetStore ??
      new DatasetStore({ dataDir: config.dataDir, logger: new Logger('REASON.DatasetStore', storeLogger) });
    this.knowledge =
      options.knowledgeStore ??
      new KnowledgeStore({ dataDir: config.dataDir, logger: new Logger('REASON.KnowledgeStore', storeLogger) });
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.now = options.now ?? (() => new Date());
    this.onStage = options.onStage;

    this.logger.info('REASON system initialized successfully.');
  }

  /** Create the data, results and models directories. */
  initDirectories(): void {
    for (const dir of [this.config.dataDir, this.config.resultsDir, this.config.modelsDir]) {
      try {
        fs.mkdirSync(dir, { recursive: true });
      } catch (err) {
        throw new StorageError(`Cannot create directory: ${err instanceof Error ? err.message : String(err)}`, { path: dir });
      }
    }
  }

  /** Resolve the requested level, falling back to the configured default. */
  resolveLevel(requested?: string): string {
    if (requested === undefined) return this.config.defaultLevel;
    if (this.config.analysisLevels.includes(requested)) return requested;
    this.logger.warn(`Invalid analysis level. Using default: ${this.config.defaultLevel}`);
    return this.config.defaultLevel;
  }

  async analyzeDisease(disease: string, options: AnalyzeOptions = {}): Promise<AnalysisRun> {
    const name = disease.trim();
    if (!name) {
      throw new AnalysisError('Disease name must not be empty');
    }
    this.logger.info(`Starting analysis of ${name}...`);

    const level = this.resolveLevel(options.analysisLevel);
    const timestamp = formatTimestamp(this.now());
    const dataSources = options.dataSources ?? [];

    await this.stage('retrieve', `Retrieving information about ${name}...`, () => {
      const info = this.knowledge.getDisease(name);
      if (info.is_placeholder === true) {
        this.logger.debug(`Using placeholder disease information for ${name}`);
      }
    });

    let datasets: DatasetStatus[] = [];
    await this.stage('preprocess', 'Loading and preprocessing datasets...', () => {
      datasets = dataSources.map((source) => this.loadSource(source, name));
    });

    await this.stage('integrate', 'Integrating multi-omics data...');
    await this.stage('pathways', 'Identifying affected pathways...');
    await this.stage('targets', 'Identifying therapeutic targets...');
    await this.stage('drugs', 'Predicting potential drug candidates...');

    const result: AnalysisResult = {
      disease: name,
      timestamp,
      analysis_level: level,
      data_sources: [...dataSources],
      results: {
        pathways: [...AFFECTED_PATHWAYS],
        targets: [...THERAPEUTIC_TARGETS],
        drugs: [...DRUG_CANDIDATES],
        datasets,
      },
    };

    const artifacts = this.writeArtifacts(result);
    this.logger.info(`Analysis complete. Results saved to ${artifacts.resultFile}`);
    this.logger.info(`Summary available at ${artifacts.summaryFile}`);
    return { ...artifacts, result };
  }

  async runSimulation(disease: string, treatmentId?: string): Promise<SimulationResult> {
    this.logger.info(`Running simulation for ${disease}...`);
    await this.stage('simulate', 'Simulating system dynamics...');
    this.logger.info('Simulation completed');
    return {
      status: 'completed',
      disease,
      treatment: treatmentId ?? null,
      simulation_time: STAGE_DELAYS_MS.simulate / 1000,
    };
  }

  async validateResults(disease: string, result: AnalysisResult): Promise<number> {
    this.logger.info(`Validating results for ${disease}...`);
    await this.stage('validate', 'Comparing findings against known data...', () => {
      const known = this.knowledge.getValidationData(disease);
      const matched = result.results.targets.filter((t) => known.known_genes.includes(t)).length;
      this.logger.debug(`${matched} of ${result.results.targets.length} targets are known genes`);
    });
    this.logger.info(`Validation completed. Score: ${VALIDATION_SCORE.toFixed(2)}`);
    return VALIDATION_SCORE;
  }

  /**
   * Analyze, then optionally simulate and validate. The result file and
   * summary are rewritten to include the extra sections.
   */
  async run(disease: string, options: RunOptions = {}): Promise<AnalysisRun> {
    const analysis = await this.analyzeDisease(disease, options);
    const result = analysis.result;
    if (!options.simulate && !options.validate) return analysis;

    if (options.simulate) {
      result.simulation = await this.runSimulation(result.disease, options.treatment);
    }
    if (options.validate) {
      result.validation_score = await this.validateResults(result.disease, result);
    }
    return { ...this.writeArtifacts(result), result };
  }

  shutdown(): void {
    if (this.closed) return;
    this.closed = true;
    this.logger.info('Shutting down REASON system...');
    this.datasets.shutdown();
    this.knowledge.shutdown();
    this.logger.info('REASON system shut down successfully.');
  }

  // ─── Internals ──────────────────────────────────────────────────────────────

  private loadSource(source: string, disease: string): DatasetStatus {
    const doc = this.datasets.load(source, disease, this.config.cacheEnabled);
    if (isErrorDocument(doc)) {
      this.logger.warn(`Dataset ${source} unavailable: ${doc.error}`);
      return { source, status: 'error', error: doc.error };
    }
    return { source, status: doc.is_placeholder === true ? 'placeholder' : 'loaded' };
  }

  private async stage(name: StageName, message: string, work?: () => void): Promise<void> {
    this.logger.info(message);
    this.onStage?.({ stage: name, message, phase: 'start' });
    work?.();
    const ms = STAGE_DELAYS_MS[name] * this.config.stageDelayScale;
    if (ms > 0) await this.sleep(ms);
    this.onStage?.({ stage: name, message, phase: 'complete' });
  }

  private writeArtifacts(result: AnalysisResult): AnalysisArtifacts {
    const resultId = resultIdFor(result.disease, result.timestamp);
    const resultFile = path.join(this.config.resultsDir, `${resultId}.json`);
    const summaryFile = path.join(this.config.resultsDir, `${resultId}_summary.txt`);
    try {
      fs.mkdirSync(this.config.resultsDir, { recursive: true });
      fs.writeFileSync(resultFile, JSON.stringify(result, null, 2), 'utf-8');
      fs.writeFileSync(summaryFile, formatSummary(result), 'utf-8');
    } catch (err) {
      throw new StorageError(`Failed to write analysis results: ${err instanceof Error ? err.message : String(err)}`, {
        path: this.config.resultsDir,
      });
    }
    return { resultId, resultFile, summaryFile };
  }
}
