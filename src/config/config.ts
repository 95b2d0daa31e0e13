/**
 * REASON Configuration System
 *
 * Manages the JSON config file (default ./reason.config.json).
 * Supports environment variable overrides.
 */

import fs from 'fs';
import path from 'path';
import { ConfigurationError } from '../errors/index.js';
import { isLogLevel, Logger, LOG_LEVELS } from '../logging/index.js';
import type { LogLevel } from '../logging/index.js';
import { isJsonObject } from '../storage/json.js';
import type { JsonObject } from '../storage/json.js';

export type AnalysisLevel = 'basic' | 'standard' | 'comprehensive';

export const ANALYSIS_LEVELS: readonly AnalysisLevel[] = ['basic', 'standard', 'comprehensive'];

export interface ReasonConfig {
  /** Default: data */
  dataDir: string;
  /** Default: results */
  resultsDir: string;
  /** Default: models */
  modelsDir: string;
  analysisLevels: string[];
  /** Default: standard */
  defaultLevel: string;
  /** When false, datasets are always read fresh. Default: true */
  cacheEnabled: boolean;
  /** Default: 4 */
  maxThreads: number;
  apiKeys: Record<string, string>;
  /** Multiplier applied to every simulated stage delay. 0 disables delays. Default: 1 */
  stageDelayScale: number;
  /** Default: info */
  logLevel: LogLevel;
  /** Mirror log lines to this file when set. */
  logFile?: string;
}

export const DEFAULT_CONFIG_FILE = 'reason.config.json';

export class ConfigManager {
  readonly configPath: string;

  constructor(configPath?: string) {
    this.configPath = configPath ?? path.resolve(DEFAULT_CONFIG_FILE);
  }

  /**
   * Load config from disk. Returns defaults if file doesn't exist.
   */
  load(): ReasonConfig {
    if (!fs.existsSync(this.configPath)) {
      return ConfigManager.defaults();
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.configPath, 'utf-8'));
    } catch (err) {
      throw new ConfigurationError(
        `Failed to read config at ${this.configPath}: ${err instanceof Error ? err.message : String(err)}`,
        { path: this.configPath }
      );
    }
    if (!isJsonObject(parsed)) {
      throw new ConfigurationError(`Config at ${this.configPath} must be a JSON object`, {
        path: this.configPath,
      });
    }
    return this.merge(ConfigManager.defaults(), parsed);
  }

  /**
   * Save config to disk, creating parent directories as needed.
   */
  save(config: ReasonConfig): void {
    const dir = path.dirname(this.configPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(this.configPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
  }

  /**
   * Validate a config object. Returns errors array; empty means valid.
   */
  validate(config: Partial<ReasonConfig>): { valid: boolean; errors: string[] } {
    const errors: string[] = [];

    const levels = config.analysisLevels ?? [...ANALYSIS_LEVELS];
    if (levels.length === 0) {
      errors.push('analysisLevels must list at least one level');
    }
    if (config.defaultLevel !== undefined && !levels.includes(config.defaultLevel)) {
      errors.push(`defaultLevel must be one of ${levels.join(' | ')}, got: ${config.defaultLevel}`);
    }

    if (
      config.maxThreads !== undefined &&
      (!Number.isInteger(config.maxThreads) || config.maxThreads < 1)
    ) {
      errors.push('maxThreads must be a positive integer');
    }

    if (
      config.stageDelayScale !== undefined &&
      (!Number.isFinite(config.stageDelayScale) || config.stageDelayScale < 0)
    ) {
      errors.push('stageDelayScale must be a non-negative number');
    }

    if (config.logLevel !== undefined && !isLogLevel(config.logLevel)) {
      errors.push(`logLevel must be ${LOG_LEVELS.join(' | ')}`);
    }

    for (const key of ['dataDir', 'resultsDir', 'modelsDir'] as const) {
      const value = config[key];
      if (value !== undefined && value.trim() === '') {
        errors.push(`${key} must not be empty`);
      }
    }

    return { valid: errors.length === 0, errors };
  }

  /**
   * Load config, then apply environment variable overrides.
   *
   * Supported env vars:
   *   REASON_DATA_DIR, REASON_RESULTS_DIR, REASON_MODELS_DIR,
   *   REASON_DEFAULT_LEVEL, REASON_CACHE_ENABLED, REASON_MAX_THREADS,
   *   REASON_STAGE_DELAY_SCALE, REASON_LOG_LEVEL, REASON_LOG_FILE
   */
  loadWithEnvOverrides(): ReasonConfig {
    return this.applyEnvOverrides(this.load());
  }

  /**
   * loadWithEnvOverrides(), except that a config file which cannot be read,
   * parsed or merged is logged and replaced by the defaults.
   */
  loadWithFallback(logger: Logger = new Logger('REASON.Core')): ReasonConfig {
    try {
      return this.loadWithEnvOverrides();
    } catch (err) {
      if (!(err instanceof ConfigurationError) || err.context?.path !== this.configPath) throw err;
      logger.error(`Error loading configuration: ${err.message}`);
      logger.info('Using default configuration');
      return this.applyEnvOverrides(ConfigManager.defaults());
    }
  }

  private applyEnvOverrides(config: ReasonConfig): ReasonConfig {
    const env = process.env;

    if (env.REASON_DATA_DIR) config.dataDir = env.REASON_DATA_DIR;
    if (env.REASON_RESULTS_DIR) config.resultsDir = env.REASON_RESULTS_DIR;
    if (env.REASON_MODELS_DIR) config.modelsDir = env.REASON_MODELS_DIR;
    if (env.REASON_DEFAULT_LEVEL) config.defaultLevel = env.REASON_DEFAULT_LEVEL;
    if (env.REASON_CACHE_ENABLED) {
      config.cacheEnabled = !['0', 'false', 'no', 'off'].includes(env.REASON_CACHE_ENABLED.toLowerCase());
    }
    if (env.REASON_MAX_THREADS) config.maxThreads = parseInt(env.REASON_MAX_THREADS, 10);
    if (env.REASON_STAGE_DELAY_SCALE) config.stageDelayScale = parseFloat(env.REASON_STAGE_DELAY_SCALE);
    if (env.REASON_LOG_LEVEL) {
      const level = env.REASON_LOG_LEVEL.toLowerCase();
      if (!isLogLevel(level)) {
        throw new ConfigurationError(`REASON_LOG_LEVEL must be ${LOG_LEVELS.join(' | ')}, got: ${level}`);
      }
      config.logLevel = level;
    }
    if (env.REASON_LOG_FILE) config.logFile = env.REASON_LOG_FILE;

    return config;
  }

  /**
   * Return a default configuration.
   */
  static defaults(): ReasonConfig {
    return {
      dataDir: 'data',
      resultsDir: 'results',
      modelsDir: 'models',
      analysisLevels: [...ANALYSIS_LEVELS],
      defaultLevel: 'standard',
      cacheEnabled: true,
      maxThreads: 4,
      apiKeys: {},
      stageDelayScale: 1,
      logLevel: 'info',
    };
  }

  /** Overlay the keys a user file sets onto the defaults. Unknown keys are ignored. */
  private merge(target: ReasonConfig, source: JsonObject): ReasonConfig {
    const result: ReasonConfig = { ...target, analysisLevels: [...target.analysisLevels] };
    const fail = (key: string, expected: string): never => {
      throw new ConfigurationError(`${key} in ${this.configPath} must be ${expected}`, {
        path: this.configPath,
      });
    };

    for (const key of ['dataDir', 'resultsDir', 'modelsDir', 'defaultLevel', 'logFile'] as const) {
      const value = source[key];
      if (value === undefined) continue;
      if (typeof value !== 'string') fail(key, 'a string');
      else result[key] = value;
    }

    for (const key of ['maxThreads', 'stageDelayScale'] as const) {
      const value = source[key];
      if (value === undefined) continue;
      if (typeof value !== 'number') fail(key, 'a number');
      else result[key] = value;
    }

    if (source.cacheEnabled !== undefined) {
      if (typeof source.cacheEnabled !== 'boolean') fail('cacheEnabled', 'a boolean');
      else result.cacheEnabled = source.cacheEnabled;
    }

    if (source.logLevel !== undefined) {
      const level = source.logLevel;
      if (typeof level !== 'string' || !isLogLevel(level)) fail('logLevel', LOG_LEVELS.join(' | '));
      else result.logLevel = level;
    }

    if (source.analysisLevels !== undefined) {
      const levels = source.analysisLevels;
      if (!Array.isArray(levels)) {
        fail('analysisLevels', 'an array of strings');
      } else {
        const names = levels.filter((l): l is string => typeof l === 'string');
        if (names.length !== levels.length) fail('analysisLevels', 'an array of strings');
        result.analysisLevels = names;
      }
    }

    if (source.apiKeys !== undefined) {
      const keys = source.apiKeys;
      if (!isJsonObject(keys)) {
        fail('apiKeys', 'an object of strings');
      } else {
        const apiKeys: Record<string, string> = {};
        for (const [name, value] of Object.entries(keys)) {
          if (typeof value !== 'string') fail(`apiKeys.${name}`, 'a string');
          else apiKeys[name] = value;
        }
        result.apiKeys = apiKeys;
      }
    }

    return result;
  }
}
