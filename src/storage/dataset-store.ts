/**
 * REASON Dataset Store
 *
 * Typed datasets under <root>/<dataType>/<name>.json, fronted by an
 * in-memory cache. A missing file is not an error: it yields a
 * placeholder document marked `is_placeholder: true`.
 *
 * Read failures are settled by `readFailurePolicy` ("surface"): the
 * caller receives `{ error: message }` and nothing is cached.
 */

import fs from 'fs';
import path from 'path';
import { Logger } from '../logging/index.js';
import { DocumentCache } from './cache-manager.js';
import type { CacheStats } from './cache-manager.js';
import { parseJsonObject } from './json.js';
import type { JsonObject } from './json.js';
import { placeholderFor } from './placeholders.js';
import { settleReadFailure } from './read-policy.js';
import type { ReadFailure, ReadFailurePolicy } from './read-policy.js';

export interface DatasetStoreOptions {
  /** Default: data */
  dataDir?: string;
  logger?: Logger;
}

export type DatasetDocument = JsonObject;

/** Returned by load() when a stored file exists but cannot be read. */
export type DatasetErrorDocument = ReadFailure;

export function isErrorDocument(doc: DatasetDocument): doc is DatasetErrorDocument {
  return Object.keys(doc).length === 1 && typeof doc.error === 'string';
}

export class DatasetStore {
  static readonly readFailurePolicy: ReadFailurePolicy = 'surface';

  readonly dataDir: string;
  private readonly cache = new DocumentCache<DatasetDocument>();
  private readonly logger: Logger;

  constructor(options: DatasetStoreOptions = {}) {
    this.dataDir = options.dataDir ?? 'data';
    this.logger = options.logger ?? new Logger('REASON.DatasetStore');
    this.logger.info(`DatasetStore initialized with data directory: ${this.dataDir}`);
  }

  /**
   * Path of a dataset file, or of the data type's directory when no
   * name is given. Performs no I/O.
   */
  resolvePath(dataType: string, name?: string): string {
    const base = path.join(this.dataDir, dataType);
    return name ? path.join(base, `${name}.json`) : base;
  }

  load(dataType: string, name?: string, useCache = true): DatasetDocument {
    const key = DocumentCache.compositeKey(dataType, name);

    if (useCache) {
      const cached = this.cache.get(key);
      if (cached !== undefined) {
        this.logger.debug(`Using cached data for ${key}`);
        return cached;
      }
    }

    const dataPath = this.resolvePath(dataType, name);

    if (!fs.existsSync(dataPath)) {
      this.logger.warn(`Data file not found: ${dataPath}`);
      return this.placeholderEntry(key, dataType, name, useCache);
    }

    try {
      this.logger.info(`Loading data from ${dataPath}`);
      const data = parseJsonObject(fs.readFileSync(dataPath, 'utf-8'));
      if (useCache) this.cache.set(key, data);
      return data;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error(`Error loading data from ${dataPath}: ${message}`);
      return settleReadFailure(DatasetStore.readFailurePolicy, message, () =>
        this.placeholderEntry(key, dataType, name, useCache)
      );
    }
  }

  private placeholderEntry(key: string, dataType: string, name: string | undefined, useCache: boolean): DatasetDocument {
    const placeholder = this.generatePlaceholder(dataType, name);
    if (useCache) this.cache.set(key, placeholder);
    return placeholder;
  }

  /** Deterministic synthetic document for a data type. */
  generatePlaceholder(dataType: string, name?: string): DatasetDocument {
    return placeholderFor(dataType)(dataType, name ?? null);
  }

  /**
   * Write a document as indented JSON, creating directories as needed.
   * Returns false instead of throwing when the write fails.
   */
  save(document: JsonObject, dataType: string, name: string): boolean {
    const dataPath = this.resolvePath(dataType, name);
    try {
      fs.mkdirSync(path.dirname(dataPath), { recursive: true });
      fs.writeFileSync(dataPath, JSON.stringify(document, null, 2), 'utf-8');
      this.logger.info(`Data saved to ${dataPath}`);
      return true;
    } catch (err) {
      this.logger.error(`Error saving data to ${dataPath}: ${err instanceof Error ? err.message : String(err)}`);
      return false;
    }
  }

  clearCache(): void {
    this.cache.clear();
    this.logger.debug('Data cache cleared');
  }

  getCacheStats(): CacheStats {
    return this.cache.getStats();
  }

  shutdown(): void {
    this.clearCache();
    this.logger.info('DatasetStore resources released');
  }
}
