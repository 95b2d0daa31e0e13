/**
 * REASON Knowledge Store
 *
 * Disease, pathway, drug, literature and validation lookups with the same
 * cache-or-placeholder contract as the dataset store. Only diseases are
 * read from disk; the other kinds are always synthesized.
 *
 * Disease read failures are settled by `readFailurePolicy` ("substitute"):
 * they are logged and answered with a placeholder, so callers cannot tell
 * a corrupt file from a missing one.
 */

import fs from 'fs';
import path from 'path';
import { Logger } from '../logging/index.js';
import { DocumentCache } from '../storage/cache-manager.js';
import type { CacheStats } from '../storage/cache-manager.js';
import { parseJsonObject } from '../storage/json.js';
import { settleReadFailure } from '../storage/read-policy.js';
import type { ReadFailurePolicy } from '../storage/read-policy.js';
import {
  diseasePlaceholder,
  drugPlaceholder,
  pathwayPlaceholder,
  publicationPlaceholders,
  validationPlaceholder,
} from './placeholders.js';
import { KNOWLEDGE_KINDS } from './types.js';
import type {
  DiseaseRecord,
  DrugRecord,
  KnowledgeKind,
  PathwayRecord,
  PublicationRecord,
  ValidationRecord,
} from './types.js';

export interface KnowledgeStoreOptions {
  /** Default: data */
  dataDir?: string;
  logger?: Logger;
}

export class KnowledgeStore {
  static readonly readFailurePolicy: ReadFailurePolicy = 'substitute';

  readonly dataDir: string;
  private readonly logger: Logger;
  private readonly diseases = new DocumentCache<DiseaseRecord>();
  private readonly pathways = new DocumentCache<PathwayRecord>();
  private readonly drugs = new DocumentCache<DrugRecord>();

  constructor(options: KnowledgeStoreOptions = {}) {
    this.dataDir = options.dataDir ?? 'data';
    this.logger = options.logger ?? new Logger('REASON.KnowledgeStore');

    for (const kind of KNOWLEDGE_KINDS) {
      fs.mkdirSync(this.directoryFor(kind), { recursive: true });
    }

    this.logger.info('Knowledge Store initialized');
  }

  directoryFor(kind: KnowledgeKind): string {
    return path.join(this.dataDir, kind);
  }

  /** `<root>/diseases/<name with spaces replaced by underscores>.json` */
  diseasePath(name: string): string {
    return path.join(this.directoryFor('diseases'), `${name.replaceAll(' ', '_')}.json`);
  }

  getDisease(name: string): DiseaseRecord {
    const key = DocumentCache.compositeKey('disease', name);
    const cached = this.diseases.get(key);
    if (cached !== undefined) return cached;

    const file = this.diseasePath(name);
    if (fs.existsSync(file)) {
      try {
        const info = parseJsonObject(fs.readFileSync(file, 'utf-8'));
        this.diseases.set(key, info);
        return info;
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        this.logger.error(`Error loading disease information: ${message}`);
        return settleReadFailure(KnowledgeStore.readFailurePolicy, message, () => this.diseaseFallback(key, name));
      }
    }

    return this.diseaseFallback(key, name);
  }

  private diseaseFallback(key: string, name: string): DiseaseRecord {
    this.logger.info(`Creating placeholder data for disease: ${name}`);
    const info = diseasePlaceholder(name);
    this.diseases.set(key, info);
    return info;
  }

  getPathway(id: string): PathwayRecord {
    const key = DocumentCache.compositeKey('pathway', id);
    const cached = this.pathways.get(key);
    if (cached !== undefined) return cached;

    const info = pathwayPlaceholder(id);
    this.pathways.set(key, info);
    return info;
  }

  getDrug(id: string): DrugRecord {
    const key = DocumentCache.compositeKey('drug', id);
    const cached = this.drugs.get(key);
    if (cached !== undefined) return cached;

    const info = drugPlaceholder(id);
    this.drugs.set(key, info);
    return info;
  }

  /** At most five synthetic publications per call; results are not cached. */
  searchLiterature(query: string, maxResults = 10): PublicationRecord[] {
    return publicationPlaceholders(query, maxResults);
  }

  /**
   * Known genes, pathways and treatments to validate against.
   * The record does not depend on the disease yet.
   */
  getValidationData(_disease: string): ValidationRecord {
    return validationPlaceholder();
  }

  clearCache(): void {
    this.diseases.clear();
    this.pathways.clear();
    this.drugs.clear();
    this.logger.debug('Knowledge cache cleared');
  }

  /** Combined statistics over the disease, pathway and drug caches. */
  getCacheStats(): CacheStats {
    const parts = [this.diseases, this.pathways, this.drugs].map((c) => c.getStats());
    const hits = parts.reduce((sum, s) => sum + s.hits, 0);
    const misses = parts.reduce((sum, s) => sum + s.misses, 0);
    return {
      entryCount: parts.reduce((sum, s) => sum + s.entryCount, 0),
      hits,
      misses,
      hitRate: hits + misses === 0 ? 0 : hits / (hits + misses),
    };
  }

  shutdown(): void {
    this.clearCache();
    this.logger.info('Knowledge Store resources released');
  }
}
