/**
 * Storage Tests
 *
 * DocumentCache: composite keys, hit/miss accounting
 * DatasetStore: path resolution, load/cache/placeholder/error, save
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import os from 'os';
import fs from 'fs';
import path from 'path';
import { DocumentCache } from './cache-manager.js';
import { DatasetStore, isErrorDocument } from './dataset-store.js';
import { DATASET_PLACEHOLDERS, placeholderFor, GENERIC_PLACEHOLDER } from './placeholders.js';
import { parseJsonObject } from './json.js';
import { settleReadFailure } from './read-policy.js';
import { Logger } from '../logging/index.js';

// ─── Fixtures ────────────────────────────────────────────────────────────────

function tmpDataDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'reason-data-'));
}

function quietLogger(): Logger {
  return new Logger('REASON.DatasetStore', { level: 'error' });
}

// ─── DocumentCache ───────────────────────────────────────────────────────────

describe('DocumentCache', () => {
  it('compositeKey joins category and sub-key with an underscore', () => {
    expect(DocumentCache.compositeKey('gene_expression', 'Asthma')).toBe('gene_expression_Asthma');
  });

  it('compositeKey returns the bare category without a sub-key', () => {
    expect(DocumentCache.compositeKey('proteomics')).toBe('proteomics');
    expect(DocumentCache.compositeKey('proteomics', '')).toBe('proteomics');
  });

  it('get returns undefined for a missing key and counts a miss', () => {
    const cache = new DocumentCache<number>();
    expect(cache.get('nope')).toBeUndefined();
    expect(cache.getStats()).toEqual({ entryCount: 0, hits: 0, misses: 1, hitRate: 0 });
  });

  it('tracks hits and hit rate', () => {
    const cache = new DocumentCache<string>();
    cache.set('a', 'value');
    cache.get('a');
    cache.get('a');
    cache.get('b');
    const stats = cache.getStats();
    expect(stats.entryCount).toBe(1);
    expect(stats.hits).toBe(2);
    expect(stats.misses).toBe(1);
    expect(stats.hitRate).toBeCloseTo(2 / 3);
  });

  it('clear removes every entry', () => {
    const cache = new DocumentCache<number>();
    cache.set('a', 1);
    cache.set('b', 2);
    cache.clear();
    expect(cache.getStats().entryCount).toBe(0);
    expect(cache.get('a')).toBeUndefined();
  });
});

// ─── Placeholders ────────────────────────────────────────────────────────────

describe('placeholderFor', () => {
  it('returns the registered generator for known types', () => {
    expect(placeholderFor('pathways')).toBe(DATASET_PLACEHOLDERS.pathways);
  });

  it('falls back to the generic generator for unknown types', () => {
    expect(placeholderFor('metabolomics')).toBe(GENERIC_PLACEHOLDER);
    expect(placeholderFor('toString')).toBe(GENERIC_PLACEHOLDER);
  });
});

describe('parseJsonObject', () => {
  it('rejects a JSON array root', () => {
    expect(() => parseJsonObject('[1, 2]')).toThrow('Expected a JSON object, got array');
  });

  it('rejects malformed JSON', () => {
    expect(() => parseJsonObject('{ nope')).toThrow();
  });
});

describe('settleReadFailure', () => {
  it('surface returns the error document without building a substitute', () => {
    const substitute = vi.fn(() => ({ is_placeholder: true }));
    expect(settleReadFailure('surface', 'Unexpected token', substitute)).toEqual({ error: 'Unexpected token' });
    expect(substitute).not.toHaveBeenCalled();
  });

  it('substitute returns the substitute document', () => {
    const doc = { is_placeholder: true };
    expect(settleReadFailure('substitute', 'Unexpected token', () => doc)).toBe(doc);
  });
});

// ─── DatasetStore ────────────────────────────────────────────────────────────

describe('DatasetStore', () => {
  let dataDir: string;
  let store: DatasetStore;

  beforeEach(() => {
    dataDir = tmpDataDir();
    store = new DatasetStore({ dataDir, logger: quietLogger() });
  });

  afterEach(() => {
    fs.rmSync(dataDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('uses the surface read-failure policy', () => {
    expect(DatasetStore.readFailurePolicy).toBe('surface');
  });

  it('defaults the data directory to "data"', () => {
    const s = new DatasetStore({ logger: quietLogger() });
    expect(s.dataDir).toBe('data');
  });

  describe('resolvePath', () => {
    it('joins root, data type and <name>.json', () => {
      expect(store.resolvePath('gene_expression', 'Asthma')).toBe(
        path.join(dataDir, 'gene_expression', 'Asthma.json')
      );
    });

    it('returns the data type directory when no name is given', () => {
      expect(store.resolvePath('proteomics')).toBe(path.join(dataDir, 'proteomics'));
    });

    it('is pure: identical inputs give identical paths and touch nothing', () => {
      const a = store.resolvePath('pathways', 'Lupus');
      const b = store.resolvePath('pathways', 'Lupus');
      expect(a).toBe(b);
      expect(fs.existsSync(path.join(dataDir, 'pathways'))).toBe(false);
    });
  });

  describe('generatePlaceholder', () => {
    it('gene_expression has 3 genes and 3 matching values', () => {
      const doc = store.generatePlaceholder('gene_expression', 'X');
      expect(doc).toEqual({
        type: 'gene_expression',
        disease: 'X',
        genes: ['GENE1', 'GENE2', 'GENE3'],
        values: [1.2, -0.8, 2.5],
        is_placeholder: true,
      });
    });

    it('is deterministic across calls', () => {
      expect(store.generatePlaceholder('gene_expression', 'X')).toEqual(
        store.generatePlaceholder('gene_expression', 'X')
      );
      expect(store.generatePlaceholder('pathways')).toEqual(store.generatePlaceholder('pathways'));
    });

    it('proteomics has 3 proteins with values', () => {
      const doc = store.generatePlaceholder('proteomics', 'X');
      expect(doc.proteins).toEqual(['PROT1', 'PROT2', 'PROT3']);
      expect(doc.values).toEqual([0.9, 1.5, -1.1]);
      expect(doc.is_placeholder).toBe(true);
    });

    it('pathways lists three pathways', () => {
      const doc = store.generatePlaceholder('pathways', 'X');
      expect(doc.pathways).toEqual([
        { id: 'PW1', name: 'Inflammatory Response', genes: ['GENE1', 'GENE2'] },
        { id: 'PW2', name: 'Cell Cycle', genes: ['GENE3', 'GENE4'] },
        { id: 'PW3', name: 'Apoptosis', genes: ['GENE2', 'GENE5'] },
      ]);
    });

    it('unknown types get the generic shape', () => {
      expect(store.generatePlaceholder('clinical', 'Gout')).toEqual({
        type: 'clinical',
        disease: 'Gout',
        note: 'Placeholder data',
        is_placeholder: true,
      });
    });

    it('records a null disease when no name is given', () => {
      expect(store.generatePlaceholder('clinical').disease).toBeNull();
    });
  });

  describe('load', () => {
    it('returns a placeholder for a missing file and serves it from cache', () => {
      const first = store.load('gene_expression', 'Asthma');
      expect(first.is_placeholder).toBe(true);

      const exists = vi.spyOn(fs, 'existsSync');
      const second = store.load('gene_expression', 'Asthma');
      expect(second).toBe(first);
      expect(exists).not.toHaveBeenCalled();
    });

    it('does not cache when useCache is false', () => {
      const first = store.load('gene_expression', 'Asthma', false);
      const second = store.load('gene_expression', 'Asthma', false);
      expect(second).toEqual(first);
      expect(second).not.toBe(first);
      expect(store.getCacheStats().entryCount).toBe(0);
    });

    it('loads a stored document verbatim without a placeholder marker', () => {
      const file = store.resolvePath('gene_expression', 'Asthma');
      fs.mkdirSync(path.dirname(file), { recursive: true });
      fs.writeFileSync(file, JSON.stringify({ genes: ['IL4'], values: [3.1] }), 'utf-8');

      const doc = store.load('gene_expression', 'Asthma');
      expect(doc).toEqual({ genes: ['IL4'], values: [3.1] });
      expect('is_placeholder' in doc).toBe(false);
    });

    it('keeps a placeholder marker the stored file itself set', () => {
      store.save({ is_placeholder: true, note: 'seeded' }, 'clinical', 'Gout');
      expect(store.load('clinical', 'Gout', false)).toEqual({ is_placeholder: true, note: 'seeded' });
    });

    it('returns an error document for malformed JSON and does not cache it', () => {
      const file = store.resolvePath('proteomics', 'Broken');
      fs.mkdirSync(path.dirname(file), { recursive: true });
      fs.writeFileSync(file, '{ not json', 'utf-8');

      const doc = store.load('proteomics', 'Broken');
      expect(isErrorDocument(doc)).toBe(true);
      expect(typeof doc.error).toBe('string');
      expect(store.getCacheStats().entryCount).toBe(0);

      fs.writeFileSync(file, JSON.stringify({ proteins: ['P1'] }), 'utf-8');
      expect(store.load('proteomics', 'Broken')).toEqual({ proteins: ['P1'] });
    });

    it('keys data types apart when sub-keys collide', () => {
      const genes = store.load('gene_expression', 'Flu');
      const proteins = store.load('proteomics', 'Flu');
      expect(genes).not.toBe(proteins);
      expect(genes.type).toBe('gene_expression');
      expect(proteins.type).toBe('proteomics');
      expect(store.getCacheStats().entryCount).toBe(2);
    });

    it('loads by data type alone when no name is given', () => {
      const doc = store.load('clinical');
      expect(doc).toEqual({ type: 'clinical', disease: null, note: 'Placeholder data', is_placeholder: true });
    });
  });

  describe('save', () => {
    it('round-trips through load without the cache', () => {
      const doc = { genes: ['TP53', 'BRCA1'], values: [0.5, -2], meta: { source: 'lab' } };
      expect(store.save(doc, 'gene_expression', 'Melanoma')).toBe(true);
      expect(store.load('gene_expression', 'Melanoma', false)).toEqual(doc);
    });

    it('writes 2-space indented JSON', () => {
      store.save({ a: 1 }, 'misc', 'fmt');
      expect(fs.readFileSync(store.resolvePath('misc', 'fmt'), 'utf-8')).toBe('{\n  "a": 1\n}');
    });

    it('creates intermediate directories', () => {
      const nested = new DatasetStore({ dataDir: path.join(dataDir, 'deep', 'er'), logger: quietLogger() });
      expect(nested.save({ ok: true }, 'kind', 'name')).toBe(true);
      expect(fs.existsSync(path.join(dataDir, 'deep', 'er', 'kind', 'name.json'))).toBe(true);
    });

    it('returns false and logs when the write fails', () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      // A regular file where the data type directory should be
      fs.writeFileSync(path.join(dataDir, 'blocked'), 'x', 'utf-8');
      expect(store.save({ a: 1 }, 'blocked', 'name')).toBe(false);
      expect(errorSpy).toHaveBeenCalledTimes(1);
      expect(String(errorSpy.mock.calls[0][0])).toContain('Error saving data to');
    });
  });

  describe('clearCache / shutdown', () => {
    it('clearCache forces the next load to re-read from disk', () => {
      store.save({ version: 1 }, 'clinical', 'Gout');
      expect(store.load('clinical', 'Gout')).toEqual({ version: 1 });

      store.save({ version: 2 }, 'clinical', 'Gout');
      expect(store.load('clinical', 'Gout')).toEqual({ version: 1 });

      store.clearCache();
      expect(store.load('clinical', 'Gout')).toEqual({ version: 2 });
    });

    it('shutdown empties the cache and can be called twice', () => {
      store.load('gene_expression', 'Asthma');
      store.shutdown();
      store.shutdown();
      expect(store.getCacheStats().entryCount).toBe(0);
    });
  });
});
