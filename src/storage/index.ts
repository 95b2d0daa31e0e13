/**
 * REASON Storage
 *
 * Barrel export for the document cache and the dataset store.
 */

export { DocumentCache } from './cache-manager.js';
export type { CacheStats } from './cache-manager.js';

export { DatasetStore, isErrorDocument } from './dataset-store.js';
export type { DatasetStoreOptions, DatasetDocument, DatasetErrorDocument } from './dataset-store.js';

export { DATASET_PLACEHOLDERS, GENERIC_PLACEHOLDER, placeholderFor } from './placeholders.js';
export type { PlaceholderGenerator } from './placeholders.js';

export { isJsonObject, parseJsonObject } from './json.js';
export type { JsonValue, JsonObject, JsonPrimitive } from './json.js';

export { settleReadFailure } from './read-policy.js';
export type { ReadFailure, ReadFailurePolicy } from './read-policy.js';
