/**
 * REASON Knowledge
 *
 * Barrel export for the knowledge store and its record types.
 */

export { KnowledgeStore } from './knowledge-store.js';
export type { KnowledgeStoreOptions } from './knowledge-store.js';
export { MAX_LITERATURE_RESULTS, LITERATURE_BASE_YEAR } from './placeholders.js';
export { KNOWLEDGE_KINDS } from './types.js';
export type {
  KnowledgeKind,
  DiseaseRecord,
  DiseasePlaceholder,
  PathwayRecord,
  InteractionType,
  DrugRecord,
  PublicationRecord,
  ValidationRecord,
} from './types.js';
