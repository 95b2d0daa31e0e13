/**
 * Knowledge record shapes.
 *
 * Declared as type aliases so every record is assignable to JsonObject
 * and can be written to disk unchanged.
 */

import type { JsonObject } from '../storage/json.js';

export type KnowledgeKind = 'diseases' | 'pathways' | 'drugs' | 'targets' | 'publications';

export const KNOWLEDGE_KINDS: readonly KnowledgeKind[] = [
  'diseases',
  'pathways',
  'drugs',
  'targets',
  'publications',
];

/** A disease record read from disk is returned verbatim, whatever its shape. */
export type DiseaseRecord = JsonObject;

export type DiseasePlaceholder = {
  name: string;
  description: string;
  categories: string[];
  icd10: string;
  symptoms: { name: string; prevalence: 'common' | 'uncommon' | 'rare' }[];
  associated_genes: { id: string; name: string; evidence: 'strong' | 'moderate' | 'weak' }[];
  prevalence: string;
  risk_factors: string[];
  treatments: { id: string; name: string; type: 'drug' | 'procedure' }[];
  is_placeholder: true;
};

export type InteractionType = 'activation' | 'inhibition' | 'binding';

export type PathwayRecord = {
  id: string;
  name: string;
  description: string;
  genes: string[];
  interactions: { source: string; target: string; type: InteractionType }[];
  is_placeholder: true;
};

export type DrugRecord = {
  id: string;
  name: string;
  description: string;
  mechanism: string;
  targets: string[];
  indications: string[];
  contraindications: string[];
  side_effects: string[];
  is_placeholder: true;
};

export type PublicationRecord = {
  id: string;
  title: string;
  authors: string[];
  journal: string;
  year: number;
  abstract: string;
  url: string;
  is_placeholder: true;
};

export type ValidationRecord = {
  known_genes: string[];
  known_pathways: string[];
  known_treatments: string[];
  is_placeholder: true;
};
