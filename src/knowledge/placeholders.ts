/**
 * Placeholder knowledge generators. All of them are deterministic.
 */

import type {
  DiseasePlaceholder,
  DrugRecord,
  PathwayRecord,
  PublicationRecord,
  ValidationRecord,
} from './types.js';

/** Upper bound on synthetic literature results, whatever the caller asks for. */
export const MAX_LITERATURE_RESULTS = 5;
export const LITERATURE_BASE_YEAR = 2021;

export function diseasePlaceholder(name: string): DiseasePlaceholder {
  return {
    name,
    description: 'A condition characterized by abnormal function or structure.',
    categories: ['example_category'],
    icd10: 'X00.0',
    symptoms: [
      { name: 'Symptom 1', prevalence: 'common' },
      { name: 'Symptom 2', prevalence: 'uncommon' },
      { name: 'Symptom 3', prevalence: 'rare' },
    ],
    associated_genes: [
      { id: 'GENE1', name: 'Gene 1', evidence: 'strong' },
      { id: 'GENE2', name: 'Gene 2', evidence: 'moderate' },
      { id: 'GENE3', name: 'Gene 3', evidence: 'weak' },
    ],
    prevalence: '5 in 100,000',
    risk_factors: ['Risk factor 1', 'Risk factor 2'],
    treatments: [
      { id: 'TREATMENT1', name: 'Treatment 1', type: 'drug' },
      { id: 'TREATMENT2', name: 'Treatment 2', type: 'procedure' },
    ],
    is_placeholder: true,
  };
}

export function pathwayPlaceholder(id: string): PathwayRecord {
  return {
    id,
    name: `Pathway ${id}`,
    description: 'Biological pathway involved in cellular function',
    genes: ['GENE1', 'GENE2', 'GENE3', 'GENE4'],
    interactions: [
      { source: 'GENE1', target: 'GENE2', type: 'activation' },
      { source: 'GENE2', target: 'GENE3', type: 'inhibition' },
      { source: 'GENE3', target: 'GENE4', type: 'binding' },
    ],
    is_placeholder: true,
  };
}

export function drugPlaceholder(id: string): DrugRecord {
  return {
    id,
    name: `Drug ${id}`,
    description: 'Pharmaceutical compound used for treatment',
    mechanism: 'Inhibits protein function',
    targets: ['TARGET1', 'TARGET2'],
    indications: ['Disease 1', 'Disease 2'],
    contraindications: ['Condition 1', 'Condition 2'],
    side_effects: ['Side effect 1', 'Side effect 2'],
    is_placeholder: true,
  };
}

export function publicationPlaceholders(query: string, maxResults: number): PublicationRecord[] {
  const count = Math.max(0, Math.min(Math.floor(maxResults), MAX_LITERATURE_RESULTS));
  return Array.from({ length: count }, (_, i) => ({
    id: `PUB${i + 1}`,
    title: `Research on ${query} - Study ${i + 1}`,
    authors: ['Author A', 'Author B'],
    journal: 'Journal of Medical Research',
    year: LITERATURE_BASE_YEAR + (i % 3),
    abstract: `This study investigates ${query} and its effects on health.`,
    url: `https://example.com/publication${i + 1}`,
    is_placeholder: true as const,
  }));
}

export function validationPlaceholder(): ValidationRecord {
  return {
    known_genes: ['GENE1', 'GENE2'],
    known_pathways: ['PW1', 'PW2'],
    known_treatments: ['TREATMENT1'],
    is_placeholder: true,
  };
}
