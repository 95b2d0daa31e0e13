/**
 * Placeholder dataset generators.
 *
 * Lookup table from data type to a deterministic synthetic document.
 * Unrecognised types fall back to the generic shape.
 */

import type { JsonObject } from './json.js';

export type PlaceholderGenerator = (dataType: string, disease: string | null) => JsonObject;

export const GENERIC_PLACEHOLDER: PlaceholderGenerator = (dataType, disease) => ({
  type: dataType,
  disease,
  note: 'Placeholder data',
  is_placeholder: true,
});

export const DATASET_PLACEHOLDERS: Readonly<Record<string, PlaceholderGenerator>> = {
  gene_expression: (dataType, disease) => ({
    type: dataType,
    disease,
    genes: ['GENE1', 'GENE2', 'GENE3'],
    values: [1.2, -0.8, 2.5],
    is_placeholder: true,
  }),

  proteomics: (dataType, disease) => ({
    type: dataType,
    disease,
    proteins: ['PROT1', 'PROT2', 'PROT3'],
    values: [0.9, 1.5, -1.1],
    is_placeholder: true,
  }),

  pathways: (dataType, disease) => ({
    type: dataType,
    disease,
    pathways: [
      { id: 'PW1', name: 'Inflammatory Response', genes: ['GENE1', 'GENE2'] },
      { id: 'PW2', name: 'Cell Cycle', genes: ['GENE3', 'GENE4'] },
      { id: 'PW3', name: 'Apoptosis', genes: ['GENE2', 'GENE5'] },
    ],
    is_placeholder: true,
  }),
};

export function placeholderFor(dataType: string): PlaceholderGenerator {
  return Object.hasOwn(DATASET_PLACEHOLDERS, dataType)
    ? DATASET_PLACEHOLDERS[dataType]
    : GENERIC_PLACEHOLDER;
}
