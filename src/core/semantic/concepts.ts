/**
 * The built-in accounting vocabulary and workflow patterns.
 *
 * The tables live in data/accounting.json; path patterns are stored as regex
 * sources and compiled case-insensitively.
 */

import { z } from 'zod';
import { parseRecord } from '../validation.js';
import type { DomainVocabulary, WorkflowPattern } from './types.js';
import accountingData from './data/accounting.json';

const workflowPatternSchema = z.object({
  name: z.string().min(1),
  startConcepts: z.array(z.string()),
  endConcepts: z.array(z.string()),
  intermediateConcepts: z.array(z.string()),
  businessProcess: z.string().min(1),
});

const vocabularyFileSchema = z.object({
  concepts: z.record(z.array(z.string().min(1))),
  pathPatterns: z.array(z.string().min(1)),
  workflowPatterns: z.array(workflowPatternSchema),
});

export type VocabularyFile = z.infer<typeof vocabularyFileSchema>;

/**
 * Validate a vocabulary file and compile its path patterns.
 *
 * @throws {IndexFormatError} If the data does not match the vocabulary schema
 */
export function loadVocabulary(data: unknown): { vocabulary: DomainVocabulary; workflowPatterns: WorkflowPattern[] } {
  const file = parseRecord(vocabularyFileSchema, data, 'domain vocabulary');
  return {
    vocabulary: {
      concepts: file.concepts,
      pathPatterns: file.pathPatterns.map(source => new RegExp(source, 'i')),
    },
    workflowPatterns: file.workflowPatterns,
  };
}

const accounting = loadVocabulary(accountingData);

export const ACCOUNTING_VOCABULARY: DomainVocabulary = accounting.vocabulary;

export const ACCOUNTING_WORKFLOW_PATTERNS: readonly WorkflowPattern[] = accounting.workflowPatterns;
