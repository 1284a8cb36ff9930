/**
 * Four-factor quality heuristic for files and entities.
 *
 * Every factor lies in [0, 1] and contributes one reasoning line. The
 * weighted sum is reduced to a tier by {@link tierForScore}.
 */

import { basename } from 'node:path';
import { isClass } from '../ast/entities.js';
import type { Entity, FileAnalysis, ProjectAnalysis, Relationship } from '../ast/types.js';
import { normalizeText } from './tokenize.js';
import type { ContextScore, QualityTier } from './types.js';

export const HIGH_TIER_THRESHOLD = 0.7;
export const MEDIUM_TIER_THRESHOLD = 0.4;

const FILE_WEIGHTS = { domain: 0.4, density: 0.3, docs: 0.2, tests: 0.1 };
const ENTITY_WEIGHTS = { domain: 0.3, density: 0.3, docs: 0.3, tests: 0.1 };

/**
 * Keyword tables for the relevance and documentation factors. All matching
 * is by lower-cased substring.
 */
export interface ScorerKeywords {
  fileKeywords: string[];
  entityKeywords: string[];
  businessVerbs: string[];
  documentationTerms: string[];
}

export const DEFAULT_SCORER_KEYWORDS: ScorerKeywords = {
  fileKeywords: [
    'account',
    'ledger',
    'journal',
    'invoice',
    'payment',
    'tax',
    'balance',
    'posting',
    'transaction',
    'finance',
    'erp',
  ],
  entityKeywords: [
    'account',
    'ledger',
    'journal',
    'invoice',
    'payment',
    'tax',
    'balance',
    'posting',
    'transaction',
    'debit',
    'credit',
    'gl',
  ],
  businessVerbs: ['create', 'post', 'validate', 'calculate', 'process'],
  documentationTerms: ['function', 'class', 'method', 'calculate', 'create', 'validate'],
};

export function tierForScore(score: number): QualityTier {
  if (score >= HIGH_TIER_THRESHOLD) {
    return 'HIGH';
  }
  if (score >= MEDIUM_TIER_THRESHOLD) {
    return 'MEDIUM';
  }
  return 'LOW';
}

function bucket(value: number, high: number, low: number, labels: [string, string, string]): string {
  if (value > high) {
    return labels[0];
  }
  if (value > low) {
    return labels[1];
  }
  return labels[2];
}

function countContained(text: string, keywords: readonly string[]): number {
  return keywords.filter(keyword => text.includes(keyword)).length;
}

export class ContextScorer {
  private readonly keywords: ScorerKeywords;

  constructor(keywords: Partial<ScorerKeywords> = {}) {
    this.keywords = { ...DEFAULT_SCORER_KEYWORDS, ...keywords };
  }

  scoreFile(file: FileAnalysis, project: ProjectAnalysis): ContextScore {
    const domainRelevance = this.fileDomainRelevance(file);
    const relationshipDensity = fileRelationshipDensity(file, project);
    const docstringQuality = fileDocstringQuality(file);
    const testCoverage = fileTestCoverage(file);

    const score =
      domainRelevance * FILE_WEIGHTS.domain +
      relationshipDensity * FILE_WEIGHTS.density +
      docstringQuality * FILE_WEIGHTS.docs +
      testCoverage * FILE_WEIGHTS.tests;

    return {
      overallScore: tierForScore(score),
      domainRelevance,
      relationshipDensity,
      docstringQuality,
      testCoverage,
      reasoning: [
        bucket(domainRelevance, 0.7, 0.3, [
          'High domain relevance - appears to be core business logic',
          'Medium domain relevance - contains some domain concepts',
          'Low domain relevance - utility or generic code',
        ]),
        bucket(relationshipDensity, 0.7, 0.3, [
          'High connectivity - central to the codebase',
          'Medium connectivity - moderately connected',
          'Low connectivity - peripheral code',
        ]),
        bucket(docstringQuality, 0.7, 0.3, [
          'Well documented - good docstring coverage',
          'Partially documented - some docstrings present',
          'Poorly documented - missing docstrings',
        ]),
        testCoverage > 0.5
          ? 'Likely well tested - test file or test-related'
          : 'Test coverage unclear - not identified as test code',
      ],
    };
  }

  scoreEntity(entity: Entity, file: FileAnalysis, project: ProjectAnalysis): ContextScore {
    const domainRelevance = this.entityDomainRelevance(entity);
    const relationshipDensity = entityRelationshipDensity(entity, file, project);
    const docstringQuality = this.entityDocstringQuality(entity);
    // Not measurable for a single entity
    const testCoverage = 0;

    const score =
      domainRelevance * ENTITY_WEIGHTS.domain +
      relationshipDensity * ENTITY_WEIGHTS.density +
      docstringQuality * ENTITY_WEIGHTS.docs +
      testCoverage * ENTITY_WEIGHTS.tests;

    return {
      overallScore: tierForScore(score),
      domainRelevance,
      relationshipDensity,
      docstringQuality,
      testCoverage,
      reasoning: [
        bucket(domainRelevance, 0.7, 0.3, [
          'High domain relevance - core business function or class',
          'Medium domain relevance - domain-related',
          'Low domain relevance - utility function',
        ]),
        bucket(relationshipDensity, 0.7, 0.3, [
          'Highly connected - called by many other functions',
          'Moderately connected - has some dependencies',
          'Low connectivity - rarely used',
        ]),
        bucket(docstringQuality, 0.8, 0.4, [
          'Well documented - comprehensive docstring',
          'Partially documented - basic docstring',
          'Undocumented - missing or poor docstring',
        ]),
        'Test coverage assessment requires test file analysis',
      ],
    };
  }

  private fileDomainRelevance(file: FileAnalysis): number {
    const fileName = basename(file.filePath).toLowerCase();
    const nameScore = Math.min(countContained(fileName, this.keywords.fileKeywords) * 0.2, 0.6);
    const entityBoost = Math.min(file.entities.length * 0.02, 0.3);
    const relationshipBoost = Math.min(file.relationships.length * 0.01, 0.1);
    return Math.min(nameScore + entityBoost + relationshipBoost, 1);
  }

  private entityDomainRelevance(entity: Entity): number {
    const name = entity.name.toLowerCase();
    const docstring = (entity.docstring ?? '').toLowerCase();

    let score = Math.min(
      countContained(name, this.keywords.entityKeywords) * 0.3 +
        countContained(docstring, this.keywords.entityKeywords) * 0.2,
      1
    );
    if (countContained(name, this.keywords.businessVerbs) > 0) {
      score = Math.min(score + 0.2, 1);
    }
    return score;
  }

  private entityDocstringQuality(entity: Entity): number {
    const docstring = entity.docstring?.trim();
    if (!docstring) {
      return 0;
    }

    let score = Math.min(docstring.length * 0.002, 0.6);
    if (docstring.split(/\s+/).length > 5) {
      score += 0.2;
    }
    if (docstring.includes('Args:') || docstring.includes('Returns:')) {
      score += 0.2;
    }
    if (countContained(docstring.toLowerCase(), this.keywords.documentationTerms) > 0) {
      score += 0.2;
    }
    return Math.min(score, 1);
  }
}

function touchesFile(relationship: Relationship, filePath: string): boolean {
  return relationship.metadata['source_file'] === filePath || relationship.metadata['target_file'] === filePath;
}

function fileRelationshipDensity(file: FileAnalysis, project: ProjectAnalysis): number {
  if (file.entities.length === 0) {
    return 0;
  }
  const crossFile = project.allRelationships.filter(rel => touchesFile(rel, file.filePath)).length;
  const density = (file.relationships.length + crossFile) / file.entities.length;
  return Math.min(density * 0.1, 1);
}

/**
 * Relationships whose ends name the entity. A class also owns the
 * relationships recorded for its methods (`Class.method`).
 */
function entityRelationshipDensity(entity: Entity, file: FileAnalysis, project: ProjectAnalysis): number {
  const names = (prefix: string): ((end: string) => boolean) => {
    const own = `${prefix}${entity.name}`;
    return end => end === own || (isClass(entity) && end.startsWith(`${own}.`));
  };
  const local = names('');
  const qualified = names(`${file.filePath}::`);

  const count =
    file.relationships.filter(rel => local(rel.source) || local(rel.target)).length +
    project.allRelationships.filter(rel => qualified(rel.source) || qualified(rel.target)).length;

  return Math.min(count * 0.2, 1);
}

function fileDocstringQuality(file: FileAnalysis): number {
  const count = file.entities.length;
  if (count === 0) {
    return 0;
  }
  const documented = file.entities.filter(entity => entity.docstring).length;
  const totalLength = file.entities.reduce((sum, entity) => sum + (entity.docstring?.length ?? 0), 0);
  return Math.min((documented / count) * 0.5 + Math.min((totalLength / count) * 0.001, 0.5), 1);
}

function fileTestCoverage(file: FileAnalysis): number {
  const segments = file.filePath.split('/');
  const isTestPath = segments.some(segment =>
    normalizeText(segment)
      .split(/\s+/)
      .some(token => token === 'test' || token === 'tests')
  );
  if (isTestPath) {
    return 0.8;
  }

  const hasTestFunction = file.entities.some(
    entity => entity.kind === 'function' && entity.name.toLowerCase().startsWith('test')
  );
  return hasTestFunction ? 0.6 : 0;
}
