/**
 * Semantic layer types: domain tags, quality scores, workflow hints and the
 * index that bundles them.
 */

import type { EntityKind } from '../ast/types.js';

export interface DomainTag {
  /** Concept label, e.g. "ledger" */
  tag: string;
  /** Confidence in [0, 1] */
  confidence: number;
  reasoning: string[];
}

export interface DomainContext {
  /** Sorted by confidence, highest first */
  tags: DomainTag[];
  primaryTag?: string;
  isDomainRelated: boolean;
}

/**
 * Concept table used by the tagger.
 */
export interface DomainVocabulary {
  /** Concept label → keywords; iteration order breaks confidence ties */
  concepts: Record<string, string[]>;
  /** Patterns tested against a file's full path */
  pathPatterns: RegExp[];
}

export const QUALITY_TIERS = ['LOW', 'MEDIUM', 'HIGH'] as const;

export type QualityTier = (typeof QUALITY_TIERS)[number];

export interface ContextScore {
  overallScore: QualityTier;
  domainRelevance: number;
  relationshipDensity: number;
  docstringQuality: number;
  testCoverage: number;
  reasoning: string[];
}

export const WORKFLOW_ROLES = ['initiator', 'processor', 'finalizer'] as const;

export type WorkflowRole = (typeof WORKFLOW_ROLES)[number];

export interface WorkflowStep {
  entityName: string;
  filePath: string;
  domainTags: string[];
  role: WorkflowRole;
}

export interface WorkflowHint {
  /** `<pattern>: a -> b -> c` */
  name: string;
  steps: WorkflowStep[];
  confidence: number;
  reasoning: string[];
  businessProcess: string;
}

export interface WorkflowPattern {
  name: string;
  startConcepts: string[];
  endConcepts: string[];
  /** Informational only; paths are not filtered by it */
  intermediateConcepts: string[];
  businessProcess: string;
}

export interface SemanticEntity {
  name: string;
  filePath: string;
  domainContext: DomainContext;
  contextScore: ContextScore;
  entityType: EntityKind;
}

export interface SemanticFile {
  filePath: string;
  domainContext: DomainContext;
  contextScore: ContextScore;
  /** Names of the file's entities, in file order */
  entities: string[];
}

export interface SemanticIndexMetadata {
  total_files: number;
  total_entities: number;
  total_workflows: number;
  domain_related_files: number;
  high_quality_entities: number;
}

export interface SemanticIndex {
  projectName: string;
  /** Keyed by file path */
  files: Record<string, SemanticFile>;
  /** Keyed by `file::entity` */
  entities: Record<string, SemanticEntity>;
  workflows: WorkflowHint[];
  metadata: SemanticIndexMetadata;
}

/**
 * One ranked answer to a semantic query.
 */
export interface QueryResult {
  entityName: string;
  filePath: string;
  relevanceScore: number;
  domainTags: string[];
  contextScore: QualityTier;
  shortContext?: string;
  reasoning: string[];
}

export interface FileQueryResult {
  filePath: string;
  relevanceScore: number;
  domainTags: string[];
  contextScore: QualityTier;
  reasoning: string[];
}
