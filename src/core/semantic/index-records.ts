/**
 * JSON records for the semantic index.
 *
 * Keys are snake_case and missing values are null, matching the project
 * analysis records. The domain-related flag is stored as
 * `is_accounting_related`, the name readers of the format already use.
 */

import { z } from 'zod';
import { parseRecord } from '../validation.js';
import type { ContextScore, DomainContext, SemanticIndex, WorkflowHint } from './types.js';
import { QUALITY_TIERS, WORKFLOW_ROLES } from './types.js';

const domainTagSchema = z.object({
  tag: z.string(),
  confidence: z.number().min(0).max(1),
  reasoning: z.array(z.string()),
});

const domainContextSchema = z.object({
  tags: z.array(domainTagSchema),
  primary_tag: z.string().nullable(),
  is_accounting_related: z.boolean(),
});

const contextScoreSchema = z.object({
  overall_score: z.enum(QUALITY_TIERS),
  domain_relevance: z.number(),
  relationship_density: z.number(),
  docstring_quality: z.number(),
  test_coverage: z.number(),
  reasoning: z.array(z.string()),
});

const semanticFileSchema = z.object({
  file_path: z.string(),
  domain_context: domainContextSchema,
  context_score: contextScoreSchema,
  entities: z.array(z.string()),
});

const semanticEntitySchema = z.object({
  name: z.string(),
  file_path: z.string(),
  domain_context: domainContextSchema,
  context_score: contextScoreSchema,
  entity_type: z.enum(['function', 'async_function', 'class', 'import']),
});

const workflowSchema = z.object({
  name: z.string(),
  steps: z.array(
    z.object({
      entity_name: z.string(),
      file_path: z.string(),
      domain_tags: z.array(z.string()),
      role: z.enum(WORKFLOW_ROLES),
    })
  ),
  confidence: z.number(),
  reasoning: z.array(z.string()),
  business_process: z.string(),
});

export const semanticIndexRecordSchema = z.object({
  project_name: z.string(),
  files: z.record(semanticFileSchema),
  entities: z.record(semanticEntitySchema),
  workflows: z.array(workflowSchema),
  metadata: z.object({
    total_files: z.number().int(),
    total_entities: z.number().int(),
    total_workflows: z.number().int(),
    domain_related_files: z.number().int(),
    high_quality_entities: z.number().int(),
  }),
});

export type DomainContextRecord = z.infer<typeof domainContextSchema>;
export type ContextScoreRecord = z.infer<typeof contextScoreSchema>;
export type WorkflowRecord = z.infer<typeof workflowSchema>;
export type SemanticIndexRecord = z.infer<typeof semanticIndexRecordSchema>;

function mapValues<T, U>(record: Readonly<Record<string, T>>, transform: (value: T) => U): Record<string, U> {
  const result: Record<string, U> = {};
  for (const [key, value] of Object.entries(record)) {
    result[key] = transform(value);
  }
  return result;
}

function domainContextToRecord(context: DomainContext): DomainContextRecord {
  return {
    tags: context.tags.map(tag => ({ tag: tag.tag, confidence: tag.confidence, reasoning: [...tag.reasoning] })),
    primary_tag: context.primaryTag ?? null,
    is_accounting_related: context.isDomainRelated,
  };
}

function domainContextFromRecord(record: DomainContextRecord): DomainContext {
  return {
    tags: record.tags.map(tag => ({ tag: tag.tag, confidence: tag.confidence, reasoning: tag.reasoning })),
    ...(record.primary_tag !== null ? { primaryTag: record.primary_tag } : {}),
    isDomainRelated: record.is_accounting_related,
  };
}

function contextScoreToRecord(score: ContextScore): ContextScoreRecord {
  return {
    overall_score: score.overallScore,
    domain_relevance: score.domainRelevance,
    relationship_density: score.relationshipDensity,
    docstring_quality: score.docstringQuality,
    test_coverage: score.testCoverage,
    reasoning: [...score.reasoning],
  };
}

function contextScoreFromRecord(record: ContextScoreRecord): ContextScore {
  return {
    overallScore: record.overall_score,
    domainRelevance: record.domain_relevance,
    relationshipDensity: record.relationship_density,
    docstringQuality: record.docstring_quality,
    testCoverage: record.test_coverage,
    reasoning: record.reasoning,
  };
}

export function workflowToRecord(workflow: WorkflowHint): WorkflowRecord {
  return {
    name: workflow.name,
    steps: workflow.steps.map(step => ({
      entity_name: step.entityName,
      file_path: step.filePath,
      domain_tags: [...step.domainTags],
      role: step.role,
    })),
    confidence: workflow.confidence,
    reasoning: [...workflow.reasoning],
    business_process: workflow.businessProcess,
  };
}

function workflowFromRecord(record: WorkflowRecord): WorkflowHint {
  return {
    name: record.name,
    steps: record.steps.map(step => ({
      entityName: step.entity_name,
      filePath: step.file_path,
      domainTags: step.domain_tags,
      role: step.role,
    })),
    confidence: record.confidence,
    reasoning: record.reasoning,
    businessProcess: record.business_process,
  };
}

export function semanticIndexToRecord(index: SemanticIndex): SemanticIndexRecord {
  return {
    project_name: index.projectName,
    files: mapValues(index.files, file => ({
      file_path: file.filePath,
      domain_context: domainContextToRecord(file.domainContext),
      context_score: contextScoreToRecord(file.contextScore),
      entities: [...file.entities],
    })),
    entities: mapValues(index.entities, entity => ({
      name: entity.name,
      file_path: entity.filePath,
      domain_context: domainContextToRecord(entity.domainContext),
      context_score: contextScoreToRecord(entity.contextScore),
      entity_type: entity.entityType,
    })),
    workflows: index.workflows.map(workflowToRecord),
    metadata: { ...index.metadata },
  };
}

/**
 * Rebuild a semantic index from its JSON record.
 *
 * @throws {IndexFormatError} If the data does not match the record schema
 */
export function semanticIndexFromRecord(data: unknown): SemanticIndex {
  const record = parseRecord(semanticIndexRecordSchema, data, 'semantic index');
  return {
    projectName: record.project_name,
    files: mapValues(record.files, file => ({
      filePath: file.file_path,
      domainContext: domainContextFromRecord(file.domain_context),
      contextScore: contextScoreFromRecord(file.context_score),
      entities: file.entities,
    })),
    entities: mapValues(record.entities, entity => ({
      name: entity.name,
      filePath: entity.file_path,
      domainContext: domainContextFromRecord(entity.domain_context),
      contextScore: contextScoreFromRecord(entity.context_score),
      entityType: entity.entity_type,
    })),
    workflows: record.workflows.map(workflowFromRecord),
    metadata: record.metadata,
  };
}
