/**
 * Builds the semantic index: tags and scores for every file and entity,
 * then one workflow pass over the whole project.
 */

import { isDefinition } from '../ast/entities.js';
import type { ProjectAnalysis } from '../ast/types.js';
import { silentLogger, type Logger } from '../logger.js';
import { ContextScorer, type ScorerKeywords } from './context-scorer.js';
import { DomainTagger } from './domain-tagger.js';
import { WorkflowDetector, type TaggedEntity } from './workflow-detector.js';
import type { DomainVocabulary, SemanticEntity, SemanticFile, SemanticIndex, WorkflowPattern } from './types.js';

export interface SemanticIndexerOptions {
  vocabulary?: DomainVocabulary;
  workflowPatterns?: readonly WorkflowPattern[];
  scorerKeywords?: Partial<ScorerKeywords>;
  logger?: Logger;
}

export function entityKey(filePath: string, name: string): string {
  return `${filePath}::${name}`;
}

export class SemanticIndexer {
  private readonly tagger: DomainTagger;
  private readonly scorer: ContextScorer;
  private readonly detector: WorkflowDetector;
  private readonly logger: Logger;

  constructor(options: SemanticIndexerOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.tagger = new DomainTagger({
      ...(options.vocabulary ? { vocabulary: options.vocabulary } : {}),
      logger: this.logger,
    });
    this.scorer = new ContextScorer(options.scorerKeywords);
    this.detector = new WorkflowDetector({
      ...(options.workflowPatterns ? { patterns: options.workflowPatterns } : {}),
      logger: this.logger,
    });
  }

  buildIndex(project: ProjectAnalysis): SemanticIndex {
    this.logger.info('Building semantic index', { project: project.projectName });

    const files: Record<string, SemanticFile> = {};
    const entities: Record<string, SemanticEntity> = {};
    const tagged: TaggedEntity[] = [];

    for (const file of project.fileAnalyses) {
      files[file.filePath] = {
        filePath: file.filePath,
        domainContext: this.tagger.tagFile(file),
        contextScore: this.scorer.scoreFile(file, project),
        entities: file.entities.map(entity => entity.name),
      };

      for (const entity of file.entities) {
        const domainContext = this.tagger.tagEntity(entity);
        entities[entityKey(file.filePath, entity.name)] = {
          name: entity.name,
          filePath: file.filePath,
          domainContext,
          contextScore: this.scorer.scoreEntity(entity, file, project),
          entityType: entity.kind,
        };
        if (isDefinition(entity)) {
          tagged.push({ name: entity.name, filePath: file.filePath, context: domainContext });
        }
      }
    }

    // Workflows need every entity tagged first
    const workflows = this.detector.detect(
      tagged,
      project.fileAnalyses.flatMap(file => [...file.relationships])
    );

    const fileValues = Object.values(files);
    const entityValues = Object.values(entities);
    const index: SemanticIndex = {
      projectName: project.projectName,
      files,
      entities,
      workflows,
      metadata: {
        total_files: fileValues.length,
        total_entities: entityValues.length,
        total_workflows: workflows.length,
        domain_related_files: fileValues.filter(file => file.domainContext.isDomainRelated).length,
        high_quality_entities: entityValues.filter(entity => entity.contextScore.overallScore === 'HIGH').length,
      },
    };

    this.logger.info('Built semantic index', { ...index.metadata });
    return index;
  }
}

/**
 * Build a semantic index with the given options.
 */
export function buildSemanticIndex(project: ProjectAnalysis, options: SemanticIndexerOptions = {}): SemanticIndex {
  return new SemanticIndexer(options).buildIndex(project);
}
