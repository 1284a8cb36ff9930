/**
 * Index CLI command - analyze a project and build its semantic index
 */

import { resolve } from 'node:path';
import { createLogger, type Logger } from '../../core/logger.js';
import { buildSemanticIndex } from '../../core/semantic/semantic-index.js';
import { loadConfig } from '../../storage/config.js';
import { saveProjectAnalysis, saveSemanticIndex } from '../../storage/index-store.js';
import { analyzeWithProgress } from './analyze.js';

export const DEFAULT_INDEX_FILE = 'codelore-index.json';

/**
 * Options for index command
 */
export interface IndexOptions {
  /** Where to write the semantic index (default: ./codelore-index.json) */
  output?: string;
  /** Also write the structural analysis here */
  analysisOutput?: string;
  /** Project name (default: directory name) */
  name?: string;
  showProgress?: boolean;
  logger?: Logger;
}

export interface IndexResult {
  success: boolean;
  projectName: string;
  outputPath: string;
  analysisPath: string | null;
  files: number;
  entities: number;
  workflows: number;
  domainRelatedFiles: number;
  highQualityEntities: number;
  errors: string[];
  duration_ms: number;
}

/**
 * Run the index command
 */
export async function runIndexCommand(sourcePath: string, options: IndexOptions = {}): Promise<IndexResult> {
  const startTime = Date.now();
  const config = await loadConfig();
  const logger = options.logger ?? createLogger('index', { level: config.logLevel });

  const project = await analyzeWithProgress(sourcePath, {
    name: options.name,
    showProgress: options.showProgress ?? false,
    logger,
    config,
  });

  const index = buildSemanticIndex(project, { logger });
  const outputPath = await saveSemanticIndex(index, resolve(options.output ?? DEFAULT_INDEX_FILE), logger);
  const analysisPath = options.analysisOutput
    ? await saveProjectAnalysis(project, resolve(options.analysisOutput), logger)
    : null;

  return {
    success: true,
    projectName: index.projectName,
    outputPath,
    analysisPath,
    files: index.metadata.total_files,
    entities: index.metadata.total_entities,
    workflows: index.metadata.total_workflows,
    domainRelatedFiles: index.metadata.domain_related_files,
    highQualityEntities: index.metadata.high_quality_entities,
    errors: [...project.errors],
    duration_ms: Date.now() - startTime,
  };
}

export function formatIndexResult(result: IndexResult): string {
  const lines = [
    `Indexed ${result.projectName}`,
    `  Files: ${result.files} (${result.domainRelatedFiles} domain-related)`,
    `  Entities: ${result.entities} (${result.highQualityEntities} high quality)`,
    `  Workflow hints: ${result.workflows}`,
  ];
  if (result.errors.length > 0) {
    lines.push(`  Errors: ${result.errors.length}`);
    lines.push(...result.errors.map(error => `    ${error}`));
  }
  lines.push(`Wrote ${result.outputPath}`);
  if (result.analysisPath) {
    lines.push(`Wrote ${result.analysisPath}`);
  }
  return lines.join('\n');
}
