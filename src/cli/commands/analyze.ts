/**
 * Analyze CLI command - structural analysis of a Python project
 */

import { resolve } from 'node:path';
import { analyzeProject, type AnalyzeOptions } from '../../core/ast/analyzer.js';
import { summarizeProject, type ProjectSummary } from '../../core/ast/records.js';
import type { ProjectAnalysis } from '../../core/ast/types.js';
import { createLogger, type Logger } from '../../core/logger.js';
import { loadConfig, type CodeloreConfig } from '../../storage/config.js';
import { saveProjectAnalysis } from '../../storage/index-store.js';
import { createSpinner } from '../utils/progress.js';

export const DEFAULT_ANALYSIS_FILE = 'codelore-analysis.json';

/**
 * Options for analyze command
 */
export interface AnalyzeCommandOptions {
  /** Where to write the analysis JSON (default: ./codelore-analysis.json) */
  output?: string;
  /** Project name (default: directory name) */
  name?: string;
  /** Show a spinner on stderr */
  showProgress?: boolean;
  logger?: Logger;
}

export interface AnalyzeResult {
  success: boolean;
  projectName: string;
  rootPath: string;
  outputPath: string;
  summary: ProjectSummary;
  crossFileRelationships: number;
  errors: string[];
  duration_ms: number;
}

/**
 * Analyzer options from configuration.
 */
export function analyzerOptionsFromConfig(config: CodeloreConfig, logger: Logger): AnalyzeOptions {
  return {
    excludes: config.excludes,
    includeHidden: config.includeHidden,
    respectGitignore: config.respectGitignore,
    maxFileSize: config.maxFileSize,
    previewLines: config.previewLines,
    concurrency: config.concurrency,
    logger,
  };
}

/**
 * Analyze a project with a progress spinner. Shared by analyze and index.
 */
export async function analyzeWithProgress(
  sourcePath: string,
  options: { name?: string; showProgress?: boolean; logger: Logger; config: CodeloreConfig }
): Promise<ProjectAnalysis> {
  const spinner = createSpinner(`Analyzing ${sourcePath}`, { silent: !options.showProgress });
  spinner.start();
  try {
    const project = await analyzeProject(sourcePath, {
      ...analyzerOptionsFromConfig(options.config, options.logger),
      projectName: options.name,
      onProgress: (analyzed, total) => spinner.update(`Analyzing files (${analyzed}/${total})`),
    });
    spinner.succeed(`Analyzed ${project.fileAnalyses.length} files`);
    return project;
  } catch (error) {
    spinner.fail('Analysis failed');
    throw error;
  }
}

/**
 * Run the analyze command
 */
export async function runAnalyzeCommand(
  sourcePath: string,
  options: AnalyzeCommandOptions = {}
): Promise<AnalyzeResult> {
  const startTime = Date.now();
  const config = await loadConfig();
  const logger = options.logger ?? createLogger('analyze', { level: config.logLevel });

  const project = await analyzeWithProgress(sourcePath, {
    name: options.name,
    showProgress: options.showProgress ?? false,
    logger,
    config,
  });

  const outputPath = await saveProjectAnalysis(project, resolve(options.output ?? DEFAULT_ANALYSIS_FILE), logger);

  return {
    success: true,
    projectName: project.projectName,
    rootPath: project.rootPath,
    outputPath,
    summary: summarizeProject(project),
    crossFileRelationships: project.allRelationships.length,
    errors: [...project.errors],
    duration_ms: Date.now() - startTime,
  };
}

/**
 * Human-readable summary of an analyze run.
 */
export function formatAnalyzeResult(result: AnalyzeResult): string {
  const { summary } = result;
  const lines = [
    `Project: ${result.projectName} (${result.rootPath})`,
    `  Files: ${summary.total_files}`,
    `  Entities: ${summary.total_entities} (${summary.total_functions} functions, ${summary.total_classes} classes)`,
    `  Relationships: ${summary.total_relationships} (${result.crossFileRelationships} across files)`,
  ];
  if (result.errors.length > 0) {
    lines.push(`  Errors: ${result.errors.length}`);
    lines.push(...result.errors.map(error => `    ${error}`));
  }
  lines.push(`Wrote ${result.outputPath}`);
  return lines.join('\n');
}
