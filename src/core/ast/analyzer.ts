/**
 * Project-wide analysis: walk, parse every file, then link calls and
 * inheritance that cross file boundaries.
 */

import { stat } from 'node:fs/promises';
import { basename, resolve } from 'node:path';
import { errorMessage, InvalidRootError, isNodeError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { walkFiles, DEFAULT_EXCLUDES } from '../walker.js';
import { createProjectAnalysis, createRelationship, isDefinition } from './entities.js';
import { PythonFileParser } from './file-parser.js';
import type { FileAnalysis, ProjectAnalysis, Relationship } from './types.js';

/**
 * Options for analysis
 */
export interface AnalyzeOptions {
  /** Project name (default: root directory name) */
  projectName?: string;
  /** Directory and file names or globs to skip */
  excludes?: string[];
  /** Whether to include hidden files (default: false) */
  includeHidden?: boolean;
  /** Whether to respect .gitignore and .codeloreignore (default: true) */
  respectGitignore?: boolean;
  /** Files larger than this many bytes are reported and skipped */
  maxFileSize?: number;
  /** Number of source lines kept as each entity's preview */
  previewLines?: number;
  /** Number of files to process in parallel (default: 10) */
  concurrency?: number;
  /** Called after each batch of files */
  onProgress?: (analyzed: number, total: number) => void;
  logger?: Logger;
}

export const DEFAULT_CONCURRENCY = 10;

export class ProjectAnalyzer {
  private readonly parser: PythonFileParser;
  private readonly logger: Logger;

  constructor(private readonly options: AnalyzeOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.parser = new PythonFileParser({
      ...(options.maxFileSize !== undefined ? { maxFileSize: options.maxFileSize } : {}),
      ...(options.previewLines !== undefined ? { previewLines: options.previewLines } : {}),
      logger: this.logger,
    });
  }

  /**
   * Analyze every Python file under a directory.
   *
   * @throws {InvalidRootError} If the root does not exist or is not a directory
   */
  async analyze(root: string): Promise<ProjectAnalysis> {
    const rootPath = resolve(root);
    await assertDirectory(rootPath);

    const projectName = this.options.projectName ?? basename(rootPath);
    const walk = await walkFiles(rootPath, {
      excludes: this.options.excludes ?? DEFAULT_EXCLUDES,
      includeHidden: this.options.includeHidden ?? false,
      respectGitignore: this.options.respectGitignore ?? true,
      respectCodeloreignore: this.options.respectGitignore ?? true,
    });
    const files = walk.files;

    this.logger.info('Starting project analysis', { project: projectName, root: rootPath, files: files.length });

    const fileAnalyses: FileAnalysis[] = [];
    const errors: string[] = [];
    for (const message of walk.errors) {
      this.logger.warn(message);
      errors.push(message);
    }
    const concurrency = Math.max(1, this.options.concurrency ?? DEFAULT_CONCURRENCY);

    // Process files in parallel batches
    for (let i = 0; i < files.length; i += concurrency) {
      const batch = files.slice(i, i + concurrency);
      const batchResults = await Promise.all(
        batch.map(file =>
          this.parser
            .parseFile(file.absolutePath, file.relativePath)
            .catch((error: unknown) => `Failed to analyze ${file.relativePath}: ${errorMessage(error)}`)
        )
      );

      for (const result of batchResults) {
        if (typeof result === 'string') {
          this.logger.error(result);
          errors.push(result);
          continue;
        }
        fileAnalyses.push(result);
        errors.push(...result.errors.map(message => `${result.filePath}: ${message}`));
      }

      this.options.onProgress?.(Math.min(i + concurrency, files.length), files.length);
    }

    const allRelationships = resolveCrossFileRelationships(fileAnalyses, this.logger);

    this.logger.info('Project analysis complete', {
      project: projectName,
      files: fileAnalyses.length,
      crossFileRelationships: allRelationships.length,
      errors: errors.length,
    });

    return createProjectAnalysis({ projectName, rootPath, fileAnalyses, allRelationships, errors });
  }
}

/**
 * Analyze a project directory
 */
export async function analyzeProject(rootPath: string, options: AnalyzeOptions = {}): Promise<ProjectAnalysis> {
  return new ProjectAnalyzer(options).analyze(rootPath);
}

async function assertDirectory(rootPath: string): Promise<void> {
  try {
    const stats = await stat(rootPath);
    if (!stats.isDirectory()) {
      throw new InvalidRootError(rootPath, 'not a directory');
    }
  } catch (error) {
    if (error instanceof InvalidRootError) {
      throw error;
    }
    if (isNodeError(error) && error.code === 'ENOENT') {
      throw new InvalidRootError(rootPath, 'no such directory');
    }
    throw new InvalidRootError(rootPath, errorMessage(error));
  }
}

/**
 * Re-emit every relationship whose target names a function or class defined
 * in another file, with `file::name` ends.
 *
 * Names map to files by last write: when two files define the same name, the
 * later file wins and the collision is logged. Imports are not definitions
 * and never take part in the lookup.
 */
export function resolveCrossFileRelationships(
  fileAnalyses: readonly FileAnalysis[],
  logger: Logger = silentLogger
): Relationship[] {
  const definedIn = new Map<string, string>();

  for (const file of fileAnalyses) {
    for (const entity of file.entities) {
      if (!isDefinition(entity)) {
        continue;
      }
      const previous = definedIn.get(entity.name);
      if (previous !== undefined && previous !== file.filePath) {
        logger.warn('Ambiguous definition, keeping the last one', {
          name: entity.name,
          previous,
          current: file.filePath,
        });
      }
      definedIn.set(entity.name, file.filePath);
    }
  }

  const crossFile: Relationship[] = [];
  for (const file of fileAnalyses) {
    for (const relationship of file.relationships) {
      const targetFile = definedIn.get(relationship.target);
      if (targetFile === undefined || targetFile === file.filePath) {
        continue;
      }
      crossFile.push(
        createRelationship(
          `${file.filePath}::${relationship.source}`,
          `${targetFile}::${relationship.target}`,
          relationship.kind,
          relationship.sourceLocation,
          {
            ...relationship.metadata,
            cross_file: true,
            source_file: file.filePath,
            target_file: targetFile,
          }
        )
      );
    }
  }

  return crossFile;
}
