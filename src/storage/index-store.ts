/**
 * Reading and writing analysis and index JSON files.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { projectAnalysisFromRecord, projectAnalysisToRecord } from '../core/ast/records.js';
import type { ProjectAnalysis } from '../core/ast/types.js';
import { errorMessage, IndexFormatError } from '../core/errors.js';
import { silentLogger, type Logger } from '../core/logger.js';
import { semanticIndexFromRecord, semanticIndexToRecord } from '../core/semantic/index-records.js';
import type { SemanticIndex } from '../core/semantic/types.js';

async function writeJson(filePath: string, data: unknown): Promise<string> {
  const outputPath = resolve(filePath);
  await mkdir(dirname(outputPath), { recursive: true });
  await writeFile(outputPath, `${JSON.stringify(data, null, 2)}\n`, 'utf-8');
  return outputPath;
}

async function readJson(filePath: string, source: string): Promise<unknown> {
  const content = await readFile(resolve(filePath), 'utf-8');
  try {
    return JSON.parse(content);
  } catch (error) {
    throw new IndexFormatError(source, errorMessage(error));
  }
}

/**
 * Save a project analysis as JSON. Returns the absolute path written.
 */
export async function saveProjectAnalysis(
  project: ProjectAnalysis,
  filePath: string,
  logger: Logger = silentLogger
): Promise<string> {
  const outputPath = await writeJson(filePath, projectAnalysisToRecord(project));
  logger.info('Saved project analysis', { path: outputPath });
  return outputPath;
}

/**
 * @throws {IndexFormatError} If the file is not a valid project analysis
 */
export async function loadProjectAnalysis(filePath: string, logger: Logger = silentLogger): Promise<ProjectAnalysis> {
  const project = projectAnalysisFromRecord(await readJson(filePath, 'project analysis'));
  logger.info('Loaded project analysis', { path: resolve(filePath) });
  return project;
}

/**
 * Save a semantic index as JSON. Returns the absolute path written.
 */
export async function saveSemanticIndex(
  index: SemanticIndex,
  filePath: string,
  logger: Logger = silentLogger
): Promise<string> {
  const outputPath = await writeJson(filePath, semanticIndexToRecord(index));
  logger.info('Saved semantic index', { path: outputPath });
  return outputPath;
}

/**
 * @throws {IndexFormatError} If the file is not a valid semantic index
 */
export async function loadSemanticIndex(filePath: string, logger: Logger = silentLogger): Promise<SemanticIndex> {
  const index = semanticIndexFromRecord(await readJson(filePath, 'semantic index'));
  logger.info('Loaded semantic index', { path: resolve(filePath) });
  return index;
}
