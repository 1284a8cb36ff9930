/**
 * Workflows CLI command - list the workflow hints of a saved semantic index
 */

import { createLogger, type Logger } from '../../core/logger.js';
import type { WorkflowHint } from '../../core/semantic/types.js';
import { loadConfig } from '../../storage/config.js';
import { loadSemanticIndex } from '../../storage/index-store.js';

export interface WorkflowsOptions {
  /** Only hints at or above this confidence */
  minConfidence?: number;
  logger?: Logger;
}

export interface WorkflowsCommandResult {
  projectName: string;
  workflows: WorkflowHint[];
  count: number;
}

export async function runWorkflowsCommand(
  indexFile: string,
  options: WorkflowsOptions = {}
): Promise<WorkflowsCommandResult> {
  const config = await loadConfig();
  const logger = options.logger ?? createLogger('workflows', { level: config.logLevel });
  const index = await loadSemanticIndex(indexFile, logger);

  const minConfidence = options.minConfidence ?? 0;
  const workflows = index.workflows.filter(workflow => workflow.confidence >= minConfidence);
  return { projectName: index.projectName, workflows, count: workflows.length };
}

export function formatWorkflowsResult(result: WorkflowsCommandResult): string {
  if (result.count === 0) {
    return `No workflow hints in ${result.projectName}`;
  }

  const lines = [`${result.count} workflow hint${result.count === 1 ? '' : 's'} in ${result.projectName}:`];
  for (const workflow of result.workflows) {
    lines.push(`\n${workflow.name}`);
    lines.push(`  Process: ${workflow.businessProcess} (confidence ${workflow.confidence.toFixed(2)})`);
    for (const step of workflow.steps) {
      lines.push(`  [${step.role}] ${step.entityName} (${step.filePath})`);
    }
  }
  return lines.join('\n');
}
