import { AnalysisError, errorMessage, isNodeError } from '../../core/errors.js';
import type { AnalyzeResult } from './analyze.js';
import type { ConfigCommandResult } from './config.js';
import type { IndexResult } from './index.js';
import type { QueryCommandResult } from './query.js';
import type { WorkflowsCommandResult } from './workflows.js';

/**
 * JSON error format
 */
export interface JsonError {
  error: string;
  code: string;
}

/**
 * Command output tagged with the command that produced it
 */
export type CommandOutput =
  | { command: 'analyze'; result: AnalyzeResult }
  | { command: 'index'; result: IndexResult }
  | { command: 'query'; result: QueryCommandResult }
  | { command: 'workflows'; result: WorkflowsCommandResult }
  | { command: 'config'; result: ConfigCommandResult }
  | { command: 'error'; result: unknown };

/**
 * Format command output as JSON
 */
export function formatAsJson(output: CommandOutput): string {
  switch (output.command) {
    case 'analyze':
      return JSON.stringify({ command: 'analyze', ...output.result });
    case 'index':
      return JSON.stringify({ command: 'index', ...output.result });
    case 'query':
      return JSON.stringify({ command: 'query', ...output.result });
    case 'workflows':
      return JSON.stringify({ command: 'workflows', ...output.result });
    case 'config':
      return JSON.stringify(formatConfigJson(output.result));
    case 'error':
      return JSON.stringify(formatErrorJson(output.result));
  }
}

function formatConfigJson(result: ConfigCommandResult): { config: Record<string, unknown> } {
  if (result.action === 'show') {
    return { config: { ...result.config } };
  }
  return { config: { [result.key]: result.value } };
}

/**
 * Error codes come from the analysis error taxonomy where there is one.
 */
export function formatErrorJson(error: unknown): JsonError {
  if (error instanceof AnalysisError) {
    return { error: error.message, code: error.code };
  }
  if (isNodeError(error) && error.code === 'ENOENT') {
    return { error: error.message, code: 'NOT_FOUND' };
  }

  const message = errorMessage(error);
  const code = message.toLowerCase().includes('unknown') || message.startsWith('Invalid') ? 'VALIDATION_ERROR' : 'COMMAND_ERROR';
  return { error: message, code };
}
