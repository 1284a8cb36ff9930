import { Command, InvalidArgumentError } from 'commander';
import { formatAnalyzeResult, runAnalyzeCommand } from './commands/analyze.js';
import { formatConfigResult, runConfigCommand } from './commands/config.js';
import { formatIndexResult, runIndexCommand } from './commands/index.js';
import { formatAsJson } from './commands/json-formatter.js';
import { formatQueryResult, runQueryCommand } from './commands/query.js';
import { formatWorkflowsResult, runWorkflowsCommand } from './commands/workflows.js';
import { errorMessage } from '../core/errors.js';

export const VERSION = '0.1.0';

/**
 * Where the program writes. Tests swap these for collectors.
 */
export interface ProgramIO {
  out: (text: string) => void;
  err: (text: string) => void;
  setExitCode: (code: number) => void;
}

const defaultIO: ProgramIO = {
  out: text => console.log(text),
  err: text => console.error(text),
  setExitCode: code => {
    process.exitCode = code;
  },
};

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function parseConfidence(value: string): number {
  const parsed = Number(value);
  if (Number.isNaN(parsed) || parsed < 0 || parsed > 1) {
    throw new InvalidArgumentError('Must be a number between 0 and 1.');
  }
  return parsed;
}

export function createProgram(io: ProgramIO = defaultIO): Command {
  const program = new Command();

  const fail = (err: unknown, json?: boolean): void => {
    if (json) {
      io.out(formatAsJson({ command: 'error', result: err }));
    } else {
      io.err(`Error: ${errorMessage(err)}`);
    }
    io.setExitCode(1);
  };

  program
    .name('codelore')
    .description('Structural and semantic indexing of Python codebases')
    .version(VERSION);

  program
    .command('analyze <path>')
    .description('Extract entities and relationships from every Python file under a directory')
    .option('-o, --output <file>', 'Where to write the analysis JSON')
    .option('--name <name>', 'Project name (default: directory name)')
    .option('-j, --json', 'Output as JSON')
    .action(async (path: string, options: { output?: string; name?: string; json?: boolean }) => {
      try {
        const result = await runAnalyzeCommand(path, {
          output: options.output,
          name: options.name,
          showProgress: !options.json,
        });
        io.out(options.json ? formatAsJson({ command: 'analyze', result }) : formatAnalyzeResult(result));
      } catch (err) {
        fail(err, options.json);
      }
    });

  program
    .command('index <path>')
    .description('Analyze a project and build its semantic index')
    .option('-o, --output <file>', 'Where to write the semantic index JSON')
    .option('--analysis <file>', 'Also write the structural analysis JSON')
    .option('--name <name>', 'Project name (default: directory name)')
    .option('-j, --json', 'Output as JSON')
    .action(
      async (path: string, options: { output?: string; analysis?: string; name?: string; json?: boolean }) => {
        try {
          const result = await runIndexCommand(path, {
            output: options.output,
            analysisOutput: options.analysis,
            name: options.name,
            showProgress: !options.json,
          });
          io.out(options.json ? formatAsJson({ command: 'index', result }) : formatIndexResult(result));
        } catch (err) {
          fail(err, options.json);
        }
      }
    );

  program
    .command('query <index-file> <query...>')
    .description('Search a semantic index for code matching a query')
    .option('-n, --limit <number>', 'Maximum number of results', parsePositiveInt)
    .option('--files', 'Rank files instead of entities')
    .option('-j, --json', 'Output as JSON')
    .action(
      async (indexFile: string, words: string[], options: { limit?: number; files?: boolean; json?: boolean }) => {
        try {
          const result = await runQueryCommand(indexFile, words.join(' '), {
            limit: options.limit,
            files: options.files,
          });
          io.out(options.json ? formatAsJson({ command: 'query', result }) : formatQueryResult(result));
        } catch (err) {
          fail(err, options.json);
        }
      }
    );

  program
    .command('workflows <index-file>')
    .description('List the workflow hints of a semantic index')
    .option('--min-confidence <number>', 'Only show hints at or above this confidence', parseConfidence)
    .option('-j, --json', 'Output as JSON')
    .action(async (indexFile: string, options: { minConfidence?: number; json?: boolean }) => {
      try {
        const result = await runWorkflowsCommand(indexFile, { minConfidence: options.minConfidence });
        io.out(options.json ? formatAsJson({ command: 'workflows', result }) : formatWorkflowsResult(result));
      } catch (err) {
        fail(err, options.json);
      }
    });

  program
    .command('config [key] [value]')
    .description('Get or set configuration values')
    .option('-j, --json', 'Output as JSON')
    .action(async (key: string | undefined, value: string | undefined, options: { json?: boolean }) => {
      try {
        const result = await runConfigCommand(key, value);
        io.out(options.json ? formatAsJson({ command: 'config', result }) : formatConfigResult(result));
      } catch (err) {
        fail(err, options.json);
      }
    });

  return program;
}
