import type { Dirent } from 'node:fs';
import { readdir, readFile } from 'node:fs/promises';
import { join, relative, extname } from 'node:path';
import ignore, { type Ignore } from 'ignore';
import { errorMessage, isNodeError } from './errors.js';

/**
 * Result from walking a single file.
 */
export interface WalkResult {
  /** Absolute path to the file */
  absolutePath: string;
  /** Path relative to the walk root, with forward slashes */
  relativePath: string;
  /** File extension (including dot) */
  extension: string;
}

/**
 * Files found by a walk, plus the directories and ignore files it could not
 * read. Only a failure to read the root itself rejects.
 */
export interface WalkOutcome {
  files: WalkResult[];
  errors: string[];
}

/**
 * Options for file walking.
 */
export interface WalkOptions {
  /** Names or globs to exclude (directories and files) */
  excludes?: string[];
  /** File extensions to report (default: ['.py']) */
  extensions?: string[];
  /** Whether to include hidden files (default: false) */
  includeHidden?: boolean;
  /** Whether to respect .gitignore files (default: true) */
  respectGitignore?: boolean;
  /** Whether to respect .codeloreignore files (default: true) */
  respectCodeloreignore?: boolean;
}

/**
 * Default directories and file patterns to exclude.
 *
 * Users can add negation patterns to a .codeloreignore file or change the
 * list with `codelore config excludes`.
 */
export const DEFAULT_EXCLUDES: string[] = [
  // Version control
  '.git',
  '.hg',
  '.svn',
  '.bzr',

  // Virtual environments and installed packages
  '.venv',
  'venv',
  'env',
  '.env',
  'site-packages',
  'node_modules',
  '*.egg-info',
  '.eggs',

  // Caches
  '__pycache__',
  '.pytest_cache',
  '.mypy_cache',
  '.ruff_cache',
  '.tox',
  '.nox',
  '.hypothesis',
  '.cache',

  // Build output
  'build',
  'dist',
  '_build',
  'htmlcov',

  // IDE/editor
  '.idea',
  '.vscode',
];

export const DEFAULT_EXTENSIONS: string[] = ['.py'];

/**
 * Check if a path should be excluded based on patterns.
 */
export function shouldExclude(name: string, excludes: string[]): boolean {
  for (const pattern of excludes) {
    // Exact match
    if (name === pattern) {
      return true;
    }

    // Glob pattern matching
    if (pattern.includes('*') && globToRegex(pattern).test(name)) {
      return true;
    }
  }

  return false;
}

/**
 * Convert a simple glob pattern to a regex.
 */
function globToRegex(pattern: string): RegExp {
  // Escape special regex characters except *
  const regexStr = pattern.replace(/[.+?^${}()|[\]\\]/g, '\\$&').replace(/\*/g, '.*');

  return new RegExp(`^${regexStr}$`);
}

/**
 * Read the patterns of an ignore file (.gitignore or .codeloreignore).
 * A missing file has no patterns; any other failure is recorded and the
 * file is treated as empty.
 */
async function readIgnoreFile(rootPath: string, name: string, errors: string[]): Promise<string[]> {
  let content: string;
  try {
    content = await readFile(join(rootPath, name), 'utf-8');
  } catch (error) {
    if (!(isNodeError(error) && error.code === 'ENOENT')) {
      errors.push(`Cannot read ${name}: ${errorMessage(error)}`);
    }
    return [];
  }
  return content
    .split('\n')
    .map(line => line.trim())
    .filter(line => line && !line.startsWith('#'));
}

async function createIgnoreFilter(
  rootPath: string,
  options: { respectGitignore: boolean; respectCodeloreignore: boolean },
  errors: string[]
): Promise<Ignore> {
  const ig = ignore();

  if (options.respectGitignore) {
    ig.add(await readIgnoreFile(rootPath, '.gitignore', errors));
  }

  // Added last so its negations can re-include gitignored paths
  if (options.respectCodeloreignore) {
    ig.add(await readIgnoreFile(rootPath, '.codeloreignore', errors));
  }

  return ig;
}

/**
 * Walk a directory and find source files, in sorted path order.
 */
export async function walkFiles(rootPath: string, options: WalkOptions = {}): Promise<WalkOutcome> {
  const {
    excludes = DEFAULT_EXCLUDES,
    extensions = DEFAULT_EXTENSIONS,
    includeHidden = false,
    respectGitignore = true,
    respectCodeloreignore = true,
  } = options;

  const files: WalkResult[] = [];
  const errors: string[] = [];
  const ignoreFilter = await createIgnoreFilter(rootPath, { respectGitignore, respectCodeloreignore }, errors);

  async function walk(currentPath: string): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await readdir(currentPath, { withFileTypes: true });
    } catch (error) {
      if (currentPath === rootPath) {
        throw error;
      }
      const relativeDir = relative(rootPath, currentPath).replace(/\\/g, '/');
      errors.push(`Cannot read directory ${relativeDir}: ${errorMessage(error)}`);
      return;
    }
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const name = entry.name;
      const fullPath = join(currentPath, name);
      const relativePath = relative(rootPath, fullPath).replace(/\\/g, '/');

      if (!includeHidden && name.startsWith('.')) {
        continue;
      }

      if (shouldExclude(name, excludes)) {
        continue;
      }

      // Directories are tested with a trailing slash so `build/` patterns match
      if (ignoreFilter.ignores(entry.isDirectory() ? `${relativePath}/` : relativePath)) {
        continue;
      }

      if (entry.isDirectory()) {
        await walk(fullPath);
      } else if (entry.isFile() && extensions.includes(extname(name))) {
        files.push({
          absolutePath: fullPath,
          relativePath,
          extension: extname(name),
        });
      }
    }
  }

  await walk(rootPath);
  return { files, errors };
}
