import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { analyzeProject } from './analyzer.js';
import { MemoryLogger } from '../logger.js';

// Directories listed here fail to open, whoever runs the tests
const lockedDirs = vi.hoisted(() => new Set<string>());

vi.mock('node:fs/promises', async importOriginal => {
  const actual = await importOriginal<typeof import('node:fs/promises')>();
  return {
    ...actual,
    readdir: async (path: string, options: { withFileTypes: true }) => {
      if (lockedDirs.has(path)) {
        const error: NodeJS.ErrnoException = new Error('EACCES: permission denied');
        error.code = 'EACCES';
        throw error;
      }
      return actual.readdir(path, options);
    },
  };
});

describe('project analyzer with unreadable directories', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `codelore-unreadable-${randomUUID()}`);
    await mkdir(join(testDir, 'locked'), { recursive: true });
    await mkdir(join(testDir, 'reports'), { recursive: true });
    await writeFile(join(testDir, 'ok.py'), 'def post():\n    pass\n');
    await writeFile(join(testDir, 'locked', 'hidden.py'), 'def secret():\n    pass\n');
    await writeFile(join(testDir, 'reports', 'trial.py'), 'def trial_balance():\n    pass\n');
    lockedDirs.add(join(testDir, 'locked'));
  });

  afterEach(async () => {
    lockedDirs.clear();
    await rm(testDir, { recursive: true, force: true });
  });

  it('should skip the directory, record it and keep analyzing its siblings', async () => {
    const logger = new MemoryLogger();

    const project = await analyzeProject(testDir, { logger });

    expect(project.fileAnalyses.map(f => f.filePath)).toEqual(['ok.py', 'reports/trial.py']);
    expect(project.errors).toEqual(['Cannot read directory locked: EACCES: permission denied']);
    expect(logger.messages('warn')).toEqual(['Cannot read directory locked: EACCES: permission denied']);
  });

  it('should still fail when the root cannot be read', async () => {
    lockedDirs.add(testDir);

    await expect(analyzeProject(testDir)).rejects.toThrow('EACCES: permission denied');
  });
});
