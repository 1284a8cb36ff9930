import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { createProgram, type ProgramIO } from './program.js';
import { DEFAULT_CONFIG, saveConfig } from '../storage/config.js';

interface CapturedIO extends ProgramIO {
  stdout: string[];
  stderr: string[];
  exitCode: number;
}

function createIO(): CapturedIO {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const io: CapturedIO = {
    stdout,
    stderr,
    exitCode: 0,
    out: text => stdout.push(text),
    err: text => stderr.push(text),
    setExitCode: code => {
      io.exitCode = code;
    },
  };
  return io;
}

describe('codelore program', () => {
  let testDir: string;
  let sourceDir: string;
  let originalEnv: NodeJS.ProcessEnv;

  beforeEach(async () => {
    testDir = join(tmpdir(), `codelore-program-${randomUUID()}`);
    sourceDir = join(testDir, 'books');
    await mkdir(sourceDir, { recursive: true });

    originalEnv = { ...process.env };
    process.env['CODELORE_HOME'] = testDir;
    await saveConfig({ ...DEFAULT_CONFIG, logLevel: 'silent' });

    await writeFile(join(sourceDir, 'tax_utils.py'), 'def calculate_tax_amount(amount):\n    return amount\n');
  });

  afterEach(async () => {
    process.env = originalEnv;
    await rm(testDir, { recursive: true, force: true });
  });

  it('should index and then query from the command line', async () => {
    const indexFile = join(testDir, 'index.json');
    const indexIO = createIO();
    await createProgram(indexIO).parseAsync(['index', sourceDir, '-o', indexFile, '--json'], { from: 'user' });

    expect(indexIO.exitCode).toBe(0);
    expect(JSON.parse(indexIO.stdout[0] ?? '')).toMatchObject({ command: 'index', files: 1, entities: 1 });

    const queryIO = createIO();
    await createProgram(queryIO).parseAsync(['query', indexFile, 'tax', 'amount', '-n', '5', '--json'], {
      from: 'user',
    });

    const output = JSON.parse(queryIO.stdout[0] ?? '');
    expect(output.query).toBe('tax amount');
    expect(output.results.map((r: { entityName: string }) => r.entityName)).toEqual(['calculate_tax_amount']);
  });

  it('should print config values as text', async () => {
    const io = createIO();

    await createProgram(io).parseAsync(['config', 'logLevel'], { from: 'user' });

    expect(io.stdout).toEqual(['silent']);
  });

  it('should report errors as JSON and set the exit code', async () => {
    const io = createIO();

    await createProgram(io).parseAsync(['analyze', join(testDir, 'missing'), '--json'], { from: 'user' });

    expect(io.exitCode).toBe(1);
    expect(JSON.parse(io.stdout[0] ?? '')).toEqual({
      error: `Invalid project root ${join(testDir, 'missing')}: no such directory`,
      code: 'INVALID_ROOT',
    });
  });

  it('should report errors as text on stderr', async () => {
    const io = createIO();

    await createProgram(io).parseAsync(['workflows', join(testDir, 'missing.json')], { from: 'user' });

    expect(io.exitCode).toBe(1);
    expect(io.stdout).toEqual([]);
    expect(io.stderr[0]).toMatch(/^Error: ENOENT/);
  });
});
