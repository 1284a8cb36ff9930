import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { formatConfigResult, isConfigKey, runConfigCommand } from './config.js';
import { DEFAULT_CONFIG, loadConfig } from '../../storage/config.js';

describe('config command', () => {
  let testDir: string;
  let originalEnv: NodeJS.ProcessEnv;

  beforeEach(async () => {
    testDir = join(tmpdir(), `codelore-config-cmd-${randomUUID()}`);
    await mkdir(testDir, { recursive: true });
    originalEnv = { ...process.env };
    process.env['CODELORE_HOME'] = testDir;
  });

  afterEach(async () => {
    process.env = originalEnv;
    await rm(testDir, { recursive: true, force: true });
  });

  it('should show the whole configuration', async () => {
    const result = await runConfigCommand();

    expect(result).toEqual({ action: 'show', config: DEFAULT_CONFIG });
    expect(formatConfigResult(result).split('\n')).toEqual([
      'maxFileSize: 10485760',
      `excludes: ${DEFAULT_CONFIG.excludes.join(', ')}`,
      'includeHidden: false',
      'respectGitignore: true',
      'concurrency: 10',
      'previewLines: 5',
      'maxResults: 10',
      'logLevel: info',
    ]);
  });

  it('should get a single value', async () => {
    const result = await runConfigCommand('concurrency');

    expect(result).toEqual({ action: 'get', key: 'concurrency', value: 10 });
    expect(formatConfigResult(result)).toBe('10');
  });

  it('should set and persist a numeric value', async () => {
    const result = await runConfigCommand('maxResults', '25');

    expect(formatConfigResult(result)).toBe('Set maxResults = 25');
    expect((await loadConfig()).maxResults).toBe(25);
  });

  it('should set booleans, lists and log levels', async () => {
    await runConfigCommand('includeHidden', 'true');
    await runConfigCommand('excludes', 'build, dist,,vendor');
    await runConfigCommand('logLevel', 'debug');

    const config = await loadConfig();
    expect(config.includeHidden).toBe(true);
    expect(config.excludes).toEqual(['build', 'dist', 'vendor']);
    expect(config.logLevel).toBe('debug');
  });

  it('should reject unknown keys', async () => {
    await expect(runConfigCommand('model', 'x')).rejects.toThrow(/^Unknown config key: model\. Valid keys: maxFileSize, /);
  });

  it('should reject values of the wrong type', async () => {
    await expect(runConfigCommand('concurrency', 'many')).rejects.toThrow('Invalid numeric value for concurrency: many');
    await expect(runConfigCommand('concurrency', '0')).rejects.toThrow('Invalid numeric value for concurrency: 0');
    await expect(runConfigCommand('includeHidden', 'yes')).rejects.toThrow(
      'Invalid boolean value for includeHidden: yes (use true or false)'
    );
    await expect(runConfigCommand('logLevel', 'loud')).rejects.toThrow('Invalid log level: loud');
  });

  it('should recognise config keys', () => {
    expect(isConfigKey('previewLines')).toBe(true);
    expect(isConfigKey('toString')).toBe(false);
  });
});
