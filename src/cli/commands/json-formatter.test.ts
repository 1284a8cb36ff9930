import { describe, it, expect } from 'vitest';
import { formatAsJson, formatErrorJson } from './json-formatter.js';
import { InvalidRootError, IndexFormatError } from '../../core/errors.js';

describe('json formatter', () => {
  it('should tag command results with the command name', () => {
    const json = formatAsJson({
      command: 'workflows',
      result: { projectName: 'books', workflows: [], count: 0 },
    });

    expect(JSON.parse(json)).toEqual({ command: 'workflows', projectName: 'books', workflows: [], count: 0 });
  });

  it('should wrap config output in a config object', () => {
    expect(JSON.parse(formatAsJson({ command: 'config', result: { action: 'get', key: 'concurrency', value: 4 } }))).toEqual({
      config: { concurrency: 4 },
    });
  });

  it('should produce single-line JSON', () => {
    const json = formatAsJson({ command: 'query', result: { mode: 'entities', query: 'tax', results: [], count: 0 } });

    expect(json).toBe('{"command":"query","mode":"entities","query":"tax","results":[],"count":0}');
  });

  describe('formatErrorJson', () => {
    it('should use the code of analysis errors', () => {
      expect(formatErrorJson(new InvalidRootError('/nope', 'no such directory'))).toEqual({
        error: 'Invalid project root /nope: no such directory',
        code: 'INVALID_ROOT',
      });
      expect(formatErrorJson(new IndexFormatError('semantic index', 'metadata: Required'))).toEqual({
        error: 'Invalid semantic index: metadata: Required',
        code: 'INDEX_FORMAT',
      });
    });

    it('should report missing files as not found', () => {
      const error = Object.assign(new Error("ENOENT: no such file or directory, open 'index.json'"), { code: 'ENOENT' });

      expect(formatErrorJson(error).code).toBe('NOT_FOUND');
    });

    it('should classify validation messages', () => {
      expect(formatErrorJson(new Error('Unknown config key: model'))).toEqual({
        error: 'Unknown config key: model',
        code: 'VALIDATION_ERROR',
      });
      expect(formatErrorJson('boom')).toEqual({ error: 'boom', code: 'COMMAND_ERROR' });
    });
  });
});
