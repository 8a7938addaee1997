/**
 * Tests for the error handling system
 *
 * Tests cover:
 * - Error class properties and exit codes
 * - Error formatting (text and JSON)
 * - Verbose mode (causes and stack traces)
 */

import { describe, it, expect } from 'vitest';
import {
  CLIError,
  FileNotFoundError,
  ConfigError,
  APIKeyError,
  DatabaseError,
  ValidationError,
  DocumentParseError,
  DocumentDecodeError,
  EmbeddingError,
  UnknownToolError,
  QueryError,
  formatError,
  getExitCode,
} from '../index.js';

describe('Error Classes', () => {
  describe('CLIError', () => {
    it('creates error with message only', () => {
      const error = new CLIError('Something went wrong');

      expect(error.message).toBe('Something went wrong');
      expect(error.hint).toBeUndefined();
      expect(error.code).toBe(1);
      expect(error.name).toBe('CLIError');
    });

    it('keeps a custom exit code', () => {
      expect(new CLIError('Critical failure', 'Reboot', 99).code).toBe(99);
    });

    it('is instanceof Error and CLIError', () => {
      const error = new ConfigError('bad');

      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(CLIError);
      expect(error).toBeInstanceOf(ConfigError);
    });
  });

  it.each([
    [new FileNotFoundError('/missing'), 'FileNotFoundError', 3],
    [new ConfigError('bad toml'), 'ConfigError', 2],
    [new APIKeyError('Anthropic', 'ANTHROPIC_API_KEY'), 'APIKeyError', 4],
    [new DatabaseError('locked'), 'DatabaseError', 5],
    [new ValidationError('bad input'), 'ValidationError', 1],
    [new DocumentParseError('a.txt', 'missing title'), 'DocumentParseError', 6],
    [new DocumentDecodeError('a.bin', 0.5), 'DocumentDecodeError', 6],
    [new EmbeddingError('down'), 'EmbeddingError', 7],
    [new UnknownToolError('nope', ['search_course_content']), 'UnknownToolError', 8],
    [new QueryError('failed'), 'QueryError', 9],
  ])('%s has name %s and exit code %i', (error, name, code) => {
    expect(error.name).toBe(name);
    expect(error.code).toBe(code);
    expect(getExitCode(error)).toBe(code);
  });

  it('FileNotFoundError names the path', () => {
    expect(new FileNotFoundError('/tmp/docs').message).toBe('Path does not exist: /tmp/docs');
  });

  it('APIKeyError hints at the environment variable', () => {
    const error = new APIKeyError('Anthropic', 'ANTHROPIC_API_KEY');

    expect(error.message).toBe('Anthropic API key not configured');
    expect(error.hint).toContain('ANTHROPIC_API_KEY');
  });

  it('APIKeyError derives the variable name from the provider', () => {
    expect(new APIKeyError('openai').hint).toContain('OPENAI_API_KEY');
  });

  it('APIKeyError takes a specific message and hint', () => {
    const error = new APIKeyError('Anthropic', 'ANTHROPIC_API_KEY', {
      message: 'Invalid key format',
      hint: 'Get a key from the console',
    });

    expect(error.message).toBe('Invalid key format');
    expect(error.hint).toBe('Get a key from the console');
    expect(error.code).toBe(4);
  });

  it('ValidationError lists issues in the hint', () => {
    const error = new ValidationError('Invalid options', ['a: too small', 'b: required']);

    expect(error.issues).toEqual(['a: too small', 'b: required']);
    expect(error.hint).toBe('Issues:\n  a: too small\n  b: required');
  });

  it('DocumentParseError keeps the source', () => {
    const error = new DocumentParseError('course1.txt', 'missing "Course Title:" line');

    expect(error.source).toBe('course1.txt');
    expect(error.message).toBe(
      'Cannot parse course document course1.txt: missing "Course Title:" line'
    );
  });

  it('DocumentDecodeError reports the invalid percentage', () => {
    expect(new DocumentDecodeError('blob.txt', 0.25).message).toBe(
      'Cannot decode blob.txt: 25.0% of characters are not valid UTF-8'
    );
  });

  it('UnknownToolError lists registered tools', () => {
    const error = new UnknownToolError('delete_everything', ['search_course_content']);

    expect(error.message).toBe("Tool 'delete_everything' not found");
    expect(error.toolName).toBe('delete_everything');
    expect(error.hint).toBe('Registered tools: search_course_content');
  });

  it('UnknownToolError with an empty registry', () => {
    expect(new UnknownToolError('x', []).hint).toBe('No tools are registered');
  });

  it('QueryError keeps the cause', () => {
    const cause = new Error('overloaded');
    expect(new QueryError('Query failed', cause).cause).toBe(cause);
  });
});

describe('getExitCode', () => {
  it('returns 1 for plain errors and non-errors', () => {
    expect(getExitCode(new Error('x'))).toBe(1);
    expect(getExitCode('x')).toBe(1);
  });
});

describe('formatError', () => {
  it('includes the message and hint for CLIError', () => {
    const output = formatError(new ConfigError('Invalid TOML', 'Fix the file'));

    expect(output).toContain('Invalid TOML');
    expect(output).toContain('Fix the file');
  });

  it('suggests --verbose for plain errors', () => {
    const output = formatError(new Error('boom'));

    expect(output).toContain('boom');
    expect(output).toContain('Run with --verbose for more details');
  });

  it('shows the cause and stack in verbose mode', () => {
    const error = new QueryError('Query failed', new Error('rate limited'));
    const output = formatError(error, { verbose: true });

    expect(output).toContain('Caused by: ');
    expect(output).toContain('rate limited');
    expect(output).toContain('Stack trace:');
  });

  it('formats non-Error values', () => {
    expect(formatError('plain string')).toContain('plain string');
  });

  describe('JSON mode', () => {
    it('outputs structured JSON for CLIError', () => {
      const output = formatError(new FileNotFoundError('/x'), { json: true });

      expect(JSON.parse(output)).toEqual({
        error: 'Path does not exist: /x',
        name: 'FileNotFoundError',
        code: 3,
        hint: 'Check the path and try again',
      });
    });

    it('includes cause and stack only in verbose mode', () => {
      const error = new QueryError('Query failed', new Error('timeout'));

      const quiet = JSON.parse(formatError(error, { json: true }));
      const verbose = JSON.parse(formatError(error, { json: true, verbose: true }));

      expect(quiet.cause).toBeUndefined();
      expect(quiet.stack).toBeUndefined();
      expect(verbose.cause).toBe('timeout');
      expect(typeof verbose.stack).toBe('string');
    });

    it('formats non-Error values', () => {
      expect(JSON.parse(formatError(42, { json: true }))).toEqual({
        error: '42',
        name: 'Error',
        code: 1,
      });
    });
  });
});
