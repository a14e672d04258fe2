/**
 * Tests for the shared command helpers
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  describeFailure,
  exitCodeForScore,
  parseFormatOption,
  parseIntegerOption,
  resolveSessionId,
  writeOutput,
} from '../../../src/cli/commands/common.js';
import { RuleSourceError } from '../../../src/types/errors.js';

describe('parseIntegerOption', () => {
  it('should parse non-negative integers', () => {
    expect(parseIntegerOption('0')).toBe(0);
    expect(parseIntegerOption(' 75 ')).toBe(75);
  });

  it('should reject anything else', () => {
    for (const value of ['-1', '2.5', 'ten', '']) {
      expect(() => parseIntegerOption(value)).toThrow(InvalidArgumentError);
    }
  });
});

describe('parseFormatOption', () => {
  it('should accept the report formats', () => {
    expect(parseFormatOption('markdown')).toBe('markdown');
  });

  it('should list the choices on error', () => {
    expect(() => parseFormatOption('html')).toThrow('Expected one of: text, json, markdown.');
  });
});

describe('resolveSessionId', () => {
  it('should prefer the flag over the environment', () => {
    expect(resolveSessionId('flag', { PULSE_SESSION_ID: 'env' })).toBe('flag');
    expect(resolveSessionId(undefined, { PULSE_SESSION_ID: 'env' })).toBe('env');
  });

  it('should treat blank values as missing', () => {
    expect(resolveSessionId('  ', {})).toBeUndefined();
    expect(resolveSessionId(undefined, {})).toBeUndefined();
  });
});

describe('exitCodeForScore', () => {
  it('should fail only below the threshold', () => {
    expect(exitCodeForScore(49, 50)).toBe(2);
    expect(exitCodeForScore(50, 50)).toBe(0);
  });
});

describe('describeFailure', () => {
  it('should append the error code', () => {
    expect(describeFailure(new RuleSourceError('SOURCE_NOT_FOUND', 'rules.yaml', 'gone'))).toBe(
      'gone [SOURCE_NOT_FOUND]'
    );
  });

  it('should handle plain errors and other values', () => {
    expect(describeFailure(new Error('boom'))).toBe('boom');
    expect(describeFailure(42)).toBe('42');
  });
});

describe('writeOutput', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'pulse-output-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should create parent directories and end the file with a newline', async () => {
    const target = join(dir, 'out', 'report.txt');
    expect(await writeOutput('hello', target)).toBe(target);
    expect(readFileSync(target, 'utf-8')).toBe('hello\n');
  });
});
