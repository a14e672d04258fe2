/**
 * Structure scanner tests on a temporary project tree
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, symlinkSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { basename, dirname, join } from 'node:path';
import { matchFrameworks, packageDependencyNames, scanProject } from '../../src/analysis/structure-scanner.js';
import { AnalysisLogger } from '../../src/analysis/analysis-logger.js';

function write(root: string, relativePath: string, content = ''): void {
  const file = join(root, relativePath);
  mkdirSync(dirname(file), { recursive: true });
  writeFileSync(file, content);
}

describe('scanProject', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'pulse-scan-'));
    write(root, 'package.json', JSON.stringify({ dependencies: { react: '^18.0.0' }, devDependencies: { vitest: '^2.0.0' } }));
    write(root, 'README.md', '# Demo\n');
    write(root, 'Dockerfile', 'FROM node:20\n');
    write(root, 'cache.pyc');
    write(root, 'src/index.ts', 'export {};\n');
    write(root, 'tests/app.test.ts', '');
    write(root, '.github/workflows/ci.yml', 'on: push\n');
    write(root, 'node_modules/left-pad/index.js', '');
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('should record files and directories as relative POSIX paths', async () => {
    const snapshot = await scanProject(root);

    expect([...snapshot.files]).toEqual([
      '.github/workflows/ci.yml',
      'Dockerfile',
      'README.md',
      'package.json',
      'src/index.ts',
      'tests/app.test.ts',
    ]);
    expect([...snapshot.directories]).toEqual(['.github', '.github/workflows', 'node_modules', 'src', 'tests']);
    expect(snapshot.projectName).toBe(basename(root));
    expect(snapshot.skipped).toEqual([]);
  });

  it('should derive types, frameworks and flags', async () => {
    const snapshot = await scanProject(root);

    expect(snapshot.projectTypes).toEqual(['node']);
    expect(snapshot.frameworks).toEqual(['react']);
    expect(snapshot.flags).toEqual({ hasGit: false, hasCI: true, hasTests: true, hasDocker: true });
  });

  it('should produce the same snapshot at any concurrency', async () => {
    const one = await scanProject(root, { concurrency: 1 });
    const many = await scanProject(root, { concurrency: 16 });

    expect([...many.files]).toEqual([...one.files]);
    expect([...many.directories]).toEqual([...one.directories]);
  });

  it('should record but not descend extra ignored directories', async () => {
    const snapshot = await scanProject(root, { extraIgnores: ['src'] });

    expect(snapshot.directories.has('src')).toBe(true);
    expect(snapshot.files.has('src/index.ts')).toBe(false);
  });

  it('should record an unparsable package.json as skipped', async () => {
    write(root, 'package.json', '{ broken');
    const snapshot = await scanProject(root);

    expect(snapshot.frameworks).toEqual([]);
    expect(snapshot.skipped.map((s) => s.path)).toEqual(['package.json']);
  });

  it('should skip a dangling symlink and keep walking', async () => {
    symlinkSync(join(root, 'src', 'gone.ts'), join(root, 'src', 'alpha.ts'));
    symlinkSync(join(root, 'src', 'gone.ts'), join(root, 'src', 'Beta.ts'));

    const snapshot = await scanProject(root);

    expect(snapshot.skipped.map((s) => s.path)).toEqual(['src/Beta.ts', 'src/alpha.ts']);
    expect(snapshot.skipped[0].reason).toMatch(/^ENOENT: /);
    expect(snapshot.files.has('src/index.ts')).toBe(true);
    expect(snapshot.files.has('tests/app.test.ts')).toBe(true);
  });

  it('should log each scanned subtree at debug level', async () => {
    const logger = new AnalysisLogger({ verbose: true });
    await scanProject(root, { logger });

    const messages = logger
      .getEntries()
      .filter((e) => e.event === 'subtree_scanned')
      .map((e) => e.message)
      .sort();
    expect(messages).toEqual(['scanned .github', 'scanned src', 'scanned tests']);
  });

  it('should fail with ROOT_NOT_FOUND for a missing root', async () => {
    await expect(scanProject(join(root, 'missing'))).rejects.toMatchObject({
      name: 'ScanError',
      code: 'ROOT_NOT_FOUND',
    });
  });

  it('should fail with ROOT_NOT_DIRECTORY for a file', async () => {
    await expect(scanProject(join(root, 'README.md'))).rejects.toMatchObject({ code: 'ROOT_NOT_DIRECTORY' });
  });

  it('should fail with SCAN_ABORTED when cancelled', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(scanProject(root, { signal: controller.signal })).rejects.toMatchObject({ code: 'SCAN_ABORTED' });
  });

  it('should fail with SCAN_ABORTED when the deadline passes mid-walk', async () => {
    const deep = join(root, 'deep');
    write(deep, 'a/b/c/d/e/f/g/h/leaf.txt', 'x');
    let clock = 0;
    vi.spyOn(Date, 'now').mockImplementation(() => ++clock);

    await expect(scanProject(deep, { timeoutMs: 3 })).rejects.toMatchObject({
      name: 'ScanError',
      code: 'SCAN_ABORTED',
    });
  });
});

describe('framework detection helpers', () => {
  it('should collect dependency names from both buckets', () => {
    expect(packageDependencyNames({ dependencies: { express: '^4' }, devDependencies: { vitest: '^2' } })).toEqual([
      'express',
      'vitest',
    ]);
    expect(packageDependencyNames('not an object')).toEqual([]);
  });

  it('should match indicators by substring', () => {
    expect(matchFrameworks(['@nestjs/core', 'express'])).toEqual(['express', 'nestjs']);
    expect(matchFrameworks(['Django==5.0\nrequests'])).toEqual(['django']);
  });
});
