/**
 * Deterministic structure scanner.
 *
 * Walks a project root into an immutable ProjectSnapshot: relative file and
 * directory paths, ecosystems inferred from marker files, frameworks inferred
 * from root manifests, and the setup flags. Top-level subtrees are walked in
 * parallel under a bounded pool and merged by set union.
 */

import { promises as fs, type Dirent } from 'node:fs';
import path from 'node:path';
import type { ProjectSnapshot, ScanSkip } from '../types/analysis.js';
import { ScanError } from '../types/errors.js';
import type { AnalysisLogger } from './analysis-logger.js';
import { compareIds } from './scoring.js';
import { mapWithConcurrency } from './concurrency.js';
import { createSnapshot, toPosixPath } from './snapshot.js';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Directories recorded when present but never descended into */
export const SKIP_DIRS = new Set([
  'node_modules', '.git', 'dist', 'build', '__pycache__', 'vendor', 'target',
  '.venv', 'venv', '.next', '.nuxt', 'coverage',
]);

const SKIP_FILE_SUFFIXES = ['.pyc', '.class', '.o', '.so'];

/**
 * Framework name substrings. For package.json they are matched against
 * dependency names; for other manifests against the raw text.
 */
export const FRAMEWORK_INDICATORS: Record<string, readonly string[]> = {
  react: ['react', '@types/react'],
  vue: ['vue', '@vue/'],
  angular: ['@angular/'],
  svelte: ['svelte'],
  next: ['next'],
  express: ['express'],
  nestjs: ['@nestjs/'],
  django: ['django', 'Django'],
  flask: ['flask', 'Flask'],
  fastapi: ['fastapi'],
  spring: ['spring-boot', 'org.springframework'],
  laravel: ['laravel/framework'],
  rails: ['rails'],
};

/** Root manifests scanned as plain text */
const TEXT_MANIFESTS = [
  'requirements.txt',
  'pyproject.toml',
  'Pipfile',
  'pom.xml',
  'build.gradle',
  'build.gradle.kts',
  'composer.json',
  'Gemfile',
];

export const DEFAULT_SCAN_CONCURRENCY = 8;

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface ScanOptions {
  /** Maximum top-level subtrees walked at once */
  concurrency?: number;
  /** Cancels the walk; a cancelled scan raises ScanError('SCAN_ABORTED') */
  signal?: AbortSignal;
  /** Deadline in milliseconds; 0 or undefined means none */
  timeoutMs?: number;
  /** Extra directory names to skip */
  extraIgnores?: readonly string[];
  logger?: AnalysisLogger;
}

interface WalkResult {
  files: string[];
  directories: string[];
  skipped: ScanSkip[];
}

interface WalkContext {
  root: string;
  skipDirs: ReadonlySet<string>;
  checkCancelled: () => void;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function describeError(error: unknown): string {
  if (error instanceof Error) {
    const code = (error as NodeJS.ErrnoException).code;
    return code ? `${code}: ${error.message}` : error.message;
  }
  return String(error);
}

function isSkippedFile(name: string): boolean {
  return SKIP_FILE_SUFFIXES.some((suffix) => name.endsWith(suffix));
}

/**
 * Resolve what a directory entry is, following symlinks one level.
 * Symlinked directories are recorded but not descended.
 */
async function classifyEntry(
  entry: Dirent,
  absolutePath: string
): Promise<{ kind: 'file' | 'dir' | 'other'; descend: boolean }> {
  if (entry.isFile()) return { kind: 'file', descend: false };
  if (entry.isDirectory()) return { kind: 'dir', descend: true };
  if (entry.isSymbolicLink()) {
    const stat = await fs.stat(absolutePath);
    if (stat.isFile()) return { kind: 'file', descend: false };
    if (stat.isDirectory()) return { kind: 'dir', descend: false };
  }
  return { kind: 'other', descend: false };
}

/**
 * Walk one directory and everything below it. Per-entry failures are
 * recorded in `skipped` and the walk continues.
 */
async function walkDirectory(ctx: WalkContext, absoluteDir: string, out: WalkResult): Promise<void> {
  ctx.checkCancelled();

  let entries: Dirent[];
  try {
    entries = await fs.readdir(absoluteDir, { withFileTypes: true });
  } catch (error) {
    out.skipped.push({
      path: toPosixPath(path.relative(ctx.root, absoluteDir)),
      reason: describeError(error),
    });
    return;
  }

  for (const entry of entries) {
    const abs = path.join(absoluteDir, entry.name);
    const rel = toPosixPath(path.relative(ctx.root, abs));

    let classified: { kind: 'file' | 'dir' | 'other'; descend: boolean };
    try {
      classified = await classifyEntry(entry, abs);
    } catch (error) {
      out.skipped.push({ path: rel, reason: describeError(error) });
      continue;
    }

    if (classified.kind === 'file') {
      if (!isSkippedFile(entry.name)) out.files.push(rel);
    } else if (classified.kind === 'dir') {
      out.directories.push(rel);
      if (classified.descend && !ctx.skipDirs.has(entry.name)) {
        await walkDirectory(ctx, abs, out);
      }
    }
  }
}

/**
 * Verify the root exists and is a directory.
 */
async function assertRoot(root: string): Promise<void> {
  let stat;
  try {
    stat = await fs.stat(root);
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      throw new ScanError('ROOT_NOT_FOUND', root, `Project path does not exist: ${root}`);
    }
    throw new ScanError('ROOT_UNREADABLE', root, `Cannot access project path ${root}: ${describeError(error)}`);
  }
  if (!stat.isDirectory()) {
    throw new ScanError('ROOT_NOT_DIRECTORY', root, `Project path is not a directory: ${root}`);
  }
}

// ---------------------------------------------------------------------------
// Framework detection
// ---------------------------------------------------------------------------

function isStringRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Extract dependency names from a parsed package.json.
 */
export function packageDependencyNames(pkg: unknown): string[] {
  if (!isStringRecord(pkg)) return [];
  const names: string[] = [];
  for (const bucket of ['dependencies', 'devDependencies']) {
    const deps = pkg[bucket];
    if (isStringRecord(deps)) names.push(...Object.keys(deps));
  }
  return names;
}

/**
 * Match framework indicators against a list of haystacks.
 */
export function matchFrameworks(haystacks: readonly string[]): string[] {
  const found: string[] = [];
  for (const [framework, indicators] of Object.entries(FRAMEWORK_INDICATORS)) {
    if (indicators.some((indicator) => haystacks.some((h) => h.includes(indicator)))) {
      found.push(framework);
    }
  }
  return found;
}

/**
 * Detect frameworks from root manifests already known to exist.
 *
 * @param root - Absolute project root.
 * @param files - Recorded relative file paths.
 * @param skipped - Receives a record for each unreadable manifest.
 * @returns Sorted, unique framework tags.
 */
export async function detectFrameworks(
  root: string,
  files: ReadonlySet<string>,
  skipped: ScanSkip[]
): Promise<string[]> {
  const frameworks = new Set<string>();

  if (files.has('package.json')) {
    try {
      const raw = await fs.readFile(path.join(root, 'package.json'), 'utf-8');
      const names = packageDependencyNames(JSON.parse(raw));
      for (const f of matchFrameworks(names)) frameworks.add(f);
    } catch (error) {
      skipped.push({ path: 'package.json', reason: describeError(error) });
    }
  }

  for (const manifest of TEXT_MANIFESTS) {
    if (!files.has(manifest)) continue;
    try {
      const content = await fs.readFile(path.join(root, manifest), 'utf-8');
      for (const f of matchFrameworks([content])) frameworks.add(f);
    } catch (error) {
      skipped.push({ path: manifest, reason: describeError(error) });
    }
  }

  return [...frameworks].sort();
}

// ---------------------------------------------------------------------------
// Scan
// ---------------------------------------------------------------------------

/**
 * Scan a project root into an immutable snapshot.
 *
 * @param rootPath - Project root, absolute or relative to the cwd.
 * @param options - Concurrency, cancellation and ignore settings.
 * @returns The frozen ProjectSnapshot.
 * @throws ScanError when the root is missing, not a directory, unreadable,
 *   or the walk is cancelled.
 */
export async function scanProject(rootPath: string, options: ScanOptions = {}): Promise<ProjectSnapshot> {
  const root = path.resolve(rootPath);
  const { logger, signal } = options;
  const deadline = options.timeoutMs && options.timeoutMs > 0 ? Date.now() + options.timeoutMs : null;

  const checkCancelled = (): void => {
    if (signal?.aborted) {
      throw new ScanError('SCAN_ABORTED', root, `Scan of ${root} was cancelled`);
    }
    if (deadline !== null && Date.now() > deadline) {
      throw new ScanError('SCAN_ABORTED', root, `Scan of ${root} exceeded ${options.timeoutMs}ms`);
    }
  };

  await assertRoot(root);
  checkCancelled();
  await logger?.stageStart('scan', `scanning ${root}`);

  const skipDirs = new Set([...SKIP_DIRS, ...(options.extraIgnores ?? [])]);
  const ctx: WalkContext = { root, skipDirs, checkCancelled };

  let topEntries: Dirent[];
  try {
    topEntries = await fs.readdir(root, { withFileTypes: true });
  } catch (error) {
    throw new ScanError('ROOT_UNREADABLE', root, `Cannot read project path ${root}: ${describeError(error)}`);
  }

  const top: WalkResult = { files: [], directories: [], skipped: [] };
  const subtrees: string[] = [];

  for (const entry of topEntries) {
    const abs = path.join(root, entry.name);
    let classified: { kind: 'file' | 'dir' | 'other'; descend: boolean };
    try {
      classified = await classifyEntry(entry, abs);
    } catch (error) {
      top.skipped.push({ path: entry.name, reason: describeError(error) });
      continue;
    }
    if (classified.kind === 'file') {
      if (!isSkippedFile(entry.name)) top.files.push(entry.name);
    } else if (classified.kind === 'dir') {
      top.directories.push(entry.name);
      if (classified.descend && !skipDirs.has(entry.name)) subtrees.push(abs);
    }
  }

  const partials = await mapWithConcurrency(
    subtrees,
    options.concurrency ?? DEFAULT_SCAN_CONCURRENCY,
    async (dir) => {
      const out: WalkResult = { files: [], directories: [], skipped: [] };
      await walkDirectory(ctx, dir, out);
      await logger?.debug('scan', 'subtree_scanned', `scanned ${toPosixPath(path.relative(root, dir))}`, {
        files: out.files.length,
        directories: out.directories.length,
        skipped: out.skipped.length,
      });
      return out;
    }
  );

  // A deadline that passed during the final subtree still invalidates the scan
  checkCancelled();

  const files = new Set<string>(top.files);
  const directories = new Set<string>(top.directories);
  const skipped: ScanSkip[] = [...top.skipped];
  for (const part of partials) {
    for (const f of part.files) files.add(f);
    for (const d of part.directories) directories.add(d);
    skipped.push(...part.skipped);
  }

  const frameworks = await detectFrameworks(root, files, skipped);
  skipped.sort((a, b) => compareIds(a.path, b.path));

  for (const skip of skipped) {
    await logger?.warn('scan', 'entry_skipped', `Skipped ${skip.path}: ${skip.reason}`);
  }

  const snapshot = createSnapshot({
    root,
    files,
    directories,
    frameworks,
    skipped,
  });

  await logger?.stageComplete('scan', `scanned ${root}`, {
    files: snapshot.files.size,
    directories: snapshot.directories.size,
    projectTypes: [...snapshot.projectTypes],
    frameworks: [...snapshot.frameworks],
    skipped: snapshot.skipped.length,
  });

  return snapshot;
}
