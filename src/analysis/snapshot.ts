/**
 * Snapshot construction and path-derived facts.
 *
 * Project types and setup flags depend only on the recorded paths, so they
 * are computed here and shared by the scanner and the exchange reader.
 */

import path from 'node:path';
import type { ProjectSnapshot, ScanSkip, SnapshotFlags } from '../types/analysis.js';
import { ProjectTypeSchema, type ProjectType } from '../types/rules.js';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/**
 * Marker files per ecosystem. `*.ext` matches an extension, a trailing `/`
 * marks a directory marker; everything else matches a file basename.
 */
export const PROJECT_INDICATORS: Record<ProjectType, readonly string[]> = {
  node: ['package.json', 'package-lock.json', 'node_modules/'],
  python: ['requirements.txt', 'setup.py', 'pyproject.toml', 'Pipfile', '__pycache__/'],
  java: ['pom.xml', 'build.gradle', 'build.gradle.kts', 'gradlew'],
  rust: ['Cargo.toml', 'Cargo.lock', 'target/'],
  go: ['go.mod', 'go.sum'],
  ruby: ['Gemfile', 'Gemfile.lock'],
  php: ['composer.json', 'composer.lock'],
  csharp: ['*.csproj', '*.sln'],
};

export const CI_DIRECTORIES = ['.github/workflows'];

export const CI_FILES = [
  '.gitlab-ci.yml',
  '.circleci/config.yml',
  'azure-pipelines.yml',
  'Jenkinsfile',
  '.travis.yml',
  'bitbucket-pipelines.yml',
];

export const TEST_DIRECTORY_NAMES = new Set(['test', 'tests', 'spec', '__tests__']);

export const DOCKER_FILES = ['Dockerfile', 'docker-compose.yml', 'docker-compose.yaml'];

// ---------------------------------------------------------------------------
// Derivations
// ---------------------------------------------------------------------------

/**
 * Convert a platform path to the POSIX form used throughout snapshots.
 */
export function toPosixPath(p: string): string {
  return p.split(path.sep).join('/');
}

function basename(p: string): string {
  const idx = p.lastIndexOf('/');
  return idx === -1 ? p : p.slice(idx + 1);
}

/**
 * Detect ecosystems from marker membership. Several may co-occur.
 *
 * @param files - Recorded file paths.
 * @param directories - Recorded directory paths.
 * @returns Project types in declaration order.
 */
export function detectProjectTypes(
  files: Iterable<string>,
  directories: Iterable<string>
): ProjectType[] {
  const fileNames = new Set<string>();
  const extensions = new Set<string>();
  for (const f of files) {
    const name = basename(f);
    fileNames.add(name);
    const dot = name.lastIndexOf('.');
    if (dot > 0) extensions.add(name.slice(dot));
  }
  const dirNames = new Set<string>();
  for (const d of directories) {
    dirNames.add(basename(d));
  }

  const detected: ProjectType[] = [];
  for (const type of ProjectTypeSchema.options) {
    const hit = PROJECT_INDICATORS[type].some((indicator) => {
      if (indicator.endsWith('/')) return dirNames.has(indicator.slice(0, -1));
      if (indicator.startsWith('*')) return extensions.has(indicator.slice(1));
      return fileNames.has(indicator);
    });
    if (hit) detected.push(type);
  }
  return detected;
}

/**
 * Compute the setup flags from recorded paths.
 */
export function computeFlags(
  files: ReadonlySet<string>,
  directories: ReadonlySet<string>
): SnapshotFlags {
  const hasGit = directories.has('.git') || files.has('.git');
  const hasCI =
    CI_DIRECTORIES.some((d) => directories.has(d)) ||
    CI_FILES.some((f) => files.has(f));

  let hasTests = false;
  for (const dir of directories) {
    if (!TEST_DIRECTORY_NAMES.has(basename(dir))) continue;
    const prefix = `${dir}/`;
    for (const f of files) {
      if (f.startsWith(prefix)) {
        hasTests = true;
        break;
      }
    }
    if (hasTests) break;
  }

  const hasDocker = DOCKER_FILES.some((f) => files.has(f));

  return { hasGit, hasCI, hasTests, hasDocker };
}

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

export interface SnapshotInput {
  root: string;
  projectName?: string;
  files: Iterable<string>;
  directories: Iterable<string>;
  projectTypes?: readonly ProjectType[];
  frameworks?: readonly string[];
  flags?: SnapshotFlags;
  skipped?: readonly ScanSkip[];
  scannedAt?: string;
}

/**
 * Build a frozen snapshot. Missing project types and flags are derived
 * from the paths; frameworks default to none since they need file reads.
 *
 * @param input - Snapshot fields.
 * @returns An immutable ProjectSnapshot.
 */
export function createSnapshot(input: SnapshotInput): ProjectSnapshot {
  const files = new Set([...input.files].sort());
  const directories = new Set([...input.directories].sort());
  const projectTypes = input.projectTypes
    ? [...input.projectTypes]
    : detectProjectTypes(files, directories);
  const frameworks = [...new Set(input.frameworks ?? [])].sort();
  const flags = input.flags ? { ...input.flags } : computeFlags(files, directories);

  return Object.freeze({
    root: input.root,
    projectName: input.projectName ?? path.basename(input.root),
    files: freezeSet(files),
    directories: freezeSet(directories),
    projectTypes: Object.freeze(projectTypes),
    frameworks: Object.freeze(frameworks),
    flags: Object.freeze(flags),
    skipped: Object.freeze((input.skipped ?? []).map((s) => Object.freeze({ ...s }))),
    scannedAt: input.scannedAt ?? new Date().toISOString(),
  });
}

/**
 * Wrap a set so that the mutating methods are unreachable at runtime as
 * well as at the type level.
 */
function freezeSet(values: Set<string>): ReadonlySet<string> {
  const view: ReadonlySet<string> = {
    get size() {
      return values.size;
    },
    has: (value: string) => values.has(value),
    forEach: (cb, thisArg) => values.forEach((v) => cb.call(thisArg, v, v, view)),
    entries: () => values.entries(),
    keys: () => values.keys(),
    values: () => values.values(),
    [Symbol.iterator]: () => values[Symbol.iterator](),
  };
  return Object.freeze(view);
}
