import fs from 'fs';
import path from 'path';

/**
 * Conventional module file names that commonly hold a package version.
 */
export const VERSION_MODULE_NAMES = [
  '__init__.py',
  '__main__.py',
  '__version__.py',
  '__about__.py',
  '__version.py',
  '_version.py',
  'version.py',
  'VERSION.py',
  'package_data.py'
];

export const DEFAULT_MAX_DEPTH = 4;

export interface VersionSearchOptions {
  maxDepth?: number;
}

export type VersionDetector = (location: string) => string | undefined;

const DUNDER_VERSION = /^__version__\s*=\s*['"]([^'"]*)['"]/m;
const PLAIN_VERSION = /^version\s*=\s*['"]([^'"]*)['"]/m;
const SETUP_VERSION_REFERENCE = /^\s*version\s*=\s*(.*__version__)/m;

function findPattern(location: string, pattern: RegExp): string | undefined {
  const content = fs.readFileSync(location, 'utf8');
  const match = content.match(pattern);
  return match ? match[1].trim() : undefined;
}

/** Value of a module-level `__version__ = "..."` assignment. */
export function findDunderVersion(location: string): string | undefined {
  return findPattern(location, DUNDER_VERSION);
}

/** Value of a module-level `version = "..."` assignment. */
export function findPlainVersion(location: string): string | undefined {
  return findPattern(location, PLAIN_VERSION);
}

/**
 * The expression passed as `version=` when it refers to a `__version__`
 * attribute, e.g. `mypkg.__version__` or a bare `__version__`.
 */
export function findSetupPyDunderVersion(location: string): string | undefined {
  return findPattern(location, SETUP_VERSION_REFERENCE);
}

/**
 * Files named in `names` found breadth-first under `root`, at most `maxDepth`
 * path segments below it. Entries are visited in sorted order.
 */
export function getModuleScripts(root: string, names: string[], maxDepth = DEFAULT_MAX_DEPTH): string[] {
  const found: string[] = [];
  let level = [root];
  for (let depth = 1; depth <= maxDepth && level.length; depth++) {
    const nextLevel: string[] = [];
    for (const dir of level) {
      const entries = fs.readdirSync(dir, { withFileTypes: true });
      entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
      for (const entry of entries) {
        const fullPath = path.join(dir, entry.name);
        if (entry.isDirectory()) nextLevel.push(fullPath);
        else if (entry.isFile() && names.includes(entry.name)) found.push(fullPath);
      }
    }
    level = nextLevel;
  }
  return found;
}

function isFile(location: string): boolean {
  try {
    return fs.statSync(location).isFile();
  } catch {
    return false;
  }
}

export function detectVersionInLocations(
  candidates: string[],
  detector: VersionDetector = findPlainVersion
): string | undefined {
  for (const location of candidates) {
    if (!isFile(location)) continue;
    const version = detector(location);
    if (version) return version;
  }
  return undefined;
}

/**
 * Candidate module files for a `version=a.b.__version__` reference, relative
 * to the descriptor directory and to its `src/` directory when present.
 */
export function buildCandidateLocations(setupDir: string, versionReference?: string): string[] {
  const segments = versionReference && versionReference.includes('.') ? versionReference.split('.').slice(0, -1) : [];
  if (!segments.length) return [];

  const hasSrc = fs.existsSync(path.join(setupDir, 'src'));
  const candidates: string[][] = [];
  for (const name of VERSION_MODULE_NAMES) candidates.push([...segments, name]);
  if (hasSrc) {
    for (const name of VERSION_MODULE_NAMES) candidates.push(['src', ...segments, name]);
  }

  const heads = segments.slice(0, -1);
  const tail = `${segments[segments.length - 1]}.py`;
  candidates.push([...heads, tail]);
  if (hasSrc) candidates.push(['src', ...heads, tail]);

  return candidates.map((parts) => path.join(setupDir, ...parts));
}

/**
 * Search the modules around `descriptorDir` for the version a dotted
 * `__version__` reference points at, falling back to every conventionally
 * named module within reach. A `__version__` assignment beats a plain
 * `version` assignment anywhere in the candidate files.
 */
export function detectReferencedVersion(
  descriptorDir: string,
  versionReference?: string,
  options: VersionSearchOptions = {}
): string | undefined {
  const candidates = [
    ...buildCandidateLocations(descriptorDir, versionReference),
    ...getModuleScripts(descriptorDir, VERSION_MODULE_NAMES, options.maxDepth ?? DEFAULT_MAX_DEPTH)
  ];
  return (
    detectVersionInLocations(candidates, findDunderVersion) ||
    detectVersionInLocations(candidates, findPlainVersion)
  );
}

/** Best-effort version for a setup.py at `setupLocation` that declares no literal version. */
export function detectVersionAttribute(setupLocation: string, options: VersionSearchOptions = {}): string | undefined {
  const versionReference = findSetupPyDunderVersion(setupLocation);
  const setupDunderVersion = findDunderVersion(setupLocation);
  if (versionReference === '__version__' && setupDunderVersion) return setupDunderVersion;
  return detectReferencedVersion(path.dirname(setupLocation), versionReference, options);
}
