import type { DependentPackage } from './types';
import { RequirementParseError } from './errors';
import { type MarkerNode, getExtra, parseMarker } from './markers';

const SPECIFIER_OPERATORS = ['===', '~=', '==', '!=', '<=', '>=', '<', '>'] as const;
export type SpecifierOperator = (typeof SPECIFIER_OPERATORS)[number];

export interface Specifier {
  operator: SpecifierOperator;
  version: string;
}

export interface RequirementExpression {
  name?: string;
  extras: string[];
  specifiers: Specifier[];
  url?: string;
  marker?: MarkerNode;
  // text rendered as the extracted requirement when there are no specifiers
  raw: string;
  editable?: boolean;
}

export interface ResolveOptions {
  defaultScope?: string;
  isRuntime?: boolean;
  isOptional?: boolean;
  ecosystem?: string;
}

const NAME_PATTERN = /^\s*([A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?)/;
const SPECIFIER_PATTERN = /^\s*(===|~=|==|!=|<=|>=|<|>)\s*([^\s,;()]+)/;
const VERSION_PATTERN = /^[A-Za-z0-9_.*+!-]+$/;
const EQUALITY_OPERATORS: SpecifierOperator[] = ['==', '==='];

function isSpecifierOperator(value: string): value is SpecifierOperator {
  return SPECIFIER_OPERATORS.some((operator) => operator === value);
}

export function canonicalizeName(name: string): string {
  return name.replace(/[-_.]+/g, '-').toLowerCase();
}

export function buildPurl(name: string, version?: string, type = 'pypi'): string {
  const base = `pkg:${type}/${encodeURIComponent(name)}`;
  return version ? `${base}@${encodeURIComponent(version)}` : base;
}

function parseSpecifierList(text: string, source: string): { specifiers: Specifier[]; rest: string } {
  const specifiers: Specifier[] = [];
  let rest = text;
  const parenthesized = /^\s*\(/.test(rest);
  if (parenthesized) rest = rest.replace(/^\s*\(/, '');

  let match = rest.match(SPECIFIER_PATTERN);
  while (match) {
    const operator = match[1];
    const version = match[2];
    if (!isSpecifierOperator(operator)) throw new RequirementParseError(`Invalid operator ${operator}`, source);
    if (operator !== '===' && !VERSION_PATTERN.test(version)) {
      throw new RequirementParseError(`Invalid version ${version}`, source);
    }
    specifiers.push({ operator, version });
    rest = rest.slice(match[0].length);
    if (!/^\s*,/.test(rest)) break;
    rest = rest.replace(/^\s*,/, '');
    match = rest.match(SPECIFIER_PATTERN);
    if (!match) throw new RequirementParseError('Expected a version specifier after ","', source);
  }

  if (parenthesized) {
    if (!/^\s*\)/.test(rest)) throw new RequirementParseError('Unbalanced parenthesis in specifier', source);
    rest = rest.replace(/^\s*\)/, '');
  }
  return { specifiers, rest };
}

/**
 * Parse a dependency specification such as
 * `requests[socks] (>=2.8.1, <3) ; python_version >= "3.7"` or
 * `pkg @ https://example.com/pkg.zip`.
 */
export function parseRequirement(text: string): RequirementExpression {
  const nameMatch = text.match(NAME_PATTERN);
  if (!nameMatch) throw new RequirementParseError('Expected a package name', text);
  const name = nameMatch[1];
  let rest = text.slice(nameMatch[0].length);

  let extras: string[] = [];
  const extrasMatch = rest.match(/^\s*\[([^\]]*)\]/);
  if (extrasMatch) {
    extras = extrasMatch[1].split(',').map((extra) => extra.trim()).filter(Boolean);
    if (extras.some((extra) => !NAME_PATTERN.test(extra))) {
      throw new RequirementParseError('Invalid extra name', text);
    }
    rest = rest.slice(extrasMatch[0].length);
  }

  let url: string | undefined;
  let specifiers: Specifier[] = [];
  const urlMatch = rest.match(/^\s*@\s*(\S+)/);
  if (urlMatch) {
    url = urlMatch[1];
    rest = rest.slice(urlMatch[0].length);
  } else {
    ({ specifiers, rest } = parseSpecifierList(rest, text));
  }

  let marker: MarkerNode | undefined;
  const markerMatch = rest.match(/^\s*;/);
  if (markerMatch) {
    marker = parseMarker(rest.slice(markerMatch[0].length));
    rest = '';
  }
  if (rest.trim()) throw new RequirementParseError('Unexpected text in requirement', text);

  return { name, extras, specifiers, url, marker, raw: text.trim() };
}

function uniqueSpecifiers(specifiers: Specifier[]): string[] {
  return Array.from(new Set(specifiers.map((spec) => `${spec.operator}${spec.version}`)));
}

/** Comma-joined, de-duplicated, sorted specifiers: `<2.0,>=1.0`. */
export function formatSpecifiers(specifiers: Specifier[]): string {
  return uniqueSpecifiers(specifiers).sort().join(',');
}

/** The version a specifier set pins to: exactly one `==` or `===` specifier. */
export function getPinnedVersion(specifiers: Specifier[]): string | undefined {
  if (uniqueSpecifiers(specifiers).length !== 1) return undefined;
  const [only] = specifiers;
  if (!EQUALITY_OPERATORS.includes(only.operator)) return undefined;
  return only.version;
}

export function resolveRequirement(
  requirement: string | RequirementExpression,
  options: ResolveOptions = {}
): DependentPackage {
  const req = typeof requirement === 'string' ? parseRequirement(requirement) : requirement;
  const scope = getExtra(req.marker) ?? options.defaultScope ?? 'install';
  const pinned = getPinnedVersion(req.specifiers);
  const extractedRequirement = req.specifiers.length ? formatSpecifiers(req.specifiers) : req.raw || undefined;
  return {
    purl: req.name ? buildPurl(canonicalizeName(req.name), pinned, options.ecosystem) : undefined,
    scope,
    isRuntime: options.isRuntime ?? true,
    isOptional: options.isOptional ?? false,
    isResolved: Boolean(req.name && pinned),
    extractedRequirement
  };
}

/**
 * Resolve a list of requirement strings, skipping malformed entries. Anything
 * other than a list of strings yields no dependencies.
 */
export function getRequiresDependencies(requires: unknown, options: ResolveOptions = {}): DependentPackage[] {
  if (!Array.isArray(requires)) return [];
  const items: unknown[] = requires;
  const requirements = items.filter((item): item is string => typeof item === 'string');
  if (!requirements.length || requirements.length !== items.length) return [];
  const dependencies: DependentPackage[] = [];
  for (const requirement of requirements) {
    try {
      dependencies.push(resolveRequirement(requirement, options));
    } catch (err) {
      if (!(err instanceof RequirementParseError)) throw err;
    }
  }
  return dependencies;
}

/** Requirement text as a list: strings split into non-empty, non-comment lines. */
export function asRequirementList(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  return value
    .split(/\r\n|\r|\n/)
    .map((line) => line.trim())
    .filter((line) => line && !line.startsWith('#'));
}
