import fsp from 'fs/promises';
import path from 'path';
import type { DependentPackage, PackageRecord, ToolResult } from '../types';
import { RequirementParseError } from '../errors';
import { emptyPackageRecord } from '../record';
import { type RequirementExpression, type ResolveOptions, parseRequirement, resolveRequirement } from '../requirements';
import { DEVELOPMENT_OPTIONS, INSTALL_OPTIONS } from './pipfile';

const DEVELOPMENT_SUFFIXES = ['dev.txt', 'test.txt', 'tests.txt'];
const EDITABLE_PATTERN = /^(?:-e|--editable)(?:\s+|=)(.+)$/;
const URL_OR_PATH_PATTERN = /^(?:[A-Za-z][\w+.-]*:\/\/|[A-Za-z][\w+.-]*\+[A-Za-z]+:|\.{1,2}[\\/]|\/|~|[A-Za-z]:\\)/;
const ARCHIVE_PATTERN = /\.(?:whl|zip|tar\.gz|tgz|tar\.bz2)$/i;
const WHEEL_PATTERN = /^([^-]+)-([^-]+)-.+\.whl$/i;
const TRAILING_OPTIONS = /\s+--?[A-Za-z].*$/;
const DIRECT_REFERENCE = /^[A-Za-z0-9][A-Za-z0-9._-]*\s*(?:\[[^\]]*\])?\s*@/;

/** Physical lines joined across backslash continuations, comments removed. */
export function getLogicalLines(text: string): string[] {
  const lines: string[] = [];
  let pending = '';
  for (const line of text.split(/\r\n|\r|\n/)) {
    if (line.endsWith('\\')) {
      pending += line.slice(0, -1);
      continue;
    }
    lines.push(pending + line);
    pending = '';
  }
  if (pending) lines.push(pending);
  return lines.map((line) => line.replace(/(^|\s+)#.*$/, '').trim()).filter(Boolean);
}

function getEggName(link: string): string | undefined {
  const match = link.match(/#(?:.*&)?egg=([^&\s]+)/);
  return match ? match[1].replace(/\[.*$/, '') : undefined;
}

function linkRequirement(link: string, raw: string, editable: boolean): RequirementExpression {
  const requirement: RequirementExpression = { extras: [], specifiers: [], url: link, raw, editable };
  const egg = getEggName(link);
  if (egg) return { ...requirement, name: egg };
  const fileName = path.posix.basename(link.replace(/[?#].*$/, ''));
  const wheel = fileName.match(WHEEL_PATTERN);
  if (wheel) {
    return { ...requirement, name: wheel[1], specifiers: [{ operator: '==', version: wheel[2] }] };
  }
  return requirement;
}

/**
 * One requirement per logical line. Option lines (`-r`, `--index-url`, ...)
 * yield undefined; editable, URL and path lines keep their link text.
 * `name @ url` lines are ordinary requirements.
 */
export function parseRequirementLine(line: string): RequirementExpression | undefined {
  const editable = line.match(EDITABLE_PATTERN);
  if (editable) {
    const link = editable[1].trim();
    return linkRequirement(link, `--editable ${link}`, true);
  }
  if (line.startsWith('-')) return undefined;
  const text = line.replace(TRAILING_OPTIONS, '');
  if (DIRECT_REFERENCE.test(text)) return parseRequirement(text);
  if (URL_OR_PATH_PATTERN.test(text) || ARCHIVE_PATTERN.test(text)) {
    return linkRequirement(text, text, false);
  }
  return parseRequirement(text);
}

export function isDevelopmentRequirementsFile(location: string): boolean {
  return DEVELOPMENT_SUFFIXES.some((suffix) => location.endsWith(suffix));
}

export function getRequirementsFileDependencies(text: string, options: ResolveOptions): DependentPackage[] {
  const dependencies: DependentPackage[] = [];
  for (const line of getLogicalLines(text)) {
    try {
      const requirement = parseRequirementLine(line);
      if (requirement) dependencies.push(resolveRequirement(requirement, options));
    } catch (err) {
      if (!(err instanceof RequirementParseError)) throw err;
    }
  }
  return dependencies;
}

export async function parseRequirementsFile(location: string): Promise<ToolResult<PackageRecord[]>> {
  try {
    const text = await fsp.readFile(location, 'utf8');
    const options = isDevelopmentRequirementsFile(location) ? DEVELOPMENT_OPTIONS : INSTALL_OPTIONS;
    const record = emptyPackageRecord('pip_requirements');
    record.dependencies = getRequirementsFileDependencies(text, options);
    return { ok: true, data: [record], file: location };
  } catch (err) {
    return { ok: false, error: `requirements file parse failed: ${String(err)}`, file: location };
  }
}
