import fsp from 'fs/promises';
import type { DependentPackage, PackageRecord, ToolResult } from '../types';
import { RequirementParseError } from '../errors';
import { emptyPackageRecord } from '../record';
import { type ResolveOptions, parseRequirement, resolveRequirement } from '../requirements';
import { isPlainObject } from '../attributes';
import { parseToml } from '../tomlTables';

export const INSTALL_OPTIONS: ResolveOptions = { defaultScope: 'install', isRuntime: true, isOptional: false };
export const DEVELOPMENT_OPTIONS: ResolveOptions = { defaultScope: 'development', isRuntime: false, isOptional: true };

const PIPFILE_SECTIONS: Array<{ key: string; options: ResolveOptions }> = [
  { key: 'packages', options: INSTALL_OPTIONS },
  { key: 'dev-packages', options: DEVELOPMENT_OPTIONS }
];

function pipfileSpecifier(value: unknown): string {
  const spec = isPlainObject(value) ? value.version : value;
  if (typeof spec !== 'string') return '';
  const trimmed = spec.trim();
  return trimmed === '*' ? '' : trimmed;
}

/**
 * A Pipfile entry maps a name to `"*"`, a specifier string, or a table that
 * may carry `version` next to git/path/extras keys. Pipfile.lock entries are
 * always tables.
 */
export function getPipfileDependencies(section: unknown, options: ResolveOptions): DependentPackage[] {
  if (!isPlainObject(section)) return [];
  const dependencies: DependentPackage[] = [];
  for (const [name, value] of Object.entries(section)) {
    try {
      const requirement = parseRequirement(`${name}${pipfileSpecifier(value)}`);
      dependencies.push(resolveRequirement({ ...requirement, raw: name }, options));
    } catch (err) {
      if (!(err instanceof RequirementParseError)) throw err;
    }
  }
  return dependencies;
}

export async function parsePipfile(location: string): Promise<ToolResult<PackageRecord[]>> {
  try {
    const pipfile = parseToml(await fsp.readFile(location, 'utf8'));
    const record = emptyPackageRecord('pipfile');
    record.dependencies = PIPFILE_SECTIONS.flatMap(({ key, options }) => getPipfileDependencies(pipfile[key], options));
    return { ok: true, data: [record], file: location };
  } catch (err) {
    return { ok: false, error: `Pipfile parse failed: ${String(err)}`, file: location };
  }
}
