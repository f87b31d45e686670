import fsp from 'fs/promises';
import type { DependentPackage, PackageRecord, ToolResult } from '../types';
import { type MetadataSource, fromMapping, isPlainObject } from '../attributes';
import { readSetupCallArguments } from '../pythonLiterals';
import { buildPackageRecord } from '../record';
import { asRequirementList, getRequiresDependencies } from '../requirements';
import { detectVersionAttribute } from '../version';

export interface SetupRequires {
  install?: unknown;
  tests?: unknown;
  setup?: unknown;
  extras?: unknown;
}

/**
 * Dependencies declared through setuptools keywords. Each extras group
 * becomes a scope of its own.
 */
export function getSetupDependencies(requires: SetupRequires): DependentPackage[] {
  const dependencies: DependentPackage[] = [
    ...getRequiresDependencies(asRequirementList(requires.install), { defaultScope: 'install' }),
    ...getRequiresDependencies(asRequirementList(requires.tests), { defaultScope: 'tests' }),
    ...getRequiresDependencies(asRequirementList(requires.setup), { defaultScope: 'setup' })
  ];
  if (isPlainObject(requires.extras)) {
    for (const [scope, extraRequires] of Object.entries(requires.extras)) {
      dependencies.push(...getRequiresDependencies(asRequirementList(extraRequires), { defaultScope: scope }));
    }
  }
  return dependencies;
}

/**
 * setuptools calls the summary `description` and the body `long_description`;
 * rename them so the shared description logic sees both.
 */
export function setupMetadataSource(args: Record<string, unknown>): MetadataSource {
  const { description, long_description: longDescription, ...rest } = args;
  return fromMapping({ ...rest, summary: description, description: longDescription });
}

export async function parseSetupPy(location: string): Promise<ToolResult<PackageRecord[]>> {
  try {
    const text = await fsp.readFile(location, 'utf8');
    const { args, warnings } = readSetupCallArguments(text);
    const name = typeof args.name === 'string' ? args.name : undefined;
    let version = typeof args.version === 'string' ? args.version : undefined;
    if (!version) {
      version = detectVersionAttribute(location);
    }
    const dependencies = getSetupDependencies({
      install: args.install_requires,
      tests: args.tests_require ?? args.tests_requires,
      setup: args.setup_requires,
      extras: args.extras_require
    });
    const record = buildPackageRecord('pypi_setup_py', setupMetadataSource(args), {
      name,
      version,
      dependencies,
      warnings
    });
    return { ok: true, data: [record], file: location };
  } catch (err) {
    return { ok: false, error: `setup.py parse failed: ${String(err)}`, file: location };
  }
}
