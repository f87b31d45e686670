import fsp from 'fs/promises';
import path from 'path';
import type { PackageRecord, ToolResult } from '../types';
import { parseIni, splitLines } from '../iniFile';
import { buildPackageRecord } from '../record';
import { detectReferencedVersion } from '../version';
import { getSetupDependencies, setupMetadataSource } from './setupPy';

const DIRECTIVE = /^(attr|file):\s*(.*)$/;

function parseProjectUrls(value?: string): Record<string, string> {
  const urls: Record<string, string> = {};
  for (const line of splitLines(value)) {
    const match = line.match(/^([^=]+?)\s*=\s*(.+)$/);
    if (match) urls[match[1]] = match[2];
  }
  return urls;
}

function parseList(value?: string): string[] {
  return splitLines(value).flatMap((line) => line.split(',')).map((item) => item.trim()).filter(Boolean);
}

/**
 * `[metadata]` options as the setup() keywords they stand for. `file:`
 * directives are dropped; an `attr:` version is resolved later.
 */
function metadataArgs(metadata: Record<string, string>): Record<string, unknown> {
  const args: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(metadata)) {
    if (DIRECTIVE.test(value)) continue;
    args[key.replace(/-/g, '_')] = value;
  }
  if (metadata.classifiers) args.classifiers = splitLines(metadata.classifiers);
  if (metadata.keywords) args.keywords = parseList(metadata.keywords);
  if (metadata.project_urls) args.project_urls = parseProjectUrls(metadata.project_urls);
  return args;
}

export async function parseSetupCfg(location: string): Promise<ToolResult<PackageRecord[]>> {
  try {
    const sections = parseIni(await fsp.readFile(location, 'utf8'));
    const metadata = sections.metadata || {};
    const options = sections.options || {};
    const args = metadataArgs(metadata);

    let version = typeof args.version === 'string' ? args.version : undefined;
    const versionDirective = (metadata.version || '').match(DIRECTIVE);
    if (!version && versionDirective && versionDirective[1] === 'attr') {
      version = detectReferencedVersion(path.dirname(location), versionDirective[2].trim());
    }

    const dependencies = getSetupDependencies({
      install: options.install_requires,
      tests: options.tests_require,
      setup: options.setup_requires,
      extras: sections['options.extras_require']
    });
    const record = buildPackageRecord('pypi_setup_cfg', setupMetadataSource(args), { version, dependencies });
    return { ok: true, data: [record], file: location };
  } catch (err) {
    return { ok: false, error: `setup.cfg parse failed: ${String(err)}`, file: location };
  }
}
