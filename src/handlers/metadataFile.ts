import fsp from 'fs/promises';
import path from 'path';
import type { DatasourceId, PackageRecord, ToolResult } from '../types';
import { MetadataMessage } from '../metadataMessage';
import { buildPackageRecord } from '../record';
import { getRequiresDependencies } from '../requirements';
import { pathExists } from '../utils';

export const META_DIR_SUFFIXES = ['.dist-info', '.egg-info', 'EGG-INFO'];

function sectionMarker(section: string): string {
  const [extra, ...rest] = section.split(':');
  let markers = rest.join(':');
  if (extra && markers) markers = `(${markers})`;
  const conditions = [markers, extra ? `extra == "${extra}"` : ''].filter(Boolean);
  return conditions.length ? `; ${conditions.join(' and ')}` : '';
}

/**
 * Turn an egg-info requires.txt into requirement strings, moving its
 * `[extra]`, `[extra:marker]` and `[:marker]` sections into markers.
 */
export function convertRequiresTxt(text: string): string[] {
  const requirements: string[] = [];
  let section = '';
  for (const rawLine of text.split(/\r\n|\r|\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) continue;
    const header = line.match(/^\[(.*)\]$/);
    if (header) {
      section = header[1];
      continue;
    }
    const space = line.includes('@') ? ' ' : '';
    requirements.push(`${line}${space}${sectionMarker(section)}`);
  }
  return requirements;
}

async function readRequires(message: MetadataMessage, location: string): Promise<string[]> {
  const requiresDist = message.getAll('Requires-Dist');
  if (requiresDist) return requiresDist;
  const metaDir = path.dirname(location);
  if (!META_DIR_SUFFIXES.some((suffix) => path.basename(metaDir).endsWith(suffix))) return [];
  const requiresTxt = path.join(metaDir, 'requires.txt');
  if (!(await pathExists(requiresTxt))) return [];
  return convertRequiresTxt(await fsp.readFile(requiresTxt, 'utf8'));
}

/**
 * Parse a core-metadata file: an sdist or egg-info PKG-INFO, or an installed
 * wheel's METADATA.
 */
export async function parseMetadataFile(
  location: string,
  datasourceId: DatasourceId
): Promise<ToolResult<PackageRecord[]>> {
  const label = path.basename(location);
  try {
    const message = MetadataMessage.parse(await fsp.readFile(location, 'utf8'));
    if (!message.size) {
      return { ok: false, error: `${label} parse failed: no metadata fields found`, file: location };
    }
    const requires = await readRequires(message, location);
    const record = buildPackageRecord(datasourceId, message, {
      location,
      dependencies: getRequiresDependencies(requires, { defaultScope: 'install' })
    });
    return { ok: true, data: [record], file: location };
  } catch (err) {
    return { ok: false, error: `${label} parse failed: ${String(err)}`, file: location };
  }
}
