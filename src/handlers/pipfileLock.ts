import fsp from 'fs/promises';
import type { PackageRecord, ToolResult } from '../types';
import { isPlainObject } from '../attributes';
import { emptyPackageRecord } from '../record';
import { DEVELOPMENT_OPTIONS, INSTALL_OPTIONS, getPipfileDependencies } from './pipfile';

function getLockHash(lock: Record<string, unknown>): string | undefined {
  const meta = lock._meta;
  const hash = isPlainObject(meta) ? meta.hash : undefined;
  if (!isPlainObject(hash)) return undefined;
  const sha256 = hash.sha256;
  return typeof sha256 === 'string' && sha256 ? sha256 : undefined;
}

export async function parsePipfileLock(location: string): Promise<ToolResult<PackageRecord[]>> {
  try {
    const lock: unknown = JSON.parse(await fsp.readFile(location, 'utf8'));
    if (!isPlainObject(lock)) {
      return { ok: false, error: 'Pipfile.lock parse failed: expected a JSON object', file: location };
    }
    const record = emptyPackageRecord('pipfile_lock');
    record.sha256 = getLockHash(lock);
    record.dependencies = [
      ...getPipfileDependencies(lock.default, INSTALL_OPTIONS),
      ...getPipfileDependencies(lock.develop, DEVELOPMENT_OPTIONS)
    ];
    return { ok: true, data: [record], file: location };
  } catch (err) {
    return { ok: false, error: `Pipfile.lock parse failed: ${String(err)}`, file: location };
  }
}
