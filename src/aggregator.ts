import fg from 'fast-glob';
import path from 'path';
import type { DescriptorHandler, ScanError, ScanOptions, ScanResult, ScannedPackage } from './types';
import { HANDLERS } from './handlers';
import { getToolVersion, toPosixPath } from './utils';

// Library surface for callers that already hold parsed distribution metadata.
export { type MetadataSource, fromMapping, fromObject, getAttribute } from './attributes';
export { buildPackageRecord } from './record';
export { HANDLERS } from './handlers';

export const DEFAULT_IGNORE = ['**/node_modules/**', '**/.git/**'];

const toolVersion = getToolVersion();

/** Descriptor files a handler recognizes, relative to the project root. */
export async function findDescriptors(
  projectPath: string,
  handler: DescriptorHandler,
  ignore: string[] = DEFAULT_IGNORE
): Promise<string[]> {
  const files = await fg(handler.pathPatterns, { cwd: projectPath, ignore, onlyFiles: true });
  return files.sort();
}

function byFile<T extends { file: string }>(a: T, b: T): number {
  return a.file < b.file ? -1 : a.file > b.file ? 1 : 0;
}

/**
 * Run every handler over the descriptors found below `projectPath`, one file
 * at a time. A file that fails to parse lands in `errors`; it never stops the
 * scan.
 */
export async function scanProject(options: ScanOptions, handlers: DescriptorHandler[] = HANDLERS): Promise<ScanResult> {
  const projectPath = path.resolve(options.projectPath);
  const ignore = [...DEFAULT_IGNORE, ...(options.ignore || [])];
  const packages: ScannedPackage[] = [];
  const errors: ScanError[] = [];

  for (const handler of handlers) {
    const files = await findDescriptors(projectPath, handler, ignore);
    for (const descriptor of files) {
      const file = toPosixPath(descriptor);
      const result = await handler.parse(path.join(projectPath, descriptor));
      if (!result.ok) {
        errors.push({ file, error: result.error || 'unknown error' });
        continue;
      }
      for (const record of result.data || []) {
        packages.push({ datasourceId: handler.datasourceId, file, package: record });
      }
    }
  }

  return {
    generatedAt: new Date().toISOString(),
    projectPath,
    toolVersion,
    packages: packages.sort(byFile),
    errors: errors.sort(byFile)
  };
}
