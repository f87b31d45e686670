import fs from 'fs';
import fsp from 'fs/promises';
import path from 'path';
import { isPlainObject } from './attributes';

export function getToolVersion(): string {
  try {
    const pkgPath = path.join(__dirname, '..', 'package.json');
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf8'));
    return isPlainObject(pkg) && typeof pkg.version === 'string' ? pkg.version : 'unknown';
  } catch {
    return 'unknown';
  }
}

export async function ensureDir(dir: string): Promise<void> {
  await fsp.mkdir(dir, { recursive: true });
}

export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
  await ensureDir(path.dirname(filePath));
  const content = JSON.stringify(data, null, 2);
  await fsp.writeFile(filePath, content, 'utf8');
}

export async function pathExists(target: string): Promise<boolean> {
  try {
    await fsp.access(target);
    return true;
  } catch {
    return false;
  }
}

export function toPosixPath(p: string): string {
  return p.split(path.sep).join('/');
}
