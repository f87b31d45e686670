import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  buildCandidateLocations,
  detectVersionAttribute,
  findDunderVersion,
  findPlainVersion,
  getModuleScripts
} from '../version';

describe('version recovery', () => {
  let tempDir: string;

  const write = (relativePath: string, content: string): string => {
    const location = path.join(tempDir, relativePath);
    fs.mkdirSync(path.dirname(location), { recursive: true });
    fs.writeFileSync(location, content);
    return location;
  };

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pymeta-version-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('reads dunder and plain assignments', () => {
    const location = write('mod.py', 'version = "0.9"\n__version__ = \'1.2.3\'\n');
    expect(findDunderVersion(location)).toBe('1.2.3');
    expect(findPlainVersion(location)).toBe('0.9');
  });

  it('follows a dotted __version__ reference into the package', () => {
    write('mypkg/__init__.py', "__version__ = '1.2.3'\n");
    const setup = write('setup.py', 'import mypkg\nsetup(\n    name="mypkg",\n    version=mypkg.__version__,\n)\n');
    expect(detectVersionAttribute(setup)).toBe('1.2.3');
  });

  it('uses a plain version only when no dunder version exists', () => {
    write('mypkg/version.py', 'version = "0.9"\n');
    const setup = write('setup.py', 'setup(name="mypkg")\n');
    expect(detectVersionAttribute(setup)).toBe('0.9');

    write('mypkg/_version.py', '__version__ = "2.0"\n');
    expect(detectVersionAttribute(setup)).toBe('2.0');
  });

  it('reads a version assigned in setup.py itself', () => {
    const setup = write('setup.py', '__version__ = "3.1"\nsetup(\n    name="x",\n    version=__version__,\n)\n');
    expect(detectVersionAttribute(setup)).toBe('3.1');
  });

  it('looks under src/ for the referenced package', () => {
    write('src/pkg/__about__.py', '__version__ = "4.0"\n');
    const setup = write('setup.py', 'setup(\n    name="pkg",\n    version=pkg.__version__,\n)\n');
    expect(detectVersionAttribute(setup)).toBe('4.0');
  });

  it('returns undefined when nothing is found', () => {
    const setup = write('setup.py', 'setup(name="empty")\n');
    expect(detectVersionAttribute(setup)).toBeUndefined();
  });

  it('bounds the directory walk', () => {
    write('a/b/c/__init__.py', '');
    write('a/b/c/d/__init__.py', '');
    expect(getModuleScripts(tempDir, ['__init__.py'])).toEqual([path.join(tempDir, 'a', 'b', 'c', '__init__.py')]);
    expect(getModuleScripts(tempDir, ['__init__.py'], 5)).toHaveLength(2);
  });

  it('builds candidates for each reference segment', () => {
    const candidates = buildCandidateLocations(tempDir, 'top.sub.__version__');
    expect(candidates[0]).toBe(path.join(tempDir, 'top', 'sub', '__init__.py'));
    expect(candidates[candidates.length - 1]).toBe(path.join(tempDir, 'top', 'sub.py'));
    expect(buildCandidateLocations(tempDir, '__version__')).toEqual([]);
  });
});
