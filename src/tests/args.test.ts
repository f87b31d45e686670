import { describe, it, expect } from 'vitest';
import path from 'path';
import { DEFAULT_OUT, parseArgs, resolveOutputPath } from '../args';

describe('parseArgs', () => {
  it('defaults to scanning the working directory', () => {
    expect(parseArgs([], '/work')).toEqual({
      command: 'scan',
      project: '/work',
      out: DEFAULT_OUT,
      ignore: [],
      help: false
    });
  });

  it('reads options and repeated ignores', () => {
    const opts = parseArgs(
      ['scan', '--project', 'py', '--out', 'report.json', '--ignore', 'build/**', '--ignore', 'dist/**'],
      '/work'
    );
    expect(opts.project).toBe('py');
    expect(opts.out).toBe('report.json');
    expect(opts.ignore).toEqual(['build/**', 'dist/**']);
  });

  it('recognizes help and other commands', () => {
    expect(parseArgs(['-h']).help).toBe(true);
    expect(parseArgs(['audit']).command).toBe('audit');
  });
});

describe('resolveOutputPath', () => {
  const cwd = path.resolve('/work');

  it('keeps a file path', () => {
    expect(resolveOutputPath('out.json', undefined, cwd)).toBe(path.resolve(cwd, 'out.json'));
    expect(resolveOutputPath('existing.json', false, cwd)).toBe(path.resolve(cwd, 'existing.json'));
  });

  it('appends the default file name to directories', () => {
    expect(resolveOutputPath('reports/', undefined, cwd)).toBe(path.join(path.resolve(cwd, 'reports'), DEFAULT_OUT));
    expect(resolveOutputPath('reports', true, cwd)).toBe(path.join(path.resolve(cwd, 'reports'), DEFAULT_OUT));
    expect(resolveOutputPath('reports', undefined, cwd)).toBe(path.join(path.resolve(cwd, 'reports'), DEFAULT_OUT));
  });
});
