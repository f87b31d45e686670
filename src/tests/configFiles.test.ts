import { describe, it, expect } from 'vitest';
import { IniParseError, parseIni, splitLines } from '../iniFile';
import { TomlParseError, parseToml } from '../tomlTables';

describe('parseIni', () => {
  const text = [
    '[metadata]',
    'Name = demo',
    'home-page: https://example.com',
    'classifiers =',
    '    A',
    '    B',
    '',
    '[options]',
    'install_requires =',
    '    requests>=2',
    '    # comment',
    '    six',
    ''
  ].join('\n');

  it('reads sections with lower-cased keys', () => {
    const sections = parseIni(text);
    expect(sections.metadata.name).toBe('demo');
    expect(sections.metadata['home-page']).toBe('https://example.com');
  });

  it('joins continuation lines and skips comments', () => {
    const sections = parseIni(text);
    expect(splitLines(sections.metadata.classifiers)).toEqual(['A', 'B']);
    expect(sections.options.install_requires).toBe('\nrequests>=2\nsix');
  });

  it('keeps reserved section names as ordinary sections', () => {
    const sections = parseIni('[__proto__]\npolluted = yes\n\n[constructor]\nname = demo\n');
    expect(Object.keys(sections)).toEqual(['__proto__', 'constructor']);
    expect(sections['__proto__'].polluted).toBe('yes');
    expect(sections['constructor'].name).toBe('demo');
    expect('polluted' in {}).toBe(false);
  });

  it('rejects options outside a section and unreadable lines', () => {
    expect(() => parseIni('name = x\n')).toThrow(IniParseError);
    expect(() => parseIni('[metadata]\ngarbage\n')).toThrow('Expected "key = value" (line 2)');
  });
});

describe('parseToml', () => {
  it('reads a Pipfile', () => {
    const pipfile = parseToml(
      [
        '[[source]]',
        'url = "https://pypi.org/simple"',
        'verify_ssl = true',
        '',
        '[packages]',
        'requests = "*"',
        'django = {version = ">=3.2", extras = ["bcrypt"]}',
        '"zope.interface" = \'==5.0\'  # pinned',
        '',
        '[dev-packages]',
        'pytest = ">=7"',
        '',
        '[requires]',
        'python_version = "3.11"',
        'retries = 3',
        ''
      ].join('\n')
    );
    expect(pipfile).toEqual({
      source: [{ url: 'https://pypi.org/simple', verify_ssl: true }],
      packages: {
        requests: '*',
        django: { version: '>=3.2', extras: ['bcrypt'] },
        'zope.interface': '==5.0'
      },
      'dev-packages': { pytest: '>=7' },
      requires: { python_version: '3.11', retries: 3 }
    });
  });

  it('keeps reserved table names as ordinary tables', () => {
    const table = parseToml('[__proto__]\npolluted = "yes"\n[packages]\nconstructor = "*"\n');
    expect(Object.keys(table)).toEqual(['__proto__', 'packages']);
    expect(table['__proto__']).toEqual({ polluted: 'yes' });
    expect(table.packages).toEqual({ constructor: '*' });
    expect('polluted' in {}).toBe(false);
  });

  it('reports unterminated strings', () => {
    expect(() => parseToml('name = "open\n')).toThrow(TomlParseError);
  });
});
