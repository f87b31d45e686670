import { describe, it, expect } from 'vitest';
import { RequirementParseError } from '../errors';
import {
  asRequirementList,
  buildPurl,
  canonicalizeName,
  formatSpecifiers,
  getPinnedVersion,
  getRequiresDependencies,
  parseRequirement,
  resolveRequirement
} from '../requirements';

describe('canonicalizeName', () => {
  it('lower-cases and collapses separator runs', () => {
    expect(canonicalizeName('Foo_Bar.baz')).toBe('foo-bar-baz');
    expect(canonicalizeName('zope--interface')).toBe('zope-interface');
  });
});

describe('buildPurl', () => {
  it('adds the version only when given', () => {
    expect(buildPurl('requests')).toBe('pkg:pypi/requests');
    expect(buildPurl('requests', '2.31.0')).toBe('pkg:pypi/requests@2.31.0');
  });
});

describe('parseRequirement', () => {
  it('reads name, extras, parenthesized specifiers and a marker', () => {
    const requirement = parseRequirement('requests[socks, security] (>=2.8.1, <3) ; python_version >= "3.7"');
    expect(requirement.name).toBe('requests');
    expect(requirement.extras).toEqual(['socks', 'security']);
    expect(requirement.specifiers).toEqual([
      { operator: '>=', version: '2.8.1' },
      { operator: '<', version: '3' }
    ]);
    expect(requirement.marker).toEqual({
      kind: 'clause',
      left: { kind: 'variable', name: 'python_version' },
      op: '>=',
      right: { kind: 'value', value: '3.7' }
    });
  });

  it('reads a direct URL reference', () => {
    const requirement = parseRequirement('pkg @ https://example.com/pkg.zip');
    expect(requirement.url).toBe('https://example.com/pkg.zip');
    expect(requirement.specifiers).toEqual([]);
  });

  it('rejects malformed text', () => {
    expect(() => parseRequirement('requests >=')).toThrow(RequirementParseError);
    expect(() => parseRequirement('>=1.0')).toThrow(RequirementParseError);
    expect(() => parseRequirement('pkg>=1.0,')).toThrow(RequirementParseError);
  });
});

describe('formatSpecifiers and getPinnedVersion', () => {
  it('sorts and de-duplicates specifiers', () => {
    expect(
      formatSpecifiers([
        { operator: '>=', version: '1.0' },
        { operator: '<', version: '2.0' },
        { operator: '>=', version: '1.0' }
      ])
    ).toBe('<2.0,>=1.0');
  });

  it('pins only a single equality specifier', () => {
    expect(getPinnedVersion([{ operator: '==', version: '1.0' }])).toBe('1.0');
    expect(getPinnedVersion([{ operator: '===', version: 'abc' }])).toBe('abc');
    expect(getPinnedVersion([{ operator: '==', version: '1.*' }])).toBe('1.*');
    expect(getPinnedVersion([{ operator: '>=', version: '1.0' }])).toBeUndefined();
    expect(
      getPinnedVersion([
        { operator: '==', version: '1.0' },
        { operator: '!=', version: '1.1' }
      ])
    ).toBeUndefined();
  });
});

describe('resolveRequirement', () => {
  it('resolves a pinned requirement', () => {
    expect(resolveRequirement('pytest==7.0', { defaultScope: 'tests' })).toEqual({
      purl: 'pkg:pypi/pytest@7.0',
      scope: 'tests',
      isRuntime: true,
      isOptional: false,
      isResolved: true,
      extractedRequirement: '==7.0'
    });
  });

  it('leaves a range unresolved and unversioned', () => {
    const dependency = resolveRequirement('Django>=3.2');
    expect(dependency.purl).toBe('pkg:pypi/django');
    expect(dependency.scope).toBe('install');
    expect(dependency.isResolved).toBe(false);
    expect(dependency.extractedRequirement).toBe('>=3.2');
  });

  it('takes the scope from an extra marker', () => {
    const dependency = resolveRequirement('coverage; extra == "test"', { defaultScope: 'install' });
    expect(dependency.scope).toBe('test');
    expect(dependency.extractedRequirement).toBe('coverage; extra == "test"');
  });

  it('resolves a wildcard equality pin', () => {
    const dependency = resolveRequirement('six==1.*');
    expect(dependency.isResolved).toBe(true);
    expect(dependency.purl).toBe('pkg:pypi/six@1.*');
    expect(dependency.extractedRequirement).toBe('==1.*');
  });
});

describe('getRequiresDependencies', () => {
  it('skips malformed entries', () => {
    const dependencies = getRequiresDependencies(['requests>=2', 'bad ===', 'six==1.16']);
    expect(dependencies.map((dependency) => dependency.purl)).toEqual(['pkg:pypi/requests', 'pkg:pypi/six@1.16']);
  });

  it('ignores anything but a list of strings', () => {
    expect(getRequiresDependencies(['a', 3])).toEqual([]);
    expect(getRequiresDependencies('a')).toEqual([]);
    expect(getRequiresDependencies(undefined)).toEqual([]);
  });
});

describe('asRequirementList', () => {
  it('splits text into requirement lines', () => {
    expect(asRequirementList('a\n# comment\n\n b ')).toEqual(['a', 'b']);
    expect(asRequirementList(['x'])).toEqual(['x']);
  });
});
